import { InvalidExpressionError } from "../errors";
import keywords from "./keywords.json";
import type { LiteralValue } from "./types";

export interface Dialect {
  readonly name: string;
  identifier(name: string): string;
  table(name: string): string;
  literal(value: LiteralValue): string;
  /** `" LIMIT n OFFSET m"`, or an empty string when neither is set. */
  limit(limit: number | undefined, offset: number | undefined): string;
}

function quote(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function renderLiteral(value: LiteralValue): string {
  if (value === null) return "NULL";
  if (typeof value === "string") return `'${value.replace(/'/g, "''")}'`;
  if (typeof value === "boolean") return value ? "TRUE" : "FALSE";
  if (typeof value === "bigint") return value.toString();
  if (!Number.isFinite(value)) throw new InvalidExpressionError(`cannot render non-finite number ${value}`);
  return String(value);
}

const MIXED_CASE = /^[A-Za-z_][A-Za-z0-9_]*$/;
const LOWER_CASE = /^[a-z_][a-z0-9_]*$/;

const SQLITE_KEYWORDS = new Set(keywords.sqlite);
const POSTGRES_KEYWORDS = new Set(keywords.postgres);

// SQLite keywords are case-insensitive.
function sqliteIdentifier(name: string): string {
  return MIXED_CASE.test(name) && !SQLITE_KEYWORDS.has(name.toLowerCase()) ? name : quote(name);
}

export const sqliteDialect: Dialect = {
  name: "sqlite",
  identifier: sqliteIdentifier,
  table: sqliteIdentifier,
  literal: renderLiteral,
  limit(limit, offset) {
    if (limit === undefined && offset === undefined) return "";
    // SQLite accepts OFFSET only after a LIMIT; -1 means no limit.
    const head = ` LIMIT ${limit ?? -1}`;
    return offset ? `${head} OFFSET ${offset}` : head;
  },
};

// Postgres folds unquoted identifiers to lower case.
function pgIdentifier(name: string): string {
  return LOWER_CASE.test(name) && !POSTGRES_KEYWORDS.has(name) ? name : quote(name);
}

export const postgresDialect: Dialect = {
  name: "postgres",
  identifier: pgIdentifier,
  table: (name) => name.split(".").map(pgIdentifier).join("."),
  literal: renderLiteral,
  limit(limit, offset) {
    let out = "";
    if (limit !== undefined) out += ` LIMIT ${limit}`;
    if (offset) out += ` OFFSET ${offset}`;
    return out;
  },
};
