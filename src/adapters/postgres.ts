import { Pool, type PoolClient } from "pg";
import { CACHE_POOL_SIZE, POOL_MAX, STATEMENT_TIMEOUT_MS } from "../config";
import { postgresDialect } from "../query/dialect";
import { createLogger } from "../utils/logger";
import { LRU } from "../utils/lru";
import type { ColumnInfo, ConnectionAdapter, Row } from "./db";

const log = createLogger("postgres");

const poolCache = new LRU<string, Pool>(CACHE_POOL_SIZE);

export function getPool(dbUrl: string): Pool {
  const cached = poolCache.get(dbUrl);
  if (cached) return cached;
  const pool = new Pool({ connectionString: dbUrl, max: POOL_MAX });
  poolCache.set(dbUrl, pool);
  return pool;
}

type TableRow = { schema: string; name: string };
type ColumnRow = { name: string; type: string };

export class PostgresAdapter implements ConnectionAdapter {
  readonly dialect = postgresDialect;

  constructor(
    private pool: Pool,
    private readonly timeoutMs: number = STATEMENT_TIMEOUT_MS,
  ) {}

  static fromUrl(dbUrl: string, timeoutMs?: number) {
    return new PostgresAdapter(getPool(dbUrl), timeoutMs);
  }

  async testConnection(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("SELECT 1");
    } finally {
      client.release();
    }
  }

  /** Tables and views outside the system schemas, schema-qualified. */
  async listTables(): Promise<string[]> {
    const sql = `
      SELECT n.nspname AS schema, c.relname AS name
      FROM pg_class c
      JOIN pg_namespace n ON n.oid = c.relnamespace
      WHERE n.nspname NOT IN ('pg_catalog','information_schema')
        AND n.nspname NOT LIKE 'pg_toast%'
        AND c.relkind IN ('r','v','m','p') -- table, view, matview, partitioned table
      ORDER BY 1,2
    `;
    const { rows } = await this.pool.query<TableRow>(sql);
    return rows.map((r) => `${r.schema}.${r.name}`);
  }

  async listColumns(table: string): Promise<ColumnInfo[]> {
    const dot = table.indexOf(".");
    const schema = dot === -1 ? "public" : table.slice(0, dot);
    const rel = dot === -1 ? table : table.slice(dot + 1);
    const sql = `
      SELECT a.attname AS name,
             pg_catalog.format_type(a.atttypid, a.atttypmod) AS type
      FROM pg_attribute a
      JOIN pg_class c ON c.oid = a.attrelid
      JOIN pg_namespace n ON n.oid = c.relnamespace
      WHERE n.nspname = $1 AND c.relname = $2 AND a.attnum > 0 AND NOT a.attisdropped
      ORDER BY a.attnum
    `;
    const { rows } = await this.pool.query<ColumnRow>(sql, [schema, rel]);
    return rows.map((r) => ({ name: r.name, type: String(r.type) }));
  }

  private async withClient<T>(fn: (c: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      // PostgreSQL does not accept parameter placeholders in SET commands.
      const timeout = Math.trunc(this.timeoutMs) || 0;
      await client.query(`SET statement_timeout TO ${timeout}`);
      return await fn(client);
    } finally {
      await client.query("SET statement_timeout TO DEFAULT").catch((err: unknown) => {
        log.warn("statement_timeout_reset_failed", { message: err instanceof Error ? err.message : String(err) });
      });
      client.release();
    }
  }

  async execute(sql: string): Promise<Row[]> {
    log.info("sql_execute", { sql });
    return this.withClient(async (client) => {
      const result = await client.query<unknown[]>({ text: sql, rowMode: "array" });
      return result.rows;
    });
  }
}
