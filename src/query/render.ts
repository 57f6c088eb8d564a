import { InvalidExpressionError } from "../errors";
import type { Dialect } from "./dialect";
import { hasAggregate } from "./expr";
import type { Expr, Plan, Relation, Source } from "./types";

// Two- and three-letter words an alias must not collide with.
const RESERVED = new Set(["as", "at", "by", "do", "if", "in", "is", "no", "of", "on", "or", "to", "all", "and", "any", "asc", "end", "for", "not", "set"]);

/** Bijective base-26 name: 0 -> a, 25 -> z, 26 -> aa, 27 -> ab. */
export function aliasAt(index: number): string {
  let n = index + 1;
  let out = "";
  while (n > 0) {
    n -= 1;
    out = String.fromCharCode(97 + (n % 26)) + out;
    n = Math.floor(n / 26);
  }
  return out;
}

export class AliasGenerator {
  private index = 0;

  next(): string {
    let alias = aliasAt(this.index++);
    while (RESERVED.has(alias)) alias = aliasAt(this.index++);
    return alias;
  }
}

/** Aliases of one SELECT scope. Nested subqueries draw from the same generator. */
export class RenderContext {
  private readonly aliases = new Map<Relation, string>();

  constructor(
    readonly dialect: Dialect,
    private readonly names: AliasGenerator = new AliasGenerator(),
  ) {}

  nested(): RenderContext {
    return new RenderContext(this.dialect, this.names);
  }

  bind(relation: Relation): void {
    if (!this.aliases.has(relation)) this.aliases.set(relation, this.names.next());
  }

  alias(relation: Relation): string {
    const alias = this.aliases.get(relation);
    if (alias === undefined) {
      throw new InvalidExpressionError(`expression references ${describeRelation(relation)}, which is not part of this query`);
    }
    return alias;
  }
}

export function describeRelation(relation: Relation): string {
  return relation.kind === "table" ? `table "${relation.table}"` : "a derived table";
}

/** Relations addressable in the SELECT that reads `source`, in join order. */
export function visibleRelations(source: Source): Relation[] {
  if (source.kind === "join") return [...visibleRelations(source.left), ...visibleRelations(source.right)];
  return [source];
}

export function relationColumns(relation: Relation): string[] {
  return relation.kind === "table"
    ? relation.columns.map((c) => c.name)
    : relation.plan.projection.map((c) => c.name);
}

function operand(expr: Expr, ctx: RenderContext): string {
  const sql = renderExpr(expr, ctx);
  return expr.kind === "binary" || expr.kind === "unary" ? `(${sql})` : sql;
}

export function renderExpr(expr: Expr, ctx: RenderContext): string {
  switch (expr.kind) {
    case "column": {
      const alias = ctx.alias(expr.relation);
      if (!relationColumns(expr.relation).includes(expr.name)) {
        throw new InvalidExpressionError(`column "${expr.name}" does not exist in ${describeRelation(expr.relation)}`);
      }
      return `${alias}.${ctx.dialect.identifier(expr.name)}`;
    }
    case "literal":
      return ctx.dialect.literal(expr.value);
    case "binary":
      return `${operand(expr.left, ctx)} ${expr.op} ${operand(expr.right, ctx)}`;
    case "unary":
      switch (expr.op) {
        case "NOT":
          return `NOT ${operand(expr.operand, ctx)}`;
        case "NEG":
          return expr.operand.kind === "column"
            ? `-${renderExpr(expr.operand, ctx)}`
            : `-(${renderExpr(expr.operand, ctx)})`;
        default:
          return `${operand(expr.operand, ctx)} ${expr.op}`;
      }
    case "aggregate":
      return `${expr.fn}(${expr.operand ? renderExpr(expr.operand, ctx) : "*"})`;
  }
}

function renderSource(source: Source, ctx: RenderContext): string {
  switch (source.kind) {
    case "table":
      return `${ctx.dialect.table(source.table)} AS ${ctx.alias(source)}`;
    case "derived":
      return `(${renderSelect(source.plan, ctx.nested())}) AS ${ctx.alias(source)}`;
    case "join": {
      const left = renderSource(source.left, ctx);
      const right = source.right.kind === "join"
        ? `(${renderSource(source.right, ctx)})`
        : renderSource(source.right, ctx);
      const conditions = source.on.map((key) => `${operand(key.left, ctx)}=${operand(key.right, ctx)}`);
      if (source.condition) conditions.push(operand(source.condition, ctx));
      const kind = source.how === "left" ? "LEFT" : "INNER";
      return `${left} ${kind} JOIN ${right} ON ${conditions.join(" AND ")}`;
    }
  }
}

function renderSelect(plan: Plan, ctx: RenderContext): string {
  if (plan.projection.length === 0) throw new InvalidExpressionError("cannot render a query without output columns");
  for (const relation of visibleRelations(plan.source)) ctx.bind(relation);

  const outputs = plan.projection.map(({ name, expr }) => {
    const sql = renderExpr(expr, ctx);
    return expr.kind === "column" && expr.name === name ? sql : `${sql} AS ${ctx.dialect.identifier(name)}`;
  });
  const from = renderSource(plan.source, ctx);

  let where = "";
  if (plan.filter) {
    if (hasAggregate(plan.filter)) throw new InvalidExpressionError("aggregates are not allowed in a filter");
    where = ` WHERE ${renderExpr(plan.filter, ctx)}`;
  }

  const distinct = plan.distinct ? " DISTINCT" : "";
  return `SELECT${distinct} ${outputs.join(", ")} FROM ${from}${where}${ctx.dialect.limit(plan.limit, plan.offset)}`;
}

/** Render one complete statement. Pure: the same plan always yields the same text. */
export function renderPlan(plan: Plan, dialect: Dialect): string {
  return `${renderSelect(plan, new RenderContext(dialect))};`;
}
