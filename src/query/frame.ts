import type { ConnectionAdapter, Row } from "../adapters/db";
import { ExecutionError, InvalidOperationError } from "../errors";
import { createLogger } from "../utils/logger";
import { Table } from "../utils/table";
import type { Dialect } from "./dialect";
import * as plans from "./plan";
import type { MergeOptions } from "./plan";
import { renderPlan } from "./render";
import type { AggregateFunction, Expr, Plan } from "./types";

const log = createLogger("frame");

export interface FrameContext {
  readonly adapter: ConnectionAdapter;
  readonly dialect: Dialect;
}

function toNumber(value: unknown, sql: string): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return value;
  if (typeof value === "bigint") return Number(value);
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  throw new ExecutionError(`expected a numeric result, got ${typeof value}`, sql);
}

/**
 * Lazy relation handle. Transformations return new frames and never touch
 * the database; `head`, `values`, `shape` and the aggregates execute exactly
 * one statement each.
 */
export class QueryFrame {
  private rows?: Promise<Row[]>;
  private rowCount?: Promise<number>;

  constructor(
    private readonly context: FrameContext,
    readonly plan: Plan,
  ) {}

  private derive(plan: Plan): QueryFrame {
    return new QueryFrame(this.context, plan);
  }

  /** Output column names, in order. */
  get columns(): string[] {
    return plans.outputNames(this.plan);
  }

  /** Expression behind an output column, for use in `where`, `assign` and the builders. */
  col(name: string): Expr {
    return plans.lookup(this.plan, name);
  }

  select(names: readonly string[]): QueryFrame {
    return this.derive(plans.project(this.plan, names));
  }

  assign(name: string, expr: Expr): QueryFrame {
    return this.derive(plans.assign(this.plan, name, expr));
  }

  rename(mapping: Readonly<Record<string, string>>): QueryFrame {
    return this.derive(plans.rename(this.plan, mapping));
  }

  drop(names: readonly string[]): QueryFrame {
    return this.derive(plans.drop(this.plan, names));
  }

  where(predicate: Expr): QueryFrame {
    return this.derive(plans.filter(this.plan, predicate));
  }

  merge(right: QueryFrame, options: MergeOptions = {}): QueryFrame {
    if (right.context.adapter !== this.context.adapter) {
      throw new InvalidOperationError("cannot merge frames from different connections");
    }
    return this.derive(plans.join(this.plan, right.plan, options));
  }

  dropDuplicates(): QueryFrame {
    return this.derive(plans.distinct(this.plan));
  }

  slice(start?: number, stop?: number): QueryFrame {
    return this.derive(plans.slice(this.plan, start, stop));
  }

  /** SQL text of the frame. Never executes. */
  query(): string {
    return renderPlan(this.plan, this.context.dialect);
  }

  toString(): string {
    return this.query();
  }

  async head(n = 5): Promise<Table> {
    if (!Number.isInteger(n) || n < 0) throw new InvalidOperationError(`invalid row count: ${n}`);
    const preview = this.slice(0, n);
    return new Table(preview.columns, await preview.values());
  }

  /** All rows. Fetched once per frame; a failed fetch is not remembered. */
  values(): Promise<Row[]> {
    if (!this.rows) {
      this.rows = this.fetch(this.query()).catch((err: unknown) => {
        this.rows = undefined;
        throw err;
      });
    }
    return this.rows;
  }

  /** `[rows, columns]`; only the row count reaches the database. */
  async shape(): Promise<[number, number]> {
    const width = this.columns.length;
    if (!this.rowCount) {
      this.rowCount = this.countRows().catch((err: unknown) => {
        this.rowCount = undefined;
        throw err;
      });
    }
    return [await this.rowCount, width];
  }

  sum(name: string): Promise<number | null> {
    return this.numeric("SUM", name);
  }

  mean(name: string): Promise<number | null> {
    return this.numeric("AVG", name);
  }

  min(name: string): Promise<unknown> {
    return this.scalar("MIN", name).then(({ value }) => value);
  }

  max(name: string): Promise<unknown> {
    return this.scalar("MAX", name).then(({ value }) => value);
  }

  private async numeric(fn: AggregateFunction, name: string): Promise<number | null> {
    const { sql, value } = await this.scalar(fn, name);
    return toNumber(value, sql);
  }

  private async scalar(fn: AggregateFunction, name: string): Promise<{ sql: string; value: unknown }> {
    const sql = renderPlan(plans.aggregatePlan(this.plan, fn, name), this.context.dialect);
    const rows = await this.fetch(sql);
    return { sql, value: rows[0]?.[0] ?? null };
  }

  private async countRows(): Promise<number> {
    const sql = renderPlan(plans.countPlan(this.plan), this.context.dialect);
    const rows = await this.fetch(sql);
    const count = toNumber(rows[0]?.[0], sql);
    if (count === null) throw new ExecutionError("COUNT query returned no rows", sql);
    return count;
  }

  private async fetch(sql: string): Promise<Row[]> {
    log.debug("frame_fetch", { sql });
    try {
      const rows = await this.context.adapter.execute(sql);
      log.debug("frame_fetched", { sql, rowCount: rows.length });
      return rows;
    } catch (err) {
      log.warn("frame_fetch_failed", { sql, message: err instanceof Error ? err.message : String(err) });
      throw ExecutionError.from(err, sql);
    }
  }
}
