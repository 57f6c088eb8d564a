import type { ColumnInfo, ConnectionAdapter } from "../adapters/db";
import { ExecutionError, UnknownTableError } from "../errors";
import { sqliteDialect, type Dialect } from "../query/dialect";
import { QueryFrame, type FrameContext } from "../query/frame";
import { tablePlan } from "../query/plan";
import type { TableSource } from "../query/types";
import { createLogger } from "../utils/logger";
import { Table } from "../utils/table";

const log = createLogger("schema");

export type SchemaOptions = {
  /** Overrides the adapter's dialect. */
  dialect?: Dialect;
};

/**
 * Tables and columns of a database, read once from the adapter.
 * The adapter is borrowed: the schema never closes it.
 */
export class Schema {
  private readonly context: FrameContext;

  private constructor(
    adapter: ConnectionAdapter,
    dialect: Dialect,
    private readonly sources: ReadonlyMap<string, TableSource>,
  ) {
    this.context = { adapter, dialect };
  }

  static async load(adapter: ConnectionAdapter, options: SchemaOptions = {}): Promise<Schema> {
    const started = Date.now();
    const sources = new Map<string, TableSource>();
    try {
      for (const table of await adapter.listTables()) {
        if (sources.has(table)) continue;
        const columns = await adapter.listColumns(table);
        sources.set(table, { kind: "table", table, columns: columns.map((c) => ({ name: c.name, type: c.type })) });
      }
    } catch (err) {
      throw ExecutionError.from(err);
    }
    const dialect = options.dialect ?? adapter.dialect ?? sqliteDialect;
    log.info("schema_loaded", { tables: sources.size, dialect: dialect.name, durationMs: Date.now() - started });
    return new Schema(adapter, dialect, sources);
  }

  get dialect(): Dialect {
    return this.context.dialect;
  }

  /** Table names in discovery order. */
  tables(): string[] {
    return [...this.sources.keys()];
  }

  has(table: string): boolean {
    return this.sources.has(table);
  }

  columns(table: string): readonly ColumnInfo[] {
    return this.source(table).columns;
  }

  /** A new frame reading every column of `table`. */
  frame(table: string): QueryFrame {
    return new QueryFrame(this.context, tablePlan(this.source(table)));
  }

  /** Table names as headers with their columns stacked beneath. */
  overview(): Table {
    const tables = this.tables();
    return Table.fromColumns(tables, tables.map((t) => this.columns(t).map((c) => c.name)));
  }

  toString(): string {
    return this.overview().toString();
  }

  private source(table: string): TableSource {
    const source = this.sources.get(table);
    if (!source) throw new UnknownTableError(table);
    return source;
  }
}
