import type { Dialect } from "../query/dialect";

export type ColumnInfo = {
  name: string;
  type: string;
};

/** One result row, cells aligned with the statement's output columns. */
export type Row = readonly unknown[];

/**
 * Narrow view of a database connection. The caller owns the connection;
 * nothing in this package opens, closes or pools it.
 */
export interface ConnectionAdapter {
  /** Dialect the rendered SQL must follow. Defaults to `sqliteDialect`. */
  readonly dialect?: Dialect;
  listTables(): Promise<string[]>;
  listColumns(table: string): Promise<ColumnInfo[]>;
  execute(sql: string): Promise<Row[]>;
  /** Liveness check; rejects when the database cannot be reached. */
  testConnection?(): Promise<void>;
}
