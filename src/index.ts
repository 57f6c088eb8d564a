export type { ColumnInfo, ConnectionAdapter, Row } from "./adapters/db";
export { PostgresAdapter } from "./adapters/postgres";
export * from "./errors";
export { postgresDialect, sqliteDialect } from "./query/dialect";
export type { Dialect } from "./query/dialect";
export * from "./query/expr";
export { QueryFrame } from "./query/frame";
export type { FrameContext } from "./query/frame";
export type { MergeOptions } from "./query/plan";
export { renderPlan } from "./query/render";
export type * from "./query/types";
export { Schema } from "./schema/schema";
export type { SchemaOptions } from "./schema/schema";
export { Table } from "./utils/table";
