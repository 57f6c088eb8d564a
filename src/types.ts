import type { Row } from "./adapters/db";
import type { LiteralValue } from "./query/types";

export type ExprSpec =
  | { col: string }
  | { lit: LiteralValue }
  | { op: string; args: ExprSpec[] };

export type StepSpec =
  | { op: "select"; columns: string[] }
  | { op: "assign"; name: string; expr: ExprSpec }
  | { op: "rename"; mapping: Record<string, string> }
  | { op: "drop"; columns: string[] }
  | { op: "where"; predicate: ExprSpec }
  | { op: "merge"; right: FrameSpec; on?: string[]; leftOn?: string[]; rightOn?: string[]; how?: string }
  | { op: "distinct" }
  | { op: "slice"; start?: number; stop?: number };

export type FrameSpec = {
  table: string;
  steps: StepSpec[];
};

export type FrameAction = "sql" | "head" | "shape";

export type FrameRequest = {
  dbUrl?: string;
  frame: FrameSpec;
  action?: FrameAction;
  n?: number;
};

export type FrameResponse = {
  sql: string;
  columns: string[];
  rows?: Row[];
  shape?: [number, number];
};
