/**
 * JSON descriptions of frames, as accepted by `POST /frame`.
 *
 *   { "table": "tracks", "steps": [
 *       { "op": "where", "predicate": { "op": "gt", "args": [{ "col": "Milliseconds" }, { "lit": 300000 }] } },
 *       { "op": "select", "columns": ["Name"] } ] }
 */

import * as e from "../query/expr";
import type { QueryFrame } from "../query/frame";
import type { Expr, LiteralValue } from "../query/types";
import type { Schema } from "../schema/schema";
import type { ExprSpec, FrameSpec, StepSpec } from "../types";

type BadRequest = Error & { status: number };

export function badRequest(message: string): BadRequest {
  return Object.assign(new Error(message), { status: 400 });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isString(value: unknown): value is string {
  return typeof value === "string" && value.length > 0;
}

function stringList(value: unknown, what: string): string[] {
  if (isString(value)) return [value];
  if (Array.isArray(value) && value.every(isString)) return value;
  throw badRequest(`${what} must be a column name or a list of column names`);
}

function optionalList(value: unknown, what: string): string[] | undefined {
  return value === undefined ? undefined : stringList(value, what);
}

function optionalInt(value: unknown, what: string): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isInteger(value)) return value;
  throw badRequest(`${what} must be an integer`);
}

function isLiteral(value: unknown): value is LiteralValue {
  return value === null || ["string", "number", "boolean"].includes(typeof value);
}

const BINARY: Record<string, (l: Expr, r: Expr) => Expr> = {
  add: e.add,
  sub: e.sub,
  mul: e.mul,
  div: e.div,
  mod: e.mod,
  eq: e.eq,
  ne: e.ne,
  lt: e.lt,
  le: e.le,
  gt: e.gt,
  ge: e.ge,
  and: e.and,
  or: e.or,
};

const UNARY: Record<string, (operand: Expr) => Expr> = {
  not: e.not,
  neg: e.neg,
  isNull: e.isNull,
  notNull: e.notNull,
};

export function parseExpr(value: unknown): ExprSpec {
  if (!isRecord(value)) throw badRequest("expression must be an object");
  if ("col" in value) {
    if (!isString(value.col)) throw badRequest("col must be a column name");
    return { col: value.col };
  }
  if ("lit" in value) {
    if (!isLiteral(value.lit)) throw badRequest("lit must be a string, number, boolean or null");
    return { lit: value.lit };
  }
  if (isString(value.op) && Array.isArray(value.args)) {
    const op = value.op;
    const arity = Object.hasOwn(BINARY, op) ? 2 : Object.hasOwn(UNARY, op) ? 1 : 0;
    if (arity === 0) throw badRequest(`unknown operator: ${op}`);
    if (value.args.length !== arity) throw badRequest(`${op} takes ${arity} argument(s)`);
    return { op, args: value.args.map(parseExpr) };
  }
  throw badRequest("expression must have col, lit or op/args");
}

function parseStep(value: unknown): StepSpec {
  if (!isRecord(value)) throw badRequest("step must be an object");
  switch (value.op) {
    case "select":
      return { op: "select", columns: stringList(value.columns, "select.columns") };
    case "drop":
      return { op: "drop", columns: stringList(value.columns, "drop.columns") };
    case "assign":
      if (!isString(value.name)) throw badRequest("assign.name must be a column name");
      return { op: "assign", name: value.name, expr: parseExpr(value.expr) };
    case "rename": {
      const mapping = value.mapping;
      if (!isRecord(mapping) || !Object.values(mapping).every(isString)) {
        throw badRequest("rename.mapping must map column names to new names");
      }
      const out: Record<string, string> = {};
      for (const [from, to] of Object.entries(mapping)) if (isString(to)) out[from] = to;
      return { op: "rename", mapping: out };
    }
    case "where":
      return { op: "where", predicate: parseExpr(value.predicate) };
    case "merge": {
      const how = value.how;
      if (how !== undefined && typeof how !== "string") throw badRequest("merge.how must be a string");
      return {
        op: "merge",
        right: parseFrameSpec(value.right),
        on: optionalList(value.on, "merge.on"),
        leftOn: optionalList(value.leftOn, "merge.leftOn"),
        rightOn: optionalList(value.rightOn, "merge.rightOn"),
        how,
      };
    }
    case "distinct":
      return { op: "distinct" };
    case "slice":
      return { op: "slice", start: optionalInt(value.start, "slice.start"), stop: optionalInt(value.stop, "slice.stop") };
    default:
      throw badRequest(`unknown step: ${String(value.op)}`);
  }
}

export function parseFrameSpec(value: unknown): FrameSpec {
  if (!isRecord(value)) throw badRequest("frame must be an object");
  if (!isString(value.table)) throw badRequest("frame.table must be a table name");
  const steps = value.steps === undefined ? [] : value.steps;
  if (!Array.isArray(steps)) throw badRequest("frame.steps must be a list");
  return { table: value.table, steps: steps.map(parseStep) };
}

/** Column names resolve against the frame the expression is applied to. */
export function toExpr(frame: QueryFrame, spec: ExprSpec): Expr {
  if ("col" in spec) return frame.col(spec.col);
  if ("lit" in spec) return e.lit(spec.lit);
  const args = spec.args.map((arg) => toExpr(frame, arg));
  if (Object.hasOwn(UNARY, spec.op)) return UNARY[spec.op](args[0]);
  if (Object.hasOwn(BINARY, spec.op)) return BINARY[spec.op](args[0], args[1]);
  throw badRequest(`unknown operator: ${spec.op}`);
}

function applyStep(schema: Schema, frame: QueryFrame, step: StepSpec): QueryFrame {
  switch (step.op) {
    case "select":
      return frame.select(step.columns);
    case "drop":
      return frame.drop(step.columns);
    case "assign":
      return frame.assign(step.name, toExpr(frame, step.expr));
    case "rename":
      return frame.rename(step.mapping);
    case "where":
      return frame.where(toExpr(frame, step.predicate));
    case "merge":
      return frame.merge(buildFrame(schema, step.right), {
        on: step.on,
        leftOn: step.leftOn,
        rightOn: step.rightOn,
        how: step.how,
      });
    case "distinct":
      return frame.dropDuplicates();
    case "slice":
      return frame.slice(step.start, step.stop);
  }
}

export function buildFrame(schema: Schema, spec: FrameSpec): QueryFrame {
  return spec.steps.reduce((frame, step) => applyStep(schema, frame, step), schema.frame(spec.table));
}
