/**
 * Expression builders.
 *
 * Expressions are plain immutable objects; every builder returns a new node
 * and never touches its operands. Raw values are lifted to literals.
 */

import type {
  AggregateExpr,
  AggregateFunction,
  BinaryExpr,
  BinaryOperator,
  ColumnExpr,
  Expr,
  LiteralExpr,
  LiteralValue,
  Relation,
  UnaryExpr,
  UnaryOperator,
} from "./types";

export type Operand = Expr | LiteralValue;

export function isExpr(value: Operand): value is Expr {
  return typeof value === "object" && value !== null;
}

export function lit(value: LiteralValue): LiteralExpr {
  return { kind: "literal", value };
}

export function toExpr(value: Operand): Expr {
  return isExpr(value) ? value : lit(value);
}

export function column(relation: Relation, name: string): ColumnExpr {
  return { kind: "column", relation, name };
}

function binary(op: BinaryOperator) {
  return (left: Operand, right: Operand): BinaryExpr => ({
    kind: "binary",
    op,
    left: toExpr(left),
    right: toExpr(right),
  });
}

function unary(op: UnaryOperator) {
  return (operand: Operand): UnaryExpr => ({ kind: "unary", op, operand: toExpr(operand) });
}

function aggregate(fn: AggregateFunction) {
  return (operand: Operand): AggregateExpr => ({ kind: "aggregate", fn, operand: toExpr(operand) });
}

// Arithmetic
export const add = binary("+");
export const sub = binary("-");
export const mul = binary("*");
export const div = binary("/");
export const mod = binary("%");

// Comparison
export const eq = binary("=");
export const ne = binary("<>");
export const lt = binary("<");
export const le = binary("<=");
export const gt = binary(">");
export const ge = binary(">=");

// Boolean
export const and = binary("AND");
export const or = binary("OR");
export const not = unary("NOT");

export const neg = unary("NEG");
export const isNull = unary("IS NULL");
export const notNull = unary("IS NOT NULL");

// Aggregates
export const sum = aggregate("SUM");
export const avg = aggregate("AVG");
export const min = aggregate("MIN");
export const max = aggregate("MAX");

export function count(operand?: Operand): AggregateExpr {
  return { kind: "aggregate", fn: "COUNT", operand: operand === undefined ? null : toExpr(operand) };
}

/** `a AND b`, or whichever side exists. */
export function conjoin(a: Expr | undefined, b: Expr | undefined): Expr | undefined {
  if (a && b) return and(a, b);
  return a ?? b;
}

/** All column references of an expression, depth-first, left to right. */
export function columnsOf(expr: Expr): ColumnExpr[] {
  switch (expr.kind) {
    case "column":
      return [expr];
    case "literal":
      return [];
    case "binary":
      return [...columnsOf(expr.left), ...columnsOf(expr.right)];
    case "unary":
      return columnsOf(expr.operand);
    case "aggregate":
      return expr.operand ? columnsOf(expr.operand) : [];
  }
}

export function hasAggregate(expr: Expr): boolean {
  switch (expr.kind) {
    case "aggregate":
      return true;
    case "binary":
      return hasAggregate(expr.left) || hasAggregate(expr.right);
    case "unary":
      return hasAggregate(expr.operand);
    default:
      return false;
  }
}

/** Rewrite column references whose relation appears in `map`. Unchanged subtrees are shared. */
export function substitute(expr: Expr, map: ReadonlyMap<Relation, Relation>): Expr {
  switch (expr.kind) {
    case "column": {
      const relation = map.get(expr.relation);
      return relation ? column(relation, expr.name) : expr;
    }
    case "literal":
      return expr;
    case "binary": {
      const left = substitute(expr.left, map);
      const right = substitute(expr.right, map);
      return left === expr.left && right === expr.right ? expr : { ...expr, left, right };
    }
    case "unary": {
      const operand = substitute(expr.operand, map);
      return operand === expr.operand ? expr : { ...expr, operand };
    }
    case "aggregate": {
      if (!expr.operand) return expr;
      const operand = substitute(expr.operand, map);
      return operand === expr.operand ? expr : { ...expr, operand };
    }
  }
}
