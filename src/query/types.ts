import type { ColumnInfo } from "../adapters/db";

export type LiteralValue = string | number | bigint | boolean | null;

export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";
export type ComparisonOperator = "=" | "<>" | "<" | "<=" | ">" | ">=";
export type LogicalOperator = "AND" | "OR";
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;
export type UnaryOperator = "NOT" | "NEG" | "IS NULL" | "IS NOT NULL";
export type AggregateFunction = "SUM" | "AVG" | "MIN" | "MAX" | "COUNT";

export type JoinKind = "inner" | "left";

// Sources

/** Base table as discovered by the schema. Compared by identity. */
export interface TableSource {
  readonly kind: "table";
  readonly table: string;
  readonly columns: readonly ColumnInfo[];
}

/** A sealed plan read as a subquery: `FROM (SELECT ...) AS a`. */
export interface DerivedSource {
  readonly kind: "derived";
  readonly plan: Plan;
}

/** Anything a column reference can point at. */
export type Relation = TableSource | DerivedSource;

export interface JoinKey {
  readonly left: Expr;
  readonly right: Expr;
}

export interface JoinSource {
  readonly kind: "join";
  readonly left: Source;
  readonly right: Source;
  readonly how: JoinKind;
  readonly on: readonly JoinKey[];
  /** Extra ON conjunct; carries the right side's filter of a left join. */
  readonly condition?: Expr;
}

export type Source = Relation | JoinSource;

// Expressions

export interface ColumnExpr {
  readonly kind: "column";
  readonly relation: Relation;
  readonly name: string;
}

export interface LiteralExpr {
  readonly kind: "literal";
  readonly value: LiteralValue;
}

export interface BinaryExpr {
  readonly kind: "binary";
  readonly op: BinaryOperator;
  readonly left: Expr;
  readonly right: Expr;
}

export interface UnaryExpr {
  readonly kind: "unary";
  readonly op: UnaryOperator;
  readonly operand: Expr;
}

export interface AggregateExpr {
  readonly kind: "aggregate";
  readonly fn: AggregateFunction;
  /** null means `COUNT(*)` */
  readonly operand: Expr | null;
}

export type Expr = ColumnExpr | LiteralExpr | BinaryExpr | UnaryExpr | AggregateExpr;

// Plans

export interface OutputColumn {
  readonly name: string;
  readonly expr: Expr;
}

export interface Plan {
  readonly source: Source;
  /** Output order is insertion order; names are unique. */
  readonly projection: readonly OutputColumn[];
  readonly filter?: Expr;
  readonly distinct?: boolean;
  readonly limit?: number;
  readonly offset?: number;
}
