/**
 * Plan composition. Every operation takes a plan and returns a new one;
 * unchanged sources and expressions are shared, never copied.
 */

import {
  InvalidExpressionError,
  InvalidOperationError,
  UnknownColumnError,
  UnsupportedJoinKindError,
} from "../errors";
import { column, columnsOf, conjoin, count, hasAggregate, substitute } from "./expr";
import { describeRelation, relationColumns, visibleRelations } from "./render";
import type {
  AggregateFunction,
  DerivedSource,
  Expr,
  JoinKind,
  JoinKey,
  OutputColumn,
  Plan,
  Relation,
  Source,
  TableSource,
} from "./types";

export type MergeOptions = {
  /** Column name(s) present on both sides. */
  on?: string | readonly string[];
  leftOn?: string | readonly string[];
  rightOn?: string | readonly string[];
  /** "inner" (default) or "left". */
  how?: string;
};

export function tablePlan(source: TableSource): Plan {
  return {
    source,
    projection: source.columns.map((c) => ({ name: c.name, expr: column(source, c.name) })),
  };
}

export function outputNames(plan: Plan): string[] {
  return plan.projection.map((c) => c.name);
}

// Sealing

export function isSealed(plan: Plan): boolean {
  return Boolean(plan.distinct) || plan.limit !== undefined || plan.offset !== undefined;
}

const derivedSources = new WeakMap<Plan, DerivedSource>();
const openedPlans = new WeakMap<Plan, Plan>();

/** The plan as a subquery. Memoized so references taken from it stay valid. */
export function derive(plan: Plan): DerivedSource {
  let source = derivedSources.get(plan);
  if (!source) {
    source = { kind: "derived", plan };
    derivedSources.set(plan, source);
  }
  return source;
}

/**
 * A plan further operations can build on: the plan itself, or for a sealed
 * plan (DISTINCT / LIMIT / OFFSET) a pass-through SELECT over it.
 */
export function open(plan: Plan): Plan {
  if (!isSealed(plan)) return plan;
  let opened = openedPlans.get(plan);
  if (!opened) {
    const source = derive(plan);
    opened = {
      source,
      projection: plan.projection.map((c) => ({ name: c.name, expr: column(source, c.name) })),
    };
    openedPlans.set(plan, opened);
  }
  return opened;
}

// Lookup and scope

export function lookup(plan: Plan, name: string): Expr {
  const found = open(plan).projection.find((c) => c.name === name);
  if (!found) throw new UnknownColumnError(name, `available: ${outputNames(plan).join(", ")}`);
  return found.expr;
}

/** Every column reference must point at a relation this plan reads and at a column it exposes. */
export function checkScope(plan: Plan, expr: Expr): void {
  const visible = new Set(visibleRelations(plan.source));
  for (const ref of columnsOf(expr)) {
    if (!visible.has(ref.relation)) {
      throw new InvalidExpressionError(
        `column "${ref.name}" comes from ${describeRelation(ref.relation)}, which this frame does not read from`,
      );
    }
    if (!relationColumns(ref.relation).includes(ref.name)) {
      throw new InvalidExpressionError(`column "${ref.name}" does not exist in ${describeRelation(ref.relation)}`);
    }
  }
}

function assertUnique(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) throw new InvalidOperationError(`duplicate output column: "${name}"`);
    seen.add(name);
  }
}

// Column operations

export function project(plan: Plan, names: readonly string[]): Plan {
  if (names.length === 0) throw new InvalidOperationError("cannot select an empty list of columns");
  assertUnique(names);
  const base = open(plan);
  const projection = names.map((name) => ({ name, expr: lookup(base, name) }));
  return { ...base, projection };
}

export function assign(plan: Plan, name: string, expr: Expr): Plan {
  const base = open(plan);
  checkScope(base, expr);
  if (hasAggregate(expr)) throw new InvalidExpressionError(`aggregate expression cannot be assigned to column "${name}"`);

  const index = base.projection.findIndex((c) => c.name === name);
  const entry: OutputColumn = { name, expr };
  const projection = index === -1
    ? [...base.projection, entry]
    : base.projection.map((c, i) => (i === index ? entry : c));
  return { ...base, projection };
}

export function rename(plan: Plan, mapping: Readonly<Record<string, string>>): Plan {
  const base = open(plan);
  const names = outputNames(base);
  const renames = new Map(Object.entries(mapping));
  for (const from of renames.keys()) {
    if (!names.includes(from)) throw new UnknownColumnError(from, "cannot rename");
  }
  const projection = base.projection.map((c) => {
    const to = renames.get(c.name);
    return to === undefined ? c : { name: to, expr: c.expr };
  });
  assertUnique(projection.map((c) => c.name));
  return { ...base, projection };
}

export function drop(plan: Plan, names: readonly string[]): Plan {
  const base = open(plan);
  const existing = outputNames(base);
  for (const name of names) {
    if (!existing.includes(name)) throw new UnknownColumnError(name, "cannot drop");
  }
  const projection = base.projection.filter((c) => !names.includes(c.name));
  if (projection.length === 0) throw new InvalidOperationError("cannot drop every column");
  return { ...base, projection };
}

// Row operations

export function filter(plan: Plan, predicate: Expr): Plan {
  const base = open(plan);
  checkScope(base, predicate);
  if (hasAggregate(predicate)) throw new InvalidExpressionError("aggregates are not allowed in a filter");
  return { ...base, filter: conjoin(base.filter, predicate) };
}

export function distinct(plan: Plan): Plan {
  if (plan.distinct && plan.limit === undefined && plan.offset === undefined) return plan;
  const base = plan.limit === undefined && plan.offset === undefined ? plan : open(plan);
  return { ...base, distinct: true };
}

/** Rows `start` (inclusive) to `stop` (exclusive), like positional slicing. */
export function slice(plan: Plan, start = 0, stop?: number): Plan {
  if (!Number.isInteger(start) || start < 0) throw new InvalidOperationError(`invalid slice start: ${start}`);
  if (stop !== undefined && (!Number.isInteger(stop) || stop < start)) {
    throw new InvalidOperationError(`invalid slice: [${start}, ${stop})`);
  }
  if (start === 0 && stop === undefined) return plan;
  const base = plan.limit === undefined && plan.offset === undefined ? plan : open(plan);
  return {
    ...base,
    limit: stop === undefined ? undefined : stop - start,
    offset: start > 0 ? start : undefined,
  };
}

// Joins

export function toJoinKind(how: string): JoinKind {
  if (how === "inner" || how === "left") return how;
  throw new UnsupportedJoinKindError(how);
}

function asList(names: string | readonly string[]): readonly string[] {
  return typeof names === "string" ? [names] : names;
}

function joinColumns(left: Plan, right: Plan, options: MergeOptions): [readonly string[], readonly string[]] {
  const [leftNames, rightNames] = requestedKeys(left, right, options);
  if (leftNames.length === 0) throw new InvalidOperationError("merge needs at least one key column");
  return [leftNames, rightNames];
}

function requestedKeys(left: Plan, right: Plan, options: MergeOptions): [readonly string[], readonly string[]] {
  const { on, leftOn, rightOn } = options;
  if (on !== undefined) {
    if (leftOn !== undefined || rightOn !== undefined) {
      throw new InvalidOperationError('merge takes either "on" or "leftOn"/"rightOn", not both');
    }
    const names = asList(on);
    for (const name of names) {
      if (!outputNames(left).includes(name) || !outputNames(right).includes(name)) {
        throw new UnknownColumnError(name, "not in both frames");
      }
    }
    return [names, names];
  }
  if (leftOn !== undefined || rightOn !== undefined) {
    if (leftOn === undefined || rightOn === undefined) {
      throw new InvalidOperationError('"leftOn" and "rightOn" must be given together');
    }
    const l = asList(leftOn);
    const r = asList(rightOn);
    if (l.length !== r.length) throw new InvalidOperationError('"leftOn" and "rightOn" must have the same length');
    return [l, r];
  }
  const common = outputNames(left).filter((name) => outputNames(right).includes(name));
  if (common.length !== 1) {
    throw new InvalidOperationError(
      common.length === 0
        ? "frames share no column to merge on"
        : `cannot infer merge key from shared columns: ${common.join(", ")}`,
    );
  }
  return [common, common];
}

function replaceRelations(source: Source, map: ReadonlyMap<Relation, Relation>): Source {
  if (source.kind !== "join") return map.get(source) ?? source;
  return {
    ...source,
    left: replaceRelations(source.left, map),
    right: replaceRelations(source.right, map),
    on: source.on.map((key) => ({ left: substitute(key.left, map), right: substitute(key.right, map) })),
    condition: source.condition && substitute(source.condition, map),
  };
}

/** Give the relations in `shared` fresh identities so both join sides get their own alias. */
function rebase(plan: Plan, shared: readonly Relation[]): Plan {
  const map = new Map<Relation, Relation>();
  for (const relation of shared) map.set(relation, { ...relation });
  return {
    ...plan,
    source: replaceRelations(plan.source, map),
    projection: plan.projection.map((c) => ({ name: c.name, expr: substitute(c.expr, map) })),
    filter: plan.filter && substitute(plan.filter, map),
  };
}

/**
 * Join two plans. Output columns are the left projection followed by the
 * right one; a right column whose name the left side already exposes is
 * dropped, so rename one side first to keep both.
 *
 * When both sides read the same table, the right side gets its own copy of
 * it; expressions taken from the right frame before the merge still point at
 * the left copy, so take them from the merged frame.
 */
export function join(leftPlan: Plan, rightPlan: Plan, options: MergeOptions = {}): Plan {
  const how = toJoinKind(options.how ?? "inner");
  const left = open(leftPlan);
  let right = open(rightPlan);

  const [leftNames, rightNames] = joinColumns(left, right, options);

  const leftRelations = new Set(visibleRelations(left.source));
  const shared = visibleRelations(right.source).filter((r) => leftRelations.has(r));
  if (shared.length > 0) right = rebase(right, shared);

  const on: JoinKey[] = leftNames.map((name, i) => ({ left: lookup(left, name), right: lookup(right, rightNames[i]) }));

  const taken = new Set(outputNames(left));
  const projection = [...left.projection, ...right.projection.filter((c) => !taken.has(c.name))];

  return {
    source: {
      kind: "join",
      left: left.source,
      right: right.source,
      how,
      on,
      condition: how === "left" ? right.filter : undefined,
    },
    projection,
    filter: how === "left" ? left.filter : conjoin(left.filter, right.filter),
  };
}

// Materialization helpers

export function aggregatePlan(plan: Plan, fn: AggregateFunction, name: string): Plan {
  const base = open(plan);
  const operand = lookup(base, name);
  return {
    source: base.source,
    filter: base.filter,
    projection: [{ name, expr: { kind: "aggregate", fn, operand } }],
  };
}

/** `SELECT COUNT(*) FROM (<plan>) AS a` */
export function countPlan(plan: Plan): Plan {
  return {
    source: derive(plan),
    projection: [{ name: "row_count", expr: count() }],
  };
}
