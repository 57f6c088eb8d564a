/**
 * Error taxonomy for frame construction and materialization.
 *
 * Every error carries the HTTP status the server answers with.
 */
export class QueryFrameError extends Error {
  readonly status: number = 400;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownTableError extends QueryFrameError {
  override readonly status = 404;

  constructor(readonly table: string) {
    super(`unknown table: "${table}"`);
  }
}

export class UnknownColumnError extends QueryFrameError {
  constructor(readonly column: string, context?: string) {
    super(context ? `unknown column: "${column}" (${context})` : `unknown column: "${column}"`);
  }
}

/** Structurally invalid expression, e.g. a column of a relation the plan does not read from. */
export class InvalidExpressionError extends QueryFrameError {}

export class UnsupportedJoinKindError extends QueryFrameError {
  constructor(readonly how: string) {
    super(`unsupported join kind: "${how}" (expected "inner" or "left")`);
  }
}

export class InvalidOperationError extends QueryFrameError {}

export class ExecutionError extends QueryFrameError {
  override readonly status = 502;

  constructor(message: string, readonly sql?: string, options?: ErrorOptions) {
    super(message, options);
  }

  static from(err: unknown, sql?: string): ExecutionError {
    if (err instanceof ExecutionError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new ExecutionError(message, sql, { cause: err });
  }
}
