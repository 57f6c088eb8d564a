import type { Request, Response, NextFunction } from "express";
import { QueryFrameError } from "../errors";
import { logger } from "../utils/logger";

export function statusOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") return err.status;
  return 500;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  const message = err instanceof Error && err.message ? err.message : "Internal error";
  logger.error("request_error", { status, message });
  const body: { error: string; code?: string } = { error: message };
  if (err instanceof QueryFrameError) body.code = err.name;
  res.status(status).json(body);
}
