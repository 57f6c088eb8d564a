import { env } from "process";

function intFromEnv(name: string, def: number): number {
  const v = env[name];
  if (!v) return def;
  const n = parseInt(v, 10);
  return Number.isFinite(n) ? n : def;
}

export const PG_URL = env.PG_URL || "";
export const PORT = intFromEnv("PORT", 8080);
export const LOG_LEVEL = (env.LOG_LEVEL || "info").toLowerCase();

export const STATEMENT_TIMEOUT_MS = intFromEnv("STATEMENT_TIMEOUT_MS", 3000);
export const POOL_MAX = intFromEnv("POOL_MAX", 10);
export const CACHE_POOL_SIZE = intFromEnv("CACHE_POOL_SIZE", 8); // LRU of db URLs

export const SCHEMA_TTL_SECONDS = intFromEnv("SCHEMA_TTL_SECONDS", 900);
export const MAX_LIMIT = intFromEnv("MAX_LIMIT", 1000);
export const HEAD_ROWS = intFromEnv("HEAD_ROWS", 5);
