type Level = "debug" | "info" | "warn" | "error";

import { LOG_LEVEL } from "../config";

const levelOrder: Record<Level, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const threshold = ((): Level => {
  if (LOG_LEVEL === "debug" || LOG_LEVEL === "info" || LOG_LEVEL === "warn" || LOG_LEVEL === "error") return LOG_LEVEL;
  return "info";
})();

export type Logger = Record<Level, (msg: string, extra?: Record<string, unknown>) => void>;

function log(level: Level, scope: string | undefined, msg: string, extra?: Record<string, unknown>) {
  if (levelOrder[level] < levelOrder[threshold]) return;
  const payload = {
    ts: new Date().toISOString(),
    level,
    msg,
    ...(scope ? { scope } : {}),
    ...extra,
  };
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(payload, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value)));
}

export function createLogger(scope?: string): Logger {
  return {
    debug: (msg, extra) => log("debug", scope, msg, extra),
    info: (msg, extra) => log("info", scope, msg, extra),
    warn: (msg, extra) => log("warn", scope, msg, extra),
    error: (msg, extra) => log("error", scope, msg, extra),
  };
}

export const logger = createLogger();
