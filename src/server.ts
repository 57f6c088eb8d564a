import express from "express";
import type { Request } from "express";
import { PG_URL, SCHEMA_TTL_SECONDS, MAX_LIMIT, HEAD_ROWS, CACHE_POOL_SIZE } from "./config";
import { logger } from "./utils/logger";
import { LRU } from "./utils/lru";
import { PostgresAdapter } from "./adapters/postgres";
import type { ConnectionAdapter } from "./adapters/db";
import { Schema } from "./schema/schema";
import { badRequest, buildFrame, isRecord, parseFrameSpec } from "./pipeline/pipeline";
import type { FrameAction, FrameRequest, FrameResponse } from "./types";
import { errorHandler } from "./middleware/error";
import { ExecutionError } from "./errors";

const ACTIONS: readonly FrameAction[] = ["sql", "head", "shape"];

// Validations
export function parseFrameRequest(body: unknown): FrameRequest {
  if (!isRecord(body)) throw badRequest("Invalid body");
  const { dbUrl, frame, action, n } = body;
  if (dbUrl !== undefined && typeof dbUrl !== "string") throw badRequest("Invalid dbUrl");
  const parsedAction = ACTIONS.find((a) => a === (action ?? "sql"));
  if (!parsedAction) throw badRequest(`Invalid action, expected one of: ${ACTIONS.join(", ")}`);
  if (n !== undefined && (typeof n !== "number" || !Number.isInteger(n) || n < 0 || n > MAX_LIMIT)) {
    throw badRequest(`Invalid n, expected an integer between 0 and ${MAX_LIMIT}`);
  }
  return { dbUrl, frame: parseFrameSpec(frame), action: parsedAction, n };
}

export type AppOptions = {
  /** Adapter factory per database URL. Defaults to a pooled Postgres adapter. */
  connect?: (dbUrl: string) => ConnectionAdapter;
};

export function createApp(options: AppOptions = {}) {
  const connect = options.connect ?? ((dbUrl: string) => PostgresAdapter.fromUrl(dbUrl));
  // Schemas per dbUrl with TTL
  const schemaCache = new LRU<string, { ts: number; schema: Schema }>(CACHE_POOL_SIZE);

  async function getSchema(dbUrl: string | undefined): Promise<Schema> {
    const url = dbUrl || PG_URL;
    if (!url) throw badRequest("Missing dbUrl");
    const now = Date.now();
    const entry = schemaCache.get(url);
    if (entry && now - entry.ts <= SCHEMA_TTL_SECONDS * 1000) return entry.schema;
    const schema = await Schema.load(connect(url));
    schemaCache.set(url, { ts: now, schema });
    return schema;
  }

  function queryDbUrl(req: Request): string | undefined {
    return typeof req.query.dbUrl === "string" ? req.query.dbUrl : undefined;
  }

  const app = express();
  app.use(express.json({ limit: "1mb" }));

  app.get("/healthz", async (req, res, next) => {
    try {
      const dbUrl = queryDbUrl(req);
      if (dbUrl) {
        const adapter = connect(dbUrl);
        if (adapter.testConnection) await adapter.testConnection();
      }
      res.json({ ok: true });
    } catch (err) {
      next(ExecutionError.from(err));
    }
  });

  app.get("/tables", async (req, res, next) => {
    try {
      const schema = await getSchema(queryDbUrl(req));
      res.json({ tables: schema.tables() });
    } catch (err) {
      next(err);
    }
  });

  app.get("/tables/:name", async (req, res, next) => {
    try {
      const schema = await getSchema(queryDbUrl(req));
      res.json({ name: req.params.name, columns: schema.columns(req.params.name) });
    } catch (err) {
      next(err);
    }
  });

  app.get("/overview", async (req, res, next) => {
    try {
      const schema = await getSchema(queryDbUrl(req));
      res.type("text/plain").send(schema.toString());
    } catch (err) {
      next(err);
    }
  });

  app.post("/frame", async (req, res, next) => {
    const started = Date.now();
    try {
      const request = parseFrameRequest(req.body);
      const schema = await getSchema(request.dbUrl);
      const frame = buildFrame(schema, request.frame);
      const response: FrameResponse = { sql: frame.query(), columns: frame.columns };

      if (request.action === "head") {
        const table = await frame.head(request.n ?? HEAD_ROWS);
        response.rows = [...table.rows];
      } else if (request.action === "shape") {
        response.shape = await frame.shape();
      }

      const durationMs = Date.now() - started;
      logger.info("frame_ok", { table: request.frame.table, action: request.action, sql: response.sql, durationMs });
      res.json(response);
    } catch (err) {
      next(err);
    }
  });

  app.use(errorHandler);
  return app;
}
