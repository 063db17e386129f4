import express from "express";
import type { Express, NextFunction, Request, Response } from "express";
import compression from "compression";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { ApiError } from "@todo-service/types";
import type { AppConfig } from "./config";
import { ConnectionProvider } from "./db";
import { codeOf } from "./errors";
import { logger } from "./logger";
import { createMetrics, metricsEndpoint, observe } from "./metrics";
import type { Metrics } from "./metrics";
import { todoRouter } from "./routes";
import { SchemaManager } from "./schema";

export interface AppDeps {
  config: AppConfig;
  provider?: ConnectionProvider;
  schema?: SchemaManager;
  metrics?: Metrics;
}

export interface TodoApp {
  app: Express;
  provider: ConnectionProvider;
  schema: SchemaManager;
  metrics: Metrics;
}

// Errors raised by body-parser carry an HTTP status and a `type`
type HttpError = Error & { status?: number; type?: string };

export function createApp(deps: AppDeps): TodoApp {
  const { config } = deps;
  const provider = deps.provider ?? new ConnectionProvider(config.db);
  const schema = deps.schema ?? new SchemaManager(provider);
  const metrics = deps.metrics ?? createMetrics({ collectDefaultMetrics: config.collectDefaultMetrics });

  const app = express();

  app.use(helmet()); // secure HTTP headers
  app.use(compression());

  // Observed ahead of the limiter so a 429 on /todos is counted too
  app.get("/todos", observe(metrics, "/todos"));
  app.post("/todos", observe(metrics, "/todos"));

  // Rate limit per IP
  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: config.rateLimitMax,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  // Request logger middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      logger.info({
        method: req.method,
        path: req.path,
        status: res.statusCode,
        ms: Date.now() - start,
      });
    });
    next();
  });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, pid: process.pid, ts: Date.now() });
  });

  app.get("/metrics", metricsEndpoint(metrics));

  app.use(todoRouter({ provider, schema, metrics }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" } satisfies ApiError);
  });

  // Error handler
  app.use((err: HttpError, _req: Request, res: Response, _next: NextFunction) => {
    if (err.type === "entity.parse.failed") {
      res.status(400).json({ error: "Invalid JSON body" } satisfies ApiError);
      return;
    }
    if (err.status && err.status >= 400 && err.status < 500) {
      res.status(err.status).json({ error: err.message } satisfies ApiError);
      return;
    }
    logger.error({ err, code: codeOf(err) }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" } satisfies ApiError);
  });

  return { app, provider, schema, metrics };
}
