import type { RequestHandler } from "express";
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics as collectDefaults } from "prom-client";

// ─── Metrics ──────────────────────────────────────────────
// One registry per app instance, scraped at GET /metrics.

export interface Metrics {
  register: Registry;
  requests: Counter<"method" | "route" | "status">;
  latency: Histogram<"method" | "route">;
  todoItems: Gauge;
}

export interface MetricsOptions {
  collectDefaultMetrics?: boolean;
}

export function createMetrics({ collectDefaultMetrics = false }: MetricsOptions = {}): Metrics {
  const register = new Registry();
  if (collectDefaultMetrics) collectDefaults({ register });

  return {
    register,
    requests: new Counter({
      name: "http_requests_total",
      help: "Total HTTP requests",
      labelNames: ["method", "route", "status"] as const,
      registers: [register],
    }),
    latency: new Histogram({
      name: "http_request_duration_seconds",
      help: "HTTP request latency in seconds",
      labelNames: ["method", "route"] as const,
      buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
      registers: [register],
    }),
    todoItems: new Gauge({
      name: "todo_items",
      help: "Current number of todo items",
      registers: [register],
    }),
  };
}

/**
 * Records exactly one count and one latency observation per request, tagged
 * with the final status, whether the handler succeeded or not.
 */
export const observe = (metrics: Metrics, route: string): RequestHandler => (req, res, next) => {
  const start = process.hrtime.bigint();
  let recorded = false;

  const record = () => {
    if (recorded) return;
    recorded = true;
    const seconds = Number(process.hrtime.bigint() - start) / 1e9;
    metrics.requests.inc({ method: req.method, route, status: String(res.statusCode) });
    metrics.latency.observe({ method: req.method, route }, seconds);
  };

  res.once("finish", record);
  res.once("close", record);
  next();
};

export const metricsEndpoint = (metrics: Metrics): RequestHandler => async (_req, res, next) => {
  try {
    res.set("Content-Type", metrics.register.contentType);
    res.end(await metrics.register.metrics());
  } catch (err) {
    next(err);
  }
};
