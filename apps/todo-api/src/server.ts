/**
 * ─────────────────────────────────────────────────────────
 *  TODO SERVICE
 *  Stack: Node.js + TypeScript + Express + PostgreSQL (pg) + prom-client
 * ─────────────────────────────────────────────────────────
 *
 *  Boot sequence:
 *  - Create the database and table if they are missing
 *  - Keep starting even if that fails; the first request retries it
 *  - Listen, and shut down cleanly on SIGTERM / SIGINT
 */

import { createApp } from "./app";
import { config } from "./config";
import { logger } from "./logger";

async function main(): Promise<void> {
  const { app, schema } = createApp({ config });

  if (!(await schema.initializeSchema())) {
    logger.warn("Initial database setup failed, will retry on first request");
  }

  const server = app.listen(config.port, () => {
    logger.info(`Todo service ${process.pid} listening on :${config.port}`);
  });

  // ─── Graceful Shutdown ────────────────────────────────────
  // No pool to drain: every request closes its own connection.
  const shutdown = (signal: string) => {
    logger.info(`${signal} — shutting down ${process.pid}`);
    server.close(() => process.exit(0));
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "Failed to start");
  process.exit(1);
});
