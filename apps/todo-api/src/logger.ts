import pino from "pino";
import { config } from "./config";

// ─── Logger ───────────────────────────────────────────────
// Structured JSON everywhere except local development.
export const logger = pino({
  level     : config.logLevel,
  transport : config.nodeEnv === "development"
                ? { target: "pino-pretty" }  // dev: human readable
                : undefined,                 // prod: raw JSON for log aggregators
});
