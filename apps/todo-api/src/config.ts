import "dotenv/config";

// ─── Config ───────────────────────────────────────────────
// Everything the service reads from the environment, parsed once.

const num = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value && Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
};

const bool = (value: string | undefined, fallback: boolean): boolean =>
  value ? !["false", "0", "no"].includes(value.toLowerCase()) : fallback;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface DbConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  adminDatabase: string;
  connectRetries: number;
  connectDelayMs: number;
  connectTimeoutMs: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  rateLimitMax: number;
  collectDefaultMetrics: boolean;
  db: DbConfig;
}

export class ConfigError extends Error {
  override name = "ConfigError";
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const database = env.DB_NAME || "todo_db";
  // The name is interpolated into CREATE DATABASE, so only plain identifiers
  if (!IDENTIFIER.test(database)) {
    throw new ConfigError(`DB_NAME must be a plain identifier, got "${database}"`);
  }

  return Object.freeze({
    nodeEnv: env.NODE_ENV || "development",
    port: num(env.PORT, 5000),
    logLevel: env.LOG_LEVEL || "info",
    rateLimitMax: num(env.RATE_LIMIT_MAX, 5_000),
    collectDefaultMetrics: bool(env.METRICS_DEFAULT, true),
    db: Object.freeze({
      host: env.DB_HOST || "localhost",
      port: num(env.DB_PORT, 5432),
      user: env.DB_USER || "todo_user",
      password: env.DB_PASSWORD || "todo_password",
      database,
      adminDatabase: env.DB_ADMIN_DATABASE || "postgres",
      connectRetries: Math.max(1, num(env.DB_CONNECT_RETRIES, 5)),
      connectDelayMs: num(env.DB_CONNECT_DELAY_MS, 2_000),
      connectTimeoutMs: num(env.DB_CONNECT_TIMEOUT_MS, 5_000),
    }),
  });
}

export const config = loadConfig();
