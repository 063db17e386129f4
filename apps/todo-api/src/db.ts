import { Client } from "pg";
import type { ClientConfig, QueryResultRow } from "pg";
import type { DbConfig } from "./config";
import { ConnectionError, fail, messageOf, ok } from "./errors";
import type { DbResult } from "./errors";
import { logger } from "./logger";

// ─── Connections ──────────────────────────────────────────
// One short-lived client per request, never pooled. A pg.Pool would keep
// every contract below, but the service deliberately opens and closes its
// own connection so a dropped database or table is noticed on the next call.

export interface DbConnection {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>;
  close(): Promise<void>;
}

/** Opens one connection or rejects with the driver error. */
export type OpenConnection = (params: ClientConfig) => Promise<DbConnection>;

class PgConnection implements DbConnection {
  constructor(private readonly client: Client) {}

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values: unknown[] = []): Promise<R[]> {
    const { rows } = await this.client.query<R>(text, values);
    return rows;
  }

  close(): Promise<void> {
    return this.client.end();
  }
}

export const openPgConnection: OpenConnection = async (params) => {
  const client = new Client(params);
  client.on("error", (err) => logger.error({ err }, "Database client error"));
  await client.connect();
  return new PgConnection(client);
};

export interface ConnectOptions {
  /** false targets the administrative database instead of the configured one */
  includeDatabase?: boolean;
  maxAttempts?: number;
  delayMs?: number;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class ConnectionProvider {
  constructor(
    private readonly config: DbConfig,
    private readonly open: OpenConnection = openPgConnection,
  ) {}

  get databaseName(): string {
    return this.config.database;
  }

  params(includeDatabase: boolean): ClientConfig {
    return {
      host: this.config.host,
      port: this.config.port,
      user: this.config.user,
      password: this.config.password,
      database: includeDatabase ? this.config.database : this.config.adminDatabase,
      connectionTimeoutMillis: this.config.connectTimeoutMs,
    };
  }

  async connect({
    includeDatabase = true,
    maxAttempts = this.config.connectRetries,
    delayMs = this.config.connectDelayMs,
  }: ConnectOptions = {}): Promise<DbResult<DbConnection>> {
    const params = this.params(includeDatabase);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return ok(await this.open(params));
      } catch (err) {
        lastError = err;
        logger.warn({ attempt, maxAttempts, database: params.database, err: messageOf(err) }, "Connection attempt failed");
        if (attempt < maxAttempts) await sleep(delayMs);
      }
    }

    const error = new ConnectionError(Math.max(maxAttempts, 0), lastError);
    logger.error({ database: params.database, attempts: maxAttempts }, "Failed to connect to database after retries");
    return fail(error);
  }

  /** Closes a handle. A failed close is logged and otherwise ignored. */
  async release(connection: DbConnection): Promise<void> {
    try {
      await connection.close();
    } catch (err) {
      logger.warn({ err }, "Failed to close database connection");
    }
  }
}
