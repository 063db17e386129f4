import type { ConnectionProvider, DbConnection } from "./db";
import { isAlreadyExists, messageOf } from "./errors";
import { logger } from "./logger";
import { SQL, TODOS_TABLE } from "./sql";

// ─── Schema Initialization ────────────────────────────────
// The database and its single table are created lazily: once at boot and
// again whenever a request notices they are gone. No in-process lock guards
// this; concurrent callers rely on the DDL being idempotent and on the
// "already exists" SQLSTATEs being treated as success.

export class SchemaManager {
  constructor(private readonly provider: ConnectionProvider) {}

  /** Creates the database and the todos table if absent. true = ready. */
  async initializeSchema(): Promise<boolean> {
    const admin = await this.provider.connect({ includeDatabase: false });
    if (!admin.ok) {
      logger.error({ err: admin.error.message }, "Failed to connect to database server");
      return false;
    }

    try {
      await this.createDatabase(admin.value);
    } catch (err) {
      logger.error({ err: messageOf(err) }, "Error creating database");
      return false;
    } finally {
      await this.provider.release(admin.value);
    }

    // Postgres cannot switch databases on an open connection
    const target = await this.provider.connect();
    if (!target.ok) {
      logger.error({ err: target.error.message }, "Failed to connect to database after creating it");
      return false;
    }

    try {
      await this.createTable(target.value);
      logger.info({ database: this.provider.databaseName }, "Database and table initialized successfully");
      return true;
    } catch (err) {
      logger.error({ err: messageOf(err) }, "Error creating table");
      return false;
    } finally {
      await this.provider.release(target.value);
    }
  }

  /**
   * Runs before every todo request.
   *
   * The two repair paths differ on purpose: when the connection itself fails
   * the repair is attempted but this call still reports not-ready, because
   * nothing re-verifies the result. When the table is merely missing the
   * repair outcome is returned as-is. This mirrors long-standing behavior
   * and is kept until someone decides which of the two is intended.
   */
  async ensureReady(): Promise<boolean> {
    const conn = await this.provider.connect();
    if (!conn.ok) {
      logger.warn("Attempting to initialize database due to connection failure");
      await this.initializeSchema();
      return false;
    }

    let released = false;
    try {
      const rows = await conn.value.query(SQL.tableExists, [TODOS_TABLE]);
      if (rows.length === 0) {
        logger.warn({ table: TODOS_TABLE }, "Table not found, initializing database");
        released = true;
        await this.provider.release(conn.value);
        return await this.initializeSchema();
      }
      return true;
    } catch (err) {
      logger.error({ err: messageOf(err) }, "Error checking table existence");
      return false;
    } finally {
      if (!released) await this.provider.release(conn.value);
    }
  }

  private async createDatabase(conn: DbConnection): Promise<void> {
    const name = this.provider.databaseName;
    const existing = await conn.query(SQL.databaseExists, [name]);
    if (existing.length > 0) return;

    try {
      await conn.query(SQL.createDatabase(name));
      logger.info({ database: name }, "Database created");
    } catch (err) {
      if (!isAlreadyExists(err)) throw err;
    }
  }

  private async createTable(conn: DbConnection): Promise<void> {
    try {
      await conn.query(SQL.createTodosTable);
    } catch (err) {
      if (!isAlreadyExists(err)) throw err;
    }
  }
}
