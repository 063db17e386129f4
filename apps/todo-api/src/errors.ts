import type { Result } from "@todo-service/types";

// ─── Database Errors ──────────────────────────────────────

/** Every attempt to open a connection failed. */
export class ConnectionError extends Error {
  override name = "ConnectionError";

  constructor(
    readonly attempts: number,
    cause: unknown,
  ) {
    super(`Failed to connect after ${attempts} attempt(s): ${messageOf(cause)}`, { cause });
  }
}

/** A statement was rejected by the database. `code` is the SQLSTATE when the driver gave one. */
export class QueryError extends Error {
  override name = "QueryError";

  constructor(
    message: string,
    readonly code?: string,
  ) {
    super(message);
  }

  static from(err: unknown): QueryError {
    return new QueryError(messageOf(err), codeOf(err));
  }
}

export type DbError = ConnectionError | QueryError;
export type DbResult<T> = Result<T, DbError>;

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });
export const fail = <E>(error: E): Result<never, E> => ({ ok: false, error });

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function codeOf(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

// SQLSTATEs raised when a concurrent creator won the race
export const ALREADY_EXISTS_CODES: ReadonlySet<string> = new Set([
  "42P04", // duplicate_database
  "42P07", // duplicate_table
  "23505", // unique_violation on the catalog index
]);

export const isAlreadyExists = (err: unknown): boolean => {
  const code = codeOf(err);
  return code !== undefined && ALREADY_EXISTS_CODES.has(code);
};
