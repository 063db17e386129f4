import type { NewTodo, TodoItem } from "@todo-service/types";
import type { DbConnection } from "./db";
import { QueryError, fail, ok } from "./errors";
import type { DbResult } from "./errors";
import { SQL } from "./sql";

// ─── Todo Repository ──────────────────────────────────────

interface TodoRow {
  id: number;
  title: string;
  created_at: Date;
}

export const toTodoItem = (row: TodoRow): TodoItem => ({
  id: row.id,
  title: row.title,
  created_at: row.created_at.toISOString(),
});

async function run<T>(fn: () => Promise<T>): Promise<DbResult<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    return fail(QueryError.from(err));
  }
}

export const listTodos = (conn: DbConnection): Promise<DbResult<TodoItem[]>> =>
  run(async () => {
    const rows = await conn.query<TodoRow>(SQL.listTodos);
    return rows.map(toTodoItem);
  });

export const countTodos = (conn: DbConnection): Promise<DbResult<number>> =>
  run(async () => {
    const rows = await conn.query<{ count: number }>(SQL.countTodos);
    return rows[0]?.count ?? 0;
  });

/** Inserts a row, then reads it back so created_at comes from the database clock. */
export const createTodo = (conn: DbConnection, { title }: NewTodo): Promise<DbResult<TodoItem>> =>
  run(async () => {
    const inserted = await conn.query<{ id: number }>(SQL.insertTodo, [title]);
    const id = inserted[0]?.id;
    if (id === undefined) throw new QueryError("Insert returned no id");

    const rows = await conn.query<TodoRow>(SQL.findTodo, [id]);
    const row = rows[0];
    if (!row) throw new QueryError(`Todo ${id} not found after insert`);
    return toTodoItem(row);
  });
