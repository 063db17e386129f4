// ─── SQL ──────────────────────────────────────────────────
// Every statement the service issues lives here.

export const TODOS_TABLE = "todos";

export const quoteIdentifier = (name: string): string =>
  `"${name.replace(/"/g, '""')}"`;

export const SQL = {
  databaseExists: "SELECT 1 FROM pg_database WHERE datname = $1",
  createDatabase: (name: string) => `CREATE DATABASE ${quoteIdentifier(name)}`,

  // Catalog lookup, not a data query
  tableExists: `SELECT 1 FROM information_schema.tables
     WHERE table_schema = current_schema() AND table_name = $1`,

  createTodosTable: `CREATE TABLE IF NOT EXISTS ${TODOS_TABLE} (
       id SERIAL PRIMARY KEY,
       title VARCHAR(255) NOT NULL CHECK (title <> ''),
       created_at TIMESTAMPTZ NOT NULL DEFAULT CURRENT_TIMESTAMP
     )`,

  // No ORDER BY: rows come back in whatever order the engine returns them
  listTodos: `SELECT id, title, created_at FROM ${TODOS_TABLE}`,
  insertTodo: `INSERT INTO ${TODOS_TABLE} (title) VALUES ($1) RETURNING id`,
  findTodo: `SELECT id, title, created_at FROM ${TODOS_TABLE} WHERE id = $1`,
  countTodos: `SELECT COUNT(*)::int AS count FROM ${TODOS_TABLE}`,
} as const;
