import express, { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import type { ApiError, NewTodo, TodoItem } from "@todo-service/types";
import type { ConnectionProvider } from "./db";
import { logger } from "./logger";
import type { Metrics } from "./metrics";
import type { SchemaManager } from "./schema";
import { countTodos, createTodo, listTodos } from "./todos";

export interface TodoRouterDeps {
  provider: ConnectionProvider;
  schema: SchemaManager;
  metrics: Metrics;
}

const TITLE_REQUIRED = "Title is required";
const TITLE_MAX_CHARS = 255;

export const NewTodoSchema = z.object(
  {
    title: z
      .string({ required_error: TITLE_REQUIRED, invalid_type_error: TITLE_REQUIRED })
      .min(1, TITLE_REQUIRED)
      // VARCHAR counts code points, not UTF-16 units
      .refine((t) => [...t].length <= TITLE_MAX_CHARS, `Title must be at most ${TITLE_MAX_CHARS} characters`)
      // Postgres rejects NUL in text values
      .refine((t) => !t.includes("\u0000"), "Title must not contain NUL characters"),
  },
  { required_error: TITLE_REQUIRED, invalid_type_error: TITLE_REQUIRED },
) satisfies z.ZodType<NewTodo>;

const error = (res: Response, status: number, message: string) =>
  res.status(status).json({ error: message } satisfies ApiError);

export function todoRouter({ provider, schema, metrics }: TodoRouterDeps): Router {
  const router = Router();

  // Runs before anything else touches the database or the body
  const requireReady = async (_req: Request, res: Response, next: NextFunction) => {
    try {
      if (!(await schema.ensureReady())) return error(res, 500, "Database initialization failed");
      next();
    } catch (err) {
      next(err);
    }
  };

  // LIST — every row, in whatever order the engine returns them
  router.get(
    "/todos",
    requireReady,
    async (_req: Request, res: Response<TodoItem[] | ApiError>, next: NextFunction) => {
      try {
        const conn = await provider.connect();
        if (!conn.ok) return error(res, 500, "Database connection failed");

        try {
          const todos = await listTodos(conn.value);
          if (!todos.ok) return error(res, 500, todos.error.message);

          // Re-derived from the table, not from todos.value.length
          const count = await countTodos(conn.value);
          if (!count.ok) return error(res, 500, count.error.message);
          metrics.todoItems.set(count.value);

          res.status(200).json(todos.value);
        } finally {
          await provider.release(conn.value);
        }
      } catch (err) {
        next(err);
      }
    },
  );

  // CREATE — body is parsed only after the readiness check
  router.post(
    "/todos",
    requireReady,
    express.json({ limit: "100kb" }),
    async (req: Request, res: Response<TodoItem | ApiError>, next: NextFunction) => {
      try {
        const parsed = NewTodoSchema.safeParse(req.body);
        if (!parsed.success) {
          return error(res, 400, parsed.error.issues[0]?.message ?? TITLE_REQUIRED);
        }

        const conn = await provider.connect();
        if (!conn.ok) return error(res, 500, "Database connection failed");

        try {
          const created = await createTodo(conn.value, parsed.data);
          if (!created.ok) return error(res, 500, created.error.message);

          const count = await countTodos(conn.value);
          if (count.ok) {
            metrics.todoItems.set(count.value);
          } else {
            // The row is already committed; a stale gauge does not undo that
            logger.warn({ err: count.error.message }, "Failed to refresh todo count");
          }

          res.status(201).json(created.value);
        } finally {
          await provider.release(conn.value);
        }
      } catch (err) {
        next(err);
      }
    },
  );

  return router;
}
