export interface TodoItem {
  id: number;
  title: string;
  created_at: string;
}

export interface NewTodo {
  title: string;
}

export interface ApiError {
  error: string;
}

// Returned by every database operation instead of throwing
export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };
