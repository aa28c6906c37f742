export type ErrorKind = "validation" | "not_found" | "corrupted" | "persistence";

export abstract class TaskletError extends Error {
  abstract readonly kind: ErrorKind;
}

export class ValidationError extends TaskletError {
  readonly kind = "validation";

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends TaskletError {
  readonly kind = "not_found";
  readonly id: number;

  constructor(id: number) {
    super(`Task ${id} not found.`);
    this.name = "NotFoundError";
    this.id = id;
  }
}

export class CorruptedStoreError extends TaskletError {
  readonly kind = "corrupted";
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Task file at ${path} could not be read: ${reason}`);
    this.name = "CorruptedStoreError";
    this.path = path;
  }
}

export class PersistenceError extends TaskletError {
  readonly kind = "persistence";
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(
      `Could not save tasks to ${path}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause },
    );
    this.name = "PersistenceError";
    this.path = path;
  }
}

export function isTaskletError(err: unknown): err is TaskletError {
  return err instanceof TaskletError;
}
