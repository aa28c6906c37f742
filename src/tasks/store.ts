import { quarantineStoreFile, readStoreFile, writeStoreFile } from "../storage/file.js";
import type { StoreSnapshot } from "../storage/schema.js";
import {
  sanitizeTitle,
  validateCategory,
  validateDescription,
  validateTitle,
  type ValidationResult,
} from "../validation.js";
import { CorruptedStoreError, NotFoundError, ValidationError } from "./errors.js";
import {
  DEFAULT_CATEGORY,
  SUGGESTED_CATEGORIES,
  type CategoryStats,
  type CreateTaskInput,
  type Task,
  type TaskFilter,
  type TaskStatistics,
  type UpdateTaskInput,
} from "./types.js";

export interface TaskStoreOptions {
  defaultCategory?: string;
  suggestedCategories?: readonly string[];
  clock?: () => Date;
}

function assertValid(result: ValidationResult): void {
  if (!result.valid) {
    throw new ValidationError(result.message);
  }
}

function copy(task: Task): Task {
  return { ...task };
}

/**
 * Ordered, in-memory collection of tasks mirrored to a JSON file. Every
 * mutating method writes the whole file before returning.
 */
export class TaskStore {
  readonly filePath: string;
  private readonly tasks: Task[];
  private nextId: number;
  private readonly defaultCategory: string;
  private readonly suggestedCategories: readonly string[];
  private readonly clock: () => Date;

  constructor(filePath: string, snapshot?: StoreSnapshot, options: TaskStoreOptions = {}) {
    this.filePath = filePath;
    this.tasks = snapshot ? snapshot.tasks.map(copy) : [];
    this.nextId = snapshot?.nextId ?? 1;
    this.defaultCategory = options.defaultCategory ?? DEFAULT_CATEGORY;
    this.suggestedCategories = options.suggestedCategories ?? SUGGESTED_CATEGORIES;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Load the store from disk. A missing file yields an empty store; an
   * unreadable one throws CorruptedStoreError.
   */
  static open(filePath: string, options: TaskStoreOptions = {}): TaskStore {
    const clock = options.clock ?? (() => new Date());
    const snapshot = readStoreFile(filePath, {
      defaultCategory: options.defaultCategory ?? DEFAULT_CATEGORY,
      now: clock().toISOString(),
    });
    return new TaskStore(filePath, snapshot ?? undefined, options);
  }

  get size(): number {
    return this.tasks.length;
  }

  save(): void {
    writeStoreFile(this.filePath, { tasks: this.tasks, nextId: this.nextId });
  }

  add(input: CreateTaskInput): Task {
    const title = sanitizeTitle(input.title);
    assertValid(validateTitle(title));
    const description = (input.description ?? "").trim();
    assertValid(validateDescription(description));
    const category = (input.category ?? "").trim() || this.defaultCategory;
    assertValid(validateCategory(category));
    if (!Number.isSafeInteger(this.nextId)) {
      throw new ValidationError("No task ids left to assign.");
    }

    const task: Task = {
      id: this.nextId,
      title,
      description,
      category,
      completed: false,
      created_at: this.now(),
      completed_at: null,
    };
    this.nextId++;
    this.tasks.push(task);
    this.save();
    return copy(task);
  }

  get(id: number): Task {
    return copy(this.find(id));
  }

  edit(id: number, input: UpdateTaskInput): Task {
    const task = this.find(id);

    const title = input.title !== undefined ? sanitizeTitle(input.title) : undefined;
    if (title !== undefined) {
      assertValid(validateTitle(title));
    }
    const description = input.description !== undefined ? input.description.trim() : undefined;
    if (description !== undefined) {
      assertValid(validateDescription(description));
    }
    const category = input.category !== undefined ? input.category.trim() : undefined;
    if (category !== undefined) {
      assertValid(validateCategory(category));
    }

    if (title !== undefined) {
      task.title = title;
    }
    if (description !== undefined) {
      task.description = description;
    }
    if (category !== undefined) {
      task.category = category;
    }
    this.save();
    return copy(task);
  }

  markCompleted(id: number): Task {
    const task = this.find(id);
    task.completed = true;
    task.completed_at = this.now();
    this.save();
    return copy(task);
  }

  markIncomplete(id: number): Task {
    const task = this.find(id);
    task.completed = false;
    task.completed_at = null;
    this.save();
    return copy(task);
  }

  delete(id: number): Task {
    const index = this.tasks.findIndex((t) => t.id === id);
    if (index === -1) {
      throw new NotFoundError(id);
    }
    const [removed] = this.tasks.splice(index, 1);
    this.save();
    return copy(removed);
  }

  /**
   * Tasks in insertion order. The result is lazy and can be iterated more
   * than once; each pass reflects the store at that moment.
   */
  list(filter: TaskFilter = {}): Iterable<Task> {
    return { [Symbol.iterator]: () => this.iterate(filter) };
  }

  /** Case-insensitive substring match on title, description and category. */
  search(keyword: string): Task[] {
    const needle = keyword.trim().toLowerCase();
    return this.tasks
      .filter(
        (t) =>
          t.title.toLowerCase().includes(needle) ||
          t.description.toLowerCase().includes(needle) ||
          t.category.toLowerCase().includes(needle),
      )
      .map(copy);
  }

  statistics(): TaskStatistics {
    const categories = new Map<string, CategoryStats>();
    let completed = 0;
    for (const task of this.tasks) {
      let stats = categories.get(task.category);
      if (!stats) {
        stats = { total: 0, completed: 0 };
        categories.set(task.category, stats);
      }
      stats.total++;
      if (task.completed) {
        stats.completed++;
        completed++;
      }
    }
    const total = this.tasks.length;
    return {
      total,
      completed,
      incomplete: total - completed,
      completionRate: total === 0 ? 0 : completed / total,
      categories,
    };
  }

  /** Suggested categories first, then the ones in use, without duplicates. */
  listCategories(): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const category of [...this.suggestedCategories, ...this.tasks.map((t) => t.category)]) {
      const key = category.toLowerCase();
      if (!seen.has(key)) {
        seen.add(key);
        result.push(category);
      }
    }
    return result;
  }

  private *iterate(filter: TaskFilter): Generator<Task> {
    const category = filter.category?.trim().toLowerCase();
    for (const task of this.tasks) {
      if (filter.completed !== undefined && task.completed !== filter.completed) {
        continue;
      }
      if (category !== undefined && task.category.toLowerCase() !== category) {
        continue;
      }
      yield copy(task);
    }
  }

  private find(id: number): Task {
    const task = this.tasks.find((t) => t.id === id);
    if (!task) {
      throw new NotFoundError(id);
    }
    return task;
  }

  private now(): string {
    return this.clock().toISOString();
  }
}

export type OpenStoreResult = {
  store: TaskStore;
  /** Set when the file existed but could not be loaded. */
  error: CorruptedStoreError | null;
  /** Where the unreadable file was moved, if moving it succeeded. */
  movedTo: string | null;
};

/**
 * Open the store, falling back to an empty one when the file is corrupted.
 * The unreadable file is moved aside so the next save does not destroy it.
 */
export function openStore(filePath: string, options: TaskStoreOptions = {}): OpenStoreResult {
  try {
    return { store: TaskStore.open(filePath, options), error: null, movedTo: null };
  } catch (err) {
    if (!(err instanceof CorruptedStoreError)) {
      throw err;
    }
    let movedTo: string | null = null;
    try {
      movedTo = quarantineStoreFile(filePath);
    } catch (moveErr) {
      if (process.env.TASKLET_DEBUG === "1") {
        console.error(`Could not move ${filePath} aside:`, moveErr);
      }
    }
    process.stderr.write(
      `Warning: ${err.message}. Starting with an empty task list` +
        (movedTo ? `; the old file was moved to ${movedTo}.\n` : ".\n"),
    );
    return { store: new TaskStore(filePath, undefined, options), error: err, movedTo };
  }
}
