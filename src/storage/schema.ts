import { z } from "zod";
import type { Task } from "../tasks/types.js";

// Files written by the first release of the tool used task_id, created_date
// and completed_date. Both spellings are accepted on read; only the current
// one is written.
const storedTaskSchema = z.object({
  id: z.number().int().positive().safe().nullable().optional(),
  task_id: z.number().int().positive().safe().nullable().optional(),
  title: z.string().trim().min(1, "task title cannot be empty"),
  description: z.string().nullable().optional(),
  category: z.string().nullable().optional(),
  completed: z.boolean().nullable().optional(),
  created_at: z.string().nullable().optional(),
  created_date: z.string().nullable().optional(),
  completed_at: z.string().nullable().optional(),
  completed_date: z.string().nullable().optional(),
});

export const storeFileSchema = z.object({
  tasks: z.array(storedTaskSchema),
  next_id: z.number().int().positive().safe().nullable().optional(),
});

export type StoredTask = z.infer<typeof storedTaskSchema>;
export type StoreFile = z.infer<typeof storeFileSchema>;

export type StoreSnapshot = {
  tasks: Task[];
  nextId: number;
};

export interface DecodeOptions {
  defaultCategory: string;
  now: string;
}

export type DecodeResult = { ok: true; snapshot: StoreSnapshot } | { ok: false; reason: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
}

export function decodeStoreFile(raw: unknown, options: DecodeOptions): DecodeResult {
  const parsed = storeFileSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: formatIssues(parsed.error) };
  }

  const seen = new Set<number>();
  let maxId = 0;
  for (const stored of parsed.data.tasks) {
    const id = stored.id ?? stored.task_id;
    if (id === null || id === undefined) {
      continue;
    }
    if (seen.has(id)) {
      return { ok: false, reason: `duplicate task id ${id}` };
    }
    seen.add(id);
    maxId = Math.max(maxId, id);
  }

  let nextId = Math.max(parsed.data.next_id ?? 1, maxId + 1);
  const tasks: Task[] = parsed.data.tasks.map((stored) => {
    let id = stored.id ?? stored.task_id;
    if (id === null || id === undefined) {
      id = nextId;
      nextId++;
    }
    const createdAt = stored.created_at ?? stored.created_date ?? options.now;
    const completed = stored.completed ?? false;
    const completedAt = stored.completed_at ?? stored.completed_date ?? null;
    const category = stored.category?.trim();
    return {
      id,
      title: stored.title,
      description: stored.description ?? "",
      category: category ? category : options.defaultCategory,
      completed,
      created_at: createdAt,
      completed_at: completed ? (completedAt ?? createdAt) : null,
    };
  });

  if (tasks.some((t) => !Number.isSafeInteger(t.id))) {
    return { ok: false, reason: "no task ids left to assign" };
  }

  return { ok: true, snapshot: { tasks, nextId } };
}

export function encodeStoreFile(snapshot: StoreSnapshot): StoreFile {
  return {
    tasks: snapshot.tasks.map((t) => ({
      id: t.id,
      title: t.title,
      description: t.description,
      category: t.category,
      completed: t.completed,
      created_at: t.created_at,
      completed_at: t.completed_at,
    })),
    next_id: snapshot.nextId,
  };
}
