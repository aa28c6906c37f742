export const DEFAULT_CATEGORY = "General";

/** Suggested categories offered before any custom ones. Not a closed set. */
export const SUGGESTED_CATEGORIES = [
  "Work",
  "Personal",
  "Urgent",
  "General",
  "Health",
  "Learning",
] as const;

export type Task = {
  id: number;
  title: string;
  description: string;
  category: string;
  completed: boolean;
  created_at: string;
  completed_at: string | null;
};

export type CreateTaskInput = {
  title: string;
  description?: string;
  category?: string;
};

export type UpdateTaskInput = {
  title?: string;
  description?: string;
  category?: string;
};

export type TaskFilter = {
  completed?: boolean;
  category?: string;
};

export type CategoryStats = {
  total: number;
  completed: number;
};

export type TaskStatistics = {
  total: number;
  completed: number;
  incomplete: number;
  /** Ratio in [0, 1]; 0 for an empty store. */
  completionRate: number;
  /** Keyed by category in first-seen order. */
  categories: Map<string, CategoryStats>;
};
