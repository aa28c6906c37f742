import type { Task, TaskStatistics } from "../tasks/types.js";

export function formatTaskJson(task: Task): string {
  return JSON.stringify(task, null, 2);
}

export function formatTasksJson(tasks: Task[]): string {
  return JSON.stringify(tasks, null, 2);
}

export function formatStatsJson(stats: TaskStatistics): string {
  return JSON.stringify(
    {
      total: stats.total,
      completed: stats.completed,
      incomplete: stats.incomplete,
      completion_rate: stats.completionRate,
      categories: Object.fromEntries(stats.categories),
    },
    null,
    2,
  );
}

export function formatCategoriesJson(categories: string[]): string {
  return JSON.stringify(categories, null, 2);
}
