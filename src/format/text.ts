import type { Task, TaskStatistics } from "../tasks/types.js";
import { bold, cyan, dim, green } from "./colors.js";

const EMPTY_HINT = 'Create one with: tasklet add "Task title"';

// Stored timestamps are ISO-8601 ("2026-03-20T14:05:00.000Z"); files from the
// first release used "2026-03-20 14:05:00". Both render as "2026-03-20 14:05".
export function formatTimestamp(ts: string): string {
  if (ts.length < 16) {
    return ts;
  }
  return `${ts.slice(0, 10)} ${ts.slice(11, 16)}`;
}

function colorCheck(completed: boolean): string {
  return completed ? green("[x]") : dim("[ ]");
}

function formatRow(task: Task, idW: number): string {
  const title = task.completed ? dim(task.title) : bold(task.title);
  return `${colorCheck(task.completed)} ${dim(String(task.id).padStart(idW))}  ${title}`;
}

function idWidth(tasks: Task[]): number {
  return Math.max(...tasks.map((t) => String(t.id).length));
}

export function formatTaskText(task: Task): string {
  const lines: string[] = [];
  lines.push(formatRow(task, String(task.id).length));
  lines.push(`  Category: ${task.category}`);
  if (task.description) {
    lines.push(`  Description: ${task.description}`);
  }
  lines.push(`  Created: ${formatTimestamp(task.created_at)}`);
  if (task.completed_at) {
    lines.push(`  Completed: ${formatTimestamp(task.completed_at)}`);
  }
  return lines.join("\n");
}

/** Group tasks by category in first-seen order. */
export function groupByCategory(tasks: Iterable<Task>): Map<string, Task[]> {
  const groups = new Map<string, Task[]>();
  for (const task of tasks) {
    const group = groups.get(task.category);
    if (group) {
      group.push(task);
    } else {
      groups.set(task.category, [task]);
    }
  }
  return groups;
}

/**
 * Tasks grouped under their category heading. Within a group, open tasks
 * come before completed ones, each by id.
 */
export function formatTasksText(tasks: Task[], emptyMessage = "No tasks found."): string {
  if (tasks.length === 0) {
    return `${dim(emptyMessage)}\n${dim(EMPTY_HINT)}`;
  }

  const idW = idWidth(tasks);
  const sections: string[] = [];
  for (const [category, group] of groupByCategory(tasks)) {
    const sorted = [...group].sort(
      (a, b) => Number(a.completed) - Number(b.completed) || a.id - b.id,
    );
    const lines = [bold(cyan(category.toUpperCase()))];
    for (const task of sorted) {
      lines.push(`  ${formatRow(task, idW)}`);
      if (task.description) {
        lines.push(`  ${" ".repeat(idW + 6)}${dim(task.description)}`);
      }
    }
    sections.push(lines.join("\n"));
  }
  return sections.join("\n\n");
}

export function formatSearchText(tasks: Task[], keyword: string): string {
  if (tasks.length === 0) {
    return dim(`No tasks match '${keyword}'.`);
  }
  const idW = idWidth(tasks);
  const lines = [`Found ${tasks.length} matching task(s):`];
  for (const task of tasks) {
    lines.push(`  ${formatRow(task, idW)}  ${dim(`(${task.category})`)}`);
  }
  return lines.join("\n");
}

export function formatStatsText(stats: TaskStatistics): string {
  const lines = [
    bold("Task statistics"),
    `  Total:           ${stats.total}`,
    `  Completed:       ${stats.completed}`,
    `  Incomplete:      ${stats.incomplete}`,
    `  Completion rate: ${(stats.completionRate * 100).toFixed(1)}%`,
  ];
  if (stats.categories.size > 0) {
    lines.push("", bold("By category"));
    const nameW = Math.max(...[...stats.categories.keys()].map((c) => c.length));
    for (const [category, c] of stats.categories) {
      lines.push(`  ${category.padEnd(nameW)}  ${c.completed}/${c.total} completed`);
    }
  }
  return lines.join("\n");
}

export function formatCategoriesText(categories: string[]): string {
  if (categories.length === 0) {
    return dim("No categories found.");
  }
  return categories.join("\n");
}
