import type { TaskStore } from "./tasks/store.js";
import { isTaskletError } from "./tasks/errors.js";
import type { LineReader } from "./prompt.js";
import { parseId } from "./validation.js";
import {
  formatCategoriesText,
  formatSearchText,
  formatStatsText,
  formatTaskText,
  formatTasksText,
} from "./format/text.js";

export const MENU_TEXT = [
  "",
  "==== tasklet ====",
  " 1. Add task",
  " 2. View all tasks",
  " 3. View incomplete tasks",
  " 4. Mark task as completed",
  " 5. Mark task as incomplete",
  " 6. Edit task",
  " 7. Delete task",
  " 8. Search tasks",
  " 9. Statistics",
  "10. Filter by category",
  "11. List categories",
  " 0. Exit",
].join("\n");

type Reader = Pick<LineReader, "ask">;

class Session {
  constructor(
    private store: TaskStore,
    private reader: Reader,
    private write: (text: string) => void,
  ) {}

  /** Ask until a non-empty answer is given. Null when input ends. */
  async askRequired(prompt: string): Promise<string | null> {
    for (;;) {
      const line = await this.reader.ask(prompt);
      if (line === null) {
        return null;
      }
      if (line.trim().length > 0) {
        return line.trim();
      }
      this.write("Input cannot be empty. Please try again.");
    }
  }

  /** Ask until a valid task ID is given. Null when input ends. */
  async askId(prompt: string): Promise<number | null> {
    for (;;) {
      const line = await this.reader.ask(prompt);
      if (line === null) {
        return null;
      }
      const parsed = parseId(line);
      if (parsed.valid) {
        return parsed.id;
      }
      this.write(parsed.message);
    }
  }

  listOrEmpty(completed: boolean | undefined, emptyMessage: string): boolean {
    const tasks = [...this.store.list({ completed })];
    if (tasks.length === 0) {
      this.write(emptyMessage);
      return false;
    }
    this.write(formatTasksText(tasks));
    return true;
  }

  async add(): Promise<void> {
    const title = await this.askRequired("Task title: ");
    if (title === null) {
      return;
    }
    const description = (await this.reader.ask("Description (optional): ")) ?? "";
    this.write(`Categories: ${this.store.listCategories().join(", ")}`);
    const category = (await this.reader.ask("Category (Enter for default): ")) ?? "";
    const task = this.store.add({ title, description, category });
    this.write(`Added task ${task.id}: ${task.title}`);
  }

  async markCompleted(): Promise<void> {
    if (!this.listOrEmpty(false, "No incomplete tasks.")) {
      return;
    }
    const id = await this.askId("Task ID to mark as completed: ");
    if (id === null) {
      return;
    }
    const task = this.store.markCompleted(id);
    this.write(`Completed ${task.id}: ${task.title}`);
  }

  async markIncomplete(): Promise<void> {
    if (!this.listOrEmpty(true, "No completed tasks.")) {
      return;
    }
    const id = await this.askId("Task ID to mark as incomplete: ");
    if (id === null) {
      return;
    }
    const task = this.store.markIncomplete(id);
    this.write(`Reopened ${task.id}: ${task.title}`);
  }

  async edit(): Promise<void> {
    if (!this.listOrEmpty(undefined, "No tasks found.")) {
      return;
    }
    const id = await this.askId("Task ID to edit: ");
    if (id === null) {
      return;
    }
    const current = this.store.get(id);
    this.write("Leave blank to keep the current value. Enter - to clear the description.");
    const title = await this.reader.ask(`Title [${current.title}]: `);
    const description = await this.reader.ask(`Description [${current.description}]: `);
    const category = await this.reader.ask(`Category [${current.category}]: `);
    const task = this.store.edit(id, {
      title: title?.trim() ? title : undefined,
      description:
        description?.trim() === "-" ? "" : description?.trim() ? description : undefined,
      category: category?.trim() ? category : undefined,
    });
    this.write(formatTaskText(task));
  }

  async delete(): Promise<void> {
    if (!this.listOrEmpty(undefined, "No tasks found.")) {
      return;
    }
    const id = await this.askId("Task ID to delete: ");
    if (id === null) {
      return;
    }
    const task = this.store.get(id);
    const answer = await this.reader.ask(`Delete task ${task.id} "${task.title}"? (y/N) `);
    const trimmed = (answer ?? "").trim().toLowerCase();
    if (trimmed !== "y" && trimmed !== "yes") {
      this.write("Delete cancelled.");
      return;
    }
    this.store.delete(id);
    this.write(`Deleted ${task.id}: ${task.title}`);
  }

  async search(): Promise<void> {
    const keyword = await this.reader.ask("Search for: ");
    if (keyword === null) {
      return;
    }
    this.write(formatSearchText(this.store.search(keyword), keyword.trim()));
  }

  async filterByCategory(): Promise<void> {
    this.write(`Categories: ${this.store.listCategories().join(", ")}`);
    const category = await this.askRequired("Category to show: ");
    if (category === null) {
      return;
    }
    const tasks = [...this.store.list({ category })];
    this.write(formatTasksText(tasks, `No tasks in category '${category}'.`));
  }

  async dispatch(choice: string): Promise<boolean> {
    switch (choice) {
      case "1":
        await this.add();
        break;
      case "2":
        this.write(formatTasksText([...this.store.list()]));
        break;
      case "3":
        this.write(
          formatTasksText([...this.store.list({ completed: false })], "No incomplete tasks."),
        );
        break;
      case "4":
        await this.markCompleted();
        break;
      case "5":
        await this.markIncomplete();
        break;
      case "6":
        await this.edit();
        break;
      case "7":
        await this.delete();
        break;
      case "8":
        await this.search();
        break;
      case "9":
        this.write(formatStatsText(this.store.statistics()));
        break;
      case "10":
        await this.filterByCategory();
        break;
      case "11":
        this.write(formatCategoriesText(this.store.listCategories()));
        break;
      case "0":
        return false;
      default:
        this.write("Invalid choice. Please select a number between 0 and 11.");
    }
    return true;
  }
}

/**
 * Run the numbered menu until the user picks Exit or input ends. The store
 * is saved once more on the way out.
 */
export async function runMenu(
  store: TaskStore,
  reader: Reader,
  write: (text: string) => void,
): Promise<void> {
  const session = new Session(store, reader, write);
  for (;;) {
    write(MENU_TEXT);
    const choice = await reader.ask("Choose an option (0-11): ");
    if (choice === null) {
      break;
    }
    let keepGoing = true;
    try {
      keepGoing = await session.dispatch(choice.trim());
    } catch (err) {
      if (!isTaskletError(err)) {
        throw err;
      }
      write(err.message);
    }
    if (!keepGoing) {
      break;
    }
  }

  try {
    store.save();
    write("Tasks saved. Goodbye!");
  } catch (err) {
    if (!isTaskletError(err)) {
      throw err;
    }
    write(err.message);
  }
}
