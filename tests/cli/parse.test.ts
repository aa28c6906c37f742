import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import { CommanderError } from "commander";
import { createProgram } from "../../src/cli.js";
import { TaskStore, openStore } from "../../src/tasks/store.js";
import { getConfigPath, type Config } from "../../src/config/config.js";
import { createTempDir, minute, stepClock, testConfig } from "../helpers/test-store.js";

describe("CLI parse", () => {
  let tmpDir: string;
  let filePath: string;
  let store: TaskStore;
  let output: string;
  let answers: boolean[];
  let prompts: string[];
  let savedFormat: string | undefined;

  function capture(): (text: string) => void {
    output = "";
    return (text: string) => {
      output += text + "\n";
    };
  }

  async function run(args: string[], config: Config = testConfig()): Promise<void> {
    const program = createProgram(store, capture(), config, async (prompt) => {
      prompts.push(prompt);
      return answers.shift() ?? false;
    });
    await program.parseAsync(["node", "tasklet", ...args]);
  }

  beforeEach(() => {
    tmpDir = createTempDir();
    filePath = path.join(tmpDir, "tasks.json");
    store = new TaskStore(filePath, undefined, { clock: stepClock() });
    output = "";
    answers = [];
    prompts = [];
    savedFormat = process.env.TASKLET_FORMAT;
    delete process.env.TASKLET_FORMAT;
  });

  afterEach(() => {
    process.exitCode = undefined;
    if (savedFormat !== undefined) {
      process.env.TASKLET_FORMAT = savedFormat;
    } else {
      delete process.env.TASKLET_FORMAT;
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("add", () => {
    it("creates a task and prints it", async () => {
      await run(["add", "Finish report", "-d", "Complete Q3 analysis", "-c", "Work"]);
      expect(output).toBe(
        [
          "[ ] 1  Finish report",
          "  Category: Work",
          "  Description: Complete Q3 analysis",
          "  Created: 2026-03-20 09:00",
          "",
        ].join("\n"),
      );
      expect(TaskStore.open(filePath).get(1).title).toBe("Finish report");
    });

    it("--json outputs the task", async () => {
      await run(["add", "Buy milk", "--json"]);
      expect(JSON.parse(output)).toEqual({
        id: 1,
        title: "Buy milk",
        description: "",
        category: "General",
        completed: false,
        created_at: minute(0),
        completed_at: null,
      });
    });

    it("rejects an empty title", async () => {
      await run(["add", "   "]);
      expect(output).toBe("Title cannot be empty.\n");
      expect(process.exitCode).toBe(1);
      expect(store.size).toBe(0);
    });

    it("rejects an empty title as JSON", async () => {
      await run(["add", "", "--json"]);
      expect(JSON.parse(output)).toEqual({
        error: "validation",
        message: "Title cannot be empty.",
      });
    });
  });

  describe("list", () => {
    beforeEach(() => {
      store.add({ title: "Finish report", category: "Work" });
      store.add({ title: "Clean kitchen" });
      store.add({ title: "Send invoice", category: "work" });
      store.markCompleted(3);
    });

    it("shows every task grouped by category", async () => {
      await run(["list"]);
      expect(output).toBe(
        [
          "WORK",
          "  [ ] 1  Finish report",
          "",
          "GENERAL",
          "  [ ] 2  Clean kitchen",
          "",
          "WORK",
          "  [x] 3  Send invoice",
          "",
        ].join("\n"),
      );
    });

    it("--incomplete hides completed tasks", async () => {
      await run(["list", "--incomplete", "--json"]);
      expect(JSON.parse(output).map((t: { id: number }) => t.id)).toEqual([1, 2]);
    });

    it("--completed shows only completed tasks", async () => {
      await run(["list", "--completed", "--json"]);
      expect(JSON.parse(output).map((t: { id: number }) => t.id)).toEqual([3]);
    });

    it("--category matches case-insensitively", async () => {
      await run(["list", "--category", "WORK", "--json"]);
      expect(JSON.parse(output).map((t: { id: number }) => t.id)).toEqual([1, 3]);
    });

    it("says when nothing matches the filter", async () => {
      await run(["list", "--category", "Garden"]);
      expect(output.split("\n")[0]).toBe("No tasks match the filter.");
    });

    it("rejects --completed together with --incomplete", async () => {
      await expect(run(["list", "--completed", "--incomplete"])).rejects.toThrow(CommanderError);
    });
  });

  it("list on an empty store says there are no tasks", async () => {
    await run(["list"]);
    expect(output).toBe('No tasks found.\nCreate one with: tasklet add "Task title"\n');
  });

  describe("get", () => {
    beforeEach(() => {
      store.add({ title: "A" });
    });

    it("shows a task", async () => {
      await run(["get", "1", "--json"]);
      expect(JSON.parse(output).title).toBe("A");
    });

    it("reports an unknown id", async () => {
      await run(["get", "99"]);
      expect(output).toBe("Task 99 not found.\n");
      expect(process.exitCode).toBe(1);
    });

    it("reports an unknown id as JSON", async () => {
      await run(["get", "99", "--json"]);
      expect(JSON.parse(output)).toEqual({ error: "not_found", id: 99 });
    });

    it("rejects a malformed id", async () => {
      await run(["get", "abc"]);
      expect(output).toBe("Invalid task ID: 'abc'. Expected a positive integer.\n");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("edit", () => {
    beforeEach(() => {
      store.add({ title: "Finish report", category: "Work" });
      store.markCompleted(1);
    });

    it("changes only the given fields", async () => {
      await run(["edit", "1", "--category", "Urgent", "--json"]);
      const task = JSON.parse(output);
      expect(task.category).toBe("Urgent");
      expect(task.title).toBe("Finish report");
      expect(task.completed).toBe(true);
      expect(task.completed_at).toBe(minute(1));
      expect(TaskStore.open(filePath).get(1).category).toBe("Urgent");
    });

    it("requires at least one field", async () => {
      await run(["edit", "1"]);
      expect(output).toBe("Nothing to update. Pass --title, --description or --category.\n");
      expect(process.exitCode).toBe(1);
    });

    it("rejects an empty title", async () => {
      await run(["edit", "1", "--title", ""]);
      expect(output).toBe("Title cannot be empty.\n");
      expect(store.get(1).title).toBe("Finish report");
    });

    it("reports an unknown id", async () => {
      await run(["edit", "7", "-t", "x"]);
      expect(output).toBe("Task 7 not found.\n");
    });
  });

  describe("done / undone", () => {
    beforeEach(() => {
      store.add({ title: "A" });
      store.add({ title: "B" });
    });

    it("completes several tasks", async () => {
      await run(["done", "1", "2"]);
      expect(output).toBe("Completed 1: A\nCompleted 2: B\n");
      expect(store.get(1).completed).toBe(true);
      expect(store.get(2).completed).toBe(true);
    });

    it("keeps going past an unknown id", async () => {
      await run(["done", "99", "2"]);
      expect(output).toBe("Task 99 not found.\nCompleted 2: B\n");
      expect(process.exitCode).toBe(1);
    });

    it("reopens a completed task", async () => {
      store.markCompleted(1);
      await run(["undone", "1", "--json"]);
      const task = JSON.parse(output);
      expect(task.completed).toBe(false);
      expect(task.completed_at).toBeNull();
    });
  });

  describe("delete", () => {
    beforeEach(() => {
      store.add({ title: "A" });
      store.add({ title: "B" });
    });

    it("asks before deleting", async () => {
      answers = [true];
      await run(["delete", "1"]);
      expect(prompts).toEqual(['Delete task 1 "A"? (y/N) ']);
      expect(output).toBe("Deleted 1: A\n");
      expect([...store.list()].map((t) => t.id)).toEqual([2]);
    });

    it("keeps the task when the answer is no", async () => {
      answers = [false];
      await run(["delete", "1"]);
      expect(output).toBe("Kept 1.\n");
      expect(store.size).toBe(2);
    });

    it("--yes skips the question", async () => {
      await run(["delete", "1", "2", "--yes", "--json"]);
      expect(prompts).toEqual([]);
      expect(output).toBe('{"id":1,"deleted":true}\n{"id":2,"deleted":true}\n');
      expect(store.size).toBe(0);
    });

    it("does not ask when confirm_delete is off", async () => {
      await run(["delete", "2"], testConfig({ confirm_delete: false }));
      expect(prompts).toEqual([]);
      expect(output).toBe("Deleted 2: B\n");
    });

    it("reports an unknown id without asking", async () => {
      await run(["delete", "5"]);
      expect(prompts).toEqual([]);
      expect(output).toBe("Task 5 not found.\n");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("search", () => {
    beforeEach(() => {
      store.add({ title: "Finish report", category: "Work" });
      store.add({ title: "Clean kitchen" });
    });

    it("finds matching tasks", async () => {
      await run(["search", "report"]);
      expect(output).toBe("Found 1 matching task(s):\n  [ ] 1  Finish report  (Work)\n");
    });

    it("matches every task without a keyword", async () => {
      await run(["search", "--json"]);
      expect(JSON.parse(output).map((t: { id: number }) => t.id)).toEqual([1, 2]);
    });
  });

  it("stats --json reports counts and categories", async () => {
    store.add({ title: "A", category: "Work" });
    store.add({ title: "B" });
    store.markCompleted(1);
    await run(["stats", "--json"]);
    expect(JSON.parse(output)).toEqual({
      total: 2,
      completed: 1,
      incomplete: 1,
      completion_rate: 0.5,
      categories: {
        Work: { total: 1, completed: 1 },
        General: { total: 1, completed: 0 },
      },
    });
  });

  it("categories lists suggestions and custom categories", async () => {
    store.add({ title: "A", category: "Garden" });
    await run(["categories"]);
    expect(output).toBe("Work\nPersonal\nUrgent\nGeneral\nHealth\nLearning\nGarden\n");
  });

  describe("opening the store", () => {
    let opens: number;

    async function runLazy(args: string[]): Promise<void> {
      opens = 0;
      const program = createProgram(
        () => {
          opens++;
          return openStore(filePath, { clock: stepClock() }).store;
        },
        capture(),
        testConfig(),
      );
      await program.parseAsync(["node", "tasklet", ...args]);
    }

    it("leaves a damaged data file alone for config commands", async () => {
      fs.writeFileSync(filePath, "{not json");
      await runLazy(["config", "path"]);
      expect(output).toBe(getConfigPath() + "\n");
      expect(opens).toBe(0);
      expect(fs.readdirSync(tmpDir)).toEqual(["tasks.json"]);
    });

    it("opens the store once for a command that needs it", async () => {
      await runLazy(["done", "1", "2"]);
      expect(opens).toBe(1);
      expect(output).toBe("Task 1 not found.\nTask 2 not found.\n");
    });
  });

  describe("output format", () => {
    beforeEach(() => {
      store.add({ title: "A" });
    });

    it("uses JSON when TASKLET_FORMAT=json", async () => {
      process.env.TASKLET_FORMAT = "json";
      await run(["get", "1"]);
      expect(JSON.parse(output).id).toBe(1);
    });

    it("uses JSON when the config says so", async () => {
      await run(["get", "1"], testConfig({ output_format: "json" }));
      expect(JSON.parse(output).id).toBe(1);
    });

    it("--plaintext overrides the config", async () => {
      await run(["get", "1", "--plaintext"], testConfig({ output_format: "json" }));
      expect(output.split("\n")[0]).toBe("[ ] 1  A");
    });
  });
});
