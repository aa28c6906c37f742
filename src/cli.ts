#!/usr/bin/env node
import { fileURLToPath } from "url";
import fs from "fs";
import path from "path";
import { Command, CommanderError, Option } from "commander";
import { openStore, type TaskStore } from "./tasks/store.js";
import { isTaskletError, NotFoundError, ValidationError } from "./tasks/errors.js";
import type { Task } from "./tasks/types.js";
import { getStorePath } from "./storage/file.js";
import { loadConfig, getConfigPath, DEFAULT_CONFIG_TOML, type Config } from "./config/config.js";
import { parseId } from "./validation.js";
import { confirm, createLineReader } from "./prompt.js";
import { runMenu } from "./menu.js";
import {
  formatCategoriesText,
  formatSearchText,
  formatStatsText,
  formatTaskText,
  formatTasksText,
} from "./format/text.js";
import {
  formatCategoriesJson,
  formatStatsJson,
  formatTaskJson,
  formatTasksJson,
} from "./format/json.js";

const VERSION = "0.1.0";

type OutputOpts = { json?: boolean; plaintext?: boolean };

export function createProgram(
  store: TaskStore | (() => TaskStore),
  write: (text: string) => void = (t) => process.stdout.write(t + "\n"),
  config?: Config,
  confirmFn: (prompt: string) => Promise<boolean> = (prompt) => confirm(prompt),
): Command {
  const resolvedConfig = config ?? loadConfig();

  // Opened on first use so that config and help commands never touch the data file.
  let opened: TaskStore | undefined;
  function getStore(): TaskStore {
    if (typeof store !== "function") {
      return store;
    }
    if (!opened) {
      opened = store();
    }
    return opened;
  }

  const program = new Command("tasklet")
    .description(
      "tasklet: a local task list stored in a JSON file\n\nUse --json on any command for machine-readable output (or set TASKLET_FORMAT=json, or output_format in config). Run 'tasklet config init' to create a config file.",
    )
    .version(VERSION);

  program.configureOutput({
    writeOut: write,
    writeErr: write,
  });

  // Override exit to not actually exit during tests
  program.exitOverride();

  function useJson(opts: OutputOpts): boolean {
    if (opts.plaintext) {
      return false;
    }
    return !!(
      opts.json ||
      process.env.TASKLET_FORMAT === "json" ||
      resolvedConfig.output_format === "json"
    );
  }

  function reportError(err: unknown, json: boolean): void {
    if (!isTaskletError(err)) {
      throw err;
    }
    if (json) {
      write(
        JSON.stringify(
          err instanceof NotFoundError
            ? { error: err.kind, id: err.id }
            : { error: err.kind, message: err.message },
        ),
      );
    } else {
      write(err.message);
    }
    process.exitCode = 1;
  }

  function writeTask(task: Task, json: boolean): void {
    write(json ? formatTaskJson(task) : formatTaskText(task));
  }

  // Parses each raw ID and runs fn on it; errors are reported per ID so
  // one bad ID does not stop the rest.
  async function forEachId(
    rawIds: string[],
    json: boolean,
    fn: (id: number) => Promise<void> | void,
  ): Promise<void> {
    for (const raw of rawIds) {
      const parsed = parseId(raw);
      if (!parsed.valid) {
        reportError(new ValidationError(parsed.message), json);
        continue;
      }
      try {
        await fn(parsed.id);
      } catch (err) {
        reportError(err, json);
      }
    }
  }

  // add
  program
    .command("add <title>")
    .description("Add a new task")
    .option("-d, --description <text>", "Longer description")
    .option("-c, --category <name>", `Category (default: ${resolvedConfig.default_category})`)
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action(
      (title: string, opts: { description?: string; category?: string } & OutputOpts) => {
        const json = useJson(opts);
        try {
          const task = getStore().add({
            title,
            description: opts.description,
            category: opts.category,
          });
          writeTask(task, json);
        } catch (err) {
          reportError(err, json);
        }
      },
    );

  // list
  program
    .command("list")
    .description("List tasks grouped by category")
    .option("-c, --category <name>", "Only tasks in this category (case-insensitive)")
    .addOption(new Option("--incomplete", "Only tasks that are not completed"))
    .addOption(new Option("--completed", "Only completed tasks").conflicts("incomplete"))
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action(
      (opts: { category?: string; incomplete?: boolean; completed?: boolean } & OutputOpts) => {
        let completed: boolean | undefined;
        if (opts.incomplete) {
          completed = false;
        } else if (opts.completed) {
          completed = true;
        }
        const tasks = [...getStore().list({ completed, category: opts.category })];
        if (useJson(opts)) {
          write(formatTasksJson(tasks));
        } else {
          const filtered = completed !== undefined || opts.category !== undefined;
          write(
            formatTasksText(
              tasks,
              filtered && getStore().size > 0 ? "No tasks match the filter." : "No tasks found.",
            ),
          );
        }
      },
    );

  // get
  program
    .command("get <id>")
    .description("Show a task")
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action(async (rawId: string, opts: OutputOpts) => {
      const json = useJson(opts);
      await forEachId([rawId], json, (id) => {
        writeTask(getStore().get(id), json);
      });
    });

  // edit
  program
    .command("edit <id>")
    .description("Change a task's title, description or category")
    .option("-t, --title <title>", "New title")
    .option("-d, --description <text>", "New description (empty string clears it)")
    .option("-c, --category <name>", "New category")
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action(
      async (
        rawId: string,
        opts: { title?: string; description?: string; category?: string } & OutputOpts,
      ) => {
        const json = useJson(opts);
        if (
          opts.title === undefined &&
          opts.description === undefined &&
          opts.category === undefined
        ) {
          reportError(
            new ValidationError("Nothing to update. Pass --title, --description or --category."),
            json,
          );
          return;
        }
        await forEachId([rawId], json, (id) => {
          const task = getStore().edit(id, {
            title: opts.title,
            description: opts.description,
            category: opts.category,
          });
          writeTask(task, json);
        });
      },
    );

  // done
  program
    .command("done <id...>")
    .description("Mark tasks as completed")
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action(async (ids: string[], opts: OutputOpts) => {
      const json = useJson(opts);
      await forEachId(ids, json, (id) => {
        const task = getStore().markCompleted(id);
        write(json ? formatTaskJson(task) : `Completed ${task.id}: ${task.title}`);
      });
    });

  // undone
  program
    .command("undone <id...>")
    .description("Mark tasks as not completed")
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action(async (ids: string[], opts: OutputOpts) => {
      const json = useJson(opts);
      await forEachId(ids, json, (id) => {
        const task = getStore().markIncomplete(id);
        write(json ? formatTaskJson(task) : `Reopened ${task.id}: ${task.title}`);
      });
    });

  // delete
  program
    .command("delete <id...>")
    .description("Delete tasks permanently")
    .option("-y, --yes", "Do not ask for confirmation")
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action(async (ids: string[], opts: { yes?: boolean } & OutputOpts) => {
      const json = useJson(opts);
      const ask = resolvedConfig.confirm_delete && !opts.yes;
      await forEachId(ids, json, async (id) => {
        const task = getStore().get(id);
        if (ask && !(await confirmFn(`Delete task ${task.id} "${task.title}"? (y/N) `))) {
          write(json ? JSON.stringify({ id, deleted: false }) : `Kept ${task.id}.`);
          return;
        }
        getStore().delete(id);
        write(json ? JSON.stringify({ id, deleted: true }) : `Deleted ${task.id}: ${task.title}`);
      });
    });

  // search
  program
    .command("search [keyword]")
    .description("Find tasks whose title, description or category contains a keyword")
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action((keyword: string | undefined, opts: OutputOpts) => {
      const tasks = getStore().search(keyword ?? "");
      if (useJson(opts)) {
        write(formatTasksJson(tasks));
      } else {
        write(formatSearchText(tasks, (keyword ?? "").trim()));
      }
    });

  // stats
  program
    .command("stats")
    .description("Show completion statistics")
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action((opts: OutputOpts) => {
      const stats = getStore().statistics();
      write(useJson(opts) ? formatStatsJson(stats) : formatStatsText(stats));
    });

  // categories
  program
    .command("categories")
    .description("List suggested categories and the ones in use")
    .option("--json", "Output as JSON")
    .option("--plaintext", "Output as plain text (overrides config)")
    .action((opts: OutputOpts) => {
      const categories = getStore().listCategories();
      write(useJson(opts) ? formatCategoriesJson(categories) : formatCategoriesText(categories));
    });

  // menu
  program
    .command("menu")
    .description("Open the interactive numbered menu")
    .action(async () => {
      const reader = createLineReader();
      try {
        await runMenu(getStore(), reader, write);
      } finally {
        reader.close();
      }
    });

  // config
  const configCmd = program.command("config").description("Manage configuration");

  configCmd
    .command("init")
    .description("Create a default config file with documented options")
    .action(() => {
      const configPath = getConfigPath();
      if (fs.existsSync(configPath)) {
        write(`Config file already exists at ${configPath}`);
        return;
      }
      fs.mkdirSync(path.dirname(configPath), { recursive: true });
      fs.writeFileSync(configPath, DEFAULT_CONFIG_TOML);
      write(`Created ${configPath}`);
    });

  configCmd
    .command("path")
    .description("Print the config file path")
    .action(() => {
      write(getConfigPath());
    });

  return program;
}

// Entry point when run directly
async function main() {
  const config = loadConfig();
  const program = createProgram(
    () =>
      openStore(getStorePath(config.data_path), {
        defaultCategory: config.default_category,
        suggestedCategories: config.categories,
      }).store,
    undefined,
    config,
  );

  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    // Commander throws on --help, --version, etc.
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    throw err;
  }
}

// npm installs the bin as a symlink, so compare resolved paths.
function isEntryPoint(): boolean {
  if (!process.argv[1]) {
    return false;
  }
  try {
    return fs.realpathSync(process.argv[1]) === fs.realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
