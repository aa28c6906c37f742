import fs from "fs";
import path from "path";
import os from "os";
import { parse } from "smol-toml";
import { DEFAULT_CATEGORY, SUGGESTED_CATEGORIES } from "../tasks/types.js";
import { MAX_CATEGORY_LENGTH } from "../validation.js";

export type OutputFormat = "text" | "json";

export interface Config {
  output_format: OutputFormat;
  data_path: string | null;
  default_category: string;
  categories: string[];
  confirm_delete: boolean;
}

const DEFAULTS: Config = {
  output_format: "text",
  data_path: null,
  default_category: DEFAULT_CATEGORY,
  categories: [...SUGGESTED_CATEGORIES],
  confirm_delete: true,
};

function defaults(): Config {
  return { ...DEFAULTS, categories: [...DEFAULTS.categories] };
}

function isCategoryName(value: unknown): value is string {
  return (
    typeof value === "string" && value.trim().length > 0 && value.length <= MAX_CATEGORY_LENGTH
  );
}

export function getConfigPath(): string {
  if (process.env.TASKLET_CONFIG_DIR) {
    return path.join(process.env.TASKLET_CONFIG_DIR, "config.toml");
  }
  return path.join(os.homedir(), ".tasklet", "config.toml");
}

export const DEFAULT_CONFIG_TOML = `# tasklet configuration

# Default output format for commands
# "text" = human-readable (default)
# "json" = machine-readable (overridable per-command with --json / --plaintext)
output_format = "text"

# Where tasks are stored. Defaults to ~/.tasklet/tasks.json
# (or $TASKLET_DATA_PATH when set).
# data_path = "~/Dropbox/tasks.json"

# Category given to tasks added without one
default_category = "General"

# Suggested categories, listed before the ones already in use
categories = ["Work", "Personal", "Urgent", "General", "Health", "Learning"]

# Ask before deleting tasks (skip per-command with --yes)
confirm_delete = true
`;

export function loadConfig(configPath?: string): Config {
  const resolved = configPath ?? getConfigPath();

  if (!fs.existsSync(resolved)) {
    return defaults();
  }

  const raw = fs.readFileSync(resolved, "utf-8");
  let parsed;
  try {
    parsed = parse(raw);
  } catch (err) {
    process.stderr.write(
      `Warning: Could not parse config file at ${resolved}: ${err instanceof Error ? err.message : String(err)}. Using defaults.\n`,
    );
    return defaults();
  }
  const config = defaults();

  const outputFormat = parsed.output_format;
  if (outputFormat === "text" || outputFormat === "json") {
    config.output_format = outputFormat;
  }

  if (typeof parsed.data_path === "string" && parsed.data_path.length > 0) {
    config.data_path = parsed.data_path;
  }

  if (isCategoryName(parsed.default_category)) {
    config.default_category = parsed.default_category.trim();
  }

  if (Array.isArray(parsed.categories)) {
    config.categories = parsed.categories.filter(isCategoryName).map((c) => c.trim());
  }

  if (typeof parsed.confirm_delete === "boolean") {
    config.confirm_delete = parsed.confirm_delete;
  }

  return config;
}
