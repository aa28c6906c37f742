import fs from "fs";
import path from "path";
import os from "os";
import { CorruptedStoreError, PersistenceError } from "../tasks/errors.js";
import {
  decodeStoreFile,
  encodeStoreFile,
  type DecodeOptions,
  type StoreSnapshot,
} from "./schema.js";

export function expandHome(p: string): string {
  return p.startsWith("~") ? path.join(os.homedir(), p.slice(1)) : p;
}

/** $TASKLET_DATA_PATH, then the configured path, then ~/.tasklet/tasks.json. */
export function getStorePath(configured?: string | null): string {
  if (process.env.TASKLET_DATA_PATH) {
    return process.env.TASKLET_DATA_PATH;
  }
  if (configured) {
    return expandHome(configured);
  }
  return path.join(os.homedir(), ".tasklet", "tasks.json");
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read and validate the task file. Returns null when the file does not
 * exist; throws CorruptedStoreError when it exists but cannot be used.
 */
export function readStoreFile(filePath: string, options: DecodeOptions): StoreSnapshot | null {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw new CorruptedStoreError(filePath, describeError(err));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CorruptedStoreError(filePath, `invalid JSON (${describeError(err)})`);
  }

  const result = decodeStoreFile(data, options);
  if (!result.ok) {
    throw new CorruptedStoreError(filePath, result.reason);
  }
  return result.snapshot;
}

/**
 * Write the snapshot to a temp file beside the target, then rename it over
 * the target so an interrupted write never leaves a truncated file behind.
 */
export function writeStoreFile(filePath: string, snapshot: StoreSnapshot): void {
  const dir = path.dirname(filePath);
  const tmpPath = `${filePath}.tmp-${process.pid}`;
  try {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    fs.writeFileSync(tmpPath, JSON.stringify(encodeStoreFile(snapshot), null, 2) + "\n", {
      encoding: "utf-8",
      mode: 0o600,
    });
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    try {
      fs.rmSync(tmpPath, { force: true });
    } catch (cleanupErr) {
      if (process.env.TASKLET_DEBUG === "1") {
        console.error(`Could not remove ${tmpPath}:`, cleanupErr);
      }
    }
    throw new PersistenceError(filePath, err);
  }
}

/**
 * Move an unreadable task file out of the way so the next save does not
 * overwrite it. Returns the new location.
 */
export function quarantineStoreFile(filePath: string): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-").replace("Z", "");
  let dest = `${filePath}.corrupt-${ts}`;
  let i = 1;
  while (fs.existsSync(dest)) {
    dest = `${filePath}.corrupt-${ts}-${i}`;
    i++;
  }
  fs.renameSync(filePath, dest);
  return dest;
}
