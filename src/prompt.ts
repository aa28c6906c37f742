import readline from "readline";

/** Ask a yes/no question. Anything but "y" or "yes" counts as no. */
export function confirm(
  prompt: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Promise<boolean> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input, output });
    let answered = false;
    rl.question(prompt, (answer) => {
      answered = true;
      rl.close();
      const trimmed = answer.trim().toLowerCase();
      resolve(trimmed === "y" || trimmed === "yes");
    });
    rl.on("close", () => {
      if (!answered) {
        resolve(false);
      }
    });
  });
}

export interface LineReader {
  /** Print the prompt and resolve with the next line, or null once input has ended. */
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

/**
 * Line-at-a-time reader for the interactive menu. Lines that arrive before
 * they are asked for are queued, so piped input is not lost.
 */
export function createLineReader(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): LineReader {
  const rl = readline.createInterface({ input, terminal: false });
  const queued: string[] = [];
  const waiting: ((line: string | null) => void)[] = [];
  let closed = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) {
      next(line);
    } else {
      queued.push(line);
    }
  });
  rl.on("close", () => {
    closed = true;
    for (const next of waiting.splice(0)) {
      next(null);
    }
  });

  return {
    ask(prompt: string): Promise<string | null> {
      output.write(prompt);
      const line = queued.shift();
      if (line !== undefined) {
        return Promise.resolve(line);
      }
      if (closed) {
        return Promise.resolve(null);
      }
      return new Promise((resolve) => {
        waiting.push(resolve);
      });
    },
    close(): void {
      rl.close();
    },
  };
}
