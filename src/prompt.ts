import * as readline from "readline";

export type Ask = (question: string) => Promise<string>;

export interface Prompt {
  ask: Ask;
  close(): void;
}

/**
 * One readline interface for a whole flow. Lines that arrive before they are
 * asked for (piped stdin) are queued, and once input ends every further
 * question gets an empty answer.
 */
export function createPrompt(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompt {
  const rl = readline.createInterface({ input, output });
  const lines: string[] = [];
  const waiting: Array<(line: string) => void> = [];
  let closed = false;

  rl.on("line", (line) => {
    const next = waiting.shift();
    if (next) next(line);
    else lines.push(line);
  });
  rl.on("close", () => {
    closed = true;
    for (const resolve of waiting.splice(0)) resolve("");
  });
  // Ctrl+C ends input, which leaves any pending answer empty.
  rl.on("SIGINT", () => rl.close());

  return {
    ask: (question) => {
      if (closed) {
        output.write(question);
      } else {
        rl.setPrompt(question);
        rl.prompt();
      }

      const buffered = lines.shift();
      if (buffered !== undefined) return Promise.resolve(buffered);
      if (closed) return Promise.resolve("");
      return new Promise((resolve) => waiting.push(resolve));
    },
    close: () => rl.close(),
  };
}
