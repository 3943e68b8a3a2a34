import { spawn } from "child_process";
import type { Logger } from "./logger.js";

export interface ExecutionResult {
  exitCode: number | null;
  // set when the command was killed instead of exiting.
  signal: NodeJS.Signals | null;
}

// The only place a generated command reaches the host shell.
export interface Executor {
  run(command: string): Promise<ExecutionResult>;
}

export function defaultShell(platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? "powershell" : "/bin/bash";
}

/**
 * Runs the command through the host shell with the terminal's stdio, so its
 * output streams live.
 */
export class ShellExecutor implements Executor {
  constructor(private readonly shell: string = defaultShell()) {}

  run(command: string): Promise<ExecutionResult> {
    return new Promise((resolve, reject) => {
      const commandProcess = spawn(command, {
        shell: this.shell,
        stdio: "inherit",
      });
      commandProcess.on("error", (err) => reject(err));
      commandProcess.on("close", (code, signal) =>
        resolve({ exitCode: code, signal })
      );
    });
  }
}

export class DryRunExecutor implements Executor {
  constructor(private readonly logger: Logger) {}

  async run(command: string): Promise<ExecutionResult> {
    this.logger.info(`(dry run) would execute: ${command}`);
    return { exitCode: 0, signal: null };
  }
}
