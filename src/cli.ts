import { Command } from "commander";

export const VERSION = "1.0.0";

export interface CliOptions {
  version?: boolean;
  model?: boolean;
  dryRun?: boolean;
}

export interface CliHandlers {
  version: () => void;
  selectModel: (options: CliOptions) => Promise<void>;
  request: (request: string[], options: CliOptions) => Promise<void>;
}

/**
 * Flags resolve in a fixed order: help, version, model selection, then the
 * request itself. Version is a plain flag handled in the action so that
 * `--help` still wins when both are given.
 */
export function createProgram(shell: string, handlers: CliHandlers): Command {
  const program = new Command();

  program
    .name("shlama")
    .description(
      `shlama: Natural language to ${shell} command generator, powered by a local Ollama model.`
    )
    .argument(
      "[request...]",
      "Natural language request to convert into a shell command."
    )
    .option("-v, --version", "output the version number")
    .option("-m, --model", "choose the model used to generate commands")
    .option("-n, --dry-run", "show the command instead of running it")
    .action(async (request: string[], options: CliOptions) => {
      if (options.version) {
        handlers.version();
      } else if (options.model) {
        await handlers.selectModel(options);
      } else {
        await handlers.request(request, options);
      }
    });

  return program;
}
