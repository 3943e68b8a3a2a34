import type { Configuration } from "./config.js";
import {
  EmptySuggestionError,
  ExecutionError,
  InferenceError,
  ServerUnavailableError,
  ShlamaError,
  UsageError,
  describeError,
} from "./errors.js";
import type { Executor } from "./executor.js";
import type { Logger } from "./logger.js";
import type { Ask } from "./prompt.js";
import { isLoopback } from "./server.js";

export type BrokerState =
  | "idle"
  | "validating-input"
  | "ensuring-server"
  | "generating"
  | "awaiting-confirmation"
  | "executing"
  | "done"
  | "failed";

export interface BrokerOutcome {
  state: "done" | "failed";
  // whether the suggestion was handed to the executor.
  executed: boolean;
  suggestion?: string;
  error?: ShlamaError;
  trail: BrokerState[];
}

export interface BrokerDeps {
  config: Configuration;
  ensureServer: (serverURL: string) => Promise<boolean>;
  generate: (request: string, model: string) => Promise<string>;
  ask: Ask;
  executor: Executor;
  logger: Logger;
}

export const USAGE_MESSAGE =
  'Please describe what you want to do, e.g. shlama "list all files including hidden"';

export function remediationFor(serverURL: string): string {
  if (isLoopback(serverURL)) {
    return "Install Ollama from https://ollama.com/download, then start it with `ollama serve`.";
  }
  return `Check that the server set in OLLAMA_HOST (${serverURL}) is running and reachable.`;
}

/**
 * Turns one natural-language request into a command and runs it once the
 * user confirms. Never throws: every failure is reported through the logger
 * and returned in the outcome.
 */
export async function runRequest(
  tokens: string[],
  deps: BrokerDeps
): Promise<BrokerOutcome> {
  const { config, logger } = deps;
  const trail: BrokerState[] = ["idle"];
  const enter = (state: BrokerState) => {
    trail.push(state);
    logger.debug(`state: ${state}`);
  };

  const fail = (error: ShlamaError, message = error.message): BrokerOutcome => {
    enter("failed");
    logger.error(message);
    return { state: "failed", executed: false, error, trail };
  };

  enter("validating-input");
  const request = tokens.join(" ").trim();
  if (!request) {
    return fail(new UsageError(USAGE_MESSAGE));
  }

  enter("ensuring-server");
  if (!(await deps.ensureServer(config.serverURL))) {
    const error = new ServerUnavailableError(
      config.serverURL,
      remediationFor(config.serverURL)
    );
    return fail(error, `${error.message}\n${error.remediation}`);
  }

  enter("generating");
  let suggestion: string;
  try {
    suggestion = await deps.generate(request, config.model);
  } catch (err) {
    const error =
      err instanceof ShlamaError
        ? err
        : new InferenceError(describeError(err), { cause: err });
    return fail(error, `Failed to generate command: ${error.message}`);
  }
  if (!suggestion.trim()) {
    const error = new EmptySuggestionError();
    return fail(error, `Failed to generate command: ${error.message}`);
  }

  enter("awaiting-confirmation");
  logger.info("Generated command:");
  logger.command(suggestion);
  const answer = await deps.ask("Execute this command? (y/N): ");

  if (answer.toLowerCase() !== "y") {
    enter("done");
    logger.info("Command not executed.");
    return { state: "done", executed: false, suggestion, trail };
  }

  enter("executing");
  let error: ExecutionError | undefined;
  try {
    const { exitCode, signal } = await deps.executor.run(suggestion);
    if (exitCode !== 0) {
      error = new ExecutionError(suggestion, exitCode, signal);
    }
  } catch (err) {
    error = new ExecutionError(suggestion, null, null, { cause: err });
    logger.debug(describeError(err));
  }

  enter("done");
  if (error) {
    logger.error(error.message);
    logger.warn("The command was started, so some of its changes may already have been made.");
  } else {
    logger.success("Command finished.");
  }
  return { state: "done", executed: true, suggestion, error, trail };
}
