export type ErrorKind =
  | "UsageError"
  | "ServerUnavailableError"
  | "InferenceError"
  | "EmptySuggestionError"
  | "ExecutionError"
  | "ConfigWriteError";

export abstract class ShlamaError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// No request text was given.
export class UsageError extends ShlamaError {
  readonly kind = "UsageError";
}

export class ServerUnavailableError extends ShlamaError {
  readonly kind = "ServerUnavailableError";

  constructor(
    readonly serverURL: string,
    readonly remediation: string
  ) {
    super(`Ollama server is not reachable at ${serverURL}`);
  }
}

// Transport failure, HTTP error status or timeout while generating.
export class InferenceError extends ShlamaError {
  readonly kind = "InferenceError";
}

export class EmptySuggestionError extends ShlamaError {
  readonly kind = "EmptySuggestionError";

  constructor() {
    super("The model returned an empty command");
  }
}

function describeExit(
  command: string,
  exitCode: number | null,
  signal: NodeJS.Signals | null
): string {
  if (signal) return `Command was terminated by ${signal}: ${command}`;
  if (exitCode === null) return `Command could not be run: ${command}`;
  return `Command exited with code ${exitCode}: ${command}`;
}

/**
 * The confirmed command failed while running. It may already have changed
 * something on disk before failing.
 */
export class ExecutionError extends ShlamaError {
  readonly kind = "ExecutionError";

  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly signal: NodeJS.Signals | null = null,
    options?: ErrorOptions
  ) {
    super(describeExit(command, exitCode, signal), options);
  }
}

export class ConfigWriteError extends ShlamaError {
  readonly kind = "ConfigWriteError";

  constructor(readonly path: string, options?: ErrorOptions) {
    super(`Could not save the model choice to ${path}`, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
