import { Ollama } from "ollama";
import * as os from "os";
import { EmptySuggestionError, InferenceError, describeError } from "./errors.js";

// covers loading the model into memory as well as generating.
export const GENERATE_TIMEOUT_MS = 120_000;

export const FALLBACK_COMMAND =
  'echo "Unable to generate a safe command for this request"';

export interface SystemConfig {
  shell: string;
  systemInstruction: string;
}

export type GenerateClient = Pick<Ollama, "generate">;

// create prompt for the model according to the system.
export function getSystemConfig(
  platform: NodeJS.Platform = os.platform()
): SystemConfig {
  let shellName: string;
  let specificRules: string;

  if (platform === "win32") {
    shellName = "Windows PowerShell";
    specificRules = `Prefer standard, widely available Windows PowerShell cmdlets (e.g., 'Get-ChildItem', 'Select-Object', 'Where-Object', 'Move-Item').
For destructive operations, generate a non-destructive alternative (e.g., 'Get-ChildItem ...' or a command using the '-WhatIf' parameter).`;
  } else {
    shellName = "Bash/Zsh";
    specificRules = `Prefer standard, widely available Linux/macOS utilities (e.g., 'grep', 'find', 'ls', 'mv').
For destructive operations, generate a non-destructive alternative (e.g., 'find ... -print').`;
  }

  const systemInstruction = `You are an expert ${shellName} command generator.
A user will provide a request in natural language. Your ONLY task is to convert this request
into a single, executable, syntactically correct ${shellName} command.

Crucial Rules:
1. Output MUST be ONLY the shell command. Do not include any explanations, surrounding text,
   markdown formatting (like \`\`\`bash\`\`\`) or backticks.
2. The output must be ready to be copied and pasted directly into a terminal.
3. ${specificRules}
4. If the request is unclear or dangerous, output exactly: ${FALLBACK_COMMAND}
`;

  return { shell: shellName, systemInstruction };
}

/**
 * Builds an Ollama client whose every request is aborted after `timeoutMs`.
 */
export function createOllamaClient(
  serverURL: string,
  timeoutMs: number,
  fetchImpl: typeof fetch = fetch
): Ollama {
  const timedFetch: typeof fetch = (input, init) =>
    fetchImpl(input, { ...init, signal: AbortSignal.timeout(timeoutMs) });

  return new Ollama({ host: serverURL, fetch: timedFetch });
}

/**
 * Strips the markdown a model tends to wrap commands in: one fenced block
 * (with an optional language tag) and one pair of inline backticks. Nested or
 * repeated blocks are left as they are.
 */
export function cleanCommand(text: string): string {
  let command = text.trim();

  command = command.replace(/^```(?:[\w+-]*[ \t]*\r?\n)?/, "");
  command = command.replace(/\r?\n?```$/, "");
  command = command.trim();

  return command.replace(/^`([^`]+)`$/, "$1").trim();
}

// generate cmd from the user prompt with the local model.
export async function generateCommand(
  userPrompt: string,
  model: string,
  client: GenerateClient,
  platform: NodeJS.Platform = os.platform()
): Promise<string> {
  const { systemInstruction } = getSystemConfig(platform);

  let text: string;
  try {
    const response = await client.generate({
      model,
      prompt: userPrompt,
      system: systemInstruction,
      stream: false,
    });
    text = response.response;
  } catch (err) {
    if (err instanceof Error && err.name === "TimeoutError") {
      throw new InferenceError(
        "Timed out waiting for the model to answer",
        { cause: err }
      );
    }
    throw new InferenceError(`Request to Ollama failed: ${describeError(err)}`, {
      cause: err,
    });
  }

  const command = cleanCommand(text ?? "");
  if (!command) {
    throw new EmptySuggestionError();
  }
  return command;
}
