import type { Configuration } from "./config.js";
import { ConfigWriteError, describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Ask } from "./prompt.js";

export const CURATED_MODELS = [
  "qwen2.5-coder:7b",
  "llama3.2:3b",
  "codellama:7b",
  "mistral:7b",
] as const;

export type CuratedModel = (typeof CURATED_MODELS)[number];

export type MenuChoice =
  | { kind: "preset"; model: CuratedModel }
  | { kind: "custom" }
  | { kind: "cancel" };

export const CUSTOM_OPTION = "5";
export const CANCEL_OPTION = "0";

export function parseMenuChoice(input: string): MenuChoice {
  const choice = input.trim();
  if (choice === CUSTOM_OPTION) return { kind: "custom" };

  if (/^[1-9]$/.test(choice)) {
    const model = CURATED_MODELS[Number(choice) - 1];
    if (model) return { kind: "preset", model };
  }
  return { kind: "cancel" };
}

// "llama3.2" is listed by the server as "llama3.2:latest".
export function hasModel(localModels: string[], model: string): boolean {
  const wanted = model.includes(":") ? model : `${model}:latest`;
  return localModels.some((name) => name === model || name === wanted);
}

export interface SelectModelDeps {
  config: Configuration;
  ask: Ask;
  persist: (model: string) => Promise<void>;
  listLocalModels: () => Promise<string[]>;
  pullModel: (model: string) => Promise<number | null>;
  logger: Logger;
}

export type SelectModelOutcome =
  | { status: "cancelled" }
  | { status: "saved"; model: string; downloaded: boolean }
  | { status: "failed"; error: ConfigWriteError };

function renderMenu(current: string): string {
  const lines = [`Current model: ${current}`, "", "Choose a model:"];
  CURATED_MODELS.forEach((model, i) => {
    lines.push(`  ${i + 1}) ${model}`);
  });
  lines.push(`  ${CUSTOM_OPTION}) Custom model name`);
  lines.push(`  ${CANCEL_OPTION}) Cancel`);
  return lines.join("\n");
}

async function readChoice(deps: SelectModelDeps): Promise<string | undefined> {
  const choice = parseMenuChoice(await deps.ask("Selection: "));

  switch (choice.kind) {
    case "preset":
      return choice.model;
    case "custom": {
      const custom = (await deps.ask("Model name (e.g. phi3:mini): ")).trim();
      return custom || undefined;
    }
    case "cancel":
      return undefined;
  }
}

/**
 * Interactive menu that saves a new default model and offers to download it
 * when the local server does not have it yet.
 */
export async function selectModel(
  deps: SelectModelDeps
): Promise<SelectModelOutcome> {
  const { logger } = deps;
  logger.info(renderMenu(deps.config.model));

  const model = await readChoice(deps);
  if (!model) {
    logger.info("Model selection cancelled.");
    return { status: "cancelled" };
  }

  try {
    await deps.persist(model);
  } catch (err) {
    if (err instanceof ConfigWriteError) {
      logger.error(`${err.message}: ${describeError(err.cause)}`);
      return { status: "failed", error: err };
    }
    throw err;
  }
  logger.success(`Default model set to ${model}.`);

  let localModels: string[];
  try {
    localModels = await deps.listLocalModels();
  } catch (err) {
    logger.warn(`Could not check the installed models: ${describeError(err)}`);
    logger.info(`If it is missing, download it with: ollama pull ${model}`);
    return { status: "saved", model, downloaded: false };
  }

  if (hasModel(localModels, model)) {
    return { status: "saved", model, downloaded: false };
  }

  const answer = await deps.ask(`${model} is not downloaded yet. Download it now? (y/N): `);
  if (answer.toLowerCase() !== "y") {
    logger.info(`Download it later with: ollama pull ${model}`);
    return { status: "saved", model, downloaded: false };
  }

  let exitCode: number | null;
  try {
    exitCode = await deps.pullModel(model);
  } catch (err) {
    logger.error(`Could not run ollama pull: ${describeError(err)}`);
    return { status: "saved", model, downloaded: false };
  }

  if (exitCode !== 0) {
    logger.error(`ollama pull exited with code ${exitCode}.`);
    return { status: "saved", model, downloaded: false };
  }
  logger.success(`${model} downloaded.`);
  return { status: "saved", model, downloaded: true };
}
