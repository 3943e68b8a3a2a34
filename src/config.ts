import { promises as fs } from "fs";
import { dirname, join } from "path";
import { homedir } from "os";
import { ConfigWriteError } from "./errors.js";

export const DEFAULT_MODEL = "qwen2.5-coder:7b";
export const DEFAULT_PORT = "11434";
export const DEFAULT_SERVER_URL = `http://localhost:${DEFAULT_PORT}`;

export const CONFIG_PATH = join(homedir(), ".shlama", "model");

export interface Configuration {
  readonly model: string;
  readonly serverURL: string;
  // single-line file holding the saved model name.
  readonly configPath: string;
}

type Env = Record<string, string | undefined>;

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function isMissingFile(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return err.code === "ENOENT" || err.code === "ENOTDIR";
}

/**
 * Reads the saved model name. A missing or blank file means there is no
 * saved preference.
 */
export async function readSavedModel(
  configPath: string = CONFIG_PATH
): Promise<string | undefined> {
  try {
    const data = await fs.readFile(configPath, "utf-8");
    return nonEmpty(data);
  } catch (err) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

// SHLAMA_MODEL > saved file > built-in default.
export function resolveModel(env: Env, savedModel?: string): string {
  return nonEmpty(env.SHLAMA_MODEL) ?? nonEmpty(savedModel) ?? DEFAULT_MODEL;
}

function hasPort(hostport: string): boolean {
  return /^\[[^\]]*\]:\d+$/.test(hostport) || /^[^:[\]]+:\d+$/.test(hostport);
}

/**
 * Reads OLLAMA_HOST the way `ollama serve` does: a bare host gets `http://`
 * and port 11434, while a value with a scheme keeps that scheme's own
 * default port.
 */
export function normalizeServerURL(value: string): string {
  const url = value.trim().replace(/\/+$/, "");
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(url)) return url;

  const slash = url.indexOf("/");
  const hostport = slash === -1 ? url : url.slice(0, slash);
  const path = slash === -1 ? "" : url.slice(slash);
  const host = hasPort(hostport) ? hostport : `${hostport}:${DEFAULT_PORT}`;
  return `http://${host}${path}`;
}

// OLLAMA_HOST > built-in default.
export function resolveServerURL(env: Env): string {
  const host = nonEmpty(env.OLLAMA_HOST);
  return host ? normalizeServerURL(host) : DEFAULT_SERVER_URL;
}

export async function loadConfig(
  env: Env = process.env,
  configPath: string = CONFIG_PATH
): Promise<Configuration> {
  const savedModel = await readSavedModel(configPath);

  return Object.freeze({
    model: resolveModel(env, savedModel),
    serverURL: resolveServerURL(env),
    configPath,
  });
}

export async function persistModel(
  model: string,
  configPath: string = CONFIG_PATH
): Promise<void> {
  try {
    await fs.mkdir(dirname(configPath), { recursive: true });
    await fs.writeFile(configPath, `${model.trim()}\n`, "utf-8");
  } catch (err) {
    throw new ConfigWriteError(configPath, { cause: err });
  }
}
