import { type SpawnOptions, spawn } from "child_process";
import { existsSync } from "fs";
import { win32 } from "path";
import { setTimeout as sleep } from "timers/promises";
import type { Ollama } from "ollama";
import type { Logger } from "./logger.js";

export const PROBE_TIMEOUT_MS = 3_000;
export const READY_POLL_ATTEMPTS = 30;
export const READY_POLL_INTERVAL_MS = 500;

type Env = Record<string, string | undefined>;

export type ListClient = Pick<Ollama, "list">;

// the slice of ChildProcess the launcher and `ollama pull` rely on.
export interface SpawnedProcess {
  on(event: "error", listener: (err: Error) => void): unknown;
  on(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void
  ): unknown;
  unref(): void;
}

export type SpawnProcess = (
  command: string,
  args: string[],
  options: SpawnOptions
) => SpawnedProcess;

const LOOPBACK_HOSTS = new Set(["localhost", "::1", "[::1]", "0.0.0.0"]);

export function isLoopback(serverURL: string): boolean {
  let hostname: string;
  try {
    hostname = new URL(serverURL).hostname.toLowerCase();
  } catch {
    return false;
  }
  return LOOPBACK_HOSTS.has(hostname) || /^127(\.\d{1,3}){3}$/.test(hostname);
}

// reachability is all that counts; the model list itself is ignored.
export async function probeServer(client: ListClient): Promise<boolean> {
  try {
    await client.list();
    return true;
  } catch {
    return false;
  }
}

export async function listLocalModels(client: ListClient): Promise<string[]> {
  const response = await client.list();
  return response.models.map((m) => m.name);
}

// path of the desktop app that ships with the server, if it is installed.
export function installedAppPath(
  platform: NodeJS.Platform,
  env: Env,
  exists: (path: string) => boolean = existsSync
): string | undefined {
  let candidate: string | undefined;
  if (platform === "win32" && env.LOCALAPPDATA) {
    candidate = win32.join(env.LOCALAPPDATA, "Programs", "Ollama", "ollama app.exe");
  } else if (platform === "darwin") {
    candidate = "/Applications/Ollama.app/Contents/MacOS/Ollama";
  }
  return candidate && exists(candidate) ? candidate : undefined;
}

export interface LaunchOptions {
  platform?: NodeJS.Platform;
  env?: Env;
  exists?: (path: string) => boolean;
  spawnProcess?: SpawnProcess;
}

/**
 * Starts the server in the background. The child is detached and unref'd so
 * it keeps running after the CLI exits.
 */
export function launchServer(
  logger: Logger,
  {
    platform = process.platform,
    env = process.env,
    exists = existsSync,
    spawnProcess = spawn,
  }: LaunchOptions = {}
): void {
  const appPath = installedAppPath(platform, env, exists);
  const command = appPath ?? "ollama";
  const args = appPath ? [] : ["serve"];

  logger.debug(`Launching ${command} ${args.join(" ")}`.trim());

  const child = spawnProcess(command, args, { detached: true, stdio: "ignore" });
  child.on("error", (err) => {
    logger.warn(`Could not start Ollama (${command}): ${err.message}`);
  });
  child.unref();
}

export interface ReadyOptions {
  probe: () => Promise<boolean>;
  launch: () => void;
  wait?: (ms: number) => Promise<unknown>;
  attempts?: number;
  intervalMs?: number;
}

export async function ensureServerReady(
  serverURL: string,
  {
    probe,
    launch,
    wait = sleep,
    attempts = READY_POLL_ATTEMPTS,
    intervalMs = READY_POLL_INTERVAL_MS,
  }: ReadyOptions
): Promise<boolean> {
  if (await probe()) return true;

  // a remote server cannot be started from here.
  if (!isLoopback(serverURL)) return false;

  launch();

  for (let attempt = 0; attempt < attempts; attempt++) {
    await wait(intervalMs);
    if (await probe()) return true;
  }
  return false;
}

// runs `ollama pull` in the foreground so its own progress output shows.
export function pullModel(
  model: string,
  spawnProcess: SpawnProcess = spawn
): Promise<number | null> {
  return new Promise((resolve, reject) => {
    const pullProcess = spawnProcess("ollama", ["pull", model], { stdio: "inherit" });
    pullProcess.on("error", (err) => reject(err));
    pullProcess.on("close", (code) => resolve(code));
  });
}
