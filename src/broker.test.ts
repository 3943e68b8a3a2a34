import { describe, expect, it, vi } from "vitest";
import { createOllamaClient, generateCommand } from "./ai.js";
import { type BrokerDeps, runRequest, USAGE_MESSAGE } from "./broker.js";
import type { Configuration } from "./config.js";
import {
  EmptySuggestionError,
  ExecutionError,
  InferenceError,
  ServerUnavailableError,
  UsageError,
} from "./errors.js";
import type { Executor } from "./executor.js";
import { ensureServerReady, probeServer } from "./server.js";
import { createFakeFetch, createRecordingLogger, jsonResponse } from "./test-utils.js";

const config: Configuration = Object.freeze({
  model: "llama3.2:3b",
  serverURL: "http://localhost:11434",
  configPath: "/tmp/shlama-test/model",
});

function makeDeps(overrides: Partial<BrokerDeps> = {}) {
  const logger = createRecordingLogger();
  const run = vi.fn<Executor["run"]>().mockResolvedValue({ exitCode: 0, signal: null });
  const deps = {
    config,
    ensureServer: vi.fn<BrokerDeps["ensureServer"]>().mockResolvedValue(true),
    generate: vi.fn<BrokerDeps["generate"]>().mockResolvedValue("ls -a"),
    ask: vi.fn<BrokerDeps["ask"]>().mockResolvedValue("y"),
    executor: { run },
    logger,
    ...overrides,
  };
  return { deps, run, logger };
}

describe("runRequest", () => {
  const emptyRequests: { tokens: string[] }[] = [
    { tokens: [] },
    { tokens: [""] },
    { tokens: ["  ", "\t"] },
  ];

  it.each(emptyRequests)(
    "fails with a usage error for empty request $tokens",
    async ({ tokens }) => {
      const { deps, run, logger } = makeDeps();

      const outcome = await runRequest(tokens, deps);

      expect(outcome.state).toBe("failed");
      expect(outcome.error).toBeInstanceOf(UsageError);
      expect(deps.ensureServer).not.toHaveBeenCalled();
      expect(deps.generate).not.toHaveBeenCalled();
      expect(run).not.toHaveBeenCalled();
      expect(logger.messages("error")).toEqual([USAGE_MESSAGE]);
    }
  );

  it("joins the request tokens with spaces", async () => {
    const { deps } = makeDeps();

    await runRequest(["list", "all", "files"], deps);

    expect(deps.generate).toHaveBeenCalledWith("list all files", "llama3.2:3b");
  });

  it("walks every state on the happy path", async () => {
    const { deps } = makeDeps();

    const outcome = await runRequest(["list files"], deps);

    expect(outcome.trail).toEqual([
      "idle",
      "validating-input",
      "ensuring-server",
      "generating",
      "awaiting-confirmation",
      "executing",
      "done",
    ]);
  });

  it.each(["y", "Y"])("executes exactly once when the user answers %j", async (answer) => {
    const { deps, run } = makeDeps({ ask: vi.fn().mockResolvedValue(answer) });

    const outcome = await runRequest(["list files"], deps);

    expect(outcome).toMatchObject({ state: "done", executed: true, suggestion: "ls -a" });
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith("ls -a");
  });

  it.each(["", "n", "N", "yes", " y", "y ", "no"])(
    "does not execute when the user answers %j",
    async (answer) => {
      const { deps, run, logger } = makeDeps({ ask: vi.fn().mockResolvedValue(answer) });

      const outcome = await runRequest(["list files"], deps);

      expect(outcome).toMatchObject({ state: "done", executed: false });
      expect(run).not.toHaveBeenCalled();
      expect(logger.messages("info")).toContain("Command not executed.");
    }
  );

  it("fails without generating when the server is unavailable", async () => {
    const { deps, run, logger } = makeDeps({
      ensureServer: vi.fn().mockResolvedValue(false),
    });

    const outcome = await runRequest(["list files"], deps);

    expect(outcome.state).toBe("failed");
    expect(outcome.error).toBeInstanceOf(ServerUnavailableError);
    expect(deps.generate).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
    expect(logger.messages("error")).toEqual([
      "Ollama server is not reachable at http://localhost:11434\n" +
        "Install Ollama from https://ollama.com/download, then start it with `ollama serve`.",
    ]);
  });

  it("suggests checking OLLAMA_HOST for a remote server", async () => {
    const { deps, logger } = makeDeps({
      config: { ...config, serverURL: "http://10.0.0.5:11434" },
      ensureServer: vi.fn().mockResolvedValue(false),
    });

    await runRequest(["list files"], deps);

    expect(logger.messages("error")).toEqual([
      "Ollama server is not reachable at http://10.0.0.5:11434\n" +
        "Check that the server set in OLLAMA_HOST (http://10.0.0.5:11434) is running and reachable.",
    ]);
  });

  it("fails without showing anything when generation fails", async () => {
    const { deps, run, logger } = makeDeps({
      generate: vi.fn().mockRejectedValue(new InferenceError("Timed out waiting for the model to answer")),
    });

    const outcome = await runRequest(["list files"], deps);

    expect(outcome.state).toBe("failed");
    expect(outcome.error).toBeInstanceOf(InferenceError);
    expect(logger.messages("command")).toEqual([]);
    expect(deps.ask).not.toHaveBeenCalled();
    expect(run).not.toHaveBeenCalled();
    expect(logger.messages("error")).toEqual([
      "Failed to generate command: Timed out waiting for the model to answer",
    ]);
  });

  it("fails when the generated command is blank", async () => {
    const { deps, run } = makeDeps({ generate: vi.fn().mockResolvedValue("   ") });

    const outcome = await runRequest(["list files"], deps);

    expect(outcome.error).toBeInstanceOf(EmptySuggestionError);
    expect(run).not.toHaveBeenCalled();
  });

  it("reports a failing command but still counts it as executed", async () => {
    const run = vi.fn<Executor["run"]>().mockResolvedValue({ exitCode: 2, signal: null });
    const { deps, logger } = makeDeps({ executor: { run } });

    const outcome = await runRequest(["list files"], deps);

    expect(outcome.state).toBe("done");
    expect(outcome.executed).toBe(true);
    expect(outcome.error).toBeInstanceOf(ExecutionError);
    expect(logger.messages("error")).toEqual(["Command exited with code 2: ls -a"]);
    expect(logger.messages("warn")).toHaveLength(1);
  });

  it("reports a command killed by a signal as having run", async () => {
    const run = vi.fn<Executor["run"]>().mockResolvedValue({ exitCode: null, signal: "SIGTERM" });
    const { deps, logger } = makeDeps({ executor: { run } });

    const outcome = await runRequest(["list files"], deps);

    expect(outcome).toMatchObject({ state: "done", executed: true });
    expect(logger.messages("error")).toEqual(["Command was terminated by SIGTERM: ls -a"]);
  });

  it("reports a command that could not be started", async () => {
    const run = vi.fn<Executor["run"]>().mockRejectedValue(new Error("spawn /bin/bash ENOENT"));
    const { deps, logger } = makeDeps({ executor: { run } });

    const outcome = await runRequest(["list files"], deps);

    expect(outcome).toMatchObject({ state: "done", executed: true });
    expect(logger.messages("error")).toEqual(["Command could not be run: ls -a"]);
  });

  it("shows the suggestion once and runs it verbatim against a fake server", async () => {
    const { fetch, calls } = createFakeFetch((url) =>
      url.endsWith("/api/tags")
        ? jsonResponse({ models: [] })
        : jsonResponse({ response: "Get-ChildItem -Force" })
    );
    const client = createOllamaClient(config.serverURL, 1_000, fetch);
    const { deps, run, logger } = makeDeps({
      ensureServer: (serverURL) =>
        ensureServerReady(serverURL, {
          probe: () => probeServer(client),
          launch: () => undefined,
        }),
      generate: (prompt, model) => generateCommand(prompt, model, client, "win32"),
    });

    const outcome = await runRequest(["list all files including hidden"], deps);

    expect(outcome).toMatchObject({ state: "done", executed: true, suggestion: "Get-ChildItem -Force" });
    expect(logger.messages("command")).toEqual(["Get-ChildItem -Force"]);
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith("Get-ChildItem -Force");
    expect(calls.map((call) => call.url)).toEqual([
      "http://localhost:11434/api/tags",
      "http://localhost:11434/api/generate",
    ]);
  });

  it("fails with ServerUnavailableError once the probe budget runs out", async () => {
    const probe = vi.fn().mockResolvedValue(false);
    const { deps } = makeDeps({
      ensureServer: (serverURL) =>
        ensureServerReady(serverURL, {
          probe,
          launch: () => undefined,
          wait: () => Promise.resolve(),
          attempts: 3,
        }),
    });

    const outcome = await runRequest(["list files"], deps);

    expect(outcome.error).toBeInstanceOf(ServerUnavailableError);
    expect(probe).toHaveBeenCalledTimes(4);
    expect(deps.generate).not.toHaveBeenCalled();
  });
});
