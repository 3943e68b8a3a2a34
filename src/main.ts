#!/usr/bin/env node

import * as dotenv from "dotenv";
import ora from "ora";
import {
  GENERATE_TIMEOUT_MS,
  createOllamaClient,
  generateCommand,
  getSystemConfig,
} from "./ai.js";
import { runRequest } from "./broker.js";
import { VERSION, createProgram } from "./cli.js";
import { loadConfig, persistModel } from "./config.js";
import { describeError } from "./errors.js";
import { DryRunExecutor, ShellExecutor } from "./executor.js";
import { createConsoleLogger } from "./logger.js";
import { selectModel } from "./models.js";
import { createPrompt } from "./prompt.js";
import {
  PROBE_TIMEOUT_MS,
  ensureServerReady,
  launchServer,
  listLocalModels,
  probeServer,
  pullModel,
} from "./server.js";

dotenv.config();

const logger = createConsoleLogger(Boolean(process.env.SHLAMA_DEBUG));

async function main() {
  const program = createProgram(getSystemConfig().shell, {
    version: () => console.log(VERSION),

    selectModel: async () => {
      const config = await loadConfig();
      const probeClient = createOllamaClient(config.serverURL, PROBE_TIMEOUT_MS);
      const prompt = createPrompt();

      try {
        const outcome = await selectModel({
          config,
          ask: prompt.ask,
          persist: (model) => persistModel(model, config.configPath),
          listLocalModels: () => listLocalModels(probeClient),
          pullModel: (model) => pullModel(model),
          logger,
        });
        if (outcome.status === "failed") process.exitCode = 1;
      } finally {
        prompt.close();
      }
    },

    request: async (request, options) => {
      const config = await loadConfig();
      logger.debug(`model=${config.model} server=${config.serverURL}`);

      const probeClient = createOllamaClient(config.serverURL, PROBE_TIMEOUT_MS);
      const generateClient = createOllamaClient(
        config.serverURL,
        GENERATE_TIMEOUT_MS
      );

      const outcome = await runRequest(request, {
        config,
        ensureServer: (serverURL) => {
          const spinner = ora(`Connecting to Ollama at ${serverURL}...`).start();
          return ensureServerReady(serverURL, {
            probe: () => probeServer(probeClient),
            launch: () => {
              spinner.text = "Starting Ollama...";
              launchServer(logger);
            },
          }).finally(() => spinner.stop());
        },
        generate: async (userPrompt, model) => {
          const spinner = ora(`Thinking with ${model}...`).start();
          try {
            return await generateCommand(userPrompt, model, generateClient);
          } finally {
            spinner.stop();
          }
        },
        // the only question of this flow; stdin is released before the command runs.
        ask: async (question) => {
          const prompt = createPrompt();
          try {
            return await prompt.ask(question);
          } finally {
            prompt.close();
          }
        },
        executor: options.dryRun ? new DryRunExecutor(logger) : new ShellExecutor(),
        logger,
      });

      if (outcome.state === "failed" || outcome.error) process.exitCode = 1;
    },
  });

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  logger.error(describeError(err));
  process.exitCode = 1;
});
