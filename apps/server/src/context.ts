// ──────────────────────────────────────────────
// MEDIAFORGE - Application Context
// Owns the engine client and the generation queue
// for the lifetime of the server process
// ──────────────────────────────────────────────

import type { MediaEngineClient } from "@mediaforge/types";
import { HttpMediaEngineClient } from "@mediaforge/engine-client";
import {
  createFileArtifactStore,
  createFileInputReader,
  createGenerationQueueService,
  createGenerationWorkflow,
  type ArtifactStore,
  type GenerationQueueService,
  type GenerationWorkflow,
  type InputFileReader,
} from "@mediaforge/queue";
import { createLogger, type AppConfig } from "@mediaforge/utils";

const logger = createLogger("app-context");

export interface AppContext {
  config: AppConfig;
  client: MediaEngineClient;
  artifacts: ArtifactStore;
  queue: GenerationQueueService;
  workflow: GenerationWorkflow;
}

export interface AppContextOverrides {
  client?: MediaEngineClient;
  artifacts?: ArtifactStore;
  inputs?: InputFileReader;
}

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const client =
    overrides.client ??
    new HttpMediaEngineClient({
      baseUrl: config.engine.baseUrl,
      timeoutMs: config.engine.timeoutMs,
      useApiPrefix: config.engine.useApiPrefix,
    });

  const artifacts = overrides.artifacts ?? createFileArtifactStore(config.storage.outputDir);
  const queue = createGenerationQueueService({
    client,
    artifacts,
    inputs: overrides.inputs ?? createFileInputReader(config.storage.inputDir),
    config: config.queue,
  });

  logger.info(
    { engineUrl: config.engine.baseUrl, outputDir: config.storage.outputDir, inputDir: config.storage.inputDir },
    "Application context created"
  );
  return { config, client, artifacts, queue, workflow: createGenerationWorkflow(queue) };
}

export async function closeAppContext(context: AppContext): Promise<void> {
  await context.queue.stop();
  logger.info("Application context closed");
}
