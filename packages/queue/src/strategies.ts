// ──────────────────────────────────────────────
// MEDIAFORGE - Generation Strategies
// Per-type workflow construction and input staging
// ──────────────────────────────────────────────

import { extname } from "node:path";
import type {
  AudioWorkflowConfig,
  GenerationSettings,
  GenerationType,
  ImageWorkflowConfig,
  MediaEngineClient,
  VideoWorkflowConfig,
  WorkflowConfigMap,
} from "@mediaforge/types";
import { createLogger } from "@mediaforge/utils";
import {
  WorkflowConfigError,
  createAudioWorkflow,
  createImageWorkflow,
  createVideoWorkflow,
  type WorkflowGraph,
} from "@mediaforge/workflow";
import type { InputFileReader } from "./inputs.js";

const logger = createLogger("generation-strategy");

export const IMAGE_INPUT_EXTENSIONS: readonly string[] = [".jpg", ".jpeg", ".png", ".bmp", ".gif", ".tiff", ".webp"];
export const AUDIO_INPUT_EXTENSIONS: readonly string[] = [".wav", ".mp3", ".flac", ".ogg", ".m4a", ".aac", ".wma"];

/** Engine input subfolder that staged files are uploaded into. */
export const UPLOAD_SUBFOLDER = "mediaforge";

export interface StrategyContext {
  client: MediaEngineClient;
  inputs: InputFileReader;
}

export interface GenerationStrategy<T extends GenerationType> {
  readonly type: T;
  buildWorkflow(config: WorkflowConfigMap[T], context: StrategyContext): Promise<WorkflowGraph>;
}

export type GenerationStrategies = { [T in GenerationType]: GenerationStrategy<T> };

export const audioStrategy: GenerationStrategy<"audio"> = {
  type: "audio",
  async buildWorkflow(config: AudioWorkflowConfig) {
    return createAudioWorkflow(config);
  },
};

export const imageStrategy: GenerationStrategy<"image"> = {
  type: "image",
  async buildWorkflow(config: ImageWorkflowConfig) {
    return createImageWorkflow(config);
  },
};

async function stageInput(
  path: string,
  field: "imageFilePath" | "audioFilePath",
  allowed: readonly string[],
  context: StrategyContext
): Promise<string> {
  const extension = extname(path).toLowerCase();
  if (!allowed.includes(extension)) {
    throw new WorkflowConfigError("video", [
      `${field}: unsupported file type "${extension || path}" (allowed: ${allowed.join(", ")})`,
    ]);
  }

  const file = await context.inputs.read(path);
  const uploaded = await context.client.uploadFile(file.data, file.filename, {
    subfolder: UPLOAD_SUBFOLDER,
    type: "input",
    overwrite: true,
  });

  logger.debug({ path, storedAs: uploaded.name, subfolder: uploaded.subfolder }, "Input staged on engine");
  return uploaded.subfolder ? `${uploaded.subfolder}/${uploaded.name}` : uploaded.name;
}

export const videoStrategy: GenerationStrategy<"video"> = {
  type: "video",
  async buildWorkflow(config: VideoWorkflowConfig, context) {
    const imageFilePath = config.imageFilePath
      ? await stageInput(config.imageFilePath, "imageFilePath", IMAGE_INPUT_EXTENSIONS, context)
      : undefined;
    const audioFilePath = config.audioFilePath
      ? await stageInput(config.audioFilePath, "audioFilePath", AUDIO_INPUT_EXTENSIONS, context)
      : undefined;

    return createVideoWorkflow({ ...config, imageFilePath, audioFilePath });
  },
};

export function createDefaultStrategies(): GenerationStrategies {
  return { audio: audioStrategy, image: imageStrategy, video: videoStrategy };
}

export function buildWorkflowForSettings(
  strategies: GenerationStrategies,
  settings: GenerationSettings,
  context: StrategyContext
): Promise<WorkflowGraph> {
  switch (settings.type) {
    case "audio":
      return strategies.audio.buildWorkflow(settings.config, context);
    case "image":
      return strategies.image.buildWorkflow(settings.config, context);
    case "video":
      return strategies.video.buildWorkflow(settings.config, context);
  }
}
