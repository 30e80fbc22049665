// ──────────────────────────────────────────────
// MEDIAFORGE - Queue Package
// ──────────────────────────────────────────────

export { GenerationTask, createGenerationTask } from "./task.js";
export type { GenerationTaskInit } from "./task.js";
export { TaskStateError, DuplicateTaskError } from "./errors.js";
export {
  summarizeAudioConfig,
  summarizeImageConfig,
  summarizeVideoConfig,
  summarizeGeneration,
  describeGenerationType,
} from "./summaries.js";
export {
  audioStrategy,
  imageStrategy,
  videoStrategy,
  createDefaultStrategies,
  buildWorkflowForSettings,
  IMAGE_INPUT_EXTENSIONS,
  AUDIO_INPUT_EXTENSIONS,
  UPLOAD_SUBFOLDER,
} from "./strategies.js";
export type { GenerationStrategy, GenerationStrategies, StrategyContext } from "./strategies.js";
export {
  resolveOutputFile,
  createFileArtifactStore,
  buildArtifactFileName,
  artifactWebPath,
  contentTypeFor,
  isArtifactFileName,
  ARTIFACT_LAYOUT,
} from "./artifacts.js";
export type { ArtifactStore, SaveArtifactInput, SavedArtifact, StoredArtifact } from "./artifacts.js";
export { createFileInputReader } from "./inputs.js";
export type { InputFile, InputFileReader } from "./inputs.js";
export { createGenerationQueueService } from "./queue-service.js";
export type { GenerationQueueService, GenerationQueueServiceOptions } from "./queue-service.js";
export { createGenerationWorkflow } from "./generation.js";
export type { GenerationWorkflow } from "./generation.js";
