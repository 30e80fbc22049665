// ──────────────────────────────────────────────
// MEDIAFORGE - Workflow Configuration Types
// Flat parameter records consumed by the factories
// ──────────────────────────────────────────────

export const GENERATION_TYPES = ["audio", "image", "video"] as const;

export type GenerationType = (typeof GENERATION_TYPES)[number];

export type SeedControl = "fixed" | "randomize";

export const AUDIO_OUTPUT_FORMATS = ["mp3", "opus", "flac"] as const;
export type AudioOutputFormat = (typeof AUDIO_OUTPUT_FORMATS)[number];

export const VIDEO_OUTPUT_FORMATS = ["mp4", "webm", "gif"] as const;
export type VideoOutputFormat = (typeof VIDEO_OUTPUT_FORMATS)[number];

export interface AudioWorkflowConfig {
  checkpointName: string;
  tags: string;
  lyrics: string;
  lyricsStrength: number;
  durationSeconds: number;
  batchSize: number;
  modelShift: number;
  tonemapMultiplier: number;
  seed: number;
  steps: number;
  cfgScale: number;
  samplerName: string;
  scheduler: string;
  denoise: number;
  outputFilename: string;
  outputFormat: AudioOutputFormat;
  quality: string;
}

export interface ImageWorkflowConfig {
  checkpointName: string;
  positivePrompt: string;
  negativePrompt: string;
  width: number;
  height: number;
  batchSize: number;
  seed: number;
  steps: number;
  cfgScale: number;
  samplerName: string;
  scheduler: string;
  denoise: number;
  outputFilename: string;
}

export interface VideoWorkflowConfig {
  /** Describes the clip in task listings; image-to-video conditioning takes no text. */
  textPrompt: string;
  imageFilePath?: string;
  audioFilePath?: string;
  checkpointName: string;
  durationSeconds: number;
  width: number;
  height: number;
  fps: number;
  motionIntensity: number;
  augmentationLevel: number;
  minCfg: number;
  seed: number;
  steps: number;
  cfgScale: number;
  samplerName: string;
  scheduler: string;
  denoise: number;
  outputFilename: string;
  outputFormat: VideoOutputFormat;
}

export interface WorkflowConfigMap {
  audio: AudioWorkflowConfig;
  image: ImageWorkflowConfig;
  video: VideoWorkflowConfig;
}
