// ──────────────────────────────────────────────
// MEDIAFORGE - Task Summaries
// Human-readable prompt line shown for each task
// ──────────────────────────────────────────────

import { basename } from "node:path";
import type {
  AudioWorkflowConfig,
  GenerationSettings,
  GenerationType,
  ImageWorkflowConfig,
  VideoWorkflowConfig,
} from "@mediaforge/types";

const LYRICS_PREVIEW_LENGTH = 50;

export function summarizeAudioConfig(config: AudioWorkflowConfig): string {
  return `${config.tags} - ${config.lyrics.slice(0, LYRICS_PREVIEW_LENGTH)}`;
}

export function summarizeImageConfig(config: ImageWorkflowConfig): string {
  return config.positivePrompt;
}

export function summarizeVideoConfig(config: VideoWorkflowConfig): string {
  if (config.textPrompt.trim().length > 0) return config.textPrompt;
  return config.imageFilePath ? basename(config.imageFilePath) : "";
}

export function summarizeGeneration(settings: GenerationSettings): string {
  switch (settings.type) {
    case "audio":
      return summarizeAudioConfig(settings.config);
    case "image":
      return summarizeImageConfig(settings.config);
    case "video":
      return summarizeVideoConfig(settings.config);
  }
}

/** "audio" -> "Audio", used at the start of task messages. */
export function describeGenerationType(type: GenerationType): string {
  return type.charAt(0).toUpperCase() + type.slice(1);
}
