// ──────────────────────────────────────────────
// MEDIAFORGE - Workflow Config Schemas
// Defaults and range checks for the factory inputs
// ──────────────────────────────────────────────

import { z } from "zod";
import { AUDIO_OUTPUT_FORMATS, VIDEO_OUTPUT_FORMATS } from "@mediaforge/types";
import type {
  AudioWorkflowConfig,
  GenerationType,
  ImageWorkflowConfig,
  VideoWorkflowConfig,
  WorkflowConfigMap,
} from "@mediaforge/types";
import { WorkflowConfigError } from "./errors.js";

export const DEFAULT_LYRICS = "[verse]\nCity lights are fading slow\nEvery street I used to know\n[chorus]\nSing it out and let it go";

const MP3_QUALITIES = ["V0", "128k", "320k"] as const;
const OPUS_QUALITIES = ["64k", "96k", "128k", "192k", "320k"] as const;

const seed = z.number().int().safe();
const samplerName = z.string().trim().min(1);
const denoise = z.number().min(0).max(1);
const dimension = z.number().int().positive().multipleOf(8, "must be a multiple of 8");

export const audioWorkflowConfigSchema = z
  .object({
    checkpointName: z.string().trim().min(1).default("ace_step_v1_3.5b.safetensors"),
    tags: z.string().trim().min(1, "tags are required").default("pop, female voice, catchy melody"),
    lyrics: z.string().default(DEFAULT_LYRICS),
    lyricsStrength: z.number().min(0).max(10).default(0.99),
    durationSeconds: z.number().positive().default(120),
    batchSize: z.number().int().min(1).default(1),
    modelShift: z.number().min(0).default(5),
    tonemapMultiplier: z.number().min(0).default(1),
    seed: seed.default(-1),
    steps: z.number().int().min(1).default(50),
    cfgScale: z.number().min(0).default(5),
    samplerName: samplerName.default("euler"),
    scheduler: samplerName.default("simple"),
    denoise: denoise.default(1),
    outputFilename: z.string().trim().min(1).default("audio/ComfyUI"),
    outputFormat: z.enum(AUDIO_OUTPUT_FORMATS).default("mp3"),
    quality: z.string().optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (value.quality === undefined || value.outputFormat === "flac") return;
    const allowed: readonly string[] = value.outputFormat === "opus" ? OPUS_QUALITIES : MP3_QUALITIES;
    if (!allowed.includes(value.quality)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["quality"],
        message: `${value.outputFormat} quality must be one of ${allowed.join(", ")}`,
      });
    }
  })
  .transform((value): AudioWorkflowConfig => ({
    ...value,
    quality: value.quality ?? (value.outputFormat === "opus" ? "128k" : "V0"),
  }));

export const imageWorkflowConfigSchema = z
  .object({
    checkpointName: z.string().trim().min(1).default("v1-5-pruned-emaonly.safetensors"),
    positivePrompt: z.string().trim().min(1, "positive prompt is required").default("beautiful landscape, high quality, detailed"),
    negativePrompt: z.string().default("ugly, blurry, low quality"),
    width: dimension.default(1024),
    height: dimension.default(1024),
    batchSize: z.number().int().min(1).default(1),
    seed: seed.default(-1),
    steps: z.number().int().min(1).default(20),
    cfgScale: z.number().min(0).default(7),
    samplerName: samplerName.default("euler"),
    scheduler: samplerName.default("normal"),
    denoise: denoise.default(1),
    outputFilename: z.string().trim().min(1).default("image/ComfyUI"),
  })
  .strict();

export const videoWorkflowConfigSchema = z
  .object({
    // Shown as the task's prompt only; no node consumes it.
    textPrompt: z.string().default(""),
    imageFilePath: z.string().trim().min(1).optional(),
    audioFilePath: z.string().trim().min(1).optional(),
    checkpointName: z.string().trim().min(1).default("svd_xt.safetensors"),
    durationSeconds: z.number().positive().default(10),
    width: dimension.default(1024),
    height: dimension.default(1024),
    fps: z.number().int().min(1).max(120).default(30),
    motionIntensity: z.number().min(0).max(1).default(0.5),
    augmentationLevel: z.number().min(0).max(10).default(0),
    minCfg: z.number().min(0).default(1),
    seed: seed.default(-1),
    steps: z.number().int().min(1).default(20),
    cfgScale: z.number().min(0).default(2.5),
    samplerName: samplerName.default("euler"),
    scheduler: samplerName.default("karras"),
    denoise: denoise.default(1),
    outputFilename: z.string().trim().min(1).default("video/ComfyUI"),
    outputFormat: z.enum(VIDEO_OUTPUT_FORMATS).default("mp4"),
  })
  .strict()
  .superRefine((value, ctx) => {
    if (Math.round(value.durationSeconds * value.fps) < 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["durationSeconds"],
        message: "duration and fps must yield at least one frame",
      });
    }
  });

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseAudioWorkflowConfig(input: unknown = {}): AudioWorkflowConfig {
  const parsed = audioWorkflowConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new WorkflowConfigError("audio", formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseImageWorkflowConfig(input: unknown = {}): ImageWorkflowConfig {
  const parsed = imageWorkflowConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new WorkflowConfigError("image", formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseVideoWorkflowConfig(input: unknown = {}): VideoWorkflowConfig {
  const parsed = videoWorkflowConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new WorkflowConfigError("video", formatIssues(parsed.error));
  }
  return parsed.data;
}

const parsers: { [T in GenerationType]: (input: unknown) => WorkflowConfigMap[T] } = {
  audio: parseAudioWorkflowConfig,
  image: parseImageWorkflowConfig,
  video: parseVideoWorkflowConfig,
};

export function parseWorkflowConfig<T extends GenerationType>(type: T, input: unknown): WorkflowConfigMap[T] {
  const parse: (input: unknown) => WorkflowConfigMap[T] = parsers[type];
  return parse(input);
}
