// ──────────────────────────────────────────────
// MEDIAFORGE - Video Workflow Factory
// Stable Video Diffusion image-to-video graph
// ──────────────────────────────────────────────

import type { VideoOutputFormat, VideoWorkflowConfig } from "@mediaforge/types";
import { WorkflowGraph } from "../graph.js";
import {
  PLACEHOLDER_IMAGE,
  computeFrameCount,
  computeMotionBucketId,
  resolveSeed,
} from "../mappings.js";
import { parseVideoWorkflowConfig } from "../schemas.js";

const COMBINE_FORMATS: Record<VideoOutputFormat, string> = {
  mp4: "video/h264-mp4",
  webm: "video/webm",
  gif: "image/gif",
};

/**
 * `imageFilePath` and `audioFilePath` name files already staged on the engine.
 * Without an image the loader points at the placeholder asset.
 */
export function createVideoWorkflow(input: Partial<VideoWorkflowConfig> = {}): WorkflowGraph {
  const config = parseVideoWorkflowConfig(input);
  const { seed, control } = resolveSeed(config.seed);
  const frameCount = computeFrameCount(config.durationSeconds, config.fps);
  const motionBucketId = computeMotionBucketId(config.motionIntensity);
  const graph = new WorkflowGraph();

  const loader = graph.addNode("ImageOnlyCheckpointLoader", 55, 160).setWidgets(config.checkpointName);
  const image = graph.addNode("LoadImage", 55, 320).setWidgets(config.imageFilePath ?? PLACEHOLDER_IMAGE);
  const conditioning = graph
    .addNode("SVD_img2vid_Conditioning", 480, 220)
    .setWidgets(
      config.width,
      config.height,
      frameCount,
      motionBucketId,
      config.fps,
      config.augmentationLevel
    );
  const guidance = graph.addNode("VideoLinearCFGGuidance", 480, 60).setWidgets(config.minCfg);
  const sampler = graph
    .addNode("KSampler", 880, 160)
    .setWidgets(
      seed,
      control,
      config.steps,
      config.cfgScale,
      config.samplerName,
      config.scheduler,
      config.denoise
    );
  const decoder = graph.addNode("VAEDecode", 1240, 160);
  const combine = graph
    .addNode("VHS_VideoCombine", 1480, 160)
    .setWidgets(config.fps, 0, config.outputFilename, COMBINE_FORMATS[config.outputFormat], false, true);

  graph.connect(loader, "MODEL", guidance, "model");
  graph.connect(loader, "CLIP_VISION", conditioning, "clip_vision");
  graph.connect(loader, "VAE", conditioning, "vae");
  graph.connect(image, "IMAGE", conditioning, "init_image");
  graph.connect(guidance, "MODEL", sampler, "model");
  graph.connect(conditioning, "positive", sampler, "positive");
  graph.connect(conditioning, "negative", sampler, "negative");
  graph.connect(conditioning, "latent", sampler, "latent_image");
  graph.connect(sampler, "LATENT", decoder, "samples");
  graph.connect(loader, "VAE", decoder, "vae");
  graph.connect(decoder, "IMAGE", combine, "images");

  if (config.audioFilePath !== undefined) {
    const audio = graph.addNode("LoadAudio", 1240, 360).setWidgets(config.audioFilePath);
    graph.connect(audio, "AUDIO", combine, "audio");
  }

  return graph.assertValid();
}
