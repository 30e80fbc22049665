// ──────────────────────────────────────────────
// MEDIAFORGE - Audio Workflow Factory
// ACE-Step text-to-music graph
// ──────────────────────────────────────────────

import type { AudioWorkflowConfig } from "@mediaforge/types";
import { WorkflowGraph } from "../graph.js";
import type { GraphNodeHandle } from "../graph.js";
import { resolveSeed } from "../mappings.js";
import { parseAudioWorkflowConfig } from "../schemas.js";

function addSaveNode(graph: WorkflowGraph, config: AudioWorkflowConfig): GraphNodeHandle {
  switch (config.outputFormat) {
    case "mp3":
      return graph.addNode("SaveAudioMP3", 1630, 1320).setWidgets(config.outputFilename, config.quality);
    case "opus":
      return graph.addNode("SaveAudioOpus", 1630, 1320).setWidgets(config.outputFilename, config.quality);
    case "flac":
      return graph.addNode("SaveAudio", 1630, 1320).setWidgets(config.outputFilename);
  }
}

export function createAudioWorkflow(input: Partial<AudioWorkflowConfig> = {}): WorkflowGraph {
  const config = parseAudioWorkflowConfig(input);
  const { seed, control } = resolveSeed(config.seed);
  const graph = new WorkflowGraph();

  const checkpoint = graph.addNode("CheckpointLoaderSimple", 180, 1580).setWidgets(config.checkpointName);
  const latent = graph
    .addNode("EmptyAceStepLatentAudio", 180, 1800)
    .setWidgets(config.durationSeconds, config.batchSize);
  const encoder = graph
    .addNode("TextEncodeAceStepAudio", 590, 1320)
    .setWidgets(config.tags, config.lyrics, config.lyricsStrength);
  const zeroOut = graph.addNode("ConditioningZeroOut", 600, 1880);
  const tonemap = graph
    .addNode("LatentOperationTonemapReinhard", 590, 1160)
    .setWidgets(config.tonemapMultiplier);
  const modelSampling = graph.addNode("ModelSamplingSD3", 590, 1040).setWidgets(config.modelShift);
  const applyCfg = graph.addNode("LatentApplyOperationCFG", 940, 1160);
  const sampler = graph
    .addNode("KSampler", 1020, 1320)
    .setWidgets(
      seed,
      control,
      config.steps,
      config.cfgScale,
      config.samplerName,
      config.scheduler,
      config.denoise
    );
  const decoder = graph.addNode("VAEDecodeAudio", 1370, 1320);
  const save = addSaveNode(graph, config);

  graph.connect(checkpoint, "MODEL", modelSampling, "model");
  graph.connect(checkpoint, "CLIP", encoder, "clip");
  graph.connect(checkpoint, "VAE", decoder, "vae");
  graph.connect(encoder, "CONDITIONING", zeroOut, "conditioning");
  graph.connect(modelSampling, "MODEL", applyCfg, "model");
  graph.connect(tonemap, "LATENT_OPERATION", applyCfg, "operation");
  graph.connect(applyCfg, "MODEL", sampler, "model");
  graph.connect(encoder, "CONDITIONING", sampler, "positive");
  graph.connect(zeroOut, "CONDITIONING", sampler, "negative");
  graph.connect(latent, "LATENT", sampler, "latent_image");
  graph.connect(sampler, "LATENT", decoder, "samples");
  graph.connect(decoder, "AUDIO", save, "audio");

  return graph.assertValid();
}
