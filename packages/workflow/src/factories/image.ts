// ──────────────────────────────────────────────
// MEDIAFORGE - Image Workflow Factory
// ──────────────────────────────────────────────

import type { ImageWorkflowConfig } from "@mediaforge/types";
import { WorkflowGraph } from "../graph.js";
import { resolveSeed } from "../mappings.js";
import { parseImageWorkflowConfig } from "../schemas.js";

export function createImageWorkflow(input: Partial<ImageWorkflowConfig> = {}): WorkflowGraph {
  const config = parseImageWorkflowConfig(input);
  const { seed, control } = resolveSeed(config.seed);
  const graph = new WorkflowGraph();

  const checkpoint = graph.addNode("CheckpointLoaderSimple", 26, 474).setWidgets(config.checkpointName);
  const latent = graph
    .addNode("EmptyLatentImage", 473, 609)
    .setWidgets(config.width, config.height, config.batchSize);
  const positive = graph
    .addNode("CLIPTextEncode", 415, 186, { title: "Positive Prompt" })
    .setWidgets(config.positivePrompt);
  const negative = graph
    .addNode("CLIPTextEncode", 413, 389, { title: "Negative Prompt" })
    .setWidgets(config.negativePrompt);
  const sampler = graph
    .addNode("KSampler", 863, 186)
    .setWidgets(
      seed,
      control,
      config.steps,
      config.cfgScale,
      config.samplerName,
      config.scheduler,
      config.denoise
    );
  const decoder = graph.addNode("VAEDecode", 1209, 188);
  const save = graph.addNode("SaveImage", 1451, 189).setWidgets(config.outputFilename);

  graph.connect(checkpoint, "MODEL", sampler, "model");
  graph.connect(checkpoint, "CLIP", positive, "clip");
  graph.connect(checkpoint, "CLIP", negative, "clip");
  graph.connect(checkpoint, "VAE", decoder, "vae");
  graph.connect(positive, "CONDITIONING", sampler, "positive");
  graph.connect(negative, "CONDITIONING", sampler, "negative");
  graph.connect(latent, "LATENT", sampler, "latent_image");
  graph.connect(sampler, "LATENT", decoder, "samples");
  graph.connect(decoder, "IMAGE", save, "images");

  return graph.assertValid();
}
