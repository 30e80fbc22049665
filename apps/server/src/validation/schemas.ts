// ──────────────────────────────────────────────
// MEDIAFORGE - Zod Validation Schemas
// ──────────────────────────────────────────────

import { z } from "zod";
import { GENERATION_TYPES } from "@mediaforge/types";

// Generation schemas. Workflow configs are validated per type by the
// workflow package, so only their outer shape is checked here.
export const generationRequestSchema = z.object({
  name: z.string().trim().min(1, "Name is required").max(255),
  notes: z.string().max(2000).optional(),
  config: z.record(z.unknown()).default({}),
});

export type GenerationRequestBody = z.infer<typeof generationRequestSchema>;

// Model listing
export const listModelsQuerySchema = z.object({
  input: z.string().trim().min(1).max(255).default("ckpt_name"),
});

// Generated files
export const artifactTypeParamsSchema = z.object({
  type: z.enum(GENERATION_TYPES),
});
