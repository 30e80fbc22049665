// ──────────────────────────────────────────────
// MEDIAFORGE - Workflow Factories
// ──────────────────────────────────────────────

import type { GenerationType, WorkflowConfigMap } from "@mediaforge/types";
import type { WorkflowGraph } from "../graph.js";
import { createAudioWorkflow } from "./audio.js";
import { createImageWorkflow } from "./image.js";
import { createVideoWorkflow } from "./video.js";

export { createAudioWorkflow, createImageWorkflow, createVideoWorkflow };

const factories: { [T in GenerationType]: (config: Partial<WorkflowConfigMap[T]>) => WorkflowGraph } = {
  audio: createAudioWorkflow,
  image: createImageWorkflow,
  video: createVideoWorkflow,
};

export function createWorkflowForType<T extends GenerationType>(
  type: T,
  config: Partial<WorkflowConfigMap[T]>
): WorkflowGraph {
  const factory: (config: Partial<WorkflowConfigMap[T]>) => WorkflowGraph = factories[type];
  return factory(config);
}
