// ──────────────────────────────────────────────
// MEDIAFORGE - Generation Workflow Facade
// ──────────────────────────────────────────────

import type { AudioWorkflowConfig, ImageWorkflowConfig, VideoWorkflowConfig } from "@mediaforge/types";
import type { GenerationQueueService } from "./queue-service.js";
import { createGenerationTask } from "./task.js";

export interface GenerationWorkflow {
  generateAudio(name: string, config?: Partial<AudioWorkflowConfig>, notes?: string): Promise<string>;
  generateImage(name: string, config?: Partial<ImageWorkflowConfig>, notes?: string): Promise<string>;
  generateVideo(name: string, config?: Partial<VideoWorkflowConfig>, notes?: string): Promise<string>;
}

/**
 * Entry point for callers that only know a name and a partial config.
 * Config errors reject before the task is registered.
 */
export function createGenerationWorkflow(queue: GenerationQueueService): GenerationWorkflow {
  return {
    async generateAudio(name, config = {}, notes) {
      return queue.queueTask(createGenerationTask({ type: "audio", name, notes, config }));
    },

    async generateImage(name, config = {}, notes) {
      return queue.queueTask(createGenerationTask({ type: "image", name, notes, config }));
    },

    async generateVideo(name, config = {}, notes) {
      return queue.queueTask(createGenerationTask({ type: "video", name, notes, config }));
    },
  };
}
