// ──────────────────────────────────────────────
// MEDIAFORGE - Generation Routes
// ──────────────────────────────────────────────

import type { FastifyInstance } from "fastify";
import {
  GENERATION_TYPES,
  type GenerationRequest,
  type GenerationType,
} from "@mediaforge/types";
import { createGenerationTask, type GenerationQueueService } from "@mediaforge/queue";
import { parseWorkflowConfig } from "@mediaforge/workflow";
import { generationRequestSchema, type GenerationRequestBody } from "../validation/schemas.js";

interface TaskParams {
  taskId: string;
}

function toGenerationRequest(type: GenerationType, body: GenerationRequestBody): GenerationRequest {
  const { name, notes } = body;
  switch (type) {
    case "audio":
      return { type, name, notes, config: parseWorkflowConfig("audio", body.config) };
    case "image":
      return { type, name, notes, config: parseWorkflowConfig("image", body.config) };
    case "video":
      return { type, name, notes, config: parseWorkflowConfig("video", body.config) };
  }
}

export function registerGenerationRoutes(app: FastifyInstance, queue: GenerationQueueService): void {
  // Create a generation task per media type
  for (const type of GENERATION_TYPES) {
    app.post(`/api/generations/${type}`, async (request, reply) => {
      const parsed = generationRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({
          success: false,
          error: { code: "VALIDATION_ERROR", message: "Invalid input", details: parsed.error.flatten() },
        });
      }

      // WorkflowConfigError surfaces through the global error handler as a 400
      const task = createGenerationTask(toGenerationRequest(type, parsed.data));
      const taskId = await queue.queueTask(task);

      return reply.status(201).send({ success: true, data: { taskId, task: queue.getTask(taskId) } });
    });
  }

  // List tasks, newest first
  app.get("/api/generations", async (_request, reply) => {
    const tasks = queue.getAllTasks();
    return reply.send({ success: true, data: tasks, meta: { total: tasks.length } });
  });

  // Remove finished tasks
  app.delete("/api/generations/completed", async (_request, reply) => {
    const removed = await queue.clearCompletedTasks();
    return reply.send({ success: true, data: { removed } });
  });

  // Get single task
  app.get<{ Params: TaskParams }>("/api/generations/:taskId", async (request, reply) => {
    const task = queue.getTask(request.params.taskId);
    if (!task) {
      return reply.status(404).send({
        success: false,
        error: { code: "NOT_FOUND", message: "Generation task not found" },
      });
    }

    return reply.send({ success: true, data: task });
  });

  // Cancel task
  app.post<{ Params: TaskParams }>("/api/generations/:taskId/cancel", async (request, reply) => {
    const cancelled = await queue.cancelTask(request.params.taskId);
    if (!cancelled) {
      return reply.status(409).send({
        success: false,
        error: { code: "NOT_CANCELLABLE", message: "Task is unknown or already finished" },
      });
    }

    return reply.send({ success: true, data: { cancelled: true } });
  });
}
