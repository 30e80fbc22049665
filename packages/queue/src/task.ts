// ──────────────────────────────────────────────
// MEDIAFORGE - Generation Task
// Lifecycle state machine for one engine job
// ──────────────────────────────────────────────

import {
  ACTIVE_GENERATION_STATUSES,
  CANCELLED_BY_USER_MESSAGE,
  TERMINAL_GENERATION_STATUSES,
  type GenerationRequest,
  type GenerationSettings,
  type GenerationStatus,
  type GenerationTaskSnapshot,
  type GenerationType,
} from "@mediaforge/types";
import { generateId } from "@mediaforge/utils";
import { parseWorkflowConfig } from "@mediaforge/workflow";
import { TaskStateError } from "./errors.js";
import { describeGenerationType, summarizeGeneration } from "./summaries.js";

const TRANSITIONS: Record<GenerationStatus, readonly GenerationStatus[]> = {
  pending: ["queued", "failed", "cancelled"],
  queued: ["processing", "completed", "failed", "cancelled"],
  processing: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export interface GenerationTaskInit {
  id?: string;
  name: string;
  notes?: string | null;
  settings: GenerationSettings;
  positivePrompt?: string;
  createdAt?: Date;
}

export class GenerationTask {
  readonly id: string;
  readonly name: string;
  readonly notes: string | null;
  readonly positivePrompt: string;
  readonly settings: GenerationSettings;
  readonly createdAt: Date;

  /** Consecutive cycles in which the engine could not be reached for this task. */
  pollFailures = 0;
  /** Consecutive cycles in which the job had left the queue without a retrievable file. */
  outputMisses = 0;

  private currentStatus: GenerationStatus = "pending";
  private currentPromptId: string | null = null;
  private currentQueuePosition: number | null = null;
  private filePath: string | null = null;
  private error: string | null = null;
  private submitted: Date | null = null;
  private completed: Date | null = null;

  constructor(init: GenerationTaskInit) {
    this.id = init.id ?? generateId();
    this.name = init.name;
    this.notes = init.notes ?? null;
    this.settings = init.settings;
    this.positivePrompt = init.positivePrompt ?? summarizeGeneration(init.settings);
    this.createdAt = init.createdAt ?? new Date();
  }

  get type(): GenerationType {
    return this.settings.type;
  }

  get status(): GenerationStatus {
    return this.currentStatus;
  }

  get promptId(): string | null {
    return this.currentPromptId;
  }

  get queuePosition(): number | null {
    return this.currentQueuePosition;
  }

  get submittedAt(): Date | null {
    return this.submitted;
  }

  isActive(): boolean {
    return ACTIVE_GENERATION_STATUSES.includes(this.currentStatus);
  }

  isTerminal(): boolean {
    return TERMINAL_GENERATION_STATUSES.includes(this.currentStatus);
  }

  markQueued(promptId: string, at: Date = new Date()): void {
    this.transition("queued");
    this.currentPromptId = promptId;
    this.submitted = at;
  }

  markProcessing(): void {
    this.transition("processing");
    this.currentQueuePosition = 0;
  }

  /** Returns true when the position actually changed. */
  updateQueuePosition(position: number): boolean {
    if (this.currentStatus !== "queued" && this.currentStatus !== "processing") {
      throw new TaskStateError(this.id, this.currentStatus, this.currentStatus);
    }
    if (this.currentQueuePosition === position) return false;
    this.currentQueuePosition = position;
    return true;
  }

  markCompleted(generatedFilePath: string, at: Date = new Date()): void {
    this.transition("completed");
    this.filePath = generatedFilePath;
    this.finish(at);
  }

  markFailed(errorMessage: string, at: Date = new Date()): void {
    this.transition("failed");
    this.error = errorMessage;
    this.finish(at);
  }

  markCancelled(at: Date = new Date()): void {
    this.transition("cancelled");
    this.error = CANCELLED_BY_USER_MESSAGE;
    this.finish(at);
  }

  snapshot(): GenerationTaskSnapshot {
    return {
      id: this.id,
      name: this.name,
      notes: this.notes,
      positivePrompt: this.positivePrompt,
      status: this.currentStatus,
      promptId: this.currentPromptId,
      queuePosition: this.currentQueuePosition,
      generatedFilePath: this.filePath,
      errorMessage: this.error,
      createdAt: new Date(this.createdAt.getTime()),
      submittedAt: this.submitted ? new Date(this.submitted.getTime()) : null,
      completedAt: this.completed ? new Date(this.completed.getTime()) : null,
      ...structuredClone(this.settings),
    };
  }

  private transition(next: GenerationStatus): void {
    if (!TRANSITIONS[this.currentStatus].includes(next)) {
      throw new TaskStateError(this.id, this.currentStatus, next);
    }
    this.currentStatus = next;
  }

  private finish(at: Date): void {
    this.completed = at;
    this.currentQueuePosition = null;
  }
}

function parseSettings(request: GenerationRequest): GenerationSettings {
  switch (request.type) {
    case "audio":
      return { type: "audio", config: parseWorkflowConfig("audio", request.config) };
    case "image":
      return { type: "image", config: parseWorkflowConfig("image", request.config) };
    case "video":
      return { type: "video", config: parseWorkflowConfig("video", request.config) };
  }
}

/**
 * Validates the request's config and returns a pending task.
 * Throws WorkflowConfigError before anything is sent to the engine.
 */
export function createGenerationTask(request: GenerationRequest): GenerationTask {
  const settings = parseSettings(request);
  const name = request.name.trim();
  const notes = request.notes?.trim();

  return new GenerationTask({
    name: name.length > 0 ? name : `${describeGenerationType(settings.type)} generation`,
    notes: notes && notes.length > 0 ? notes : null,
    settings,
  });
}
