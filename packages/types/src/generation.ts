// ──────────────────────────────────────────────
// MEDIAFORGE - Generation Task Types
// ──────────────────────────────────────────────

import type { GenerationType, WorkflowConfigMap } from "./workflow-config.js";

export type GenerationStatus =
  | "pending"
  | "queued"
  | "processing"
  | "completed"
  | "failed"
  | "cancelled";

export const ACTIVE_GENERATION_STATUSES: readonly GenerationStatus[] = ["pending", "queued", "processing"] as const;

export const TERMINAL_GENERATION_STATUSES: readonly GenerationStatus[] = ["completed", "failed", "cancelled"] as const;

export const CANCELLED_BY_USER_MESSAGE = "Cancelled by user";

export type GenerationSettings = {
  [T in GenerationType]: { type: T; config: WorkflowConfigMap[T] };
}[GenerationType];

export interface GenerationTaskState {
  id: string;
  name: string;
  notes: string | null;
  positivePrompt: string;
  status: GenerationStatus;
  promptId: string | null;
  queuePosition: number | null;
  generatedFilePath: string | null;
  errorMessage: string | null;
  createdAt: Date;
  submittedAt: Date | null;
  completedAt: Date | null;
}

export type GenerationTaskSnapshot = GenerationTaskState & GenerationSettings;

export type GenerationRequest = {
  [T in GenerationType]: {
    type: T;
    name: string;
    notes?: string;
    config: Partial<WorkflowConfigMap[T]>;
  };
}[GenerationType];

export type TaskChangedListener = (task: GenerationTaskSnapshot) => void;
