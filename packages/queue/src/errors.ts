// ──────────────────────────────────────────────
// MEDIAFORGE - Queue Errors
// ──────────────────────────────────────────────

import type { GenerationStatus } from "@mediaforge/types";

export class TaskStateError extends Error {
  readonly code = "TASK_STATE_INVALID";

  constructor(
    readonly taskId: string,
    readonly from: GenerationStatus,
    readonly to: GenerationStatus
  ) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = "TaskStateError";
  }
}

export class DuplicateTaskError extends Error {
  readonly code = "TASK_DUPLICATE";

  constructor(readonly taskId: string) {
    super(`Task ${taskId} is already registered`);
    this.name = "DuplicateTaskError";
  }
}
