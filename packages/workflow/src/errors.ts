// ──────────────────────────────────────────────
// MEDIAFORGE - Workflow Errors
// ──────────────────────────────────────────────

import type { GenerationType } from "@mediaforge/types";

export class WorkflowConfigError extends Error {
  readonly code = "WORKFLOW_CONFIG_INVALID";
  readonly workflowType: GenerationType;
  readonly issues: string[];

  constructor(workflowType: GenerationType, issues: string[]) {
    super(`Invalid ${workflowType} workflow config: ${issues.join("; ")}`);
    this.name = "WorkflowConfigError";
    this.workflowType = workflowType;
    this.issues = issues;
  }
}

export class WorkflowGraphError extends Error {
  readonly code = "WORKFLOW_GRAPH_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "WorkflowGraphError";
  }
}

export class WireFormatError extends Error {
  readonly code = "WIRE_FORMAT_INVALID";

  constructor(message: string) {
    super(message);
    this.name = "WireFormatError";
  }
}
