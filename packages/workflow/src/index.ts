// ──────────────────────────────────────────────
// MEDIAFORGE - Workflow Package
// ──────────────────────────────────────────────

export {
  registerNodeSchema,
  resolveNodeSchema,
  findNodeSchema,
  getRegisteredNodeSchemaTypes,
  isNodeSchemaRegistered,
  resetNodeCatalog,
  loadBuiltinNodeSchemas,
} from "./catalog/registry.js";
export { WorkflowGraph, GraphNodeHandle, WORKFLOW_FORMAT_VERSION, WORKFLOW_FORMAT_REVISION } from "./graph.js";
export type { AddNodeOptions } from "./graph.js";
export { validateGraph } from "./graph-validator.js";
export { toWire, fromWire, parseWireGraph, areGraphsEquivalent } from "./wire.js";
export type { FromWireOptions } from "./wire.js";
export {
  computeFrameCount,
  computeMotionBucketId,
  resolveSeed,
  MOTION_BUCKET_MIN,
  MOTION_BUCKET_MAX,
  PLACEHOLDER_IMAGE,
} from "./mappings.js";
export type { ResolvedSeed } from "./mappings.js";
export {
  audioWorkflowConfigSchema,
  imageWorkflowConfigSchema,
  videoWorkflowConfigSchema,
  parseAudioWorkflowConfig,
  parseImageWorkflowConfig,
  parseVideoWorkflowConfig,
  parseWorkflowConfig,
  DEFAULT_LYRICS,
} from "./schemas.js";
export {
  createAudioWorkflow,
  createImageWorkflow,
  createVideoWorkflow,
  createWorkflowForType,
} from "./factories/index.js";
export { WorkflowConfigError, WorkflowGraphError, WireFormatError } from "./errors.js";
