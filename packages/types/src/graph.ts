// ──────────────────────────────────────────────
// MEDIAFORGE - Workflow Graph Types
// ──────────────────────────────────────────────

export const SLOT_TYPES = [
  "MODEL",
  "CLIP",
  "CLIP_VISION",
  "VAE",
  "CONDITIONING",
  "LATENT",
  "LATENT_OPERATION",
  "IMAGE",
  "MASK",
  "AUDIO",
  "VHS_FILENAMES",
] as const;

export type SlotType = (typeof SLOT_TYPES)[number];

export const WIDGET_KINDS = ["INT", "FLOAT", "STRING", "COMBO", "BOOLEAN"] as const;

export type WidgetKind = (typeof WIDGET_KINDS)[number];

export type WidgetValue = string | number | boolean;

export interface InputSlotSchema {
  name: string;
  type: SlotType;
  optional?: boolean;
}

export interface OutputSlotSchema {
  name: string;
  type: SlotType;
}

export interface WidgetSchema {
  name: string;
  kind: WidgetKind;
  // Used when a widget is missing from a wire graph or left off a trailing setWidgets() call
  default?: WidgetValue;
}

export interface NodeSchema {
  type: string;
  inputs: InputSlotSchema[];
  outputs: OutputSlotSchema[];
  widgets: WidgetSchema[];
  size: [number, number];
}

export interface GraphNode {
  id: number;
  type: string;
  title?: string;
  pos: [number, number];
  size: [number, number];
  widgets_values: WidgetValue[];
}

/** [linkId, sourceNodeId, sourceSlot, targetNodeId, targetSlot, dataType] */
export type GraphLink = [
  linkId: number,
  sourceNodeId: number,
  sourceSlot: number,
  targetNodeId: number,
  targetSlot: number,
  dataType: SlotType,
];

export interface WorkflowDocument {
  id: string;
  revision: number;
  version: number;
  last_node_id: number;
  last_link_id: number;
  nodes: GraphNode[];
  links: GraphLink[];
  extra: Record<string, unknown>;
}

export interface GraphValidationResult {
  valid: boolean;
  errors: string[];
}
