// ──────────────────────────────────────────────
// MEDIAFORGE - Engine Wire Format
// Node map the media engine accepts on POST /prompt
// ──────────────────────────────────────────────

import type { WidgetValue } from "./graph.js";

/** [sourceNodeId, sourceOutputSlot] */
export type WireLinkRef = [string, number];

export type WireInputValue = WidgetValue | WireLinkRef;

export interface WireNode {
  class_type: string;
  inputs: Record<string, WireInputValue>;
  _meta?: { title: string };
}

export type WireGraph = Record<string, WireNode>;
