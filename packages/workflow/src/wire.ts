// ──────────────────────────────────────────────
// MEDIAFORGE - Wire Conversion
// WorkflowDocument <-> engine node map
// ──────────────────────────────────────────────

import { z } from "zod";
import type {
  GraphLink,
  GraphNode,
  WidgetValue,
  WireGraph,
  WireInputValue,
  WorkflowDocument,
} from "@mediaforge/types";
import { generateId } from "@mediaforge/utils";
import { findNodeSchema } from "./catalog/registry.js";
import { WireFormatError, WorkflowGraphError } from "./errors.js";
import { WORKFLOW_FORMAT_REVISION, WORKFLOW_FORMAT_VERSION } from "./graph.js";
import { validateGraph } from "./graph-validator.js";

const LAYOUT_COLUMNS = 4;
const LAYOUT_SPACING = 400;

const wireGraphSchema = z.record(
  z.string().regex(/^[1-9]\d*$/, "node ids must be positive integers"),
  z.object({
    class_type: z.string().min(1),
    inputs: z.record(
      z.union([z.string(), z.number(), z.boolean(), z.tuple([z.string(), z.number().int().min(0)])])
    ),
    _meta: z.object({ title: z.string() }).optional(),
  })
);

/** Validates an untrusted value (e.g. a parsed API-format file) as a wire graph. */
export function parseWireGraph(value: unknown): WireGraph {
  const parsed = wireGraphSchema.safeParse(value);
  if (!parsed.success) {
    throw new WireFormatError(
      `Malformed wire graph: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`
    );
  }
  return parsed.data;
}

export function toWire(document: WorkflowDocument): WireGraph {
  const validation = validateGraph(document);
  if (!validation.valid) {
    throw new WorkflowGraphError(`Cannot serialize invalid workflow graph: ${validation.errors.join("; ")}`);
  }

  const wire: WireGraph = {};
  for (const node of document.nodes) {
    const schema = findNodeSchema(node.type);
    if (!schema) {
      throw new WireFormatError(`Node ${node.id} has unknown type "${node.type}"`);
    }

    const inputs: Record<string, WireInputValue> = {};
    schema.inputs.forEach((input, slot) => {
      const link = document.links.find((l) => l[3] === node.id && l[4] === slot);
      if (link) {
        inputs[input.name] = [String(link[1]), link[2]];
      }
    });
    schema.widgets.forEach((widget, index) => {
      const value = node.widgets_values[index];
      if (value !== undefined) {
        inputs[widget.name] = value;
      }
    });

    wire[String(node.id)] = {
      class_type: node.type,
      inputs,
      _meta: { title: node.title ?? node.type },
    };
  }
  return wire;
}

export interface FromWireOptions {
  id?: string;
}

export function fromWire(wire: WireGraph, options: FromWireOptions = {}): WorkflowDocument {
  const entries = Object.entries(wire)
    .map(([key, node]) => ({ id: Number(key), key, node }))
    .sort((a, b) => a.id - b.id);

  const nodes: GraphNode[] = [];
  const links: GraphLink[] = [];

  entries.forEach(({ id, key, node }, index) => {
    if (!Number.isSafeInteger(id) || id <= 0) {
      throw new WireFormatError(`Node key "${key}" is not a positive integer`);
    }
    const schema = findNodeSchema(node.class_type);
    if (!schema) {
      throw new WireFormatError(`Node ${key} has unknown class_type "${node.class_type}"`);
    }

    const known = new Set([...schema.inputs.map((i) => i.name), ...schema.widgets.map((w) => w.name)]);
    for (const name of Object.keys(node.inputs)) {
      if (!known.has(name)) {
        throw new WireFormatError(`Node ${key} (${node.class_type}) has unknown input "${name}"`);
      }
    }

    const widgets_values: WidgetValue[] = schema.widgets.map((widget) => {
      const value = node.inputs[widget.name] ?? widget.default;
      if (value === undefined) {
        throw new WireFormatError(`Node ${key} (${node.class_type}) is missing widget "${widget.name}"`);
      }
      if (Array.isArray(value)) {
        throw new WireFormatError(`Widget "${widget.name}" of node ${key} cannot take a link`);
      }
      return value;
    });

    schema.inputs.forEach((input, slot) => {
      const value = node.inputs[input.name];
      if (value === undefined) return;
      if (!Array.isArray(value)) {
        throw new WireFormatError(`Input "${input.name}" of node ${key} must be a [nodeId, slot] link`);
      }
      const [sourceKey, sourceSlot] = value;
      if (!wire[sourceKey]) {
        throw new WireFormatError(`Input "${input.name}" of node ${key} links to missing node ${sourceKey}`);
      }
      links.push([links.length + 1, Number(sourceKey), sourceSlot, id, slot, input.type]);
    });

    const title = node._meta?.title;
    nodes.push({
      id,
      type: node.class_type,
      ...(title !== undefined && title !== node.class_type ? { title } : {}),
      pos: [(index % LAYOUT_COLUMNS) * LAYOUT_SPACING, Math.floor(index / LAYOUT_COLUMNS) * LAYOUT_SPACING],
      size: [schema.size[0], schema.size[1]],
      widgets_values,
    });
  });

  const document: WorkflowDocument = {
    id: options.id ?? generateId(),
    revision: WORKFLOW_FORMAT_REVISION,
    version: WORKFLOW_FORMAT_VERSION,
    last_node_id: nodes.reduce((max, n) => Math.max(max, n.id), 0),
    last_link_id: links.length,
    nodes,
    links,
    extra: {},
  };

  const validation = validateGraph(document);
  if (!validation.valid) {
    throw new WireFormatError(`Wire graph does not form a valid workflow: ${validation.errors.join("; ")}`);
  }
  return document;
}

function linkKey(link: GraphLink): string {
  const [, sourceId, sourceSlot, targetId, targetSlot, dataType] = link;
  return `${sourceId}:${sourceSlot}->${targetId}:${targetSlot}:${dataType}`;
}

/**
 * Node-for-node and link-set comparison. Layout and link ids are ignored;
 * link ids are renumbered by fromWire().
 */
export function areGraphsEquivalent(a: WorkflowDocument, b: WorkflowDocument): boolean {
  if (a.nodes.length !== b.nodes.length || a.links.length !== b.links.length) {
    return false;
  }

  const sameNodes = a.nodes.every((node, index) => {
    const other = b.nodes[index];
    return (
      other !== undefined &&
      other.id === node.id &&
      other.type === node.type &&
      (other.title ?? other.type) === (node.title ?? node.type) &&
      other.widgets_values.length === node.widgets_values.length &&
      other.widgets_values.every((value, i) => value === node.widgets_values[i])
    );
  });
  if (!sameNodes) return false;

  const otherLinks = new Set(b.links.map(linkKey));
  return a.links.every((link) => otherLinks.has(linkKey(link)));
}
