// ──────────────────────────────────────────────
// MEDIAFORGE - Workflow Graph Builder
// Append-only node/link document with catalog-checked wiring
// ──────────────────────────────────────────────

import type {
  GraphLink,
  GraphNode,
  GraphValidationResult,
  NodeSchema,
  SlotType,
  WidgetValue,
  WorkflowDocument,
} from "@mediaforge/types";
import { generateId } from "@mediaforge/utils";
import { findNodeSchema } from "./catalog/registry.js";
import { WorkflowGraphError } from "./errors.js";
import { validateGraph } from "./graph-validator.js";
import { describeWidgetMismatch } from "./widgets.js";

export const WORKFLOW_FORMAT_VERSION = 0.4;
export const WORKFLOW_FORMAT_REVISION = 0;

export interface AddNodeOptions {
  title?: string;
  size?: [number, number];
}

function describeNode(node: GraphNode): string {
  return `node ${node.id} (${node.type})`;
}

function cloneNode(node: GraphNode): GraphNode {
  return {
    ...node,
    pos: [node.pos[0], node.pos[1]],
    size: [node.size[0], node.size[1]],
    widgets_values: [...node.widgets_values],
  };
}

export class GraphNodeHandle {
  constructor(
    private readonly node: GraphNode,
    private readonly schema: NodeSchema
  ) {}

  get id(): number {
    return this.node.id;
  }

  get type(): string {
    return this.node.type;
  }

  get widgets(): readonly WidgetValue[] {
    return [...this.node.widgets_values];
  }

  /**
   * Replaces the positional widget list. Trailing widgets may be left off
   * when the schema gives them a default.
   */
  setWidgets(...values: WidgetValue[]): this {
    const { widgets } = this.schema;
    if (values.length > widgets.length) {
      throw new WorkflowGraphError(
        `${describeNode(this.node)} takes ${widgets.length} widget values, got ${values.length}`
      );
    }

    const resolved: WidgetValue[] = [];
    for (const [index, widget] of widgets.entries()) {
      const value = values[index] ?? widget.default;
      if (value === undefined) {
        throw new WorkflowGraphError(`${describeNode(this.node)} is missing a value for widget "${widget.name}"`);
      }
      const mismatch = describeWidgetMismatch(widget, value);
      if (mismatch) {
        throw new WorkflowGraphError(`${describeNode(this.node)}: ${mismatch}`);
      }
      resolved.push(value);
    }

    this.node.widgets_values = resolved;
    return this;
  }

  setWidget(name: string, value: WidgetValue): this {
    const index = this.schema.widgets.findIndex((w) => w.name === name);
    const widget = this.schema.widgets[index];
    if (!widget) {
      throw new WorkflowGraphError(`${describeNode(this.node)} has no widget "${name}"`);
    }
    if (this.node.widgets_values.length !== this.schema.widgets.length) {
      throw new WorkflowGraphError(`${describeNode(this.node)} needs setWidgets() before setWidget("${name}")`);
    }
    const mismatch = describeWidgetMismatch(widget, value);
    if (mismatch) {
      throw new WorkflowGraphError(`${describeNode(this.node)}: ${mismatch}`);
    }
    this.node.widgets_values[index] = value;
    return this;
  }
}

export class WorkflowGraph {
  readonly id: string;
  private readonly nodes: GraphNode[] = [];
  private readonly links: GraphLink[] = [];
  private lastNodeId = 0;
  private lastLinkId = 0;
  private extra: Record<string, unknown> = {};

  constructor(id: string = generateId()) {
    this.id = id;
  }

  static fromDocument(document: WorkflowDocument): WorkflowGraph {
    const result = validateGraph(document);
    if (!result.valid) {
      throw new WorkflowGraphError(`Invalid workflow document: ${result.errors.join("; ")}`);
    }

    const graph = new WorkflowGraph(document.id);
    graph.nodes.push(...document.nodes.map(cloneNode));
    graph.links.push(...document.links.map((link): GraphLink => [...link]));
    graph.lastNodeId = Math.max(document.last_node_id, ...document.nodes.map((n) => n.id));
    graph.lastLinkId = Math.max(document.last_link_id, ...document.links.map((l) => l[0]));
    graph.extra = structuredClone(document.extra);
    return graph;
  }

  get nodeCount(): number {
    return this.nodes.length;
  }

  get linkCount(): number {
    return this.links.length;
  }

  addNode(type: string, x: number, y: number, options: AddNodeOptions = {}): GraphNodeHandle {
    const schema = findNodeSchema(type);
    if (!schema) {
      throw new WorkflowGraphError(`Cannot add node of unknown type "${type}"`);
    }

    const defaults = schema.widgets.map((w) => w.default);
    const node: GraphNode = {
      id: ++this.lastNodeId,
      type,
      pos: [x, y],
      size: options.size ?? [schema.size[0], schema.size[1]],
      widgets_values: defaults.every((value) => value !== undefined)
        ? defaults.filter((value): value is WidgetValue => value !== undefined)
        : [],
    };
    if (options.title !== undefined) {
      node.title = options.title;
    }

    this.nodes.push(node);
    return new GraphNodeHandle(node, schema);
  }

  addLink(
    sourceId: number,
    sourceSlot: number,
    targetId: number,
    targetSlot: number,
    dataType: SlotType
  ): GraphLink {
    const source = this.requireNode(sourceId);
    const target = this.requireNode(targetId);
    if (sourceId === targetId) {
      throw new WorkflowGraphError(`Cannot link ${describeNode(source)} to itself`);
    }

    const output = this.requireSchema(source).outputs[sourceSlot];
    if (!output) {
      throw new WorkflowGraphError(`${describeNode(source)} has no output slot ${sourceSlot}`);
    }
    const input = this.requireSchema(target).inputs[targetSlot];
    if (!input) {
      throw new WorkflowGraphError(`${describeNode(target)} has no input slot ${targetSlot}`);
    }
    if (output.type !== dataType) {
      throw new WorkflowGraphError(
        `Output slot ${sourceSlot} "${output.name}" of ${describeNode(source)} emits ${output.type}, not ${dataType}`
      );
    }
    if (input.type !== dataType) {
      throw new WorkflowGraphError(
        `Input slot ${targetSlot} "${input.name}" of ${describeNode(target)} accepts ${input.type}, not ${dataType}`
      );
    }
    if (this.links.some((l) => l[3] === targetId && l[4] === targetSlot)) {
      throw new WorkflowGraphError(`Input "${input.name}" of ${describeNode(target)} is already linked`);
    }

    const link: GraphLink = [++this.lastLinkId, sourceId, sourceSlot, targetId, targetSlot, dataType];
    this.links.push(link);
    return [...link];
  }

  /** Links two nodes by slot name; slot indices and the data type come from the catalog. */
  connect(
    source: GraphNodeHandle,
    outputName: string,
    target: GraphNodeHandle,
    inputName: string
  ): GraphLink {
    const sourceSchema = this.requireSchema(this.requireNode(source.id));
    const targetSchema = this.requireSchema(this.requireNode(target.id));

    const sourceSlot = sourceSchema.outputs.findIndex((o) => o.name === outputName);
    const output = sourceSchema.outputs[sourceSlot];
    if (!output) {
      throw new WorkflowGraphError(`Node ${source.id} (${source.type}) has no output named "${outputName}"`);
    }
    const targetSlot = targetSchema.inputs.findIndex((i) => i.name === inputName);
    if (targetSlot < 0) {
      throw new WorkflowGraphError(`Node ${target.id} (${target.type}) has no input named "${inputName}"`);
    }

    return this.addLink(source.id, sourceSlot, target.id, targetSlot, output.type);
  }

  getNode(id: number): GraphNode | undefined {
    const node = this.nodes.find((n) => n.id === id);
    return node ? cloneNode(node) : undefined;
  }

  findNodesByType(type: string): GraphNode[] {
    return this.nodes.filter((n) => n.type === type).map(cloneNode);
  }

  validate(): GraphValidationResult {
    return validateGraph(this.toDocument());
  }

  assertValid(): this {
    const result = this.validate();
    if (!result.valid) {
      throw new WorkflowGraphError(`Workflow graph ${this.id} is invalid: ${result.errors.join("; ")}`);
    }
    return this;
  }

  toDocument(): WorkflowDocument {
    return {
      id: this.id,
      revision: WORKFLOW_FORMAT_REVISION,
      version: WORKFLOW_FORMAT_VERSION,
      last_node_id: this.lastNodeId,
      last_link_id: this.lastLinkId,
      nodes: this.nodes.map(cloneNode),
      links: this.links.map((link): GraphLink => [...link]),
      extra: structuredClone(this.extra),
    };
  }

  private requireNode(id: number): GraphNode {
    const node = this.nodes.find((n) => n.id === id);
    if (!node) {
      throw new WorkflowGraphError(`Workflow graph ${this.id} has no node ${id}`);
    }
    return node;
  }

  private requireSchema(node: GraphNode): NodeSchema {
    const schema = findNodeSchema(node.type);
    if (!schema) {
      throw new WorkflowGraphError(`No catalog schema for ${describeNode(node)}`);
    }
    return schema;
  }
}
