// ──────────────────────────────────────────────
// MEDIAFORGE - Graph Validator
// Checks node/link invariants against the node catalog
// and rejects cyclic graphs
// ──────────────────────────────────────────────

import type { GraphValidationResult, WorkflowDocument } from "@mediaforge/types";
import { findNodeSchema } from "./catalog/registry.js";
import { checkWidgetValues } from "./widgets.js";

export function validateGraph(document: WorkflowDocument): GraphValidationResult {
  const errors: string[] = [];

  const nodeTypes = new Map<number, string>();
  for (const node of document.nodes) {
    if (!Number.isSafeInteger(node.id) || node.id <= 0) {
      errors.push(`Node id ${node.id} must be a positive integer`);
      continue;
    }
    if (nodeTypes.has(node.id)) {
      errors.push(`Duplicate node id ${node.id}`);
      continue;
    }
    nodeTypes.set(node.id, node.type);

    const schema = findNodeSchema(node.type);
    if (!schema) {
      errors.push(`Node ${node.id} has unknown type "${node.type}"`);
      continue;
    }
    for (const problem of checkWidgetValues(schema.widgets, node.widgets_values)) {
      errors.push(`Node ${node.id} (${node.type}): ${problem}`);
    }
  }

  // Validate links against slot schemas
  const linkIds = new Set<number>();
  const linkedInputs = new Set<string>();
  const adjacency = new Map<number, number[]>();
  const inDegree = new Map<number, number>();
  for (const nodeId of nodeTypes.keys()) {
    adjacency.set(nodeId, []);
    inDegree.set(nodeId, 0);
  }

  for (const [linkId, sourceId, sourceSlot, targetId, targetSlot, dataType] of document.links) {
    if (linkIds.has(linkId)) {
      errors.push(`Duplicate link id ${linkId}`);
      continue;
    }
    linkIds.add(linkId);

    const sourceType = nodeTypes.get(sourceId);
    const targetType = nodeTypes.get(targetId);
    if (sourceType === undefined) {
      errors.push(`Link ${linkId} references unknown source node ${sourceId}`);
      continue;
    }
    if (targetType === undefined) {
      errors.push(`Link ${linkId} references unknown target node ${targetId}`);
      continue;
    }
    if (sourceId === targetId) {
      errors.push(`Link ${linkId} creates a self-loop on node ${sourceId}`);
      continue;
    }

    const output = findNodeSchema(sourceType)?.outputs[sourceSlot];
    const input = findNodeSchema(targetType)?.inputs[targetSlot];
    if (!output) {
      errors.push(`Link ${linkId} uses missing output slot ${sourceSlot} of node ${sourceId} (${sourceType})`);
      continue;
    }
    if (!input) {
      errors.push(`Link ${linkId} uses missing input slot ${targetSlot} of node ${targetId} (${targetType})`);
      continue;
    }
    if (output.type !== dataType || input.type !== dataType) {
      errors.push(
        `Link ${linkId} declares ${dataType} but connects ${output.type} output "${output.name}" ` +
          `to ${input.type} input "${input.name}"`
      );
      continue;
    }

    const inputKey = `${targetId}:${targetSlot}`;
    if (linkedInputs.has(inputKey)) {
      errors.push(`Input "${input.name}" of node ${targetId} is linked more than once`);
      continue;
    }
    linkedInputs.add(inputKey);

    adjacency.get(sourceId)?.push(targetId);
    inDegree.set(targetId, (inDegree.get(targetId) ?? 0) + 1);
  }

  // Required inputs
  for (const [nodeId, type] of nodeTypes) {
    const schema = findNodeSchema(type);
    schema?.inputs.forEach((input, slot) => {
      if (!input.optional && !linkedInputs.has(`${nodeId}:${slot}`)) {
        errors.push(`Required input "${input.name}" of node ${nodeId} (${type}) is not linked`);
      }
    });
  }

  if (errors.length > 0) {
    return { valid: false, errors };
  }

  // Kahn's algorithm for cycle detection
  const queue: number[] = [];
  let visited = 0;
  for (const [nodeId, degree] of inDegree) {
    if (degree === 0) queue.push(nodeId);
  }

  for (let current = queue.shift(); current !== undefined; current = queue.shift()) {
    visited += 1;
    for (const neighbor of adjacency.get(current) ?? []) {
      const remaining = (inDegree.get(neighbor) ?? 0) - 1;
      inDegree.set(neighbor, remaining);
      if (remaining === 0) queue.push(neighbor);
    }
  }

  if (visited !== nodeTypes.size) {
    return { valid: false, errors: ["Workflow graph contains a cycle"] };
  }

  return { valid: true, errors: [] };
}
