// ──────────────────────────────────────────────
// MEDIAFORGE - Node Catalog
// Slot and widget schemas for the engine node types
// the factories build with
// ──────────────────────────────────────────────

import { readFileSync } from "node:fs";
import { z } from "zod";
import { SLOT_TYPES, WIDGET_KINDS } from "@mediaforge/types";
import type { NodeSchema } from "@mediaforge/types";

const nodeSchemaSchema = z.object({
  type: z.string().min(1),
  inputs: z.array(
    z.object({
      name: z.string().min(1),
      type: z.enum(SLOT_TYPES),
      optional: z.boolean().optional(),
    })
  ),
  outputs: z.array(
    z.object({
      name: z.string().min(1),
      type: z.enum(SLOT_TYPES),
    })
  ),
  widgets: z.array(
    z.object({
      name: z.string().min(1),
      kind: z.enum(WIDGET_KINDS),
      default: z.union([z.string(), z.number(), z.boolean()]).optional(),
    })
  ),
  size: z.tuple([z.number(), z.number()]),
});

const catalog = new Map<string, NodeSchema>();

export function loadBuiltinNodeSchemas(): NodeSchema[] {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("./builtin-nodes.json", import.meta.url), "utf8")
  );
  return z.array(nodeSchemaSchema).parse(raw);
}

export function registerNodeSchema(schema: NodeSchema): void {
  if (catalog.has(schema.type)) {
    throw new Error(`Node type "${schema.type}" is already registered`);
  }
  const parsed = nodeSchemaSchema.parse(schema);
  const names = new Set<string>();
  for (const name of [...parsed.inputs.map((i) => i.name), ...parsed.widgets.map((w) => w.name)]) {
    if (names.has(name)) {
      throw new Error(`Node type "${schema.type}" declares input "${name}" more than once`);
    }
    names.add(name);
  }
  catalog.set(parsed.type, parsed);
}

export function findNodeSchema(type: string): NodeSchema | undefined {
  return catalog.get(type);
}

export function resolveNodeSchema(type: string): NodeSchema {
  const schema = catalog.get(type);
  if (!schema) {
    throw new Error(
      `Unknown node type "${type}". Available types: ${Array.from(catalog.keys()).join(", ")}`
    );
  }
  return schema;
}

export function getRegisteredNodeSchemaTypes(): string[] {
  return Array.from(catalog.keys());
}

export function isNodeSchemaRegistered(type: string): boolean {
  return catalog.has(type);
}

/** Drops caller-registered schemas and reloads the built-in set. */
export function resetNodeCatalog(): void {
  catalog.clear();
  for (const schema of loadBuiltinNodeSchemas()) {
    registerNodeSchema(schema);
  }
}

resetNodeCatalog();
