// ──────────────────────────────────────────────
// MEDIAFORGE - Engine Response Schemas
// ──────────────────────────────────────────────

import { z } from "zod";
import type { NodeErrorDetail } from "./errors.js";

const errorEntrySchema = z
  .object({
    type: z.string().optional(),
    message: z.string().optional(),
    details: z.string().optional(),
  })
  .passthrough();

const nodeErrorSchema = z
  .object({
    class_type: z.string().optional(),
    errors: z.array(errorEntrySchema).default([]),
  })
  .passthrough();

export const errorPayloadSchema = z
  .object({
    error: z.union([z.string(), errorEntrySchema]).optional(),
    node_errors: z.record(nodeErrorSchema).optional(),
  })
  .passthrough();

export const promptResponseSchema = z
  .object({
    prompt_id: z.string().optional(),
    number: z.number().optional(),
    node_errors: z.record(nodeErrorSchema).optional(),
  })
  .passthrough();

const queueItemSchema = z.union([
  z
    .tuple([z.number(), z.string()])
    .rest(z.unknown())
    .transform(([number, promptId]) => ({ number, promptId })),
  z
    .object({ prompt_id: z.string(), number: z.number().optional() })
    .passthrough()
    .transform((item) => ({ number: item.number ?? 0, promptId: item.prompt_id })),
]);

export const queueResponseSchema = z.object({
  queue_running: z.array(queueItemSchema).default([]),
  queue_pending: z.array(queueItemSchema).default([]),
});

const outputFileSchema = z.object({
  filename: z.string().min(1),
  subfolder: z.string().default(""),
  type: z.string().default("output"),
});

const nodeOutputSchema = z
  .object({
    images: z.array(outputFileSchema).optional(),
    audio: z.array(outputFileSchema).optional(),
    gifs: z.array(outputFileSchema).optional(),
    videos: z.array(outputFileSchema).optional(),
  })
  .passthrough();

const historyItemSchema = z
  .object({
    outputs: z.record(nodeOutputSchema).default({}),
    status: z
      .object({
        status_str: z.string().default(""),
        completed: z.boolean().default(false),
        messages: z.array(z.unknown()).default([]),
      })
      .optional(),
  })
  .passthrough();

export const historyResponseSchema = z.record(historyItemSchema);

const historyEventSchema = z.tuple([z.string(), z.record(z.unknown())]);

export const uploadResponseSchema = z.object({
  name: z.string().min(1),
  subfolder: z.string().default(""),
  type: z.string().default("input"),
});

export const systemStatsSchema = z
  .object({
    system: z.record(z.unknown()).default({}),
    devices: z.array(z.record(z.unknown())).default([]),
  })
  .passthrough();

export const objectInfoSchema = z.record(
  z
    .object({
      input: z
        .object({
          required: z.record(z.unknown()).default({}),
          optional: z.record(z.unknown()).default({}),
        })
        .default({}),
    })
    .passthrough()
);

const comboInputSchema = z.union([
  z.tuple([z.array(z.string())]).rest(z.unknown()).transform(([options]) => options),
  z
    .tuple([z.literal("COMBO"), z.object({ options: z.array(z.string()) }).passthrough()])
    .rest(z.unknown())
    .transform(([, definition]) => definition.options),
]);

/** Option list of a COMBO input definition from /object_info, or null when the input is not a COMBO. */
export function readComboOptions(definition: unknown): string[] | null {
  const parsed = comboInputSchema.safeParse(definition);
  return parsed.success ? parsed.data : null;
}

/**
 * History status messages arrive as [eventName, payload] pairs; execution
 * errors are reduced to "<node type>: <exception message>".
 */
export function describeHistoryMessage(message: unknown): string {
  const parsed = historyEventSchema.safeParse(message);
  if (!parsed.success) return JSON.stringify(message);

  const [event, payload] = parsed.data;
  const exception = payload["exception_message"];
  if (event === "execution_error" && typeof exception === "string") {
    const nodeType = payload["node_type"];
    return `${typeof nodeType === "string" ? nodeType : "node"}: ${exception.trim()}`;
  }
  return event;
}

export function toNodeErrorDetails(
  nodeErrors: z.infer<typeof errorPayloadSchema>["node_errors"]
): Record<string, NodeErrorDetail> {
  const details: Record<string, NodeErrorDetail> = {};
  for (const [nodeId, entry] of Object.entries(nodeErrors ?? {})) {
    details[nodeId] = {
      classType: entry.class_type ?? "unknown",
      messages: entry.errors.map((e) => {
        const message = e.message ?? e.type ?? "error";
        return e.details ? `${message}: ${e.details}` : message;
      }),
    };
  }
  return details;
}

export function formatNodeErrors(details: Record<string, NodeErrorDetail>): string {
  return Object.entries(details)
    .map(([nodeId, detail]) => `node ${nodeId} (${detail.classType}): ${detail.messages.join(", ")}`)
    .join("; ");
}
