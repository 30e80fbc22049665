// ──────────────────────────────────────────────
// MEDIAFORGE - Model Routes
// ──────────────────────────────────────────────

import type { FastifyInstance } from "fastify";
import type { MediaEngineClient } from "@mediaforge/types";
import { listModelsQuerySchema } from "../validation/schemas.js";

export function registerModelRoutes(app: FastifyInstance, client: MediaEngineClient): void {
  app.get<{ Params: { nodeType: string } }>("/api/models/:nodeType", async (request, reply) => {
    const parsed = listModelsQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid input", details: parsed.error.flatten() },
      });
    }

    const { nodeType } = request.params;
    const models = await client.listModels(nodeType, parsed.data.input);
    return reply.send({ success: true, data: { nodeType, input: parsed.data.input, models } });
  });
}
