// ──────────────────────────────────────────────
// MEDIAFORGE - Generated File Routes
// Lists stored artifacts and serves them at the
// web paths completed tasks report
// ──────────────────────────────────────────────

import type { FastifyInstance } from "fastify";
import { GENERATION_TYPES } from "@mediaforge/types";
import { ARTIFACT_LAYOUT, contentTypeFor, type ArtifactStore } from "@mediaforge/queue";
import { artifactTypeParamsSchema } from "../validation/schemas.js";

interface FileParams {
  fileName: string;
}

const FILE_NOT_FOUND = {
  success: false,
  error: { code: "NOT_FOUND", message: "Generated file not found" },
} as const;

export function registerFileRoutes(app: FastifyInstance, artifacts: ArtifactStore): void {
  // List generated files of one type
  app.get<{ Params: { type: string } }>("/api/files/:type", async (request, reply) => {
    const parsed = artifactTypeParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid input", details: parsed.error.flatten() },
      });
    }

    const files = await artifacts.list(parsed.data.type);
    return reply.send({ success: true, data: files, meta: { total: files.length } });
  });

  // File details
  app.get<{ Params: { type: string; fileName: string } }>("/api/files/:type/:fileName", async (request, reply) => {
    const parsed = artifactTypeParamsSchema.safeParse({ type: request.params.type });
    if (!parsed.success) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: "Invalid input", details: parsed.error.flatten() },
      });
    }

    const file = await artifacts.find(parsed.data.type, request.params.fileName);
    if (!file) return reply.status(404).send(FILE_NOT_FOUND);
    return reply.send({ success: true, data: file });
  });

  // File contents, e.g. GET /images/image_<promptId>_<timestamp>.png
  for (const type of GENERATION_TYPES) {
    app.get<{ Params: FileParams }>(`/${ARTIFACT_LAYOUT[type].subfolder}/:fileName`, async (request, reply) => {
      const { fileName } = request.params;
      const data = await artifacts.read(type, fileName);
      if (!data) return reply.status(404).send(FILE_NOT_FOUND);

      return reply.type(contentTypeFor(fileName)).send(Buffer.from(data));
    });
  }
}
