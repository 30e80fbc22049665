// ──────────────────────────────────────────────
// MEDIAFORGE - Fastify Application
// ──────────────────────────────────────────────

import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import { EngineApiError } from "@mediaforge/engine-client";
import { createLogger } from "@mediaforge/utils";
import { WorkflowConfigError } from "@mediaforge/workflow";
import type { AppContext } from "./context.js";
import { registerFileRoutes } from "./routes/file.routes.js";
import { registerGenerationRoutes } from "./routes/generation.routes.js";
import { registerModelRoutes } from "./routes/model.routes.js";

const logger = createLogger("server");

export interface BuildAppOptions {
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp(context: AppContext, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.logger ?? { level: context.config.logLevel, timestamp: true },
  });

  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  registerGenerationRoutes(app, context.queue);
  registerModelRoutes(app, context.client);
  registerFileRoutes(app, context.artifacts);

  // Health check
  app.get("/api/health", async () => {
    const engine = await context.client.isAvailable();
    return {
      success: true,
      data: { status: engine ? "ok" : "degraded", engine, timestamp: new Date().toISOString() },
    };
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, _request, reply) => {
    if (error instanceof WorkflowConfigError) {
      return reply.status(400).send({
        success: false,
        error: { code: "VALIDATION_ERROR", message: error.message, details: { issues: error.issues } },
      });
    }

    if (error instanceof EngineApiError) {
      logger.warn({ message: error.message, engineCode: error.code }, "Media engine request failed");
      return reply.status(error.code === "TIMEOUT" ? 504 : 502).send({
        success: false,
        error: { code: "ENGINE_ERROR", message: error.message, details: { engineCode: error.code } },
      });
    }

    logger.error(
      {
        message: error.message,
        statusCode: error.statusCode,
        stack: context.config.nodeEnv === "development" ? error.stack : undefined,
      },
      "Unhandled error"
    );

    const statusCode = error.statusCode ?? 500;
    return reply.status(statusCode).send({
      success: false,
      error: {
        code: statusCode >= 500 ? "INTERNAL_ERROR" : "BAD_REQUEST",
        message: statusCode >= 500 ? "Internal server error" : error.message,
      },
    });
  });

  return app;
}
