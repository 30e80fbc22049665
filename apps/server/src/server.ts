// ──────────────────────────────────────────────
// MEDIAFORGE - API Server
// ──────────────────────────────────────────────

import { createLogger, loadConfig } from "@mediaforge/utils";
import { buildApp } from "./app.js";
import { closeAppContext, createAppContext } from "./context.js";

const logger = createLogger("server");

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const context = createAppContext(config);
  const app = await buildApp(context);

  try {
    await app.listen({ port: config.server.port, host: config.server.host });
    logger.info({ port: config.server.port, environment: config.nodeEnv }, "MediaForge API started");
  } catch (err) {
    logger.error({ error: err }, "Failed to start server");
    process.exit(1);
  }

  context.queue.start();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutdown signal received");
    await closeAppContext(context);
    await app.close();
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err: unknown) => {
      logger.error({ error: err }, "Shutdown failed");
      process.exit(1);
    });
  });
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err: unknown) => {
      logger.error({ error: err }, "Shutdown failed");
      process.exit(1);
    });
  });
}

bootstrap().catch((err) => {
  logger.error({ error: err }, "Bootstrap failed");
  process.exit(1);
});
