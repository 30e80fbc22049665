// ──────────────────────────────────────────────
// MEDIAFORGE - Utils Package
// ──────────────────────────────────────────────

export { rootLogger, createLogger, createTaskLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export {
  loadConfig,
  getEnvOrDefault,
  getEnvAsNumber,
  getEnvAsBoolean,
  DEFAULT_QUEUE_CONFIG,
} from "./config.js";
export type { AppConfig, EngineConfig, QueueConfig, StorageConfig } from "./config.js";
export {
  generateId,
  sleep,
  measureDuration,
  startTimer,
  sanitizeErrorMessage,
  withTimeout,
  TimeoutError,
  formatFileTimestamp,
} from "./helpers.js";
export { createMutex } from "./mutex.js";
export type { Mutex } from "./mutex.js";
