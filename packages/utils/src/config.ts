// ──────────────────────────────────────────────
// MEDIAFORGE - Environment Configuration Helper
// ──────────────────────────────────────────────

export function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

export function getEnvAsNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export function getEnvAsBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no"].includes(normalized)) return false;
  throw new Error(`Environment variable ${key} must be a boolean, got: ${value}`);
}

export interface EngineConfig {
  baseUrl: string;
  timeoutMs: number;
  useApiPrefix: boolean;
}

export interface QueueConfig {
  pollIntervalMs: number;
  initialDelayMs: number;
  checkTimeoutMs: number;
  maxConsecutivePollFailures: number;
  outputRetryLimit: number;
  taskTimeoutMs: number;
}

export interface StorageConfig {
  outputDir: string;
  inputDir: string;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: string;
  engine: EngineConfig;
  queue: QueueConfig;
  storage: StorageConfig;
  server: {
    host: string;
    port: number;
  };
}

export const DEFAULT_QUEUE_CONFIG: QueueConfig = {
  pollIntervalMs: 15_000,
  initialDelayMs: 5_000,
  checkTimeoutMs: 30_000,
  maxConsecutivePollFailures: 20,
  outputRetryLimit: 10,
  taskTimeoutMs: 3 * 60 * 60 * 1000,
};

export function loadConfig(): AppConfig {
  return {
    nodeEnv: getEnvOrDefault("NODE_ENV", "development"),
    logLevel: getEnvOrDefault("LOG_LEVEL", "info"),

    engine: {
      baseUrl: getEnvOrDefault("MEDIA_ENGINE_URL", "http://127.0.0.1:8188"),
      timeoutMs: getEnvAsNumber("MEDIA_ENGINE_TIMEOUT_MS", 300_000),
      useApiPrefix: getEnvAsBoolean("MEDIA_ENGINE_USE_API_PREFIX", true),
    },

    queue: {
      pollIntervalMs: getEnvAsNumber("QUEUE_POLL_INTERVAL_MS", DEFAULT_QUEUE_CONFIG.pollIntervalMs),
      initialDelayMs: getEnvAsNumber("QUEUE_INITIAL_DELAY_MS", DEFAULT_QUEUE_CONFIG.initialDelayMs),
      checkTimeoutMs: getEnvAsNumber("QUEUE_CHECK_TIMEOUT_MS", DEFAULT_QUEUE_CONFIG.checkTimeoutMs),
      maxConsecutivePollFailures: getEnvAsNumber(
        "QUEUE_MAX_POLL_FAILURES",
        DEFAULT_QUEUE_CONFIG.maxConsecutivePollFailures
      ),
      outputRetryLimit: getEnvAsNumber("QUEUE_OUTPUT_RETRY_LIMIT", DEFAULT_QUEUE_CONFIG.outputRetryLimit),
      taskTimeoutMs: getEnvAsNumber("QUEUE_TASK_TIMEOUT_MS", DEFAULT_QUEUE_CONFIG.taskTimeoutMs),
    },

    storage: {
      outputDir: getEnvOrDefault("OUTPUT_DIR", "./generated"),
      inputDir: getEnvOrDefault("INPUT_DIR", "./uploads"),
    },

    server: {
      host: getEnvOrDefault("SERVER_HOST", "0.0.0.0"),
      port: getEnvAsNumber("SERVER_PORT", 4000),
    },
  };
}
