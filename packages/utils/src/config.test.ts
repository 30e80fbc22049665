import test from "node:test";
import assert from "node:assert/strict";
import { loadConfig, getEnvAsBoolean, getEnvAsNumber, DEFAULT_QUEUE_CONFIG } from "./config.js";

const KEYS = ["MEDIA_ENGINE_URL", "QUEUE_POLL_INTERVAL_MS", "MEDIA_ENGINE_USE_API_PREFIX", "MEDIAFORGE_TEST_FLAG"];

function withEnv(values: Record<string, string>, fn: () => void): void {
  const saved = new Map<string, string | undefined>();
  for (const key of KEYS) {
    saved.set(key, process.env[key]);
    delete process.env[key];
  }
  Object.assign(process.env, values);
  try {
    fn();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

test("falls back to defaults when the environment is empty", () => {
  withEnv({}, () => {
    const config = loadConfig();
    assert.equal(config.engine.baseUrl, "http://127.0.0.1:8188");
    assert.equal(config.engine.useApiPrefix, true);
    assert.deepEqual(config.queue, DEFAULT_QUEUE_CONFIG);
  });
});

test("reads engine and queue settings from the environment", () => {
  withEnv(
    {
      MEDIA_ENGINE_URL: "http://engine.local:9000",
      QUEUE_POLL_INTERVAL_MS: "2000",
      MEDIA_ENGINE_USE_API_PREFIX: "false",
    },
    () => {
      const config = loadConfig();
      assert.equal(config.engine.baseUrl, "http://engine.local:9000");
      assert.equal(config.engine.useApiPrefix, false);
      assert.equal(config.queue.pollIntervalMs, 2000);
    }
  );
});

test("rejects malformed numeric and boolean values", () => {
  withEnv({ QUEUE_POLL_INTERVAL_MS: "soon", MEDIAFORGE_TEST_FLAG: "maybe" }, () => {
    assert.throws(() => getEnvAsNumber("QUEUE_POLL_INTERVAL_MS", 1), /must be a number/);
    assert.throws(() => getEnvAsBoolean("MEDIAFORGE_TEST_FLAG", true), /must be a boolean/);
  });
});
