// ──────────────────────────────────────────────
// MEDIAFORGE - Generation Queue Service
// Submits tasks to the engine and tracks them to completion
// ──────────────────────────────────────────────

import { EventEmitter } from "node:events";
import type {
  EngineQueueStatus,
  GenerationTaskSnapshot,
  HistoryEntry,
  MediaEngineClient,
  TaskChangedListener,
} from "@mediaforge/types";
import {
  DEFAULT_QUEUE_CONFIG,
  createLogger,
  createMutex,
  createTaskLogger,
  sanitizeErrorMessage,
  withTimeout,
  type QueueConfig,
} from "@mediaforge/utils";
import { toWire } from "@mediaforge/workflow";
import { resolveOutputFile, type ArtifactStore } from "./artifacts.js";
import { DuplicateTaskError } from "./errors.js";
import type { InputFileReader } from "./inputs.js";
import {
  buildWorkflowForSettings,
  createDefaultStrategies,
  type GenerationStrategies,
} from "./strategies.js";
import { describeGenerationType } from "./summaries.js";
import type { GenerationTask } from "./task.js";

const logger = createLogger("generation-queue");

const TASK_CHANGED = "taskChanged";

export interface GenerationQueueServiceOptions {
  client: MediaEngineClient;
  artifacts: ArtifactStore;
  inputs: InputFileReader;
  strategies?: GenerationStrategies;
  config?: Partial<QueueConfig>;
  /** Clock used for submission, completion and timeout checks. */
  now?: () => Date;
}

export interface GenerationQueueService {
  /** Resolves with the task id once the task is queued on the engine or has failed. */
  queueTask(task: GenerationTask): Promise<string>;
  getTask(taskId: string): GenerationTaskSnapshot | undefined;
  getAllTasks(): GenerationTaskSnapshot[];
  cancelTask(taskId: string): Promise<boolean>;
  clearCompletedTasks(): Promise<number>;
  on(event: "taskChanged", listener: TaskChangedListener): () => void;
  pollOnce(): Promise<void>;
  start(): void;
  stop(): Promise<void>;
  isRunning(): boolean;
}

type ChangeLog = GenerationTaskSnapshot[];

/** Last execution error the engine reported, if any. */
function describeEngineFailure(entry: HistoryEntry): string {
  const details = (entry.status?.messages ?? []).filter((message) => !message.startsWith("execution_"));
  return details[details.length - 1] ?? "engine reported an error";
}

export function createGenerationQueueService(options: GenerationQueueServiceOptions): GenerationQueueService {
  const { client, artifacts, inputs } = options;
  const strategies = options.strategies ?? createDefaultStrategies();
  const config: QueueConfig = { ...DEFAULT_QUEUE_CONFIG, ...options.config };
  const now = options.now ?? (() => new Date());

  const registry = new Map<string, GenerationTask>();
  const mutex = createMutex();
  const events = new EventEmitter();

  let running = false;
  let initialTimer: NodeJS.Timeout | null = null;
  let pollTimer: NodeJS.Timeout | null = null;
  let activeCycle: Promise<void> | null = null;
  // Task checks in flight, keyed by task id; guarded by the mutex.
  const checking = new Map<string, AbortController>();

  // Registry mutations run under the mutex; snapshots recorded in the
  // change log are emitted once the lock is released.
  async function mutate<T>(fn: (changes: ChangeLog) => T): Promise<T> {
    const changes: ChangeLog = [];
    const result = await mutex.runExclusive(() => fn(changes));
    for (const snapshot of changes) {
      events.emit(TASK_CHANGED, snapshot);
    }
    return result;
  }

  async function failTask(task: GenerationTask, message: string): Promise<boolean> {
    return mutate((changes) => {
      if (!task.isActive()) return false;
      task.markFailed(message, now());
      changes.push(task.snapshot());
      return true;
    });
  }

  // Remote cancellation is detached; its outcome is only logged.
  function cancelRemotely(task: GenerationTask, promptId: string, message: string): void {
    const log = createTaskLogger(task.id, task.type);
    void client.cancelPrompt(promptId).then(
      (removed) => {
        log.info({ promptId, removed }, message);
      },
      (err: unknown) => {
        log.warn({ promptId, error: sanitizeErrorMessage(err) }, "Remote cancellation failed");
      }
    );
  }

  async function submit(task: GenerationTask): Promise<void> {
    const log = createTaskLogger(task.id, task.type);
    const label = describeGenerationType(task.type);

    let promptId: string;
    try {
      const graph = await buildWorkflowForSettings(strategies, task.settings, { client, inputs });
      const submission = await client.submitPrompt(toWire(graph.toDocument()));
      promptId = submission.promptId;
    } catch (err) {
      const detail = sanitizeErrorMessage(err);
      log.error({ error: detail }, "Workflow submission failed");
      await failTask(task, `${label} generation failed: ${detail}`);
      return;
    }

    if (promptId.length === 0) {
      log.error("Engine accepted the workflow without a prompt id");
      await failTask(task, `Failed to submit ${task.type} workflow: no prompt ID received`);
      return;
    }

    const queued = await mutate((changes) => {
      if (task.status !== "pending") return false;
      task.markQueued(promptId, now());
      changes.push(task.snapshot());
      return true;
    });

    if (queued) {
      log.info({ promptId }, "Task queued on engine");
      return;
    }

    // Cancelled while the submission was in flight.
    cancelRemotely(task, promptId, "Cancelled prompt that arrived after the task was cancelled");
  }

  async function recordPollFailure(task: GenerationTask, err: unknown): Promise<void> {
    const detail = sanitizeErrorMessage(err);
    const failed = await mutate((changes) => {
      if (!task.isActive()) return false;
      task.pollFailures += 1;
      if (task.pollFailures < config.maxConsecutivePollFailures) return false;
      task.markFailed(`${describeGenerationType(task.type)} generation failed: ${detail}`, now());
      changes.push(task.snapshot());
      return true;
    });

    const log = createTaskLogger(task.id, task.type);
    if (failed) {
      log.error({ error: detail, attempts: task.pollFailures }, "Giving up on task after repeated poll failures");
    } else {
      log.warn({ error: detail, attempts: task.pollFailures }, "Task status check failed");
    }
  }

  async function retrieveOutput(task: GenerationTask, promptId: string, signal: AbortSignal): Promise<void> {
    const log = createTaskLogger(task.id, task.type);
    const label = describeGenerationType(task.type);
    const history = await client.getHistory(promptId, { signal });
    signal.throwIfAborted();

    if (history?.status?.statusStr === "error") {
      const reason = describeEngineFailure(history);
      log.error({ promptId, reason }, "Engine reported a failed execution");
      await failTask(task, `${label} generation failed: ${reason}`);
      return;
    }

    const file = history ? resolveOutputFile(history) : null;
    if (!file) {
      const gaveUp = await mutate((changes) => {
        if (!task.isActive()) return false;
        task.pollFailures = 0;
        task.outputMisses += 1;
        if (task.outputMisses < config.outputRetryLimit) return false;
        task.markFailed(`${label} generation finished but no output file was found`, now());
        changes.push(task.snapshot());
        return true;
      });
      log.warn({ promptId, misses: task.outputMisses, gaveUp }, "No output available for finished prompt");
      return;
    }

    const data = await client.downloadFile(file, { signal });
    signal.throwIfAborted();
    const saved = await artifacts.save({ promptId, type: task.type, file, data, savedAt: now() });

    const completed = await mutate((changes) => {
      if (!task.isActive()) return false;
      task.markCompleted(saved.webPath, now());
      changes.push(task.snapshot());
      return true;
    });
    if (completed) {
      log.info({ promptId, generatedFilePath: saved.webPath }, "Task completed");
    }
  }

  async function checkTask(task: GenerationTask, queue: EngineQueueStatus, signal: AbortSignal): Promise<void> {
    const promptId = task.promptId;
    if (!task.isActive() || promptId === null) return;

    const submittedAt = task.submittedAt;
    if (submittedAt && now().getTime() - submittedAt.getTime() > config.taskTimeoutMs) {
      const minutes = Math.round(config.taskTimeoutMs / 60_000);
      if (await failTask(task, `${describeGenerationType(task.type)} generation timed out after ${minutes} minutes`)) {
        createTaskLogger(task.id, task.type).warn({ promptId }, "Task timed out");
        cancelRemotely(task, promptId, "Cancelled prompt of timed out task");
      }
      return;
    }

    const isRunning = queue.running.some((entry) => entry.promptId === promptId);
    const pendingIndex = queue.pending.findIndex((entry) => entry.promptId === promptId);

    if (isRunning || pendingIndex >= 0) {
      await mutate((changes) => {
        if (!task.isActive()) return;
        task.pollFailures = 0;
        task.outputMisses = 0;
        let changed = false;
        if (isRunning && task.status === "queued") {
          task.markProcessing();
          changed = true;
        }
        changed = task.updateQueuePosition(isRunning ? 0 : pendingIndex + 1) || changed;
        if (changed) changes.push(task.snapshot());
      });
      return;
    }

    await retrieveOutput(task, promptId, signal);
  }

  // A timed out check is aborted but stays registered until it settles,
  // so the next cycle cannot start a second one for the same task.
  async function runCheck(task: GenerationTask, queue: EngineQueueStatus, controller: AbortController): Promise<void> {
    const check = checkTask(task, queue, controller.signal).finally(() =>
      mutex.runExclusive(() => {
        checking.delete(task.id);
      })
    );

    try {
      await withTimeout(check, config.checkTimeoutMs, `Status check for task ${task.id}`);
    } catch (err) {
      controller.abort();
      await recordPollFailure(task, err);
    }
  }

  async function runCycle(): Promise<void> {
    const tracked = await mutex.runExclusive(() =>
      [...registry.values()].filter(
        (task) => (task.status === "queued" || task.status === "processing") && !checking.has(task.id)
      )
    );
    if (tracked.length === 0) return;

    let queue: EngineQueueStatus;
    try {
      queue = await withTimeout(client.getQueueStatus(), config.checkTimeoutMs, "Engine queue status check");
    } catch (err) {
      logger.warn({ error: sanitizeErrorMessage(err), tasks: tracked.length }, "Engine queue status unavailable");
      for (const task of tracked) {
        await recordPollFailure(task, err);
      }
      return;
    }

    const claimed = await mutex.runExclusive(() =>
      tracked
        .filter((task) => !checking.has(task.id))
        .map((task) => {
          const controller = new AbortController();
          checking.set(task.id, controller);
          return { task, controller };
        })
    );

    const results = await Promise.allSettled(
      claimed.map(({ task, controller }) => runCheck(task, queue, controller))
    );
    for (const result of results) {
      if (result.status === "rejected") {
        logger.error({ error: sanitizeErrorMessage(result.reason) }, "Task check failed");
      }
    }
  }

  function pollOnce(): Promise<void> {
    if (activeCycle) return activeCycle;
    activeCycle = runCycle()
      .catch((err: unknown) => {
        logger.error({ error: sanitizeErrorMessage(err) }, "Poll cycle failed");
      })
      .finally(() => {
        activeCycle = null;
      });
    return activeCycle;
  }

  function tick(): void {
    pollOnce().catch((err: unknown) => {
      logger.error({ error: sanitizeErrorMessage(err) }, "Poll tick failed");
    });
  }

  return {
    async queueTask(task) {
      await mutate((changes) => {
        if (registry.has(task.id)) throw new DuplicateTaskError(task.id);
        registry.set(task.id, task);
        changes.push(task.snapshot());
      });
      logger.info({ taskId: task.id, type: task.type, name: task.name }, "Task registered");

      await submit(task);
      return task.id;
    },

    getTask(taskId) {
      return registry.get(taskId)?.snapshot();
    },

    getAllTasks() {
      return [...registry.values()]
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
        .map((task) => task.snapshot());
    },

    async cancelTask(taskId) {
      const cancelled = await mutate((changes) => {
        const task = registry.get(taskId);
        if (!task || !task.isActive()) return null;
        const promptId = task.promptId;
        task.markCancelled(now());
        changes.push(task.snapshot());
        return { task, promptId };
      });
      if (!cancelled) return false;

      if (cancelled.promptId) {
        cancelRemotely(cancelled.task, cancelled.promptId, "Task cancelled");
      } else {
        createTaskLogger(cancelled.task.id, cancelled.task.type).info("Task cancelled before submission completed");
      }
      return true;
    },

    async clearCompletedTasks() {
      const removed = await mutate(() => {
        let count = 0;
        for (const [id, task] of registry) {
          if (task.isTerminal()) {
            registry.delete(id);
            count += 1;
          }
        }
        return count;
      });
      if (removed > 0) logger.info({ removed }, "Cleared finished tasks");
      return removed;
    },

    on(event, listener) {
      const guarded = (snapshot: GenerationTaskSnapshot) => {
        try {
          listener(snapshot);
        } catch (err) {
          logger.error({ taskId: snapshot.id, error: sanitizeErrorMessage(err) }, "Task listener threw");
        }
      };
      events.on(event, guarded);
      return () => {
        events.off(event, guarded);
      };
    },

    pollOnce,

    start() {
      if (running) return;
      running = true;
      logger.info(
        { pollIntervalMs: config.pollIntervalMs, initialDelayMs: config.initialDelayMs },
        "Generation queue polling started"
      );
      initialTimer = setTimeout(() => {
        initialTimer = null;
        tick();
        pollTimer = setInterval(tick, config.pollIntervalMs);
      }, config.initialDelayMs);
    },

    async stop() {
      running = false;
      if (initialTimer) clearTimeout(initialTimer);
      if (pollTimer) clearInterval(pollTimer);
      initialTimer = null;
      pollTimer = null;
      if (activeCycle) await activeCycle;
      await mutex.runExclusive(() => {
        for (const controller of checking.values()) controller.abort();
      });
      logger.info("Generation queue polling stopped");
    },

    isRunning() {
      return running;
    },
  };
}
