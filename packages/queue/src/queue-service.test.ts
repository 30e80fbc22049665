import test from "node:test";
import assert from "node:assert/strict";
import type { GenerationStatus, WireGraph, WireNode } from "@mediaforge/types";
import { sleep, type QueueConfig } from "@mediaforge/utils";
import { parseImageWorkflowConfig } from "@mediaforge/workflow";
import { DuplicateTaskError } from "./errors.js";
import { createGenerationQueueService } from "./queue-service.js";
import { GenerationTask, createGenerationTask } from "./task.js";
import { FakeMediaEngineClient, createMemoryArtifactStore, createMemoryInputReader } from "./testing/index.js";

function nodesOf(wire: WireGraph | undefined): WireNode[] {
  return wire ? Object.values(wire) : [];
}

const FIXED_NOW = new Date(2024, 0, 2, 3, 4, 5);

function setup(config: Partial<QueueConfig> = {}, now: () => Date = () => FIXED_NOW) {
  const client = new FakeMediaEngineClient();
  const artifacts = createMemoryArtifactStore();
  const service = createGenerationQueueService({
    client,
    artifacts,
    inputs: createMemoryInputReader({}),
    config: { outputRetryLimit: 3, maxConsecutivePollFailures: 2, ...config },
    now,
  });
  return { client, artifacts, service };
}

function imageTask(name = "Fox") {
  return createGenerationTask({ type: "image", name, config: { positivePrompt: "red fox", seed: 5 } });
}

function recordChanges(service: ReturnType<typeof setup>["service"], taskId: string) {
  const seen: Array<[GenerationStatus, number | null]> = [];
  service.on("taskChanged", (snapshot) => {
    if (snapshot.id === taskId) seen.push([snapshot.status, snapshot.queuePosition]);
  });
  return seen;
}

test("queueTask resolves once the engine has accepted the prompt", async () => {
  const { client, service } = setup();
  const task = imageTask();
  const seen = recordChanges(service, task.id);

  const taskId = await service.queueTask(task);

  const snapshot = service.getTask(taskId);
  assert.equal(snapshot?.status, "queued");
  assert.equal(snapshot?.promptId, "prompt-1");
  assert.deepEqual(snapshot?.submittedAt, FIXED_NOW);
  assert.deepEqual(seen, [
    ["pending", null],
    ["queued", null],
  ]);
  assert.deepEqual(
    nodesOf(client.submitted[0]).map((node) => node.class_type).sort(),
    ["CLIPTextEncode", "CLIPTextEncode", "CheckpointLoaderSimple", "EmptyLatentImage", "KSampler", "SaveImage", "VAEDecode"]
  );
});

test("a submission error fails the task without rejecting", async () => {
  const { client, service } = setup();
  client.failures.set("submitPrompt", new Error("connection refused"));

  const taskId = await service.queueTask(imageTask());

  const snapshot = service.getTask(taskId);
  assert.equal(snapshot?.status, "failed");
  assert.equal(snapshot?.errorMessage, "Image generation failed: connection refused");
  assert.deepEqual(snapshot?.completedAt, FIXED_NOW);
});

test("an empty prompt id fails the task", async () => {
  const { client, service } = setup();
  client.nextPromptIds = [""];

  const taskId = await service.queueTask(imageTask());

  assert.equal(service.getTask(taskId)?.errorMessage, "Failed to submit image workflow: no prompt ID received");
});

test("the same task cannot be queued twice", async () => {
  const { service } = setup();
  const task = imageTask();
  await service.queueTask(task);

  await assert.rejects(service.queueTask(task), DuplicateTaskError);
});

test("cancelling a queued task removes it from the engine", async () => {
  const { client, service } = setup();
  const taskId = await service.queueTask(imageTask());

  assert.equal(await service.cancelTask(taskId), true);

  const snapshot = service.getTask(taskId);
  assert.equal(snapshot?.status, "cancelled");
  assert.equal(snapshot?.errorMessage, "Cancelled by user");
  assert.deepEqual(snapshot?.completedAt, FIXED_NOW);
  assert.deepEqual(client.cancelled, ["prompt-1"]);
  assert.equal(await service.cancelTask(taskId), false);
});

test("cancelling an unknown task changes nothing", async () => {
  const { service } = setup();
  const taskId = await service.queueTask(imageTask());
  const before = service.getAllTasks();

  assert.equal(await service.cancelTask("no-such-task"), false);
  assert.deepEqual(service.getAllTasks(), before);
  assert.equal(service.getTask(taskId)?.status, "queued");
});

test("a prompt id arriving after cancellation is cancelled remotely", async () => {
  const { client, service } = setup();
  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  client.beforeSubmit = () => gate;
  const task = imageTask();

  const queued = service.queueTask(task);
  assert.equal(await service.cancelTask(task.id), true);
  release();
  await queued;

  const snapshot = service.getTask(task.id);
  assert.equal(snapshot?.status, "cancelled");
  assert.equal(snapshot?.promptId, null);
  assert.deepEqual(client.cancelled, ["prompt-1"]);
});

test("polling tracks queue position, running state and completion", async () => {
  const { client, artifacts, service } = setup();
  const first = imageTask("first");
  const second = imageTask("second");
  const firstChanges = recordChanges(service, first.id);
  const secondChanges = recordChanges(service, second.id);
  await service.queueTask(first);
  await service.queueTask(second);

  await service.pollOnce();
  client.startPrompt("prompt-1");
  await service.pollOnce();
  client.finishPrompt("prompt-1", {
    kind: "images",
    filename: "ComfyUI_00001_.png",
    data: new Uint8Array([1, 2, 3]),
  });
  await service.pollOnce();

  assert.deepEqual(firstChanges, [
    ["pending", null],
    ["queued", null],
    ["queued", 1],
    ["processing", 0],
    ["completed", null],
  ]);
  assert.deepEqual(secondChanges, [
    ["pending", null],
    ["queued", null],
    ["queued", 2],
    ["queued", 1],
  ]);
  assert.equal(service.getTask(first.id)?.generatedFilePath, "/images/image_prompt-1_20240102_030405.png");
  assert.deepEqual([...(artifacts.saved[0]?.data ?? [])], [1, 2, 3]);
  assert.equal(client.queueStatusCalls, 3);
});

test("an engine execution error fails the task with its message", async () => {
  const { client, service } = setup();
  const taskId = await service.queueTask(imageTask());
  client.failPrompt("prompt-1", "KSampler: CUDA out of memory");

  await service.pollOnce();

  const snapshot = service.getTask(taskId);
  assert.equal(snapshot?.status, "failed");
  assert.equal(snapshot?.errorMessage, "Image generation failed: KSampler: CUDA out of memory");
});

test("missing outputs are retried up to the retry limit", async () => {
  const { client, service } = setup({ outputRetryLimit: 3 });
  const taskId = await service.queueTask(imageTask());
  client.dropPrompt("prompt-1");

  await service.pollOnce();
  await service.pollOnce();
  assert.equal(service.getTask(taskId)?.status, "queued");

  await service.pollOnce();
  const snapshot = service.getTask(taskId);
  assert.equal(snapshot?.status, "failed");
  assert.equal(snapshot?.errorMessage, "Image generation finished but no output file was found");
});

test("an unreachable engine fails tasks after repeated poll failures", async () => {
  const { client, service } = setup({ maxConsecutivePollFailures: 2 });
  const taskId = await service.queueTask(imageTask());
  client.failures.set("getQueueStatus", new Error("ECONNREFUSED"));

  await service.pollOnce();
  assert.equal(service.getTask(taskId)?.status, "queued");

  await service.pollOnce();
  assert.equal(service.getTask(taskId)?.errorMessage, "Image generation failed: ECONNREFUSED");
});

test("a reachable engine resets the poll failure count", async () => {
  const { client, service } = setup({ maxConsecutivePollFailures: 2 });
  const taskId = await service.queueTask(imageTask());

  client.failures.set("getQueueStatus", new Error("ECONNREFUSED"));
  await service.pollOnce();
  client.failures.delete("getQueueStatus");
  await service.pollOnce();
  client.failures.set("getQueueStatus", new Error("ECONNREFUSED"));
  await service.pollOnce();

  assert.equal(service.getTask(taskId)?.status, "queued");
});

test("tasks that run past the task timeout are failed and cancelled", async () => {
  let current = new Date(2024, 0, 1, 0, 0, 0);
  const { client, service } = setup({ taskTimeoutMs: 120_000 }, () => current);
  const taskId = await service.queueTask(imageTask());

  current = new Date(current.getTime() + 121_000);
  await service.pollOnce();

  const snapshot = service.getTask(taskId);
  assert.equal(snapshot?.status, "failed");
  assert.equal(snapshot?.errorMessage, "Image generation timed out after 2 minutes");
  assert.deepEqual(client.cancelled, ["prompt-1"]);
});

test("cancelTask does not wait for the engine to confirm", async () => {
  const { client, service } = setup();
  client.cancelHandler = () => new Promise<boolean>(() => undefined);
  const taskId = await service.queueTask(imageTask());

  assert.equal(await service.cancelTask(taskId), true);

  assert.equal(service.getTask(taskId)?.status, "cancelled");
  assert.deepEqual(client.cancelled, ["prompt-1"]);
});

test("remote cancellation errors never reach the caller", async () => {
  const { client, service } = setup();
  client.cancelHandler = async () => {
    throw new Error("socket hang up");
  };
  const queuedId = await service.queueTask(imageTask("queued"));
  assert.equal(await service.cancelTask(queuedId), true);
  assert.equal(service.getTask(queuedId)?.status, "cancelled");

  let release: () => void = () => undefined;
  const gate = new Promise<void>((resolve) => {
    release = resolve;
  });
  client.beforeSubmit = () => gate;
  const late = imageTask("late");
  const submission = service.queueTask(late);
  assert.equal(await service.cancelTask(late.id), true);
  release();

  assert.equal(await submission, late.id);
  assert.equal(service.getTask(late.id)?.status, "cancelled");
  assert.deepEqual(client.cancelled, ["prompt-1", "prompt-2"]);
});

test("a timed out task is failed even when the remote cancel fails", async () => {
  let current = new Date(2024, 0, 1, 0, 0, 0);
  const { client, service } = setup({ taskTimeoutMs: 60_000 }, () => current);
  client.cancelHandler = async () => {
    throw new Error("socket hang up");
  };
  const taskId = await service.queueTask(imageTask());

  current = new Date(current.getTime() + 61_000);
  await service.pollOnce();

  assert.equal(service.getTask(taskId)?.errorMessage, "Image generation timed out after 1 minutes");
  assert.deepEqual(client.cancelled, ["prompt-1"]);
});

test("a stalled download does not hold up other tasks in the cycle", async () => {
  const { client, artifacts, service } = setup({ checkTimeoutMs: 50, maxConsecutivePollFailures: 5 });
  const slow = await service.queueTask(imageTask("slow"));
  const fast = await service.queueTask(imageTask("fast"));
  client.finishPrompt("prompt-1", { kind: "images", filename: "slow.png", data: new Uint8Array([1]) });
  client.finishPrompt("prompt-2", { kind: "images", filename: "fast.png", data: new Uint8Array([2]) });
  const abortedDownloads: string[] = [];
  client.beforeDownload = (file, signal) => {
    if (file.filename !== "slow.png") return Promise.resolve();
    return new Promise<void>((resolve) => {
      signal?.addEventListener(
        "abort",
        () => {
          abortedDownloads.push(file.filename);
          resolve();
        },
        { once: true }
      );
    });
  };

  await service.pollOnce();

  assert.equal(service.getTask(fast)?.status, "completed");
  assert.equal(service.getTask(fast)?.generatedFilePath, "/images/image_prompt-2_20240102_030405.png");
  assert.equal(service.getTask(slow)?.status, "queued");
  assert.deepEqual(abortedDownloads, ["slow.png"]);

  await sleep(10);
  assert.deepEqual(
    artifacts.saved.map((saved) => saved.promptId),
    ["prompt-2"]
  );
});

test("a task whose check is still running is not checked again", async () => {
  const { client, artifacts, service } = setup({ checkTimeoutMs: 20, maxConsecutivePollFailures: 5 });
  const taskId = await service.queueTask(imageTask());
  client.finishPrompt("prompt-1", { kind: "images", filename: "ComfyUI_00001_.png", data: new Uint8Array([7]) });
  let release: () => void = () => undefined;
  client.beforeDownload = () =>
    new Promise<void>((resolve) => {
      release = resolve;
    });

  await service.pollOnce();
  await service.pollOnce();

  assert.equal(client.downloadCalls, 1);
  assert.equal(client.queueStatusCalls, 1);
  assert.equal(service.getTask(taskId)?.status, "queued");

  client.beforeDownload = null;
  release();
  await sleep(10);
  assert.equal(artifacts.saved.length, 0);

  await service.pollOnce();
  assert.equal(client.downloadCalls, 2);
  assert.equal(artifacts.saved.length, 1);
  assert.equal(service.getTask(taskId)?.status, "completed");
});

test("a throwing listener does not disturb the queue or other listeners", async () => {
  const { service } = setup();
  service.on("taskChanged", () => {
    throw new Error("listener bug");
  });
  const statuses: GenerationStatus[] = [];
  const unsubscribe = service.on("taskChanged", (snapshot) => {
    statuses.push(snapshot.status);
  });

  const taskId = await service.queueTask(imageTask());
  unsubscribe();
  await service.cancelTask(taskId);

  assert.deepEqual(statuses, ["pending", "queued"]);
  assert.equal(service.getTask(taskId)?.status, "cancelled");
});

test("clearing finished tasks is idempotent and keeps active ones", async () => {
  const { service } = setup();
  const kept = await service.queueTask(imageTask("kept"));
  const cancelled = await service.queueTask(imageTask("cancelled"));
  await service.cancelTask(cancelled);

  assert.equal(await service.clearCompletedTasks(), 1);
  assert.equal(await service.clearCompletedTasks(), 0);
  assert.deepEqual(
    service.getAllTasks().map((t) => t.id),
    [kept]
  );
});

test("tasks are listed newest first", async () => {
  const { service } = setup();
  const settings = { type: "image" as const, config: parseImageWorkflowConfig({ seed: 1 }) };
  const older = new GenerationTask({ name: "older", settings, createdAt: new Date(2024, 0, 1) });
  const newer = new GenerationTask({ name: "newer", settings, createdAt: new Date(2024, 0, 2) });

  await service.queueTask(older);
  await service.queueTask(newer);

  assert.deepEqual(
    service.getAllTasks().map((t) => t.name),
    ["newer", "older"]
  );
});

test("start polls on an interval until stopped", async () => {
  const { client, service } = setup({ initialDelayMs: 0, pollIntervalMs: 5 });
  await service.queueTask(imageTask());

  service.start();
  assert.equal(service.isRunning(), true);
  for (let attempt = 0; attempt < 100 && client.queueStatusCalls < 2; attempt += 1) {
    await sleep(5);
  }
  await service.stop();

  const callsAtStop = client.queueStatusCalls;
  await sleep(30);
  assert.ok(callsAtStop >= 2);
  assert.equal(client.queueStatusCalls, callsAtStop);
  assert.equal(service.isRunning(), false);
});
