// ──────────────────────────────────────────────
// MEDIAFORGE - Media Engine HTTP Client
// fetch-based client for a ComfyUI-compatible API
// ──────────────────────────────────────────────

import { z } from "zod";
import type {
  EngineQueueStatus,
  EngineRequestOptions,
  EngineSystemStats,
  HistoryEntry,
  MediaEngineClient,
  NodeOutput,
  OutputFileDescriptor,
  PromptSubmission,
  UploadOptions,
  UploadResult,
  WireGraph,
} from "@mediaforge/types";
import { createLogger, generateId, measureDuration, sanitizeErrorMessage, startTimer } from "@mediaforge/utils";
import { EngineApiError } from "./errors.js";
import {
  describeHistoryMessage,
  errorPayloadSchema,
  formatNodeErrors,
  historyResponseSchema,
  objectInfoSchema,
  promptResponseSchema,
  queueResponseSchema,
  readComboOptions,
  systemStatsSchema,
  toNodeErrorDetails,
  uploadResponseSchema,
} from "./responses.js";

const logger = createLogger("engine-client");

const DEFAULT_TIMEOUT_MS = 300_000;

export interface HttpMediaEngineClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  /** Prefix every route with /api, as current engine builds expect. */
  useApiPrefix?: boolean;
  clientId?: string;
  fetch?: typeof fetch;
}

function toOutputFiles(files: OutputFileDescriptor[] | undefined): OutputFileDescriptor[] | undefined {
  return files?.map((f) => ({ filename: f.filename, subfolder: f.subfolder, type: f.type }));
}

export class HttpMediaEngineClient implements MediaEngineClient {
  readonly clientId: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly routePrefix: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpMediaEngineClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.routePrefix = options.useApiPrefix === false ? "" : "/api";
    this.clientId = options.clientId ?? generateId();
    this.fetchImpl = options.fetch ?? fetch;
  }

  async submitPrompt(prompt: WireGraph): Promise<PromptSubmission> {
    const timer = startTimer();
    const body = await this.requestJson("/prompt", promptResponseSchema, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ prompt, client_id: this.clientId }),
    });

    const nodeErrors = toNodeErrorDetails(body.node_errors);
    if (Object.keys(nodeErrors).length > 0) {
      throw new EngineApiError(`Engine rejected the workflow: ${formatNodeErrors(nodeErrors)}`, {
        code: "NODE_ERRORS",
        nodeErrors,
      });
    }

    logger.debug(
      { promptId: body.prompt_id, nodeCount: Object.keys(prompt).length, durationMs: measureDuration(timer) },
      "Workflow submitted"
    );
    return { promptId: body.prompt_id ?? "", number: body.number ?? 0 };
  }

  async getQueueStatus(): Promise<EngineQueueStatus> {
    const body = await this.requestJson("/queue", queueResponseSchema);
    return {
      running: body.queue_running,
      pending: [...body.queue_pending].sort((a, b) => a.number - b.number),
    };
  }

  async getHistory(promptId: string, options: EngineRequestOptions = {}): Promise<HistoryEntry | null> {
    const body = await this.requestJson(`/history/${encodeURIComponent(promptId)}`, historyResponseSchema, {
      signal: options.signal,
    });
    const item = body[promptId];
    if (!item) return null;

    const outputs: Record<string, NodeOutput> = {};
    for (const [nodeId, output] of Object.entries(item.outputs)) {
      outputs[nodeId] = {
        images: toOutputFiles(output.images),
        audio: toOutputFiles(output.audio),
        gifs: toOutputFiles(output.gifs),
        videos: toOutputFiles(output.videos),
      };
    }

    return {
      promptId,
      outputs,
      status: item.status
        ? {
            statusStr: item.status.status_str,
            completed: item.status.completed,
            messages: item.status.messages.map(describeHistoryMessage),
          }
        : null,
    };
  }

  async downloadFile(file: OutputFileDescriptor, options: EngineRequestOptions = {}): Promise<Uint8Array> {
    const query = new URLSearchParams({ filename: file.filename, subfolder: file.subfolder, type: file.type });
    return this.request(`/view?${query.toString()}`, { signal: options.signal }, async (response) => {
      return new Uint8Array(await response.arrayBuffer());
    });
  }

  async uploadFile(data: Uint8Array, filename: string, options: UploadOptions = {}): Promise<UploadResult> {
    const form = new FormData();
    form.append("image", new Blob([data]), filename);
    form.append("type", options.type ?? "input");
    form.append("subfolder", options.subfolder ?? "");
    form.append("overwrite", String(options.overwrite ?? false));

    const body = await this.requestJson("/upload/image", uploadResponseSchema, { method: "POST", body: form });
    logger.debug({ filename, storedAs: body.name, subfolder: body.subfolder }, "File uploaded to engine");
    return body;
  }

  async cancelPrompt(promptId: string): Promise<boolean> {
    try {
      await this.request(
        "/queue",
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ delete: [promptId] }),
        },
        async () => undefined
      );
      await this.request(
        "/interrupt",
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({ prompt_id: promptId }),
        },
        async () => undefined
      );
      return true;
    } catch (err) {
      logger.warn({ promptId, error: sanitizeErrorMessage(err) }, "Failed to cancel prompt on engine");
      return false;
    }
  }

  async listModels(nodeType: string, inputName: string): Promise<string[]> {
    const body = await this.requestJson(`/object_info/${encodeURIComponent(nodeType)}`, objectInfoSchema);
    const info = body[nodeType];
    if (!info) return [];

    const definition = info.input.required[inputName] ?? info.input.optional[inputName];
    if (definition === undefined) return [];

    const options = readComboOptions(definition);
    if (!options) {
      throw new EngineApiError(`Input "${inputName}" of ${nodeType} is not a list of options`, {
        code: "MALFORMED_RESPONSE",
      });
    }
    return options;
  }

  async getSystemStats(): Promise<EngineSystemStats> {
    const body = await this.requestJson("/system_stats", systemStatsSchema);
    return { system: body.system, devices: body.devices };
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.getSystemStats();
      return true;
    } catch (err) {
      logger.debug({ error: sanitizeErrorMessage(err) }, "Media engine is not reachable");
      return false;
    }
  }

  private requestJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    init: RequestInit = {}
  ): Promise<z.output<S>> {
    return this.request(path, init, async (response) => {
      const text = await response.text();
      let json: unknown;
      try {
        json = text.length > 0 ? JSON.parse(text) : {};
      } catch {
        throw new EngineApiError(`Engine returned invalid JSON for ${path}`, {
          code: "MALFORMED_RESPONSE",
          statusCode: response.status,
        });
      }

      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new EngineApiError(
          `Unexpected response shape from ${path}: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
          { code: "MALFORMED_RESPONSE", statusCode: response.status }
        );
      }
      return parsed.data;
    });
  }

  private async request<T>(path: string, init: RequestInit, read: (response: Response) => Promise<T>): Promise<T> {
    const url = `${this.baseUrl}${this.routePrefix}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    // Caller cancellation shares the timeout's controller.
    const callerSignal = init.signal ?? null;
    const abortFromCaller = () => controller.abort();
    if (callerSignal?.aborted) controller.abort();
    callerSignal?.addEventListener("abort", abortFromCaller, { once: true });

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        throw await this.toHttpError(path, response);
      }
      return await read(response);
    } catch (error) {
      if (error instanceof EngineApiError) throw error;
      if (error instanceof Error && error.name === "AbortError") {
        if (callerSignal?.aborted) {
          throw new EngineApiError(`Engine request ${path} was aborted`, { code: "ABORTED" });
        }
        throw new EngineApiError(`Engine request ${path} timed out after ${this.timeoutMs}ms`, { code: "TIMEOUT" });
      }
      throw new EngineApiError(`Engine request ${path} failed: ${sanitizeErrorMessage(error)}`, {
        code: "UNREACHABLE",
      });
    } finally {
      clearTimeout(timeout);
      callerSignal?.removeEventListener("abort", abortFromCaller);
    }
  }

  private async toHttpError(path: string, response: Response): Promise<EngineApiError> {
    const text = await response.text().catch(() => "");
    let payload: unknown = null;
    try {
      payload = JSON.parse(text);
    } catch {
      payload = null;
    }

    const parsed = errorPayloadSchema.safeParse(payload);
    if (!parsed.success || (parsed.data.error === undefined && parsed.data.node_errors === undefined)) {
      return new EngineApiError(
        `Engine request ${path} failed with status ${response.status}: ${text || response.statusText}`,
        { code: "HTTP_ERROR", statusCode: response.status }
      );
    }

    const { error } = parsed.data;
    const nodeErrors = toNodeErrorDetails(parsed.data.node_errors);
    const summary =
      typeof error === "string"
        ? error
        : [error?.message, error?.details].filter((part) => part !== undefined && part.length > 0).join(": ");
    const nodeSummary = formatNodeErrors(nodeErrors);

    return new EngineApiError(
      [summary || `Engine request ${path} failed with status ${response.status}`, nodeSummary]
        .filter((part) => part.length > 0)
        .join(" | "),
      {
        code: Object.keys(nodeErrors).length > 0 ? "NODE_ERRORS" : "HTTP_ERROR",
        statusCode: response.status,
        errorType: typeof error === "string" ? undefined : error?.type,
        nodeErrors,
      }
    );
  }
}
