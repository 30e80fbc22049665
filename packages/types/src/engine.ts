// ──────────────────────────────────────────────
// MEDIAFORGE - Media Engine Client Contract
// ──────────────────────────────────────────────

import type { WireGraph } from "./wire.js";

export interface PromptSubmission {
  promptId: string;
  number: number;
}

export interface EngineQueueEntry {
  promptId: string;
  number: number;
}

export interface EngineQueueStatus {
  running: EngineQueueEntry[];
  pending: EngineQueueEntry[];
}

export interface OutputFileDescriptor {
  filename: string;
  subfolder: string;
  type: string;
}

export interface NodeOutput {
  images?: OutputFileDescriptor[];
  audio?: OutputFileDescriptor[];
  gifs?: OutputFileDescriptor[];
  videos?: OutputFileDescriptor[];
}

export interface HistoryStatus {
  statusStr: string;
  completed: boolean;
  messages: string[];
}

export interface HistoryEntry {
  promptId: string;
  outputs: Record<string, NodeOutput>;
  status: HistoryStatus | null;
}

export interface UploadOptions {
  subfolder?: string;
  type?: "input" | "temp" | "output";
  overwrite?: boolean;
}

export interface UploadResult {
  name: string;
  subfolder: string;
  type: string;
}

export interface EngineSystemStats {
  system: Record<string, unknown>;
  devices: Array<Record<string, unknown>>;
}

export interface EngineRequestOptions {
  /** Aborts the request when the caller stops waiting for it. */
  signal?: AbortSignal;
}

export interface MediaEngineClient {
  submitPrompt(prompt: WireGraph): Promise<PromptSubmission>;
  getQueueStatus(): Promise<EngineQueueStatus>;
  getHistory(promptId: string, options?: EngineRequestOptions): Promise<HistoryEntry | null>;
  downloadFile(file: OutputFileDescriptor, options?: EngineRequestOptions): Promise<Uint8Array>;
  uploadFile(data: Uint8Array, filename: string, options?: UploadOptions): Promise<UploadResult>;
  cancelPrompt(promptId: string): Promise<boolean>;
  listModels(nodeType: string, inputName: string): Promise<string[]>;
  getSystemStats(): Promise<EngineSystemStats>;
  isAvailable(): Promise<boolean>;
}
