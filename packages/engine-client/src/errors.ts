// ──────────────────────────────────────────────
// MEDIAFORGE - Engine API Error
// ──────────────────────────────────────────────

export type EngineErrorCode =
  | "HTTP_ERROR"
  | "NODE_ERRORS"
  | "TIMEOUT"
  | "ABORTED"
  | "UNREACHABLE"
  | "MALFORMED_RESPONSE";

export interface NodeErrorDetail {
  classType: string;
  messages: string[];
}

export interface EngineApiErrorOptions {
  code: EngineErrorCode;
  statusCode?: number;
  errorType?: string;
  nodeErrors?: Record<string, NodeErrorDetail>;
}

export class EngineApiError extends Error {
  readonly code: EngineErrorCode;
  readonly statusCode: number | null;
  readonly errorType: string | null;
  readonly nodeErrors: Record<string, NodeErrorDetail>;

  constructor(message: string, options: EngineApiErrorOptions) {
    super(message);
    this.name = "EngineApiError";
    this.code = options.code;
    this.statusCode = options.statusCode ?? null;
    this.errorType = options.errorType ?? null;
    this.nodeErrors = options.nodeErrors ?? {};
  }
}
