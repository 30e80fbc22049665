// ──────────────────────────────────────────────
// MEDIAFORGE - Engine Client Package
// ──────────────────────────────────────────────

export { HttpMediaEngineClient } from "./client.js";
export type { HttpMediaEngineClientOptions } from "./client.js";
export { EngineApiError } from "./errors.js";
export type { EngineErrorCode, EngineApiErrorOptions, NodeErrorDetail } from "./errors.js";
