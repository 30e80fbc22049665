// ──────────────────────────────────────────────
// MEDIAFORGE - Shared Types
// ──────────────────────────────────────────────

export * from "./graph.js";
export * from "./wire.js";
export * from "./workflow-config.js";
export * from "./generation.js";
export * from "./engine.js";
export * from "./api.js";
