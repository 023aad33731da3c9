/**
 * @fileoverview @papertriage/engine
 *
 * Domain-agnostic engine for request-scoped, staged pipelines:
 * stage contracts with diagnostics, an event bus, a structured logger,
 * the pipeline error taxonomy and runtime helpers (deadlines, retries,
 * bounded fan-out).
 *
 * @module @papertriage/engine
 */

export * from "./contracts/index.js";
export * from "./engine/index.js";
export * from "./impl/index.js";
export * from "./errors/index.js";
export * from "./runtime/index.js";
