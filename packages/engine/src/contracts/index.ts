/**
 * @fileoverview Contract exports
 *
 * @module @papertriage/engine/contracts
 */

export type {
    EventPayload,
    PipelineEventType,
    StageEventType,
    EventType,
    EventHandler,
    Subscription,
    EventBus,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";

export type { LogLevel, PipelineLogger } from "./Logger.js";
export { createConsoleLogger, isLogLevel, scopeLogger, silentLogger } from "./Logger.js";

export type { Diagnostic, StageResult, StageContext, PipelineStage } from "./Stage.js";
export { stageResult, DiagnosticCollector } from "./Stage.js";
