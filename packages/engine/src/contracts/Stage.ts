/**
 * @fileoverview Pipeline Stage Contract
 *
 * A stage is a function of its input: it reads nothing but its input and
 * its context, and it mutates neither. Recoverable problems are reported
 * as diagnostics next to the value; anything else is thrown.
 *
 * Design principles:
 * - Pure: no shared mutable state between stages or runs
 * - Replaceable: each stage can be retried or swapped independently
 * - Observable: the engine times, logs and emits events around every stage
 *
 * @module @papertriage/engine/contracts/Stage
 */

import type { PipelineLogger } from "./Logger.js";
import type { EventType } from "./EventBus.js";

/**
 * A non-fatal issue recorded by a stage (skipped page, dropped candidate,
 * clamped score...). Diagnostics never fail a request.
 */
export interface Diagnostic {
    /** Stage that recorded the issue */
    readonly stage: string;

    /** Short machine-readable code, e.g. `page-skipped` */
    readonly code: string;

    /** Human-readable description */
    readonly message: string;

    /** Optional structured detail */
    readonly data?: Record<string, unknown>;
}

/**
 * Value plus the diagnostics gathered while producing it.
 */
export interface StageResult<T> {
    readonly value: T;
    readonly diagnostics: readonly Diagnostic[];
}

/**
 * Context handed to a stage by the engine.
 */
export interface StageContext {
    /** Trace ID of the current run */
    readonly traceId: string;

    /** Aborted when the run's deadline expires. Advisory only. */
    readonly signal: AbortSignal;

    /** Logger scoped to the stage and trace */
    readonly logger: PipelineLogger;

    /** Emit a domain event tagged with the run's trace id */
    emit(type: EventType, data?: Record<string, unknown>): void;
}

/**
 * Pipeline stage interface.
 *
 * @example
 * ```typescript
 * const upper: PipelineStage<string, string> = {
 *     id: "upper",
 *     async run(input) {
 *         return stageResult(input.toUpperCase());
 *     },
 * };
 * ```
 */
export interface PipelineStage<TIn, TOut> {
    /** Unique stage identifier, used in logs, events and diagnostics */
    readonly id: string;

    run(input: TIn, context: StageContext): Promise<StageResult<TOut>>;
}

/**
 * Build a StageResult.
 */
export function stageResult<T>(value: T, diagnostics: readonly Diagnostic[] = []): StageResult<T> {
    return Object.freeze({ value, diagnostics: Object.freeze([...diagnostics]) });
}

/**
 * Collects diagnostics for a single stage invocation.
 *
 * @example
 * ```typescript
 * const issues = new DiagnosticCollector("parser");
 * issues.add("page-skipped", "Page 3 could not be read", { page: 3 });
 * return stageResult(document, issues.list());
 * ```
 */
export class DiagnosticCollector {
    private readonly items: Diagnostic[] = [];

    constructor(private readonly stage: string) {}

    add(code: string, message: string, data?: Record<string, unknown>): Diagnostic {
        const diagnostic: Diagnostic = data === undefined
            ? { stage: this.stage, code, message }
            : { stage: this.stage, code, message, data };
        this.items.push(diagnostic);
        return diagnostic;
    }

    get size(): number {
        return this.items.length;
    }

    list(): readonly Diagnostic[] {
        return [...this.items];
    }
}
