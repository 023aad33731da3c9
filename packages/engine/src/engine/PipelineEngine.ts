/**
 * @fileoverview PipelineEngine
 *
 * Runs request-scoped pipelines made of PipelineStages.
 *
 * Run flow:
 * 1. Assign a trace id and start the deadline
 * 2. The caller's body runs stages through `run.stage()`
 * 3. Each stage is logged, timed, evented; its diagnostics are collected
 * 4. The body's value is returned with every diagnostic of the run
 *
 * Design principles:
 * - Domain-agnostic: knows nothing about papers or disciplines
 * - Request-scoped: a run shares no mutable state with any other run
 * - Observable: emits events at each lifecycle stage
 * - Transparent: errors reach the caller exactly as they were thrown
 *
 * @module @papertriage/engine/engine/PipelineEngine
 */

import type { EventBus, EventPayload, EventType } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import type { PipelineLogger } from "../contracts/Logger.js";
import { createConsoleLogger, scopeLogger } from "../contracts/Logger.js";
import type { Diagnostic, PipelineStage, StageContext } from "../contracts/Stage.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { TimeoutError, errorMessage, isPipelineError } from "../errors/PipelineError.js";
import { withDeadline } from "../runtime/deadline.js";

/**
 * Engine configuration options.
 */
export interface PipelineEngineConfig {
    /** Pipeline name used in log prefixes and events (default: "pipeline") */
    readonly name?: string;

    /** Per-run deadline in milliseconds (default: 600000) */
    readonly timeoutMs?: number;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for engine operations */
    readonly logger?: PipelineLogger;
}

/**
 * Per-call overrides for a single run.
 */
export interface ExecuteOptions {
    /** Reuse an existing trace id (e.g. one received from a caller) */
    readonly traceId?: string;

    /** Deadline for this run only */
    readonly timeoutMs?: number;

    /** Extra fields attached to the run's start/finish events and logs */
    readonly meta?: Record<string, unknown>;
}

/**
 * Handle given to the run body.
 */
export interface PipelineRun {
    readonly traceId: string;
    readonly signal: AbortSignal;

    /** Run one stage and return its value; its diagnostics join the run's. */
    stage<TIn, TOut>(stage: PipelineStage<TIn, TOut>, input: TIn): Promise<TOut>;

    /** Diagnostics recorded so far, in order */
    diagnostics(): readonly Diagnostic[];
}

/**
 * Successful run outcome.
 */
export interface PipelineOutcome<T> {
    readonly value: T;
    readonly diagnostics: readonly Diagnostic[];
    readonly traceId: string;
    readonly durationMs: number;
}

export const kDEFAULT_TIMEOUT_MS = 600_000;

/**
 * Generate a unique trace ID for a run.
 */
export function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `tr_${timestamp}_${random}`;
}

/**
 * PipelineEngine - request-scoped stage runner.
 *
 * @example
 * ```typescript
 * const engine = new PipelineEngine({ name: "classify", timeoutMs: 60_000 });
 *
 * engine.eventBus.subscribe("stage:completed", (event) => {
 *     console.log(event.data?.stage, event.data?.durationMs);
 * });
 *
 * const outcome = await engine.execute(async (run) => {
 *     const source = await run.stage(normalizer, request);
 *     return run.stage(parser, source);
 * });
 * ```
 */
export class PipelineEngine {
    private readonly config: {
        name: string;
        timeoutMs: number;
        logger: PipelineLogger;
    };

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: PipelineEngineConfig = {}) {
        const logger = config.logger ?? createConsoleLogger();
        this.eventBus = config.eventBus ?? new InMemoryEventBus(logger);

        this.config = {
            name     : config.name ?? "pipeline",
            timeoutMs: config.timeoutMs ?? kDEFAULT_TIMEOUT_MS,
            logger,
        };
    }

    /**
     * Execute one run under the engine's deadline.
     *
     * @param body - Composes the stages of the run
     * @param options - Per-run overrides
     * @returns The body's value plus every diagnostic recorded
     * @throws Whatever the body or a stage threw, unchanged; TimeoutError on expiry
     */
    async execute<T>(
        body: (run: PipelineRun) => Promise<T>,
        options: ExecuteOptions = {}
    ): Promise<PipelineOutcome<T>> {
        const traceId = options.traceId ?? generateTraceId();
        const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
        const meta = options.meta ?? {};
        const diagnostics: Diagnostic[] = [];
        const startTime = Date.now();

        this.emit(createEvent("pipeline:started", { pipeline: this.config.name, timeoutMs, ...meta }, traceId));
        this.config.logger.debug(`[${this.config.name}] Run started`, { traceId, ...meta });

        try {
            const value = await withDeadline(
                (signal) => body(this.createRun(traceId, signal, diagnostics)),
                timeoutMs,
                `${this.config.name} run ${traceId}`
            );

            const durationMs = Date.now() - startTime;
            this.emit(createEvent("pipeline:completed", {
                pipeline   : this.config.name,
                durationMs,
                diagnostics: diagnostics.length,
                ...meta,
            }, traceId));

            this.config.logger.info(`[${this.config.name}] Run completed`, {
                traceId,
                durationMs,
                diagnostics: diagnostics.length,
            });

            return {
                value,
                diagnostics: [...diagnostics],
                traceId,
                durationMs,
            };
        }
        catch (error) {
            this.reportFailure(error, traceId, Date.now() - startTime, meta);
            throw error;
        }
    }

    /**
     * Build the run handle. Stages run sequentially in the order the body
     * awaits them.
     */
    private createRun(traceId: string, signal: AbortSignal, diagnostics: Diagnostic[]): PipelineRun {
        return {
            traceId,
            signal,
            stage      : (stage, input) => this.runStage(stage, input, traceId, signal, diagnostics),
            diagnostics: () => [...diagnostics],
        };
    }

    private async runStage<TIn, TOut>(
        stage: PipelineStage<TIn, TOut>,
        input: TIn,
        traceId: string,
        signal: AbortSignal,
        diagnostics: Diagnostic[]
    ): Promise<TOut> {
        // A stage never starts after the deadline has passed
        signal.throwIfAborted();

        const logger = scopeLogger(this.config.logger, `${this.config.name}:${stage.id}`, { traceId });
        const context: StageContext = {
            traceId,
            signal,
            logger,
            emit: (type: EventType, data?: Record<string, unknown>) => {
                this.emit(createEvent(type, { stage: stage.id, ...data }, traceId));
            },
        };

        const startTime = Date.now();
        this.emit(createEvent("stage:started", { stage: stage.id }, traceId));
        logger.debug("Stage started");

        try {
            const result = await stage.run(input, context);
            const durationMs = Date.now() - startTime;

            for (const diagnostic of result.diagnostics) {
                diagnostics.push(diagnostic);
                this.emit(createEvent("stage:diagnostic", { ...diagnostic }, traceId));
            }

            this.emit(createEvent("stage:completed", {
                stage      : stage.id,
                durationMs,
                diagnostics: result.diagnostics.length,
            }, traceId));

            logger.debug("Stage completed", {
                durationMs,
                diagnostics: result.diagnostics.length,
            });

            return result.value;
        }
        catch (error) {
            this.emit(createEvent("stage:failed", {
                stage: stage.id,
                kind : isPipelineError(error) ? error.kind : "internal",
                error: errorMessage(error),
            }, traceId));
            throw error;
        }
    }

    /**
     * Log and emit a failed run. Client errors are warnings; everything
     * else (including invariant violations) is logged at error level.
     */
    private reportFailure(error: unknown, traceId: string, durationMs: number, meta: Record<string, unknown>): void {
        const kind = isPipelineError(error) ? error.kind : "internal";
        const data = {
            traceId,
            durationMs,
            kind,
            error: errorMessage(error),
            ...meta,
        };

        if (error instanceof TimeoutError) {
            this.emit(createEvent("pipeline:timeout", { pipeline: this.config.name, durationMs, ...meta }, traceId));
        }

        this.emit(createEvent("pipeline:failed", { pipeline: this.config.name, ...data }, traceId));

        if (isPipelineError(error) && error.category === "client") {
            this.config.logger.warn(`[${this.config.name}] Run rejected`, data);
        }
        else {
            this.config.logger.error(`[${this.config.name}] Run failed`, data);
        }
    }

    /**
     * Emit an event to the event bus.
     */
    private emit(event: EventPayload): void {
        this.eventBus.emit(event);
    }
}
