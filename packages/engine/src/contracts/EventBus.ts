/**
 * @fileoverview EventBus Contract
 *
 * Internal event flow for pipeline runs. The engine emits lifecycle and
 * stage events; stages may emit their own (e.g. per-candidate scoring).
 * Subscribers observe, they never influence the run.
 *
 * @module @papertriage/engine/contracts/EventBus
 */

/**
 * Event payload base interface.
 * All events must have a type and timestamp.
 */
export interface EventPayload {
    /** Event type identifier */
    readonly type: string;

    /** ISO timestamp when event was emitted */
    readonly timestamp: string;

    /** Trace ID of the pipeline run that emitted the event */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Run-level events emitted by the engine.
 */
export type PipelineEventType =
    | "pipeline:started"
    | "pipeline:completed"
    | "pipeline:failed"
    | "pipeline:timeout";

/**
 * Stage-level events emitted by the engine around each stage.
 */
export type StageEventType =
    | "stage:started"
    | "stage:completed"
    | "stage:failed"
    | "stage:diagnostic";

/**
 * Known event types. Stages may emit additional domain events, so any
 * string is accepted.
 */
export type EventType = PipelineEventType | StageEventType | (string & {});

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void;

/**
 * Subscription handle returned when subscribing to events.
 */
export interface Subscription {
    /** Unsubscribe from the event */
    unsubscribe(): void;
}

/**
 * EventBus interface.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("stage:completed", (event) => {
 *     console.log(event.data?.stage, event.data?.durationMs);
 * });
 *
 * bus.emit(createEvent("stage:completed", { stage: "parser", durationMs: 12 }, "tr_1"));
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type ("*" for all events).
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;

    /**
     * Subscribe to the next event of a type only.
     */
    once(eventType: EventType, handler: EventHandler): Subscription;

    /**
     * Remove all subscriptions for a type, or every subscription when omitted.
     */
    clear(eventType?: EventType | "*"): void;
}

/**
 * Factory function to create an event payload.
 *
 * @param type - Event type
 * @param data - Optional event data
 * @param traceId - Optional trace ID
 * @returns Event payload with timestamp
 */
export function createEvent(
    type: EventType,
    data?: Record<string, unknown>,
    traceId?: string
): EventPayload {
    return {
        type,
        timestamp: new Date().toISOString(),
        traceId,
        data,
    };
}
