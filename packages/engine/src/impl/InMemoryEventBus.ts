/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous, in-process event bus. One instance is usually shared by
 * every pipeline run of a process; events carry the run's trace id.
 *
 * @module @papertriage/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import type { PipelineLogger } from "../contracts/Logger.js";
import { createConsoleLogger } from "../contracts/Logger.js";
import { errorMessage } from "../errors/PipelineError.js";

/**
 * In-memory EventBus implementation.
 *
 * - Handlers for a type run first, then wildcard ("*") handlers
 * - A throwing handler is reported to the logger and the rest still run
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 * bus.subscribe("candidate:dropped", (event) => audit(event.data));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private readonly handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: PipelineLogger;

    constructor(logger: PipelineLogger = createConsoleLogger()) {
        this.logger = logger;
    }

    emit(event: EventPayload): void {
        this.dispatch(event, this.handlers.get(event.type));
        this.dispatch(event, this.handlers.get("*"));
    }

    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        let handlers = this.handlers.get(eventType);
        if (!handlers) {
            handlers = new Set();
            this.handlers.set(eventType, handlers);
        }
        handlers.add(handler);

        return {
            unsubscribe: () => {
                const current = this.handlers.get(eventType);
                if (current) {
                    current.delete(handler);
                    if (current.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }

    once(eventType: EventType, handler: EventHandler): Subscription {
        const subscription = this.subscribe(eventType, (event) => {
            subscription.unsubscribe();
            handler(event);
        });
        return subscription;
    }

    clear(eventType?: EventType | "*"): void {
        if (eventType === undefined || eventType === "*") {
            this.handlers.clear();
        }
        else {
            this.handlers.delete(eventType);
        }
    }

    /**
     * Number of handlers registered for a type. Useful for testing.
     */
    handlerCount(eventType: EventType | "*"): number {
        return this.handlers.get(eventType)?.size ?? 0;
    }

    private dispatch(event: EventPayload, handlers: Set<EventHandler> | undefined): void {
        if (!handlers) {
            return;
        }

        // Copy so once() handlers can unsubscribe mid-iteration
        for (const handler of [...handlers]) {
            try {
                handler(event);
            }
            catch (error) {
                this.logger.error("EventBus handler error", {
                    eventType: event.type,
                    traceId  : event.traceId,
                    error    : errorMessage(error),
                });
            }
        }
    }
}
