/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * Tests cover:
 * - Typed and wildcard dispatch order
 * - once() and unsubscribe
 * - clear()
 * - Handler failures reported to the logger
 *
 * @module @papertriage/engine/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createEvent, type EventPayload } from "../contracts/EventBus.js";
import type { PipelineLogger } from "../contracts/Logger.js";

function createMockLogger(): PipelineLogger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function stageEvent(type: string, stage: string): EventPayload {
    return {
        type,
        timestamp: "2026-03-02T09:00:00.000Z",
        traceId  : "tr_test_1",
        data     : { stage },
    };
}

describe("InMemoryEventBus", () => {
    let logger: PipelineLogger;
    let eventBus: InMemoryEventBus;

    beforeEach(() => {
        logger = createMockLogger();
        eventBus = new InMemoryEventBus(logger);
    });

    describe("dispatch", () => {
        // Scenario: typed handlers run before wildcard handlers
        it("should call typed handlers first, then wildcard handlers", () => {
            const calls: string[] = [];
            eventBus.subscribe("*", () => calls.push("wildcard"));
            eventBus.subscribe("stage:completed", () => calls.push("typed"));

            eventBus.emit(stageEvent("stage:completed", "parser"));

            expect(calls).toEqual(["typed", "wildcard"]);
        });

        // Scenario: handlers only see their own type
        it("should not call a handler for another event type", () => {
            const handler = vi.fn();
            eventBus.subscribe("stage:failed", handler);

            eventBus.emit(stageEvent("stage:completed", "parser"));

            expect(handler).not.toHaveBeenCalled();
        });

        // Scenario: payload is passed through untouched
        it("should pass the event payload with its trace id", () => {
            const handler = vi.fn();
            const event = stageEvent("stage:started", "normalizer");
            eventBus.subscribe("stage:started", handler);

            eventBus.emit(event);

            expect(handler).toHaveBeenCalledWith(event);
        });
    });

    describe("once", () => {
        // Scenario: once() fires a single time
        it("should call the handler for the first matching event only", () => {
            const handler = vi.fn();
            eventBus.once("pipeline:completed", handler);

            eventBus.emit(stageEvent("pipeline:completed", "a"));
            eventBus.emit(stageEvent("pipeline:completed", "b"));

            expect(handler).toHaveBeenCalledTimes(1);
            expect(eventBus.handlerCount("pipeline:completed")).toBe(0);
        });

        // Scenario: a once() handler unsubscribing mid-dispatch does not skip siblings
        it("should still call the other handlers registered after a once() handler", () => {
            const sibling = vi.fn();
            eventBus.once("stage:started", vi.fn());
            eventBus.subscribe("stage:started", sibling);

            eventBus.emit(stageEvent("stage:started", "parser"));

            expect(sibling).toHaveBeenCalledTimes(1);
        });
    });

    describe("unsubscribe and clear", () => {
        // Scenario: unsubscribe removes only that handler
        it("should stop calling an unsubscribed handler", () => {
            const removed = vi.fn();
            const kept = vi.fn();
            const subscription = eventBus.subscribe("stage:completed", removed);
            eventBus.subscribe("stage:completed", kept);

            subscription.unsubscribe();
            subscription.unsubscribe();
            eventBus.emit(stageEvent("stage:completed", "parser"));

            expect(removed).not.toHaveBeenCalled();
            expect(kept).toHaveBeenCalledTimes(1);
        });

        // Scenario: clear(type) keeps other types
        it("should clear a single event type", () => {
            eventBus.subscribe("stage:started", vi.fn());
            eventBus.subscribe("stage:completed", vi.fn());

            eventBus.clear("stage:started");

            expect(eventBus.handlerCount("stage:started")).toBe(0);
            expect(eventBus.handlerCount("stage:completed")).toBe(1);
        });

        // Scenario: clear() with no argument drops everything
        it("should clear every subscription", () => {
            eventBus.subscribe("stage:started", vi.fn());
            eventBus.subscribe("*", vi.fn());

            eventBus.clear();

            expect(eventBus.handlerCount("stage:started")).toBe(0);
            expect(eventBus.handlerCount("*")).toBe(0);
        });
    });

    describe("handler errors", () => {
        // Scenario: a throwing handler is logged and the others still run
        it("should log a failing handler and keep dispatching", () => {
            const after = vi.fn();
            eventBus.subscribe("candidate:dropped", () => {
                throw new Error("audit sink offline");
            });
            eventBus.subscribe("candidate:dropped", after);

            eventBus.emit(createEvent("candidate:dropped", { disciplineId: 4 }, "tr_err"));

            expect(after).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("EventBus handler error", {
                eventType: "candidate:dropped",
                traceId  : "tr_err",
                error    : "audit sink offline",
            });
        });
    });
});
