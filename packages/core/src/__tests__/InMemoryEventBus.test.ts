/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * Tests cover:
 * - Basic event emission and subscription
 * - Wildcard subscriptions
 * - One-time subscriptions (once)
 * - Unsubscribe and clear
 * - Handler errors reported to the logger
 * - createEvent payloads
 *
 * @module @textmill/core/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createEvent, type EventPayload } from "../contracts/EventBus.js";
import type { Logger } from "../contracts/Logger.js";

function createMockLogger(): Logger {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("InMemoryEventBus", () => {
    let logger: Logger;
    let eventBus: InMemoryEventBus;

    beforeEach(() => {
        logger = createMockLogger();
        eventBus = new InMemoryEventBus(logger);
    });

    describe("subscribe and emit", () => {
        // Scenario: Basic subscription receives emitted events
        it("should call handler when matching event is emitted", () => {
            const handler = vi.fn();
            const event: EventPayload = {
                type     : "document:preprocessed",
                timestamp: "2025-01-15T10:00:00.000Z",
                data     : { documentId: "doc-1" },
            };

            eventBus.subscribe("document:preprocessed", handler);
            eventBus.emit(event);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(handler).toHaveBeenCalledWith(event);
        });

        // Scenario: Handler not called for non-matching event types
        it("should not call handler for non-matching event type", () => {
            const handler = vi.fn();

            eventBus.subscribe("document:failed", handler);
            eventBus.emit({ type: "document:skipped", timestamp: "2025-01-15T10:00:00.000Z" });

            expect(handler).not.toHaveBeenCalled();
        });

        // Scenario: Events reach handlers in emit order
        it("should call handler for each emitted event in order", () => {
            const handler = vi.fn();
            const event1: EventPayload = {
                type     : "step:started",
                timestamp: "2025-01-15T10:00:00.000Z",
                data     : { step: "tokenization" },
            };
            const event2: EventPayload = {
                type     : "step:started",
                timestamp: "2025-01-15T10:00:01.000Z",
                data     : { step: "segmentation" },
            };

            eventBus.subscribe("step:started", handler);
            eventBus.emit(event1);
            eventBus.emit(event2);

            expect(handler).toHaveBeenCalledTimes(2);
            expect(handler).toHaveBeenNthCalledWith(1, event1);
            expect(handler).toHaveBeenNthCalledWith(2, event2);
        });
    });

    describe("wildcard subscription", () => {
        // Scenario: Wildcard handler receives all events, after specific ones
        it("should call wildcard handlers after specific handlers", () => {
            const calls: string[] = [];

            eventBus.subscribe("*", () => calls.push("wildcard"));
            eventBus.subscribe("pipeline:started", () => calls.push("specific"));
            eventBus.emit({ type: "pipeline:started", timestamp: "2025-01-15T10:00:00.000Z" });
            eventBus.emit({ type: "pipeline:finished", timestamp: "2025-01-15T10:00:01.000Z" });

            expect(calls).toEqual(["specific", "wildcard", "wildcard"]);
        });
    });

    describe("once", () => {
        // Scenario: once() handler only called for first event
        it("should call handler only once then auto-unsubscribe", () => {
            const handler = vi.fn();
            const event: EventPayload = { type: "step:finished", timestamp: "2025-01-15T10:00:00.000Z" };

            eventBus.once("step:finished", handler);
            eventBus.emit(event);
            eventBus.emit(event);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(eventBus.handlerCount("step:finished")).toBe(0);
        });
    });

    describe("unsubscribe and clear", () => {
        // Scenario: Unsubscribed handler not called, double unsubscribe is a no-op
        it("should stop calling a handler after unsubscribe", () => {
            const handler = vi.fn();
            const event: EventPayload = { type: "document:failed", timestamp: "2025-01-15T10:00:00.000Z" };

            const subscription = eventBus.subscribe("document:failed", handler);
            eventBus.emit(event);
            subscription.unsubscribe();
            eventBus.emit(event);

            expect(handler).toHaveBeenCalledTimes(1);
            expect(() => subscription.unsubscribe()).not.toThrow();
        });

        // Scenario: Clear one type keeps the others
        it("should clear handlers of one type only", () => {
            eventBus.subscribe("document:failed", vi.fn());
            eventBus.subscribe("document:skipped", vi.fn());

            eventBus.clear("document:failed");

            expect(eventBus.handlerCount("document:failed")).toBe(0);
            expect(eventBus.handlerCount("document:skipped")).toBe(1);
        });

        // Scenario: Clear everything
        it("should clear all handlers when no type is given", () => {
            eventBus.subscribe("document:failed", vi.fn());
            eventBus.subscribe("*", vi.fn());

            eventBus.clear();

            expect(eventBus.handlerCount("document:failed")).toBe(0);
            expect(eventBus.handlerCount("*")).toBe(0);
        });
    });

    describe("error handling", () => {
        // Scenario: Handler error doesn't break other handlers
        it("should continue calling other handlers and log the error", () => {
            const successHandler = vi.fn();

            eventBus.subscribe("document:failed", () => {
                throw new Error("Handler error");
            });
            eventBus.subscribe("document:failed", successHandler);
            eventBus.emit({ type: "document:failed", timestamp: "2025-01-15T10:00:00.000Z" });

            expect(successHandler).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("EventBus handler error", {
                eventType: "document:failed",
                error    : "Handler error",
            });
        });
    });

    describe("createEvent", () => {
        // Scenario: Events carry type, data, run id and an ISO timestamp
        it("should build a stamped payload", () => {
            const event = createEvent("step:started", { step: "nerc" }, "run_abc_123");

            expect(event.type).toBe("step:started");
            expect(event.data).toEqual({ step: "nerc" });
            expect(event.runId).toBe("run_abc_123");
            expect(new Date(event.timestamp).toISOString()).toBe(event.timestamp);
        });
    });
});
