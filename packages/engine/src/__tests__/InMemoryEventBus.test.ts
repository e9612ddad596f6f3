/**
 * @fileoverview Unit tests for InMemoryEventBus
 *
 * Tests cover:
 * - Delivery of scheduler, source and registry events to typed subscribers
 * - Wildcard delivery, as used for console reporting
 * - Handler failures reported to the logger
 *
 * @module @nestguard/engine/__tests__/InMemoryEventBus
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { createEvent, type EventPayload } from "../contracts/EventBus.js";

function createLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

describe("InMemoryEventBus", () => {
    let logger: ReturnType<typeof createLogger>;
    let eventBus: InMemoryEventBus;

    beforeEach(() => {
        logger = createLogger();
        eventBus = new InMemoryEventBus(logger);
    });

    describe("typed delivery", () => {
        // Scenario: A registry subscriber only sees registry updates
        it("should deliver an event only to handlers of its type", () => {
            const updated = vi.fn();
            eventBus.subscribe("registry:updated", updated);

            const event = createEvent("registry:updated", { size: 2 });
            eventBus.emit(createEvent("source:updated", { sourceId: "snapshot-source" }));
            eventBus.emit(event);

            expect(updated).toHaveBeenCalledTimes(1);
            expect(updated).toHaveBeenCalledWith(event);
        });

        // Scenario: Handlers run in subscription order
        it("should call handlers in the order they subscribed", () => {
            const calls: string[] = [];
            eventBus.subscribe("task:failed", () => {
                calls.push("first");
            });
            eventBus.subscribe("task:failed", () => {
                calls.push("second");
            });

            eventBus.emit(createEvent("task:failed", { taskId: "snapshot-poller" }));

            expect(calls).toEqual(["first", "second"]);
        });

        // Scenario: An unsubscribed handler hears nothing more
        it("should stop delivery after unsubscribe", () => {
            const failed = vi.fn();
            const subscription = eventBus.subscribe("source:failed", failed);

            eventBus.emit(createEvent("source:failed", { sourceId: "pilot-lookup" }));
            subscription.unsubscribe();
            eventBus.emit(createEvent("source:failed", { sourceId: "pilot-lookup" }));

            expect(failed).toHaveBeenCalledTimes(1);
        });

        // Scenario: Unsubscribing during dispatch does not skip later handlers
        it("should finish the current dispatch when a handler unsubscribes", () => {
            const later = vi.fn();
            const subscription = eventBus.subscribe("scheduler:stopped", () => {
                subscription.unsubscribe();
            });
            eventBus.subscribe("scheduler:stopped", later);

            eventBus.emit(createEvent("scheduler:stopped"));

            expect(later).toHaveBeenCalledTimes(1);
        });
    });

    describe("wildcard delivery", () => {
        // Scenario: "*" sees every event, after the typed handlers
        it("should deliver every event type to wildcard handlers", () => {
            const seen: string[] = [];
            eventBus.subscribe("*", (event: EventPayload) => {
                seen.push(`*:${event.type}`);
            });
            eventBus.subscribe("task:completed", (event) => {
                seen.push(event.type);
            });

            eventBus.emit(createEvent("task:completed", { taskId: "registry-updater" }));
            eventBus.emit(createEvent("source:failed", { sourceId: "snapshot-source" }));
            eventBus.emit(createEvent("registry:updated", { size: 0 }));

            expect(seen).toEqual([
                "task:completed",
                "*:task:completed",
                "*:source:failed",
                "*:registry:updated",
            ]);
        });
    });

    describe("handler failures", () => {
        // Scenario: A throwing handler is logged and the others still run
        it("should log a throwing handler and keep delivering", () => {
            const later = vi.fn();
            eventBus.subscribe("registry:updated", () => {
                throw new Error("console closed");
            });
            eventBus.subscribe("registry:updated", later);

            expect(() => eventBus.emit(createEvent("registry:updated"))).not.toThrow();

            expect(later).toHaveBeenCalledTimes(1);
            expect(logger.error).toHaveBeenCalledWith("EventBus handler error", {
                eventType: "registry:updated",
                error    : "console closed",
            });
        });

        // Scenario: A rejected async handler is logged
        it("should log a rejected async handler", async () => {
            eventBus.subscribe("source:failed", async () => {
                throw new Error("report failed");
            });

            eventBus.emit(createEvent("source:failed"));

            await vi.waitFor(() => expect(logger.error).toHaveBeenCalledWith("EventBus handler error", {
                eventType: "source:failed",
                error    : "report failed",
            }));
        });
    });
});

describe("createEvent", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    // Scenario: Events are stamped with the current time
    it("should stamp the event with an ISO timestamp", () => {
        vi.useFakeTimers({ toFake: ["Date"] });
        vi.setSystemTime(new Date("2023-01-05T08:00:00.000Z"));

        expect(createEvent("scheduler:started", { intervalMs: 2000 })).toEqual({
            type     : "scheduler:started",
            timestamp: "2023-01-05T08:00:00.000Z",
            traceId  : undefined,
            data     : { intervalMs: 2000 },
        });
    });
});
