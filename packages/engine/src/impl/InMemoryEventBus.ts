/**
 * @fileoverview In-Memory EventBus Implementation
 *
 * Synchronous in-memory event bus used by the scheduler, the polling
 * sources and the monitor domain.
 *
 * @module @nestguard/engine/impl/InMemoryEventBus
 */

import type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    Subscription,
} from "../contracts/EventBus.js";
import { defaultLogger, type EngineLogger } from "../contracts/Logger.js";
import { describeError } from "../contracts/errors.js";

/**
 * In-memory EventBus implementation.
 *
 * Features:
 * - Synchronous event dispatch
 * - Wildcard subscription ("*" for all events)
 * - Handler failures are reported to the logger and never reach the emitter
 *
 * @example
 * ```typescript
 * const bus = new InMemoryEventBus();
 *
 * bus.subscribe("task:failed", (event) => {
 *     console.log("Task failed:", event.data);
 * });
 *
 * bus.emit(createEvent("task:failed", { taskId: "snapshot-poller" }));
 * ```
 */
export class InMemoryEventBus implements EventBus {
    private handlers: Map<string, Set<EventHandler>> = new Map();
    private readonly logger: EngineLogger;

    constructor(logger: EngineLogger = defaultLogger) {
        this.logger = logger;
    }

    /**
     * Emit an event to all subscribers.
     *
     * Events are dispatched synchronously to all matching handlers.
     * Handlers for "*" receive all events.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void {
        this.dispatch(this.handlers.get(event.type), event);
        this.dispatch(this.handlers.get("*"), event);
    }

    /**
     * Deliver an event to a handler set. Sync throws and async rejections are
     * both logged; one handler failing never stops the others.
     */
    private dispatch(handlers: Set<EventHandler> | undefined, event: EventPayload): void {
        if (!handlers) {
            return;
        }

        // Copy so handlers can unsubscribe while we iterate
        for (const handler of [...handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((error: unknown) => this.reportHandlerError(event, error));
                }
            }
            catch (error) {
                this.reportHandlerError(event, error);
            }
        }
    }

    private reportHandlerError(event: EventPayload, error: unknown): void {
        this.logger.error("EventBus handler error", {
            eventType: event.type,
            error    : describeError(error),
        });
    }

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription {
        const handlers = this.handlers.get(eventType) ?? new Set<EventHandler>();
        handlers.add(handler);
        this.handlers.set(eventType, handlers);

        return {
            unsubscribe: () => {
                const handlers = this.handlers.get(eventType);
                if (handlers) {
                    handlers.delete(handler);
                    if (handlers.size === 0) {
                        this.handlers.delete(eventType);
                    }
                }
            },
        };
    }
}
