/**
 * @fileoverview EventBus Contract
 *
 * Defines the contract for internal event flow: scheduler lifecycle, task
 * outcomes, source updates and failures, and domain events such as registry
 * updates.
 *
 * - Synchronous dispatch
 * - In-memory implementation
 * - Ordering is preserved within a single event type
 *
 * @module @nestguard/engine/contracts/EventBus
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

    /** Trace ID for correlation */
    readonly traceId?: string;

    /** Additional event-specific data */
    readonly data?: Record<string, unknown>;
}

/**
 * Lifecycle event types emitted by the scheduler.
 */
export type LifecycleEventType =
    | "scheduler:starting"
    | "scheduler:started"
    | "scheduler:stopping"
    | "scheduler:stopped"
    | "scheduler:error";

/**
 * Processing event types emitted by scheduled tasks and polling sources.
 */
export type ProcessingEventType =
    | "task:completed"
    | "task:failed"
    | "task:retrying"
    | "task:waiting"
    | "source:updated"
    | "source:failed";

/**
 * All known event types.
 */
export type EventType = LifecycleEventType | ProcessingEventType | string;

/**
 * Event handler function signature.
 */
export type EventHandler<T extends EventPayload = EventPayload> = (event: T) => void | Promise<void>;

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
 * Provides a simple pub/sub mechanism for internal events.
 *
 * @example
 * ```typescript
 * const bus: EventBus = new InMemoryEventBus();
 *
 * const sub = bus.subscribe("source:failed", (event) => {
 *     console.log("Source failed:", event.data);
 * });
 *
 * bus.emit({
 *     type: "source:failed",
 *     timestamp: new Date().toISOString(),
 *     data: { sourceId: "drone-report", error: "HTTP 503" },
 * });
 *
 * // Unsubscribe when done
 * sub.unsubscribe();
 * ```
 */
export interface EventBus {
    /**
     * Emit an event to all subscribers.
     *
     * @param event - The event payload to emit
     */
    emit(event: EventPayload): void;

    /**
     * Subscribe to events of a specific type.
     *
     * @param eventType - The event type to subscribe to (or "*" for all events)
     * @param handler - Handler function called when event is emitted
     * @returns Subscription handle for unsubscribing
     */
    subscribe(eventType: EventType | "*", handler: EventHandler): Subscription;
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
