/**
 * @fileoverview Contract barrel exports
 *
 * Domain-agnostic interfaces and types shared by the engine and the
 * applications built on it.
 *
 * @module @nestguard/engine/contracts
 */

// Error taxonomy
export type { ErrorCode } from "./errors.js";
export {
    NestguardError,
    ValidationError,
    ParameterCountError,
    MissingParameterError,
    TransportError,
    ParseError,
    describeError,
} from "./errors.js";

// Logger contract
export type { EngineLogger, LogLevel } from "./Logger.js";
export {
    createConsoleLogger,
    createPrefixedLogger,
    defaultLogger,
    isLogLevel,
} from "./Logger.js";

// PollingSource contract
export type {
    DeliveryMode,
    FailureObserver,
    FetchOutcome,
    PollingSource,
    ResponseOutcome,
    SourceFailure,
    SourceResponse,
    StatusHandler,
} from "./PollingSource.js";

// ScheduledTask contract
export type { ScheduledTask, TaskRunResult } from "./ScheduledTask.js";

// EventBus contract
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
