/**
 * @fileoverview Nestguard Engine
 *
 * Domain-agnostic polling and templating engine.
 *
 * The engine provides:
 * - Typed path parameters and path templates
 * - HTTP polling sources with failure observers and status handlers
 * - A scheduler with retry, backoff and drift correction
 * - An in-memory event bus and a logger contract
 *
 * @module @nestguard/engine
 * @example
 * ```typescript
 * import {
 *     HttpSource,
 *     UpdateScheduler,
 *     type ScheduledTask,
 * } from "@nestguard/engine";
 *
 * // Build sources and tasks in the application domain
 * // Register the tasks with the scheduler
 * // The scheduler drives them until stop()
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Errors
export type { ErrorCode } from "./contracts/index.js";
export {
    NestguardError,
    ValidationError,
    ParameterCountError,
    MissingParameterError,
    TransportError,
    ParseError,
    describeError,
} from "./contracts/index.js";

// Logger
export type { EngineLogger, LogLevel } from "./contracts/index.js";
export {
    createConsoleLogger,
    createPrefixedLogger,
    defaultLogger,
    isLogLevel,
} from "./contracts/index.js";

// PollingSource
export type {
    DeliveryMode,
    FailureObserver,
    FetchOutcome,
    PollingSource,
    ResponseOutcome,
    SourceFailure,
    SourceResponse,
    StatusHandler,
} from "./contracts/index.js";

// ScheduledTask
export type { ScheduledTask, TaskRunResult } from "./contracts/index.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    LifecycleEventType,
    ProcessingEventType,
    Subscription,
} from "./contracts/index.js";
export { createEvent } from "./contracts/index.js";

// ============================================================================
// Path template exports
// ============================================================================

export {
    Parameter,
    PathTemplate,
    ResourceSegment,
    ValueTypes,
    DEFAULT_CHARSET,
    integerParameter,
    percentDecode,
    percentEncode,
    resolveReference,
    stringParameter,
    toStringPredicate,
    type Charset,
    type NamedValues,
    type ParameterDefinition,
    type PathParameter,
    type StringValidator,
    type ValueType,
    type ValueValidator,
} from "./rest/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    InMemoryEventBus,
    HttpSource,
    Mutex,
    classifyResponse,
    type FetchFunction,
    type HttpSourceConfig,
    type Release,
} from "./impl/index.js";

// ============================================================================
// Scheduler exports
// ============================================================================

export {
    UpdateScheduler,
    type SchedulerConfig,
} from "./scheduler/index.js";
