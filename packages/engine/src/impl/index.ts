/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @nestguard/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export { Mutex, type Release } from "./Mutex.js";
export {
    HttpSource,
    classifyResponse,
    type FetchFunction,
    type HttpSourceConfig,
} from "./HttpSource.js";
