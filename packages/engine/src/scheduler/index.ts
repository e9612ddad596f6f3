/**
 * @fileoverview Scheduler barrel exports
 *
 * @module @nestguard/engine/scheduler
 */

export {
    UpdateScheduler,
    type SchedulerConfig,
} from "./UpdateScheduler.js";
