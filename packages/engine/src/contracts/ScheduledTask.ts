/**
 * ScheduledTask Contract
 *
 * Scheduled tasks are passive units of periodic work. The scheduler
 * calls run() in its own loop per task and decides how long to wait
 * between runs from the reported result.
 *
 * Design principles:
 * - Passive: tasks don't schedule themselves; the scheduler pulls
 * - Failures are results: run() reports `success: false` or throws,
 *   and the scheduler applies its retry policy either way
 * - Tasks may know when the next useful run is (`nextUpdateAt`)
 */

/**
 * Result of a single task run.
 */
export interface TaskRunResult {
    /** Whether the run produced what it was asked for */
    readonly success: boolean;

    /**
     * Epoch milliseconds at which the next run is expected to be useful.
     * The scheduler sleeps until then; a past instant triggers drift correction.
     */
    readonly nextUpdateAt?: number;

    /**
     * Request a short idle delay instead of the nominal interval.
     * Used when a run found nothing new to do.
     */
    readonly idle?: boolean;

    /** Failure detail for logging when `success` is false */
    readonly error?: unknown;
}

/**
 * ScheduledTask interface.
 *
 * @example
 * ```typescript
 * class HeartbeatTask implements ScheduledTask {
 *     readonly id = "heartbeat";
 *     readonly name = "Heartbeat";
 *
 *     async run() {
 *         await ping();
 *         return { success: true, nextUpdateAt: Date.now() + 5000 };
 *     }
 * }
 * ```
 */
export interface ScheduledTask {
    /** Unique identifier for this task */
    readonly id: string;

    /** Human-readable name */
    readonly name: string;

    /** Optional description for logging */
    readonly description?: string;

    /**
     * Called once before the scheduler starts the task's loop.
     * A throw aborts scheduler startup.
     */
    initialize?(): Promise<void>;

    /**
     * Perform one unit of work.
     */
    run(): Promise<TaskRunResult>;

    /**
     * Called once after the task's loop has exited.
     */
    shutdown?(): Promise<void>;
}
