/**
 * @fileoverview UpdateScheduler
 *
 * Runs each registered task on its own loop.
 *
 * Loop policy:
 * 1. Run the task
 * 2. Success: reset the retry count and sleep until the reported
 *    `nextUpdateAt` (or the idle delay, or one interval)
 * 3. Failure: retry up to `maxRetries` times, waiting n x `backoffUnitMs`
 *    before retry n; then wait for the next expected update
 * 4. Drift correction: a non-positive wait re-runs at once, but only once
 *    in a row; further non-positive waits fall back to one interval
 *
 * Stopping is cooperative: in-flight runs finish, sleeping loops wake.
 *
 * @module @nestguard/engine/scheduler/UpdateScheduler
 */

import type { EventBus, EventPayload } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import {
    createPrefixedLogger,
    defaultLogger,
    type EngineLogger,
} from "../contracts/Logger.js";
import type { ScheduledTask, TaskRunResult } from "../contracts/ScheduledTask.js";
import { describeError } from "../contracts/errors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";

/**
 * Scheduler configuration options.
 */
export interface SchedulerConfig {
    /** Nominal interval between runs in milliseconds (default: 2000) */
    readonly intervalMs?: number;

    /** Immediate retries after a failure (default: 5) */
    readonly maxRetries?: number;

    /** Retry n waits n x backoffUnitMs (default: 100) */
    readonly backoffUnitMs?: number;

    /** Wait after a run that reported `idle` (default: 250) */
    readonly idleDelayMs?: number;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for scheduler operations */
    readonly logger?: EngineLogger;

    /** Clock (default: Date.now) */
    readonly now?: () => number;
}

/**
 * Per-task loop state.
 */
interface TaskState {
    readonly task: ScheduledTask;
    readonly logger: EngineLogger;
    retries: number;
    nextUpdateAt?: number;
    repolledEarly: boolean;
    loop?: Promise<void>;
}

/**
 * UpdateScheduler - drives periodic tasks with retry and drift correction.
 *
 * @example
 * ```typescript
 * const scheduler = new UpdateScheduler({ intervalMs: 2000 });
 *
 * scheduler.registerTask(snapshotPoller);
 * scheduler.registerTask(registryUpdater);
 *
 * scheduler.eventBus.subscribe("task:failed", (event) => {
 *     console.log("Task failed:", event.data);
 * });
 *
 * await scheduler.start();
 * ```
 */
export class UpdateScheduler {
    private readonly config: Required<Omit<SchedulerConfig, "eventBus" | "logger">> & {
        eventBus: EventBus;
        logger: EngineLogger;
    };

    private readonly tasks: Map<string, TaskState> = new Map();
    private readonly sleepers: Set<() => void> = new Set();
    private running = false;

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: SchedulerConfig = {}) {
        const logger = config.logger ?? defaultLogger;
        this.eventBus = config.eventBus ?? new InMemoryEventBus(logger);

        this.config = {
            intervalMs   : config.intervalMs ?? 2000,
            maxRetries   : config.maxRetries ?? 5,
            backoffUnitMs: config.backoffUnitMs ?? 100,
            idleDelayMs  : config.idleDelayMs ?? 250,
            now          : config.now ?? Date.now,
            eventBus     : this.eventBus,
            logger,
        };

        if (!(this.config.intervalMs > 0)) {
            throw new Error(`intervalMs must be positive, got ${this.config.intervalMs}`);
        }
        if (!Number.isInteger(this.config.maxRetries) || this.config.maxRetries < 0) {
            throw new Error(`maxRetries must be a non-negative integer, got ${this.config.maxRetries}`);
        }
        if (!(this.config.backoffUnitMs >= 0) || !(this.config.idleDelayMs >= 0)) {
            throw new Error("backoffUnitMs and idleDelayMs must be non-negative");
        }
    }

    /**
     * Register a task.
     *
     * @throws Error if a task with the same ID is registered or the scheduler is running
     */
    registerTask(task: ScheduledTask): void {
        if (this.tasks.has(task.id)) {
            throw new Error(`Task already registered: ${task.id}`);
        }
        if (this.running) {
            throw new Error(`Cannot register task while running: ${task.id}`);
        }

        this.tasks.set(task.id, {
            task,
            logger       : createPrefixedLogger(this.config.logger, task.id),
            retries      : 0,
            repolledEarly: false,
        });
        this.config.logger.info("Task registered", {
            taskId: task.id,
            name  : task.name,
        });
    }

    /**
     * Start the scheduler.
     *
     * Initializes every task, then starts one loop per task.
     */
    async start(): Promise<void> {
        if (this.running) {
            this.config.logger.warn("Scheduler already running");
            return;
        }

        this.emit(createEvent("scheduler:starting"));
        this.config.logger.info("Scheduler starting...");

        for (const state of this.tasks.values()) {
            try {
                if (state.task.initialize) {
                    await state.task.initialize();
                }
            }
            catch (error) {
                this.config.logger.error("Task initialization failed", {
                    taskId: state.task.id,
                    error : describeError(error),
                });
                throw error;
            }
        }

        this.running = true;

        for (const state of this.tasks.values()) {
            state.loop = this.runLoop(state).catch((error: unknown) => {
                state.logger.error("Task loop crashed", { error: describeError(error) });
                this.emit(createEvent("scheduler:error", {
                    taskId: state.task.id,
                    error : describeError(error),
                }));
            });
        }

        this.emit(createEvent("scheduler:started", {
            tasks     : Array.from(this.tasks.keys()),
            intervalMs: this.config.intervalMs,
        }));

        this.config.logger.info("Scheduler started", {
            tasks     : this.tasks.size,
            intervalMs: this.config.intervalMs,
        });
    }

    /**
     * Stop the scheduler.
     *
     * Lets in-flight runs finish, wakes sleeping loops, waits for every loop
     * to exit, then shuts the tasks down.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }

        this.emit(createEvent("scheduler:stopping"));
        this.config.logger.info("Scheduler stopping...");

        this.running = false;
        for (const wake of [...this.sleepers]) {
            wake();
        }

        await Promise.all(Array.from(this.tasks.values(), (state) => state.loop));

        for (const state of this.tasks.values()) {
            state.loop = undefined;
            try {
                if (state.task.shutdown) {
                    await state.task.shutdown();
                }
            }
            catch (error) {
                this.config.logger.error("Task shutdown error", {
                    taskId: state.task.id,
                    error : describeError(error),
                });
            }
        }

        this.emit(createEvent("scheduler:stopped"));
        this.config.logger.info("Scheduler stopped");
    }

    /**
     * Check if the scheduler is running.
     */
    get isRunning(): boolean {
        return this.running;
    }

    private async runLoop(state: TaskState): Promise<void> {
        while (this.running) {
            const delayMs = await this.runOnce(state);
            if (!this.running) {
                break;
            }
            await this.sleep(delayMs);
        }
    }

    /**
     * Run the task once and return how long to wait before the next run.
     */
    private async runOnce(state: TaskState): Promise<number> {
        let result: TaskRunResult;
        try {
            result = await state.task.run();
        }
        catch (error) {
            result = { success: false, error };
        }

        if (result.success) {
            state.retries = 0;
            if (result.nextUpdateAt !== undefined) {
                state.nextUpdateAt = result.nextUpdateAt;
            }
            this.emit(createEvent("task:completed", { taskId: state.task.id }));

            if (result.idle) {
                state.repolledEarly = false;
                return this.config.idleDelayMs;
            }
            return this.delayUntil(state, result.nextUpdateAt);
        }

        const error = result.error === undefined ? "unsuccessful run" : describeError(result.error);
        state.logger.warn("Task run failed", { error, retries: state.retries });
        this.emit(createEvent("task:failed", {
            taskId : state.task.id,
            error,
            retries: state.retries,
        }));

        if (state.retries < this.config.maxRetries) {
            state.retries++;
            const delayMs = state.retries * this.config.backoffUnitMs;
            this.emit(createEvent("task:retrying", {
                taskId : state.task.id,
                attempt: state.retries,
                delayMs,
            }));
            return delayMs;
        }

        const delayMs = this.delayUntil(state, state.nextUpdateAt);
        this.emit(createEvent("task:waiting", {
            taskId: state.task.id,
            delayMs,
        }));
        return delayMs;
    }

    /**
     * Wait until `target`, applying drift correction.
     */
    private delayUntil(state: TaskState, target: number | undefined): number {
        if (target === undefined) {
            state.repolledEarly = false;
            return this.config.intervalMs;
        }

        const waitMs = target - this.config.now();
        if (waitMs > 0) {
            state.repolledEarly = false;
            return waitMs;
        }

        if (!state.repolledEarly) {
            state.repolledEarly = true;
            return 0;
        }
        return this.config.intervalMs;
    }

    /**
     * Sleep that stop() can cut short.
     */
    private sleep(ms: number): Promise<void> {
        if (ms <= 0) {
            return Promise.resolve();
        }

        return new Promise((resolve) => {
            const wake = (): void => {
                clearTimeout(timer);
                this.sleepers.delete(wake);
                resolve();
            };
            const timer = setTimeout(wake, ms);
            this.sleepers.add(wake);
        });
    }

    private emit(event: EventPayload): void {
        this.config.eventBus.emit(event);
    }
}
