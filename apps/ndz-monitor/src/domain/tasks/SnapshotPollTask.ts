/**
 * @fileoverview Snapshot poll task
 *
 * Scheduled task that polls the snapshot source once per run. Failures
 * reach the task through a failure observer on the source and are
 * reported to the scheduler, which owns the retry policy.
 *
 * @module domain/tasks/SnapshotPollTask
 */

import type {
    ScheduledTask,
    SourceFailure,
    Subscription,
    TaskRunResult,
} from "@nestguard/engine";
import type { SnapshotSource } from "../providers/SnapshotSource.js";

/**
 * Configuration for the snapshot poll task
 */
export interface SnapshotPollTaskConfig {
    source: SnapshotSource;

    /** Nominal update interval, used when the sensor announces none */
    intervalMs: number;
}

/**
 * Snapshot Poll Task
 *
 * @example
 * ```typescript
 * scheduler.registerTask(new SnapshotPollTask({ source, intervalMs: 2000 }));
 * ```
 */
export class SnapshotPollTask implements ScheduledTask {
    readonly id = "snapshot-poller";
    readonly name = "Snapshot Poller";
    readonly description = "Polls the drone report feed";

    private readonly source: SnapshotSource;
    private readonly intervalMs: number;
    private failure: SourceFailure | undefined;
    private subscription: Subscription | undefined;

    constructor(config: SnapshotPollTaskConfig) {
        this.source = config.source;
        this.intervalMs = config.intervalMs;
    }

    async initialize(): Promise<void> {
        if (this.subscription) {
            return;
        }
        this.subscription = this.source.addFailureObserver({
            id       : this.id,
            onFailure: (failure) => {
                this.failure = failure;
            },
        });
    }

    async run(): Promise<TaskRunResult> {
        this.failure = undefined;
        await this.source.fetch();

        if (this.failure) {
            return { success: false, error: this.failure.error };
        }

        const capture = this.source.latest();
        if (capture === undefined) {
            return { success: true };
        }

        const interval = this.source.announcedIntervalMs() ?? this.intervalMs;
        return { success: true, nextUpdateAt: capture.captureTime + interval };
    }

    async shutdown(): Promise<void> {
        this.subscription?.unsubscribe();
        this.subscription = undefined;
    }
}
