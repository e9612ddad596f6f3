/**
 * @fileoverview Registry update task
 *
 * Scheduled task that feeds new captures to the identity registry. When
 * the published capture has already been processed it only evicts expired
 * records and asks for the short idle delay.
 *
 * @module domain/tasks/RegistryUpdateTask
 */

import type { ScheduledTask, TaskRunResult } from "@nestguard/engine";
import type { ViolationDetector } from "../detection/ViolationDetector.js";
import type { Capture } from "../entities/Observation.js";
import type { IdentityRegistry } from "../registry/IdentityRegistry.js";

/**
 * Configuration for the registry update task
 */
export interface RegistryUpdateTaskConfig {
    /** Where the latest published capture is read from */
    source: { latest(): Capture | undefined };
    detector: ViolationDetector;
    registry: IdentityRegistry;
}

export class RegistryUpdateTask implements ScheduledTask {
    readonly id = "registry-updater";
    readonly name = "Registry Updater";
    readonly description = "Merges new captures into the identity registry";

    private readonly config: RegistryUpdateTaskConfig;
    private lastProcessed: number | undefined;

    constructor(config: RegistryUpdateTaskConfig) {
        this.config = config;
    }

    /**
     * Capture time of the last capture merged into the registry.
     */
    get lastProcessedAt(): number | undefined {
        return this.lastProcessed;
    }

    async run(): Promise<TaskRunResult> {
        const capture = this.config.source.latest();

        if (capture === undefined
            || (this.lastProcessed !== undefined && capture.captureTime <= this.lastProcessed)) {
            await this.config.registry.evictExpired();
            return { success: true, idle: true };
        }

        await this.config.registry.update(this.config.detector.detect(capture));
        this.lastProcessed = capture.captureTime;

        return { success: true, idle: true };
    }
}
