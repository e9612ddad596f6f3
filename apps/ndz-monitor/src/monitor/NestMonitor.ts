/**
 * @fileoverview Nest monitor
 *
 * Composition root: wires the snapshot source, the violation detector, the
 * pilot lookup client and the identity registry to the update scheduler.
 * Every component shares one event bus and one logger.
 *
 * @module monitor/NestMonitor
 */

import {
    InMemoryEventBus,
    UpdateScheduler,
    createConsoleLogger,
    type EngineLogger,
    type EventBus,
    type FetchFunction,
} from "@nestguard/engine";
import type { MonitorConfig } from "../config/loadConfig.js";
import { ViolationDetector } from "../domain/detection/ViolationDetector.js";
import { PilotLookupClient } from "../domain/lookup/PilotLookupClient.js";
import { SnapshotSource } from "../domain/providers/SnapshotSource.js";
import { IdentityRegistry, type ViolatorView } from "../domain/registry/IdentityRegistry.js";
import { RegistryUpdateTask } from "../domain/tasks/RegistryUpdateTask.js";
import { SnapshotPollTask } from "../domain/tasks/SnapshotPollTask.js";

const kMINUTE_MS = 60_000;

/**
 * Options for building a monitor
 */
export interface NestMonitorOptions {
    config: MonitorConfig;

    /** Logger (default: console logger at `config.logLevel`) */
    logger?: EngineLogger;

    eventBus?: EventBus;

    /** Fetch implementation shared by both feeds */
    fetch?: FetchFunction;

    /** Clock (default: Date.now) */
    now?: () => number;
}

/**
 * Nest Monitor
 *
 * @example
 * ```typescript
 * const monitor = new NestMonitor({ config: loadConfig("./config/monitor.yml") });
 *
 * monitor.eventBus.subscribe("registry:updated", () => {
 *     console.table(monitor.currentViolators());
 * });
 *
 * await monitor.start();
 * ```
 */
export class NestMonitor {
    readonly config: MonitorConfig;
    readonly logger: EngineLogger;
    readonly eventBus: EventBus;

    readonly source: SnapshotSource;
    readonly detector: ViolationDetector;
    readonly lookup: PilotLookupClient;
    readonly registry: IdentityRegistry;
    readonly scheduler: UpdateScheduler;
    readonly pollTask: SnapshotPollTask;
    readonly updateTask: RegistryUpdateTask;

    constructor(options: NestMonitorOptions) {
        const { config } = options;
        const retentionMs = config.retentionMinutes * kMINUTE_MS;

        this.config = config;
        this.logger = options.logger ?? createConsoleLogger(config.logLevel);
        this.eventBus = options.eventBus ?? new InMemoryEventBus(this.logger);

        this.source = new SnapshotSource({
            url      : config.feeds.snapshotUrl,
            tags     : config.report,
            timeoutMs: config.requestTimeoutMs,
            fetch    : options.fetch,
            eventBus : this.eventBus,
            logger   : this.logger,
        });

        this.detector = new ViolationDetector(config.zone);

        this.lookup = new PilotLookupClient({
            baseUrl  : config.feeds.pilotBaseUrl,
            retentionMs,
            timeoutMs: config.requestTimeoutMs,
            fetch    : options.fetch,
            eventBus : this.eventBus,
            logger   : this.logger,
            now      : options.now,
        });

        this.registry = new IdentityRegistry({
            lookup  : this.lookup,
            retentionMs,
            eventBus: this.eventBus,
            logger  : this.logger,
            now     : options.now,
        });

        this.scheduler = new UpdateScheduler({
            intervalMs   : config.pollIntervalMs,
            maxRetries   : config.retry.maxRetries,
            backoffUnitMs: config.retry.backoffUnitMs,
            idleDelayMs  : config.idleDelayMs,
            eventBus     : this.eventBus,
            logger       : this.logger,
            now          : options.now,
        });

        this.pollTask = new SnapshotPollTask({
            source    : this.source,
            intervalMs: config.pollIntervalMs,
        });
        this.updateTask = new RegistryUpdateTask({
            source  : this.source,
            detector: this.detector,
            registry: this.registry,
        });

        this.scheduler.registerTask(this.pollTask);
        this.scheduler.registerTask(this.updateTask);
    }

    get isRunning(): boolean {
        return this.scheduler.isRunning;
    }

    async start(): Promise<void> {
        await this.scheduler.start();
    }

    async stop(): Promise<void> {
        await this.scheduler.stop();
    }

    /**
     * Violators within the retention window, sorted by drone serial.
     */
    currentViolators(): ViolatorView[] {
        return this.registry.currentViolators();
    }
}
