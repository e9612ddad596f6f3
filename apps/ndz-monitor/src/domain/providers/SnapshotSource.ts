/**
 * @fileoverview Snapshot source
 *
 * Polls the drone report feed. Specializes the engine's HttpSource with the
 * report parser and keeps track of the latest capture; a report whose
 * latest capture is older than the one already published is not published.
 *
 * @module domain/providers/SnapshotSource
 */

import {
    HttpSource,
    type EngineLogger,
    type EventBus,
    type FetchFunction,
} from "@nestguard/engine";
import { getDefaultConfig, type ReportTagNames } from "../../config/loadConfig.js";
import { selectLatestCapture } from "../detection/ViolationDetector.js";
import type { Capture, DroneReport } from "../entities/Observation.js";
import { parseDroneReport } from "./parseDroneReport.js";

/**
 * Configuration for the snapshot source
 */
export interface SnapshotSourceConfig {
    /** Drone report address */
    url: string;

    /** Report element names (defaults to the standard report) */
    tags?: ReportTagNames;

    /** Request timeout in milliseconds */
    timeoutMs?: number;

    fetch?: FetchFunction;
    eventBus?: EventBus;
    logger?: EngineLogger;
}

/**
 * Snapshot Source
 *
 * @example
 * ```typescript
 * const source = new SnapshotSource({ url: "https://example.test/birdnest/drones" });
 *
 * await source.fetch();
 * const capture = source.latest();
 * console.log(capture?.observations.length);
 * ```
 */
export class SnapshotSource extends HttpSource<DroneReport> {
    constructor(config: SnapshotSourceConfig) {
        const tags = config.tags ?? getDefaultConfig().report;
        super({
            id       : "snapshot-source",
            url      : config.url,
            parse    : (body) => parseDroneReport(body, tags),
            headers  : { accept: "application/xml, text/xml" },
            timeoutMs: config.timeoutMs,
            fetch    : config.fetch,
            eventBus : config.eventBus,
            logger   : config.logger,
        });
    }

    /**
     * Latest capture of the published report.
     */
    latest(): Capture | undefined {
        const report = this.current();
        return report === undefined ? undefined : selectLatestCapture(report.captures);
    }

    /**
     * Update interval announced by the sensor, if any.
     */
    announcedIntervalMs(): number | undefined {
        return this.current()?.device?.updateIntervalMs;
    }

    protected publish(report: DroneReport): void {
        const incoming = selectLatestCapture(report.captures);
        const known = this.latest();

        if (known !== undefined && (incoming === undefined || incoming.captureTime < known.captureTime)) {
            this.logger.warn("Ignoring stale drone report", {
                sourceId: this.id,
                known   : new Date(known.captureTime).toISOString(),
                received: incoming === undefined ? null : new Date(incoming.captureTime).toISOString(),
            });
            return;
        }

        super.publish(report);
    }
}
