/**
 * @fileoverview Violation detector
 *
 * Picks the authoritative capture of a report and measures every drone's
 * horizontal distance to the zone origin. A drone violates the zone when
 * its distance, rounded up to the next millimetre, is within the radius.
 *
 * @module domain/detection/ViolationDetector
 */

import { ValidationError } from "@nestguard/engine";
import type { ZoneConfig } from "../../config/loadConfig.js";
import type { Capture, DroneReport, Observation } from "../entities/Observation.js";

/**
 * A drone inside the zone.
 */
export interface Violation {
    readonly observation: Observation;

    /** Distance to the origin in millimetres */
    readonly distance: number;
}

/**
 * Result of checking one capture.
 */
export interface Detection {
    /** Freshness timestamp for every registry update derived from this capture */
    readonly captureTime: number;

    /** Every drone in the capture, violating or not */
    readonly observations: readonly Observation[];

    /** Violating drones in document order */
    readonly violations: readonly Violation[];
}

/**
 * Select the capture with the latest timestamp. On equal timestamps the
 * one later in document order wins.
 */
export function selectLatestCapture(captures: readonly Capture[]): Capture | undefined {
    let latest: Capture | undefined;
    for (const capture of captures) {
        if (latest === undefined || capture.captureTime >= latest.captureTime) {
            latest = capture;
        }
    }
    return latest;
}

/**
 * ViolationDetector
 *
 * @example
 * ```typescript
 * const detector = new ViolationDetector({ originX: 250000, originY: 250000, radius: 100000 });
 * const detection = detector.detectLatest(report);
 * detection?.violations.forEach((v) => console.log(v.observation.serial, v.distance));
 * ```
 */
export class ViolationDetector {
    readonly zone: ZoneConfig;

    constructor(zone: ZoneConfig) {
        if (!Number.isFinite(zone.originX) || !Number.isFinite(zone.originY)) {
            throw new ValidationError(`Zone origin must be finite, got (${zone.originX}, ${zone.originY})`);
        }
        if (!Number.isFinite(zone.radius) || zone.radius < 0) {
            throw new ValidationError(`Zone radius must be a non-negative number, got ${zone.radius}`);
        }
        this.zone = { ...zone };
    }

    /**
     * Horizontal distance from the zone origin.
     */
    distanceToOrigin(observation: Observation): number {
        return Math.hypot(observation.x - this.zone.originX, observation.y - this.zone.originY);
    }

    /**
     * Whether a distance lies inside the zone, boundary included.
     */
    isInside(distance: number): boolean {
        return Math.ceil(distance) <= this.zone.radius;
    }

    /**
     * Check every drone of one capture.
     */
    detect(capture: Capture): Detection {
        const violations: Violation[] = [];
        for (const observation of capture.observations) {
            const distance = this.distanceToOrigin(observation);
            if (this.isInside(distance)) {
                violations.push({ observation, distance });
            }
        }

        return {
            captureTime : capture.captureTime,
            observations: capture.observations,
            violations,
        };
    }

    /**
     * Check the latest capture of a report; `undefined` when it has none.
     */
    detectLatest(report: DroneReport): Detection | undefined {
        const capture = selectLatestCapture(report.captures);
        return capture === undefined ? undefined : this.detect(capture);
    }
}
