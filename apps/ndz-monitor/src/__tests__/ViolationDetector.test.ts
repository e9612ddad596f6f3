/**
 * @fileoverview Unit tests for ViolationDetector
 *
 * @module domain/detection/__tests__/ViolationDetector
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "@nestguard/engine";
import { ViolationDetector, selectLatestCapture } from "../domain/detection/ViolationDetector.js";
import type { Capture, Observation } from "../domain/entities/Observation.js";

const zone = { originX: 250000, originY: 250000, radius: 100000 };

function observe(serial: string, x: number, y: number): Observation {
    return { serial, x, y, z: 0 };
}

describe("selectLatestCapture", () => {
    // Scenario: Only the latest capture is authoritative
    it("should select the capture with the latest timestamp", () => {
        const captures: Capture[] = [
            { captureTime: 2000, observations: [observe("late", 0, 0)] },
            { captureTime: 1000, observations: [observe("early", 0, 0)] },
        ];

        expect(selectLatestCapture(captures)?.observations[0]?.serial).toBe("late");
    });

    // Scenario: Equal timestamps resolve to the last one in document order
    it("should prefer the later capture on equal timestamps", () => {
        const captures: Capture[] = [
            { captureTime: 1000, observations: [observe("first", 0, 0)] },
            { captureTime: 1000, observations: [observe("second", 0, 0)] },
        ];

        expect(selectLatestCapture(captures)?.observations[0]?.serial).toBe("second");
    });

    it("should return undefined without captures", () => {
        expect(selectLatestCapture([])).toBeUndefined();
    });
});

describe("ViolationDetector", () => {
    // Scenario: Just inside and just outside the radius
    it("should flag (250000, 349999) and not (250000, 350001)", () => {
        const detector = new ViolationDetector(zone);

        const detection = detector.detect({
            captureTime : 5000,
            observations: [observe("inside", 250000, 349999), observe("outside", 250000, 350001)],
        });

        expect(detection.captureTime).toBe(5000);
        expect(detection.observations).toHaveLength(2);
        expect(detection.violations).toEqual([
            { observation: observe("inside", 250000, 349999), distance: 99999 },
        ]);
    });

    // Scenario: The boundary counts, the distance is rounded up
    it("should include the boundary and round distances up", () => {
        const detector = new ViolationDetector(zone);

        expect(detector.isInside(100000)).toBe(true);
        expect(detector.isInside(99999.2)).toBe(true);
        expect(detector.isInside(100000.01)).toBe(false);
    });

    // Scenario: Distance uses both horizontal axes
    it("should measure the distance on both axes", () => {
        const detector = new ViolationDetector(zone);

        expect(detector.distanceToOrigin(observe("d", 250000 + 3000, 250000 - 4000))).toBe(5000);
    });

    // Scenario: Only the latest capture is checked
    it("should check only the latest capture of a report", () => {
        const detector = new ViolationDetector(zone);

        const detection = detector.detectLatest({
            captures: [
                { captureTime: 2000, observations: [observe("t2", 500000, 500000)] },
                { captureTime: 1000, observations: [observe("t1", 250000, 250000)] },
            ],
        });

        expect(detection?.captureTime).toBe(2000);
        expect(detection?.violations).toEqual([]);
        expect(detector.detectLatest({ captures: [] })).toBeUndefined();
    });

    it("should reject a negative radius", () => {
        expect(() => new ViolationDetector({ ...zone, radius: -1 })).toThrow(ValidationError);
    });
});
