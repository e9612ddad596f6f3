/**
 * @fileoverview Unit tests for the drone report parser
 *
 * @module domain/providers/__tests__/parseDroneReport
 */

import { describe, it, expect } from "vitest";
import { ParseError } from "@nestguard/engine";
import { parseDroneReport, parseTimestamp } from "../domain/providers/parseDroneReport.js";
import { getDefaultConfig } from "../config/loadConfig.js";

function drone(serial: string, x: number | string, y: number | string, z: number | string = 1000): string {
    return `
    <drone>
      <serialNumber>${serial}</serialNumber>
      <model>HRP-DRONE-PRO</model>
      <positionY>${y}</positionY>
      <positionX>${x}</positionX>
      <altitude>${z}</altitude>
    </drone>`;
}

function report(captures: string, device = ""): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<report>${device}${captures}
</report>`;
}

describe("parseDroneReport", () => {
    // Scenario: A report with device information and one capture
    it("should parse the device and its captures", () => {
        const xml = report(
            `<capture snapshotTimestamp="2023-01-05T08:20:33.125Z">${drone("SN-a1", "250000", 349999, "4321.5")}${drone("SN-b2", 1, 2)}</capture>`,
            `<deviceInformation deviceId="GUARDB1"><listenRange>500000</listenRange><updateIntervalMs>2000</updateIntervalMs></deviceInformation>`
        );

        const parsed = parseDroneReport(xml);

        expect(parsed.device).toEqual({ deviceId: "GUARDB1", listenRange: 500000, updateIntervalMs: 2000 });
        expect(parsed.captures).toEqual([{
            captureTime : Date.UTC(2023, 0, 5, 8, 20, 33, 125),
            observations: [
                { serial: "SN-a1", x: 250000, y: 349999, z: 4321.5 },
                { serial: "SN-b2", x: 1, y: 2, z: 1000 },
            ],
        }]);
    });

    // Scenario: Several captures and a capture without drones
    it("should keep every capture in document order", () => {
        const xml = report(
            `<capture snapshotTimestamp="2023-01-05T08:20:33Z">${drone("SN-a1", 1, 1)}</capture>
             <capture snapshotTimestamp="2023-01-05T10:20:35+02:00"></capture>`
        );

        const parsed = parseDroneReport(xml);

        expect(parsed.device).toBeUndefined();
        expect(parsed.captures.map((capture) => capture.captureTime)).toEqual([
            Date.UTC(2023, 0, 5, 8, 20, 33),
            Date.UTC(2023, 0, 5, 8, 20, 35),
        ]);
        expect(parsed.captures[1]?.observations).toEqual([]);
    });

    // Scenario: Configured element names are honoured
    it("should read configured element names", () => {
        const tags = { ...getDefaultConfig().report, drone: "craft", serial: "id" };
        const xml = `<report><capture snapshotTimestamp="2023-01-05T08:20:33Z">
            <craft><id>C-1</id><positionX>5</positionX><positionY>6</positionY><altitude>7</altitude></craft>
        </capture></report>`;

        expect(parseDroneReport(xml, tags).captures[0]?.observations).toEqual([
            { serial: "C-1", x: 5, y: 6, z: 7 },
        ]);
    });

    // Scenario: An empty report has no captures
    it("should return no captures for an empty report", () => {
        expect(parseDroneReport("<report/>")).toEqual({ captures: [] });
    });

    it.each([
        ["not xml", "<report><capture>", /^Invalid XML at line/],
        ["a different root", "<feed></feed>", "Missing <report> element"],
        ["a capture without timestamp", report(`<capture>${drone("SN-a1", 1, 1)}</capture>`), "<capture> #1 has no snapshotTimestamp"],
        ["a local timestamp", report(`<capture snapshotTimestamp="2023-01-05T08:20:33">${drone("SN-a1", 1, 1)}</capture>`), 'Timestamp is not ISO-8601 with an offset: "2023-01-05T08:20:33"'],
        ["a drone without serial", report(`<capture snapshotTimestamp="2023-01-05T08:20:33Z"><drone><positionX>1</positionX></drone></capture>`), "<drone> #1 has no serialNumber"],
        ["a non-numeric position", report(`<capture snapshotTimestamp="2023-01-05T08:20:33Z">${drone("SN-a1", "east", 1)}</capture>`), '<drone> #1 (SN-a1) has a non-numeric <positionX>: "east"'],
        ["a missing altitude", report(`<capture snapshotTimestamp="2023-01-05T08:20:33Z"><drone><serialNumber>SN-a1</serialNumber><positionX>1</positionX><positionY>2</positionY></drone></capture>`), "<drone> #1 (SN-a1) has no <altitude>"],
    ])("should fail with ParseError for %s", (_label, xml, message) => {
        expect(() => parseDroneReport(xml)).toThrow(ParseError);
        expect(() => parseDroneReport(xml)).toThrow(message);
    });
});

describe("parseTimestamp", () => {
    // Scenario: Offsets are honoured
    it("should convert offset timestamps to epoch milliseconds", () => {
        expect(parseTimestamp("2023-01-05T10:00:00+02:00")).toBe(Date.UTC(2023, 0, 5, 8));
        expect(parseTimestamp(" 2023-01-05T08:00:00.5Z ")).toBe(Date.UTC(2023, 0, 5, 8, 0, 0, 500));
    });

    // Scenario: Calendar-invalid dates are rejected
    it("should reject an impossible date", () => {
        expect(() => parseTimestamp("2023-13-45T08:00:00Z")).toThrow('Invalid timestamp: "2023-13-45T08:00:00Z"');
    });
});
