/**
 * @fileoverview Unit tests for the monitor configuration loader
 *
 * Tests cover:
 * - Loading a complete monitor.yml
 * - Defaults for missing keys and empty files
 * - Validation errors for invalid values
 * - Environment overrides
 *
 * @module config/__tests__/loadConfig
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import {
    getDefaultConfig,
    loadConfig,
    resolveConfigPath,
} from "../config/loadConfig.js";
import { ConfigurationError } from "../domain/errors.js";

// Mock the fs module
vi.mock("fs", () => ({
    readFileSync: vi.fn(),
    existsSync  : vi.fn(),
}));

import { readFileSync, existsSync } from "fs";

const mockExistsSync = vi.mocked(existsSync);
const mockReadFileSync = vi.mocked(readFileSync);

function givenFile(content: string): void {
    mockExistsSync.mockReturnValue(true);
    mockReadFileSync.mockReturnValue(content);
}

describe("loadConfig", () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    afterEach(() => {
        vi.clearAllMocks();
    });

    describe("loadConfig", () => {
        // Scenario: Load a complete configuration file
        it("should load and validate every section", () => {
            givenFile(`
feeds:
  snapshotUrl: https://feeds.example.test/drones
  pilotBaseUrl: https://feeds.example.test/pilots/
zone:
  originX: 1000
  originY: 2000
  radius: 500
retentionMinutes: 5
pollIntervalMs: 1500
requestTimeoutMs: 3000
retry:
  maxRetries: 3
  backoffUnitMs: 50
idleDelayMs: 100
report:
  drone: craft
logLevel: warn
`);

            const config = loadConfig("/etc/ndz/monitor.yml", {});

            expect(mockReadFileSync).toHaveBeenCalledWith("/etc/ndz/monitor.yml", "utf-8");
            expect(config.feeds).toEqual({
                snapshotUrl : "https://feeds.example.test/drones",
                pilotBaseUrl: "https://feeds.example.test/pilots/",
            });
            expect(config.zone).toEqual({ originX: 1000, originY: 2000, radius: 500 });
            expect(config.retentionMinutes).toBe(5);
            expect(config.pollIntervalMs).toBe(1500);
            expect(config.requestTimeoutMs).toBe(3000);
            expect(config.retry).toEqual({ maxRetries: 3, backoffUnitMs: 50 });
            expect(config.idleDelayMs).toBe(100);
            expect(config.report.drone).toBe("craft");
            expect(config.report.serial).toBe("serialNumber");
            expect(config.logLevel).toBe("warn");
        });

        // Scenario: An empty file yields the defaults
        it("should return the defaults for an empty file", () => {
            givenFile("");

            expect(loadConfig("/etc/ndz/monitor.yml", {})).toEqual(getDefaultConfig());
        });

        // Scenario: The pilot base address always acts as a directory
        it("should append a trailing slash to the pilot base address", () => {
            givenFile(`
feeds:
  pilotBaseUrl: https://feeds.example.test/pilots
`);

            expect(loadConfig("/etc/ndz/monitor.yml", {}).feeds.pilotBaseUrl)
                .toBe("https://feeds.example.test/pilots/");
        });

        // Scenario: Missing file
        it("should throw ConfigurationError when the file does not exist", () => {
            mockExistsSync.mockReturnValue(false);

            expect(() => loadConfig("/missing.yml", {})).toThrow(ConfigurationError);
            expect(() => loadConfig("/missing.yml", {})).toThrow("Configuration file not found: /missing.yml");
            expect(mockReadFileSync).not.toHaveBeenCalled();
        });

        // Scenario: YAML that does not parse
        it("should throw ConfigurationError for invalid YAML", () => {
            givenFile("zone: [1, 2");

            expect(() => loadConfig("/etc/ndz/monitor.yml", {})).toThrow(/^Invalid YAML in \/etc\/ndz\/monitor\.yml/);
        });

        // Scenario: Top level must be a mapping
        it("should reject a top-level list", () => {
            givenFile("- a\n- b\n");

            expect(() => loadConfig("/etc/ndz/monitor.yml", {}))
                .toThrow("Invalid configuration file format: expected a mapping at the top level");
        });

        it.each([
            ["zone:\n  radius: -1\n", "Invalid 'zone.radius': must not be negative, got -1"],
            ["zone:\n  radius: wide\n", "Invalid 'zone.radius': expected a number"],
            ["zone: 12\n", "Invalid 'zone': expected a mapping"],
            ["retentionMinutes: 0\n", "Invalid 'retentionMinutes': must be positive, got 0"],
            ["retry:\n  maxRetries: 1.5\n", "Invalid 'retry.maxRetries': expected an integer, got 1.5"],
            ["feeds:\n  snapshotUrl: ftp://feeds.example.test/drones\n", "Invalid 'feeds.snapshotUrl': expected an http or https URL, got \"ftp://feeds.example.test/drones\""],
            ["feeds:\n  pilotBaseUrl: pilots/\n", "Invalid 'feeds.pilotBaseUrl': \"pilots/\" is not an absolute URL"],
            ["logLevel: verbose\n", "Invalid 'logLevel': expected debug, info, warn or error, got \"verbose\""],
            ["report:\n  drone: two words\n", "Invalid 'report.drone': \"two words\" is not an XML name"],
        ])("should reject %j", (yaml, message) => {
            givenFile(yaml);

            expect(() => loadConfig("/etc/ndz/monitor.yml", {})).toThrow(message);
        });
    });

    describe("environment overrides", () => {
        // Scenario: Environment values win over the file
        it("should apply environment overrides after the file", () => {
            givenFile(`
feeds:
  snapshotUrl: https://feeds.example.test/drones
retentionMinutes: 10
logLevel: info
`);

            const config = loadConfig("/etc/ndz/monitor.yml", {
                NDZ_SNAPSHOT_URL     : "http://localhost:9000/drones",
                NDZ_PILOT_BASE_URL   : "http://localhost:9000/pilots",
                NDZ_RETENTION_MINUTES: "2.5",
                NDZ_POLL_INTERVAL_MS : "500",
                NDZ_LOG_LEVEL        : "debug",
            });

            expect(config.feeds).toEqual({
                snapshotUrl : "http://localhost:9000/drones",
                pilotBaseUrl: "http://localhost:9000/pilots/",
            });
            expect(config.retentionMinutes).toBe(2.5);
            expect(config.pollIntervalMs).toBe(500);
            expect(config.logLevel).toBe("debug");
        });

        // Scenario: Blank variables count as unset
        it("should ignore blank environment variables", () => {
            givenFile("retentionMinutes: 7\n");

            expect(loadConfig("/etc/ndz/monitor.yml", { NDZ_RETENTION_MINUTES: "  " }).retentionMinutes).toBe(7);
        });

        // Scenario: Numeric overrides are validated
        it("should reject a non-numeric override", () => {
            givenFile("");

            expect(() => loadConfig("/etc/ndz/monitor.yml", { NDZ_POLL_INTERVAL_MS: "fast" }))
                .toThrow("Invalid NDZ_POLL_INTERVAL_MS: expected a finite number");
            expect(() => loadConfig("/etc/ndz/monitor.yml", { NDZ_RETENTION_MINUTES: "-3" }))
                .toThrow("Invalid NDZ_RETENTION_MINUTES: must be positive, got -3");
        });
    });

    describe("resolveConfigPath", () => {
        // Scenario: NDZ_CONFIG picks the file
        it("should prefer NDZ_CONFIG over the fallback", () => {
            expect(resolveConfigPath("/app/config/monitor.yml", { NDZ_CONFIG: "/etc/ndz.yml" })).toBe("/etc/ndz.yml");
            expect(resolveConfigPath("/app/config/monitor.yml", {})).toBe("/app/config/monitor.yml");
        });
    });
});
