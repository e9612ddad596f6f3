/**
 * @fileoverview Monitor configuration loader
 *
 * Loads the monitor settings from a YAML file, fills in defaults and
 * applies environment overrides.
 *
 * Environment overrides (applied after the file):
 * - NDZ_SNAPSHOT_URL      → feeds.snapshotUrl
 * - NDZ_PILOT_BASE_URL    → feeds.pilotBaseUrl
 * - NDZ_RETENTION_MINUTES → retentionMinutes
 * - NDZ_POLL_INTERVAL_MS  → pollIntervalMs
 * - NDZ_LOG_LEVEL         → logLevel
 *
 * NDZ_CONFIG selects the file itself; see resolveConfigPath().
 *
 * @module config/loadConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { describeError, isLogLevel, type LogLevel } from "@nestguard/engine";
import { ConfigurationError } from "../domain/errors.js";

/**
 * Element and attribute names of the drone report.
 */
export interface ReportTagNames {
    readonly root: string;
    readonly deviceInformation: string;
    readonly deviceId: string;
    readonly listenRange: string;
    readonly updateInterval: string;
    readonly capture: string;
    readonly captureTimestamp: string;
    readonly drone: string;
    readonly serial: string;
    readonly x: string;
    readonly y: string;
    readonly z: string;
}

/**
 * Circular no-drone zone. Coordinates and radius in millimetres.
 */
export interface ZoneConfig {
    readonly originX: number;
    readonly originY: number;
    readonly radius: number;
}

/**
 * Validated monitor configuration
 */
export interface MonitorConfig {
    readonly feeds: {
        /** Drone report address */
        readonly snapshotUrl: string;

        /** Pilot lookup base address, always ending with "/" */
        readonly pilotBaseUrl: string;
    };
    readonly zone: ZoneConfig;

    /** How long a violator stays listed after its last sighting */
    readonly retentionMinutes: number;

    /** Nominal snapshot poll interval */
    readonly pollIntervalMs: number;

    readonly requestTimeoutMs: number;
    readonly retry: {
        readonly maxRetries: number;
        readonly backoffUnitMs: number;
    };

    /** Registry updater delay when there is no new capture */
    readonly idleDelayMs: number;

    readonly report: ReportTagNames;
    readonly logLevel: LogLevel;
}

/**
 * Environment variables read by loadConfig().
 */
export type ConfigEnvironment = Readonly<Record<string, string | undefined>>;

type RawSection = Record<string, unknown>;

type NumberRule = "positive" | "non-negative" | "any";

/**
 * Get the default configuration.
 */
export function getDefaultConfig(): MonitorConfig {
    return {
        feeds           : {
            snapshotUrl : "http://localhost:8080/birdnest/drones",
            pilotBaseUrl: "http://localhost:8080/birdnest/pilots/",
        },
        zone            : {
            originX: 250000,
            originY: 250000,
            radius : 100000,
        },
        retentionMinutes: 10,
        pollIntervalMs  : 2000,
        requestTimeoutMs: 10000,
        retry           : {
            maxRetries   : 5,
            backoffUnitMs: 100,
        },
        idleDelayMs     : 250,
        report          : {
            root             : "report",
            deviceInformation: "deviceInformation",
            deviceId         : "deviceId",
            listenRange      : "listenRange",
            updateInterval   : "updateIntervalMs",
            capture          : "capture",
            captureTimestamp : "snapshotTimestamp",
            drone            : "drone",
            serial           : "serialNumber",
            x                : "positionX",
            y                : "positionY",
            z                : "altitude",
        },
        logLevel        : "info",
    };
}

/**
 * Pick the configuration file: NDZ_CONFIG when set, else the fallback.
 */
export function resolveConfigPath(fallback: string, env: ConfigEnvironment = process.env): string {
    const fromEnv = env.NDZ_CONFIG?.trim();
    return fromEnv ? fromEnv : fallback;
}

/**
 * Load the monitor configuration from a YAML file.
 *
 * Missing keys take their defaults; present keys must be valid.
 *
 * @param filePath - Path to monitor.yml
 * @param env - Environment overrides (default: process.env)
 * @throws ConfigurationError if the file doesn't exist or a value is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig("./config/monitor.yml");
 * console.log(config.zone.radius);
 * // 100000
 * ```
 */
export function loadConfig(filePath: string, env: ConfigEnvironment = process.env): MonitorConfig {
    if (!existsSync(filePath)) {
        throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");

    let parsed: unknown;
    try {
        parsed = parseYaml(content);
    }
    catch (error) {
        throw new ConfigurationError(`Invalid YAML in ${filePath}: ${describeError(error)}`, { cause: error });
    }

    if (parsed === null || parsed === undefined) {
        parsed = {};
    }
    if (!isRecord(parsed)) {
        throw new ConfigurationError("Invalid configuration file format: expected a mapping at the top level");
    }

    return buildConfig(parsed, env);
}

/**
 * Validate a raw configuration object and apply environment overrides.
 */
export function buildConfig(raw: RawSection, env: ConfigEnvironment = {}): MonitorConfig {
    const defaults = getDefaultConfig();
    const feeds = readSection(raw, "feeds");
    const zone = readSection(raw, "zone");
    const retry = readSection(raw, "retry");
    const report = readSection(raw, "report");
    const retentionOverride = envValue(env, "NDZ_RETENTION_MINUTES");
    const intervalOverride = envValue(env, "NDZ_POLL_INTERVAL_MS");

    const snapshotUrl = envValue(env, "NDZ_SNAPSHOT_URL") ?? readString(feeds, "feeds.snapshotUrl", defaults.feeds.snapshotUrl);
    const pilotBaseUrl = envValue(env, "NDZ_PILOT_BASE_URL") ?? readString(feeds, "feeds.pilotBaseUrl", defaults.feeds.pilotBaseUrl);

    const logLevel = envValue(env, "NDZ_LOG_LEVEL") ?? readString(raw, "logLevel", defaults.logLevel);
    if (!isLogLevel(logLevel)) {
        throw new ConfigurationError(`Invalid 'logLevel': expected debug, info, warn or error, got "${logLevel}"`);
    }

    return {
        feeds           : {
            snapshotUrl : requireHttpUrl("feeds.snapshotUrl", snapshotUrl),
            pilotBaseUrl: asDirectory(requireHttpUrl("feeds.pilotBaseUrl", pilotBaseUrl)),
        },
        zone            : {
            originX: readNumber(zone, "zone.originX", defaults.zone.originX, "any"),
            originY: readNumber(zone, "zone.originY", defaults.zone.originY, "any"),
            radius : readNumber(zone, "zone.radius", defaults.zone.radius, "non-negative"),
        },
        retentionMinutes: retentionOverride !== undefined
            ? parseEnvNumber("NDZ_RETENTION_MINUTES", retentionOverride)
            : readNumber(raw, "retentionMinutes", defaults.retentionMinutes, "positive"),
        pollIntervalMs  : intervalOverride !== undefined
            ? parseEnvNumber("NDZ_POLL_INTERVAL_MS", intervalOverride)
            : readNumber(raw, "pollIntervalMs", defaults.pollIntervalMs, "positive"),
        requestTimeoutMs: readNumber(raw, "requestTimeoutMs", defaults.requestTimeoutMs, "positive"),
        retry           : {
            maxRetries   : readNumber(retry, "retry.maxRetries", defaults.retry.maxRetries, "non-negative", true),
            backoffUnitMs: readNumber(retry, "retry.backoffUnitMs", defaults.retry.backoffUnitMs, "non-negative"),
        },
        idleDelayMs     : readNumber(raw, "idleDelayMs", defaults.idleDelayMs, "positive"),
        report          : readTagNames(report, defaults.report),
        logLevel,
    };
}

function readTagNames(raw: RawSection, defaults: ReportTagNames): ReportTagNames {
    const name = (key: keyof ReportTagNames): string => {
        const value = readString(raw, `report.${key}`, defaults[key]);
        if (!/^[A-Za-z_][\w.-]*$/.test(value)) {
            throw new ConfigurationError(`Invalid 'report.${key}': "${value}" is not an XML name`);
        }
        return value;
    };

    return {
        root             : name("root"),
        deviceInformation: name("deviceInformation"),
        deviceId         : name("deviceId"),
        listenRange      : name("listenRange"),
        updateInterval   : name("updateInterval"),
        capture          : name("capture"),
        captureTimestamp : name("captureTimestamp"),
        drone            : name("drone"),
        serial           : name("serial"),
        x                : name("x"),
        y                : name("y"),
        z                : name("z"),
    };
}

function isRecord(value: unknown): value is RawSection {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readSection(raw: RawSection, key: string): RawSection {
    const value = raw[key];
    if (value === undefined || value === null) {
        return {};
    }
    if (!isRecord(value)) {
        throw new ConfigurationError(`Invalid '${key}': expected a mapping`);
    }
    return value;
}

function lastKey(path: string): string {
    return path.slice(path.lastIndexOf(".") + 1);
}

function readString(raw: RawSection, path: string, fallback: string): string {
    const value = raw[lastKey(path)];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigurationError(`Invalid '${path}': expected a non-empty string`);
    }
    return value.trim();
}

function readNumber(
    raw: RawSection,
    path: string,
    fallback: number,
    rule: NumberRule,
    integer = false
): number {
    const value = raw[lastKey(path)];
    if (value === undefined || value === null) {
        return fallback;
    }
    if (typeof value !== "number") {
        throw new ConfigurationError(`Invalid '${path}': expected a number`);
    }
    return checkNumber(`'${path}'`, value, rule, integer);
}

/**
 * Read an environment variable; blank counts as unset.
 */
function envValue(env: ConfigEnvironment, name: string): string | undefined {
    const value = env[name]?.trim();
    return value ? value : undefined;
}

function parseEnvNumber(name: string, raw: string): number {
    const value = Number(raw);
    return checkNumber(name, value, "positive", false);
}

function checkNumber(label: string, value: number, rule: NumberRule, integer: boolean): number {
    if (!Number.isFinite(value)) {
        throw new ConfigurationError(`Invalid ${label}: expected a finite number`);
    }
    if (integer && !Number.isInteger(value)) {
        throw new ConfigurationError(`Invalid ${label}: expected an integer, got ${value}`);
    }
    if (rule === "positive" && value <= 0) {
        throw new ConfigurationError(`Invalid ${label}: must be positive, got ${value}`);
    }
    if (rule === "non-negative" && value < 0) {
        throw new ConfigurationError(`Invalid ${label}: must not be negative, got ${value}`);
    }
    return value;
}

function requireHttpUrl(path: string, value: string): string {
    let url: URL;
    try {
        url = new URL(value);
    }
    catch (error) {
        throw new ConfigurationError(`Invalid '${path}': "${value}" is not an absolute URL`, { cause: error });
    }
    if (url.protocol !== "http:" && url.protocol !== "https:") {
        throw new ConfigurationError(`Invalid '${path}': expected an http or https URL, got "${value}"`);
    }
    return value;
}

function asDirectory(url: string): string {
    return url.endsWith("/") ? url : `${url}/`;
}
