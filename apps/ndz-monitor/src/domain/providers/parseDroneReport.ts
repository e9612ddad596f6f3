/**
 * @fileoverview Drone report parser
 *
 * Turns the XML report of the drone sensor into a DroneReport:
 *
 * ```xml
 * <report>
 *   <deviceInformation deviceId="GUARDB1">
 *     <listenRange>500000</listenRange>
 *     <updateIntervalMs>2000</updateIntervalMs>
 *   </deviceInformation>
 *   <capture snapshotTimestamp="2023-01-05T08:20:33.125Z">
 *     <drone>
 *       <serialNumber>SN-x1</serialNumber>
 *       <positionY>349999</positionY>
 *       <positionX>250000</positionX>
 *       <altitude>4321.5</altitude>
 *     </drone>
 *   </capture>
 * </report>
 * ```
 *
 * Element and attribute names come from the configuration. Any structural
 * problem fails the whole document with a ParseError.
 *
 * @module domain/providers/parseDroneReport
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError } from "@nestguard/engine";
import { getDefaultConfig, type ReportTagNames } from "../../config/loadConfig.js";
import type { Capture, DeviceInformation, DroneReport, Observation } from "../entities/Observation.js";

const kATTRIBUTE_PREFIX = "@_";

const kISO_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})$/;

type XmlNode = Record<string, unknown>;

/**
 * Parse an offset-aware ISO-8601 timestamp to epoch milliseconds.
 *
 * @throws ParseError for local times or unparseable text
 */
export function parseTimestamp(text: string): number {
    const trimmed = text.trim();
    if (!kISO_TIMESTAMP.test(trimmed)) {
        throw new ParseError(`Timestamp is not ISO-8601 with an offset: "${text}"`);
    }
    const millis = Date.parse(trimmed);
    if (Number.isNaN(millis)) {
        throw new ParseError(`Invalid timestamp: "${text}"`);
    }
    return millis;
}

/**
 * Parse a drone report document.
 *
 * @param xml - Response body
 * @param tags - Element and attribute names (default: the standard report)
 * @throws ParseError when the document is not a valid report
 */
export function parseDroneReport(xml: string, tags: ReportTagNames = getDefaultConfig().report): DroneReport {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        throw new ParseError(`Invalid XML at line ${validation.err.line}: ${validation.err.msg}`);
    }

    const capturePath = `${tags.root}.${tags.capture}`;
    const dronePath = `${capturePath}.${tags.drone}`;

    const parser = new XMLParser({
        ignoreAttributes   : false,
        attributeNamePrefix: kATTRIBUTE_PREFIX,
        parseTagValue      : false,
        parseAttributeValue: false,
        trimValues         : true,
        isArray            : (_name, jpath) => jpath === capturePath || jpath === dronePath,
    });

    const document: unknown = parser.parse(xml);
    const root = isNode(document) ? document[tags.root] : undefined;
    if (root === undefined) {
        throw new ParseError(`Missing <${tags.root}> element`);
    }
    if (!isNode(root)) {
        // <report/> or <report>text</report>
        return { captures: [] };
    }

    const deviceNode = root[tags.deviceInformation];
    return {
        device  : deviceNode === undefined ? undefined : readDevice(deviceNode, tags),
        captures: asList(root[tags.capture]).map((node, index) => readCapture(node, index, tags)),
    };
}

function readDevice(node: unknown, tags: ReportTagNames): DeviceInformation {
    if (!isNode(node)) {
        throw new ParseError(`<${tags.deviceInformation}> has no ${tags.deviceId}`);
    }

    const deviceId = textOf(node[kATTRIBUTE_PREFIX + tags.deviceId]);
    if (!deviceId) {
        throw new ParseError(`<${tags.deviceInformation}> has no ${tags.deviceId}`);
    }

    return {
        deviceId,
        listenRange     : optionalNumber(node, tags.listenRange, tags.deviceInformation),
        updateIntervalMs: optionalNumber(node, tags.updateInterval, tags.deviceInformation),
    };
}

function readCapture(node: unknown, index: number, tags: ReportTagNames): Capture {
    if (!isNode(node)) {
        throw new ParseError(`<${tags.capture}> #${index + 1} has no ${tags.captureTimestamp}`);
    }

    const stamp = textOf(node[kATTRIBUTE_PREFIX + tags.captureTimestamp]);
    if (!stamp) {
        throw new ParseError(`<${tags.capture}> #${index + 1} has no ${tags.captureTimestamp}`);
    }

    return {
        captureTime : parseTimestamp(stamp),
        observations: asList(node[tags.drone]).map((drone, droneIndex) => readDrone(drone, droneIndex, tags)),
    };
}

function readDrone(node: unknown, index: number, tags: ReportTagNames): Observation {
    const where = `<${tags.drone}> #${index + 1}`;
    if (!isNode(node)) {
        throw new ParseError(`${where} has no ${tags.serial}`);
    }

    const serial = textOf(node[tags.serial]);
    if (!serial) {
        throw new ParseError(`${where} has no ${tags.serial}`);
    }

    return {
        serial,
        x: requiredNumber(node, tags.x, `${where} (${serial})`),
        y: requiredNumber(node, tags.y, `${where} (${serial})`),
        z: requiredNumber(node, tags.z, `${where} (${serial})`),
    };
}

function requiredNumber(node: XmlNode, tag: string, where: string): number {
    const value = optionalNumber(node, tag, where);
    if (value === undefined) {
        throw new ParseError(`${where} has no <${tag}>`);
    }
    return value;
}

function optionalNumber(node: XmlNode, tag: string, where: string): number | undefined {
    const raw = node[tag];
    if (raw === undefined) {
        return undefined;
    }
    if (Array.isArray(raw)) {
        throw new ParseError(`${where} has more than one <${tag}>`);
    }

    const text = textOf(raw);
    const value = text ? Number(text) : NaN;
    if (!Number.isFinite(value)) {
        throw new ParseError(`${where} has a non-numeric <${tag}>: "${text ?? ""}"`);
    }
    return value;
}

function isNode(value: unknown): value is XmlNode {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Text content of a leaf, whether or not it carries attributes.
 */
function textOf(value: unknown): string | undefined {
    if (typeof value === "string") {
        return value.trim();
    }
    if (isNode(value)) {
        return textOf(value["#text"]);
    }
    return undefined;
}

function asList(value: unknown): unknown[] {
    if (value === undefined) {
        return [];
    }
    return Array.isArray(value) ? value : [value];
}
