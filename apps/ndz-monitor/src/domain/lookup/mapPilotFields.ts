/**
 * @fileoverview Pilot field mapping
 *
 * Explicit mapping from the identity feed's JSON keys to pilot record
 * fields. Known keys are copied, `createdDt` is dropped silently and any
 * other key is logged and dropped.
 *
 * @module domain/lookup/mapPilotFields
 */

import { defaultLogger, type EngineLogger } from "@nestguard/engine";
import type { PilotIdentity } from "../entities/PilotRecord.js";
import { MalformedResponseError } from "../errors.js";

/**
 * JSON key → record field; `null` marks a known key that is not kept.
 */
const kFIELD_MAP: ReadonlyMap<string, keyof PilotIdentity | null> = new Map<string, keyof PilotIdentity | null>([
    ["pilotId", "pilotId"],
    ["firstName", "firstName"],
    ["lastName", "lastName"],
    ["email", "email"],
    ["phoneNumber", "phone"],
    ["phone", "phone"],
    ["createdDt", null],
]);

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Map a parsed identity feed body to pilot identity fields.
 *
 * JSON `null` counts as a missing field.
 *
 * @param body - Parsed JSON
 * @param serial - Drone serial, for log context
 * @throws MalformedResponseError when the body is not an object or a known
 *   field is not a string
 */
export function mapPilotFields(
    body: unknown,
    serial: string,
    logger: EngineLogger = defaultLogger
): PilotIdentity {
    if (!isObject(body)) {
        throw new MalformedResponseError(
            `Pilot response for ${serial} is not a JSON object`
        );
    }

    const identity: PilotIdentity = {};
    for (const [key, value] of Object.entries(body)) {
        const field = kFIELD_MAP.get(key);

        if (field === undefined) {
            logger.info("Ignoring unknown pilot field", { serial, field: key });
            continue;
        }
        if (field === null || value === null) {
            continue;
        }
        if (typeof value !== "string") {
            throw new MalformedResponseError(
                `Pilot field "${key}" for ${serial} must be a string, got ${typeof value}`
            );
        }

        identity[field] = value;
    }

    return identity;
}
