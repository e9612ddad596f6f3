/**
 * @fileoverview Pilot record
 *
 * Identity record of a drone's pilot, kept in the identity registry while
 * the drone is recently seen. A record is built field by field from the
 * lookup response and then sealed; sealed records are frozen and only
 * change through mergeDistance() and extendExpiry(), each of which returns
 * a new sealed value.
 *
 * @module domain/entities/PilotRecord
 */

import { ValidationError } from "@nestguard/engine";

/**
 * Identity fields a lookup may fill in.
 */
export interface PilotIdentity {
    firstName?: string;
    lastName?: string;
    email?: string;
    phone?: string;
    pilotId?: string;
}

/**
 * Fields assignable while a record is being built.
 */
export interface PilotDraftFields extends PilotIdentity {
    droneSerial?: string;
    closestDistanceToNest?: number;
    expireTime?: number;

    /** Display name used when the lookup yields no first or last name */
    placeholderName?: string;

    /** The record was not built from a successful lookup */
    stub: boolean;

    /** The lookup failed transiently and should be tried again */
    lookupPending: boolean;
}

/**
 * A record under construction.
 */
export type PilotDraft = { readonly state: "building" } & PilotDraftFields;

/**
 * A sealed, frozen record.
 */
export interface SealedPilot extends Readonly<PilotIdentity> {
    readonly state: "sealed";
    readonly droneSerial: string;

    /** Display name: first and last name, or the placeholder */
    readonly name: string;

    /** Monotonically non-increasing across updates */
    readonly closestDistanceToNest: number;

    /** Epoch milliseconds; monotonically non-decreasing across updates */
    readonly expireTime: number;

    readonly stub: boolean;
    readonly lookupPending: boolean;
}

export type PilotRecord = PilotDraft | SealedPilot;

export type PilotField = Exclude<keyof PilotDraftFields, "stub" | "lookupPending">;

/**
 * Start building a record for a drone.
 */
export function createPilotDraft(droneSerial?: string): PilotDraft {
    return {
        state        : "building",
        droneSerial,
        stub         : false,
        lookupPending: false,
    };
}

/**
 * Assign a field of a record under construction.
 *
 * @throws ValidationError if the record is already sealed
 */
export function assignPilotField<K extends PilotField>(
    record: PilotRecord,
    field: K,
    value: PilotDraftFields[K]
): void {
    if (record.state === "sealed") {
        throw new ValidationError(`Cannot assign "${field}" of sealed pilot record ${record.droneSerial}`);
    }

    const fields: PilotDraftFields = record;
    fields[field] = value;
}

/**
 * Seal a record. The draft is left untouched.
 *
 * @param draft - Record under construction
 * @param now - Epoch milliseconds; the record must not already be expired
 * @throws ValidationError naming the first missing or invalid field
 */
export function sealPilot(draft: PilotDraft, now: number): SealedPilot {
    const droneSerial = draft.droneSerial?.trim();
    if (!droneSerial) {
        throw new ValidationError("Pilot record needs a drone serial");
    }

    const distance = draft.closestDistanceToNest;
    if (distance === undefined || !Number.isFinite(distance) || distance < 0) {
        throw new ValidationError(`Pilot record ${droneSerial} has an invalid distance: ${distance}`);
    }

    const name = displayName(draft);
    if (!name) {
        throw new ValidationError(`Pilot record ${droneSerial} has no name`);
    }

    const expireTime = draft.expireTime;
    if (expireTime === undefined || !Number.isFinite(expireTime)) {
        throw new ValidationError(`Pilot record ${droneSerial} has no expiry time`);
    }
    if (now >= expireTime) {
        throw new ValidationError(`Pilot record ${droneSerial} expired at ${new Date(expireTime).toISOString()}`);
    }

    return Object.freeze({
        state                : "sealed",
        droneSerial,
        name,
        firstName            : draft.firstName,
        lastName             : draft.lastName,
        email                : draft.email,
        phone                : draft.phone,
        pilotId              : draft.pilotId,
        closestDistanceToNest: distance,
        expireTime,
        stub                 : draft.stub,
        lookupPending        : draft.lookupPending,
    });
}

/**
 * Build and seal a stub record named after the drone serial.
 *
 * @param lookupPending - Whether the lookup should be tried again later
 */
export function sealStubPilot(
    droneSerial: string,
    distance: number,
    expireTime: number,
    now: number,
    lookupPending = false
): SealedPilot {
    const draft = createPilotDraft(droneSerial);
    assignPilotField(draft, "placeholderName", droneSerial);
    assignPilotField(draft, "closestDistanceToNest", distance);
    assignPilotField(draft, "expireTime", expireTime);
    draft.stub = true;
    draft.lookupPending = lookupPending;
    return sealPilot(draft, now);
}

/**
 * Keep the smaller of the recorded and the observed distance.
 * Returns the same record when nothing changes.
 */
export function mergeDistance(pilot: SealedPilot, distance: number): SealedPilot {
    if (!Number.isFinite(distance) || distance < 0) {
        throw new ValidationError(`Invalid distance for ${pilot.droneSerial}: ${distance}`);
    }
    if (distance >= pilot.closestDistanceToNest) {
        return pilot;
    }
    return Object.freeze({ ...pilot, closestDistanceToNest: distance });
}

/**
 * Move the expiry forward; an earlier time leaves the record as it is.
 */
export function extendExpiry(pilot: SealedPilot, expireTime: number): SealedPilot {
    if (expireTime <= pilot.expireTime) {
        return pilot;
    }
    return Object.freeze({ ...pilot, expireTime });
}

/**
 * Whether the record is still valid at `now`.
 */
export function isPilotActive(pilot: SealedPilot, now: number): boolean {
    return now < pilot.expireTime;
}

function displayName(fields: PilotDraftFields): string | undefined {
    const full = [fields.firstName, fields.lastName]
        .map((part) => part?.trim())
        .filter((part): part is string => Boolean(part))
        .join(" ");
    return full || fields.placeholderName?.trim() || undefined;
}
