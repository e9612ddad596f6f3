/**
 * @fileoverview Domain errors
 *
 * Failures specific to drone monitoring. They extend the engine's
 * NestguardError so that callers can switch on `code` and `retryable`
 * the same way for every failure.
 *
 * @module domain/errors
 */

import { NestguardError } from "@nestguard/engine";

/**
 * A pilot lookup was refused because the violation lies outside the
 * retention window. Never retried.
 */
export class PrivacyRejectedError extends NestguardError {
    readonly serial: string;

    constructor(serial: string, captureTime: number) {
        super(
            "PRIVACY_REJECTED",
            `Pilot lookup for ${serial} refused: capture at ${new Date(captureTime).toISOString()} is outside the retention window`,
            false
        );
        this.serial = serial;
    }
}

/**
 * The identity feed has no pilot for the serial.
 */
export class NotFoundError extends NestguardError {
    readonly serial: string;

    constructor(serial: string) {
        super("NOT_FOUND", `No pilot found for drone ${serial}`, false);
        this.serial = serial;
    }
}

/**
 * The identity feed answered with a body that is not a pilot.
 */
export class MalformedResponseError extends NestguardError {
    constructor(message: string, options?: ErrorOptions) {
        super("MALFORMED_RESPONSE", message, false, options);
    }
}

/**
 * Configuration is missing or invalid. Fatal at startup.
 */
export class ConfigurationError extends NestguardError {
    constructor(message: string, options?: ErrorOptions) {
        super("CONFIGURATION", message, false, options);
    }
}
