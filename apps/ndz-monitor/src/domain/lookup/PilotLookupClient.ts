/**
 * @fileoverview Pilot lookup client
 *
 * Resolves the pilot of a violating drone through the identity feed
 * (`GET {base}/{serial}`). The request goes through the engine's
 * HttpSource; a status handler turns 404 into "not found" and the body is
 * mapped field by field.
 *
 * The client never retries. Results are classified so the registry can
 * decide between a full record, a stub and nothing at all.
 *
 * @module domain/lookup/PilotLookupClient
 */

import {
    HttpSource,
    ParseError,
    PathTemplate,
    ResourceSegment,
    TransportError,
    ValidationError,
    createPrefixedLogger,
    defaultLogger,
    describeError,
    stringParameter,
    type EngineLogger,
    type EventBus,
    type FetchFunction,
    type SourceResponse,
} from "@nestguard/engine";
import {
    assignPilotField,
    createPilotDraft,
    sealPilot,
    type SealedPilot,
} from "../entities/PilotRecord.js";
import {
    MalformedResponseError,
    NotFoundError,
    PrivacyRejectedError,
} from "../errors.js";
import { mapPilotFields } from "./mapPilotFields.js";

/**
 * Everything a lookup can fail with.
 */
export type LookupError =
    | PrivacyRejectedError
    | NotFoundError
    | MalformedResponseError
    | TransportError
    | ValidationError;

/**
 * Outcome of a lookup.
 */
export type LookupResult =
    | { readonly ok: true; readonly record: SealedPilot }
    | { readonly ok: false; readonly error: LookupError };

/**
 * Anything that resolves pilots; the registry depends on this only.
 */
export interface PilotLookup {
    lookup(serial: string, violationTime: number, distance: number): Promise<LookupResult>;
}

/**
 * Configuration for the lookup client
 */
export interface PilotLookupClientConfig {
    /** Absolute base address; serials are appended as a path segment */
    baseUrl: string;

    /** Retention window; also the lifetime of a fresh record */
    retentionMs: number;

    timeoutMs?: number;
    fetch?: FetchFunction;
    eventBus?: EventBus;
    logger?: EngineLogger;

    /** Clock (default: Date.now) */
    now?: () => number;
}

/**
 * Response body as seen by the client.
 */
type LookupBody =
    | { readonly kind: "found"; readonly body: string }
    | { readonly kind: "not-found" };

const notFoundHandler = (response: SourceResponse): LookupBody | undefined =>
    response.status === 404 ? { kind: "not-found" } : undefined;

/**
 * Pilot Lookup Client
 *
 * @example
 * ```typescript
 * const client = new PilotLookupClient({
 *     baseUrl    : "https://example.test/birdnest/pilots/",
 *     retentionMs: 10 * 60_000,
 * });
 *
 * const result = await client.lookup("SN-x1", captureTime, 4200);
 * if (result.ok) {
 *     console.log(result.record.name);
 * }
 * ```
 */
export class PilotLookupClient implements PilotLookup {
    /** `{serial}` under the base address */
    readonly template = new PathTemplate([
        new ResourceSegment("", [stringParameter("serial", /[-\w]+/)]),
    ]);

    private readonly source: HttpSource<LookupBody>;
    private readonly baseUrl: string;
    private readonly retentionMs: number;
    private readonly logger: EngineLogger;
    private readonly now: () => number;

    constructor(config: PilotLookupClientConfig) {
        if (!(config.retentionMs > 0)) {
            throw new ValidationError(`retentionMs must be positive, got ${config.retentionMs}`);
        }

        this.baseUrl = config.baseUrl;
        this.retentionMs = config.retentionMs;
        this.logger = createPrefixedLogger(config.logger ?? defaultLogger, "pilot-lookup");
        this.now = config.now ?? Date.now;

        this.source = new HttpSource<LookupBody>({
            id            : "pilot-lookup",
            url           : config.baseUrl,
            parse         : (body) => ({ kind: "found", body }),
            statusHandlers: [notFoundHandler],
            headers       : { accept: "application/json" },
            timeoutMs     : config.timeoutMs,
            fetch         : config.fetch,
            eventBus      : config.eventBus,
            logger        : config.logger,
            now           : config.now,
        });
    }

    /**
     * Whether a violation at `violationTime` may be looked up now.
     */
    withinRetention(violationTime: number): boolean {
        const now = this.now();
        return violationTime <= now && now <= violationTime + this.retentionMs;
    }

    /**
     * Address of a serial's pilot.
     *
     * @throws ValidationError if the serial is not a valid path parameter
     */
    addressOf(serial: string): string {
        return this.template.resolveAgainst(this.baseUrl, { serial });
    }

    /**
     * Look up and seal the pilot of a violating drone.
     *
     * @param serial - Drone serial
     * @param violationTime - Capture time of the violation
     * @param distance - Distance to the nest at that capture
     */
    async lookup(serial: string, violationTime: number, distance: number): Promise<LookupResult> {
        if (!this.withinRetention(violationTime)) {
            return { ok: false, error: new PrivacyRejectedError(serial, violationTime) };
        }

        let url: string;
        try {
            url = this.addressOf(serial);
        }
        catch (error) {
            if (error instanceof ValidationError) {
                return { ok: false, error };
            }
            throw error;
        }

        const outcome = await this.source.request(url);
        if (!outcome.ok) {
            return { ok: false, error: toLookupError(outcome.error, serial) };
        }

        const value = outcome.value;
        if (value === undefined) {
            return { ok: false, error: new MalformedResponseError(`Empty pilot response for ${serial}`) };
        }
        if (value.kind === "not-found") {
            return { ok: false, error: new NotFoundError(serial) };
        }

        try {
            const record = this.buildRecord(serial, value.body, violationTime, distance);
            this.logger.debug("Pilot resolved", { serial, name: record.name });
            return { ok: true, record };
        }
        catch (error) {
            if (error instanceof MalformedResponseError || error instanceof ValidationError) {
                this.logger.warn("Pilot response rejected", { serial, error: error.message });
                return { ok: false, error };
            }
            throw error;
        }
    }

    private buildRecord(serial: string, body: string, violationTime: number, distance: number): SealedPilot {
        let json: unknown;
        try {
            json = JSON.parse(body);
        }
        catch (error) {
            throw new MalformedResponseError(`Invalid JSON in pilot response for ${serial}: ${describeError(error)}`, {
                cause: error,
            });
        }

        const identity = mapPilotFields(json, serial, this.logger);

        const draft = createPilotDraft(serial);
        assignPilotField(draft, "firstName", identity.firstName);
        assignPilotField(draft, "lastName", identity.lastName);
        assignPilotField(draft, "email", identity.email);
        assignPilotField(draft, "phone", identity.phone);
        assignPilotField(draft, "pilotId", identity.pilotId);
        assignPilotField(draft, "placeholderName", serial);
        assignPilotField(draft, "closestDistanceToNest", distance);
        assignPilotField(draft, "expireTime", violationTime + this.retentionMs);

        return sealPilot(draft, this.now());
    }
}

function toLookupError(error: TransportError | ParseError, serial: string): LookupError {
    if (error instanceof TransportError) {
        return error;
    }
    return new MalformedResponseError(`Unreadable pilot response for ${serial}: ${error.message}`, { cause: error });
}
