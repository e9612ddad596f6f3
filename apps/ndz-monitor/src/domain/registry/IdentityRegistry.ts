/**
 * @fileoverview Identity registry
 *
 * Keeps one sealed pilot record per violating drone for the retention
 * window after the drone was last seen.
 *
 * Per capture:
 * 1. Evict records with `expireTime <= now`
 * 2. New violators are looked up; a failed lookup leaves a stub record
 *    (pending when the failure was transient), a privacy rejection leaves
 *    nothing
 * 3. Known violators keep the smaller distance
 * 4. Pending stubs retry their lookup
 * 5. Every recorded drone seen in the capture has its expiry extended
 * 6. Evict again and commit
 *
 * Updates run on a copy that is committed at the end, so readers never
 * see half a cycle. Updates are serialized by the registry's own mutex.
 *
 * @module domain/registry/IdentityRegistry
 */

import {
    Mutex,
    ValidationError,
    createEvent,
    createPrefixedLogger,
    defaultLogger,
    type EngineLogger,
    type EventBus,
} from "@nestguard/engine";
import type { Detection } from "../detection/ViolationDetector.js";
import {
    extendExpiry,
    isPilotActive,
    mergeDistance,
    sealStubPilot,
    type SealedPilot,
} from "../entities/PilotRecord.js";
import { PrivacyRejectedError } from "../errors.js";
import type { LookupError, PilotLookup } from "../lookup/PilotLookupClient.js";

/**
 * Consumer view of one violator.
 */
export interface ViolatorView {
    readonly name: string;
    readonly email?: string;
    readonly phone?: string;
    readonly closestDistanceToNest: number;
}

/**
 * Counts from one registry update.
 */
export interface RegistryUpdateSummary {
    readonly captureTime: number;
    readonly added: number;
    readonly stubs: number;
    readonly resolved: number;
    readonly rejected: number;
    readonly evicted: number;
    readonly size: number;
}

/**
 * Registry configuration
 */
export interface IdentityRegistryConfig {
    lookup: PilotLookup;
    retentionMs: number;
    eventBus?: EventBus;
    logger?: EngineLogger;

    /** Clock (default: Date.now) */
    now?: () => number;
}

interface CycleCounts {
    added: number;
    stubs: number;
    resolved: number;
    rejected: number;
    evicted: number;
}

function bySerial(a: SealedPilot, b: SealedPilot): number {
    if (a.droneSerial < b.droneSerial) {
        return -1;
    }
    return a.droneSerial > b.droneSerial ? 1 : 0;
}

/**
 * Identity Registry
 *
 * @example
 * ```typescript
 * const registry = new IdentityRegistry({ lookup: client, retentionMs: 10 * 60_000 });
 *
 * await registry.update(detector.detect(capture));
 * console.table(registry.currentViolators());
 * ```
 */
export class IdentityRegistry {
    private pilots: ReadonlyMap<string, SealedPilot> = new Map();
    private readonly lock = new Mutex();
    private readonly lookup: PilotLookup;
    private readonly retentionMs: number;
    private readonly eventBus?: EventBus;
    private readonly logger: EngineLogger;
    private readonly now: () => number;

    constructor(config: IdentityRegistryConfig) {
        if (!(config.retentionMs > 0)) {
            throw new ValidationError(`retentionMs must be positive, got ${config.retentionMs}`);
        }
        this.lookup = config.lookup;
        this.retentionMs = config.retentionMs;
        this.eventBus = config.eventBus;
        this.logger = createPrefixedLogger(config.logger ?? defaultLogger, "registry");
        this.now = config.now ?? Date.now;
    }

    get size(): number {
        return this.pilots.size;
    }

    /**
     * Record of a drone, if any.
     */
    get(serial: string): SealedPilot | undefined {
        return this.pilots.get(serial);
    }

    /**
     * All records, sorted by drone serial.
     */
    snapshot(): SealedPilot[] {
        return [...this.pilots.values()].sort(bySerial);
    }

    /**
     * Active violators, sorted by drone serial.
     */
    currentViolators(): ViolatorView[] {
        const now = this.now();
        return this.snapshot()
            .filter((pilot) => isPilotActive(pilot, now))
            .map((pilot) => ({
                name                 : pilot.name,
                email                : pilot.email,
                phone                : pilot.phone,
                closestDistanceToNest: pilot.closestDistanceToNest,
            }));
    }

    /**
     * Remove expired records.
     *
     * @returns Number of records removed
     */
    async evictExpired(): Promise<number> {
        return this.lock.runExclusive(() => {
            const next = new Map(this.pilots);
            const evicted = this.evict(next, this.now());
            if (evicted > 0) {
                this.pilots = next;
                this.logger.debug("Evicted expired pilots", { evicted, size: next.size });
            }
            return evicted;
        });
    }

    /**
     * Merge one capture's detection into the registry.
     */
    async update(detection: Detection): Promise<RegistryUpdateSummary> {
        return this.lock.runExclusive(async () => {
            const next = new Map(this.pilots);
            const counts: CycleCounts = { added: 0, stubs: 0, resolved: 0, rejected: 0, evicted: 0 };
            const expireTime = detection.captureTime + this.retentionMs;
            const lookedUp = new Set<string>();

            counts.evicted += this.evict(next, this.now());

            for (const { observation, distance } of detection.violations) {
                const existing = next.get(observation.serial);
                if (existing) {
                    next.set(observation.serial, mergeDistance(existing, distance));
                    continue;
                }
                if (expireTime <= this.now()) {
                    this.logger.debug("Skipping violation outside retention", { serial: observation.serial });
                    continue;
                }

                lookedUp.add(observation.serial);
                const result = await this.lookup.lookup(observation.serial, detection.captureTime, distance);
                if (result.ok) {
                    next.set(observation.serial, result.record);
                    counts.added++;
                    continue;
                }

                const stub = this.stubFor(observation.serial, distance, expireTime, result.error);
                if (stub === undefined) {
                    counts.rejected++;
                    continue;
                }
                next.set(observation.serial, stub);
                counts.added++;
                counts.stubs++;
            }

            counts.resolved += await this.retryPending(next, lookedUp);

            for (const observation of detection.observations) {
                const pilot = next.get(observation.serial);
                if (pilot) {
                    next.set(observation.serial, extendExpiry(pilot, expireTime));
                }
            }

            counts.evicted += this.evict(next, this.now());
            this.pilots = next;

            const summary: RegistryUpdateSummary = {
                captureTime: detection.captureTime,
                ...counts,
                size       : next.size,
            };

            this.logger.info("Registry updated", {
                captureTime: new Date(detection.captureTime).toISOString(),
                violations : detection.violations.length,
                added      : counts.added,
                evicted    : counts.evicted,
                size       : next.size,
            });

            this.eventBus?.emit(createEvent("registry:updated", { ...summary }));

            return summary;
        });
    }

    /**
     * Decide what a failed lookup leaves behind.
     */
    private stubFor(serial: string, distance: number, expireTime: number, error: LookupError): SealedPilot | undefined {
        if (error instanceof PrivacyRejectedError) {
            this.logger.warn("Pilot lookup refused", { serial, error: error.message });
            return undefined;
        }

        // The lookup may outlast the retention window
        if (expireTime <= this.now()) {
            this.logger.debug("Pilot lookup finished outside retention", { serial, code: error.code });
            return undefined;
        }

        const pending = error.retryable;
        this.logger.warn(pending ? "Pilot lookup failed, will retry" : "Pilot unavailable, recording stub", {
            serial,
            code : error.code,
            error: error.message,
        });
        return sealStubPilot(serial, distance, expireTime, this.now(), pending);
    }

    /**
     * Retry the lookup of every pending stub not looked up in this cycle.
     * A resolved record keeps the stub's distance and expiry when those
     * are better.
     *
     * @returns Number of stubs replaced by resolved records
     */
    private async retryPending(next: Map<string, SealedPilot>, skip: ReadonlySet<string>): Promise<number> {
        let resolved = 0;

        for (const stub of [...next.values()]) {
            if (!stub.lookupPending || skip.has(stub.droneSerial)) {
                continue;
            }

            const lastSeen = stub.expireTime - this.retentionMs;
            const result = await this.lookup.lookup(stub.droneSerial, lastSeen, stub.closestDistanceToNest);

            if (result.ok) {
                const record = extendExpiry(
                    mergeDistance(result.record, stub.closestDistanceToNest),
                    stub.expireTime
                );
                next.set(stub.droneSerial, record);
                resolved++;
                this.logger.info("Pending pilot resolved", { serial: stub.droneSerial });
            }
            else if (!result.error.retryable) {
                next.set(stub.droneSerial, Object.freeze({ ...stub, lookupPending: false }));
                this.logger.warn("Pending pilot lookup gave up", {
                    serial: stub.droneSerial,
                    code  : result.error.code,
                });
            }
        }

        return resolved;
    }

    private evict(pilots: Map<string, SealedPilot>, now: number): number {
        let evicted = 0;
        for (const [serial, pilot] of pilots) {
            if (!isPilotActive(pilot, now)) {
                pilots.delete(serial);
                evicted++;
            }
        }
        return evicted;
    }
}
