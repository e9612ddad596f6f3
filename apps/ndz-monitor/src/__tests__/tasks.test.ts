/**
 * @fileoverview Unit tests for the snapshot source and the scheduled tasks
 *
 * Tests cover:
 * - Publishing the latest capture and rejecting stale reports
 * - SnapshotPollTask results for success, failure and empty feeds
 * - RegistryUpdateTask processing each capture once
 *
 * @module domain/tasks/__tests__/tasks
 */

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { TransportError, type FetchFunction } from "@nestguard/engine";
import { SnapshotSource } from "../domain/providers/SnapshotSource.js";
import { SnapshotPollTask } from "../domain/tasks/SnapshotPollTask.js";
import { RegistryUpdateTask } from "../domain/tasks/RegistryUpdateTask.js";
import { ViolationDetector } from "../domain/detection/ViolationDetector.js";
import { IdentityRegistry } from "../domain/registry/IdentityRegistry.js";
import type { Capture } from "../domain/entities/Observation.js";
import type { PilotLookup } from "../domain/lookup/PilotLookupClient.js";
import { NotFoundError } from "../domain/errors.js";

const kURL = "https://feeds.example.test/birdnest/drones";
const T = Date.UTC(2023, 0, 5, 8, 0);

function createLogger() {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

function respond(body: string | null, status = 200): Promise<Response> {
    return Promise.resolve(new Response(body, { status }));
}

function report(captureTime: number, interval?: number): string {
    const device = interval === undefined
        ? ""
        : `<deviceInformation deviceId="GUARDB1"><updateIntervalMs>${interval}</updateIntervalMs></deviceInformation>`;
    return `<report>${device}<capture snapshotTimestamp="${new Date(captureTime).toISOString()}">
        <drone><serialNumber>SN-a1</serialNumber><positionX>250000</positionX><positionY>250100</positionY><altitude>900</altitude></drone>
    </capture></report>`;
}

describe("SnapshotSource", () => {
    let fetchMock: Mock<FetchFunction>;
    let logger: ReturnType<typeof createLogger>;
    let source: SnapshotSource;

    beforeEach(() => {
        fetchMock = vi.fn<FetchFunction>();
        logger = createLogger();
        source = new SnapshotSource({ url: kURL, fetch: fetchMock, logger });
    });

    // Scenario: The latest capture and the announced interval are exposed
    it("should publish the fetched report", async () => {
        fetchMock.mockReturnValue(respond(report(T, 1500)));

        await source.fetch();

        expect(fetchMock).toHaveBeenCalledWith(kURL, expect.objectContaining({
            headers: { accept: "application/xml, text/xml" },
        }));
        expect(source.latest()).toEqual({
            captureTime : T,
            observations: [{ serial: "SN-a1", x: 250000, y: 250100, z: 900 }],
        });
        expect(source.announcedIntervalMs()).toBe(1500);
    });

    // Scenario: A report older than the published one is ignored
    it("should not publish a stale report", async () => {
        fetchMock
            .mockReturnValueOnce(respond(report(T + 2000)))
            .mockReturnValueOnce(respond(report(T)));

        await source.fetch();
        await source.fetch();

        expect(source.latest()?.captureTime).toBe(T + 2000);
        expect(logger.warn).toHaveBeenCalledWith("Ignoring stale drone report", {
            sourceId: "snapshot-source",
            known   : "2023-01-05T08:00:02.000Z",
            received: "2023-01-05T08:00:00.000Z",
        });
    });

    // Scenario: Nothing is published before the first successful fetch
    it("should have no capture before the first fetch", () => {
        expect(source.latest()).toBeUndefined();
        expect(source.announcedIntervalMs()).toBeUndefined();
    });
});

describe("SnapshotPollTask", () => {
    let fetchMock: Mock<FetchFunction>;
    let source: SnapshotSource;
    let task: SnapshotPollTask;

    beforeEach(async () => {
        fetchMock = vi.fn<FetchFunction>();
        source = new SnapshotSource({ url: kURL, fetch: fetchMock, logger: createLogger() });
        task = new SnapshotPollTask({ source, intervalMs: 2000 });
        await task.initialize();
    });

    // Scenario: The next update is expected one interval after the capture
    it("should report the next expected update", async () => {
        fetchMock.mockReturnValue(respond(report(T)));

        expect(await task.run()).toEqual({ success: true, nextUpdateAt: T + 2000 });
    });

    // Scenario: The sensor's announced interval wins over the configured one
    it("should prefer the announced interval", async () => {
        fetchMock.mockReturnValue(respond(report(T, 5000)));

        expect(await task.run()).toEqual({ success: true, nextUpdateAt: T + 5000 });
    });

    // Scenario: A failed fetch is a failed run
    it("should report the source failure", async () => {
        fetchMock.mockReturnValue(respond("", 502));

        const result = await task.run();

        expect(result.success).toBe(false);
        expect(result.error).toBeInstanceOf(TransportError);
        expect(result.error).toHaveProperty("message", `HTTP 502 from ${kURL}`);
    });

    // Scenario: A failure does not stick to the next run
    it("should succeed again after a failure", async () => {
        fetchMock
            .mockReturnValueOnce(respond("", 502))
            .mockReturnValueOnce(respond(report(T)));

        await task.run();

        expect((await task.run()).success).toBe(true);
    });

    // Scenario: An empty feed is not a failure
    it("should succeed without a next update when nothing was published", async () => {
        fetchMock.mockReturnValue(respond(null, 204));

        expect(await task.run()).toEqual({ success: true });
    });
});

describe("RegistryUpdateTask", () => {
    let latest: Mock<() => Capture | undefined>;
    let lookupMock: Mock<PilotLookup["lookup"]>;
    let registry: IdentityRegistry;
    let task: RegistryUpdateTask;

    const capture: Capture = {
        captureTime : T,
        observations: [{ serial: "SN-a1", x: 0, y: 50, z: 0 }],
    };

    beforeEach(() => {
        latest = vi.fn<() => Capture | undefined>();
        lookupMock = vi.fn<PilotLookup["lookup"]>(async (serial) => ({ ok: false, error: new NotFoundError(serial) }));
        registry = new IdentityRegistry({
            lookup     : { lookup: lookupMock },
            retentionMs: 600_000,
            logger     : createLogger(),
            now        : () => T,
        });
        task = new RegistryUpdateTask({
            source  : { latest },
            detector: new ViolationDetector({ originX: 0, originY: 0, radius: 100 }),
            registry,
        });
    });

    // Scenario: A new capture is merged into the registry
    it("should merge a new capture", async () => {
        latest.mockReturnValue(capture);

        expect(await task.run()).toEqual({ success: true, idle: true });
        expect(task.lastProcessedAt).toBe(T);
        expect(registry.get("SN-a1")).toMatchObject({ stub: true, closestDistanceToNest: 50 });
    });

    // Scenario: The same capture is processed only once
    it("should only evict when the capture was already processed", async () => {
        latest.mockReturnValue(capture);
        const update = vi.spyOn(registry, "update");
        const evict = vi.spyOn(registry, "evictExpired");

        await task.run();
        await task.run();

        expect(update).toHaveBeenCalledTimes(1);
        expect(evict).toHaveBeenCalledTimes(1);
        expect(lookupMock).toHaveBeenCalledTimes(1);
    });

    // Scenario: No capture yet
    it("should idle when nothing has been published", async () => {
        latest.mockReturnValue(undefined);

        expect(await task.run()).toEqual({ success: true, idle: true });
        expect(task.lastProcessedAt).toBeUndefined();
        expect(registry.size).toBe(0);
    });
});
