/**
 * @fileoverview Unit tests for Mutex
 *
 * @module @nestguard/engine/__tests__/Mutex
 */

import { describe, it, expect } from "vitest";
import { Mutex } from "../impl/Mutex.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((done) => {
        resolve = done;
    });
    return { promise, resolve };
}

describe("Mutex", () => {
    // Scenario: Critical sections never overlap and run in arrival order
    it("should serialize critical sections in FIFO order", async () => {
        const mutex = new Mutex();
        const gate = deferred();
        const order: string[] = [];

        const first = mutex.runExclusive(async () => {
            order.push("first:start");
            await gate.promise;
            order.push("first:end");
        });
        const second = mutex.runExclusive(async () => {
            order.push("second");
        });

        await new Promise((resolve) => setTimeout(resolve, 0));
        expect(order).toEqual(["first:start"]);
        expect(mutex.isLocked).toBe(true);

        gate.resolve();
        await Promise.all([first, second]);

        expect(order).toEqual(["first:start", "first:end", "second"]);
        expect(mutex.isLocked).toBe(false);
    });

    // Scenario: A failing section releases the lock and rejects its caller only
    it("should release the lock when the section throws", async () => {
        const mutex = new Mutex();

        await expect(mutex.runExclusive(() => {
            throw new Error("section failed");
        })).rejects.toThrow("section failed");

        await expect(mutex.runExclusive(() => "next")).resolves.toBe("next");
    });

    // Scenario: Releasing twice does not free a later holder's lock
    it("should ignore a second release", async () => {
        const mutex = new Mutex();
        const release = await mutex.acquire();
        release();
        release();

        const next = await mutex.acquire();
        expect(mutex.isLocked).toBe(true);
        next();
        expect(mutex.isLocked).toBe(false);
    });
});
