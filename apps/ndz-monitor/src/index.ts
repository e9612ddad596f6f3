/**
 * @fileoverview NDZ Monitor - Main Entry Point
 *
 * Polls the drone report feed, detects drones inside the no-drone zone
 * around the nest, resolves their pilots and keeps the violators listed
 * for the retention window.
 *
 * Configuration is read from config/monitor.yml (or NDZ_CONFIG) with
 * environment overrides; see config/loadConfig.ts.
 *
 * @module ndz-monitor
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { NestMonitor } from "./monitor/index.js";
import { loadConfig, resolveConfigPath, type MonitorConfig } from "./config/index.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Build the monitor and hook its events up to the console.
 *
 * @param config - Validated configuration
 */
function createMonitor(config: MonitorConfig): NestMonitor {
    const monitor = new NestMonitor({ config });

    monitor.eventBus.subscribe("scheduler:started", () => {
        console.log(`[MONITOR] Started - polling every ${config.pollIntervalMs}ms`);
    });

    monitor.eventBus.subscribe("scheduler:stopped", () => {
        console.log("[MONITOR] Stopped");
    });

    monitor.eventBus.subscribe("source:failed", (event) => {
        console.log(`[FEED] ${String(event.data?.sourceId)} failed: ${String(event.data?.error)}`);
    });

    monitor.eventBus.subscribe("registry:updated", () => {
        const violators = monitor.currentViolators();
        console.log(`[VIOLATORS] ${violators.length} within the last ${config.retentionMinutes} minutes`);
        for (const violator of violators) {
            const contact = [violator.email, violator.phone].filter(Boolean).join(", ");
            const closest = (violator.closestDistanceToNest / 1000).toFixed(1);
            console.log(`  ${violator.name}${contact ? ` <${contact}>` : ""} - closest ${closest} m`);
        }
    });

    monitor.eventBus.subscribe("scheduler:error", (event) => {
        console.error("[MONITOR ERROR]", event.data);
    });

    return monitor;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    console.log("=".repeat(60));
    console.log("NDZ Monitor v1.0.0");
    console.log("=".repeat(60));

    let monitor: NestMonitor | undefined;

    const shutdown = async (): Promise<void> => {
        console.log("\nShutting down...");
        await monitor?.stop();
        process.exit(0);
    };

    // Handle graceful shutdown
    process.on("SIGINT", () => {
        shutdown().catch(console.error);
    });

    process.on("SIGTERM", () => {
        shutdown().catch(console.error);
    });

    try {
        const configPath = resolveConfigPath(join(__dirname, "..", "config", "monitor.yml"));
        const config = loadConfig(configPath);
        console.log(`[INFO] Loaded configuration from ${configPath}`);
        console.log(`[INFO] Zone radius ${config.zone.radius} mm around (${config.zone.originX}, ${config.zone.originY})`);

        monitor = createMonitor(config);
        await monitor.start();

        console.log("\n[INFO] NDZ Monitor is running. Press Ctrl+C to stop.\n");
    }
    catch (error) {
        console.error("[FATAL] Failed to start application:", error);
        process.exit(1);
    }
}

// Run if this is the main module
main().catch(console.error);

// Export for testing
export { createMonitor };
