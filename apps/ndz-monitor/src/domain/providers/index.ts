/**
 * @fileoverview Domain providers barrel exports
 *
 * @module domain/providers
 */

export {
    SnapshotSource,
    type SnapshotSourceConfig,
} from "./SnapshotSource.js";

export {
    parseDroneReport,
    parseTimestamp,
} from "./parseDroneReport.js";
