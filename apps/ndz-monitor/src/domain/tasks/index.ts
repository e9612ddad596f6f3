/**
 * @fileoverview Scheduled tasks barrel exports
 *
 * @module domain/tasks
 */

export {
    SnapshotPollTask,
    type SnapshotPollTaskConfig,
} from "./SnapshotPollTask.js";

export {
    RegistryUpdateTask,
    type RegistryUpdateTaskConfig,
} from "./RegistryUpdateTask.js";
