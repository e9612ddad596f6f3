/**
 * @fileoverview Domain entities barrel exports
 *
 * @module domain/entities
 */

export type {
    Capture,
    DeviceInformation,
    DroneReport,
    Observation,
} from "./Observation.js";

export {
    assignPilotField,
    createPilotDraft,
    extendExpiry,
    isPilotActive,
    mergeDistance,
    sealPilot,
    sealStubPilot,
    type PilotDraft,
    type PilotDraftFields,
    type PilotField,
    type PilotIdentity,
    type PilotRecord,
    type SealedPilot,
} from "./PilotRecord.js";
