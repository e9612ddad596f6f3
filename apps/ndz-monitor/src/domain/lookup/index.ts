/**
 * @fileoverview Lookup barrel exports
 *
 * @module domain/lookup
 */

export {
    PilotLookupClient,
    type LookupError,
    type LookupResult,
    type PilotLookup,
    type PilotLookupClientConfig,
} from "./PilotLookupClient.js";

export { mapPilotFields } from "./mapPilotFields.js";
