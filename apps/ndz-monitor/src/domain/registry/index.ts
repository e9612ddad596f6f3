/**
 * @fileoverview Registry barrel exports
 *
 * @module domain/registry
 */

export {
    IdentityRegistry,
    type IdentityRegistryConfig,
    type RegistryUpdateSummary,
    type ViolatorView,
} from "./IdentityRegistry.js";
