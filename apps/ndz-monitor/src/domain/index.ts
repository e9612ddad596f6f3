/**
 * @fileoverview Domain barrel exports
 *
 * All domain-specific implementations for the no-drone-zone monitor.
 *
 * @module domain
 */

export * from "./errors.js";
export * from "./entities/index.js";
export * from "./providers/index.js";
export * from "./detection/index.js";
export * from "./lookup/index.js";
export * from "./registry/index.js";
export * from "./tasks/index.js";
