/**
 * @fileoverview Monitor barrel exports
 *
 * @module monitor
 */

export { NestMonitor, type NestMonitorOptions } from "./NestMonitor.js";
