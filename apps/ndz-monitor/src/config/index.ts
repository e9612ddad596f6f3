/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    buildConfig,
    getDefaultConfig,
    loadConfig,
    resolveConfigPath,
    type ConfigEnvironment,
    type MonitorConfig,
    type ReportTagNames,
    type ZoneConfig,
} from "./loadConfig.js";
