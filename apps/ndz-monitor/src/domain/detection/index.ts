/**
 * @fileoverview Detection barrel exports
 *
 * @module domain/detection
 */

export {
    ViolationDetector,
    selectLatestCapture,
    type Detection,
    type Violation,
} from "./ViolationDetector.js";
