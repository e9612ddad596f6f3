/**
 * @fileoverview Drone report entities
 *
 * Plain immutable values produced by the report parser and consumed by the
 * violation detector. Positions and ranges are in millimetres, times in
 * epoch milliseconds.
 *
 * @module domain/entities/Observation
 */

/**
 * One drone seen in one capture.
 */
export interface Observation {
    /** Drone serial number */
    readonly serial: string;

    readonly x: number;
    readonly y: number;

    /** Altitude */
    readonly z: number;
}

/**
 * A capture: every drone the sensor saw at one instant, in document order.
 */
export interface Capture {
    readonly captureTime: number;
    readonly observations: readonly Observation[];
}

/**
 * Sensor metadata carried by the report header.
 */
export interface DeviceInformation {
    readonly deviceId: string;

    /** Sensor range */
    readonly listenRange?: number;

    /** Interval at which the sensor publishes a new capture */
    readonly updateIntervalMs?: number;
}

/**
 * A parsed report. Only the latest capture is authoritative.
 */
export interface DroneReport {
    readonly device?: DeviceInformation;
    readonly captures: readonly Capture[];
}
