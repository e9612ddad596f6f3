/**
 * PollingSource Contract
 *
 * A polling source fetches a remote document, turns it into a typed value
 * and reports failures to observers instead of throwing at the caller.
 *
 * Design principles:
 * - Failure never crosses the boundary: fetch() yields `undefined`
 * - Observers are ordered; every observer sees every failure unless the
 *   source is in "first-handled" delivery mode
 * - Status handlers form a chain tried in registration order
 */

import type { Subscription } from "./EventBus.js";
import type { ParseError, TransportError } from "./errors.js";

/**
 * Classification of a response by its status code.
 */
export type ResponseOutcome =
    | "success-with-body"
    | "success-no-body"
    | "client-error"
    | "server-error"
    | "other";

/**
 * Response as seen by status handlers and parsers.
 */
export interface SourceResponse {
    /** Request address */
    readonly url: string;

    /** HTTP status code */
    readonly status: number;

    /** Outcome derived from the status and body */
    readonly outcome: ResponseOutcome;

    /** Response headers, lower-cased names */
    readonly headers: Readonly<Record<string, string>>;

    /** Raw response body; empty for no-body outcomes */
    readonly body: string;
}

/**
 * A status handler inspects a response and either produces the value
 * (short-circuiting the chain) or returns `undefined` to pass it on.
 * A thrown error becomes a source failure.
 */
export type StatusHandler<T> = (response: SourceResponse) => T | undefined | Promise<T | undefined>;

/**
 * Failure delivered to observers.
 */
export interface SourceFailure {
    /** Source that failed */
    readonly sourceId: string;

    /** Address that was requested */
    readonly url: string;

    /** What went wrong */
    readonly error: TransportError | ParseError;

    /** Epoch milliseconds of the failure */
    readonly timestamp: number;
}

/**
 * Receives source failures.
 *
 * Returning `true` marks the failure as handled; in "first-handled"
 * delivery mode that stops delivery to later observers.
 */
export interface FailureObserver {
    /** Optional identifier used in logs */
    readonly id?: string;

    onFailure(failure: SourceFailure): boolean | void;
}

/**
 * How failures are delivered to observers.
 */
export type DeliveryMode = "all" | "first-handled";

/**
 * Outcome of a request/response style fetch.
 */
export type FetchOutcome<T> =
    | { readonly ok: true; readonly value: T | undefined }
    | { readonly ok: false; readonly error: TransportError | ParseError };

/**
 * PollingSource interface.
 */
export interface PollingSource<T> {
    /** Unique identifier for this source */
    readonly id: string;

    /**
     * Fetch and parse the configured address.
     * Resolves `undefined` when there is no value or the fetch failed.
     */
    fetch(): Promise<T | undefined>;

    /**
     * Last successfully fetched value, if any.
     */
    current(): T | undefined;

    /**
     * Register a failure observer.
     *
     * @returns Subscription handle for removing the observer
     */
    addFailureObserver(observer: FailureObserver): Subscription;
}
