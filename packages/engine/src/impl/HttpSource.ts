/**
 * @fileoverview HTTP polling source
 *
 * Fetches a document over HTTP, classifies the response, offers it to the
 * status handler chain, parses it, and reports failures to observers and
 * the event bus. Nothing thrown by the network, a handler or the parser
 * escapes fetch() or request().
 *
 * @module @nestguard/engine/impl/HttpSource
 */

import type { EventBus, Subscription } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { defaultLogger, type EngineLogger } from "../contracts/Logger.js";
import type {
    DeliveryMode,
    FailureObserver,
    FetchOutcome,
    PollingSource,
    ResponseOutcome,
    SourceFailure,
    SourceResponse,
    StatusHandler,
} from "../contracts/PollingSource.js";
import { ParseError, TransportError, describeError } from "../contracts/errors.js";
import { Mutex } from "./Mutex.js";

/**
 * Signature of the fetch implementation, injectable for tests.
 */
export type FetchFunction = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * HttpSource configuration.
 */
export interface HttpSourceConfig<T> {
    /** Unique identifier used in logs, events and failures */
    readonly id: string;

    /** Address polled by fetch() */
    readonly url: string;

    /** Turn a success-with-body response into a value; throw to fail */
    readonly parse: (body: string, response: SourceResponse) => T;

    /** Initial status handler chain */
    readonly statusHandlers?: readonly StatusHandler<T>[];

    /** Request headers */
    readonly headers?: Readonly<Record<string, string>>;

    /** Per-request timeout in milliseconds (default: 10000) */
    readonly timeoutMs?: number;

    /** Failure delivery mode (default: "all") */
    readonly delivery?: DeliveryMode;

    /** Fetch implementation (default: global fetch) */
    readonly fetch?: FetchFunction;

    /** Event bus for source:updated / source:failed */
    readonly eventBus?: EventBus;

    /** Logger */
    readonly logger?: EngineLogger;

    /** Clock (default: Date.now) */
    readonly now?: () => number;
}

/**
 * Classify a status code and body.
 */
export function classifyResponse(status: number, body: string): ResponseOutcome {
    if (status >= 200 && status < 300) {
        return body.length > 0 && status !== 204 && status !== 205
            ? "success-with-body"
            : "success-no-body";
    }
    if (status >= 400 && status < 500) {
        return "client-error";
    }
    if (status >= 500 && status < 600) {
        return "server-error";
    }
    return "other";
}

/**
 * HttpSource - generic fetch-and-parse polling source.
 *
 * @example
 * ```typescript
 * const source = new HttpSource({
 *     id   : "status-feed",
 *     url  : "https://example.test/status.json",
 *     parse: (body) => JSON.parse(body) as unknown,
 * });
 *
 * source.addFailureObserver({
 *     onFailure: (failure) => console.warn(failure.error.message),
 * });
 *
 * const value = await source.fetch();   // undefined on failure
 * ```
 */
export class HttpSource<T> implements PollingSource<T> {
    readonly id: string;
    readonly url: string;

    protected readonly logger: EngineLogger;
    protected readonly eventBus?: EventBus;

    private readonly parseBody: (body: string, response: SourceResponse) => T;
    private readonly statusHandlers: StatusHandler<T>[];
    private readonly observers: FailureObserver[] = [];
    private readonly headers: Readonly<Record<string, string>>;
    private readonly timeoutMs: number;
    private readonly delivery: DeliveryMode;
    private readonly fetchFn: FetchFunction;
    private readonly now: () => number;
    private readonly lock = new Mutex();

    private published: T | undefined;

    constructor(config: HttpSourceConfig<T>) {
        this.id = config.id;
        this.url = config.url;
        this.parseBody = config.parse;
        this.statusHandlers = [...(config.statusHandlers ?? [])];
        this.headers = config.headers ?? {};
        this.timeoutMs = config.timeoutMs ?? 10000;
        this.delivery = config.delivery ?? "all";
        this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
        this.eventBus = config.eventBus;
        this.logger = config.logger ?? defaultLogger;
        this.now = config.now ?? Date.now;
    }

    /**
     * Append a status handler to the chain.
     */
    addStatusHandler(handler: StatusHandler<T>): void {
        this.statusHandlers.push(handler);
    }

    /**
     * Register a failure observer.
     */
    addFailureObserver(observer: FailureObserver): Subscription {
        this.observers.push(observer);
        return {
            unsubscribe: () => {
                const index = this.observers.indexOf(observer);
                if (index >= 0) {
                    this.observers.splice(index, 1);
                }
            },
        };
    }

    /**
     * Fetch the configured address and publish the value on success.
     */
    async fetch(): Promise<T | undefined> {
        return this.lock.runExclusive(async () => {
            const outcome = await this.perform(this.url);
            if (!outcome.ok) {
                return undefined;
            }
            if (outcome.value !== undefined) {
                this.publish(outcome.value);
            }
            return outcome.value;
        });
    }

    /**
     * Request an arbitrary address without publishing the result.
     * Failures are still delivered to observers before being returned.
     */
    async request(url: string): Promise<FetchOutcome<T>> {
        return this.lock.runExclusive(() => this.perform(url));
    }

    /**
     * Last published value.
     */
    current(): T | undefined {
        return this.published;
    }

    /**
     * Replace the published value. Subclasses override to reject values.
     */
    protected publish(value: T): void {
        this.published = value;
        this.eventBus?.emit(createEvent("source:updated", {
            sourceId: this.id,
            url     : this.url,
        }));
    }

    private async perform(url: string): Promise<FetchOutcome<T>> {
        let response: Response;
        let body: string;
        try {
            response = await this.fetchFn(url, {
                method : "GET",
                headers: { ...this.headers },
                signal : AbortSignal.timeout(this.timeoutMs),
            });
            body = await response.text();
        }
        catch (error) {
            const message = error instanceof Error && error.name === "TimeoutError"
                ? `Request to ${url} timed out after ${this.timeoutMs}ms`
                : `Request to ${url} failed: ${describeError(error)}`;
            return this.fail(url, new TransportError(message, { cause: error }));
        }

        const headers: Record<string, string> = {};
        response.headers.forEach((value, name) => {
            headers[name.toLowerCase()] = value;
        });

        const sourceResponse: SourceResponse = {
            url,
            status : response.status,
            outcome: classifyResponse(response.status, body),
            headers,
            body,
        };

        for (const handler of this.statusHandlers) {
            let handled: T | undefined;
            try {
                handled = await handler(sourceResponse);
            }
            catch (error) {
                return this.fail(url, toSourceError(error, sourceResponse));
            }
            if (handled !== undefined) {
                return { ok: true, value: handled };
            }
        }

        switch (sourceResponse.outcome) {
            case "success-with-body":
                try {
                    return { ok: true, value: this.parseBody(body, sourceResponse) };
                }
                catch (error) {
                    return this.fail(url, error instanceof ParseError
                        ? error
                        : new ParseError(`Cannot parse response from ${url}: ${describeError(error)}`, {
                            cause: error,
                        }));
                }

            case "success-no-body":
            case "other":
                return { ok: true, value: undefined };

            case "client-error":
            case "server-error":
                return this.fail(url, new TransportError(`HTTP ${sourceResponse.status} from ${url}`, {
                    status: sourceResponse.status,
                }));
        }
    }

    private fail(url: string, error: TransportError | ParseError): FetchOutcome<T> {
        const failure: SourceFailure = {
            sourceId : this.id,
            url,
            error,
            timestamp: this.now(),
        };

        this.logger.warn("Source fetch failed", {
            sourceId: this.id,
            url,
            code    : error.code,
            error   : error.message,
        });

        this.deliver(failure);

        this.eventBus?.emit(createEvent("source:failed", {
            sourceId: this.id,
            url,
            code    : error.code,
            status  : error instanceof TransportError ? error.status : undefined,
            error   : error.message,
        }));

        return { ok: false, error };
    }

    private deliver(failure: SourceFailure): void {
        for (const observer of [...this.observers]) {
            let handled: boolean | void = false;
            try {
                handled = observer.onFailure(failure);
            }
            catch (error) {
                this.logger.error("Failure observer error", {
                    sourceId  : this.id,
                    observerId: observer.id,
                    error     : describeError(error),
                });
            }

            if (this.delivery === "first-handled" && handled === true) {
                return;
            }
        }
    }
}

function toSourceError(error: unknown, response: SourceResponse): TransportError | ParseError {
    if (error instanceof TransportError || error instanceof ParseError) {
        return error;
    }
    return new TransportError(`Status handler rejected HTTP ${response.status} from ${response.url}: ${describeError(error)}`, {
        status: response.status,
        cause : error,
    });
}
