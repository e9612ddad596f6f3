/**
 * Error Taxonomy
 *
 * Every failure the engine reports is one of these classes. Each carries a
 * stable `code` for switching and a `retryable` flag the scheduler and the
 * callers use to decide whether trying again can help.
 */

/**
 * Stable error codes shared by the engine and its domains.
 */
export type ErrorCode =
    | "VALIDATION"
    | "PARAMETER_COUNT"
    | "MISSING_PARAMETER"
    | "TRANSPORT"
    | "PARSE"
    | (string & {});

/**
 * Base class for all engine errors.
 */
export class NestguardError extends Error {
    /** Stable identifier of the failure kind */
    readonly code: ErrorCode;

    /** Whether the same operation may succeed if attempted again */
    readonly retryable: boolean;

    constructor(code: ErrorCode, message: string, retryable: boolean, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
        this.retryable = retryable;
    }
}

/**
 * A value, parameter or definition was rejected. The caller is at fault,
 * so retrying with the same input never helps.
 */
export class ValidationError extends NestguardError {
    constructor(message: string, options?: ErrorOptions & { code?: ErrorCode }) {
        super(options?.code ?? "VALIDATION", message, false, options);
    }
}

/**
 * Positional path resolution received the wrong number of values.
 */
export class ParameterCountError extends ValidationError {
    readonly reason: "too-many" | "not-enough";
    readonly expected: number;
    readonly received: number;

    constructor(reason: "too-many" | "not-enough", expected: number, received: number) {
        super(
            reason === "too-many"
                ? `Too many parameters: expected ${expected}, received ${received}`
                : `Not enough parameters: expected ${expected}, received ${received}`,
            { code: "PARAMETER_COUNT" }
        );
        this.reason = reason;
        this.expected = expected;
        this.received = received;
    }
}

/**
 * Named path resolution did not receive a value for a declared parameter.
 */
export class MissingParameterError extends ValidationError {
    readonly parameterName: string;

    constructor(parameterName: string) {
        super(`Missing parameter: ${parameterName}`, { code: "MISSING_PARAMETER" });
        this.parameterName = parameterName;
    }
}

/**
 * Network or I/O failure, including error-class HTTP statuses.
 */
export class TransportError extends NestguardError {
    /** HTTP status when the failure came from a response */
    readonly status?: number;

    constructor(message: string, options?: ErrorOptions & { status?: number }) {
        super("TRANSPORT", message, true, options);
        this.status = options?.status;
    }
}

/**
 * The payload could not be turned into the expected structure.
 * Retryable: the server may have sent a truncated or corrupted document.
 */
export class ParseError extends NestguardError {
    constructor(message: string, options?: ErrorOptions) {
        super("PARSE", message, true, options);
    }
}

/**
 * Render any thrown value as a log-friendly message.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
