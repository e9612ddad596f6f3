/**
 * @fileoverview Typed path parameters
 *
 * A Parameter binds a name to an encode/decode/validate triplet for one
 * value type. Values reach a parameter untyped (positional arrays, named
 * records), so each parameter also carries a runtime value type that
 * checks the value before any validator sees it.
 *
 * @module @nestguard/engine/rest/Parameter
 */

import { ValidationError, describeError } from "../contracts/errors.js";
import {
    type Charset,
    DEFAULT_CHARSET,
    percentDecode,
    percentEncode,
} from "./percentEncoding.js";

/**
 * Runtime description of a parameter's value type.
 */
export interface ValueType<V> {
    /** Name used in error messages */
    readonly name: string;

    is(value: unknown): value is V;
}

/**
 * Built-in value types.
 */
export const ValueTypes = {
    string: {
        name: "string",
        is  : (value: unknown): value is string => typeof value === "string",
    },
    number: {
        name: "number",
        is  : (value: unknown): value is number => typeof value === "number" && Number.isFinite(value),
    },
    integer: {
        name: "integer",
        is  : (value: unknown): value is number => typeof value === "number" && Number.isSafeInteger(value),
    },
    boolean: {
        name: "boolean",
        is  : (value: unknown): value is boolean => typeof value === "boolean",
    },
} satisfies Record<string, ValueType<unknown>>;

/**
 * Validates the raw (decoded) string form. A RegExp must match the whole string.
 */
export type StringValidator = ((raw: string) => boolean) | RegExp;

/**
 * Validates a typed value.
 */
export type ValueValidator<V> = (value: V) => boolean;

/**
 * Parameter definition.
 */
export interface ParameterDefinition<V> {
    /** Identifier-like name, unique within its segment */
    readonly name: string;

    /** Runtime value type */
    readonly type: ValueType<V>;

    /** Turn a value into its string form */
    readonly encode: (value: V) => string;

    /** Turn a string form back into a value */
    readonly decode: (raw: string) => V;

    /** Defaults to accepting every string */
    readonly stringValidator?: StringValidator;

    /** Defaults to encoding the value and running the string validator */
    readonly valueValidator?: ValueValidator<V>;
}

/**
 * What a path template needs from a parameter.
 * Values are checked against the parameter's own type at encode time.
 */
export interface PathParameter {
    readonly name: string;

    encodeValue(value: unknown, charset?: Charset): string;
}

const kIDENTIFIER = /^[\p{L}_$][\p{L}\p{N}_$]*$/u;

/**
 * Compile a string validator into a predicate.
 */
export function toStringPredicate(validator: StringValidator | undefined): (raw: string) => boolean {
    if (validator === undefined) {
        return () => true;
    }

    if (validator instanceof RegExp) {
        const flags = validator.flags.replace(/[gy]/g, "");
        const anchored = new RegExp(`^(?:${validator.source})$`, flags);
        return (raw) => anchored.test(raw);
    }

    if (typeof validator !== "function") {
        throw new ValidationError("String validator must be a function or a RegExp");
    }

    return validator;
}

/**
 * Parameter - one typed path value.
 *
 * @example
 * ```typescript
 * const serial = new Parameter({
 *     name           : "serial",
 *     type           : ValueTypes.string,
 *     encode         : (value) => value,
 *     decode         : (raw) => raw,
 *     stringValidator: /[-\w]+/,
 * });
 *
 * serial.encodeValue("SN-1 2");   // throws ValidationError
 * serial.encodeValue("SN-12");    // "SN-12"
 * ```
 */
export class Parameter<V> implements PathParameter {
    readonly name: string;
    readonly type: ValueType<V>;

    private readonly encodeFn: (value: V) => string;
    private readonly decodeFn: (raw: string) => V;
    private readonly acceptsString: (raw: string) => boolean;
    private readonly acceptsValue: ValueValidator<V>;

    /**
     * @throws ValidationError if the name is not identifier-like, the value
     *         type is missing, or a validator is of the wrong kind
     */
    constructor(definition: ParameterDefinition<V>) {
        if (typeof definition.name !== "string" || !kIDENTIFIER.test(definition.name)) {
            throw new ValidationError(`Invalid parameter name: "${String(definition.name)}"`);
        }
        if (!definition.type || typeof definition.type.is !== "function") {
            throw new ValidationError(`Parameter "${definition.name}" has no value type`);
        }
        if (typeof definition.encode !== "function" || typeof definition.decode !== "function") {
            throw new ValidationError(`Parameter "${definition.name}" needs encode and decode functions`);
        }

        this.name = definition.name;
        this.type = definition.type;
        this.encodeFn = definition.encode;
        this.decodeFn = definition.decode;
        this.acceptsString = toStringPredicate(definition.stringValidator);

        const valueValidator = definition.valueValidator;
        if (valueValidator !== undefined && typeof valueValidator !== "function") {
            throw new ValidationError(`Value validator of "${definition.name}" must be a function`);
        }
        this.acceptsValue = valueValidator ?? ((value) => this.acceptsString(this.encodeFn(value)));
    }

    /**
     * Validate, encode and percent-encode a value.
     *
     * @throws ValidationError if the value is not of the parameter's type
     *         or a validator rejects it
     */
    encodeValue(value: unknown, charset: Charset = DEFAULT_CHARSET): string {
        if (!this.type.is(value)) {
            throw new ValidationError(
                `Parameter "${this.name}" expects a ${this.type.name}, received ${describeValue(value)}`
            );
        }

        let encoded: string;
        try {
            if (!this.acceptsValue(value)) {
                throw new ValidationError(`Value rejected by parameter "${this.name}": ${String(value)}`);
            }
            encoded = this.encodeFn(value);
        }
        catch (error) {
            if (error instanceof ValidationError) {
                throw error;
            }
            throw new ValidationError(`Cannot encode parameter "${this.name}": ${describeError(error)}`, {
                cause: error,
            });
        }

        return percentEncode(encoded, charset);
    }

    /**
     * Percent-decode, validate and decode a raw string.
     *
     * @throws ValidationError if the escape is malformed, the string validator
     *         rejects the decoded string, or decoding does not yield the type
     */
    decodeValue(raw: string, charset: Charset = DEFAULT_CHARSET): V {
        const decoded = percentDecode(raw, charset);
        if (!this.acceptsString(decoded)) {
            throw new ValidationError(`String rejected by parameter "${this.name}": "${decoded}"`);
        }

        let value: V;
        try {
            value = this.decodeFn(decoded);
        }
        catch (error) {
            throw new ValidationError(`Cannot decode parameter "${this.name}": ${describeError(error)}`, {
                cause: error,
            });
        }

        if (!this.type.is(value)) {
            throw new ValidationError(`Parameter "${this.name}" decoded "${decoded}" to a non-${this.type.name}`);
        }
        return value;
    }
}

function describeValue(value: unknown): string {
    if (value === null) {
        return "null";
    }
    return typeof value === "string" ? `"${value}"` : `${typeof value} ${String(value)}`;
}

/**
 * A string parameter, optionally restricted by a pattern.
 */
export function stringParameter(name: string, stringValidator?: StringValidator): Parameter<string> {
    return new Parameter({
        name,
        type  : ValueTypes.string,
        encode: (value) => value,
        decode: (raw) => raw,
        stringValidator,
    });
}

/**
 * An integer parameter written in base 10.
 */
export function integerParameter(name: string, valueValidator?: ValueValidator<number>): Parameter<number> {
    return new Parameter({
        name,
        type           : ValueTypes.integer,
        encode         : (value) => value.toString(10),
        decode         : (raw) => Number(raw),
        stringValidator: /-?\d+/,
        valueValidator,
    });
}
