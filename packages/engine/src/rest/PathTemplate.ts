/**
 * @fileoverview Path templates
 *
 * A PathTemplate is an ordered list of resource segments. Each segment is
 * a base path followed by zero or more parameters. Resolving a template
 * encodes the values of each segment, joins them with "/" and resolves that
 * against the segment's base path (RFC 3986 reference resolution). Segment
 * addresses are then joined onto the accumulated address with a single "/"
 * and resolved against it, so later segments nest under earlier ones.
 *
 * A base path that names a directory must end with "/": "pilots/" + "SN-1"
 * gives "pilots/SN-1", while "pilots" + "SN-1" gives "SN-1".
 *
 * @module @nestguard/engine/rest/PathTemplate
 */

import {
    MissingParameterError,
    ParameterCountError,
    ValidationError,
} from "../contracts/errors.js";
import type { PathParameter } from "./Parameter.js";
import { type Charset, DEFAULT_CHARSET } from "./percentEncoding.js";

/**
 * Values for named resolution.
 */
export type NamedValues = ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>;

const kPLACEHOLDER_ORIGIN = "http://placeholder.invalid";
const kSCHEME = /^[A-Za-z][A-Za-z0-9+.-]*:/;

/**
 * Resolve a reference against a base address (RFC 3986 section 5.2).
 * Both may be relative; a relative base yields a relative result.
 */
export function resolveReference(base: string, reference: string): string {
    if (kSCHEME.test(base)) {
        try {
            return new URL(reference, base).href;
        }
        catch (error) {
            throw new ValidationError(`Cannot resolve "${reference}" against "${base}"`, { cause: error });
        }
    }

    const rooted = base.startsWith("/");
    let resolved: URL;
    try {
        resolved = new URL(reference, `${kPLACEHOLDER_ORIGIN}${rooted ? "" : "/"}${base}`);
    }
    catch (error) {
        throw new ValidationError(`Cannot resolve "${reference}" against "${base}"`, { cause: error });
    }

    if (resolved.origin !== kPLACEHOLDER_ORIGIN) {
        // The reference carried its own scheme or authority
        return resolved.href;
    }

    const path = `${resolved.pathname}${resolved.search}${resolved.hash}`;
    return rooted || reference.startsWith("/") ? path : path.replace(/^\//, "");
}

/**
 * One resource segment: a base path and its parameters.
 */
export class ResourceSegment {
    readonly basePath: string;
    readonly parameters: readonly PathParameter[];

    /**
     * @throws ValidationError on duplicate parameter names
     */
    constructor(basePath = "", parameters: readonly PathParameter[] = []) {
        const seen = new Set<string>();
        for (const parameter of parameters) {
            if (seen.has(parameter.name)) {
                throw new ValidationError(`Duplicate parameter "${parameter.name}" in segment "${basePath}"`);
            }
            seen.add(parameter.name);
        }

        this.basePath = basePath;
        this.parameters = Object.freeze([...parameters]);
    }

    /**
     * Return a new segment with one more parameter.
     *
     * @throws ValidationError if the name is already taken
     */
    withParameter(parameter: PathParameter): ResourceSegment {
        return new ResourceSegment(this.basePath, [...this.parameters, parameter]);
    }

    /**
     * Resolve with exactly one value per parameter, in order.
     */
    resolve(values: readonly unknown[], charset: Charset = DEFAULT_CHARSET): string {
        if (values.length !== this.parameters.length) {
            throw new ParameterCountError(
                values.length > this.parameters.length ? "too-many" : "not-enough",
                this.parameters.length,
                values.length
            );
        }

        const reference = this.parameters
            .map((parameter, index) => {
                const encoded = parameter.encodeValue(values[index], charset);
                if (encoded === "." || encoded === "..") {
                    throw new ValidationError(`Parameter "${parameter.name}" cannot be a dot segment`);
                }
                return encoded;
            })
            .join("/");
        return resolveReference(this.basePath, reference);
    }
}

/**
 * PathTemplate - immutable sequence of resource segments.
 *
 * @example
 * ```typescript
 * const pilots = new PathTemplate([
 *     new ResourceSegment("pilots/", [stringParameter("serial", /[-\w]+/)]),
 * ]);
 *
 * pilots.resolve(["SN-42"]);                      // "pilots/SN-42"
 * pilots.resolve({ serial: "SN-42" });            // "pilots/SN-42"
 * pilots.resolveAgainst("https://host/api/", ["SN-42"]);
 * // "https://host/api/pilots/SN-42"
 * ```
 */
export class PathTemplate {
    readonly segments: readonly ResourceSegment[];
    readonly charset: Charset;

    constructor(segments: readonly ResourceSegment[] = [], charset: Charset = DEFAULT_CHARSET) {
        this.segments = Object.freeze([...segments]);
        this.charset = charset;
    }

    /**
     * All parameters across segments, in order.
     */
    get parameters(): readonly PathParameter[] {
        return this.segments.flatMap((segment) => segment.parameters);
    }

    get parameterCount(): number {
        return this.parameters.length;
    }

    /**
     * Whether the first segment's base path carries a scheme.
     */
    get isAbsolute(): boolean {
        const first = this.segments[0];
        return first !== undefined && kSCHEME.test(first.basePath);
    }

    /**
     * Resolve positionally (array) or by name (record or map).
     *
     * @throws ParameterCountError when the number of values does not match
     * @throws MissingParameterError when a named value is absent
     * @throws ValidationError when a parameter rejects its value
     */
    resolve(values: readonly unknown[] | NamedValues = []): string {
        return isPositional(values)
            ? this.resolvePositional(values)
            : this.resolveNamed(values);
    }

    /**
     * Resolve and then resolve the result against an absolute base address.
     */
    resolveAgainst(base: string, values: readonly unknown[] | NamedValues = []): string {
        if (!kSCHEME.test(base)) {
            throw new ValidationError(`Base address must be absolute: "${base}"`);
        }
        return resolveReference(base, this.resolve(values));
    }

    private resolvePositional(values: readonly unknown[]): string {
        const expected = this.parameterCount;
        if (values.length > expected) {
            throw new ParameterCountError("too-many", expected, values.length);
        }
        if (values.length < expected) {
            throw new ParameterCountError("not-enough", expected, values.length);
        }

        let offset = 0;
        return this.accumulate((segment) => {
            const slice = values.slice(offset, offset + segment.parameters.length);
            offset += segment.parameters.length;
            return segment.resolve(slice, this.charset);
        });
    }

    private resolveNamed(values: NamedValues): string {
        const lookup = toMap(values);
        const known = new Set(this.parameters.map((parameter) => parameter.name));

        const unknown = [...lookup.keys()].filter((name) => !known.has(name));
        if (unknown.length > 0) {
            throw new ParameterCountError("too-many", known.size, lookup.size);
        }

        return this.accumulate((segment) => {
            const slice = segment.parameters.map((parameter) => {
                if (!lookup.has(parameter.name)) {
                    throw new MissingParameterError(parameter.name);
                }
                return lookup.get(parameter.name);
            });
            return segment.resolve(slice, this.charset);
        });
    }

    private accumulate(resolveSegment: (segment: ResourceSegment) => string): string {
        let address: string | undefined;
        for (const segment of this.segments) {
            const segmentAddress = resolveSegment(segment);
            address = address === undefined
                ? segmentAddress
                : resolveReference(asDirectory(address), segmentAddress);
        }
        return address ?? "";
    }
}

function asDirectory(address: string): string {
    return address === "" || address.endsWith("/") ? address : `${address}/`;
}

function isPositional(values: readonly unknown[] | NamedValues): values is readonly unknown[] {
    return Array.isArray(values);
}

function toMap(values: NamedValues): ReadonlyMap<string, unknown> {
    if (values instanceof Map) {
        return values;
    }
    return new Map(Object.entries(values));
}
