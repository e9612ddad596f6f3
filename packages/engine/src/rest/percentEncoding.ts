/**
 * @fileoverview Percent-encoding for path segments
 *
 * Unreserved characters (ALPHA / DIGIT / "-" / "." / "_" / "~") pass
 * through; every other byte of the charset encoding becomes `%XX` with
 * upper-case hex digits.
 *
 * @module @nestguard/engine/rest/percentEncoding
 */

import { ValidationError } from "../contracts/errors.js";

/**
 * Charsets supported for percent-encoding.
 */
export type Charset = "utf-8" | "latin1";

export const DEFAULT_CHARSET: Charset = "utf-8";

const kUNRESERVED = /^[A-Za-z0-9\-._~]$/;
const kHEX_PAIR = /^[0-9A-Fa-f]{2}$/;

function toBytes(text: string, charset: Charset): Buffer {
    if (charset === "latin1") {
        for (const char of text) {
            const codePoint = char.codePointAt(0) ?? 0;
            if (codePoint > 0xff) {
                throw new ValidationError(`Character "${char}" cannot be encoded as latin1`);
            }
        }
        return Buffer.from(text, "latin1");
    }
    return Buffer.from(text, "utf8");
}

/**
 * Percent-encode a string as a single path segment.
 */
export function percentEncode(text: string, charset: Charset = DEFAULT_CHARSET): string {
    let encoded = "";
    for (const byte of toBytes(text, charset)) {
        const char = String.fromCharCode(byte);
        encoded += byte < 0x80 && kUNRESERVED.test(char)
            ? char
            : `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
    }
    return encoded;
}

/**
 * Decode a percent-encoded string.
 *
 * @throws ValidationError for a truncated or non-hex escape, or bytes that
 *         are not valid in the charset
 */
export function percentDecode(raw: string, charset: Charset = DEFAULT_CHARSET): string {
    const bytes: number[] = [];

    for (let i = 0; i < raw.length; i++) {
        const char = raw.charAt(i);
        if (char !== "%") {
            // Literal characters are taken as-is, including non-ASCII ones
            const codePoint = raw.codePointAt(i) ?? 0;
            const literal = String.fromCodePoint(codePoint);
            bytes.push(...toBytes(literal, charset));
            i += literal.length - 1;
            continue;
        }

        const pair = raw.slice(i + 1, i + 3);
        if (!kHEX_PAIR.test(pair)) {
            throw new ValidationError(`Malformed percent escape at index ${i} in "${raw}"`);
        }
        bytes.push(parseInt(pair, 16));
        i += 2;
    }

    if (charset === "latin1") {
        return Buffer.from(bytes).toString("latin1");
    }

    try {
        return new TextDecoder("utf-8", { fatal: true }).decode(Uint8Array.from(bytes));
    }
    catch (error) {
        throw new ValidationError(`Invalid utf-8 sequence in "${raw}"`, { cause: error });
    }
}
