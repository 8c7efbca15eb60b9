import {DecodeError} from "./errors.js";

const HEX_DIGITS = /^[0-9a-f]*$/;

export function encodeHex(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

/**
 * Strict inverse of {@link encodeHex}. `Buffer.from(hex, "hex")` stops silently at the first bad pair, so the input is
 * validated up front.
 */
export function decodeHex(hex: string): Buffer {
    if (hex.length % 2 !== 0) {
        throw new DecodeError(`Odd-length hex string (${hex.length} characters).`);
    }

    if (!HEX_DIGITS.test(hex)) {
        throw new DecodeError("Invalid hex digit in input.");
    }

    return Buffer.from(hex, "hex");
}
