import fc from "fast-check";
import {describe, expect, it} from "vitest";

import {DecodeError} from "../src/errors.js";
import {decodeHex, encodeHex} from "../src/hex_codec.js";

describe("Hex codec", () => {
    it("encodes lowercase, two digits per byte", () => {
        expect(encodeHex(Buffer.from([0x00, 0xff, 0x10, 0xab]))).toStrictEqual("00ff10ab");
        expect(encodeHex(new Uint8Array())).toStrictEqual("");
    });

    it("encodes only the viewed part of a subarray", () => {
        const bytes = new Uint8Array([0x01, 0x02, 0x03, 0x04]);

        expect(encodeHex(bytes.subarray(1, 3))).toStrictEqual("0203");
    });

    it("decodes into a new buffer", () => {
        const decoded = decodeHex("55aaeb");

        expect(decoded).toStrictEqual(Buffer.from([0x55, 0xaa, 0xeb]));
    });

    it("rejects odd-length input", () => {
        expect(() => decodeHex("abc")).toThrow(DecodeError);
        expect(() => decodeHex("abc")).toThrow("Odd-length hex string (3 characters).");
    });

    it("rejects non-hex and uppercase digits", () => {
        expect(() => decodeHex("0g")).toThrow(DecodeError);
        expect(() => decodeHex("00FF")).toThrow("Invalid hex digit in input.");
    });

    it("round-trips any byte sequence", () => {
        fc.assert(
            fc.property(fc.uint8Array({maxLength: 512}), (bytes) => {
                const hex = encodeHex(bytes);

                return hex.length === bytes.length * 2 && decodeHex(hex).equals(bytes);
            }),
        );
    });
});
