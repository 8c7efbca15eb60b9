import type {BytePattern, DetectOffsetsOptions, DetectedFooter, DetectedOffsets, FooterLayout} from "./types.js";

import assert from "node:assert";

import {FooterNotFoundError, HeaderNotFoundError} from "./errors.js";
import {FOOTER_LAYOUTS, HEADER_PATTERN, footerPattern} from "./pattern_catalog.js";

interface CompiledPattern {
    lead: string;
    /** literals after the lead, relative to the match start */
    checks: {offset: number; hex: string}[];
    /** total match length in hex characters */
    length: number;
}

function compilePattern(pattern: BytePattern): CompiledPattern {
    const [first] = pattern;

    assert(first?.kind === "literal" && first.hex.length > 0, "Pattern must start with a literal.");

    const checks: CompiledPattern["checks"] = [];
    let length = 0;

    for (const segment of pattern) {
        if (segment.kind === "literal") {
            assert(segment.hex.length % 2 === 0, `Literal '${segment.hex}' is not made of whole bytes.`);

            if (length > 0) {
                checks.push({offset: length, hex: segment.hex});
            }

            length += segment.hex.length;
        } else {
            assert(Number.isInteger(segment.bytes) && segment.bytes >= 0, `Invalid gap length ${segment.bytes}.`);

            length += segment.bytes * 2;
        }
    }

    return {lead: first.hex, checks, length};
}

/**
 * Leftmost byte-aligned match of `pattern` in `view` at or after `from`, in hex view coordinates.
 * Gaps match any digits but may not run past the end of the view.
 */
export function findPattern(view: string, pattern: BytePattern, from = 0): number | undefined {
    const compiled = compilePattern(pattern);
    let index = view.indexOf(compiled.lead, from);

    while (index !== -1) {
        if (index + compiled.length > view.length) {
            // later candidates have even less room
            return undefined;
        }

        if (index % 2 === 0 && compiled.checks.every((check) => view.startsWith(check.hex, index + check.offset))) {
            return index;
        }

        index = view.indexOf(compiled.lead, index + 1);
    }

    return undefined;
}

/** header anchor length in hex characters */
export const HEADER_LENGTH = compilePattern(HEADER_PATTERN).length;

/**
 * Leftmost match wins, even when a spurious lookalike precedes the real header.
 */
export function detectHeader(view: string): number {
    const position = findPattern(view, HEADER_PATTERN);

    if (position === undefined) {
        throw new HeaderNotFoundError();
    }

    return position;
}

/**
 * Try each layout in catalog order and return the first one matching anywhere at or after `from`.
 * Catalog order, not position in the image, decides between layouts.
 */
export function detectFooter(view: string, catalog: readonly FooterLayout[] = FOOTER_LAYOUTS, from = 0): DetectedFooter {
    for (const layout of catalog) {
        const position = findPattern(view, footerPattern(layout), from);

        if (position !== undefined) {
            return {position, layout};
        }
    }

    throw new FooterNotFoundError();
}

/**
 * Footer search for an image whose header sits at `header`: only matches starting past the whole header anchor count.
 */
export function detectFooterAfterHeader(view: string, header: number, catalog: readonly FooterLayout[] = FOOTER_LAYOUTS): DetectedFooter {
    return detectFooter(view, catalog, header + HEADER_LENGTH);
}

export function detectOffsets(view: string, options: DetectOffsetsOptions = {}): DetectedOffsets {
    const {footerStripping = true, catalog = FOOTER_LAYOUTS} = options;
    const header = detectHeader(view);

    if (!footerStripping) {
        return {offsets: {header}};
    }

    const footer = detectFooterAfterHeader(view, header, catalog);

    return {offsets: {header, footer: footer.position}, footerLayout: footer.layout};
}
