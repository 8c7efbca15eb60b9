import type {BytePattern, FooterLayout, PatternSegment} from "./types.js";

/** `NPDS`, PCI data structure signature */
export const NPDS_MARKER = "4e504453";
/** `NPDE`, PCI data structure extension signature */
export const NPDE_MARKER = "4e504445";
/** `VN`, start of the footer trailing the legacy image */
export const FOOTER_ANCHOR = "564e";
export const FOOTER_SECOND_GAP_BYTES = 28;

function literal(hex: string): PatternSegment {
    const segment: PatternSegment = {kind: "literal", hex};

    return Object.freeze(segment);
}

function gap(bytes: number): PatternSegment {
    const segment: PatternSegment = {kind: "gap", bytes};

    return Object.freeze(segment);
}

/**
 * `55aa` option-ROM signature, one byte, `eb` (short jump), ten bytes, then `VIDEO`.
 */
export const HEADER_PATTERN: BytePattern = Object.freeze([literal("55aa"), gap(1), literal("eb"), gap(10), literal("564944454f")]);

function layout(name: string, firstGapBytes: number): FooterLayout {
    return Object.freeze({name, firstGapBytes, secondGapBytes: FOOTER_SECOND_GAP_BYTES});
}

/**
 * Newest first: a longer first gap must be ruled out before falling back to an older, shorter layout.
 */
export const FOOTER_LAYOUTS: readonly FooterLayout[] = Object.freeze([
    layout("RTX 30XX", 318),
    layout("RTX 2060", 286),
    layout("GTX 16XX / RTX 20XX", 238),
    layout("Quadro PXXX", 222),
    layout("GTX 10XX", 174),
    layout("GTX 980", 94),
    layout("GTX 400 - 900 Series", 62),
]);

export function footerPattern(footerLayout: FooterLayout): BytePattern {
    return Object.freeze([
        literal(FOOTER_ANCHOR),
        gap(footerLayout.firstGapBytes),
        literal(NPDS_MARKER),
        gap(footerLayout.secondGapBytes),
        literal(NPDE_MARKER),
    ]);
}
