export type PatternSegment = {kind: "literal"; hex: string} | {kind: "gap"; bytes: number};

/** Sequence of whole-byte literals and fixed-length wildcard runs. */
export type BytePattern = readonly PatternSegment[];

export interface FooterLayout {
    /** GPU generation the layout was observed on */
    name: string;
    /** bytes between the `VN` anchor and the NPDS marker */
    firstGapBytes: number;
    /** bytes between the NPDS marker and the trailing NPDE marker */
    secondGapBytes: number;
}

/** Positions in hex view coordinates (two characters per byte). */
export interface Offsets {
    header?: number;
    footer?: number;
}

export interface DetectedFooter {
    position: number;
    layout: FooterLayout;
}

export interface DetectedOffsets {
    offsets: Offsets;
    footerLayout?: FooterLayout;
}

export interface DetectOffsetsOptions {
    /** Search for the footer after the header. Default `true`. */
    footerStripping?: boolean;
    catalog?: readonly FooterLayout[];
}

export enum SanityRule {
    SingleNpds = "single-npds",
    ThreeNpde = "three-npde",
    TwoNpdeAfterNpds = "two-npde-after-npds",
}

export interface SanityViolation {
    rule: SanityRule;
    expected: number;
    observed: number;
    message: string;
}

export interface ExtractOptions {
    /** Detect the footer and cut the image there. Default `true`. */
    footerStripping?: boolean;
    /** Fail the run on a sanity violation instead of logging it. Default `true`. */
    sanityViolationsFatal?: boolean;
    logPrefix?: string;
}

export enum ExtractionState {
    Init = "init",
    HeaderFound = "header-found",
    FooterFound = "footer-found",
    FooterSkipped = "footer-skipped",
    Validated = "validated",
    SkippedValidation = "skipped-validation",
    Spliced = "spliced",
    Failed = "failed",
}
