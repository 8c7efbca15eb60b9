export * from "./errors.js";
export {DEFAULT_LOG_PREFIX, assertTransition, extractRom, extractRomOrThrow} from "./extract_rom.js";
export type {ExtractionFailure, ExtractionOutcome, ExtractionSuccess} from "./extract_rom.js";
export {decodeHex, encodeHex} from "./hex_codec.js";
export {HEADER_LENGTH, detectFooter, detectFooterAfterHeader, detectHeader, detectOffsets, findPattern} from "./offset_detector.js";
export * from "./pattern_catalog.js";
export {checkSanity, findMarkers} from "./sanity_checker.js";
export {splice} from "./splicer.js";
export {ExtractionState, SanityRule} from "./types.js";
export type {BytePattern, DetectOffsetsOptions, DetectedFooter, DetectedOffsets, ExtractOptions, FooterLayout, Offsets, PatternSegment, SanityViolation} from "./types.js";
