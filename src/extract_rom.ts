import type {ExtractOptions, FooterLayout, Offsets, SanityViolation} from "./types.js";

import assert from "node:assert";

import {RomCheckError, SanityViolationError} from "./errors.js";
import {encodeHex} from "./hex_codec.js";
import {detectFooterAfterHeader, detectHeader} from "./offset_detector.js";
import {checkSanity} from "./sanity_checker.js";
import {splice} from "./splicer.js";
import {ExtractionState} from "./types.js";

export const DEFAULT_LOG_PREFIX = "[vbios]";

const TRANSITIONS: Readonly<Record<ExtractionState, readonly ExtractionState[]>> = {
    [ExtractionState.Init]: [ExtractionState.HeaderFound, ExtractionState.Failed],
    [ExtractionState.HeaderFound]: [ExtractionState.FooterFound, ExtractionState.FooterSkipped, ExtractionState.Failed],
    [ExtractionState.FooterFound]: [ExtractionState.Validated, ExtractionState.Failed],
    [ExtractionState.FooterSkipped]: [ExtractionState.SkippedValidation, ExtractionState.Failed],
    [ExtractionState.Validated]: [ExtractionState.Spliced, ExtractionState.Failed],
    [ExtractionState.SkippedValidation]: [ExtractionState.Spliced, ExtractionState.Failed],
    [ExtractionState.Spliced]: [],
    [ExtractionState.Failed]: [],
};

export interface ExtractionSuccess {
    state: ExtractionState.Spliced;
    rom: Buffer;
    offsets: Offsets;
    /** unset when footer stripping is disabled */
    footerLayout?: FooterLayout;
    /** set when a sanity rule failed and violations are not fatal */
    sanityViolation?: SanityViolation;
}

export interface ExtractionFailure {
    state: ExtractionState.Failed;
    /** last state reached before failing */
    failedIn: ExtractionState;
    reason: RomCheckError;
    offsets: Offsets;
}

export type ExtractionOutcome = ExtractionSuccess | ExtractionFailure;

export function assertTransition(from: ExtractionState, to: ExtractionState): void {
    assert(TRANSITIONS[from].includes(to), `Invalid extraction state transition ${from} -> ${to}.`);
}

/**
 * Locate, validate and splice the passthrough-ready part of a full vBIOS dump.
 *
 * Detection, decode and (fatal) sanity failures end the run in {@link ExtractionState.Failed} and are returned, not
 * thrown. Anything else (e.g. a broken state transition) is a bug and propagates.
 */
export function extractRom(image: Uint8Array, options: ExtractOptions = {}): ExtractionOutcome {
    const {footerStripping = true, sanityViolationsFatal = true, logPrefix = DEFAULT_LOG_PREFIX} = options;
    const offsets: Offsets = {};
    let state = ExtractionState.Init;
    let footerLayout: FooterLayout | undefined;
    let sanityViolation: SanityViolation | undefined;

    const advance = (to: ExtractionState): void => {
        assertTransition(state, to);

        state = to;
    };

    try {
        console.log(`${logPrefix} Scanning for ROM offsets...`);

        const view = encodeHex(image);
        offsets.header = detectHeader(view);

        advance(ExtractionState.HeaderFound);
        console.log(`${logPrefix} ROM header found at byte ${offsets.header / 2}.`);

        if (footerStripping) {
            const footer = detectFooterAfterHeader(view, offsets.header);
            offsets.footer = footer.position;
            footerLayout = footer.layout;

            advance(ExtractionState.FooterFound);
            console.log(`${logPrefix} ROM footer for ${footer.layout.name} found at byte ${footer.position / 2}.`);
            console.log(`${logPrefix} Running sanity checks...`);

            sanityViolation = checkSanity(view, offsets);

            if (sanityViolation) {
                if (sanityViolationsFatal) {
                    throw new SanityViolationError(sanityViolation);
                }

                console.warn(`${logPrefix} Encountered error during sanity check: ${sanityViolation.message}`);
                console.warn(`${logPrefix} Ignoring...`);
            } else {
                console.log(`${logPrefix} No problems found.`);
            }

            advance(ExtractionState.Validated);
        } else {
            advance(ExtractionState.FooterSkipped);
            console.log(`${logPrefix} Footer stripping disabled, keeping everything after the header.`);
            advance(ExtractionState.SkippedValidation);
        }

        const rom = splice(view, offsets, footerStripping);

        advance(ExtractionState.Spliced);
        console.log(`${logPrefix} Spliced ${rom.length} bytes.`);

        return {state: ExtractionState.Spliced, rom, offsets: {...offsets}, footerLayout, sanityViolation};
    } catch (error) {
        if (!(error instanceof RomCheckError)) {
            throw error;
        }

        const failedIn = state;

        advance(ExtractionState.Failed);
        console.error(`${logPrefix} Extraction failed: ${error.message}`);

        return {state: ExtractionState.Failed, failedIn, reason: error, offsets: {...offsets}};
    }
}

export function extractRomOrThrow(image: Uint8Array, options: ExtractOptions = {}): Buffer {
    const outcome = extractRom(image, options);

    if (outcome.state === ExtractionState.Failed) {
        throw outcome.reason;
    }

    return outcome.rom;
}
