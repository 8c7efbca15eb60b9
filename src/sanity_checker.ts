import type {Offsets, SanityViolation} from "./types.js";

import {MissingOffsetError} from "./errors.js";
import {NPDE_MARKER, NPDS_MARKER} from "./pattern_catalog.js";
import {SanityRule} from "./types.js";

/**
 * Byte-aligned, non-overlapping occurrences of `marker` lying fully inside `[start, end)`.
 */
export function findMarkers(view: string, marker: string, start: number, end: number): number[] {
    const positions: number[] = [];
    let index = view.indexOf(marker, start);

    while (index !== -1 && index + marker.length <= end) {
        if (index % 2 === 0) {
            positions.push(index);
            index = view.indexOf(marker, index + marker.length);
        } else {
            index = view.indexOf(marker, index + 1);
        }
    }

    return positions;
}

function violation(rule: SanityRule, expected: number, observed: number, message: string): SanityViolation {
    return {rule, expected, observed, message};
}

/**
 * Check the NPDS/NPDE layout between header and footer of a UEFI-capable image. Returns the first failed rule, if any.
 */
export function checkSanity(view: string, offsets: Offsets): SanityViolation | undefined {
    const {header, footer} = offsets;

    if (header === undefined || footer === undefined) {
        throw new MissingOffsetError("Header/footer offsets not set before sanity checks.");
    }

    const npds = findMarkers(view, NPDS_MARKER, header, footer);

    if (npds.length !== 1) {
        return violation(
            SanityRule.SingleNpds,
            1,
            npds.length,
            `Expected only one 'NPDS' marker between header and footer, found ${npds.length}.`,
        );
    }

    const npdeCount = findMarkers(view, NPDE_MARKER, header, footer).length;

    if (npdeCount !== 3) {
        return violation(
            SanityRule.ThreeNpde,
            3,
            npdeCount,
            `Expected three 'NPDE' markers between header and footer, found ${npdeCount} (possible vBIOS without UEFI support).`,
        );
    }

    const npdeAfterNpdsCount = findMarkers(view, NPDE_MARKER, npds[0], footer).length;

    if (npdeAfterNpdsCount !== 2) {
        return violation(
            SanityRule.TwoNpdeAfterNpds,
            2,
            npdeAfterNpdsCount,
            `Expected two 'NPDE' markers after the 'NPDS' marker, found ${npdeAfterNpdsCount}.`,
        );
    }

    return undefined;
}
