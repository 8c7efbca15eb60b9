import type {Offsets} from "./types.js";

import {FooterNotFoundError, MissingOffsetError} from "./errors.js";
import {decodeHex} from "./hex_codec.js";

/**
 * Cut `view` from the header to the footer (or to the end when `includeFooter` is false) and decode it into a new
 * buffer.
 */
export function splice(view: string, offsets: Offsets, includeFooter: boolean): Buffer {
    if (offsets.header === undefined) {
        throw new MissingOffsetError("Header offset not found; cannot splice ROM.");
    }

    if (!includeFooter) {
        return decodeHex(view.slice(offsets.header));
    }

    if (offsets.footer === undefined) {
        throw new FooterNotFoundError("Footer offset not found; cannot splice ROM.");
    }

    return decodeHex(view.slice(offsets.header, offsets.footer));
}
