import type {SanityViolation} from "./types.js";

export class RomCheckError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class DecodeError extends RomCheckError {}

export class HeaderNotFoundError extends RomCheckError {
    constructor() {
        super("Couldn't find the ROM header!");
    }
}

export class FooterNotFoundError extends RomCheckError {
    constructor(message = "Couldn't find the ROM footer!") {
        super(message);
    }
}

/**
 * Thrown when a stage runs before the offsets it works on have been detected.
 */
export class MissingOffsetError extends RomCheckError {}

export class SanityViolationError extends RomCheckError {
    readonly violation: SanityViolation;

    constructor(violation: SanityViolation) {
        super(violation.message);
        this.violation = violation;
    }
}
