/**
 * Error taxonomy and result types
 *
 * Codecs and framing throw {@link StegoError} subclasses; the public operations convert
 * them into tagged {@link StegoResult} values so no data-dependent failure escapes as an exception.
 */

/**
 * Failure categories
 * - validation: empty secret or cover, oversized payload, malformed carrier buffer (detected before any mutation)
 * - format: no terminator or sentinels in the carrier
 * - integrity: checksum mismatch on the text path (wrong password)
 * - decode: unmasked bytes are not valid UTF-8 or the frame is truncated
 */
export type StegoErrorKind = "validation" | "format" | "integrity" | "decode";

export class StegoError extends Error {
    readonly kind: StegoErrorKind;

    constructor(kind: StegoErrorKind, message: string, cause?: Error) {
        super(message, cause ? { cause } : undefined);
        this.name = "StegoError";
        this.kind = kind;
    }
}

export class ValidationError extends StegoError {
    constructor(message: string, cause?: Error) {
        super("validation", message, cause);
        this.name = "ValidationError";
    }
}

export class FormatError extends StegoError {
    constructor(message: string, cause?: Error) {
        super("format", message, cause);
        this.name = "FormatError";
    }
}

export class IntegrityError extends StegoError {
    constructor(message: string, cause?: Error) {
        super("integrity", message, cause);
        this.name = "IntegrityError";
    }
}

export class DecodeError extends StegoError {
    constructor(message: string, cause?: Error) {
        super("decode", message, cause);
        this.name = "DecodeError";
    }
}

export interface StegoFailure {
    ok: false;
    kind: StegoErrorKind;
    message: string;
}

export interface StegoSuccess<T> {
    ok: true;
    value: T;
}

export type StegoResult<T> = StegoSuccess<T> | StegoFailure;

/**
 * Converts a thrown StegoError into a failure result
 * Anything else is a programming error and is re-thrown.
 */
export function toFailure(error: unknown): StegoFailure {
    if (error instanceof StegoError) {
        return { ok: false, kind: error.kind, message: error.message };
    }
    throw error;
}

/**
 * Runs `fn` and wraps its value in a success result, or its StegoError in a failure result
 */
export function attempt<T>(fn: () => T): StegoResult<T> {
    try {
        return { ok: true, value: fn() };
    } catch (error) {
        return toFailure(error);
    }
}
