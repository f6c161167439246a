/**
 * Text Steganography Module
 *
 * Hides secret data in plain text using Zero-Width Characters (ZWC).
 * Pipeline: Checksum → XOR mask → one ZWC per bit, wrapped in START/END sentinels
 *
 * Frame layout: [2-byte checksum of the plain payload][mask(payload)]
 */

import {
    bitsToBytes,
    bytesEqual,
    bytesToBits,
    CHECKSUM_LENGTH,
    computeChecksum,
    decodeUtf8,
    mask,
    MAX_COVER_LENGTH,
    MAX_SECRET_LENGTH,
    unmask,
} from "./common.ts";
import { attempt, DecodeError, FormatError, IntegrityError, type StegoResult, ValidationError } from "./errors.ts";

/** Bit 0 (ZERO WIDTH SPACE) */
export const ZERO = "\u200b";
/** Bit 1 (ZERO WIDTH NON-JOINER) */
export const ONE = "\u200c";
/** Payload start marker (ZERO WIDTH NO-BREAK SPACE) */
export const START = "\ufeff";
/** Payload end marker (ZERO WIDTH JOINER) */
export const END = "\u200d";

const ZWC_PATTERN = /[\u200b\u200c\u200d\ufeff]/g;

/**
 * Branded type for steganographic text containing hidden ZWC data
 * This helps distinguish stega text from regular strings for type safety
 */
export type StegaText = string & { readonly __brand: "StegaText" };

function asStegaText(text: string): StegaText {
    return text as StegaText;
}

/**
 * Inserts the bit-encoded frame right after the first scalar value of the cover text
 * Result: cover[0] + START + (ONE|ZERO)* + END + cover[1:]
 */
export function embedZeroWidth(coverText: string, frame: Uint8Array): StegaText {
    const first = coverText.codePointAt(0);
    if (first === undefined) {
        throw new ValidationError("Cover text cannot be empty.");
    }

    const bits = bytesToBits(frame);
    let invisible = START;
    for (const bit of bits) {
        invisible += bit ? ONE : ZERO;
    }
    invisible += END;

    const head = String.fromCodePoint(first);
    return asStegaText(head + invisible + coverText.slice(head.length));
}

/**
 * Collects the frame bits between the first START and the first END sentinel
 * Scans Unicode scalar values; characters other than ZERO and ONE between the sentinels are ignored.
 */
export function extractZeroWidthBits(stegaText: string | StegaText): Uint8Array {
    const scalars = Array.from(stegaText);
    const startIdx = scalars.indexOf(START);
    const endIdx = scalars.indexOf(END);

    if (startIdx === -1 || endIdx === -1 || endIdx <= startIdx) {
        throw new FormatError("No hidden message found in this text.");
    }

    const bits: number[] = [];
    for (let i = startIdx + 1; i < endIdx; i++) {
        if (scalars[i] === ONE) bits.push(1);
        else if (scalars[i] === ZERO) bits.push(0);
    }

    if (bits.length === 0 || bits.length % 8 !== 0) {
        throw new FormatError("Hidden data is corrupted or incomplete.");
    }

    return Uint8Array.from(bits);
}

/**
 * Builds the text frame: checksum of the plain payload, then the masked payload
 */
export function buildTextFrame(payload: Uint8Array, password: string): Uint8Array {
    const frame = new Uint8Array(CHECKSUM_LENGTH + payload.length);
    frame.set(computeChecksum(payload), 0);
    frame.set(mask(payload, password), CHECKSUM_LENGTH);
    return frame;
}

/**
 * Splits a text frame, removes the mask and verifies the checksum
 * @returns The unmasked payload bytes
 */
export function parseTextFrame(frame: Uint8Array, password: string): Uint8Array {
    if (frame.length <= CHECKSUM_LENGTH) {
        throw new DecodeError("Hidden data is too short, possibly corrupted.");
    }

    const storedChecksum = frame.subarray(0, CHECKSUM_LENGTH);
    const payload = unmask(frame.subarray(CHECKSUM_LENGTH), password);

    if (!bytesEqual(computeChecksum(payload), storedChecksum)) {
        throw new IntegrityError(
            "Wrong password, the message could not be unlocked. " +
                "Make sure you're using the same password that was used to hide it.",
        );
    }

    return payload;
}

/**
 * Options for text encoding
 */
export interface TextEncodeOptions {
    /**
     * Maximum secret message length in UTF-8 bytes
     * If not specified, uses MAX_SECRET_LENGTH (50KB)
     */
    maxSecretLength?: number;
    /**
     * Maximum cover text length in scalar values
     * If not specified, uses MAX_COVER_LENGTH
     */
    maxCoverLength?: number;
    /**
     * Whether to fail when the secret exceeds maxSecretLength (default: true)
     * If false, will only warn but still encode
     */
    strictCapacity?: boolean;
}

/**
 * Encodes a secret message into a cover text using ZWC steganography
 *
 * @param coverText - The visible text that will carry the hidden message
 * @param secretText - The secret text to hide
 * @param password - Optional XOR mask key (empty means no masking)
 * @param options - Optional size limits
 * @returns The cover text with the invisible payload inserted after its first character
 */
export function textEncode(
    coverText: string,
    secretText: string,
    password: string = "",
    options?: TextEncodeOptions,
): StegoResult<StegaText> {
    return attempt(() => {
        if (coverText.length === 0) {
            throw new ValidationError("Cover text cannot be empty.");
        }
        if (secretText.length === 0) {
            throw new ValidationError("Secret message cannot be empty.");
        }
        // An END ahead of the new START would be the first END found on decode
        if (coverText.startsWith(END)) {
            throw new ValidationError("Cover text cannot start with a zero-width joiner (U+200D).");
        }

        const maxCoverLength = options?.maxCoverLength ?? MAX_COVER_LENGTH;
        const coverLength = Array.from(coverText).length;
        if (coverLength > maxCoverLength) {
            throw new ValidationError(
                `Cover text too long. ${coverLength} chars, maximum: ${maxCoverLength} chars. ` +
                    `Increase maxCoverLength option if needed.`,
            );
        }

        const payload = new TextEncoder().encode(secretText);
        const maxSecretLength = options?.maxSecretLength ?? MAX_SECRET_LENGTH;
        if (payload.length > maxSecretLength) {
            const message = `Secret message too long. ${payload.length} bytes, maximum: ${maxSecretLength} bytes. ` +
                `Increase maxSecretLength option if needed.`;

            if (options?.strictCapacity ?? true) {
                throw new ValidationError(message);
            }
            console.warn(`⚠ ${message} Proceeding anyway...`);
        }

        return embedZeroWidth(coverText, buildTextFrame(payload, password));
    });
}

/**
 * Decodes a hidden message from text containing ZWC steganography
 *
 * @param stegaText - Text potentially containing hidden ZWC data
 * @param password - Password the message was hidden with
 * @returns The secret text, or a format, integrity or decode failure
 */
export function textDecode(
    stegaText: string | StegaText,
    password: string = "",
): StegoResult<string> {
    return attempt(() => {
        const frame = bitsToBytes(extractZeroWidthBits(stegaText));
        const payload = parseTextFrame(frame, password);
        return decodeUtf8(payload, "Could not decode, message may be corrupted.");
    });
}

/**
 * Checks if text contains both payload sentinels
 */
export function hasHiddenMessage(text: string | StegaText): boolean {
    return text.includes(START) && text.includes(END);
}

/**
 * Strips all ZWC characters from text (removes any hidden data)
 */
export function stripInvisible(text: string | StegaText): string {
    return text.replace(ZWC_PATTERN, "");
}

/**
 * Statistics about hidden data in text
 */
export interface ZWCStats {
    hasHiddenData: boolean;
    visibleLength: number;
    zwcCount: number;
    estimatedPayloadBytes: number;
    breakdown: { zero: number; one: number; start: number; end: number };
}

export function analyzeZeroWidth(text: string | StegaText): ZWCStats {
    const breakdown = { zero: 0, one: 0, start: 0, end: 0 };
    let visibleLength = 0;

    for (const char of text) {
        switch (char) {
            case ZERO:
                breakdown.zero++;
                break;
            case ONE:
                breakdown.one++;
                break;
            case START:
                breakdown.start++;
                break;
            case END:
                breakdown.end++;
                break;
            default:
                visibleLength++;
        }
    }

    // Each byte = 8 bit characters, minus the checksum
    const frameBytes = Math.floor((breakdown.zero + breakdown.one) / 8);

    return {
        hasHiddenData: hasHiddenMessage(text),
        visibleLength,
        zwcCount: breakdown.zero + breakdown.one + breakdown.start + breakdown.end,
        estimatedPayloadBytes: Math.max(0, frameBytes - CHECKSUM_LENGTH),
        breakdown,
    };
}
