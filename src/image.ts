/**
 * Image steganography
 * Hides a masked payload in the least-significant bit of each RGB channel of a flat pixel buffer.
 *
 * Frame layout: [mask(payload)][5 zero bytes]
 */

import {
    bytesToBits,
    decodeUtf8,
    mask,
    MAX_MESSAGE_LENGTH,
    unmask,
    validatePixelBuffer,
} from "./common.ts";
import { attempt, FormatError, type StegoFailure, type StegoResult, toFailure, ValidationError } from "./errors.ts";

/** Length of the all-zero end-of-frame marker */
export const TERMINATOR_LENGTH = 5;

const NO_MESSAGE = "No hidden message found in this image.";
const UNDECODABLE = "Could not decode the message. " +
    "Possible causes: wrong password, or no message was encoded here.";

/**
 * Calculates how many payload bytes an RGB image can hide at one bit per channel
 * Negative for images too small to hold even the terminator.
 */
export function imageCapacity(pixelCount: number): number {
    return Math.floor((pixelCount * 3) / 8) - TERMINATOR_LENGTH;
}

/**
 * Same as {@link imageCapacity}, clamped at zero
 */
export function availableImageCapacity(pixelCount: number): number {
    return Math.max(0, imageCapacity(pixelCount));
}

/**
 * Embeds frame bits into the LSB of each carrier byte
 * Bit i of the MSB-first expansion of `frame` replaces the LSB of carrier byte i.
 * The input array is never modified; a capacity failure throws before anything is copied.
 */
export function embedLSB(carrier: Uint8Array, frame: Uint8Array): Uint8Array {
    const requiredBits = frame.length * 8;

    if (requiredBits > carrier.length) {
        throw new ValidationError(
            `Message too large for image capacity. ` +
                `Required: ${requiredBits} bits (${frame.length} bytes), ` +
                `Available: ${carrier.length} bits (${Math.floor(carrier.length / 8)} bytes). ` +
                `Try: shorter message or larger image.`,
        );
    }

    const result = new Uint8Array(carrier);
    const bits = bytesToBits(frame);

    for (let i = 0; i < bits.length; i++) {
        result[i] = (result[i] & 0xFE) | bits[i];
    }

    return result;
}

/**
 * Reads LSBs until the first run of five zero bytes and returns the bytes before it
 * A masked payload that itself contains five consecutive zero bytes ends the frame early.
 */
export function extractTerminatedFrame(carrier: Uint8Array): Uint8Array {
    const decoded: number[] = [];
    let current = 0;
    let bitCount = 0;
    let zeroRun = 0;

    for (let i = 0; i < carrier.length; i++) {
        current = (current << 1) | (carrier[i] & 1);
        bitCount++;
        if (bitCount < 8) continue;

        decoded.push(current);
        zeroRun = current === 0 ? zeroRun + 1 : 0;
        current = 0;
        bitCount = 0;

        if (zeroRun === TERMINATOR_LENGTH) {
            return new Uint8Array(decoded.slice(0, decoded.length - TERMINATOR_LENGTH));
        }
    }

    throw new FormatError(NO_MESSAGE);
}

/**
 * Options for image encoding
 */
export interface ImageEncodeOptions {
    /**
     * Maximum message length in UTF-8 bytes
     * If not specified, uses MAX_MESSAGE_LENGTH (10MB)
     */
    maxMessageLength?: number;
    /**
     * Maximum width and height in pixels
     * If not specified, uses MAX_IMAGE_DIMENSION (10,000)
     */
    maxImageDimension?: number;
}

/**
 * Builds the image frame for a secret: the masked payload followed by the terminator
 */
export function buildImageFrame(
    secretText: string,
    password: string,
    options?: ImageEncodeOptions,
): Uint8Array {
    if (secretText.length === 0) {
        throw new ValidationError("Secret message cannot be empty.");
    }

    const payload = new TextEncoder().encode(secretText);
    const maxMessageLength = options?.maxMessageLength ?? MAX_MESSAGE_LENGTH;
    if (payload.length > maxMessageLength) {
        throw new ValidationError(
            `Message too long. ${payload.length} bytes, maximum: ${maxMessageLength} bytes. ` +
                `Increase maxMessageLength option if needed.`,
        );
    }

    const masked = mask(payload, password);
    // Trailing bytes stay zero and form the terminator
    const frame = new Uint8Array(masked.length + TERMINATOR_LENGTH);
    frame.set(masked, 0);
    return frame;
}

export type ImageEncodeResult =
    | { ok: true; message: string; pixels: Uint8Array }
    | StegoFailure;

/**
 * Hides a secret message in a flat RGB pixel buffer
 *
 * @param pixels - Row-major RGB bytes, length width*height*3 (not modified)
 * @param width - Image width in pixels
 * @param height - Image height in pixels
 * @param secretText - The secret text to hide
 * @param password - Optional XOR mask key (empty means no masking)
 * @returns The modified pixel copy and a summary, or a validation failure
 */
export function imageEncode(
    pixels: Uint8Array,
    width: number,
    height: number,
    secretText: string,
    password: string = "",
    options?: ImageEncodeOptions,
): ImageEncodeResult {
    try {
        validatePixelBuffer(pixels, width, height, options?.maxImageDimension);
        const frame = buildImageFrame(secretText, password, options);

        const capacity = availableImageCapacity(width * height);
        const payloadLength = frame.length - TERMINATOR_LENGTH;
        if (payloadLength > capacity) {
            throw new ValidationError(
                `Message too long. This image can hold up to ${capacity.toLocaleString("en-US")} bytes, ` +
                    `but your message needs ${payloadLength.toLocaleString("en-US")}.`,
            );
        }

        const characters = Array.from(secretText).length;
        return {
            ok: true,
            message: `Encoded ${characters.toLocaleString("en-US")} characters into a ${width}×${height} image.`,
            pixels: embedLSB(pixels, frame),
        };
    } catch (error) {
        return toFailure(error);
    }
}

/**
 * Extracts a hidden message from a flat RGB pixel buffer
 * An image whose first 40 channel LSBs are all zero decodes to "".
 *
 * The image path carries no checksum: a wrong password is only caught when the
 * unmasked bytes happen not to be valid UTF-8.
 */
export function imageDecode(pixels: Uint8Array, password: string = ""): StegoResult<string> {
    return attempt(() => {
        const frame = extractTerminatedFrame(pixels);
        return decodeUtf8(unmask(frame, password), UNDECODABLE);
    });
}

export interface ChannelStats {
    ones: number;
    zeros: number;
    changed?: number;
}

export interface LSBStats {
    red: ChannelStats;
    green: ChannelStats;
    blue: ChannelStats;
    total: ChannelStats;
}

/**
 * Generates LSB statistics for an RGB buffer
 * Returns counts of LSB=1 vs LSB=0 per channel
 * Optionally compares with original to show how many bits were changed
 */
export function generateLSBStats(
    pixels: Uint8Array,
    originalPixels?: Uint8Array,
): LSBStats {
    const ones = [0, 0, 0];
    const zeros = [0, 0, 0];
    const changed = [0, 0, 0];

    for (let i = 0; i < pixels.length; i++) {
        const channel = i % 3;
        const lsb = pixels[i] & 1;

        if (lsb) ones[channel]++;
        else zeros[channel]++;

        if (originalPixels && i < originalPixels.length && lsb !== (originalPixels[i] & 1)) {
            changed[channel]++;
        }
    }

    const channelStats = (channel: number): ChannelStats =>
        originalPixels
            ? { ones: ones[channel], zeros: zeros[channel], changed: changed[channel] }
            : { ones: ones[channel], zeros: zeros[channel] };

    const total: ChannelStats = {
        ones: ones[0] + ones[1] + ones[2],
        zeros: zeros[0] + zeros[1] + zeros[2],
    };
    if (originalPixels) {
        total.changed = changed[0] + changed[1] + changed[2];
    }

    return {
        red: channelStats(0),
        green: channelStats(1),
        blue: channelStats(2),
        total,
    };
}
