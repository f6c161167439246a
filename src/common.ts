/**
 * Common utilities shared between image and text steganography
 * Includes the XOR mask, bit/byte conversion, the frame checksum and validation functions
 */

import { createHash } from "node:crypto";

import { DecodeError, ValidationError } from "./errors.ts";

/**
 * Applies a cyclic XOR mask keyed by a password
 * Each byte is XORed with the corresponding byte from the UTF-8 encoded key (repeated as needed).
 * An empty key is the identity and returns the same array.
 */
export function mask(data: Uint8Array, key: string): Uint8Array {
    if (key.length === 0) return data;

    const keyBytes = new TextEncoder().encode(key);
    const result = new Uint8Array(data.length);

    for (let i = 0; i < data.length; i++) {
        result[i] = data[i] ^ keyBytes[i % keyBytes.length];
    }

    return result;
}

/**
 * Removes a mask applied with {@link mask} (XOR is its own inverse)
 */
export function unmask(data: Uint8Array, key: string): Uint8Array {
    return mask(data, key);
}

/**
 * Converts a byte array to a bit array
 * Each byte becomes 8 bits (MSB first)
 */
export function bytesToBits(bytes: Uint8Array): Uint8Array {
    const bits = new Uint8Array(bytes.length * 8);

    for (let i = 0; i < bytes.length; i++) {
        const byte = bytes[i];
        for (let j = 0; j < 8; j++) {
            bits[i * 8 + j] = (byte >> (7 - j)) & 1;
        }
    }

    return bits;
}

/**
 * Converts a bit array back to bytes
 * 8 bits become 1 byte (MSB first). Trailing bits that do not fill a byte are dropped.
 */
export function bitsToBytes(bits: Uint8Array): Uint8Array {
    const byteCount = Math.floor(bits.length / 8);
    const bytes = new Uint8Array(byteCount);

    for (let i = 0; i < byteCount; i++) {
        let byte = 0;
        for (let j = 0; j < 8; j++) {
            byte = (byte << 1) | (bits[i * 8 + j] & 1);
        }
        bytes[i] = byte;
    }

    return bytes;
}

/** Number of digest bytes kept as the text frame checksum */
export const CHECKSUM_LENGTH = 2;

/**
 * Computes the frame checksum: the first two bytes of the MD5 digest of the unmasked payload
 */
export function computeChecksum(payload: Uint8Array): Uint8Array {
    const digest = createHash("md5").update(payload).digest();
    return new Uint8Array(digest.subarray(0, CHECKSUM_LENGTH));
}

/**
 * Compares two byte arrays for equality
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (a[i] !== b[i]) return false;
    }
    return true;
}

/**
 * Decodes UTF-8 bytes strictly
 * Throws a DecodeError carrying `message` when the bytes are not valid UTF-8
 */
export function decodeUtf8(bytes: Uint8Array, message: string): string {
    try {
        return new TextDecoder("utf-8", { fatal: true }).decode(bytes);
    } catch (error) {
        throw new DecodeError(message, error instanceof Error ? error : undefined);
    }
}

/**
 * Maximum size limits
 */
export const MAX_MESSAGE_LENGTH = 10 * 1024 * 1024; // 10MB, image payloads
export const MAX_SECRET_LENGTH = 50000; // 50KB, text payloads
export const MAX_COVER_LENGTH = 100000; // scalar values in a cover text
export const MAX_IMAGE_DIMENSION = 10000; // 10,000 pixels

/**
 * Validates image dimensions to prevent memory exhaustion
 */
export function validateImageDimensions(
    width: number,
    height: number,
    maxDimension: number = MAX_IMAGE_DIMENSION,
): void {
    if (!Number.isInteger(width) || !Number.isInteger(height)) {
        throw new ValidationError(
            `Invalid image dimensions: width and height must be integers. Got width: ${width}, height: ${height}`,
        );
    }
    if (width <= 0 || height <= 0) {
        throw new ValidationError(
            `Invalid image dimensions: width and height must be positive. Got width: ${width}, height: ${height}`,
        );
    }
    if (width > maxDimension || height > maxDimension) {
        throw new ValidationError(
            `Image dimensions too large: ${width}x${height} pixels (maximum ${maxDimension}x${maxDimension} pixels). ` +
                `Consider resizing the image or increasing the maxImageDimension option.`,
        );
    }
}

/**
 * Validates that a flat RGB buffer matches the declared dimensions
 */
export function validatePixelBuffer(
    pixels: Uint8Array,
    width: number,
    height: number,
    maxDimension: number = MAX_IMAGE_DIMENSION,
): void {
    validateImageDimensions(width, height, maxDimension);
    const expected = width * height * 3;
    if (pixels.length !== expected) {
        throw new ValidationError(
            `Pixel buffer length mismatch: got ${pixels.length} bytes, expected ${expected} (${width}x${height} RGB).`,
        );
    }
}
