/**
 * hidden-ink
 *
 * Steganography library supporting:
 * - Image steganography (LSB of each RGB channel, terminator-delimited frame)
 * - Text steganography (Zero-Width Character encoding with a checksum frame)
 */

export * from "./src/common.ts";
export * from "./src/errors.ts";
export * from "./src/image.ts";
export * from "./src/png.ts";
export * from "./src/text.ts";
