/**
 * Image container adapters
 * Converts between PNG files and the flat RGB buffers the image codec works on.
 */

import { PNG } from "pngjs";

import { validatePixelBuffer } from "./common.ts";
import { FormatError } from "./errors.ts";

export interface RGBImage {
    /** Row-major RGB bytes, length width*height*3 */
    pixels: Uint8Array;
    width: number;
    height: number;
}

export type ImageFormat = "png" | "jpeg" | "gif" | "bmp" | "webp" | "tiff";

const SIGNATURES: ReadonlyArray<{ format: ImageFormat; offset: number; bytes: readonly number[] }> = [
    { format: "png", offset: 0, bytes: [0x89, 0x50, 0x4E, 0x47, 0x0D, 0x0A, 0x1A, 0x0A] },
    { format: "jpeg", offset: 0, bytes: [0xFF, 0xD8, 0xFF] },
    { format: "gif", offset: 0, bytes: [0x47, 0x49, 0x46, 0x38] },
    { format: "bmp", offset: 0, bytes: [0x42, 0x4D] },
    { format: "webp", offset: 8, bytes: [0x57, 0x45, 0x42, 0x50] },
    { format: "tiff", offset: 0, bytes: [0x49, 0x49, 0x2A, 0x00] },
    { format: "tiff", offset: 0, bytes: [0x4D, 0x4D, 0x00, 0x2A] },
];

/**
 * Detects image format from file data by its magic bytes
 * Returns format name or null if unknown
 */
export function detectImageFormat(data: Uint8Array): ImageFormat | null {
    for (const { format, offset, bytes } of SIGNATURES) {
        if (data.length < offset + bytes.length) continue;
        if (bytes.every((byte, i) => data[offset + i] === byte)) {
            return format;
        }
    }
    return null;
}

/**
 * Checks if a format is lossy (will destroy pixel-domain embedding data on re-encoding)
 */
export function isLossyFormat(format: string | null): boolean {
    if (!format) return false;
    return ["jpeg", "jpg", "webp"].includes(format.toLowerCase());
}

/**
 * Decodes PNG file data into a flat RGB buffer
 * Palette, grayscale and 16-bit images are normalised by the decoder; alpha is dropped.
 */
export function decodeToRGB(fileData: Uint8Array): RGBImage {
    const format = detectImageFormat(fileData);
    if (format !== "png") {
        throw new FormatError(
            `Unsupported image format: ${format ?? "unknown"}. Only PNG images can be read. ` +
                `Convert the image to PNG first.`,
        );
    }

    let png: PNG;
    try {
        png = PNG.sync.read(Buffer.from(fileData.buffer, fileData.byteOffset, fileData.byteLength));
    } catch (error) {
        throw new FormatError(
            `Could not read PNG data: ${error instanceof Error ? error.message : String(error)}`,
            error instanceof Error ? error : undefined,
        );
    }

    const { width, height, data } = png;
    const pixels = new Uint8Array(width * height * 3);

    for (let src = 0, dst = 0; src < data.length; src += 4, dst += 3) {
        pixels[dst] = data[src];
        pixels[dst + 1] = data[src + 1];
        pixels[dst + 2] = data[src + 2];
    }

    return { pixels, width, height };
}

/**
 * Encodes a flat RGB buffer as a PNG file
 * Every channel value is written unchanged; alpha is set to 255.
 */
export function encodeFromRGB(pixels: Uint8Array, width: number, height: number): Uint8Array {
    validatePixelBuffer(pixels, width, height);

    const png = new PNG({ width, height });
    for (let src = 0, dst = 0; src < pixels.length; src += 3, dst += 4) {
        png.data[dst] = pixels[src];
        png.data[dst + 1] = pixels[src + 1];
        png.data[dst + 2] = pixels[src + 2];
        png.data[dst + 3] = 255;
    }

    return new Uint8Array(PNG.sync.write(png));
}
