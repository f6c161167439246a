import { expect, test } from "vitest";
import {
    bitsToBytes,
    bytesEqual,
    bytesToBits,
    computeChecksum,
    DecodeError,
    decodeUtf8,
    mask,
    MAX_IMAGE_DIMENSION,
    unmask,
    validateImageDimensions,
    validatePixelBuffer,
    ValidationError,
} from "../mod.ts";

test("validateImageDimensions - valid dimensions", () => {
    expect(() => validateImageDimensions(100, 100)).not.toThrow();
    expect(() => validateImageDimensions(1, 1)).not.toThrow();
    expect(() => validateImageDimensions(MAX_IMAGE_DIMENSION, MAX_IMAGE_DIMENSION)).not.toThrow();
});

test("validateImageDimensions - invalid dimensions", () => {
    expect(() => validateImageDimensions(0, 100)).toThrow(ValidationError);
    expect(() => validateImageDimensions(100, 0)).toThrow(ValidationError);
    expect(() => validateImageDimensions(-1, 100)).toThrow(ValidationError);
    expect(() => validateImageDimensions(1.5, 100)).toThrow(ValidationError);
    expect(() => validateImageDimensions(100, MAX_IMAGE_DIMENSION + 1)).toThrow(/too large/);
});

test("validatePixelBuffer - length must match width*height*3", () => {
    expect(() => validatePixelBuffer(new Uint8Array(12), 2, 2)).not.toThrow();
    expect(() => validatePixelBuffer(new Uint8Array(16), 2, 2)).toThrow(
        "Pixel buffer length mismatch: got 16 bytes, expected 12 (2x2 RGB).",
    );
});

test("mask and unmask - round trip", () => {
    const data = new Uint8Array([1, 2, 3, 4, 5]);
    const password = "mypassword";

    const masked = mask(data, password);
    expect(masked).not.toEqual(data);
    expect(unmask(masked, password)).toEqual(data);
});

test("mask - empty key is the identity", () => {
    const data = new Uint8Array([9, 8, 7]);
    expect(mask(data, "")).toBe(data);
    expect(unmask(mask(data, ""), "")).toBe(data);
});

test("mask - key repeats cyclically", () => {
    expect(mask(new Uint8Array([1, 2, 3]), "A")).toEqual(new Uint8Array([0x40, 0x43, 0x42]));
});

test("mask - key is UTF-8 encoded", () => {
    // "é" encodes as C3 A9
    expect(mask(new Uint8Array([0, 0, 0]), "é")).toEqual(new Uint8Array([0xC3, 0xA9, 0xC3]));
});

test("mask - different passwords produce different output", () => {
    const data = new Uint8Array([1, 2, 3, 4, 5]);

    const masked1 = mask(data, "password1");
    const masked2 = mask(data, "different");

    expect(masked1.some((byte, i) => byte !== masked2[i])).toBe(true);
});

test("bytesToBits - MSB first", () => {
    expect(bytesToBits(new Uint8Array([0xA0]))).toEqual(new Uint8Array([1, 0, 1, 0, 0, 0, 0, 0]));
    expect(bytesToBits(new Uint8Array([0x01]))).toEqual(new Uint8Array([0, 0, 0, 0, 0, 0, 0, 1]));
});

test("bitsToBytes - MSB first, trailing bits dropped", () => {
    expect(bitsToBytes(new Uint8Array([0, 1, 0, 0, 1, 0, 0, 0, 1, 1]))).toEqual(new Uint8Array([0x48]));
});

test("bytesToBits and bitsToBytes - round trip", () => {
    const original = new Uint8Array([0x12, 0x34, 0x56, 0x78]);
    expect(bitsToBytes(bytesToBits(original))).toEqual(original);
});

test("computeChecksum - first two bytes of MD5", () => {
    expect(computeChecksum(new Uint8Array())).toEqual(new Uint8Array([0xD4, 0x1D]));
    expect(computeChecksum(new TextEncoder().encode("abc"))).toEqual(new Uint8Array([0x90, 0x01]));
});

test("bytesEqual - compares length and content", () => {
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2, 3]))).toBe(false);
});

test("decodeUtf8 - rejects invalid sequences with a DecodeError", () => {
    expect(decodeUtf8(new Uint8Array([0x68, 0x69]), "bad")).toBe("hi");

    let caught: unknown;
    try {
        decodeUtf8(new Uint8Array([0xFF]), "bad bytes");
    } catch (error) {
        caught = error;
    }
    expect(caught).toBeInstanceOf(DecodeError);
    expect(caught).toMatchObject({ kind: "decode", message: "bad bytes" });
});
