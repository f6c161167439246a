/**
 * Command line interface over the image and text operations
 * Reads and writes files; every codec failure is reported on stderr with a non-zero exit code.
 */

import { readFileSync, writeFileSync } from "node:fs";
import path from "node:path";

import { Command } from "commander";

import { type StegoResult, toFailure, ValidationError } from "./errors.ts";
import { availableImageCapacity, generateLSBStats, imageDecode, imageEncode } from "./image.ts";
import { decodeToRGB, encodeFromRGB, isLossyFormat } from "./png.ts";
import { analyzeZeroWidth, textDecode, textEncode } from "./text.ts";

interface ImageEncodeFlags {
    input: string;
    output: string;
    message: string;
    password: string;
}

interface ImageDecodeFlags {
    input: string;
    password: string;
}

interface ImageInputFlags {
    input: string;
}

interface TextEncodeFlags {
    cover?: string;
    coverFile?: string;
    message: string;
    password: string;
    output?: string;
}

interface TextInputFlags {
    text?: string;
    file?: string;
    password: string;
}

function fail(message: string): void {
    console.error(`✗ ${message}`);
    process.exitCode = 1;
}

function report<T>(result: StegoResult<T>, onSuccess: (value: T) => void): void {
    if (result.ok) {
        onSuccess(result.value);
    } else {
        fail(result.message);
    }
}

/**
 * Runs a command body, turning codec errors and file system errors into a reported failure
 */
function run(body: () => void): void {
    try {
        body();
    } catch (error) {
        if (error instanceof Error && "code" in error && typeof error.code === "string") {
            fail(error.message);
            return;
        }
        fail(toFailure(error).message);
    }
}

function readTextInput(flags: { text?: string; file?: string }, missing: string): string {
    if (flags.text !== undefined) return flags.text;
    if (flags.file !== undefined) return readFileSync(path.resolve(flags.file), "utf-8");
    throw new ValidationError(missing);
}

const MISSING_TEXT = "Provide the text with --text or --file.";

export function createProgram(): Command {
    const program = new Command();

    program
        .name("hidden-ink")
        .description("Hide text inside PNG images or plain text.")
        .version("1.0.0");

    program
        .command("image-encode")
        .description("Hide a message in a PNG image.")
        .requiredOption("-i, --input <path>", "PNG image to hide the message in.")
        .requiredOption("-o, --output <path>", "Where to write the resulting PNG.")
        .requiredOption("-m, --message <text>", "Secret message.")
        .option("-p, --password <password>", "Password used to mask the message.", "")
        .action((flags: ImageEncodeFlags) =>
            run(() => {
                const extension = path.extname(flags.output).slice(1);
                if (isLossyFormat(extension)) {
                    fail(`Output format ${extension.toUpperCase()} is lossy and would destroy the hidden data. Use .png.`);
                    return;
                }

                const { pixels, width, height } = decodeToRGB(readFileSync(path.resolve(flags.input)));
                const result = imageEncode(pixels, width, height, flags.message, flags.password);
                if (!result.ok) {
                    fail(result.message);
                    return;
                }

                writeFileSync(path.resolve(flags.output), encodeFromRGB(result.pixels, width, height));
                const stats = generateLSBStats(result.pixels, pixels);
                console.log(`✓ ${result.message} ${stats.total.changed ?? 0} channel LSBs changed.`);
            })
        );

    program
        .command("image-decode")
        .description("Recover a message hidden in a PNG image.")
        .requiredOption("-i, --input <path>", "PNG image holding the message.")
        .option("-p, --password <password>", "Password the message was masked with.", "")
        .action((flags: ImageDecodeFlags) =>
            run(() => {
                const { pixels } = decodeToRGB(readFileSync(path.resolve(flags.input)));
                report(imageDecode(pixels, flags.password), (message) => console.log(message));
            })
        );

    program
        .command("image-capacity")
        .description("Show how many bytes a PNG image can hide.")
        .requiredOption("-i, --input <path>", "PNG image to measure.")
        .action((flags: ImageInputFlags) =>
            run(() => {
                const { width, height } = decodeToRGB(readFileSync(path.resolve(flags.input)));
                console.log(`${availableImageCapacity(width * height)} bytes (${width}x${height} image)`);
            })
        );

    program
        .command("text-encode")
        .description("Hide a message inside cover text using zero-width characters.")
        .option("-c, --cover <text>", "Cover text.")
        .option("--cover-file <path>", "File containing the cover text.")
        .requiredOption("-m, --message <text>", "Secret message.")
        .option("-p, --password <password>", "Password used to mask the message.", "")
        .option("-o, --output <path>", "Write the result to a file instead of stdout.")
        .action((flags: TextEncodeFlags) =>
            run(() => {
                const cover = readTextInput(
                    { text: flags.cover, file: flags.coverFile },
                    "Provide the cover text with --cover or --cover-file.",
                );
                report(textEncode(cover, flags.message, flags.password), (stegaText) => {
                    if (flags.output) {
                        writeFileSync(path.resolve(flags.output), stegaText, "utf-8");
                        console.log(`✓ Hidden message written to ${flags.output}`);
                    } else {
                        console.log(stegaText);
                    }
                });
            })
        );

    program
        .command("text-decode")
        .description("Recover a message hidden in text.")
        .option("-t, --text <text>", "Text holding the message.")
        .option("-f, --file <path>", "File holding the message.")
        .option("-p, --password <password>", "Password the message was masked with.", "")
        .action((flags: TextInputFlags) =>
            run(() => {
                report(textDecode(readTextInput(flags, MISSING_TEXT), flags.password), (message) => console.log(message));
            })
        );

    program
        .command("text-inspect")
        .description("Show zero-width character statistics for a text.")
        .option("-t, --text <text>", "Text to inspect.")
        .option("-f, --file <path>", "File to inspect.")
        .action((flags: Omit<TextInputFlags, "password">) =>
            run(() => {
                console.log(JSON.stringify(analyzeZeroWidth(readTextInput(flags, MISSING_TEXT)), null, 2));
            })
        );

    return program;
}
