/**
 * Writes encoded identicons to disk as <input>.png
 */

import { mkdir, writeFile } from "fs/promises";
import { join, resolve } from "path";
import { invalidInput } from "./errors.js";

/**
 * File name for an input; inputs that would escape the output directory are refused
 * @throws IdenticonError (InvalidInput) for inputs containing a path separator or NUL
 */
export function imageFileName(input: string): string {
    if (/[/\\\0]/.test(input)) {
        throw invalidInput(`"${input}" cannot be used as a file name`);
    }
    return `${input}.png`;
}

/**
 * Saves PNG bytes as <outputDir>/<input>.png, creating the directory if needed.
 * File system errors are passed through unchanged.
 * @returns Absolute path of the written file
 */
export async function saveImage(png: Buffer, input: string, outputDir: string = "."): Promise<string> {
    const fileName = imageFileName(input);
    const dir = resolve(outputDir);
    await mkdir(dir, { recursive: true });

    const filePath = join(dir, fileName);
    await writeFile(filePath, png);
    return filePath;
}
