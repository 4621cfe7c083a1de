/**
 * Hasher: input string -> 16 digest bytes
 */

import { createHash } from "crypto";
import type { HashBytes } from "./types.js";

/**
 * Computes the MD5 digest of the input's UTF-8 bytes
 * @param input - Any string, including the empty string
 * @returns 16 bytes (0-255) in digest order
 */
export function hashInput(input: string): HashBytes {
    const digest = createHash("md5").update(input, "utf8").digest();
    return Array.from(digest);
}

/**
 * Lower-case hex form of a digest (32 characters for MD5)
 */
export function toDigestString(bytes: HashBytes): string {
    return bytes.map((byte) => byte.toString(16).padStart(2, "0")).join("");
}
