/**
 * ColorPicker: the first three hash bytes become the foreground color
 */

import type { RGB } from "../color/rgb.js";
import { invalidInput } from "./errors.js";
import type { HashBytes } from "./types.js";

/**
 * Picks the identicon color from the leading hash bytes
 * @param bytes - Hash bytes; at least 3 are required
 * @throws IdenticonError (InvalidInput) when fewer than 3 bytes are given
 */
export function pickColor(bytes: HashBytes): RGB {
    if (bytes.length < 3) {
        throw invalidInput(`color needs at least 3 hash bytes, got ${bytes.length}`);
    }
    const [r, g, b] = bytes;
    return { r, g, b };
}
