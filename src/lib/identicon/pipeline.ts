/**
 * Identicon pipeline: hash -> color -> grid -> filter -> pixel map -> draw
 */

import { pickColor } from "./color.js";
import { draw, type DrawOptions } from "./draw.js";
import { filterOddCells } from "./filter.js";
import { buildGrid } from "./grid.js";
import { hashInput } from "./hash.js";
import { buildPixelMap } from "./pixelMap.js";
import type { IdenticonImage, PixelBuffer } from "./types.js";

export interface IdenticonResult {
    image: IdenticonImage;
    pixels: PixelBuffer;
}

/**
 * Derives every intermediate value for an input, without drawing
 */
export function describeIdenticon(input: string): IdenticonImage {
    const hex = hashInput(input);
    const grid = buildGrid(hex);
    const filled = filterOddCells(grid);

    return {
        input,
        hex,
        color: pickColor(hex),
        grid,
        filled,
        pixelMap: buildPixelMap(filled),
    };
}

/**
 * Runs the full pipeline. The same input always yields the same pixels.
 */
export function generateIdenticon(input: string, options: DrawOptions = {}): IdenticonResult {
    const image = describeIdenticon(input);
    return {
        image,
        pixels: draw(image.color, image.pixelMap, options),
    };
}
