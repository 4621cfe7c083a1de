/**
 * Rasterizer: color + rectangles -> RGB pixel buffer
 */

import { WHITE, type RGB } from "../color/rgb.js";
import { CANVAS_SIZE } from "./constants.js";
import { invalidInput } from "./errors.js";
import type { PixelBuffer, Rectangle } from "./types.js";

export interface DrawOptions {
    /** Color of unpainted pixels (default: white) */
    background?: RGB;
}

const CHANNELS = 3;

/**
 * Creates a canvas filled with one color
 */
function createCanvas(size: number, background: RGB): PixelBuffer {
    const data = new Uint8Array(size * size * CHANNELS);
    for (let i = 0; i < data.length; i += CHANNELS) {
        data[i] = background.r;
        data[i + 1] = background.g;
        data[i + 2] = background.b;
    }
    return { width: size, height: size, channels: CHANNELS, data };
}

/**
 * Paints every pixel with x in [topLeft.x, bottomRight.x) and
 * y in [topLeft.y, bottomRight.y)
 */
function fillRectangle(canvas: PixelBuffer, rect: Rectangle, color: RGB): void {
    const { topLeft, bottomRight } = rect;
    const coordinates = [topLeft.x, topLeft.y, bottomRight.x, bottomRight.y];
    if (!coordinates.every((value) => Number.isInteger(value))) {
        throw invalidInput(
            `rectangle (${topLeft.x},${topLeft.y})-(${bottomRight.x},${bottomRight.y}) has non-integer coordinates`
        );
    }
    if (
        topLeft.x < 0 ||
        topLeft.y < 0 ||
        bottomRight.x > canvas.width ||
        bottomRight.y > canvas.height ||
        topLeft.x > bottomRight.x ||
        topLeft.y > bottomRight.y
    ) {
        throw invalidInput(
            `rectangle (${topLeft.x},${topLeft.y})-(${bottomRight.x},${bottomRight.y}) does not fit a ${canvas.width}x${canvas.height} canvas`
        );
    }

    for (let y = topLeft.y; y < bottomRight.y; y++) {
        for (let x = topLeft.x; x < bottomRight.x; x++) {
            const pixelIndex = (y * canvas.width + x) * CHANNELS;
            canvas.data[pixelIndex] = color.r;
            canvas.data[pixelIndex + 1] = color.g;
            canvas.data[pixelIndex + 2] = color.b;
        }
    }
}

/**
 * Draws the rectangles in order on a fresh 250x250 canvas, all in one color.
 * Overlapping rectangles are simply painted again.
 */
export function draw(color: RGB, rectangles: readonly Rectangle[], options: DrawOptions = {}): PixelBuffer {
    const canvas = createCanvas(CANVAS_SIZE, options.background ?? WHITE);
    for (const rect of rectangles) {
        fillRectangle(canvas, rect, color);
    }
    return canvas;
}
