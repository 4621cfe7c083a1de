/**
 * PNG encoding of raw pixel buffers
 */

import sharp from "sharp";
import type { PixelBuffer } from "./types.js";

/**
 * Encodes an RGB pixel buffer as a lossless PNG
 */
export async function encodePng(pixels: PixelBuffer): Promise<Buffer> {
    return await sharp(pixels.data, {
        raw: {
            width: pixels.width,
            height: pixels.height,
            channels: pixels.channels,
        },
    })
        .png()
        .toBuffer();
}
