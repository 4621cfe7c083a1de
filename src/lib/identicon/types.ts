/**
 * Values passed between identicon pipeline stages.
 * Every stage returns a fresh value and leaves its input untouched.
 */

import type { RGB } from "../color/rgb.js";

/**
 * MD5 digest of the input as 16 unsigned bytes, in digest order
 */
export type HashBytes = readonly number[];

/**
 * One cell of the 5x5 grid
 */
export interface GridCell {
    /** Hash byte; even values are painted */
    readonly value: number;
    /** Row-major position in the grid (0-24) */
    readonly index: number;
}

export type Grid = readonly GridCell[];

export interface Point {
    readonly x: number;
    readonly y: number;
}

/**
 * Canvas region covering one cell, half-open on both axes
 */
export interface Rectangle {
    readonly topLeft: Point;
    readonly bottomRight: Point;
}

/**
 * Row-major RGB pixel buffer (3 bytes per pixel)
 */
export interface PixelBuffer {
    readonly width: number;
    readonly height: number;
    readonly channels: 3;
    readonly data: Uint8Array;
}

/**
 * Everything derived from one input string
 */
export interface IdenticonImage {
    readonly input: string;
    readonly hex: HashBytes;
    readonly color: RGB;
    /** All 25 cells */
    readonly grid: Grid;
    /** Even-valued cells only, original indices kept */
    readonly filled: Grid;
    readonly pixelMap: readonly Rectangle[];
}
