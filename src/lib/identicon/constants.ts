/**
 * Fixed geometry of the identicon
 */

/** Bytes in an MD5 digest */
export const HASH_LENGTH = 16;

/** Hash bytes mirrored into each grid row */
export const GROUP_SIZE = 3;

/** Cells per row and rows per grid */
export const GRID_WIDTH = 5;

/** Hash bytes consumed by the grid; the 16th byte is never used */
export const GRID_BYTES = GROUP_SIZE * GRID_WIDTH;

export const GRID_CELLS = GRID_WIDTH * GRID_WIDTH;

/** Side of one cell in pixels */
export const CELL_SIZE = 50;

/** Side of the canvas in pixels (CELL_SIZE * GRID_WIDTH) */
export const CANVAS_SIZE = CELL_SIZE * GRID_WIDTH;

/** Encoded PNGs kept in memory unless configured otherwise */
export const DEFAULT_CACHE_SIZE = 32;
