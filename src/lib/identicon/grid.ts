/**
 * GridBuilder: hash bytes -> horizontally symmetric 5x5 grid
 */

import { GRID_BYTES, GROUP_SIZE } from "./constants.js";
import { invalidInput } from "./errors.js";
import type { Grid, HashBytes } from "./types.js";

/**
 * Mirrors a row around its last element: [a, b, c] -> [a, b, c, b, a]
 * @param row - At least two values
 * @throws IdenticonError (InvalidInput) for rows shorter than two
 */
export function mirrorRow<T>(row: readonly T[]): T[] {
    if (row.length < 2) {
        throw invalidInput(`cannot mirror a row of ${row.length} value(s)`);
    }
    const [first, second] = row;
    return [...row, second, first];
}

/**
 * Splits values into consecutive groups of `size`, dropping a short tail
 */
function chunk(values: readonly number[], size: number): number[][] {
    const groups: number[][] = [];
    for (let start = 0; start + size <= values.length; start += size) {
        groups.push(values.slice(start, start + size));
    }
    return groups;
}

/**
 * Builds the grid from the first 15 hash bytes. Each group of three
 * becomes a mirrored row of five; cells are indexed 0-24 in row-major order.
 * @throws IdenticonError (InvalidInput) when fewer than 15 bytes are given
 */
export function buildGrid(bytes: HashBytes): Grid {
    if (bytes.length < GRID_BYTES) {
        throw invalidInput(`grid needs at least ${GRID_BYTES} hash bytes, got ${bytes.length}`);
    }

    return chunk(bytes.slice(0, GRID_BYTES), GROUP_SIZE)
        .flatMap((group) => mirrorRow(group))
        .map((value, index) => ({ value, index }));
}
