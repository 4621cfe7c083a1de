/**
 * CellFilter: only even-valued cells are painted
 */

import type { Grid } from "./types.js";

/**
 * Drops odd-valued cells. Order and original indices are kept.
 */
export function filterOddCells(grid: Grid): Grid {
    return grid.filter((cell) => cell.value % 2 === 0);
}
