/**
 * PixelMapper: grid cells -> canvas rectangles
 */

import { CELL_SIZE, GRID_CELLS, GRID_WIDTH } from "./constants.js";
import { invalidInput } from "./errors.js";
import type { Grid, GridCell, Rectangle } from "./types.js";

/**
 * Places one cell on the canvas
 * @throws IdenticonError (InvalidInput) for an index outside 0-24
 */
export function cellToRectangle(cell: GridCell): Rectangle {
    const { index } = cell;
    if (!Number.isInteger(index) || index < 0 || index >= GRID_CELLS) {
        throw invalidInput(`cell index ${index} is outside the ${GRID_WIDTH}x${GRID_WIDTH} grid`);
    }

    const horizontal = (index % GRID_WIDTH) * CELL_SIZE;
    const vertical = Math.floor(index / GRID_WIDTH) * CELL_SIZE;

    return {
        topLeft: { x: horizontal, y: vertical },
        bottomRight: { x: horizontal + CELL_SIZE, y: vertical + CELL_SIZE },
    };
}

export function buildPixelMap(cells: Grid): Rectangle[] {
    return cells.map(cellToRectangle);
}
