export { hashInput, toDigestString } from "./hash.js";
export { pickColor } from "./color.js";
export { buildGrid, mirrorRow } from "./grid.js";
export { filterOddCells } from "./filter.js";
export { buildPixelMap, cellToRectangle } from "./pixelMap.js";
export { draw, type DrawOptions } from "./draw.js";
export { describeIdenticon, generateIdenticon, type IdenticonResult } from "./pipeline.js";
export { encodePng } from "./encode.js";
export { saveImage, imageFileName } from "./save.js";
export {
    renderIdenticon,
    clearRenderCache,
    getRenderCacheSize,
    getRenderStats,
    type RenderedIdenticon,
    type RenderOptions,
    type RenderStats,
} from "./render.js";
export { IdenticonError, invalidInput, isInvalidInput, type IdenticonErrorKind } from "./errors.js";
export * from "./constants.js";
export type { HashBytes, GridCell, Grid, Point, Rectangle, PixelBuffer, IdenticonImage } from "./types.js";
