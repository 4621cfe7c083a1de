/**
 * Renders identicons to PNG, keeping the most recent renders in memory
 */

import { DEFAULT_CACHE_SIZE } from "./constants.js";
import { encodePng } from "./encode.js";
import { generateIdenticon } from "./pipeline.js";
import type { IdenticonImage } from "./types.js";

export interface RenderedIdenticon {
    image: IdenticonImage;
    png: Buffer;
    width: number;
    height: number;
}

export interface RenderOptions {
    /** Cache capacity (default: 32) */
    cacheSize?: number;
    /** Log timings to stderr */
    perfLogs?: boolean;
}

/**
 * Key: input string. Map insertion order doubles as recency order.
 */
const renderCache = new Map<string, RenderedIdenticon>();

export interface RenderStats {
    hits: number;
    misses: number;
}

const renderStats: RenderStats = { hits: 0, misses: 0 };

/**
 * Clears cached renders and counters (exported for test use)
 */
export function clearRenderCache(): void {
    renderCache.clear();
    renderStats.hits = 0;
    renderStats.misses = 0;
}

export function getRenderCacheSize(): number {
    return renderCache.size;
}

/**
 * Snapshot of the cache hit/miss counters
 */
export function getRenderStats(): RenderStats {
    return { ...renderStats };
}

/**
 * Callers get their own PNG buffer; the cached one is never handed out
 */
function copyRender(rendered: RenderedIdenticon): RenderedIdenticon {
    return { ...rendered, png: Buffer.from(rendered.png) };
}

function getCachedRender(input: string): RenderedIdenticon | null {
    const cached = renderCache.get(input);
    if (cached) {
        renderCache.delete(input);
        renderCache.set(input, cached);
        renderStats.hits++;
        return cached;
    }
    renderStats.misses++;
    return null;
}

function setCachedRender(input: string, rendered: RenderedIdenticon, capacity: number): void {
    while (renderCache.size >= capacity) {
        const oldest = renderCache.keys().next();
        if (oldest.done) {
            break;
        }
        renderCache.delete(oldest.value);
    }
    renderCache.set(input, rendered);
}

/**
 * Runs the pipeline for an input and encodes the result as PNG
 */
export async function renderIdenticon(input: string, options: RenderOptions = {}): Promise<RenderedIdenticon> {
    const { cacheSize = DEFAULT_CACHE_SIZE, perfLogs = false } = options;

    const cached = getCachedRender(input);
    if (cached) {
        return copyRender(cached);
    }

    const start = performance.now();
    const { image, pixels } = generateIdenticon(input);
    const drawn = performance.now();
    const png = await encodePng(pixels);
    const encoded = performance.now();

    if (perfLogs) {
        console.error(
            `[PERF] renderIdenticon: pipeline ${(drawn - start).toFixed(2)}ms, encode ${(encoded - drawn).toFixed(2)}ms, ${png.length} bytes`
        );
    }

    const rendered: RenderedIdenticon = { image, png, width: pixels.width, height: pixels.height };
    setCachedRender(input, copyRender(rendered), cacheSize);
    return rendered;
}
