/**
 * Tests for PNG encoding and the render cache
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import sharp from 'sharp';
import { encodePng } from '../encode.js';
import { generateIdenticon } from '../pipeline.js';
import { clearRenderCache, getRenderCacheSize, getRenderStats, renderIdenticon } from '../render.js';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

describe('encodePng', () => {
    it('should encode a PNG that decodes back to the same pixels', async () => {
        const { pixels } = generateIdenticon('identicon');
        const png = await encodePng(pixels);

        expect([...png.subarray(0, 8)]).toEqual(PNG_SIGNATURE);

        const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });
        expect(info.width).toBe(250);
        expect(info.height).toBe(250);
        expect(info.channels).toBe(3);
        expect(data.equals(Buffer.from(pixels.data))).toBe(true);
    });

    it('should produce identical bytes for identical input', async () => {
        const first = await encodePng(generateIdenticon('same').pixels);
        const second = await encodePng(generateIdenticon('same').pixels);
        expect(first.equals(second)).toBe(true);
    });
});

describe('renderIdenticon', () => {
    beforeEach(() => {
        clearRenderCache();
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return the image, PNG and dimensions', async () => {
        const rendered = await renderIdenticon('identicon');

        expect(rendered.width).toBe(250);
        expect(rendered.height).toBe(250);
        expect(rendered.image.color).toEqual({ r: 173, g: 43, b: 65 });
        expect([...rendered.png.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
    });

    it('should serve repeated inputs from the cache', async () => {
        const first = await renderIdenticon('cached');
        const second = await renderIdenticon('cached');

        expect(second.png.equals(first.png)).toBe(true);
        expect(getRenderStats().hits).toBe(1);
        expect(getRenderStats().misses).toBe(1);
        expect(getRenderCacheSize()).toBe(1);
    });

    it('should not let a caller modify cached PNG bytes', async () => {
        const first = await renderIdenticon('shared');
        first.png.fill(0);

        const second = await renderIdenticon('shared');
        expect(getRenderStats().hits).toBe(1);
        expect([...second.png.subarray(0, 8)]).toEqual(PNG_SIGNATURE);

        second.png.fill(0);
        const third = await renderIdenticon('shared');
        expect([...third.png.subarray(0, 8)]).toEqual(PNG_SIGNATURE);
    });

    it('should return a snapshot of the counters', async () => {
        const stats = getRenderStats();
        stats.hits = 99;
        stats.misses = 99;

        await renderIdenticon('snapshot');
        expect(getRenderStats()).toEqual({ hits: 0, misses: 1 });
    });

    it('should evict the least recently used entry when full', async () => {
        await renderIdenticon('a', { cacheSize: 2 });
        await renderIdenticon('b', { cacheSize: 2 });
        await renderIdenticon('a', { cacheSize: 2 }); // a is now the most recent
        await renderIdenticon('c', { cacheSize: 2 }); // evicts b

        expect(getRenderCacheSize()).toBe(2);
        expect(getRenderStats().hits).toBe(1);
        expect(getRenderStats().misses).toBe(3);

        await renderIdenticon('a', { cacheSize: 2 });
        expect(getRenderStats().hits).toBe(2);

        await renderIdenticon('b', { cacheSize: 2 });
        expect(getRenderStats().misses).toBe(4);
    });

    it('should log timings to stderr only when asked', async () => {
        const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        await renderIdenticon('quiet');
        expect(errorSpy).not.toHaveBeenCalled();

        await renderIdenticon('loud', { perfLogs: true });
        expect(errorSpy).toHaveBeenCalledTimes(1);
        expect(String(errorSpy.mock.calls[0][0])).toMatch(/^\[PERF\] renderIdenticon: pipeline /);
    });
});
