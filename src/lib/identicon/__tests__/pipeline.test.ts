/**
 * End-to-end tests for the identicon pipeline
 */

import { describe, it, expect } from 'vitest';
import { describeIdenticon, generateIdenticon } from '../pipeline.js';
import type { PixelBuffer } from '../types.js';

function countColor(pixels: PixelBuffer, r: number, g: number, b: number): number {
    let count = 0;
    for (let i = 0; i < pixels.data.length; i += 3) {
        if (pixels.data[i] === r && pixels.data[i + 1] === g && pixels.data[i + 2] === b) {
            count++;
        }
    }
    return count;
}

describe('describeIdenticon', () => {
    it('should derive hash, color, grid and pixel map for "identicon"', () => {
        const image = describeIdenticon('identicon');

        expect(image.input).toBe('identicon');
        expect(image.hex).toEqual([173, 43, 65, 97, 60, 135, 2, 181, 55, 43, 189, 201, 168, 16, 112, 64]);
        expect(image.color).toEqual({ r: 173, g: 43, b: 65 });
        expect(image.grid).toHaveLength(25);
        expect(image.filled.map((cell) => cell.index)).toEqual([6, 8, 10, 14, 20, 21, 22, 23, 24]);
        expect(image.pixelMap).toHaveLength(9);
        expect(image.pixelMap[0]).toEqual({ topLeft: { x: 50, y: 50 }, bottomRight: { x: 100, y: 100 } });
        expect(image.pixelMap[8]).toEqual({ topLeft: { x: 200, y: 200 }, bottomRight: { x: 250, y: 250 } });
    });

    it('should handle the empty string', () => {
        const image = describeIdenticon('');

        expect(image.color).toEqual({ r: 212, g: 29, b: 140 });
        expect(image.filled.map((cell) => cell.index)).toEqual([
            0, 2, 4, 7, 10, 11, 13, 14, 15, 17, 19, 20, 21, 22, 23, 24,
        ]);
    });
});

describe('generateIdenticon', () => {
    it('should paint 9 cells in the picked color for "identicon"', () => {
        const { pixels } = generateIdenticon('identicon');

        expect(pixels.width).toBe(250);
        expect(pixels.height).toBe(250);
        expect(countColor(pixels, 173, 43, 65)).toBe(9 * 2500);
        expect(countColor(pixels, 255, 255, 255)).toBe(16 * 2500);
    });

    it('should produce a well-formed buffer for the empty string', () => {
        const { pixels } = generateIdenticon('');

        expect(pixels.data).toHaveLength(250 * 250 * 3);
        expect(countColor(pixels, 212, 29, 140)).toBe(16 * 2500);
    });

    it('should be deterministic', () => {
        const first = generateIdenticon('deterministic');
        const second = generateIdenticon('deterministic');
        expect(Buffer.from(first.pixels.data).equals(Buffer.from(second.pixels.data))).toBe(true);
    });

    it('should give different inputs different images', () => {
        const a = generateIdenticon('alice');
        const b = generateIdenticon('bob');
        expect(Buffer.from(a.pixels.data).equals(Buffer.from(b.pixels.data))).toBe(false);
    });

    it('should mirror the image left to right', () => {
        const { pixels } = generateIdenticon('mirror');
        for (const y of [0, 75, 125, 249]) {
            for (const x of [0, 60, 110]) {
                const left = (y * 250 + x) * 3;
                const right = (y * 250 + (249 - x)) * 3;
                expect(pixels.data[left]).toBe(pixels.data[right]);
            }
        }
    });
});
