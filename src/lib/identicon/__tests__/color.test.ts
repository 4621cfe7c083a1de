/**
 * Unit tests for the color picker
 */

import { describe, it, expect } from 'vitest';
import { pickColor } from '../color.js';
import { IdenticonError } from '../errors.js';
import { hashInput } from '../hash.js';
import { rgbToHex } from '../../color/rgb.js';

describe('pickColor', () => {
    it('should use the first three hash bytes as r, g, b', () => {
        expect(pickColor(hashInput('identicon'))).toEqual({ r: 173, g: 43, b: 65 });
    });

    it('should accept exactly three bytes', () => {
        expect(pickColor([1, 2, 3])).toEqual({ r: 1, g: 2, b: 3 });
    });

    it('should reject fewer than three bytes with InvalidInput', () => {
        expect(() => pickColor([1, 2])).toThrow(IdenticonError);
        try {
            pickColor([]);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(IdenticonError);
            if (error instanceof IdenticonError) {
                expect(error.kind).toBe('InvalidInput');
                expect(error.message).toBe('ERROR-ID-01: color needs at least 3 hash bytes, got 0');
            }
        }
    });
});

describe('rgbToHex', () => {
    it('should format as upper-case #RRGGBB', () => {
        expect(rgbToHex({ r: 173, g: 43, b: 65 })).toBe('#AD2B41');
        expect(rgbToHex({ r: 0, g: 9, b: 255 })).toBe('#0009FF');
    });
});
