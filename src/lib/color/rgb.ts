/**
 * RGB color utilities
 */

/**
 * RGB color (0-255 range)
 */
export interface RGB {
    readonly r: number;
    readonly g: number;
    readonly b: number;
}

export const WHITE: RGB = { r: 255, g: 255, b: 255 };

/**
 * Converts RGB to an upper-case hex string (e.g. #AD2B41)
 */
export function rgbToHex(rgb: RGB): string {
    return `#${[rgb.r, rgb.g, rgb.b]
        .map((val) => Math.max(0, Math.min(255, val)).toString(16).padStart(2, "0"))
        .join("")
        .toUpperCase()}`;
}
