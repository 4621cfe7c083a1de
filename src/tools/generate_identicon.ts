/**
 * generate_identicon tool
 * Derives the identicon for a string and returns it as a base64 PNG
 * along with the intermediate values (hash, color, grid)
 */

import { loadConfig, type IdenticonConfig } from "../config.js";
import { rgbToHex, type RGB } from "../lib/color/rgb.js";
import { isInvalidInput, renderIdenticon, type GridCell } from "../lib/identicon/index.js";
import type { ToolDefinition } from "./types.js";

export interface GenerateIdenticonInput {
    input: string;
}

export interface GenerateIdenticonOutput {
    ok: boolean;
    input?: string;
    hash?: number[];
    color?: {
        rgb: RGB;
        hex: string;
    };
    grid?: GridCell[];
    filledCells?: number[];
    width?: number;
    height?: number;
    pngBase64?: string;
    error?: string;
}

export async function generateIdenticonHandler(
    input: GenerateIdenticonInput,
    config: IdenticonConfig = loadConfig()
): Promise<GenerateIdenticonOutput> {
    try {
        const { image, png, width, height } = await renderIdenticon(input.input, {
            cacheSize: config.cacheSize,
            perfLogs: config.perfLogs,
        });

        return {
            ok: true,
            input: image.input,
            hash: [...image.hex],
            color: {
                rgb: image.color,
                hex: rgbToHex(image.color),
            },
            grid: [...image.grid],
            filledCells: image.filled.map((cell) => cell.index),
            width,
            height,
            pngBase64: png.toString("base64"),
        };
    } catch (error) {
        // InvalidInput reaches the server and becomes InvalidParams
        if (isInvalidInput(error)) {
            throw error;
        }
        if (error instanceof Error) {
            return {
                ok: false,
                error: `Failed to generate identicon: ${error.message}`,
            };
        }
        return {
            ok: false,
            error: "Unknown error during identicon generation",
        };
    }
}

/**
 * Generate identicon tool definition for MCP
 */
export const generateIdenticonTool = {
    name: "generate_identicon",
    description:
        "Generates a 250x250 symmetric identicon for a string. Returns the PNG as base64 together with the MD5 bytes, picked color, 5x5 grid and the indices of painted cells.",
    inputSchema: {
        type: "object",
        properties: {
            input: {
                type: "string",
                description: "String to derive the identicon from (may be empty)",
            },
        },
        required: ["input"],
    },
} satisfies ToolDefinition;
