/**
 * save_identicon tool - renders an identicon and writes <input>.png
 */

import { loadConfig, type IdenticonConfig } from "../config.js";
import { isInvalidInput, renderIdenticon, saveImage } from "../lib/identicon/index.js";
import type { ToolDefinition } from "./types.js";

export interface SaveIdenticonInput {
    input: string;
    outputDir?: string; // Defaults to IDENTICON_OUTPUT_DIR or the working directory
}

export interface SaveIdenticonOutput {
    ok: boolean;
    path?: string;
    bytes?: number;
    error?: string;
}

export async function saveIdenticonHandler(
    input: SaveIdenticonInput,
    config: IdenticonConfig = loadConfig()
): Promise<SaveIdenticonOutput> {
    try {
        const { png } = await renderIdenticon(input.input, {
            cacheSize: config.cacheSize,
            perfLogs: config.perfLogs,
        });
        const path = await saveImage(png, input.input, input.outputDir ?? config.outputDir);

        return {
            ok: true,
            path,
            bytes: png.length,
        };
    } catch (error) {
        // InvalidInput reaches the server and becomes InvalidParams
        if (isInvalidInput(error)) {
            throw error;
        }
        if (error instanceof Error) {
            return {
                ok: false,
                error: `Failed to save identicon: ${error.message}`,
            };
        }
        return {
            ok: false,
            error: "Unknown error while saving identicon",
        };
    }
}

/**
 * Save identicon tool definition for MCP
 */
export const saveIdenticonTool = {
    name: "save_identicon",
    description: "Generates the identicon for a string and writes it to disk as <input>.png",
    inputSchema: {
        type: "object",
        properties: {
            input: {
                type: "string",
                description: "String to derive the identicon from; also the file name",
            },
            outputDir: {
                type: "string",
                description: "Directory to write into (default: IDENTICON_OUTPUT_DIR or the current directory)",
            },
        },
        required: ["input"],
    },
} satisfies ToolDefinition;
