/**
 * hash_input tool - MD5 digest of a string as byte list
 */

import { hashInput, toDigestString } from "../lib/identicon/index.js";
import type { ToolDefinition } from "./types.js";

export interface HashInputInput {
    input: string;
}

export interface HashInputOutput {
    ok: true;
    hex: number[];
    digest: string;
}

/**
 * Hashes the input string
 * @returns The 16 digest bytes and their hex form
 */
export function hashInputHandler(input: HashInputInput): HashInputOutput {
    const hex = [...hashInput(input.input)];
    return {
        ok: true,
        hex,
        digest: toDigestString(hex),
    };
}

/**
 * Hash input tool definition for MCP
 */
export const hashInputTool = {
    name: "hash_input",
    description: "Returns the MD5 digest of a string as a list of 16 bytes (0-255) plus its hex form",
    inputSchema: {
        type: "object",
        properties: {
            input: {
                type: "string",
                description: "String to hash (may be empty)",
            },
        },
        required: ["input"],
    },
} satisfies ToolDefinition;
