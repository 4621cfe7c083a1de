/**
 * Tools aggregator - Exports all tool definitions and handlers
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { hashInputTool, hashInputHandler } from "./hash_input.js";
import { generateIdenticonTool, generateIdenticonHandler } from "./generate_identicon.js";
import { saveIdenticonTool, saveIdenticonHandler } from "./save_identicon.js";
import { healthTool, healthHandler } from "./health.js";
import type { ToolDefinition } from "./types.js";

export type { ToolDefinition } from "./types.js";

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = [
    healthTool,
    hashInputTool,
    generateIdenticonTool,
    saveIdenticonTool,
];

/**
 * Tool handler function type
 */
export type ToolHandler = (args: unknown) => Promise<unknown> | unknown;

/**
 * Wraps a handler with argument validation
 * @throws McpError (InvalidParams) when the arguments do not match the schema
 */
function withSchema<S extends z.ZodTypeAny>(
    toolName: string,
    schema: S,
    handler: (args: z.infer<S>) => Promise<unknown> | unknown
): ToolHandler {
    return (args: unknown) => {
        const parseResult = schema.safeParse(args ?? {});
        if (!parseResult.success) {
            throw new McpError(
                ErrorCode.InvalidParams,
                parseResult.error.issues[0]?.message || `Invalid parameters for ${toolName}`
            );
        }
        return handler(parseResult.data);
    };
}

const inputSchema = z.object({
    input: z.string(),
});

/**
 * Map of tool names to their handlers
 */
export const toolHandlers: Record<string, ToolHandler> = {
    health: withSchema("health", z.object({}), () => healthHandler(tools.length)),
    hash_input: withSchema("hash_input", inputSchema, (args) => hashInputHandler(args)),
    generate_identicon: withSchema("generate_identicon", inputSchema, async (args) => {
        return await generateIdenticonHandler(args);
    }),
    save_identicon: withSchema(
        "save_identicon",
        inputSchema.extend({ outputDir: z.string().min(1).optional() }),
        async (args) => {
            return await saveIdenticonHandler(args);
        }
    ),
};
