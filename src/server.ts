import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { isTestEnvironment } from "./config.js";
import { isInvalidInput } from "./lib/identicon/index.js";
import { tools, toolHandlers } from "./tools/index.js";

export const SERVER_NAME = "identicon-mcp";
export const SERVER_VERSION = "1.0.0";

/**
 * Identicon MCP Server
 * Deterministic 5x5 identicons from arbitrary strings
 */
export class IdenticonServer {
    private server: Server;

    constructor() {
        this.server = new Server(
            {
                name: SERVER_NAME,
                version: SERVER_VERSION,
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        // Error handling
        this.server.onerror = (error) => console.error("[MCP Error]", error);

        // Only set up SIGINT handler if not in test environment
        if (!isTestEnvironment()) {
            process.on("SIGINT", () => {
                this.server.close().then(
                    () => process.exit(0),
                    (error: unknown) => {
                        console.error("[MCP Error] Failed to close server:", error);
                        process.exit(1);
                    }
                );
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;

            if (!Object.prototype.hasOwnProperty.call(toolHandlers, toolName)) {
                throw new McpError(
                    ErrorCode.MethodNotFound,
                    `Unknown tool: ${toolName}`
                );
            }

            let result: unknown;
            try {
                result = await toolHandlers[toolName](request.params.arguments);
            } catch (error) {
                if (error instanceof McpError) {
                    throw error;
                }
                if (isInvalidInput(error)) {
                    throw new McpError(ErrorCode.InvalidParams, error.message);
                }
                throw new McpError(
                    ErrorCode.InternalError,
                    `Failed to run ${toolName}: ${error instanceof Error ? error.message : "Unknown error"}`
                );
            }

            return {
                content: [
                    {
                        type: "text",
                        text: JSON.stringify(result, null, 2),
                    },
                ],
            };
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        // Only log when using stdio transport and not in test environment
        if (!transport && !isTestEnvironment()) {
            console.error("Identicon MCP server running on stdio");
        }
    }

    getServer(): Server {
        return this.server;
    }
}
