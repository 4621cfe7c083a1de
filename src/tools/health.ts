/**
 * Health check tool - Returns server status and render cache metrics
 */

import { readFileSync } from "fs";
import { loadConfig, type IdenticonConfig } from "../config.js";
import { getRenderCacheSize, getRenderStats } from "../lib/identicon/index.js";
import type { ToolDefinition } from "./types.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    cache: {
        entries: number;
        hits: number;
        misses: number;
    };
}

// Track server start time
const startTime = Date.now();

/**
 * Version from VERSION or package.json
 */
function getVersion(config: IdenticonConfig): string {
    if (config.version) {
        return config.version;
    }

    try {
        const packageJson: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
        if (typeof packageJson === "object" && packageJson !== null && "version" in packageJson && typeof packageJson.version === "string") {
            return packageJson.version;
        }
        return "unknown";
    } catch {
        return "unknown";
    }
}

/**
 * Health check handler
 * @param toolCount - Number of tools the server exposes
 */
export function healthHandler(toolCount: number, config: IdenticonConfig = loadConfig()): HealthOutput {
    const { hits, misses } = getRenderStats();
    return {
        ok: true,
        version: getVersion(config),
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount,
        cache: {
            entries: getRenderCacheSize(),
            hits,
            misses,
        },
    };
}

/**
 * Health tool definition for MCP
 */
export const healthTool = {
    name: "health",
    description: "Returns server health status including version, uptime, tool count and render cache statistics",
    inputSchema: {
        type: "object",
        properties: {},
    },
} satisfies ToolDefinition;
