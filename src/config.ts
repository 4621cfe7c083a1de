/**
 * Runtime configuration read from environment variables
 */

import { z } from "zod";
import { DEFAULT_CACHE_SIZE } from "./lib/identicon/constants.js";

export interface IdenticonConfig {
    /** Directory that save_identicon and the CLI write into */
    outputDir: string;
    /** Maximum number of encoded PNGs kept in memory */
    cacheSize: number;
    /** Print [PERF] timings to stderr */
    perfLogs: boolean;
    /** Overrides the package.json version reported by health */
    version?: string;
}

export const DEFAULT_OUTPUT_DIR = ".";
export { DEFAULT_CACHE_SIZE };

// Unusable values fall back to the defaults instead of failing startup
const envSchema = z.object({
    IDENTICON_OUTPUT_DIR: z.string().min(1).optional().catch(undefined),
    IDENTICON_CACHE_SIZE: z.coerce.number().int().positive().optional().catch(undefined),
    ENABLE_PERF_LOGS: z.string().optional().catch(undefined),
    VERSION: z.string().min(1).optional().catch(undefined),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): IdenticonConfig {
    const parsed = envSchema.parse(env);
    return {
        outputDir: parsed.IDENTICON_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
        cacheSize: parsed.IDENTICON_CACHE_SIZE ?? DEFAULT_CACHE_SIZE,
        perfLogs: parsed.ENABLE_PERF_LOGS === "1",
        version: parsed.VERSION,
    };
}

/**
 * True under Vitest or NODE_ENV=test
 */
export function isTestEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
    return env.NODE_ENV === "test" || typeof env.VITEST !== "undefined";
}
