/**
 * Command-line front end: identicon <input> [--out <dir>]
 */

import { loadConfig, type IdenticonConfig } from "./config.js";
import { renderIdenticon, saveImage } from "./lib/identicon/index.js";

export const USAGE = "Usage: identicon <input> [--out <dir>]";

export type CliArgs =
    | { kind: "run"; input: string; outDir?: string }
    | { kind: "help" }
    | { kind: "error"; message: string };

/**
 * Parses arguments (without the node and script paths).
 * Everything after "--" is positional, so inputs may start with a dash.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
    const positionals: string[] = [];
    let outDir: string | undefined;
    let optionsEnded = false;

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (optionsEnded) {
            positionals.push(arg);
        } else if (arg === "--") {
            optionsEnded = true;
        } else if (arg === "-h" || arg === "--help") {
            return { kind: "help" };
        } else if (arg === "--out" || arg === "-o") {
            const value = argv[i + 1];
            if (value === undefined || value === "") {
                return { kind: "error", message: `${arg} requires a directory` };
            }
            outDir = value;
            i++;
        } else if (arg.startsWith("--out=")) {
            outDir = arg.slice("--out=".length);
            if (outDir === "") {
                return { kind: "error", message: "--out requires a directory" };
            }
        } else if (arg.startsWith("-") && arg !== "-") {
            return { kind: "error", message: `Unknown option: ${arg}` };
        } else {
            positionals.push(arg);
        }
    }

    if (positionals.length !== 1) {
        return {
            kind: "error",
            message: positionals.length === 0 ? "Missing input string" : "Expected exactly one input string",
        };
    }

    return { kind: "run", input: positionals[0], outDir };
}

/**
 * Renders the identicon for the input and writes <input>.png
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], config: IdenticonConfig = loadConfig()): Promise<number> {
    const args = parseCliArgs(argv);

    if (args.kind === "help") {
        console.log(USAGE);
        return 0;
    }
    if (args.kind === "error") {
        console.error(`Error: ${args.message}`);
        console.error(USAGE);
        return 1;
    }

    try {
        const { png } = await renderIdenticon(args.input, { cacheSize: config.cacheSize, perfLogs: config.perfLogs });
        const path = await saveImage(png, args.input, args.outDir ?? config.outputDir);
        console.log(path);
        return 0;
    } catch (error) {
        console.error("Identicon generation failed:", error instanceof Error ? error.message : error);
        return 1;
    }
}
