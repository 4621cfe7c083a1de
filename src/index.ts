#!/usr/bin/env node
import { IdenticonServer } from "./server.js";

const server = new IdenticonServer();
server.run().catch((error: unknown) => {
    console.error("[MCP Error] Failed to start server:", error);
    process.exit(1);
});
