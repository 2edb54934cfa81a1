#!/usr/bin/env node
import { CattoServer } from "../index.js";

async function main() {
    const server = new CattoServer();
    await server.run();
}

main().catch((error: unknown) => {
    console.error("[MCP Error]", error);
    process.exit(1);
});
