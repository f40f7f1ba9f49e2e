#!/usr/bin/env node
// MCP entry point (stdio transport)
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadToolchain } from "../config/load.js";
import { createServer } from "./server.js";

async function main(): Promise<void> {
  const server = createServer({ toolchain: loadToolchain() });
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  // stderr only: stdout carries the protocol
  console.error("MCP server failed:", err);
  process.exit(1);
});
