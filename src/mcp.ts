#!/usr/bin/env node
/**
 * HAR timing MCP server — entry point.
 *
 * Exposes the same analysis as the CLI as tools over stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { registerAnalysisTools } from "./tools/analysis.js";

async function main() {
  const server = new McpServer({
    name: "har-timing",
    version: "1.0.0",
  });

  registerAnalysisTools(server);

  // stdout belongs to the transport from here on
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
