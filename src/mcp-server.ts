#!/usr/bin/env node
/**
 * mcp-server.ts - MCP server entry point
 *
 * What is this file?
 * The process an MCP client spawns to get similarity search as tools. It
 * speaks JSON-RPC over stdio, so anything meant for a human goes to stderr.
 *
 * How it works:
 * 1. Load .env and validate config
 * 2. Register tracing (if enabled) and build the services
 * 3. Register the tools and connect the stdio transport
 * 4. On SIGINT/SIGTERM, close the pg pool and flush spans
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig, loadDotEnv } from "./config";
import { createServices } from "./service";
import { registerTools } from "./tools/mcp";
import { initTracing } from "./tracing";

const log = (message: string): void => console.error(message);

async function main(): Promise<void> {
  loadDotEnv();
  const config = loadConfig();
  const tracing = initTracing({ ...config.tracing, onProgress: log });
  const services = createServices(config, { onProgress: log, requireEmbeddings: false });

  const server = new McpServer({
    name: "report-similarity",
    version: "0.1.0",
  });
  registerTools(server, services.service);

  const shutdown = async (): Promise<void> => {
    try {
      await server.close();
      await services.close();
      await tracing.shutdown();
    } catch (error) {
      log(`Error during shutdown: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(0);
  };
  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());

  await server.connect(new StdioServerTransport());
}

main().catch((error) => {
  console.error("MCP server error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
