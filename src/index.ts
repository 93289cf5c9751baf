#!/usr/bin/env node

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";

import { loadConfig } from "./config.js";
import { logger, setLogLevel } from "./logger.js";
import { closeStore, getStore } from "./services/database.js";
import { ReportRenderer } from "./services/renderer.js";
import { loadUnitTable, seedStore } from "./services/seed.js";
import { TOOLS, handleToolCall, type ToolContext } from "./tools.js";

const config = loadConfig();
setLogLevel(config.logging.level);

// Initialize database
const store = getStore(config.dbPath);
seedStore(store, config.dataDir);

const context: ToolContext = {
  store,
  config,
  units: loadUnitTable(config.dataDir),
  renderer: new ReportRenderer(config.reportDir),
  now: () => new Date(),
};

logger.debug(`Database at ${config.dbPath}, ${store.countFoods()} foods loaded`);

// Create server
const server = new Server(
  {
    name: "diet-tracker-mcp",
    version: "1.0.0",
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;
  return handleToolCall(context, name, args ?? {});
});

// Cleanup on exit
process.on("SIGINT", () => {
  closeStore();
  process.exit(0);
});

process.on("SIGTERM", () => {
  closeStore();
  process.exit(0);
});

// Start server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Diet Tracker MCP server running on stdio");
}

main().catch((error) => {
  logger.error("Fatal error:", error);
  process.exit(1);
});
