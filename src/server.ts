import "dotenv/config";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { MongoClient } from "mongodb";
import { collectionsFor } from "./collections.js";
import { loadConfig, type MigrationConfig } from "./config.js";
import type { MigrationLogger } from "./migrations.js";
import { registerMigrationTools } from "./tools.js";

// stdout carries the MCP protocol, so every diagnostic goes to stderr.
const stderrLogger: MigrationLogger = {
  log: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.error(...args),
  error: (...args: unknown[]) => console.error(...args),
};

let config: MigrationConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error("Invalid configuration:", err);
  process.exit(1);
}

const client = new MongoClient(config.mongoUrl);

const server = new McpServer({
  name: "platform-data-migration",
  version: "0.1.0",
});

registerMigrationTools(server, {
  getCollections: () => collectionsFor(client.db(config.dbName)),
  logger: stderrLogger,
});

async function main() {
  try {
    await client.connect();
  } catch (err) {
    console.error("Failed to connect to MongoDB:", err);
    process.exit(1);
  }
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("platform-data-migration MCP server is running.");
}

main().catch(async (err) => {
  console.error("Fatal error in MCP server:", err);
  await client.close();
  process.exit(1);
});
