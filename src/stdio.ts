import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { SqlitePromptStore } from "./sqlite-store.js";
import { createServer } from "./server.js";
import { loadServerConfig } from "./config.js";

const config = loadServerConfig();

const store = new SqlitePromptStore(config.dbPath);
store.initialize();

const server = createServer(store, config.galaxy);
const transport = new StdioServerTransport();
await server.connect(transport);

console.error(`Prompt Galaxy MCP Server running on stdio (library: ${config.dbPath})`);
