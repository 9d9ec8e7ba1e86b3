import express from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { SqlitePromptStore } from "./sqlite-store.js";
import { createServer } from "./server.js";
import { createApiRouter } from "./api.js";
import { loadServerConfig } from "./config.js";
import { randomUUID } from "node:crypto";

const config = loadServerConfig();

const store = new SqlitePromptStore(config.dbPath);
store.initialize();

const app = express();
app.use(express.json({ limit: "50mb" }));

// Mount the REST API used by the web front end
app.use("/api", createApiRouter(store, config.galaxy));

// Map of active transports by session ID
const transports = new Map<string, StreamableHTTPServerTransport>();

app.all("/mcp", async (req, res) => {
  const sessionId = req.header("mcp-session-id");

  try {
    if (req.method === "POST" && !sessionId) {
      // New session
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id) => {
          transports.set(id, transport);
        },
      });
      transport.onclose = () => {
        if (transport.sessionId) transports.delete(transport.sessionId);
      };

      const server = createServer(store, config.galaxy);
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
      return;
    }

    if (sessionId) {
      const transport = transports.get(sessionId);
      if (transport) {
        await transport.handleRequest(req, res, req.body);
        return;
      }
    }

    // No valid session
    res.status(400).json({ error: "Invalid or missing session" });
  } catch (err) {
    console.error("MCP request failed:", err);
    if (!res.headersSent) {
      res.status(500).json({ error: "Internal server error" });
    }
  }
});

app.listen(config.port, "127.0.0.1", () => {
  console.error(`Prompt Galaxy MCP Server running on http://127.0.0.1:${config.port}/mcp`);
  console.error(`Prompt library API available at http://127.0.0.1:${config.port}/api`);
  console.error(`Library database: ${config.dbPath}`);
});
