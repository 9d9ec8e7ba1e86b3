import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { PromptStore, PromptWriter } from "./types.js";
import type { GalaxyOverrides } from "./config.js";
import { createFillHandler, createGalaxyHandler, createSearchHandler } from "./tools.js";

/**
 * Creates and configures the MCP server with search, fill, and galaxy tools.
 */
export function createServer(db: PromptStore & PromptWriter, config: GalaxyOverrides = {}): McpServer {
  const server = new McpServer({
    name: "prompt-galaxy",
    version: "0.1.0",
  });

  const searchHandler = createSearchHandler(db);
  const fillHandler = createFillHandler(db);
  const galaxyHandler = createGalaxyHandler(db, config);

  server.tool(
    "search",
    "Searches the prompt library. Matches the query against titles, content and variable names; optionally narrows by category, tags (any of) or favorites. Returns prompt ids with the variables each one expects.",
    {
      query: z.string().optional().describe("Free text to look for"),
      category: z.string().optional().describe("Only prompts in this category (e.g. 'Development')"),
      tags: z.array(z.string()).optional().describe("Only prompts carrying at least one of these tags"),
      favoritesOnly: z.boolean().optional().describe("Only favorite prompts"),
    },
    async (args) => searchHandler(args)
  );

  server.tool(
    "fill",
    "Fills a prompt's {{variables}} and returns the final text. Variables without a value fall back to their defaults; if any remain empty the call fails and lists them. A successful fill counts as a use of the prompt.",
    {
      id: z.string().describe("Prompt id, as returned by search"),
      values: z.record(z.string(), z.string()).optional().describe("Variable name to value"),
    },
    async (args) => fillHandler(args)
  );

  server.tool(
    "galaxy",
    "Summarises how the prompts relate: similarity connections (weighted category, tag and title overlap), clusters of connected prompts and overall statistics.",
    {
      threshold: z.number().min(0).max(1).optional().describe("Minimum similarity for a connection (exclusive)"),
      category: z.string().optional().describe("Only prompts in this category"),
      favoritesOnly: z.boolean().optional().describe("Only favorite prompts"),
    },
    async (args) => galaxyHandler(args)
  );

  return server;
}
