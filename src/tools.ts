import type { PromptStore, PromptWriter } from "./types.js";
import type { GalaxyOverrides } from "./config.js";
import { generateLivePreview, initialValues } from "./variables.js";
import { createGalaxy } from "./galaxy.js";

interface ToolResult {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

function textResult(value: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(value, null, 2) }] };
}

function errorResult(text: string): ToolResult {
  return { content: [{ type: "text", text }], isError: true };
}

/**
 * Creates a handler for the `search` tool.
 * Returns matching prompts as summaries with their variable names.
 */
export function createSearchHandler(db: PromptStore) {
  return async (args: {
    query?: string;
    category?: string;
    tags?: string[];
    favoritesOnly?: boolean;
  }): Promise<ToolResult> => {
    const prompts = db.searchPrompts(args).map((p) => ({
      id: p.id,
      title: p.title,
      category: p.category,
      tags: p.tags,
      isFavorite: p.isFavorite,
      variables: p.variables.map((v) => v.name),
    }));

    return textResult(prompts);
  };
}

/**
 * Creates a handler for the `fill` tool.
 * Substitutes the given values (falling back to variable defaults) and records
 * a use. Unfilled variables are reported and leave the prompt unused.
 */
export function createFillHandler(db: PromptStore & PromptWriter) {
  return async (args: { id: string; values?: Record<string, string> }): Promise<ToolResult> => {
    const prompt = db.getPrompt(args.id);
    if (!prompt) {
      return errorResult(`Prompt not found: "${args.id}". Use the search tool to find prompt ids.`);
    }

    const values = { ...initialValues(prompt.variables), ...args.values };
    const { preview, missing } = generateLivePreview(prompt.content, values);
    if (missing.length > 0) {
      return errorResult(`Missing values for: ${missing.join(", ")}`);
    }

    db.incrementUseCount(prompt.id);
    return { content: [{ type: "text", text: preview }] };
  };
}

/**
 * Creates a handler for the `galaxy` tool.
 * Returns the similarity statistics and clusters (as prompt titles).
 */
export function createGalaxyHandler(db: PromptStore, config: GalaxyOverrides = {}) {
  return async (args: { threshold?: number; category?: string; favoritesOnly?: boolean }): Promise<ToolResult> => {
    try {
      const galaxy = createGalaxy(db.getAllPrompts(), {
        category: args.category,
        favoritesOnly: args.favoritesOnly,
        config: { ...config, threshold: args.threshold ?? config.threshold },
        seed: 0,
      });

      const titles = new Map(galaxy.nodes.map((n) => [n.id, n.label]));
      return textResult({
        stats: galaxy.stats,
        clusters: galaxy.components.map((ids) => ids.map((id) => titles.get(id) ?? id)),
        connections: galaxy.edges.map((e) => ({
          from: titles.get(e.source) ?? e.source,
          to: titles.get(e.target) ?? e.target,
          weight: Number(e.weight.toFixed(3)),
        })),
      });
    } catch (err) {
      return errorResult(`Failed to build galaxy: ${err instanceof Error ? err.message : String(err)}`);
    }
  };
}
