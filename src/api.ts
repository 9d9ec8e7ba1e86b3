import { Router, type Response } from "express";
import { z } from "zod";
import type { SqlitePromptStore } from "./sqlite-store.js";
import { ConfigError, type GalaxyOverrides } from "./config.js";
import { GraphTooLargeError } from "./similarity.js";
import { createGalaxy } from "./galaxy.js";
import { buildFormFields, generateLivePreview, initialValues } from "./variables.js";
import { describeIssues, promptChangesSchema, promptInputSchema, valuesSchema } from "./schemas.js";

const previewSchema = z.object({
  content: z.string(),
  values: valuesSchema.default({}),
});

const valuesBodySchema = z.object({ values: valuesSchema.default({}) }).default({});

/**
 * Maps store and core errors onto HTTP statuses.
 */
function sendError(res: Response, err: unknown): void {
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof ConfigError) {
    res.status(400).json({ error: message, issues: err.issues });
  } else if (err instanceof GraphTooLargeError) {
    res.status(413).json({ error: message });
  } else if (message.includes("not found")) {
    res.status(404).json({ error: message });
  } else if (message.startsWith("Invalid JSON")) {
    res.status(400).json({ error: message });
  } else {
    res.status(500).json({ error: message });
  }
}

function queryString(value: unknown): string | undefined {
  if (Array.isArray(value)) return queryString(value[0]);
  return typeof value === "string" && value !== "" ? value : undefined;
}

function queryList(value: unknown): string[] {
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === "string" && v !== "");
  const single = queryString(value);
  return single ? [single] : [];
}

function queryFlag(value: unknown): boolean {
  const flag = queryString(value);
  return flag === "true" || flag === "1";
}

function exportFilename(now: Date = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace("T", "_").slice(0, 15);
  return `prompts_export_${stamp}.json`;
}

/**
 * Creates an Express router with REST endpoints for the prompt library:
 * CRUD, live preview and use, facets, import/export and the galaxy graph.
 */
export function createApiRouter(store: SqlitePromptStore, galaxyConfig: GalaxyOverrides = {}): Router {
  const router = Router();

  // -- Prompts --

  router.get("/prompts", (req, res) => {
    const prompts = store.searchPrompts({
      query: queryString(req.query.q),
      category: queryString(req.query.category),
      tags: queryList(req.query.tag),
      favoritesOnly: queryFlag(req.query.favorites),
    });
    res.json(prompts);
  });

  router.post("/prompts", (req, res) => {
    const parsed = promptInputSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    try {
      const prompt = store.createPrompt(parsed.data);
      res.status(201).json(prompt);
    } catch (err) {
      sendError(res, err);
    }
  });

  router.get("/prompts/:id", (req, res) => {
    const prompt = store.getPrompt(req.params.id);
    if (!prompt) {
      res.status(404).json({ error: `Prompt not found: id ${req.params.id}` });
      return;
    }
    res.json(prompt);
  });

  router.put("/prompts/:id", (req, res) => {
    const parsed = promptChangesSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    try {
      res.json(store.updatePrompt(req.params.id, parsed.data));
    } catch (err) {
      sendError(res, err);
    }
  });

  router.delete("/prompts/:id", (req, res) => {
    try {
      store.deletePrompt(req.params.id);
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err);
    }
  });

  router.post("/prompts/:id/favorite", (req, res) => {
    try {
      res.json({ isFavorite: store.toggleFavorite(req.params.id) });
    } catch (err) {
      sendError(res, err);
    }
  });

  // -- Variables --

  router.post("/preview", (req, res) => {
    const parsed = previewSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }
    res.json(generateLivePreview(parsed.data.content, parsed.data.values));
  });

  router.post("/prompts/:id/preview", (req, res) => {
    const prompt = store.getPrompt(req.params.id);
    if (!prompt) {
      res.status(404).json({ error: `Prompt not found: id ${req.params.id}` });
      return;
    }

    const parsed = valuesBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    const values = { ...initialValues(prompt.variables), ...parsed.data.values };
    res.json({
      ...generateLivePreview(prompt.content, values),
      fields: buildFormFields(prompt.variables),
    });
  });

  router.post("/prompts/:id/use", (req, res) => {
    const parsed = valuesBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    const prompt = store.getPrompt(req.params.id);
    if (!prompt) {
      res.status(404).json({ error: `Prompt not found: id ${req.params.id}` });
      return;
    }

    try {
      store.incrementUseCount(prompt.id);
      const values = { ...initialValues(prompt.variables), ...parsed.data.values };
      const { preview, missing } = generateLivePreview(prompt.content, values);
      res.json({ text: preview, missing });
    } catch (err) {
      sendError(res, err);
    }
  });

  // -- Facets --

  router.get("/categories", (_req, res) => {
    res.json(store.getCategories());
  });

  router.get("/tags", (_req, res) => {
    res.json(store.getTags());
  });

  router.get("/facets", (req, res) => {
    res.json(store.getFacetCounts(queryString(req.query.q), queryList(req.query.tag)));
  });

  router.get("/stats", (_req, res) => {
    res.json(store.getStats());
  });

  // -- Galaxy --

  router.get("/galaxy", (req, res) => {
    const rawThreshold = queryString(req.query.threshold);
    const rawSeed = queryString(req.query.seed);
    const seed = rawSeed !== undefined ? Number(rawSeed) : undefined;
    if (seed !== undefined && !Number.isFinite(seed)) {
      res.status(400).json({ error: "seed must be a number" });
      return;
    }

    try {
      const galaxy = createGalaxy(store.getAllPrompts(), {
        category: queryString(req.query.category),
        favoritesOnly: queryFlag(req.query.favorites),
        config: {
          ...galaxyConfig,
          threshold: rawThreshold !== undefined ? Number(rawThreshold) : galaxyConfig.threshold,
        },
        seed,
      });
      res.json(galaxy);
    } catch (err) {
      sendError(res, err);
    }
  });

  // -- Import / export --

  router.get("/export", (_req, res) => {
    res.setHeader("Content-Disposition", `attachment; filename="${exportFilename()}"`);
    res.type("application/json").send(store.exportToJson());
  });

  router.post("/import", (req, res) => {
    if (!Array.isArray(req.body)) {
      res.status(400).json({ error: "Invalid JSON format: expected array of prompts" });
      return;
    }

    try {
      const imported = store.importPrompts(req.body);
      res.status(201).json({ imported });
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
