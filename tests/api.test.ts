import { describe, it, expect, beforeAll, afterAll, beforeEach, vi } from "vitest";
import express from "express";
import { SqlitePromptStore } from "../src/sqlite-store.js";
import { createApiRouter } from "../src/api.js";
import type { GalaxyOverrides } from "../src/config.js";
import type { Galaxy, Prompt, PromptInput } from "../src/types.js";

// Minimal request helper, so tests need no supertest dependency
async function req<T = unknown>(
  app: express.Express,
  method: string,
  path: string,
  body?: unknown
): Promise<{ status: number; body: T; headers: Headers }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      const port = typeof addr === "object" && addr !== null ? addr.port : 0;
      const opts: RequestInit = {
        method,
        headers: { "Content-Type": "application/json" },
      };
      if (body !== undefined) {
        opts.body = JSON.stringify(body);
      }
      fetch(`http://127.0.0.1:${port}${path}`, opts)
        .then(async (res) => {
          const json = await res.json().catch(() => null);
          server.close();
          resolve({ status: res.status, body: json, headers: res.headers });
        })
        .catch((err) => {
          server.close();
          reject(err);
        });
    });
  });
}

function createApp(store: SqlitePromptStore, galaxyConfig: GalaxyOverrides = {}): express.Express {
  const app = express();
  app.use(express.json());
  app.use("/api", createApiRouter(store, galaxyConfig));
  return app;
}

const blogOutline: PromptInput = {
  title: "Blog Post Outline",
  content: "Write an outline for a blog post about {{topic}} for {{audience}}.",
  category: "Writing",
  tags: ["blog", "content"],
  variables: [{ name: "topic", type: "text", defaultValue: "AI", options: [] }],
};

const blogIdeas: PromptInput = {
  title: "Blog Post Ideas",
  content: "List ten blog post ideas for a {{niche}} audience.",
  category: "Writing",
  tags: ["blog"],
};

const codeReview: PromptInput = {
  title: "Code Review Request",
  content: "Please review this {{language}} code:\n\n{{code}}",
  category: "Development",
  tags: ["code-review"],
  isFavorite: true,
};

describe("API Router", () => {
  let store: SqlitePromptStore;
  let app: express.Express;

  beforeAll(() => {
    store = new SqlitePromptStore(":memory:");
    store.initialize();
    app = createApp(store);
  });

  afterAll(() => {
    store.close();
  });

  beforeEach(() => {
    for (const prompt of store.getAllPrompts()) {
      store.deletePrompt(prompt.id);
    }
  });

  // -- Prompts --

  describe("GET /api/prompts", () => {
    it("returns an empty array for an empty library", async () => {
      const res = await req(app, "GET", "/api/prompts");
      expect(res.status).toBe(200);
      expect(res.body).toEqual([]);
    });

    it("searches by text, tags and favorites", async () => {
      store.createPrompt(blogOutline);
      store.createPrompt(blogIdeas);
      store.createPrompt(codeReview);

      const byText = await req<Prompt[]>(app, "GET", "/api/prompts?q=outline");
      expect(byText.body.map((p) => p.title)).toEqual(["Blog Post Outline"]);

      const byTags = await req<Prompt[]>(app, "GET", "/api/prompts?tag=content&tag=code-review");
      expect(byTags.body.map((p) => p.title)).toEqual(["Code Review Request", "Blog Post Outline"]);

      const favorites = await req<Prompt[]>(app, "GET", "/api/prompts?favorites=true");
      expect(favorites.body.map((p) => p.title)).toEqual(["Code Review Request"]);

      const byCategory = await req<Prompt[]>(app, "GET", "/api/prompts?category=Writing");
      expect(byCategory.body).toHaveLength(2);
    });
  });

  describe("POST /api/prompts", () => {
    it("creates a prompt and detects its variables", async () => {
      const res = await req<Prompt>(app, "POST", "/api/prompts", blogOutline);
      expect(res.status).toBe(201);
      expect(res.body.id).toBeTruthy();
      expect(res.body.variables.map((v) => v.name)).toEqual(["topic", "audience"]);
      expect(store.getPrompt(res.body.id)?.title).toBe("Blog Post Outline");
    });

    it("trims the title", async () => {
      const res = await req<Prompt>(app, "POST", "/api/prompts", { ...blogIdeas, title: "  Ideas  " });
      expect(res.status).toBe(201);
      expect(res.body.title).toBe("Ideas");
    });

    it("returns 400 for a short title", async () => {
      const res = await req(app, "POST", "/api/prompts", { ...blogIdeas, title: "ab" });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "title: Title must be 3-200 characters" });
    });

    it("returns 400 for content that is blank once trimmed", async () => {
      const res = await req(app, "POST", "/api/prompts", { ...blogIdeas, content: "   short   " });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "content: Content must be 10-10000 characters" });
    });

    it("returns 400 for a malformed variable name", async () => {
      const res = await req(app, "POST", "/api/prompts", {
        ...blogIdeas,
        variables: [{ name: "1bad" }],
      });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "variables.0.name: must be an identifier ([A-Za-z_][A-Za-z0-9_]*)" });
    });
  });

  describe("variable definitions", () => {
    it("returns 400 for a select without options and a non-numeric number default", async () => {
      const res = await req(app, "POST", "/api/prompts", {
        title: "Pick a language",
        content: "Translate {{lang}} snippets {{n}} times.",
        category: "Development",
        variables: [
          { name: "lang", type: "select", defaultValue: "Rust", options: [] },
          { name: "n", type: "number", defaultValue: "abc" },
        ],
      });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: 'variables: Select variable "lang" has no options; variables: Default "abc" of "n" is not a number',
      });
      expect(store.getAllPrompts()).toEqual([]);
    });

    it("returns 400 for a select default outside its options on update", async () => {
      const created = store.createPrompt(blogIdeas);
      const res = await req(app, "PUT", `/api/prompts/${created.id}`, {
        variables: [{ name: "niche", type: "select", defaultValue: "golf", options: ["chess", "tennis"] }],
      });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'variables: Default "golf" is not an option of "niche"' });
    });

    it("returns 400 for duplicate names", async () => {
      const res = await req(app, "POST", "/api/prompts", {
        ...blogIdeas,
        variables: [{ name: "niche" }, { name: "niche" }],
      });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'variables: Duplicate variable: "niche"' });
    });

    it("accepts a select whose default is one of its options", async () => {
      const res = await req(app, "POST", "/api/prompts", {
        ...blogIdeas,
        variables: [{ name: "niche", type: "select", defaultValue: "chess", options: ["chess", "tennis"] }],
      });
      expect(res.status).toBe(201);
    });
  });

  describe("GET /api/prompts/:id", () => {
    it("returns the prompt", async () => {
      const created = store.createPrompt(blogIdeas);
      const res = await req<Prompt>(app, "GET", `/api/prompts/${created.id}`);
      expect(res.status).toBe(200);
      expect(res.body).toEqual(created);
    });

    it("returns 404 for an unknown id", async () => {
      const res = await req(app, "GET", "/api/prompts/missing");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ error: "Prompt not found: id missing" });
    });
  });

  describe("PUT /api/prompts/:id", () => {
    it("applies partial changes", async () => {
      const created = store.createPrompt(blogIdeas);
      const res = await req<Prompt>(app, "PUT", `/api/prompts/${created.id}`, { category: "Marketing" });
      expect(res.status).toBe(200);
      expect(res.body.category).toBe("Marketing");
      expect(res.body.title).toBe("Blog Post Ideas");
    });

    it("returns 404 for an unknown id", async () => {
      const res = await req(app, "PUT", "/api/prompts/missing", { category: "Marketing" });
      expect(res.status).toBe(404);
    });

    it("returns 400 for invalid changes", async () => {
      const created = store.createPrompt(blogIdeas);
      const res = await req(app, "PUT", `/api/prompts/${created.id}`, { category: "" });
      expect(res.status).toBe(400);
    });
  });

  describe("DELETE /api/prompts/:id", () => {
    it("deletes the prompt", async () => {
      const created = store.createPrompt(blogIdeas);
      const res = await req(app, "DELETE", `/api/prompts/${created.id}`);
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ ok: true });
      expect(store.getPrompt(created.id)).toBeUndefined();
    });

    it("returns 404 for an unknown id", async () => {
      const res = await req(app, "DELETE", "/api/prompts/missing");
      expect(res.status).toBe(404);
    });
  });

  describe("POST /api/prompts/:id/favorite", () => {
    it("toggles the flag", async () => {
      const created = store.createPrompt(blogIdeas);
      const first = await req(app, "POST", `/api/prompts/${created.id}/favorite`);
      const second = await req(app, "POST", `/api/prompts/${created.id}/favorite`);
      expect(first.body).toEqual({ isFavorite: true });
      expect(second.body).toEqual({ isFavorite: false });
    });
  });

  // -- Variables --

  describe("POST /api/preview", () => {
    it("substitutes values and reports missing ones", async () => {
      const res = await req(app, "POST", "/api/preview", {
        content: "Hello {{name}}, you are {{age}} years old. {{mood}}",
        values: { name: "Ana", age: 30 },
      });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ preview: "Hello Ana, you are 30 years old. {{mood}}", missing: ["mood"] });
    });

    it("returns 400 without content", async () => {
      const res = await req(app, "POST", "/api/preview", { values: {} });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "content: Required" });
    });
  });

  describe("POST /api/prompts/:id/preview", () => {
    it("starts from variable defaults and returns the form fields", async () => {
      const created = store.createPrompt(blogOutline);
      const res = await req(app, "POST", `/api/prompts/${created.id}/preview`, { values: { audience: "students" } });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        preview: "Write an outline for a blog post about AI for students.",
        missing: [],
        fields: [
          { name: "topic", label: "topic", kind: "text", initial: "AI" },
          { name: "audience", label: "audience", kind: "text", initial: "" },
        ],
      });
    });

    it("returns 404 for an unknown id", async () => {
      const res = await req(app, "POST", "/api/prompts/missing/preview", {});
      expect(res.status).toBe(404);
    });
  });

  describe("POST /api/prompts/:id/use", () => {
    it("returns the filled text and records a use", async () => {
      const created = store.createPrompt(blogOutline);
      const res = await req(app, "POST", `/api/prompts/${created.id}/use`, {
        values: { topic: "AI", audience: "students" },
      });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ text: "Write an outline for a blog post about AI for students.", missing: [] });
      expect(store.getPrompt(created.id)?.useCount).toBe(1);
    });

    it("still counts the use when values are missing", async () => {
      const created = store.createPrompt(blogOutline);
      const res = await req(app, "POST", `/api/prompts/${created.id}/use`, { values: { topic: "AI" } });
      expect(res.body).toEqual({
        text: "Write an outline for a blog post about AI for .",
        missing: ["audience"],
      });
      expect(store.getPrompt(created.id)?.useCount).toBe(1);
    });

    it("fills from variable defaults, matching the preview", async () => {
      const created = store.createPrompt({
        title: "Greeting",
        content: "Say hello to {{name}} now.",
        category: "General",
        variables: [{ name: "name", type: "text", defaultValue: "Ana", options: [] }],
      });

      const preview = await req(app, "POST", `/api/prompts/${created.id}/preview`, {});
      const use = await req(app, "POST", `/api/prompts/${created.id}/use`, {});
      expect(use.body).toEqual({ text: "Say hello to Ana now.", missing: [] });
      expect(preview.body).toMatchObject({ preview: "Say hello to Ana now.", missing: [] });
    });

    it("returns 404 for an unknown id", async () => {
      const res = await req(app, "POST", "/api/prompts/missing/use", {});
      expect(res.status).toBe(404);
    });
  });

  // -- Facets --

  describe("facets", () => {
    beforeEach(() => {
      store.createPrompt(blogOutline);
      store.createPrompt(codeReview);
    });

    it("GET /api/categories lists categories", async () => {
      const res = await req(app, "GET", "/api/categories");
      expect(res.body).toEqual(["Development", "Writing"]);
    });

    it("GET /api/tags lists tags", async () => {
      const res = await req(app, "GET", "/api/tags");
      expect(res.body).toEqual(["blog", "code-review", "content"]);
    });

    it("GET /api/facets counts over a search", async () => {
      const res = await req(app, "GET", "/api/facets?q=review");
      expect(res.body).toEqual({ categories: { Development: 1 }, tags: { "code-review": 1 } });
    });

    it("GET /api/stats summarises the library", async () => {
      const res = await req(app, "GET", "/api/stats");
      expect(res.body).toEqual({ totalPrompts: 2, totalFavorites: 1, totalTags: 3, totalUses: 0 });
    });
  });

  // -- Galaxy --

  describe("GET /api/galaxy", () => {
    it("returns nodes, edges and statistics", async () => {
      store.createPrompt(blogOutline);
      store.createPrompt(blogIdeas);
      store.createPrompt(codeReview);

      const res = await req<Galaxy>(app, "GET", "/api/galaxy?threshold=0.5&seed=1");
      expect(res.status).toBe(200);
      expect(res.body.nodes).toHaveLength(3);
      expect(res.body.edges).toHaveLength(1);
      // category 0.4 + tags 0.5 * 1/2 + title 0.1 * 2/4
      expect(res.body.edges[0].weight).toBeCloseTo(0.7, 10);
      expect(res.body.components).toHaveLength(2);
      expect(res.body.categories).toEqual(["Development", "Writing"]);
      expect(res.body.stats.mostConnectedCategory).toBe("Writing");
    });

    it("is reproducible for a fixed seed", async () => {
      store.createPrompt(blogOutline);
      store.createPrompt(blogIdeas);

      const first = await req<Galaxy>(app, "GET", "/api/galaxy?seed=3");
      const second = await req<Galaxy>(app, "GET", "/api/galaxy?seed=3");
      expect(first.body.nodes).toEqual(second.body.nodes);
    });

    it("filters by category", async () => {
      store.createPrompt(blogOutline);
      store.createPrompt(codeReview);

      const res = await req<Galaxy>(app, "GET", "/api/galaxy?category=Development&seed=1");
      expect(res.body.nodes.map((n) => n.label)).toEqual(["Code Review Request"]);
    });

    it("returns 400 for a threshold outside [0, 1]", async () => {
      const res = await req(app, "GET", "/api/galaxy?threshold=2");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: "Invalid configuration: threshold: Number must be less than or equal to 1",
        issues: ["threshold: Number must be less than or equal to 1"],
      });
    });

    it("returns 400 for a non-numeric seed", async () => {
      const res = await req(app, "GET", "/api/galaxy?seed=abc");
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "seed must be a number" });
    });

    it("returns 413 when the library exceeds the size cap", async () => {
      store.createPrompt(blogOutline);
      store.createPrompt(blogIdeas);

      const res = await req(createApp(store, { maxPrompts: 1 }), "GET", "/api/galaxy");
      expect(res.status).toBe(413);
      expect(res.body).toEqual({ error: "Too many prompts for the similarity graph: 2 (limit 1)" });
    });
  });

  // -- Import / export --

  describe("GET /api/export", () => {
    it("downloads the library as a JSON attachment", async () => {
      store.createPrompt(blogIdeas);

      const res = await req<Prompt[]>(app, "GET", "/api/export");
      expect(res.status).toBe(200);
      expect(res.headers.get("content-disposition")).toMatch(
        /^attachment; filename="prompts_export_\d{8}_\d{6}\.json"$/
      );
      expect(res.body.map((p) => p.title)).toEqual(["Blog Post Ideas"]);
    });
  });

  describe("POST /api/import", () => {
    it("imports valid prompts and skips invalid ones", async () => {
      const spy = vi.spyOn(console, "error").mockImplementation(() => {});
      const res = await req(app, "POST", "/api/import", [blogIdeas, { title: "no content" }]);
      spy.mockRestore();

      expect(res.status).toBe(201);
      expect(res.body).toEqual({ imported: 1 });
      expect(store.getAllPrompts().map((p) => p.title)).toEqual(["Blog Post Ideas"]);
    });

    it("returns 400 when the body is not an array", async () => {
      const res = await req(app, "POST", "/api/import", { prompts: [] });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: "Invalid JSON format: expected array of prompts" });
    });
  });
});
