import Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type {
  FacetCounts,
  LibraryStats,
  Prompt,
  PromptChanges,
  PromptInput,
  PromptQuery,
  PromptStore,
  PromptWriter,
  Variable,
} from "./types.js";
import { isVariableType, pruneVariables, reconcileVariables } from "./variables.js";
import { describeIssues, exportedPromptSchema } from "./schemas.js";

interface PromptRow {
  id: string;
  title: string;
  content: string;
  category: string;
  is_favorite: number;
  use_count: number;
  created_at: string;
  updated_at: string;
}

interface VariableRow {
  name: string;
  type: string;
  default_value: string | null;
  options: string | null;
}

const PROMPT_COLUMNS = "p.id, p.title, p.content, p.category, p.is_favorite, p.use_count, p.created_at, p.updated_at";

/**
 * SQLite-backed prompt library: prompts with their tags and variable
 * definitions, usage counters and favorites.
 */
export class SqlitePromptStore implements PromptStore, PromptWriter {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  /**
   * Creates the schema tables if they do not exist yet.
   */
  initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS prompts (
        id TEXT PRIMARY KEY,
        title TEXT NOT NULL,
        content TEXT NOT NULL,
        category TEXT NOT NULL,
        is_favorite INTEGER NOT NULL DEFAULT 0,
        use_count INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_prompts_category ON prompts(category);
      CREATE INDEX IF NOT EXISTS idx_prompts_is_favorite ON prompts(is_favorite);

      CREATE TABLE IF NOT EXISTS tags (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT UNIQUE NOT NULL
      );

      CREATE TABLE IF NOT EXISTS prompt_tags (
        prompt_id TEXT NOT NULL,
        tag_id INTEGER NOT NULL,
        position INTEGER NOT NULL,
        PRIMARY KEY (prompt_id, tag_id),
        FOREIGN KEY (prompt_id) REFERENCES prompts(id) ON DELETE CASCADE,
        FOREIGN KEY (tag_id) REFERENCES tags(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_prompt_tags_tag_id ON prompt_tags(tag_id);

      CREATE TABLE IF NOT EXISTS variables (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        prompt_id TEXT NOT NULL,
        position INTEGER NOT NULL,
        name TEXT NOT NULL,
        type TEXT NOT NULL,
        default_value TEXT,
        options TEXT,
        FOREIGN KEY (prompt_id) REFERENCES prompts(id) ON DELETE CASCADE
      );

      CREATE INDEX IF NOT EXISTS idx_variables_prompt_id ON variables(prompt_id);
    `);
  }

  /**
   * Closes the database connection.
   */
  close(): void {
    this.db.close();
  }

  // -- Create / update / delete --

  /**
   * Saves a new prompt. Variables referenced in the content but not defined
   * get a blank text definition.
   */
  createPrompt(input: PromptInput): Prompt {
    const now = new Date().toISOString();
    const prompt: Prompt = {
      id: randomUUID(),
      title: input.title,
      content: input.content,
      category: input.category,
      tags: dedupe(input.tags ?? []),
      variables: reconcileVariables(input.content, input.variables ?? []),
      isFavorite: input.isFavorite ?? false,
      useCount: 0,
      createdAt: now,
      updatedAt: now,
    };

    this.db.transaction(() => this.insertPrompt(prompt))();
    return prompt;
  }

  /**
   * Applies partial changes. Tags and variables are replaced wholesale; a
   * content change without new variables re-derives them from the content.
   */
  updatePrompt(id: string, changes: PromptChanges): Prompt {
    const existing = this.getPrompt(id);
    if (!existing) {
      throw new Error(`Prompt not found: id ${id}`);
    }

    const content = changes.content ?? existing.content;
    let variables = existing.variables;
    if (changes.variables !== undefined) {
      variables = reconcileVariables(content, changes.variables);
    } else if (changes.content !== undefined) {
      variables = pruneVariables(content, existing.variables);
    }

    const updated: Prompt = {
      ...existing,
      title: changes.title ?? existing.title,
      content,
      category: changes.category ?? existing.category,
      tags: changes.tags !== undefined ? dedupe(changes.tags) : existing.tags,
      variables,
      isFavorite: changes.isFavorite ?? existing.isFavorite,
      useCount: changes.useCount ?? existing.useCount,
      updatedAt: new Date().toISOString(),
    };

    this.db.transaction(() => {
      this.db
        .prepare(
          `UPDATE prompts
           SET title = ?, content = ?, category = ?, is_favorite = ?, use_count = ?, updated_at = ?
           WHERE id = ?`
        )
        .run(
          updated.title,
          updated.content,
          updated.category,
          updated.isFavorite ? 1 : 0,
          updated.useCount,
          updated.updatedAt,
          id
        );
      this.db.prepare("DELETE FROM prompt_tags WHERE prompt_id = ?").run(id);
      this.db.prepare("DELETE FROM variables WHERE prompt_id = ?").run(id);
      this.insertTags(id, updated.tags);
      this.insertVariables(id, updated.variables);
    })();

    return updated;
  }

  /**
   * Deletes a prompt together with its tag links and variables (via CASCADE).
   */
  deletePrompt(id: string): void {
    const result = this.db.prepare("DELETE FROM prompts WHERE id = ?").run(id);
    if (result.changes === 0) {
      throw new Error(`Prompt not found: id ${id}`);
    }
  }

  /**
   * Flips the favorite flag and returns the new value.
   */
  toggleFavorite(id: string): boolean {
    const result = this.db.prepare("UPDATE prompts SET is_favorite = 1 - is_favorite WHERE id = ?").run(id);
    if (result.changes === 0) {
      throw new Error(`Prompt not found: id ${id}`);
    }
    const row = this.db.prepare("SELECT is_favorite FROM prompts WHERE id = ?").get(id) as
      | { is_favorite: number }
      | undefined;
    return row?.is_favorite === 1;
  }

  incrementUseCount(id: string): void {
    const result = this.db.prepare("UPDATE prompts SET use_count = use_count + 1 WHERE id = ?").run(id);
    if (result.changes === 0) {
      throw new Error(`Prompt not found: id ${id}`);
    }
  }

  // -- PromptStore interface (read) --

  getPrompt(id: string): Prompt | undefined {
    const row = this.db.prepare(`SELECT ${PROMPT_COLUMNS} FROM prompts p WHERE p.id = ?`).get(id) as
      | PromptRow
      | undefined;
    return row ? this.hydrate(row) : undefined;
  }

  /**
   * All prompts, newest first.
   */
  getAllPrompts(): Prompt[] {
    const rows = this.db
      .prepare(`SELECT ${PROMPT_COLUMNS} FROM prompts p ORDER BY p.created_at DESC, p.rowid DESC`)
      .all() as PromptRow[];
    return rows.map((row) => this.hydrate(row));
  }

  /**
   * Text query matches title, content or a variable name (case-insensitive);
   * tags match when the prompt carries any of them.
   */
  searchPrompts(query: PromptQuery): Prompt[] {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (query.query) {
      const term = `%${query.query}%`;
      conditions.push(
        `(p.title LIKE ? OR p.content LIKE ? OR EXISTS (
           SELECT 1 FROM variables v WHERE v.prompt_id = p.id AND v.name LIKE ?))`
      );
      values.push(term, term, term);
    }

    if (query.tags && query.tags.length > 0) {
      const placeholders = query.tags.map(() => "?").join(", ");
      conditions.push(
        `EXISTS (SELECT 1 FROM prompt_tags pt JOIN tags t ON pt.tag_id = t.id
                 WHERE pt.prompt_id = p.id AND t.name IN (${placeholders}))`
      );
      values.push(...query.tags);
    }

    if (query.category) {
      conditions.push("p.category = ?");
      values.push(query.category);
    }

    if (query.favoritesOnly) {
      conditions.push("p.is_favorite = 1");
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const rows = this.db
      .prepare(`SELECT ${PROMPT_COLUMNS} FROM prompts p ${where} ORDER BY p.created_at DESC, p.rowid DESC`)
      .all(...values) as PromptRow[];
    return rows.map((row) => this.hydrate(row));
  }

  getCategories(): string[] {
    const rows = this.db.prepare("SELECT DISTINCT category FROM prompts ORDER BY category").all() as Array<{
      category: string;
    }>;
    return rows.map((r) => r.category);
  }

  /**
   * Tags attached to at least one prompt, alphabetically.
   */
  getTags(): string[] {
    const rows = this.db
      .prepare(
        `SELECT DISTINCT t.name FROM tags t
         JOIN prompt_tags pt ON pt.tag_id = t.id
         ORDER BY t.name`
      )
      .all() as Array<{ name: string }>;
    return rows.map((r) => r.name);
  }

  /**
   * Category and tag counts over the prompts matching a search.
   */
  getFacetCounts(query: string = "", tags: string[] = []): FacetCounts {
    const categories = new Map<string, number>();
    const tagCounts = new Map<string, number>();
    for (const prompt of this.searchPrompts({ query, tags })) {
      increment(categories, prompt.category);
      for (const tag of prompt.tags) {
        increment(tagCounts, tag);
      }
    }
    return { categories: Object.fromEntries(categories), tags: Object.fromEntries(tagCounts) };
  }

  getStats(): LibraryStats {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS total,
                COALESCE(SUM(is_favorite), 0) AS favorites,
                COALESCE(SUM(use_count), 0) AS uses
         FROM prompts`
      )
      .get() as { total: number; favorites: number; uses: number };
    const tags = this.getTags().length;

    return {
      totalPrompts: row.total,
      totalFavorites: row.favorites,
      totalTags: tags,
      totalUses: row.uses,
    };
  }

  // -- Import / export --

  exportToJson(): string {
    return JSON.stringify(this.getAllPrompts(), null, 2);
  }

  /**
   * Imports prompts from a JSON array (see importPrompts).
   */
  importFromJson(json: string): number {
    let data: unknown;
    try {
      data = JSON.parse(json);
    } catch (err) {
      throw new Error(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    if (!Array.isArray(data)) {
      throw new Error("Invalid JSON format: expected array of prompts");
    }
    return this.importPrompts(data);
  }

  /**
   * Imports exported prompts. Ids are regenerated; invalid items are logged
   * and skipped. Returns the number imported.
   */
  importPrompts(items: readonly unknown[]): number {
    let count = 0;
    const now = new Date().toISOString();

    this.db.transaction(() => {
      items.forEach((item, index) => {
        const parsed = exportedPromptSchema.safeParse(item);
        if (!parsed.success) {
          console.error(`Skipping prompt #${index} on import: ${describeIssues(parsed.error)}`);
          return;
        }
        const p = parsed.data;
        this.insertPrompt({
          id: randomUUID(),
          title: p.title,
          content: p.content,
          category: p.category,
          tags: dedupe(p.tags ?? []),
          variables: reconcileVariables(p.content, p.variables ?? []),
          isFavorite: p.isFavorite ?? false,
          useCount: p.useCount ?? 0,
          createdAt: p.createdAt ?? now,
          updatedAt: p.updatedAt ?? now,
        });
        count++;
      });
    })();

    return count;
  }

  // -- Private helpers --

  private insertPrompt(prompt: Prompt): void {
    this.db
      .prepare(
        `INSERT INTO prompts (id, title, content, category, is_favorite, use_count, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        prompt.id,
        prompt.title,
        prompt.content,
        prompt.category,
        prompt.isFavorite ? 1 : 0,
        prompt.useCount,
        prompt.createdAt,
        prompt.updatedAt
      );
    this.insertTags(prompt.id, prompt.tags);
    this.insertVariables(prompt.id, prompt.variables);
  }

  private insertTags(promptId: string, tags: readonly string[]): void {
    const ensureTag = this.db.prepare("INSERT OR IGNORE INTO tags (name) VALUES (?)");
    const findTag = this.db.prepare("SELECT id FROM tags WHERE name = ?");
    const link = this.db.prepare("INSERT OR IGNORE INTO prompt_tags (prompt_id, tag_id, position) VALUES (?, ?, ?)");

    tags.forEach((name, position) => {
      ensureTag.run(name);
      const tag = findTag.get(name) as { id: number };
      link.run(promptId, tag.id, position);
    });
  }

  private insertVariables(promptId: string, variables: readonly Variable[]): void {
    const insert = this.db.prepare(
      `INSERT INTO variables (prompt_id, position, name, type, default_value, options)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    variables.forEach((v, position) => {
      insert.run(
        promptId,
        position,
        v.name,
        v.type,
        v.defaultValue,
        v.options.length > 0 ? JSON.stringify(v.options) : null
      );
    });
  }

  private hydrate(row: PromptRow): Prompt {
    const tags = this.db
      .prepare(
        `SELECT t.name FROM tags t
         JOIN prompt_tags pt ON pt.tag_id = t.id
         WHERE pt.prompt_id = ?
         ORDER BY pt.position`
      )
      .all(row.id) as Array<{ name: string }>;

    const variables = this.db
      .prepare(
        "SELECT name, type, default_value, options FROM variables WHERE prompt_id = ? ORDER BY position"
      )
      .all(row.id) as VariableRow[];

    return {
      id: row.id,
      title: row.title,
      content: row.content,
      category: row.category,
      tags: tags.map((t) => t.name),
      variables: variables.map(mapVariableRow),
      isFavorite: row.is_favorite === 1,
      useCount: row.use_count,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}

function mapVariableRow(row: VariableRow): Variable {
  return {
    name: row.name,
    type: isVariableType(row.type) ? row.type : "text",
    defaultValue: row.default_value ?? "",
    options: parseOptions(row.options),
  };
}

function parseOptions(raw: string | null): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((o): o is string => typeof o === "string") : [];
}

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function dedupe(values: readonly string[]): string[] {
  return [...new Set(values)];
}
