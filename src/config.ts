import { resolve } from "node:path";
import { z } from "zod";
import { formatIssue } from "./schemas.js";

/**
 * Relative importance of each similarity signal. Must sum to 1.
 */
export interface SimilarityWeights {
  category: number;
  tags: number;
  title: number;
}

/**
 * Node size = baseSize + favoriteBonus (favorites only) + min(useCount / 2, usageCap).
 */
export interface SizingConfig {
  baseSize: number;
  favoriteBonus: number;
  usageCap: number;
}

export interface LayoutConfig {
  /** Half-width of the square the 2D layout is scaled into. */
  scale: number;
  /** Depth added per recorded use. */
  zStep: number;
  /** Jitter amplitude on z; at most zStep / 2 so depth stays monotonic in use count. */
  zJitter: number;
  iterations: number;
}

export interface GalaxyConfig {
  weights: SimilarityWeights;
  threshold: number;
  sizing: SizingConfig;
  layout: LayoutConfig;
  /** Cap on prompts fed to the O(n²) similarity pass. */
  maxPrompts: number;
}

export interface GalaxyOverrides {
  weights?: Partial<SimilarityWeights>;
  threshold?: number;
  sizing?: Partial<SizingConfig>;
  layout?: Partial<LayoutConfig>;
  maxPrompts?: number;
}

export const DEFAULT_GALAXY_CONFIG: GalaxyConfig = {
  weights: { category: 0.4, tags: 0.5, title: 0.1 },
  threshold: 0.1,
  sizing: { baseSize: 10, favoriteBonus: 5, usageCap: 10 },
  layout: { scale: 10, zStep: 1, zJitter: 0.5, iterations: 300 },
  maxPrompts: 2000,
};

const WEIGHT_SUM_TOLERANCE = 1e-6;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export const thresholdSchema = z.number().min(0).max(1);

export const weightsSchema = z
  .object({
    category: z.number().min(0).max(1),
    tags: z.number().min(0).max(1),
    title: z.number().min(0).max(1),
  })
  .refine((w) => Math.abs(w.category + w.tags + w.title - 1) <= WEIGHT_SUM_TOLERANCE, {
    message: "weights must sum to 1",
  });

export const layoutSchema = z
  .object({
    scale: z.number().positive(),
    zStep: z.number().positive(),
    zJitter: z.number().nonnegative(),
    iterations: z.number().int().positive(),
  })
  .refine((l) => l.zJitter <= l.zStep / 2, {
    message: "zJitter must not exceed half of zStep",
    path: ["zJitter"],
  });

const galaxyConfigSchema = z.object({
  weights: weightsSchema,
  threshold: thresholdSchema,
  sizing: z.object({
    baseSize: z.number().nonnegative(),
    favoriteBonus: z.number().nonnegative(),
    usageCap: z.number().nonnegative(),
  }),
  layout: layoutSchema,
  maxPrompts: z.number().int().positive(),
});

/**
 * Validates a parsed value against a schema, turning zod issues into a ConfigError.
 */
export function parseConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

/**
 * Merges overrides onto the defaults and validates the result.
 * Throws ConfigError when a value is out of range.
 */
export function resolveGalaxyConfig(overrides: GalaxyOverrides = {}): GalaxyConfig {
  const merged: GalaxyConfig = {
    weights: { ...DEFAULT_GALAXY_CONFIG.weights, ...overrides.weights },
    threshold: overrides.threshold ?? DEFAULT_GALAXY_CONFIG.threshold,
    sizing: { ...DEFAULT_GALAXY_CONFIG.sizing, ...overrides.sizing },
    layout: { ...DEFAULT_GALAXY_CONFIG.layout, ...overrides.layout },
    maxPrompts: overrides.maxPrompts ?? DEFAULT_GALAXY_CONFIG.maxPrompts,
  };
  return parseConfig(galaxyConfigSchema, merged);
}

export interface ServerConfig {
  port: number;
  dbPath: string;
  galaxy: GalaxyConfig;
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3001),
  PROMPT_DB_PATH: z.string().min(1).default("prompts.db"),
  GALAXY_THRESHOLD: z.coerce.number().optional(),
});

/**
 * Reads server settings from the environment.
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = parseConfig(envSchema, env);
  return {
    port: parsed.PORT,
    dbPath: parsed.PROMPT_DB_PATH === ":memory:" ? parsed.PROMPT_DB_PATH : resolve(parsed.PROMPT_DB_PATH),
    galaxy: resolveGalaxyConfig({ threshold: parsed.GALAXY_THRESHOLD }),
  };
}
