import type { Prompt, SimilarityEdge } from "./types.js";
import {
  DEFAULT_GALAXY_CONFIG,
  parseConfig,
  thresholdSchema,
  weightsSchema,
  type SimilarityWeights,
} from "./config.js";

/**
 * The prompt fields similarity is computed from.
 */
export type Comparable = Pick<Prompt, "category" | "tags" | "title">;

export type SimilarityFn = (a: Comparable, b: Comparable) => number;

/**
 * |A ∩ B| / |A ∪ B|, with two empty sets scoring 0.
 */
export function jaccard(a: Iterable<string>, b: Iterable<string>): number {
  const left = new Set(a);
  const right = new Set(b);
  if (left.size === 0 && right.size === 0) return 0;

  let shared = 0;
  for (const item of left) {
    if (right.has(item)) shared++;
  }
  return shared / (left.size + right.size - shared);
}

/**
 * Lower-cased word set of a title; anything that is not a letter or digit separates words.
 */
export function titleWords(title: string): Set<string> {
  return new Set(title.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter((w) => w.length > 0));
}

/**
 * Returns a scorer bound to the given weights. Throws ConfigError when the
 * weights are out of range or do not sum to 1.
 */
export function createSimilarity(weights: SimilarityWeights = DEFAULT_GALAXY_CONFIG.weights): SimilarityFn {
  const w = parseConfig(weightsSchema, weights);

  return (a, b) => {
    const category = a.category === b.category ? 1 : 0;
    const tags = jaccard(a.tags, b.tags);
    const title = jaccard(titleWords(a.title), titleWords(b.title));
    const score = w.category * category + w.tags * tags + w.title * title;
    return Math.min(1, Math.max(0, score));
  };
}

const defaultSimilarity = createSimilarity();

/**
 * Weighted category / tag / title similarity in [0, 1]. Symmetric.
 */
export function pairwiseSimilarity(a: Comparable, b: Comparable, weights?: SimilarityWeights): number {
  return weights ? createSimilarity(weights)(a, b) : defaultSimilarity(a, b);
}

// -- Graph construction --

export class GraphTooLargeError extends Error {
  constructor(readonly count: number, readonly limit: number) {
    super(`Too many prompts for the similarity graph: ${count} (limit ${limit})`);
    this.name = "GraphTooLargeError";
  }
}

export interface GraphFilter {
  category?: string;
  favoritesOnly?: boolean;
}

export interface GraphOptions extends GraphFilter {
  threshold?: number;
  weights?: SimilarityWeights;
  maxPrompts?: number;
}

export interface SimilarityGraph {
  nodes: Prompt[];
  edges: SimilarityEdge[];
}

/**
 * Keeps prompts matching the category and favorite filters. The input is not modified.
 */
export function filterPrompts(prompts: readonly Prompt[], filter: GraphFilter): Prompt[] {
  return prompts.filter((p) => {
    if (filter.category && p.category !== filter.category) return false;
    if (filter.favoritesOnly && !p.isFavorite) return false;
    return true;
  });
}

/**
 * Filters the prompts, then links every pair whose similarity is strictly
 * above the threshold. Isolated prompts remain in the node list.
 */
export function buildGraph(prompts: readonly Prompt[], options: GraphOptions = {}): SimilarityGraph {
  const threshold = parseConfig(thresholdSchema, options.threshold ?? DEFAULT_GALAXY_CONFIG.threshold);
  const similarity = options.weights ? createSimilarity(options.weights) : defaultSimilarity;
  const limit = options.maxPrompts ?? DEFAULT_GALAXY_CONFIG.maxPrompts;

  const nodes = filterPrompts(prompts, options);
  if (nodes.length > limit) {
    throw new GraphTooLargeError(nodes.length, limit);
  }

  const edges: SimilarityEdge[] = [];
  for (let i = 0; i < nodes.length; i++) {
    for (let j = i + 1; j < nodes.length; j++) {
      const weight = similarity(nodes[i], nodes[j]);
      if (weight > threshold) {
        edges.push({ source: nodes[i].id, target: nodes[j].id, weight });
      }
    }
  }

  return { nodes, edges };
}
