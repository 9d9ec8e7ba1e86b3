import type { Galaxy, GalaxyNode, GalaxyStats, Prompt, SimilarityEdge } from "./types.js";
import { resolveGalaxyConfig, type GalaxyOverrides, type SizingConfig } from "./config.js";
import { buildGraph, type GraphFilter } from "./similarity.js";
import { computeLayout, type LayoutStrategy } from "./layout.js";

export const FAVORITE_COLOR = "#FFD700";

const CATEGORY_COLORS = new Map<string, string>([
  ["Development", "#2563EB"],
  ["Writing", "#8B5CF6"],
  ["Marketing", "#EC4899"],
  ["Analysis", "#10B981"],
  ["General", "#6B7280"],
]);

const FALLBACK_PALETTE = ["#F59E0B", "#3B82F6", "#EF4444", "#14B8A6", "#A855F7", "#84CC16", "#F97316", "#06B6D4"];

/**
 * Partitions node ids into connected components (union-find).
 * Components are listed in order of their first member; members keep node order.
 */
export function connectedComponents(nodeIds: readonly string[], edges: readonly SimilarityEdge[]): string[][] {
  const parent = new Map<string, string>();
  for (const id of nodeIds) parent.set(id, id);

  const find = (id: string): string => {
    let root = id;
    for (let next = parent.get(root); next !== undefined && next !== root; next = parent.get(root)) {
      root = next;
    }
    // path compression
    let current = id;
    while (current !== root) {
      const next = parent.get(current) ?? root;
      parent.set(current, root);
      current = next;
    }
    return root;
  };

  for (const edge of edges) {
    if (!parent.has(edge.source) || !parent.has(edge.target)) continue;
    const a = find(edge.source);
    const b = find(edge.target);
    if (a !== b) parent.set(b, a);
  }

  const groups = new Map<string, string[]>();
  for (const id of nodeIds) {
    const root = find(id);
    const group = groups.get(root);
    if (group) group.push(id);
    else groups.set(root, [id]);
  }
  return [...groups.values()];
}

export function nodeSize(prompt: Pick<Prompt, "isFavorite" | "useCount">, sizing: SizingConfig): number {
  const favorite = prompt.isFavorite ? sizing.favoriteBonus : 0;
  return sizing.baseSize + favorite + Math.min(prompt.useCount / 2, sizing.usageCap);
}

export function nodeColor(prompt: Pick<Prompt, "isFavorite" | "category">): string {
  if (prompt.isFavorite) return FAVORITE_COLOR;
  return CATEGORY_COLORS.get(prompt.category) ?? FALLBACK_PALETTE[stableHash(prompt.category) % FALLBACK_PALETTE.length];
}

function stableHash(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (hash * 31 + value.charCodeAt(i)) >>> 0;
  }
  return hash;
}

/**
 * Edge, cluster and degree statistics. An empty graph yields zeros, never NaN.
 */
export function summaryStatistics(
  nodes: readonly Pick<Prompt, "id" | "category">[],
  edges: readonly SimilarityEdge[],
  components: readonly (readonly string[])[]
): GalaxyStats {
  const totalWeight = edges.reduce((sum, e) => sum + e.weight, 0);

  const degree = new Map<string, number>();
  for (const edge of edges) {
    degree.set(edge.source, (degree.get(edge.source) ?? 0) + 1);
    degree.set(edge.target, (degree.get(edge.target) ?? 0) + 1);
  }

  const categoryDegree = new Map<string, number>();
  for (const node of nodes) {
    categoryDegree.set(node.category, (categoryDegree.get(node.category) ?? 0) + (degree.get(node.id) ?? 0));
  }

  let mostConnectedCategory: string | null = null;
  let best = -1;
  for (const [category, total] of categoryDegree) {
    if (
      total > best ||
      (total === best && mostConnectedCategory !== null && category < mostConnectedCategory)
    ) {
      mostConnectedCategory = category;
      best = total;
    }
  }

  return {
    totalPrompts: nodes.length,
    edgeCount: edges.length,
    componentCount: components.length,
    largestComponent: components.reduce((max, c) => Math.max(max, c.length), 0),
    averageSimilarity: edges.length > 0 ? totalWeight / edges.length : 0,
    mostConnectedCategory,
  };
}

export interface GalaxyOptions extends GraphFilter {
  config?: GalaxyOverrides;
  seed?: number;
  strategy?: LayoutStrategy;
}

/**
 * Builds the renderable galaxy for a prompt snapshot: filter, similarity
 * edges, clusters, 3D positions, node decoration and statistics.
 */
export function createGalaxy(prompts: readonly Prompt[], options: GalaxyOptions = {}): Galaxy {
  const config = resolveGalaxyConfig(options.config);

  const { nodes: members, edges } = buildGraph(prompts, {
    category: options.category,
    favoritesOnly: options.favoritesOnly,
    threshold: config.threshold,
    weights: config.weights,
    maxPrompts: config.maxPrompts,
  });

  const components = connectedComponents(
    members.map((p) => p.id),
    edges
  );
  const positions = computeLayout(members, edges, {
    seed: options.seed,
    strategy: options.strategy,
    layout: config.layout,
  });

  const nodes: GalaxyNode[] = members.map((prompt) => {
    const position = positions.get(prompt.id) ?? { x: 0, y: 0, z: 0 };
    return {
      id: prompt.id,
      label: prompt.title,
      category: prompt.category,
      tags: [...prompt.tags],
      isFavorite: prompt.isFavorite,
      useCount: prompt.useCount,
      x: position.x,
      y: position.y,
      z: position.z,
      size: nodeSize(prompt, config.sizing),
      color: nodeColor(prompt),
    };
  });

  return {
    nodes,
    edges,
    components,
    categories: [...new Set(members.map((p) => p.category))].sort(),
    stats: summaryStatistics(members, edges, components),
  };
}
