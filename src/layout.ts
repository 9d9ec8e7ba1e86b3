import {
  forceLink,
  forceManyBody,
  forceSimulation,
  forceX,
  forceY,
  type SimulationLinkDatum,
  type SimulationNodeDatum,
} from "d3-force";
import { randomLcg } from "d3-random";
import type { Point3D, Prompt, SimilarityEdge } from "./types.js";
import { DEFAULT_GALAXY_CONFIG, layoutSchema, parseConfig, type LayoutConfig } from "./config.js";

export interface Point2D {
  x: number;
  y: number;
}

/**
 * Places graph nodes in the plane. Implementations must return the same
 * positions for the same input and seed.
 */
export interface LayoutStrategy {
  layout(ids: readonly string[], edges: readonly SimilarityEdge[], seed?: number): Map<string, Point2D>;
}

interface LayoutNode extends SimulationNodeDatum {
  id: string;
}

interface LayoutLink extends SimulationLinkDatum<LayoutNode> {
  weight: number;
}

export interface ForceLayoutOptions {
  iterations?: number;
  scale?: number;
  /** Rest length of a link with weight 0; weight 1 links rest at a third of this. */
  linkDistance?: number;
  charge?: number;
  gravity?: number;
}

/**
 * Spring embedding on d3-force: many-body repulsion, links pulling
 * similar prompts together (stronger for higher weights) and a weak pull
 * toward the origin so disconnected clusters stay in frame.
 * The result is centred and scaled into [-scale, scale].
 */
export class ForceLayout implements LayoutStrategy {
  private readonly iterations: number;
  private readonly scale: number;
  private readonly linkDistance: number;
  private readonly charge: number;
  private readonly gravity: number;

  constructor(options: ForceLayoutOptions = {}) {
    this.iterations = options.iterations ?? DEFAULT_GALAXY_CONFIG.layout.iterations;
    this.scale = options.scale ?? DEFAULT_GALAXY_CONFIG.layout.scale;
    this.linkDistance = options.linkDistance ?? 90;
    this.charge = options.charge ?? -120;
    this.gravity = options.gravity ?? 0.05;
  }

  layout(ids: readonly string[], edges: readonly SimilarityEdge[], seed?: number): Map<string, Point2D> {
    if (ids.length === 0) return new Map();

    const nodes: LayoutNode[] = ids.map((id) => ({ id }));
    const links: LayoutLink[] = edges.map((e) => ({ source: e.source, target: e.target, weight: e.weight }));

    const simulation = forceSimulation<LayoutNode, LayoutLink>(nodes)
      .force("charge", forceManyBody<LayoutNode>().strength(this.charge))
      .force(
        "link",
        forceLink<LayoutNode, LayoutLink>(links)
          .id((d) => d.id)
          .distance((l) => this.linkDistance * (1 - (2 / 3) * l.weight))
          .strength((l) => l.weight)
      )
      .force("x", forceX<LayoutNode>(0).strength(this.gravity))
      .force("y", forceY<LayoutNode>(0).strength(this.gravity))
      .stop();

    if (seed !== undefined) {
      simulation.randomSource(randomLcg(seed));
    }
    simulation.tick(this.iterations);

    return normalize(nodes, this.scale);
  }
}

/**
 * Centres positions on their mean and scales the largest coordinate to `scale`.
 */
function normalize(nodes: readonly LayoutNode[], scale: number): Map<string, Point2D> {
  const xs = nodes.map((n) => n.x ?? 0);
  const ys = nodes.map((n) => n.y ?? 0);
  const cx = xs.reduce((sum, x) => sum + x, 0) / nodes.length;
  const cy = ys.reduce((sum, y) => sum + y, 0) / nodes.length;

  let extent = 0;
  for (let i = 0; i < nodes.length; i++) {
    extent = Math.max(extent, Math.abs(xs[i] - cx), Math.abs(ys[i] - cy));
  }
  const factor = extent > 0 ? scale / extent : 0;

  const positions = new Map<string, Point2D>();
  nodes.forEach((node, i) => {
    positions.set(node.id, { x: (xs[i] - cx) * factor, y: (ys[i] - cy) * factor });
  });
  return positions;
}

export interface ComputeLayoutOptions {
  seed?: number;
  strategy?: LayoutStrategy;
  layout?: Partial<LayoutConfig>;
}

/**
 * 3D coordinates for each prompt: x and y from the layout strategy, z from
 * use count plus bounded jitter so ties do not overlap. With a seed the
 * whole result is reproducible. Throws ConfigError for an invalid layout.
 */
export function computeLayout(
  prompts: readonly Prompt[],
  edges: readonly SimilarityEdge[],
  options: ComputeLayoutOptions = {}
): Map<string, Point3D> {
  const config = parseConfig(layoutSchema, { ...DEFAULT_GALAXY_CONFIG.layout, ...options.layout });
  const strategy = options.strategy ?? new ForceLayout({ iterations: config.iterations, scale: config.scale });
  const random = options.seed !== undefined ? randomLcg(options.seed) : Math.random;

  const planar = strategy.layout(
    prompts.map((p) => p.id),
    edges,
    options.seed
  );

  const positions = new Map<string, Point3D>();
  for (const prompt of prompts) {
    const point = planar.get(prompt.id) ?? { x: 0, y: 0 };
    const jitter = (random() * 2 - 1) * config.zJitter;
    positions.set(prompt.id, { x: point.x, y: point.y, z: prompt.useCount * config.zStep + jitter });
  }
  return positions;
}
