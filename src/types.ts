/**
 * Input widget a variable is filled through.
 */
export type VariableType = "text" | "textarea" | "select" | "number";

/**
 * A `{{name}}` placeholder definition attached to a prompt.
 * `options` only matters for `select` variables.
 */
export interface Variable {
  name: string;
  type: VariableType;
  defaultValue: string;
  options: string[];
}

/**
 * A stored prompt. The core reads these fields and never mutates them.
 */
export interface Prompt {
  id: string;
  title: string;
  content: string;
  category: string;
  tags: string[];
  variables: Variable[];
  isFavorite: boolean;
  useCount: number;
  createdAt: string;
  updatedAt: string;
}

/**
 * Input for creating a prompt (id, counters and timestamps are generated).
 * When `variables` is omitted they are detected from the content.
 */
export interface PromptInput {
  title: string;
  content: string;
  category: string;
  tags?: string[];
  variables?: Variable[];
  isFavorite?: boolean;
}

export type PromptChanges = Partial<Omit<Prompt, "id" | "createdAt" | "updatedAt">>;

export interface PromptQuery {
  query?: string;
  category?: string;
  tags?: string[];
  favoritesOnly?: boolean;
}

export interface FacetCounts {
  categories: Record<string, number>;
  tags: Record<string, number>;
}

export interface LibraryStats {
  totalPrompts: number;
  totalFavorites: number;
  totalTags: number;
  totalUses: number;
}

/**
 * Read side of the storage backend, as used by the galaxy and tool handlers.
 */
export interface PromptStore {
  getAllPrompts(): Prompt[];
  getPrompt(id: string): Prompt | undefined;
  searchPrompts(query: PromptQuery): Prompt[];
  getCategories(): string[];
  getTags(): string[];
}

/**
 * Write side of the storage backend.
 */
export interface PromptWriter {
  createPrompt(input: PromptInput): Prompt;
  incrementUseCount(id: string): void;
}

/**
 * Undirected similarity link between two prompts. `source` precedes `target`
 * in the filtered prompt order.
 */
export interface SimilarityEdge {
  source: string;
  target: string;
  weight: number;
}

export interface Point3D {
  x: number;
  y: number;
  z: number;
}

export interface GalaxyNode extends Point3D {
  id: string;
  label: string;
  category: string;
  tags: string[];
  isFavorite: boolean;
  useCount: number;
  size: number;
  color: string;
}

export interface GalaxyStats {
  totalPrompts: number;
  edgeCount: number;
  componentCount: number;
  largestComponent: number;
  averageSimilarity: number;
  mostConnectedCategory: string | null;
}

export interface Galaxy {
  nodes: GalaxyNode[];
  edges: SimilarityEdge[];
  components: string[][];
  categories: string[];
  stats: GalaxyStats;
}
