import { VertexKind, PlaytimeStats } from '../../types/models';
import { validateInteractionRecord } from '../../models/validation';
import { SentimentAnalyzer } from '../sentiment/SentimentAnalyzer';
import { computeEdgeWeight } from './WeightModel';

/**
 * A user or a game in the interaction graph
 */
export class Vertex {
  readonly neighbours: Map<Vertex, number> = new Map();

  constructor(readonly id: string, readonly kind: VertexKind) {}

  setNeighbour(neighbour: Vertex, weight: number): void {
    this.neighbours.set(neighbour, weight);
  }
}

export interface GraphBuildResult {
  graph: InteractionGraph;
  processed: number;
  skipped: number;
}

/**
 * Weighted bipartite graph between users and games.
 * Built once from the record stream and read-only afterwards.
 */
export class InteractionGraph {
  private vertices: Map<string, Vertex> = new Map();
  private edges = 0;

  /**
   * Add a vertex; the first kind assigned to an id wins
   */
  addVertex(id: string, kind: VertexKind): void {
    if (!this.vertices.has(id)) {
      this.vertices.set(id, new Vertex(id, kind));
    }
  }

  /**
   * Set the weight of a user-game edge in both directions.
   * No-op when either endpoint is unknown or both have the same kind.
   */
  addEdge(id1: string, id2: string, weight: number): void {
    const v1 = this.vertices.get(id1);
    const v2 = this.vertices.get(id2);
    if (!v1 || !v2 || v1.kind === v2.kind) {
      return;
    }
    if (!v1.neighbours.has(v2)) {
      this.edges++;
    }
    v1.setNeighbour(v2, weight);
    v2.setNeighbour(v1, weight);
  }

  getVertex(id: string): Vertex | undefined {
    return this.vertices.get(id);
  }

  hasVertex(id: string): boolean {
    return this.vertices.has(id);
  }

  getWeight(id1: string, id2: string): number | undefined {
    const v1 = this.vertices.get(id1);
    const v2 = this.vertices.get(id2);
    if (!v1 || !v2) return undefined;
    return v1.neighbours.get(v2);
  }

  neighborsOfKind(id: string, kind: VertexKind): Vertex[] {
    const vertex = this.vertices.get(id);
    if (!vertex) return [];
    const matches: Vertex[] = [];
    for (const neighbour of vertex.neighbours.keys()) {
      if (neighbour.kind === kind) {
        matches.push(neighbour);
      }
    }
    return matches;
  }

  vertexCount(kind?: VertexKind): number {
    if (!kind) return this.vertices.size;
    let count = 0;
    for (const vertex of this.vertices.values()) {
      if (vertex.kind === kind) count++;
    }
    return count;
  }

  edgeCount(): number {
    return this.edges;
  }

  *allVertices(): IterableIterator<Vertex> {
    yield* this.vertices.values();
  }
}

/**
 * Build the graph in a single pass over the record stream.
 * Malformed records are reported and skipped; the rest of the build continues.
 */
export function buildInteractionGraph(
  records: Iterable<unknown>,
  stats: Map<string, PlaytimeStats>,
  sentiment?: SentimentAnalyzer
): GraphBuildResult {
  const graph = new InteractionGraph();
  let processed = 0;
  let skipped = 0;
  let index = 0;

  for (const raw of records) {
    index++;
    const { value, error } = validateInteractionRecord(raw);
    if (!value) {
      skipped++;
      console.warn(`⚠️ Skipping record ${index}: ${error?.message ?? 'invalid record'}`);
      continue;
    }

    const { mean, std } = stats.get(value.itemName) ?? { mean: 0, std: 0 };
    const weight = computeEdgeWeight(
      { playtime: value.playtime, mean, std, recommend: value.recommend, review: value.review },
      sentiment
    );

    graph.addVertex(value.userId, 'user');
    graph.addVertex(value.itemName, 'item');
    graph.addEdge(value.userId, value.itemName, weight);
    processed++;
  }

  return { graph, processed, skipped };
}
