/**
 * InteractionGraph - weighted undirected graph of character co-appearances
 *
 * Nodes are character names, an edge carries the number of scenes the two
 * characters shared. Only endpoints of surviving edges become nodes, so the
 * graph never holds an isolated character.
 *
 * A graph is immutable once built. Changing the threshold means building a
 * new graph, never editing an existing one.
 */

import { createLogger } from '../shared/logger';
import type { CoAppearanceRecord, GraphEdge } from '../shared/types';

const log = createLogger('Graph');

export class InteractionGraph {
  private readonly adjacency: ReadonlyMap<string, ReadonlyMap<string, number>>;
  private readonly edgeList: readonly GraphEdge[];

  private constructor(
    adjacency: Map<string, Map<string, number>>,
    edgeList: GraphEdge[]
  ) {
    this.adjacency = adjacency;
    this.edgeList = Object.freeze(edgeList.map((edge) => Object.freeze({ ...edge })));
  }

  /**
   * Build a graph keeping every record whose weight reaches `minWeight`.
   * A later record for the same unordered pair overwrites the earlier weight.
   */
  static fromRecords(records: Iterable<CoAppearanceRecord>, minWeight: number): InteractionGraph {
    const adjacency = new Map<string, Map<string, number>>();
    // lower name -> higher name -> edge
    const edgeIndex = new Map<string, Map<string, GraphEdge>>();
    const edges: GraphEdge[] = [];
    let skippedSelfPairs = 0;

    const link = (from: string, to: string, weight: number) => {
      let neighbors = adjacency.get(from);
      if (!neighbors) {
        neighbors = new Map();
        adjacency.set(from, neighbors);
      }
      neighbors.set(to, weight);
    };

    for (const record of records) {
      if (record.scenesTogether < minWeight) continue;

      const { character1, character2, scenesTogether } = record;
      if (character1 === character2) {
        skippedSelfPairs++;
        continue;
      }

      const [low, high] = character1 < character2 ? [character1, character2] : [character2, character1];
      let byHigh = edgeIndex.get(low);
      if (!byHigh) {
        byHigh = new Map();
        edgeIndex.set(low, byHigh);
      }
      const existing = byHigh.get(high);
      if (existing) {
        existing.weight = scenesTogether;
      } else {
        const edge = { source: character1, target: character2, weight: scenesTogether };
        byHigh.set(high, edge);
        edges.push(edge);
      }

      link(character1, character2, scenesTogether);
      link(character2, character1, scenesTogether);
    }

    if (skippedSelfPairs > 0) {
      log.debug(`Skipped ${skippedSelfPairs} record(s) pairing a character with itself`);
    }

    return new InteractionGraph(adjacency, edges);
  }

  get nodeCount(): number {
    return this.adjacency.size;
  }

  get edgeCount(): number {
    return this.edgeList.length;
  }

  /** Node names in discovery order */
  nodes(): string[] {
    return Array.from(this.adjacency.keys());
  }

  /** Edges in creation order, each pair once */
  edges(): readonly GraphEdge[] {
    return this.edgeList;
  }

  hasNode(character: string): boolean {
    return this.adjacency.has(character);
  }

  /** Neighbor name -> edge weight. Empty for unknown characters. */
  neighbors(character: string): ReadonlyMap<string, number> {
    return this.adjacency.get(character) ?? new Map<string, number>();
  }

  degree(character: string): number {
    return this.adjacency.get(character)?.size ?? 0;
  }

  weight(a: string, b: string): number | undefined {
    return this.adjacency.get(a)?.get(b);
  }
}

export function buildGraph(records: Iterable<CoAppearanceRecord>, minWeight: number): InteractionGraph {
  return InteractionGraph.fromRecords(records, minWeight);
}
