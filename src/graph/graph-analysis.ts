/**
 * Graph Analysis - read-only queries over an InteractionGraph
 *
 * All orderings are deterministic. Ties fall back to ordinal name order:
 * - topConnected: degree desc, then name asc
 * - topPairs: weight desc, then first endpoint asc, then second endpoint asc
 * - characterStats.topCoCharacter: weight desc, then name asc
 */

import { familyOf } from './family';
import type { InteractionGraph } from './interaction-graph';
import type {
  CharacterStats,
  CoCharacter,
  DegreeEntry,
  PairEntry,
  PathResult,
  QueryResult,
} from '../shared/types';

function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Characters with the most distinct connections.
 * Degree counts edges, not the weights on them.
 */
export function topConnected(graph: InteractionGraph, n: number): DegreeEntry[] {
  if (n <= 0) return [];

  return graph
    .nodes()
    .map((character) => ({ character, degree: graph.degree(character) }))
    .sort((a, b) => b.degree - a.degree || compareNames(a.character, b.character))
    .slice(0, n);
}

/**
 * Pairs that shared the most scenes. Each pair is reported once, oriented
 * the way the record that created the edge named it.
 */
export function topPairs(graph: InteractionGraph, n: number): PairEntry[] {
  if (n <= 0) return [];

  return [...graph.edges()]
    .sort(
      (a, b) =>
        b.weight - a.weight ||
        compareNames(a.source, b.source) ||
        compareNames(a.target, b.target)
    )
    .slice(0, n)
    .map((edge): PairEntry => ({ pair: [edge.source, edge.target], weight: edge.weight }));
}

/**
 * Breadth-first path between two characters. Weights are ignored; the
 * returned path has the fewest possible hops.
 */
export function findPath(graph: InteractionGraph, source: string, target: string): PathResult {
  if (!graph.hasNode(source)) return { kind: 'not-found', character: source };
  if (!graph.hasNode(target)) return { kind: 'not-found', character: target };
  if (source === target) return { kind: 'found', path: [source] };

  const previous = new Map<string, string | null>([[source, null]]);
  const queue: string[] = [source];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];

    for (const neighbor of graph.neighbors(current).keys()) {
      if (previous.has(neighbor)) continue;
      previous.set(neighbor, current);

      if (neighbor === target) {
        return { kind: 'found', path: tracePath(previous, target) };
      }
      queue.push(neighbor);
    }
  }

  return { kind: 'no-path', source, target };
}

function tracePath(previous: Map<string, string | null>, target: string): string[] {
  const path: string[] = [];
  let step: string | null | undefined = target;
  while (step != null) {
    path.push(step);
    step = previous.get(step);
  }
  return path.reverse();
}

/**
 * Shortest path as a plain node list, or null when there is none
 * (disconnected, or either name missing from the graph).
 */
export function shortestPath(graph: InteractionGraph, source: string, target: string): string[] | null {
  const result = findPath(graph, source, target);
  return result.kind === 'found' ? result.path : null;
}

/**
 * Aggregate stats for one character. Fails with not-found when the
 * character has no edges at the current threshold.
 */
export function characterStats(graph: InteractionGraph, character: string): QueryResult<CharacterStats> {
  const neighbors = graph.neighbors(character);
  if (neighbors.size === 0) {
    return { ok: false, error: { kind: 'not-found', character } };
  }

  let totalScenes = 0;
  let top: CoCharacter | null = null;
  for (const [name, weight] of neighbors) {
    totalScenes += weight;
    if (!top || weight > top.weight || (weight === top.weight && compareNames(name, top.name) < 0)) {
      top = { name, weight };
    }
  }

  if (!top) {
    return { ok: false, error: { kind: 'not-found', character } };
  }

  return {
    ok: true,
    value: {
      totalScenes,
      topCoCharacter: top,
      uniqueCoAppearances: neighbors.size,
      family: familyOf(character),
    },
  };
}
