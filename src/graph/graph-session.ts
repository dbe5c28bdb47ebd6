/**
 * GraphSession - the record table plus the graph built for the current
 * threshold.
 *
 * The graph is rebuilt whenever a different threshold is asked for, and
 * dropped whenever the table is replaced. Both swap whole objects, so a
 * graph already handed to a caller is never changed underneath it.
 */

import { buildGraph, type InteractionGraph } from './interaction-graph';
import { createLogger } from '../shared/logger';
import type { CoAppearanceRecord } from '../shared/types';

const log = createLogger('GraphSession');

interface CachedGraph {
  minWeight: number;
  graph: InteractionGraph;
}

export class GraphSession {
  private records: readonly CoAppearanceRecord[];
  private cached: CachedGraph | null = null;

  constructor(records: readonly CoAppearanceRecord[] = []) {
    this.records = Object.freeze([...records]);
  }

  get recordCount(): number {
    return this.records.length;
  }

  replaceRecords(records: readonly CoAppearanceRecord[]): void {
    this.records = Object.freeze([...records]);
    this.cached = null;
    log.info(`Record table replaced (${records.length} records)`);
  }

  graphFor(minWeight: number): InteractionGraph {
    if (this.cached && this.cached.minWeight === minWeight) {
      return this.cached.graph;
    }

    const graph = buildGraph(this.records, minWeight);
    this.cached = { minWeight, graph };
    log.debug(`Built graph for minWeight=${minWeight}: ${graph.nodeCount} nodes, ${graph.edgeCount} edges`);
    return graph;
  }

  /** Character names at this threshold, sorted for selection lists */
  characters(minWeight: number): string[] {
    return this.graphFor(minWeight)
      .nodes()
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  }
}
