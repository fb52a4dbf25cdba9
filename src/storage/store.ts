/**
 * Storage layer interfaces.
 *
 * Graphs and runs are keyed by their ids with put/get semantics; a second
 * save under the same id replaces the first (last write wins).
 */

import { Run } from '../domain/run';
import { Graph } from '../engine/graph';

/** Store interface for graphs. Graphs are immutable and may be held by reference. */
export interface GraphStore {
  save(graph: Graph): Promise<Graph>;
  getById(id: string): Promise<Graph | null>;
  list(): Promise<Graph[]>;
}

/** Store interface for runs. */
export interface RunStore {
  save(run: Run): Promise<Run>;
  getById(id: string): Promise<Run | null>;
  listByGraph(graphId: string): Promise<Run[]>;
}

/** Composite store interface. */
export interface Store {
  graphs: GraphStore;
  runs: RunStore;
}
