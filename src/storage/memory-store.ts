/**
 * In-memory storage implementation.
 *
 * Nothing survives a process restart. Runs are deep-copied on the way in
 * and out so callers never alias the stored record; graphs are frozen at
 * construction and stored as-is.
 */

import { Run } from '../domain/run';
import { Graph } from '../engine/graph';
import { GraphStore, RunStore, Store } from './store';

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

class MemoryGraphStore implements GraphStore {
  private data = new Map<string, Graph>();

  async save(graph: Graph): Promise<Graph> {
    this.data.set(graph.id, graph);
    return graph;
  }

  async getById(id: string): Promise<Graph | null> {
    return this.data.get(id) ?? null;
  }

  async list(): Promise<Graph[]> {
    return [...this.data.values()];
  }
}

class MemoryRunStore implements RunStore {
  private data = new Map<string, Run>();

  async save(run: Run): Promise<Run> {
    this.data.set(run.id, deepCopy(run));
    return deepCopy(run);
  }

  async getById(id: string): Promise<Run | null> {
    const run = this.data.get(id);
    return run ? deepCopy(run) : null;
  }

  async listByGraph(graphId: string): Promise<Run[]> {
    return [...this.data.values()].filter((r) => r.graphId === graphId).map(deepCopy);
  }
}

/** Create an in-memory store. */
export function createMemoryStore(): Store {
  return {
    graphs: new MemoryGraphStore(),
    runs: new MemoryRunStore(),
  };
}
