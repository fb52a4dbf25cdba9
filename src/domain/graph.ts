/**
 * Graph definition domain model.
 *
 * The serialisable description of a workflow graph: which registered nodes
 * it uses, the static successor of each node, and where a run begins.
 */

/** Static successor map. A null or absent entry marks a terminal node. */
export type EdgeMap = Record<string, string | null>;

/** Input for creating a graph. */
export interface CreateGraphInput {
  name: string;
  /** Ordered node names; each must be registered. */
  nodes: string[];
  edges: EdgeMap;
  startNode: string;
}

/** A complete graph definition, as stored and returned by the API. */
export interface GraphDefinition extends CreateGraphInput {
  id: string;
}
