/**
 * An immutable, validated workflow definition.
 *
 * Node names are resolved against the registry once, at construction.
 * Edge targets are not checked: a dangling target only surfaces when the
 * executor reaches it.
 */

import { TypedError, invalidStartNodeError, unknownNodeError } from '../domain/errors';
import { EdgeMap, GraphDefinition } from '../domain/graph';
import { NodeBehavior, NodeRegistry } from './registry';

/** Graph construction error wrapper. */
export class GraphError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'GraphError';
  }
}

export class Graph {
  readonly id: string;
  readonly name: string;
  readonly nodeNames: readonly string[];
  readonly edges: Readonly<EdgeMap>;
  readonly startNode: string;
  private readonly nodes: ReadonlyMap<string, NodeBehavior>;

  private constructor(
    definition: GraphDefinition,
    nodes: Map<string, NodeBehavior>,
  ) {
    this.id = definition.id;
    this.name = definition.name;
    this.nodeNames = Object.freeze([...definition.nodes]);
    this.edges = Object.freeze({ ...definition.edges });
    this.startNode = definition.startNode;
    this.nodes = nodes;
    Object.freeze(this);
  }

  /**
   * Build a graph from its definition.
   *
   * Throws GraphError with GRAPH.UNKNOWN_NODE for the first listed node the
   * registry does not know, or GRAPH.INVALID_START_NODE when the start node
   * is not among the listed nodes.
   */
  static fromDefinition(registry: NodeRegistry, definition: GraphDefinition): Graph {
    const nodes = new Map<string, NodeBehavior>();
    for (const name of definition.nodes) {
      if (!registry.has(name)) {
        throw new GraphError(unknownNodeError(name));
      }
      nodes.set(name, registry.resolve(name));
    }

    if (!nodes.has(definition.startNode)) {
      throw new GraphError(invalidStartNodeError(definition.startNode, definition.nodes));
    }

    return new Graph(definition, nodes);
  }

  /** Behavior of a declared node, or undefined for names outside the graph. */
  getNode(name: string): NodeBehavior | undefined {
    return this.nodes.get(name);
  }

  hasNode(name: string): boolean {
    return this.nodes.has(name);
  }

  /** Static successor of a node; null when the node is terminal. */
  nextOf(name: string): string | null {
    return Object.prototype.hasOwnProperty.call(this.edges, name) ? this.edges[name] ?? null : null;
  }

  toDefinition(): GraphDefinition {
    return {
      id: this.id,
      name: this.name,
      nodes: [...this.nodeNames],
      edges: { ...this.edges },
      startNode: this.startNode,
    };
  }
}
