/**
 * Node registry. Maps node names to their behaviors.
 *
 * Handlers are registered once at process start through a builder; the
 * built registry is frozen and passed explicitly into graph construction,
 * so nothing is resolved against ambient global state during a run.
 */

import { TypedError, nodeNotFoundError } from '../domain/errors';
import { WorkflowState } from '../domain/state';

/**
 * A node's behavior. Returning nothing means "no state change"; the
 * executor keeps the state object it passed in.
 */
export type NodeBehavior = (state: WorkflowState) => WorkflowState | void;

/** Pluggable node implementation. */
export interface NodeHandler {
  /** Symbolic name graphs refer to. */
  name: string;
  description?: string;
  execute(state: WorkflowState): WorkflowState | void;
}

/** Public listing entry for a registered node. */
export interface NodeInfo {
  name: string;
  description: string;
}

/** Read-only name → behavior lookup. */
export interface NodeRegistry {
  /** Resolve a behavior, throwing RegistryError (NODE.NOT_FOUND) if unknown. */
  resolve(name: string): NodeBehavior;
  has(name: string): boolean;
  /** Registered nodes in registration order. */
  list(): NodeInfo[];
}

/** Registry-specific error wrapper. */
export class RegistryError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'RegistryError';
  }
}

/**
 * Error that node handlers throw to abort the run with a typed cause
 * (e.g., NODE.MISSING_PRECONDITION). The executor re-throws it as an
 * ExecutorError annotated with the step number.
 */
export class NodeError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'NodeError';
  }
}

/** Collects handlers before the registry is frozen. */
export class NodeRegistryBuilder {
  private handlers = new Map<string, NodeHandler>();

  /** Register a handler. A later registration under the same name wins. */
  register(handler: NodeHandler): this {
    this.handlers.set(handler.name, handler);
    return this;
  }

  registerAll(handlers: Iterable<NodeHandler>): this {
    for (const handler of handlers) {
      this.register(handler);
    }
    return this;
  }

  build(): NodeRegistry {
    return new FrozenNodeRegistry(this.handlers);
  }
}

class FrozenNodeRegistry implements NodeRegistry {
  private readonly behaviors: ReadonlyMap<string, NodeBehavior>;
  private readonly infos: readonly NodeInfo[];

  constructor(handlers: ReadonlyMap<string, NodeHandler>) {
    const behaviors = new Map<string, NodeBehavior>();
    const infos: NodeInfo[] = [];
    for (const [name, handler] of handlers) {
      behaviors.set(name, (state) => handler.execute(state));
      infos.push(Object.freeze({ name, description: handler.description ?? '' }));
    }
    this.behaviors = behaviors;
    this.infos = Object.freeze(infos);
    Object.freeze(this);
  }

  resolve(name: string): NodeBehavior {
    const behavior = this.behaviors.get(name);
    if (!behavior) {
      throw new RegistryError(nodeNotFoundError(name));
    }
    return behavior;
  }

  has(name: string): boolean {
    return this.behaviors.has(name);
  }

  list(): NodeInfo[] {
    return this.infos.map((info) => ({ ...info }));
  }
}

/** Build a registry from a fixed list of handlers. */
export function createNodeRegistry(handlers: Iterable<NodeHandler>): NodeRegistry {
  return new NodeRegistryBuilder().registerAll(handlers).build();
}
