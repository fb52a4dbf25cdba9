/**
 * Workflow service: the engine's interface to its callers.
 *
 * Binds graph construction and execution to an id generator and a store.
 * The HTTP layer talks only to this class.
 */

import { v4 as uuid } from 'uuid';
import { TypedError, notFoundError } from '../domain/errors';
import { CreateGraphInput } from '../domain/graph';
import { Run } from '../domain/run';
import { WorkflowState } from '../domain/state';
import { Logger, logger as rootLogger } from '../logger';
import { Store } from '../storage/store';
import { ExecutorConfig, GraphExecutor } from './executor';
import { Graph } from './graph';
import { NodeInfo, NodeRegistry } from './registry';

/** Produces a fresh opaque id for the given kind of record. */
export type IdGenerator = (kind: 'graph' | 'run') => string;

export const defaultIdGenerator: IdGenerator = (kind) => `${kind}_${uuid()}`;

export interface WorkflowServiceOptions {
  registry: NodeRegistry;
  store: Store;
  generateId?: IdGenerator;
  executor?: Partial<ExecutorConfig>;
  logger?: Logger;
}

/** Service-level error wrapper (lookups). */
export class ServiceError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ServiceError';
  }
}

export class WorkflowService {
  private registry: NodeRegistry;
  private store: Store;
  private generateId: IdGenerator;
  private executorConfig: Partial<ExecutorConfig>;
  private logger: Logger;

  constructor(options: WorkflowServiceOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.generateId = options.generateId ?? defaultIdGenerator;
    this.logger = options.logger ?? rootLogger.child({ module: 'workflow-service' });
    this.executorConfig = { logger: this.logger, ...options.executor };
  }

  /** Validate and persist a graph. Throws GraphError on an invalid definition. */
  async createGraph(input: CreateGraphInput): Promise<Graph> {
    const graph = Graph.fromDefinition(this.registry, {
      id: this.generateId('graph'),
      ...input,
    });
    await this.store.graphs.save(graph);
    this.logger.info('Graph created', { graphId: graph.id, name: graph.name, nodes: graph.nodeNames.length });
    return graph;
  }

  async getGraph(graphId: string): Promise<Graph | null> {
    return this.store.graphs.getById(graphId);
  }

  /**
   * Execute a stored graph and persist the run.
   * Throws ServiceError (VALIDATION.NOT_FOUND) for an unknown graph id and
   * ExecutorError when the run aborts.
   */
  async runGraph(graphId: string, initialState: WorkflowState): Promise<Run> {
    const graph = await this.store.graphs.getById(graphId);
    if (!graph) {
      throw new ServiceError(notFoundError('Graph', graphId));
    }
    const run = this.execute(graph, initialState);
    return this.store.runs.save(run);
  }

  /** Execute a graph value directly, assigning a fresh run id. Nothing is persisted. */
  execute(graph: Graph, initialState: WorkflowState): Run {
    const executor = new GraphExecutor(graph, this.executorConfig);
    return executor.run(initialState, this.generateId('run'));
  }

  async getRun(runId: string): Promise<Run | null> {
    return this.store.runs.getById(runId);
  }

  listNodes(): NodeInfo[] {
    return this.registry.list();
  }
}
