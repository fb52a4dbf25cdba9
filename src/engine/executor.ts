/**
 * Graph executor.
 *
 * Walks a graph from its start node, invoking one node per step and
 * choosing the successor from the reserved control keys or the static
 * edge map. Runs are synchronous and bounded by a step ceiling.
 */

import {
  TypedError,
  createTypedError,
  nodeExecutionError,
  unregisteredNodeInvocationError,
} from '../domain/errors';
import { ExecutionLogEntry, Run, RunTermination } from '../domain/run';
import { NEXT_NODE_KEY, STOP_KEY, WorkflowState, cloneState, isTruthy } from '../domain/state';
import { Logger, logger as rootLogger } from '../logger';
import { Graph } from './graph';
import { NodeBehavior, NodeError } from './registry';

/** Executor configuration. */
export interface ExecutorConfig {
  /** Maximum node invocations per run. */
  maxSteps: number;
  logger: Logger;
}

export const DEFAULT_MAX_STEPS = 100;

const DEFAULT_CONFIG: ExecutorConfig = {
  maxSteps: DEFAULT_MAX_STEPS,
  logger: rootLogger.child({ module: 'executor' }),
};

/** Executor-specific error wrapper. Aborts the run it is thrown from. */
export class ExecutorError extends Error {
  constructor(public typedError: TypedError) {
    super(typedError.message);
    this.name = 'ExecutorError';
  }
}

/** The graph executor. */
export class GraphExecutor {
  private config: ExecutorConfig;

  constructor(
    private graph: Graph,
    config?: Partial<ExecutorConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (!Number.isInteger(this.config.maxSteps) || this.config.maxSteps < 1) {
      throw new ExecutorError(
        createTypedError({
          code: 'VALIDATION.MAX_STEPS',
          message: `maxSteps must be a positive integer, got ${this.config.maxSteps}`,
          retryable: false,
          details: { maxSteps: this.config.maxSteps },
        }),
      );
    }
  }

  /**
   * Execute the graph against an initial state.
   *
   * The caller's top-level object is copied first; nested values are owned
   * by the run from here on. Throws ExecutorError on an unregistered node
   * invocation or a failing node. Reaching the step ceiling is not an
   * error: the run ends with `termination: step_limit`.
   */
  run(initialState: WorkflowState, runId = ''): Run {
    const log = this.config.logger.child({ graphId: this.graph.id, runId });
    const startedAt = new Date().toISOString();
    const entries: ExecutionLogEntry[] = [];

    let state: WorkflowState = { ...initialState };
    let currentNode: string | null = this.graph.startNode;
    let termination = RunTermination.Completed;
    let step = 0;

    while (currentNode !== null && step < this.config.maxSteps) {
      step += 1;
      const behavior = this.graph.getNode(currentNode);
      if (!behavior) {
        throw new ExecutorError({ ...unregisteredNodeInvocationError(currentNode, step), runId: runId || undefined });
      }

      const result = this.invoke(log, currentNode, behavior, state, step, runId);
      if (result) {
        state = result;
      }

      entries.push({ step, node: currentNode, stateSnapshot: cloneState(state) });
      log.debug('Step completed', { step, node: currentNode });

      if (isTruthy(state[STOP_KEY])) {
        termination = RunTermination.Stopped;
        break;
      }

      const override = state[NEXT_NODE_KEY];
      delete state[NEXT_NODE_KEY];
      currentNode = typeof override === 'string' && override.length > 0
        ? override
        : this.graph.nextOf(currentNode);
    }

    if (termination !== RunTermination.Stopped && currentNode !== null) {
      termination = RunTermination.StepLimit;
      log.warn('Run truncated at step ceiling', { maxSteps: this.config.maxSteps, pendingNode: currentNode });
    }

    log.info('Run finished', { steps: step, termination, currentNode });

    return {
      id: runId,
      graphId: this.graph.id,
      currentNode,
      state,
      log: entries,
      termination,
      steps: step,
      startedAt,
      completedAt: new Date().toISOString(),
    };
  }

  private invoke(
    log: Logger,
    node: string,
    behavior: NodeBehavior,
    state: WorkflowState,
    step: number,
    runId: string,
  ): WorkflowState | undefined {
    let result: WorkflowState | void;
    try {
      result = behavior(state);
    } catch (err) {
      const typedError = err instanceof NodeError
        ? { ...err.typedError, details: { ...err.typedError.details, step } }
        : nodeExecutionError(node, step, err);
      log.error('Node failed', { node, step, code: typedError.code });
      throw new ExecutorError({ ...typedError, runId: runId || undefined });
    }
    // A null return from an untyped handler also means "no change".
    return typeof result === 'object' && result !== null ? result : undefined;
  }
}
