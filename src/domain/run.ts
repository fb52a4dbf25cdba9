/**
 * Run domain model.
 *
 * A single bounded execution of a graph: the node it ended on, the final
 * state, and the ordered execution log.
 */

import { WorkflowState } from './state';

/** Why a run stopped. */
export enum RunTermination {
  /** A node set the stop flag. */
  Stopped = 'stopped',
  /** The next node resolved to none. */
  Completed = 'completed',
  /** The step ceiling was reached with a node still pending. */
  StepLimit = 'step_limit',
}

/** One executed step. Entries are never mutated after being appended. */
export interface ExecutionLogEntry {
  /** 1-based step number. */
  step: number;
  node: string;
  /** Deep copy of the state right after the node ran. */
  stateSnapshot: WorkflowState;
}

/** The record of one executor run. */
export interface Run {
  id: string;
  graphId: string;
  /** Last assigned current node; null when the graph reached a terminal node. */
  currentNode: string | null;
  state: WorkflowState;
  log: ExecutionLogEntry[];
  termination: RunTermination;
  /** Number of node invocations. */
  steps: number;
  startedAt: string;
  completedAt: string;
}
