import { NEXT_NODE_KEY, STOP_KEY, WorkflowState } from '../domain/state';
import { NodeHandler } from '../engine/registry';

export const DEFAULT_ANOMALY_THRESHOLD = 1;

/** Node the pipeline loops back to while anomalies remain. */
export const LOOP_TARGET = 'profile_data';

export const checkStopConditionNode: NodeHandler = {
  name: 'check_stop_condition',
  description: 'Stops when anomaly_count <= threshold, otherwise loops back to profile_data',
  execute(state: WorkflowState): WorkflowState {
    const { threshold, anomaly_count: anomalyCount } = state;
    const limit = typeof threshold === 'number' ? threshold : DEFAULT_ANOMALY_THRESHOLD;
    const count = typeof anomalyCount === 'number' ? anomalyCount : 0;

    if (count <= limit) {
      state[STOP_KEY] = true;
    } else {
      state[NEXT_NODE_KEY] = LOOP_TARGET;
    }
    return state;
  },
};
