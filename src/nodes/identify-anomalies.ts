import { WorkflowState, isStateRecord, readDataSequence, readNullableNumber, toNumber } from '../domain/state';
import { NodeHandler } from '../engine/registry';
import { numericValues } from './profile-data';

export type AnomalyReason = 'missing_value' | 'non_numeric' | 'outlier';

/** An anomaly as stored in state: `[index, reason]`. */
export type Anomaly = [number, AnomalyReason];

/** Population standard deviation around a given mean; 0 for fewer than two values. */
export function populationStd(values: readonly number[], mean: number | null): number {
  if (values.length < 2 || mean === null) return 0;
  const variance = values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length;
  return Math.sqrt(variance);
}

export const identifyAnomaliesNode: NodeHandler = {
  name: 'identify_anomalies',
  description: 'Flags missing values, non-numeric values and outliers beyond mean ± 2·std',
  execute(state: WorkflowState): WorkflowState {
    const data = readDataSequence(state);
    const profile = state.profile;
    const mean = isStateRecord(profile) ? readNullableNumber(profile, 'mean') : null;
    const std = populationStd(numericValues(data), mean);

    const anomalies: Anomaly[] = [];
    data.forEach((value, index) => {
      if (value === null) {
        anomalies.push([index, 'missing_value']);
        return;
      }
      const parsed = toNumber(value);
      if (!parsed.ok) {
        anomalies.push([index, 'non_numeric']);
      } else if (std > 0 && mean !== null && Math.abs(parsed.value - mean) > 2 * std) {
        anomalies.push([index, 'outlier']);
      }
    });

    state.anomalies = anomalies;
    state.anomaly_count = anomalies.length;
    return state;
  },
};
