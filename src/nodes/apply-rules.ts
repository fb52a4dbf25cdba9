import { StateValue, WorkflowState, isStateRecord, readDataSequence, readNullableNumber, toNumber } from '../domain/state';
import { NodeHandler } from '../engine/registry';

interface Bounds {
  mean: number | null;
  min: number | null;
  max: number | null;
}

/** Fill missing/non-numeric entries with the mean and clamp the rest. */
export function cleanSequence(data: readonly StateValue[], bounds: Bounds): Array<number | null> {
  return data.map((value) => {
    const parsed = value === null ? undefined : toNumber(value);
    if (!parsed || !parsed.ok) return bounds.mean;

    let num = parsed.value;
    if (bounds.min !== null && num < bounds.min) num = bounds.min;
    if (bounds.max !== null && num > bounds.max) num = bounds.max;
    return num;
  });
}

export const applyRulesNode: NodeHandler = {
  name: 'apply_rules',
  description: 'Replaces missing and non-numeric values with the mean and caps values to [min, max]',
  execute(state: WorkflowState): WorkflowState {
    const raw = state.rules;
    const rules: { [key: string]: StateValue } = isStateRecord(raw) ? raw : {};
    state.data = cleanSequence(readDataSequence(state), {
      mean: readNullableNumber(rules, 'mean'),
      min: readNullableNumber(rules, 'min'),
      max: readNullableNumber(rules, 'max'),
    });
    return state;
  },
};
