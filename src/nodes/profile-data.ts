import { StateValue, WorkflowState, readDataSequence, toNumber } from '../domain/state';
import { NodeHandler } from '../engine/registry';

/** Summary statistics written under `profile`. */
export interface DataProfile {
  row_count: number;
  missing_count: number;
  numeric_count: number;
  non_numeric_count: number;
  min: number | null;
  max: number | null;
  mean: number | null;
}

/** Numeric values of a sequence in order, skipping missing and non-numeric entries. */
export function numericValues(data: readonly StateValue[]): number[] {
  const values: number[] = [];
  for (const value of data) {
    if (value === null) continue;
    const parsed = toNumber(value);
    if (parsed.ok) values.push(parsed.value);
  }
  return values;
}

export function profileSequence(data: readonly StateValue[]): DataProfile {
  const profile: DataProfile = {
    row_count: data.length,
    missing_count: 0,
    numeric_count: 0,
    non_numeric_count: 0,
    min: null,
    max: null,
    mean: null,
  };

  let sum = 0;
  for (const value of data) {
    if (value === null) {
      profile.missing_count += 1;
      continue;
    }
    const parsed = toNumber(value);
    if (!parsed.ok) {
      profile.non_numeric_count += 1;
      continue;
    }
    const num = parsed.value;
    profile.numeric_count += 1;
    sum += num;
    if (profile.min === null || num < profile.min) profile.min = num;
    if (profile.max === null || num > profile.max) profile.max = num;
  }

  if (profile.numeric_count > 0) {
    profile.mean = sum / profile.numeric_count;
  }

  return profile;
}

export const profileDataNode: NodeHandler = {
  name: 'profile_data',
  description: 'Counts missing and non-numeric values and computes min, max and mean of the numeric ones',
  execute(state: WorkflowState): WorkflowState {
    state.profile = { ...profileSequence(readDataSequence(state)) };
    return state;
  },
};
