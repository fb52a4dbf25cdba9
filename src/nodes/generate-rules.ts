import { missingPreconditionError } from '../domain/errors';
import { WorkflowState, isStateRecord, readNullableNumber } from '../domain/state';
import { NodeError, NodeHandler } from '../engine/registry';

/** Cleaning rules written under `rules`. */
export interface CleaningRules {
  missing_value_rule: 'replace_with_mean';
  non_numeric_rule: 'replace_with_mean';
  outlier_rule: 'cap_with_minmax';
  mean: number | null;
  min: number | null;
  max: number | null;
}

export const generateRulesNode: NodeHandler = {
  name: 'generate_rules',
  description: 'Derives cleaning rules from the current profile',
  execute(state: WorkflowState): WorkflowState {
    const profile = state.profile;
    if (!isStateRecord(profile)) {
      throw new NodeError(missingPreconditionError('generate_rules', 'profile'));
    }

    const rules: CleaningRules = {
      missing_value_rule: 'replace_with_mean',
      non_numeric_rule: 'replace_with_mean',
      outlier_rule: 'cap_with_minmax',
      mean: readNullableNumber(profile, 'mean'),
      min: readNullableNumber(profile, 'min'),
      max: readNullableNumber(profile, 'max'),
    };
    state.rules = { ...rules };
    return state;
  },
};
