/**
 * Data-quality node library.
 *
 * profile_data → identify_anomalies → generate_rules → apply_rules →
 * check_stop_condition, which loops back to profile_data until the
 * anomaly count falls to the threshold.
 */

import { NodeHandler, NodeRegistry, createNodeRegistry } from '../engine/registry';
import { applyRulesNode } from './apply-rules';
import { checkStopConditionNode } from './check-stop-condition';
import { generateRulesNode } from './generate-rules';
import { identifyAnomaliesNode } from './identify-anomalies';
import { profileDataNode } from './profile-data';

export const dataQualityNodes: readonly NodeHandler[] = [
  profileDataNode,
  identifyAnomaliesNode,
  generateRulesNode,
  applyRulesNode,
  checkStopConditionNode,
];

/** Registry holding every built-in node. */
export function createDefaultRegistry(): NodeRegistry {
  return createNodeRegistry(dataQualityNodes);
}

export * from './profile-data';
export * from './identify-anomalies';
export * from './generate-rules';
export * from './apply-rules';
export * from './check-stop-condition';
