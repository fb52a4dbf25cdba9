/**
 * Workflow state model.
 *
 * State is a string-keyed mapping of JSON-compatible values handed from
 * node to node. Two keys are reserved for the executor and never read by
 * node business logic outside the control node that sets them.
 */

/** Any value a state entry may hold. */
export type StateValue =
  | null
  | boolean
  | number
  | string
  | StateValue[]
  | { [key: string]: StateValue };

/** The mapping passed between nodes. */
export interface WorkflowState {
  [key: string]: StateValue;
}

/** When truthy, the executor halts after logging the current step. */
export const STOP_KEY = 'stop';

/** When a non-empty string, overrides the static edge for the next step. */
export const NEXT_NODE_KEY = 'next_node';

/** Outcome of converting a state value to a number. */
export type NumericResult = { ok: true; value: number } | { ok: false };

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Convert a value to a finite number without throwing.
 *
 * Numbers and booleans convert directly; strings must hold a decimal or
 * exponent literal once surrounding whitespace is removed. Null, empty
 * strings, non-finite results, arrays and objects do not convert.
 */
export function toNumber(value: StateValue | undefined): NumericResult {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { ok: true, value } : { ok: false };
  }
  if (typeof value === 'boolean') {
    return { ok: true, value: value ? 1 : 0 };
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_LITERAL.test(trimmed)) return { ok: false };
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? { ok: true, value: parsed } : { ok: false };
  }
  return { ok: false };
}

export function isStateRecord(value: StateValue | undefined): value is { [key: string]: StateValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a number-or-null field from a nested record. */
export function readNullableNumber(record: { [key: string]: StateValue }, key: string): number | null {
  const value = record[key];
  return typeof value === 'number' ? value : null;
}

/** Read the `data` sequence, treating anything else as empty. */
export function readDataSequence(state: WorkflowState): StateValue[] {
  const data = state.data;
  return Array.isArray(data) ? data : [];
}

/**
 * Truthiness where empty sequences and mappings count as false. Among
 * numbers only zero is false; a NaN a node wrote into state counts as true.
 */
export function isTruthy(value: StateValue | undefined): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isStateRecord(value)) return Object.keys(value).length > 0;
  if (typeof value === 'number') return value !== 0;
  return Boolean(value);
}

/** Deep copy a state so later mutation cannot reach the copy. */
export function cloneState(state: WorkflowState): WorkflowState {
  return structuredClone(state);
}

/** Runtime check that an unknown payload is a state mapping. */
export function isWorkflowState(value: unknown): value is WorkflowState {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
