/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the engine can raise is described by a TypedError with a
 * namespaced code. Exceptions thrown across module boundaries carry one in
 * their `typedError` field so callers (and the HTTP layer) can map them
 * without parsing messages.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'GRAPH'
  | 'RUN'
  | 'NODE'
  | 'VALIDATION'
  | 'CONFIG'
  | 'SYSTEM';

/** Typed suggested fix a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses. */
export interface TypedError {
  /** Namespaced error code (e.g., "GRAPH.UNKNOWN_NODE"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Node the error relates to, if any. */
  node?: string;
  /** Run the error relates to, if any. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  node?: string;
  runId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    node: params.node,
    runId: params.runId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

const ERROR_DOMAINS: readonly ErrorDomain[] = ['GRAPH', 'RUN', 'NODE', 'VALIDATION', 'CONFIG', 'SYSTEM'];

/** Domain of an error code, or undefined when its prefix is not a known domain. */
export function errorDomain(error: TypedError): ErrorDomain | undefined {
  const prefix = error.code.split('.', 1)[0];
  return ERROR_DOMAINS.find((domain) => domain === prefix);
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
    details: { resourceType, resourceId },
  });
}

// --- Graph construction ---

export function unknownNodeError(node: string): TypedError {
  return createTypedError({
    code: 'GRAPH.UNKNOWN_NODE',
    message: `Node '${node}' is not registered.`,
    node,
    retryable: false,
    suggestedFixes: [
      { type: 'REGISTER_NODE', params: { node }, description: `Register a handler named "${node}" or remove it from the graph` },
    ],
  });
}

export function invalidStartNodeError(startNode: string, nodes: readonly string[]): TypedError {
  return createTypedError({
    code: 'GRAPH.INVALID_START_NODE',
    message: `Start node '${startNode}' is not part of the graph nodes.`,
    node: startNode,
    retryable: false,
    details: { nodes: [...nodes] },
    suggestedFixes: [
      { type: 'ADD_NODE', params: { node: startNode }, description: 'List the start node in the graph nodes' },
    ],
  });
}

// --- Registry and execution ---

export function nodeNotFoundError(node: string): TypedError {
  return createTypedError({
    code: 'NODE.NOT_FOUND',
    message: `No handler registered for node "${node}"`,
    node,
    retryable: false,
  });
}

export function unregisteredNodeInvocationError(node: string, step: number): TypedError {
  return createTypedError({
    code: 'RUN.UNREGISTERED_NODE',
    message: `Node "${node}" was reached at step ${step} but is not part of the graph`,
    node,
    retryable: false,
    details: { step },
    suggestedFixes: [
      { type: 'ADD_NODE', params: { node }, description: `Declare "${node}" in the graph nodes` },
    ],
  });
}

export function missingPreconditionError(node: string, key: string): TypedError {
  return createTypedError({
    code: 'NODE.MISSING_PRECONDITION',
    message: `Node "${node}" requires state key "${key}"`,
    node,
    retryable: false,
    details: { key },
  });
}

export function nodeExecutionError(node: string, step: number, cause: unknown): TypedError {
  return createTypedError({
    code: 'NODE.EXECUTION_ERROR',
    message: cause instanceof Error ? cause.message : `Node "${node}" failed`,
    node,
    retryable: false,
    details: { step },
  });
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
