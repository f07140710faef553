/**
 * Typed error model for machine-actionable error handling.
 *
 * Every failure the engine reports (graph validation issues, node failures,
 * run-level failures) is expressed as a TypedError so that callers can
 * highlight offending nodes/edges and decide whether a retry makes sense.
 * Thrown errors wrap a TypedError in one of the classes at the bottom of
 * this module.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'VALIDATION'
  | 'INPUT'
  | 'NODE'
  | 'AGENT'
  | 'LOOP'
  | 'RUN'
  | 'RECORD'
  | 'SYSTEM';

/**
 * Failure classification.
 *
 * - validation: graph malformed, rejected before execution
 * - input: missing/invalid run-time input, fails the run immediately
 * - transient: eligible for bounded automatic retry (agent nodes only)
 * - fatal: never retried
 * - cancellation: the run was aborted on request; not a failure
 */
export type ErrorClassification = 'validation' | 'input' | 'transient' | 'fatal' | 'cancellation';

/** Typed suggested fix that callers can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure returned in API responses and records. */
export interface TypedError {
  /** Namespaced error code (e.g., "VALIDATION.CYCLE_DETECTED"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Offending node, if any. */
  nodeId?: string;
  /** Offending edge, if any. */
  edgeId?: string;
  /** Associated run if applicable. */
  runId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  classification?: ErrorClassification;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  nodeId?: string;
  edgeId?: string;
  runId?: string;
  retryable?: boolean;
  classification?: ErrorClassification;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    nodeId: params.nodeId,
    edgeId: params.edgeId,
    runId: params.runId,
    retryable: params.retryable ?? false,
    classification: params.classification,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

// --- Common error factory functions ---

export function validationError(message: string, details?: Record<string, unknown>, fixes?: SuggestedFix[]): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    classification: 'validation',
    details,
    suggestedFixes: fixes,
  });
}

export function notFoundError(resourceType: string, resourceId: string): TypedError {
  return createTypedError({
    code: 'VALIDATION.NOT_FOUND',
    message: `${resourceType} not found: ${resourceId}`,
    retryable: false,
  });
}

export function inputMissingError(nodeId: string): TypedError {
  return createTypedError({
    code: 'INPUT.MISSING',
    message: `Required input "${nodeId}" was not supplied`,
    nodeId,
    retryable: false,
    classification: 'input',
    suggestedFixes: [
      { type: 'PROVIDE_INPUT', params: { nodeId }, description: `Supply a value for input node "${nodeId}"` },
    ],
  });
}

export function inputTypeError(nodeId: string, expected: string, actual: string): TypedError {
  return createTypedError({
    code: 'INPUT.INVALID_TYPE',
    message: `Input "${nodeId}" must be of type ${expected}, got ${actual}`,
    nodeId,
    retryable: false,
    classification: 'input',
    details: { expected, actual },
  });
}

export function agentTimeoutError(nodeId: string, timeoutMs: number, attempt: number): TypedError {
  return createTypedError({
    code: 'AGENT.TIMEOUT',
    message: `Agent invocation timed out after ${timeoutMs}ms`,
    nodeId,
    retryable: true,
    classification: 'transient',
    details: { timeoutMs, attempt },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 1.5 } },
    ],
  });
}

/**
 * Create a typed error for an agent provider failure, with retryability
 * determined by HTTP status code.
 *
 * - 429: Rate limited, retryable after backoff.
 * - 5xx: Transient server errors, retryable.
 * - no status (connection failure): retryable.
 * - Everything else: configuration problem, not retryable.
 */
export function agentProviderError(
  message: string,
  statusCode?: number,
  details?: Record<string, unknown>,
): TypedError {
  const retryable = statusCode === undefined || statusCode === 429 || statusCode >= 500;
  const fixes: SuggestedFix[] = [];

  if (statusCode === 401 || statusCode === 403) {
    fixes.push({ type: 'CHECK_API_KEY', params: { statusCode }, description: 'Authentication failed. Verify the agent API key.' });
  } else if (statusCode === 404) {
    fixes.push({ type: 'FIX_AGENT_MODEL', params: { statusCode }, description: 'The model or endpoint does not exist.' });
  } else if (retryable) {
    fixes.push({ type: 'WAIT_AND_RETRY', params: { delayMs: 2000 } });
  }

  let code = 'AGENT.PROVIDER_ERROR';
  if (statusCode === 429) code = 'AGENT.RATE_LIMITED';
  else if (statusCode === undefined) code = 'AGENT.UNAVAILABLE';

  return createTypedError({
    code,
    message,
    retryable,
    classification: retryable ? 'transient' : 'fatal',
    details: statusCode !== undefined ? { statusCode, ...details } : details,
    suggestedFixes: fixes,
  });
}

export function nodeFatalError(
  code: string,
  message: string,
  nodeId?: string,
  details?: Record<string, unknown>,
): TypedError {
  return createTypedError({
    code,
    message,
    nodeId,
    retryable: false,
    classification: 'fatal',
    details,
  });
}

export function runCanceledError(runId: string, reason?: string): TypedError {
  return createTypedError({
    code: 'RUN.CANCELED',
    message: reason ? `Run canceled: ${reason}` : 'Run canceled',
    runId,
    retryable: false,
    classification: 'cancellation',
    details: reason ? { reason } : undefined,
  });
}

export function runNotFoundError(runId: string): TypedError {
  return createTypedError({
    code: 'RUN.NOT_FOUND',
    message: `Run not found: ${runId}`,
    runId,
    retryable: false,
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

// --- Thrown error classes ---

/** Base class for every error the engine throws. */
export class EngineError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'EngineError';
  }
}

/** The workflow graph is malformed; carries every structural issue found. */
export class ValidationError extends EngineError {
  constructor(public readonly issues: TypedError[], message = 'Workflow graph is invalid') {
    super(
      createTypedError({
        code: 'VALIDATION.GRAPH_INVALID',
        message,
        retryable: false,
        classification: 'validation',
        details: { errors: issues },
        suggestedFixes: issues.flatMap((issue) => issue.suggestedFixes),
      }),
    );
    this.name = 'ValidationError';
  }
}

/** Missing or invalid run-time input for an input node. */
export class InputError extends EngineError {
  constructor(typedError: TypedError) {
    super({ ...typedError, classification: 'input' });
    this.name = 'InputError';
  }
}

/** A failure that may succeed on retry (agent timeouts, rate limits). */
export class TransientNodeError extends EngineError {
  constructor(typedError: TypedError) {
    super({ ...typedError, retryable: true, classification: 'transient' });
    this.name = 'TransientNodeError';
  }
}

/** A failure that will not succeed on retry. */
export class FatalNodeError extends EngineError {
  constructor(typedError: TypedError) {
    super({ ...typedError, retryable: false, classification: 'fatal' });
    this.name = 'FatalNodeError';
  }
}

/** The run was aborted by explicit request. */
export class CancellationError extends EngineError {
  constructor(runId: string, reason?: string) {
    super(runCanceledError(runId, reason));
    this.name = 'CancellationError';
  }
}

/** Extract a message from an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return 'Unknown error';
}
