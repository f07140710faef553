/**
 * Node runner: executes one node under its attempt policy.
 *
 * Retries, per-attempt timeouts and backoff are applied here; the
 * executors themselves run a single attempt. Only transient failures are
 * retried, and only where the policy allows more than one attempt (agent
 * nodes). The runner never rejects: every outcome, including
 * cancellation, comes back as a NodeRunOutcome.
 */

import {
  CancellationError,
  EngineError,
  InputError,
  TransientNodeError,
  TypedError,
  agentTimeoutError,
  createTypedError,
  errorMessage,
  runCanceledError,
} from '../domain/errors';
import { Logger } from '../logger';
import { NodeOutcome } from './node-executors';

export interface AttemptPolicy {
  maxAttempts: number;
  /** Per-attempt timeout; no timeout when undefined. */
  timeoutMs?: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** Source of jitter, in [0, 1). */
  random: () => number;
}

export type NodeRunOutcome =
  | { ok: true; outcome: NodeOutcome; attempts: number }
  | { ok: false; error: TypedError; attempts: number };

export interface RunNodeOptions {
  nodeId: string;
  runId: string;
  policy: AttemptPolicy;
  /** Run-level cancellation. */
  signal: AbortSignal;
  logger: Logger;
}

/** Execute with retry/timeout policy. */
export async function runNode(
  attempt: (signal: AbortSignal, attempt: number) => Promise<NodeOutcome>,
  options: RunNodeOptions,
): Promise<NodeRunOutcome> {
  const { nodeId, runId, policy, signal, logger } = options;
  let lastError: TypedError | undefined;

  for (let n = 1; n <= policy.maxAttempts; n++) {
    if (signal.aborted) {
      return { ok: false, error: { ...runCanceledError(runId), nodeId }, attempts: n - 1 };
    }

    try {
      const outcome = await attemptWithTimeout(attempt, n, nodeId, policy.timeoutMs, signal);
      return { ok: true, outcome, attempts: n };
    } catch (err) {
      if (err instanceof CancellationError || signal.aborted) {
        return { ok: false, error: { ...runCanceledError(runId), nodeId }, attempts: n };
      }

      const typed = toTypedError(err, nodeId);
      if (!(err instanceof TransientNodeError) || n >= policy.maxAttempts) {
        return {
          ok: false,
          error: { ...typed, details: { ...typed.details, attempts: n } },
          attempts: n,
        };
      }

      lastError = typed;
      const delay = computeBackoff(n, policy.backoffBaseMs, policy.backoffMaxMs, policy.random);
      logger.warn('Transient node failure, retrying', {
        nodeId,
        attempt: n,
        maxAttempts: policy.maxAttempts,
        delayMs: delay,
        code: typed.code,
      });

      try {
        await sleep(delay, signal);
      } catch {
        return { ok: false, error: { ...runCanceledError(runId), nodeId }, attempts: n };
      }
    }
  }

  return {
    ok: false,
    error:
      lastError ??
      createTypedError({ code: 'NODE.NO_ATTEMPTS', message: 'Node was never attempted', nodeId, classification: 'fatal' }),
    attempts: policy.maxAttempts,
  };
}

/** Whether a failure came from an input node's missing/invalid value. */
export function isInputFailure(error: TypedError): boolean {
  return error.classification === 'input';
}

export function isCancellation(error: TypedError): boolean {
  return error.classification === 'cancellation';
}

function toTypedError(err: unknown, nodeId: string): TypedError {
  if (err instanceof InputError || err instanceof EngineError) {
    return { ...err.typedError, nodeId: err.typedError.nodeId ?? nodeId };
  }
  return createTypedError({
    code: 'NODE.EXECUTION_FAILED',
    message: errorMessage(err),
    nodeId,
    retryable: false,
    classification: 'fatal',
  });
}

/**
 * One attempt, raced against the timeout. The attempt gets its own signal,
 * aborted on timeout or run cancellation. Cancellation does not settle the
 * attempt: a node that finishes anyway keeps its result, and one that
 * rejects after the abort is reported as cancelled by the caller.
 */
function attemptWithTimeout(
  attempt: (signal: AbortSignal, attempt: number) => Promise<NodeOutcome>,
  n: number,
  nodeId: string,
  timeoutMs: number | undefined,
  runSignal: AbortSignal,
): Promise<NodeOutcome> {
  return new Promise<NodeOutcome>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onCancel = (): void => {
      controller.abort(runSignal.reason);
    };

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      if (timer !== undefined) clearTimeout(timer);
      runSignal.removeEventListener('abort', onCancel);
      settle();
    };

    runSignal.addEventListener('abort', onCancel, { once: true });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        controller.abort('timeout');
        finish(() => reject(new TransientNodeError(agentTimeoutError(nodeId, timeoutMs, n))));
      }, timeoutMs);
    }

    attempt(controller.signal, n).then(
      (outcome) => finish(() => resolve(outcome)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}

/**
 * Exponential backoff with "equal jitter": half the delay is fixed, the
 * other half random.
 */
export function computeBackoff(attempt: number, baseMs: number, maxMs: number, random: () => number): number {
  const full = Math.min(maxMs, baseMs * Math.pow(2, attempt - 1));
  return Math.round(full / 2 + random() * (full / 2));
}

/** Sleep that rejects early when the signal aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new Error('aborted'));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
