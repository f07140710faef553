/**
 * Run and node state machines.
 *
 * Enforces valid state transitions for runs and node results,
 * producing typed errors on invalid transitions.
 */

import {
  NodeRunStatus,
  RunStatus,
  VALID_NODE_TRANSITIONS,
  VALID_RUN_TRANSITIONS,
} from '../domain/run';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export type TransitionResult<S> =
  | { success: true; newStatus: S }
  | { success: false; error: TypedError };

/** Attempt a run state transition. */
export function transitionRunStatus(current: RunStatus, target: RunStatus): TransitionResult<RunStatus> {
  const validTargets = VALID_RUN_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'RUN.INVALID_TRANSITION',
        message: `Invalid run state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a node state transition. */
export function transitionNodeStatus(
  current: NodeRunStatus,
  target: NodeRunStatus,
): TransitionResult<NodeRunStatus> {
  const validTargets = VALID_NODE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'NODE.INVALID_TRANSITION',
        message: `Invalid node state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a run status is terminal. */
export function isTerminalRunStatus(status: RunStatus): boolean {
  return status === RunStatus.Completed || status === RunStatus.Failed || status === RunStatus.Cancelled;
}

/** Check if a node status is terminal. */
export function isTerminalNodeStatus(status: NodeRunStatus): boolean {
  return status === NodeRunStatus.Completed || status === NodeRunStatus.Failed || status === NodeRunStatus.Skipped;
}
