/**
 * Run domain model.
 *
 * A single execution instance of a workflow against concrete inputs,
 * producing node-level results and an append-only execution record.
 */

import { NodeKind, BranchLabel } from './workflow';
import { TypedError } from './errors';

/** Run lifecycle states. */
export enum RunStatus {
  Pending = 'pending',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
  Cancelled = 'cancelled',
}

/** Node-level run states. */
export enum NodeRunStatus {
  Pending = 'pending',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
  Skipped = 'skipped',
}

/** Valid state transitions for runs. */
export const VALID_RUN_TRANSITIONS: Record<RunStatus, RunStatus[]> = {
  [RunStatus.Pending]: [RunStatus.Running, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Running]: [RunStatus.Completed, RunStatus.Failed, RunStatus.Cancelled],
  [RunStatus.Completed]: [],
  [RunStatus.Failed]: [],
  [RunStatus.Cancelled]: [],
};

/** Valid state transitions for node results. */
export const VALID_NODE_TRANSITIONS: Record<NodeRunStatus, NodeRunStatus[]> = {
  [NodeRunStatus.Pending]: [NodeRunStatus.Running, NodeRunStatus.Skipped],
  [NodeRunStatus.Running]: [NodeRunStatus.Completed, NodeRunStatus.Failed],
  [NodeRunStatus.Completed]: [],
  [NodeRunStatus.Failed]: [],
  [NodeRunStatus.Skipped]: [],
};

/** Token usage reported by the agent invoker. */
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Result of a single node execution. */
export interface NodeResult {
  nodeId: string;
  kind: NodeKind;
  status: NodeRunStatus;
  output?: unknown;
  /** Branch taken, for conditional nodes. */
  branchLabel?: BranchLabel;
  error?: TypedError;
  startedAt?: string;
  finishedAt?: string;
  /** Number of attempts made (including retries). */
  attempts: number;
  durationMs?: number;
  /** Agent nodes only. */
  usage?: TokenUsage;
  /** Loop nodes only. */
  iterations?: number;
}

/** The durable status/result trail of a run. */
export interface ExecutionRecord {
  runId: string;
  workflowId: string;
  status: RunStatus;
  createdAt: string;
  updatedAt: string;
  startTime?: string;
  endTime?: string;
  /** Node-level results indexed by node id. */
  nodeResults: Record<string, NodeResult>;
  /** Output of the designated output nodes; set when the run completes. */
  finalOutput?: unknown;
  inputs: Record<string, unknown>;
  cancelRequested: boolean;
  /** Run-level reason when the run failed or was cancelled. */
  error?: TypedError;
}

/** Input for submitting a run. */
export interface CreateRunInput {
  workflowId: string;
  /** Initial values keyed by input node id. */
  inputs?: Record<string, unknown>;
  /** Initial context bag visible to every node. */
  context?: Record<string, unknown>;
}

/** Immediate response to a run submission. */
export interface RunSubmission {
  runId: string;
  status: RunStatus;
  startTime: string;
}
