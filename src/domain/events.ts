/**
 * Execution record change events.
 *
 * Every committed record-store update produces exactly one event; progress
 * observers consume these instead of polling the record.
 */

import { ExecutionRecord } from './run';

/** Event types emitted by the execution record store. */
export type RecordEventType =
  | 'run.created'
  | 'run.running'
  | 'run.completed'
  | 'run.failed'
  | 'run.cancelled'
  | 'run.cancel-requested'
  | 'node.running'
  | 'node.completed'
  | 'node.failed'
  | 'node.skipped';

/** A committed change to an execution record. */
export interface RecordEvent {
  type: RecordEventType;
  runId: string;
  workflowId: string;
  /** Set for node.* events. */
  nodeId?: string;
  timestamp: string;
  /** Snapshot of the record after the change. */
  record: ExecutionRecord;
}

/** Callback for record change events. */
export type RecordListener = (event: RecordEvent) => void;
