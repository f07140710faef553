/**
 * Execution Record Store.
 *
 * Holds the durable status/result trail of every run. Updates for the same
 * run are applied one at a time, in call order, even when several node
 * completions call update() concurrently. Each committed update appends a
 * history snapshot and notifies subscribers synchronously before the
 * returned promise resolves.
 *
 * ```ts
 * const records = createRecordStore();
 * await records.create(runId, 'greeting', { nodes, inputs: { greeting: 'hi' } });
 * const stop = records.subscribe(runId, (event) => console.log(event.type));
 * await records.update(runId, { nodeId: 'greeting', kind: 'input', status: NodeRunStatus.Running, attempts: 0 });
 * ```
 */

import { EngineError, TypedError, createTypedError, runNotFoundError } from '../domain/errors';
import { RecordEvent, RecordEventType, RecordListener } from '../domain/events';
import { ExecutionRecord, NodeResult, NodeRunStatus, RunStatus } from '../domain/run';
import { NodeKind } from '../domain/workflow';
import { isTerminalRunStatus, transitionNodeStatus, transitionRunStatus } from '../engine/state-machine';
import { logger } from '../logger';
import { deepCopy } from '../storage/memory-store';

/** A snapshot of a record after one committed change. */
export interface RecordHistoryEntry {
  timestamp: string;
  event: RecordEventType;
  nodeId?: string;
  record: ExecutionRecord;
}

export interface CreateRecordInput {
  nodes: Array<{ id: string; kind: NodeKind }>;
  inputs?: Record<string, unknown>;
}

/** Run-level change. */
export interface RunPatch {
  status?: RunStatus;
  finalOutput?: unknown;
  error?: TypedError;
  cancelRequested?: boolean;
}

export interface ExecutionRecordStore {
  /** Create the record of a submitted run, every node pending. */
  create(runId: string, workflowId: string, input: CreateRecordInput): Promise<ExecutionRecord>;
  /**
   * Apply a node result. Status must progress along the node state
   * machine; repeating a terminal status is a no-op, repeating `running`
   * refreshes the entry.
   */
  update(runId: string, result: NodeResult): Promise<ExecutionRecord>;
  /** Apply a run-level change validated by the run state machine. */
  transition(runId: string, patch: RunPatch): Promise<ExecutionRecord>;
  get(runId: string): Promise<ExecutionRecord | null>;
  list(workflowId: string): Promise<ExecutionRecord[]>;
  history(runId: string): Promise<RecordHistoryEntry[]>;
  /** Observe one run. Returns an unsubscribe function. */
  subscribe(runId: string, listener: RecordListener): () => void;
  /** Observe every run. Returns an unsubscribe function. */
  subscribeAll(listener: RecordListener): () => void;
}

export interface RecordStoreOptions {
  /** Maximum history entries kept per run (default: 50). */
  maxHistory?: number;
  clock?: () => Date;
}

const log = logger.child({ module: 'record-store' });

// Pending is never a transition target; its entries exist only to make the maps total.
const NODE_EVENTS: Record<NodeRunStatus, RecordEventType> = {
  [NodeRunStatus.Pending]: 'node.running',
  [NodeRunStatus.Running]: 'node.running',
  [NodeRunStatus.Completed]: 'node.completed',
  [NodeRunStatus.Failed]: 'node.failed',
  [NodeRunStatus.Skipped]: 'node.skipped',
};

const RUN_EVENTS: Record<RunStatus, RecordEventType> = {
  [RunStatus.Pending]: 'run.created',
  [RunStatus.Running]: 'run.running',
  [RunStatus.Completed]: 'run.completed',
  [RunStatus.Failed]: 'run.failed',
  [RunStatus.Cancelled]: 'run.cancelled',
};

function invalidUpdate(code: string, message: string, runId: string, details?: Record<string, unknown>): EngineError {
  return new EngineError(createTypedError({ code, message, runId, retryable: false, details }));
}

/** Create an in-memory ExecutionRecordStore. */
export function createRecordStore(options: RecordStoreOptions = {}): ExecutionRecordStore {
  const maxHistory = options.maxHistory ?? 50;
  const clock = options.clock ?? (() => new Date());

  const records = new Map<string, ExecutionRecord>();
  const historyMap = new Map<string, RecordHistoryEntry[]>();
  const chains = new Map<string, Promise<void>>();
  const runListeners = new Map<string, Set<RecordListener>>();
  const globalListeners = new Set<RecordListener>();

  // ---- helpers -----------------------------------------------------------

  /** Run `op` after every earlier operation on the same run has settled. */
  function serialize<T>(runId: string, op: () => T): Promise<T> {
    const previous = chains.get(runId) ?? Promise.resolve();
    const next = previous.then(op);
    // The chain only orders operations; `next` carries the outcome to the caller.
    // An idle run drops its chain so finished runs hold no promise.
    const tail: Promise<void> = next.then(release, release);
    function release(): void {
      if (chains.get(runId) === tail) chains.delete(runId);
    }
    chains.set(runId, tail);
    return next;
  }

  function requireRecord(runId: string): ExecutionRecord {
    const record = records.get(runId);
    if (!record) throw new EngineError(runNotFoundError(runId));
    return record;
  }

  function commit(record: ExecutionRecord, type: RecordEventType, nodeId?: string): ExecutionRecord {
    const timestamp = clock().toISOString();
    record.updatedAt = timestamp;
    records.set(record.runId, record);

    let entries = historyMap.get(record.runId);
    if (!entries) {
      entries = [];
      historyMap.set(record.runId, entries);
    }
    entries.push({ timestamp, event: type, nodeId, record: deepCopy(record) });
    if (entries.length > maxHistory) {
      entries.splice(0, entries.length - maxHistory);
    }

    notify({ type, runId: record.runId, workflowId: record.workflowId, nodeId, timestamp, record: deepCopy(record) });
    return deepCopy(record);
  }

  function notify(event: RecordEvent): void {
    const listeners = [...(runListeners.get(event.runId) ?? []), ...globalListeners];
    for (const listener of listeners) {
      try {
        listener(event);
      } catch (err) {
        log.warn('Record listener threw', {
          runId: event.runId,
          event: event.type,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  // ---- implementation ----------------------------------------------------

  function create(runId: string, workflowId: string, input: CreateRecordInput): Promise<ExecutionRecord> {
    return serialize(runId, () => {
      if (records.has(runId)) {
        throw invalidUpdate('RECORD.DUPLICATE_RUN', `Run "${runId}" already has a record`, runId);
      }
      const now = clock().toISOString();
      const nodeResults: Record<string, NodeResult> = {};
      for (const node of input.nodes) {
        nodeResults[node.id] = { nodeId: node.id, kind: node.kind, status: NodeRunStatus.Pending, attempts: 0 };
      }
      const record: ExecutionRecord = {
        runId,
        workflowId,
        status: RunStatus.Pending,
        createdAt: now,
        updatedAt: now,
        nodeResults,
        inputs: deepCopy(input.inputs ?? {}),
        cancelRequested: false,
      };
      return commit(record, 'run.created');
    });
  }

  function update(runId: string, result: NodeResult): Promise<ExecutionRecord> {
    return serialize(runId, () => {
      const record = requireRecord(runId);
      const current = record.nodeResults[result.nodeId];
      if (!current) {
        throw invalidUpdate('RECORD.UNKNOWN_NODE', `Run "${runId}" has no node "${result.nodeId}"`, runId, {
          nodeId: result.nodeId,
        });
      }

      if (current.status === result.status) {
        if (result.status !== NodeRunStatus.Running) return deepCopy(record);
      } else {
        const transition = transitionNodeStatus(current.status, result.status);
        if (!transition.success) {
          throw new EngineError({ ...transition.error, nodeId: result.nodeId, runId });
        }
      }

      record.nodeResults[result.nodeId] = deepCopy({ ...current, ...result, kind: current.kind });
      return commit(record, NODE_EVENTS[result.status], result.nodeId);
    });
  }

  function transition(runId: string, patch: RunPatch): Promise<ExecutionRecord> {
    return serialize(runId, () => {
      const record = requireRecord(runId);
      const now = clock().toISOString();
      let event: RecordEventType | undefined;

      if (patch.status !== undefined && patch.status !== record.status) {
        const result = transitionRunStatus(record.status, patch.status);
        if (!result.success) {
          throw new EngineError({ ...result.error, runId });
        }
        record.status = result.newStatus;
        if (result.newStatus === RunStatus.Running) record.startTime = now;
        if (isTerminalRunStatus(result.newStatus)) record.endTime = now;
        event = RUN_EVENTS[result.newStatus];
      }

      if (patch.cancelRequested && !record.cancelRequested) {
        record.cancelRequested = true;
        event = event ?? 'run.cancel-requested';
      }
      if (patch.finalOutput !== undefined) record.finalOutput = deepCopy(patch.finalOutput);
      if (patch.error !== undefined) record.error = deepCopy(patch.error);

      return event ? commit(record, event) : deepCopy(record);
    });
  }

  async function get(runId: string): Promise<ExecutionRecord | null> {
    const record = records.get(runId);
    return record ? deepCopy(record) : null;
  }

  async function list(workflowId: string): Promise<ExecutionRecord[]> {
    return [...records.values()].filter((r) => r.workflowId === workflowId).map(deepCopy);
  }

  async function history(runId: string): Promise<RecordHistoryEntry[]> {
    return deepCopy(historyMap.get(runId) ?? []);
  }

  function subscribe(runId: string, listener: RecordListener): () => void {
    let listeners = runListeners.get(runId);
    if (!listeners) {
      listeners = new Set();
      runListeners.set(runId, listeners);
    }
    const set = listeners;
    set.add(listener);
    return () => {
      set.delete(listener);
      if (set.size === 0) runListeners.delete(runId);
    };
  }

  function subscribeAll(listener: RecordListener): () => void {
    globalListeners.add(listener);
    return () => {
      globalListeners.delete(listener);
    };
  }

  return { create, update, transition, get, list, history, subscribe, subscribeAll };
}
