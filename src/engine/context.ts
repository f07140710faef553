/**
 * Execution Context.
 *
 * Per-run mutable state: the bindings table (node id to output), the
 * context patches emitted along context edges, and the cancellation
 * signal. Only the graph runner writes to it, and only after a node
 * executor has returned, so executors never race on it.
 */

import { EngineError, createTypedError } from '../domain/errors';

/** A node output as recorded in the bindings table. */
export interface Binding {
  value: unknown;
  contextPatch?: Record<string, unknown>;
}

export interface ExecutionContextOptions {
  workflowId: string;
  runId: string;
  /** Context bag visible to every node before any patch is applied. */
  initialContext?: Record<string, unknown>;
  /** Aborting this signal cancels the context. */
  parentSignal?: AbortSignal;
  clock?: () => Date;
}

export class ExecutionContext {
  readonly workflowId: string;
  readonly runId: string;
  private readonly bindings = new Map<string, Binding>();
  private readonly initialContext: Record<string, unknown>;
  private readonly controller = new AbortController();
  private readonly clock: () => Date;
  private reason?: string;

  constructor(options: ExecutionContextOptions) {
    this.workflowId = options.workflowId;
    this.runId = options.runId;
    this.initialContext = structuredClone(options.initialContext ?? {});
    this.clock = options.clock ?? (() => new Date());

    const parent = options.parentSignal;
    if (parent) {
      if (parent.aborted) this.cancel(abortReason(parent));
      else parent.addEventListener('abort', () => this.cancel(abortReason(parent)), { once: true });
    }
  }

  /** Record a node's output. Bindings are write-once. */
  bind(nodeId: string, binding: Binding): void {
    if (this.bindings.has(nodeId)) {
      throw new EngineError(
        createTypedError({
          code: 'RUN.BINDING_EXISTS',
          message: `Node "${nodeId}" already has a recorded output`,
          nodeId,
          runId: this.runId,
        }),
      );
    }
    this.bindings.set(nodeId, {
      value: binding.value,
      contextPatch: binding.contextPatch ? structuredClone(binding.contextPatch) : undefined,
    });
  }

  has(nodeId: string): boolean {
    return this.bindings.has(nodeId);
  }

  /** Output value of a completed node. */
  valueOf(nodeId: string): unknown {
    return this.bindings.get(nodeId)?.value;
  }

  /** Snapshot of every binding's value. */
  values(): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [nodeId, binding] of this.bindings) out[nodeId] = binding.value;
    return out;
  }

  /**
   * Context bag as seen by a node: the initial context overlaid with the
   * patches of the given sources, in order. Sources without a binding
   * contribute nothing. The result is a copy.
   */
  contextFor(sourceNodeIds: readonly string[]): Record<string, unknown> {
    const view: Record<string, unknown> = structuredClone(this.initialContext);
    for (const sourceId of sourceNodeIds) {
      const patch = this.bindings.get(sourceId)?.contextPatch;
      if (patch) Object.assign(view, structuredClone(patch));
    }
    return view;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get cancelReason(): string | undefined {
    return this.reason;
  }

  /** Request cancellation. Idempotent. */
  cancel(reason?: string): void {
    if (this.controller.signal.aborted) return;
    this.reason = reason;
    this.controller.abort(reason);
  }

  now(): Date {
    return this.clock();
  }

  /**
   * Create an isolated child context (one loop iteration). It shares the
   * clock and cancellation but nothing else. `signal` narrows cancellation
   * to a descendant of this context's signal (a node attempt's).
   */
  createChild(
    runId: string,
    initialContext: Record<string, unknown>,
    signal: AbortSignal = this.controller.signal,
  ): ExecutionContext {
    return new ExecutionContext({
      workflowId: this.workflowId,
      runId,
      initialContext,
      parentSignal: signal,
      clock: this.clock,
    });
  }
}

function abortReason(signal: AbortSignal): string | undefined {
  return typeof signal.reason === 'string' ? signal.reason : undefined;
}
