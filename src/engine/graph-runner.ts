/**
 * Graph runner: the ready-set scheduler for one graph.
 *
 * Runs a compiled graph to completion against an ExecutionContext. The
 * top-level run and every loop iteration each get their own GraphRunner;
 * all of a run's runners draw on one set of ExecutionSlots, so the
 * concurrency limit holds across loop bodies. Loop nodes take no slot
 * themselves, since their body nodes do.
 *
 * Node lifecycle: pending -> (ready) -> running -> completed | failed, or
 * pending -> skipped. A node is decided once every source of an incoming
 * edge is terminal; its outcome is recorded (onNodeUpdate resolved) before
 * any successor is decided.
 */

import {
  CancellationError,
  FatalNodeError,
  TypedError,
  createTypedError,
  nodeFatalError,
  runCanceledError,
} from '../domain/errors';
import { NodeResult, NodeRunStatus, RunStatus } from '../domain/run';
import { Edge, OutputNode, WorkflowNode } from '../domain/workflow';
import { WorkflowGraph } from '../dsl/graph';
import { EngineSettings } from '../config';
import { Logger } from '../logger';
import { ExecutionContext } from './context';
import {
  ExecutorServices,
  IterationInput,
  IterationResult,
  LoopBodyRunner,
  ResolvedInputs,
  executeNode,
} from './node-executors';
import { AttemptPolicy, NodeRunOutcome, isCancellation, isInputFailure, runNode } from './node-runner';
import { ExecutionSlots } from './slots';
import { isTerminalNodeStatus } from './state-machine';

export type GraphRunSettings = Pick<
  EngineSettings,
  'maxConcurrency' | 'agentMaxAttempts' | 'backoffBaseMs' | 'backoffMaxMs' | 'agentTimeoutMs'
>;

export interface GraphRunOptions {
  graph: WorkflowGraph;
  context: ExecutionContext;
  /** Values for input nodes, keyed by node id. */
  inputs: Record<string, unknown>;
  services: ExecutorServices;
  settings: GraphRunSettings;
  /** Jitter source for retry backoff. */
  random: () => number;
  logger: Logger;
  /** Receives every node state change; awaited before scheduling continues. */
  onNodeUpdate?: (result: NodeResult) => Promise<void>;
  /** The run's shared slots; a new set of `maxConcurrency` when omitted. */
  slots?: ExecutionSlots;
}

export interface GraphRunResult {
  status: RunStatus.Completed | RunStatus.Failed | RunStatus.Cancelled;
  finalOutput?: unknown;
  error?: TypedError;
  nodeResults: Record<string, NodeResult>;
}

interface Settled {
  nodeId: string;
  outcome: NodeRunOutcome;
}

export class GraphRunner {
  private readonly results = new Map<string, NodeResult>();
  private readonly startedAt = new Map<string, number>();
  private readonly ready: string[] = [];
  private readonly queued = new Set<string>();
  private readonly inFlight = new Map<string, Promise<Settled>>();
  /** Set once the outcome is decided; in-flight nodes still finish. */
  private halted = false;
  private runError?: TypedError;
  private readonly slots: ExecutionSlots;

  constructor(private readonly options: GraphRunOptions) {
    this.slots = options.slots ?? new ExecutionSlots(options.settings.maxConcurrency);
    for (const node of options.graph.nodes) {
      this.results.set(node.id, { nodeId: node.id, kind: node.kind, status: NodeRunStatus.Pending, attempts: 0 });
    }
  }

  async run(): Promise<GraphRunResult> {
    const { graph } = this.options;
    for (const node of graph.nodes) {
      if (graph.incoming(node.id).length === 0) this.enqueue(node.id);
    }

    for (;;) {
      await this.dispatchReady();
      if (this.inFlight.size === 0) break;
      const settled = await Promise.race(this.inFlight.values());
      this.inFlight.delete(settled.nodeId);
      await this.settle(settled);
    }

    return this.finish();
  }

  // ─── dispatch ─────────────────────────────────────────────────────────────

  private enqueue(nodeId: string): void {
    this.queued.add(nodeId);
    this.ready.push(nodeId);
  }

  private async dispatchReady(): Promise<void> {
    const { context, settings } = this.options;
    while (!this.halted && this.ready.length > 0 && this.inFlight.size < settings.maxConcurrency) {
      if (context.cancelled) return;
      const nodeId = this.ready.shift();
      if (nodeId === undefined) return;
      await this.dispatch(nodeId);
    }
  }

  private async dispatch(nodeId: string): Promise<void> {
    const { graph, context, services, logger } = this.options;
    const node = this.nodeOf(nodeId);
    const holdsSlot = node.kind !== 'loop';
    // Without a slot the run was cancelled while waiting; the node stays pending.
    if (holdsSlot && !(await this.slots.acquire(context.signal))) return;

    const now = context.now();
    this.startedAt.set(nodeId, now.getTime());
    await this.record({ ...this.resultOf(nodeId), status: NodeRunStatus.Running, startedAt: now.toISOString() });

    const inputs = this.resolveInputs(nodeId);
    const view = context.contextFor(graph.incoming(nodeId, 'context').map((e) => e.source));
    const runLoopBody: LoopBodyRunner = (loopNode, input, signal) => this.runLoopBody(loopNode.id, input, signal);

    const settled = runNode(
      (signal) =>
        executeNode(
          {
            node,
            inputs,
            context: view,
            runId: context.runId,
            runInputs: this.options.inputs,
            signal,
            runLoopBody,
          },
          services,
        ),
      {
        nodeId,
        runId: context.runId,
        policy: this.policyFor(node),
        signal: context.signal,
        logger: logger.child({ nodeId }),
      },
    ).then((outcome): Settled => {
      if (holdsSlot) this.slots.release();
      return { nodeId, outcome };
    });

    this.inFlight.set(nodeId, settled);
  }

  private policyFor(node: WorkflowNode): AttemptPolicy {
    const { settings, random } = this.options;
    const base = { backoffBaseMs: settings.backoffBaseMs, backoffMaxMs: settings.backoffMaxMs, random };
    if (node.kind === 'agent') {
      return {
        ...base,
        maxAttempts: node.config.maxAttempts ?? settings.agentMaxAttempts,
        timeoutMs: node.config.timeoutMs ?? settings.agentTimeoutMs,
      };
    }
    return { ...base, maxAttempts: 1 };
  }

  // ─── completion ───────────────────────────────────────────────────────────

  private async settle({ nodeId, outcome }: Settled): Promise<void> {
    const { context, logger } = this.options;
    const finished = context.now();
    const durationMs = finished.getTime() - (this.startedAt.get(nodeId) ?? finished.getTime());
    const base = { ...this.resultOf(nodeId), attempts: outcome.attempts, finishedAt: finished.toISOString(), durationMs };

    if (outcome.ok) {
      const { value, branchLabel, contextPatch, usage, iterations } = outcome.outcome;
      context.bind(nodeId, { value, contextPatch });
      await this.record({ ...base, status: NodeRunStatus.Completed, output: value, branchLabel, usage, iterations });
    } else {
      await this.record({ ...base, status: NodeRunStatus.Failed, error: outcome.error });
      if (isInputFailure(outcome.error)) {
        this.runError = outcome.error;
        this.halted = true;
        logger.error('Run input rejected', { nodeId, code: outcome.error.code, message: outcome.error.message });
      } else if (!isCancellation(outcome.error)) {
        logger.warn('Node failed', { nodeId, code: outcome.error.code, message: outcome.error.message });
      }
    }

    if (context.cancelled) return;
    await this.propagate(nodeId);
    this.checkOutputsReachable();
  }

  /**
   * Decide every successor whose sources are now all terminal, walking
   * outgoing edges in declaration order. Skips cascade.
   */
  private async propagate(startId: string): Promise<void> {
    const { graph, logger } = this.options;
    const worklist = [startId];

    while (worklist.length > 0) {
      const sourceId = worklist.shift();
      if (sourceId === undefined) break;

      for (const edge of graph.outgoing(sourceId)) {
        const targetId = edge.target;
        if (this.statusOf(targetId) !== NodeRunStatus.Pending || this.queued.has(targetId)) continue;
        if (!graph.incoming(targetId).every((e) => isTerminalNodeStatus(this.statusOf(e.source)))) continue;

        if (this.isRunnable(targetId)) {
          this.enqueue(targetId);
        } else {
          const at = this.options.context.now().toISOString();
          await this.record({ ...this.resultOf(targetId), status: NodeRunStatus.Skipped, finishedAt: at });
          logger.debug('Node skipped', { nodeId: targetId });
          worklist.push(targetId);
        }
      }
    }
  }

  /**
   * Readiness once all sources are terminal: every control edge satisfied,
   * no failed data source, and at least one satisfied data edge when the
   * node has any. Context edges never gate.
   */
  private isRunnable(nodeId: string): boolean {
    const { graph } = this.options;
    if (!graph.incoming(nodeId, 'control').every((e) => this.edgeSatisfied(e))) return false;

    const data = graph.incoming(nodeId, 'data');
    if (data.some((e) => this.statusOf(e.source) === NodeRunStatus.Failed)) return false;
    return data.length === 0 || data.some((e) => this.edgeSatisfied(e));
  }

  private edgeSatisfied(edge: Edge): boolean {
    const source = this.resultOf(edge.source);
    if (source.status !== NodeRunStatus.Completed) return false;
    if (source.kind === 'conditional') return source.branchLabel === (edge.sourcePort ?? 'true');
    if (edge.type === 'control') return Boolean(this.options.context.valueOf(edge.source));
    return true;
  }

  private resolveInputs(nodeId: string): ResolvedInputs {
    const { graph, context } = this.options;
    const satisfied = graph.incoming(nodeId, 'data').filter((e) => this.edgeSatisfied(e));
    const values: Record<string, unknown> = {};
    for (const edge of satisfied) {
      values[edge.targetPort ?? edge.source] = context.valueOf(edge.source);
    }

    let primary: unknown;
    if (satisfied.length === 1) primary = context.valueOf(satisfied[0].source);
    else if (satisfied.length > 1) primary = values;
    return { values, primary };
  }

  /**
   * Halt dispatch once no output node has completed and none still can.
   */
  private checkOutputsReachable(): void {
    if (this.halted) return;
    const outputs = this.options.graph.outputNodes();
    if (outputs.some((n) => this.statusOf(n.id) === NodeRunStatus.Completed)) return;

    const memo = new Map<string, boolean>();
    if (outputs.every((n) => !this.canComplete(n.id, memo))) {
      this.halted = true;
      this.options.logger.warn('No output node can complete; halting dispatch');
    }
  }

  private canComplete(nodeId: string, memo: Map<string, boolean>): boolean {
    const known = memo.get(nodeId);
    if (known !== undefined) return known;

    const status = this.statusOf(nodeId);
    let result: boolean;
    if (status === NodeRunStatus.Completed || status === NodeRunStatus.Running) {
      result = true;
    } else if (status !== NodeRunStatus.Pending) {
      result = false;
    } else {
      const { graph } = this.options;
      const edgeCan = (e: Edge): boolean =>
        this.statusOf(e.source) === NodeRunStatus.Completed ? this.edgeSatisfied(e) : this.canComplete(e.source, memo);
      const data = graph.incoming(nodeId, 'data');
      result =
        graph.incoming(nodeId, 'control').every(edgeCan) &&
        !data.some((e) => this.statusOf(e.source) === NodeRunStatus.Failed) &&
        (data.length === 0 || data.some(edgeCan));
    }

    memo.set(nodeId, result);
    return result;
  }

  // ─── loops ────────────────────────────────────────────────────────────────

  /** One loop iteration as an isolated sub-run over the loop's body graph. */
  private async runLoopBody(nodeId: string, input: IterationInput, signal: AbortSignal): Promise<IterationResult> {
    const { graph, context, logger } = this.options;
    const node = this.nodeOf(nodeId);
    const body = graph.loopBody(nodeId);
    if (node.kind !== 'loop' || !body) {
      throw new FatalNodeError(nodeFatalError('LOOP.BODY_MISSING', `Loop "${nodeId}" has no compiled body`, nodeId));
    }

    const key = node.config.accumulatorKey;
    const iterationContext = context.createChild(
      `${context.runId}/${nodeId}#${input.iteration}`,
      key !== undefined ? { [key]: input.accumulator } : {},
      signal,
    );
    const inputs: Record<string, unknown> = {};
    for (const inputNode of body.inputNodes()) inputs[inputNode.id] = input.value;

    const iterationLogger = logger.child({ loopNodeId: nodeId, iteration: input.iteration });
    iterationLogger.debug('Loop iteration started');

    const result = await new GraphRunner({
      ...this.options,
      graph: body,
      context: iterationContext,
      inputs,
      logger: iterationLogger,
      onNodeUpdate: undefined,
      slots: this.slots,
    }).run();

    if (result.status === RunStatus.Cancelled) {
      throw new CancellationError(context.runId);
    }
    if (result.status === RunStatus.Failed) {
      throw new FatalNodeError(
        nodeFatalError(
          'LOOP.BODY_FAILED',
          `Loop "${nodeId}" iteration ${input.iteration} failed: ${result.error?.message ?? 'unknown error'}`,
          nodeId,
          { iteration: input.iteration, cause: result.error },
        ),
      );
    }

    const accumulator =
      key !== undefined
        ? iterationContext.contextFor(body.executionOrder.filter((id) => iterationContext.has(id)))[key]
        : undefined;
    return { value: result.finalOutput, accumulator };
  }

  // ─── outcome ──────────────────────────────────────────────────────────────

  private finish(): GraphRunResult {
    const { graph, context } = this.options;
    const nodeResults = Object.fromEntries(this.results);

    if (context.cancelled) {
      return { status: RunStatus.Cancelled, error: runCanceledError(context.runId, context.cancelReason), nodeResults };
    }
    if (this.runError) {
      return { status: RunStatus.Failed, error: this.runError, nodeResults };
    }

    const outputs = graph.outputNodes().filter((n): n is OutputNode => n.kind === 'output');
    const completed = outputs.filter((n) => this.statusOf(n.id) === NodeRunStatus.Completed);
    if (completed.length === 0) {
      return { status: RunStatus.Failed, error: this.noOutputError(), nodeResults };
    }

    const finalOutput =
      outputs.length === 1
        ? context.valueOf(outputs[0].id)
        : Object.fromEntries(completed.map((n) => [n.config.key ?? n.id, context.valueOf(n.id)]));
    return { status: RunStatus.Completed, finalOutput, nodeResults };
  }

  /** The first recorded node failure, or a generic error if none failed. */
  private noOutputError(): TypedError {
    const failed = [...this.results.values()].filter((r) => r.status === NodeRunStatus.Failed);
    const cause = failed.find((r) => r.error)?.error;
    return createTypedError({
      code: 'RUN.NO_OUTPUT',
      message: cause
        ? `No output node completed; node "${cause.nodeId ?? failed[0].nodeId}" failed: ${cause.message}`
        : 'No output node completed',
      runId: this.options.context.runId,
      retryable: cause?.retryable ?? false,
      classification: cause?.classification ?? 'fatal',
      details: { failedNodes: failed.map((r) => r.nodeId), cause },
    });
  }

  // ─── bookkeeping ──────────────────────────────────────────────────────────

  private async record(result: NodeResult): Promise<void> {
    this.results.set(result.nodeId, result);
    if (this.options.onNodeUpdate) {
      await this.options.onNodeUpdate({ ...result });
    }
  }

  private resultOf(nodeId: string): NodeResult {
    const result = this.results.get(nodeId);
    if (!result) {
      throw new FatalNodeError(nodeFatalError('NODE.UNKNOWN', `Unknown node "${nodeId}"`, nodeId));
    }
    return result;
  }

  private statusOf(nodeId: string): NodeRunStatus {
    return this.resultOf(nodeId).status;
  }

  private nodeOf(nodeId: string): WorkflowNode {
    const node = this.options.graph.node(nodeId);
    if (!node) {
      throw new FatalNodeError(nodeFatalError('NODE.UNKNOWN', `Unknown node "${nodeId}"`, nodeId));
    }
    return node;
  }
}
