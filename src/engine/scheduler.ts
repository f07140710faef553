/**
 * Workflow scheduler: the run lifecycle facade.
 *
 * Validates and compiles the workflow, resolves its agents, creates the
 * execution record and hands the graph to a GraphRunner. Submission returns
 * as soon as the run is marked running; execution continues in the
 * background and every state change lands in the ExecutionRecordStore.
 */

import { v4 as uuid } from 'uuid';
import {
  EngineError,
  ValidationError,
  createTypedError,
  errorMessage,
  notFoundError,
  runNotFoundError,
} from '../domain/errors';
import { RecordListener } from '../domain/events';
import { CreateRunInput, ExecutionRecord, RunStatus, RunSubmission } from '../domain/run';
import { Workflow } from '../domain/workflow';
import { AgentDirectory, AgentInvoker, AgentProfile, resolveAgents } from '../agents/invoker';
import { DEFAULT_ENGINE_SETTINGS, EngineSettings } from '../config';
import { WorkflowGraph } from '../dsl/graph';
import { compileWorkflow } from '../dsl/compiler';
import { ValidationResult, validateWorkflow } from '../dsl/validator';
import { ExecutionRecordStore, RecordHistoryEntry } from '../execution/record-store';
import { Logger, logger as rootLogger } from '../logger';
import { ListOptions, WorkflowStore } from '../storage/store';
import { ExecutionContext } from './context';
import { GraphRunner } from './graph-runner';
import { TransformRegistry, createDefaultTransformRegistry } from './transforms';

export interface SchedulerDependencies {
  workflows: WorkflowStore;
  records: ExecutionRecordStore;
  invoker: AgentInvoker;
  agents: AgentDirectory;
  transforms?: TransformRegistry;
  settings?: Partial<EngineSettings>;
  /** Jitter source for retry backoff. */
  random?: () => number;
  clock?: () => Date;
  logger?: Logger;
  generateRunId?: () => string;
}

interface ActiveRun {
  context: ExecutionContext;
  done: Promise<void>;
}

export class WorkflowScheduler {
  readonly settings: EngineSettings;
  readonly transforms: TransformRegistry;
  private readonly log: Logger;
  private readonly active = new Map<string, ActiveRun>();

  constructor(private readonly deps: SchedulerDependencies) {
    this.settings = { ...DEFAULT_ENGINE_SETTINGS, ...deps.settings };
    this.transforms = deps.transforms ?? createDefaultTransformRegistry();
    this.log = (deps.logger ?? rootLogger).child({ module: 'scheduler' });
  }

  /** Structural validation against this scheduler's transforms and limits. */
  validate(workflow: Partial<Workflow>): ValidationResult {
    return validateWorkflow(workflow, {
      transformNames: this.transforms.names(),
      maxLoopIterations: this.settings.maxLoopIterations,
    });
  }

  /** Validate and store a workflow definition. */
  async registerWorkflow(workflow: Workflow): Promise<Workflow> {
    const validation = this.validate(workflow);
    if (!validation.valid) {
      throw new ValidationError(validation.errors);
    }
    return this.deps.workflows.create(workflow);
  }

  async getWorkflow(workflowId: string): Promise<Workflow> {
    const workflow = await this.deps.workflows.getById(workflowId);
    if (!workflow) throw new EngineError(notFoundError('Workflow', workflowId));
    return workflow;
  }

  async listWorkflows(options?: ListOptions): Promise<Workflow[]> {
    return this.deps.workflows.list(options);
  }

  /**
   * Submit a run. Resolves once the run is recorded as running; rejects with
   * ValidationError for a malformed graph or unknown agent and with
   * EngineError when the workflow does not exist.
   */
  async submitRun(input: CreateRunInput): Promise<RunSubmission> {
    const workflow = await this.getWorkflow(input.workflowId);

    const compilation = compileWorkflow(workflow, {
      transformNames: this.transforms.names(),
      maxLoopIterations: this.settings.maxLoopIterations,
    });
    if (!compilation.success || !compilation.graph) {
      throw new ValidationError(compilation.errors);
    }
    const graph = compilation.graph;
    const agents = await resolveAgents(this.deps.agents, graph.agentIds());

    const runId = this.deps.generateRunId?.() ?? `run_${uuid()}`;
    const inputs = input.inputs ?? {};
    await this.deps.records.create(runId, workflow.id, {
      nodes: graph.nodes.map((n) => ({ id: n.id, kind: n.kind })),
      inputs,
    });

    const context = new ExecutionContext({
      workflowId: workflow.id,
      runId,
      initialContext: input.context,
      clock: this.deps.clock,
    });
    const record = await this.deps.records.transition(runId, { status: RunStatus.Running });

    const done = this.execute(graph, context, inputs, agents, compilation.workflowHash);
    this.active.set(runId, { context, done });

    return {
      runId,
      status: record.status,
      startTime: record.startTime ?? record.updatedAt,
    };
  }

  /** Submit a run and wait for its terminal record. */
  async runWorkflow(input: CreateRunInput): Promise<ExecutionRecord> {
    const { runId } = await this.submitRun(input);
    return this.waitForRun(runId);
  }

  /** Resolve with the record once the run is no longer executing. */
  async waitForRun(runId: string): Promise<ExecutionRecord> {
    const active = this.active.get(runId);
    if (active) await active.done;
    return this.getRun(runId);
  }

  /**
   * Request cancellation. Nodes not yet dispatched are never started and
   * in-flight nodes see their signal abort; one that finishes anyway is
   * still recorded completed. Returns the current record; a run that
   * already finished is left untouched.
   */
  async cancelRun(runId: string, reason?: string): Promise<ExecutionRecord> {
    const active = this.active.get(runId);
    if (!active) {
      return this.getRun(runId);
    }

    active.context.cancel(reason);
    this.log.info('Run cancellation requested', { runId, reason });
    return this.deps.records.transition(runId, { cancelRequested: true });
  }

  async getRun(runId: string): Promise<ExecutionRecord> {
    const record = await this.deps.records.get(runId);
    if (!record) throw new EngineError(runNotFoundError(runId));
    return record;
  }

  async listRuns(workflowId: string): Promise<ExecutionRecord[]> {
    return this.deps.records.list(workflowId);
  }

  async runHistory(runId: string): Promise<RecordHistoryEntry[]> {
    await this.getRun(runId);
    return this.deps.records.history(runId);
  }

  /** Observe a run's record changes. */
  subscribe(runId: string, listener: RecordListener): () => void {
    return this.deps.records.subscribe(runId, listener);
  }

  isActive(runId: string): boolean {
    return this.active.has(runId);
  }

  /** Runs the graph and records the outcome. Never rejects. */
  private async execute(
    graph: WorkflowGraph,
    context: ExecutionContext,
    inputs: Record<string, unknown>,
    agents: ReadonlyMap<string, AgentProfile>,
    workflowHash: string | undefined,
  ): Promise<void> {
    const { runId, workflowId } = context;
    const log = (this.deps.logger ?? rootLogger).child({ runId, workflowId });
    log.info('Run started', { nodes: graph.nodes.length, workflowHash });

    try {
      const result = await new GraphRunner({
        graph,
        context,
        inputs,
        services: {
          transforms: this.transforms,
          invoker: this.deps.invoker,
          agents,
          expressionTimeoutMs: this.settings.expressionTimeoutMs,
          defaultMaxLoopIterations: this.settings.defaultMaxLoopIterations,
        },
        settings: this.settings,
        random: this.deps.random ?? Math.random,
        logger: log,
        onNodeUpdate: async (nodeResult) => {
          await this.deps.records.update(runId, nodeResult);
        },
      }).run();

      await this.deps.records.transition(runId, {
        status: result.status,
        finalOutput: result.finalOutput,
        error: result.error,
      });
      if (result.status === RunStatus.Failed) {
        log.warn('Run failed', { code: result.error?.code, message: result.error?.message });
      } else {
        log.info('Run finished', { status: result.status });
      }
    } catch (err) {
      log.error('Run aborted by an internal error', { error: errorMessage(err) });
      await this.failUnexpectedly(runId, err, log);
    } finally {
      this.active.delete(runId);
    }
  }

  private async failUnexpectedly(runId: string, err: unknown, log: Logger): Promise<void> {
    try {
      await this.deps.records.transition(runId, {
        status: RunStatus.Failed,
        error:
          err instanceof EngineError
            ? err.typedError
            : createTypedError({ code: 'SYSTEM.INTERNAL', message: errorMessage(err), runId, classification: 'fatal' }),
      });
    } catch (recordErr) {
      log.error('Could not record run failure', { error: errorMessage(recordErr) });
    }
  }
}
