/**
 * Node executors, one per node kind.
 *
 * executeNode() is the single dispatch point: an exhaustive switch over the
 * closed node union, so adding a kind is a compile error until it has an
 * executor. Each executor runs exactly one attempt; retry and timeout
 * policy live in the node runner.
 */

import {
  CancellationError,
  EngineError,
  FatalNodeError,
  InputError,
  TransientNodeError,
  createTypedError,
  errorMessage,
  inputMissingError,
  inputTypeError,
  nodeFatalError,
} from '../domain/errors';
import { TokenUsage } from '../domain/run';
import {
  AgentNode,
  BranchLabel,
  ConditionalNode,
  InputNode,
  LoopNode,
  OutputNode,
  TransformNode,
  WorkflowNode,
} from '../domain/workflow';
import { AgentInvocationError, AgentInvoker, AgentProfile, AgentResponse, ConversationTurn } from '../agents/invoker';
import { ExpressionError, evaluatePredicate } from './expressions';
import { TransformRegistry, renderTemplate } from './transforms';

/** Inputs resolved from a node's satisfied data edges. */
export interface ResolvedInputs {
  /** Slot name to value, in edge declaration order. */
  values: Record<string, unknown>;
  /** The sole value when exactly one data edge is satisfied, else `values`; undefined when none. */
  primary: unknown;
}

/** What a node produces on success. */
export interface NodeOutcome {
  value: unknown;
  branchLabel?: BranchLabel;
  contextPatch?: Record<string, unknown>;
  usage?: TokenUsage;
  iterations?: number;
}

/** State handed to one loop iteration. */
export interface IterationInput {
  iteration: number;
  value: unknown;
  accumulator: unknown;
}

export interface IterationResult {
  value: unknown;
  accumulator: unknown;
}

/** Runs a loop body once as an isolated sub-run. */
export type LoopBodyRunner = (node: LoopNode, input: IterationInput, signal: AbortSignal) => Promise<IterationResult>;

/** Run-scoped collaborators shared by every executor. */
export interface ExecutorServices {
  transforms: TransformRegistry;
  invoker: AgentInvoker;
  /** Agents resolved at run start. */
  agents: ReadonlyMap<string, AgentProfile>;
  expressionTimeoutMs: number;
  defaultMaxLoopIterations: number;
}

export interface NodeInvocation {
  node: WorkflowNode;
  inputs: ResolvedInputs;
  /** The node's context view. */
  context: Record<string, unknown>;
  runId: string;
  /** Submission values keyed by input node id. */
  runInputs: Record<string, unknown>;
  signal: AbortSignal;
  runLoopBody: LoopBodyRunner;
}

/** Execute a single attempt of a node. */
export async function executeNode(invocation: NodeInvocation, services: ExecutorServices): Promise<NodeOutcome> {
  const { node } = invocation;
  switch (node.kind) {
    case 'input':
      return executeInput(node, invocation);
    case 'output':
      return executeOutput(node, invocation);
    case 'transform':
      return executeTransform(node, invocation, services);
    case 'conditional':
      return executeConditional(node, invocation, services);
    case 'loop':
      return executeLoop(node, invocation, services);
    case 'agent':
      return executeAgent(node, invocation, services);
    default:
      return assertNever(node);
  }
}

function assertNever(node: never): never {
  throw new FatalNodeError(
    createTypedError({ code: 'NODE.UNKNOWN_KIND', message: `No executor for node ${JSON.stringify(node)}` }),
  );
}

// ─── input ──────────────────────────────────────────────────────────────────

function executeInput(node: InputNode, { runInputs }: NodeInvocation): NodeOutcome {
  const { required = true, defaultValue, type } = node.config;
  const supplied = Object.prototype.hasOwnProperty.call(runInputs, node.id);
  const value = supplied ? runInputs[node.id] : defaultValue;

  if (value === undefined) {
    if (required) throw new InputError(inputMissingError(node.id));
    return { value: null };
  }

  if (type) {
    const actual = valueType(value);
    if (actual !== type) throw new InputError(inputTypeError(node.id, type, actual));
  }
  return { value };
}

function valueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

// ─── output ─────────────────────────────────────────────────────────────────

function executeOutput(_node: OutputNode, { inputs }: NodeInvocation): NodeOutcome {
  return { value: inputs.primary };
}

// ─── transform ──────────────────────────────────────────────────────────────

async function executeTransform(
  node: TransformNode,
  { inputs }: NodeInvocation,
  { transforms }: ExecutorServices,
): Promise<NodeOutcome> {
  const fn = transforms.get(node.config.fn);
  if (!fn) {
    throw new FatalNodeError(
      nodeFatalError('NODE.UNKNOWN_TRANSFORM', `Transform function "${node.config.fn}" is not registered`, node.id),
    );
  }

  try {
    const value = await fn(inputs.primary, node.config.args ?? {}, { inputs: inputs.values });
    return { value };
  } catch (err) {
    if (err instanceof EngineError) {
      throw new FatalNodeError({ ...err.typedError, nodeId: node.id });
    }
    throw new FatalNodeError(
      nodeFatalError('NODE.TRANSFORM_FAILED', `Transform "${node.config.fn}" failed: ${errorMessage(err)}`, node.id),
    );
  }
}

// ─── conditional ────────────────────────────────────────────────────────────

function executeConditional(
  node: ConditionalNode,
  { inputs, context }: NodeInvocation,
  { expressionTimeoutMs }: ExecutorServices,
): NodeOutcome {
  const scope = { ...inputs.values, input: inputs.primary, inputs: inputs.values, context };
  const taken = evaluateOrFail(node.id, () => evaluatePredicate(node.config.expression, scope, expressionTimeoutMs));
  return { value: inputs.primary, branchLabel: taken ? 'true' : 'false' };
}

function evaluateOrFail<T>(nodeId: string, evaluate: () => T): T {
  try {
    return evaluate();
  } catch (err) {
    if (err instanceof ExpressionError) {
      throw new FatalNodeError(
        nodeFatalError('NODE.EXPRESSION_FAILED', err.message, nodeId, { expression: err.expression }),
      );
    }
    throw err;
  }
}

// ─── loop ───────────────────────────────────────────────────────────────────

async function executeLoop(
  node: LoopNode,
  { inputs, context, signal, runId, runLoopBody }: NodeInvocation,
  { expressionTimeoutMs, defaultMaxLoopIterations }: ExecutorServices,
): Promise<NodeOutcome> {
  const { maxIterations, until, accumulatorKey } = node.config;
  const bound = maxIterations ?? defaultMaxLoopIterations;

  let value = inputs.primary;
  let accumulator = accumulatorKey !== undefined ? context[accumulatorKey] : undefined;
  const patch = (): Record<string, unknown> | undefined =>
    accumulatorKey !== undefined ? { [accumulatorKey]: accumulator } : undefined;

  for (let iteration = 1; iteration <= bound; iteration++) {
    if (signal.aborted) throw new CancellationError(runId);

    const result = await runLoopBody(node, { iteration, value, accumulator }, signal);
    value = result.value;
    accumulator = result.accumulator;

    if (until !== undefined) {
      const done = evaluateOrFail(node.id, () =>
        evaluatePredicate(until, { value, iteration, accumulator }, expressionTimeoutMs),
      );
      if (done) return { value, iterations: iteration, contextPatch: patch() };
    }
  }

  if (until !== undefined) {
    throw new FatalNodeError(
      nodeFatalError(
        'LOOP.BOUND_EXCEEDED',
        `Loop "${node.id}" did not satisfy its until condition within ${bound} iterations`,
        node.id,
        { bound, until },
      ),
    );
  }
  return { value, iterations: bound, contextPatch: patch() };
}

// ─── agent ──────────────────────────────────────────────────────────────────

async function executeAgent(
  node: AgentNode,
  { inputs, context, signal }: NodeInvocation,
  { invoker, agents }: ExecutorServices,
): Promise<NodeOutcome> {
  const { agentId, prompt: template, systemPrompt, memoryKey } = node.config;
  const profile = agents.get(agentId);
  if (!profile) {
    throw new FatalNodeError(
      nodeFatalError('AGENT.UNRESOLVED', `Agent "${agentId}" was not resolved for this run`, node.id, { agentId }),
    );
  }

  const prompt =
    template !== undefined
      ? renderTemplate(template, { ...inputs.values, input: inputs.primary, context })
      : promptText(inputs.primary);
  const history = memoryKey !== undefined ? readHistory(context[memoryKey]) : [];

  let response: AgentResponse;
  try {
    response = await invoker.invoke(profile, { prompt, systemPrompt, context, history }, signal);
  } catch (err) {
    if (signal.aborted || err instanceof EngineError) throw err;
    if (err instanceof AgentInvocationError) {
      const typed = err.toTypedError(node.id);
      throw typed.retryable ? new TransientNodeError(typed) : new FatalNodeError(typed);
    }
    throw new FatalNodeError(
      nodeFatalError('AGENT.INVOCATION_FAILED', `Agent "${agentId}" failed: ${errorMessage(err)}`, node.id),
    );
  }

  const contextPatch =
    memoryKey !== undefined
      ? {
          [memoryKey]: [
            ...history,
            { role: 'user', content: prompt },
            { role: 'assistant', content: response.text },
          ] satisfies ConversationTurn[],
        }
      : undefined;

  return { value: response.text, usage: response.usage, contextPatch };
}

function promptText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return '';
  return JSON.stringify(value);
}

/** Keep only well-formed turns from a context value. */
function readHistory(value: unknown): ConversationTurn[] {
  if (!Array.isArray(value)) return [];
  const items: unknown[] = value;
  const turns: ConversationTurn[] = [];
  for (const item of items) {
    if (typeof item !== 'object' || item === null) continue;
    const role: unknown = Reflect.get(item, 'role');
    const content: unknown = Reflect.get(item, 'content');
    if ((role === 'user' || role === 'assistant') && typeof content === 'string') {
      turns.push({ role, content });
    }
  }
  return turns;
}

