/**
 * Shared builders for test workflows and an in-process agent invoker.
 */

import {
  AgentNode,
  AgentNodeConfig,
  ConditionalNode,
  Edge,
  InputNode,
  InputNodeConfig,
  LoopNode,
  LoopNodeConfig,
  OutputNode,
  TransformNode,
  Workflow,
  WorkflowNode,
} from '../src/domain/workflow';
import { AgentInvoker, AgentProfile, AgentResponse, PromptContext } from '../src/agents/invoker';
import { LogEntry, resetLogHandler, setLogHandler } from '../src/logger';

export const inputNode = (id: string, config: InputNodeConfig = {}): InputNode => ({ id, kind: 'input', config });

export const outputNode = (id: string, key?: string): OutputNode => ({
  id,
  kind: 'output',
  config: key !== undefined ? { key } : {},
});

export const transformNode = (id: string, fn: string, args?: Record<string, unknown>): TransformNode => ({
  id,
  kind: 'transform',
  config: args ? { fn, args } : { fn },
});

export const conditionalNode = (id: string, expression: string): ConditionalNode => ({
  id,
  kind: 'conditional',
  config: { expression },
});

export const loopNode = (id: string, config: LoopNodeConfig): LoopNode => ({ id, kind: 'loop', config });

export const agentNode = (id: string, config: AgentNodeConfig): AgentNode => ({ id, kind: 'agent', config });

export function dataEdge(id: string, source: string, target: string, extra: Partial<Edge> = {}): Edge {
  return { id, source, target, type: 'data', ...extra };
}

export function controlEdge(id: string, source: string, target: string, extra: Partial<Edge> = {}): Edge {
  return { id, source, target, type: 'control', ...extra };
}

export function contextEdge(id: string, source: string, target: string): Edge {
  return { id, source, target, type: 'context' };
}

export function makeWorkflow(nodes: WorkflowNode[], edges: Edge[], id = 'wf_test'): Workflow {
  return { id, name: 'Test Workflow', nodes, edges };
}

/** input -> uppercase -> output */
export function greetingWorkflow(id = 'wf_greeting'): Workflow {
  return makeWorkflow(
    [inputNode('greeting'), transformNode('upper', 'uppercase'), outputNode('result')],
    [dataEdge('e1', 'greeting', 'upper'), dataEdge('e2', 'upper', 'result')],
    id,
  );
}

export const TEST_AGENT: AgentProfile = { id: 'writer', model: 'test-model' };

export interface RecordedCall {
  profile: AgentProfile;
  prompt: PromptContext;
}

type ScriptStep = AgentResponse | Error | ((prompt: PromptContext, signal: AbortSignal) => Promise<AgentResponse>);

/**
 * Replays scripted responses in order; the last step repeats once the
 * script runs out.
 */
export class ScriptedInvoker implements AgentInvoker {
  readonly calls: RecordedCall[] = [];
  private readonly steps: ScriptStep[];

  constructor(...steps: ScriptStep[]) {
    this.steps = steps;
  }

  async invoke(profile: AgentProfile, prompt: PromptContext, signal: AbortSignal): Promise<AgentResponse> {
    this.calls.push({ profile, prompt });
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    if (step === undefined) return reply('');
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(prompt, signal);
    return step;
  }
}

export function reply(text: string, promptTokens = 1, completionTokens = 1): AgentResponse {
  return { text, usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens } };
}

/** Rejects when the signal aborts; never settles otherwise. */
export function untilAborted(signal: AbortSignal): Promise<AgentResponse> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

/** Route log output into an array for the duration of a test file. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  beforeEach(() => {
    entries.length = 0;
    setLogHandler((entry) => entries.push(entry));
  });
  afterEach(() => resetLogHandler());
  return entries;
}
