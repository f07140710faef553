import { compileWorkflow, topologicalSort } from '../../src/dsl/compiler';
import {
  agentNode,
  conditionalNode,
  contextEdge,
  controlEdge,
  dataEdge,
  greetingWorkflow,
  inputNode,
  loopNode,
  makeWorkflow,
  outputNode,
  transformNode,
} from '../fixtures';

describe('Workflow Compiler', () => {
  test('compiles a valid workflow into an indexed graph', () => {
    const result = compileWorkflow(greetingWorkflow());
    expect(result.success).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.graph?.executionOrder).toEqual(['greeting', 'upper', 'result']);
    expect(result.graph?.nodeIds).toEqual(['greeting', 'upper', 'result']);
    expect(result.workflowHash).toMatch(/^[0-9a-f]{64}$/);
  });

  test('hash depends only on nodes and edges', () => {
    const a = compileWorkflow(greetingWorkflow('wf_a'));
    const b = compileWorkflow({ ...greetingWorkflow('wf_b'), name: 'Renamed' });
    expect(a.workflowHash).toBe(b.workflowHash);
  });

  test('returns validation errors without a graph', () => {
    const result = compileWorkflow(makeWorkflow([inputNode('in')], []));
    expect(result.success).toBe(false);
    expect(result.graph).toBeUndefined();
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.NO_OUTPUT_NODE']);
  });

  test('execution order respects every edge type and keeps declaration order for ties', () => {
    const wf = makeWorkflow(
      [
        outputNode('out'),
        transformNode('b', 'identity'),
        transformNode('a', 'identity'),
        inputNode('in'),
      ],
      [
        dataEdge('e1', 'in', 'a'),
        dataEdge('e2', 'in', 'b'),
        contextEdge('c1', 'a', 'b'),
        dataEdge('e3', 'b', 'out'),
        controlEdge('k1', 'a', 'out'),
      ],
    );
    const result = compileWorkflow(wf);
    expect(result.graph?.executionOrder).toEqual(['in', 'a', 'b', 'out']);
  });

  test('topologicalSort returns null for a cycle', () => {
    const nodes = [transformNode('a', 'identity'), transformNode('b', 'identity')];
    expect(topologicalSort(nodes, [dataEdge('e1', 'a', 'b'), dataEdge('e2', 'b', 'a')])).toBeNull();
  });

  test('graph indexes edges by direction and type', () => {
    const wf = makeWorkflow(
      [
        inputNode('x'),
        conditionalNode('check', 'x > 0'),
        outputNode('pos'),
        outputNode('neg'),
      ],
      [
        dataEdge('e1', 'x', 'check'),
        dataEdge('e2', 'check', 'pos', { sourcePort: 'true' }),
        dataEdge('e3', 'check', 'neg', { sourcePort: 'false' }),
        contextEdge('c1', 'x', 'neg'),
      ],
    );
    const graph = compileWorkflow(wf).graph;
    expect(graph?.outgoing('check').map((e) => e.id)).toEqual(['e2', 'e3']);
    expect(graph?.incoming('neg').map((e) => e.id)).toEqual(['e3', 'c1']);
    expect(graph?.incoming('neg', 'context').map((e) => e.id)).toEqual(['c1']);
    expect(graph?.inputNodes().map((n) => n.id)).toEqual(['x']);
    expect(graph?.outputNodes().map((n) => n.id)).toEqual(['pos', 'neg']);
    expect(graph?.roots().map((n) => n.id)).toEqual(['x']);
  });

  test('loop bodies compile recursively and agent ids are collected from them', () => {
    const body = makeWorkflow(
      [inputNode('draft'), agentNode('revise', { agentId: 'editor' }), outputNode('next')],
      [dataEdge('b1', 'draft', 'revise'), dataEdge('b2', 'revise', 'next')],
    );
    const wf = makeWorkflow(
      [
        agentNode('write', { agentId: 'writer', prompt: 'Write a poem' }),
        loopNode('polish', { body, maxIterations: 3 }),
        outputNode('out'),
      ],
      [dataEdge('e1', 'write', 'polish'), dataEdge('e2', 'polish', 'out')],
    );

    const graph = compileWorkflow(wf).graph;
    const compiledBody = graph?.loopBody('polish');
    expect(compiledBody?.workflowId).toBe('wf_test/polish');
    expect(compiledBody?.executionOrder).toEqual(['draft', 'revise', 'next']);
    expect(graph?.loopNodes().map((n) => n.id)).toEqual(['polish']);
    expect([...(graph?.agentIds() ?? [])].sort()).toEqual(['editor', 'writer']);
  });
});
