import { ValidationOptions, validateWorkflow } from '../../src/dsl/validator';
import { Workflow } from '../../src/domain/workflow';
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

function codes(workflow: Partial<Workflow>, options: ValidationOptions = {}): string[] {
  return validateWorkflow(workflow, options).errors.map((e) => e.code);
}

/** A definition as it arrives over the wire, unchecked. */
function fromWire(value: unknown): Partial<Workflow> {
  return JSON.parse(JSON.stringify(value));
}

describe('Graph Validator', () => {
  test('valid workflow passes validation', () => {
    const result = validateWorkflow(greetingWorkflow());
    expect(result.valid).toBe(true);
    expect(result.errors).toHaveLength(0);
    expect(result.warnings).toHaveLength(0);
  });

  test('missing required fields produces one error per field', () => {
    const result = validateWorkflow({});
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual([
      'VALIDATION.REQUIRED_FIELD',
      'VALIDATION.REQUIRED_FIELD',
      'VALIDATION.REQUIRED_FIELD',
      'VALIDATION.REQUIRED_FIELD',
    ]);
    expect(result.errors[0].details).toBeUndefined();
    expect(result.errors.every((e) => e.classification === 'validation')).toBe(true);
  });

  test('empty graph is rejected', () => {
    expect(codes(makeWorkflow([], []))).toEqual(['VALIDATION.EMPTY_GRAPH']);
  });

  test('workflow without an output node is rejected', () => {
    const wf = makeWorkflow([inputNode('a'), transformNode('b', 'identity')], [dataEdge('e1', 'a', 'b')]);
    expect(codes(wf)).toEqual(['VALIDATION.NO_OUTPUT_NODE']);
  });

  test('detects a data cycle and names the closing edge', () => {
    const wf = makeWorkflow(
      [inputNode('in'), transformNode('a', 'identity'), transformNode('b', 'identity'), outputNode('out')],
      [
        dataEdge('e0', 'in', 'a'),
        dataEdge('e1', 'a', 'b'),
        dataEdge('e2', 'b', 'a'),
        dataEdge('e3', 'b', 'out'),
      ],
    );
    const result = validateWorkflow(wf);
    const cycle = result.errors.find((e) => e.code === 'VALIDATION.CYCLE_DETECTED');
    expect(cycle?.edgeId).toBe('e2');
    expect(cycle?.nodeId).toBe('a');
    expect(cycle?.details?.cycle).toEqual(['a', 'b', 'a']);
  });

  test('cycles through context edges are reported separately', () => {
    const wf = makeWorkflow(
      [inputNode('in'), transformNode('a', 'identity'), outputNode('out')],
      [dataEdge('e1', 'in', 'a'), dataEdge('e2', 'a', 'out'), contextEdge('c1', 'out', 'in')],
    );
    const result = validateWorkflow(wf);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].code).toBe('VALIDATION.CONTEXT_CYCLE');
    expect(result.errors[0].edgeId).toBe('c1');
  });

  test('agent nodes must reference an agent', () => {
    const wf = makeWorkflow(
      [inputNode('in'), agentNode('ask', { agentId: '' }), outputNode('out')],
      [dataEdge('e1', 'in', 'ask'), dataEdge('e2', 'ask', 'out')],
    );
    const result = validateWorkflow(wf);
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.AGENT_REFERENCE_MISSING']);
    expect(result.errors[0].nodeId).toBe('ask');
  });

  test('agent attempts and timeout are range checked', () => {
    const wf = makeWorkflow(
      [inputNode('in'), agentNode('ask', { agentId: 'writer', maxAttempts: 0, timeoutMs: -5 }), outputNode('out')],
      [dataEdge('e1', 'in', 'ask'), dataEdge('e2', 'ask', 'out')],
    );
    expect(codes(wf)).toEqual(['VALIDATION.INVALID_ATTEMPTS', 'VALIDATION.INVALID_TIMEOUT']);
  });

  test('loops need a bound', () => {
    const body = makeWorkflow([inputNode('x'), outputNode('y')], [dataEdge('b1', 'x', 'y')]);
    const wf = makeWorkflow(
      [inputNode('in'), loopNode('loop', { body }), outputNode('out')],
      [dataEdge('e1', 'in', 'loop'), dataEdge('e2', 'loop', 'out')],
    );
    const result = validateWorkflow(wf);
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.UNBOUNDED_LOOP']);
    expect(result.errors[0].nodeId).toBe('loop');
  });

  test('loop bounds must be positive integers within the engine cap', () => {
    const body = makeWorkflow([inputNode('x'), outputNode('y')], [dataEdge('b1', 'x', 'y')]);
    const build = (maxIterations: number) =>
      makeWorkflow(
        [inputNode('in'), loopNode('loop', { body, maxIterations }), outputNode('out')],
        [dataEdge('e1', 'in', 'loop'), dataEdge('e2', 'loop', 'out')],
      );
    expect(codes(build(0))).toEqual(['VALIDATION.INVALID_LOOP_BOUND']);
    expect(codes(build(2.5))).toEqual(['VALIDATION.INVALID_LOOP_BOUND']);
    expect(codes(build(50), { maxLoopIterations: 10 })).toEqual(['VALIDATION.LOOP_BOUND_TOO_HIGH']);
    expect(codes(build(10), { maxLoopIterations: 10 })).toEqual([]);
  });

  test('loop body issues are reported against the loop node', () => {
    const body = makeWorkflow([inputNode('x'), transformNode('t', 'identity')], [dataEdge('b1', 'x', 't')]);
    const wf = makeWorkflow(
      [inputNode('in'), loopNode('loop', { body, maxIterations: 2 }), outputNode('out')],
      [dataEdge('e1', 'in', 'loop'), dataEdge('e2', 'loop', 'out')],
    );
    const result = validateWorkflow(wf);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0].code).toBe('VALIDATION.NO_OUTPUT_NODE');
    expect(result.errors[0].nodeId).toBe('loop');
    expect(result.errors[0].message).toBe('Loop "loop" body: Workflow must declare at least one output node');
    expect(result.warnings).toContain('Loop "loop" body: Node "t" has no outgoing edges; its result is recorded but never consumed');
  });

  test('entries that are not objects are reported by index', () => {
    const wf = greetingWorkflow();
    const result = validateWorkflow(fromWire({ ...wf, nodes: [...wf.nodes, null], edges: [...wf.edges, 7] }));

    expect(result.errors.map((e) => [e.code, e.message, e.details])).toEqual([
      ['VALIDATION.INVALID_NODE', 'Node at index 3 must be an object', { index: 3 }],
      ['VALIDATION.INVALID_EDGE', 'Edge at index 2 must be an object', { index: 2 }],
    ]);
  });

  test('input types must be one of the known names', () => {
    const wf = greetingWorkflow();
    const withType = (type: unknown) =>
      fromWire({ ...wf, nodes: [{ id: 'greeting', kind: 'input', config: { type } }, ...wf.nodes.slice(1)] });

    expect(codes(withType('date'))).toEqual(['VALIDATION.INVALID_INPUT_TYPE']);
    expect(codes(withType(7))).toEqual(['VALIDATION.INVALID_INPUT_TYPE']);
    expect(codes(withType('number'))).toEqual([]);
  });

  test('non-object entries in a loop body are reported against the loop node', () => {
    const result = validateWorkflow(
      fromWire({
        id: 'wf_test',
        name: 'Test Workflow',
        nodes: [
          inputNode('in'),
          { id: 'loop', kind: 'loop', config: { maxIterations: 2, body: { nodes: [null], edges: ['x'] } } },
          outputNode('out'),
        ],
        edges: [dataEdge('e1', 'in', 'loop'), dataEdge('e2', 'loop', 'out')],
      }),
    );

    expect(result.errors[0]).toMatchObject({
      code: 'VALIDATION.INVALID_NODE',
      nodeId: 'loop',
      message: 'Loop "loop" body: Node at index 0 must be an object',
    });
    expect(result.errors.map((e) => e.code)).toContain('VALIDATION.INVALID_EDGE');
  });

  test('edges must reference existing nodes', () => {
    const wf = makeWorkflow([inputNode('in'), outputNode('out')], [dataEdge('e1', 'in', 'out'), dataEdge('e2', 'in', 'ghost')]);
    const result = validateWorkflow(wf);
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.UNKNOWN_EDGE_ENDPOINT']);
    expect(result.errors[0].edgeId).toBe('e2');
    expect(result.errors[0].details).toEqual({ endpoint: 'target', nodeId: 'ghost' });
  });

  test('duplicate ids and self edges are rejected', () => {
    const wf = makeWorkflow(
      [inputNode('in'), inputNode('in'), outputNode('out')],
      [dataEdge('e1', 'in', 'out'), dataEdge('e1', 'in', 'out'), controlEdge('e2', 'out', 'out')],
    );
    expect(codes(wf)).toEqual([
      'VALIDATION.DUPLICATE_NODE_ID',
      'VALIDATION.DUPLICATE_EDGE_ID',
      'VALIDATION.SELF_EDGE',
    ]);
  });

  test('branch ports are only allowed on conditional nodes', () => {
    const wf = makeWorkflow(
      [inputNode('in'), outputNode('out')],
      [dataEdge('e1', 'in', 'out', { sourcePort: 'true' })],
    );
    const result = validateWorkflow(wf);
    expect(result.errors[0].code).toBe('VALIDATION.INVALID_PORT');
    expect(result.errors[0].nodeId).toBe('in');
  });

  test('input nodes cannot receive data edges', () => {
    const wf = makeWorkflow(
      [inputNode('a'), inputNode('b'), outputNode('out')],
      [dataEdge('e1', 'a', 'b'), dataEdge('e2', 'b', 'out')],
    );
    expect(codes(wf)).toEqual(['VALIDATION.INPUT_HAS_DATA_EDGE']);
  });

  test('conditionals need one true and one false data edge', () => {
    const wf = makeWorkflow(
      [inputNode('x'), conditionalNode('check', 'x > 0'), outputNode('pos')],
      [dataEdge('e1', 'x', 'check'), dataEdge('e2', 'check', 'pos', { sourcePort: 'true' })],
    );
    const result = validateWorkflow(wf);
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.CONDITIONAL_BRANCHES']);
    expect(result.errors[0].details).toEqual({ dataEdgeCount: 1, labels: ['true'] });
  });

  test('conditional expressions must compile', () => {
    const wf = makeWorkflow(
      [inputNode('x'), conditionalNode('check', 'x >'), outputNode('pos'), outputNode('neg')],
      [
        dataEdge('e1', 'x', 'check'),
        dataEdge('e2', 'check', 'pos', { sourcePort: 'true' }),
        dataEdge('e3', 'check', 'neg', { sourcePort: 'false' }),
      ],
    );
    expect(codes(wf)).toEqual(['VALIDATION.INVALID_EXPRESSION']);
  });

  test('nodes that need input and have no path from an input are unreachable', () => {
    const wf = makeWorkflow(
      [inputNode('in'), transformNode('orphan', 'identity'), outputNode('out')],
      [dataEdge('e1', 'in', 'out'), dataEdge('e2', 'orphan', 'out')],
    );
    const result = validateWorkflow(wf);
    expect(result.errors.map((e) => e.code)).toEqual(['VALIDATION.UNREACHABLE_NODE']);
    expect(result.errors[0].nodeId).toBe('orphan');
  });

  test('an agent with a prompt template is a valid root', () => {
    const wf = makeWorkflow(
      [agentNode('ask', { agentId: 'writer', prompt: 'Say hello' }), outputNode('out')],
      [dataEdge('e1', 'ask', 'out')],
    );
    expect(validateWorkflow(wf).valid).toBe(true);
  });

  test('unknown transforms are reported only when names are supplied', () => {
    const wf = makeWorkflow(
      [inputNode('in'), transformNode('t', 'reverse'), outputNode('out')],
      [dataEdge('e1', 'in', 't'), dataEdge('e2', 't', 'out')],
    );
    expect(codes(wf)).toEqual([]);
    expect(codes(wf, { transformNames: ['uppercase'] })).toEqual(['VALIDATION.UNKNOWN_TRANSFORM']);
  });

  test('dangling non-output nodes produce a warning, not an error', () => {
    const wf = makeWorkflow(
      [inputNode('in'), transformNode('side', 'identity'), outputNode('out')],
      [dataEdge('e1', 'in', 'out'), dataEdge('e2', 'in', 'side')],
    );
    const result = validateWorkflow(wf);
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['Node "side" has no outgoing edges; its result is recorded but never consumed']);
  });
});
