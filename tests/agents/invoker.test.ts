import {
  AgentInvocationError,
  AgentProfile,
  createStaticAgentDirectory,
  parseAgentProfiles,
  resolveAgents,
} from '../../src/agents/invoker';
import { ValidationError } from '../../src/domain/errors';

describe('AgentInvocationError', () => {
  test('server errors are transient', () => {
    const typed = new AgentInvocationError('bad gateway', 502).toTypedError('ask');
    expect(typed).toMatchObject({
      code: 'AGENT.PROVIDER_ERROR',
      message: 'bad gateway',
      nodeId: 'ask',
      retryable: true,
      classification: 'transient',
      details: { statusCode: 502 },
    });
  });

  test('client errors are fatal and auth failures suggest checking the key', () => {
    const typed = new AgentInvocationError('unauthorized', 401).toTypedError();
    expect(typed.retryable).toBe(false);
    expect(typed.classification).toBe('fatal');
    expect(typed.suggestedFixes.map((f) => f.type)).toEqual(['CHECK_API_KEY']);
  });

  test('no status means the endpoint was unreachable', () => {
    expect(new AgentInvocationError('refused').toTypedError().code).toBe('AGENT.UNAVAILABLE');
  });
});

describe('resolveAgents', () => {
  const writer: AgentProfile = { id: 'writer', model: 'm1' };

  test('resolves every id through the directory', async () => {
    const resolved = await resolveAgents(createStaticAgentDirectory([writer]), ['writer']);
    expect([...resolved.entries()]).toEqual([['writer', writer]]);
  });

  test('accepts asynchronous directories', async () => {
    const directory = { resolve: async (id: string) => (id === 'writer' ? writer : undefined) };
    expect((await resolveAgents(directory, ['writer'])).get('writer')).toBe(writer);
  });

  test('reports every unknown id at once', async () => {
    const err = await resolveAgents(createStaticAgentDirectory([writer]), ['ghost', 'writer', 'phantom']).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(ValidationError);
    if (err instanceof ValidationError) {
      expect(err.message).toBe('Workflow references unknown agents');
      expect(err.issues.map((i) => i.details)).toEqual([{ agentId: 'ghost' }, { agentId: 'phantom' }]);
    }
  });
});

describe('parseAgentProfiles', () => {
  test('keeps known fields of the right type', () => {
    expect(
      parseAgentProfiles([
        { id: 'writer', model: 'm1', temperature: 0.3, maxTokens: '100', extra: true },
        { id: 'critic', model: 'm2', name: 'Critic', baseUrl: 'http://critic.test' },
      ]),
    ).toEqual([
      { id: 'writer', model: 'm1', temperature: 0.3 },
      { id: 'critic', model: 'm2', name: 'Critic', baseUrl: 'http://critic.test' },
    ]);
  });

  test('rejects malformed entries', () => {
    expect(() => parseAgentProfiles({ id: 'writer' })).toThrow('Agent profiles must be a JSON array');
    expect(() => parseAgentProfiles([null])).toThrow('Agent profile #0 must be an object');
    expect(() => parseAgentProfiles([{ model: 'm1' }])).toThrow('Agent profile #0 is missing "id"');
    expect(() => parseAgentProfiles([{ id: 'writer' }])).toThrow('Agent profile "writer" is missing "model"');
  });
});
