/**
 * Agent Invoker boundary.
 *
 * Turning an agent node into a model completion is delegated to an
 * injected AgentInvoker. Agent identities are resolved once per run
 * through an AgentDirectory, never looked up ad hoc by a node.
 */

import { TypedError, ValidationError, agentProviderError, createTypedError } from '../domain/errors';
import { TokenUsage } from '../domain/run';

/** A resolvable agent identity. */
export interface AgentProfile {
  id: string;
  name?: string;
  model: string;
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  /** Per-agent endpoint override. */
  baseUrl?: string;
}

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

/** Everything the invoker needs to produce one completion. */
export interface PromptContext {
  prompt: string;
  systemPrompt?: string;
  /** The node's context view. */
  context: Record<string, unknown>;
  /** Prior conversation turns shared along context edges. */
  history: ConversationTurn[];
}

export interface AgentResponse {
  text: string;
  usage: TokenUsage;
}

export interface AgentInvoker {
  invoke(profile: AgentProfile, prompt: PromptContext, signal: AbortSignal): Promise<AgentResponse>;
}

export interface AgentDirectory {
  resolve(agentId: string): AgentProfile | undefined | Promise<AgentProfile | undefined>;
}

/**
 * Provider failure raised by an invoker. Whether it is worth retrying
 * follows the HTTP status: 429, 5xx and connection failures are transient.
 */
export class AgentInvocationError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'AgentInvocationError';
  }

  toTypedError(nodeId?: string): TypedError {
    return { ...agentProviderError(this.message, this.statusCode), nodeId };
  }
}

/** Directory over a fixed list of profiles. */
export function createStaticAgentDirectory(profiles: AgentProfile[]): AgentDirectory {
  const byId = new Map(profiles.map((p) => [p.id, p]));
  return { resolve: (agentId) => byId.get(agentId) };
}

/**
 * Resolve every agent id a run needs. Unresolvable ids are rejected
 * together as a ValidationError.
 */
export async function resolveAgents(
  directory: AgentDirectory,
  agentIds: Iterable<string>,
): Promise<Map<string, AgentProfile>> {
  const resolved = new Map<string, AgentProfile>();
  const missing: TypedError[] = [];

  for (const agentId of agentIds) {
    const profile = await directory.resolve(agentId);
    if (profile) {
      resolved.set(agentId, profile);
    } else {
      missing.push(
        createTypedError({
          code: 'VALIDATION.UNRESOLVED_AGENT',
          message: `Agent "${agentId}" could not be resolved`,
          classification: 'validation',
          details: { agentId },
          suggestedFixes: [{ type: 'REGISTER_AGENT', params: { agentId }, description: `Register an agent with id "${agentId}"` }],
        }),
      );
    }
  }

  if (missing.length > 0) {
    throw new ValidationError(missing, 'Workflow references unknown agents');
  }
  return resolved;
}

/** Parse a JSON list of agent profiles, e.g. from an agents file. */
export function parseAgentProfiles(raw: unknown): AgentProfile[] {
  if (!Array.isArray(raw)) {
    throw new Error('Agent profiles must be a JSON array');
  }
  return raw.map((entry: unknown, index) => {
    if (typeof entry !== 'object' || entry === null) {
      throw new Error(`Agent profile #${index} must be an object`);
    }
    const fields: object = entry;
    const read = (key: string): unknown => Reflect.get(fields, key);
    const [id, name, model, systemPrompt, temperature, maxTokens, baseUrl] = [
      read('id'),
      read('name'),
      read('model'),
      read('systemPrompt'),
      read('temperature'),
      read('maxTokens'),
      read('baseUrl'),
    ];
    if (typeof id !== 'string' || id.length === 0) throw new Error(`Agent profile #${index} is missing "id"`);
    if (typeof model !== 'string' || model.length === 0) throw new Error(`Agent profile "${id}" is missing "model"`);
    return {
      id,
      model,
      name: typeof name === 'string' ? name : undefined,
      systemPrompt: typeof systemPrompt === 'string' ? systemPrompt : undefined,
      temperature: typeof temperature === 'number' ? temperature : undefined,
      maxTokens: typeof maxTokens === 'number' ? maxTokens : undefined,
      baseUrl: typeof baseUrl === 'string' ? baseUrl : undefined,
    };
  });
}
