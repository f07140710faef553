/**
 * Agent invoker for any server exposing an OpenAI-compatible
 * `/v1/chat/completions` endpoint (OpenAI, vLLM, LocalAI, Ollama's
 * compatibility layer).
 */

import { AgentInvocationError, AgentInvoker, AgentProfile, AgentResponse, PromptContext } from './invoker';

export const DEFAULT_AGENT_BASE_URL = 'http://localhost:8000';

export interface OpenAICompatibleInvokerOptions {
  baseUrl?: string;
  apiKey?: string;
}

interface ChatCompletionRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  max_tokens?: number;
  temperature?: number;
}

interface ChatCompletion {
  content?: string;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

function field(value: unknown, key: string): unknown {
  return typeof value === 'object' && value !== null ? Reflect.get(value, key) : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

/** Pull the first choice's content and the usage block out of a response body. */
function readCompletion(payload: unknown): ChatCompletion {
  const choices = field(payload, 'choices');
  const first: unknown = Array.isArray(choices) ? choices[0] : undefined;
  const content = field(field(first, 'message'), 'content');
  const usage = field(payload, 'usage');
  return {
    content: typeof content === 'string' ? content : undefined,
    usage:
      usage === undefined
        ? undefined
        : {
            prompt_tokens: optionalNumber(field(usage, 'prompt_tokens')),
            completion_tokens: optionalNumber(field(usage, 'completion_tokens')),
            total_tokens: optionalNumber(field(usage, 'total_tokens')),
          },
  };
}

export function createOpenAICompatibleInvoker(options: OpenAICompatibleInvokerOptions = {}): AgentInvoker {
  return {
    async invoke(profile: AgentProfile, prompt: PromptContext, signal: AbortSignal): Promise<AgentResponse> {
      const baseUrl = (profile.baseUrl || options.baseUrl || DEFAULT_AGENT_BASE_URL).replace(/\/+$/, '');
      const url = `${baseUrl}/v1/chat/completions`;

      const messages: Array<{ role: string; content: string }> = [];
      const systemPrompt = prompt.systemPrompt ?? profile.systemPrompt;
      if (systemPrompt) {
        messages.push({ role: 'system', content: systemPrompt });
      }
      for (const turn of prompt.history) {
        messages.push({ role: turn.role, content: turn.content });
      }
      messages.push({ role: 'user', content: prompt.prompt });

      const body: ChatCompletionRequest = {
        model: profile.model,
        messages,
        max_tokens: profile.maxTokens,
        temperature: profile.temperature,
      };

      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (options.apiKey) {
        headers['Authorization'] = `Bearer ${options.apiKey}`;
      }

      let res: Response;
      try {
        res = await fetch(url, { method: 'POST', headers, body: JSON.stringify(body), signal });
      } catch (err) {
        if (signal.aborted) throw err;
        throw new AgentInvocationError(
          `Agent endpoint unreachable (${baseUrl}): ${err instanceof Error ? err.message : 'unknown error'}`,
        );
      }

      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw new AgentInvocationError(`Agent endpoint returned HTTP ${res.status}: ${text.slice(0, 200)}`, res.status);
      }

      let payload: unknown;
      try {
        payload = await res.json();
      } catch {
        throw new AgentInvocationError(`Agent endpoint returned a non-JSON response (HTTP ${res.status})`, res.status);
      }
      const data = readCompletion(payload);

      const promptTokens = data.usage?.prompt_tokens ?? 0;
      const completionTokens = data.usage?.completion_tokens ?? 0;
      return {
        text: data.content ?? '',
        usage: {
          promptTokens,
          completionTokens,
          totalTokens: data.usage?.total_tokens ?? promptTokens + completionTokens,
        },
      };
    },
  };
}
