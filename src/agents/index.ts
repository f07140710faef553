export * from './invoker';
export { createOpenAICompatibleInvoker, DEFAULT_AGENT_BASE_URL } from './openai-compatible';
export type { OpenAICompatibleInvokerOptions } from './openai-compatible';
