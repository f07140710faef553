/**
 * Engine and server configuration.
 *
 * Usage:
 *   const config = loadConfig(process.env);
 *   const result = validateEngineConfig(config);
 *   if (!result.valid) throw new Error(result.errors.join('; '));
 */

import { LogLevel, parseLogLevel } from './logger';

/** Settings the scheduler applies to every run. */
export interface EngineSettings {
  /** Maximum nodes executing at once per run (and per loop iteration). */
  maxConcurrency: number;
  /** Default attempts for agent nodes (first try included). */
  agentMaxAttempts: number;
  /** Exponential backoff base delay between agent attempts. */
  backoffBaseMs: number;
  /** Backoff delay cap. */
  backoffMaxMs: number;
  /** Per-attempt agent timeout unless the node sets its own. */
  agentTimeoutMs: number;
  /** Wall-clock limit for a single expression evaluation. */
  expressionTimeoutMs: number;
  /** Iteration bound for loops that only declare an until condition. */
  defaultMaxLoopIterations: number;
  /** Highest maxIterations a loop node may declare. */
  maxLoopIterations: number;
  /** History snapshots kept per run. */
  historyLimit: number;
}

/** Complete application configuration. */
export interface AppConfig extends EngineSettings {
  port: number;
  logLevel: LogLevel;
  /** OpenAI-compatible endpoint used by agent nodes. */
  agentBaseUrl?: string;
  agentApiKey?: string;
  /** JSON file listing agent profiles. */
  agentsFile?: string;
}

export const DEFAULT_ENGINE_SETTINGS: EngineSettings = {
  maxConcurrency: 4,
  agentMaxAttempts: 3,
  backoffBaseMs: 500,
  backoffMaxMs: 30_000,
  agentTimeoutMs: 60_000,
  expressionTimeoutMs: 1_000,
  defaultMaxLoopIterations: 100,
  maxLoopIterations: 1_000,
  historyLimit: 50,
};

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

function readInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isInteger(parsed) ? parsed : Number.NaN;
}

function readString(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim();
  return raw ? raw : undefined;
}

/**
 * Build configuration from environment variables. Unparseable numbers come
 * back as NaN so validateEngineConfig reports them.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const d = DEFAULT_ENGINE_SETTINGS;
  return {
    port: readInt(env, 'PORT', 5000),
    logLevel: parseLogLevel(env.FLOWGRAPH_LOG_LEVEL) ?? LogLevel.Info,
    maxConcurrency: readInt(env, 'FLOWGRAPH_MAX_CONCURRENCY', d.maxConcurrency),
    agentMaxAttempts: readInt(env, 'FLOWGRAPH_AGENT_MAX_ATTEMPTS', d.agentMaxAttempts),
    backoffBaseMs: readInt(env, 'FLOWGRAPH_BACKOFF_BASE_MS', d.backoffBaseMs),
    backoffMaxMs: readInt(env, 'FLOWGRAPH_BACKOFF_MAX_MS', d.backoffMaxMs),
    agentTimeoutMs: readInt(env, 'FLOWGRAPH_AGENT_TIMEOUT_MS', d.agentTimeoutMs),
    expressionTimeoutMs: readInt(env, 'FLOWGRAPH_EXPRESSION_TIMEOUT_MS', d.expressionTimeoutMs),
    defaultMaxLoopIterations: readInt(env, 'FLOWGRAPH_DEFAULT_LOOP_ITERATIONS', d.defaultMaxLoopIterations),
    maxLoopIterations: readInt(env, 'FLOWGRAPH_MAX_LOOP_ITERATIONS', d.maxLoopIterations),
    historyLimit: readInt(env, 'FLOWGRAPH_HISTORY_LIMIT', d.historyLimit),
    agentBaseUrl: readString(env, 'FLOWGRAPH_AGENT_BASE_URL'),
    agentApiKey: readString(env, 'FLOWGRAPH_AGENT_API_KEY'),
    agentsFile: readString(env, 'FLOWGRAPH_AGENTS_FILE'),
  };
}

/** Validate settings for consistency. */
export function validateEngineConfig(config: EngineSettings & Partial<AppConfig>): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const positive: Array<[keyof EngineSettings, number]> = [
    ['maxConcurrency', config.maxConcurrency],
    ['agentMaxAttempts', config.agentMaxAttempts],
    ['agentTimeoutMs', config.agentTimeoutMs],
    ['expressionTimeoutMs', config.expressionTimeoutMs],
    ['defaultMaxLoopIterations', config.defaultMaxLoopIterations],
    ['maxLoopIterations', config.maxLoopIterations],
    ['historyLimit', config.historyLimit],
  ];
  for (const [key, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${key} must be a positive integer`);
    }
  }

  for (const [key, value] of [
    ['backoffBaseMs', config.backoffBaseMs],
    ['backoffMaxMs', config.backoffMaxMs],
  ] as const) {
    if (!Number.isInteger(value) || value < 0) {
      errors.push(`${key} cannot be negative`);
    }
  }

  if (config.backoffMaxMs < config.backoffBaseMs) {
    warnings.push('backoffMaxMs is below backoffBaseMs; every retry waits at most backoffMaxMs');
  }
  if (config.defaultMaxLoopIterations > config.maxLoopIterations) {
    errors.push('defaultMaxLoopIterations cannot exceed maxLoopIterations');
  }
  if (config.port !== undefined && (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535)) {
    errors.push('port must be an integer between 0 and 65535');
  }
  if (config.agentApiKey && !config.agentBaseUrl) {
    warnings.push(`Agent API key set without a base URL; requests go to the default endpoint`);
  }

  return { valid: errors.length === 0, errors, warnings };
}
