/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import fs from 'fs';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { ExecutionRecordStore, createRecordStore } from './execution/record-store';
import { WorkflowScheduler } from './engine/scheduler';
import { TransformRegistry } from './engine/transforms';
import {
  AgentDirectory,
  AgentInvoker,
  AgentProfile,
  createStaticAgentDirectory,
  parseAgentProfiles,
} from './agents/invoker';
import { createOpenAICompatibleInvoker } from './agents/openai-compatible';
import { AppConfig, DEFAULT_ENGINE_SETTINGS, EngineSettings } from './config';
import { errorHandler, requestLogger } from './api/middleware';
import { createWorkflowRoutes } from './api/workflows';
import { createRunRoutes } from './api/runs';
import { logger } from './logger';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  store: Store;
  records: ExecutionRecordStore;
  scheduler: WorkflowScheduler;
}

export interface AppContextOptions {
  store?: Store;
  records?: ExecutionRecordStore;
  invoker?: AgentInvoker;
  agents?: AgentDirectory;
  transforms?: TransformRegistry;
  settings?: Partial<EngineSettings>;
  config?: Partial<AppConfig>;
  random?: () => number;
}

/** Read agent profiles from a JSON file. */
export function loadAgentProfiles(file: string): AgentProfile[] {
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return parseAgentProfiles(raw);
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config = options.config ?? {};
  const settings: EngineSettings = { ...DEFAULT_ENGINE_SETTINGS, ...config, ...options.settings };

  const store = options.store ?? createMemoryStore();
  const records = options.records ?? createRecordStore({ maxHistory: settings.historyLimit });
  const invoker =
    options.invoker ?? createOpenAICompatibleInvoker({ baseUrl: config.agentBaseUrl, apiKey: config.agentApiKey });

  let agents = options.agents;
  if (!agents) {
    const profiles = config.agentsFile ? loadAgentProfiles(config.agentsFile) : [];
    logger.info('Agent directory loaded', { agents: profiles.length, file: config.agentsFile });
    agents = createStaticAgentDirectory(profiles);
  }

  const scheduler = new WorkflowScheduler({
    workflows: store.workflows,
    records,
    invoker,
    agents,
    transforms: options.transforms,
    settings,
    random: options.random,
  });

  return { store, records, scheduler };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(express.json({ limit: '10mb' }));
  app.use(requestLogger());

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: '0.1.0',
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
    });
  });

  // Versioned API routes under /api/v1
  const v1 = express.Router();
  v1.use('/workflows', createWorkflowRoutes(ctx.scheduler));
  v1.use('/', createRunRoutes(ctx.scheduler));
  app.use('/api/v1', v1);

  // Unversioned routes
  app.use('/api/workflows', createWorkflowRoutes(ctx.scheduler));
  app.use('/api', createRunRoutes(ctx.scheduler));

  app.use(errorHandler);

  return app;
}
