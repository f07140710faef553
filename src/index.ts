/**
 * flowgraph: dependency-ordered workflow graph execution.
 *
 * Entry point for the reference HTTP server, and the public surface for
 * programmatic use: build a WorkflowScheduler with createAppContext() (or
 * directly) and submit runs without going through HTTP.
 */

import { createApp, createAppContext } from './server';
import { loadConfig, validateEngineConfig } from './config';
import { errorMessage } from './domain/errors';
import { logger, setLogLevel } from './logger';

function main(): void {
  const config = loadConfig(process.env);
  setLogLevel(config.logLevel);

  const check = validateEngineConfig(config);
  for (const warning of check.warnings) logger.warn(warning);
  if (!check.valid) {
    logger.error('Invalid configuration', { errors: check.errors });
    process.exitCode = 1;
    return;
  }

  const context = createAppContext({ config });
  const app = createApp(context);
  app.listen(config.port, () => {
    logger.info('Server listening', { port: config.port, maxConcurrency: config.maxConcurrency });
  });
}

if (require.main === module) {
  try {
    main();
  } catch (err) {
    logger.error('Server failed to start', { error: errorMessage(err) });
    process.exitCode = 1;
  }
}

// Public exports for programmatic use
export { createApp, createAppContext, loadAgentProfiles } from './server';
export type { AppContext, AppContextOptions } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './agents';
export * from './execution';
export * from './storage';
