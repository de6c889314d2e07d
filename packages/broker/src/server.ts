/**
 * TaskMatch Discovery Server
 * Main entry point
 */

import 'dotenv/config';
import { createLoggerFromEnv } from '@taskmatch/core';
import { AgentDiscovery, HttpRegistryClient } from '@taskmatch/sdk';
import { createApp } from './app';
import { loadConfig } from './lib/config';

const logger = createLoggerFromEnv('taskmatch-broker');

async function main() {
  const config = loadConfig();

  const registry = new HttpRegistryClient({
    baseUrl: config.registryUrl,
    timeoutMs: config.registryTimeoutMs,
    logger: logger.child({ component: 'registry' }),
  });

  if (!(await registry.healthCheck())) {
    logger.warn('Registry not reachable at startup', { registryUrl: config.registryUrl });
  }

  const discovery = new AgentDiscovery({
    registry,
    weights: config.weights,
    logger: logger.child({ component: 'discovery' }),
  });

  const app = createApp({
    discovery,
    registry,
    logger,
    routes: { defaultLimit: config.defaultLimit, defaultMinScore: config.defaultMinScore },
  });

  const server = app.listen(config.port, () => {
    logger.info('Discovery server started', { port: config.port, registryUrl: config.registryUrl });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Fatal error starting server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
