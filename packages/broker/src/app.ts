/**
 * Express application wiring
 */

import express, { type Express } from 'express';
import type { Logger } from '@taskmatch/core';
import type { AgentDiscovery, RegistryClient } from '@taskmatch/sdk';
import { createErrorHandler } from './middleware/error-handler';
import { createDiscoveryRoutes, type DiscoveryRouteOptions } from './routes/discovery';
import { createHealthRoutes } from './routes/health';

export interface AppDependencies {
  discovery: AgentDiscovery;
  registry: RegistryClient;
  logger: Logger;
  routes: DiscoveryRouteOptions;
}

export function createApp({ discovery, registry, logger, routes }: AppDependencies): Express {
  const app = express();

  app.use(express.json());

  app.use(createHealthRoutes(registry));
  app.use('/api/discovery', createDiscoveryRoutes(discovery, routes));

  app.use(createErrorHandler(logger));

  return app;
}
