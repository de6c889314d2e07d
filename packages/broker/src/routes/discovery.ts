/**
 * Discovery Routes
 */

import { Router } from 'express';
import { ValidationError, type AgentDiscovery } from '@taskmatch/sdk';
import { parseDiscoveryRequest, parseLimitParam, parsePerformanceMetrics } from '../middleware/validation';

export interface DiscoveryRouteOptions {
  defaultLimit: number;
  defaultMinScore: number;
}

export function createDiscoveryRoutes(discovery: AgentDiscovery, options: DiscoveryRouteOptions): Router {
  const router = Router();

  router.post('/recommend', async (req, res, next) => {
    try {
      const request = parseDiscoveryRequest(req.body);
      const result = await discovery.discoverAgents(request.task, {
        limit: request.limit ?? options.defaultLimit,
        minScore: request.min_score ?? options.defaultMinScore,
        filters: request.filters,
      });

      if (request.explain) {
        res.json({ ...result, explanation: discovery.explainRecommendations(result) });
      } else {
        res.json(result);
      }
    } catch (error) {
      next(error);
    }
  });

  router.get('/agents/:agentId/similar', async (req, res, next) => {
    try {
      const limit = parseLimitParam(req.query.limit, 3);
      const results = await discovery.getSimilarAgents(req.params.agentId, limit);
      res.json({ results });
    } catch (error) {
      next(error);
    }
  });

  router.get('/agents/:agentId/breakdown', async (req, res, next) => {
    try {
      const task = req.query.task;
      if (typeof task !== 'string' || task.trim() === '') {
        throw new ValidationError('task query parameter is required', 'MISSING_TASK');
      }

      const explanation = await discovery.explainAgentScore(req.params.agentId, task);
      if (explanation === null) {
        return res.status(404).json({
          error: 'AGENT_NOT_FOUND',
          message: `Agent ${req.params.agentId} not found in registry`,
        });
      }

      res.json({ agent_id: req.params.agentId, explanation });
    } catch (error) {
      next(error);
    }
  });

  router.put('/performance/:agentId', (req, res, next) => {
    try {
      discovery.updatePerformanceData(req.params.agentId, parsePerformanceMetrics(req.body));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
