/**
 * Candidate Retrieval
 * Gathers a deduplicated candidate set from the registry for one task
 */

import {
  createLoggerFromEnv,
  type AgentRecord,
  type DiscoveryFilters,
  type Logger,
  type TaskAnalysis,
} from '@taskmatch/core';
import { dedupeAgents } from './agent-record';
import { settle, type AgentSearchParams, type RegistryClient, type RegistryResult } from './registry-client';

/** Number of leading task keywords joined into the text query */
const KEYWORD_QUERY_SIZE = 3;

/**
 * Apply caller filters to a candidate list.
 *
 * `min_score` is accepted but has no effect here: candidates have not been
 * scored yet. Score thresholds belong to `topRecommendations`.
 */
export function applyFilters(agents: readonly AgentRecord[], filters: DiscoveryFilters): AgentRecord[] {
  let filtered = [...agents];

  if (filters.status !== undefined) {
    filtered = filtered.filter((agent) => agent.status === filters.status);
  }

  if (filters.exclude_agents && filters.exclude_agents.length > 0) {
    const excluded = new Set(filters.exclude_agents);
    filtered = filtered.filter((agent) => !excluded.has(agent.agent_id));
  }

  if (filters.domain !== undefined) {
    const domain = filters.domain.toLowerCase();
    filtered = filtered.filter((agent) => agent.domain.toLowerCase() === domain);
  }

  return filtered;
}

export class CandidateRetriever {
  private logger: Logger;

  constructor(
    private registry: RegistryClient,
    logger?: Logger
  ) {
    this.logger = logger ?? createLoggerFromEnv('taskmatch-retrieval');
  }

  /**
   * Queries the registry by capabilities, domain and top keywords, unions the
   * results, applies filters, and falls back to the full listing when nothing
   * survives
   */
  async gatherCandidates(task: TaskAnalysis, filters?: DiscoveryFilters): Promise<AgentRecord[]> {
    const queries: Array<{ label: string; params: AgentSearchParams }> = [];

    if (task.required_capabilities.length > 0) {
      queries.push({ label: 'capabilities', params: { capabilities: task.required_capabilities } });
    }

    if (task.domain && task.domain !== 'general') {
      queries.push({ label: 'domain', params: { query: task.domain } });
    }

    if (task.keywords.length > 0) {
      queries.push({ label: 'keywords', params: { query: task.keywords.slice(0, KEYWORD_QUERY_SIZE).join(' ') } });
    }

    const results = await Promise.all(
      queries.map(async ({ label, params }) => this.unwrap(label, await settle(this.registry.searchAgents(params))))
    );

    let candidates = dedupeAgents(...results);

    if (filters) {
      if (filters.min_score !== undefined) {
        this.logger.debug('Ignoring min_score filter during retrieval; apply it at ranking time', {
          min_score: filters.min_score,
        });
      }
      candidates = applyFilters(candidates, filters);
    }

    if (candidates.length === 0) {
      this.logger.info('No targeted candidates, falling back to full listing', {
        queries: queries.map((q) => q.label),
      });
      candidates = this.unwrap('list', await settle(this.registry.listAgents()));
    }

    return candidates;
  }

  private unwrap(label: string, result: RegistryResult<AgentRecord[]>): AgentRecord[] {
    if (result.ok) {
      return result.value;
    }
    this.logger.warn('Registry query failed, treating as empty', {
      query: label,
      code: result.error.code,
      error: result.error.message,
    });
    return [];
  }
}
