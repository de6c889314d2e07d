/**
 * Agent Discovery
 * Coordinates task analysis, candidate retrieval, scoring and ranking
 */

import { v4 as uuidv4 } from 'uuid';
import {
  createLoggerFromEnv,
  type AgentRecord,
  type AgentScore,
  type DiscoveryOptions,
  type DiscoveryResult,
  type Logger,
  type PerformanceMetrics,
  type PerformanceSnapshot,
  type ScoringWeights,
} from '@taskmatch/core';
import { explainRecommendations, explainScore } from './explain';
import { DEFAULT_MIN_SCORE, DEFAULT_RECOMMENDATION_LIMIT, rankAgents, topRecommendations } from './ranking';
import { settle, type RegistryClient, type RegistryResult } from './registry-client';
import { CandidateRetriever } from './retrieval';
import { AgentScorer } from './scoring';
import { generateSuggestions } from './suggestions';
import { KeywordTaskAnalyzer, validateTaskAnalysis, type TaskAnalyzer } from './task-analyzer';

export interface AgentDiscoveryOptions {
  registry: RegistryClient;
  analyzer?: TaskAnalyzer;
  weights?: ScoringWeights;
  logger?: Logger;
  /** Clock used for last-seen recency scoring */
  now?: () => number;
}

export class AgentDiscovery {
  private registry: RegistryClient;
  private analyzer: TaskAnalyzer;
  private scorer: AgentScorer;
  private retriever: CandidateRetriever;
  private logger: Logger;
  private performanceCache = new Map<string, PerformanceMetrics>();

  constructor(opts: AgentDiscoveryOptions) {
    this.registry = opts.registry;
    this.analyzer = opts.analyzer ?? new KeywordTaskAnalyzer();
    this.scorer = new AgentScorer({ weights: opts.weights, now: opts.now });
    this.logger = opts.logger ?? createLoggerFromEnv('taskmatch-discovery');
    this.retriever = new CandidateRetriever(this.registry, this.logger);
  }

  /**
   * Main entry point: analyze the task, gather candidates, rank them and keep
   * the ones clearing both the score and confidence thresholds
   */
  async discoverAgents(taskDescription: string, options: DiscoveryOptions = {}): Promise<DiscoveryResult> {
    const started = performance.now();
    const traceId = uuidv4();
    const log = this.logger.child({ trace_id: traceId });

    const limit = options.limit ?? DEFAULT_RECOMMENDATION_LIMIT;
    const minScore = options.minScore ?? DEFAULT_MIN_SCORE;

    const taskAnalysis = validateTaskAnalysis(this.analyzer.analyzeTask(taskDescription));
    const agents = await this.retriever.gatherCandidates(taskAnalysis, options.filters);
    const performanceData = this.getPerformanceSnapshot();

    const agentScores = rankAgents(agents, taskAnalysis, performanceData, this.scorer);
    const recommendations = topRecommendations(agentScores, limit, minScore);
    const suggestions = generateSuggestions(taskAnalysis, recommendations);

    const elapsedMs = performance.now() - started;

    log.info('Discovery completed', {
      domain: taskAnalysis.domain,
      taskType: taskAnalysis.task_type,
      candidates: agents.length,
      recommended: recommendations.length,
      elapsedMs: Math.round(elapsedMs),
    });

    return Object.freeze({
      trace_id: traceId,
      task_analysis: taskAnalysis,
      recommended_agents: recommendations,
      total_agents_evaluated: agents.length,
      search_time_seconds: elapsedMs / 1000,
      suggestions,
    });
  }

  explainRecommendations(result: DiscoveryResult): string {
    return explainRecommendations(result);
  }

  /**
   * Score breakdown of one agent against one task, for audit and debugging.
   * Returns null when the registry does not know the agent.
   */
  async explainAgentScore(agentId: string, taskDescription: string): Promise<string | null> {
    const agent = await this.getAgentDetails(agentId);
    if (!agent) {
      return null;
    }
    const taskAnalysis = validateTaskAnalysis(this.analyzer.analyzeTask(taskDescription));
    const score = this.scorer.scoreAgent(agent, taskAnalysis, this.getPerformanceSnapshot());
    return explainScore(score);
  }

  /**
   * Find agents similar to the given agent by running discovery on a task
   * built from its own domain and capabilities
   */
  async getSimilarAgents(agentId: string, limit: number = 3): Promise<AgentScore[]> {
    const target = await this.getAgentDetails(agentId);
    if (!target) {
      return [];
    }

    let taskDescription = `Task requiring ${target.domain || 'general'} domain expertise`;
    if (target.capabilities.length > 0) {
      taskDescription += ` with capabilities: ${target.capabilities.join(', ')}`;
    }

    // One extra slot since the target itself usually ranks first
    const result = await this.discoverAgents(taskDescription, { limit: limit + 1 });

    return result.recommended_agents.filter((agent) => agent.agent_id !== agentId).slice(0, limit);
  }

  async searchAgentsByCapabilities(capabilities: string[]): Promise<AgentRecord[]> {
    return this.unwrap('capabilities', await settle(this.registry.searchAgents({ capabilities })), []);
  }

  async searchAgentsByDomain(domain: string): Promise<AgentRecord[]> {
    return this.unwrap('domain', await settle(this.registry.searchAgents({ query: domain })), []);
  }

  async getAgentDetails(agentId: string): Promise<AgentRecord | null> {
    return this.unwrap('lookup', await settle(this.registry.getAgentMetadata(agentId)), null);
  }

  updatePerformanceData(agentId: string, metrics: PerformanceMetrics): void {
    this.performanceCache.set(agentId, { ...metrics });
  }

  getPerformanceSnapshot(): PerformanceSnapshot {
    return new Map(this.performanceCache);
  }

  private unwrap<T>(label: string, result: RegistryResult<T>, fallback: T): T {
    if (result.ok) {
      return result.value;
    }
    this.logger.warn('Registry request failed', { request: label, code: result.error.code, error: result.error.message });
    return fallback;
  }
}
