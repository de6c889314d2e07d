/**
 * Task-to-agent discovery type definitions
 */

import type { AgentStatus } from './agent.js';

export const TASK_COMPLEXITIES = ['simple', 'moderate', 'complex'] as const;

export type TaskComplexity = (typeof TASK_COMPLEXITIES)[number];

/**
 * Structured interpretation of a natural-language task request
 */
export interface TaskAnalysis {
  task_type: string;
  domain: string;
  complexity: TaskComplexity;
  required_capabilities: string[];
  /** Most salient first */
  keywords: string[];
  /** Parse certainty, 0-1 */
  confidence: number;
}

export interface ScoreBreakdown {
  capability_score: number;
  domain_score: number;
  keyword_score: number;
  performance_score: number;
  availability_score: number;
  load_score: number;
}

export interface AgentScore {
  agent_id: string;
  score: number;
  confidence: number;
  match_reasons: string[];
  metadata: ScoreBreakdown;
}

/**
 * Relative weight of each scoring signal. Must sum to 1.0.
 */
export interface ScoringWeights {
  readonly capability_match: number;
  readonly domain_match: number;
  readonly keyword_match: number;
  readonly performance: number;
  readonly availability: number;
  readonly load: number;
}

export interface DiscoveryFilters {
  status?: AgentStatus;
  exclude_agents?: string[];
  domain?: string;
  /**
   * Accepted for compatibility; candidates are not scored yet when filters
   * run, so this key has no effect. Use the `minScore` discovery option.
   */
  min_score?: number;
}

export interface DiscoveryOptions {
  limit?: number;
  minScore?: number;
  filters?: DiscoveryFilters;
}

export interface DiscoveryResult {
  readonly trace_id: string;
  readonly task_analysis: TaskAnalysis;
  readonly recommended_agents: readonly AgentScore[];
  readonly total_agents_evaluated: number;
  readonly search_time_seconds: number;
  readonly suggestions: readonly string[];
}
