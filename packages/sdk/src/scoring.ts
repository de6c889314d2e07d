/**
 * Agent Scoring Engine
 *
 * Six independent signals, each in [0, 1], combined by a weighted sum:
 *
 * 1. Capability match (35%) - required capabilities covered by the agent
 * 2. Domain match (25%)     - exact or clustered domain similarity
 * 3. Keyword match (20%)    - task keywords in agent keywords or description
 * 4. Performance (10%)      - historical success, latency and reliability
 * 5. Availability (5%)      - declared status, else last-seen recency
 * 6. Load (5%)              - spare capacity
 */

import type {
  AgentRecord,
  AgentScore,
  PerformanceMetrics,
  PerformanceSnapshot,
  ScoreBreakdown,
  ScoringWeights,
  TaskAnalysis,
} from '@taskmatch/core';
import { ValidationError } from './errors';

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_SCORING_WEIGHTS: ScoringWeights = Object.freeze({
  capability_match: 0.35,
  domain_match: 0.25,
  keyword_match: 0.2,
  performance: 0.1,
  availability: 0.05,
  load: 0.05,
});

/** Score returned by a signal that has nothing to compare */
export const NEUTRAL_SCORE = 0.7;

const UNRELATED_DOMAIN_SCORE = 0.2;
const SIBLING_DOMAIN_SCORE = 0.8;
const PARENT_DOMAIN_SCORE = 0.9;
const GENERAL_AGENT_DOMAIN_SCORE = 0.5;
const NO_CAPABILITIES_SCORE = 0.3;
const UNKNOWN_AVAILABILITY_SCORE = 0.5;

/** Response time at which the latency component bottoms out */
const MAX_RESPONSE_TIME_SECONDS = 30;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Domain clusters: each key is the cluster name, values are its synonyms.
 * Checked in insertion order.
 */
export const DOMAIN_CLUSTERS: ReadonlyMap<string, readonly string[]> = new Map([
  ['technology', ['software', 'it', 'programming', 'tech']],
  ['finance', ['banking', 'trading', 'accounting', 'fintech']],
  ['healthcare', ['medical', 'clinical', 'pharmaceutical']],
  ['marketing', ['advertising', 'sales', 'promotion']],
  ['education', ['learning', 'training', 'academic']],
]);

// ============================================================================
// WEIGHTS
// ============================================================================

const WEIGHT_KEYS = [
  'capability_match',
  'domain_match',
  'keyword_match',
  'performance',
  'availability',
  'load',
] as const satisfies ReadonlyArray<keyof ScoringWeights>;

/**
 * Build an immutable weight table from defaults plus overrides.
 *
 * @throws ValidationError if a weight is outside [0, 1] or the total is not 1.0
 */
export function createScoringWeights(overrides: Partial<ScoringWeights> = {}): ScoringWeights {
  const weights: ScoringWeights = { ...DEFAULT_SCORING_WEIGHTS, ...overrides };

  for (const key of WEIGHT_KEYS) {
    const value = weights[key];
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new ValidationError(`Scoring weight ${key} must be between 0 and 1 (got ${value})`, 'INVALID_WEIGHTS');
    }
  }

  const sum = WEIGHT_KEYS.reduce((total, key) => total + weights[key], 0);
  if (Math.abs(sum - 1.0) > 0.001) {
    throw new ValidationError(`Scoring weights must sum to 1.0 (got ${sum.toFixed(3)})`, 'INVALID_WEIGHTS');
  }

  return Object.freeze(weights);
}

// ============================================================================
// SIGNALS
// ============================================================================

function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function scoreCapabilities(agent: AgentRecord, task: TaskAnalysis, reasons: string[]): number {
  const required = [...new Set(task.required_capabilities)];
  if (required.length === 0) {
    return NEUTRAL_SCORE;
  }

  const agentCapabilities = new Set(agent.capabilities);
  if (agentCapabilities.size === 0) {
    return NO_CAPABILITIES_SCORE;
  }

  const matching = required.filter((capability) => agentCapabilities.has(capability));
  let ratio = matching.length / required.length;

  if (matching.length > 0) {
    reasons.push(`Matching capabilities: ${matching.join(', ')}`);
  }

  // Full coverage earns a bonus for breadth beyond the requirement
  if (matching.length === required.length) {
    const extra = agentCapabilities.size - required.length;
    ratio += Math.min(0.2, extra * 0.05);
  }

  return Math.min(1.0, ratio);
}

export function domainSimilarity(first: string, second: string): number {
  for (const [cluster, synonyms] of DOMAIN_CLUSTERS) {
    if (synonyms.includes(first) && synonyms.includes(second)) {
      return SIBLING_DOMAIN_SCORE;
    }
    if ((first === cluster && synonyms.includes(second)) || (second === cluster && synonyms.includes(first))) {
      return PARENT_DOMAIN_SCORE;
    }
  }
  return UNRELATED_DOMAIN_SCORE;
}

export function scoreDomain(agent: AgentRecord, task: TaskAnalysis, reasons: string[]): number {
  const agentDomain = agent.domain.trim().toLowerCase();
  const taskDomain = task.domain.trim().toLowerCase();

  if (taskDomain === 'general') {
    return NEUTRAL_SCORE;
  }

  if (!agentDomain || agentDomain === 'general') {
    return GENERAL_AGENT_DOMAIN_SCORE;
  }

  if (agentDomain === taskDomain) {
    reasons.push(`Domain expertise: ${taskDomain}`);
    return 1.0;
  }

  const similarity = domainSimilarity(agentDomain, taskDomain);
  if (similarity > 0.5) {
    reasons.push(`Related domain: ${agentDomain}`);
  }
  return similarity;
}

export function scoreKeywords(agent: AgentRecord, task: TaskAnalysis, reasons: string[]): number {
  const taskKeywords = [...new Set(task.keywords.map((word) => word.toLowerCase()))];
  if (taskKeywords.length === 0) {
    return NEUTRAL_SCORE;
  }

  const agentKeywords = new Set(agent.keywords.map((word) => word.toLowerCase()));
  const description = agent.description.toLowerCase();

  const matches = taskKeywords.filter((keyword) => agentKeywords.has(keyword) || description.includes(keyword));

  if (matches.length > 0) {
    reasons.push(`Keyword matches: ${matches.join(', ')}`);
  }

  return Math.min(1.0, matches.length / taskKeywords.length);
}

export function scorePerformance(agent: AgentRecord, performance?: PerformanceSnapshot): number {
  const metrics: PerformanceMetrics | undefined = performance?.get(agent.agent_id);
  if (!metrics) {
    return NEUTRAL_SCORE;
  }

  const successRate = metrics.success_rate ?? 0.7;
  const avgResponseTime = metrics.avg_response_time ?? 5.0;
  const reliability = metrics.reliability ?? 0.7;

  const timeScore = Math.max(0, 1 - avgResponseTime / MAX_RESPONSE_TIME_SECONDS);

  return clamp01(successRate * 0.5 + timeScore * 0.3 + reliability * 0.2);
}

export function scoreAvailability(agent: AgentRecord, now: number = Date.now()): number {
  switch (agent.status) {
    case 'offline':
      return 0.0;
    case 'busy':
      return 0.3;
    case 'available':
    case 'online':
      return 1.0;
    default:
      break;
  }

  if (!agent.last_seen) {
    return UNKNOWN_AVAILABILITY_SCORE;
  }

  const lastSeen = Date.parse(agent.last_seen);
  if (Number.isNaN(lastSeen)) {
    return UNKNOWN_AVAILABILITY_SCORE;
  }

  const elapsed = now - lastSeen;
  if (elapsed < 5 * MINUTE_MS) return 1.0;
  if (elapsed < HOUR_MS) return 0.8;
  if (elapsed < DAY_MS) return 0.5;
  return 0.2;
}

export function scoreLoad(agent: AgentRecord): number {
  return clamp01(1.0 - agent.current_load);
}

/**
 * How much of the agent's record was available to score, scaled by how sure
 * the task parse was
 */
export function scoringConfidence(agent: AgentRecord, task: TaskAnalysis): number {
  let confidence = 0.5;

  if (agent.capabilities.length > 0) confidence += 0.2;
  if (agent.description) confidence += 0.1;
  if (agent.domain) confidence += 0.1;
  if (agent.last_seen) confidence += 0.05;
  if (agent.status) confidence += 0.05;

  confidence *= task.confidence;

  return Math.min(1.0, confidence);
}

// ============================================================================
// SCORER
// ============================================================================

export interface AgentScorerOptions {
  weights?: ScoringWeights;
  /** Clock used for last-seen recency */
  now?: () => number;
}

/**
 * AgentScorer - weighted multi-signal scoring of one agent against one task
 *
 * @example
 * ```typescript
 * const scorer = new AgentScorer({ weights: createScoringWeights({ load: 0.1, availability: 0 }) });
 * const result = scorer.scoreAgent(agent, analysis, performance);
 * ```
 */
export class AgentScorer {
  readonly weights: ScoringWeights;
  private readonly now: () => number;

  constructor(options: AgentScorerOptions = {}) {
    this.weights = options.weights ?? DEFAULT_SCORING_WEIGHTS;
    this.now = options.now ?? Date.now;
  }

  scoreAgent(agent: AgentRecord, task: TaskAnalysis, performance?: PerformanceSnapshot): AgentScore {
    const matchReasons: string[] = [];

    const breakdown: ScoreBreakdown = {
      capability_score: scoreCapabilities(agent, task, matchReasons),
      domain_score: scoreDomain(agent, task, matchReasons),
      keyword_score: scoreKeywords(agent, task, matchReasons),
      performance_score: scorePerformance(agent, performance),
      availability_score: scoreAvailability(agent, this.now()),
      load_score: scoreLoad(agent),
    };

    return {
      agent_id: agent.agent_id,
      score: this.combine(breakdown),
      confidence: scoringConfidence(agent, task),
      match_reasons: matchReasons,
      metadata: breakdown,
    };
  }

  private combine(breakdown: ScoreBreakdown): number {
    const w = this.weights;
    return (
      breakdown.capability_score * w.capability_match +
      breakdown.domain_score * w.domain_match +
      breakdown.keyword_score * w.keyword_match +
      breakdown.performance_score * w.performance +
      breakdown.availability_score * w.availability +
      breakdown.load_score * w.load
    );
  }
}
