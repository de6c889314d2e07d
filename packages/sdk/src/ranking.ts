/**
 * Ranking & Filtering
 */

import type { AgentRecord, AgentScore, PerformanceSnapshot, TaskAnalysis } from '@taskmatch/core';
import { AgentScorer } from './scoring';

/** Scores below this confidence are never recommended, whatever min_score is */
export const MIN_RECOMMENDATION_CONFIDENCE = 0.4;

export const DEFAULT_RECOMMENDATION_LIMIT = 5;
export const DEFAULT_MIN_SCORE = 0.3;

/**
 * Score every candidate and sort by score, highest first. Array.prototype.sort
 * is stable, so equal scores keep retrieval order.
 */
export function rankAgents(
  agents: readonly AgentRecord[],
  task: TaskAnalysis,
  performance?: PerformanceSnapshot,
  scorer: AgentScorer = new AgentScorer()
): AgentScore[] {
  return agents
    .map((agent) => scorer.scoreAgent(agent, task, performance))
    .sort((a, b) => b.score - a.score);
}

export function topRecommendations(
  scores: readonly AgentScore[],
  limit: number = DEFAULT_RECOMMENDATION_LIMIT,
  minScore: number = DEFAULT_MIN_SCORE
): AgentScore[] {
  return scores
    .filter((score) => score.score >= minScore && score.confidence >= MIN_RECOMMENDATION_CONFIDENCE)
    .slice(0, Math.max(0, limit));
}
