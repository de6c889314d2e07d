/**
 * Shared fixtures for SDK tests
 */

import type { AgentRecord, AgentScore, TaskAnalysis } from '@taskmatch/core';

/** 2025-01-15T12:00:00.000Z */
export const FIXED_NOW = Date.UTC(2025, 0, 15, 12, 0, 0);

export function minutesAgo(minutes: number): string {
  return new Date(FIXED_NOW - minutes * 60_000).toISOString();
}

export function makeAgent(overrides: Partial<AgentRecord> = {}): AgentRecord {
  return {
    agent_id: 'agent-1',
    capabilities: [],
    domain: '',
    keywords: [],
    description: '',
    current_load: 0.5,
    ...overrides,
  };
}

export function makeTask(overrides: Partial<TaskAnalysis> = {}): TaskAnalysis {
  return {
    task_type: 'general',
    domain: 'general',
    complexity: 'simple',
    required_capabilities: [],
    keywords: [],
    confidence: 1.0,
    ...overrides,
  };
}

export function makeScore(agentId: string, score: number, confidence = 0.8): AgentScore {
  return {
    agent_id: agentId,
    score,
    confidence,
    match_reasons: [],
    metadata: {
      capability_score: 0,
      domain_score: 0,
      keyword_score: 0,
      performance_score: 0,
      availability_score: 0,
      load_score: 0,
    },
  };
}
