/**
 * Tests for result and score explanations
 */

import { describe, it, expect } from 'vitest';
import type { DiscoveryResult } from '@taskmatch/core';
import { explainRecommendations, explainScore } from './explain';
import { makeScore, makeTask } from './__tests__/helpers';

describe('Explanations', () => {
  const task = makeTask({
    task_type: 'research',
    domain: 'technology',
    required_capabilities: ['nlp', 'search'],
    keywords: ['search', 'papers'],
    confidence: 0.9,
  });

  it('should render an empty result without throwing', () => {
    const result: DiscoveryResult = {
      trace_id: 'trace-empty',
      task_analysis: makeTask(),
      recommended_agents: [],
      total_agents_evaluated: 0,
      search_time_seconds: 0,
      suggestions: [],
    };

    const text = explainRecommendations(result);

    expect(text).toContain('=== No Agents Found ===');
    expect(text.split('\n').at(-1)).toBe('=== No Agents Found ===');
  });

  it('should render every section of a populated result', () => {
    const agent = {
      ...makeScore('agent-a', 0.96, 0.9),
      match_reasons: ['Matching capabilities: nlp, search', 'Domain expertise: technology'],
    };
    const result: DiscoveryResult = {
      trace_id: 'trace-1',
      task_analysis: task,
      recommended_agents: [agent],
      total_agents_evaluated: 3,
      search_time_seconds: 0.0123,
      suggestions: ['Only one agent found - consider broadening your search criteria'],
    };

    expect(explainRecommendations(result)).toBe(
      [
        '=== Task Analysis ===',
        'Task Type: research',
        'Domain: technology',
        'Complexity: simple',
        'Required Capabilities: nlp, search',
        'Key Keywords: search, papers',
        'Analysis Confidence: 0.90',
        '',
        '=== Search Results ===',
        'Total Agents Evaluated: 3',
        'Agents Recommended: 1',
        'Search Time: 0.01 seconds',
        '',
        '=== Recommended Agents ===',
        '',
        '1. Agent: agent-a',
        '   Score: 0.96',
        '   Confidence: 0.90',
        '   Match Reasons:',
        '     - Matching capabilities: nlp, search',
        '     - Domain expertise: technology',
        '',
        '=== Suggestions ===',
        '- Only one agent found - consider broadening your search criteria',
      ].join('\n')
    );
  });

  it('should only show the first five keywords', () => {
    const result: DiscoveryResult = {
      trace_id: 'trace-2',
      task_analysis: makeTask({ keywords: ['a', 'b', 'c', 'd', 'e', 'f', 'g'] }),
      recommended_agents: [],
      total_agents_evaluated: 0,
      search_time_seconds: 0,
      suggestions: [],
    };

    expect(explainRecommendations(result)).toContain('Key Keywords: a, b, c, d, e\n');
  });

  it('should break a score down into all six signals', () => {
    const score = {
      agent_id: 'agent-b',
      score: 0.546,
      confidence: 0.856,
      match_reasons: ['Related domain: banking'],
      metadata: {
        capability_score: 0.5,
        domain_score: 0.9,
        keyword_score: 0,
        performance_score: 0.7,
        availability_score: 1,
        load_score: 0.5,
      },
    };

    expect(explainScore(score)).toBe(
      [
        'Overall score: 0.55 (confidence: 0.86)',
        'Match reasons:',
        '  - Related domain: banking',
        'Score breakdown:',
        '  - Capability match: 0.50',
        '  - Domain expertise: 0.90',
        '  - Keyword relevance: 0.00',
        '  - Performance: 0.70',
        '  - Availability: 1.00',
        '  - Load: 0.50',
      ].join('\n')
    );
  });
});
