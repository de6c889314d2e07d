/**
 * Plain-text rendering of discovery results and score breakdowns
 */

import type { AgentScore, DiscoveryResult } from '@taskmatch/core';

const fmt = (value: number): string => value.toFixed(2);

export function explainRecommendations(result: DiscoveryResult): string {
  const lines: string[] = [];
  const task = result.task_analysis;

  lines.push('=== Task Analysis ===');
  lines.push(`Task Type: ${task.task_type}`);
  lines.push(`Domain: ${task.domain}`);
  lines.push(`Complexity: ${task.complexity}`);
  lines.push(`Required Capabilities: ${task.required_capabilities.join(', ')}`);
  lines.push(`Key Keywords: ${task.keywords.slice(0, 5).join(', ')}`);
  lines.push(`Analysis Confidence: ${fmt(task.confidence)}`);
  lines.push('');

  lines.push('=== Search Results ===');
  lines.push(`Total Agents Evaluated: ${result.total_agents_evaluated}`);
  lines.push(`Agents Recommended: ${result.recommended_agents.length}`);
  lines.push(`Search Time: ${fmt(result.search_time_seconds)} seconds`);
  lines.push('');

  if (result.recommended_agents.length > 0) {
    lines.push('=== Recommended Agents ===');
    result.recommended_agents.forEach((agent, index) => {
      lines.push('');
      lines.push(`${index + 1}. Agent: ${agent.agent_id}`);
      lines.push(`   Score: ${fmt(agent.score)}`);
      lines.push(`   Confidence: ${fmt(agent.confidence)}`);
      if (agent.match_reasons.length > 0) {
        lines.push('   Match Reasons:');
        for (const reason of agent.match_reasons) {
          lines.push(`     - ${reason}`);
        }
      }
    });
  } else {
    lines.push('=== No Agents Found ===');
  }

  if (result.suggestions.length > 0) {
    lines.push('');
    lines.push('=== Suggestions ===');
    for (const suggestion of result.suggestions) {
      lines.push(`- ${suggestion}`);
    }
  }

  return lines.join('\n');
}

/**
 * Per-agent audit view: overall score, reasons and all six signals
 */
export function explainScore(agentScore: AgentScore): string {
  const lines: string[] = [];
  const breakdown = agentScore.metadata;

  lines.push(`Overall score: ${fmt(agentScore.score)} (confidence: ${fmt(agentScore.confidence)})`);

  if (agentScore.match_reasons.length > 0) {
    lines.push('Match reasons:');
    for (const reason of agentScore.match_reasons) {
      lines.push(`  - ${reason}`);
    }
  }

  lines.push('Score breakdown:');
  lines.push(`  - Capability match: ${fmt(breakdown.capability_score)}`);
  lines.push(`  - Domain expertise: ${fmt(breakdown.domain_score)}`);
  lines.push(`  - Keyword relevance: ${fmt(breakdown.keyword_score)}`);
  lines.push(`  - Performance: ${fmt(breakdown.performance_score)}`);
  lines.push(`  - Availability: ${fmt(breakdown.availability_score)}`);
  lines.push(`  - Load: ${fmt(breakdown.load_score)}`);

  return lines.join('\n');
}
