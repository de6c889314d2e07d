/**
 * Discovery suggestions derived from the shape of the results
 */

import type { AgentScore, TaskAnalysis } from '@taskmatch/core';

const MODERATE_MATCH_THRESHOLD = 0.7;

export function generateSuggestions(task: TaskAnalysis, recommendations: readonly AgentScore[]): string[] {
  const suggestions: string[] = [];

  if (recommendations.length === 0) {
    suggestions.push(
      'No agents found matching your requirements',
      `Try searching for agents with '${task.domain}' domain expertise`,
      'Consider breaking down your task into smaller components',
      'Check if your required capabilities are too specific'
    );
  } else if (recommendations.length === 1) {
    suggestions.push('Only one agent found - consider broadening your search criteria');
  } else if (task.complexity === 'complex') {
    suggestions.push(
      'This appears to be a complex task',
      'Consider using multiple agents for different components',
      "Review the top agents' capabilities to ensure full coverage"
    );
  }

  if (task.task_type === 'data_analysis') {
    suggestions.push('For data analysis tasks, ensure agents have visualization capabilities');
  } else if (task.task_type === 'automation') {
    suggestions.push('For automation, look for agents with workflow management features');
  }

  const [top] = recommendations;
  if (top && top.score < MODERATE_MATCH_THRESHOLD) {
    suggestions.push('Match confidence is moderate - review agent details carefully');
  }

  return suggestions;
}
