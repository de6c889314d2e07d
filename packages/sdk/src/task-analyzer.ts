/**
 * Task Analysis
 *
 * The discovery engine consumes a TaskAnalysis from any TaskAnalyzer.
 * KeywordTaskAnalyzer is a deterministic lexicon-based implementation with
 * no model calls; swap in a richer analyzer through AgentDiscovery options.
 */

import { TASK_COMPLEXITIES, type TaskAnalysis, type TaskComplexity } from '@taskmatch/core';
import lexicon from '../data/task-lexicon.json';
import { isJsonObject } from './agent-record';
import { ValidationError } from './errors';

export interface TaskAnalyzer {
  analyzeTask(text: string): TaskAnalysis;
}

// ============================================================================
// Validation
// ============================================================================

function isTaskComplexity(value: unknown): value is TaskComplexity {
  return TASK_COMPLEXITIES.some((complexity) => complexity === value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Check an analyzer's output before it reaches the scorer.
 * An empty domain is read as "general".
 *
 * @throws ValidationError when a field is missing or out of range
 */
export function validateTaskAnalysis(value: unknown): TaskAnalysis {
  if (!isJsonObject(value)) {
    throw new ValidationError('Task analysis must be an object', 'INVALID_TASK_ANALYSIS');
  }

  const { task_type, domain, complexity, required_capabilities, keywords, confidence } = value;

  if (typeof task_type !== 'string') {
    throw new ValidationError('task_type must be a string', 'INVALID_TASK_ANALYSIS');
  }
  if (typeof domain !== 'string') {
    throw new ValidationError('domain must be a string', 'INVALID_TASK_ANALYSIS');
  }
  if (!isTaskComplexity(complexity)) {
    throw new ValidationError(
      `complexity must be one of: ${TASK_COMPLEXITIES.join(', ')}`,
      'INVALID_TASK_ANALYSIS'
    );
  }
  if (!isStringArray(required_capabilities)) {
    throw new ValidationError('required_capabilities must be an array of strings', 'INVALID_TASK_ANALYSIS');
  }
  if (!isStringArray(keywords)) {
    throw new ValidationError('keywords must be an array of strings', 'INVALID_TASK_ANALYSIS');
  }
  if (typeof confidence !== 'number' || Number.isNaN(confidence) || confidence < 0 || confidence > 1) {
    throw new ValidationError('confidence must be a number between 0 and 1', 'INVALID_TASK_ANALYSIS');
  }

  const normalizedDomain = domain.trim().toLowerCase();

  return {
    task_type,
    domain: normalizedDomain === '' ? 'general' : normalizedDomain,
    complexity,
    required_capabilities: [...required_capabilities],
    keywords: [...keywords],
    confidence,
  };
}

// ============================================================================
// Keyword analyzer
// ============================================================================

const STOPWORDS = new Set(lexicon.stopwords);
const MAX_KEYWORDS = 10;

const EXPLICIT_DOMAIN_PATTERN = /\b([a-z][a-z0-9_-]*)\s+domain\b/;
const EXPLICIT_CAPABILITIES_PATTERN = /capabilities:\s*([^.;\n]+)/i;

function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9_-]+/)
    .map((token) => token.replace(/^-+|-+$/g, ''))
    .filter((token) => token.length > 1 && !STOPWORDS.has(token));
}

/**
 * Pick the lexicon entry with the most hits; earlier entries win ties
 */
function bestMatch(entries: Record<string, string[]>, tokens: ReadonlySet<string>): string | undefined {
  let best: string | undefined;
  let bestHits = 0;
  for (const [name, triggers] of Object.entries(entries)) {
    const hits = triggers.filter((trigger) => tokens.has(trigger)).length;
    if (hits > bestHits) {
      best = name;
      bestHits = hits;
    }
  }
  return best;
}

function rankKeywords(tokens: string[]): string[] {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  // Map preserves first-appearance order and sort is stable
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, MAX_KEYWORDS)
    .map(([token]) => token);
}

export class KeywordTaskAnalyzer implements TaskAnalyzer {
  analyzeTask(text: string): TaskAnalysis {
    const tokens = tokenize(text);
    const tokenSet = new Set(tokens);

    const explicitDomain = EXPLICIT_DOMAIN_PATTERN.exec(text.toLowerCase())?.[1];
    const detectedDomain = bestMatch(lexicon.domains, tokenSet);
    const domain = explicitDomain ?? detectedDomain ?? 'general';

    const capabilities = new Set<string>();
    const explicitCapabilities = EXPLICIT_CAPABILITIES_PATTERN.exec(text)?.[1];
    if (explicitCapabilities) {
      for (const capability of explicitCapabilities.split(',')) {
        const trimmed = capability.trim();
        if (trimmed) capabilities.add(trimmed);
      }
    }
    for (const [capability, triggers] of Object.entries(lexicon.capabilities)) {
      if (triggers.some((trigger) => tokenSet.has(trigger))) {
        capabilities.add(capability);
      }
    }

    const taskType = bestMatch(lexicon.task_types, tokenSet) ?? 'general';
    const keywords = rankKeywords(tokens);

    return {
      task_type: taskType,
      domain,
      complexity: this.estimateComplexity(tokens, tokenSet, capabilities.size),
      required_capabilities: [...capabilities],
      keywords,
      confidence: this.estimateConfidence(domain !== 'general', capabilities.size > 0, taskType !== 'general', keywords.length),
    };
  }

  private estimateComplexity(tokens: string[], tokenSet: ReadonlySet<string>, capabilityCount: number): TaskComplexity {
    const markers = lexicon.complexity_markers;
    if (capabilityCount >= 3 || tokens.length > 40 || markers.complex.some((m) => tokenSet.has(m))) {
      return 'complex';
    }
    if (capabilityCount === 2 || tokens.length > 15 || markers.moderate.some((m) => tokenSet.has(m))) {
      return 'moderate';
    }
    return 'simple';
  }

  private estimateConfidence(hasDomain: boolean, hasCapabilities: boolean, hasTaskType: boolean, keywordCount: number): number {
    let confidence = 0.5;
    if (hasDomain) confidence += 0.2;
    if (hasCapabilities) confidence += 0.15;
    if (hasTaskType) confidence += 0.1;
    if (keywordCount >= 3) confidence += 0.05;
    return Math.min(1.0, Math.round(confidence * 100) / 100);
  }
}
