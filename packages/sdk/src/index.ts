/**
 * TaskMatch SDK
 * Main entry point for SDK exports
 */

// Discovery facade
export { AgentDiscovery } from './discovery';
export type { AgentDiscoveryOptions } from './discovery';

// Agent records
export {
  agentIdentityKey,
  dedupeAgents,
  normalizeAgentRecord,
  normalizeAgentRecords,
  DEFAULT_AGENT_LOAD,
} from './agent-record';

// Task analysis
export { KeywordTaskAnalyzer, validateTaskAnalysis } from './task-analyzer';
export type { TaskAnalyzer } from './task-analyzer';

// Scoring
export {
  AgentScorer,
  createScoringWeights,
  domainSimilarity,
  scoreAvailability,
  scoreCapabilities,
  scoreDomain,
  scoreKeywords,
  scoreLoad,
  scorePerformance,
  scoringConfidence,
  DEFAULT_SCORING_WEIGHTS,
  DOMAIN_CLUSTERS,
  NEUTRAL_SCORE,
} from './scoring';
export type { AgentScorerOptions } from './scoring';

// Retrieval, ranking, suggestions, explanations
export { CandidateRetriever, applyFilters } from './retrieval';
export {
  rankAgents,
  topRecommendations,
  MIN_RECOMMENDATION_CONFIDENCE,
  DEFAULT_RECOMMENDATION_LIMIT,
  DEFAULT_MIN_SCORE,
} from './ranking';
export { generateSuggestions } from './suggestions';
export { explainRecommendations, explainScore } from './explain';

// Registry clients
export { HttpRegistryClient, StaticRegistryClient, matchesSearch, success, failure, settle } from './registry-client';
export type { RegistryClient, RegistryResult, AgentSearchParams, HttpRegistryClientOptions } from './registry-client';

// Errors
export * from './errors';
