/**
 * Service Configuration
 *
 * Environment-based settings for the discovery service. Values are read from
 * process.env (populated by dotenv in the server entry point) with defaults.
 */

import type { ScoringWeights } from '@taskmatch/core';
import { createScoringWeights, ValidationError } from '@taskmatch/sdk';

// ============================================================================
// Type Definitions
// ============================================================================

export interface ServiceConfig {
  port: number;
  registryUrl: string;
  registryTimeoutMs: number;
  defaultLimit: number;
  defaultMinScore: number;
  weights: ScoringWeights;
}

type Env = Record<string, string | undefined>;

// ============================================================================
// Parsing
// ============================================================================

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${key} must be a number (got "${raw}")`, 'INVALID_CONFIG');
  }
  return value;
}

function readInteger(env: Env, key: string, fallback: number, min: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value) || value < min) {
    throw new ValidationError(`${key} must be an integer >= ${min} (got ${value})`, 'INVALID_CONFIG');
  }
  return value;
}

/**
 * Ranking weights from DISCOVERY_*_WEIGHT, falling back to the defaults
 *
 * @throws ValidationError if the weights don't sum to 1.0
 */
export function getDiscoveryWeights(env: Env = process.env): ScoringWeights {
  const overrides: Partial<Record<keyof ScoringWeights, number>> = {};
  const keys: Array<[keyof ScoringWeights, string]> = [
    ['capability_match', 'DISCOVERY_CAPABILITY_WEIGHT'],
    ['domain_match', 'DISCOVERY_DOMAIN_WEIGHT'],
    ['keyword_match', 'DISCOVERY_KEYWORD_WEIGHT'],
    ['performance', 'DISCOVERY_PERFORMANCE_WEIGHT'],
    ['availability', 'DISCOVERY_AVAILABILITY_WEIGHT'],
    ['load', 'DISCOVERY_LOAD_WEIGHT'],
  ];

  for (const [weight, envKey] of keys) {
    if (env[envKey] !== undefined) {
      overrides[weight] = readNumber(env, envKey, 0);
    }
  }

  return createScoringWeights(overrides);
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  const defaultMinScore = readNumber(env, 'DISCOVERY_MIN_SCORE', 0.3);
  if (defaultMinScore < 0 || defaultMinScore > 1) {
    throw new ValidationError(`DISCOVERY_MIN_SCORE must be between 0 and 1 (got ${defaultMinScore})`, 'INVALID_CONFIG');
  }

  return {
    port: readInteger(env, 'PORT', 8080, 0),
    registryUrl: env.REGISTRY_URL || 'http://localhost:6900',
    registryTimeoutMs: readInteger(env, 'REGISTRY_TIMEOUT_MS', 10000, 1),
    defaultLimit: readInteger(env, 'DISCOVERY_DEFAULT_LIMIT', 5, 1),
    defaultMinScore,
    weights: getDiscoveryWeights(env),
  };
}
