/**
 * Request Validation
 */

import {
  AGENT_STATUSES,
  type AgentStatus,
  type DiscoveryFilters,
  type PerformanceMetrics,
} from '@taskmatch/core';
import { ValidationError } from '@taskmatch/sdk';

export interface DiscoveryRequest {
  task: string;
  limit?: number;
  min_score?: number;
  filters?: DiscoveryFilters;
  explain: boolean;
}

const MAX_LIMIT = 50;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalid(message: string): ValidationError {
  return new ValidationError(message, 'INVALID_DISCOVERY_REQUEST');
}

function isUnitInterval(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0 && value <= 1;
}

function parseStatus(value: unknown): AgentStatus {
  const status = AGENT_STATUSES.find((candidate) => candidate === value);
  if (status === undefined) {
    throw invalid(`filters.status must be one of: ${AGENT_STATUSES.join(', ')}`);
  }
  return status;
}

function parseFilters(value: unknown): DiscoveryFilters {
  if (!isRecord(value)) {
    throw invalid('filters must be an object');
  }

  const filters: DiscoveryFilters = {};

  if (value.status !== undefined) {
    filters.status = parseStatus(value.status);
  }

  if (value.exclude_agents !== undefined) {
    const excluded = value.exclude_agents;
    if (!Array.isArray(excluded) || !excluded.every((id): id is string => typeof id === 'string')) {
      throw invalid('filters.exclude_agents must be an array of agent ids');
    }
    filters.exclude_agents = excluded;
  }

  if (value.domain !== undefined) {
    if (typeof value.domain !== 'string') {
      throw invalid('filters.domain must be a string');
    }
    filters.domain = value.domain;
  }

  if (value.min_score !== undefined) {
    if (!isUnitInterval(value.min_score)) {
      throw invalid('filters.min_score must be a number between 0 and 1');
    }
    filters.min_score = value.min_score;
  }

  return filters;
}

/**
 * Parse a recommendation request body
 *
 * @throws ValidationError with code INVALID_DISCOVERY_REQUEST
 */
export function parseDiscoveryRequest(body: unknown): DiscoveryRequest {
  if (!isRecord(body)) {
    throw invalid('Request body must be a JSON object');
  }

  const { task, limit, min_score, filters, explain } = body;

  if (typeof task !== 'string' || task.trim() === '') {
    throw invalid('task must be a non-empty string');
  }

  const request: DiscoveryRequest = { task, explain: explain === true };

  if (limit !== undefined) {
    if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
      throw invalid(`limit must be an integer between 1 and ${MAX_LIMIT}`);
    }
    request.limit = limit;
  }

  if (min_score !== undefined) {
    if (!isUnitInterval(min_score)) {
      throw invalid('min_score must be a number between 0 and 1');
    }
    request.min_score = min_score;
  }

  if (filters !== undefined) {
    request.filters = parseFilters(filters);
  }

  return request;
}

/**
 * Parse a `limit` query parameter, e.g. `?limit=3`
 */
export function parseLimitParam(value: unknown, fallback: number): number {
  if (value === undefined) {
    return fallback;
  }
  const limit = typeof value === 'string' ? Number(value) : NaN;
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
    throw new ValidationError(`limit must be an integer between 1 and ${MAX_LIMIT}`, 'INVALID_LIMIT');
  }
  return limit;
}

export function parsePerformanceMetrics(body: unknown): PerformanceMetrics {
  if (!isRecord(body)) {
    throw new ValidationError('Request body must be a JSON object', 'INVALID_PERFORMANCE_METRICS');
  }

  const metrics: PerformanceMetrics = {};
  const { success_rate, avg_response_time, reliability } = body;

  if (success_rate !== undefined) {
    if (!isUnitInterval(success_rate)) {
      throw new ValidationError('success_rate must be a number between 0 and 1', 'INVALID_PERFORMANCE_METRICS');
    }
    metrics.success_rate = success_rate;
  }

  if (avg_response_time !== undefined) {
    if (typeof avg_response_time !== 'number' || !Number.isFinite(avg_response_time) || avg_response_time < 0) {
      throw new ValidationError('avg_response_time must be a non-negative number of seconds', 'INVALID_PERFORMANCE_METRICS');
    }
    metrics.avg_response_time = avg_response_time;
  }

  if (reliability !== undefined) {
    if (!isUnitInterval(reliability)) {
      throw new ValidationError('reliability must be a number between 0 and 1', 'INVALID_PERFORMANCE_METRICS');
    }
    metrics.reliability = reliability;
  }

  return metrics;
}
