/**
 * Agent directory type definitions
 */

export const AGENT_STATUSES = ['online', 'available', 'busy', 'offline', 'unknown'] as const;

export type AgentStatus = (typeof AGENT_STATUSES)[number];

/**
 * Normalized view of one registry entry. Read-only to the discovery engine.
 */
export interface AgentRecord {
  agent_id: string;
  capabilities: string[];
  /** Lowercase expertise area; may be empty or "general" */
  domain: string;
  keywords: string[];
  description: string;
  status?: AgentStatus;
  /** ISO-8601 timestamp */
  last_seen?: string;
  /** 0 (idle) to 1 (saturated) */
  current_load: number;
  agent_url?: string;
  api_url?: string;
  tags?: string[];
}

/**
 * Historical metrics fed in by telemetry, keyed by agent id
 */
export interface PerformanceMetrics {
  success_rate?: number;
  /** Seconds */
  avg_response_time?: number;
  reliability?: number;
}

export type PerformanceSnapshot = ReadonlyMap<string, PerformanceMetrics>;
