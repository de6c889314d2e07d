/**
 * Agent record normalization and identity
 */

import { createHash } from 'crypto';
import { canonicalize } from 'json-canonicalize';
import { AGENT_STATUSES, type AgentRecord, type AgentStatus } from '@taskmatch/core';

export const DEFAULT_AGENT_LOAD = 0.5;

type JsonObject = Record<string, unknown>;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAgentStatus(value: string): value is AgentStatus {
  return AGENT_STATUSES.some((status) => status === value);
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/**
 * Registries emit tag lists either as arrays or as comma-separated strings
 */
function readStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.trim() !== '').map((item) => item.trim());
  }
  if (typeof value === 'string') {
    return value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item !== '');
  }
  return [];
}

function readStatus(value: unknown): AgentStatus | undefined {
  const status = readString(value)?.trim().toLowerCase();
  if (!status) {
    return undefined;
  }
  return isAgentStatus(status) ? status : 'unknown';
}

function readLoad(value: unknown): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return DEFAULT_AGENT_LOAD;
  }
  return Math.max(0, Math.min(1, value));
}

/**
 * Convert a raw registry payload into an AgentRecord.
 * Returns null when the payload has no usable agent_id.
 */
export function normalizeAgentRecord(raw: unknown): AgentRecord | null {
  if (!isJsonObject(raw)) {
    return null;
  }

  const agentId = readString(raw.agent_id)?.trim();
  if (!agentId) {
    return null;
  }

  const record: AgentRecord = {
    agent_id: agentId,
    capabilities: readStringList(raw.capabilities),
    domain: (readString(raw.domain) ?? '').trim().toLowerCase(),
    keywords: readStringList(raw.keywords),
    description: readString(raw.description) ?? '',
    current_load: readLoad(raw.current_load),
  };

  const status = readStatus(raw.status);
  if (status) record.status = status;

  const lastSeen = readString(raw.last_seen);
  if (lastSeen) record.last_seen = lastSeen;

  const agentUrl = readString(raw.agent_url);
  if (agentUrl) record.agent_url = agentUrl;

  const apiUrl = readString(raw.api_url);
  if (apiUrl) record.api_url = apiUrl;

  const tags = readStringList(raw.tags);
  if (tags.length > 0) record.tags = tags;

  return record;
}

export function normalizeAgentRecords(raw: unknown): AgentRecord[] {
  if (!Array.isArray(raw)) {
    return [];
  }
  const records: AgentRecord[] = [];
  for (const item of raw) {
    const record = normalizeAgentRecord(item);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

/**
 * Canonical identity of a record: agent id plus a content hash of every field.
 * List-valued fields are compared as sets, so ordering does not matter.
 */
export function agentIdentityKey(agent: AgentRecord): string {
  const content: JsonObject = {
    agent_id: agent.agent_id,
    capabilities: [...new Set(agent.capabilities)].sort(),
    domain: agent.domain,
    keywords: [...new Set(agent.keywords)].sort(),
    description: agent.description,
    current_load: agent.current_load,
  };
  if (agent.status !== undefined) content.status = agent.status;
  if (agent.last_seen !== undefined) content.last_seen = agent.last_seen;
  if (agent.agent_url !== undefined) content.agent_url = agent.agent_url;
  if (agent.api_url !== undefined) content.api_url = agent.api_url;
  if (agent.tags !== undefined) content.tags = [...new Set(agent.tags)].sort();

  const digest = createHash('sha256').update(canonicalize(content)).digest('hex');
  return `${agent.agent_id}:${digest}`;
}

/**
 * Union several result lists, keeping the first occurrence of each identity
 */
export function dedupeAgents(...lists: ReadonlyArray<readonly AgentRecord[]>): AgentRecord[] {
  const seen = new Set<string>();
  const merged: AgentRecord[] = [];
  for (const list of lists) {
    for (const agent of list) {
      const key = agentIdentityKey(agent);
      if (!seen.has(key)) {
        seen.add(key);
        merged.push(agent);
      }
    }
  }
  return merged;
}
