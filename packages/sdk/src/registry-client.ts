/**
 * Registry Client
 * Lookup and search of agent records in an agent directory
 */

import { createLoggerFromEnv, type AgentRecord, type Logger } from '@taskmatch/core';
import { isJsonObject, normalizeAgentRecord, normalizeAgentRecords } from './agent-record';
import { RegistryError, TimeoutError, toRegistryError } from './errors';

export type RegistryResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RegistryError | TimeoutError };

export interface AgentSearchParams {
  query?: string;
  capabilities?: string[];
  tags?: string[];
}

export interface RegistryClient {
  searchAgents(params: AgentSearchParams): Promise<RegistryResult<AgentRecord[]>>;
  listAgents(): Promise<RegistryResult<AgentRecord[]>>;
  getAgentMetadata(agentId: string): Promise<RegistryResult<AgentRecord | null>>;
  healthCheck(): Promise<boolean>;
}

export function success<T>(value: T): RegistryResult<T> {
  return { ok: true, value };
}

export function failure<T>(error: RegistryError | TimeoutError): RegistryResult<T> {
  return { ok: false, error };
}

/**
 * Turn a rejected registry call into a failed result, for clients that throw
 * instead of returning `{ ok: false }`
 */
export function settle<T>(call: Promise<RegistryResult<T>>): Promise<RegistryResult<T>> {
  return call.catch((error: unknown) => failure<T>(toRegistryError(error)));
}

/**
 * Client-side search semantics: query is a case-insensitive substring of
 * "<agent_id> <description>"; capabilities and tags match on any overlap.
 */
export function matchesSearch(agent: AgentRecord, params: AgentSearchParams): boolean {
  if (params.query) {
    const text = `${agent.agent_id} ${agent.description}`.toLowerCase();
    if (!text.includes(params.query.toLowerCase())) {
      return false;
    }
  }

  if (params.capabilities && params.capabilities.length > 0) {
    if (!params.capabilities.some((capability) => agent.capabilities.includes(capability))) {
      return false;
    }
  }

  if (params.tags && params.tags.length > 0) {
    const agentTags = agent.tags ?? [];
    if (!params.tags.some((tag) => agentTags.includes(tag))) {
      return false;
    }
  }

  return true;
}

// ============================================================================
// HTTP registry
// ============================================================================

export interface HttpRegistryClientOptions {
  baseUrl: string;           // e.g., http://localhost:6900
  timeoutMs?: number;        // per-request HTTP timeout
  logger?: Logger;
  fetchImpl?: typeof fetch;
}

export class HttpRegistryClient implements RegistryClient {
  private baseUrl: string;
  private timeoutMs: number;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(opts: HttpRegistryClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/$/, '');
    this.timeoutMs = opts.timeoutMs ?? 10000;
    this.logger = opts.logger ?? createLoggerFromEnv('taskmatch-registry');
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  private async getJson(path: string, params?: URLSearchParams, timeoutMs = this.timeoutMs): Promise<unknown> {
    const search = params?.toString() ?? '';
    const url = search ? `${this.baseUrl}${path}?${search}` : `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const res = await this.fetchImpl(url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: controller.signal,
      });
      if (!res.ok) {
        const text = await res.text().catch(() => '');
        throw new RegistryError(`HTTP ${res.status}: ${text}`, res.status);
      }
      return await res.json();
    } finally {
      clearTimeout(timeout);
    }
  }

  async listAgents(): Promise<RegistryResult<AgentRecord[]>> {
    try {
      const body = await this.getJson('/list');
      return success(normalizeAgentRecords(body));
    } catch (error) {
      const err = toRegistryError(error);
      this.logger.warn('Registry list failed', { error: err.message, code: err.code });
      return failure(err);
    }
  }

  /**
   * Server-side search, falling back to filtering the full listing when the
   * registry has no working /search endpoint
   */
  async searchAgents(params: AgentSearchParams): Promise<RegistryResult<AgentRecord[]>> {
    const query = new URLSearchParams();
    if (params.query) query.set('q', params.query);
    if (params.capabilities && params.capabilities.length > 0) query.set('capabilities', params.capabilities.join(','));
    if (params.tags && params.tags.length > 0) query.set('tags', params.tags.join(','));

    try {
      const body = await this.getJson('/search', query);
      return success(normalizeAgentRecords(body));
    } catch (error) {
      const err = toRegistryError(error);
      this.logger.warn('Registry search failed, filtering listing locally', {
        error: err.message,
        code: err.code,
        query: params.query,
      });
      return this.filterAgentsLocally(params);
    }
  }

  private async filterAgentsLocally(params: AgentSearchParams): Promise<RegistryResult<AgentRecord[]>> {
    const listing = await this.listAgents();
    if (!listing.ok) {
      return listing;
    }
    return success(listing.value.filter((agent) => matchesSearch(agent, params)));
  }

  async getAgentMetadata(agentId: string): Promise<RegistryResult<AgentRecord | null>> {
    try {
      const body = await this.getJson(`/lookup/${encodeURIComponent(agentId)}`);
      if (!isJsonObject(body)) {
        return success(null);
      }
      // Lookup payloads do not always echo the id back
      return success(normalizeAgentRecord({ ...body, agent_id: body.agent_id ?? agentId }));
    } catch (error) {
      const err = toRegistryError(error);
      if (err instanceof RegistryError && err.status === 404) {
        return success(null);
      }
      this.logger.warn('Registry lookup failed', { agentId, error: err.message, code: err.code });
      return failure(err);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.getJson('/health', undefined, 5000);
      return true;
    } catch (error) {
      this.logger.debug('Registry health check failed', { error: toRegistryError(error).message });
      return false;
    }
  }

  async getRegistryStats(): Promise<RegistryResult<Record<string, unknown> | null>> {
    try {
      const body = await this.getJson('/stats');
      return success(isJsonObject(body) ? body : null);
    } catch (error) {
      const err = toRegistryError(error);
      this.logger.warn('Registry stats failed', { error: err.message, code: err.code });
      return failure(err);
    }
  }
}

// ============================================================================
// Static registry
// ============================================================================

/**
 * In-memory directory snapshot with the same search semantics as the HTTP
 * client's local fallback
 */
export class StaticRegistryClient implements RegistryClient {
  private agents: AgentRecord[];

  constructor(agents: readonly AgentRecord[] = []) {
    this.agents = [...agents];
  }

  static fromJson(raw: unknown): StaticRegistryClient {
    return new StaticRegistryClient(normalizeAgentRecords(raw));
  }

  upsert(agent: AgentRecord): void {
    const index = this.agents.findIndex((existing) => existing.agent_id === agent.agent_id);
    if (index >= 0) {
      this.agents[index] = agent;
    } else {
      this.agents.push(agent);
    }
  }

  remove(agentId: string): boolean {
    const before = this.agents.length;
    this.agents = this.agents.filter((agent) => agent.agent_id !== agentId);
    return this.agents.length < before;
  }

  async searchAgents(params: AgentSearchParams): Promise<RegistryResult<AgentRecord[]>> {
    return success(this.agents.filter((agent) => matchesSearch(agent, params)));
  }

  async listAgents(): Promise<RegistryResult<AgentRecord[]>> {
    return success([...this.agents]);
  }

  async getAgentMetadata(agentId: string): Promise<RegistryResult<AgentRecord | null>> {
    return success(this.agents.find((agent) => agent.agent_id === agentId) ?? null);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}
