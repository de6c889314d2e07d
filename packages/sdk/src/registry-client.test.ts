/**
 * Tests for registry clients
 */

import { describe, it, expect, vi } from 'vitest';
import { HttpRegistryClient, StaticRegistryClient, matchesSearch, settle } from './registry-client';
import { RegistryError, TimeoutError } from './errors';
import { makeAgent } from './__tests__/helpers';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createClient(fetchImpl: typeof fetch): HttpRegistryClient {
  return new HttpRegistryClient({ baseUrl: 'http://registry.test/', fetchImpl });
}

describe('Registry Clients', () => {
  describe('matchesSearch', () => {
    const agent = makeAgent({
      agent_id: 'summarizer',
      description: 'Summarizes long Finance reports',
      capabilities: ['nlp'],
      tags: ['text'],
    });

    it('should match query against id and description case-insensitively', () => {
      expect(matchesSearch(agent, { query: 'finance' })).toBe(true);
      expect(matchesSearch(agent, { query: 'SUMMARIZER' })).toBe(true);
      expect(matchesSearch(agent, { query: 'legal' })).toBe(false);
    });

    it('should match capabilities and tags on any overlap', () => {
      expect(matchesSearch(agent, { capabilities: ['ocr', 'nlp'] })).toBe(true);
      expect(matchesSearch(agent, { capabilities: ['ocr'] })).toBe(false);
      expect(matchesSearch(agent, { tags: ['image'] })).toBe(false);
    });
  });

  describe('HttpRegistryClient', () => {
    it('should send comma-joined capabilities to /search', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([{ agent_id: 'nlp-agent' }]));
      const client = createClient(fetchMock);

      const result = await client.searchAgents({ capabilities: ['nlp', 'search'] });

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe('http://registry.test/search?capabilities=nlp%2Csearch');
      expect(result.ok && result.value.map((agent) => agent.agent_id)).toEqual(['nlp-agent']);
    });

    it('should filter the listing locally when /search fails', async () => {
      const fetchMock = vi
        .fn<typeof fetch>()
        .mockResolvedValueOnce(jsonResponse({ error: 'boom' }, 500))
        .mockResolvedValueOnce(
          jsonResponse([
            { agent_id: 'a', capabilities: ['nlp'] },
            { agent_id: 'b', capabilities: ['ocr'] },
          ])
        );
      const client = createClient(fetchMock);

      const result = await client.searchAgents({ capabilities: ['nlp'] });

      expect(fetchMock.mock.calls[1][0]).toBe('http://registry.test/list');
      expect(result.ok && result.value.map((agent) => agent.agent_id)).toEqual(['a']);
    });

    it('should report network failures as RegistryError', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(new Error('connect ECONNREFUSED'));
      const client = createClient(fetchMock);

      const result = await client.listAgents();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RegistryError);
        expect(result.error.message).toBe('connect ECONNREFUSED');
      }
    });

    it('should report aborted requests as TimeoutError', async () => {
      const abort = Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
      const fetchMock = vi.fn<typeof fetch>().mockRejectedValue(abort);
      const client = createClient(fetchMock);

      const result = await client.listAgents();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(TimeoutError);
        expect(result.error.code).toBe('TIMEOUT');
      }
    });

    it('should return null for unknown agents', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ detail: 'not found' }, 404));
      const client = createClient(fetchMock);

      const result = await client.getAgentMetadata('ghost');

      expect(fetchMock.mock.calls[0][0]).toBe('http://registry.test/lookup/ghost');
      expect(result).toEqual({ ok: true, value: null });
    });

    it('should fill in the agent id when lookup omits it', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ domain: 'Finance' }));
      const client = createClient(fetchMock);

      const result = await client.getAgentMetadata('fin-1');

      expect(result.ok && result.value?.agent_id).toBe('fin-1');
      expect(result.ok && result.value?.domain).toBe('finance');
    });

    it('should report health from /health', async () => {
      const healthy = createClient(vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ status: 'ok' })));
      const down = createClient(vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({}, 503)));

      expect(await healthy.healthCheck()).toBe(true);
      expect(await down.healthCheck()).toBe(false);
    });
  });

  describe('getRegistryStats', () => {
    it('should return the stats object from /stats', async () => {
      const fetchMock = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ total_agents: 4, online: 3 }));
      const client = createClient(fetchMock);

      const result = await client.getRegistryStats();

      expect(fetchMock.mock.calls[0][0]).toBe('http://registry.test/stats');
      expect(result).toEqual({ ok: true, value: { total_agents: 4, online: 3 } });
    });

    it('should return null for a non-object body', async () => {
      const client = createClient(vi.fn<typeof fetch>().mockResolvedValue(jsonResponse([1, 2])));

      expect(await client.getRegistryStats()).toEqual({ ok: true, value: null });
    });

    it('should report failures', async () => {
      const client = createClient(vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ error: 'boom' }, 500)));

      const result = await client.getRegistryStats();

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RegistryError);
        expect(result.error.message).toBe('HTTP 500: {"error":"boom"}');
      }
    });
  });

  describe('settle', () => {
    it('should turn a rejection into a failed result', async () => {
      const result = await settle(Promise.reject(new Error('socket hang up')));

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RegistryError);
        expect(result.error.message).toBe('socket hang up');
      }
    });
  });

  describe('StaticRegistryClient', () => {
    it('should search, upsert and remove agents', async () => {
      const registry = StaticRegistryClient.fromJson([
        { agent_id: 'a', capabilities: ['nlp'] },
        { agent_id: 'b', capabilities: 'ocr' },
        { description: 'missing id' },
      ]);

      const ocr = await registry.searchAgents({ capabilities: ['ocr'] });
      expect(ocr.ok && ocr.value.map((agent) => agent.agent_id)).toEqual(['b']);

      registry.upsert(makeAgent({ agent_id: 'a', capabilities: ['ocr'] }));
      const updated = await registry.searchAgents({ capabilities: ['ocr'] });
      expect(updated.ok && updated.value.map((agent) => agent.agent_id)).toEqual(['a', 'b']);

      expect(registry.remove('b')).toBe(true);
      expect(registry.remove('b')).toBe(false);
      expect(await registry.getAgentMetadata('b')).toEqual({ ok: true, value: null });
    });
  });
});
