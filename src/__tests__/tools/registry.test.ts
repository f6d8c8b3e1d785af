/**
 * Tool Registry Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ToolResponse } from '../../errors/index.js';
import { toMcpTools } from '../../mcp/server.js';
import type { Strata } from '../../strata.js';
import { callTool, listTools, registerTools, type ToolRegistry } from '../../tools/index.js';
import { createTestStrata, memoryConfig } from '../fixtures.js';

const TOOL_NAMES = [
  'strata_graph_add',
  'strata_graph_connect',
  'strata_graph_query',
  'strata_graph_remove',
  'strata_graph_restore',
  'strata_graph_status',
  'strata_experience_save',
  'strata_experience_search',
  'strata_experience_prune',
  'strata_learn',
  'strata_recall',
  'strata_crossref',
  'strata_context',
  'strata_related',
];

function dataOf(result: ToolResponse): unknown {
  if (!result.ok) throw new Error(`tool failed: ${result.error.message}`);
  return result.data;
}

function idOf(data: unknown): string {
  if (typeof data === 'object' && data !== null && 'id' in data && typeof data.id === 'string') {
    return data.id;
  }
  throw new Error('no id in tool result');
}

describe('Tool registry', () => {
  let strata: Strata;
  let registry: ToolRegistry;

  beforeEach(async () => {
    strata = await createTestStrata();
    registry = registerTools(strata);
  });

  afterEach(async () => {
    await strata.close();
  });

  it('should register every tool once', () => {
    expect(listTools(registry).map((t) => t.name)).toEqual(TOOL_NAMES);
  });

  it('should advertise object input schemas over MCP', () => {
    const tools = toMcpTools(registry);
    expect(tools.map((t) => t.name)).toEqual(TOOL_NAMES);
    for (const tool of tools) {
      expect(tool.inputSchema.type).toBe('object');
      expect(tool.description?.length).toBeGreaterThan(0);
    }
  });

  it('should answer an unknown tool with InvalidArgument', async () => {
    const result = await callTool(registry, 'strata_nope', {});
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidArgument');
      expect(result.error.message.startsWith('Unknown tool: strata_nope. Available: strata_graph_add, ')).toBe(true);
    }
  });

  describe('graph tools', () => {
    it('should add a node', async () => {
      const result = await callTool(registry, 'strata_graph_add', {
        name: 'Redis',
        type: 'service',
        tags: ['cache'],
      });
      expect(result).toMatchObject({
        ok: true,
        data: { name: 'Redis', type: 'service', namespace: 'knowledge', tags: ['cache'] },
      });
    });

    it('should turn schema failures into InvalidArgument', async () => {
      expect(await callTool(registry, 'strata_graph_add', {})).toEqual({
        ok: false,
        error: {
          kind: 'InvalidArgument',
          message: 'name: Required; type: Required',
          recoveryHints: ['Fix the arguments and call again'],
          retryable: false,
        },
      });
    });

    it('should reject a weight above 1', async () => {
      const result = await callTool(registry, 'strata_graph_connect', {
        source_id: 'node_a',
        target_id: 'node_b',
        edge_type: 'calls',
        weight: 2,
      });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toMatch(/^weight: /);
    });

    it('should connect, remove and restore through tools', async () => {
      const a = idOf(dataOf(await callTool(registry, 'strata_graph_add', { name: 'API', type: 'service' })));
      const b = idOf(dataOf(await callTool(registry, 'strata_graph_add', { name: 'Auth', type: 'service' })));
      const edgeArgs = { source_id: a, target_id: b, edge_type: 'calls' };

      expect(await callTool(registry, 'strata_graph_connect', { ...edgeArgs, weight: 0.7 })).toMatchObject({
        ok: true,
        data: { sourceId: a, targetId: b, type: 'calls', weight: 0.7 },
      });
      expect(dataOf(await callTool(registry, 'strata_graph_remove', edgeArgs))).toEqual({
        removed: 'edge',
        sourceId: a,
        targetId: b,
        type: 'calls',
      });
      expect(await callTool(registry, 'strata_graph_restore', edgeArgs)).toMatchObject({
        ok: true,
        data: { restored: 'edge', edge: { sourceId: a, deletedAt: null } },
      });
      expect(dataOf(await callTool(registry, 'strata_graph_status', {}))).toEqual({
        nodeCount: 2,
        edgeCount: 1,
        perNamespaceCounts: { knowledge: 2 },
      });
    });

    it('should require either a node id or an edge key to remove', async () => {
      const result = await callTool(registry, 'strata_graph_remove', { source_id: 'node_a' });
      expect(result).toMatchObject({
        ok: false,
        error: { kind: 'InvalidArgument', message: 'Pass node_id, or source_id + target_id + edge_type' },
      });
    });

    it('should report a missing node as NotFound', async () => {
      expect(await callTool(registry, 'strata_graph_remove', { node_id: 'node_missing' })).toMatchObject({
        ok: false,
        error: { kind: 'NotFound', message: 'Node not found: node_missing', retryable: false },
      });
    });
  });

  describe('experience and intelligence tools', () => {
    it('should learn and recall', async () => {
      expect(
        await callTool(registry, 'strata_learn', {
          content: 'Cache invalidation runs on publish',
          type: 'decision',
          confidence: 'low',
        })
      ).toMatchObject({ ok: true, data: { routing: 'decaying', nodeId: null } });

      expect(await callTool(registry, 'strata_recall', { topic: 'cache invalidation' })).toMatchObject({
        ok: true,
        data: { topic: 'cache invalidation', count: 1 },
      });
    });

    it('should reject an unknown experience type', async () => {
      const result = await callTool(registry, 'strata_experience_save', { content: 'x', type: 'rumour' });
      expect(result).toMatchObject({ ok: false, error: { kind: 'InvalidArgument' } });
    });

    it('should search and prune experiences', async () => {
      await callTool(registry, 'strata_experience_save', { content: 'Pin the node version in CI', type: 'solution' });

      expect(await callTool(registry, 'strata_experience_search', { text: 'node version' })).toMatchObject({
        ok: true,
        data: { count: 1, results: [{ content: 'Pin the node version in CI', accessCount: 1, relevance: 1 }] },
      });
      expect(await callTool(registry, 'strata_experience_prune', { threshold: 0.5 })).toEqual({
        ok: true,
        data: { removed: 0 },
      });
    });

    it('should resolve context and related nodes', async () => {
      const a = idOf(dataOf(await callTool(registry, 'strata_graph_add', { name: 'Ledger service', type: 'service' })));
      const b = idOf(dataOf(await callTool(registry, 'strata_graph_add', { name: 'Audit log', type: 'store' })));
      await callTool(registry, 'strata_graph_connect', { source_id: a, target_id: b, edge_type: 'writes' });

      expect(await callTool(registry, 'strata_context', { keywords: 'ledger' })).toMatchObject({
        ok: true,
        data: { source: 'index', count: 1, nodes: [{ id: a, name: 'Ledger service', type: 'service' }] },
      });
      expect(dataOf(await callTool(registry, 'strata_related', { node_id: a }))).toMatchObject({
        originId: a,
        count: 2,
        nodes: [
          { id: a, depth: 0, via: null },
          { id: b, depth: 1, via: { type: 'writes' } },
        ],
      });
    });

    it('should cross-reference without peers', async () => {
      expect(await callTool(registry, 'strata_crossref', { problem: 'audit' })).toMatchObject({
        ok: true,
        data: { topic: 'audit', count: 0, items: [] },
      });
    });
  });
});

describe('Tool registry with configured pagination', () => {
  let strata: Strata;
  let registry: ToolRegistry;

  beforeEach(async () => {
    strata = await createTestStrata({
      config: memoryConfig({ pagination: { defaultLimit: 5, maxLimit: 20 } }),
    });
    registry = registerTools(strata);
  });

  afterEach(async () => {
    await strata.close();
  });

  it('should advertise the configured limit bounds', () => {
    const recall = listTools(registry).find((t) => t.name === 'strata_recall');
    expect(recall?.inputSchema.properties['limit']).toEqual({
      type: 'integer',
      minimum: 1,
      maximum: 20,
      description: 'Max results (default 5).',
    });
  });

  it('should reject limits above the configured maximum', async () => {
    const result = await callTool(registry, 'strata_recall', { topic: 'cache', limit: 30 });
    expect(result).toMatchObject({
      ok: false,
      error: { kind: 'InvalidArgument', message: 'limit: Number must be less than or equal to 20' },
    });
    expect(await callTool(registry, 'strata_recall', { topic: 'cache', limit: 20 })).toMatchObject({ ok: true });
  });
});
