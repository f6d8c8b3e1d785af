/**
 * Graph Engine Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { GraphEngine, normaliseRank } from '../../graph/engine.js';
import { SQLiteKnowledgeStore } from '../../storage/sqlite/storage.js';
import { createTestClock, EPOCH, type TestClock } from '../fixtures.js';

describe('GraphEngine', () => {
  let store: SQLiteKnowledgeStore;
  let time: TestClock;
  let graph: GraphEngine;

  beforeEach(async () => {
    store = new SQLiteKnowledgeStore(':memory:');
    await store.initialize();
    time = createTestClock();
    graph = new GraphEngine(store, { clock: time.clock });
  });

  afterEach(async () => {
    await store.close();
  });

  describe('addNode', () => {
    it('should fill defaults and stamp both timestamps', async () => {
      const node = await graph.addNode({ name: '  Redis  ', type: 'service', description: '   ' });

      expect(node.id).toMatch(/^node_/);
      expect(node.name).toBe('Redis');
      expect(node.namespace).toBe('knowledge');
      expect(node.description).toBeNull();
      expect(node.tags).toEqual([]);
      expect(node.properties).toEqual({});
      expect(node.createdAt).toBe(EPOCH);
      expect(node.updatedAt).toBe(EPOCH);
      expect(await graph.getNode(node.id)).toEqual(node);
    });

    it('should reject a blank name or type', async () => {
      await expect(graph.addNode({ name: ' ', type: 'service' })).rejects.toMatchObject({
        kind: 'InvalidArgument',
        detail: 'name must be a non-empty string',
      });
      await expect(graph.addNode({ name: 'Redis', type: '' })).rejects.toMatchObject({
        kind: 'InvalidArgument',
      });
      expect((await graph.status()).nodeCount).toBe(0);
    });

    it('should notify listeners after the node commits', async () => {
      const seen: string[] = [];
      graph.addListener({
        onNodeAdded: async (node) => {
          seen.push((await store.getNode(node.id))?.name ?? 'missing');
        },
      });
      await graph.addNode({ name: 'Kafka', type: 'service' });
      expect(seen).toEqual(['Kafka']);
    });

    it('should log and swallow listener failures', async () => {
      const warn = vi.fn();
      const logger = { error: vi.fn(), warn, info: vi.fn(), debug: vi.fn(), child: vi.fn() };
      const noisy = new GraphEngine(store, { clock: time.clock, logger });
      noisy.addListener({
        onNodeAdded: () => {
          throw new Error('index offline');
        },
      });

      const node = await noisy.addNode({ name: 'Kafka', type: 'service' });
      expect(await store.getNode(node.id)).not.toBeNull();
      expect(warn).toHaveBeenCalledWith('graph listener failed', expect.objectContaining({ event: 'onNodeAdded' }));
    });
  });

  describe('remove and restore', () => {
    it('should soft-delete and bring back a node', async () => {
      const node = await graph.addNode({ name: 'Redis', type: 'service' });
      time.advanceDays(1);
      await graph.removeNode(node.id);

      await expect(graph.getNode(node.id)).rejects.toMatchObject({ kind: 'NotFound' });
      expect((await graph.status()).nodeCount).toBe(0);

      time.advanceDays(1);
      const restored = await graph.restoreNode(node.id);
      expect(restored.deletedAt).toBeNull();
      expect(restored.updatedAt).toBe('2026-01-03T00:00:00.000Z');
    });

    it('should report NotFound for unknown or already removed nodes', async () => {
      await expect(graph.removeNode('node_missing')).rejects.toMatchObject({
        kind: 'NotFound',
        detail: 'Node not found: node_missing',
      });
      const node = await graph.addNode({ name: 'Redis', type: 'service' });
      await graph.removeNode(node.id);
      await expect(graph.removeNode(node.id)).rejects.toMatchObject({ kind: 'NotFound' });
      await expect(graph.restoreNode('node_missing')).rejects.toMatchObject({
        kind: 'NotFound',
        detail: 'No deleted node: node_missing',
      });
    });
  });

  describe('connect', () => {
    it('should upsert a single edge per triple', async () => {
      const a = await graph.addNode({ name: 'API gateway', type: 'service' });
      const b = await graph.addNode({ name: 'Auth service', type: 'service' });

      await graph.connect(a.id, b.id, 'calls', 0.5);
      time.advanceDays(1);
      const edge = await graph.connect(a.id, b.id, 'calls', 0.9);

      expect(edge.weight).toBe(0.9);
      expect(edge.createdAt).toBe(EPOCH);
      expect(edge.updatedAt).toBe('2026-01-02T00:00:00.000Z');
      expect((await graph.status()).edgeCount).toBe(1);
    });

    it('should default the weight to 1', async () => {
      const a = await graph.addNode({ name: 'A', type: 't' });
      const b = await graph.addNode({ name: 'B', type: 't' });
      expect((await graph.connect(a.id, b.id, 'next')).weight).toBe(1);
    });

    it('should reject weights outside [0, 1] and missing endpoints', async () => {
      const a = await graph.addNode({ name: 'A', type: 't' });
      await expect(graph.connect(a.id, a.id, 'self', 1.5)).rejects.toMatchObject({
        kind: 'InvalidArgument',
        detail: 'weight must be between 0 and 1',
      });
      await expect(graph.connect(a.id, 'node_missing', 'next')).rejects.toMatchObject({
        kind: 'NotFound',
      });
    });

    it('should remove and restore an edge', async () => {
      const a = await graph.addNode({ name: 'A', type: 't' });
      const b = await graph.addNode({ name: 'B', type: 't' });
      await graph.connect(a.id, b.id, 'next');

      await graph.removeEdge(a.id, b.id, 'next');
      expect(await graph.edgesOf(a.id)).toEqual([]);
      await expect(graph.removeEdge(a.id, b.id, 'next')).rejects.toMatchObject({ kind: 'NotFound' });

      const restored = await graph.restoreEdge(a.id, b.id, 'next');
      expect(restored.deletedAt).toBeNull();
      expect(await graph.edgesOf(a.id)).toHaveLength(1);
    });
  });

  describe('query', () => {
    it('should score the best text match 1 and the rest within (0, 1]', async () => {
      await graph.addNode({ name: 'Postgres replication lag', type: 'issue', description: 'replication replication' });
      await graph.addNode({ name: 'Postgres vacuum', type: 'task' });
      await graph.addNode({ name: 'Nginx timeouts', type: 'issue' });

      const hits = await graph.query({ text: 'postgres replication' });
      expect(hits).toHaveLength(2);
      expect(hits[0]?.node.name).toBe('Postgres replication lag');
      expect(hits[0]?.score).toBe(1);
      for (const hit of hits) {
        expect(hit.score).toBeGreaterThan(0);
        expect(hit.score).toBeLessThanOrEqual(1);
      }
    });

    it('should filter without text, scoring every hit 1', async () => {
      await graph.addNode({ name: 'A', type: 'issue', tags: ['db'] });
      await graph.addNode({ name: 'B', type: 'task', tags: ['db'] });

      const hits = await graph.query({ type: 'issue' });
      expect(hits.map((h) => [h.node.name, h.score])).toEqual([['A', 1]]);
    });

    it('should page with limit and offset', async () => {
      for (const name of ['A', 'B', 'C']) {
        await graph.addNode({ name, type: 't' });
        time.advanceDays(1);
      }
      const page = await graph.query({ limit: 1, offset: 1 });
      expect(page.map((h) => h.node.name)).toEqual(['B']);
      await expect(graph.query({ limit: 51 })).rejects.toMatchObject({ kind: 'InvalidArgument' });
    });
  });
});

describe('normaliseRank', () => {
  it('should divide by the best rank', () => {
    expect(normaliseRank(-2, -4)).toBe(0.5);
    expect(normaliseRank(-4, -4)).toBe(1);
  });

  it('should score unranked hits 1', () => {
    expect(normaliseRank(null, null)).toBe(1);
    expect(normaliseRank(-1, 0)).toBe(1);
  });
});
