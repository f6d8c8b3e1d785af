/**
 * Intelligence Layer Tests: learn, recall, context and related
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PROMOTED_NODE_TYPE } from '../../intelligence/promotion.js';
import type { Strata } from '../../strata.js';
import { createTestClock, createTestStrata, memoryConfig, type TestClock } from '../fixtures.js';

describe('IntelligenceLayer', () => {
  let strata: Strata;
  let time: TestClock;

  beforeEach(async () => {
    time = createTestClock();
    strata = await createTestStrata({ clock: time.clock });
  });

  afterEach(async () => {
    await strata.close();
  });

  describe('learn', () => {
    it('should store high confidence facts as a node plus a linked experience', async () => {
      const result = await strata.intelligence.learn({
        content: 'Use connection pooling for Postgres',
        type: 'pattern',
        confidence: 'high',
        tags: ['postgres'],
      });

      expect(result.routing).toBe('permanent');
      expect(result.confidence).toBe('high');
      expect(result.decayRate).toBeCloseTo(Math.LN2 / 300, 12);
      expect(result.nodeId).not.toBeNull();

      const node = await strata.graph.getNode(result.nodeId ?? '');
      expect(node.name).toBe('Pattern: Use connection pooling for Postgres');
      expect(node.type).toBe('learned-pattern');
      expect(node.description).toBe('Use connection pooling for Postgres');
      expect(node.tags).toEqual(['postgres']);

      const experience = await strata.experiences.get(result.experienceId);
      expect(experience.promotedToNodeId).toBe(node.id);
      expect(await strata.store.getLinks({ nodeId: node.id })).toHaveLength(1);

      expect(await strata.status()).toMatchObject({
        workspace: 'default',
        nodeCount: 1,
        experienceCount: 1,
        promotedExperienceCount: 1,
      });
    });

    it('should keep lower confidence facts as decaying experiences only', async () => {
      const result = await strata.intelligence.learn({
        content: 'The staging cluster drops idle connections after 5 minutes',
        type: 'gotcha',
        confidence: 'medium',
      });

      expect(result).toMatchObject({ routing: 'decaying', nodeId: null, type: 'gotcha', confidence: 'medium' });
      expect(result.decayRate).toBeCloseTo(Math.LN2 / 100, 12);
      expect(await strata.status()).toMatchObject({ nodeCount: 0, experienceCount: 1 });
    });

    it('should default to high confidence', async () => {
      const result = await strata.intelligence.learn({ content: 'Deploys freeze on Fridays', type: 'decision' });
      expect(result.routing).toBe('permanent');
    });

    it('should cut long content in the node name', async () => {
      const content = 'x'.repeat(100);
      const result = await strata.intelligence.learn({ content, type: 'solution' });
      const node = await strata.graph.getNode(result.nodeId ?? '');
      expect(node.name).toBe(`Solution: ${'x'.repeat(60)}`);
      expect(node.description).toBe(content);
    });

    it('should reject invalid input without writing', async () => {
      await expect(strata.intelligence.learn({ content: ' ', type: 'solution' })).rejects.toMatchObject({
        kind: 'InvalidArgument',
      });
      expect(await strata.status()).toMatchObject({ nodeCount: 0, experienceCount: 0 });
    });

    it('should make learned nodes reachable through context', async () => {
      await strata.intelligence.learn({ content: 'Rotate signing keys quarterly', type: 'decision' });
      const context = await strata.intelligence.context({ keywords: 'signing keys' });
      expect(context.source).toBe('index');
      expect(context.nodes.map((n) => n.name)).toEqual(['Decision: Rotate signing keys quarterly']);
    });
  });

  describe('recall', () => {
    it('should not list an experience next to the node it was learned into', async () => {
      const learned = await strata.intelligence.learn({
        content: 'Use connection pooling for Postgres',
        type: 'pattern',
      });

      const result = await strata.intelligence.recall({ topic: 'connection pooling' });
      expect(result.topic).toBe('connection pooling');
      expect(result.count).toBe(1);
      expect(result.items[0]).toMatchObject({ source: 'node', id: learned.nodeId, workspace: 'default', score: 1 });
    });

    it('should merge nodes and experiences by score', async () => {
      await strata.graph.addNode({ name: 'Billing retries', type: 'concept' });
      await strata.experiences.save({ content: 'Billing retries double charge without keys', type: 'gotcha', confidence: 'low' });
      time.advanceDays(50);

      const result = await strata.intelligence.recall({ topic: 'billing retries' });
      expect(result.items.map((i) => i.source)).toEqual(['node', 'experience']);
      expect(result.items[1]?.score).toBeCloseTo(0.5, 10);
    });

    it('should apply the minimum relevance to experiences', async () => {
      await strata.experiences.save({ content: 'Billing retries double charge', type: 'gotcha', confidence: 'low' });
      time.advanceDays(50);
      const result = await strata.intelligence.recall({ topic: 'billing', minRelevance: 0.6 });
      expect(result.count).toBe(0);
    });

    it('should list everything recent when no topic is given', async () => {
      await strata.graph.addNode({ name: 'A', type: 'concept' });
      await strata.experiences.save({ content: 'Something learned', type: 'solution', confidence: 'low' });
      const result = await strata.intelligence.recall();
      expect(result.topic).toBeNull();
      expect(result.count).toBe(2);
    });

    it('should cut the merged list to the limit', async () => {
      for (const name of ['Cache one', 'Cache two', 'Cache three']) {
        await strata.graph.addNode({ name, type: 'concept' });
      }
      const result = await strata.intelligence.recall({ topic: 'cache', limit: 2 });
      expect(result.count).toBe(2);
      await expect(strata.intelligence.recall({ limit: 0 })).rejects.toMatchObject({ kind: 'InvalidArgument' });
    });
  });

  describe('related', () => {
    it('should traverse from a node with depth 1 by default', async () => {
      const a = await strata.graph.addNode({ name: 'A', type: 't' });
      const b = await strata.graph.addNode({ name: 'B', type: 't' });
      const c = await strata.graph.addNode({ name: 'C', type: 't' });
      await strata.graph.connect(a.id, b.id, 'next');
      await strata.graph.connect(b.id, c.id, 'next');

      expect((await strata.intelligence.related({ nodeId: a.id })).map((s) => s.node.name)).toEqual(['A', 'B']);
      expect(
        (await strata.intelligence.related({ nodeId: a.id, depth: 2 })).map((s) => s.node.name)
      ).toEqual(['A', 'B', 'C']);
    });
  });

  describe('configuration', () => {
    it('should use the configured workspace name and promotion threshold', async () => {
      const custom = await createTestStrata({
        clock: time.clock,
        config: memoryConfig({ workspace: 'team', promotion: { accessThreshold: 2 } }),
      });
      try {
        const saved = await custom.experiences.save({ content: 'Flaky DNS in CI', type: 'gotcha', confidence: 'low' });
        await custom.intelligence.searchExperiences({ text: 'dns' });
        const { promotedNodeIds } = await custom.intelligence.searchExperiences({ text: 'dns' });

        expect(promotedNodeIds).toHaveLength(1);
        const node = await custom.graph.getNode(promotedNodeIds[0] ?? '');
        expect(node.type).toBe(PROMOTED_NODE_TYPE);
        expect(node.properties).toMatchObject({ sourceExperienceId: saved.id, accessCount: 2 });
        expect((await custom.status()).workspace).toBe('team');
      } finally {
        await custom.close();
      }
    });
  });
});
