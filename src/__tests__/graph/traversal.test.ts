/**
 * Graph Traversal Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { GraphEngine } from '../../graph/engine.js';
import { SQLiteKnowledgeStore } from '../../storage/sqlite/storage.js';
import type { Node, TraversalStep } from '../../types/index.js';

function names(steps: TraversalStep[]): string[] {
  return steps.map((s) => s.node.name);
}

describe('GraphEngine.traverse', () => {
  let store: SQLiteKnowledgeStore;
  let graph: GraphEngine;
  let a: Node;
  let b: Node;
  let c: Node;

  beforeEach(async () => {
    store = new SQLiteKnowledgeStore(':memory:');
    await store.initialize();
    graph = new GraphEngine(store);
    a = await graph.addNode({ name: 'A', type: 'step' });
    b = await graph.addNode({ name: 'B', type: 'step' });
    c = await graph.addNode({ name: 'C', type: 'step' });
    // A -> B -> C -> A
    await graph.connect(a.id, b.id, 'next');
    await graph.connect(b.id, c.id, 'next');
    await graph.connect(c.id, a.id, 'next');
  });

  afterEach(async () => {
    await store.close();
  });

  it('should visit each node of a cycle once, breadth first', async () => {
    const steps = await graph.traverse(a.id, { depth: 5, direction: 'out' });
    expect(names(steps)).toEqual(['A', 'B', 'C']);
    expect(steps.map((s) => s.depth)).toEqual([0, 1, 2]);
    expect(steps[0]?.via).toBeUndefined();
    expect(steps[1]?.via).toMatchObject({ sourceId: a.id, targetId: b.id, type: 'next' });
  });

  it('should visit each node of a cycle once, depth first', async () => {
    const steps = await graph.traverse(a.id, { depth: 5, direction: 'out', mode: 'dfs' });
    expect(names(steps)).toEqual(['A', 'B', 'C']);
  });

  it('should stop at the requested depth', async () => {
    const steps = await graph.traverse(a.id, { depth: 1, direction: 'out' });
    expect(names(steps)).toEqual(['A', 'B']);
  });

  it('should follow incoming edges', async () => {
    const steps = await graph.traverse(a.id, { depth: 1, direction: 'in' });
    expect(names(steps)).toEqual(['A', 'C']);
  });

  it('should reach both neighbours by default', async () => {
    const steps = await graph.traverse(a.id);
    expect(names(steps).sort()).toEqual(['A', 'B', 'C']);
    expect(steps.filter((s) => s.depth === 1)).toHaveLength(2);
  });

  it('should skip removed nodes and their edges', async () => {
    await graph.removeNode(b.id);
    expect(names(await graph.traverse(a.id, { depth: 5, direction: 'out' }))).toEqual(['A']);
    expect(names(await graph.traverse(a.id, { depth: 5 }))).toEqual(['A', 'C']);
  });

  it('should only follow the requested edge type', async () => {
    const d = await graph.addNode({ name: 'D', type: 'step' });
    await graph.connect(a.id, d.id, 'owns');
    const steps = await graph.traverse(a.id, { depth: 2, direction: 'out', edgeType: 'owns' });
    expect(names(steps)).toEqual(['A', 'D']);
  });

  it('should validate depth and the start node', async () => {
    await expect(graph.traverse(a.id, { depth: 0 })).rejects.toMatchObject({
      kind: 'InvalidArgument',
      detail: 'depth must be an integer between 1 and 5',
    });
    await expect(graph.traverse(a.id, { depth: 6 })).rejects.toMatchObject({ kind: 'InvalidArgument' });
    await expect(graph.traverse('node_missing')).rejects.toMatchObject({ kind: 'NotFound' });
  });
});

describe('GraphEngine.traverse with shortcuts', () => {
  let store: SQLiteKnowledgeStore;
  let graph: GraphEngine;
  let a: Node;

  beforeEach(async () => {
    store = new SQLiteKnowledgeStore(':memory:');
    await store.initialize();
    graph = new GraphEngine(store);
    a = await graph.addNode({ name: 'A', type: 'step' });
    const b = await graph.addNode({ name: 'B', type: 'step' });
    const c = await graph.addNode({ name: 'C', type: 'step' });
    const d = await graph.addNode({ name: 'D', type: 'step' });
    // A -> B -> C is explored first, but C is also one hop from A
    await graph.connect(a.id, b.id, 'next', 1);
    await graph.connect(a.id, c.id, 'next', 0.5);
    await graph.connect(b.id, c.id, 'next');
    await graph.connect(c.id, d.id, 'next');
  });

  afterEach(async () => {
    await store.close();
  });

  it('should reach nodes through the shorter path when depth first', async () => {
    const steps = await graph.traverse(a.id, { depth: 2, direction: 'out', mode: 'dfs' });
    expect(names(steps)).toEqual(['A', 'B', 'C', 'D']);
    expect(steps.map((s) => s.depth)).toEqual([0, 1, 1, 2]);
  });

  it('should return the same nodes in both modes', async () => {
    const bfs = await graph.traverse(a.id, { depth: 2, direction: 'out' });
    const dfs = await graph.traverse(a.id, { depth: 2, direction: 'out', mode: 'dfs' });
    expect(names(bfs)).toEqual(['A', 'B', 'C', 'D']);
    expect(names(dfs).sort()).toEqual(names(bfs).sort());
  });
});
