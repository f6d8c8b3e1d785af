/**
 * Graph Traverser
 *
 * Breadth- or depth-first walk over live edges. A visited set keeps every
 * node to a single appearance, so cycles terminate.
 */

import type { IKnowledgeStore } from '../storage/interface.js';
import type {
  Edge,
  EdgeDirection,
  Node,
  TraversalMode,
  TraversalStep,
} from '../types/index.js';

export interface ResolvedTraversal {
  depth: number;
  mode: TraversalMode;
  direction: EdgeDirection;
  edgeType?: string;
}

function neighbourOf(nodeId: string, edge: Edge, direction: EdgeDirection): string {
  if (direction === 'out') return edge.targetId;
  if (direction === 'in') return edge.sourceId;
  return edge.sourceId === nodeId ? edge.targetId : edge.sourceId;
}

/**
 * Graph traverser
 */
export class GraphTraverser {
  constructor(private store: IKnowledgeStore) {}

  async traverse(start: Node, options: ResolvedTraversal): Promise<TraversalStep[]> {
    return options.mode === 'dfs' ? this.depthFirst(start, options) : this.breadthFirst(start, options);
  }

  private async breadthFirst(start: Node, options: ResolvedTraversal): Promise<TraversalStep[]> {
    const visited = new Set<string>([start.id]);
    const steps: TraversalStep[] = [{ node: start, depth: 0 }];

    for (let i = 0; i < steps.length; i++) {
      const current = steps[i];
      if (current === undefined || current.depth >= options.depth) continue;
      for (const { node, via } of await this.expand(current.node, options, visited)) {
        steps.push({ node, depth: current.depth + 1, via });
      }
    }

    return steps;
  }

  /**
   * Depth-first order over the breadth-first reachable set: a node is entered
   * only at its shortest depth, so both modes return the same nodes.
   */
  private async depthFirst(start: Node, options: ResolvedTraversal): Promise<TraversalStep[]> {
    const shortest = new Map<string, TraversalStep>();
    for (const step of await this.breadthFirst(start, options)) {
      shortest.set(step.node.id, step);
    }

    const emitted = new Set<string>([start.id]);
    const steps: TraversalStep[] = [];

    const visit = async (step: TraversalStep): Promise<void> => {
      steps.push(step);
      if (step.depth >= options.depth) return;
      for (const edge of await this.liveEdges(step.node.id, options)) {
        const nextId = neighbourOf(step.node.id, edge, options.direction);
        const reached = shortest.get(nextId);
        if (!reached || emitted.has(nextId) || reached.depth !== step.depth + 1) continue;
        emitted.add(nextId);
        await visit({ node: reached.node, depth: step.depth + 1, via: edge });
      }
    };

    await visit({ node: start, depth: 0 });
    return steps;
  }

  /**
   * Unvisited live neighbours in edge order; marks them visited
   */
  private async expand(
    node: Node,
    options: ResolvedTraversal,
    visited: Set<string>
  ): Promise<Array<{ node: Node; via: Edge }>> {
    const out: Array<{ node: Node; via: Edge }> = [];
    for (const edge of await this.liveEdges(node.id, options)) {
      const nextId = neighbourOf(node.id, edge, options.direction);
      if (visited.has(nextId)) continue;
      const next = await this.store.getNode(nextId);
      if (!next) continue;
      visited.add(nextId);
      out.push({ node: next, via: edge });
    }
    return out;
  }

  private liveEdges(nodeId: string, options: ResolvedTraversal): Promise<Edge[]> {
    return this.store.listEdges(nodeId, { direction: options.direction, type: options.edgeType });
  }
}
