/**
 * strata_related: Nodes reachable from a start node.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import type { ToolDefinition } from '../types.js';

const args = z.object({
  node_id: z.string().min(1),
  depth: z.number().int().min(1).max(5).optional(),
  edge_type: z.string().optional(),
  mode: z.enum(['bfs', 'dfs']).optional(),
  direction: z.enum(['out', 'in', 'both']).optional(),
});

export function strataRelated(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_related',
    description:
      'Traverse the graph from a node up to depth hops (1-5). ' +
      'Each reachable node appears once with its depth and the edge that reached it.',
    inputSchema: {
      type: 'object',
      properties: {
        node_id: { type: 'string', description: 'Start node id.' },
        depth: { type: 'integer', minimum: 1, maximum: 5, description: 'Default 1.' },
        edge_type: { type: 'string', description: 'Only follow edges of this type.' },
        mode: { type: 'string', enum: ['bfs', 'dfs'], description: 'Default "bfs".' },
        direction: { type: 'string', enum: ['out', 'in', 'both'], description: 'Default "both".' },
      },
      required: ['node_id'],
    },
    args,
    run: async (a) => {
      const steps = await strata.intelligence.related({
        nodeId: a.node_id,
        depth: a.depth,
        edgeType: a.edge_type,
        mode: a.mode,
        direction: a.direction,
      });
      return {
        originId: a.node_id,
        count: steps.length,
        nodes: steps.map(({ node, depth, via }) => ({
          id: node.id,
          name: node.name,
          type: node.type,
          depth,
          via: via ?? null,
        })),
      };
    },
  });
}
