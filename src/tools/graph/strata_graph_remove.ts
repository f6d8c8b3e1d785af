/**
 * strata_graph_remove: Soft-delete a node or an edge.
 */

import type { Strata } from '../../strata.js';
import { invalidArgument } from '../../errors/index.js';
import { defineTool } from '../define.js';
import { JSON_NODE_OR_EDGE, nodeOrEdgeArgs } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

export function strataGraphRemove(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_graph_remove',
    description:
      'Soft-delete a node (by node_id) or an edge (by source_id, target_id, edge_type). ' +
      'Removed records are hidden from queries and traversal and can be restored.',
    inputSchema: { type: 'object', properties: JSON_NODE_OR_EDGE },
    args: nodeOrEdgeArgs,
    run: async (a) => {
      if (a.node_id !== undefined) {
        await strata.graph.removeNode(a.node_id);
        return { removed: 'node', id: a.node_id };
      }
      if (a.source_id === undefined || a.target_id === undefined || a.edge_type === undefined) {
        throw invalidArgument('Pass node_id, or source_id + target_id + edge_type');
      }
      await strata.graph.removeEdge(a.source_id, a.target_id, a.edge_type);
      return {
        removed: 'edge',
        sourceId: a.source_id,
        targetId: a.target_id,
        type: a.edge_type,
      };
    },
  });
}
