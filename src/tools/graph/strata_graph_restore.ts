/**
 * strata_graph_restore: Undo a soft delete.
 */

import type { Strata } from '../../strata.js';
import { invalidArgument } from '../../errors/index.js';
import { defineTool } from '../define.js';
import { JSON_NODE_OR_EDGE, nodeOrEdgeArgs } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

export function strataGraphRestore(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_graph_restore',
    description:
      'Restore a soft-deleted node (by node_id) or edge (by source_id, target_id, edge_type). ' +
      'A restored node is re-indexed for keyword routing.',
    inputSchema: { type: 'object', properties: JSON_NODE_OR_EDGE },
    args: nodeOrEdgeArgs,
    run: async (a) => {
      if (a.node_id !== undefined) {
        return { restored: 'node', node: await strata.graph.restoreNode(a.node_id) };
      }
      if (a.source_id === undefined || a.target_id === undefined || a.edge_type === undefined) {
        throw invalidArgument('Pass node_id, or source_id + target_id + edge_type');
      }
      const edge = await strata.graph.restoreEdge(a.source_id, a.target_id, a.edge_type);
      return { restored: 'edge', edge };
    },
  });
}
