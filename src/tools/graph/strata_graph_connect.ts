/**
 * strata_graph_connect: Create or overwrite an edge between two nodes.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { propertiesArg, unitArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

const args = z.object({
  source_id: z.string().min(1),
  target_id: z.string().min(1),
  edge_type: z.string(),
  weight: unitArg.optional(),
  properties: propertiesArg,
});

export function strataGraphConnect(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_graph_connect',
    description:
      'Connect two live nodes with a typed, weighted edge. ' +
      'Connecting the same triple again overwrites weight and properties.',
    inputSchema: {
      type: 'object',
      properties: {
        source_id: { type: 'string', description: 'Source node id.' },
        target_id: { type: 'string', description: 'Target node id.' },
        edge_type: { type: 'string', description: 'Relationship type, e.g. "depends_on".' },
        weight: { type: 'number', minimum: 0, maximum: 1, description: 'Strength in [0,1] (default 1).' },
        properties: { type: 'object', description: 'Arbitrary key/value properties.' },
      },
      required: ['source_id', 'target_id', 'edge_type'],
    },
    args,
    run: (a) => strata.graph.connect(a.source_id, a.target_id, a.edge_type, a.weight, a.properties),
  });
}
