/**
 * strata_graph_status: Live node and edge counts.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import type { ToolDefinition } from '../types.js';

export function strataGraphStatus(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_graph_status',
    description: 'Live node count, edge count and node count per namespace.',
    inputSchema: { type: 'object', properties: {} },
    args: z.object({}),
    run: () => strata.graph.status(),
  });
}
