/**
 * strata_graph_add: Add a node to the knowledge graph.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { JSON_TAGS, propertiesArg, tagsArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

const args = z.object({
  name: z.string(),
  type: z.string(),
  namespace: z.string().optional(),
  description: z.string().optional(),
  tags: tagsArg,
  properties: propertiesArg,
});

export function strataGraphAdd(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_graph_add',
    description:
      'Add a permanent node to the knowledge graph. ' +
      'The node is indexed for keyword routing immediately.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Node name.' },
        type: { type: 'string', description: 'Free-form node type, e.g. "concept", "tool".' },
        namespace: { type: 'string', description: 'Namespace (default "knowledge").' },
        description: { type: 'string', description: 'Longer description.' },
        tags: JSON_TAGS,
        properties: { type: 'object', description: 'Arbitrary key/value properties.' },
      },
      required: ['name', 'type'],
    },
    args,
    run: (a) => strata.graph.addNode(a),
  });
}
