/**
 * strata_graph_query: Full-text and filtered node search.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { jsonLimit, JSON_TAGS, limitArg, offsetArg, tagsArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

export function strataGraphQuery(strata: Strata): ToolDefinition {
  const args = z.object({
    text: z.string().optional(),
    type: z.string().optional(),
    tags: tagsArg,
    namespace: z.string().optional(),
    limit: limitArg(strata.config.pagination),
    offset: offsetArg,
  });

  return defineTool({
    name: 'strata_graph_query',
    description:
      'Search live graph nodes by text, type, namespace and tags (all tags must match). ' +
      'Text results carry a score in (0,1]; the best match scores 1.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Free-text query.' },
        type: { type: 'string', description: 'Node type filter.' },
        tags: JSON_TAGS,
        namespace: { type: 'string', description: 'Namespace filter.' },
        limit: jsonLimit(strata.config.pagination),
        offset: { type: 'integer', minimum: 0, description: 'Results to skip.' },
      },
    },
    args,
    run: async (a) => {
      const hits = await strata.graph.query(a);
      return { count: hits.length, nodes: hits.map(({ node, score }) => ({ ...node, score })) };
    },
  });
}
