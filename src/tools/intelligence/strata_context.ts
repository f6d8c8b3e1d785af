/**
 * strata_context: Keyword-routed subgraph with progressive disclosure.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { jsonLimit, limitArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

export function strataContext(strata: Strata): ToolDefinition {
  const args = z.object({
    keywords: z.string(),
    detail: z.enum(['summary', 'full']).optional(),
    limit: limitArg(strata.config.pagination),
  });

  return defineTool({
    name: 'strata_context',
    description:
      'Resolve keywords to the relevant nodes and live experiences. "summary" returns node ' +
      'id, name and type and shortened experience content; "full" adds every field, node edges ' +
      'and experience confidence, tags and context.',
    inputSchema: {
      type: 'object',
      properties: {
        keywords: { type: 'string', description: 'Free-text keywords.' },
        detail: { type: 'string', enum: ['summary', 'full'], description: 'Default "summary".' },
        limit: jsonLimit(strata.config.pagination),
      },
      required: ['keywords'],
    },
    args,
    run: (a) => strata.intelligence.context(a),
  });
}
