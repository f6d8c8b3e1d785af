/**
 * strata_crossref: Find prior solutions across workspaces.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { jsonLimit, limitArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

export function strataCrossref(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_crossref',
    description:
      'Search this workspace and every configured peer workspace (read-only) ' +
      'for knowledge related to a problem. Items are tagged with their workspace.',
    inputSchema: {
      type: 'object',
      properties: {
        problem: { type: 'string', description: 'Problem description.' },
        limit: jsonLimit(strata.config.pagination),
      },
      required: ['problem'],
    },
    args: z.object({ problem: z.string(), limit: limitArg(strata.config.pagination) }),
    run: (a) => strata.intelligence.crossref(a),
  });
}
