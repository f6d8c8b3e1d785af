/**
 * strata_experience_prune: Delete experiences that have decayed away.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { unitArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

export function strataExperiencePrune(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_experience_prune',
    description:
      'Permanently delete experiences whose current relevance is below the threshold. ' +
      'Nothing is pruned automatically.',
    inputSchema: {
      type: 'object',
      properties: {
        threshold: { type: 'number', minimum: 0, maximum: 1, description: 'Default 0.01.' },
      },
    },
    args: z.object({ threshold: unitArg.optional() }),
    run: async (a) => ({ removed: await strata.experiences.prune(a.threshold) }),
  });
}
