/**
 * strata_recall: Surface knowledge for a topic from nodes and experiences.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { jsonLimit, limitArg, unitArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';

export function strataRecall(strata: Strata): ToolDefinition {
  const args = z.object({
    topic: z.string().optional(),
    limit: limitArg(strata.config.pagination),
    min_relevance: unitArg.optional(),
  });

  return defineTool({
    name: 'strata_recall',
    description:
      'Recall nodes and experiences about a topic as one ranked list. ' +
      'Without a topic, returns the most recent and most relevant items.',
    inputSchema: {
      type: 'object',
      properties: {
        topic: { type: 'string', description: 'What to recall.' },
        limit: jsonLimit(strata.config.pagination),
        min_relevance: { type: 'number', minimum: 0, maximum: 1, description: 'Experience cutoff (default 0).' },
      },
    },
    args,
    run: (a) =>
      strata.intelligence.recall({ topic: a.topic, limit: a.limit, minRelevance: a.min_relevance }),
  });
}
