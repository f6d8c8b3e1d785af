/**
 * strata_experience_search: Decay-aware experience search.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { experienceTypeArg, jsonLimit, limitArg, offsetArg, unitArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';
import { EXPERIENCE_TYPES } from '../../types/index.js';

export function strataExperienceSearch(strata: Strata): ToolDefinition {
  const args = z.object({
    text: z.string().optional(),
    type: experienceTypeArg.optional(),
    min_relevance: unitArg.optional(),
    limit: limitArg(strata.config.pagination),
    offset: offsetArg,
  });

  return defineTool({
    name: 'strata_experience_search',
    description:
      'Search experiences ranked by current relevance. Each hit counts as an access; ' +
      'frequently accessed experiences are promoted to permanent nodes.',
    inputSchema: {
      type: 'object',
      properties: {
        text: { type: 'string', description: 'Free-text query.' },
        type: { type: 'string', enum: [...EXPERIENCE_TYPES], description: 'Type filter.' },
        min_relevance: { type: 'number', minimum: 0, maximum: 1, description: 'Default 0.' },
        limit: jsonLimit(strata.config.pagination),
        offset: { type: 'integer', minimum: 0, description: 'Results to skip.' },
      },
    },
    args,
    run: async (a) => {
      const { hits, promotedNodeIds } = await strata.intelligence.searchExperiences({
        text: a.text,
        type: a.type,
        minRelevance: a.min_relevance,
        limit: a.limit,
        offset: a.offset,
      });
      return {
        count: hits.length,
        results: hits.map(({ experience, relevance }) => ({ ...experience, relevance })),
        promotedNodeIds,
      };
    },
  });
}
