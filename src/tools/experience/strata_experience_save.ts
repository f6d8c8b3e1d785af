/**
 * strata_experience_save: Store a decaying experience.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { confidenceArg, experienceTypeArg, JSON_TAGS, tagsArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';
import { EXPERIENCE_TYPES, CONFIDENCE_LEVELS } from '../../types/index.js';

const args = z.object({
  content: z.string(),
  type: experienceTypeArg,
  context: z.string().optional(),
  confidence: confidenceArg.optional(),
  tags: tagsArg,
});

export function strataExperienceSave(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_experience_save',
    description:
      'Save an experience whose relevance decays over time. ' +
      'Lower confidence decays faster (medium 2x, low 4x).',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'What was learned.' },
        type: { type: 'string', enum: [...EXPERIENCE_TYPES], description: 'Experience type.' },
        context: { type: 'string', description: 'Situation in which it applies.' },
        confidence: { type: 'string', enum: [...CONFIDENCE_LEVELS], description: 'Default "high".' },
        tags: JSON_TAGS,
      },
      required: ['content', 'type'],
    },
    args,
    run: (a) => strata.experiences.save(a),
  });
}
