/**
 * strata_learn: Store knowledge, routed by confidence.
 */

import { z } from 'zod';
import type { Strata } from '../../strata.js';
import { defineTool } from '../define.js';
import { confidenceArg, experienceTypeArg, JSON_TAGS, tagsArg } from '../schemas.js';
import type { ToolDefinition } from '../types.js';
import { CONFIDENCE_LEVELS, EXPERIENCE_TYPES } from '../../types/index.js';

const args = z.object({
  content: z.string(),
  type: experienceTypeArg,
  context: z.string().optional(),
  confidence: confidenceArg.optional(),
  tags: tagsArg,
});

export function strataLearn(strata: Strata): ToolDefinition {
  return defineTool({
    name: 'strata_learn',
    description:
      'Learn a fact. High confidence creates a permanent node linked to an experience; ' +
      'medium or low confidence creates a decaying experience only.',
    inputSchema: {
      type: 'object',
      properties: {
        content: { type: 'string', description: 'The fact.' },
        type: { type: 'string', enum: [...EXPERIENCE_TYPES], description: 'Kind of knowledge.' },
        context: { type: 'string', description: 'Where it applies.' },
        confidence: { type: 'string', enum: [...CONFIDENCE_LEVELS], description: 'Default "high".' },
        tags: JSON_TAGS,
      },
      required: ['content', 'type'],
    },
    args,
    run: (a) => strata.intelligence.learn(a),
  });
}
