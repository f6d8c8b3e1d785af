/**
 * Shared argument schemas
 */

import { z } from 'zod';
import { CONFIDENCE_LEVELS, EXPERIENCE_TYPES } from '../types/index.js';
import type { PaginationLimits } from '../utils/validation.js';

export function limitArg(limits: PaginationLimits) {
  return z.number().int().min(1).max(limits.maxLimit).optional();
}

export const offsetArg = z.number().int().min(0).optional();
export const tagsArg = z.array(z.string()).optional();
export const propertiesArg = z.record(z.unknown()).optional();
export const experienceTypeArg = z.enum(EXPERIENCE_TYPES);
export const confidenceArg = z.enum(CONFIDENCE_LEVELS);
export const unitArg = z.number().min(0).max(1);

/** Either a node id, or the full key of an edge */
export const nodeOrEdgeArgs = z
  .object({
    node_id: z.string().min(1).optional(),
    source_id: z.string().min(1).optional(),
    target_id: z.string().min(1).optional(),
    edge_type: z.string().min(1).optional(),
  })
  .refine(
    (a) =>
      (a.node_id !== undefined) !==
      (a.source_id !== undefined && a.target_id !== undefined && a.edge_type !== undefined),
    { message: 'Pass node_id, or source_id + target_id + edge_type' }
  );

export function jsonLimit(limits: PaginationLimits): Record<string, unknown> {
  return {
    type: 'integer',
    minimum: 1,
    maximum: limits.maxLimit,
    description: `Max results (default ${limits.defaultLimit}).`,
  };
}

export const JSON_TAGS = { type: 'array', items: { type: 'string' }, description: 'Tags.' };

export const JSON_NODE_OR_EDGE = {
  node_id: { type: 'string', description: 'Node id. Omit when addressing an edge.' },
  source_id: { type: 'string', description: 'Edge source node id.' },
  target_id: { type: 'string', description: 'Edge target node id.' },
  edge_type: { type: 'string', description: 'Edge type.' },
};
