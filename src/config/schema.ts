/**
 * Configuration Schema
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../utils/logger.js';

const storageSchema = z.object({
  path: z.string().min(1).default('~/.strata/workspaces/default.db'),
  walMode: z.boolean().default(true),
  busyTimeoutMs: z.number().int().min(0).default(5000),
});

const paginationSchema = z
  .object({
    defaultLimit: z.number().int().min(1).default(10),
    maxLimit: z.number().int().min(1).max(50).default(50),
  })
  .refine((p) => p.defaultLimit <= p.maxLimit, {
    message: 'defaultLimit must not exceed maxLimit',
    path: ['defaultLimit'],
  });

const halfLifeDays = z.number().positive();

const decaySchema = z.object({
  halfLives: z
    .object({
      solution: halfLifeDays.default(200),
      pattern: halfLifeDays.default(300),
      decision: halfLifeDays.default(100),
      workaround: halfLifeDays.default(50),
      gotcha: halfLifeDays.default(200),
    })
    .default({}),
  confidenceMultipliers: z
    .object({
      high: z.number().positive().default(1),
      medium: z.number().positive().default(2),
      low: z.number().positive().default(4),
    })
    .default({}),
  pruneThreshold: z.number().min(0).max(1).default(0.01),
});

const peerSchema = z.object({
  name: z.string().min(1),
  path: z.string().min(1),
});

export const configSchema = z.object({
  workspace: z.string().min(1).default('default'),
  storage: storageSchema.default({}),
  log: z
    .object({
      level: z.enum(LOG_LEVELS).default('info'),
    })
    .default({}),
  pagination: paginationSchema.default({}),
  decay: decaySchema.default({}),
  promotion: z
    .object({
      accessThreshold: z.number().int().min(1).default(5),
    })
    .default({}),
  router: z
    .object({
      minConfidence: z.number().min(0).max(1).default(0.1),
      maxKeywords: z.number().int().min(1).default(20),
    })
    .default({}),
  context: z
    .object({
      edgeLimit: z.number().int().min(0).default(10),
    })
    .default({}),
  crossref: z
    .object({
      peers: z.array(peerSchema).default([]),
    })
    .default({}),
});
