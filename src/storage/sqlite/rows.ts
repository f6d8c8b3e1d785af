/**
 * Row Mapping
 *
 * Converts SQLite rows into domain objects. JSON columns are validated
 * rather than trusted.
 */

import { KnowledgeError } from '../../errors/index.js';
import {
  isConfidence,
  isExperienceType,
  type Edge,
  type Experience,
  type ExperienceLink,
  type Node,
  type Properties,
  type RouteEntry,
} from '../../types/index.js';

export interface NodeRow {
  id: string;
  namespace: string;
  type: string;
  name: string;
  description: string | null;
  tags: string;
  properties: string;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

export interface RankedNodeRow extends NodeRow {
  rank: number | null;
}

export interface EdgeRow {
  source_id: string;
  target_id: string;
  type: string;
  weight: number;
  properties: string;
  created_at: string;
  updated_at: string;
  deleted_at: string | null;
}

export interface ExperienceRow {
  id: string;
  type: string;
  content: string;
  context: string | null;
  confidence: string;
  tags: string;
  score: number;
  decay_rate: number;
  access_count: number;
  needs_promotion: number;
  promoted_to_node_id: string | null;
  created_at: string;
  last_accessed: string | null;
}

export interface LinkRow {
  node_id: string;
  experience_id: string;
  type: string;
  created_at: string;
}

export interface RouteRow {
  keyword: string;
  node_ids: string;
  confidence: number;
}

export interface CountRow {
  count: number;
}

function parseJson(raw: string, column: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new KnowledgeError('StoreFailure', `Corrupt JSON in column ${column}`, { cause: err });
  }
}

export function parseStringArray(raw: string, column = 'tags'): string[] {
  const value = parseJson(raw, column);
  if (!Array.isArray(value)) {
    throw new KnowledgeError('StoreFailure', `Column ${column} is not a JSON array`);
  }
  return value.filter((v): v is string => typeof v === 'string');
}

export function parseProperties(raw: string): Properties {
  const value = parseJson(raw, 'properties');
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new KnowledgeError('StoreFailure', 'Column properties is not a JSON object');
  }
  return { ...value };
}

export function rowToNode(row: NodeRow): Node {
  return {
    id: row.id,
    namespace: row.namespace,
    type: row.type,
    name: row.name,
    description: row.description,
    tags: parseStringArray(row.tags),
    properties: parseProperties(row.properties),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

export function rowToEdge(row: EdgeRow): Edge {
  return {
    sourceId: row.source_id,
    targetId: row.target_id,
    type: row.type,
    weight: row.weight,
    properties: parseProperties(row.properties),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deletedAt: row.deleted_at,
  };
}

export function rowToExperience(row: ExperienceRow): Experience {
  const { type, confidence } = row;
  if (!isExperienceType(type) || !isConfidence(confidence)) {
    throw new KnowledgeError('StoreFailure', `Experience ${row.id} has an invalid type or confidence`);
  }
  return {
    id: row.id,
    type,
    content: row.content,
    context: row.context,
    confidence,
    tags: parseStringArray(row.tags),
    score: row.score,
    decayRate: row.decay_rate,
    accessCount: row.access_count,
    needsPromotion: row.needs_promotion === 1,
    promotedToNodeId: row.promoted_to_node_id,
    createdAt: row.created_at,
    lastAccessed: row.last_accessed,
  };
}

export function rowToLink(row: LinkRow): ExperienceLink {
  return {
    nodeId: row.node_id,
    experienceId: row.experience_id,
    type: 'derived-from',
    createdAt: row.created_at,
  };
}

export function rowToRoute(row: RouteRow): RouteEntry {
  return {
    keyword: row.keyword,
    nodeIds: parseStringArray(row.node_ids, 'node_ids'),
    confidence: row.confidence,
  };
}
