/**
 * Operation Result Types
 *
 * Payloads returned by the intelligence layer and the context router.
 */

import type { Edge } from './edge.js';
import type { Confidence, ExperienceType } from './experience.js';
import type { Node, NodeSummary } from './node.js';

// ============================================================================
// learn
// ============================================================================

/**
 * Which storage path a learned fact took
 */
export type RoutingDecision = 'permanent' | 'decaying';

export interface LearnResult {
  routing: RoutingDecision;
  /** Set only for permanent (high-confidence) facts */
  nodeId: string | null;
  experienceId: string;
  type: ExperienceType;
  confidence: Confidence;
  decayRate: number;
}

// ============================================================================
// recall / crossref
// ============================================================================

export interface NodeRecallItem {
  source: 'node';
  workspace: string;
  id: string;
  name: string;
  type: string;
  description: string | null;
  score: number;
  timestamp: string;
}

export interface ExperienceRecallItem {
  source: 'experience';
  workspace: string;
  id: string;
  type: ExperienceType;
  content: string;
  confidence: Confidence;
  accessCount: number;
  promotedToNodeId: string | null;
  score: number;
  timestamp: string;
}

export type RecallItem = NodeRecallItem | ExperienceRecallItem;

export interface RecallResult {
  topic: string | null;
  count: number;
  items: RecallItem[];
  /** Nodes created by the auto-promotion sweep during this call */
  promotedNodeIds: string[];
}

// ============================================================================
// context
// ============================================================================

export type DetailLevel = 'summary' | 'full';

export interface NodeDetail extends Node {
  score: number;
  edges: Edge[];
}

export interface ContextResult {
  query: string;
  detail: DetailLevel;
  /** Where the node set came from */
  source: 'index' | 'fulltext' | 'none';
  count: number;
  nodes: NodeSummary[] | NodeDetail[];
}

export interface ContextExperienceSummary {
  id: string;
  type: ExperienceType;
  /** Cut to 200 characters at summary detail */
  content: string;
  relevance: number;
}

export interface ContextExperienceDetail extends ContextExperienceSummary {
  confidence: Confidence;
  tags: string[];
  context: string | null;
}

/**
 * Routed nodes plus the live experiences matching the same keywords.
 * `count` covers both lists.
 */
export interface WorkspaceContext extends ContextResult {
  experiences: ContextExperienceSummary[] | ContextExperienceDetail[];
}

// ============================================================================
// status
// ============================================================================

export interface GraphStatus {
  nodeCount: number;
  edgeCount: number;
  perNamespaceCounts: Record<string, number>;
}

export interface StoreStats extends GraphStatus {
  experienceCount: number;
  promotedExperienceCount: number;
  routeCount: number;
}
