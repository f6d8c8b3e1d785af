/**
 * Recall Ranking
 *
 * Merges graph nodes and decaying experiences into one list. Nodes score by
 * their normalised text rank, experiences by current relevance.
 */

import type {
  ExperienceRecallItem,
  NodeRecallItem,
  RankedNode,
  RecallItem,
  ScoredExperience,
} from '../types/index.js';

export function nodeItem(workspace: string, { node, score }: RankedNode): NodeRecallItem {
  return {
    source: 'node',
    workspace,
    id: node.id,
    name: node.name,
    type: node.type,
    description: node.description,
    score,
    timestamp: node.updatedAt,
  };
}

export function experienceItem(
  workspace: string,
  { experience, relevance }: ScoredExperience
): ExperienceRecallItem {
  return {
    source: 'experience',
    workspace,
    id: experience.id,
    type: experience.type,
    content: experience.content,
    confidence: experience.confidence,
    accessCount: experience.accessCount,
    promotedToNodeId: experience.promotedToNodeId,
    score: relevance,
    timestamp: experience.createdAt,
  };
}

/**
 * Node items plus the experience items not already promoted into one of them
 */
export function mergeWorkspaceItems(
  workspace: string,
  nodes: RankedNode[],
  experiences: ScoredExperience[]
): RecallItem[] {
  const nodeIds = new Set(nodes.map(({ node }) => node.id));
  const kept = experiences.filter(
    ({ experience }) =>
      experience.promotedToNodeId === null || !nodeIds.has(experience.promotedToNodeId)
  );
  return [
    ...nodes.map((hit) => nodeItem(workspace, hit)),
    ...kept.map((hit) => experienceItem(workspace, hit)),
  ];
}

/**
 * Result ranker
 */
export class RecallRanker {
  /**
   * Score descending, newer first on ties, then id; cut to `limit`
   */
  rank(items: RecallItem[], limit: number): RecallItem[] {
    return [...items]
      .sort(
        (a, b) =>
          b.score - a.score || b.timestamp.localeCompare(a.timestamp) || a.id.localeCompare(b.id)
      )
      .slice(0, limit);
  }
}
