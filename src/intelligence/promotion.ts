/**
 * Auto-Promotion
 *
 * Turns a frequently accessed experience into a permanent node. The node,
 * the derived-from link and the check-and-set on promotedToNodeId commit in
 * one transaction; a lost race raises Conflict and rolls everything back.
 */

import type { ExperienceEngine } from '../experience/engine.js';
import type { GraphEngine } from '../graph/engine.js';
import type { IKnowledgeStore } from '../storage/interface.js';
import type { Experience, Node } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

export const PROMOTED_NODE_TYPE = 'promoted-experience';

export function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}

/**
 * Experience promoter
 */
export class Promoter {
  constructor(
    private store: IKnowledgeStore,
    private graph: GraphEngine,
    private experiences: ExperienceEngine,
    private logger: Logger
  ) {}

  /**
   * Promote one experience. Failures are logged and return null; the
   * experience keeps its flag and is retried on its next access.
   */
  async promote(experience: Experience): Promise<Node | null> {
    let node: Node;
    try {
      node = this.graph.buildNode({
        name: `${capitalize(experience.type)}: ${experience.content.slice(0, 50)}`,
        type: PROMOTED_NODE_TYPE,
        description: experience.content,
        tags: experience.tags,
        properties: {
          sourceExperienceId: experience.id,
          experienceType: experience.type,
          confidence: experience.confidence,
          accessCount: experience.accessCount,
        },
      });

      await this.store.applyBatch([
        { kind: 'insertNode', node },
        {
          kind: 'linkExperience',
          link: {
            nodeId: node.id,
            experienceId: experience.id,
            type: 'derived-from',
            createdAt: node.createdAt,
          },
        },
        { kind: 'markPromoted', experienceId: experience.id, nodeId: node.id },
      ]);
    } catch (err) {
      this.logger.warn('promotion failed', { experienceId: experience.id, error: err });
      return null;
    }

    this.logger.info('experience promoted', {
      experienceId: experience.id,
      nodeId: node.id,
      accessCount: experience.accessCount,
    });
    await this.graph.publishNodeAdded(node);
    return node;
  }

  /**
   * Promote every qualifying experience; maps experience id to new node id
   */
  async sweep(experiences: Experience[]): Promise<Map<string, string>> {
    const created = new Map<string, string>();
    for (const experience of experiences) {
      if (!this.experiences.promoteCheck(experience)) continue;
      const node = await this.promote(experience);
      if (node) created.set(experience.id, node.id);
    }
    return created;
  }
}
