/**
 * strata related: walk the graph outward from a node.
 */

import type { Command } from 'commander';
import type { EdgeDirection, TraversalMode } from '../../types/index.js';
import { choice, parseInteger, withCommonOptions, type CommonOptions } from '../options.js';
import { runWithStrata } from '../workspace.js';

const MODES: readonly TraversalMode[] = ['bfs', 'dfs'];
const DIRECTIONS: readonly EdgeDirection[] = ['out', 'in', 'both'];

interface RelatedOptions extends CommonOptions {
  depth: number;
  mode: TraversalMode;
  direction: EdgeDirection;
  edgeType?: string;
}

export function registerRelatedCommand(program: Command): void {
  withCommonOptions(
    program
      .command('related <nodeId>')
      .description('List nodes reachable from a node, with the hop depth of each')
      .option('--depth <n>', 'Hops to follow (1-5)', parseInteger, 1)
      .option('--mode <mode>', 'Traversal: bfs, dfs', choice(MODES), 'bfs')
      .option('--direction <dir>', 'Edges to follow: out, in, both', choice(DIRECTIONS), 'both')
      .option('--edge-type <type>', 'Only follow edges of this type')
  ).action(async (nodeId: string, opts: RelatedOptions) => {
    await runWithStrata(opts, async (strata) => {
      const steps = await strata.intelligence.related({
        nodeId,
        depth: opts.depth,
        mode: opts.mode,
        direction: opts.direction,
        edgeType: opts.edgeType,
      });
      return steps.map(({ node, depth, via }) => ({
        id: node.id,
        name: node.name,
        type: node.type,
        depth,
        edge: via ? `${via.sourceId} -[${via.type}]-> ${via.targetId}` : null,
      }));
    });
  });
}
