/**
 * strata context: rebuild context for free-text keywords.
 */

import type { Command } from 'commander';
import type { DetailLevel } from '../../types/index.js';
import { choice, parseInteger, withCommonOptions, type CommonOptions } from '../options.js';
import { runWithStrata } from '../workspace.js';

const DETAIL_LEVELS: readonly DetailLevel[] = ['summary', 'full'];

interface ContextOptions extends CommonOptions {
  detail: DetailLevel;
  limit?: number;
}

export function registerContextCommand(program: Command): void {
  withCommonOptions(
    program
      .command('context <keywords>')
      .description('Find the nodes that match keywords through the route index')
      .option('-d, --detail <level>', 'Detail: summary, full', choice(DETAIL_LEVELS), 'summary')
      .option('-l, --limit <n>', 'Maximum nodes (1-50)', parseInteger),
    'json'
  ).action(async (keywords: string, opts: ContextOptions) => {
    await runWithStrata(opts, (strata) =>
      strata.intelligence.context({ keywords, detail: opts.detail, limit: opts.limit })
    );
  });
}
