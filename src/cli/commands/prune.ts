/**
 * strata prune: delete experiences whose relevance has decayed away.
 */

import type { Command } from 'commander';
import { parseNumber, withCommonOptions, type CommonOptions } from '../options.js';
import { runWithStrata } from '../workspace.js';

interface PruneOptions extends CommonOptions {
  threshold?: number;
}

export function registerPruneCommand(program: Command): void {
  withCommonOptions(
    program
      .command('prune')
      .description('Delete experiences whose current relevance is below a threshold')
      .option('--threshold <value>', 'Relevance cutoff (0-1), default from configuration', parseNumber)
  ).action(async (opts: PruneOptions) => {
    await runWithStrata(opts, async (strata) => ({
      removed: await strata.experiences.prune(opts.threshold),
    }));
  });
}
