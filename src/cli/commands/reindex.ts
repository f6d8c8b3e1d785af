/**
 * strata reindex: rebuild the keyword route index from live nodes.
 */

import type { Command } from 'commander';
import { withCommonOptions, type CommonOptions } from '../options.js';
import { runWithStrata } from '../workspace.js';

export function registerReindexCommand(program: Command): void {
  withCommonOptions(
    program.command('reindex').description('Rebuild the route index from every live node')
  ).action(async (opts: CommonOptions) => {
    await runWithStrata(opts, async (strata) => ({ routes: await strata.router.rebuild() }));
  });
}
