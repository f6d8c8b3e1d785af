/**
 * strata status: node, edge, experience and route counts for the workspace.
 */

import type { Command } from 'commander';
import { withCommonOptions, type CommonOptions } from '../options.js';
import { runWithStrata } from '../workspace.js';

export function registerStatusCommand(program: Command): void {
  withCommonOptions(
    program.command('status').description('Show workspace counts, per namespace and overall')
  ).action(async (opts: CommonOptions) => {
    await runWithStrata(opts, (strata) => strata.status());
  });
}
