/**
 * strata serve: expose the workspace as MCP tools over stdio.
 */

import type { Command } from 'commander';
import { serveStdio } from '../../mcp/run.js';
import { reportError, resolveConfig } from '../workspace.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Run the MCP server on stdin/stdout')
    .option('--db <path>', 'Workspace database path (overrides configuration)')
    .action(async (opts: { db?: string }) => {
      try {
        await serveStdio(resolveConfig(opts.db));
      } catch (err) {
        reportError(err);
      }
    });
}
