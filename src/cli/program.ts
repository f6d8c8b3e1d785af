/**
 * strata: command-line entry to a workspace.
 */

import { Command } from 'commander';
import { SERVER_VERSION } from '../mcp/server.js';
import { registerContextCommand } from './commands/context.js';
import { registerLearnCommand } from './commands/learn.js';
import { registerPruneCommand } from './commands/prune.js';
import { registerRecallCommand } from './commands/recall.js';
import { registerReindexCommand } from './commands/reindex.js';
import { registerRelatedCommand } from './commands/related.js';
import { registerServeCommand } from './commands/serve.js';
import { registerStatusCommand } from './commands/status.js';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('strata')
    .description('Knowledge graph and decaying experience memory')
    .version(SERVER_VERSION);

  registerStatusCommand(program);
  registerLearnCommand(program);
  registerRecallCommand(program);
  registerContextCommand(program);
  registerRelatedCommand(program);
  registerPruneCommand(program);
  registerReindexCommand(program);
  registerServeCommand(program);

  return program;
}
