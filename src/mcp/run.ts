/**
 * Serve a workspace over stdio until the process is signalled.
 */

import { loadConfig } from '../config/loader.js';
import type { StrataConfig } from '../config/types.js';
import { Strata } from '../strata.js';
import { createStrataMcpServer } from './server.js';
import { createStdioTransport } from './stdio.js';

export async function serveStdio(config: StrataConfig = loadConfig()): Promise<void> {
  const strata = await Strata.create({ config });
  const server = createStrataMcpServer(strata);
  await server.connect(createStdioTransport());
  strata.logger.info('mcp server listening on stdio', {
    workspace: config.workspace,
    path: config.storage.path,
  });

  const shutdown = async (): Promise<void> => {
    await server.close();
    await strata.close();
    process.exit(0);
  };
  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      strata.logger.error('shutdown failed', { error });
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}
