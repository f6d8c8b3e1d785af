/**
 * Peer Workspaces
 *
 * Read-only handles on other workspaces for cross-referencing. Peers are
 * opened per call and closed afterwards; one that cannot be opened is
 * skipped with a warning.
 */

import type { PeerConfig } from '../config/types.js';
import { ExperienceEngine } from '../experience/engine.js';
import { GraphEngine } from '../graph/engine.js';
import { openPeerStore } from '../storage/factory.js';
import type { IKnowledgeStore } from '../storage/interface.js';
import type { Logger } from '../utils/logger.js';
import type { Clock } from '../utils/time.js';
import type { PaginationLimits } from '../utils/validation.js';

export interface PeerWorkspace {
  name: string;
  graph: GraphEngine;
  experiences: ExperienceEngine;
}

export interface PeerOptions {
  busyTimeoutMs: number;
  clock: Clock;
  logger: Logger;
  pagination: PaginationLimits;
}

/**
 * Open every reachable peer, run `fn`, then close them all
 */
export async function withPeers<T>(
  configs: PeerConfig[],
  options: PeerOptions,
  fn: (peers: PeerWorkspace[]) => Promise<T>
): Promise<T> {
  const stores: IKnowledgeStore[] = [];
  const peers: PeerWorkspace[] = [];

  for (const config of configs) {
    try {
      const store = await openPeerStore(config.path, options, options.logger);
      stores.push(store);
      peers.push({
        name: config.name,
        graph: new GraphEngine(store, {
          clock: options.clock,
          logger: options.logger,
          pagination: options.pagination,
        }),
        experiences: new ExperienceEngine(store, {
          clock: options.clock,
          logger: options.logger,
          pagination: options.pagination,
        }),
      });
    } catch (err) {
      options.logger.warn('peer workspace unavailable', { peer: config.name, path: config.path, error: err });
    }
  }

  try {
    return await fn(peers);
  } finally {
    await Promise.all(stores.map((store) => store.close()));
  }
}
