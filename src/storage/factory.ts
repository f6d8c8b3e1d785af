/**
 * Storage Factory
 *
 * Opens and initializes a knowledge store for a workspace database.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import type { StorageConfig } from '../config/types.js';
import { toStoreFailure } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';
import type { IKnowledgeStore } from './interface.js';
import { SQLiteKnowledgeStore } from './sqlite/storage.js';

export const IN_MEMORY = ':memory:';

export interface CreateStoreOptions {
  logger?: Logger;
  /** Open an existing workspace without write access */
  readOnly?: boolean;
}

/**
 * Create and initialize a store
 */
export async function createStore(
  config: StorageConfig,
  options: CreateStoreOptions = {}
): Promise<IKnowledgeStore> {
  const readOnly = options.readOnly ?? false;
  if (config.path !== IN_MEMORY && !readOnly) {
    try {
      mkdirSync(dirname(config.path), { recursive: true });
    } catch (err) {
      throw toStoreFailure(err);
    }
  }

  const store = new SQLiteKnowledgeStore(config.path, {
    walMode: config.walMode,
    busyTimeoutMs: config.busyTimeoutMs,
    readOnly,
    logger: options.logger,
  });
  try {
    await store.initialize();
  } catch (err) {
    await store.close();
    throw err;
  }
  return store;
}

/**
 * Open a peer workspace for cross-workspace reads
 */
export async function openPeerStore(
  path: string,
  base: Pick<StorageConfig, 'busyTimeoutMs'>,
  logger?: Logger
): Promise<IKnowledgeStore> {
  return createStore({ path, walMode: false, busyTimeoutMs: base.busyTimeoutMs }, { readOnly: true, logger });
}
