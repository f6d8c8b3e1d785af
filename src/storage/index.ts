/**
 * Storage Exports
 */

export type {
  IKnowledgeStore,
  NodeSearch,
  NodeHit,
  NodeSearchResult,
  ExperienceSearch,
  EdgeListOptions,
  WriteOp,
} from './interface.js';
export { createStore, openPeerStore, IN_MEMORY, type CreateStoreOptions } from './factory.js';
export * from './sqlite/index.js';
