export {
  IntelligenceLayer,
  CROSSREF_MIN_RELEVANCE,
  CONTEXT_MIN_RELEVANCE,
  CONTEXT_SUMMARY_CHARS,
  LEARNED_NODE_PREFIX,
  type IntelligenceDeps,
  type IntelligenceOptions,
  type RecallInput,
  type CrossrefInput,
  type ContextInput,
  type RelatedInput,
  type ExperienceSearchResult,
} from './layer.js';
export { Promoter, PROMOTED_NODE_TYPE } from './promotion.js';
export { RecallRanker, mergeWorkspaceItems } from './ranking.js';
export { withPeers, type PeerWorkspace } from './peers.js';
