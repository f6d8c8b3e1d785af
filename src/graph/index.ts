export {
  GraphEngine,
  normaliseRank,
  type GraphListener,
  type GraphEngineOptions,
  type EdgesOfOptions,
} from './engine.js';
export { GraphTraverser, type ResolvedTraversal } from './traversal.js';
