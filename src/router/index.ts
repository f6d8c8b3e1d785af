export {
  ContextRouter,
  toSummary,
  type ContextRouterOptions,
  type ResolveOptions,
} from './context-router.js';
export { specificity } from './specificity.js';
