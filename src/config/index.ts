export { configSchema } from './schema.js';
export { loadConfig, parseConfig, configSearchPaths } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
export type {
  StrataConfig,
  StorageConfig,
  DecayConfig,
  RouterConfig,
  PaginationConfig,
  PeerConfig,
} from './types.js';
