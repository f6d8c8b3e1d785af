import type { z } from 'zod';
import type { configSchema } from './schema.js';

export type StrataConfig = z.infer<typeof configSchema>;
export type StorageConfig = StrataConfig['storage'];
export type DecayConfig = StrataConfig['decay'];
export type RouterConfig = StrataConfig['router'];
export type PaginationConfig = StrataConfig['pagination'];
export type PeerConfig = StrataConfig['crossref']['peers'][number];
