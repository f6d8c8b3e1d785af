/**
 * Configuration Loader
 *
 * Precedence: defaults < JSON file < environment variables.
 */

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, isAbsolute, join, resolve } from 'path';
import { configSchema } from './schema.js';
import type { StrataConfig } from './types.js';

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
}

function expand(value: string, env: NodeJS.ProcessEnv): string {
  return value.replace(/\$\{([^}]+)\}/g, (_, name: string) => {
    const found = env[name];
    if (found === undefined) throw new Error(`Environment variable "${name}" is not set`);
    return found;
  });
}

function expandDeep(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') return expand(obj, env);
  if (Array.isArray(obj)) return obj.map((item) => expandDeep(item, env));
  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(obj)) {
      result[key] = expandDeep(val, env);
    }
    return result;
  }
  return obj;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Overlay STRATA_* environment variables on a raw config object
 */
function applyEnv(raw: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out: Record<string, unknown> = { ...raw };
  if (env['STRATA_WORKSPACE']) out['workspace'] = env['STRATA_WORKSPACE'];
  if (env['STRATA_DB_PATH']) {
    const storage = isRecord(out['storage']) ? out['storage'] : {};
    out['storage'] = { ...storage, path: env['STRATA_DB_PATH'] };
  }
  if (env['STRATA_LOG_LEVEL']) {
    const log = isRecord(out['log']) ? out['log'] : {};
    out['log'] = { ...log, level: env['STRATA_LOG_LEVEL'] };
  }
  return out;
}

export function configSearchPaths(options: LoadConfigOptions = {}): string[] {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const home = options.home ?? homedir();
  const paths: string[] = [];
  const explicit = env['STRATA_CONFIG'];
  if (explicit) paths.push(resolve(cwd, explicit));
  paths.push(join(cwd, 'strata.json'));
  paths.push(join(home, '.strata', 'config.json'));
  return paths;
}

/**
 * Validate a raw config object. Relative paths resolve against `baseDir`.
 */
export function parseConfig(
  raw: unknown,
  options: LoadConfigOptions & { baseDir?: string; source?: string } = {}
): StrataConfig {
  const env = options.env ?? process.env;
  const home = options.home ?? homedir();
  const base = isRecord(raw) ? raw : {};
  const merged = applyEnv(base, env);
  const expanded = expandDeep(merged, env);

  const result = configSchema.safeParse(expanded);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  - ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    const where = options.source ? ` (${options.source})` : '';
    throw new Error(`Config validation failed${where}:\n${errors}`);
  }

  const data = result.data;
  const baseDir = options.baseDir ?? options.cwd ?? process.cwd();

  function resolvePath(p: string): string {
    if (p === ':memory:') return p;
    if (p === '~' || p.startsWith('~/')) return join(home, p.slice(1));
    return isAbsolute(p) ? p : resolve(baseDir, p);
  }

  data.storage.path = resolvePath(data.storage.path);
  data.crossref.peers = data.crossref.peers.map((peer) => ({
    ...peer,
    path: resolvePath(peer.path),
  }));

  return data;
}

/**
 * Load configuration from the first config file found, or defaults
 */
export function loadConfig(options: LoadConfigOptions = {}): StrataConfig {
  for (const p of configSearchPaths(options)) {
    if (!existsSync(p)) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(p, 'utf8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`Config file is not valid JSON (${p}): ${reason}`, { cause: err });
    }
    return parseConfig(raw, { ...options, baseDir: dirname(p), source: p });
  }
  return parseConfig({}, options);
}
