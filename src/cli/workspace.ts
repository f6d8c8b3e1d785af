/**
 * Open the configured workspace for one command, print the result, close.
 */

import { resolve } from 'path';
import { loadConfig } from '../config/loader.js';
import type { StrataConfig } from '../config/types.js';
import { IN_MEMORY } from '../storage/factory.js';
import { Strata } from '../strata.js';
import type { CommonOptions } from './options.js';
import { formatOutput } from './output/index.js';

export function resolveConfig(db?: string): StrataConfig {
  const config = loadConfig();
  if (db) {
    config.storage.path = db === IN_MEMORY ? db : resolve(db);
  }
  return config;
}

export function reportError(err: unknown): void {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
}

export async function runWithStrata(
  opts: CommonOptions,
  fn: (strata: Strata) => Promise<unknown>
): Promise<void> {
  let strata: Strata | null = null;
  try {
    strata = await Strata.create({ config: resolveConfig(opts.db) });
    const result = await fn(strata);
    process.stdout.write(formatOutput(result, opts.format));
  } catch (err) {
    reportError(err);
  } finally {
    if (strata) await strata.close();
  }
}
