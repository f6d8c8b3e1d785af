/**
 * Shared test fixtures: an in-memory workspace and a clock the test drives.
 */

import { parseConfig } from '../config/loader.js';
import type { StrataConfig } from '../config/types.js';
import { Strata } from '../strata.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { MS_PER_DAY, type Clock } from '../utils/time.js';

export const EPOCH = '2026-01-01T00:00:00.000Z';

export function addDays(date: string | Date, days: number): Date {
  const d = typeof date === 'string' ? new Date(date) : date;
  return new Date(d.getTime() + days * MS_PER_DAY);
}

export interface TestClock {
  clock: Clock;
  advanceDays(days: number): void;
  set(iso: string): void;
}

export function createTestClock(start: string = EPOCH): TestClock {
  let now = new Date(start);
  return {
    clock: () => new Date(now.getTime()),
    advanceDays: (days) => {
      now = addDays(now, days);
    },
    set: (iso) => {
      now = new Date(iso);
    },
  };
}

export function memoryConfig(overrides: Record<string, unknown> = {}): StrataConfig {
  return parseConfig({ ...overrides, storage: { path: ':memory:' } }, { env: {} });
}

export async function createTestStrata(
  options: { clock?: Clock; logger?: Logger; config?: StrataConfig } = {}
): Promise<Strata> {
  return Strata.create({
    config: options.config ?? memoryConfig(),
    clock: options.clock ?? createTestClock().clock,
    logger: options.logger ?? silentLogger,
  });
}
