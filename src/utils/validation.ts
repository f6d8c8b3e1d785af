/**
 * Argument Validation
 *
 * Engine-level checks that raise InvalidArgument.
 */

import { invalidArgument } from '../errors/index.js';

export interface PaginationLimits {
  defaultLimit: number;
  maxLimit: number;
}

export const DEFAULT_PAGINATION: PaginationLimits = { defaultLimit: 10, maxLimit: 50 };

/**
 * Trimmed, non-empty string
 */
export function requireText(value: string | undefined, field: string): string {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') throw invalidArgument(`${field} must be a non-empty string`);
  return trimmed;
}

export function resolveLimit(limit: number | undefined, limits: PaginationLimits): number {
  if (limit === undefined) return limits.defaultLimit;
  if (!Number.isInteger(limit) || limit < 1 || limit > limits.maxLimit) {
    throw invalidArgument(`limit must be an integer between 1 and ${limits.maxLimit}`);
  }
  return limit;
}

export function resolveOffset(offset: number | undefined): number {
  if (offset === undefined) return 0;
  if (!Number.isInteger(offset) || offset < 0) {
    throw invalidArgument('offset must be a non-negative integer');
  }
  return offset;
}

export function requireUnitInterval(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw invalidArgument(`${field} must be between 0 and 1`);
  }
  return value;
}

/**
 * Trim, drop empties and de-duplicate in order
 */
export function normalizeTags(tags: string[] | undefined): string[] {
  const out: string[] = [];
  for (const tag of tags ?? []) {
    const t = tag.trim();
    if (t !== '' && !out.includes(t)) out.push(t);
  }
  return out;
}
