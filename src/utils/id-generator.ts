/**
 * ID Generator
 *
 * Format: <prefix>_<base36 timestamp>_<random hex>
 */

import { randomBytes } from 'crypto';

function generate(prefix: string, bytes: number): string {
  const timestamp = Date.now().toString(36);
  const random = randomBytes(bytes).toString('hex');
  return `${prefix}_${timestamp}_${random}`;
}

/**
 * Generate a unique graph node ID
 */
export function generateNodeId(): string {
  return generate('node', 6);
}

/**
 * Generate a unique experience ID
 */
export function generateExperienceId(): string {
  return generate('exp', 6);
}
