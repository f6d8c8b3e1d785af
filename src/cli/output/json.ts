/**
 * JSON output format: machine-readable, one document per invocation.
 */

export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + '\n';
}
