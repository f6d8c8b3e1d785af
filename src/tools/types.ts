/**
 * Tool Definition Types
 */

import type { ToolResponse } from '../errors/index.js';

export type JsonObjectSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
};

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JsonObjectSchema;
  handler: (args: Record<string, unknown>) => Promise<ToolResponse>;
}
