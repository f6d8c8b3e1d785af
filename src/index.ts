/**
 * strata-memory
 *
 * Knowledge graph plus decaying experience memory, with keyword context
 * routing, exposed as a library, MCP tools and a CLI.
 */

export { Strata, type StrataOptions } from './strata.js';

export * from './types/index.js';
export * from './errors/index.js';
export * from './config/index.js';
export * from './utils/index.js';
export * from './storage/index.js';
export * from './decay/index.js';
export * from './graph/index.js';
export * from './experience/index.js';
export * from './router/index.js';
export * from './intelligence/index.js';
export {
  registerTools,
  listTools,
  callTool,
  defineTool,
  formatIssues,
  type ToolRegistry,
  type ToolDefinition,
  type JsonObjectSchema,
} from './tools/index.js';
export * from './mcp/index.js';
