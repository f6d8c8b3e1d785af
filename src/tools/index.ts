/**
 * Tool registry: registers all 14 tools.
 *
 * Each tool is a thin wrapper over a Strata operation with flat arguments.
 * Tools are grouped by domain and registered in a flat map for dispatch.
 */

import { ErrorHandler, invalidArgument, type ToolResponse } from '../errors/index.js';
import type { Strata } from '../strata.js';
import type { ToolDefinition } from './types.js';

// Graph (6)
import { strataGraphAdd } from './graph/strata_graph_add.js';
import { strataGraphConnect } from './graph/strata_graph_connect.js';
import { strataGraphQuery } from './graph/strata_graph_query.js';
import { strataGraphRemove } from './graph/strata_graph_remove.js';
import { strataGraphRestore } from './graph/strata_graph_restore.js';
import { strataGraphStatus } from './graph/strata_graph_status.js';

// Experience (3)
import { strataExperienceSave } from './experience/strata_experience_save.js';
import { strataExperienceSearch } from './experience/strata_experience_search.js';
import { strataExperiencePrune } from './experience/strata_experience_prune.js';

// Intelligence (5)
import { strataLearn } from './intelligence/strata_learn.js';
import { strataRecall } from './intelligence/strata_recall.js';
import { strataCrossref } from './intelligence/strata_crossref.js';
import { strataContext } from './intelligence/strata_context.js';
import { strataRelated } from './intelligence/strata_related.js';

const TOOL_FACTORIES: ((strata: Strata) => ToolDefinition)[] = [
  // Graph (6)
  strataGraphAdd,
  strataGraphConnect,
  strataGraphQuery,
  strataGraphRemove,
  strataGraphRestore,
  strataGraphStatus,
  // Experience (3)
  strataExperienceSave,
  strataExperienceSearch,
  strataExperiencePrune,
  // Intelligence (5)
  strataLearn,
  strataRecall,
  strataCrossref,
  strataContext,
  strataRelated,
];

/** Immutable map of tool name → tool definition. */
export type ToolRegistry = ReadonlyMap<string, ToolDefinition>;

export function registerTools(strata: Strata): ToolRegistry {
  const registry = new Map<string, ToolDefinition>();
  for (const factory of TOOL_FACTORIES) {
    const tool = factory(strata);
    if (registry.has(tool.name)) {
      throw new Error(`Duplicate tool name: ${tool.name}`);
    }
    registry.set(tool.name, tool);
  }
  return registry;
}

export function listTools(registry: ToolRegistry): ToolDefinition[] {
  return Array.from(registry.values());
}

/**
 * Dispatch a tool call by name. Unknown names yield an InvalidArgument response.
 */
export async function callTool(
  registry: ToolRegistry,
  name: string,
  args: Record<string, unknown>
): Promise<ToolResponse> {
  const tool = registry.get(name);
  if (!tool) {
    const available = Array.from(registry.keys()).join(', ');
    return {
      ok: false,
      error: ErrorHandler.toStructuredError(invalidArgument(`Unknown tool: ${name}. Available: ${available}`)),
    };
  }
  return tool.handler(args);
}

export { defineTool, formatIssues } from './define.js';
export type { ToolDefinition, JsonObjectSchema } from './types.js';
