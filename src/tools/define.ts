/**
 * defineTool: pairs a JSON input schema (for tool listing) with a zod
 * schema (for validation) and wraps the handler in ErrorHandler.
 */

import type { z } from 'zod';
import { ErrorHandler, invalidArgument } from '../errors/index.js';
import type { JsonObjectSchema, ToolDefinition } from './types.js';

export interface ToolOptions<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: JsonObjectSchema;
  args: S;
  run: (args: z.output<S>) => Promise<unknown>;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

export function defineTool<S extends z.ZodTypeAny>(options: ToolOptions<S>): ToolDefinition {
  return {
    name: options.name,
    description: options.description,
    inputSchema: options.inputSchema,
    handler: (args) =>
      ErrorHandler.wrap(async () => {
        const parsed = options.args.safeParse(args);
        if (!parsed.success) throw invalidArgument(formatIssues(parsed.error));
        return options.run(parsed.data);
      }),
  };
}
