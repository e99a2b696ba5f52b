/**
 * Tool definitions
 *
 * Each tool module declares a zod shape and a typed implementation; defineTool
 * erases the parameter type so heterogeneous tools can share one registry
 * that both the MCP server and the REST surface read from.
 */

import { z } from 'zod';
import { ValidationError } from '../../lib/errors';
import type { ToolResponse } from '../../domain/types';
import type { ToolContext } from '../context/types';

export type ToolCategory =
  | 'base'
  | 'dba'
  | 'qlty'
  | 'rag'
  | 'sec'
  | 'evs'
  | 'fs'
  | 'connection'
  | 'custom';

export type ToolParams<S extends z.ZodRawShape> = z.objectOutputType<S, z.ZodTypeAny, 'strip'>;

export interface ToolDefinition<S extends z.ZodRawShape> {
  name: string;
  description: string;
  category: ToolCategory;
  shape: S;
  run: (params: ToolParams<S>, context: ToolContext) => Promise<ToolResponse>;
}

export interface Tool {
  readonly name: string;
  readonly description: string;
  readonly category: ToolCategory;
  readonly inputShape: z.ZodRawShape;
  readonly inputSchema: z.ZodTypeAny;
  /** Validate raw arguments and run the tool */
  invoke(args: unknown, context: ToolContext): Promise<ToolResponse>;
}

export function defineTool<S extends z.ZodRawShape>(definition: ToolDefinition<S>): Tool {
  const schema = z.object(definition.shape);
  return {
    name: definition.name,
    description: definition.description,
    category: definition.category,
    inputShape: definition.shape,
    inputSchema: schema,
    async invoke(args, context) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ValidationError(
          `Invalid arguments for ${definition.name}: ${parsed.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ')}`,
        );
      }
      return definition.run(parsed.data, context);
    },
  };
}
