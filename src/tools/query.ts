/**
 * Helpers shared by the SQL-backed tools
 */

import type { z } from 'zod';
import type { SqlConnection } from '../lib/teradata';
import { createResponse, rowsToJson, type JsonRecord } from '../lib/serialize';
import { createTimer, type Logger } from '../lib/logger';
import { Success, failureFrom, type Result } from '../domain/types';
import { executeDbTool } from '../mcp/tools/executor';
import {
  defineTool,
  type Tool,
  type ToolCategory,
  type ToolParams,
} from '../mcp/tools/tool-definition';

export type DbToolHandler<S extends z.ZodRawShape> = (
  connection: SqlConnection,
  params: ToolParams<S>,
  logger: Logger,
) => Promise<Result<string>>;

/**
 * Define a tool whose handler runs against the shared database connection
 */
export function defineDbTool<S extends z.ZodRawShape>(options: {
  name: string;
  description: string;
  category: ToolCategory;
  schema: z.ZodObject<S>;
  handler: DbToolHandler<S>;
}): Tool {
  const { name, handler } = options;
  return defineTool({
    name,
    description: options.description,
    category: options.category,
    shape: options.schema.shape,
    run: (params, context) =>
      executeDbTool(context, name, (connection) =>
        handler(connection, params, context.logger.child({ tool: name })),
      ),
  });
}

/**
 * Run a query and wrap its rows in the standard envelope. Column names and the
 * row count are added to the metadata.
 */
export async function queryResponse(
  connection: SqlConnection,
  sql: string,
  params: readonly unknown[],
  metadata: JsonRecord,
): Promise<string> {
  const { columns, rows } = await connection.query(sql, params);
  return createResponse(rowsToJson(columns, rows), {
    ...metadata,
    columns: columns.map((column) => ({ name: column.name, type: column.type ?? null })),
    row_count: rows.length,
  });
}

/**
 * Time a tool body and turn a thrown error into a Failure
 */
export async function runTimed(
  logger: Logger,
  operation: string,
  work: () => Promise<string>,
  context: Record<string, unknown> = {},
): Promise<Result<string>> {
  const timer = createTimer(logger, operation, context);
  try {
    const value = await work();
    timer.end();
    return Success(value);
  } catch (error) {
    timer.error(error);
    return failureFrom(error);
  }
}

/**
 * Accumulates optional predicates with their bind parameters
 */
export class Predicates {
  private readonly conditions: string[] = [];
  readonly params: unknown[] = [];

  add(condition: string, ...params: unknown[]): this {
    this.conditions.push(condition);
    this.params.push(...params);
    return this;
  }

  /** Add the predicate only when the value is a non-blank string */
  addIfPresent(value: string | undefined, condition: string): this {
    if (value !== undefined && value.trim().length > 0) {
      this.add(condition, value.trim());
    }
    return this;
  }

  get isEmpty(): boolean {
    return this.conditions.length === 0;
  }

  /** `WHERE a AND b`, or an empty string when nothing was added */
  where(): string {
    return this.isEmpty ? '' : `WHERE ${this.conditions.join(' AND ')}`;
  }

  /** Conditions joined for appending to an existing WHERE clause */
  and(): string {
    return this.conditions.map((condition) => `AND ${condition}`).join(' ');
  }
}

export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

export async function tableExists(
  connection: SqlConnection,
  database: string,
  table: string,
): Promise<boolean> {
  const { rows } = await connection.query(
    'SELECT 1 FROM DBC.TablesV WHERE UPPER(DatabaseName) = UPPER(?) AND UPPER(TableName) = UPPER(?)',
    [database.trim(), table.trim()],
  );
  return rows.length > 0;
}
