/**
 * Data Quality Tools
 *
 * Column profiling through the TD_ColumnSummary and TD_UnivariateStatistics
 * table operators, plus plain aggregates for single columns.
 */

import type { Logger } from '../../lib/logger';
import type { SqlConnection } from '../../lib/teradata';
import { quoteIdentifier, quoteLiteral, quoteQualifiedName } from '../../lib/sql';
import { Failure, type Result } from '../../domain/types';
import { defineDbTool, isBlank, queryResponse, runTimed } from '../query';
import {
  tableColumnSchema,
  tableSchema,
  type TableColumnParams,
  type TableParams,
} from './schema';

export function columnSummarySql(table: string): string {
  return `SELECT * FROM TD_ColumnSummary(
  ON ${quoteQualifiedName(table)} AS InputTable
  USING TargetColumns('[:]')
) AS dt`;
}

function missingTable(params: TableParams): Result<string> | undefined {
  return isBlank(params.table_name) ? Failure('table_name is required') : undefined;
}

function missingTableOrColumn(params: TableColumnParams): Result<string> | undefined {
  if (isBlank(params.table_name) || isBlank(params.col_name)) {
    return Failure('table_name and col_name are required');
  }
  return undefined;
}

export async function missingValues(
  connection: SqlConnection,
  params: TableParams,
  logger: Logger,
): Promise<Result<string>> {
  const invalid = missingTable(params);
  if (invalid) return invalid;
  return runTimed(logger, 'qlty_missingValues', () =>
    queryResponse(
      connection,
      `SELECT ColumnName, NullCount, NullPercentage
FROM (${columnSummarySql(params.table_name)}) s
WHERE NullCount > 0
ORDER BY NullCount DESC`,
      [],
      { tool_name: 'qlty_missingValues', table_name: params.table_name },
    ),
  );
}

export async function negativeValues(
  connection: SqlConnection,
  params: TableParams,
  logger: Logger,
): Promise<Result<string>> {
  const invalid = missingTable(params);
  if (invalid) return invalid;
  return runTimed(logger, 'qlty_negativeValues', () =>
    queryResponse(
      connection,
      `SELECT ColumnName, NegativeCount
FROM (${columnSummarySql(params.table_name)}) s
WHERE NegativeCount > 0
ORDER BY NegativeCount DESC`,
      [],
      { tool_name: 'qlty_negativeValues', table_name: params.table_name },
    ),
  );
}

export async function distinctCategories(
  connection: SqlConnection,
  params: TableColumnParams,
  logger: Logger,
): Promise<Result<string>> {
  const invalid = missingTableOrColumn(params);
  if (invalid) return invalid;
  return runTimed(logger, 'qlty_distinctCategories', () => {
    const column = quoteIdentifier(params.col_name);
    return queryResponse(
      connection,
      `SELECT ${column} AS Category, COUNT(*) AS CategoryCount
FROM ${quoteQualifiedName(params.table_name)}
GROUP BY 1
ORDER BY CategoryCount DESC`,
      [],
      { tool_name: 'qlty_distinctCategories', table_name: params.table_name, col_name: params.col_name },
    );
  });
}

export async function standardDeviation(
  connection: SqlConnection,
  params: TableColumnParams,
  logger: Logger,
): Promise<Result<string>> {
  const invalid = missingTableOrColumn(params);
  if (invalid) return invalid;
  return runTimed(logger, 'qlty_standardDeviation', () => {
    const column = quoteIdentifier(params.col_name);
    return queryResponse(
      connection,
      `SELECT AVG(${column}) AS Mean, STDDEV_SAMP(${column}) AS StdDev
FROM ${quoteQualifiedName(params.table_name)}`,
      [],
      { tool_name: 'qlty_standardDeviation', table_name: params.table_name, col_name: params.col_name },
    );
  });
}

export async function columnSummary(
  connection: SqlConnection,
  params: TableParams,
  logger: Logger,
): Promise<Result<string>> {
  const invalid = missingTable(params);
  if (invalid) return invalid;
  return runTimed(logger, 'qlty_columnSummary', () =>
    queryResponse(connection, columnSummarySql(params.table_name), [], {
      tool_name: 'qlty_columnSummary',
      table_name: params.table_name,
    }),
  );
}

export async function univariateStatistics(
  connection: SqlConnection,
  params: TableColumnParams,
  logger: Logger,
): Promise<Result<string>> {
  const invalid = missingTableOrColumn(params);
  if (invalid) return invalid;
  return runTimed(logger, 'qlty_univariateStatistics', () =>
    queryResponse(
      connection,
      `SELECT * FROM TD_UnivariateStatistics(
  ON ${quoteQualifiedName(params.table_name)} AS InputTable
  USING TargetColumns(${quoteLiteral(params.col_name.trim())})
  Stats('ALL')
) AS dt
ORDER BY 1, 2`,
      [],
      { tool_name: 'qlty_univariateStatistics', table_name: params.table_name, col_name: params.col_name },
    ),
  );
}

export async function rowsWithMissingValues(
  connection: SqlConnection,
  params: TableColumnParams,
  logger: Logger,
): Promise<Result<string>> {
  const invalid = missingTableOrColumn(params);
  if (invalid) return invalid;
  return runTimed(logger, 'qlty_rowsWithMissingValues', () =>
    queryResponse(
      connection,
      `SELECT * FROM ${quoteQualifiedName(params.table_name)} WHERE ${quoteIdentifier(params.col_name)} IS NULL`,
      [],
      { tool_name: 'qlty_rowsWithMissingValues', table_name: params.table_name, col_name: params.col_name },
    ),
  );
}

export const qltyTools = [
  defineDbTool({
    name: 'qlty_missingValues',
    description: 'Get the column names that having missing values in a table.',
    category: 'qlty',
    schema: tableSchema,
    handler: missingValues,
  }),
  defineDbTool({
    name: 'qlty_negativeValues',
    description: 'Get the column names that having negative values in a table.',
    category: 'qlty',
    schema: tableSchema,
    handler: negativeValues,
  }),
  defineDbTool({
    name: 'qlty_distinctCategories',
    description: 'Get the distinct categories from column in a table.',
    category: 'qlty',
    schema: tableColumnSchema,
    handler: distinctCategories,
  }),
  defineDbTool({
    name: 'qlty_standardDeviation',
    description: 'Get the standard deviation from column in a table.',
    category: 'qlty',
    schema: tableColumnSchema,
    handler: standardDeviation,
  }),
  defineDbTool({
    name: 'qlty_columnSummary',
    description: 'Get the column summary statistics for a table.',
    category: 'qlty',
    schema: tableSchema,
    handler: columnSummary,
  }),
  defineDbTool({
    name: 'qlty_univariateStatistics',
    description: 'Get the univariate statistics for a table.',
    category: 'qlty',
    schema: tableColumnSchema,
    handler: univariateStatistics,
  }),
  defineDbTool({
    name: 'qlty_rowsWithMissingValues',
    description: 'Get the rows with missing values in a table.',
    category: 'qlty',
    schema: tableColumnSchema,
    handler: rowsWithMissingValues,
  }),
];
