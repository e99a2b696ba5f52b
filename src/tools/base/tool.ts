/**
 * Base Tools
 *
 * Ad hoc SQL plus catalog lookups against the DBC views: databases, objects,
 * columns, DDL, samples and query-log based usage.
 */

import type { Logger } from '../../lib/logger';
import type { SqlConnection } from '../../lib/teradata';
import { createResponse } from '../../lib/serialize';
import { quoteQualifiedName } from '../../lib/sql';
import { Failure, type Result } from '../../domain/types';
import { Predicates, defineDbTool, isBlank, queryResponse, runTimed } from '../query';
import {
  columnDescriptionSchema,
  databaseListSchema,
  readQuerySchema,
  tableAffinitySchema,
  tableDDLSchema,
  tableListSchema,
  tablePreviewSchema,
  tableUsageSchema,
  writeQuerySchema,
  type ColumnDescriptionParams,
  type ReadQueryParams,
  type TableAffinityParams,
  type TableDDLParams,
  type TableListParams,
  type TablePreviewParams,
  type TableUsageParams,
  type WriteQueryParams,
} from './schema';

export const PREVIEW_ROWS = 5;

export async function readQuery(
  connection: SqlConnection,
  params: ReadQueryParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.sql)) {
    return Failure('sql is required');
  }
  return runTimed(logger, 'base_readQuery', () =>
    queryResponse(connection, params.sql, [], { tool_name: 'base_readQuery', sql: params.sql }),
  );
}

export async function writeQuery(
  connection: SqlConnection,
  params: WriteQueryParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.sql)) {
    return Failure('sql is required');
  }
  return runTimed(logger, 'base_writeQuery', async () => {
    const { rowCount } = await connection.execute(params.sql);
    return createResponse([], {
      tool_name: 'base_writeQuery',
      sql: params.sql,
      affected_rows: rowCount,
    });
  });
}

export async function tableDDL(
  connection: SqlConnection,
  params: TableDDLParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.table_name)) {
    return Failure('table_name is required');
  }
  return runTimed(logger, 'base_tableDDL', () =>
    queryResponse(connection, `SHOW TABLE ${quoteQualifiedName(params.table_name, params.db_name)}`, [], {
      tool_name: 'base_tableDDL',
      db_name: params.db_name,
      table_name: params.table_name,
    }),
  );
}

export const DATABASE_LIST_SQL = `SELECT TRIM(DataBaseName) AS DataBaseName,
       DECODE(DBKind, 'U', 'User', 'D', 'DataBase') AS DBType,
       CommentString
FROM DBC.DatabasesV
ORDER BY DataBaseName`;

export async function databaseList(
  connection: SqlConnection,
  _params: unknown,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'base_databaseList', () =>
    queryResponse(connection, DATABASE_LIST_SQL, [], { tool_name: 'base_databaseList' }),
  );
}

export async function tableList(
  connection: SqlConnection,
  params: TableListParams,
  logger: Logger,
): Promise<Result<string>> {
  const predicates = new Predicates()
    .add("TableKind IN ('T', 'V', 'O', 'Q')")
    .addIfPresent(params.db_name, 'UPPER(DataBaseName) = UPPER(?)');
  const sql = `SELECT TRIM(DataBaseName) AS DataBaseName, TRIM(TableName) AS TableName, TableKind
FROM DBC.TablesV
${predicates.where()}
ORDER BY DataBaseName, TableName`;
  return runTimed(logger, 'base_tableList', () =>
    queryResponse(connection, sql, predicates.params, {
      tool_name: 'base_tableList',
      db_name: params.db_name,
    }),
  );
}

export async function columnDescription(
  connection: SqlConnection,
  params: ColumnDescriptionParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.obj_name)) {
    return Failure('obj_name is required');
  }
  const predicates = new Predicates()
    .addIfPresent(params.db_name, 'UPPER(c.DatabaseName) = UPPER(?)')
    .addIfPresent(params.obj_name, 'UPPER(c.TableName) = UPPER(?)');
  const sql = `SELECT TRIM(c.DatabaseName) AS DatabaseName,
       TRIM(c.TableName) AS TableName,
       TRIM(c.ColumnName) AS ColumnName,
       CASE c.ColumnType
         WHEN 'CF' THEN 'CHAR' WHEN 'CV' THEN 'VARCHAR' WHEN 'CO' THEN 'CLOB'
         WHEN 'I1' THEN 'BYTEINT' WHEN 'I2' THEN 'SMALLINT' WHEN 'I' THEN 'INTEGER'
         WHEN 'I8' THEN 'BIGINT' WHEN 'D' THEN 'DECIMAL' WHEN 'N' THEN 'NUMBER'
         WHEN 'F' THEN 'FLOAT' WHEN 'DA' THEN 'DATE' WHEN 'AT' THEN 'TIME'
         WHEN 'TS' THEN 'TIMESTAMP' WHEN 'SZ' THEN 'TIMESTAMP WITH TIME ZONE'
         WHEN 'BF' THEN 'BYTE' WHEN 'BV' THEN 'VARBYTE' WHEN 'BO' THEN 'BLOB'
         WHEN 'JN' THEN 'JSON' WHEN 'PD' THEN 'PERIOD(DATE)' WHEN 'PS' THEN 'PERIOD(TIMESTAMP)'
         ELSE TRIM(c.ColumnType)
       END AS CType,
       c.ColumnLength,
       c.Nullable,
       c.CommentString
FROM DBC.ColumnsV c
${predicates.where()}
ORDER BY c.ColumnId`;
  return runTimed(logger, 'base_columnDescription', () =>
    queryResponse(connection, sql, predicates.params, {
      tool_name: 'base_columnDescription',
      db_name: params.db_name,
      obj_name: params.obj_name,
    }),
  );
}

export async function tablePreview(
  connection: SqlConnection,
  params: TablePreviewParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.table_name)) {
    return Failure('table_name is required');
  }
  return runTimed(logger, 'base_tablePreview', () =>
    queryResponse(
      connection,
      `SELECT TOP ${PREVIEW_ROWS} * FROM ${quoteQualifiedName(params.table_name, params.db_name)}`,
      [],
      { tool_name: 'base_tablePreview', db_name: params.db_name, table_name: params.table_name },
    ),
  );
}

export async function tableAffinity(
  connection: SqlConnection,
  params: TableAffinityParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.db_name) || isBlank(params.obj_name)) {
    return Failure('db_name and obj_name are required');
  }
  const sql = `LOCKING ROW FOR ACCESS
SELECT TRIM(other.ObjectDatabaseName) AS DatabaseName,
       TRIM(other.ObjectTableName) AS TableName,
       COUNT(DISTINCT other.QueryID) AS QueryCount
FROM (
  SELECT DISTINCT QueryID, ObjectDatabaseName, ObjectTableName
  FROM DBC.QryLogObjectsV
  WHERE ObjectType IN ('Tab', 'Viw')
    AND ObjectColumnName IS NULL
    AND UPPER(ObjectDatabaseName) = UPPER(?)
    AND UPPER(ObjectTableName) = UPPER(?)
) target
JOIN (
  SELECT DISTINCT QueryID, ObjectDatabaseName, ObjectTableName
  FROM DBC.QryLogObjectsV
  WHERE ObjectType IN ('Tab', 'Viw')
    AND ObjectColumnName IS NULL
) other
  ON other.QueryID = target.QueryID
WHERE NOT (other.ObjectDatabaseName = target.ObjectDatabaseName
           AND other.ObjectTableName = target.ObjectTableName)
GROUP BY 1, 2
ORDER BY QueryCount DESC`;
  return runTimed(logger, 'base_tableAffinity', () =>
    queryResponse(connection, sql, [params.db_name.trim(), params.obj_name.trim()], {
      tool_name: 'base_tableAffinity',
      db_name: params.db_name,
      obj_name: params.obj_name,
    }),
  );
}

export async function tableUsage(
  connection: SqlConnection,
  params: TableUsageParams,
  logger: Logger,
): Promise<Result<string>> {
  const predicates = new Predicates()
    .add("ObjectType IN ('Tab', 'Viw')")
    .add('ObjectColumnName IS NULL')
    .addIfPresent(params.db_name, 'UPPER(ObjectDatabaseName) = UPPER(?)');
  const sql = `LOCKING ROW FOR ACCESS
SELECT TRIM(ObjectDatabaseName) AS DatabaseName,
       TRIM(ObjectTableName) AS TableName,
       COUNT(DISTINCT QueryID) AS QueryCount,
       MIN(CollectTimeStamp) AS FirstQueryTime,
       MAX(CollectTimeStamp) AS LastQueryTime
FROM DBC.QryLogObjectsV
${predicates.where()}
GROUP BY 1, 2
ORDER BY QueryCount DESC`;
  return runTimed(logger, 'base_tableUsage', () =>
    queryResponse(connection, sql, predicates.params, {
      tool_name: 'base_tableUsage',
      db_name: params.db_name,
    }),
  );
}

export const baseTools = [
  defineDbTool({
    name: 'base_readQuery',
    description: 'Executes a SQL query to read from the database.',
    category: 'base',
    schema: readQuerySchema,
    handler: readQuery,
  }),
  defineDbTool({
    name: 'base_writeQuery',
    description: 'Executes a SQL query to write to the database.',
    category: 'base',
    schema: writeQuerySchema,
    handler: writeQuery,
  }),
  defineDbTool({
    name: 'base_tableDDL',
    description: 'Display table DDL definition.',
    category: 'base',
    schema: tableDDLSchema,
    handler: tableDDL,
  }),
  defineDbTool({
    name: 'base_databaseList',
    description: 'List all databases in the Teradata System.',
    category: 'base',
    schema: databaseListSchema,
    handler: databaseList,
  }),
  defineDbTool({
    name: 'base_tableList',
    description: 'List objects in a database.',
    category: 'base',
    schema: tableListSchema,
    handler: tableList,
  }),
  defineDbTool({
    name: 'base_columnDescription',
    description: 'Show detailed column information about a database table.',
    category: 'base',
    schema: columnDescriptionSchema,
    handler: columnDescription,
  }),
  defineDbTool({
    name: 'base_tablePreview',
    description: 'Get data samples and structure overview from a database table.',
    category: 'base',
    schema: tablePreviewSchema,
    handler: tablePreview,
  }),
  defineDbTool({
    name: 'base_tableAffinity',
    description:
      'Get tables commonly used together by database users, this is helpful to infer relationships between tables.',
    category: 'base',
    schema: tableAffinitySchema,
    handler: tableAffinity,
  }),
  defineDbTool({
    name: 'base_tableUsage',
    description:
      'Measure the usage of a table and views by users in a given schema, this is helpful to infer what database objects are most actively used or drive most value.',
    category: 'base',
    schema: tableUsageSchema,
    handler: tableUsage,
  }),
];
