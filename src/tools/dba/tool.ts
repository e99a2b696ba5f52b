/**
 * DBA Tools
 *
 * Query log, space, resource usage and session views for administrators.
 * Look-back windows come from validated integers and are inlined; every other
 * user value is bound.
 */

import type { Logger } from '../../lib/logger';
import type { SqlConnection } from '../../lib/teradata';
import { Failure, type Result } from '../../domain/types';
import { Predicates, defineDbTool, isBlank, queryResponse, runTimed } from '../query';
import { buildResusageQuery } from './resusage';
import {
  databaseSpaceSchema,
  noParamsSchema,
  resusageUserSummarySchema,
  sessionInfoSchema,
  tableSpaceSchema,
  tableSqlListSchema,
  tableUsageImpactSchema,
  userSqlListSchema,
  type DatabaseSpaceParams,
  type ResusageUserSummaryParams,
  type SessionInfoParams,
  type TableSpaceParams,
  type TableSqlListParams,
  type TableUsageImpactParams,
  type UserSqlListParams,
} from './schema';

const RECENT_DAYS = 7;

export async function userSqlList(
  connection: SqlConnection,
  params: UserSqlListParams,
  logger: Logger,
): Promise<Result<string>> {
  const predicates = new Predicates().addIfPresent(params.user_name, 'UPPER(l.UserName) = UPPER(?)');
  const sql = `LOCKING ROW FOR ACCESS
SELECT l.QueryID,
       TRIM(l.UserName) AS UserName,
       l.StartTime,
       s.SqlRowNo,
       s.SqlTextInfo
FROM DBC.QryLogV l
JOIN DBC.QryLogSqlV s
  ON s.QueryID = l.QueryID AND s.ProcID = l.ProcID
WHERE CAST(l.StartTime AS DATE) >= CURRENT_DATE - ${params.no_days}
${predicates.and()}
ORDER BY l.StartTime DESC, l.QueryID, s.SqlRowNo`;
  return runTimed(logger, 'dba_userSqlList', () =>
    queryResponse(connection, sql, predicates.params, {
      tool_name: 'dba_userSqlList',
      user_name: params.user_name,
      no_days: params.no_days,
    }),
  );
}

export async function tableSqlList(
  connection: SqlConnection,
  params: TableSqlListParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.table_name)) {
    return Failure('table_name is required');
  }
  const sql = `LOCKING ROW FOR ACCESS
SELECT l.QueryID,
       TRIM(l.UserName) AS UserName,
       l.StartTime,
       s.SqlRowNo,
       s.SqlTextInfo
FROM DBC.QryLogV l
JOIN DBC.QryLogSqlV s
  ON s.QueryID = l.QueryID AND s.ProcID = l.ProcID
WHERE CAST(l.StartTime AS DATE) >= CURRENT_DATE - ${params.no_days}
  AND UPPER(s.SqlTextInfo) LIKE UPPER(?)
ORDER BY l.StartTime DESC, l.QueryID, s.SqlRowNo`;
  return runTimed(logger, 'dba_tableSqlList', () =>
    queryResponse(connection, sql, [`%${params.table_name.trim()}%`], {
      tool_name: 'dba_tableSqlList',
      table_name: params.table_name,
      no_days: params.no_days,
    }),
  );
}

export async function tableSpace(
  connection: SqlConnection,
  params: TableSpaceParams,
  logger: Logger,
): Promise<Result<string>> {
  const predicates = new Predicates()
    .add("TableName <> 'All'")
    .addIfPresent(params.db_name, 'UPPER(DatabaseName) = UPPER(?)')
    .addIfPresent(params.table_name, 'UPPER(TableName) = UPPER(?)');
  const sql = `SELECT TRIM(DatabaseName) AS DatabaseName,
       TRIM(TableName) AS TableName,
       SUM(CurrentPerm) AS CurrentPerm,
       SUM(PeakPerm) AS PeakPerm,
       CAST((100 - (AVG(CurrentPerm) / NULLIFZERO(MAX(CurrentPerm)) * 100)) AS DECIMAL(5,2)) AS SkewPct
FROM DBC.AllSpaceV
${predicates.where()}
GROUP BY 1, 2
ORDER BY CurrentPerm DESC`;
  return runTimed(logger, 'dba_tableSpace', () =>
    queryResponse(connection, sql, predicates.params, {
      tool_name: 'dba_tableSpace',
      db_name: params.db_name,
      table_name: params.table_name,
    }),
  );
}

export async function databaseSpace(
  connection: SqlConnection,
  params: DatabaseSpaceParams,
  logger: Logger,
): Promise<Result<string>> {
  const predicates = new Predicates()
    .add('MaxPerm > 0')
    .addIfPresent(params.db_name, 'UPPER(DatabaseName) = UPPER(?)');
  const sql = `SELECT TRIM(DatabaseName) AS DatabaseName,
       CAST(SUM(MaxPerm) / 1024 / 1024 / 1024 AS DECIMAL(18,2)) AS SpaceAllocated_GB,
       CAST(SUM(CurrentPerm) / 1024 / 1024 / 1024 AS DECIMAL(18,2)) AS SpaceUsed_GB,
       CAST((SUM(MaxPerm) - SUM(CurrentPerm)) / 1024 / 1024 / 1024 AS DECIMAL(18,2)) AS FreeSpace_GB,
       CAST(SUM(CurrentPerm) * 100.0 / NULLIFZERO(SUM(MaxPerm)) AS DECIMAL(5,2)) AS PercentUsed
FROM DBC.DiskSpaceV
${predicates.where()}
GROUP BY 1
ORDER BY PercentUsed DESC`;
  return runTimed(logger, 'dba_databaseSpace', () =>
    queryResponse(connection, sql, predicates.params, {
      tool_name: 'dba_databaseSpace',
      db_name: params.db_name,
    }),
  );
}

export async function databaseVersion(
  connection: SqlConnection,
  _params: unknown,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'dba_databaseVersion', () =>
    queryResponse(connection, 'SELECT InfoKey, InfoData FROM DBC.DBCInfoV', [], {
      tool_name: 'dba_databaseVersion',
    }),
  );
}

export async function resusageSummary(
  connection: SqlConnection,
  _params: unknown,
  logger: Logger,
): Promise<Result<string>> {
  const query = buildResusageQuery(['dayOfWeek', 'hourOfDay']);
  return runTimed(logger, 'dba_resusageSummary', () =>
    queryResponse(connection, query.sql, query.params, { tool_name: 'dba_resusageSummary' }),
  );
}

export async function resusageUserSummary(
  connection: SqlConnection,
  params: ResusageUserSummaryParams,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'dba_resusageUserSummary', () => {
    const query = buildResusageQuery(['UserName', 'dayOfWeek', 'hourOfDay'], params);
    return queryResponse(connection, query.sql, query.params, {
      tool_name: 'dba_resusageUserSummary',
      filters: params,
    });
  });
}

export const FLOW_CONTROL_SQL = `LOCKING ROW FOR ACCESS
SELECT TheDate,
       CAST(TheTime / 10000 AS INTEGER) AS hourOfDay,
       SUM(FlowCtlCnt) AS FlowControlCount,
       MAX(FlowControlled) AS FlowControlledMax,
       MIN(AvailableMin) AS MinAvailableAWT,
       MAX(InuseMax) AS MaxInuseAWT
FROM DBC.ResSawtView
WHERE TheDate >= CURRENT_DATE - ${RECENT_DAYS}
GROUP BY 1, 2
ORDER BY 1, 2`;

export async function flowControl(
  connection: SqlConnection,
  _params: unknown,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'dba_flowControl', () =>
    queryResponse(connection, FLOW_CONTROL_SQL, [], { tool_name: 'dba_flowControl' }),
  );
}

export const FEATURE_USAGE_SQL = `LOCKING ROW FOR ACCESS
SELECT TRIM(l.UserName) AS UserName,
       TRIM(f.FeatureName) AS FeatureName,
       COUNT(*) AS UseCount
FROM DBC.QryLogV l
CROSS JOIN DBC.QryLogFeatureListV f
WHERE GETBIT(l.FeatureUsage, (2047 - f.FeatureBitpos)) = 1
  AND CAST(l.StartTime AS DATE) >= CURRENT_DATE - ${RECENT_DAYS}
GROUP BY 1, 2
ORDER BY UseCount DESC`;

export async function featureUsage(
  connection: SqlConnection,
  _params: unknown,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'dba_featureUsage', () =>
    queryResponse(connection, FEATURE_USAGE_SQL, [], { tool_name: 'dba_featureUsage' }),
  );
}

export const USER_DELAY_SQL = `LOCKING ROW FOR ACCESS
SELECT TRIM(UserName) AS UserName,
       CAST(StartTime AS DATE) AS LogDate,
       COUNT(*) AS DelayedQueries,
       CAST(AVG(DelayTime) AS DECIMAL(18,2)) AS AvgDelaySeconds,
       MAX(DelayTime) AS MaxDelaySeconds
FROM DBC.QryLogV
WHERE DelayTime > 0
  AND CAST(StartTime AS DATE) >= CURRENT_DATE - ${RECENT_DAYS}
GROUP BY 1, 2
ORDER BY MaxDelaySeconds DESC`;

export async function userDelay(
  connection: SqlConnection,
  _params: unknown,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'dba_userDelay', () =>
    queryResponse(connection, USER_DELAY_SQL, [], { tool_name: 'dba_userDelay' }),
  );
}

export async function tableUsageImpact(
  connection: SqlConnection,
  params: TableUsageImpactParams,
  logger: Logger,
): Promise<Result<string>> {
  const predicates = new Predicates()
    .add("o.ObjectType IN ('Tab', 'Viw')")
    .add('o.ObjectColumnName IS NULL')
    .addIfPresent(params.db_name, 'UPPER(o.ObjectDatabaseName) = UPPER(?)')
    .addIfPresent(params.user_name, 'UPPER(l.UserName) = UPPER(?)');
  const sql = `LOCKING ROW FOR ACCESS
SELECT TRIM(o.ObjectDatabaseName) AS DatabaseName,
       TRIM(o.ObjectTableName) AS TableName,
       TRIM(l.UserName) AS UserName,
       COUNT(DISTINCT l.QueryID) AS QueryCount,
       CAST(SUM(l.AMPCPUTime) AS DECIMAL(18,2)) AS TotalAMPCPUTime,
       CAST(100.0 * SUM(l.AMPCPUTime) / NULLIFZERO(SUM(SUM(l.AMPCPUTime)) OVER ()) AS DECIMAL(5,2)) AS CPUPct
FROM DBC.QryLogObjectsV o
JOIN DBC.QryLogV l
  ON l.QueryID = o.QueryID AND l.ProcID = o.ProcID
${predicates.where()}
GROUP BY 1, 2, 3
ORDER BY TotalAMPCPUTime DESC`;
  return runTimed(logger, 'dba_tableUsageImpact', () =>
    queryResponse(connection, sql, predicates.params, {
      tool_name: 'dba_tableUsageImpact',
      db_name: params.db_name,
      user_name: params.user_name,
    }),
  );
}

export async function sessionInfo(
  connection: SqlConnection,
  params: SessionInfoParams,
  logger: Logger,
): Promise<Result<string>> {
  const predicates = new Predicates().addIfPresent(params.user_name, 'UPPER(UserName) = UPPER(?)');
  const sql = `SELECT TRIM(UserName) AS UserName,
       TRIM(AccountName) AS AccountName,
       SessionNo,
       TRIM(DefaultDataBase) AS DefaultDataBase,
       LogonDate,
       LogonTime,
       LogonSource,
       ClientIpAddress,
       ClientProgramName
FROM DBC.SessionInfoV
${predicates.where()}
ORDER BY LogonDate DESC, LogonTime DESC`;
  return runTimed(logger, 'dba_sessionInfo', () =>
    queryResponse(connection, sql, predicates.params, {
      tool_name: 'dba_sessionInfo',
      user_name: params.user_name,
    }),
  );
}

export const dbaTools = [
  defineDbTool({
    name: 'dba_userSqlList',
    description:
      'Get a list of SQL run by a user in the last number of days if a user name is provided, otherwise get list of all SQL in the last number of days.',
    category: 'dba',
    schema: userSqlListSchema,
    handler: userSqlList,
  }),
  defineDbTool({
    name: 'dba_tableSqlList',
    description: 'Get a list of SQL run against a table in the last number of days.',
    category: 'dba',
    schema: tableSqlListSchema,
    handler: tableSqlList,
  }),
  defineDbTool({
    name: 'dba_tableSpace',
    description:
      'Get table space used for a table if table name is provided or get table space for all tables in a database if a database name is provided.',
    category: 'dba',
    schema: tableSpaceSchema,
    handler: tableSpace,
  }),
  defineDbTool({
    name: 'dba_databaseSpace',
    description:
      'Get database space if database name is provided, otherwise get all databases space allocations.',
    category: 'dba',
    schema: databaseSpaceSchema,
    handler: databaseSpace,
  }),
  defineDbTool({
    name: 'dba_databaseVersion',
    description: 'Get Teradata database version information.',
    category: 'dba',
    schema: noParamsSchema,
    handler: databaseVersion,
  }),
  defineDbTool({
    name: 'dba_resusageSummary',
    description:
      'Get the Teradata system usage summary metrics by weekday and hour for each workload type and query complexity bucket.',
    category: 'dba',
    schema: noParamsSchema,
    handler: resusageSummary,
  }),
  defineDbTool({
    name: 'dba_resusageUserSummary',
    description:
      'Get the Teradata system usage summary metrics by user on a specified date, or day of week and hour of day.',
    category: 'dba',
    schema: resusageUserSummarySchema,
    handler: resusageUserSummary,
  }),
  defineDbTool({
    name: 'dba_flowControl',
    description: 'Get the Teradata flow control metrics.',
    category: 'dba',
    schema: noParamsSchema,
    handler: flowControl,
  }),
  defineDbTool({
    name: 'dba_featureUsage',
    description: 'Get the user feature usage metrics.',
    category: 'dba',
    schema: noParamsSchema,
    handler: featureUsage,
  }),
  defineDbTool({
    name: 'dba_userDelay',
    description: 'Get the Teradata user delay metrics.',
    category: 'dba',
    schema: noParamsSchema,
    handler: userDelay,
  }),
  defineDbTool({
    name: 'dba_tableUsageImpact',
    description:
      'Measure the usage of a table and views by users, this is helpful to understand what user and tables are driving most resource usage at any point in time.',
    category: 'dba',
    schema: tableUsageImpactSchema,
    handler: tableUsageImpact,
  }),
  defineDbTool({
    name: 'dba_sessionInfo',
    description: 'Get the Teradata session information for user.',
    category: 'dba',
    schema: sessionInfoSchema,
    handler: sessionInfo,
  }),
];
