/**
 * Security Tools
 *
 * Access rights and role membership from the DBC rights views.
 */

import type { Logger } from '../../lib/logger';
import type { SqlConnection } from '../../lib/teradata';
import { Failure, type Result } from '../../domain/types';
import { defineDbTool, isBlank, queryResponse, runTimed } from '../query';
import { roleSchema, userSchema, type RoleParams, type UserParams } from './schema';

// Common AccessRight codes; anything else is returned as stored
const ACCESS_RIGHT_NAMES: Record<string, string> = {
  R: 'SELECT',
  I: 'INSERT',
  U: 'UPDATE',
  D: 'DELETE',
  E: 'EXECUTE',
  CT: 'CREATE TABLE',
  CV: 'CREATE VIEW',
  CM: 'CREATE MACRO',
  CP: 'CHECKPOINT',
  DT: 'DROP TABLE',
  DV: 'DROP VIEW',
  DM: 'DROP MACRO',
  DP: 'DUMP',
  RS: 'RESTORE',
  IX: 'INDEX',
  RF: 'REFERENCES',
  ST: 'STATISTICS',
  PC: 'CREATE PROCEDURE',
  PD: 'DROP PROCEDURE',
  PE: 'EXECUTE PROCEDURE',
  CF: 'CREATE FUNCTION',
  DF: 'DROP FUNCTION',
  EF: 'EXECUTE FUNCTION',
};

export function accessRightCase(column: string): string {
  const whens = Object.entries(ACCESS_RIGHT_NAMES)
    .map(([code, name]) => `WHEN '${code}' THEN '${name}'`)
    .join(' ');
  return `CASE TRIM(${column}) ${whens} ELSE TRIM(${column}) END`;
}

export async function userDbPermissions(
  connection: SqlConnection,
  params: UserParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.user_name)) {
    return Failure('user_name is required');
  }
  const sql = `SELECT TRIM(DatabaseName) AS DatabaseName,
       TRIM(TableName) AS TableName,
       TRIM(ColumnName) AS ColumnName,
       ${accessRightCase('AccessRight')} AS AccessRight,
       GrantAuthority,
       TRIM(GrantorName) AS GrantorName
FROM DBC.AllRightsV
WHERE UPPER(UserName) = UPPER(?)
ORDER BY DatabaseName, TableName, AccessRight`;
  return runTimed(logger, 'sec_userDbPermissions', () =>
    queryResponse(connection, sql, [params.user_name.trim()], {
      tool_name: 'sec_userDbPermissions',
      user_name: params.user_name,
    }),
  );
}

export async function rolePermissions(
  connection: SqlConnection,
  params: RoleParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.role_name)) {
    return Failure('role_name is required');
  }
  const sql = `SELECT TRIM(DatabaseName) AS DatabaseName,
       TRIM(TableName) AS TableName,
       TRIM(ColumnName) AS ColumnName,
       ${accessRightCase('AccessRight')} AS AccessRight,
       TRIM(GrantorName) AS GrantorName,
       CreateTimeStamp
FROM DBC.AllRoleRightsV
WHERE UPPER(RoleName) = UPPER(?)
ORDER BY DatabaseName, TableName, AccessRight`;
  return runTimed(logger, 'sec_rolePermissions', () =>
    queryResponse(connection, sql, [params.role_name.trim()], {
      tool_name: 'sec_rolePermissions',
      role_name: params.role_name,
    }),
  );
}

export async function userRoles(
  connection: SqlConnection,
  params: UserParams,
  logger: Logger,
): Promise<Result<string>> {
  if (isBlank(params.user_name)) {
    return Failure('user_name is required');
  }
  const sql = `SELECT TRIM(RoleName) AS RoleName,
       TRIM(Grantor) AS Grantor,
       WhenGranted,
       DefaultRole,
       WithAdmin
FROM DBC.RoleMembersV
WHERE UPPER(Grantee) = UPPER(?)
ORDER BY RoleName`;
  return runTimed(logger, 'sec_userRoles', () =>
    queryResponse(connection, sql, [params.user_name.trim()], {
      tool_name: 'sec_userRoles',
      user_name: params.user_name,
    }),
  );
}

export const secTools = [
  defineDbTool({
    name: 'sec_userDbPermissions',
    description: 'Get permissions for a user.',
    category: 'sec',
    schema: userSchema,
    handler: userDbPermissions,
  }),
  defineDbTool({
    name: 'sec_rolePermissions',
    description: 'Get permissions for a role.',
    category: 'sec',
    schema: roleSchema,
    handler: rolePermissions,
  }),
  defineDbTool({
    name: 'sec_userRoles',
    description: 'Get roles assigned to a user.',
    category: 'sec',
    schema: userSchema,
    handler: userRoles,
  }),
];
