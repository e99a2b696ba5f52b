/**
 * DBA Tools Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import {
  FLOW_CONTROL_SQL,
  buildResusageQuery,
  databaseSpace,
  dbaTools,
  flowControl,
  normalizeDayOfWeek,
  resusageUserSummary,
  sessionInfo,
  tableSpace,
  tableSqlList,
  userSqlList,
} from '../../../src/tools/dba';
import { normalizeDate, normalizeHourOfDay } from '../../../src/tools/dba/resusage';
import { ValidationError } from '../../../src/lib/errors';
import { FakeConnection, result } from '../../__support__/fake-connection';
import { createTestContext, envelopeOf } from '../../__support__/context';
import { createSilentLogger } from '../../__support__/logger';

describe('DBA Tools', () => {
  const logger = createSilentLogger();
  let connection: FakeConnection;

  beforeEach(() => {
    connection = new FakeConnection();
  });

  describe('dba_userSqlList', () => {
    it('should inline the look-back window and bind the user', async () => {
      await userSqlList(connection, { user_name: ' alice ', no_days: 3 }, logger);

      expect(connection.calls[0]?.sql).toContain(
        'WHERE CAST(l.StartTime AS DATE) >= CURRENT_DATE - 3\nAND UPPER(l.UserName) = UPPER(?)',
      );
      expect(connection.calls[0]?.params).toEqual(['alice']);
    });

    it('should list all users when no name is given', async () => {
      await userSqlList(connection, { user_name: '', no_days: 7 }, logger);

      expect(connection.calls[0]?.sql).not.toContain('UPPER(l.UserName)');
      expect(connection.calls[0]?.params).toEqual([]);
    });
  });

  describe('dba_tableSqlList', () => {
    it('should require a table name', async () => {
      expect(await tableSqlList(connection, { table_name: '', no_days: 7 }, logger)).toEqual({
        ok: false,
        error: 'table_name is required',
      });
    });

    it('should search the SQL text for the table name', async () => {
      await tableSqlList(connection, { table_name: 'orders', no_days: 14 }, logger);

      expect(connection.calls[0]?.sql).toContain('CURRENT_DATE - 14');
      expect(connection.calls[0]?.params).toEqual(['%orders%']);
    });
  });

  it('dba_tableSpace should combine the fixed and optional predicates', async () => {
    await tableSpace(connection, { db_name: 'sales', table_name: 'orders' }, logger);

    expect(connection.calls[0]?.sql).toContain(
      "WHERE TableName <> 'All' AND UPPER(DatabaseName) = UPPER(?) AND UPPER(TableName) = UPPER(?)",
    );
    expect(connection.calls[0]?.params).toEqual(['sales', 'orders']);
  });

  it('dba_databaseSpace should skip databases without perm space', async () => {
    await databaseSpace(connection, { db_name: '' }, logger);

    expect(connection.calls[0]?.sql).toContain('WHERE MaxPerm > 0\nGROUP BY 1');
    expect(connection.calls[0]?.params).toEqual([]);
  });

  it('dba_flowControl should run the fixed statement', async () => {
    await flowControl(connection, {}, logger);

    expect(connection.sql).toEqual([FLOW_CONTROL_SQL]);
  });

  it('dba_sessionInfo should filter by user', async () => {
    await sessionInfo(connection, { user_name: 'etl_user' }, logger);

    expect(connection.calls[0]?.sql).toContain('FROM DBC.SessionInfoV\nWHERE UPPER(UserName) = UPPER(?)');
    expect(connection.calls[0]?.params).toEqual(['etl_user']);
  });

  describe('resource usage', () => {
    it('should default to the last thirty days', () => {
      const query = buildResusageQuery(['dayOfWeek', 'hourOfDay']);

      expect(query.sql).toContain('WHERE CAST(StartTime AS DATE) >= CURRENT_DATE - 30');
      expect(query.sql).toContain('GROUP BY dayOfWeek, hourOfDay, workloadType, complexity');
      expect(query.params).toEqual([]);
    });

    it('should bind every filter and drop the window when a date is given', () => {
      const query = buildResusageQuery(['UserName'], {
        user_name: ' bob ',
        date: '2025-01-31',
        dayOfWeek: '3',
        hourOfDay: '09',
      });

      expect(query.sql).toContain(
        'WHERE UPPER(UserName) = UPPER(?) AND LogDate = CAST(? AS DATE) AND dayOfWeek = ? AND hourOfDay = ?',
      );
      expect(query.sql).not.toContain('CURRENT_DATE - 30');
      expect(query.params).toEqual(['bob', '2025-01-31', 'Tuesday', 9]);
    });

    it('should normalize day names and numbers', () => {
      expect(normalizeDayOfWeek('friday')).toBe('Friday');
      expect(normalizeDayOfWeek(' 1 ')).toBe('Sunday');
      expect(normalizeDayOfWeek('7')).toBe('Saturday');
      expect(() => normalizeDayOfWeek('Funday')).toThrow(ValidationError);
    });

    it('should validate hours and dates', () => {
      expect(normalizeHourOfDay('7')).toBe(7);
      expect(() => normalizeHourOfDay('24')).toThrow('Invalid hourOfDay "24": use 0-23');
      expect(normalizeDate(' 2025-02-03 ')).toBe('2025-02-03');
      expect(() => normalizeDate('2025/02/03')).toThrow('Invalid date "2025/02/03": use YYYY-MM-DD');
    });

    it('should report an invalid filter as a failure', async () => {
      const outcome = await resusageUserSummary(
        connection,
        { user_name: '', date: '', dayOfWeek: 'someday', hourOfDay: '' },
        logger,
      );

      expect(outcome).toEqual({
        ok: false,
        error: 'Invalid dayOfWeek "someday": use a day name or 1-7 (Sunday = 1)',
      });
      expect(connection.calls).toHaveLength(0);
    });
  });

  describe('registered tools', () => {
    it('should expose every dba tool name', () => {
      expect(dbaTools.map((tool) => tool.name)).toEqual([
        'dba_userSqlList',
        'dba_tableSqlList',
        'dba_tableSpace',
        'dba_databaseSpace',
        'dba_databaseVersion',
        'dba_resusageSummary',
        'dba_resusageUserSummary',
        'dba_flowControl',
        'dba_featureUsage',
        'dba_userDelay',
        'dba_tableUsageImpact',
        'dba_sessionInfo',
      ]);
    });

    it('should coerce no_days and apply its default', async () => {
      connection.queueResult(result(['QueryID'], [1]));
      const tool = dbaTools.find((candidate) => candidate.name === 'dba_userSqlList');

      const response = await tool?.invoke({ user_name: 'alice' }, createTestContext(connection));

      expect(response && envelopeOf(response).metadata).toMatchObject({
        tool_name: 'dba_userSqlList',
        user_name: 'alice',
        no_days: 7,
      });
      expect(connection.calls[0]?.sql).toContain('CURRENT_DATE - 7');
    });
  });
});
