/**
 * Dataset view generation tests
 */

import { describe, it, expect } from '@jest/globals';
import { buildDatasetViewSql, parseEntityKeys } from '../../../src/tools/feature-store';
import { ValidationError } from '../../../src/lib/errors';

describe('parseEntityKeys', () => {
  it('should split and trim comma separated keys', () => {
    expect(parseEntityKeys('ACCOUNT_ID, CUSTOMER_ID,')).toEqual(['ACCOUNT_ID', 'CUSTOMER_ID']);
  });
});

describe('buildDatasetViewSql', () => {
  it('should pivot each feature into a column over all entity keys', () => {
    const sql = buildDatasetViewSql({
      targetDatabase: 'analytics',
      datasetName: 'churn_ds',
      entityKeys: ['CUSTOMER_ID'],
      features: [
        { id: 1, name: 'TENURE', database: 'fs_db', table: 'FS_T_NUM' },
        { id: 7, name: 'SEGMENT', database: 'fs_db', table: 'FS_T_VARCHAR' },
      ],
    });

    expect(sql).toBe(`REPLACE VIEW "analytics"."churn_ds" AS
SELECT k."CUSTOMER_ID",
       f1.FEATURE_VALUE AS "TENURE",
       f2.FEATURE_VALUE AS "SEGMENT"
FROM (
  SELECT "CUSTOMER_ID" FROM "fs_db"."FS_T_NUM" WHERE FEATURE_ID IN (1)
  UNION
  SELECT "CUSTOMER_ID" FROM "fs_db"."FS_T_VARCHAR" WHERE FEATURE_ID IN (7)
) k
LEFT JOIN (
  SELECT "CUSTOMER_ID", FEATURE_VALUE
  FROM "fs_db"."FS_T_NUM"
  WHERE FEATURE_ID = 1
) f1
  ON f1."CUSTOMER_ID" = k."CUSTOMER_ID"
LEFT JOIN (
  SELECT "CUSTOMER_ID", FEATURE_VALUE
  FROM "fs_db"."FS_T_VARCHAR"
  WHERE FEATURE_ID = 7
) f2
  ON f2."CUSTOMER_ID" = k."CUSTOMER_ID"`);
  });

  it('should group feature ids that share a table and join on every key', () => {
    const sql = buildDatasetViewSql({
      targetDatabase: 'analytics',
      datasetName: 'accounts_ds',
      entityKeys: ['ACCOUNT_ID', 'CUSTOMER_ID'],
      features: [
        { id: 3, name: 'BALANCE', database: 'fs_db', table: 'FS_T_NUM' },
        { id: 4, name: 'LIMIT', database: 'fs_db', table: 'FS_T_NUM' },
      ],
    });

    expect(sql).toContain(
      'SELECT "ACCOUNT_ID", "CUSTOMER_ID" FROM "fs_db"."FS_T_NUM" WHERE FEATURE_ID IN (3, 4)\n) k',
    );
    expect(sql).toContain('ON f2."ACCOUNT_ID" = k."ACCOUNT_ID" AND f2."CUSTOMER_ID" = k."CUSTOMER_ID"');
  });

  it('should reject empty definitions', () => {
    const base = { targetDatabase: 'analytics', datasetName: 'ds' };

    expect(() =>
      buildDatasetViewSql({
        ...base,
        entityKeys: [],
        features: [{ id: 1, name: 'A', database: 'fs_db', table: 'T' }],
      }),
    ).toThrow(ValidationError);
    expect(() => buildDatasetViewSql({ ...base, entityKeys: ['ID'], features: [] })).toThrow(
      'Dataset needs at least one feature',
    );
    expect(() =>
      buildDatasetViewSql({
        ...base,
        entityKeys: ['ID'],
        features: [{ id: Number.NaN, name: 'A', database: 'fs_db', table: 'T' }],
      }),
    ).toThrow('Feature A has an invalid FEATURE_ID');
  });
});
