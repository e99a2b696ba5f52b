/**
 * Query-log based resource usage summaries. Rows are bucketed by workload type
 * (statement class) and complexity (AMP CPU seconds), then aggregated over
 * the requested dimensions.
 */

import { ValidationError } from '../../lib/errors';

export type ResusageDimension = 'UserName' | 'LogDate' | 'hourOfDay' | 'dayOfWeek';

export interface ResusageFilters {
  user_name?: string | undefined;
  date?: string | undefined;
  dayOfWeek?: string | undefined;
  hourOfDay?: string | undefined;
}

export interface ResusageQuery {
  sql: string;
  params: unknown[];
}

/** Look-back window when no date is given */
export const RESUSAGE_WINDOW_DAYS = 30;

export const DAY_NAMES = [
  'Sunday',
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
] as const;

/**
 * Canonical day name for a name (any case) or a number 1-7 counted from Sunday
 */
export function normalizeDayOfWeek(value: string): string {
  const trimmed = value.trim();
  if (/^[1-7]$/.test(trimmed)) {
    return DAY_NAMES[Number(trimmed) - 1] ?? trimmed;
  }
  const match = DAY_NAMES.find((day) => day.toLowerCase() === trimmed.toLowerCase());
  if (!match) {
    throw new ValidationError(`Invalid dayOfWeek "${value}": use a day name or 1-7 (Sunday = 1)`);
  }
  return match;
}

export function normalizeHourOfDay(value: string): number {
  const trimmed = value.trim();
  const hour = Number(trimmed);
  if (!/^\d{1,2}$/.test(trimmed) || hour > 23) {
    throw new ValidationError(`Invalid hourOfDay "${value}": use 0-23`);
  }
  return hour;
}

export function normalizeDate(value: string): string {
  const trimmed = value.trim();
  if (!/^\d{4}-\d{2}-\d{2}$/.test(trimmed) || Number.isNaN(Date.parse(trimmed))) {
    throw new ValidationError(`Invalid date "${value}": use YYYY-MM-DD`);
  }
  return trimmed;
}

const dayCase = DAY_NAMES.map((day, index) => `WHEN ${index + 1} THEN '${day}'`).join(' ');

export function buildResusageQuery(
  dimensions: readonly ResusageDimension[],
  filters: ResusageFilters = {},
): ResusageQuery {
  const outer: string[] = [];
  const params: unknown[] = [];

  if (filters.user_name?.trim()) {
    outer.push('UPPER(UserName) = UPPER(?)');
    params.push(filters.user_name.trim());
  }
  if (filters.date?.trim()) {
    outer.push('LogDate = CAST(? AS DATE)');
    params.push(normalizeDate(filters.date));
  }
  if (filters.dayOfWeek?.trim()) {
    outer.push('dayOfWeek = ?');
    params.push(normalizeDayOfWeek(filters.dayOfWeek));
  }
  if (filters.hourOfDay?.trim()) {
    outer.push('hourOfDay = ?');
    params.push(normalizeHourOfDay(filters.hourOfDay));
  }

  const window = filters.date?.trim()
    ? ''
    : `WHERE CAST(StartTime AS DATE) >= CURRENT_DATE - ${RESUSAGE_WINDOW_DAYS}`;
  const groupBy = [...dimensions, 'workloadType', 'complexity'].join(', ');

  const sql = `LOCKING ROW FOR ACCESS
SELECT ${groupBy},
       COUNT(*) AS QueryCount,
       CAST(SUM(AMPCPUTime) AS DECIMAL(18,2)) AS TotalAMPCPUTime,
       SUM(TotalIOCount) AS TotalIOCount,
       CAST(AVG(DelayTime) AS DECIMAL(18,2)) AS AvgDelayTime,
       CAST(SUM(SpoolUsage) / 1024 / 1024 / 1024 AS DECIMAL(18,2)) AS TotalSpoolGB
FROM (
  SELECT TRIM(UserName) AS UserName,
         CAST(StartTime AS DATE) AS LogDate,
         EXTRACT(HOUR FROM StartTime) AS hourOfDay,
         CASE TD_DAY_OF_WEEK(CAST(StartTime AS DATE)) ${dayCase} END AS dayOfWeek,
         CASE
           WHEN StatementType = 'Select' THEN 'Query'
           WHEN StatementType IN ('Insert', 'Update', 'Delete', 'Merge Into', 'Insert Select') THEN 'ETL/ELT'
           WHEN StatementType LIKE 'Create%' OR StatementType LIKE 'Drop%' OR StatementType LIKE 'Alter%' THEN 'DDL'
           WHEN StatementType = 'Collect Statistics' THEN 'Statistics'
           ELSE 'Other'
         END AS workloadType,
         CASE
           WHEN AMPCPUTime < 1 THEN 'Tactical'
           WHEN AMPCPUTime < 10 THEN 'Short'
           WHEN AMPCPUTime < 100 THEN 'Medium'
           WHEN AMPCPUTime < 1000 THEN 'Long'
           ELSE 'Very Long'
         END AS complexity,
         AMPCPUTime,
         TotalIOCount,
         ZEROIFNULL(DelayTime) AS DelayTime,
         ZEROIFNULL(SpoolUsage) AS SpoolUsage
  FROM DBC.QryLogV
  ${window}
) q
${outer.length > 0 ? `WHERE ${outer.join(' AND ')}` : ''}
GROUP BY ${groupBy}
ORDER BY ${groupBy}`;

  return { sql, params };
}
