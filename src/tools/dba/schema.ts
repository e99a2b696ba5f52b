/**
 * DBA tool parameter schemas
 */

import { z } from 'zod';

const noDaysSchema = z.coerce
  .number()
  .int()
  .positive()
  .default(7)
  .describe('number of days to look back');

export const userSqlListSchema = z.object({
  user_name: z.string().default('').describe('user name'),
  no_days: noDaysSchema,
});

export const tableSqlListSchema = z.object({
  table_name: z.string().default('').describe('table name'),
  no_days: noDaysSchema,
});

export const tableSpaceSchema = z.object({
  db_name: z.string().default('').describe('Database name'),
  table_name: z.string().default('').describe('table name'),
});

export const databaseSpaceSchema = z.object({
  db_name: z.string().default('').describe('Database name'),
});

export const noParamsSchema = z.object({});

export const resusageUserSummarySchema = z.object({
  user_name: z.string().default('').describe('Database user name'),
  date: z.string().default('').describe('Date to analyze, formatted as `YYYY-MM-DD`'),
  dayOfWeek: z.string().default('').describe('Day of week to analyze'),
  hourOfDay: z.string().default('').describe('Hour of day to analyze'),
});

export const tableUsageImpactSchema = z.object({
  db_name: z.string().default('').describe('Database name'),
  user_name: z.string().default('').describe('User name'),
});

export const sessionInfoSchema = z.object({
  user_name: z.string().default('').describe('User name'),
});

export type UserSqlListParams = z.infer<typeof userSqlListSchema>;
export type TableSqlListParams = z.infer<typeof tableSqlListSchema>;
export type TableSpaceParams = z.infer<typeof tableSpaceSchema>;
export type DatabaseSpaceParams = z.infer<typeof databaseSpaceSchema>;
export type ResusageUserSummaryParams = z.infer<typeof resusageUserSummarySchema>;
export type TableUsageImpactParams = z.infer<typeof tableUsageImpactSchema>;
export type SessionInfoParams = z.infer<typeof sessionInfoSchema>;
