/**
 * Base tool parameter schemas. Every parameter is optional and defaults to an
 * empty string; handlers decide which ones they need.
 */

import { z } from 'zod';

const dbNameSchema = z.string().default('').describe('Database name');

export const readQuerySchema = z.object({
  sql: z.string().default('').describe('SQL that reads from the database to run'),
});

export const writeQuerySchema = z.object({
  sql: z.string().default('').describe('SQL that writes to the database to run'),
});

export const tableDDLSchema = z.object({
  db_name: dbNameSchema,
  table_name: z.string().default('').describe('table name'),
});

export const databaseListSchema = z.object({});

export const tableListSchema = z.object({
  db_name: z.string().default('').describe('database name'),
});

export const columnDescriptionSchema = z.object({
  db_name: dbNameSchema,
  obj_name: z.string().default('').describe('table name'),
});

export const tablePreviewSchema = z.object({
  db_name: dbNameSchema,
  table_name: z.string().default('').describe('table name'),
});

export const tableAffinitySchema = z.object({
  db_name: dbNameSchema,
  obj_name: z.string().default('').describe('Table or view name'),
});

export const tableUsageSchema = z.object({
  db_name: dbNameSchema,
});

export type ReadQueryParams = z.infer<typeof readQuerySchema>;
export type WriteQueryParams = z.infer<typeof writeQuerySchema>;
export type TableDDLParams = z.infer<typeof tableDDLSchema>;
export type TableListParams = z.infer<typeof tableListSchema>;
export type ColumnDescriptionParams = z.infer<typeof columnDescriptionSchema>;
export type TablePreviewParams = z.infer<typeof tablePreviewSchema>;
export type TableAffinityParams = z.infer<typeof tableAffinitySchema>;
export type TableUsageParams = z.infer<typeof tableUsageSchema>;
