/**
 * Data quality tool parameter schemas. Table names may be qualified as
 * `database.table`.
 */

import { z } from 'zod';

const tableNameSchema = z.string().default('').describe('table name');
const colNameSchema = z.string().default('').describe('column name');

export const tableSchema = z.object({
  table_name: tableNameSchema,
});

export const tableColumnSchema = z.object({
  table_name: tableNameSchema,
  col_name: colNameSchema,
});

export type TableParams = z.infer<typeof tableSchema>;
export type TableColumnParams = z.infer<typeof tableColumnSchema>;
