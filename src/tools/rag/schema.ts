/**
 * RAG tool parameter schemas
 */

import { z } from 'zod';

export const setConfigSchema = z.object({
  query_db: z.string().min(1).describe('Database to store user questions and query embeddings'),
  model_db: z.string().min(1).describe('Database where the embedding model is stored'),
  vector_db: z.string().min(1).describe('Database containing the chunk vector store'),
  vector_table: z
    .string()
    .min(1)
    .describe('Table containing chunk embeddings for similarity search'),
});

export const storeUserQuerySchema = z.object({
  db_name: z
    .string()
    .min(1)
    .describe('Name of the Teradata database where the question will be stored.'),
  table_name: z
    .string()
    .min(1)
    .describe("Name of the table to store user questions (e.g., 'pdf_user_queries')."),
  question: z
    .string()
    .describe("Natural language question from the user. Can optionally start with '/rag '."),
});

export const noParamsSchema = z.object({});

export const semanticSearchSchema = z.object({
  k: z.coerce
    .number()
    .int()
    .positive()
    .default(10)
    .describe('Number of top matching chunks to retrieve.'),
});

export type SetConfigParams = z.infer<typeof setConfigSchema>;
export type StoreUserQueryParams = z.infer<typeof storeUserQuerySchema>;
export type SemanticSearchParams = z.infer<typeof semanticSearchSchema>;
