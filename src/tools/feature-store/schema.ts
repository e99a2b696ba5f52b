/**
 * Feature store tool parameter schemas
 */

import { z } from 'zod';

export const setFeatureStoreConfigSchema = z.object({
  data_domain: z
    .string()
    .optional()
    .describe('Data domain grouping features within the same namespace'),
  db_name: z.string().optional().describe('Name of the database where the feature store is hosted'),
  entity: z
    .string()
    .optional()
    .describe('The list of entities, comma separated and in alphabetical order, upper case'),
});

export const noParamsSchema = z.object({});

export const isFeatureStorePresentSchema = z.object({
  db_name: z.string().min(1).describe('Name of the database to check for a feature store.'),
});

export const getDataDomainsSchema = z.object({
  entity: z
    .string()
    .default('')
    .describe('Only list data domains that hold features for this entity; empty lists all'),
});

export const createDatasetSchema = z.object({
  entity_name: z
    .string()
    .min(1)
    .describe(
      'Entity for which the dataset will be created. Available entities are reported in the feature catalog.',
    ),
  feature_selection: z
    .array(z.string().min(1))
    .min(1)
    .describe(
      'List of features to include in the dataset. Available features are reported in the feature catalog.',
    ),
  dataset_name: z.string().min(1).describe('Name of the dataset to create.'),
  target_database: z
    .string()
    .min(1)
    .describe('Target database where the dataset will be created.'),
});

export type SetFeatureStoreConfigParams = z.infer<typeof setFeatureStoreConfigSchema>;
export type IsFeatureStorePresentParams = z.infer<typeof isFeatureStorePresentSchema>;
export type GetDataDomainsParams = z.infer<typeof getDataDomainsSchema>;
export type CreateDatasetParams = z.infer<typeof createDatasetSchema>;
