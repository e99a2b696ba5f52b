/**
 * Feature Store Tools
 *
 * Browse a feature store's catalogs and build datasets from it. The selected
 * database, data domain and entity are kept in session state; every setting is
 * checked against the catalog before it is kept.
 */

import type { Logger } from '../../lib/logger';
import type { SqlConnection } from '../../lib/teradata';
import { createResponse, rowsToJson, serializeValue } from '../../lib/serialize';
import { quoteQualifiedName } from '../../lib/sql';
import {
  Failure,
  type FeatureStoreConfig,
  type Result,
  type ToolResponse,
} from '../../domain/types';
import type { ToolContext } from '../../mcp/context/types';
import { executeDbTool } from '../../mcp/tools/executor';
import { formatTextResponse } from '../../mcp/tools/response-formatter';
import { defineTool } from '../../mcp/tools/tool-definition';
import { queryResponse, runTimed } from '../query';
import { buildDatasetViewSql, parseEntityKeys, type DatasetFeature } from './dataset';
import {
  createDatasetSchema,
  getDataDomainsSchema,
  isFeatureStorePresentSchema,
  noParamsSchema,
  setFeatureStoreConfigSchema,
  type CreateDatasetParams,
  type GetDataDomainsParams,
  type IsFeatureStorePresentParams,
  type SetFeatureStoreConfigParams,
} from './schema';

export const FEATURE_CATALOG_VIEW = 'FS_V_FEATURE_CATALOG';
export const PROCESS_CATALOG_VIEW = 'FS_V_PROCESS_CATALOG';
export const DATASET_CATALOG_VIEW = 'FS_V_FS_DATASET_CATALOG';

const CATALOG_VIEWS = [FEATURE_CATALOG_VIEW, PROCESS_CATALOG_VIEW, DATASET_CATALOG_VIEW] as const;

export const DB_NOT_CONFIGURED =
  'Feature store database is not configured. Call fs_setFeatureStoreConfig with db_name first.';
export const DOMAIN_NOT_CONFIGURED =
  'Feature store data domain is not configured. Call fs_setFeatureStoreConfig with data_domain first.';

/** Config without its unset keys */
export function describeFeatureStoreConfig(config: FeatureStoreConfig): Record<string, string> {
  const described: Record<string, string> = {};
  for (const [key, value] of Object.entries(config)) {
    if (typeof value === 'string') {
      described[key] = value;
    }
  }
  return described;
}

async function catalogViewsIn(connection: SqlConnection, dbName: string): Promise<string[]> {
  const { rows } = await connection.query(
    `SELECT TRIM(TableName) AS TableName
FROM DBC.TablesV
WHERE UPPER(DatabaseName) = UPPER(?)
  AND UPPER(TableName) IN (${CATALOG_VIEWS.map(() => '?').join(', ')})`,
    [dbName.trim(), ...CATALOG_VIEWS],
  );
  return rows.map((row) => String(row[0]).trim().toUpperCase());
}

function hasFeatureStore(views: readonly string[]): boolean {
  return views.includes(FEATURE_CATALOG_VIEW) && views.includes(PROCESS_CATALOG_VIEW);
}

async function count(connection: SqlConnection, sql: string, params: unknown[]): Promise<number> {
  const { rows } = await connection.query(sql, params);
  return Number(serializeValue(rows[0]?.[0]) ?? 0);
}

export async function setFeatureStoreConfig(
  connection: SqlConnection,
  params: SetFeatureStoreConfigParams,
  config: FeatureStoreConfig,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'fs_setFeatureStoreConfig', async () => {
    const dbName = params.db_name?.trim();
    if (dbName) {
      if (hasFeatureStore(await catalogViewsIn(connection, dbName))) {
        if (config.db_name?.toUpperCase() !== dbName.toUpperCase()) {
          config.data_domain = undefined;
          config.entity = undefined;
        }
        config.db_name = dbName;
        config.feature_catalog = `${dbName}.${FEATURE_CATALOG_VIEW}`;
        config.process_catalog = `${dbName}.${PROCESS_CATALOG_VIEW}`;
        config.dataset_catalog = `${dbName}.${DATASET_CATALOG_VIEW}`;
        logger.info({ featureCatalog: config.feature_catalog }, 'Connected to feature store');
      } else {
        logger.warn({ dbName }, 'No feature store found in database');
      }
    }

    const catalog = config.feature_catalog;
    if (config.db_name !== undefined && catalog !== undefined && params.data_domain !== undefined) {
      const domain = params.data_domain.trim();
      const found = await count(
        connection,
        `SELECT COUNT(*) AS N FROM ${quoteQualifiedName(catalog)} WHERE UPPER(DATA_DOMAIN) = ?`,
        [domain.toUpperCase()],
      );
      config.data_domain = found > 0 ? domain : undefined;
    }

    if (catalog !== undefined && config.data_domain !== undefined && params.entity !== undefined) {
      const entity = params.entity.trim();
      const found = await count(
        connection,
        `SELECT COUNT(*) AS N FROM ${quoteQualifiedName(catalog)}
WHERE UPPER(DATA_DOMAIN) = ? AND UPPER(ENTITY_NAME) = ?`,
        [config.data_domain.toUpperCase(), entity.toUpperCase()],
      );
      if (found > 0) {
        config.entity = entity;
      }
    }

    return `Feature store config updated: ${JSON.stringify(describeFeatureStoreConfig(config))}`;
  });
}

export async function isFeatureStorePresent(
  connection: SqlConnection,
  params: IsFeatureStorePresentParams,
  logger: Logger,
): Promise<Result<string>> {
  return runTimed(logger, 'fs_isFeatureStorePresent', async () => {
    const views = await catalogViewsIn(connection, params.db_name);
    return createResponse(
      { db_name: params.db_name, present: hasFeatureStore(views), catalog_views: views },
      { tool_name: 'fs_isFeatureStorePresent' },
    );
  });
}

export async function featureStoreContent(
  connection: SqlConnection,
  config: FeatureStoreConfig,
  logger: Logger,
): Promise<Result<string>> {
  if (!config.feature_catalog) {
    return Failure(DB_NOT_CONFIGURED);
  }
  const sql = `SELECT DATA_DOMAIN, ENTITY_NAME, COUNT(*) AS FEATURE_COUNT
FROM ${quoteQualifiedName(config.feature_catalog)}
GROUP BY 1, 2
ORDER BY 1, 2`;
  return runTimed(logger, 'fs_featureStoreContent', () =>
    queryResponse(connection, sql, [], { tool_name: 'fs_featureStoreContent', db_name: config.db_name }),
  );
}

export async function getDataDomains(
  connection: SqlConnection,
  params: GetDataDomainsParams,
  config: FeatureStoreConfig,
  logger: Logger,
): Promise<Result<string>> {
  if (!config.feature_catalog) {
    return Failure(DB_NOT_CONFIGURED);
  }
  const entity = params.entity.trim();
  const sql = `SELECT DISTINCT DATA_DOMAIN
FROM ${quoteQualifiedName(config.feature_catalog)}
${entity ? 'WHERE UPPER(ENTITY_NAME) = UPPER(?)' : ''}
ORDER BY DATA_DOMAIN`;
  return runTimed(logger, 'fs_getDataDomains', () =>
    queryResponse(connection, sql, entity ? [entity] : [], {
      tool_name: 'fs_getDataDomains',
      db_name: config.db_name,
      entity,
    }),
  );
}

export async function getFeatures(
  connection: SqlConnection,
  config: FeatureStoreConfig,
  logger: Logger,
): Promise<Result<string>> {
  if (!config.feature_catalog) {
    return Failure(DB_NOT_CONFIGURED);
  }
  if (!config.data_domain) {
    return Failure(DOMAIN_NOT_CONFIGURED);
  }
  const params: unknown[] = [config.data_domain.toUpperCase()];
  if (config.entity) {
    params.push(config.entity.toUpperCase());
  }
  const sql = `SELECT FEATURE_ID, FEATURE_NAME, ENTITY_NAME, FEATURE_DATABASE, FEATURE_TABLE
FROM ${quoteQualifiedName(config.feature_catalog)}
WHERE UPPER(DATA_DOMAIN) = ?${config.entity ? ' AND UPPER(ENTITY_NAME) = ?' : ''}
ORDER BY FEATURE_NAME`;
  return runTimed(logger, 'fs_getFeatures', () =>
    queryResponse(connection, sql, params, {
      tool_name: 'fs_getFeatures',
      data_domain: config.data_domain,
      entity: config.entity ?? null,
    }),
  );
}

export async function getAvailableDatasets(
  connection: SqlConnection,
  config: FeatureStoreConfig,
  logger: Logger,
): Promise<Result<string>> {
  const catalog = config.dataset_catalog;
  if (!catalog) {
    return Failure(DB_NOT_CONFIGURED);
  }
  return runTimed(logger, 'fs_getAvailableDatasets', () =>
    queryResponse(connection, `SELECT * FROM ${quoteQualifiedName(catalog)}`, [], {
      tool_name: 'fs_getAvailableDatasets',
      db_name: config.db_name,
    }),
  );
}

export async function getFeatureDataModel(
  connection: SqlConnection,
  config: FeatureStoreConfig,
  logger: Logger,
): Promise<Result<string>> {
  if (!config.db_name) {
    return Failure(DB_NOT_CONFIGURED);
  }
  const sql = `SELECT TRIM(TableName) AS TableName,
       TRIM(ColumnName) AS ColumnName,
       TRIM(ColumnType) AS ColumnType,
       CommentString
FROM DBC.ColumnsV
WHERE UPPER(DatabaseName) = UPPER(?)
  AND UPPER(TableName) IN (${CATALOG_VIEWS.map(() => '?').join(', ')})
ORDER BY TableName, ColumnId`;
  return runTimed(logger, 'fs_getFeatureDataModel', () =>
    queryResponse(connection, sql, [config.db_name, ...CATALOG_VIEWS], {
      tool_name: 'fs_getFeatureDataModel',
      db_name: config.db_name,
    }),
  );
}

export async function getAvailableEntities(
  connection: SqlConnection,
  config: FeatureStoreConfig,
  logger: Logger,
): Promise<Result<string>> {
  const domain = config.data_domain;
  if (!config.feature_catalog) {
    return Failure(DB_NOT_CONFIGURED);
  }
  if (!domain) {
    return Failure(DOMAIN_NOT_CONFIGURED);
  }
  const sql = `SELECT DISTINCT ENTITY_NAME
FROM ${quoteQualifiedName(config.feature_catalog)}
WHERE UPPER(DATA_DOMAIN) = ?
ORDER BY ENTITY_NAME`;
  return runTimed(logger, 'fs_getAvailableEntities', () =>
    queryResponse(connection, sql, [domain.toUpperCase()], {
      tool_name: 'fs_getAvailableEntities',
      data_domain: domain,
    }),
  );
}

function toDatasetFeature(record: Record<string, unknown>): DatasetFeature {
  return {
    id: Number(record.FEATURE_ID),
    name: String(record.FEATURE_NAME),
    database: String(record.FEATURE_DATABASE),
    table: String(record.FEATURE_TABLE),
  };
}

export async function createDataset(
  connection: SqlConnection,
  params: CreateDatasetParams,
  config: FeatureStoreConfig,
  logger: Logger,
): Promise<Result<string>> {
  const catalog = config.feature_catalog;
  const domain = config.data_domain;
  if (!catalog) {
    return Failure(DB_NOT_CONFIGURED);
  }
  if (!domain) {
    return Failure(DOMAIN_NOT_CONFIGURED);
  }

  return runTimed(logger, 'fs_createDataset', async () => {
    const selection = params.feature_selection.map((name) => name.trim());
    const { columns, rows } = await connection.query(
      `SELECT FEATURE_ID, FEATURE_NAME, FEATURE_DATABASE, FEATURE_TABLE
FROM ${quoteQualifiedName(catalog)}
WHERE UPPER(DATA_DOMAIN) = ?
  AND UPPER(ENTITY_NAME) = UPPER(?)
  AND UPPER(FEATURE_NAME) IN (${selection.map(() => 'UPPER(?)').join(', ')})`,
      [domain.toUpperCase(), params.entity_name.trim(), ...selection],
    );

    const byName = new Map<string, DatasetFeature>();
    for (const record of rowsToJson(columns, rows)) {
      const feature = toDatasetFeature(record);
      if (!byName.has(feature.name.toUpperCase())) {
        byName.set(feature.name.toUpperCase(), feature);
      }
    }
    const missing = selection.filter((name) => !byName.has(name.toUpperCase()));
    if (missing.length > 0) {
      throw new Error(
        `Features not found for entity ${params.entity_name} in data domain ${domain}: ${missing.join(', ')}`,
      );
    }

    const features = selection.flatMap((name) => {
      const feature = byName.get(name.toUpperCase());
      return feature ? [feature] : [];
    });
    await connection.execute(
      buildDatasetViewSql({
        targetDatabase: params.target_database,
        datasetName: params.dataset_name,
        entityKeys: parseEntityKeys(params.entity_name),
        features,
      }),
    );
    logger.info(
      { dataset: `${params.target_database}.${params.dataset_name}`, features: selection },
      'Dataset created',
    );
    return createResponse(
      {
        dataset: `${params.target_database}.${params.dataset_name}`,
        entity: params.entity_name,
        features: features.map((feature) => feature.name),
      },
      { tool_name: 'fs_createDataset', data_domain: domain },
    );
  });
}

type ConfigStep = (
  connection: SqlConnection,
  config: FeatureStoreConfig,
  logger: Logger,
) => Promise<Result<string>>;

function withConfig(
  name: string,
  step: ConfigStep,
): (params: unknown, context: ToolContext) => Promise<ToolResponse> {
  return (_params, context) =>
    executeDbTool(context, name, (connection) =>
      step(connection, context.session.featureStore, context.logger.child({ tool: name })),
    );
}

export const featureStoreTools = [
  defineTool({
    name: 'fs_setFeatureStoreConfig',
    description: 'Set or update the feature store configuration (database and data domain).',
    category: 'fs',
    shape: setFeatureStoreConfigSchema.shape,
    run: (params, context) =>
      executeDbTool(context, 'fs_setFeatureStoreConfig', (connection) =>
        setFeatureStoreConfig(
          connection,
          params,
          context.session.featureStore,
          context.logger.child({ tool: 'fs_setFeatureStoreConfig' }),
        ),
      ),
  }),
  defineTool({
    name: 'fs_getFeatureStoreConfig',
    description: 'Display the current feature store configuration (database and data domain).',
    category: 'fs',
    shape: noParamsSchema.shape,
    run: async (_params, context) =>
      formatTextResponse(
        `Current feature store config: ${JSON.stringify(describeFeatureStoreConfig(context.session.featureStore))}`,
      ),
  }),
  defineTool({
    name: 'fs_isFeatureStorePresent',
    description: 'Check if a feature store is present in the specified database.',
    category: 'fs',
    shape: isFeatureStorePresentSchema.shape,
    run: (params, context) =>
      executeDbTool(context, 'fs_isFeatureStorePresent', (connection) =>
        isFeatureStorePresent(
          connection,
          params,
          context.logger.child({ tool: 'fs_isFeatureStorePresent' }),
        ),
      ),
  }),
  defineTool({
    name: 'fs_featureStoreContent',
    description:
      'Returns a summary of the feature store content. Use this to understand what data is available in the feature store.',
    category: 'fs',
    shape: noParamsSchema.shape,
    run: withConfig('fs_featureStoreContent', featureStoreContent),
  }),
  defineTool({
    name: 'fs_getDataDomains',
    description:
      'List the available data domains. Requires a configured `db_name` in the feature store config.',
    category: 'fs',
    shape: getDataDomainsSchema.shape,
    run: (params, context) =>
      executeDbTool(context, 'fs_getDataDomains', (connection) =>
        getDataDomains(
          connection,
          params,
          context.session.featureStore,
          context.logger.child({ tool: 'fs_getDataDomains' }),
        ),
      ),
  }),
  defineTool({
    name: 'fs_getFeatures',
    description:
      'List the features. Requires a configured `db_name` and `data_domain` in the feature store config.',
    category: 'fs',
    shape: noParamsSchema.shape,
    run: withConfig('fs_getFeatures', getFeatures),
  }),
  defineTool({
    name: 'fs_getAvailableDatasets',
    description:
      'List the available datasets. Requires a configured `db_name` in the feature store config.',
    category: 'fs',
    shape: noParamsSchema.shape,
    run: withConfig('fs_getAvailableDatasets', getAvailableDatasets),
  }),
  defineTool({
    name: 'fs_getFeatureDataModel',
    description:
      'Return the schema of the feature store. Requires a feature store in the configured database (`db_name`).',
    category: 'fs',
    shape: noParamsSchema.shape,
    run: withConfig('fs_getFeatureDataModel', getFeatureDataModel),
  }),
  defineTool({
    name: 'fs_getAvailableEntities',
    description:
      'List the available entities for the configured data domain. Requires a configured `db_name` and `data_domain`.',
    category: 'fs',
    shape: noParamsSchema.shape,
    run: withConfig('fs_getAvailableEntities', getAvailableEntities),
  }),
  defineTool({
    name: 'fs_createDataset',
    description:
      'Create a dataset view from selected features of an entity in the feature store. ' +
      'The view is created in the target database under the given name. ' +
      'Requires a configured feature store and data domain.',
    category: 'fs',
    shape: createDatasetSchema.shape,
    run: (params, context) =>
      executeDbTool(context, 'fs_createDataset', (connection) =>
        createDataset(
          connection,
          params,
          context.session.featureStore,
          context.logger.child({ tool: 'fs_createDataset' }),
        ),
      ),
  }),
];
