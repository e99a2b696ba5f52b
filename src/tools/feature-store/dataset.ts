/**
 * Dataset views over the feature store. Feature values live in long tables
 * keyed by the entity columns and FEATURE_ID; a dataset pivots the selected
 * features into one column each, over every entity key that has any of them.
 */

import { ValidationError } from '../../lib/errors';
import { quoteIdentifier } from '../../lib/sql';

export interface DatasetFeature {
  id: number;
  name: string;
  database: string;
  table: string;
}

export interface DatasetDefinition {
  targetDatabase: string;
  datasetName: string;
  entityKeys: readonly string[];
  features: readonly DatasetFeature[];
}

/** Split a comma separated entity into its key columns */
export function parseEntityKeys(entity: string): string[] {
  return entity
    .split(',')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

export function buildDatasetViewSql(definition: DatasetDefinition): string {
  if (definition.entityKeys.length === 0) {
    throw new ValidationError('Dataset needs at least one entity key');
  }
  if (definition.features.length === 0) {
    throw new ValidationError('Dataset needs at least one feature');
  }
  for (const feature of definition.features) {
    if (!Number.isInteger(feature.id)) {
      throw new ValidationError(`Feature ${feature.name} has an invalid FEATURE_ID`);
    }
  }

  const keys = definition.entityKeys.map(quoteIdentifier);
  const keyList = keys.join(', ');
  const source = (feature: DatasetFeature): string =>
    `${quoteIdentifier(feature.database)}.${quoteIdentifier(feature.table)}`;

  const idsBySource = new Map<string, number[]>();
  for (const feature of definition.features) {
    const ids = idsBySource.get(source(feature)) ?? [];
    ids.push(feature.id);
    idsBySource.set(source(feature), ids);
  }
  const keyUnion = [...idsBySource.entries()]
    .map(([table, ids]) => `  SELECT ${keyList} FROM ${table} WHERE FEATURE_ID IN (${ids.join(', ')})`)
    .join('\n  UNION\n');

  const columns = definition.features.map(
    (feature, index) => `       f${index + 1}.FEATURE_VALUE AS ${quoteIdentifier(feature.name)}`,
  );
  const joins = definition.features.map((feature, index) => {
    const alias = `f${index + 1}`;
    const on = keys.map((key) => `${alias}.${key} = k.${key}`).join(' AND ');
    return `LEFT JOIN (
  SELECT ${keyList}, FEATURE_VALUE
  FROM ${source(feature)}
  WHERE FEATURE_ID = ${feature.id}
) ${alias}
  ON ${on}`;
  });

  return `REPLACE VIEW ${quoteIdentifier(definition.targetDatabase)}.${quoteIdentifier(definition.datasetName)} AS
SELECT ${keys.map((key) => `k.${key}`).join(', ')},
${columns.join(',\n')}
FROM (
${keyUnion}
) k
${joins.join('\n')}`;
}
