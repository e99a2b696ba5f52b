/**
 * Feature Store Tools
 *
 * Exports the tool implementations and schemas for co-located access
 */

export * from './tool';
export * from './schema';
export { buildDatasetViewSql, parseEntityKeys, type DatasetDefinition } from './dataset';
