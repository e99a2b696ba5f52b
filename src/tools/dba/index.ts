/**
 * DBA Tools
 *
 * Exports the tool implementations and schemas for co-located access
 */

export * from './tool';
export * from './schema';
export { buildResusageQuery, normalizeDayOfWeek, type ResusageFilters } from './resusage';
