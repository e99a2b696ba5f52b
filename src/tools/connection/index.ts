/**
 * Connection Tools
 *
 * Exports the tool implementations for co-located access
 */

export * from './tool';
