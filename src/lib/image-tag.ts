/**
 * Container image tagging used by the build workflow: every CI run publishes
 * exactly one tag, `1.0.<run number>`.
 */

export const IMAGE_VERSION_PREFIX = '1.0';

export function formatImageVersion(runNumber: number): string {
  if (!Number.isInteger(runNumber) || runNumber < 1) {
    throw new RangeError(`Run number must be a positive integer, got ${runNumber}`);
  }
  return `${IMAGE_VERSION_PREFIX}.${runNumber}`;
}

export function formatImageReference(registry: string, repository: string, runNumber: number): string {
  return `${registry.replace(/\/+$/, '')}/${repository}:${formatImageVersion(runNumber)}`;
}
