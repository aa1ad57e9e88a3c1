import type { Node } from './node';

/** Reported when the cluster version manifest cannot be read */
export const UNKNOWN_VERSION = 'Unknown';

export interface ArchiveSummary {
  title: string;
  version: string;
  nodes: readonly Node[];
}

/**
 * A manifest left out of a collection scan, kept so callers can tell a
 * partial result from a complete one.
 */
export interface SkippedManifest {
  path: string;
  reason: string;
}
