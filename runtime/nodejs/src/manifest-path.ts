import type { ResourceLocator } from '@mgscope/sdk';
import * as path from 'path';

export const CLUSTER_SCOPED_DIR = 'cluster-scoped-resources';
export const NAMESPACES_DIR = 'namespaces';
export const MANIFEST_EXTENSION = '.yaml';

/**
 * Build the path to a resource, does not check that it exists.
 *
 * With a name the path points at `<name>.yaml`, without one at the directory
 * holding every manifest of the kind. An empty namespace selects the
 * cluster-scoped layout:
 *
 *   <root>/cluster-scoped-resources/[<group>/]<kind>[/<name>.yaml]
 *   <root>/namespaces/<namespace>/[<group>/]<kind>[/<name>.yaml]
 */
export function buildManifestPath(root: string, locator: ResourceLocator): string {
  const segments = [root];

  if (locator.namespace) {
    segments.push(NAMESPACES_DIR, locator.namespace);
  } else {
    segments.push(CLUSTER_SCOPED_DIR);
  }

  if (locator.group) {
    segments.push(locator.group);
  }

  segments.push(locator.kind);

  if (locator.name) {
    segments.push(`${locator.name}${MANIFEST_EXTENSION}`);
  }

  return path.join(...segments);
}
