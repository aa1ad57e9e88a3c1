import type { StructuredDocument } from './resource-manifest';

export interface ManifestLoader<T extends StructuredDocument = StructuredDocument> {
  /** Read and parse the manifest at `path`. Throws when it is absent or malformed. */
  load(path: string): T;
}
