export { MustGatherConfigSchema, formatAjvErrors, loadConfig } from './config';
export type { MustGatherConfig } from './config';
export { createLogger } from './logger';
export { Manifest } from './manifest';
export { LocalFileAdapter } from './manifest-adapters/local-file-adapter';
export {
  CLUSTER_SCOPED_DIR,
  MANIFEST_EXTENSION,
  NAMESPACES_DIR,
  buildManifestPath,
} from './manifest-path';
export { MustGather } from './must-gather';
export type { CollectionScan, MustGatherOptions } from './must-gather';
export {
  DEFAULT_MAX_ROOT_DEPTH,
  VERSION_FILE,
  findMustGatherRoot,
  isMustGatherRoot,
} from './root-finder';
export type { FindRootOptions } from './root-finder';
export { MustGatherError, MustGatherErrorCode } from './types';
