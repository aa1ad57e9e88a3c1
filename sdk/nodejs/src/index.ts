export { UNKNOWN_VERSION } from './archive-summary';
export type { ArchiveSummary, SkippedManifest } from './archive-summary';
export type { Logger } from './logger';
export type { ManifestLoader } from './manifest-loader';
export { Node, NodeDecodeError } from './node';
export type { NodeAddress, NodeInit } from './node';
export type { ResourceLocator } from './resource-locator';
export { isMapping, lookup } from './resource-manifest';
export type { DocumentKey, StructuredDocument } from './resource-manifest';
