import {
  Node,
  UNKNOWN_VERSION,
  type ArchiveSummary,
  type Logger,
  type ManifestLoader,
  type ResourceLocator,
  type SkippedManifest,
  type StructuredDocument,
} from '@mgscope/sdk';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { LocalFileAdapter } from './manifest-adapters/local-file-adapter';
import { MANIFEST_EXTENSION, buildManifestPath } from './manifest-path';
import { DEFAULT_MAX_ROOT_DEPTH, findMustGatherRoot } from './root-finder';
import { MustGatherError, MustGatherErrorCode, errorMessage } from './types';

const CLUSTER_VERSIONS: ResourceLocator = {
  kind: 'clusterversions',
  group: 'config.openshift.io',
};
// the cluster version manifest is always named version.yaml, whatever the resource name
const CLUSTER_VERSION_FILE = 'version.yaml';

const NODES: ResourceLocator = { kind: 'nodes', group: 'core' };

export interface MustGatherOptions {
  /** Defaults to the js-yaml backed LocalFileAdapter */
  loader?: ManifestLoader;
  /** Defaults to a console logger without debug output */
  logger?: Logger;
  /** Defaults to DEFAULT_MAX_ROOT_DEPTH */
  maxRootDepth?: number;
}

export interface CollectionScan<T> {
  items: T[];
  /** Manifests that could not be loaded or decoded */
  skipped: SkippedManifest[];
}

/**
 * A must-gather archive located on disk, with the facts read from it at
 * construction time.
 */
export class MustGather implements ArchiveSummary {
  private constructor(
    readonly root: string,
    readonly title: string,
    readonly version: string,
    readonly nodes: readonly Node[],
    readonly skipped: SkippedManifest[],
    private readonly loader: ManifestLoader,
    private readonly logger: Logger,
  ) {}

  /**
   * Build a MustGather from a path to the archive root, or to a directory
   * wrapping it. Throws ERR_INPUT_UNREADABLE or ERR_ROOT_NOT_FOUND;
   * problems with individual manifests only degrade the result.
   * Reads nothing from the environment; see loadConfig for that.
   */
  static from(startPath: string, options: MustGatherOptions = {}): MustGather {
    const logger = options.logger ?? createLogger(false);
    const loader = options.loader ?? new LocalFileAdapter();

    const root = findMustGatherRoot(startPath, {
      maxDepth: options.maxRootDepth ?? DEFAULT_MAX_ROOT_DEPTH,
      logger,
    });
    const version = readClusterVersion(root, loader, logger);
    const nodes = scanCollection(buildManifestPath(root, NODES), loader, logger, Node.from);

    return new MustGather(
      root,
      path.basename(root),
      version,
      nodes.items,
      nodes.skipped,
      loader,
      logger,
    );
  }

  manifestPath(locator: ResourceLocator): string {
    return buildManifestPath(this.root, locator);
  }

  /**
   * Load one named manifest. Returns undefined when it is missing or
   * cannot be parsed.
   */
  resource(locator: ResourceLocator): StructuredDocument | undefined {
    if (!locator.name) {
      throw new MustGatherError(
        MustGatherErrorCode.ERR_INVALID_LOCATOR,
        `A resource name is required to load a single ${locator.kind} manifest`,
      );
    }
    const manifestPath = this.manifestPath(locator);
    try {
      return this.loader.load(manifestPath);
    } catch (error) {
      this.logger.debug(`resource ${manifestPath} unavailable: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Load every manifest of a collection. Unreadable entries are reported
   * in `skipped`.
   */
  resources(locator: ResourceLocator): CollectionScan<StructuredDocument> {
    if (locator.name) {
      throw new MustGatherError(
        MustGatherErrorCode.ERR_INVALID_LOCATOR,
        `Cannot list ${locator.kind} manifests for a single resource name (${locator.name})`,
      );
    }
    return scanCollection(this.manifestPath(locator), this.loader, this.logger, (document) => document);
  }

  summary(): ArchiveSummary {
    return { title: this.title, version: this.version, nodes: [...this.nodes] };
  }
}

/**
 * Get the version string from the cluster version manifest, or
 * UNKNOWN_VERSION when it cannot be determined.
 */
function readClusterVersion(root: string, loader: ManifestLoader, logger: Logger): string {
  const manifestPath = path.join(buildManifestPath(root, CLUSTER_VERSIONS), CLUSTER_VERSION_FILE);
  let manifest: StructuredDocument;
  try {
    manifest = loader.load(manifestPath);
  } catch (error) {
    logger.debug(`cluster version unavailable: ${errorMessage(error)}`);
    return UNKNOWN_VERSION;
  }

  const version = manifest.getString('status', 'desired', 'version');
  if (version === undefined) {
    logger.debug(`${manifestPath} has no status.desired.version string`);
    return UNKNOWN_VERSION;
  }
  return version;
}

function scanCollection<T>(
  dirPath: string,
  loader: ManifestLoader,
  logger: Logger,
  decode: (document: StructuredDocument) => T,
): CollectionScan<T> {
  const scan: CollectionScan<T> = { items: [], skipped: [] };

  let names: string[];
  try {
    names = fs.readdirSync(dirPath);
  } catch (error) {
    const reason = errorMessage(error);
    logger.debug(`no manifests at ${dirPath}: ${reason}`);
    // a missing collection is empty; one that exists but cannot be listed is reported
    if (!isMissingEntry(error)) {
      scan.skipped.push({ path: dirPath, reason });
    }
    return scan;
  }

  // sorted so results do not depend on directory enumeration order
  for (const name of names.filter((entry) => entry.endsWith(MANIFEST_EXTENSION)).sort()) {
    const manifestPath = path.join(dirPath, name);
    try {
      scan.items.push(decode(loader.load(manifestPath)));
    } catch (error) {
      const reason = errorMessage(error);
      logger.debug(`skipping ${manifestPath}: ${reason}`);
      scan.skipped.push({ path: manifestPath, reason });
    }
  }
  return scan;
}

function isMissingEntry(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
