import type { Logger } from '@mgscope/sdk';
import * as fs from 'fs';
import * as path from 'path';
import { CLUSTER_SCOPED_DIR, NAMESPACES_DIR } from './manifest-path';
import { MustGatherError, MustGatherErrorCode, errorMessage } from './types';

export const VERSION_FILE = 'version';
export const DEFAULT_MAX_ROOT_DEPTH = 32;

export interface FindRootOptions {
  /** How many wrapper directories may be unwrapped before giving up */
  maxDepth?: number;
  logger?: Logger;
}

/**
 * A directory is a must-gather root when it holds a `version` file, or both
 * the `namespaces` and `cluster-scoped-resources` directories.
 */
export function isMustGatherRoot(dirPath: string): boolean {
  if (statOrUndefined(path.join(dirPath, VERSION_FILE))?.isFile()) {
    return true;
  }
  return (
    statOrUndefined(path.join(dirPath, NAMESPACES_DIR))?.isDirectory() === true &&
    statOrUndefined(path.join(dirPath, CLUSTER_SCOPED_DIR))?.isDirectory() === true
  );
}

/**
 * Find the root of a must-gather directory structure given a path.
 *
 * 1. if the current directory satisfies `isMustGatherRoot`, return its
 *    canonical path.
 * 2. if it has exactly one subdirectory, continue from that subdirectory.
 * 3. otherwise the root is ambiguous and ERR_ROOT_NOT_FOUND is thrown.
 *
 * Descent stops at `maxDepth` levels and on a directory seen before
 * (symlink loops).
 */
export function findMustGatherRoot(startPath: string, options: FindRootOptions = {}): string {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_ROOT_DEPTH;
  const start = path.resolve(startPath);

  let stat: fs.Stats;
  try {
    stat = fs.statSync(start);
  } catch (error) {
    throw new MustGatherError(
      MustGatherErrorCode.ERR_INPUT_UNREADABLE,
      `Cannot read must-gather path ${start}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
  if (!stat.isDirectory()) {
    throw new MustGatherError(
      MustGatherErrorCode.ERR_INPUT_UNREADABLE,
      `Must-gather path ${start} is not a directory`,
    );
  }

  const visited = new Set<string>();
  let current = start;
  for (let depth = 0; ; depth += 1) {
    const canonical = canonicalize(current);
    if (isMustGatherRoot(current)) {
      options.logger?.debug(`must-gather root found at ${canonical}`);
      return canonical;
    }

    if (visited.has(canonical)) {
      throw new MustGatherError(
        MustGatherErrorCode.ERR_ROOT_NOT_FOUND,
        `Cannot determine root of must-gather: ${current} loops back to ${canonical}`,
      );
    }
    visited.add(canonical);

    const subdirectories = listSubdirectories(current);
    if (subdirectories.length !== 1) {
      throw new MustGatherError(
        MustGatherErrorCode.ERR_ROOT_NOT_FOUND,
        `Cannot determine root of must-gather: ${current} has ${subdirectories.length} subdirectories`,
      );
    }
    if (depth >= maxDepth) {
      throw new MustGatherError(
        MustGatherErrorCode.ERR_ROOT_NOT_FOUND,
        `Cannot determine root of must-gather: no root within ${maxDepth} levels of ${start}`,
      );
    }

    options.logger?.debug(`descending into ${subdirectories[0]}`);
    current = subdirectories[0];
  }
}

function statOrUndefined(filePath: string): fs.Stats | undefined {
  try {
    return fs.statSync(filePath);
  } catch {
    return undefined;
  }
}

function canonicalize(dirPath: string): string {
  try {
    return fs.realpathSync(dirPath);
  } catch (error) {
    throw new MustGatherError(
      MustGatherErrorCode.ERR_INPUT_UNREADABLE,
      `Cannot resolve ${dirPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

function listSubdirectories(dirPath: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new MustGatherError(
      MustGatherErrorCode.ERR_INPUT_UNREADABLE,
      `Cannot list ${dirPath}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  const directories: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);
    if (entry.isDirectory()) {
      directories.push(fullPath);
    } else if (entry.isSymbolicLink() && statOrUndefined(fullPath)?.isDirectory()) {
      directories.push(fullPath);
    }
  }
  return directories;
}
