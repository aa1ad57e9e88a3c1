import type { ManifestLoader } from '@mgscope/sdk';
import * as fs from 'fs';
import { Manifest } from '../manifest';
import { MustGatherError, MustGatherErrorCode, errorMessage } from '../types';

/**
 * Loads manifests from the local filesystem.
 */
export class LocalFileAdapter implements ManifestLoader<Manifest> {
  load(filePath: string): Manifest {
    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      throw new MustGatherError(
        MustGatherErrorCode.ERR_MANIFEST_UNREADABLE,
        `Cannot read manifest ${filePath}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    return Manifest.parse(filePath, content);
  }
}
