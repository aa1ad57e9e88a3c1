import {
  isMapping,
  lookup,
  type DocumentKey,
  type StructuredDocument,
} from '@mgscope/sdk';
import * as yaml from 'js-yaml';
import { MustGatherError, MustGatherErrorCode, errorMessage } from './types';

/**
 * A single parsed resource manifest from the archive.
 */
export class Manifest implements StructuredDocument {
  constructor(
    readonly source: string,
    readonly content: Record<string, unknown>,
  ) {}

  /**
   * Parse YAML text into a manifest. Timestamps are kept as strings
   * (core schema), and the document must be a mapping.
   */
  static parse(source: string, text: string): Manifest {
    let document: unknown;
    try {
      document = yaml.load(text, { schema: yaml.CORE_SCHEMA, filename: source });
    } catch (error) {
      throw new MustGatherError(
        MustGatherErrorCode.ERR_MANIFEST_MALFORMED,
        `Cannot parse manifest ${source}: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    if (!isMapping(document)) {
      throw new MustGatherError(
        MustGatherErrorCode.ERR_MANIFEST_MALFORMED,
        `Manifest ${source} is not a YAML mapping`,
      );
    }
    return new Manifest(source, document);
  }

  get kind(): string | undefined {
    return this.getString('kind');
  }

  get name(): string | undefined {
    return this.getString('metadata', 'name');
  }

  get namespace(): string | undefined {
    return this.getString('metadata', 'namespace');
  }

  get(...keys: DocumentKey[]): unknown {
    return lookup(this.content, keys);
  }

  getString(...keys: DocumentKey[]): string | undefined {
    const value = this.get(...keys);
    return typeof value === 'string' ? value : undefined;
  }
}
