export type DocumentKey = string | number;

/**
 * Parsed manifest content with nested field lookup.
 *
 * `get('status', 'desired', 'version')` walks mappings by key and sequences
 * by numeric index, returning undefined as soon as a step is missing.
 */
export interface StructuredDocument {
  /** File path or other origin of the document */
  readonly source: string;
  get(...keys: DocumentKey[]): unknown;
  /** Same walk as `get`, but only a string leaf is returned */
  getString(...keys: DocumentKey[]): string | undefined;
}

export function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function lookup(value: unknown, keys: readonly DocumentKey[]): unknown {
  let current = value;
  for (const key of keys) {
    if (typeof key === 'number') {
      if (!Array.isArray(current) || key < 0 || key >= current.length) {
        return undefined;
      }
      current = current[key];
    } else {
      if (!isMapping(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
        return undefined;
      }
      current = current[key];
    }
  }
  return current;
}
