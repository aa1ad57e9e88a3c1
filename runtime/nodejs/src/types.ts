export enum MustGatherErrorCode {
  ERR_ROOT_NOT_FOUND = 'ERR_ROOT_NOT_FOUND',
  ERR_INPUT_UNREADABLE = 'ERR_INPUT_UNREADABLE',
  ERR_MANIFEST_UNREADABLE = 'ERR_MANIFEST_UNREADABLE',
  ERR_MANIFEST_MALFORMED = 'ERR_MANIFEST_MALFORMED',
  ERR_INVALID_LOCATOR = 'ERR_INVALID_LOCATOR',
  ERR_INVALID_CONFIG = 'ERR_INVALID_CONFIG',
}

export class MustGatherError extends Error {
  constructor(
    public code: MustGatherErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'MustGatherError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
