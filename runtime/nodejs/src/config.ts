import { Type, type Static } from '@sinclair/typebox';
import Ajv, { type ErrorObject } from 'ajv';
import { DEFAULT_MAX_ROOT_DEPTH } from './root-finder';
import { MustGatherError, MustGatherErrorCode } from './types';

/**
 * Runtime settings, read from the environment:
 *
 *   MGSCOPE_MAX_ROOT_DEPTH  wrapper directories unwrapped while looking for the root
 *   MGSCOPE_VERBOSE         "true" to print debug lines
 */
export const MustGatherConfigSchema = Type.Object(
  {
    maxRootDepth: Type.Integer({ minimum: 1, default: DEFAULT_MAX_ROOT_DEPTH }),
    verbose: Type.Boolean({ default: false }),
  },
  { additionalProperties: false },
);

export type MustGatherConfig = Static<typeof MustGatherConfigSchema>;

const ajv = new Ajv({ allErrors: true, strict: false, coerceTypes: true, useDefaults: true });

const validateConfig = ajv.compile<MustGatherConfig>(MustGatherConfigSchema);

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MustGatherConfig {
  const raw: Record<string, unknown> = {};
  if (env.MGSCOPE_MAX_ROOT_DEPTH !== undefined) {
    raw.maxRootDepth = env.MGSCOPE_MAX_ROOT_DEPTH;
  }
  if (env.MGSCOPE_VERBOSE !== undefined) {
    raw.verbose = env.MGSCOPE_VERBOSE;
  }

  if (!validateConfig(raw)) {
    throw new MustGatherError(
      MustGatherErrorCode.ERR_INVALID_CONFIG,
      `Invalid configuration: ${formatAjvErrors(validateConfig.errors)}`,
    );
  }
  return raw;
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) {
    return 'Unknown schema error';
  }
  return errors
    .map((err) => {
      const path = err.instancePath && err.instancePath.length > 0 ? err.instancePath : '/';
      const message = err.message || 'is invalid';
      return `${path} ${message}`;
    })
    .join('; ');
}
