/**
 * Configuration module for decode and loader options.
 *
 * Provides option defaults and TYPEDCONF_* environment variable overrides.
 *
 * Override precedence: explicit option > env > defaults
 *
 * @packageDocumentation
 */

export type { DecodeOptions, LoadOptions, ResolvedDecodeOptions, SourceFormat } from './types.js';
export {
  DEFAULT_DECODE_OPTIONS,
  DEFAULT_MAX_DEPTH,
  DEFAULT_STRICT_UNEXPECTED_KEYS,
  ENV_PREFIX,
  LOADER_COMPONENT,
} from './defaults.js';
export {
  EnvCoercionError,
  getDefaultEnv,
  getEnvVarDocumentation,
  readEnvOverrides,
  resolveDecodeOptions,
} from './env.js';
export type { EnvOptionOverrides, EnvOverrideResult, EnvRecord } from './env.js';
