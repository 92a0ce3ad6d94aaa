/**
 * Default decode and loader settings.
 *
 * @packageDocumentation
 */

/**
 * Default for `strictUnexpectedKeys`: leftover mapping keys are an error.
 */
export const DEFAULT_STRICT_UNEXPECTED_KEYS = true;

/**
 * Default for `maxDepth`.
 */
export const DEFAULT_MAX_DEPTH = 256;

/**
 * Default decode options, without the registry.
 */
export const DEFAULT_DECODE_OPTIONS = {
  strictUnexpectedKeys: DEFAULT_STRICT_UNEXPECTED_KEYS,
  maxDepth: DEFAULT_MAX_DEPTH,
  debug: false,
} as const;

/**
 * Prefix of the environment variables that override the defaults.
 */
export const ENV_PREFIX = 'TYPEDCONF_';

/**
 * Component name the loaders log under.
 */
export const LOADER_COMPONENT = 'ConfigLoader';
