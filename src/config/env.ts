/**
 * Environment variable overrides for decode options.
 *
 * Supports TYPEDCONF_* environment variables that override the built-in
 * defaults. Options passed explicitly to a call win over both.
 *
 * Override precedence: explicit option > env > defaults
 *
 * @packageDocumentation
 */

import { defaultRegistry } from '../schema/registry.js';
import { DEFAULT_DECODE_OPTIONS, ENV_PREFIX } from './defaults.js';
import type { DecodeOptions, ResolvedDecodeOptions } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Gets the default environment from Node.js process.env.
 * Returns an empty object if process is not available.
 */
export function getDefaultEnv(): EnvRecord {
  const globalProcess = (globalThis as { process?: { env?: EnvRecord } }).process;
  return globalProcess?.env ?? {};
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

const STRICT_VAR = `${ENV_PREFIX}STRICT_UNEXPECTED_KEYS`;
const MAX_DEPTH_VAR = `${ENV_PREFIX}MAX_DEPTH`;
const DEBUG_VAR = `${ENV_PREFIX}DEBUG`;

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to a positive integer.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced integer.
 * @throws EnvCoercionError if the value is empty, not a number, or not a positive integer.
 */
function coerceToPositiveInteger(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'positive integer', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (!Number.isInteger(num) || num < 1) {
    throw new EnvCoercionError(envVar, value, 'positive integer');
  }

  return num;
}

/**
 * Option values read from the environment.
 */
export interface EnvOptionOverrides {
  strictUnexpectedKeys?: boolean;
  maxDepth?: number;
  debug?: boolean;
}

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Option values taken from environment variables. */
  overrides: EnvOptionOverrides;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads TYPEDCONF_* environment variables into option overrides.
 *
 * Unset and empty variables are ignored.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing the first.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError on the first invalid value unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const { overrides } = readEnvOverrides({ TYPEDCONF_MAX_DEPTH: '64' });
 * // overrides.maxDepth === 64
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = getDefaultEnv(),
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: EnvOptionOverrides = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  const apply = (envVar: string, assign: (value: string) => void): void => {
    const value = env[envVar];
    if (value === undefined || value === '') {
      return;
    }
    try {
      assign(value);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  };

  apply(STRICT_VAR, (value) => {
    overrides.strictUnexpectedKeys = coerceToBoolean(value, STRICT_VAR);
  });
  apply(MAX_DEPTH_VAR, (value) => {
    overrides.maxDepth = coerceToPositiveInteger(value, MAX_DEPTH_VAR);
  });
  apply(DEBUG_VAR, (value) => {
    overrides.debug = coerceToBoolean(value, DEBUG_VAR);
  });

  return { overrides, appliedVars, errors };
}

/**
 * Fills in every decode option.
 *
 * Override precedence: explicit option > env > defaults
 *
 * @param options - Options given to the call.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The resolved options.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 * @throws RangeError if an explicit `maxDepth` is not a positive integer.
 */
export function resolveDecodeOptions(
  options: DecodeOptions & { readonly debug?: boolean } = {},
  env: EnvRecord = getDefaultEnv()
): ResolvedDecodeOptions {
  const { overrides } = readEnvOverrides(env);
  const maxDepth = options.maxDepth ?? overrides.maxDepth ?? DEFAULT_DECODE_OPTIONS.maxDepth;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${String(maxDepth)}`);
  }
  return {
    strictUnexpectedKeys:
      options.strictUnexpectedKeys ??
      overrides.strictUnexpectedKeys ??
      DEFAULT_DECODE_OPTIONS.strictUnexpectedKeys,
    maxDepth,
    registry: options.registry ?? defaultRegistry,
    debug: options.debug ?? overrides.debug ?? DEFAULT_DECODE_OPTIONS.debug,
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return {
    [STRICT_VAR]: {
      description: 'Reject mapping keys that no record field consumes (default true)',
      type: 'boolean',
    },
    [MAX_DEPTH_VAR]: {
      description: 'Maximum nesting depth before decoding fails (default 256)',
      type: 'number',
    },
    [DEBUG_VAR]: {
      description: 'Emit debug log entries from the loaders (default false)',
      type: 'boolean',
    },
  };
}
