/**
 * Type definitions for decoder and loader options.
 *
 * @packageDocumentation
 */

import type { SubclassRegistry } from '../schema/registry.js';
import type { EnvRecord } from './env.js';

/**
 * Options accepted by `decode` and every loader.
 */
export interface DecodeOptions {
  /** Reject mapping keys that no record field consumes. */
  readonly strictUnexpectedKeys?: boolean;
  /** Maximum nesting depth before decoding gives up. */
  readonly maxDepth?: number;
  /** Registry consulted for open bases. Defaults to the process-wide registry. */
  readonly registry?: SubclassRegistry;
}

/**
 * Decode options with every value filled in.
 */
export interface ResolvedDecodeOptions {
  readonly strictUnexpectedKeys: boolean;
  readonly maxDepth: number;
  readonly registry: SubclassRegistry;
  /** Whether loaders emit debug log entries. */
  readonly debug: boolean;
}

/**
 * Source formats the loaders can parse.
 */
export type SourceFormat = 'json' | 'yaml' | 'toml' | 'properties';

/**
 * Options accepted by the loaders, on top of the decode options.
 */
export interface LoadOptions extends DecodeOptions {
  /** Source format; inferred from the file extension or content type when absent. */
  readonly format?: SourceFormat;
  /** Enables debug logging for this call. */
  readonly debug?: boolean;
  /** Environment used for `TYPEDCONF_*` overrides; defaults to `process.env`. */
  readonly env?: EnvRecord;
}
