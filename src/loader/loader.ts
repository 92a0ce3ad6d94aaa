/**
 * Loaders: read a source, decode it against a shape, throw the diagnostic on failure.
 *
 * Override precedence for merged sources: later source > earlier source.
 *
 * @packageDocumentation
 */

import { LOADER_COMPONENT } from '../config/defaults.js';
import { getDefaultEnv, resolveDecodeOptions, type EnvRecord } from '../config/env.js';
import type { LoadOptions, ResolvedDecodeOptions, SourceFormat } from '../config/types.js';
import { decode } from '../decoder/decode.js';
import type { Infer, TypeShape } from '../schema/types.js';
import { Logger } from '../utils/logger.js';
import { safeReadFile } from '../utils/safe-fs.js';
import { mergeTrees, toValueTree } from '../value/convert.js';
import { mappingNode, type ValueNode } from '../value/types.js';
import { readEnvTree } from './env.js';
import { formatFromContentType, formatFromPath, parseSource } from './formats.js';

/**
 * Error class for URLs that answer with a non-2xx status.
 */
export class SourceFetchError extends Error {
  /** The requested URL. */
  public readonly url: string;
  /** HTTP status of the response. */
  public readonly status: number;

  /**
   * Creates a new SourceFetchError.
   *
   * @param url - The requested URL.
   * @param status - HTTP status of the response.
   */
  constructor(url: string, status: number) {
    super(`Failed to fetch '${url}': HTTP ${String(status)}`);
    this.name = 'SourceFetchError';
    this.url = url;
    this.status = status;
  }
}

interface LoadContext {
  readonly options: ResolvedDecodeOptions;
  readonly env: EnvRecord;
  readonly logger: Logger;
}

function contextFor(options: LoadOptions): LoadContext {
  const env = options.env ?? getDefaultEnv();
  const resolved = resolveDecodeOptions(options, env);
  return {
    options: resolved,
    env,
    logger: new Logger({ component: LOADER_COMPONENT, debugMode: resolved.debug }),
  };
}

function finish<S extends TypeShape>(root: ValueNode, shape: S, ctx: LoadContext): Infer<S> {
  const result = decode(root, shape, ctx.options);
  if (!result.success) {
    ctx.logger.debug('decode_failed', { kind: result.error.kind, path: result.error.path });
    throw result.error;
  }
  return result.value;
}

/**
 * A configuration source in a {@link SourceChain}.
 */
export type Source =
  | { readonly kind: 'string'; readonly text: string; readonly format: SourceFormat }
  | { readonly kind: 'file'; readonly path: string; readonly format?: SourceFormat }
  | { readonly kind: 'url'; readonly url: string; readonly format?: SourceFormat }
  | { readonly kind: 'env'; readonly prefix: string }
  | { readonly kind: 'dict'; readonly data: unknown }
  | { readonly kind: 'tree'; readonly node: ValueNode };

async function fetchText(url: string): Promise<{ text: string; contentType: string | null }> {
  const response = await fetch(url);
  if (!response.ok) {
    throw new SourceFetchError(url, response.status);
  }
  return { text: await response.text(), contentType: response.headers.get('content-type') };
}

function defaultFormat(ctx: LoadContext, location: string): SourceFormat {
  ctx.logger.warn('format_defaulted', { location, format: 'json' });
  return 'json';
}

async function readSource(source: Source, ctx: LoadContext): Promise<ValueNode> {
  switch (source.kind) {
    case 'string': {
      const node = parseSource(source.text, source.format);
      ctx.logger.debug('source_loaded', { source: 'string', format: source.format });
      return node;
    }
    case 'file': {
      const format = source.format ?? formatFromPath(source.path) ?? defaultFormat(ctx, source.path);
      const node = parseSource(await safeReadFile(source.path), format);
      ctx.logger.debug('source_loaded', { source: 'file', location: source.path, format });
      return node;
    }
    case 'url': {
      const { text, contentType } = await fetchText(source.url);
      const format =
        source.format ??
        formatFromPath(new URL(source.url).pathname) ??
        formatFromContentType(contentType) ??
        defaultFormat(ctx, source.url);
      const node = parseSource(text, format);
      ctx.logger.debug('source_loaded', { source: 'url', location: source.url, format });
      return node;
    }
    case 'env': {
      const node = readEnvTree(source.prefix, ctx.env);
      ctx.logger.debug('source_loaded', {
        source: 'env',
        prefix: source.prefix,
        keys: node.entries.size,
      });
      return node;
    }
    case 'dict':
      ctx.logger.debug('source_loaded', { source: 'dict' });
      return toValueTree(source.data);
    case 'tree':
      ctx.logger.debug('source_loaded', { source: 'tree' });
      return source.node;
  }
}

/**
 * Parses text and decodes it.
 *
 * @param text - Source text.
 * @param shape - Target shape.
 * @param options - Decode options plus `format` (default `json`).
 * @returns The typed value.
 * @throws SourceParseError if the text cannot be parsed.
 * @throws ConfigDecodeError if decoding fails.
 * @throws EnvCoercionError if a TYPEDCONF_* variable is invalid.
 *
 * @example
 * ```typescript
 * const conn = loads('host = "db"\nport = 5432', Conn, { format: 'toml' });
 * ```
 */
export function loads<S extends TypeShape>(text: string, shape: S, options: LoadOptions = {}): Infer<S> {
  const ctx = contextFor(options);
  const format = options.format ?? 'json';
  const root = parseSource(text, format);
  ctx.logger.debug('source_loaded', { source: 'string', format });
  return finish(root, shape, ctx);
}

/**
 * Reads a file and decodes it. The format follows the extension
 * (`.json`, `.yaml`, `.yml`, `.toml`, `.properties`) unless given, and is JSON
 * otherwise, with a `format_defaulted` warning.
 *
 * @param filePath - Path of the file.
 * @param shape - Target shape.
 * @param options - Decode options plus `format`.
 * @returns The typed value.
 * @throws PathValidationError if the path is invalid.
 * @throws SourceParseError if the text cannot be parsed.
 * @throws ConfigDecodeError if decoding fails.
 */
export async function loadFile<S extends TypeShape>(
  filePath: string,
  shape: S,
  options: LoadOptions = {}
): Promise<Infer<S>> {
  const ctx = contextFor(options);
  const source: Source =
    options.format === undefined
      ? { kind: 'file', path: filePath }
      : { kind: 'file', path: filePath, format: options.format };
  return finish(await readSource(source, ctx), shape, ctx);
}

/**
 * Fetches a URL with the global `fetch` and decodes the body. The format
 * follows the URL path extension, then the `content-type` header, unless given,
 * and is JSON otherwise, with a `format_defaulted` warning.
 *
 * @param url - Absolute URL.
 * @param shape - Target shape.
 * @param options - Decode options plus `format`.
 * @returns The typed value.
 * @throws SourceFetchError if the response status is not 2xx.
 * @throws SourceParseError if the body cannot be parsed.
 * @throws ConfigDecodeError if decoding fails.
 */
export async function loadUrl<S extends TypeShape>(
  url: string,
  shape: S,
  options: LoadOptions = {}
): Promise<Infer<S>> {
  const ctx = contextFor(options);
  const source: Source =
    options.format === undefined ? { kind: 'url', url } : { kind: 'url', url, format: options.format };
  return finish(await readSource(source, ctx), shape, ctx);
}

/**
 * Decodes the variables starting with `prefix`. See `readEnvTree` for the
 * naming and typing rules.
 *
 * @param prefix - Variable name prefix, e.g. `APP_`.
 * @param shape - Target shape.
 * @param options - Decode options; `env` replaces `process.env`.
 * @returns The typed value.
 * @throws ConfigDecodeError if decoding fails.
 */
export function loadEnv<S extends TypeShape>(prefix: string, shape: S, options: LoadOptions = {}): Infer<S> {
  const ctx = contextFor(options);
  const root = readEnvTree(prefix, ctx.env);
  ctx.logger.debug('source_loaded', { source: 'env', prefix, keys: root.entries.size });
  return finish(root, shape, ctx);
}

/**
 * Decodes in-memory plain data (parsed JSON, an object literal).
 *
 * @param data - Plain data.
 * @param shape - Target shape.
 * @param options - Decode options.
 * @returns The typed value.
 * @throws ConfigDecodeError if the data holds unsupported values or decoding fails.
 */
export function loadDict<S extends TypeShape>(data: unknown, shape: S, options: LoadOptions = {}): Infer<S> {
  const ctx = contextFor(options);
  const root = toValueTree(data);
  ctx.logger.debug('source_loaded', { source: 'dict' });
  return finish(root, shape, ctx);
}

/**
 * Immutable builder that merges several sources, later ones overriding earlier
 * ones key by key, then decodes the result.
 *
 * @example
 * ```typescript
 * const config = await multi()
 *   .file('defaults.yaml')
 *   .file('local.toml')
 *   .env('APP_')
 *   .on(AppConfig);
 * ```
 */
export class SourceChain {
  private readonly sources: readonly Source[];

  constructor(sources: readonly Source[] = []) {
    this.sources = Object.freeze([...sources]);
  }

  private with(source: Source): SourceChain {
    return new SourceChain([...this.sources, source]);
  }

  string(text: string, format: SourceFormat = 'json'): SourceChain {
    return this.with({ kind: 'string', text, format });
  }

  file(path: string, format?: SourceFormat): SourceChain {
    return this.with(format === undefined ? { kind: 'file', path } : { kind: 'file', path, format });
  }

  url(url: string, format?: SourceFormat): SourceChain {
    return this.with(format === undefined ? { kind: 'url', url } : { kind: 'url', url, format });
  }

  env(prefix: string): SourceChain {
    return this.with({ kind: 'env', prefix });
  }

  dict(data: unknown): SourceChain {
    return this.with({ kind: 'dict', data });
  }

  tree(node: ValueNode): SourceChain {
    return this.with({ kind: 'tree', node });
  }

  /**
   * Reads every source in order, merges them and decodes the result.
   *
   * @param shape - Target shape.
   * @param options - Decode options.
   * @returns The typed value.
   * @throws The first loader error met, or the decode diagnostic.
   */
  async on<S extends TypeShape>(shape: S, options: LoadOptions = {}): Promise<Infer<S>> {
    const ctx = contextFor(options);
    let root: ValueNode = mappingNode([]);
    for (const source of this.sources) {
      root = mergeTrees(root, await readSource(source, ctx));
    }
    return finish(root, shape, ctx);
  }
}

/**
 * Starts an empty {@link SourceChain}.
 */
export function multi(): SourceChain {
  return new SourceChain();
}
