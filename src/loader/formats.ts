/**
 * Source text parsers for JSON, YAML, TOML and Java-style properties.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import * as properties from 'dot-properties';
import * as yaml from 'js-yaml';
import type { SourceFormat } from '../config/types.js';
import { ConfigDecodeError } from '../diagnostics/errors.js';
import { toValueTree } from '../value/convert.js';
import { mappingNode, type ValueNode } from '../value/types.js';
import { treeFromPairs } from './env.js';

/**
 * Error class for source text that its parser rejects.
 */
export class SourceParseError extends Error {
  /** Format the text was parsed as. */
  public readonly format: SourceFormat;
  /** The parser's own error. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new SourceParseError.
   *
   * @param format - Format the text was parsed as.
   * @param message - Descriptive error message.
   * @param cause - The underlying parser error, if any.
   */
  constructor(format: SourceFormat, message: string, cause?: Error) {
    super(message);
    this.name = 'SourceParseError';
    this.format = format;
    this.cause = cause;
  }
}

const EXTENSIONS: Readonly<Record<string, SourceFormat>> = {
  '.json': 'json',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.toml': 'toml',
  '.properties': 'properties',
};

/**
 * Infers the format from a file name or URL path.
 *
 * @param location - File path or URL pathname.
 * @returns The format, or `undefined` for an unknown extension.
 */
export function formatFromPath(location: string): SourceFormat | undefined {
  const match = /\.[A-Za-z]+$/.exec(location);
  if (match === null) {
    return undefined;
  }
  return EXTENSIONS[match[0].toLowerCase()];
}

/**
 * Infers the format from an HTTP `content-type` header.
 *
 * @param contentType - Header value, if any.
 * @returns The format, or `undefined` when the media type is not recognized.
 */
export function formatFromContentType(contentType: string | null): SourceFormat | undefined {
  if (contentType === null) {
    return undefined;
  }
  const media = contentType.split(';')[0]?.trim().toLowerCase() ?? '';
  if (media === 'application/json' || media.endsWith('+json')) {
    return 'json';
  }
  if (media.endsWith('/yaml') || media.endsWith('/x-yaml')) {
    return 'yaml';
  }
  if (media.endsWith('/toml') || media.endsWith('/x-toml')) {
    return 'toml';
  }
  if (media.endsWith('/x-java-properties')) {
    return 'properties';
  }
  return undefined;
}

function parseProperties(text: string): ValueNode {
  const pairs: [string, string][] = [];
  for (const [key, value] of Object.entries(properties.parse(text))) {
    // Without a path separator the parser returns a flat map of strings.
    if (typeof value === 'string') {
      pairs.push([key, value]);
    }
  }
  return treeFromPairs(pairs, '.');
}

function parseRaw(text: string, format: SourceFormat): ValueNode {
  switch (format) {
    case 'json':
      return toValueTree(JSON.parse(text));
    case 'yaml':
      return toValueTree(yaml.load(text));
    case 'toml':
      return toValueTree(TOML.parse(text));
    case 'properties':
      return parseProperties(text);
  }
}

/**
 * Parses source text into a Value Tree.
 *
 * Empty or whitespace-only text is an empty mapping in every format.
 *
 * @param text - Source text.
 * @param format - Format of the text.
 * @returns The root node.
 * @throws SourceParseError if the parser rejects the text.
 *
 * @example
 * ```typescript
 * const root = parseSource('port = 8080', 'toml');
 * ```
 */
export function parseSource(text: string, format: SourceFormat): ValueNode {
  if (text.trim() === '') {
    return mappingNode([]);
  }
  try {
    return parseRaw(text, format);
  } catch (error) {
    if (error instanceof ConfigDecodeError) {
      throw error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SourceParseError(format, `Invalid ${format.toUpperCase()} syntax: ${cause.message}`, cause);
  }
}
