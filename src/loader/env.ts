/**
 * Builds Value Trees from flat name/value pairs: prefixed environment variables
 * and properties files.
 *
 * `APP_DB__HOST=localhost` with prefix `APP_` becomes `{ db: { host: "localhost" } }`.
 * Properties files share the same nesting and literal typing, split on `.`.
 *
 * @packageDocumentation
 */

import { getDefaultEnv, type EnvRecord } from '../config/env.js';
import { mergeTrees, toValueTree } from '../value/convert.js';
import {
  NULL_NODE,
  booleanNode,
  mappingNode,
  numberNode,
  stringNode,
  type MappingNode,
  type ValueNode,
} from '../value/types.js';

const NESTING_SEPARATOR = '__';

const NUMBER_LITERAL = /^-?(0|[1-9]\d*)(\.\d+)?([eE][+-]?\d+)?$/;

/**
 * Types a raw environment value.
 *
 * `true`/`false` (any case) are booleans, `null` is null, decimal literals
 * without leading zeros are numbers, and text starting with `[` or `{` is read
 * as JSON when it parses. Everything else stays a string.
 *
 * @param raw - The variable's value.
 * @returns The typed node.
 */
export function literalNode(raw: string): ValueNode {
  const trimmed = raw.trim();
  const lowered = trimmed.toLowerCase();
  if (lowered === 'true' || lowered === 'false') {
    return booleanNode(lowered === 'true');
  }
  if (trimmed === 'null') {
    return NULL_NODE;
  }
  if (NUMBER_LITERAL.test(trimmed)) {
    return numberNode(Number(trimmed));
  }
  if (trimmed.startsWith('[') || trimmed.startsWith('{')) {
    try {
      return toValueTree(JSON.parse(trimmed));
    } catch (error) {
      if (!(error instanceof SyntaxError)) {
        throw error;
      }
    }
  }
  return stringNode(raw);
}

function nest(segments: readonly string[], leaf: ValueNode): ValueNode {
  return segments.reduceRight<ValueNode>((child, key) => mappingNode([[key, child]]), leaf);
}

/**
 * Builds a mapping tree from flat `name = value` pairs, splitting names on
 * `separator` and typing values with {@link literalNode}. Later pairs override
 * earlier ones key by key. Names with an empty segment are skipped.
 *
 * @param pairs - Names and raw values, in precedence order.
 * @param separator - Nesting separator, e.g. `__` or `.`.
 * @returns The mapping root.
 */
export function treeFromPairs(pairs: Iterable<readonly [string, string]>, separator: string): MappingNode {
  let tree: ValueNode = mappingNode([]);
  for (const [name, value] of pairs) {
    const segments = name.split(separator);
    if (segments.some((segment) => segment === '')) {
      continue;
    }
    tree = mergeTrees(tree, nest(segments, literalNode(value)));
  }
  return tree.kind === 'mapping' ? tree : mappingNode([]);
}

/**
 * Reads every variable starting with `prefix` into a mapping tree.
 *
 * The rest of each name is lowercased and split on `__` for nesting. Names are
 * processed in sorted order, so when both `APP_DB` and `APP_DB__HOST` are set
 * the nested mapping wins. Names with an empty segment are skipped.
 *
 * @param prefix - Variable name prefix, e.g. `APP_`.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The mapping root.
 */
export function readEnvTree(prefix: string, env: EnvRecord = getDefaultEnv()): MappingNode {
  const pairs: [string, string][] = [];
  for (const name of Object.keys(env).sort()) {
    const value = env[name];
    if (name.startsWith(prefix) && value !== undefined) {
      pairs.push([name.slice(prefix.length).toLowerCase(), value]);
    }
  }
  return treeFromPairs(pairs, NESTING_SEPARATOR);
}
