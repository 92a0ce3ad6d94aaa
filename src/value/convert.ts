/**
 * Conversion between plain parser output and the Value Tree.
 *
 * @packageDocumentation
 */

import { MalformedConfigException, formatPath } from '../diagnostics/errors.js';
import {
  NULL_NODE,
  booleanNode,
  mappingNode,
  numberNode,
  sequenceNode,
  stringNode,
  type DynamicValue,
  type JsonValue,
  type ValueNode,
} from './types.js';

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Converts parsed JSON/YAML/TOML data into a Value Tree.
 *
 * `null` and `undefined` become the null node, `Date` instances (YAML and TOML
 * timestamps) become their ISO string, `bigint` becomes a number when it is a
 * safe integer and a string otherwise.
 *
 * @param data - Parser output.
 * @param path - Path of `data`, used in diagnostics.
 * @returns The corresponding node.
 * @throws MalformedConfigException for values no configuration format produces
 * (functions, symbols, class instances).
 */
export function toValueTree(data: unknown, path = ''): ValueNode {
  if (data === null || data === undefined) {
    return NULL_NODE;
  }
  if (typeof data === 'boolean') {
    return booleanNode(data);
  }
  if (typeof data === 'number') {
    return numberNode(data);
  }
  if (typeof data === 'string') {
    return stringNode(data);
  }
  if (typeof data === 'bigint') {
    return Number.isSafeInteger(Number(data)) ? numberNode(Number(data)) : stringNode(data.toString());
  }
  if (typeof data !== 'object') {
    throw new MalformedConfigException(
      `unsupported ${typeof data} value at ${formatPath(path)}`,
      path
    );
  }

  if (data instanceof Date) {
    return stringNode(data.toISOString());
  }
  if (Array.isArray(data)) {
    return sequenceNode(data.map((item: unknown, index) => toValueTree(item, `${path}[${String(index)}]`)));
  }
  if (!isPlainObject(data)) {
    throw new MalformedConfigException(
      `unsupported ${data.constructor.name} instance at ${formatPath(path)}`,
      path
    );
  }
  return mappingNode(
    Object.entries(data).map(([key, value]: [string, unknown]) => [
      key,
      toValueTree(value, `${path}.${key}`),
    ])
  );
}

/**
 * Converts a node into an untyped dynamic value.
 *
 * Mappings become plain objects (keys holding `null` are left out), sequences
 * become arrays (`null` items become `undefined`), scalars keep their kind.
 *
 * @param node - Node to convert.
 * @returns The dynamic value.
 */
export function fromValueTree(node: ValueNode): DynamicValue {
  switch (node.kind) {
    case 'null':
      return undefined;
    case 'boolean':
    case 'number':
    case 'string':
      return node.value;
    case 'sequence':
      return node.items.map(fromValueTree);
    case 'mapping':
      return Object.fromEntries(
        [...node.entries]
          .filter(([, child]) => child.kind !== 'null')
          .map(([key, child]): [string, DynamicValue] => [key, fromValueTree(child)])
      );
  }
}

/**
 * Converts a node into JSON-compatible data, keeping `null`.
 *
 * @param node - Node to convert.
 * @returns Plain data suitable for JSON or YAML serialization.
 */
export function toJsonValue(node: ValueNode): JsonValue {
  switch (node.kind) {
    case 'null':
      return null;
    case 'boolean':
    case 'number':
    case 'string':
      return node.value;
    case 'sequence':
      return node.items.map(toJsonValue);
    case 'mapping':
      return Object.fromEntries(
        [...node.entries].map(([key, child]): [string, JsonValue] => [key, toJsonValue(child)])
      );
  }
}

/**
 * Deep-merges two trees. Mappings merge key by key (existing keys keep their
 * position, new keys are appended); any other override replaces the base.
 *
 * @param base - Lower-precedence tree.
 * @param override - Higher-precedence tree.
 * @returns The merged tree.
 */
export function mergeTrees(base: ValueNode, override: ValueNode): ValueNode {
  if (base.kind !== 'mapping' || override.kind !== 'mapping') {
    return override;
  }
  const merged = new Map(base.entries);
  for (const [key, child] of override.entries) {
    const existing = merged.get(key);
    merged.set(key, existing === undefined ? child : mergeTrees(existing, child));
  }
  return mappingNode(merged);
}
