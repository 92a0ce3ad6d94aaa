/**
 * Value Tree: the format-agnostic representation of a parsed configuration
 * document.
 *
 * Nodes are produced by the loaders (or by callers holding their own parser
 * output) and are only ever read by the decoder.
 *
 * @packageDocumentation
 */

/** Explicit `null`. */
export interface NullNode {
  readonly kind: 'null';
}

/** Boolean scalar. */
export interface BooleanNode {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/** Numeric scalar; integral-ness follows `Number.isInteger`. */
export interface NumberNode {
  readonly kind: 'number';
  readonly value: number;
}

/** String scalar. */
export interface StringNode {
  readonly kind: 'string';
  readonly value: string;
}

/** Ordered list of nodes. */
export interface SequenceNode {
  readonly kind: 'sequence';
  readonly items: readonly ValueNode[];
}

/** Insertion-ordered map from string key to node. */
export interface MappingNode {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<string, ValueNode>;
}

/**
 * A node of the Value Tree.
 */
export type ValueNode = NullNode | BooleanNode | NumberNode | StringNode | SequenceNode | MappingNode;

/**
 * Shape names used in diagnostics.
 */
export type NodeShapeName =
  | 'null'
  | 'boolean'
  | 'integer'
  | 'float'
  | 'string'
  | 'sequence'
  | 'mapping';

/**
 * Untyped value produced for `dynamic` targets: nested plain objects, arrays
 * and scalars. `null` in the tree becomes `undefined`.
 */
export type DynamicValue =
  | boolean
  | number
  | string
  | undefined
  | DynamicValue[]
  | { [key: string]: DynamicValue };

/**
 * JSON-compatible plain data, used when serializing a tree.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/** The shared `null` node. */
export const NULL_NODE: NullNode = Object.freeze({ kind: 'null' });

export function booleanNode(value: boolean): BooleanNode {
  return Object.freeze({ kind: 'boolean', value });
}

export function numberNode(value: number): NumberNode {
  return Object.freeze({ kind: 'number', value });
}

export function stringNode(value: string): StringNode {
  return Object.freeze({ kind: 'string', value });
}

export function sequenceNode(items: readonly ValueNode[]): SequenceNode {
  return Object.freeze({ kind: 'sequence', items: Object.freeze([...items]) });
}

/**
 * Creates a mapping node. Later duplicates of a key replace earlier ones but keep
 * the first position, as `Map` does.
 *
 * @param entries - Key/node pairs in document order.
 * @returns A frozen mapping node.
 */
export function mappingNode(entries: Iterable<readonly [string, ValueNode]>): MappingNode {
  return Object.freeze({ kind: 'mapping', entries: new Map(entries) });
}

/**
 * Returns the shape name of a node for diagnostics.
 *
 * @param node - The node to describe.
 * @returns Its shape name; numbers are split into `integer` and `float`.
 */
export function describeNode(node: ValueNode): NodeShapeName {
  switch (node.kind) {
    case 'number':
      return Number.isInteger(node.value) ? 'integer' : 'float';
    default:
      return node.kind;
  }
}

/**
 * Returns a mapping node without `key`, leaving the original untouched.
 *
 * @param node - Source mapping.
 * @param key - Key to leave out.
 * @returns A new mapping node, or `node` itself when the key is absent.
 */
export function withoutKey(node: MappingNode, key: string): MappingNode {
  if (!node.entries.has(key)) {
    return node;
  }
  return mappingNode([...node.entries].filter(([entryKey]) => entryKey !== key));
}
