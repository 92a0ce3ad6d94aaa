/**
 * Value Tree module: node types, constructors and conversions.
 *
 * @packageDocumentation
 */

export {
  NULL_NODE,
  booleanNode,
  describeNode,
  mappingNode,
  numberNode,
  sequenceNode,
  stringNode,
  withoutKey,
} from './types.js';
export type {
  BooleanNode,
  DynamicValue,
  JsonValue,
  MappingNode,
  NodeShapeName,
  NullNode,
  NumberNode,
  SequenceNode,
  StringNode,
  ValueNode,
} from './types.js';
export { fromValueTree, mergeTrees, toJsonValue, toValueTree } from './convert.js';
