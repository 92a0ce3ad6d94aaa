/**
 * Schema module: declared shapes, built descriptors and the subclass registry.
 *
 * @packageDocumentation
 */

import * as t from './shapes.js';

export { t };
export type { RecordOptions } from './shapes.js';
export { buildDescriptor, typeName } from './builder.js';
export { SubclassRegistry, defaultRegistry, defineBase } from './registry.js';
export { TYPE_KEY } from './types.js';
export type {
  CalendarDuration,
  DefaultedField,
  DurationShape,
  DynamicShape,
  EnumDescriptor,
  EnumMember,
  EnumShape,
  FactoryField,
  FieldDefault,
  FieldDescriptor,
  FieldInput,
  Infer,
  InferFields,
  LazyShape,
  MappingDescriptor,
  MappingShape,
  OpenBase,
  OpenDescriptor,
  OpenShape,
  OptionalDescriptor,
  OptionalShape,
  PrimitiveDescriptor,
  PrimitiveKind,
  PrimitiveShape,
  RecordDescriptor,
  RecordShape,
  SequenceDescriptor,
  SequenceShape,
  TemporalShape,
  TypeDescriptor,
  TypeShape,
  UnionDescriptor,
  UnionShape,
} from './types.js';
