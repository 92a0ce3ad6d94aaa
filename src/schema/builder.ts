/**
 * Type descriptor builder and process-wide descriptor cache.
 *
 * @packageDocumentation
 */

import { MissingTypeException, formatPath } from '../diagnostics/errors.js';
import {
  TYPE_KEY,
  type FieldDefault,
  type FieldDescriptor,
  type FieldInput,
  type RecordDescriptor,
  type RecordShape,
  type TypeDescriptor,
  type TypeShape,
} from './types.js';

const cache = new WeakMap<TypeShape, TypeDescriptor>();
const building = new WeakSet<TypeShape>();

function kindOf(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return typeof value;
}

function isPlainData(value: unknown): boolean {
  if (value === null || typeof value !== 'object') {
    return typeof value !== 'function' && typeof value !== 'symbol';
  }
  if (value instanceof Date) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isPlainData);
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return (proto === Object.prototype || proto === null) && Object.values(value).every(isPlainData);
}

function buildField(name: string, input: FieldInput, path: string): FieldDescriptor {
  if (name === TYPE_KEY) {
    throw new MissingTypeException(
      `field name '${TYPE_KEY}' is reserved for subtype selection at ${formatPath(path)}`,
      path
    );
  }
  const fieldPath = `${path}.${name}`;
  if (!('type' in input)) {
    const type = build(input, fieldPath);
    return { name, type, required: type.kind !== 'optional' };
  }

  const type = build(input.type, fieldPath);
  let fallback: FieldDefault;
  if ('default' in input) {
    if ('defaultFactory' in input) {
      throw new MissingTypeException(
        `field at ${formatPath(fieldPath)} declares both a default and a default factory`,
        fieldPath
      );
    }
    // Literal defaults are copied on every decode, so they must be copyable data.
    if (!isPlainData(input.default)) {
      throw new MissingTypeException(
        `default at ${formatPath(fieldPath)} is not plain data, declare it with a default factory`,
        fieldPath
      );
    }
    fallback = { kind: 'value', value: input.default };
  } else {
    fallback = { kind: 'factory', produce: input.defaultFactory };
  }
  return { name, type, required: false, default: fallback };
}

function buildRecord(shape: RecordShape<unknown>, path: string): RecordDescriptor {
  const fields: FieldDescriptor[] = [];
  const construct = shape.construct;
  const descriptor: RecordDescriptor =
    construct === undefined
      ? { kind: 'record', name: shape.name, fields }
      : { kind: 'record', name: shape.name, fields, construct: (values) => construct.call(shape, values) };

  // Cached before the fields are built so that lazy self-references resolve to
  // this same descriptor.
  cache.set(shape, descriptor);
  try {
    for (const [name, input] of Object.entries(shape.fields)) {
      fields.push(buildField(name, input, path));
    }
  } catch (error) {
    cache.delete(shape);
    throw error;
  }
  Object.freeze(fields);
  return Object.freeze(descriptor);
}

function buildUncached(shape: TypeShape, path: string): TypeDescriptor {
  switch (shape.kind) {
    case 'primitive':
      return { kind: 'primitive', primitive: shape.primitive };
    case 'temporal':
      return { kind: 'temporal' };
    case 'duration':
      return { kind: 'duration' };
    case 'dynamic':
      return { kind: 'dynamic' };
    case 'optional':
      return { kind: 'optional', inner: build(shape.inner, path) };
    case 'sequence':
      if (shape.item === undefined) {
        throw new MissingTypeException(
          `missing item type for list at ${formatPath(path)}`,
          path
        );
      }
      return { kind: 'sequence', item: build(shape.item, `${path}[*]`) };
    case 'mapping':
      if (shape.value === undefined) {
        throw new MissingTypeException(
          `missing value type for dict at ${formatPath(path)}`,
          path
        );
      }
      return { kind: 'mapping', value: build(shape.value, `${path}.*`) };
    case 'record':
      return buildRecord(shape, path);
    case 'enumeration': {
      if (shape.members.length === 0) {
        throw new MissingTypeException(`enumeration ${shape.name} has no members`, path);
      }
      const names = new Set(shape.members.map((member) => member.name));
      if (names.size !== shape.members.length) {
        throw new MissingTypeException(
          `enumeration ${shape.name} declares duplicate member names`,
          path
        );
      }
      return { kind: 'enumeration', name: shape.name, members: shape.members };
    }
    case 'union':
      if (shape.variants.length === 0) {
        throw new MissingTypeException(`union at ${formatPath(path)} has no variants`, path);
      }
      return {
        kind: 'union',
        variants: Object.freeze(shape.variants.map((variant) => build(variant, path))),
      };
    case 'open':
      return { kind: 'open', base: shape.base };
    case 'lazy':
      return build(shape.resolve(), path);
    default:
      throw new MissingTypeException(
        `unsupported type shape '${kindOf(shape)}' at ${formatPath(path)}`,
        path
      );
  }
}

function build(shape: TypeShape, path: string): TypeDescriptor {
  const cached = cache.get(shape);
  if (cached !== undefined) {
    return cached;
  }
  if (typeof shape !== 'object' || shape === null) {
    throw new MissingTypeException(
      `unsupported type shape '${kindOf(shape)}' at ${formatPath(path)}`,
      path
    );
  }
  if (building.has(shape)) {
    throw new MissingTypeException(
      `recursive reference at ${formatPath(path)} must go through a record`,
      path
    );
  }
  building.add(shape);
  try {
    const descriptor = Object.freeze(buildUncached(shape, path));
    cache.set(shape, descriptor);
    return descriptor;
  } finally {
    building.delete(shape);
  }
}

/**
 * Builds (or returns the cached) descriptor for a shape.
 *
 * Descriptors are built once per shape object and shared read-only afterwards.
 * Paths in build errors are relative to `shape`: `.field` for record fields,
 * `[*]` for list items and `.*` for dict values.
 *
 * @param shape - Declared shape.
 * @returns The frozen descriptor.
 * @throws MissingTypeException when a list or dict lacks its item/value type at
 * any depth, a record declares `_type`, or the shape is otherwise incomplete or
 * unsupported.
 */
export function buildDescriptor(shape: TypeShape): TypeDescriptor {
  return build(shape, '');
}

/**
 * Display name of a descriptor, as used in union diagnostics.
 *
 * @param descriptor - The descriptor.
 * @returns E.g. `string`, `list<integer>`, `Conn`, `B | string`.
 */
export function typeName(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case 'primitive':
      return descriptor.primitive;
    case 'temporal':
      return 'timestamp';
    case 'duration':
      return 'duration';
    case 'dynamic':
      return 'any';
    case 'optional':
      return `optional<${typeName(descriptor.inner)}>`;
    case 'sequence':
      return `list<${typeName(descriptor.item)}>`;
    case 'mapping':
      return `dict<${typeName(descriptor.value)}>`;
    case 'record':
    case 'enumeration':
      return descriptor.name;
    case 'union':
      return descriptor.variants.map(typeName).join(' | ');
    case 'open':
      return descriptor.base.name;
  }
}
