/**
 * Encoder: the inverse of the decoder, turning typed values back into a Value Tree.
 *
 * @packageDocumentation
 */

import { DEFAULT_DECODE_OPTIONS } from '../config/defaults.js';
import type { DecodeOptions } from '../config/types.js';
import {
  ConfigDecodeError,
  MalformedConfigException,
  MissingTypeException,
  TypeConfigException,
  formatPath,
  missingField,
  shapeMismatch,
} from '../diagnostics/errors.js';
import { buildDescriptor, typeName } from '../schema/builder.js';
import { defaultRegistry, type SubclassRegistry } from '../schema/registry.js';
import {
  TYPE_KEY,
  type CalendarDuration,
  type Infer,
  type OpenDescriptor,
  type PrimitiveKind,
  type RecordDescriptor,
  type TypeDescriptor,
  type TypeShape,
} from '../schema/types.js';
import { toValueTree } from '../value/convert.js';
import {
  NULL_NODE,
  booleanNode,
  mappingNode,
  numberNode,
  sequenceNode,
  stringNode,
  type ValueNode,
} from '../value/types.js';
import { fail, succeed, type DecodeResult } from './result.js';
import { formatDuration } from './scalars.js';

interface EncodeContext {
  readonly maxDepth: number;
  readonly registry: SubclassRegistry;
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'float';
  }
  if (value instanceof Date) {
    return 'Date';
  }
  return typeof value;
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isCalendarDuration(value: unknown): value is CalendarDuration {
  if (!isObject(value)) {
    return false;
  }
  return ['years', 'months', 'days', 'hours', 'minutes', 'seconds'].every(
    (unit) => typeof Reflect.get(value, unit) === 'number'
  );
}

function encodePrimitive(value: unknown, kind: PrimitiveKind, path: string): DecodeResult<ValueNode> {
  switch (kind) {
    case 'string':
      if (typeof value === 'string') {
        return succeed(stringNode(value));
      }
      break;
    case 'integer':
      if (typeof value === 'number' && Number.isInteger(value)) {
        return succeed(numberNode(value));
      }
      break;
    case 'float':
      if (typeof value === 'number') {
        return succeed(numberNode(value));
      }
      break;
    case 'boolean':
      if (typeof value === 'boolean') {
        return succeed(booleanNode(value));
      }
      break;
  }
  return fail(shapeMismatch(path, kind, describeValue(value)));
}

function encodeRecord(
  value: unknown,
  descriptor: RecordDescriptor,
  path: string,
  depth: number,
  ctx: EncodeContext
): DecodeResult<ValueNode> {
  if (!isObject(value)) {
    return fail(shapeMismatch(path, descriptor.name, describeValue(value)));
  }
  const entries: [string, ValueNode][] = [];
  for (const field of descriptor.fields) {
    const fieldValue: unknown = Reflect.get(value, field.name);
    if (fieldValue === undefined) {
      if (field.type.kind === 'optional') {
        // An absent key would decode to the default instead of undefined.
        if (field.default !== undefined) {
          entries.push([field.name, NULL_NODE]);
        }
        continue;
      }
      return fail(missingField(descriptor.name, path, field.name));
    }
    const result = encodeNode(fieldValue, field.type, `${path}.${field.name}`, depth + 1, ctx);
    if (!result.success) {
      return result;
    }
    entries.push([field.name, result.value]);
  }
  return succeed(mappingNode(entries));
}

function encodeOpen(
  value: unknown,
  descriptor: OpenDescriptor,
  path: string,
  depth: number,
  ctx: EncodeContext
): DecodeResult<ValueNode> {
  const causes: ConfigDecodeError[] = [];
  const ownKeys = isObject(value) ? Object.keys(value) : [];
  for (const shape of ctx.registry.candidates(descriptor.base)) {
    const candidate = buildDescriptor(shape);
    if (candidate.kind !== 'record') {
      continue;
    }
    const result = encodeRecord(value, candidate, path, depth, ctx);
    if (!result.success) {
      causes.push(result.error);
      continue;
    }
    const fields = new Set(candidate.fields.map((field) => field.name));
    const uncovered = ownKeys.filter((key) => !fields.has(key));
    if (uncovered.length > 0 || result.value.kind !== 'mapping') {
      continue;
    }
    return succeed(mappingNode([[TYPE_KEY, stringNode(candidate.name)], ...result.value.entries]));
  }
  return fail(
    new TypeConfigException(
      path,
      `no registered subtype of ${descriptor.base.name} can write the value at ${formatPath(path)}`,
      causes
    )
  );
}

function encodeNode(
  value: unknown,
  descriptor: TypeDescriptor,
  path: string,
  depth: number,
  ctx: EncodeContext
): DecodeResult<ValueNode> {
  if (depth > ctx.maxDepth) {
    return fail(
      new MalformedConfigException(
        `maximum nesting depth of ${String(ctx.maxDepth)} exceeded at ${formatPath(path)}`,
        path
      )
    );
  }
  switch (descriptor.kind) {
    case 'primitive':
      return encodePrimitive(value, descriptor.primitive, path);
    case 'temporal':
      if (value instanceof Date && !Number.isNaN(value.getTime())) {
        return succeed(stringNode(value.toISOString()));
      }
      return fail(shapeMismatch(path, 'timestamp', describeValue(value)));
    case 'duration': {
      if (!isCalendarDuration(value)) {
        return fail(shapeMismatch(path, 'duration', describeValue(value)));
      }
      const literal = formatDuration(value);
      return literal === undefined
        ? fail(
            new MalformedConfigException(
              `duration at ${formatPath(path)} has more than one non-zero component and cannot be written as a single literal`,
              path
            )
          )
        : succeed(stringNode(literal));
    }
    case 'optional':
      return value === undefined || value === null
        ? succeed(NULL_NODE)
        : encodeNode(value, descriptor.inner, path, depth, ctx);
    case 'sequence': {
      if (!Array.isArray(value)) {
        return fail(shapeMismatch(path, 'sequence', describeValue(value)));
      }
      const items: ValueNode[] = [];
      for (const [index, item] of value.entries()) {
        const result = encodeNode(item, descriptor.item, `${path}[${String(index)}]`, depth + 1, ctx);
        if (!result.success) {
          return result;
        }
        items.push(result.value);
      }
      return succeed(sequenceNode(items));
    }
    case 'mapping': {
      if (!isObject(value)) {
        return fail(shapeMismatch(path, 'mapping', describeValue(value)));
      }
      const entries: [string, ValueNode][] = [];
      for (const [key, child] of Object.entries(value)) {
        const result = encodeNode(child, descriptor.value, `${path}.${key}`, depth + 1, ctx);
        if (!result.success) {
          return result;
        }
        entries.push([key, result.value]);
      }
      return succeed(mappingNode(entries));
    }
    case 'record':
      return encodeRecord(value, descriptor, path, depth, ctx);
    case 'enumeration': {
      const member = descriptor.members.find((candidate) => candidate.value === value);
      return member === undefined
        ? fail(
            new MalformedConfigException(
              `value ${String(value)} is not a member of ${descriptor.name} at ${formatPath(path)}`,
              path
            )
          )
        : succeed(stringNode(member.name));
    }
    case 'union': {
      const causes: ConfigDecodeError[] = [];
      for (const variant of descriptor.variants) {
        const result = encodeNode(value, variant, path, depth, ctx);
        if (result.success) {
          return result;
        }
        causes.push(result.error);
      }
      const expected = descriptor.variants.map(typeName).join(' | ');
      return fail(
        new TypeConfigException(
          path,
          `expected one of ${expected} at ${formatPath(path)}, failed variants:`,
          causes
        )
      );
    }
    case 'open':
      return encodeOpen(value, descriptor, path, depth, ctx);
    case 'dynamic':
      try {
        return succeed(toValueTree(value, path));
      } catch (error) {
        if (error instanceof ConfigDecodeError) {
          return fail(error);
        }
        throw error;
      }
  }
}

/**
 * Encodes a typed value into a Value Tree.
 *
 * Open-polymorphic values carry a `_type` key naming the first registered
 * candidate that can write every property of the value, so decoding the tree
 * again never hits an ambiguity.
 *
 * @param value - Value of the shape's output type.
 * @param shape - The shape the value was declared with.
 * @param options - `registry` and `maxDepth` apply; other options are ignored.
 * @returns The tree or a diagnostic.
 */
export function encode<S extends TypeShape>(
  value: Infer<S>,
  shape: S,
  options: DecodeOptions = {}
): DecodeResult<ValueNode> {
  const ctx: EncodeContext = {
    maxDepth: options.maxDepth ?? DEFAULT_DECODE_OPTIONS.maxDepth,
    registry: options.registry ?? defaultRegistry,
  };
  try {
    return encodeNode(value, buildDescriptor(shape), '', 0, ctx);
  } catch (error) {
    if (error instanceof MissingTypeException) {
      return fail(error);
    }
    throw error;
  }
}
