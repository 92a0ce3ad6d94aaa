/**
 * Type-directed decoder: walks a Value Tree together with a type descriptor.
 *
 * Decoding is synchronous and read-only. Every failure comes back as a
 * {@link DecodeResult} holding one diagnostic with the full path of the
 * failing node.
 *
 * @packageDocumentation
 */

import { DEFAULT_DECODE_OPTIONS } from '../config/defaults.js';
import type { DecodeOptions } from '../config/types.js';
import {
  AmbiguousSubclassException,
  MalformedConfigException,
  MissingTypeException,
  TypeConfigException,
  UnexpectedKeysException,
  formatPath,
  missingField,
  shapeMismatch,
  type ConfigDecodeError,
} from '../diagnostics/errors.js';
import { buildDescriptor, typeName } from '../schema/builder.js';
import { defaultRegistry, type SubclassRegistry } from '../schema/registry.js';
import {
  TYPE_KEY,
  type FieldDescriptor,
  type Infer,
  type OpenDescriptor,
  type RecordDescriptor,
  type TypeDescriptor,
  type TypeShape,
  type UnionDescriptor,
} from '../schema/types.js';
import { fromValueTree } from '../value/convert.js';
import { describeNode, withoutKey, type MappingNode, type ValueNode } from '../value/types.js';
import { fail, succeed, type DecodeResult } from './result.js';
import {
  decodeDuration,
  decodeEnumeration,
  decodePrimitive,
  decodeTimestamp,
} from './scalars.js';

interface DecodeContext {
  readonly strictUnexpectedKeys: boolean;
  readonly maxDepth: number;
  readonly registry: SubclassRegistry;
}

function contextFrom(options: DecodeOptions): DecodeContext {
  const maxDepth = options.maxDepth ?? DEFAULT_DECODE_OPTIONS.maxDepth;
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    throw new RangeError(`maxDepth must be a positive integer, got ${String(maxDepth)}`);
  }
  return {
    strictUnexpectedKeys: options.strictUnexpectedKeys ?? DEFAULT_DECODE_OPTIONS.strictUnexpectedKeys,
    maxDepth,
    registry: options.registry ?? defaultRegistry,
  };
}

function decodeSequence(
  node: ValueNode,
  item: TypeDescriptor,
  path: string,
  depth: number,
  ctx: DecodeContext
): DecodeResult<unknown[]> {
  if (node.kind !== 'sequence') {
    return fail(shapeMismatch(path, 'sequence', describeNode(node)));
  }
  const values: unknown[] = [];
  for (const [index, child] of node.items.entries()) {
    const result = decodeNode(child, item, `${path}[${String(index)}]`, depth + 1, ctx);
    if (!result.success) {
      return result;
    }
    values.push(result.value);
  }
  return succeed(values);
}

function decodeMapping(
  node: ValueNode,
  value: TypeDescriptor,
  path: string,
  depth: number,
  ctx: DecodeContext
): DecodeResult<Record<string, unknown>> {
  if (node.kind !== 'mapping') {
    return fail(shapeMismatch(path, 'mapping', describeNode(node)));
  }
  const entries: [string, unknown][] = [];
  for (const [key, child] of node.entries) {
    const result = decodeNode(child, value, `${path}.${key}`, depth + 1, ctx);
    if (!result.success) {
      return result;
    }
    entries.push([key, result.value]);
  }
  return succeed(Object.fromEntries(entries));
}

function fieldFallback(field: FieldDescriptor): { readonly value: unknown } | undefined {
  if (field.default === undefined) {
    return undefined;
  }
  return {
    value:
      field.default.kind === 'value' ? structuredClone(field.default.value) : field.default.produce(),
  };
}

function construct(
  descriptor: RecordDescriptor,
  values: Record<string, unknown>,
  path: string
): DecodeResult<unknown> {
  if (descriptor.construct === undefined) {
    return succeed(values);
  }
  try {
    return succeed(descriptor.construct(values));
  } catch (error) {
    if (!(error instanceof Error)) {
      throw error;
    }
    return fail(
      new MalformedConfigException(
        `cannot construct ${descriptor.name} at ${formatPath(path)}: ${error.message}`,
        path
      )
    );
  }
}

function decodeRecord(
  node: ValueNode,
  descriptor: RecordDescriptor,
  path: string,
  depth: number,
  ctx: DecodeContext
): DecodeResult<unknown> {
  if (node.kind !== 'mapping') {
    return fail(shapeMismatch(path, descriptor.name, describeNode(node)));
  }
  const entries: [string, unknown][] = [];
  for (const field of descriptor.fields) {
    const child = node.entries.get(field.name);
    if (child === undefined) {
      const fallback = fieldFallback(field);
      if (fallback !== undefined) {
        entries.push([field.name, fallback.value]);
      } else if (field.required) {
        return fail(missingField(descriptor.name, path, field.name));
      }
      continue;
    }
    const result = decodeNode(child, field.type, `${path}.${field.name}`, depth + 1, ctx);
    if (!result.success) {
      return result;
    }
    if (result.value !== undefined || field.default !== undefined) {
      entries.push([field.name, result.value]);
    }
  }

  if (ctx.strictUnexpectedKeys) {
    const declared = new Set(descriptor.fields.map((field) => field.name));
    const leftover = [...node.entries.keys()].filter((key) => !declared.has(key));
    if (leftover.length > 0) {
      return fail(new UnexpectedKeysException(path, descriptor.name, leftover));
    }
  }
  return construct(descriptor, Object.fromEntries(entries), path);
}

function decodeUnion(
  node: ValueNode,
  descriptor: UnionDescriptor,
  path: string,
  depth: number,
  ctx: DecodeContext
): DecodeResult<unknown> {
  const causes: ConfigDecodeError[] = [];
  for (const variant of descriptor.variants) {
    const result = decodeNode(node, variant, path, depth, ctx);
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

function subtypesHeader(baseName: string, path: string): string {
  return `expected type ${baseName} at ${formatPath(path)}, failed subtypes:`;
}

function decodeTagged(
  node: MappingNode,
  tag: ValueNode,
  descriptor: OpenDescriptor,
  candidates: readonly RecordDescriptor[],
  path: string,
  depth: number,
  ctx: DecodeContext
): DecodeResult<unknown> {
  if (tag.kind !== 'string') {
    return fail(shapeMismatch(`${path}.${TYPE_KEY}`, 'string', describeNode(tag)));
  }
  const chosen = candidates.find((candidate) => candidate.name === tag.value);
  if (chosen === undefined) {
    const names = candidates.map((candidate) => candidate.name).join(', ');
    return fail(
      new TypeConfigException(
        path,
        `unknown subtype ${JSON.stringify(tag.value)} of ${descriptor.base.name} at ${formatPath(path)}, registered subtypes: ${names}`
      )
    );
  }
  const result = decodeRecord(withoutKey(node, TYPE_KEY), chosen, path, depth, ctx);
  if (result.success) {
    return result;
  }
  return fail(new TypeConfigException(path, subtypesHeader(descriptor.base.name, path), [result.error]));
}

function decodeOpen(
  node: ValueNode,
  descriptor: OpenDescriptor,
  path: string,
  depth: number,
  ctx: DecodeContext
): DecodeResult<unknown> {
  const shapes = ctx.registry.candidates(descriptor.base);
  if (shapes.length === 0) {
    return fail(
      new TypeConfigException(
        path,
        `no registered subtypes of ${descriptor.base.name} at ${formatPath(path)}`
      )
    );
  }
  const candidates: RecordDescriptor[] = [];
  for (const shape of shapes) {
    const built = buildDescriptor(shape);
    if (built.kind === 'record') {
      candidates.push(built);
    }
  }

  if (node.kind === 'mapping') {
    const tag = node.entries.get(TYPE_KEY);
    if (tag !== undefined) {
      return decodeTagged(node, tag, descriptor, candidates, path, depth, ctx);
    }
  }

  const matches: { readonly name: string; readonly value: unknown }[] = [];
  const causes: ConfigDecodeError[] = [];
  for (const candidate of candidates) {
    const result = decodeRecord(node, candidate, path, depth, ctx);
    if (result.success) {
      matches.push({ name: candidate.name, value: result.value });
    } else {
      causes.push(result.error);
    }
  }

  const [only, ...rest] = matches;
  if (only === undefined) {
    return fail(new TypeConfigException(path, subtypesHeader(descriptor.base.name, path), causes));
  }
  if (rest.length > 0) {
    return fail(
      new AmbiguousSubclassException(
        path,
        descriptor.base.name,
        matches.map((match) => match.name)
      )
    );
  }
  return succeed(only.value);
}

function decodeNode(
  node: ValueNode,
  descriptor: TypeDescriptor,
  path: string,
  depth: number,
  ctx: DecodeContext
): DecodeResult<unknown> {
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
      return decodePrimitive(node, descriptor.primitive, path);
    case 'temporal':
      return decodeTimestamp(node, path);
    case 'duration':
      return decodeDuration(node, path);
    case 'optional':
      return node.kind === 'null' ? succeed(undefined) : decodeNode(node, descriptor.inner, path, depth, ctx);
    case 'sequence':
      return decodeSequence(node, descriptor.item, path, depth, ctx);
    case 'mapping':
      return decodeMapping(node, descriptor.value, path, depth, ctx);
    case 'record':
      return decodeRecord(node, descriptor, path, depth, ctx);
    case 'enumeration':
      return decodeEnumeration(node, descriptor, path);
    case 'union':
      return decodeUnion(node, descriptor, path, depth, ctx);
    case 'open':
      return decodeOpen(node, descriptor, path, depth, ctx);
    case 'dynamic':
      return succeed(fromValueTree(node));
  }
}

/**
 * Decodes a tree against an already-built descriptor.
 *
 * @param root - Root of the Value Tree.
 * @param descriptor - Target descriptor.
 * @param options - Decode options; unset values take the defaults.
 * @returns The decoded value or a diagnostic.
 * @throws MissingTypeException if a registered candidate of an open base cannot be built.
 * @throws RangeError if `maxDepth` is not a positive integer.
 */
export function decodeDescriptor(
  root: ValueNode,
  descriptor: TypeDescriptor,
  options: DecodeOptions = {}
): DecodeResult<unknown> {
  return decodeNode(root, descriptor, '', 0, contextFrom(options));
}

/**
 * Decodes a tree against a declared shape.
 *
 * Schema errors (`MissingTypeException`) found while building descriptors are
 * returned as the failure, so a caller handles one result either way.
 *
 * @param root - Root of the Value Tree.
 * @param shape - Target shape.
 * @param options - Decode options; unset values take the defaults.
 * @returns The typed value or a diagnostic.
 * @throws RangeError if `maxDepth` is not a positive integer.
 *
 * @example
 * ```typescript
 * const result = decode(toValueTree({ host: 'localhost', port: 5432 }), Conn);
 * if (result.success) {
 *   console.log(result.value.port);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function decode<S extends TypeShape>(
  root: ValueNode,
  shape: S,
  options: DecodeOptions = {}
): DecodeResult<Infer<S>> {
  let result: DecodeResult<unknown>;
  try {
    result = decodeDescriptor(root, buildDescriptor(shape), options);
  } catch (error) {
    if (error instanceof MissingTypeException) {
      return fail(error);
    }
    throw error;
  }
  if (!result.success) {
    return result;
  }
  // The descriptor was built from `shape`, so the value has its output type.
  return succeed(result.value as Infer<S>);
}

/**
 * Like {@link decode}, but throws the diagnostic.
 *
 * @param root - Root of the Value Tree.
 * @param shape - Target shape.
 * @param options - Decode options.
 * @returns The typed value.
 * @throws ConfigDecodeError when decoding fails.
 */
export function decodeOrThrow<S extends TypeShape>(
  root: ValueNode,
  shape: S,
  options: DecodeOptions = {}
): Infer<S> {
  const result = decode(root, shape, options);
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}
