/**
 * Shape builders, exported as the `t` namespace.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { t, type Infer } from 'typedconf';
 *
 * const Conn = t.record('Conn', {
 *   host: t.string(),
 *   port: t.integer(),
 *   ssl: t.withFactory(t.optional(t.dict(t.string())), () => ({})),
 * });
 *
 * type Conn = Infer<typeof Conn>;
 * ```
 */

import { defaultRegistry } from './registry.js';
import type {
  DefaultedField,
  DurationShape,
  DynamicShape,
  EnumMember,
  EnumShape,
  FactoryField,
  FieldInput,
  Infer,
  InferFields,
  LazyShape,
  MappingShape,
  OpenBase,
  OpenShape,
  OptionalShape,
  PrimitiveShape,
  RecordShape,
  SequenceShape,
  TemporalShape,
  TypeShape,
  UnionShape,
} from './types.js';

export function string(): PrimitiveShape<string> {
  return { kind: 'primitive', primitive: 'string' };
}

export function integer(): PrimitiveShape<number> {
  return { kind: 'primitive', primitive: 'integer' };
}

/** Accepts integer literals as well. */
export function float(): PrimitiveShape<number> {
  return { kind: 'primitive', primitive: 'float' };
}

export function boolean(): PrimitiveShape<boolean> {
  return { kind: 'primitive', primitive: 'boolean' };
}

/** ISO-8601 timestamp with an explicit offset, decoded to a `Date`. */
export function timestamp(): TemporalShape {
  return { kind: 'temporal' };
}

/** Compact calendar span such as `2d` or `3h`. */
export function duration(): DurationShape {
  return { kind: 'duration' };
}

export function optional<S extends TypeShape>(inner: S): OptionalShape<Infer<S>> {
  return { kind: 'optional', inner };
}

/**
 * Sequence of `item`. Calling it without an item type declares a bare list,
 * which fails to build with `MissingTypeException`.
 */
export function list(): SequenceShape<unknown>;
export function list<S extends TypeShape>(item: S): SequenceShape<Infer<S>>;
export function list(item?: TypeShape): SequenceShape<unknown> {
  return item === undefined ? { kind: 'sequence' } : { kind: 'sequence', item };
}

/**
 * String-keyed mapping of `value`. Like {@link list}, a bare dict cannot be built.
 */
export function dict(): MappingShape<unknown>;
export function dict<S extends TypeShape>(value: S): MappingShape<Infer<S>>;
export function dict(value?: TypeShape): MappingShape<unknown> {
  return value === undefined ? { kind: 'mapping' } : { kind: 'mapping', value };
}

/**
 * Options accepted by {@link record}.
 */
export interface RecordOptions<V, R> {
  /** Builds the output (e.g. a class instance) from the decoded field values. */
  readonly construct?: (values: V) => R;
  /** Registers the record as a candidate of this open base. */
  readonly extends?: OpenBase<unknown>;
}

/**
 * Declares a record type.
 *
 * When `extends` is given, the record is registered in the default registry as
 * a candidate of that base at declaration time.
 *
 * @param name - Type name, also the `_type` tag value for open bases.
 * @param fields - Field shapes, in declaration order.
 * @param options - Constructor and base registration.
 * @returns The record shape.
 */
export function record<F extends Readonly<Record<string, FieldInput>>, R = InferFields<F>>(
  name: string,
  fields: F,
  options: RecordOptions<InferFields<F>, R> = {}
): RecordShape<R> {
  const shape: RecordShape<R> =
    options.construct === undefined
      ? { kind: 'record', name, fields }
      : { kind: 'record', name, fields, construct: options.construct };
  if (options.extends !== undefined) {
    defaultRegistry.register(options.extends, shape);
  }
  return shape;
}

/** A field with a literal default. */
export function withDefault<S extends TypeShape>(type: S, value: Infer<S>): DefaultedField<S> {
  return { type, default: value };
}

/** A field whose default is produced on each decode that needs it. */
export function withFactory<S extends TypeShape>(
  type: S,
  produce: () => Infer<S>
): FactoryField<S> {
  return { type, defaultFactory: produce };
}

function isReverseMapping(key: string): boolean {
  return String(Number(key)) === key;
}

/**
 * Declares an enumeration.
 *
 * Pass a list of names (`['fast', 'slow'] as const`) for a name-only
 * enumeration, or an object / TypeScript `enum` for a value-backed one. Numeric
 * `enum` reverse mappings are skipped. The decoded value is the member's value.
 */
export function enumeration<M extends readonly string[]>(
  name: string,
  members: M
): EnumShape<M[number]>;
export function enumeration<E extends Readonly<Record<string, string | number | boolean>>>(
  name: string,
  members: E
): EnumShape<E[keyof E]>;
export function enumeration(
  name: string,
  members: readonly string[] | Readonly<Record<string, string | number | boolean>>
): EnumShape<unknown> {
  let list: EnumMember[];
  if (Array.isArray(members)) {
    list = members.map((member: string) => ({ name: member, value: member }));
  } else {
    list = Object.entries(members)
      .filter(([key]) => !isReverseMapping(key))
      .map(([key, value]) => ({ name: key, value }));
  }
  return { kind: 'enumeration', name, members: Object.freeze(list) };
}

/**
 * Closed union. Variants are tried in order and the first success wins.
 */
export function union<V extends readonly TypeShape[]>(...variants: V): UnionShape<Infer<V[number]>> {
  return { kind: 'union', variants };
}

/**
 * Open polymorphic target: candidates come from the registry at decode time.
 */
export function open<T>(base: OpenBase<T>): OpenShape<T> {
  return { kind: 'open', base };
}

/** Accepts any tree and returns it as plain data. */
export function dynamic(): DynamicShape {
  return { kind: 'dynamic' };
}

/**
 * Deferred reference for recursive types. The output type must be named
 * explicitly.
 *
 * @example
 * ```typescript
 * interface Node { name: string; children: Node[] }
 * const Node: RecordShape<Node> = t.record('Node', {
 *   name: t.string(),
 *   children: t.withFactory(t.list(t.lazy<Node>(() => Node)), () => []),
 * });
 * ```
 */
export function lazy<T>(resolve: () => TypeShape): LazyShape<T> {
  return { kind: 'lazy', resolve };
}
