/**
 * Type shapes and type descriptors.
 *
 * A {@link TypeShape} is what the host program declares (through the `t`
 * builders). It carries a phantom output type so that `Infer<typeof shape>`
 * names the decoded TypeScript type, and it may be incomplete: `t.list()` with no
 * item type is a valid shape but can never be built.
 *
 * A {@link TypeDescriptor} is the validated, frozen form produced by
 * `buildDescriptor`. The decoder only ever walks descriptors.
 *
 * @packageDocumentation
 */

import type { DynamicValue } from '../value/types.js';

/**
 * Primitive scalar kinds.
 */
export type PrimitiveKind = 'boolean' | 'integer' | 'float' | 'string';

/**
 * A relative calendar span. Weeks are folded into days.
 */
export interface CalendarDuration {
  readonly years: number;
  readonly months: number;
  readonly days: number;
  readonly hours: number;
  readonly minutes: number;
  readonly seconds: number;
}

/**
 * Identity of an open polymorphic base. Concrete candidates are registered
 * against it in a {@link SubclassRegistry}; identity is by reference.
 *
 * @template T - Common output type of the candidates.
 */
export interface OpenBase<T> {
  /** Display name used in diagnostics. */
  readonly name: string;
  readonly __output?: T;
}

interface ShapeOf<K extends string, T> {
  readonly kind: K;
  /** Phantom output type; never set at runtime. */
  readonly __output?: T;
}

export interface PrimitiveShape<T> extends ShapeOf<'primitive', T> {
  readonly primitive: PrimitiveKind;
}

export type TemporalShape = ShapeOf<'temporal', Date>;

export type DurationShape = ShapeOf<'duration', CalendarDuration>;

export interface OptionalShape<T> extends ShapeOf<'optional', T | undefined> {
  readonly inner: TypeShape;
}

export interface SequenceShape<T> extends ShapeOf<'sequence', T[]> {
  /** Item type; absent for a bare, unbuildable list. */
  readonly item?: TypeShape;
}

export interface MappingShape<T> extends ShapeOf<'mapping', Record<string, T>> {
  /** Value type; absent for a bare, unbuildable dict. */
  readonly value?: TypeShape;
}

/**
 * Field declared with a literal default.
 */
export interface DefaultedField<S extends TypeShape> {
  readonly type: S;
  readonly default: Infer<S>;
}

/**
 * Field declared with a default producer, invoked on every decode where the key
 * is absent.
 */
export interface FactoryField<S extends TypeShape> {
  readonly type: S;
  readonly defaultFactory: () => Infer<S>;
}

/**
 * What a record field may be declared as.
 */
export type FieldInput = TypeShape | DefaultedField<TypeShape> | FactoryField<TypeShape>;

export interface RecordShape<T> extends ShapeOf<'record', T> {
  readonly name: string;
  readonly fields: Readonly<Record<string, FieldInput>>;
  /** Builds the output from decoded field values; plain object when absent. */
  construct?(values: Record<string, unknown>): T;
}

/**
 * Enumeration member. `value` equals `name` for name-only enumerations.
 */
export interface EnumMember {
  readonly name: string;
  readonly value: string | number | boolean;
}

export interface EnumShape<T> extends ShapeOf<'enumeration', T> {
  readonly name: string;
  readonly members: readonly EnumMember[];
}

export interface UnionShape<T> extends ShapeOf<'union', T> {
  readonly variants: readonly TypeShape[];
}

export interface OpenShape<T> extends ShapeOf<'open', T> {
  readonly base: OpenBase<T>;
}

export type DynamicShape = ShapeOf<'dynamic', DynamicValue>;

/**
 * Deferred reference, used to declare recursive records.
 */
export interface LazyShape<T> extends ShapeOf<'lazy', T> {
  readonly resolve: () => TypeShape;
}

/**
 * Any declared shape, with its output type erased.
 */
export type TypeShape =
  | PrimitiveShape<unknown>
  | TemporalShape
  | DurationShape
  | OptionalShape<unknown>
  | SequenceShape<unknown>
  | MappingShape<unknown>
  | RecordShape<unknown>
  | EnumShape<unknown>
  | UnionShape<unknown>
  | OpenShape<unknown>
  | DynamicShape
  | LazyShape<unknown>;

/**
 * Output type of a shape.
 */
export type Infer<S> = S extends { readonly __output?: infer T } ? T : never;

type Simplify<T> = { [K in keyof T]: T[K] } & {};

type FieldShape<F> = F extends { readonly type: infer S } ? S : F;

type OptionalFieldKeys<F> = {
  [K in keyof F]: F[K] extends OptionalShape<unknown> ? K : never;
}[keyof F];

/**
 * Plain-object output of a record's fields. Optional fields without a default
 * become optional properties; fields with defaults are always present.
 */
export type InferFields<F> = Simplify<
  {
    -readonly [K in Exclude<keyof F, OptionalFieldKeys<F>>]: Infer<FieldShape<F[K]>>;
  } & {
    -readonly [K in OptionalFieldKeys<F>]?: Infer<FieldShape<F[K]>>;
  }
>;

// ---------------------------------------------------------------------------
// Descriptors
// ---------------------------------------------------------------------------

export interface PrimitiveDescriptor {
  readonly kind: 'primitive';
  readonly primitive: PrimitiveKind;
}

export interface TemporalDescriptor {
  readonly kind: 'temporal';
}

export interface DurationDescriptor {
  readonly kind: 'duration';
}

export interface OptionalDescriptor {
  readonly kind: 'optional';
  readonly inner: TypeDescriptor;
}

export interface SequenceDescriptor {
  readonly kind: 'sequence';
  readonly item: TypeDescriptor;
}

export interface MappingDescriptor {
  readonly kind: 'mapping';
  readonly value: TypeDescriptor;
}

/**
 * Default attached to a record field.
 */
export type FieldDefault =
  | { readonly kind: 'value'; readonly value: unknown }
  | { readonly kind: 'factory'; readonly produce: () => unknown };

export interface FieldDescriptor {
  readonly name: string;
  readonly type: TypeDescriptor;
  /** False when the type is optional or a default is declared. */
  readonly required: boolean;
  readonly default?: FieldDefault;
}

export interface RecordDescriptor {
  readonly kind: 'record';
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
  construct?(values: Record<string, unknown>): unknown;
}

export interface EnumDescriptor {
  readonly kind: 'enumeration';
  readonly name: string;
  readonly members: readonly EnumMember[];
}

export interface UnionDescriptor {
  readonly kind: 'union';
  readonly variants: readonly TypeDescriptor[];
}

export interface OpenDescriptor {
  readonly kind: 'open';
  readonly base: OpenBase<unknown>;
}

export interface DynamicDescriptor {
  readonly kind: 'dynamic';
}

/**
 * Built decode target. Recursive types are represented by record descriptors
 * that reference themselves, so there is no lazy variant here.
 */
export type TypeDescriptor =
  | PrimitiveDescriptor
  | TemporalDescriptor
  | DurationDescriptor
  | OptionalDescriptor
  | SequenceDescriptor
  | MappingDescriptor
  | RecordDescriptor
  | EnumDescriptor
  | UnionDescriptor
  | OpenDescriptor
  | DynamicDescriptor;

/**
 * Reserved mapping key naming the concrete candidate of an open base.
 */
export const TYPE_KEY = '_type';
