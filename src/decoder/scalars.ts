/**
 * Scalar coercions: primitives, timestamps, calendar durations and enumerations.
 *
 * @packageDocumentation
 */

import { ParseException, shapeMismatch } from '../diagnostics/errors.js';
import type { CalendarDuration, EnumDescriptor, PrimitiveKind } from '../schema/types.js';
import { describeNode, type ValueNode } from '../value/types.js';
import { fail, succeed, type DecodeResult } from './result.js';

/**
 * Decodes a primitive scalar.
 *
 * Integers widen to `float`; the reverse is a shape mismatch. Booleans also
 * accept the strings `true` and `false` in any letter case.
 *
 * @param node - Node to decode.
 * @param kind - Target primitive kind.
 * @param path - Node path.
 * @returns The scalar or a diagnostic.
 */
export function decodePrimitive(
  node: ValueNode,
  kind: PrimitiveKind,
  path: string
): DecodeResult<string | number | boolean> {
  switch (kind) {
    case 'string':
      return node.kind === 'string' ? succeed(node.value) : fail(shapeMismatch(path, kind, describeNode(node)));
    case 'float':
      return node.kind === 'number' ? succeed(node.value) : fail(shapeMismatch(path, kind, describeNode(node)));
    case 'integer':
      return node.kind === 'number' && Number.isInteger(node.value)
        ? succeed(node.value)
        : fail(shapeMismatch(path, kind, describeNode(node)));
    case 'boolean':
      if (node.kind === 'boolean') {
        return succeed(node.value);
      }
      if (node.kind === 'string') {
        const lowered = node.value.toLowerCase();
        if (lowered === 'true' || lowered === 'false') {
          return succeed(lowered === 'true');
        }
        return fail(new ParseException(path, node.value, 'boolean'));
      }
      return fail(shapeMismatch(path, kind, describeNode(node)));
  }
}

const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}(?::?\d{2})?)$/i;

function parseOffsetMinutes(offset: string): number | undefined {
  if (offset.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = digits.length > 2 ? Number(digits.slice(2)) : 0;
  if (hours > 23 || minutes > 59) {
    return undefined;
  }
  return sign * (hours * 60 + minutes);
}

/**
 * Parses an ISO-8601 timestamp that carries an explicit offset.
 *
 * @param text - The literal.
 * @returns The absolute instant, or `undefined` when the literal is malformed,
 * has no offset, or names an impossible date or time.
 */
export function parseTimestamp(text: string): Date | undefined {
  const match = TIMESTAMP_PATTERN.exec(text.trim());
  if (match === null) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second, fraction, offset] = match;
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hour === undefined ||
    minute === undefined ||
    offset === undefined
  ) {
    return undefined;
  }
  const y = Number(year);
  const mo = Number(month);
  const d = Number(day);
  const h = Number(hour);
  const mi = Number(minute);
  const s = second === undefined ? 0 : Number(second);
  const ms = fraction === undefined ? 0 : Number(fraction.padEnd(3, '0').slice(0, 3));
  const offsetMinutes = parseOffsetMinutes(offset);
  if (offsetMinutes === undefined || mo < 1 || mo > 12 || h > 23 || mi > 59 || s > 59) {
    return undefined;
  }
  // setUTCFullYear keeps years below 100 literal; Date.UTC would map them to 19xx.
  const local = new Date(0);
  local.setUTCFullYear(y, mo - 1, d);
  local.setUTCHours(h, mi, s, ms);
  if (local.getUTCFullYear() !== y || local.getUTCMonth() !== mo - 1 || local.getUTCDate() !== d) {
    return undefined;
  }
  return new Date(local.getTime() - offsetMinutes * 60_000);
}

/**
 * Decodes a timestamp string into a `Date`.
 *
 * @param node - Node to decode.
 * @param path - Node path.
 * @returns The instant or a diagnostic.
 */
export function decodeTimestamp(node: ValueNode, path: string): DecodeResult<Date> {
  if (node.kind !== 'string') {
    return fail(shapeMismatch(path, 'timestamp', describeNode(node)));
  }
  const parsed = parseTimestamp(node.value);
  return parsed === undefined
    ? fail(new ParseException(path, node.value, 'ISO-8601 timestamp with offset'))
    : succeed(parsed);
}

type DurationUnit = keyof CalendarDuration;

const DURATION_UNITS: ReadonlyMap<string, { unit: DurationUnit; factor: number }> = new Map<string, { unit: DurationUnit; factor: number }>([
  ...['s', 'sec', 'secs', 'second', 'seconds'].map((alias) => [alias, { unit: 'seconds', factor: 1 }] as const),
  ...['m', 'min', 'mins', 'minute', 'minutes'].map((alias) => [alias, { unit: 'minutes', factor: 1 }] as const),
  ...['h', 'hr', 'hrs', 'hour', 'hours'].map((alias) => [alias, { unit: 'hours', factor: 1 }] as const),
  ...['d', 'day', 'days'].map((alias) => [alias, { unit: 'days', factor: 1 }] as const),
  ...['w', 'week', 'weeks'].map((alias) => [alias, { unit: 'days', factor: 7 }] as const),
  ...['mo', 'month', 'months'].map((alias) => [alias, { unit: 'months', factor: 1 }] as const),
  ...['y', 'yr', 'yrs', 'year', 'years'].map((alias) => [alias, { unit: 'years', factor: 1 }] as const),
]);

const DURATION_PATTERN = /^\s*(-?\d+)\s*([a-zA-Z]+)\s*$/;

const ZERO_DURATION: CalendarDuration = Object.freeze({
  years: 0,
  months: 0,
  days: 0,
  hours: 0,
  minutes: 0,
  seconds: 0,
});

/**
 * Parses a compact duration literal such as `2d`, `3 hours` or `1mo`.
 *
 * @param text - The literal.
 * @returns The duration, or `undefined` for an unknown unit or a non-integer magnitude.
 */
export function parseDuration(text: string): CalendarDuration | undefined {
  const match = DURATION_PATTERN.exec(text);
  const magnitude = match?.[1];
  const alias = match?.[2];
  if (magnitude === undefined || alias === undefined) {
    return undefined;
  }
  const unit = DURATION_UNITS.get(alias.toLowerCase());
  if (unit === undefined) {
    return undefined;
  }
  return Object.freeze({ ...ZERO_DURATION, [unit.unit]: Number(magnitude) * unit.factor });
}

const DURATION_SUFFIXES: readonly (readonly [DurationUnit, string])[] = [
  ['years', 'y'],
  ['months', 'mo'],
  ['days', 'd'],
  ['hours', 'h'],
  ['minutes', 'm'],
  ['seconds', 's'],
];

/**
 * Formats a duration back into a compact literal.
 *
 * @param duration - Duration with at most one non-zero component.
 * @returns The literal (`0s` for an empty duration), or `undefined` when more
 * than one component is set.
 */
export function formatDuration(duration: CalendarDuration): string | undefined {
  const set = DURATION_SUFFIXES.filter(([unit]) => duration[unit] !== 0);
  if (set.length === 0) {
    return '0s';
  }
  const only = set[0];
  if (set.length > 1 || only === undefined) {
    return undefined;
  }
  const [unit, suffix] = only;
  return `${String(duration[unit])}${suffix}`;
}

/**
 * Decodes a calendar duration literal.
 *
 * @param node - Node to decode.
 * @param path - Node path.
 * @returns The duration or a diagnostic.
 */
export function decodeDuration(node: ValueNode, path: string): DecodeResult<CalendarDuration> {
  if (node.kind !== 'string') {
    return fail(shapeMismatch(path, 'duration', describeNode(node)));
  }
  const parsed = parseDuration(node.value);
  return parsed === undefined
    ? fail(new ParseException(path, node.value, 'duration'))
    : succeed(parsed);
}

/**
 * Decodes an enumeration member: by name first, then by raw value.
 *
 * A raw value matches a node of the same scalar kind holding the same value,
 * or a string node holding its textual form (so `"2"` matches `2`).
 *
 * @param node - Node to decode.
 * @param descriptor - Enumeration descriptor.
 * @param path - Node path.
 * @returns The member's value or a diagnostic listing the valid names.
 */
export function decodeEnumeration(
  node: ValueNode,
  descriptor: EnumDescriptor,
  path: string
): DecodeResult<string | number | boolean> {
  if (node.kind !== 'string' && node.kind !== 'number' && node.kind !== 'boolean') {
    return fail(shapeMismatch(path, descriptor.name, describeNode(node)));
  }
  const scalar = node.value;
  if (typeof scalar === 'string') {
    const byName = descriptor.members.find((member) => member.name === scalar);
    if (byName !== undefined) {
      return succeed(byName.value);
    }
  }
  const byValue = descriptor.members.find(
    (member) =>
      member.value === scalar || (typeof scalar === 'string' && String(member.value) === scalar)
  );
  if (byValue !== undefined) {
    return succeed(byValue.value);
  }
  return fail(
    new ParseException(
      path,
      String(scalar),
      descriptor.name,
      `expected one of ${descriptor.members.map((member) => member.name).join(', ')}`
    )
  );
}
