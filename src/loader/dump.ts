/**
 * Serializes typed values back into JSON or YAML text.
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import { encode } from '../decoder/encode.js';
import type { DecodeOptions } from '../config/types.js';
import type { Infer, TypeShape } from '../schema/types.js';
import { toJsonValue } from '../value/convert.js';

/**
 * Formats {@link dumps} can write. TOML has no `null`, so it is read-only here.
 */
export type DumpFormat = 'json' | 'yaml';

/**
 * Encodes a value against its shape and serializes it.
 *
 * @param value - Value of the shape's output type.
 * @param shape - The value's shape.
 * @param format - Output format (default `json`, indented by two spaces).
 * @param options - `registry` for open-polymorphic values.
 * @returns The serialized text.
 * @throws ConfigDecodeError if the value does not fit the shape.
 *
 * @example
 * ```typescript
 * dumps({ host: 'db', port: 5432 }, Conn, 'yaml');
 * // 'host: db\nport: 5432\n'
 * ```
 */
export function dumps<S extends TypeShape>(
  value: Infer<S>,
  shape: S,
  format: DumpFormat = 'json',
  options: DecodeOptions = {}
): string {
  const result = encode(value, shape, options);
  if (!result.success) {
    throw result.error;
  }
  const data = toJsonValue(result.value);
  switch (format) {
    case 'json':
      return JSON.stringify(data, null, 2);
    case 'yaml':
      return yaml.dump(data);
  }
}
