/**
 * Result type shared by the decoder and encoder.
 *
 * @packageDocumentation
 */

import type { ConfigDecodeError } from '../diagnostics/errors.js';

/**
 * Either a decoded value or the diagnostic explaining why decoding failed.
 */
export type DecodeResult<T> =
  | { readonly success: true; readonly value: T }
  | { readonly success: false; readonly error: ConfigDecodeError };

/**
 * Creates a successful result.
 *
 * @param value - The decoded value.
 * @returns A successful DecodeResult.
 */
export function succeed<T>(value: T): Extract<DecodeResult<T>, { success: true }> {
  return { success: true, value };
}

/**
 * Creates a failure result.
 *
 * @param error - The diagnostic.
 * @returns A failed DecodeResult.
 */
export function fail(error: ConfigDecodeError): Extract<DecodeResult<never>, { success: false }> {
  return { success: false, error };
}
