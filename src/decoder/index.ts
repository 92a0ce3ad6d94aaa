/**
 * Decoder module: decode, encode and the scalar coercions they share.
 *
 * @packageDocumentation
 */

export { decode, decodeDescriptor, decodeOrThrow } from './decode.js';
export { encode } from './encode.js';
export { fail, succeed } from './result.js';
export type { DecodeResult } from './result.js';
export { formatDuration, parseDuration, parseTimestamp } from './scalars.js';
