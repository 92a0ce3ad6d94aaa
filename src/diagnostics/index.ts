/**
 * Decode diagnostics: error taxonomy and message rendering.
 *
 * @packageDocumentation
 */

export {
  AmbiguousSubclassException,
  ConfigDecodeError,
  MalformedConfigException,
  MissingTypeException,
  ParseException,
  TypeConfigException,
  UnexpectedKeysException,
  formatPath,
  missingField,
  renderComposite,
  shapeMismatch,
} from './errors.js';
export type { DiagnosticJSON, DiagnosticKind } from './errors.js';
