/**
 * typedconf
 *
 * Type-directed decoding of parsed configuration trees into declared record,
 * union and open polymorphic types, with path-annotated diagnostics.
 *
 * @packageDocumentation
 *
 * @example
 * ```typescript
 * import { loads, t } from 'typedconf';
 *
 * const Conn = t.record('Conn', { host: t.string(), port: t.integer() });
 * const conn = loads('{"host": "db", "port": 5432}', Conn);
 * ```
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

// Schema: shapes, descriptors, registry
export {
  t,
  buildDescriptor,
  typeName,
  SubclassRegistry,
  defaultRegistry,
  defineBase,
  TYPE_KEY,
  type CalendarDuration,
  type DefaultedField,
  type EnumMember,
  type FactoryField,
  type FieldInput,
  type Infer,
  type InferFields,
  type OpenBase,
  type RecordOptions,
  type RecordShape,
  type TypeDescriptor,
  type TypeShape,
} from './schema/index.js';

// Value Tree
export {
  NULL_NODE,
  booleanNode,
  describeNode,
  fromValueTree,
  mappingNode,
  mergeTrees,
  numberNode,
  sequenceNode,
  stringNode,
  toJsonValue,
  toValueTree,
  type DynamicValue,
  type JsonValue,
  type MappingNode,
  type SequenceNode,
  type ValueNode,
} from './value/index.js';

// Decoding and encoding
export {
  decode,
  decodeDescriptor,
  decodeOrThrow,
  encode,
  formatDuration,
  parseDuration,
  parseTimestamp,
  type DecodeResult,
} from './decoder/index.js';

// Diagnostics
export {
  AmbiguousSubclassException,
  ConfigDecodeError,
  MalformedConfigException,
  MissingTypeException,
  ParseException,
  TypeConfigException,
  UnexpectedKeysException,
  type DiagnosticJSON,
  type DiagnosticKind,
} from './diagnostics/index.js';

// Loaders
export {
  SourceChain,
  SourceFetchError,
  SourceParseError,
  dumps,
  loadDict,
  loadEnv,
  loadFile,
  loadUrl,
  loads,
  multi,
  parseSource,
  readEnvTree,
  type DumpFormat,
} from './loader/index.js';

// Options
export {
  DEFAULT_DECODE_OPTIONS,
  EnvCoercionError,
  getEnvVarDocumentation,
  resolveDecodeOptions,
  type DecodeOptions,
  type LoadOptions,
  type SourceFormat,
} from './config/index.js';

export { PathValidationError } from './utils/safe-fs.js';
export { Logger, type LogLevel, type LoggerOptions } from './utils/logger.js';
