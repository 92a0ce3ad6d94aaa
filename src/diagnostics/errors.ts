/**
 * Diagnostic model for configuration decoding.
 *
 * Every failure the decoder can produce is a {@link ConfigDecodeError}: either a
 * leaf cause (kind, message, path) or a composite that keeps the per-candidate
 * causes of a union or open-polymorphic resolution in declaration/registration
 * order.
 *
 * @packageDocumentation
 */

/**
 * Discriminant for diagnostic kinds.
 */
export type DiagnosticKind =
  | 'ParseException'
  | 'MalformedConfigException'
  | 'MissingTypeException'
  | 'UnexpectedKeysException'
  | 'TypeConfigException'
  | 'AmbiguousSubclassException';

/**
 * Serializable form of a diagnostic, as returned by `toJSON()`.
 */
export interface DiagnosticJSON {
  readonly kind: DiagnosticKind;
  readonly path: string;
  readonly message: string;
  readonly causes: readonly DiagnosticJSON[];
}

/**
 * Renders a decode path for messages. The root path is empty and shows as `<root>`.
 *
 * @param path - Path in `.field[0].key` notation.
 * @returns The display form of the path.
 */
export function formatPath(path: string): string {
  return path === '' ? '<root>' : path;
}

/**
 * Renders a header followed by one `- ` bullet per cause.
 *
 * Multi-line causes keep their structure: continuation lines are indented by two
 * spaces beneath their bullet.
 *
 * @param header - First line of the message.
 * @param causes - Ordered sub-diagnostics.
 * @returns The rendered multi-line message.
 */
export function renderComposite(header: string, causes: readonly ConfigDecodeError[]): string {
  const lines = causes.map((cause) => `- ${cause.message.split('\n').join('\n  ')}`);
  return [header, ...lines].join('\n');
}

/**
 * Base class for all decode diagnostics.
 */
export class ConfigDecodeError extends Error {
  /** Diagnostic kind. */
  public readonly kind: DiagnosticKind;
  /** Fully composed path of the failing node. */
  public readonly path: string;
  /** Ordered sub-diagnostics; empty for leaf causes. */
  public readonly causes: readonly ConfigDecodeError[];

  /**
   * Creates a new ConfigDecodeError.
   *
   * @param kind - Diagnostic kind, also used as the error name.
   * @param message - Rendered message.
   * @param path - Path of the failing node.
   * @param causes - Ordered sub-diagnostics for composites.
   */
  constructor(
    kind: DiagnosticKind,
    message: string,
    path: string,
    causes: readonly ConfigDecodeError[] = []
  ) {
    super(message);
    this.name = kind;
    this.kind = kind;
    this.path = path;
    this.causes = causes;
  }

  /**
   * Returns the structured form of this diagnostic and its causes.
   */
  toJSON(): DiagnosticJSON {
    return {
      kind: this.kind,
      path: this.path,
      message: this.message,
      causes: this.causes.map((cause) => cause.toJSON()),
    };
  }
}

/**
 * A scalar literal could not be interpreted as the required kind.
 */
export class ParseException extends ConfigDecodeError {
  /** The literal that failed to parse. */
  public readonly literal: string;
  /** Name of the target the literal was parsed as. */
  public readonly target: string;

  /**
   * Creates a new ParseException.
   *
   * @param path - Path of the literal.
   * @param literal - The offending literal.
   * @param target - What the literal was parsed as (e.g. `boolean`, an enumeration name).
   * @param hint - Optional trailing detail, such as the list of valid names.
   */
  constructor(path: string, literal: string, target: string, hint?: string) {
    const base = `cannot parse ${JSON.stringify(literal)} as ${target} at ${formatPath(path)}`;
    super('ParseException', hint === undefined ? base : `${base}, ${hint}`, path);
    this.literal = literal;
    this.target = target;
  }
}

/**
 * The value tree's structure does not match the required shape.
 */
export class MalformedConfigException extends ConfigDecodeError {
  constructor(message: string, path: string) {
    super('MalformedConfigException', message, path);
  }
}

/**
 * A type description is incomplete or unsupported. Raised while building
 * descriptors, before any decoding happens.
 */
export class MissingTypeException extends ConfigDecodeError {
  constructor(message: string, path: string) {
    super('MissingTypeException', message, path);
  }
}

/**
 * Strict mode rejected keys that no record field consumed.
 */
export class UnexpectedKeysException extends ConfigDecodeError {
  /** The leftover keys, sorted. */
  public readonly keys: readonly string[];
  /** Name of the record type being decoded. */
  public readonly typeName: string;

  /**
   * Creates a new UnexpectedKeysException.
   *
   * @param path - Path of the mapping.
   * @param typeName - Record type name.
   * @param keys - Leftover keys in any order; they are sorted here.
   */
  constructor(path: string, typeName: string, keys: readonly string[]) {
    const sorted = [...keys].sort();
    const listed = sorted.map((key) => JSON.stringify(key)).join(', ');
    super(
      'UnexpectedKeysException',
      `unexpected key(s) ${listed} detected for type ${typeName} at ${formatPath(path)}`,
      path
    );
    this.keys = sorted;
    this.typeName = typeName;
  }
}

/**
 * No union variant or open-polymorphic candidate matched.
 */
export class TypeConfigException extends ConfigDecodeError {
  /**
   * Creates a new TypeConfigException.
   *
   * @param path - Path of the node.
   * @param header - Summary line.
   * @param causes - One cause per variant/candidate, in order.
   */
  constructor(path: string, header: string, causes: readonly ConfigDecodeError[] = []) {
    super(
      'TypeConfigException',
      causes.length === 0 ? header : renderComposite(header, causes),
      path,
      causes
    );
  }
}

/**
 * More than one open-polymorphic candidate matched.
 */
export class AmbiguousSubclassException extends ConfigDecodeError {
  /** Names of every matching candidate, in registration order. */
  public readonly candidates: readonly string[];

  /**
   * Creates a new AmbiguousSubclassException.
   *
   * @param path - Path of the node.
   * @param baseName - Name of the open base.
   * @param candidates - Matching candidate names, in registration order.
   */
  constructor(path: string, baseName: string, candidates: readonly string[]) {
    const header = `multiple subtypes of ${baseName} matched at ${formatPath(path)}, use '_type' to disambiguate:`;
    super(
      'AmbiguousSubclassException',
      [header, ...candidates.map((name) => `- ${name}`)].join('\n'),
      path
    );
    this.candidates = [...candidates];
  }
}

/**
 * Creates the diagnostic for a node whose shape differs from the expected one.
 *
 * @param path - Path of the node.
 * @param expected - Expected shape or type name.
 * @param actual - Actual node shape.
 * @returns A MalformedConfigException.
 */
export function shapeMismatch(path: string, expected: string, actual: string): MalformedConfigException {
  return new MalformedConfigException(
    `expected ${expected} at ${formatPath(path)}, got ${actual}`,
    path
  );
}

/**
 * Creates the diagnostic for a required record field that is absent and has no default.
 *
 * @param typeName - Record type name.
 * @param recordPath - Path of the record.
 * @param field - Name of the missing field.
 * @returns A MalformedConfigException located at the field path.
 */
export function missingField(
  typeName: string,
  recordPath: string,
  field: string
): MalformedConfigException {
  return new MalformedConfigException(
    `expected type ${typeName} at ${formatPath(recordPath)}, no ${field} found in record`,
    `${recordPath}.${field}`
  );
}
