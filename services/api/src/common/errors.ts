export type ParseErrorKind = 'UnknownFormat' | 'MissingField' | 'MissingTimestamp';

export type ValidationErrorKind =
  | 'DifferentDrives'
  | 'OutOfOrder'
  | 'MixedFormats'
  | 'CounterRegression'
  | 'MissingCapacity';

export class ParseError extends Error {
  readonly kind: ParseErrorKind;
  readonly field?: string;

  constructor(kind: ParseErrorKind, message: string, field?: string) {
    super(message);
    this.name = 'ParseError';
    this.kind = kind;
    this.field = field;
  }
}

export class ValidationError extends Error {
  readonly kind: ValidationErrorKind;
  readonly context: Readonly<Record<string, unknown>>;

  constructor(kind: ValidationErrorKind, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'ValidationError';
    this.kind = kind;
    this.context = Object.freeze({ ...context });
  }
}

/**
 * A parse failure tagged with the snapshot it came from, so callers can name
 * the offending file or request field.
 */
export class SnapshotParseError extends Error {
  readonly source: string;
  readonly parseError: ParseError;

  constructor(source: string, parseError: ParseError) {
    super(`${source}: ${parseError.message}`);
    this.name = 'SnapshotParseError';
    this.source = source;
    this.parseError = parseError;
  }
}
