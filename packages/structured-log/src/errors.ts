export class StructuredLogError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StructuredLogError';
    Object.setPrototypeOf(this, StructuredLogError.prototype);
  }

  public toErrorPlainObject() {
    return {
      name: this.name,
      message: this.message,
      stack: this.stack,
    };
  }
}

/**
 * Raised when a log entry holds a value the JSON encoding cannot represent,
 * such as an invalid date or a non-finite status code.
 */
export class LogEntryEncodingError extends StructuredLogError {
  readonly field: string;

  constructor(field: string, message: string, options?: { cause?: unknown }) {
    super(`Cannot encode log entry field "${field}": ${message}`, options);
    this.name = 'LogEntryEncodingError';
    this.field = field;
    Object.setPrototypeOf(this, LogEntryEncodingError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      field: this.field,
    };
  }
}

export interface LogEntryParseIssue {
  readonly path: string;
  readonly message: string;
}

export class LogEntryParseError extends StructuredLogError {
  readonly issues: LogEntryParseIssue[];

  constructor(message: string, issues: LogEntryParseIssue[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LogEntryParseError';
    this.issues = issues;
    Object.setPrototypeOf(this, LogEntryParseError.prototype);
  }

  public toErrorPlainObject() {
    return {
      ...super.toErrorPlainObject(),
      issues: this.issues,
    };
  }
}
