import type { LogEntry, LogTime } from '@gcp-structured-log/structured-log';

export type LogSeverity = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogOutputFormat = 'json' | 'human' | 'structured-text';

/**
 * Structured logging fields a caller can attach to a single entry, such as the
 * request an entry belongs to or the place in code that produced it.
 */
export type LogEntryMetadata = Pick<
  LogEntry,
  | 'httpRequest'
  | 'sourceLocation'
  | 'operation'
  | 'labels'
  | 'insertId'
  | 'trace'
  | 'spanId'
  | 'traceSampled'
>;

export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  info(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  error(
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void;
  fatal(
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void;
  log(
    severity: LogSeverity,
    message: string,
    fields?: Record<string, unknown>,
    metadata?: LogEntryMetadata,
  ): void;
  createChild(correlationId: string): Logger;
}

export interface CorrelationIdGenerator {
  generateRootId(): string;
  createScopedId(parentId: string, scope: string): string;
}

export interface DiagnosticConfig {
  minimumSeverity?: LogSeverity;
  outputFormat?: LogOutputFormat;
  correlationId?: string;
  defaultLoggerArgs?: Record<string, unknown>;
  /** Producer written to the operation of every entry, defaults to the service name. */
  operationProducer?: string;
  labels?: Record<string, string>;
  /** Marks error and fatal entries for Error Reporting, on unless set to false. */
  reportErrors?: boolean;
  /**
   * Fills `sourceLocation` from the first stack frame outside the logger when
   * the caller passes none. Off unless set.
   */
  captureSourceLocation?: boolean;
  clock?: () => LogTime;
}

export interface DiagnosticContext {
  correlationIdGenerator: CorrelationIdGenerator;
  logger: Logger;
  createChildLogger: (correlationId: string) => Logger;
  getChildDiagnosticContext: (
    defaultLoggerArgs?: Record<string, unknown>,
    scopeId?: string,
  ) => DiagnosticContext;
}
