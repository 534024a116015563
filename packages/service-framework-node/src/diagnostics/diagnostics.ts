import { randomUUID } from 'node:crypto';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  CloudSeverity,
  createLogEntry,
  formatTimestamp,
  type LogEntry,
  LogEntryEncodingError,
  type LogSourceLocation,
  type LogTime,
  preciseNow,
  REPORTED_ERROR_EVENT_TYPE,
  serializeLogEntry,
} from '@gcp-structured-log/structured-log';
import type { DefaultEnvContext } from '../environment/types.js';
import type {
  CorrelationIdGenerator,
  DiagnosticConfig,
  DiagnosticContext,
  LogEntryMetadata,
  Logger,
  LogOutputFormat,
  LogSeverity,
} from './types.js';

const severityLevels: Record<LogSeverity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

export const cloudSeverityByLogSeverity: Record<LogSeverity, CloudSeverity> = {
  debug: CloudSeverity.Debug,
  info: CloudSeverity.Info,
  warn: CloudSeverity.Warning,
  error: CloudSeverity.Error,
  fatal: CloudSeverity.Critical,
};

const resetColor = '\x1b[0m';
const msgColor = '\x1b[34m';
const debugColor = '\x1b[36m';
const infoColor = '\x1b[32m';

const severityColors: Record<LogSeverity, string> = {
  debug: debugColor,
  info: infoColor,
  warn: '\x1b[33m',
  error: '\x1b[31m',
  fatal: '\x1b[35m',
};

const scopeDelimiter = '.';

const loggerModulePath = fileURLToPath(import.meta.url);

// `at fn (file:line:column)` or `at file:line:column`
const stackFramePattern = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

interface LogRecord {
  severity: LogSeverity;
  serviceName: string;
  correlationId?: string;
  message: string;
  time: LogTime;
  fields: Record<string, unknown>;
  entry: LogEntry;
}

function createScopedId(parentId: string, scope: string): string {
  return `${parentId}${scopeDelimiter}${scope}`;
}

export function createCorrelationIdGenerator(): CorrelationIdGenerator {
  return {
    generateRootId(): string {
      return `req-${randomUUID()}`;
    },

    createScopedId,
  };
}

function toFilePath(location: string): string {
  return location.startsWith('file:') ? fileURLToPath(location) : location;
}

/**
 * Location of the first stack frame outside this module. Files under the
 * working directory are written relative to it.
 */
function captureCallerLocation(): LogSourceLocation | undefined {
  const frames = (new Error().stack ?? '').split('\n').slice(1);

  for (const frame of frames) {
    const match = stackFramePattern.exec(frame);
    if (!match) {
      continue;
    }

    const [, functionName, location = '', line] = match;
    const file = toFilePath(location);
    if (file === loggerModulePath) {
      continue;
    }

    const relativeFile = path.relative(process.cwd(), file);

    return {
      file: relativeFile.startsWith('..') || path.isAbsolute(relativeFile) ? file : relativeFile,
      line,
      ...(functionName ? { function: functionName.replace(/^async /, '') } : {}),
    };
  }

  return undefined;
}

function formatAsHumanReadable(record: LogRecord): string {
  const severityColor = severityColors[record.severity];

  const parts: string[] = [
    `${severityColor}${record.severity}${resetColor}`,
    `process=${msgColor}${record.serviceName}${resetColor}`,
    `ts=${msgColor}${formatTimestamp(record.time)}${resetColor}`,
    `msg="${severityColor}${record.message}${resetColor}"`,
  ];

  for (const [key, value] of Object.entries(record.fields)) {
    const serializedValue = typeof value === 'object' ? JSON.stringify(value) : `"${value}"`;
    parts.push(`${key}=${severityColor}${serializedValue}${resetColor}`);
  }

  return parts.join(' ');
}

function formatAsStructuredText(record: LogRecord): string {
  const parts: string[] = [
    `timestamp=${formatTimestamp(record.time)}`,
    `service_name=${record.serviceName}`,
    `severity=${record.severity}`,
    `message="${record.message}"`,
  ];

  if (record.correlationId) {
    parts.push(`correlation_id=${record.correlationId}`);
  }

  for (const [key, value] of Object.entries(record.fields)) {
    const serializedValue = typeof value === 'string' ? `"${value}"` : JSON.stringify(value);
    parts.push(`${key}=${serializedValue}`);
  }

  return parts.join(' ');
}

// Keeps the line in the structured format when a field cannot be encoded, minus
// the parts that may hold the offending value.
function formatEncodingFailure(record: LogRecord, error: LogEntryEncodingError): string {
  return serializeLogEntry(
    createLogEntry({
      severity: record.entry.severity,
      message: record.message,
      reportType: record.entry.reportType,
      payload: {
        serviceName: record.serviceName,
        logEntryEncodingError: error.message,
      },
    }),
  );
}

function formatLogRecord(record: LogRecord, outputFormat: LogOutputFormat): string {
  try {
    switch (outputFormat) {
      case 'human':
        return formatAsHumanReadable(record);
      case 'structured-text':
        return formatAsStructuredText(record);
      case 'json':
      default:
        return serializeLogEntry(record.entry);
    }
  } catch (error) {
    return formatEncodingFailure(
      record,
      error instanceof LogEntryEncodingError
        ? error
        : new LogEntryEncodingError(
            'fields',
            error instanceof Error ? error.message : String(error),
            { cause: error },
          ),
    );
  }
}

function formatErrorAsParams(error: unknown, includeStack: boolean): Record<string, unknown> {
  if (error instanceof Error) {
    const params: Record<string, unknown> = {
      ...(error.name !== 'Error' ? { name: error.name } : {}),
      ...('toErrorPlainObject' in error && typeof error.toErrorPlainObject === 'function'
        ? error.toErrorPlainObject()
        : {}),
    };

    if (includeStack) {
      params.stack = error.stack;
    } else {
      delete params.stack;
    }

    return params;
  }

  return {
    error: String(error),
  };
}

export function createLogger(
  serviceName: string,
  correlationId: string | undefined,
  config: DiagnosticConfig = {},
): Logger {
  const minimumSeverityLevel = config.minimumSeverity
    ? severityLevels[config.minimumSeverity]
    : severityLevels.info;
  const outputFormat = config.outputFormat ?? 'json';
  const reportErrors = config.reportErrors ?? true;
  const operationProducer = config.operationProducer ?? serviceName;
  const clock = config.clock ?? preciseNow;
  const captureSourceLocation = config.captureSourceLocation ?? false;

  function log(
    severity: LogSeverity,
    message: string,
    fields?: Record<string, unknown>,
    metadata: LogEntryMetadata = {},
  ): void {
    if (severityLevels[severity] < minimumSeverityLevel) {
      return;
    }

    const isError = severity === 'error' || severity === 'fatal';
    const time = clock();
    const sourceLocation =
      captureSourceLocation && !metadata.sourceLocation ? captureCallerLocation() : undefined;
    const recordFields = {
      ...config.defaultLoggerArgs,
      ...fields,
    };

    const entry = createLogEntry({
      severity: cloudSeverityByLogSeverity[severity],
      message,
      ...(isError && reportErrors ? { reportType: REPORTED_ERROR_EVENT_TYPE } : {}),
      time,
      ...(config.labels ? { labels: config.labels } : {}),
      ...(correlationId ? { operation: { id: correlationId, producer: operationProducer } } : {}),
      payload: { serviceName, ...recordFields },
      ...(sourceLocation ? { sourceLocation } : {}),
      ...metadata,
    });

    const formattedOutput = formatLogRecord(
      { severity, serviceName, correlationId, message, time, fields: recordFields, entry },
      outputFormat,
    );

    if (isError) {
      console.error(formattedOutput);
    } else {
      console.log(formattedOutput);
    }
  }

  // With error reporting on, the stack becomes the message so the entry is
  // grouped by the place the error was thrown.
  function logError(
    severity: 'error' | 'fatal',
    error: unknown,
    message?: string | Record<string, unknown>,
    fields?: Record<string, unknown>,
  ): void {
    const additionalFields = typeof message === 'string' ? fields : message;
    const additionalMessage = typeof message === 'string' ? message : undefined;
    const errorMessage = error instanceof Error ? error.message : undefined;
    const stack = reportErrors && error instanceof Error ? error.stack : undefined;

    log(severity, stack ?? errorMessage ?? additionalMessage ?? String(error), {
      ...formatErrorAsParams(error, stack === undefined),
      ...additionalFields,
      ...(additionalMessage ? { additionalMessage } : {}),
    });
  }

  return {
    debug(message: string, fields?: Record<string, unknown>): void {
      log('debug', message, fields);
    },

    info(message: string, fields?: Record<string, unknown>): void {
      log('info', message, fields);
    },

    warn(message: string, fields?: Record<string, unknown>): void {
      log('warn', message, fields);
    },

    error(
      error: unknown,
      message?: string | Record<string, unknown>,
      fields?: Record<string, unknown>,
    ): void {
      logError('error', error, message, fields);
    },

    fatal(
      error: unknown,
      message?: string | Record<string, unknown>,
      fields?: Record<string, unknown>,
    ): void {
      logError('fatal', error, message, fields);
    },

    log,

    createChild(scopeId: string): Logger {
      const childCorrelationId = correlationId ? createScopedId(correlationId, scopeId) : scopeId;

      return createLogger(serviceName, childCorrelationId, config);
    },
  };
}

export function createDiagnosticContext(
  envContext: DefaultEnvContext,
  config: DiagnosticConfig = {},
): DiagnosticContext {
  const env = envContext.config;
  const resolvedConfig: DiagnosticConfig = {
    minimumSeverity: env.LOG_LEVEL,
    outputFormat: env.LOG_FORMAT,
    operationProducer: env.LOG_OPERATION_PRODUCER,
    reportErrors: env.LOG_REPORT_ERRORS,
    captureSourceLocation: env.LOG_SOURCE_LOCATION,
    ...config,
  };

  const correlationIdGenerator = createCorrelationIdGenerator();
  const serviceName = env.PROCESS_NAME;
  const rootId = resolvedConfig.correlationId ?? correlationIdGenerator.generateRootId();
  const rootLogger = createLogger(serviceName, rootId, resolvedConfig);

  return {
    correlationIdGenerator,
    logger: rootLogger,
    createChildLogger: (correlationId: string) => {
      return createLogger(serviceName, correlationId, resolvedConfig);
    },
    getChildDiagnosticContext: (defaultLoggerArgs?: Record<string, unknown>, scopeId?: string) => {
      return createDiagnosticContext(envContext, {
        ...resolvedConfig,
        correlationId: scopeId ? correlationIdGenerator.createScopedId(rootId, scopeId) : rootId,
        defaultLoggerArgs: {
          ...resolvedConfig.defaultLoggerArgs,
          ...defaultLoggerArgs,
        },
      });
    },
  };
}
