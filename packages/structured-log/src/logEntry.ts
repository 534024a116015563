import { Type, type Static } from '@sinclair/typebox';
import { LogEntryEncodingError } from './errors.js';
import { type CloudSeverity, CloudSeverityTokenSchema, toSeverityToken } from './severity.js';
import { formatTimestamp, type LogTime } from './timestamp.js';

/**
 * Marks an entry as an error event for Error Reporting.
 * https://cloud.google.com/error-reporting/docs/formatting-error-messages#@type
 */
export const REPORTED_ERROR_EVENT_TYPE =
  'type.googleapis.com/google.devtools.clouderrorreporting.v1beta1.ReportedErrorEvent';

export const logEntryKeys = {
  severity: 'severity',
  message: 'message',
  reportType: '@type',
  httpRequest: 'httpRequest',
  time: 'time',
  insertId: 'logging.googleapis.com/insertId',
  labels: 'logging.googleapis.com/labels',
  operation: 'logging.googleapis.com/operation',
  sourceLocation: 'logging.googleapis.com/sourceLocation',
  spanId: 'logging.googleapis.com/spanId',
  trace: 'logging.googleapis.com/trace',
  traceSampled: 'logging.googleapis.com/trace_sampled',
} as const;

const reservedKeys = new Set<string>(Object.values(logEntryKeys));

export const LogOperation = Type.Object({
  /** Entries with the same identifier belong to the same operation. */
  id: Type.Optional(Type.String()),
  /** Together with `id` globally unique, e.g. "MyDivision.MyBigCompany.com". */
  producer: Type.Optional(Type.String()),
  first: Type.Optional(Type.Boolean()),
  last: Type.Optional(Type.Boolean()),
});

export type LogOperation = Static<typeof LogOperation>;

export const LogSourceLocation = Type.Object({
  file: Type.Optional(Type.String()),
  /** 1-based, written as a string. "0" means no line number is available. */
  line: Type.Optional(Type.String()),
  /** Qualified function name, e.g. `module.Class.method`. */
  function: Type.Optional(Type.String()),
});

export type LogSourceLocation = Static<typeof LogSourceLocation>;

export const HttpMethod = Type.Union([
  Type.Literal('GET'),
  Type.Literal('HEAD'),
  Type.Literal('PUT'),
  Type.Literal('POST'),
  Type.Literal('DELETE'),
  Type.Literal('PATCH'),
  Type.Literal('OPTIONS'),
]);

export type HttpMethod = Static<typeof HttpMethod>;

export const HttpRequest = Type.Object({
  requestMethod: Type.Optional(HttpMethod),
  /** Scheme, host, path and query, e.g. "http://example.com/some/info?color=red". */
  requestUrl: Type.Optional(Type.String()),
  /** Request size in bytes including headers, as a decimal string. */
  requestSize: Type.Optional(Type.String()),
  status: Type.Optional(Type.Integer()),
  responseSize: Type.Optional(Type.String()),
  userAgent: Type.Optional(Type.String()),
  /** May include a port, e.g. "10.0.0.1:80". */
  remoteIp: Type.Optional(Type.String()),
  serverIp: Type.Optional(Type.String()),
  /** Seconds with up to nine fractional digits, terminated by "s", e.g. "3.5s". */
  latency: Type.Optional(Type.String()),
  /** e.g. "HTTP/1.1", "HTTP/2", "websocket" */
  protocol: Type.Optional(Type.String()),
});

export type HttpRequest = Static<typeof HttpRequest>;

/**
 * One structured log record. Every field is optional, and fields left unset
 * are left out of the serialized line.
 */
export interface LogEntry {
  severity?: CloudSeverity;
  /**
   * Text shown on the entry line in the Logs Explorer. For Error Reporting
   * the message may carry the stack trace of the error.
   */
  message?: string;
  /**
   * Set to {@link REPORTED_ERROR_EVENT_TYPE} to have the entry grouped by
   * Error Reporting. Conventionally used together with an error severity.
   */
  reportType?: string;
  httpRequest?: HttpRequest;
  time?: LogTime;
  /**
   * Entries with the same timestamp and insertId are treated as duplicates
   * within one query result.
   */
  insertId?: string;
  /** Empty maps are omitted. */
  labels?: Record<string, string>;
  operation?: LogOperation;
  sourceLocation?: LogSourceLocation;
  /** 16-character hex span id, e.g. `000000000000004a`. */
  spanId?: string;
  /** e.g. `projects/my-projectid/traces/06796866738c859f2f19b7cfb3214824` */
  trace?: string;
  traceSampled?: boolean;
  /**
   * Additional top-level fields, stored by Cloud Logging as jsonPayload.
   * Keys that collide with a field above are dropped.
   */
  payload?: Record<string, unknown>;
}

export const WireLogEntry = Type.Object({
  severity: Type.Optional(CloudSeverityTokenSchema),
  message: Type.Optional(Type.String()),
  '@type': Type.Optional(Type.String()),
  httpRequest: Type.Optional(HttpRequest),
  time: Type.Optional(Type.String()),
  'logging.googleapis.com/insertId': Type.Optional(Type.String()),
  'logging.googleapis.com/labels': Type.Optional(Type.Record(Type.String(), Type.String())),
  'logging.googleapis.com/operation': Type.Optional(LogOperation),
  'logging.googleapis.com/sourceLocation': Type.Optional(LogSourceLocation),
  'logging.googleapis.com/spanId': Type.Optional(Type.String()),
  'logging.googleapis.com/trace': Type.Optional(Type.String()),
  'logging.googleapis.com/trace_sampled': Type.Optional(Type.Boolean()),
});

export type WireLogEntry = Static<typeof WireLogEntry>;

export type WireObject = WireLogEntry & Record<string, unknown>;

const operationFields = ['id', 'producer', 'first', 'last'] as const;
const sourceLocationFields = ['file', 'line', 'function'] as const;
const httpRequestFields = [
  'requestMethod',
  'requestUrl',
  'requestSize',
  'status',
  'responseSize',
  'userAgent',
  'remoteIp',
  'serverIp',
  'latency',
  'protocol',
] as const;

function isPresent<T>(value: T | null | undefined): value is T {
  return value !== null && value !== undefined;
}

function compact<T extends object>(value: T, fields: readonly (keyof T)[]): Partial<T> {
  const result: Partial<T> = {};

  for (const field of fields) {
    const fieldValue = value[field];
    if (isPresent(fieldValue)) {
      result[field] = fieldValue;
    }
  }

  return result;
}

function encodeHttpRequest(httpRequest: HttpRequest): HttpRequest {
  const { status } = httpRequest;

  if (isPresent(status) && !Number.isInteger(status)) {
    throw new LogEntryEncodingError(
      'httpRequest.status',
      `status must be an integer, received ${status}`,
    );
  }

  return compact(httpRequest, httpRequestFields);
}

function encodeLabels(labels: Record<string, string>): Record<string, string> | undefined {
  const entries = Object.entries(labels).filter(([, value]) => isPresent(value));
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

export function createLogEntry(overrides: LogEntry = {}): LogEntry {
  return { ...overrides };
}

export function markAsReportedError(entry: LogEntry): LogEntry {
  return { ...entry, reportType: REPORTED_ERROR_EVENT_TYPE };
}

/**
 * Maps an entry onto the JSON object Cloud Logging ingests: fields are renamed
 * to their schema keys and absent fields are omitted.
 */
export function toWireObject(entry: LogEntry): WireObject {
  const wire: WireLogEntry = {};

  if (isPresent(entry.severity)) {
    wire.severity = toSeverityToken(entry.severity);
  }
  if (isPresent(entry.message)) {
    wire.message = entry.message;
  }
  if (isPresent(entry.reportType)) {
    wire['@type'] = entry.reportType;
  }
  if (isPresent(entry.httpRequest)) {
    wire.httpRequest = encodeHttpRequest(entry.httpRequest);
  }
  if (isPresent(entry.time)) {
    wire.time = formatTimestamp(entry.time);
  }
  if (isPresent(entry.insertId)) {
    wire['logging.googleapis.com/insertId'] = entry.insertId;
  }
  if (isPresent(entry.labels)) {
    const labels = encodeLabels(entry.labels);
    if (labels) {
      wire['logging.googleapis.com/labels'] = labels;
    }
  }
  if (isPresent(entry.operation)) {
    wire['logging.googleapis.com/operation'] = compact(entry.operation, operationFields);
  }
  if (isPresent(entry.sourceLocation)) {
    wire['logging.googleapis.com/sourceLocation'] = compact(
      entry.sourceLocation,
      sourceLocationFields,
    );
  }
  if (isPresent(entry.spanId)) {
    wire['logging.googleapis.com/spanId'] = entry.spanId;
  }
  if (isPresent(entry.trace)) {
    wire['logging.googleapis.com/trace'] = entry.trace;
  }
  if (isPresent(entry.traceSampled)) {
    wire['logging.googleapis.com/trace_sampled'] = entry.traceSampled;
  }

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(entry.payload ?? {})) {
    if (!reservedKeys.has(key) && isPresent(value)) {
      extra[key] = value;
    }
  }

  return Object.assign(wire, extra);
}

export function isReservedKey(key: string): boolean {
  return reservedKeys.has(key);
}

/**
 * Serializes one entry to a single line of JSON.
 *
 * @throws {LogEntryEncodingError} when a field holds a value JSON cannot carry
 */
// JSON.stringify would silently write NaN and the infinities as `null`.
function rejectNonFiniteNumbers(key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new LogEntryEncodingError('payload', `"${key}" is not a finite number, received ${value}`);
  }
  return value;
}

export function serializeLogEntry(entry: LogEntry): string {
  const wire = toWireObject(entry);

  try {
    return JSON.stringify(wire, rejectNonFiniteNumbers);
  } catch (error) {
    if (error instanceof LogEntryEncodingError) {
      throw error;
    }
    throw new LogEntryEncodingError(
      'payload',
      error instanceof Error ? error.message : String(error),
      { cause: error },
    );
  }
}

/** Line-delimited JSON, one object per entry, each line terminated by `\n`. */
export function serializeLogEntries(entries: Iterable<LogEntry>): string {
  let output = '';
  for (const entry of entries) {
    output += `${serializeLogEntry(entry)}\n`;
  }
  return output;
}
