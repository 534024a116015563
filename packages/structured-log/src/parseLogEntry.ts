import { Value } from '@sinclair/typebox/value';
import { LogEntryParseError } from './errors.js';
import { isReservedKey, type LogEntry, WireLogEntry } from './logEntry.js';
import { fromSeverityToken } from './severity.js';
import { parseTimestamp } from './timestamp.js';

function toIssues(value: unknown) {
  return [...Value.Errors(WireLogEntry, value)].map((error) => ({
    path: error.path || '/',
    message: error.message,
  }));
}

function fromWireObject(wire: WireLogEntry): LogEntry {
  const entry: LogEntry = {};

  if (wire.severity !== undefined) {
    entry.severity = fromSeverityToken(wire.severity);
  }
  if (wire.message !== undefined) {
    entry.message = wire.message;
  }
  if (wire['@type'] !== undefined) {
    entry.reportType = wire['@type'];
  }
  if (wire.httpRequest !== undefined) {
    entry.httpRequest = wire.httpRequest;
  }
  if (wire.time !== undefined) {
    entry.time = parseTimestamp(wire.time);
  }
  if (wire['logging.googleapis.com/insertId'] !== undefined) {
    entry.insertId = wire['logging.googleapis.com/insertId'];
  }
  if (wire['logging.googleapis.com/labels'] !== undefined) {
    entry.labels = wire['logging.googleapis.com/labels'];
  }
  if (wire['logging.googleapis.com/operation'] !== undefined) {
    entry.operation = wire['logging.googleapis.com/operation'];
  }
  if (wire['logging.googleapis.com/sourceLocation'] !== undefined) {
    entry.sourceLocation = wire['logging.googleapis.com/sourceLocation'];
  }
  if (wire['logging.googleapis.com/spanId'] !== undefined) {
    entry.spanId = wire['logging.googleapis.com/spanId'];
  }
  if (wire['logging.googleapis.com/trace'] !== undefined) {
    entry.trace = wire['logging.googleapis.com/trace'];
  }
  if (wire['logging.googleapis.com/trace_sampled'] !== undefined) {
    entry.traceSampled = wire['logging.googleapis.com/trace_sampled'];
  }

  const payload = Object.fromEntries(
    Object.entries(wire).filter(([key]) => !isReservedKey(key)),
  );
  if (Object.keys(payload).length > 0) {
    entry.payload = payload;
  }

  return entry;
}

/**
 * Reads one serialized line back into a {@link LogEntry}. Keys outside the
 * structured logging schema are returned as `payload`.
 */
export function parseLogEntry(line: string): LogEntry {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch (error) {
    throw new LogEntryParseError('Log entry is not valid JSON', [], { cause: error });
  }

  if (!Value.Check(WireLogEntry, value)) {
    throw new LogEntryParseError(
      'Log entry does not match the structured logging schema',
      toIssues(value),
    );
  }

  return fromWireObject(value);
}
