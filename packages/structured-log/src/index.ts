export {
  LogEntryEncodingError,
  LogEntryParseError,
  type LogEntryParseIssue,
  StructuredLogError,
} from './errors.js';
export {
  createLogEntry,
  HttpMethod,
  HttpRequest,
  isReservedKey,
  type LogEntry,
  logEntryKeys,
  LogOperation,
  LogSourceLocation,
  markAsReportedError,
  REPORTED_ERROR_EVENT_TYPE,
  serializeLogEntries,
  serializeLogEntry,
  toWireObject,
  WireLogEntry,
  type WireObject,
} from './logEntry.js';
export { parseLogEntry } from './parseLogEntry.js';
export {
  CloudSeverity,
  type CloudSeverityToken,
  CloudSeverityTokenSchema,
  cloudSeverityTokens,
  cloudSeverityValues,
  compareSeverity,
  fromSeverityToken,
  toSeverityToken,
} from './severity.js';
export {
  formatTimestamp,
  type LogTime,
  parseTimestamp,
  preciseNow,
  type PreciseTimestamp,
  toPreciseTimestamp,
} from './timestamp.js';
