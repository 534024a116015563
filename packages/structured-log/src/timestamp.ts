import { LogEntryEncodingError, LogEntryParseError } from './errors.js';

/**
 * A point in time with nanosecond precision, counted from the Unix epoch.
 * `nanos` is always in `[0, 999_999_999]`, also for instants before 1970.
 */
export interface PreciseTimestamp {
  seconds: number;
  nanos: number;
}

export type LogTime = Date | PreciseTimestamp;

const NANOS_PER_SECOND = 1_000_000_000;
const NANOS_PER_MILLI = 1_000_000;
const NANOS_PER_MICRO = 1_000;

// RFC3339 only allows four digit years
const MIN_SECONDS = -62_167_219_200; // 0000-01-01T00:00:00Z
const MAX_SECONDS = 253_402_300_799; // 9999-12-31T23:59:59Z

const TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/;

const hrtimeOrigin = process.hrtime.bigint();
const epochOriginNanos = BigInt(Date.now()) * BigInt(NANOS_PER_MILLI);

export function preciseNow(): PreciseTimestamp {
  const elapsed = process.hrtime.bigint() - hrtimeOrigin;
  const epochNanos = epochOriginNanos + elapsed;
  const nanosPerSecond = BigInt(NANOS_PER_SECOND);

  return {
    seconds: Number(epochNanos / nanosPerSecond),
    nanos: Number(epochNanos % nanosPerSecond),
  };
}

export function toPreciseTimestamp(time: LogTime): PreciseTimestamp {
  if (!(time instanceof Date)) {
    return time;
  }

  const millis = time.getTime();
  const seconds = Math.floor(millis / 1000);

  return {
    seconds,
    nanos: (millis - seconds * 1000) * NANOS_PER_MILLI,
  };
}

function formatFraction(nanos: number): string {
  const digits = String(nanos).padStart(9, '0');

  if (nanos % NANOS_PER_MILLI === 0) {
    return digits.slice(0, 3);
  }
  if (nanos % NANOS_PER_MICRO === 0) {
    return digits.slice(0, 6);
  }
  return digits;
}

/**
 * Renders `time` as `YYYY-MM-DDTHH:MM:SS.fffZ` in UTC. Three, six or nine
 * fractional digits are written, depending on the precision the value carries.
 */
export function formatTimestamp(time: LogTime, field = 'time'): string {
  if (time instanceof Date && Number.isNaN(time.getTime())) {
    throw new LogEntryEncodingError(field, 'invalid date');
  }

  const { seconds, nanos } = toPreciseTimestamp(time);

  if (!Number.isSafeInteger(seconds)) {
    throw new LogEntryEncodingError(field, `seconds must be an integer, received ${seconds}`);
  }
  if (!Number.isInteger(nanos) || nanos < 0 || nanos >= NANOS_PER_SECOND) {
    throw new LogEntryEncodingError(field, `nanos must be within [0, 1e9), received ${nanos}`);
  }
  if (seconds < MIN_SECONDS || seconds > MAX_SECONDS) {
    throw new LogEntryEncodingError(field, `year is outside of 0000-9999`);
  }

  const wholeSeconds = new Date(seconds * 1000).toISOString().slice(0, 19);

  return `${wholeSeconds}.${formatFraction(nanos)}Z`;
}

// Date.parse rolls days past the end of a month over into the next one.
function isCalendarDateTime(wholeSeconds: string): boolean {
  const [year = 0, month = 0, day = 0, hour = 0, minute = 0, second = 0] = wholeSeconds
    .split(/[-T:]/)
    .map(Number);
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);

  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    hour < 24 &&
    minute < 60 &&
    second < 60
  );
}

/**
 * Parses an RFC3339 date-time with up to nine fractional digits. Offsets other
 * than `Z` are normalized to UTC.
 */
export function parseTimestamp(text: string): PreciseTimestamp {
  const match = TIMESTAMP_PATTERN.exec(text);
  if (!match) {
    throw new LogEntryParseError(`Invalid timestamp "${text}"`);
  }

  const [, wholeSeconds = '', fraction = '', offset] = match;
  const millis = Date.parse(`${wholeSeconds}${offset}`);

  if (Number.isNaN(millis) || !isCalendarDateTime(wholeSeconds)) {
    throw new LogEntryParseError(`Invalid timestamp "${text}"`);
  }

  return {
    seconds: millis / 1000,
    nanos: Number(fraction.padEnd(9, '0')),
  };
}
