import { describe, expect, it } from 'vitest';
import { LogEntryEncodingError, LogEntryParseError } from './errors.js';
import { formatTimestamp, parseTimestamp, preciseNow, toPreciseTimestamp } from './timestamp.js';

const baseSeconds = Date.UTC(2021, 11, 20, 16, 33, 41) / 1000;

describe('formatTimestamp', () => {
  it('writes nine fractional digits for nanosecond values', () => {
    expect(formatTimestamp({ seconds: baseSeconds, nanos: 643966093 })).toBe(
      '2021-12-20T16:33:41.643966093Z',
    );
  });

  it('writes six fractional digits for microsecond values', () => {
    expect(formatTimestamp({ seconds: baseSeconds, nanos: 643966000 })).toBe(
      '2021-12-20T16:33:41.643966Z',
    );
  });

  it('writes three fractional digits for millisecond and whole-second values', () => {
    expect(formatTimestamp({ seconds: baseSeconds, nanos: 643000000 })).toBe(
      '2021-12-20T16:33:41.643Z',
    );
    expect(formatTimestamp({ seconds: baseSeconds, nanos: 0 })).toBe('2021-12-20T16:33:41.000Z');
  });

  it('keeps leading zeros of the fraction', () => {
    expect(formatTimestamp({ seconds: baseSeconds, nanos: 1 })).toBe(
      '2021-12-20T16:33:41.000000001Z',
    );
  });

  it('formats dates in UTC with millisecond precision', () => {
    const date = new Date(Date.UTC(2021, 11, 20, 16, 33, 41, 643));

    expect(formatTimestamp(date)).toBe('2021-12-20T16:33:41.643Z');
  });

  it('formats dates before the epoch', () => {
    expect(formatTimestamp(new Date(-1))).toBe('1969-12-31T23:59:59.999Z');
  });

  it('rejects invalid dates', () => {
    expect(() => formatTimestamp(new Date(Number.NaN))).toThrow(LogEntryEncodingError);
  });

  it('rejects nanos outside of a second', () => {
    expect(() => formatTimestamp({ seconds: baseSeconds, nanos: 1_000_000_000 })).toThrow(
      'Cannot encode log entry field "time": nanos must be within [0, 1e9), received 1000000000',
    );
    expect(() => formatTimestamp({ seconds: baseSeconds, nanos: -1 })).toThrow(
      LogEntryEncodingError,
    );
  });

  it('rejects fractional and non-finite seconds', () => {
    expect(() => formatTimestamp({ seconds: 1.5, nanos: 0 })).toThrow(LogEntryEncodingError);
    expect(() => formatTimestamp({ seconds: Number.POSITIVE_INFINITY, nanos: 0 })).toThrow(
      LogEntryEncodingError,
    );
  });

  it('rejects years that need more than four digits', () => {
    expect(() => formatTimestamp(new Date(Date.UTC(10000, 0, 1)))).toThrow(
      'Cannot encode log entry field "time": year is outside of 0000-9999',
    );
  });

  it('reports the field name it was given', () => {
    expect(() => formatTimestamp(new Date(Number.NaN), 'receiveTimestamp')).toThrow(
      'Cannot encode log entry field "receiveTimestamp": invalid date',
    );
  });
});

describe('toPreciseTimestamp', () => {
  it('splits dates into seconds and nanos', () => {
    const date = new Date(Date.UTC(2021, 11, 20, 16, 33, 41, 643));

    expect(toPreciseTimestamp(date)).toEqual({ seconds: baseSeconds, nanos: 643000000 });
  });

  it('returns precise timestamps unchanged', () => {
    const timestamp = { seconds: baseSeconds, nanos: 5 };

    expect(toPreciseTimestamp(timestamp)).toBe(timestamp);
  });
});

describe('parseTimestamp', () => {
  it('parses nanosecond fractions', () => {
    expect(parseTimestamp('2021-12-20T16:33:41.643966093Z')).toEqual({
      seconds: baseSeconds,
      nanos: 643966093,
    });
  });

  it('pads short fractions to nanoseconds', () => {
    expect(parseTimestamp('2021-12-20T16:33:41.5Z')).toEqual({
      seconds: baseSeconds,
      nanos: 500000000,
    });
  });

  it('accepts timestamps without a fraction', () => {
    expect(parseTimestamp('2021-12-20T16:33:41Z')).toEqual({ seconds: baseSeconds, nanos: 0 });
  });

  it('normalizes numeric offsets to UTC', () => {
    expect(parseTimestamp('2021-12-20T17:33:41.25+01:00')).toEqual({
      seconds: baseSeconds,
      nanos: 250000000,
    });
  });

  it('rejects text that is not an RFC3339 date-time', () => {
    expect(() => parseTimestamp('yesterday')).toThrow(LogEntryParseError);
    expect(() => parseTimestamp('2021-12-20 16:33:41Z')).toThrow('Invalid timestamp');
    expect(() => parseTimestamp('2021-12-20T16:33:41.1234567890Z')).toThrow(LogEntryParseError);
  });

  it('rejects dates that do not exist in the calendar', () => {
    expect(() => parseTimestamp('2021-02-30T00:00:00Z')).toThrow(
      'Invalid timestamp "2021-02-30T00:00:00Z"',
    );
    expect(() => parseTimestamp('2021-04-31T12:00:00+02:00')).toThrow(LogEntryParseError);
    expect(() => parseTimestamp('2021-12-20T24:00:00Z')).toThrow(LogEntryParseError);
  });

  it('accepts the leap day of a leap year', () => {
    expect(parseTimestamp('2024-02-29T00:00:00Z')).toEqual({
      seconds: Date.UTC(2024, 1, 29) / 1000,
      nanos: 0,
    });
  });
});

describe('preciseNow', () => {
  it('returns the current time split into seconds and nanos', () => {
    const before = Date.now();
    const now = preciseNow();
    const after = Date.now();

    expect(Number.isInteger(now.seconds)).toBe(true);
    expect(Number.isInteger(now.nanos)).toBe(true);
    expect(now.nanos).toBeGreaterThanOrEqual(0);
    expect(now.nanos).toBeLessThan(1_000_000_000);
    expect(now.seconds).toBeGreaterThanOrEqual(Math.floor(before / 1000) - 1);
    expect(now.seconds).toBeLessThanOrEqual(Math.ceil(after / 1000) + 1);
  });

  it('formats as a valid timestamp', () => {
    expect(formatTimestamp(preciseNow())).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.(\d{3}|\d{6}|\d{9})Z$/,
    );
  });
});
