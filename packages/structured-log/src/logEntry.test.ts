import { describe, expect, it } from 'vitest';
import { LogEntryEncodingError } from './errors.js';
import {
  createLogEntry,
  type LogEntry,
  markAsReportedError,
  REPORTED_ERROR_EVENT_TYPE,
  serializeLogEntries,
  serializeLogEntry,
  toWireObject,
} from './logEntry.js';
import { CloudSeverity } from './severity.js';

const startTime = { seconds: Date.UTC(2021, 11, 20, 16, 33, 41) / 1000, nanos: 643966093 };

describe('serializeLogEntry', () => {
  it('serializes an entry without fields to an empty object', () => {
    expect(serializeLogEntry(createLogEntry())).toBe('{}');
  });

  it('serializes a message-only entry', () => {
    expect(serializeLogEntry(createLogEntry({ message: 'hello' }))).toBe('{"message":"hello"}');
  });

  it('serializes severity as its lowercase token', () => {
    const entry = createLogEntry({ severity: CloudSeverity.Warning, message: 'careful' });

    expect(serializeLogEntry(entry)).toBe('{"severity":"warning","message":"careful"}');
  });

  it('writes the error reporting marker under @type', () => {
    const entry = createLogEntry({
      severity: CloudSeverity.Error,
      message: 'Yeah, this is not good.',
      reportType: REPORTED_ERROR_EVENT_TYPE,
    });

    expect(serializeLogEntry(entry)).toBe(
      '{"severity":"error","message":"Yeah, this is not good.",' +
        '"@type":"type.googleapis.com/google.devtools.clouderrorreporting.v1beta1.ReportedErrorEvent"}',
    );
  });

  it('renames operation and source location to their logging.googleapis.com keys', () => {
    const entry = createLogEntry({
      severity: CloudSeverity.Info,
      message: 'Start logging',
      time: startTime,
      operation: { id: 'My Service', producer: 'MyService.Backend' },
      sourceLocation: { file: 'src/main.ts', line: '11', function: 'log' },
    });

    expect(serializeLogEntry(entry)).toBe(
      '{"severity":"info","message":"Start logging","time":"2021-12-20T16:33:41.643966093Z",' +
        '"logging.googleapis.com/operation":{"id":"My Service","producer":"MyService.Backend"},' +
        '"logging.googleapis.com/sourceLocation":{"file":"src/main.ts","line":"11","function":"log"}}',
    );
  });

  it('omits absent fields of nested structures', () => {
    const entry = createLogEntry({
      operation: { id: 'op-1', last: true },
      sourceLocation: { function: 'worker.run' },
    });

    expect(serializeLogEntry(entry)).toBe(
      '{"logging.googleapis.com/operation":{"id":"op-1","last":true},' +
        '"logging.googleapis.com/sourceLocation":{"function":"worker.run"}}',
    );
  });

  it('keeps a nested structure that was set without fields', () => {
    expect(serializeLogEntry(createLogEntry({ operation: {} }))).toBe(
      '{"logging.googleapis.com/operation":{}}',
    );
  });

  it('treats undefined and null fields as absent', () => {
    const untyped: LogEntry = JSON.parse('{"message":null,"severity":"Info","insertId":null}');

    expect(serializeLogEntry(untyped)).toBe('{"severity":"info"}');
    expect(serializeLogEntry(createLogEntry({ message: undefined, trace: undefined }))).toBe('{}');
  });

  it('writes false booleans', () => {
    const entry = createLogEntry({ traceSampled: false, operation: { first: false } });

    expect(serializeLogEntry(entry)).toBe(
      '{"logging.googleapis.com/operation":{"first":false},' +
        '"logging.googleapis.com/trace_sampled":false}',
    );
  });

  it('writes trace correlation fields', () => {
    const entry = createLogEntry({
      insertId: 'insert-1',
      spanId: '000000000000004a',
      trace: 'projects/test-project/traces/06796866738c859f2f19b7cfb3214824',
      traceSampled: true,
    });

    expect(toWireObject(entry)).toEqual({
      'logging.googleapis.com/insertId': 'insert-1',
      'logging.googleapis.com/spanId': '000000000000004a',
      'logging.googleapis.com/trace': 'projects/test-project/traces/06796866738c859f2f19b7cfb3214824',
      'logging.googleapis.com/trace_sampled': true,
    });
  });

  it('writes labels and leaves out empty label maps', () => {
    expect(serializeLogEntry(createLogEntry({ labels: { env: 'test' } }))).toBe(
      '{"logging.googleapis.com/labels":{"env":"test"}}',
    );
    expect(serializeLogEntry(createLogEntry({ labels: {} }))).toBe('{}');
  });

  it('writes http request metadata in schema order', () => {
    const entry = createLogEntry({
      httpRequest: {
        latency: '0.5s',
        status: 200,
        requestUrl: 'http://localhost/hello',
        requestMethod: 'GET',
      },
    });

    expect(serializeLogEntry(entry)).toBe(
      '{"httpRequest":{"requestMethod":"GET","requestUrl":"http://localhost/hello",' +
        '"status":200,"latency":"0.5s"}}',
    );
  });

  it('adds payload fields after the schema fields', () => {
    const entry = createLogEntry({
      payload: { requestId: 'req-1', attempt: 2 },
      message: 'retrying',
    });

    expect(serializeLogEntry(entry)).toBe('{"message":"retrying","requestId":"req-1","attempt":2}');
  });

  it('does not let payload fields replace schema fields', () => {
    const entry = createLogEntry({
      message: 'original',
      payload: {
        message: 'replaced',
        '@type': 'something else',
        'logging.googleapis.com/operation': { id: 'other' },
        skipped: undefined,
      },
    });

    expect(serializeLogEntry(entry)).toBe('{"message":"original"}');
  });

  it('escapes line breaks so each entry stays on one line', () => {
    const output = serializeLogEntry(createLogEntry({ message: 'first\nsecond' }));

    expect(output).toBe('{"message":"first\\nsecond"}');
    expect(output).not.toContain('\n');
  });

  it('fails with an encoding error for a non-integer status', () => {
    const entry = createLogEntry({ httpRequest: { status: Number.NaN } });

    expect(() => serializeLogEntry(entry)).toThrow(LogEntryEncodingError);
    expect(() => serializeLogEntry(entry)).toThrow(
      'Cannot encode log entry field "httpRequest.status": status must be an integer, received NaN',
    );
  });

  it('fails with an encoding error for an invalid time', () => {
    expect(() => serializeLogEntry(createLogEntry({ time: new Date('not a date') }))).toThrow(
      LogEntryEncodingError,
    );
  });

  it('fails with an encoding error for payload values JSON cannot hold', () => {
    const entry = createLogEntry({ payload: { count: BigInt(1) } });

    let caught: unknown;
    try {
      serializeLogEntry(entry);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LogEntryEncodingError);
    expect(caught).toMatchObject({
      field: 'payload',
      name: 'LogEntryEncodingError',
      cause: expect.any(TypeError),
    });
  });

  it('leaves null payload values out', () => {
    const entry = createLogEntry({ message: 'm', payload: { orderId: null, retries: 0 } });

    expect(serializeLogEntry(entry)).toBe('{"message":"m","retries":0}');
    expect(toWireObject(entry)).not.toHaveProperty('orderId');
  });

  it('fails with an encoding error for non-finite payload numbers', () => {
    expect(() => serializeLogEntry(createLogEntry({ payload: { ratio: Number.NaN } }))).toThrow(
      'Cannot encode log entry field "payload": "ratio" is not a finite number, received NaN',
    );
    expect(() =>
      serializeLogEntry(createLogEntry({ payload: { stats: { max: Number.POSITIVE_INFINITY } } })),
    ).toThrow(
      'Cannot encode log entry field "payload": "max" is not a finite number, received Infinity',
    );
    expect(() =>
      serializeLogEntry(createLogEntry({ payload: { deltas: [1, Number.NEGATIVE_INFINITY] } })),
    ).toThrow(LogEntryEncodingError);
  });

  it('only writes keys for fields that were set', () => {
    const fields: LogEntry = {
      severity: CloudSeverity.Notice,
      message: 'subset',
      reportType: REPORTED_ERROR_EVENT_TYPE,
      time: startTime,
      operation: { id: 'op' },
      sourceLocation: { line: '1' },
      spanId: '000000000000004a',
    };
    const keys: (keyof LogEntry)[] = [
      'severity',
      'message',
      'reportType',
      'time',
      'operation',
      'sourceLocation',
      'spanId',
    ];
    const wireKeys: Partial<Record<keyof LogEntry, string>> = {
      severity: 'severity',
      message: 'message',
      reportType: '@type',
      time: 'time',
      operation: 'logging.googleapis.com/operation',
      sourceLocation: 'logging.googleapis.com/sourceLocation',
      spanId: 'logging.googleapis.com/spanId',
    };

    for (let mask = 0; mask < 1 << keys.length; mask++) {
      const selected = keys.filter((_, index) => (mask & (1 << index)) !== 0);
      const entry: LogEntry = {};
      for (const key of selected) {
        Object.assign(entry, { [key]: fields[key] });
      }

      const parsed: Record<string, unknown> = JSON.parse(serializeLogEntry(entry));

      expect(Object.keys(parsed).sort()).toEqual(selected.map((key) => wireKeys[key]).sort());
    }
  });
});

describe('serializeLogEntries', () => {
  it('writes one line per entry', () => {
    const output = serializeLogEntries([
      createLogEntry({ message: 'a' }),
      createLogEntry({ severity: CloudSeverity.Debug }),
    ]);

    expect(output).toBe('{"message":"a"}\n{"severity":"debug"}\n');
  });

  it('writes nothing for no entries', () => {
    expect(serializeLogEntries([])).toBe('');
  });
});

describe('createLogEntry', () => {
  it('copies the overrides into a new entry', () => {
    const overrides: LogEntry = { message: 'hello' };
    const entry = createLogEntry(overrides);

    expect(entry).toEqual({ message: 'hello' });
    expect(entry).not.toBe(overrides);
  });
});

describe('markAsReportedError', () => {
  it('sets the report type without touching the original entry', () => {
    const entry = createLogEntry({ severity: CloudSeverity.Error, message: 'boom' });
    const reported = markAsReportedError(entry);

    expect(reported).toEqual({
      severity: CloudSeverity.Error,
      message: 'boom',
      reportType: REPORTED_ERROR_EVENT_TYPE,
    });
    expect(entry.reportType).toBeUndefined();
  });

  it('does not require an error severity', () => {
    const reported = markAsReportedError(createLogEntry({ severity: CloudSeverity.Info }));

    expect(serializeLogEntry(reported)).toBe(
      `{"severity":"info","@type":"${REPORTED_ERROR_EVENT_TYPE}"}`,
    );
  });
});
