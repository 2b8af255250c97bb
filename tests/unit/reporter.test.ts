import { describe, it, expect } from 'vitest';
import { formatCount, formatRuntime, Reporter } from '../../src/reporter.js';
import type { ResultSnapshot } from '../../src/types.js';

function createReporter() {
  const lines: string[] = [];
  const reporter = new Reporter({ log: line => { lines.push(line); }, color: false });
  return { lines, reporter };
}

function snapshot(overrides: Partial<ResultSnapshot> = {}): ResultSnapshot {
  return {
    timestamp: new Date('2024-01-01T00:00:00.000Z'),
    runtimeMs: 65_000,
    totalRequests: 3,
    stalled: false,
    reuseAddressFailures: 0,
    operations: [{ name: 'GET', successes: 2, cancellations: 0, failures: 1 }],
    totals: { successes: 2, cancellations: 0, failures: 1 },
    ...overrides,
  };
}

describe('formatting helpers', () => {
  it('formats runtime as hh:mm:ss', () => {
    expect(formatRuntime(0)).toBe('00:00:00');
    expect(formatRuntime(3_723_000)).toBe('01:02:03');
    expect(formatRuntime(59_999)).toBe('00:00:59');
  });

  it('groups thousands', () => {
    expect(formatCount(1234567)).toBe('1,234,567');
  });
});

describe('Reporter', () => {
  it('prints a snapshot with per-operation and total counts', () => {
    const { lines, reporter } = createReporter();
    reporter.printSnapshot(snapshot());

    expect(lines).toEqual([
      '[2024-01-01T00:00:00.000Z] Total: 3 Runtime: 00:01:05',
      `\t${'GET'.padEnd(30)}Success: 2\tCanceled: 0\tFail: 1`,
      `${'\t    TOTAL'.padEnd(31)}Success: 2\tCanceled: 0\tFail: 1`,
      '',
    ]);
  });

  it('marks a stalled run and shows reuse-address failures', () => {
    const { lines, reporter } = createReporter();
    reporter.printSnapshot(snapshot({ stalled: true, reuseAddressFailures: 1200 }));

    expect(lines[0]).toBe('[2024-01-01T00:00:00.000Z] Total: 3 (stalled) Runtime: 00:01:05');
    expect(lines[1]).toBe('~~ Reuse address failures: 1,200 ~~');
  });

  it('prints latency percentiles', () => {
    const { lines, reporter } = createReporter();
    reporter.printLatencies({ n: 5, p50: 3, p75: 4, p99: 4.96, p999: 5, max: 5 });
    reporter.printLatencies(undefined);

    expect(lines).toEqual([
      'Latency(ms) : n=5, p50=3, p75=4, p99=4.96, p999=5, max=5',
      '',
      'Latency(ms) : n=0',
      '',
    ]);
  });

  it('prints each failure type with its per-operation timeline', () => {
    const { lines, reporter } = createReporter();
    reporter.printFailureTypes([
      {
        errorText: 'Error: reset',
        signature: [{ kind: 'Error', message: 'reset', callSite: '' }],
        failureCount: 2,
        operations: [
          {
            name: 'GET',
            events: [
              { timestamp: new Date('2024-01-01T10:20:30.456Z'), durationMs: 12.5, isCancelled: false },
              { timestamp: new Date('2024-01-01T10:20:31.000Z'), durationMs: 3, isCancelled: true },
            ],
          },
        ],
      },
    ], 2);

    expect(lines).toEqual([
      'There were a total of 2 failures classified into 1 different types:',
      '',
      'Failure Type 1/1:',
      'Error: reset',
      '',
      `\t${'GET'.padEnd(30)}Fail: 2\tTimestamp: 10:20:30.456, Duration: 12.50ms, Cancelled: false, ` +
        'Timestamp: 10:20:31.000, Duration: 3.00ms, Cancelled: true',
      `${'\t    TOTAL'.padEnd(31)}Fail: 2`,
      '',
    ]);
  });

  it('prints nothing when there were no failures', () => {
    const { lines, reporter } = createReporter();
    reporter.printFailureTypes([], 0);
    expect(lines).toEqual([]);
  });

  it('prints a failure diagnostic with running totals', () => {
    const { lines, reporter } = createReporter();
    reporter.printFailureDiagnostic({
      iteration: 41,
      operationName: 'POST',
      workerIndex: 5,
      successes: 1500,
      failures: 2,
      error: 'plain failure',
    });

    expect(lines).toEqual([
      'Error from iteration 41 (POST) in task 5 with 1,500 successes / 2 fails:',
      'plain failure',
      '',
    ]);
  });
});
