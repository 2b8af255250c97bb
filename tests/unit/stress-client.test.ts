import { describe, it, expect, vi } from 'vitest';
import {
  ClientAlreadyRunningError,
  ClientDisposedError,
  ConnectivityError,
} from '../../src/errors.js';
import { getOperation } from '../../src/operations/get.js';
import { type Sleep, StressClient } from '../../src/stress-client.js';
import type { ClientOperation } from '../../src/types.js';
import {
  createMockFetch,
  okFetch,
  statusFetch,
  testConfig,
} from '../helpers/fake-transport.js';

const instantSleep = () => vi.fn<Sleep>(async () => {});

function collect() {
  const lines: string[] = [];
  return { lines, log: (line: string) => { lines.push(line); } };
}

describe('StressClient lifecycle', () => {
  it('probes, runs workers and stops', async () => {
    const fetchMock = okFetch();
    const client = new StressClient([getOperation], testConfig(), {
      fetch: fetchMock,
      log: () => {},
    });

    expect(client.state).toBe('created');
    await client.start();
    expect(client.state).toBe('running');
    expect(fetchMock.mock.calls[0][0]).toBe('http://stress.test/');

    await vi.waitFor(() => expect(client.results.requestCount).toBeGreaterThan(10));
    await client.stop();

    expect(client.state).toBe('stopped');
    expect(client.totalErrorCount).toBe(0);

    const snapshot = client.results.snapshot(0);
    const { successes, cancellations, failures } = snapshot.totals;
    expect(successes + cancellations + failures).toBe(snapshot.totalRequests);
    expect(client.results.latencyCount).toBe(snapshot.totalRequests);
  });

  it('stops counting once stopped', async () => {
    const client = new StressClient([getOperation], testConfig(), { fetch: okFetch(), log: () => {} });
    await client.start();
    await vi.waitFor(() => expect(client.results.requestCount).toBeGreaterThan(0));
    await client.stop();

    const after = client.results.requestCount;
    await new Promise(resolve => setTimeout(resolve, 20));
    expect(client.results.requestCount).toBe(after);
  });

  it('rejects a second start without disturbing the running workers', async () => {
    const client = new StressClient([getOperation], testConfig(), { fetch: okFetch(), log: () => {} });
    await client.start();

    await expect(client.start()).rejects.toBeInstanceOf(ClientAlreadyRunningError);
    expect(client.state).toBe('running');

    const before = client.results.requestCount;
    await vi.waitFor(() => expect(client.results.requestCount).toBeGreaterThan(before));
    await client.stop();
  });

  it('rejects start after stop', async () => {
    const client = new StressClient([getOperation], testConfig(), { fetch: okFetch(), log: () => {} });
    await client.start();
    await client.stop();

    await expect(client.start()).rejects.toBeInstanceOf(ClientDisposedError);
  });

  it('can be stopped before it was started', async () => {
    const fetchMock = okFetch();
    const client = new StressClient([getOperation], testConfig(), { fetch: fetchMock, log: () => {} });

    await client.stop();

    expect(client.state).toBe('stopped');
    expect(fetchMock).not.toHaveBeenCalled();
    expect(client.elapsedMs).toBe(0);
    await expect(client.start()).rejects.toBeInstanceOf(ClientDisposedError);
  });

  it('returns the same shutdown for repeated stop and dispose calls', async () => {
    const client = new StressClient([getOperation], testConfig(), { fetch: okFetch(), log: () => {} });
    await client.start();

    const first = client.stop();
    expect(client.stop()).toBe(first);
    expect(client.dispose()).toBe(first);
    await first;
  });

  it('requires at least one operation', () => {
    expect(() => new StressClient([], testConfig())).toThrow(RangeError);
  });
});

describe('StressClient probing', () => {
  it('gives up after the retry budget and launches nothing', async () => {
    let clock = 0;
    const fetchMock = createMockFetch();
    fetchMock.mockImplementation(async () => {
      clock += 300;
      throw new TypeError('fetch failed');
    });
    const sleep = instantSleep();
    const out = collect();
    const client = new StressClient([getOperation], testConfig({ probeRetries: 3 }), {
      fetch: fetchMock,
      sleep,
      now: () => clock,
      log: out.log,
      color: false,
    });

    const error = await client.start().then(() => undefined, (e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectivityError);
    expect(error).toMatchObject({ attempts: 4, serverUri: 'http://stress.test' });
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(sleep.mock.calls.map(call => call[0])).toEqual([700, 700, 700]);
    expect(out.lines.filter(line => line.includes('attempts remaining'))).toEqual([
      'Stress client could not connect to host http://stress.test, 3 attempts remaining',
      'Stress client could not connect to host http://stress.test, 2 attempts remaining',
      'Stress client could not connect to host http://stress.test, 1 attempts remaining',
    ]);
    expect(client.state).toBe('stopped');
    expect(client.results.requestCount).toBe(0);
  });

  it('skips the delay when an attempt took longer than the spacing', async () => {
    let clock = 0;
    const fetchMock = createMockFetch();
    fetchMock.mockImplementation(async () => {
      clock += 1500;
      throw new TypeError('fetch failed');
    });
    const sleep = instantSleep();
    const client = new StressClient([getOperation], testConfig({ probeRetries: 2 }), {
      fetch: fetchMock,
      sleep,
      now: () => clock,
      log: () => {},
    });

    await expect(client.start()).rejects.toBeInstanceOf(ConnectivityError);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('stops waiting between attempts once stop() is called', async () => {
    const fetchMock = createMockFetch();
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));
    const sleep = vi.fn<Sleep>((_ms, signal) => new Promise<void>((_resolve, reject) => {
      signal?.addEventListener('abort', () => reject(signal.reason), { once: true });
    }));
    const client = new StressClient([getOperation], testConfig({ probeRetries: 5 }), {
      fetch: fetchMock,
      sleep,
      log: () => {},
    });

    const started = client.start().then(() => undefined, (e: unknown) => e);
    await vi.waitFor(() => expect(sleep).toHaveBeenCalledTimes(1));
    await client.stop();
    const error = await started;

    expect(error).toBeInstanceOf(ConnectivityError);
    expect(error).toMatchObject({ attempts: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(client.state).toBe('stopped');
    expect(client.results.requestCount).toBe(0);
  });

  it('starts once the target answers', async () => {
    const fetchMock = createMockFetch();
    fetchMock
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockImplementation(async () => new Response('ok'));
    const out = collect();
    const client = new StressClient([getOperation], testConfig({ probeRetries: 5 }), {
      fetch: fetchMock,
      sleep: instantSleep(),
      log: out.log,
      color: false,
    });

    await client.start();
    expect(client.state).toBe('running');
    expect(out.lines).toContain('Connected successfully.');
    await client.stop();
  });

  it('counts any HTTP status as reachable', async () => {
    const client = new StressClient([getOperation], testConfig(), { fetch: statusFetch(503), log: () => {} });
    await client.start();
    expect(client.state).toBe('running');
    await client.stop();
  });
});

describe('StressClient shutdown', () => {
  it('waits out the grace window for workers that ignore the stop signal', async () => {
    const stuck: ClientOperation = { name: 'stuck', run: () => new Promise<void>(() => {}) };
    const out = collect();
    const client = new StressClient([stuck], testConfig({ concurrency: 1, requestTimeoutMs: 50 }), {
      fetch: okFetch(),
      sleep: instantSleep(),
      shutdownSlices: 3,
      log: out.log,
      color: false,
    });

    await client.start();
    await client.stop();

    expect(out.lines.filter(line => line === 'Client is stopping ...')).toHaveLength(3);
    expect(out.lines).toContain('Shutdown grace window elapsed with workers still running.');
    expect(client.state).toBe('stopped');
  });
});

describe('StressClient reporting', () => {
  it('prints failures as they happen and classifies them in the final report', async () => {
    const out = collect();
    const client = new StressClient([getOperation], testConfig({ concurrency: 1 }), {
      fetch: statusFetch(500),
      log: out.log,
      color: false,
    });

    await client.start();
    await vi.waitFor(() => expect(client.totalErrorCount).toBeGreaterThan(2));
    await client.stop();

    expect(out.lines).toContain('Error from iteration 0 (GET) in task 0 with 0 successes / 1 fails:');

    out.lines.length = 0;
    client.printFinalReport();

    expect(out.lines[0]).toBe('HTTP Stress Run Final Report');
    expect(out.lines).toContain(
      `There were a total of ${client.totalErrorCount} failures classified into 1 different types:`
    );
    expect(out.lines).toContain('Failure Type 1/1:');
    expect(out.lines.some(line => line.startsWith(`Latency(ms) : n=${client.results.requestCount},`))).toBe(true);
  });
});
