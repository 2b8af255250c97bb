import { setTimeout as delay } from 'node:timers/promises';
import { StressResultAggregator } from './aggregator.js';
import { ClientAlreadyRunningError, ClientDisposedError, ConnectivityError } from './errors.js';
import { describeValue, formatError } from './failure-classifier.js';
import { type FetchLike, HttpClient } from './http-client.js';
import { Reporter } from './reporter.js';
import type { ClientOperation, Logger, StressConfig } from './types.js';
import { runWorker } from './worker.js';

export type ClientState = 'created' | 'probing' | 'running' | 'stopping' | 'stopped';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface StressClientOptions {
  log?: Logger;
  color?: boolean;
  /** Transport shared by every worker; built from the config when omitted. */
  client?: HttpClient;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => number;
  shutdownSlices?: number;
  shutdownSliceMs?: number;
}

const PROBE_SPACING_MS = 1000;

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Drives `concurrency` workers against the target until stopped, printing a
 * snapshot every `displayIntervalMs`.
 *
 * created -> probing -> running -> stopping -> stopped
 */
export class StressClient {
  readonly config: Readonly<StressConfig>;
  private readonly operations: readonly ClientOperation[];
  private readonly client: HttpClient;
  private readonly aggregator: StressResultAggregator;
  private readonly reporter: Reporter;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly shutdownSlices: number;
  private readonly shutdownSliceMs: number;

  private readonly stopController = new AbortController();
  private currentState: ClientState = 'created';
  private workersTask?: Promise<PromiseSettledResult<void>[]>;
  private stopTask?: Promise<void>;
  private displayTimer?: NodeJS.Timeout;
  private runStart?: number;
  private runEnd?: number;

  constructor(
    operations: readonly ClientOperation[],
    config: Readonly<StressConfig>,
    options: StressClientOptions = {}
  ) {
    if (operations.length === 0) {
      throw new RangeError('At least one client operation is required');
    }

    this.operations = operations;
    this.config = config;
    this.reporter = new Reporter({ log: options.log, color: options.color });
    this.aggregator = new StressResultAggregator(
      operations.map(op => op.name),
      diagnostic => this.reporter.printFailureDiagnostic(diagnostic)
    );
    this.client = options.client ?? new HttpClient({
      baseUrl: config.serverUri,
      timeoutMs: config.requestTimeoutMs,
      fetch: options.fetch,
    });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => performance.now());
    this.shutdownSlices = options.shutdownSlices ?? 60;
    this.shutdownSliceMs = options.shutdownSliceMs ?? 1000;
  }

  get state(): ClientState {
    return this.currentState;
  }

  get totalErrorCount(): number {
    return this.aggregator.totalErrorCount;
  }

  get results(): StressResultAggregator {
    return this.aggregator;
  }

  /** Wall-clock run time; frozen once the client has stopped. */
  get elapsedMs(): number {
    if (this.runStart === undefined) return 0;
    return (this.runEnd ?? this.now()) - this.runStart;
  }

  /**
   * Probes the target and launches the workers. Rejects with ConnectivityError
   * when the probe budget runs out, and with a usage error when called twice or
   * after stop().
   */
  async start(): Promise<void> {
    if (this.currentState === 'stopping' || this.currentState === 'stopped') {
      throw new ClientDisposedError();
    }
    if (this.currentState !== 'created') {
      throw new ClientAlreadyRunningError();
    }

    this.currentState = 'probing';
    try {
      await this.probe();
    } catch (error) {
      if (this.currentState === 'probing') this.currentState = 'stopped';
      throw error;
    }

    // stop() arrived while probing
    if (this.stopController.signal.aborted) return;

    this.currentState = 'running';
    this.runStart = this.now();

    this.displayTimer = setInterval(() => {
      this.reporter.printSnapshot(this.aggregator.snapshot(this.elapsedMs));
    }, this.config.displayIntervalMs);
    this.displayTimer.unref();

    this.reporter.info(`Spinning up ${this.config.concurrency} concurrent workers.`);

    const workers: Promise<void>[] = [];
    for (let i = 0; i < this.config.concurrency; i++) {
      workers.push(runWorker({
        workerIndex: i,
        operations: this.operations,
        config: this.config,
        client: this.client,
        aggregator: this.aggregator,
        stopSignal: this.stopController.signal,
        now: this.now,
        onRecordError: (error, workerIndex) =>
          this.reporter.warn(
            `Worker ${workerIndex} could not record an outcome:\n${formatError(error)}`
          ),
      }));
    }
    this.workersTask = Promise.allSettled(workers);
  }

  /** Signals every worker and waits out the grace window. Safe to call repeatedly. */
  stop(): Promise<void> {
    this.stopTask ??= this.stopCore();
    return this.stopTask;
  }

  dispose(): Promise<void> {
    return this.stop();
  }

  printFinalReport(): void {
    this.reporter.printTitle('HTTP Stress Run Final Report');
    this.reporter.printSnapshot(this.aggregator.snapshot(this.elapsedMs));
    this.reporter.printLatencies(this.aggregator.latencySummary());
    this.reporter.printFailureTypes(
      this.aggregator.failureTypeReports(),
      this.aggregator.totalErrorCount
    );
  }

  private async stopCore(): Promise<void> {
    this.currentState = 'stopping';
    this.stopController.abort();

    if (this.workersTask) {
      let joined = false;
      for (let i = 0; i < this.shutdownSlices && !joined; i++) {
        joined = await this.joinWithin(this.workersTask, this.shutdownSliceMs);
        if (!joined) this.reporter.warn('Client is stopping ...');
      }

      if (joined) {
        for (const result of await this.workersTask) {
          if (result.status === 'rejected') {
            this.reporter.warn(`Worker exited with an error: ${describeValue(result.reason)}`);
          }
        }
      } else {
        this.reporter.warn('Shutdown grace window elapsed with workers still running.');
      }
    }

    if (this.runStart !== undefined) this.runEnd = this.now();
    clearInterval(this.displayTimer);
    this.displayTimer = undefined;
    this.currentState = 'stopped';
  }

  private async joinWithin(task: Promise<unknown>, ms: number): Promise<boolean> {
    const timer = new AbortController();
    try {
      return await Promise.race([
        task.then(() => true),
        this.sleep(ms, timer.signal).then(() => false, () => false),
      ]);
    } finally {
      timer.abort();
    }
  }

  private async probe(): Promise<void> {
    const { serverUri, probeRetries, probeTimeoutMs } = this.config;
    const probeClient = this.client.withTimeout(probeTimeoutMs);

    this.reporter.info(`Trying to connect to the server ${serverUri}.`);

    for (let remaining = probeRetries; ; remaining--) {
      const attemptStart = this.now();
      try {
        const response = await probeClient.send('/');
        await response.body?.cancel();
        break;
      } catch (error) {
        if (remaining <= 0 || this.stopController.signal.aborted) {
          throw new ConnectivityError(serverUri, probeRetries - remaining + 1, error);
        }
        this.reporter.warn(
          `Stress client could not connect to host ${serverUri}, ${remaining} attempts remaining`
        );
        const wait = PROBE_SPACING_MS - (this.now() - attemptStart);
        const attempts = probeRetries - remaining + 1;
        if (wait > 0) {
          try {
            await this.sleep(wait, this.stopController.signal);
          } catch (sleepError) {
            if (!this.stopController.signal.aborted) throw sleepError;
          }
        }
        if (this.stopController.signal.aborted) {
          throw new ConnectivityError(serverUri, attempts, error);
        }
      }
    }

    this.reporter.info('Connected successfully.');
  }
}
