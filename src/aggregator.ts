import {
  classifyFailure,
  formatError,
  isAddressInUse,
  signatureKey,
} from './failure-classifier.js';
import { summarizeLatencies } from './percentile.js';
import type {
  FailureEvent,
  FailureListener,
  FailureSignature,
  FailureTypeReport,
  LatencySummary,
  ResultSnapshot,
} from './types.js';

/** Every failure sharing one signature, grouped by operation index. */
export class FailureRecord {
  readonly errorText: string;
  readonly signature: FailureSignature;
  readonly failures = new Map<number, FailureEvent[]>();

  constructor(errorText: string, signature: FailureSignature) {
    this.errorText = errorText;
    this.signature = signature;
  }

  add(operationIndex: number, event: FailureEvent): void {
    let events = this.failures.get(operationIndex);
    if (!events) {
      events = [];
      this.failures.set(operationIndex, events);
    }
    events.push(event);
  }

  get failureCount(): number {
    let count = 0;
    for (const events of this.failures.values()) count += events.length;
    return count;
  }
}

function sum(values: ArrayLike<number>): number {
  let total = 0;
  for (let i = 0; i < values.length; i++) total += values[i];
  return total;
}

/**
 * Run-scoped result store shared by every worker. All workers run on one event
 * loop and each record call completes synchronously, so no update can
 * interleave with another and the counters need no locking.
 */
export class StressResultAggregator {
  private readonly operationNames: readonly string[];
  private readonly onFailure?: FailureListener;

  private totalRequests = 0;
  private readonly successes: Float64Array;
  private readonly cancellations: Float64Array;
  private readonly failures: Float64Array;
  private reuseAddressFailures = 0;
  private lastTotal = -1;

  private readonly failureTypes = new Map<string, FailureRecord>();
  private readonly latencies: number[] = [];

  constructor(operationNames: readonly string[], onFailure?: FailureListener) {
    this.operationNames = operationNames;
    this.onFailure = onFailure;
    this.successes = new Float64Array(operationNames.length);
    this.cancellations = new Float64Array(operationNames.length);
    this.failures = new Float64Array(operationNames.length);
  }

  get totalErrorCount(): number {
    return sum(this.failures);
  }

  get requestCount(): number {
    return this.totalRequests;
  }

  get latencyCount(): number {
    return this.latencies.length;
  }

  get failureTypeCount(): number {
    return this.failureTypes.size;
  }

  get reuseAddressFailureCount(): number {
    return this.reuseAddressFailures;
  }

  recordSuccess(operationIndex: number, elapsedMs: number): void {
    this.totalRequests++;
    this.successes[operationIndex]++;
    this.latencies.push(elapsedMs);
  }

  recordCancellation(operationIndex: number, elapsedMs: number): void {
    this.totalRequests++;
    this.cancellations[operationIndex]++;
    this.latencies.push(elapsedMs);
  }

  recordFailure(
    error: unknown,
    operationIndex: number,
    elapsedMs: number,
    isCancelled: boolean,
    workerIndex: number,
    iteration: number
  ): void {
    const timestamp = new Date();

    this.totalRequests++;
    this.failures[operationIndex]++;
    this.latencies.push(elapsedMs);

    const signature = classifyFailure(error);
    const key = signatureKey(signature);
    let record = this.failureTypes.get(key);
    if (!record) {
      record = new FailureRecord(formatError(error), signature);
      this.failureTypes.set(key, record);
    }
    record.add(operationIndex, { timestamp, durationMs: elapsedMs, isCancelled });

    // Port exhaustion on the client shows up in bursts; count it instead of printing each one.
    if (isAddressInUse(error)) {
      this.reuseAddressFailures++;
      return;
    }

    this.onFailure?.({
      iteration,
      operationName: this.operationNames[operationIndex],
      workerIndex,
      successes: sum(this.successes),
      failures: sum(this.failures),
      error,
    });
  }

  /** Current counters; flags the run as stalled when nothing completed since the previous snapshot. */
  snapshot(runtimeMs: number): ResultSnapshot {
    const totalRequests = this.totalRequests;
    const stalled = this.lastTotal === totalRequests;
    this.lastTotal = totalRequests;

    return {
      timestamp: new Date(),
      runtimeMs,
      totalRequests,
      stalled,
      reuseAddressFailures: this.reuseAddressFailures,
      operations: this.operationNames.map((name, i) => ({
        name,
        successes: this.successes[i],
        cancellations: this.cancellations[i],
        failures: this.failures[i],
      })),
      totals: {
        successes: sum(this.successes),
        cancellations: sum(this.cancellations),
        failures: sum(this.failures),
      },
    };
  }

  /** Undefined until at least one request has completed. */
  latencySummary(): LatencySummary | undefined {
    if (this.latencies.length === 0) return undefined;
    return summarizeLatencies(this.latencies);
  }

  /** Distinct failure types, most frequent first. */
  failureTypeReports(): FailureTypeReport[] {
    return [...this.failureTypes.values()]
      .sort((a, b) => b.failureCount - a.failureCount)
      .map(record => ({
        errorText: record.errorText,
        signature: record.signature,
        failureCount: record.failureCount,
        operations: [...record.failures.entries()].map(([operationIndex, events]) => ({
          name: this.operationNames[operationIndex],
          events: [...events],
        })),
      }));
  }
}
