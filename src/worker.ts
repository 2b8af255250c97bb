import type { StressResultAggregator } from './aggregator.js';
import type { HttpClient } from './http-client.js';
import { formatError } from './failure-classifier.js';
import { SeededRandom } from './random.js';
import { isCancellationError, StressRequestContext } from './request-context.js';
import type { ClientOperation, OperationOutcome, StressConfig } from './types.js';

export interface WorkerOptions {
  workerIndex: number;
  operations: readonly ClientOperation[];
  config: Readonly<StressConfig>;
  client: HttpClient;
  aggregator: StressResultAggregator;
  stopSignal: AbortSignal;
  /** Stop after this many iterations; runs until `stopSignal` aborts when omitted. */
  iterations?: number;
  now?: () => number;
  /** Called when recording an outcome throws; the loop carries on either way. */
  onRecordError?: (error: unknown, workerIndex: number) => void;
}

/** Round-robin; a worker's first iteration number is its own index. */
export function selectOperation(iteration: number, operationCount: number): number {
  return iteration % operationCount;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

/**
 * Runs one operation and classifies how it ended. A rejection counts as a
 * cancellation only when the request's own signal or the run's stop signal
 * caused it.
 */
export async function executeOperation(
  operation: ClientOperation,
  ctx: StressRequestContext,
  stopSignal: AbortSignal,
  now: () => number = () => performance.now()
): Promise<OperationOutcome> {
  const start = now();
  try {
    await operation.run(ctx);
    return { kind: 'success', durationMs: now() - start };
  } catch (error) {
    const durationMs = now() - start;
    if (
      (ctx.isCancellationRequested || stopSignal.aborted) &&
      isCancellationError(error, ctx.signal)
    ) {
      return { kind: 'cancelled', durationMs };
    }
    return { kind: 'failure', error, durationMs };
  } finally {
    ctx.release();
  }
}

function defaultRecordError(error: unknown, workerIndex: number): void {
  console.error(`Worker ${workerIndex} could not record an outcome:\n${formatError(error)}`);
}

/**
 * The per-worker loop. Operation errors are recorded and never end the loop;
 * only the stop signal (or the optional iteration budget) does.
 */
export async function runWorker(options: WorkerOptions): Promise<void> {
  const { workerIndex, operations, config, client, aggregator, stopSignal } = options;
  const now = options.now ?? (() => performance.now());
  const onRecordError = options.onRecordError ?? defaultRecordError;
  const random = SeededRandom.forWorker(workerIndex, config.randomSeed);
  const last = options.iterations === undefined ? Infinity : workerIndex + options.iterations;

  for (let i = workerIndex; i < last; i++) {
    if (stopSignal.aborted) break;

    const opIndex = selectOperation(i, operations.length);
    const ctx = new StressRequestContext(config, client, random, stopSignal, workerIndex);
    const outcome = await executeOperation(operations[opIndex], ctx, stopSignal, now);

    try {
      switch (outcome.kind) {
        case 'success':
          aggregator.recordSuccess(opIndex, outcome.durationMs);
          break;
        case 'cancelled':
          aggregator.recordCancellation(opIndex, outcome.durationMs);
          break;
        case 'failure':
          aggregator.recordFailure(
            outcome.error,
            opIndex,
            outcome.durationMs,
            ctx.isCancellationRequested,
            workerIndex,
            i
          );
          break;
      }
    } catch (error) {
      onRecordError(error, workerIndex);
    }

    await yieldToEventLoop();
  }
}
