import { RequestTimeoutError } from './errors.js';
import type { HttpClient } from './http-client.js';
import type { SeededRandom } from './random.js';
import type { RequestContext, StressConfig } from './types.js';

/**
 * Forwards an abort from `signal` to `controller`. Returns the function that
 * detaches the listener again.
 */
export function linkAbort(signal: AbortSignal, controller: AbortController): () => void {
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => {};
  }
  const onAbort = () => controller.abort(signal.reason);
  signal.addEventListener('abort', onAbort, { once: true });
  return () => signal.removeEventListener('abort', onAbort);
}

/** Errors a cancelled fetch or timer rejects with. */
export function isCancellationError(error: unknown, signal: AbortSignal): boolean {
  if (signal.aborted && error === signal.reason) return true;
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

/**
 * State for a single operation invocation. Its signal fires when the run is
 * stopped or when the request outlives `requestTimeoutMs`; call `release()`
 * once the invocation settles.
 */
export class StressRequestContext implements RequestContext {
  readonly config: Readonly<StressConfig>;
  readonly client: HttpClient;
  readonly random: SeededRandom;
  readonly workerIndex: number;

  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly unlink: () => void;

  constructor(
    config: Readonly<StressConfig>,
    client: HttpClient,
    random: SeededRandom,
    stopSignal: AbortSignal,
    workerIndex: number
  ) {
    this.config = config;
    this.client = client;
    this.random = random;
    this.workerIndex = workerIndex;

    this.unlink = linkAbort(stopSignal, this.controller);
    this.timer = setTimeout(
      () => this.controller.abort(new RequestTimeoutError(config.requestTimeoutMs)),
      config.requestTimeoutMs
    );
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancellationRequested(): boolean {
    return this.controller.signal.aborted;
  }

  release(): void {
    clearTimeout(this.timer);
    this.unlink();
  }
}
