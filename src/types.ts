import type { HttpClient } from './http-client.js';
import type { SeededRandom } from './random.js';

export interface StressConfig {
  serverUri: string;
  concurrency: number;
  requestTimeoutMs: number;
  randomSeed: number;
  displayIntervalMs: number;
  maxContentLength: number;
  maxParameters: number;
  probeRetries: number;
  probeTimeoutMs: number;
}

export interface RequestContext {
  readonly config: Readonly<StressConfig>;
  readonly client: HttpClient;
  readonly random: SeededRandom;
  readonly signal: AbortSignal;
  readonly workerIndex: number;
  readonly isCancellationRequested: boolean;
}

export type OperationFunction = (ctx: RequestContext) => Promise<void>;

export interface ClientOperation {
  name: string;
  run: OperationFunction;
}

export type OperationOutcome =
  | { kind: 'success'; durationMs: number }
  | { kind: 'cancelled'; durationMs: number }
  | { kind: 'failure'; error: unknown; durationMs: number };

export interface FailureLink {
  kind: string;
  message: string;
  callSite: string;
}

export type FailureSignature = readonly FailureLink[];

export interface FailureEvent {
  timestamp: Date;
  durationMs: number;
  isCancelled: boolean;
}

export interface LatencySummary {
  n: number;
  p50: number;
  p75: number;
  p99: number;
  p999: number;
  max: number;
}

export interface OperationCounts {
  name: string;
  successes: number;
  cancellations: number;
  failures: number;
}

export interface ResultSnapshot {
  timestamp: Date;
  runtimeMs: number;
  totalRequests: number;
  stalled: boolean;
  reuseAddressFailures: number;
  operations: OperationCounts[];
  totals: Omit<OperationCounts, 'name'>;
}

export interface FailureTypeReport {
  errorText: string;
  signature: FailureSignature;
  failureCount: number;
  operations: { name: string; events: FailureEvent[] }[];
}

export type Logger = (line: string) => void;

export interface FailureDiagnostic {
  iteration: number;
  operationName: string;
  workerIndex: number;
  successes: number;
  failures: number;
  error: unknown;
}

export type FailureListener = (diagnostic: FailureDiagnostic) => void;
