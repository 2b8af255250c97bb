import chalk, { Chalk, type ChalkInstance } from 'chalk';
import { formatError } from './failure-classifier.js';
import type {
  FailureDiagnostic,
  FailureTypeReport,
  LatencySummary,
  Logger,
  ResultSnapshot,
} from './types.js';

export interface ReporterOptions {
  log?: Logger;
  color?: boolean;
}

const NAME_WIDTH = 30;

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}

/** hh:mm:ss */
export function formatRuntime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return [hours, minutes, seconds].map(v => v.toString().padStart(2, '0')).join(':');
}

function formatClock(date: Date): string {
  return date.toISOString().slice(11, 23);
}

export class Reporter {
  private readonly log: Logger;
  private readonly c: ChalkInstance;

  constructor(options: ReporterOptions = {}) {
    this.log = options.log ?? ((line: string) => console.log(line));
    this.c = options.color === false ? new Chalk({ level: 0 }) : chalk;
  }

  info(message: string): void {
    this.log(message);
  }

  warn(message: string): void {
    this.log(this.c.yellow(message));
  }

  printSnapshot(snapshot: ResultSnapshot): void {
    const { c } = this;
    const total = `Total: ${formatCount(snapshot.totalRequests)}${snapshot.stalled ? ' (stalled)' : ''}`;

    this.log(
      `${c.cyan(`[${snapshot.timestamp.toISOString()}]`)} ` +
      `${snapshot.stalled ? c.red(total) : total} ` +
      `Runtime: ${formatRuntime(snapshot.runtimeMs)}`
    );

    if (snapshot.reuseAddressFailures > 0) {
      this.log(c.red(`~~ Reuse address failures: ${formatCount(snapshot.reuseAddressFailures)} ~~`));
    }

    for (const op of snapshot.operations) {
      this.log(this.countsLine(`\t${op.name.padEnd(NAME_WIDTH)}`, op));
    }
    this.log(this.countsLine('\t    TOTAL'.padEnd(NAME_WIDTH + 1), snapshot.totals));
    this.log('');
  }

  private countsLine(
    label: string,
    counts: { successes: number; cancellations: number; failures: number }
  ): string {
    const { c } = this;
    return (
      c.cyan(label) +
      c.green(`Success: ${formatCount(counts.successes)}`) +
      c.yellow(`\tCanceled: ${formatCount(counts.cancellations)}`) +
      `${c.red('\tFail: ')}${formatCount(counts.failures)}`
    );
  }

  printFailureDiagnostic(diagnostic: FailureDiagnostic): void {
    this.log(
      this.c.yellow(
        `Error from iteration ${diagnostic.iteration} (${diagnostic.operationName}) ` +
        `in task ${diagnostic.workerIndex} with ${formatCount(diagnostic.successes)} successes / ` +
        `${formatCount(diagnostic.failures)} fails:`
      )
    );
    this.log(formatError(diagnostic.error));
    this.log('');
  }

  printTitle(title: string): void {
    this.log(this.c.magenta(title));
    this.log('');
  }

  printLatencies(summary: LatencySummary | undefined): void {
    if (!summary) {
      this.log('Latency(ms) : n=0');
    } else {
      this.log(
        `Latency(ms) : n=${summary.n}, p50=${summary.p50}, p75=${summary.p75}, ` +
        `p99=${summary.p99}, p999=${summary.p999}, max=${summary.max}`
      );
    }
    this.log('');
  }

  printFailureTypes(reports: FailureTypeReport[], totalFailures: number): void {
    if (reports.length === 0) return;
    const { c } = this;

    this.log(c.red(
      `There were a total of ${formatCount(totalFailures)} failures classified into ${reports.length} different types:`
    ));
    this.log('');

    reports.forEach((report, i) => {
      this.log(c.yellow(`Failure Type ${i + 1}/${reports.length}:`));
      this.log(report.errorText);
      this.log('');

      for (const op of report.operations) {
        const timeline = op.events
          .map(e => `Timestamp: ${formatClock(e.timestamp)}, Duration: ${e.durationMs.toFixed(2)}ms, Cancelled: ${e.isCancelled}`)
          .join(', ');
        this.log(`${c.cyan(`\t${op.name.padEnd(NAME_WIDTH)}`)}${c.red('Fail: ')}${op.events.length}\t${timeline}`);
      }

      this.log(`${c.cyan('\t    TOTAL'.padEnd(NAME_WIDTH + 1))}${c.red('Fail: ')}${report.failureCount}`);
      this.log('');
    });
  }
}
