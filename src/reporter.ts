import chalk from 'chalk';
import type { RunResult } from './runner.js';
import { OUTCOME_STATUSES } from './types.js';
import type {
  AggregateReport,
  HealthSample,
  HealthTransition,
  OutcomeStatus,
  RequestOutcome,
  RetryEvent,
  RunConfig,
  RunObserver,
} from './types.js';

export type OutputFormat = 'pretty' | 'json' | 'csv';

export interface ReporterOptions {
  format?: OutputFormat;
  /** Sink for every line; defaults to console.log. */
  write?: (line: string) => void;
}

const RULE = '═'.repeat(80);
const SNIPPET_CHARS = 80;

const STATUS_LABELS: Record<OutcomeStatus, string> = {
  success: 'Successful',
  client_error: 'Client errors',
  server_error_exhausted: 'Server errors',
  timeout_exhausted: 'Timeouts',
  transport_error_exhausted: 'Transport errors',
};

function pad3(n: number): string {
  return n.toString().padStart(3, '0');
}

function formatSeconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function formatStatus(status: OutcomeStatus): string {
  return status === 'success' ? chalk.green(status) : chalk.red(status);
}

export function formatOutcomeLine(outcome: RequestOutcome): string {
  const retry = outcome.retryCount > 0 ? chalk.yellow(` (retry ${outcome.retryCount})`) : '';
  const snippet = outcome.response ? chalk.gray(` | Response: ${outcome.response.slice(0, SNIPPET_CHARS)}...`) : '';
  return (
    `[User ${pad3(outcome.userId)}] ${outcome.workloadType} | ` +
    `Context: ${Math.floor(outcome.contextLength / 1000)}K tokens | ` +
    `Status: ${formatStatus(outcome.status)}${retry} | ` +
    `Time: ${formatSeconds(outcome.elapsedMs)}${snippet}`
  );
}

export function formatRetryLine(event: RetryEvent): string {
  return chalk.yellow(`  [Retry ${event.attempt}/${event.maxRetries}] User ${pad3(event.userId)}: ${event.reason.slice(0, 100)}`);
}

export function formatHealthLine(sample: HealthSample, elapsedMs: number, inFlight: number): string {
  const label = sample.healthy ? chalk.green('[HEALTH CHECK ✓] Endpoint is ALIVE') : chalk.red('[HEALTH CHECK ✗] Endpoint is DOWN');
  return `${label} (Elapsed: ${Math.round(elapsedMs / 1000)}s, Active requests: ${inFlight})`;
}

function describeHealth(sample: HealthSample): string {
  if (sample.healthy) {
    return chalk.green(`✓ HEALTHY - Response: ${(sample.response ?? '').slice(0, 50)}`);
  }
  const detail = sample.error ?? (sample.httpStatus !== undefined ? `HTTP ${sample.httpStatus}: ${sample.response ?? ''}` : 'Unknown error');
  return chalk.red(`✗ UNHEALTHY - ${detail.slice(0, 100)}`);
}

/**
 * Renders the live line stream and the final report. Implements RunObserver
 * so it can be handed straight to the runner.
 */
export class Reporter implements RunObserver {
  private format: OutputFormat;
  private write: (line: string) => void;

  constructor(options: ReporterOptions = {}) {
    this.format = options.format ?? 'pretty';
    this.write = options.write ?? (line => console.log(line));
  }

  private get live(): boolean {
    return this.format === 'pretty';
  }

  start(config: Readonly<RunConfig>): void {
    if (!this.live) return;
    this.write('');
    this.write(chalk.gray(RULE));
    this.write(chalk.bold('Starting LLM Load Test'));
    this.write(chalk.gray(RULE));
    this.write(`${chalk.cyan('Endpoint:')}          ${config.endpoint}`);
    this.write(`${chalk.cyan('Model:')}             ${config.model}`);
    this.write(`${chalk.cyan('Concurrent Users:')}  ${config.concurrency}`);
    this.write(`${chalk.cyan('Test Duration:')}     ${config.durationSeconds} seconds`);
    this.write(`${chalk.cyan('Max Context:')}       ${Math.floor(config.maxContextTokens / 1000)}K tokens`);
    this.write(`${chalk.cyan('Request Timeout:')}   ${config.requestTimeoutSeconds}s`);
    this.write(`${chalk.cyan('Max Retries:')}       ${config.maxRetries}`);
    this.write(chalk.gray(RULE));
    this.write('');
  }

  onPreflight(sample: HealthSample): void {
    if (!this.live) return;
    if (sample.healthy) {
      this.write(chalk.green('✓ Initial health check PASSED - endpoint is responsive'));
    } else {
      this.write(chalk.red('✗ Initial health check FAILED - endpoint may not be available'));
      this.write('Continuing anyway to gather data...');
    }
    this.write('');
  }

  onOutcome(outcome: RequestOutcome): void {
    if (this.live) this.write(formatOutcomeLine(outcome));
  }

  onRetry(event: RetryEvent): void {
    if (this.live) this.write(formatRetryLine(event));
  }

  onHealthSample(sample: HealthSample, elapsedMs: number, inFlight: number): void {
    if (!this.live) return;
    this.write('');
    this.write(formatHealthLine(sample, elapsedMs, inFlight));
    this.write('');
  }

  onHealthTransition(transition: HealthTransition): void {
    if (!this.live) return;
    if (transition.to) {
      this.write(chalk.green('Endpoint recovered.'));
    } else {
      this.write(chalk.yellow('WARNING: Endpoint health check failed! Continuing test to gather failure data...'));
    }
  }

  onTaskError(task: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.write(chalk.red(`Task ${task} failed: ${message}`));
  }

  onPersistError(error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.write(chalk.red(`Failed to save results: ${message}`));
  }

  onStopRequested(): void {
    if (this.live) this.write(chalk.yellow('\n=== Test stopped by user; waiting for in-flight requests ===\n'));
  }

  finish(result: RunResult): void {
    switch (this.format) {
      case 'json':
        this.write(JSON.stringify(result.report, null, 2));
        break;
      case 'csv':
        this.printCsv(result.report);
        break;
      default:
        this.printPretty(result);
    }
  }

  private printPretty(result: RunResult): void {
    const { report, document } = result;
    const w = this.write;

    w('');
    w(chalk.gray(RULE));
    w(chalk.bold('Load Test Results'));
    w(chalk.gray(RULE));
    w('');

    if (report.totalRequests === 0) {
      w(chalk.yellow('No requests completed!'));
    } else {
      w(`Total Requests: ${report.totalRequests}`);
      for (const status of OUTCOME_STATUSES) {
        const { count, percentage } = report.statusCounts[status];
        if (status !== 'success' && count === 0) continue;
        const colour = status === 'success' ? chalk.green : chalk.red;
        w(`${STATUS_LABELS[status]}: ${colour(count)} (${percentage.toFixed(1)}%)`);
      }
      if (report.retried.count > 0) {
        w(`Retried requests: ${report.retried.count} (${report.retried.percentage.toFixed(1)}%)`);
      }
    }

    if (report.latency) {
      const l = report.latency;
      w('');
      w(chalk.bold('Response Time Statistics:'));
      w(`  Min:    ${formatSeconds(l.min)}`);
      w(`  Max:    ${formatSeconds(l.max)}`);
      w(`  Mean:   ${formatSeconds(l.mean)}`);
      w(`  Median: ${formatSeconds(l.median)}`);
      w(`  P95:    ${formatSeconds(l.p95)}`);
      w(`  P99:    ${formatSeconds(l.p99)}`);

      w('');
      w(chalk.bold('Token Statistics:'));
      w(`  Avg Context Length: ${Math.round(report.tokens.avgSent)} tokens`);
      if (report.tokens.totalReceived > 0) {
        w(`  Avg Response Length: ${Math.round(report.tokens.avgReceived)} tokens`);
      }
      w(`  Total Tokens Sent: ${report.tokens.totalSent.toLocaleString('en-US')}`);
      w(`  Total Tokens Received: ${report.tokens.totalReceived.toLocaleString('en-US')}`);
    }

    if (report.byWorkload.length > 0) {
      w('');
      w(chalk.bold('Breakdown by Request Type:'));
      for (const b of report.byWorkload) {
        w(`  ${b.workloadType}: ${b.count} requests, ${b.succeeded} successful, avg time: ${formatSeconds(b.avgLatencyMs)}`);
      }
    }

    if (report.topErrors.length > 0) {
      w('');
      w(chalk.bold('Error Details:'));
      for (const e of report.topErrors) {
        w(`  ${chalk.red(`[${e.count}x]`)} ${e.message}`);
      }
    }

    w('');
    w(chalk.bold('Throughput:'));
    w(`  Requests/second: ${chalk.bold(report.throughput.requestsPerSecond.toFixed(2))}`);
    w(`  Successful requests/second: ${report.throughput.successfulPerSecond.toFixed(2)}`);

    w('');
    w(chalk.bold('Endpoint Health Monitoring:'));
    w(`  Total health checks: ${report.health.total}`);
    w(`  Healthy: ${chalk.green(report.health.healthy)}`);
    w(`  Unhealthy: ${chalk.red(report.health.unhealthy)}`);
    if (report.health.timeline) {
      w('');
      w('  Health Check Timeline:');
      for (const sample of report.health.timeline) {
        const elapsed = Math.round((sample.timestamp - Date.parse(document.started_at)) / 1000);
        w(`    [${elapsed.toString().padStart(6)}s] ${describeHealth(sample)}`);
      }
    }

    const samples = document.response_samples.slice(0, 5);
    if (samples.length > 0) {
      w('');
      w(chalk.bold(`Sample Responses (first ${samples.length} successful requests):`));
      samples.forEach((sample, i) => {
        w('');
        w(`  Sample ${i + 1} - User ${pad3(sample.user_id)} - ${sample.request_type}:`);
        w(chalk.gray(`    ${sample.response.slice(0, 300)}...`));
      });
    }

    w('');
    w(chalk.gray(RULE));
    if (result.stoppedEarly) {
      w(chalk.yellow('Run was stopped before its deadline; results cover the partial run.'));
    }
    if (result.outputFile) {
      w(`Detailed results saved to: ${chalk.cyan(result.outputFile)}`);
      w(`  - Includes ${document.response_samples.length} response samples`);
      w(`  - Includes ${document.health_checks.length} health check results`);
    } else {
      w(chalk.red('Detailed results were not saved; see the error above.'));
    }
    w('');
  }

  private printCsv(report: AggregateReport): void {
    const l = report.latency;
    const ms = (v: number | undefined) => Math.round(v ?? 0);
    this.write(
      'total,success,client_error,server_error_exhausted,timeout_exhausted,transport_error_exhausted,retried,' +
        'min_ms,max_ms,mean_ms,median_ms,p95_ms,p99_ms,throughput_rps,health_checks,healthy_checks',
    );
    this.write(
      [
        report.totalRequests,
        ...OUTCOME_STATUSES.map(s => report.statusCounts[s].count),
        report.retried.count,
        ms(l?.min),
        ms(l?.max),
        ms(l?.mean),
        ms(l?.median),
        ms(l?.p95),
        ms(l?.p99),
        report.throughput.requestsPerSecond.toFixed(2),
        report.health.total,
        report.health.healthy,
      ].join(','),
    );
  }
}
