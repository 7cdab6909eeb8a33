import type {
  AggregateReport,
  ErrorFrequency,
  HealthSample,
  HealthSummary,
  LatencyStats,
  OutcomeStatus,
  RequestOutcome,
  StatusCount,
  TokenStats,
  WorkloadBreakdown,
} from './types.js';

export const TOP_ERROR_LIMIT = 10;
export const ERROR_KEY_CHARS = 100;
export const HEALTH_TIMELINE_LIMIT = 20;

/**
 * Element at index `floor(n * p)` of an ascending-sorted list, clamped to the
 * last element. No interpolation.
 */
export function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.min(Math.floor(sorted.length * p), sorted.length - 1);
  return sorted[index];
}

function mean(values: number[]): number {
  return values.length === 0 ? 0 : values.reduce((a, b) => a + b, 0) / values.length;
}

function median(sorted: number[]): number {
  if (sorted.length === 0) return 0;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
}

export function calculateLatencyStats(latencies: number[]): LatencyStats | null {
  if (latencies.length === 0) {
    return null;
  }

  const sorted = [...latencies].sort((a, b) => a - b);

  return {
    min: sorted[0],
    max: sorted[sorted.length - 1],
    mean: mean(sorted),
    median: median(sorted),
    p95: percentile(sorted, 0.95),
    p99: percentile(sorted, 0.99),
  };
}

function share(count: number, total: number): StatusCount {
  return { count, percentage: total > 0 ? (count / total) * 100 : 0 };
}

export function countByStatus(outcomes: RequestOutcome[]): Record<OutcomeStatus, StatusCount> {
  const of = (status: OutcomeStatus) => share(outcomes.filter(o => o.status === status).length, outcomes.length);
  return {
    success: of('success'),
    client_error: of('client_error'),
    server_error_exhausted: of('server_error_exhausted'),
    timeout_exhausted: of('timeout_exhausted'),
    transport_error_exhausted: of('transport_error_exhausted'),
  };
}

export function calculateTokenStats(successful: RequestOutcome[]): TokenStats {
  const sent = successful.map(o => o.tokensSent);
  const received = successful.map(o => o.tokensReceived);
  return {
    avgSent: mean(sent),
    avgReceived: mean(received),
    totalSent: sent.reduce((a, b) => a + b, 0),
    totalReceived: received.reduce((a, b) => a + b, 0),
  };
}

export function breakdownByWorkload(outcomes: RequestOutcome[]): WorkloadBreakdown[] {
  const groups = new Map<string, RequestOutcome[]>();
  for (const outcome of outcomes) {
    const group = groups.get(outcome.workloadType) ?? [];
    group.push(outcome);
    groups.set(outcome.workloadType, group);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([workloadType, group]) => {
      const succeeded = group.filter(o => o.status === 'success');
      return {
        workloadType,
        count: group.length,
        succeeded: succeeded.length,
        avgLatencyMs: mean(succeeded.map(o => o.elapsedMs)),
      };
    });
}

/** Most frequent failure messages, ties kept in first-seen order. */
export function topErrors(outcomes: RequestOutcome[], limit = TOP_ERROR_LIMIT): ErrorFrequency[] {
  const counts = new Map<string, number>();
  for (const outcome of outcomes) {
    if (outcome.status === 'success') continue;
    const key = outcome.error ? outcome.error.slice(0, ERROR_KEY_CHARS) : 'Unknown';
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return [...counts.entries()]
    .map(([message, count]) => ({ message, count }))
    .sort((a, b) => b.count - a.count)
    .slice(0, limit);
}

export function summarizeHealth(samples: HealthSample[]): HealthSummary {
  const healthy = samples.filter(s => s.healthy).length;
  return {
    total: samples.length,
    healthy,
    unhealthy: samples.length - healthy,
    timeline: samples.length > 0 && samples.length <= HEALTH_TIMELINE_LIMIT ? [...samples] : null,
  };
}

/**
 * Derives every end-of-run statistic from the collected records. Pure: the
 * same inputs always produce the same report.
 */
export function buildAggregateReport(
  outcomes: RequestOutcome[],
  healthSamples: HealthSample[],
  wallClockMs: number,
): AggregateReport {
  const total = outcomes.length;
  const successful = outcomes.filter(o => o.status === 'success');
  const durationSeconds = wallClockMs / 1000;

  return {
    totalRequests: total,
    statusCounts: countByStatus(outcomes),
    retried: share(outcomes.filter(o => o.retryCount > 0).length, total),
    latency: calculateLatencyStats(successful.map(o => o.elapsedMs)),
    tokens: calculateTokenStats(successful),
    byWorkload: breakdownByWorkload(outcomes),
    topErrors: topErrors(outcomes),
    throughput: {
      durationSeconds,
      requestsPerSecond: durationSeconds > 0 ? total / durationSeconds : 0,
      successfulPerSecond: durationSeconds > 0 ? successful.length / durationSeconds : 0,
    },
    health: summarizeHealth(healthSamples),
  };
}
