export interface RunConfig {
  endpoint: string;
  apiKey?: string;
  model: string;
  concurrency: number;
  durationSeconds: number;
  maxContextTokens: number;
  requestTimeoutSeconds: number;
  maxRetries: number;
  verifySsl: boolean;
}

export type OutcomeStatus =
  | 'success'
  | 'client_error'
  | 'server_error_exhausted'
  | 'timeout_exhausted'
  | 'transport_error_exhausted';

export const OUTCOME_STATUSES: readonly OutcomeStatus[] = [
  'success',
  'client_error',
  'server_error_exhausted',
  'timeout_exhausted',
  'transport_error_exhausted',
];

export interface RequestOutcome {
  userId: number;
  workloadType: string;
  contextLength: number;
  status: OutcomeStatus;
  /** Duration of the final attempt only. */
  elapsedMs: number;
  tokensSent: number;
  tokensReceived: number;
  response?: string;
  error?: string;
  timestamp: number;
  retryCount: number;
}

export type HealthStatus = 'healthy' | 'unhealthy' | 'error';

export interface HealthSample {
  timestamp: number;
  healthy: boolean;
  status: HealthStatus;
  httpStatus?: number;
  response?: string;
  error?: string;
}

export interface LatencyStats {
  min: number;
  max: number;
  mean: number;
  median: number;
  p95: number;
  p99: number;
}

export interface StatusCount {
  count: number;
  percentage: number;
}

export interface TokenStats {
  avgSent: number;
  avgReceived: number;
  totalSent: number;
  totalReceived: number;
}

export interface WorkloadBreakdown {
  workloadType: string;
  count: number;
  succeeded: number;
  avgLatencyMs: number;
}

export interface ErrorFrequency {
  message: string;
  count: number;
}

export interface HealthSummary {
  total: number;
  healthy: number;
  unhealthy: number;
  /** Present only while the probe count stays readable. */
  timeline: HealthSample[] | null;
}

export interface AggregateReport {
  totalRequests: number;
  statusCounts: Record<OutcomeStatus, StatusCount>;
  retried: StatusCount;
  latency: LatencyStats | null;
  tokens: TokenStats;
  byWorkload: WorkloadBreakdown[];
  topErrors: ErrorFrequency[];
  throughput: {
    durationSeconds: number;
    requestsPerSecond: number;
    successfulPerSecond: number;
  };
  health: HealthSummary;
}

export interface RetryEvent {
  userId: number;
  attempt: number;
  maxRetries: number;
  reason: string;
  delayMs: number;
}

export interface HealthTransition {
  from: boolean;
  to: boolean;
  sample: HealthSample;
}

/**
 * Observational stream of a run. Every callback is optional; the core never
 * writes to the console itself.
 */
export interface RunObserver {
  onPreflight?: (sample: HealthSample) => void;
  onOutcome?: (outcome: RequestOutcome, inFlight: number) => void;
  onRetry?: (event: RetryEvent) => void;
  onHealthSample?: (sample: HealthSample, elapsedMs: number, inFlight: number) => void;
  onHealthTransition?: (transition: HealthTransition) => void;
  onTaskError?: (task: string, error: unknown) => void;
  /** The results file could not be written; the run result is still delivered. */
  onPersistError?: (error: unknown) => void;
}
