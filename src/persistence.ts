import { constants } from 'node:fs';
import { access, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { SetupError } from './errors.js';
import type { HealthSample, RequestOutcome, RunConfig } from './types.js';

export const RESPONSE_SAMPLE_LIMIT = 50;
const SAMPLE_EXCERPT_CHARS = 500;
const RESULT_EXCERPT_CHARS = 1000;

export interface RunDocumentInput {
  runId: string;
  config: Readonly<RunConfig>;
  startedAt: number;
  wallClockMs: number;
  stoppedEarly: boolean;
  endpointAlive: boolean;
  preflight: HealthSample | null;
  outcomes: RequestOutcome[];
  healthSamples: HealthSample[];
}

export interface ResponseSample {
  user_id: number;
  request_type: string;
  timestamp: number;
  response: string;
}

export interface RunDocument {
  run_id: string;
  started_at: string;
  config: {
    endpoint: string;
    model: string;
    concurrent_users: number;
    test_duration: number;
    max_context: number;
    request_timeout: number;
    max_retries: number;
    verify_ssl: boolean;
  };
  summary: {
    total_requests: number;
    successful: number;
    client_errors: number;
    server_errors: number;
    timeouts: number;
    transport_errors: number;
    retried: number;
    test_duration: number;
    stopped_early: boolean;
    endpoint_health: {
      total_checks: number;
      healthy_checks: number;
      final_status: 'healthy' | 'unhealthy';
    };
  };
  preflight: HealthSample | null;
  health_checks: HealthSample[];
  response_samples: ResponseSample[];
  results: Array<{
    user_id: number;
    request_type: string;
    context_length: number;
    status: RequestOutcome['status'];
    response_time_ms: number;
    tokens_sent: number;
    tokens_received: number;
    response_content: string | null;
    timestamp: number;
    retry_count: number;
    error: string | null;
  }>;
}

function pad(n: number, width = 2): string {
  return n.toString().padStart(width, '0');
}

/** `load_test_results_YYYYMMDD_HHMMSS_mmm.json` in local time. */
export function resultFileName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `load_test_results_${day}_${time}_${pad(date.getMilliseconds(), 3)}.json`;
}

/** Creates the output directory and checks it is writable, before any traffic starts. */
export async function prepareOutputDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
    await access(dir, constants.W_OK);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SetupError(`Cannot write results to ${dir}: ${message}`);
  }
}

export function buildRunDocument(input: RunDocumentInput): RunDocument {
  const { config, outcomes, healthSamples } = input;
  const count = (status: RequestOutcome['status']) => outcomes.filter(o => o.status === status).length;

  return {
    run_id: input.runId,
    started_at: new Date(input.startedAt).toISOString(),
    config: {
      endpoint: config.endpoint,
      model: config.model,
      concurrent_users: config.concurrency,
      test_duration: config.durationSeconds,
      max_context: config.maxContextTokens,
      request_timeout: config.requestTimeoutSeconds,
      max_retries: config.maxRetries,
      verify_ssl: config.verifySsl,
    },
    summary: {
      total_requests: outcomes.length,
      successful: count('success'),
      client_errors: count('client_error'),
      server_errors: count('server_error_exhausted'),
      timeouts: count('timeout_exhausted'),
      transport_errors: count('transport_error_exhausted'),
      retried: outcomes.filter(o => o.retryCount > 0).length,
      test_duration: input.wallClockMs / 1000,
      stopped_early: input.stoppedEarly,
      endpoint_health: {
        total_checks: healthSamples.length,
        healthy_checks: healthSamples.filter(s => s.healthy).length,
        final_status: input.endpointAlive ? 'healthy' : 'unhealthy',
      },
    },
    preflight: input.preflight,
    health_checks: healthSamples,
    response_samples: outcomes
      .filter(o => o.status === 'success')
      .slice(0, RESPONSE_SAMPLE_LIMIT)
      .map(o => ({
        user_id: o.userId,
        request_type: o.workloadType,
        timestamp: o.timestamp,
        response: (o.response ?? '').slice(0, SAMPLE_EXCERPT_CHARS),
      })),
    results: outcomes.map(o => ({
      user_id: o.userId,
      request_type: o.workloadType,
      context_length: o.contextLength,
      status: o.status,
      response_time_ms: o.elapsedMs,
      tokens_sent: o.tokensSent,
      tokens_received: o.tokensReceived,
      response_content: o.response ? o.response.slice(0, RESULT_EXCERPT_CHARS) : null,
      timestamp: o.timestamp,
      retry_count: o.retryCount,
      error: o.error ?? null,
    })),
  };
}

/**
 * Writes the run document under a timestamped name. The exclusive flag makes
 * an existing file an error rather than an overwrite.
 */
export async function writeRunDocument(dir: string, document: RunDocument, now = new Date()): Promise<string> {
  const path = join(dir, resultFileName(now));
  await writeFile(path, JSON.stringify(document, null, 2), { encoding: 'utf8', flag: 'wx' });
  return path;
}
