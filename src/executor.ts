import {
  ClientError,
  HttpStatusError,
  RequestTimeoutError,
  RetriesExhaustedError,
  TransportError,
  classifyFailure,
} from './errors.js';
import type { AttemptFailure } from './errors.js';
import { WORKLOAD_PARAMS } from './llm-client.js';
import type { LlmClient } from './llm-client.js';
import type { InFlightGauge } from './result-store.js';
import { sleep as defaultSleep } from './timing.js';
import type { SleepFn } from './timing.js';
import type { OutcomeStatus, RequestOutcome, RetryEvent } from './types.js';
import { estimateTokens } from './workloads/index.js';

const RESPONSE_EXCERPT_CHARS = 1000;
const ERROR_EXCERPT_CHARS = 200;

export interface ExecutorOptions {
  client: LlmClient;
  maxRetries: number;
  requestTimeoutMs: number;
  backoffBaseMs: number;
  fixedBackoffMs: number;
  gauge: InFlightGauge;
  sleep?: SleepFn;
  onRetry?: (event: RetryEvent) => void;
}

interface OutcomeFields {
  status: OutcomeStatus;
  elapsedMs: number;
  retryCount: number;
  tokensReceived?: number;
  response?: string;
  error?: string;
}

export function exhaustedStatus(failure: AttemptFailure): OutcomeStatus {
  if (failure instanceof RequestTimeoutError) return 'timeout_exhausted';
  if (failure instanceof TransportError) return 'transport_error_exhausted';
  return 'server_error_exhausted';
}

/**
 * Performs one logical completion request, retrying transient failures, and
 * folds whatever happened into a single RequestOutcome. Never rejects.
 */
export class RequestExecutor {
  private options: ExecutorOptions;
  private sleep: SleepFn;

  constructor(options: ExecutorOptions) {
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Delay before retrying after `failure` on the given 0-based attempt. */
  backoffDelay(failure: AttemptFailure, attempt: number): number {
    if (failure instanceof HttpStatusError) {
      return this.options.backoffBaseMs * 2 ** attempt;
    }
    return this.options.fixedBackoffMs;
  }

  async execute(userId: number, prompt: string, workloadType: string, targetTokens: number): Promise<RequestOutcome> {
    const { client, maxRetries, requestTimeoutMs, gauge, onRetry } = this.options;
    const build = (fields: OutcomeFields): RequestOutcome => ({
      userId,
      workloadType,
      contextLength: targetTokens,
      tokensSent: estimateTokens(prompt),
      tokensReceived: 0,
      timestamp: Date.now(),
      ...fields,
    });

    gauge.increment();
    try {
      for (let attempt = 0; ; attempt++) {
        // Only the final attempt's duration is reported
        const attemptStart = performance.now();
        try {
          const completion = await client.complete(prompt, { ...WORKLOAD_PARAMS, timeoutMs: requestTimeoutMs });
          return build({
            status: 'success',
            elapsedMs: performance.now() - attemptStart,
            retryCount: attempt,
            tokensReceived: completion.completionTokens,
            response: completion.content.slice(0, RESPONSE_EXCERPT_CHARS),
          });
        } catch (error) {
          const elapsedMs = performance.now() - attemptStart;
          const failure = classifyFailure(error, requestTimeoutMs);

          // A rejected request is the caller's fault; retrying cannot help
          if (failure instanceof ClientError && attempt === 0) {
            return build({
              status: 'client_error',
              elapsedMs,
              retryCount: 0,
              error: failure.message.slice(0, ERROR_EXCERPT_CHARS),
            });
          }

          if (attempt >= maxRetries) {
            const exhausted = new RetriesExhaustedError(failure, attempt + 1);
            return build({
              status: exhaustedStatus(exhausted.cause),
              elapsedMs,
              retryCount: attempt,
              error: exhausted.message.slice(0, ERROR_EXCERPT_CHARS),
            });
          }

          const delayMs = this.backoffDelay(failure, attempt);
          onRetry?.({ userId, attempt: attempt + 1, maxRetries, reason: failure.message, delayMs });
          await this.sleep(delayMs);
        }
      }
    } finally {
      gauge.decrement();
    }
  }
}
