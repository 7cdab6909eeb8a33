import { HttpStatusError, ValidationError, classifyFailure } from './errors.js';
import { PROBE_PARAMS, PROBE_PROMPT } from './llm-client.js';
import type { LlmClient } from './llm-client.js';
import type { ResultStore } from './result-store.js';
import { sleep as defaultSleep } from './timing.js';
import type { RunTiming, SleepFn } from './timing.js';
import type { HealthSample, HealthTransition } from './types.js';

const EXCERPT_CHARS = 200;

export interface HealthMonitorOptions {
  client: LlmClient;
  store: ResultStore;
  timing: Pick<RunTiming, 'healthStartupDelayMs' | 'healthIntervalMs' | 'healthTimeoutMs'>;
  deadline: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
  now?: () => number;
  onSample?: (sample: HealthSample) => void;
  onTransition?: (transition: HealthTransition) => void;
}

/** Sends the minimal deterministic probe once and describes the result. */
export async function probe(client: LlmClient, timeoutMs: number): Promise<HealthSample> {
  try {
    const completion = await client.complete(PROBE_PROMPT, { ...PROBE_PARAMS, timeoutMs });
    return {
      timestamp: Date.now(),
      healthy: true,
      status: 'healthy',
      httpStatus: completion.status,
      response: completion.content.slice(0, EXCERPT_CHARS),
    };
  } catch (error) {
    const failure = classifyFailure(error, timeoutMs);
    if (failure instanceof HttpStatusError) {
      return {
        timestamp: Date.now(),
        healthy: false,
        status: 'unhealthy',
        httpStatus: failure.statusCode,
        response: failure.body.slice(0, EXCERPT_CHARS),
      };
    }
    return {
      timestamp: Date.now(),
      healthy: false,
      status: 'error',
      error: failure.message.slice(0, EXCERPT_CHARS),
    };
  }
}

/** Rejects intervals that would turn the fixed cadence into a busy loop. */
export function checkHealthInterval(intervalMs: number): void {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new ValidationError([`healthIntervalMs: health check interval must be positive (got ${intervalMs})`]);
  }
}

/**
 * Probes the endpoint on a fixed cadence for the whole run, independent of
 * workload traffic. Keeps sampling through outages.
 */
export class HealthMonitor {
  private options: HealthMonitorOptions;
  private sleep: SleepFn;
  private now: () => number;
  private alive = true;

  constructor(options: HealthMonitorOptions) {
    checkHealthInterval(options.timing.healthIntervalMs);
    this.options = options;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /** Liveness according to the most recent probe; true before the first one. */
  get endpointAlive(): boolean {
    return this.alive;
  }

  private record(sample: HealthSample): void {
    const { store, onSample, onTransition } = this.options;
    const previous = this.alive;
    store.appendHealth(sample);
    this.alive = sample.healthy;
    onSample?.(sample);
    if (previous !== sample.healthy) {
      onTransition?.({ from: previous, to: sample.healthy, sample });
    }
  }

  async run(): Promise<number> {
    const { client, timing, deadline, signal } = this.options;
    const active = () => this.now() < deadline && !signal?.aborted;
    const interval = timing.healthIntervalMs;
    let probes = 0;
    let slot = 0;

    await this.sleep(timing.healthStartupDelayMs, signal);
    const firstProbeAt = this.now();

    while (active()) {
      this.record(await probe(client, timing.healthTimeoutMs));
      probes++;

      // Fixed cadence anchored at the first probe; a slow probe skips the
      // slots it overran instead of firing back-to-back
      slot = Math.max(slot + 1, Math.ceil((this.now() - firstProbeAt) / interval));
      await this.sleep(firstProbeAt + slot * interval - this.now(), signal);
    }

    return probes;
  }
}
