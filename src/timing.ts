export type RandomFn = () => number;

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Inclusive-exclusive range in milliseconds. */
export interface MsRange {
  min: number;
  max: number;
}

/**
 * Pacing of a run. Defaults mirror what a real user population looks like;
 * tests scale every value down.
 */
export interface RunTiming {
  startJitterMs: MsRange;
  thinkTimeMs: MsRange;
  /** One backoff time unit, doubled per attempt after a server error. */
  backoffBaseMs: number;
  /** Delay after a timeout or transport failure. */
  fixedBackoffMs: number;
  healthStartupDelayMs: number;
  healthIntervalMs: number;
  healthTimeoutMs: number;
}

export const DEFAULT_TIMING: RunTiming = {
  startJitterMs: { min: 0, max: 5000 },
  thinkTimeMs: { min: 2000, max: 8000 },
  backoffBaseMs: 1000,
  fixedBackoffMs: 1000,
  healthStartupDelayMs: 2000,
  healthIntervalMs: 30000,
  healthTimeoutMs: 30000,
};

export function uniform(random: RandomFn, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleep: SleepFn = (ms, signal) => {
  if (signal?.aborted || ms <= 0) {
    return Promise.resolve();
  }
  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
