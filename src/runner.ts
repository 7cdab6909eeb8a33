import { RequestExecutor } from './executor.js';
import { HealthMonitor, checkHealthInterval, probe } from './health-monitor.js';
import { createClient } from './llm-client.js';
import type { FetchFn, LlmClient } from './llm-client.js';
import { buildAggregateReport } from './metrics.js';
import type { RunDocument } from './persistence.js';
import { buildRunDocument, prepareOutputDir, writeRunDocument } from './persistence.js';
import { ResultStore } from './result-store.js';
import { UserSession } from './session.js';
import { DEFAULT_TIMING } from './timing.js';
import type { RandomFn, RunTiming } from './timing.js';
import type { AggregateReport, HealthSample, RunConfig, RunObserver } from './types.js';

export const DEFAULT_OUTPUT_DIR = 'results';

export interface RunnerOptions {
  outputDir?: string;
  timing?: Partial<RunTiming>;
  /** Skip the single probe sent before any task starts. */
  skipPreflight?: boolean;
  observer?: RunObserver;
  fetch?: FetchFn;
  random?: RandomFn;
}

export interface RunResult {
  runId: string;
  report: AggregateReport;
  document: RunDocument;
  /** Null when the results file could not be written; the report is still valid. */
  outputFile: string | null;
  stoppedEarly: boolean;
  endpointAlive: boolean;
  preflight: HealthSample | null;
}

/**
 * A run in progress. Sessions and the monitor are already running when the
 * handle is returned; `done` settles after they have all joined and the
 * results have been reported and written.
 */
export class RunHandle {
  readonly runId: string;
  readonly config: Readonly<RunConfig>;
  readonly store: ResultStore;
  readonly startedAt: number;
  readonly deadline: number;
  readonly done: Promise<RunResult>;
  private controller: AbortController;
  private monitor: HealthMonitor;

  constructor(init: {
    runId: string;
    config: Readonly<RunConfig>;
    store: ResultStore;
    startedAt: number;
    deadline: number;
    controller: AbortController;
    monitor: HealthMonitor;
    done: (handle: RunHandle) => Promise<RunResult>;
  }) {
    this.runId = init.runId;
    this.config = init.config;
    this.store = init.store;
    this.startedAt = init.startedAt;
    this.deadline = init.deadline;
    this.controller = init.controller;
    this.monitor = init.monitor;
    this.done = init.done(this);
  }

  get endpointAlive(): boolean {
    return this.monitor.endpointAlive;
  }

  get inFlight(): number {
    return this.store.inFlight.value;
  }

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Stops starting new work. Requests already in flight finish and are
   * recorded.
   */
  stop(): void {
    this.controller.abort();
  }
}

/**
 * A stop request that may arrive before the run it targets exists, e.g. a
 * Ctrl+C during the preflight probe. Attaching replays an earlier request.
 */
export class PendingStop {
  private target?: { stop(): void };
  private isRequested = false;

  get requested(): boolean {
    return this.isRequested;
  }

  request(): void {
    this.isRequested = true;
    this.target?.stop();
  }

  attach(target: { stop(): void }): void {
    this.target = target;
    if (this.isRequested) {
      target.stop();
    }
  }
}

async function joinAll(tasks: Array<{ name: string; promise: Promise<unknown> }>, observer: RunObserver): Promise<void> {
  const settled = await Promise.allSettled(tasks.map(t => t.promise));
  settled.forEach((result, i) => {
    if (result.status === 'rejected') {
      observer.onTaskError?.(tasks[i].name, result.reason);
    }
  });
}

/**
 * Validates the environment for a run (output directory, preflight probe),
 * then spawns one session per simulated user plus the health monitor.
 * Throws SetupError before any traffic if results could not be written.
 */
export async function start(config: Readonly<RunConfig>, options: RunnerOptions = {}): Promise<RunHandle> {
  const timing: RunTiming = { ...DEFAULT_TIMING, ...options.timing };
  const observer = options.observer ?? {};
  const outputDir = options.outputDir ?? DEFAULT_OUTPUT_DIR;

  checkHealthInterval(timing.healthIntervalMs);
  await prepareOutputDir(outputDir);

  const client: LlmClient = createClient(config, options.fetch);
  let preflight: HealthSample | null = null;
  if (!options.skipPreflight) {
    preflight = await probe(client, timing.healthTimeoutMs);
    observer.onPreflight?.(preflight);
  }

  const runId = `load-test-${Date.now()}`;
  const store = new ResultStore();
  const controller = new AbortController();
  const startedAt = Date.now();
  const deadline = startedAt + config.durationSeconds * 1000;

  const executor = new RequestExecutor({
    client,
    maxRetries: config.maxRetries,
    requestTimeoutMs: config.requestTimeoutSeconds * 1000,
    backoffBaseMs: timing.backoffBaseMs,
    fixedBackoffMs: timing.fixedBackoffMs,
    gauge: store.inFlight,
    onRetry: event => observer.onRetry?.(event),
  });

  const monitor = new HealthMonitor({
    client,
    store,
    timing,
    deadline,
    signal: controller.signal,
    onSample: sample => observer.onHealthSample?.(sample, Date.now() - startedAt, store.inFlight.value),
    onTransition: transition => observer.onHealthTransition?.(transition),
  });

  const sessions = Array.from(
    { length: config.concurrency },
    (_, userId) =>
      new UserSession({
        userId,
        maxContextTokens: config.maxContextTokens,
        executor,
        store,
        timing,
        deadline,
        signal: controller.signal,
        random: options.random,
        onOutcome: outcome => observer.onOutcome?.(outcome, store.inFlight.value),
      }),
  );

  const tasks = [
    { name: 'health-monitor', promise: monitor.run() },
    ...sessions.map(session => ({ name: `user-${session.userId}`, promise: session.run() })),
  ];

  return new RunHandle({
    runId,
    config,
    store,
    startedAt,
    deadline,
    controller,
    monitor,
    done: async handle => {
      try {
        await joinAll(tasks, observer);

        const wallClockMs = Date.now() - startedAt;
        const outcomes = store.getOutcomes();
        const healthSamples = store.getHealthSamples();
        const report = buildAggregateReport(outcomes, healthSamples, wallClockMs);
        const document = buildRunDocument({
          runId,
          config,
          startedAt,
          wallClockMs,
          stoppedEarly: handle.stopped,
          endpointAlive: monitor.endpointAlive,
          preflight,
          outcomes,
          healthSamples,
        });
        let outputFile: string | null = null;
        try {
          outputFile = await writeRunDocument(outputDir, document);
        } catch (error) {
          observer.onPersistError?.(error);
        }

        return {
          runId,
          report,
          document,
          outputFile,
          stoppedEarly: handle.stopped,
          endpointAlive: monitor.endpointAlive,
          preflight,
        };
      } finally {
        await client.close();
      }
    },
  });
}

export function stop(handle: RunHandle): void {
  handle.stop();
}

/** Starts a run and waits for its result. */
export async function runLoadTest(config: Readonly<RunConfig>, options: RunnerOptions = {}): Promise<RunResult> {
  const handle = await start(config, options);
  return handle.done;
}
