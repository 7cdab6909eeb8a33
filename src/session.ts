import type { RequestExecutor } from './executor.js';
import type { ResultStore } from './result-store.js';
import { sleep as defaultSleep, uniform } from './timing.js';
import type { RandomFn, RunTiming, SleepFn } from './timing.js';
import type { RequestOutcome } from './types.js';
import type { PromptProvider, WorkloadCatalog } from './workloads/index.js';
import {
  defaultCatalog,
  paddedPromptProvider,
  selectTemplate,
  targetTokensFor,
  workloadTag,
} from './workloads/index.js';

export interface UserSessionOptions {
  userId: number;
  maxContextTokens: number;
  executor: RequestExecutor;
  store: ResultStore;
  timing: Pick<RunTiming, 'startJitterMs' | 'thinkTimeMs'>;
  /** Epoch ms after which no new request is started. */
  deadline: number;
  /** Aborted when the run is stopped early. */
  signal?: AbortSignal;
  promptProvider?: PromptProvider;
  catalog?: WorkloadCatalog;
  random?: RandomFn;
  sleep?: SleepFn;
  now?: () => number;
  onOutcome?: (outcome: RequestOutcome) => void;
}

/** One simulated user issuing randomized workload requests until the deadline. */
export class UserSession {
  private options: UserSessionOptions;
  private random: RandomFn;
  private sleep: SleepFn;
  private now: () => number;

  constructor(options: UserSessionOptions) {
    this.options = options;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get userId(): number {
    return this.options.userId;
  }

  private shouldContinue(): boolean {
    return this.now() < this.options.deadline && !this.options.signal?.aborted;
  }

  async run(): Promise<number> {
    const { userId, maxContextTokens, executor, store, timing, signal, onOutcome } = this.options;
    const promptProvider = this.options.promptProvider ?? paddedPromptProvider;
    const catalog = this.options.catalog ?? defaultCatalog;
    let completed = 0;

    // Stagger start times so users don't fire in lockstep
    await this.sleep(uniform(this.random, timing.startJitterMs.min, timing.startJitterMs.max), signal);

    while (this.shouldContinue()) {
      const template = selectTemplate(this.random, catalog);
      const targetTokens = targetTokensFor(template, maxContextTokens, this.random);
      const prompt = promptProvider.createPrompt(template, targetTokens);

      const outcome = await executor.execute(userId, prompt, workloadTag(template), targetTokens);
      store.append(outcome);
      completed++;
      onOutcome?.(outcome);

      await this.sleep(uniform(this.random, timing.thinkTimeMs.min, timing.thinkTimeMs.max), signal);
    }

    return completed;
  }
}
