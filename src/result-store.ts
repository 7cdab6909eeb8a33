import type { HealthSample, RequestOutcome } from './types.js';

/**
 * Count of logical requests currently between start and terminal return.
 * Exact: increments and decrements happen on the single event-loop thread.
 */
export class InFlightGauge {
  private count = 0;

  increment(): void {
    this.count++;
  }

  decrement(): void {
    this.count = Math.max(0, this.count - 1);
  }

  get value(): number {
    return this.count;
  }
}

/**
 * Append-only log of everything a run produced. Every session and the health
 * monitor append to the same store; entries are frozen on the way in and
 * readers only ever get copies.
 */
export class ResultStore {
  private outcomes: RequestOutcome[] = [];
  private health: HealthSample[] = [];
  readonly inFlight = new InFlightGauge();

  append(outcome: RequestOutcome): void {
    this.outcomes.push(Object.freeze({ ...outcome }));
  }

  appendHealth(sample: HealthSample): void {
    this.health.push(Object.freeze({ ...sample }));
  }

  get size(): number {
    return this.outcomes.length;
  }

  get healthCount(): number {
    return this.health.length;
  }

  getOutcomes(): RequestOutcome[] {
    return [...this.outcomes];
  }

  getHealthSamples(): HealthSample[] {
    return [...this.health];
  }
}
