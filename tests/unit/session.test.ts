/**
 * Unit Tests: UserSession loop, workload selection and deadline handling.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { RequestExecutor } from '../../src/executor.js';
import { ResultStore } from '../../src/result-store.js';
import { UserSession } from '../../src/session.js';
import type { UserSessionOptions } from '../../src/session.js';
import type { RequestOutcome } from '../../src/types.js';
import { estimateTokens } from '../../src/workloads/index.js';
import {
  createMockFetch,
  createTestClient,
  delayed,
  mockCompletionResponse,
  requestBody,
  sentPrompt,
} from '../helpers/mock-fetch.js';

const NO_JITTER = { startJitterMs: { min: 0, max: 0 }, thinkTimeMs: { min: 20, max: 80 } };

describe('UserSession', () => {
  let mockFetch: ReturnType<typeof createMockFetch>;
  let store: ResultStore;
  let executor: RequestExecutor;

  const createSession = (overrides: Partial<UserSessionOptions> = {}) =>
    new UserSession({
      userId: 4,
      maxContextTokens: 1000,
      executor,
      store,
      timing: NO_JITTER,
      deadline: Date.now() + 120,
      ...overrides,
    });

  beforeEach(() => {
    mockFetch = createMockFetch();
    mockFetch.mockImplementation(delayed(1, () => mockCompletionResponse('done', 3)));
    store = new ResultStore();
    executor = new RequestExecutor({
      client: createTestClient(mockFetch),
      maxRetries: 2,
      requestTimeoutMs: 1000,
      backoffBaseMs: 10,
      fixedBackoffMs: 10,
      gauge: store.inFlight,
    });
  });

  it('keeps issuing successful requests until the deadline', async () => {
    const completed = await createSession().run();

    const outcomes = store.getOutcomes();
    expect(completed).toBe(outcomes.length);
    // One cycle is at least 1ms of response plus 20ms of think time
    expect(outcomes.length).toBeGreaterThanOrEqual(1);
    expect(outcomes.length).toBeLessThanOrEqual(Math.ceil(120 / 21));
    for (const outcome of outcomes) {
      expect(outcome.status).toBe('success');
      expect(outcome.retryCount).toBe(0);
      expect(outcome.userId).toBe(4);
    }
  });

  it('appends its own outcomes in the order it produced them', async () => {
    const produced: RequestOutcome[] = [];
    await createSession({ onOutcome: outcome => produced.push(outcome) }).run();

    expect(produced.length).toBeGreaterThanOrEqual(1);
    expect(store.getOutcomes()).toEqual(produced);
  });

  it('does not start a request once the deadline has passed', async () => {
    const completed = await createSession({ deadline: Date.now() - 1 }).run();

    expect(completed).toBe(0);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('picks the first MCP template at the low end of the size range', async () => {
    const session = createSession({ random: () => 0 });
    await session.run();

    const [first] = store.getOutcomes();
    expect(first.workloadType).toBe('MCP_file_search');
    expect(first.contextLength).toBe(210);
  });

  it('picks an Agentic template for high random draws', async () => {
    await createSession({ random: () => 0.99 }).run();

    const [first] = store.getOutcomes();
    expect(first.workloadType).toBe('Agentic_problem_solving');
    expect(first.contextLength).toBe(797);
  });

  it('reports tokensSent as the estimate of the prompt actually sent', async () => {
    await createSession().run();

    expect(requestBody(mockFetch.mock.calls[0][1])).toMatchObject({ messages: [{ role: 'user' }] });
    const prompt = sentPrompt(mockFetch.mock.calls[0][1]);
    expect(store.getOutcomes()[0].tokensSent).toBe(estimateTokens(prompt));
  });

  it('stops after the in-flight request when the run is stopped', async () => {
    const controller = new AbortController();
    const session = createSession({
      deadline: Date.now() + 60_000,
      timing: { startJitterMs: { min: 0, max: 0 }, thinkTimeMs: { min: 10_000, max: 10_000 } },
      signal: controller.signal,
      onOutcome: () => controller.abort(),
    });

    const started = Date.now();
    const completed = await session.run();

    expect(completed).toBe(1);
    expect(store.size).toBe(1);
    // The think-time sleep was interrupted rather than waited out
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});
