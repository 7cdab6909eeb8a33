/**
 * Shared test helpers for stubbing the completion endpoint and building
 * fixtures. Tests inject the stub into LlmClient instead of touching the network.
 */
import { vi } from 'vitest';
import { Response } from 'undici';
import type { RequestInit } from 'undici';
import { LlmClient } from '../../src/llm-client.js';
import type { FetchFn } from '../../src/llm-client.js';
import type { HealthSample, RequestOutcome, RunConfig } from '../../src/types.js';

// ============================================================================
// Fetch Stubbing
// ============================================================================

export const BASE_URL = 'https://mock.llm.test';
export const COMPLETIONS_URL = `${BASE_URL}/v1/chat/completions`;

export function createMockFetch() {
  return vi.fn<FetchFn>();
}

export function createTestClient(mockFetch: FetchFn, apiKey: string | undefined = 'test-secret'): LlmClient {
  return new LlmClient({ endpoint: BASE_URL, apiKey, model: 'test-model', fetch: mockFetch });
}

export function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

/** The user message content of a captured completion request. */
export function sentPrompt(init: RequestInit | undefined): string {
  const body = requestBody(init);
  if (typeof body === 'object' && body !== null && 'messages' in body && Array.isArray(body.messages)) {
    const [message] = body.messages;
    if (typeof message?.content === 'string') return message.content;
  }
  throw new Error('request carried no prompt');
}

// ============================================================================
// Response Builders
// ============================================================================

export function mockJsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function mockCompletionResponse(content = 'OK', completionTokens = 12): Response {
  return mockJsonResponse({
    id: 'chatcmpl-test',
    object: 'chat.completion',
    choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }],
    usage: { prompt_tokens: 100, completion_tokens: completionTokens, total_tokens: 100 + completionTokens },
  });
}

export function mockErrorResponse(message: string, status: number): Response {
  return new Response(message, { status });
}

export function timeoutError(): Error {
  const error = new Error('The operation was aborted due to timeout');
  error.name = 'TimeoutError';
  return error;
}

export function connectionError(): Error {
  const cause = new Error('connect ECONNREFUSED 127.0.0.1:4000');
  return new TypeError('fetch failed', { cause });
}

/** Resolves with `response()` after `ms`, so calls actually overlap. */
export function delayed(ms: number, response: () => Response): () => Promise<Response> {
  return () => new Promise(resolve => setTimeout(() => resolve(response()), ms));
}

// ============================================================================
// Fixtures
// ============================================================================

export function testConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    endpoint: BASE_URL,
    apiKey: 'test-secret',
    model: 'test-model',
    concurrency: 2,
    durationSeconds: 1,
    maxContextTokens: 1000,
    requestTimeoutSeconds: 1,
    maxRetries: 2,
    verifySsl: false,
    ...overrides,
  };
}

export function mockOutcome(overrides: Partial<RequestOutcome> = {}): RequestOutcome {
  return {
    userId: 0,
    workloadType: 'MCP_file_search',
    contextLength: 300,
    status: 'success',
    elapsedMs: 100,
    tokensSent: 280,
    tokensReceived: 20,
    response: 'Here are the files.',
    timestamp: 1_700_000_000_000,
    retryCount: 0,
    ...overrides,
  };
}

export function mockHealthSample(overrides: Partial<HealthSample> = {}): HealthSample {
  return {
    timestamp: 1_700_000_000_000,
    healthy: true,
    status: 'healthy',
    httpStatus: 200,
    response: 'OK',
    ...overrides,
  };
}
