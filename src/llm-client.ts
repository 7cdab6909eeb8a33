import { Agent, fetch } from 'undici';
import type { RequestInit, Response } from 'undici';
import { z } from 'zod';
import { ClientError, ServerError, classifyFailure } from './errors.js';
import type { RunConfig } from './types.js';

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface CompletionParams {
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
}

export interface Completion {
  status: number;
  content: string;
  completionTokens: number;
}

export interface LlmClientOptions {
  endpoint: string;
  apiKey?: string;
  model: string;
  verifySsl?: boolean;
  /** Connections per origin in the shared pool. */
  poolSize?: number;
  /** Replaces the pooled undici fetch, e.g. with a stub in tests. */
  fetch?: FetchFn;
}

export const WORKLOAD_PARAMS = { maxTokens: 500, temperature: 0.7 } as const;
export const PROBE_PARAMS = { maxTokens: 10, temperature: 0 } as const;
export const PROBE_PROMPT = 'Reply with OK if you can read this.';

// Extra connections on top of one per simulated user, for the health monitor
export const POOL_HEADROOM = 10;

// Lenient view of a chat completion body: malformed parts read as absent
const completionBodySchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.unknown() }).partial().optional() }))
    .optional()
    .catch(undefined),
  usage: z.object({ completion_tokens: z.unknown() }).partial().optional().catch(undefined),
});

function parseCompletion(text: string): { content: string; completionTokens: number } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { content: '', completionTokens: 0 };
  }
  const parsed = completionBodySchema.safeParse(raw);
  if (!parsed.success) {
    return { content: '', completionTokens: 0 };
  }
  const content = parsed.data.choices?.[0]?.message?.content;
  const tokens = parsed.data.usage?.completion_tokens;
  return {
    content: typeof content === 'string' ? content : '',
    completionTokens: typeof tokens === 'number' && Number.isFinite(tokens) ? tokens : 0,
  };
}

/**
 * Thin client for an OpenAI-compatible `/v1/chat/completions` endpoint.
 * One instance is shared by every session and the health monitor so they all
 * draw from the same connection pool.
 */
export class LlmClient {
  private url: string;
  private apiKey?: string;
  private model: string;
  private fetchFn: FetchFn;
  private agent?: Agent;

  constructor(options: LlmClientOptions) {
    this.url = `${options.endpoint.replace(/\/+$/, '')}/v1/chat/completions`;
    this.apiKey = options.apiKey;
    this.model = options.model;

    if (options.fetch) {
      this.fetchFn = options.fetch;
    } else {
      const agent = new Agent({
        connections: options.poolSize,
        connect: { rejectUnauthorized: options.verifySsl ?? true },
      });
      this.agent = agent;
      this.fetchFn = (url, init) => fetch(url, { ...init, dispatcher: agent });
    }
  }

  get completionsUrl(): string {
    return this.url;
  }

  /**
   * Sends one chat completion. Resolves on 2xx; otherwise rejects with a
   * ClientError, ServerError, RequestTimeoutError or TransportError.
   */
  async complete(prompt: string, params: CompletionParams): Promise<Completion> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(this.url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: prompt }],
          max_tokens: params.maxTokens,
          temperature: params.temperature,
        }),
        signal: AbortSignal.timeout(params.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw classifyFailure(error, params.timeoutMs);
    }

    if (response.status >= 200 && response.status < 300) {
      return { status: response.status, ...parseCompletion(text) };
    }
    if (response.status >= 400 && response.status < 500) {
      throw new ClientError(response.status, text);
    }
    throw new ServerError(response.status, text);
  }

  async close(): Promise<void> {
    await this.agent?.close();
  }
}

export function createClient(config: RunConfig, fetchFn?: FetchFn): LlmClient {
  return new LlmClient({
    endpoint: config.endpoint,
    apiKey: config.apiKey,
    model: config.model,
    verifySsl: config.verifySsl,
    poolSize: config.concurrency + POOL_HEADROOM,
    fetch: fetchFn,
  });
}
