/**
 * Unit Tests: run document layout and results file handling.
 */
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SetupError } from '../../src/errors.js';
import {
  RESPONSE_SAMPLE_LIMIT,
  buildRunDocument,
  prepareOutputDir,
  resultFileName,
  writeRunDocument,
} from '../../src/persistence.js';
import type { RunDocumentInput } from '../../src/persistence.js';
import { mockHealthSample, mockOutcome, testConfig } from '../helpers/mock-fetch.js';

function documentInput(overrides: Partial<RunDocumentInput> = {}): RunDocumentInput {
  return {
    runId: 'load-test-1',
    config: testConfig(),
    startedAt: Date.UTC(2024, 0, 5, 9, 3, 7),
    wallClockMs: 1500,
    stoppedEarly: false,
    endpointAlive: true,
    preflight: mockHealthSample(),
    outcomes: [],
    healthSamples: [],
    ...overrides,
  };
}

describe('resultFileName', () => {
  it('embeds a millisecond-resolution local timestamp', () => {
    expect(resultFileName(new Date(2024, 0, 5, 9, 3, 7, 42))).toBe('load_test_results_20240105_090307_042.json');
  });
});

describe('buildRunDocument', () => {
  it('records the configuration without the credential', () => {
    const document = buildRunDocument(documentInput());

    expect(document.config).toEqual({
      endpoint: 'https://mock.llm.test',
      model: 'test-model',
      concurrent_users: 2,
      test_duration: 1,
      max_context: 1000,
      request_timeout: 1,
      max_retries: 2,
      verify_ssl: false,
    });
    expect(JSON.stringify(document)).not.toContain('test-secret');
    expect(document.started_at).toBe('2024-01-05T09:03:07.000Z');
  });

  it('summarizes outcomes and health', () => {
    const document = buildRunDocument(
      documentInput({
        outcomes: [
          mockOutcome(),
          mockOutcome({ status: 'server_error_exhausted', error: 'HTTP 503: busy', response: undefined, retryCount: 2 }),
          mockOutcome({ status: 'client_error', error: 'HTTP 400: bad', response: undefined }),
        ],
        healthSamples: [mockHealthSample(), mockHealthSample({ healthy: false, status: 'unhealthy', httpStatus: 503 })],
        endpointAlive: false,
        stoppedEarly: true,
      }),
    );

    expect(document.summary).toEqual({
      total_requests: 3,
      successful: 1,
      client_errors: 1,
      server_errors: 1,
      timeouts: 0,
      transport_errors: 0,
      retried: 1,
      test_duration: 1.5,
      stopped_early: true,
      endpoint_health: { total_checks: 2, healthy_checks: 1, final_status: 'unhealthy' },
    });
  });

  it('writes one result row per outcome in snake_case', () => {
    const document = buildRunDocument(
      documentInput({ outcomes: [mockOutcome({ status: 'timeout_exhausted', error: 'Request timeout', response: undefined })] }),
    );

    expect(document.results).toEqual([
      {
        user_id: 0,
        request_type: 'MCP_file_search',
        context_length: 300,
        status: 'timeout_exhausted',
        response_time_ms: 100,
        tokens_sent: 280,
        tokens_received: 20,
        response_content: null,
        timestamp: 1_700_000_000_000,
        retry_count: 0,
        error: 'Request timeout',
      },
    ]);
  });

  it('keeps a bounded set of response samples from successes', () => {
    const outcomes = Array.from({ length: 60 }, (_, userId) => mockOutcome({ userId, response: 'r'.repeat(800) }));
    const document = buildRunDocument(documentInput({ outcomes }));

    expect(document.response_samples).toHaveLength(RESPONSE_SAMPLE_LIMIT);
    expect(document.response_samples[0]).toEqual({
      user_id: 0,
      request_type: 'MCP_file_search',
      timestamp: 1_700_000_000_000,
      response: 'r'.repeat(500),
    });
    expect(document.results[0].response_content).toBe('r'.repeat(800));
  });
});

describe('results files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'llm-load-results-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates nested output directories', async () => {
    await expect(prepareOutputDir(join(dir, 'a', 'b'))).resolves.toBeUndefined();
  });

  it('raises SetupError when the directory cannot be created', async () => {
    const file = join(dir, 'not-a-dir');
    await writeFile(file, '');

    await expect(prepareOutputDir(join(file, 'results'))).rejects.toThrow(SetupError);
  });

  it('writes the document as JSON and never overwrites', async () => {
    const document = buildRunDocument(documentInput({ outcomes: [mockOutcome()] }));
    const now = new Date(2024, 0, 5, 9, 3, 7, 42);

    const path = await writeRunDocument(dir, document, now);

    expect(path).toBe(join(dir, 'load_test_results_20240105_090307_042.json'));
    expect(JSON.parse(await readFile(path, 'utf8'))).toEqual(document);
    await expect(writeRunDocument(dir, document, now)).rejects.toThrow(/EEXIST/);
  });
});
