import { readFile } from 'node:fs/promises';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ValidationError } from './errors.js';
import type { RunConfig } from './types.js';

loadDotenv();

export const DEFAULT_CONFIG = {
  model: 'llama-scout-17b',
  concurrency: 60,
  durationSeconds: 300,
  maxContextTokens: 6000,
  requestTimeoutSeconds: 60,
  maxRetries: 2,
  verifySsl: false,
} satisfies Omit<RunConfig, 'endpoint' | 'apiKey'>;

const runConfigSchema = z.object({
  endpoint: z
    .string({ required_error: 'endpoint is required' })
    .url('endpoint must be an absolute URL')
    .refine(url => /^https?:\/\//.test(url), 'endpoint must use http or https'),
  apiKey: z.string().optional(),
  model: z.string().min(1, 'model must not be empty'),
  concurrency: z.number().int().min(1, 'concurrency must be at least 1'),
  durationSeconds: z.number().positive('durationSeconds must be positive'),
  maxContextTokens: z.number().int().positive('maxContextTokens must be positive'),
  requestTimeoutSeconds: z.number().positive('requestTimeoutSeconds must be positive'),
  maxRetries: z.number().int().min(0, 'maxRetries must not be negative'),
  verifySsl: z.boolean(),
});

export type PartialRunConfig = { [K in keyof RunConfig]?: RunConfig[K] };

/** Shape accepted from a JSON config file; numeric fields may arrive as strings. */
const fileConfigSchema = z
  .object({
    endpoint: z.string(),
    apiKey: z.string(),
    model: z.string(),
    concurrency: z.coerce.number(),
    durationSeconds: z.coerce.number(),
    maxContextTokens: z.coerce.number(),
    requestTimeoutSeconds: z.coerce.number(),
    maxRetries: z.coerce.number(),
    verifySsl: z.boolean(),
  })
  .partial()
  .strict();

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

const CONFIG_KEYS = [
  'endpoint',
  'apiKey',
  'model',
  'concurrency',
  'durationSeconds',
  'maxContextTokens',
  'requestTimeoutSeconds',
  'maxRetries',
  'verifySsl',
] as const satisfies readonly (keyof RunConfig)[];

function assignDefined<K extends keyof RunConfig>(target: PartialRunConfig, source: PartialRunConfig, key: K): void {
  const value = source[key];
  if (value !== undefined) {
    target[key] = value;
  }
}

/** Later layers win; undefined values never erase an earlier one. */
export function mergeConfig(...layers: PartialRunConfig[]): PartialRunConfig {
  const merged: PartialRunConfig = {};
  for (const layer of layers) {
    for (const key of CONFIG_KEYS) {
      assignDefined(merged, layer, key);
    }
  }
  return merged;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PartialRunConfig {
  return {
    endpoint: env.LLM_ENDPOINT || undefined,
    apiKey: env.LLM_API_KEY || undefined,
    model: env.LLM_MODEL || undefined,
    concurrency: parseNumber(env.LLM_CONCURRENCY),
    durationSeconds: parseNumber(env.LLM_DURATION_SECONDS),
    maxContextTokens: parseNumber(env.LLM_MAX_CONTEXT_TOKENS),
    requestTimeoutSeconds: parseNumber(env.LLM_REQUEST_TIMEOUT_SECONDS),
    maxRetries: parseNumber(env.LLM_MAX_RETRIES),
    verifySsl: parseBoolean(env.LLM_VERIFY_SSL),
  };
}

export async function configFromFile(path: string): Promise<PartialRunConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError([`config file ${path}: ${message}`]);
  }
  const parsed = fileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error).map(issue => `config file ${path}: ${issue}`));
  }
  return parsed.data;
}

/** Validates a fully merged configuration and freezes it for the run. */
export function validateConfig(input: PartialRunConfig): Readonly<RunConfig> {
  const parsed = runConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(formatIssues(parsed.error));
  }
  const { apiKey, ...rest } = parsed.data;
  return Object.freeze({ ...rest, ...(apiKey ? { apiKey } : {}) });
}

/**
 * Merges defaults, environment, an optional config file and explicit
 * overrides (highest precedence), then validates the result.
 */
export async function loadConfig(
  overrides: PartialRunConfig = {},
  configFile?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Readonly<RunConfig>> {
  const fromFile = configFile ? await configFromFile(configFile) : {};
  return validateConfig(mergeConfig(DEFAULT_CONFIG, configFromEnv(env), fromFile, overrides));
}
