#!/usr/bin/env node

import { writeFile } from 'node:fs/promises';
import { Command, InvalidArgumentError, Option } from 'commander';
import { loadConfig } from './config.js';
import type { PartialRunConfig } from './config.js';
import { ValidationError } from './errors.js';
import { Reporter } from './reporter.js';
import type { OutputFormat } from './reporter.js';
import { DEFAULT_OUTPUT_DIR, PendingStop, start } from './runner.js';

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

function parsePositiveDecimal(value: string): number {
  const parsed = parseDecimal(value);
  if (parsed <= 0) {
    throw new InvalidArgumentError('Must be greater than zero.');
  }
  return parsed;
}

interface ConfigFlags {
  config?: string;
  endpoint?: string;
  apiKey?: string;
  model?: string;
  concurrency?: number;
  duration?: number;
  maxContext?: number;
  timeout?: number;
  retries?: number;
  verifySsl?: boolean;
}

interface RunFlags extends ConfigFlags {
  outputDir: string;
  output: OutputFormat;
  healthInterval?: number;
}

function withConfigOptions(command: Command): Command {
  return command
    .option('--config <file>', 'JSON config file (fields named like the flags below, camelCase)')
    .option('-e, --endpoint <url>', 'Base URL of the OpenAI-compatible API (env: LLM_ENDPOINT)')
    .option('-k, --api-key <key>', 'Bearer credential (env: LLM_API_KEY)')
    .option('-m, --model <name>', 'Model identifier (env: LLM_MODEL)')
    .option('-c, --concurrency <number>', 'Number of simulated users', parseInteger)
    .option('-d, --duration <seconds>', 'Test duration in seconds', parseDecimal)
    .option('--max-context <tokens>', 'Max context tokens per prompt', parseInteger)
    .option('-t, --timeout <seconds>', 'Per-request timeout in seconds', parseDecimal)
    .option('-r, --retries <number>', 'Max retries per request', parseInteger)
    .option('--verify-ssl', 'Verify TLS certificates')
    .option('--no-verify-ssl', 'Skip TLS certificate verification');
}

function overridesFrom(flags: ConfigFlags): PartialRunConfig {
  return {
    endpoint: flags.endpoint,
    apiKey: flags.apiKey,
    model: flags.model,
    concurrency: flags.concurrency,
    durationSeconds: flags.duration,
    maxContextTokens: flags.maxContext,
    requestTimeoutSeconds: flags.timeout,
    maxRetries: flags.retries,
    verifySsl: flags.verifySsl,
  };
}

function fail(error: unknown): never {
  if (error instanceof ValidationError) {
    console.error('Error: invalid configuration');
    for (const issue of error.issues) {
      console.error(`  - ${issue}`);
    }
  } else if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error('An unknown error occurred');
  }
  process.exit(2);
}

const program = new Command();

program
  .name('llm-load')
  .description('CLI load testing tool for OpenAI-compatible LLM completion endpoints')
  .version('1.0.0');

withConfigOptions(
  program
    .command('run', { isDefault: true })
    .description('Simulate concurrent users against the endpoint for a fixed duration'),
)
  .option('--output-dir <dir>', 'Directory for the JSON results file', DEFAULT_OUTPUT_DIR)
  .addOption(
    new Option('-o, --output <format>', 'Report format').choices(['pretty', 'json', 'csv']).default('pretty'),
  )
  .option('--health-interval <seconds>', 'Seconds between health probes', parsePositiveDecimal)
  .action(async (flags: RunFlags) => {
    try {
      const config = await loadConfig(overridesFrom(flags), flags.config);
      const reporter = new Reporter({ format: flags.output });
      reporter.start(config);

      // First Ctrl+C stops gracefully, a second one exits immediately. The
      // handler is live during setup so the preflight probe is covered too.
      const pendingStop = new PendingStop();
      process.once('SIGINT', () => {
        reporter.onStopRequested();
        pendingStop.request();
        process.once('SIGINT', () => process.exit(130));
      });

      const handle = await start(config, {
        outputDir: flags.outputDir,
        observer: reporter,
        timing: flags.healthInterval !== undefined ? { healthIntervalMs: flags.healthInterval * 1000 } : {},
      });
      pendingStop.attach(handle);

      const result = await handle.done;
      reporter.finish(result);

      process.exit(result.report.statusCounts.success.count === result.report.totalRequests ? 0 : 1);
    } catch (error) {
      fail(error);
    }
  });

withConfigOptions(
  program
    .command('save-config <file>')
    .description('Validate the merged configuration and write it as JSON'),
)
  .option('--include-key', 'Keep the API key in the written file')
  .action(async (file: string, flags: ConfigFlags & { includeKey?: boolean }) => {
    try {
      const { apiKey, ...rest } = await loadConfig(overridesFrom(flags), flags.config);
      const saved = flags.includeKey && apiKey ? { ...rest, apiKey } : rest;
      await writeFile(file, JSON.stringify(saved, null, 2) + '\n', 'utf8');
      console.log(`Configuration saved to ${file}`);
    } catch (error) {
      fail(error);
    }
  });

await program.parseAsync();
