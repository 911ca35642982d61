#!/usr/bin/env node

/**
 * site-analyzer CLI
 *
 * Usage:
 *   site-analyzer analyze example.com                   - Markdown report on stdout
 *   site-analyzer analyze example.com --format json     - JSON export on stdout
 *   site-analyzer analyze example.com --json --csv      - Also write export files
 *   site-analyzer analyze example.com --out ./reports   - Store JSON, CSV and Markdown under a report id
 *   site-analyzer analyze example.com --browser         - Render with Chrome (CHROME_EXECUTABLE_PATH)
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { writeFile } from 'fs/promises';
import {
  csvExportFileName,
  jsonExportFileName,
  renderMarkdown,
  serializeCsv,
  serializeJson,
} from './aggregator/index.js';
import { loadConfig, type AppConfig, type BatteryName } from './config/index.js';
import { ConfigError, MissingCredentialError } from './errors/index.js';
import { createConsoleLogger, errorMessage, setLogLevel } from './logging/index.js';
import {
  createExportStorage,
  createPipelineDeps,
  runPipeline,
  type PipelineDeps,
  type ServiceOverrides,
} from './pipeline/index.js';
import { saveReport } from './storage/index.js';

export interface CliRuntime {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  overrides?: ServiceOverrides;
}

interface AnalyzeOptions {
  browser?: boolean;
  limit?: number;
  battery?: BatteryName;
  json?: string | boolean;
  csv?: string | boolean;
  out?: string;
  format: 'markdown' | 'json';
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

function parseChoice<T extends string>(choices: readonly T[]): (value: string) => T {
  return (value) => {
    const match = choices.find((choice) => choice === value);
    if (!match) {
      throw new InvalidArgumentError(`Allowed choices are ${choices.join(', ')}.`);
    }
    return match;
  };
}

function applyOptions(config: AppConfig, options: AnalyzeOptions): AppConfig {
  return {
    ...config,
    fetch: { ...config.fetch, mode: options.browser ? 'browser' : config.fetch.mode },
    analysis: {
      contentLimit: options.limit ?? config.analysis.contentLimit,
      battery: options.battery ?? config.analysis.battery,
    },
  };
}

async function analyzeCommand(rawUrl: string, options: AnalyzeOptions, runtime: CliRuntime): Promise<number> {
  let config: AppConfig;
  try {
    config = applyOptions(loadConfig(runtime.env), options);
  } catch (error) {
    if (error instanceof MissingCredentialError || error instanceof ConfigError) {
      runtime.stderr(`${error.message}\n`);
      return 1;
    }
    throw error;
  }
  setLogLevel(config.logLevel);
  const logger = runtime.overrides?.logger ?? createConsoleLogger('cli');

  let deps: PipelineDeps;
  try {
    deps = createPipelineDeps(config, runtime.overrides);
  } catch (error) {
    if (error instanceof ConfigError) {
      runtime.stderr(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const outcome = await runPipeline(rawUrl, {
    ...deps,
    onStage: (event) => logger.info('Progress', { stage: event.stage, progress: event.progress }),
  });

  if (outcome.status === 'invalid_url') {
    runtime.stderr(`Invalid URL: ${outcome.error}\n`);
    return 1;
  }
  if (outcome.status === 'fetch_failed') {
    runtime.stderr(`Failed to fetch ${outcome.url}: ${outcome.error}\n`);
    return 1;
  }

  const { bundle } = outcome;
  runtime.stdout(options.format === 'json' ? `${serializeJson(bundle)}\n` : renderMarkdown(bundle));

  if (options.json) {
    const path = typeof options.json === 'string' ? options.json : jsonExportFileName(bundle.website_url);
    await writeFile(path, serializeJson(bundle), 'utf-8');
    runtime.stderr(`JSON report written to ${path}\n`);
  }
  if (options.csv) {
    const path = typeof options.csv === 'string' ? options.csv : csvExportFileName(new Date(bundle.timestamp));
    await writeFile(path, serializeCsv(bundle), 'utf-8');
    runtime.stderr(`CSV data written to ${path}\n`);
  }

  const storage = createExportStorage(config, options.out);
  if (storage) {
    const saved = await saveReport(bundle, storage, logger);
    if (!saved.success) {
      runtime.stderr(`Export failed: ${saved.error?.message ?? 'unknown error'}\n`);
      return 1;
    }
    runtime.stderr(`Report ${bundle.reportId} exported (${saved.data?.length ?? 0} files)\n`);
  }

  return 0;
}

/**
 * Build the command tree. The action stores its exit code in `result.code`.
 */
export function createProgram(runtime: CliRuntime, result: { code: number }): Command {
  const program = new Command();

  program
    .name('site-analyzer')
    .description('Marketing analysis of a web page with a language model')
    .exitOverride()
    .configureOutput({
      writeOut: runtime.stdout,
      writeErr: runtime.stderr,
    });

  program
    .command('analyze')
    .description('Fetch a page, analyze it and print the report')
    .argument('<url>', 'page to analyze; https:// is assumed when no scheme is given')
    .option('--browser', 'render the page with Chrome instead of a plain HTTP fetch')
    .option('--limit <n>', 'truncation bound for page text in characters', parsePositiveInt)
    .option('--battery <name>', 'analysis battery: standard or extended', parseChoice(['standard', 'extended'] as const))
    .option('--json [file]', 'write the JSON export (default name derived from the URL)')
    .option('--csv [file]', 'write the one-row CSV export (default name derived from the time)')
    .option('--out <dir>', 'store JSON, CSV and Markdown under <dir>/<report id>')
    .option('--format <format>', 'stdout format: markdown or json', parseChoice(['markdown', 'json'] as const), 'markdown')
    .action(async (url: string, options: AnalyzeOptions) => {
      result.code = await analyzeCommand(url, options, runtime);
    });

  return program;
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function runCli(argv: string[], runtime: CliRuntime): Promise<number> {
  const result = { code: 0 };
  try {
    await createProgram(runtime, result).parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    runtime.stderr(`${errorMessage(error)}\n`);
    return 1;
  }
  return result.code;
}

if (require.main === module) {
  runCli(process.argv.slice(2), {
    env: process.env,
    stdout: (text) => process.stdout.write(text),
    stderr: (text) => process.stderr.write(text),
  })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(errorMessage(error));
      process.exitCode = 1;
    });
}
