#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';

import { loadExtractionConfig } from '../config/extraction-config-loader.js';
import { describeThrown, errorDetails } from '../kernel/extraction-error.js';
import { consoleSink, RunLogger, type LogLevel, type LogSink } from '../harness/logger.js';
import { runExtraction } from '../harness/run-extraction.js';

export const USAGE = 'Usage: decl-extract --config <file> [--output <file>] [--quiet] [--verbose]';

export interface CliOptions {
  readonly configPath: string;
  readonly outputPath?: string;
  readonly threshold: LogLevel;
}

export type CliParseResult =
  | { readonly ok: true; readonly options: CliOptions }
  | { readonly ok: false; readonly message: string };

export function parseCliArgs(args: readonly string[]): CliParseResult {
  let configPath: string | undefined;
  let outputPath: string | undefined;
  let threshold: LogLevel = 'info';

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === '--quiet') {
      threshold = 'warn';
    } else if (arg === '--verbose') {
      threshold = 'debug';
    } else if (arg === '--config' || arg === '--output') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        return { ok: false, message: `${arg} needs a file argument.` };
      }
      if (arg === '--config') configPath = value;
      else outputPath = value;
      i += 1;
    } else {
      return { ok: false, message: `Unknown argument ${String(arg)}.` };
    }
  }

  if (configPath === undefined) {
    return { ok: false, message: '--config is required.' };
  }
  return {
    ok: true,
    options: outputPath === undefined ? { configPath, threshold } : { configPath, outputPath, threshold },
  };
}

/** Runs one extraction from command-line arguments and returns the exit status. */
export function main(args: readonly string[], sink: LogSink = consoleSink): number {
  const parsed = parseCliArgs(args);
  const cliLogger = RunLogger.scope('decl-extract', sink);
  if (!parsed.ok) {
    cliLogger.error(parsed.message);
    cliLogger.error(USAGE);
    return 2;
  }

  const { options } = parsed;
  try {
    const config = loadExtractionConfig(options.configPath);
    const logger = RunLogger.scope(config.domain, sink, options.threshold);
    runExtraction(config, options.outputPath === undefined ? { logger } : { logger, outputPath: options.outputPath });
    return 0;
  } catch (error) {
    cliLogger.error(describeThrown(error));
    for (const detail of errorDetails(error)) {
      cliLogger.error(`  ${detail}`);
    }
    return 1;
  }
}

const invokedDirectly = (): boolean => {
  const script = process.argv[1];
  if (script === undefined) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
};

if (invokedDirectly()) {
  process.exitCode = main(process.argv.slice(2));
}
