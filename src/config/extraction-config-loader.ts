import { readFileSync } from 'node:fs';
import path from 'node:path';
import { parseDocument } from 'yaml';

import { configInvalidError, describeThrown } from '../kernel/extraction-error.js';
import { ExtractionConfigSchema, type ExtractionConfig } from './extraction-config-types.js';

export interface ParseExtractionConfigOptions {
  /** Directory relative paths resolve against. */
  readonly baseDir: string;
  readonly configPath?: string;
}

export function parseExtractionConfig(raw: unknown, options: ParseExtractionConfigOptions): ExtractionConfig {
  const result = ExtractionConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.map(String).join('.') : 'config'}: ${issue.message}`,
    );
    throw configInvalidError(`Invalid extraction config${options.configPath === undefined ? '' : ` ${options.configPath}`}.`, {
      ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
      issues,
    });
  }

  const config = result.data;
  const resolve = (filePath: string): string => path.resolve(options.baseDir, filePath);
  return {
    ...config,
    source: resolve(config.source),
    output: resolve(config.output),
    ...(config.companion === undefined ? {} : { companion: resolve(config.companion) }),
    ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
  };
}

export function parseExtractionConfigText(text: string, options: ParseExtractionConfigOptions): ExtractionConfig {
  const document = parseDocument(text, {
    schema: 'core',
    strict: true,
    uniqueKeys: true,
  });

  if (document.errors.length > 0) {
    throw configInvalidError('Extraction config is not valid YAML.', {
      ...(options.configPath === undefined ? {} : { configPath: options.configPath }),
      issues: document.errors.map((error) => {
        const line = error.linePos?.[0]?.line;
        return line === undefined ? error.message : `line ${line}: ${error.message}`;
      }),
    });
  }

  return parseExtractionConfig(document.toJSON(), options);
}

export function loadExtractionConfig(configPath: string): ExtractionConfig {
  const absolutePath = path.resolve(configPath);
  let text: string;
  try {
    text = readFileSync(absolutePath, 'utf8');
  } catch (error) {
    throw configInvalidError(`Cannot read extraction config ${absolutePath}.`, {
      configPath: absolutePath,
      issues: [describeThrown(error)],
    });
  }
  return parseExtractionConfigText(text, { baseDir: path.dirname(absolutePath), configPath: absolutePath });
}
