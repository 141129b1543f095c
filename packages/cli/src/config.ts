import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { SchemashiftError, formatZodIssues, tagClassConfigSchema } from '@schemashift/core';
import type { TagClassConfig } from '@schemashift/core';
import { resolveTagClasses } from '@schemashift/rewrite-core';
import type { LogFormat, LogLevel } from './logger.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

function expandEnvInString(input: string): string {
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = process.env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    throw new SchemashiftError({
      code: 'CONFIGURATION_ERROR',
      message: `Missing required environment variable: ${name}`,
      suggestion: `Set ${name} or use \${${name}:-default} in the config file.`,
    });
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed config
 */
export function expandEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v);
    }
    return out;
  }
  return value;
}

export const configFileSchema = z
  .object({
    $schema: z.string().min(1).optional(),
    inputDir: z.string().min(1).optional(),
    outputDir: z.string().min(1).optional(),
    mappingFile: z.string().min(1).optional(),
    tags: tagClassConfigSchema.optional(),
    concurrency: z.number().int().min(1).max(64).optional(),
    timeoutMs: z.number().int().min(1).max(3_600_000).optional(),
    logging: z
      .object({
        format: z.enum(['text', 'json']).optional(),
        level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Settings after defaults and command line flags are applied */
export interface ResolvedConfig {
  inputDir: string;
  outputDir: string;
  mappingFile: string;
  tags: TagClassConfig;
  concurrency: number;
  timeoutMs?: number;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

/** Command line values that take precedence over the config file */
export interface ConfigOverrides {
  inputDir?: string;
  outputDir?: string;
  mappingFile?: string;
  concurrency?: number;
}

export const DEFAULT_CONFIG = {
  inputDir: 'input',
  outputDir: 'output',
  mappingFile: 'schema_mapping.json',
  concurrency: 1,
} as const;

export function parseConfig(content: string, filePath?: string): ConfigFile {
  let parsed: unknown;
  try {
    // Handle UTF-8 BOM (common on Windows) to avoid JSON.parse failures.
    parsed = JSON.parse(content.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new SchemashiftError({
      code: 'CONFIGURATION_ERROR',
      message: `Config file is not valid JSON: ${(error as Error).message}`,
      filePath,
    });
  }

  const result = configFileSchema.safeParse(expandEnvVars(parsed));
  if (!result.success) {
    throw new SchemashiftError({
      code: 'CONFIGURATION_ERROR',
      message: formatZodIssues('Invalid config file', result.error),
      filePath,
    });
  }
  return result.data;
}

export async function loadConfigFile(configPath: string, cwd = process.cwd()): Promise<ConfigFile> {
  const absolutePath = resolve(cwd, configPath);
  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new SchemashiftError({
      code: 'CONFIGURATION_ERROR',
      message: `Cannot read config file: ${(error as Error).message}`,
      filePath: absolutePath,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseConfig(content, absolutePath);
}

/**
 * Merge defaults, config file and overrides. Relative paths resolve
 * against `cwd`.
 */
export function resolveConfig(
  file: ConfigFile | undefined,
  overrides: ConfigOverrides = {},
  cwd = process.cwd()
): ResolvedConfig {
  return {
    inputDir: resolve(cwd, overrides.inputDir ?? file?.inputDir ?? DEFAULT_CONFIG.inputDir),
    outputDir: resolve(cwd, overrides.outputDir ?? file?.outputDir ?? DEFAULT_CONFIG.outputDir),
    mappingFile: resolve(cwd, overrides.mappingFile ?? file?.mappingFile ?? DEFAULT_CONFIG.mappingFile),
    tags: resolveTagClasses(file?.tags),
    concurrency: overrides.concurrency ?? file?.concurrency ?? DEFAULT_CONFIG.concurrency,
    timeoutMs: file?.timeoutMs,
    logging: {
      level: file?.logging?.level ?? 'info',
      format: file?.logging?.format ?? 'text',
    },
  };
}
