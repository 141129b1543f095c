/**
 * Command line program
 *
 * Usage:
 *   schemashift [--config ./schemashift.json] [--input dir] [--output dir]
 *               [--mappings file] [--concurrency n] [--check]
 */

import { SchemashiftError } from '@schemashift/core';
import { loadMappingTable } from '@schemashift/archive';
import { formatBatchReport } from '@schemashift/rewrite-core';
import { runBatch } from './batch.js';
import { loadConfigFile, resolveConfig, type ConfigOverrides } from './config.js';
import { Logger } from './logger.js';
import { createDefaultRegistry } from './transformer-registry.js';

export interface CliArgs extends ConfigOverrides {
  configPath?: string;
  /** Validate the mapping file only */
  check: boolean;
  help: boolean;
}

export interface CliIO {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  cwd: string;
}

export const USAGE = [
  'Usage: schemashift [options]',
  '',
  'Options:',
  '  --config <file>      JSON config file',
  '  --input <dir>        Directory with project files (default: input)',
  '  --output <dir>       Directory for rewritten files (default: output)',
  '  --mappings <file>    Mapping file (default: schema_mapping.json)',
  '  --concurrency <n>    Files processed at the same time (default: 1)',
  '  --check              Validate the mapping file and exit',
  '  -h, --help           Show this help',
  '',
  'Example mapping file:',
  JSON.stringify(
    {
      mappings: [
        { source_schema: 'WORK', target_schema: 'bronze', source_table: 'ORDERS', target_table: 'orders' },
        { source_schema: 'WORK', target_schema: 'staging' },
      ],
    },
    null,
    2
  ),
].join('\n');

const VALUE_FLAGS: Record<string, keyof Omit<CliArgs, 'check' | 'help' | 'concurrency'>> = {
  '--config': 'configPath',
  '--input': 'inputDir',
  '--output': 'outputDir',
  '--mappings': 'mappingFile',
};

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { check: false, help: false };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i] ?? '';

    if (flag === '--check') {
      args.check = true;
      continue;
    }
    if (flag === '--help' || flag === '-h') {
      args.help = true;
      continue;
    }

    const value = argv[i + 1];
    if (flag === '--concurrency') {
      const parsed = Number(value);
      if (!Number.isInteger(parsed) || parsed < 1) {
        throw new SchemashiftError({
          code: 'CONFIGURATION_ERROR',
          message: `--concurrency expects a positive integer (got ${value ?? 'nothing'})`,
        });
      }
      args.concurrency = parsed;
      i++;
      continue;
    }

    const key = Object.hasOwn(VALUE_FLAGS, flag) ? VALUE_FLAGS[flag] : undefined;
    if (!key) {
      throw new SchemashiftError({
        code: 'CONFIGURATION_ERROR',
        message: `Unknown option: ${flag}`,
      });
    }
    if (value === undefined || value.startsWith('--')) {
      throw new SchemashiftError({
        code: 'CONFIGURATION_ERROR',
        message: `${flag} expects a value`,
      });
    }
    args[key] = value;
    i++;
  }

  return args;
}

/**
 * Run the program and return its exit code
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = { stdout: process.stdout, stderr: process.stderr, cwd: process.cwd() }
): Promise<number> {
  let logger = new Logger({ stream: io.stderr });

  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout.write(`${USAGE}\n`);
      return 0;
    }

    const file = args.configPath ? await loadConfigFile(args.configPath, io.cwd) : undefined;
    const config = resolveConfig(file, args, io.cwd);
    logger = new Logger({ ...config.logging, stream: io.stderr });

    const { table, warnings } = await loadMappingTable(config.mappingFile);
    const findings = [...warnings, ...table.findDuplicates()];
    for (const finding of findings) {
      logger.warn(finding.message, { kind: finding.kind });
    }
    logger.info(`Loaded ${table.size} mapping rules`, { mappingFile: config.mappingFile });

    if (args.check) {
      io.stdout.write(`${table.size} rules loaded, ${findings.length} warnings\n`);
      return table.isEmpty ? 1 : 0;
    }

    const report = await runBatch({
      inputDir: config.inputDir,
      outputDir: config.outputDir,
      table,
      registry: createDefaultRegistry({ tagClasses: config.tags }),
      concurrency: config.concurrency,
      timeoutMs: config.timeoutMs,
      logger,
    });

    io.stdout.write(`${formatBatchReport(report)}\n`);
    return report.failed > 0 ? 1 : 0;
  } catch (error) {
    if (error instanceof SchemashiftError) {
      io.stderr.write(`${error.toActionableMessage()}\n`);
    } else {
      logger.error('Unexpected failure', { error });
    }
    return 1;
  }
}
