/**
 * @schemashift/cli
 *
 * Batch driver and command line program for schemashift
 */

export { runBatch, discoverInputs, summarizeBatch } from './batch.js';
export type { BatchOptions } from './batch.js';
export { TransformerRegistry, createDefaultRegistry } from './transformer-registry.js';
export {
  configFileSchema,
  expandEnvVars,
  parseConfig,
  loadConfigFile,
  resolveConfig,
  DEFAULT_CONFIG,
} from './config.js';
export type { ConfigFile, ResolvedConfig, ConfigOverrides } from './config.js';
export { Logger } from './logger.js';
export type { LogLevel, LogFormat, LoggerOptions } from './logger.js';
export { Semaphore } from './semaphore.js';
export { withTimeout } from './timeout.js';
export { runCli, parseCliArgs, USAGE } from './run.js';
export type { CliArgs, CliIO } from './run.js';
