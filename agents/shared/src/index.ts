/**
 * Shared Agent Utilities
 */

export { Logger, initLogger, getLogger } from './logger';
export type { LoggerOptions, LogMeta } from './logger';

export { AppError, ConfigError, ValidationError, toErrorMessage } from './errors';

export { ConfigLoader } from './config/loader';
export type { ConfigOptions } from './config/loader';

export { CLIUtils } from './cli';
export type { TableCell } from './cli';
