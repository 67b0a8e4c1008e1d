/**
 * @fileoverview Módulo índice que centraliza las utilidades reexportadas.
 * @module utils
 */

export {
  logger,
  log,
  configureLogger,
  createScopedLogger,
} from './logger';
export type { ScopedLogger, LoggerInstance, ConfigureLoggerOptions } from './logger';

export * from './fileHelpers';

export * as schemas from './schemas';
