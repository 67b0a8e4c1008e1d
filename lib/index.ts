/**
 * API pública: motor de descargas, configuración y logger.
 *
 * @module chunked-downloader
 */

export * from './engines';
export { default as config, loadConfig, defaultConfig } from './config';
export type { EngineConfig, LogLevel } from './config';
export { logger, configureLogger, formatBytes } from './utils';
export type { TaskInput } from './utils/schemas';
export { ERRORS, DOWNLOAD_ERRORS, NETWORK_ERRORS, GENERAL_ERRORS } from './constants/errors';
