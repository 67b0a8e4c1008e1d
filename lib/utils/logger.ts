/**
 * @fileoverview Sistema de logging centralizado (electron-log, entrada para Node).
 * @module utils/logger
 *
 * Proporciona logger con scope (child) y operaciones cronometradas.
 * Al cargar el módulo se aplican los niveles de config.logging: consola según LOG_LEVEL
 * y archivo solo si LOG_FILE está definido.
 */

import log from 'electron-log/node';
import path from 'path';
import config from '../config';
import type { LogLevel } from '../config';

export type { LogLevel };

export interface ConfigureLoggerOptions {
  consoleLevel?: LogLevel | false;
  fileLevel?: LogLevel | false;
  /** Ruta del archivo de log; null desactiva el transport de archivo. */
  filePath?: string | null;
  maxSize?: number;
}

/**
 * Convierte un valor a string para logging: Errors con stack, objetos a JSON, primitivos a String.
 */
function formatObject(obj: unknown): string {
  if (obj === null) return 'null';
  if (obj === undefined) return 'undefined';
  if (typeof obj === 'string') return obj;
  if (obj instanceof Error) {
    return `${obj.message}\n${obj.stack ?? ''}`;
  }
  try {
    return JSON.stringify(obj, null, 2);
  } catch {
    return String(obj);
  }
}

export interface ScopedLogger {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  verbose: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  silly: (..._args: unknown[]) => void;
  startOperation: (_operation: string) => (_result?: string) => void;
  child: (_subScope: string) => ScopedLogger;
}

const childLoggers = new Map<string, ScopedLogger>();

export function createScopedLogger(scope: string): ScopedLogger {
  const existing = childLoggers.get(scope);
  if (existing) return existing;

  const baseChildLog = log.scope(scope);

  const logMethod =
    (method: LogLevel) =>
    (...args: unknown[]): void => {
      if (
        args.length === 2 &&
        typeof args[0] === 'string' &&
        typeof args[1] === 'object' &&
        args[1] !== null
      ) {
        baseChildLog[method](args[0], formatObject(args[1]));
      } else {
        baseChildLog[method](...args);
      }
    };

  const extendedChildLog: ScopedLogger = {
    error: logMethod('error'),
    warn: logMethod('warn'),
    info: logMethod('info'),
    verbose: logMethod('verbose'),
    debug: logMethod('debug'),
    silly: logMethod('silly'),
    startOperation(operation: string) {
      const start = Date.now();
      baseChildLog.verbose(`▶ Iniciando: ${operation}`);
      return (result = 'completado') => {
        const duration = Date.now() - start;
        baseChildLog.info(`✓ ${operation}: ${result} (${duration}ms)`);
      };
    },
    child(subScope: string) {
      return createScopedLogger(`${scope}:${subScope}`);
    },
  };

  childLoggers.set(scope, extendedChildLog);
  return extendedChildLog;
}

/**
 * Configura los transports de electron-log. Sin filePath el log a archivo queda desactivado.
 */
export function configureLogger(options: ConfigureLoggerOptions = {}): typeof log {
  const {
    consoleLevel = config.logging.level,
    fileLevel = config.logging.level,
    filePath = config.logging.file,
    maxSize = config.logging.maxSize,
  } = options;

  log.transports.console.level = consoleLevel;
  log.transports.console.format = '[{h}:{i}:{s}] [{level}]{scope} {text}';

  if (filePath) {
    const resolved = path.resolve(filePath);
    log.transports.file.resolvePathFn = () => resolved;
    log.transports.file.level = fileLevel;
    log.transports.file.maxSize = maxSize;
    log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}]{scope} {text}';
  } else {
    log.transports.file.level = false;
  }

  return log;
}

export interface LoggerInstance {
  error: (..._args: unknown[]) => void;
  warn: (..._args: unknown[]) => void;
  info: (..._args: unknown[]) => void;
  verbose: (..._args: unknown[]) => void;
  debug: (..._args: unknown[]) => void;
  child: (_scope: string) => ScopedLogger;
  configure: typeof configureLogger;
}

export const logger: LoggerInstance = {
  error: (...args: unknown[]) => log.error(...args),
  warn: (...args: unknown[]) => log.warn(...args),
  info: (...args: unknown[]) => log.info(...args),
  verbose: (...args: unknown[]) => log.verbose(...args),
  debug: (...args: unknown[]) => log.debug(...args),
  child: (scope: string) => createScopedLogger(scope),
  configure: configureLogger,
};

configureLogger();

export { logger as log };
