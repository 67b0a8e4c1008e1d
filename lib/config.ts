/**
 * Configuración por defecto del motor de descargas (valores de runtime).
 *
 * Los valores se pueden sobrescribir con variables de entorno (DOWNLOAD_THREADS,
 * CHUNK_SIZE, MAX_RETRIES, ...). loadConfig valida el entorno con zod y lanza
 * ConfigError si algún valor no es válido; el export por defecto es la configuración
 * resuelta a partir de process.env al cargar el módulo.
 *
 * @module config
 */

import { envConfigSchema, formatZodIssues } from './utils/schemas';
import { ConfigError } from './engines/errors';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

export interface EngineConfig {
  downloads: {
    /** Tamaño del pool de workers (chunks en vuelo a la vez). */
    threads: number;
    /** Tamaño de cada chunk en bytes. */
    chunkSize: number;
    /** Reintentos adicionales por chunk tras el primer intento. */
    maxRetries: number;
    digestAlgorithm: string;
    /** Conservar el sidecar de progreso tras una descarga exitosa. */
    retainProgressRecord: boolean;
    progressSuffix: string;
  };
  network: {
    retryBaseDelayMs: number;
    retryMaxDelayMs: number;
    /** Jitter relativo (0.0-1.0) aplicado al delay calculado. */
    retryJitter: number;
    /** Tope para delays pedidos por el servidor vía Retry-After. */
    retryAfterMaxMs: number;
    /** Timeout de inactividad por intento (socket sin datos). */
    requestTimeoutMs: number;
    maxRedirects: number;
    headers: Readonly<Record<string, string>>;
  };
  verifier: {
    bufferSize: number;
  };
  ui: {
    progressThrottle: number;
  };
  logging: {
    level: LogLevel;
    file: string | null;
    maxSize: number;
  };
}

const defaults: EngineConfig = {
  downloads: {
    threads: 16,
    chunkSize: 6 * 1024 * 1024,
    maxRetries: 5,
    digestAlgorithm: 'sha256',
    retainProgressRecord: false,
    progressSuffix: '.progress.json',
  },
  network: {
    retryBaseDelayMs: 500,
    retryMaxDelayMs: 30000,
    retryJitter: 0.3,
    retryAfterMaxMs: 300000,
    requestTimeoutMs: 30000,
    maxRedirects: 5,
    headers: Object.freeze({
      'User-Agent':
        'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
      Accept: '*/*',
      // Los rangos deben mapear a bytes del archivo, no del cuerpo comprimido
      'Accept-Encoding': 'identity',
      Connection: 'keep-alive',
    }),
  },
  verifier: {
    bufferSize: 1024 * 1024,
  },
  ui: {
    progressThrottle: 200,
  },
  logging: {
    level: 'info',
    file: null,
    maxSize: 10 * 1024 * 1024,
  },
};

/**
 * Resuelve la configuración a partir de un entorno (por defecto process.env).
 *
 * @throws ConfigError si alguna variable tiene un valor inválido.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = envConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(formatZodIssues(parsed.error));
  }
  const e = parsed.data;

  return {
    downloads: {
      ...defaults.downloads,
      threads: e.DOWNLOAD_THREADS ?? defaults.downloads.threads,
      chunkSize: e.CHUNK_SIZE ?? defaults.downloads.chunkSize,
      maxRetries: e.MAX_RETRIES ?? defaults.downloads.maxRetries,
    },
    network: {
      ...defaults.network,
      retryBaseDelayMs: e.RETRY_BASE_DELAY_MS ?? defaults.network.retryBaseDelayMs,
      retryMaxDelayMs: e.RETRY_MAX_DELAY_MS ?? defaults.network.retryMaxDelayMs,
      requestTimeoutMs: e.REQUEST_TIMEOUT_MS ?? defaults.network.requestTimeoutMs,
    },
    verifier: { ...defaults.verifier },
    ui: { ...defaults.ui },
    logging: {
      ...defaults.logging,
      level: e.LOG_LEVEL ?? defaults.logging.level,
      file: e.LOG_FILE ?? defaults.logging.file,
    },
  };
}

export const defaultConfig: Readonly<EngineConfig> = defaults;

const config: EngineConfig = loadConfig();

export default config;
