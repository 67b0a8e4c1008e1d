/**
 * Taxonomía de errores del motor de descargas.
 *
 * Todos extienden DownloadError y llevan un `code` estable para que el llamador
 * pueda distinguirlos sin depender del texto. Los errores por chunk se reintentan
 * dentro del ChunkFetcher; solo ChunkFetchError, RangeUnsupportedError y
 * DownloadCancelledError llegan al coordinador.
 *
 * @module engines/errors
 */

import { DOWNLOAD_ERRORS, GENERAL_ERRORS, NETWORK_ERRORS } from '../constants/errors';

export type DownloadErrorCode =
  | 'INVALID_SIZE'
  | 'INVALID_CONFIG'
  | 'INVALID_TASK'
  | 'RANGE_UNSUPPORTED'
  | 'CHUNK_FETCH_FAILED'
  | 'DOWNLOAD_FAILED'
  | 'INTEGRITY_MISMATCH'
  | 'CANCELLED'
  | `HTTP_${number}`;

export class DownloadError extends Error {
  readonly code: DownloadErrorCode;

  constructor(code: DownloadErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Entradas de planificación inválidas (bug del llamador, no reintentable). */
export class InvalidSizeError extends DownloadError {
  constructor(detail: string) {
    super('INVALID_SIZE', `${DOWNLOAD_ERRORS.INVALID_SIZE}: ${detail}`);
  }
}

export class ConfigError extends DownloadError {
  constructor(detail: string) {
    super('INVALID_CONFIG', `${GENERAL_ERRORS.INVALID_CONFIG}: ${detail}`);
  }
}

export class InvalidTaskError extends DownloadError {
  constructor(detail: string) {
    super('INVALID_TASK', `${DOWNLOAD_ERRORS.INVALID_TASK}: ${detail}`);
  }
}

/** El servidor ignoró el Range (HTTP 200) o devolvió otro rango; dispara el fallback a stream único. */
export class RangeUnsupportedError extends DownloadError {
  readonly statusCode: number;
  readonly chunkIndex: number;

  constructor(chunkIndex: number, statusCode: number, detail: string = NETWORK_ERRORS.RANGE_UNSUPPORTED) {
    super('RANGE_UNSUPPORTED', `${detail} (chunk ${chunkIndex}, HTTP ${statusCode})`);
    this.statusCode = statusCode;
    this.chunkIndex = chunkIndex;
  }
}

/** Respuesta HTTP fuera de 2xx. retryAfterMs viene de la cabecera Retry-After (429/503). */
export class HttpStatusError extends DownloadError {
  readonly statusCode: number;
  readonly retryAfterMs: number | null;

  constructor(statusCode: number, statusMessage = '', retryAfterMs: number | null = null) {
    super(`HTTP_${statusCode}`, `HTTP ${statusCode} ${statusMessage}`.trim());
    this.statusCode = statusCode;
    this.retryAfterMs = retryAfterMs;
  }
}

/** Un chunk agotó su presupuesto de reintentos. */
export class ChunkFetchError extends DownloadError {
  readonly chunkIndex: number;
  readonly attempts: number;

  constructor(chunkIndex: number, attempts: number, cause: unknown) {
    const causeMsg = cause instanceof Error ? cause.message : String(cause);
    super(
      'CHUNK_FETCH_FAILED',
      `${DOWNLOAD_ERRORS.CHUNK_FAILED} (chunk ${chunkIndex}, ${attempts} intentos): ${causeMsg}`,
      { cause }
    );
    this.chunkIndex = chunkIndex;
    this.attempts = attempts;
  }
}

/** Error a nivel de tarea. chunkIndex es null cuando el fallo no es de un chunk concreto. */
export class DownloadFailedError extends DownloadError {
  readonly chunkIndex: number | null;

  constructor(message: string, chunkIndex: number | null, cause?: unknown) {
    super('DOWNLOAD_FAILED', `${DOWNLOAD_ERRORS.DOWNLOAD_FAILED}: ${message}`, { cause });
    this.chunkIndex = chunkIndex;
  }

  static fromChunk(error: ChunkFetchError): DownloadFailedError {
    return new DownloadFailedError(error.message, error.chunkIndex, error);
  }
}

/** El digest del archivo ensamblado no coincide; el archivo se conserva pero nunca se da por bueno. */
export class IntegrityMismatchError extends DownloadError {
  readonly filePath: string;
  readonly expectedDigest: string;
  readonly actualDigest: string;

  constructor(filePath: string, expectedDigest: string, actualDigest: string) {
    super(
      'INTEGRITY_MISMATCH',
      `${DOWNLOAD_ERRORS.INTEGRITY_MISMATCH}: ${actualDigest} !== ${expectedDigest}`
    );
    this.filePath = filePath;
    this.expectedDigest = expectedDigest;
    this.actualDigest = actualDigest;
  }
}

export class DownloadCancelledError extends DownloadError {
  constructor(cause?: unknown) {
    super('CANCELLED', DOWNLOAD_ERRORS.CANCELLED, { cause });
  }
}

/** Indica si el error proviene de un AbortSignal (propio o de Node). */
export function isAbortError(error: unknown): boolean {
  if (error instanceof DownloadCancelledError) return true;
  if (!(error instanceof Error)) return false;
  const code = (error as NodeJS.ErrnoException).code;
  return error.name === 'AbortError' || code === 'ABORT_ERR';
}
