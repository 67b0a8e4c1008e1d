/**
 * Utilidades de red puras para el motor de descargas.
 *
 * isTransientNetworkError: detecta errores que merecen reintento (ECONNRESET, ETIMEDOUT, 5xx, 429...).
 * parseRetryAfter: interpreta cabecera Retry-After (segundos o fecha).
 * calculateBackoffDelay: delay exponencial acotado, función pura de (intento, opciones).
 *
 * @module engines/DownloadValidator
 */

import config from '../config';
import { HttpStatusError, isAbortError } from './errors';

const TRANSIENT_ERROR_CODES: readonly string[] = [
  'ECONNRESET',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ERR_STREAM_PREMATURE_CLOSE',
  'PREMATURE_CLOSE',
];

/** Indica si el error es de red transitorio (reintento razonable). Los abortos nunca lo son. */
export function isTransientNetworkError(error: unknown): boolean {
  if (!(error instanceof Error) || isAbortError(error)) return false;

  if (error instanceof HttpStatusError) {
    return error.statusCode >= 500 || error.statusCode === 429 || error.statusCode === 408;
  }

  const code = (error as NodeJS.ErrnoException).code;
  if (code && TRANSIENT_ERROR_CODES.includes(code)) return true;

  return /socket hang up|timed? ?out/i.test(error.message);
}

export interface BackoffOptions {
  baseDelayMs?: number;
  maxDelayMs?: number;
  /** Jitter relativo (0.0-1.0). */
  jitter?: number;
  random?: () => number;
}

/**
 * Delay antes del siguiente intento, en ms.
 *
 * @param failedAttempts - Intentos fallidos hasta ahora (1 tras el primer fallo).
 */
export function calculateBackoffDelay(failedAttempts: number, options: BackoffOptions = {}): number {
  const baseDelay = options.baseDelayMs ?? config.network.retryBaseDelayMs;
  const maxDelay = options.maxDelayMs ?? config.network.retryMaxDelayMs;
  const jitter = options.jitter ?? config.network.retryJitter;
  const random = options.random ?? Math.random;

  const exponent = Math.max(0, failedAttempts - 1);
  const exponentialDelay = baseDelay * Math.pow(2, exponent);
  const withJitter = exponentialDelay + random() * jitter * exponentialDelay;
  return Math.round(Math.min(withJitter, maxDelay));
}

export interface ParseRetryAfterOptions {
  maxMs?: number;
  now?: number;
}

/** Parsea cabecera Retry-After (entero segundos o fecha HTTP); devuelve ms o null. */
export function parseRetryAfter(
  retryAfter: string | string[] | undefined,
  opts: ParseRetryAfterOptions = {}
): number | null {
  const raw = Array.isArray(retryAfter) ? retryAfter[0] : retryAfter;
  if (!raw) return null;
  const max = opts.maxMs ?? config.network.retryAfterMaxMs;
  const s = raw.trim();
  if (/^\d+$/.test(s)) {
    return Math.min(parseInt(s, 10) * 1000, max);
  }
  const date = Date.parse(s);
  if (!Number.isNaN(date)) {
    const ms = date - (opts.now ?? Date.now());
    return ms > 0 ? Math.min(ms, max) : null;
  }
  return null;
}
