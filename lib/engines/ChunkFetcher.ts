/**
 * Descarga de un rango de bytes (HTTP 206) directamente a su región del archivo destino.
 *
 * Cada intento abre el destino en modo r+ y escribe con escrituras posicionadas a medida
 * que llegan los fragmentos del body; nunca se acumula el chunk entero en memoria. Al
 * terminar se comprueba la longitud recibida y se hace datasync antes de devolver, de modo
 * que el coordinador solo marca el chunk como done cuando los bytes ya son durables.
 *
 * Reintentos: bucle de intentos acotado (1 + maxRetries) con backoff exponencial puro
 * (calculateBackoffDelay) y sleep inyectable. Retry-After del servidor tiene prioridad.
 *
 * @module engines/ChunkFetcher
 */

import { promises as fs } from 'fs';
import { setTimeout as delay } from 'timers/promises';
import config from '../config';
import { logger } from '../utils';
import { NETWORK_ERRORS } from '../constants/errors';
import { chunkLength } from './ChunkPlanner';
import { calculateBackoffDelay, isTransientNetworkError, parseRetryAfter } from './DownloadValidator';
import {
  ChunkFetchError,
  DownloadCancelledError,
  HttpStatusError,
  RangeUnsupportedError,
  isAbortError,
} from './errors';
import { headerValue, parseContentRange } from './HttpTransport';
import type { BackoffOptions } from './DownloadValidator';
import type { HttpTransport } from './HttpTransport';
import type { ChunkRange } from './types';

const log = logger.child('ChunkFetcher');

export type SleepFn = (_ms: number, _signal?: AbortSignal) => Promise<void>;

export const defaultSleep: SleepFn = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface RetryInfo {
  index: number;
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface ChunkFetchRequest {
  url: string;
  index: number;
  range: ChunkRange;
  destination: string;
  signal?: AbortSignal;
  /** Se llama al empezar cada intento (1, 2, ...). */
  onAttempt?: (_attempt: number) => void;
  /** Bytes escritos del chunk en el intento actual (absoluto, vuelve a 0 al reintentar). */
  onProgress?: (_chunkBytes: number) => void;
  onRetry?: (_info: RetryInfo) => void;
}

export interface ChunkFetcherOptions {
  transport: HttpTransport;
  maxRetries?: number;
  timeoutMs?: number;
  backoff?: BackoffOptions;
  sleep?: SleepFn;
}

function prematureClose(received: number, expected: number): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(
    `${NETWORK_ERRORS.CONNECTION_CLOSED}: ${received}/${expected} bytes`
  );
  err.code = 'PREMATURE_CLOSE';
  return err;
}

export class ChunkFetcher {
  private readonly transport: HttpTransport;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly backoff: BackoffOptions;
  private readonly sleep: SleepFn;

  constructor(options: ChunkFetcherOptions) {
    this.transport = options.transport;
    this.maxRetries = options.maxRetries ?? config.downloads.maxRetries;
    this.timeoutMs = options.timeoutMs ?? config.network.requestTimeoutMs;
    this.backoff = options.backoff ?? {};
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Descarga el rango del chunk y lo escribe en destination a partir de range.start.
   *
   * @returns Bytes escritos (siempre la longitud del rango).
   * @throws RangeUnsupportedError si el servidor no respeta el Range (sin reintentos).
   * @throws DownloadCancelledError si se aborta la señal.
   * @throws ChunkFetchError al agotar los reintentos o ante un error no transitorio.
   */
  async fetch(request: ChunkFetchRequest): Promise<number> {
    const { signal } = request;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw new DownloadCancelledError(signal.reason);
      request.onAttempt?.(attempt);

      try {
        return await this.attemptOnce(request);
      } catch (caught) {
        if (signal?.aborted || isAbortError(caught)) {
          throw caught instanceof DownloadCancelledError ? caught : new DownloadCancelledError(caught);
        }
        if (caught instanceof RangeUnsupportedError) throw caught;
        const error = caught instanceof Error ? caught : new Error(String(caught));
        await this.handleFailure(request, attempt, error);
      }
    }
  }

  /** Decide si el intento fallido se reintenta; si es así espera el backoff, si no lanza. */
  private async handleFailure(
    request: ChunkFetchRequest,
    attempt: number,
    error: Error
  ): Promise<void> {
    const { index, signal } = request;
    const transient = isTransientNetworkError(error);
    if (!transient || attempt > this.maxRetries) {
      log.error(
        `[Chunk failure] chunk ${index}: ${error.message} (intento ${attempt}, ${transient ? 'reintentos agotados' : 'no reintentable'})`
      );
      throw new ChunkFetchError(index, attempt, error);
    }

    const retryAfterMs = error instanceof HttpStatusError ? error.retryAfterMs : null;
    const delayMs = retryAfterMs ?? calculateBackoffDelay(attempt, this.backoff);
    log.warn(
      `[Chunk] chunk ${index} falló (intento ${attempt}/${this.maxRetries + 1}): ${error.message}; reintento en ${delayMs}ms`
    );
    request.onRetry?.({ index, attempt, delayMs, error });

    try {
      await this.sleep(delayMs, signal);
    } catch (sleepError) {
      throw new DownloadCancelledError(sleepError);
    }
  }

  private async attemptOnce(request: ChunkFetchRequest): Promise<number> {
    const { url, index, range, destination, signal } = request;
    const expected = chunkLength(range);

    const response = await this.transport.get(url, { range, signal, timeoutMs: this.timeoutMs });

    if (response.statusCode === 200) {
      response.discard();
      throw new RangeUnsupportedError(index, 200);
    }
    if (response.statusCode !== 206) {
      response.discard();
      throw new HttpStatusError(
        response.statusCode,
        response.statusMessage,
        parseRetryAfter(headerValue(response.headers, 'retry-after'))
      );
    }
    const contentRange = parseContentRange(response.headers);
    if (contentRange && contentRange.start !== range.start) {
      response.discard();
      throw new RangeUnsupportedError(index, 206, NETWORK_ERRORS.CONTENT_RANGE_MISMATCH);
    }
    if (contentRange && contentRange.end < range.end) {
      response.discard();
      throw new RangeUnsupportedError(index, 206, NETWORK_ERRORS.RANGE_TRUNCATED);
    }

    const handle = await fs.open(destination, 'r+');
    let written = 0;
    try {
      for await (const piece of response.body) {
        if (written + piece.length > expected) {
          throw new RangeUnsupportedError(index, 206, NETWORK_ERRORS.TOO_MANY_BYTES);
        }
        await handle.write(piece, 0, piece.length, range.start + written);
        written += piece.length;
        request.onProgress?.(written);
      }
      if (written < expected) {
        throw prematureClose(written, expected);
      }
      await handle.datasync();
    } finally {
      await handle.close();
    }

    log.debug(`[Chunk] chunk ${index} completo: bytes ${range.start}-${range.end}`);
    return written;
  }
}
