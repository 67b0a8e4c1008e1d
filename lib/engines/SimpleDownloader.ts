/**
 * Descarga en un solo stream (GET sin Range). Se usa cuando el tamaño es desconocido
 * o cuando el servidor ignora las peticiones Range.
 *
 * Cada intento trunca el destino y escribe desde el byte 0; un corte a mitad de cuerpo
 * se reintenta desde el principio con el mismo backoff que los chunks. Si se conoce el
 * tamaño esperado, se comprueba al final.
 *
 * @module engines/SimpleDownloader
 */

import { promises as fs } from 'fs';
import path from 'path';
import config from '../config';
import { logger } from '../utils';
import { formatBytes } from '../utils/fileHelpers';
import { DOWNLOAD_ERRORS, NETWORK_ERRORS } from '../constants/errors';
import { calculateBackoffDelay, isTransientNetworkError, parseRetryAfter } from './DownloadValidator';
import { defaultSleep } from './ChunkFetcher';
import {
  DownloadCancelledError,
  DownloadFailedError,
  HttpStatusError,
  isAbortError,
} from './errors';
import { headerValue, parseContentLength } from './HttpTransport';
import type { BackoffOptions } from './DownloadValidator';
import type { SleepFn } from './ChunkFetcher';
import type { HttpTransport } from './HttpTransport';

const log = logger.child('SimpleDownloader');

export interface SimpleDownloadRequest {
  url: string;
  destination: string;
  /** null si no se conoce; entonces se confía en Content-Length o en el fin del stream. */
  expectedSize: number | null;
  signal?: AbortSignal;
  /** Bytes escritos en el intento actual. */
  onProgress?: (_bytes: number) => void;
  onRetry?: (_attempt: number, _delayMs: number, _error: Error) => void;
}

export interface SimpleDownloaderOptions {
  transport: HttpTransport;
  maxRetries?: number;
  timeoutMs?: number;
  backoff?: BackoffOptions;
  sleep?: SleepFn;
}

export class SimpleDownloader {
  private readonly transport: HttpTransport;
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly backoff: BackoffOptions;
  private readonly sleep: SleepFn;

  constructor(options: SimpleDownloaderOptions) {
    this.transport = options.transport;
    this.maxRetries = options.maxRetries ?? config.downloads.maxRetries;
    this.timeoutMs = options.timeoutMs ?? config.network.requestTimeoutMs;
    this.backoff = options.backoff ?? {};
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Descarga el recurso completo en destination.
   *
   * @returns Bytes escritos (tamaño final del archivo).
   * @throws DownloadCancelledError si se aborta la señal.
   * @throws DownloadFailedError al agotar los reintentos o ante un error no transitorio.
   */
  async download(request: SimpleDownloadRequest): Promise<number> {
    const { signal } = request;
    await fs.mkdir(path.dirname(request.destination), { recursive: true });

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw new DownloadCancelledError(signal.reason);
      try {
        const written = await this.attemptOnce(request);
        log.info(`Descarga en stream único completa: ${request.destination} (${formatBytes(written)})`);
        return written;
      } catch (caught) {
        if (signal?.aborted || isAbortError(caught)) {
          throw caught instanceof DownloadCancelledError ? caught : new DownloadCancelledError(caught);
        }
        if (caught instanceof DownloadFailedError) throw caught;
        const error = caught instanceof Error ? caught : new Error(String(caught));

        if (!isTransientNetworkError(error) || attempt > this.maxRetries) {
          log.error(`[Stream] ${request.url}: ${error.message} (intento ${attempt})`);
          throw new DownloadFailedError(`${DOWNLOAD_ERRORS.FALLBACK_FAILED}: ${error.message}`, null, error);
        }

        const retryAfterMs = error instanceof HttpStatusError ? error.retryAfterMs : null;
        const delayMs = retryAfterMs ?? calculateBackoffDelay(attempt, this.backoff);
        log.warn(`[Stream] intento ${attempt} falló: ${error.message}; reintento en ${delayMs}ms`);
        request.onRetry?.(attempt, delayMs, error);
        try {
          await this.sleep(delayMs, signal);
        } catch (sleepError) {
          throw new DownloadCancelledError(sleepError);
        }
      }
    }
  }

  private async attemptOnce(request: SimpleDownloadRequest): Promise<number> {
    const { url, destination, signal } = request;
    const response = await this.transport.get(url, { signal, timeoutMs: this.timeoutMs });

    if (response.statusCode !== 200) {
      response.discard();
      throw new HttpStatusError(
        response.statusCode,
        response.statusMessage,
        parseRetryAfter(headerValue(response.headers, 'retry-after'))
      );
    }
    const expected = request.expectedSize ?? parseContentLength(response.headers);

    const handle = await fs.open(destination, 'w');
    let written = 0;
    try {
      for await (const piece of response.body) {
        await handle.write(piece, 0, piece.length, written);
        written += piece.length;
        request.onProgress?.(written);
      }
      await handle.datasync();
    } finally {
      await handle.close();
    }

    if (expected !== null && written < expected) {
      const err: NodeJS.ErrnoException = new Error(
        `${NETWORK_ERRORS.CONNECTION_CLOSED}: ${written}/${expected} bytes`
      );
      err.code = 'PREMATURE_CLOSE';
      throw err;
    }
    if (expected !== null && written > expected) {
      throw new DownloadFailedError(
        `${DOWNLOAD_ERRORS.SIZE_MISMATCH}: ${written}/${expected} bytes`,
        null
      );
    }
    return written;
  }
}
