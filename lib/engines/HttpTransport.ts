/**
 * Capa HTTP mínima que usa el motor: HEAD para descubrir tamaño y GET con Range opcional.
 *
 * NodeHttpTransport usa http/https de Node, sigue redirecciones (los CDN de instaladores
 * suelen redirigir) y aplica un timeout de inactividad por petición: si el socket pasa
 * timeoutMs sin datos la petición se destruye con ETIMEDOUT y el fetcher la reintenta.
 * Los tests inyectan un transport en memoria con la misma interfaz.
 *
 * @module engines/HttpTransport
 */

import http from 'http';
import https from 'https';
import config from '../config';
import { logger } from '../utils';
import { NETWORK_ERRORS } from '../constants/errors';
import { DownloadCancelledError, DownloadError } from './errors';
import type { ChunkRange } from './types';

const log = logger.child('HttpTransport');

export type HttpHeaders = Record<string, string | string[] | undefined>;

export interface RequestOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  headers?: Record<string, string>;
}

export interface GetOptions extends RequestOptions {
  range?: ChunkRange;
}

export interface HttpResponse {
  statusCode: number;
  statusMessage: string;
  headers: HttpHeaders;
  body: AsyncIterable<Uint8Array>;
  /** Libera el socket si el cuerpo no se va a consumir. */
  discard(): void;
}

export interface HeadResult {
  statusCode: number;
  contentLength: number | null;
}

export interface HttpTransport {
  head(url: string, options?: RequestOptions): Promise<HeadResult>;
  get(url: string, options?: GetOptions): Promise<HttpResponse>;
}

export function headerValue(headers: HttpHeaders, name: string): string | undefined {
  const value = headers[name.toLowerCase()];
  return Array.isArray(value) ? value[0] : value;
}

export function parseContentLength(headers: HttpHeaders): number | null {
  const raw = headerValue(headers, 'content-length');
  if (!raw || !/^\d+$/.test(raw.trim())) return null;
  return parseInt(raw, 10);
}

/** Parsea `bytes start-end/total`; devuelve null si la cabecera no tiene ese formato. */
export function parseContentRange(
  headers: HttpHeaders
): { start: number; end: number; total: number | null } | null {
  const raw = headerValue(headers, 'content-range');
  const match = raw ? /^bytes (\d+)-(\d+)\/(\d+|\*)$/.exec(raw.trim()) : null;
  if (!match) return null;
  return {
    start: parseInt(match[1], 10),
    end: parseInt(match[2], 10),
    total: match[3] === '*' ? null : parseInt(match[3], 10),
  };
}

function timeoutError(timeoutMs: number): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(`${NETWORK_ERRORS.TIMEOUT} (${timeoutMs}ms)`);
  err.code = 'ETIMEDOUT';
  return err;
}

export interface NodeHttpTransportOptions {
  headers?: Record<string, string>;
  timeoutMs?: number;
  maxRedirects?: number;
}

export class NodeHttpTransport implements HttpTransport {
  private readonly headers: Record<string, string>;
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly agents = {
    http: new http.Agent({ keepAlive: true }),
    https: new https.Agent({ keepAlive: true }),
  };

  constructor(options: NodeHttpTransportOptions = {}) {
    this.headers = { ...config.network.headers, ...options.headers };
    this.timeoutMs = options.timeoutMs ?? config.network.requestTimeoutMs;
    this.maxRedirects = options.maxRedirects ?? config.network.maxRedirects;
  }

  async head(url: string, options: RequestOptions = {}): Promise<HeadResult> {
    const response = await this.request('HEAD', url, options, {});
    response.resume();
    return {
      statusCode: response.statusCode ?? 0,
      contentLength: parseContentLength(response.headers),
    };
  }

  async get(url: string, options: GetOptions = {}): Promise<HttpResponse> {
    const extra: Record<string, string> = {};
    if (options.range) {
      extra.Range = `bytes=${options.range.start}-${options.range.end}`;
    }
    const response = await this.request('GET', url, options, extra);
    return {
      statusCode: response.statusCode ?? 0,
      statusMessage: response.statusMessage ?? '',
      headers: response.headers,
      body: response,
      discard: () => {
        response.destroy();
      },
    };
  }

  /** Cierra las conexiones keep-alive abiertas. */
  destroy(): void {
    this.agents.http.destroy();
    this.agents.https.destroy();
  }

  private async request(
    method: 'HEAD' | 'GET',
    url: string,
    options: RequestOptions,
    extraHeaders: Record<string, string>
  ): Promise<http.IncomingMessage> {
    let currentUrl = url;
    for (let redirects = 0; ; redirects++) {
      const response = await this.send(method, currentUrl, options, extraHeaders);
      const status = response.statusCode ?? 0;
      const location = headerValue(response.headers, 'location');
      if (status >= 300 && status < 400 && location) {
        response.resume();
        if (redirects >= this.maxRedirects) {
          throw new DownloadError(`HTTP_${status}`, `${NETWORK_ERRORS.TOO_MANY_REDIRECTS}: ${url}`);
        }
        const next = new URL(location, currentUrl).toString();
        log.debug(`[${method}] redirección ${status}: ${currentUrl} → ${next}`);
        currentUrl = next;
        continue;
      }
      return response;
    }
  }

  private send(
    method: 'HEAD' | 'GET',
    url: string,
    options: RequestOptions,
    extraHeaders: Record<string, string>
  ): Promise<http.IncomingMessage> {
    const parsed = new URL(url);
    const isHttps = parsed.protocol === 'https:';
    if (!isHttps && parsed.protocol !== 'http:') {
      return Promise.reject(
        new DownloadError('INVALID_TASK', `${NETWORK_ERRORS.UNSUPPORTED_PROTOCOL}: ${parsed.protocol}`)
      );
    }
    if (options.signal?.aborted) {
      return Promise.reject(new DownloadCancelledError(options.signal.reason));
    }
    const timeoutMs = options.timeoutMs ?? this.timeoutMs;
    const requestOptions: http.RequestOptions = {
      method,
      headers: { ...this.headers, ...options.headers, ...extraHeaders },
      agent: isHttps ? this.agents.https : this.agents.http,
      signal: options.signal,
    };

    return new Promise((resolve, reject) => {
      const req = isHttps
        ? https.request(parsed, requestOptions)
        : http.request(parsed, requestOptions);
      // Timeout de inactividad: se rearma con cada lectura/escritura del socket
      req.setTimeout(timeoutMs, () => {
        req.destroy(timeoutError(timeoutMs));
      });
      req.on('response', response => {
        // El consumidor del body recibe el error al iterar; aquí solo se evita el crash
        // por 'error' sin listener antes de que empiece a leer.
        response.on('error', error => {
          log.debug(`[${method}] error en respuesta de ${parsed.host}: ${error.message}`);
        });
        resolve(response);
      });
      req.on('error', error => {
        reject(options.signal?.aborted ? new DownloadCancelledError(error) : error);
      });
      req.end();
    });
  }
}
