/**
 * Tests unitarios para lib/engines/DownloadValidator.ts
 */
import {
  isTransientNetworkError,
  calculateBackoffDelay,
  parseRetryAfter,
} from '../../lib/engines/DownloadValidator';
import { DownloadCancelledError, HttpStatusError } from '../../lib/engines/errors';

function errnoError(code: string, message = ''): NodeJS.ErrnoException {
  const err: NodeJS.ErrnoException = new Error(message);
  err.code = code;
  return err;
}

describe('DownloadValidator', () => {
  describe('isTransientNetworkError', () => {
    it('debe retornar false si no es un Error', () => {
      expect(isTransientNetworkError(null)).toBe(false);
      expect(isTransientNetworkError(undefined)).toBe(false);
      expect(isTransientNetworkError('ECONNRESET')).toBe(false);
    });

    it('debe detectar códigos de socket transitorios', () => {
      expect(isTransientNetworkError(errnoError('ECONNRESET'))).toBe(true);
      expect(isTransientNetworkError(errnoError('ETIMEDOUT'))).toBe(true);
      expect(isTransientNetworkError(errnoError('EPIPE'))).toBe(true);
      expect(isTransientNetworkError(errnoError('PREMATURE_CLOSE'))).toBe(true);
    });

    it('debe clasificar estados HTTP', () => {
      expect(isTransientNetworkError(new HttpStatusError(500))).toBe(true);
      expect(isTransientNetworkError(new HttpStatusError(503))).toBe(true);
      expect(isTransientNetworkError(new HttpStatusError(429))).toBe(true);
      expect(isTransientNetworkError(new HttpStatusError(408))).toBe(true);
      expect(isTransientNetworkError(new HttpStatusError(404))).toBe(false);
      expect(isTransientNetworkError(new HttpStatusError(403))).toBe(false);
    });

    it('debe detectar mensajes de timeout y socket hang up', () => {
      expect(isTransientNetworkError(new Error('socket hang up'))).toBe(true);
      expect(isTransientNetworkError(new Error('request timed out'))).toBe(true);
    });

    it('nunca considera transitoria una cancelación', () => {
      expect(isTransientNetworkError(new DownloadCancelledError())).toBe(false);
      const abort = errnoError('ECONNRESET', 'aborted');
      abort.name = 'AbortError';
      expect(isTransientNetworkError(abort)).toBe(false);
    });

    it('debe retornar false para errores no transitorios', () => {
      expect(isTransientNetworkError(errnoError('ENOENT', 'File not found'))).toBe(false);
      expect(isTransientNetworkError(new Error('Unknown error'))).toBe(false);
    });
  });

  describe('calculateBackoffDelay', () => {
    it('duplica el delay por intento sin jitter', () => {
      const opts = { baseDelayMs: 500, maxDelayMs: 30000, jitter: 0 };
      expect(calculateBackoffDelay(1, opts)).toBe(500);
      expect(calculateBackoffDelay(2, opts)).toBe(1000);
      expect(calculateBackoffDelay(3, opts)).toBe(2000);
    });

    it('trata intentos < 1 como el primero', () => {
      expect(calculateBackoffDelay(0, { baseDelayMs: 500, jitter: 0 })).toBe(500);
    });

    it('respeta el máximo', () => {
      expect(calculateBackoffDelay(10, { baseDelayMs: 500, maxDelayMs: 30000, jitter: 0 })).toBe(30000);
    });

    it('aplica jitter con la función random inyectada', () => {
      const opts = { baseDelayMs: 100, maxDelayMs: 10000, jitter: 0.5, random: () => 1 };
      expect(calculateBackoffDelay(1, opts)).toBe(150);
      expect(calculateBackoffDelay(2, opts)).toBe(300);
    });

    it('es determinista con las mismas entradas', () => {
      const opts = { baseDelayMs: 250, jitter: 0.3, random: () => 0.5 };
      expect(calculateBackoffDelay(4, opts)).toBe(calculateBackoffDelay(4, opts));
    });
  });

  describe('parseRetryAfter', () => {
    it('interpreta segundos', () => {
      expect(parseRetryAfter('5')).toBe(5000);
      expect(parseRetryAfter(['7'])).toBe(7000);
    });

    it('aplica el tope maxMs', () => {
      expect(parseRetryAfter('1000', { maxMs: 60000 })).toBe(60000);
    });

    it('interpreta fechas HTTP relativas a now', () => {
      const now = Date.parse('Wed, 21 Oct 2026 07:28:00 GMT');
      expect(parseRetryAfter('Wed, 21 Oct 2026 07:28:30 GMT', { now })).toBe(30000);
      expect(parseRetryAfter('Wed, 21 Oct 2026 07:27:00 GMT', { now })).toBeNull();
    });

    it('devuelve null para valores ausentes o ilegibles', () => {
      expect(parseRetryAfter(undefined)).toBeNull();
      expect(parseRetryAfter('')).toBeNull();
      expect(parseRetryAfter('pronto')).toBeNull();
    });
  });
});
