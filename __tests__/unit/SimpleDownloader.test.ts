/**
 * Tests unitarios para lib/engines/SimpleDownloader.ts
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { SimpleDownloader } from '../../lib/engines/SimpleDownloader';
import { DownloadCancelledError, DownloadFailedError } from '../../lib/engines/errors';
import { FakeTransport, makeData, recordingSleep } from '../helpers/fakeTransport';

const TEST_URL = 'https://downloads.test/plain.bin';

describe('SimpleDownloader', () => {
  let dir: string;
  let dest: string;
  const data = makeData(1000);

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'simple-downloader-'));
    dest = path.join(dir, 'sub', 'plain.bin');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function downloader(transport: FakeTransport, sleep = recordingSleep().sleep) {
    return new SimpleDownloader({
      transport,
      maxRetries: 2,
      backoff: { baseDelayMs: 100, jitter: 0 },
      sleep,
    });
  }

  it('descarga el cuerpo completo usando Content-Length', async () => {
    const progress: number[] = [];
    const written = await downloader(new FakeTransport(data, { pieceSize: 400 })).download({
      url: TEST_URL,
      destination: dest,
      expectedSize: null,
      onProgress: bytes => progress.push(bytes),
    });

    expect(written).toBe(1000);
    expect(progress).toEqual([400, 800, 1000]);
    expect(await fs.readFile(dest)).toEqual(data);
  });

  it('reintenta un cuerpo incompleto desde el principio', async () => {
    const transport = new FakeTransport(data).failChunk(-1, 'short');
    const { sleep, delays } = recordingSleep();
    const retries: Array<[number, number]> = [];

    const written = await downloader(transport, sleep).download({
      url: TEST_URL,
      destination: dest,
      expectedSize: 1000,
      onRetry: (attempt, delayMs) => retries.push([attempt, delayMs]),
    });

    expect(written).toBe(1000);
    expect(retries).toEqual([[1, 100]]);
    expect(delays).toEqual([100]);
    expect(await fs.readFile(dest)).toEqual(data);
  });

  it('más bytes de los esperados falla sin reintentar', async () => {
    const transport = new FakeTransport(data);
    await expect(
      downloader(transport).download({ url: TEST_URL, destination: dest, expectedSize: 500 })
    ).rejects.toThrow('La descarga falló: Tamaño incorrecto del archivo final: 1000/500 bytes');
    expect(transport.requests).toHaveLength(1);
  });

  it('un estado HTTP no transitorio falla con DownloadFailedError', async () => {
    const transport = new FakeTransport(data).failChunk(-1, { status: 404 });
    const promise = downloader(transport).download({ url: TEST_URL, destination: dest, expectedSize: null });

    await expect(promise).rejects.toBeInstanceOf(DownloadFailedError);
    await expect(promise).rejects.toThrow('La descarga falló: La descarga en un solo stream falló: HTTP 404');
  });

  it('agota los reintentos tras maxRetries + 1 intentos', async () => {
    const transport = new FakeTransport(data).failChunk(-1, 'reset', 'reset', 'reset');
    await expect(
      downloader(transport).download({ url: TEST_URL, destination: dest, expectedSize: null })
    ).rejects.toBeInstanceOf(DownloadFailedError);
    expect(transport.requests).toHaveLength(3);
  });

  it('una señal abortada cancela', async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      downloader(new FakeTransport(data)).download({
        url: TEST_URL,
        destination: dest,
        expectedSize: null,
        signal: controller.signal,
      })
    ).rejects.toBeInstanceOf(DownloadCancelledError);
  });
});
