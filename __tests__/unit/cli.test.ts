/**
 * Tests unitarios para lib/cli.ts
 */
import crypto from 'crypto';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { EXIT_CODES, USAGE, main } from '../../lib/cli';
import type { DownloadCoordinatorOptions } from '../../lib/engines/DownloadCoordinator';
import { FakeTransport, makeData, recordingSleep } from '../helpers/fakeTransport';

const TEST_URL = 'https://downloads.test/tool.zip';

class Capture {
  text = '';
  write(chunk: string): boolean {
    this.text += chunk;
    return true;
  }
}

describe('cli main', () => {
  let dir: string;
  let dest: string;
  let stdout: Capture;
  let stderr: Capture;
  const data = makeData(1000);

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
    dest = path.join(dir, 'tool.zip');
    stdout = new Capture();
    stderr = new Capture();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function deps(transport: FakeTransport, extra: DownloadCoordinatorOptions = {}, signal?: AbortSignal) {
    return {
      stdout,
      stderr,
      signal,
      coordinatorOptions: { transport, threads: 1, sleep: recordingSleep().sleep, ...extra },
    };
  }

  it('--help imprime el uso y sale con 0', async () => {
    expect(await main(['--help'], { stdout, stderr })).toBe(EXIT_CODES.SUCCESS);
    expect(stdout.text).toBe(`${USAGE}\n`);
  });

  it('sin argumentos es un error de uso', async () => {
    expect(await main([], { stdout, stderr })).toBe(EXIT_CODES.USAGE);
    expect(stderr.text).toBe(`${USAGE}\n`);
  });

  it('una opción desconocida es un error de uso', async () => {
    expect(await main([TEST_URL, dest, '--bogus'], { stdout, stderr })).toBe(EXIT_CODES.USAGE);
    expect(stderr.text.endsWith(`${USAGE}\n`)).toBe(true);
  });

  it('valida las opciones numéricas', async () => {
    expect(await main([TEST_URL, dest, '--threads', '0'], { stdout, stderr })).toBe(EXIT_CODES.USAGE);
    expect(stderr.text).toBe('Opciones inválidas: threads: debe ser >= 1\n');
  });

  it('una URL inválida es un error de uso', async () => {
    const code = await main(['not-a-url', dest, '-q'], deps(new FakeTransport(data)));
    expect(code).toBe(EXIT_CODES.USAGE);
    expect(stderr.text.startsWith('Error: Tarea de descarga inválida: url: ')).toBe(true);
  });

  it('imprime la ruta final y el digest al terminar', async () => {
    const digest = crypto.createHash('sha256').update(data).digest('hex');
    const code = await main(
      [TEST_URL, dest, '--size', '1000', '--chunk-size', '256', '--quiet'],
      deps(new FakeTransport(data))
    );

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout.text).toBe(`${dest}\nsha256 ${digest} (unverified)\n`);
    expect(stderr.text).toBe('');
    expect(await fs.readFile(dest)).toEqual(data);
  });

  it('--sha256 marca la descarga como verificada', async () => {
    const digest = crypto.createHash('sha256').update(data).digest('hex');
    const code = await main(
      [TEST_URL, dest, '--size', '1000', '--chunk-size', '256', '--sha256', digest, '-q'],
      deps(new FakeTransport(data))
    );

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout.text).toBe(`${dest}\nsha256 ${digest} (verified)\n`);
  });

  it('sin --quiet escribe el progreso en stderr', async () => {
    const code = await main([TEST_URL, dest, '--size', '1000', '--chunk-size', '256'], deps(new FakeTransport(data)));

    expect(code).toBe(EXIT_CODES.SUCCESS);
    const lines = stderr.text.trimEnd().split('\n');
    expect(lines[0].startsWith('tool.zip [....................] 0.0% 0/4 chunks')).toBe(true);
    expect(lines[lines.length - 1].startsWith('tool.zip [####################] 100.0% 4/4 chunks')).toBe(true);
  });

  it('un chunk fallido sale con 1 y el mensaje de error', async () => {
    const transport = new FakeTransport(data).failChunk(0, { status: 404 });
    const code = await main([TEST_URL, dest, '--size', '1000', '--chunk-size', '256', '-q'], deps(transport));

    expect(code).toBe(EXIT_CODES.FAILED);
    expect(stderr.text).toBe(
      'Error: La descarga falló: Chunk falló después de múltiples reintentos (chunk 0, 1 intentos): HTTP 404\n'
    );
    expect(stdout.text).toBe('');
  });

  it('la cancelación sale con 130', async () => {
    const controller = new AbortController();
    controller.abort();
    const code = await main(
      [TEST_URL, dest, '--size', '1000', '-q'],
      deps(new FakeTransport(data), {}, controller.signal)
    );

    expect(code).toBe(EXIT_CODES.CANCELLED);
    expect(stderr.text).toBe('Descarga cancelada; se reanudará en la próxima ejecución\n');
  });
});
