/**
 * Tests unitarios para lib/engines/ProgressStore.ts (sidecar JSON)
 */
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { JsonProgressStore, createTaskKey } from '../../lib/engines/ProgressStore';
import type { ProgressRecord } from '../../lib/engines/types';

describe('createTaskKey', () => {
  it('es estable para la misma url y destino', () => {
    const a = createTaskKey('https://downloads.test/a.exe', '/tmp/a.exe');
    const b = createTaskKey('https://downloads.test/a.exe', '/tmp/a.exe');
    expect(a).toEqual(b);
    expect(a.id).toMatch(/^[0-9a-f]{16}$/);
  });

  it('cambia con la url o con el destino', () => {
    const base = createTaskKey('https://downloads.test/a.exe', '/tmp/a.exe');
    expect(createTaskKey('https://downloads.test/b.exe', '/tmp/a.exe').id).not.toBe(base.id);
    expect(createTaskKey('https://downloads.test/a.exe', '/tmp/b.exe').id).not.toBe(base.id);
  });

  it('resuelve el destino a ruta absoluta', () => {
    const key = createTaskKey('https://downloads.test/a.exe', 'a.exe');
    expect(key.destination).toBe(path.resolve('a.exe'));
  });
});

describe('JsonProgressStore', () => {
  let dir: string;
  let dest: string;
  let store: JsonProgressStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'progress-store-'));
    dest = path.join(dir, 'setup.exe');
    store = new JsonProgressStore();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function recordFor(done: number[]): ProgressRecord {
    const key = createTaskKey('https://downloads.test/setup.exe', dest);
    return {
      version: 1,
      taskId: key.id,
      url: key.url,
      destination: key.destination,
      totalSize: 1000,
      chunkSize: 300,
      done,
      updatedAt: 1_700_000_000_000,
    };
  }

  it('guarda el sidecar junto al destino y lo vuelve a leer', async () => {
    const record = recordFor([0, 2]);
    await store.save(record);

    expect(store.recordPath(dest)).toBe(`${dest}.progress.json`);
    const raw: unknown = JSON.parse(await fs.readFile(`${dest}.progress.json`, 'utf8'));
    expect(raw).toEqual(record);
    expect(await store.load(createTaskKey(record.url, dest))).toEqual(record);
  });

  it('no deja archivos temporales tras guardar', async () => {
    await store.save(recordFor([0]));
    await store.save(recordFor([0, 1]));
    expect(await fs.readdir(dir)).toEqual(['setup.exe.progress.json']);
  });

  it('load devuelve null si no existe', async () => {
    expect(await store.load(createTaskKey('https://downloads.test/setup.exe', dest))).toBeNull();
  });

  it('un sidecar corrupto se trata como ausente', async () => {
    await fs.writeFile(`${dest}.progress.json`, '{"version":1,"taskId":', 'utf8');
    expect(await store.load(createTaskKey('https://downloads.test/setup.exe', dest))).toBeNull();
  });

  it('un sidecar con otro formato se trata como ausente', async () => {
    const record = { ...recordFor([0]), version: 2 };
    await fs.writeFile(`${dest}.progress.json`, JSON.stringify(record), 'utf8');
    expect(await store.load(createTaskKey('https://downloads.test/setup.exe', dest))).toBeNull();
  });

  it('un sidecar de otra tarea se ignora', async () => {
    await store.save(recordFor([0]));
    expect(await store.load(createTaskKey('https://mirror.test/setup.exe', dest))).toBeNull();
  });

  it('remove borra el sidecar y es idempotente', async () => {
    const record = recordFor([1]);
    const key = createTaskKey(record.url, dest);
    await store.save(record);
    await store.remove(key);
    await store.remove(key);
    expect(await store.load(key)).toBeNull();
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('admite un sufijo propio', async () => {
    const custom = new JsonProgressStore('.state');
    await custom.save(recordFor([]));
    expect(await fs.readdir(dir)).toEqual(['setup.exe.state']);
  });
});
