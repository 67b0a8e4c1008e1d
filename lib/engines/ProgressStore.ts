/**
 * Persistencia del registro de progreso de una tarea (qué chunks ya están escritos).
 *
 * JsonProgressStore guarda un archivo junto al destino (`<destino>.progress.json`)
 * con escritura atómica; un registro ilegible o con otro formato se trata como ausente
 * y la descarga arranca de cero. La identidad de la tarea es un hash de (url, destino).
 *
 * @module engines/ProgressStore
 */

import crypto from 'crypto';
import path from 'path';
import config from '../config';
import { logger } from '../utils';
import { readJSONFile, removeFile, writeJSONFileAtomic } from '../utils/fileHelpers';
import { progressRecordSchema, validate } from '../utils/schemas';
import type { ProgressRecord, TaskKey } from './types';

const log = logger.child('ProgressStore');

export interface AttemptEntry {
  chunkIndex: number;
  attempt: number;
  error: string;
}

export interface ProgressStore {
  load(key: TaskKey): Promise<ProgressRecord | null>;
  save(record: ProgressRecord): Promise<void>;
  remove(key: TaskKey): Promise<void>;
  /** Historial de intentos fallidos; opcional según el backend. */
  recordAttempt?(key: TaskKey, entry: AttemptEntry): Promise<void> | void;
}

/** Identidad estable de la tarea: los 16 primeros hex de sha256(url + "\n" + destino absoluto). */
export function createTaskKey(url: string, destination: string): TaskKey {
  const absolute = path.resolve(destination);
  const id = crypto
    .createHash('sha256')
    .update(`${url}\n${absolute}`)
    .digest('hex')
    .slice(0, 16);
  return { id, url, destination: absolute };
}

export class JsonProgressStore implements ProgressStore {
  private readonly suffix: string;

  constructor(suffix: string = config.downloads.progressSuffix) {
    this.suffix = suffix;
  }

  recordPath(destination: string): string {
    return `${destination}${this.suffix}`;
  }

  async load(key: TaskKey): Promise<ProgressRecord | null> {
    const filePath = this.recordPath(key.destination);
    const raw = await readJSONFile(filePath);
    if (raw === null) return null;

    const result = validate(progressRecordSchema, raw);
    if (!result.success || !result.data) {
      log.warn(`Registro de progreso inválido en ${filePath}, se ignora: ${result.error}`);
      return null;
    }
    if (result.data.taskId !== key.id) {
      log.warn(`Registro de progreso de otra tarea en ${filePath} (${result.data.taskId}), se ignora`);
      return null;
    }
    return result.data;
  }

  async save(record: ProgressRecord): Promise<void> {
    await writeJSONFileAtomic(this.recordPath(record.destination), record);
  }

  async remove(key: TaskKey): Promise<void> {
    if (await removeFile(this.recordPath(key.destination))) {
      log.debug(`Registro de progreso eliminado: ${key.id}`);
    }
  }
}
