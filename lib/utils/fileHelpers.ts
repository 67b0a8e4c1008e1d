/**
 * @fileoverview Utilidades de sistema de archivos: escritura JSON atómica (temp + rename),
 * tamaño de archivo tolerante a ENOENT, borrado idempotente y formato de bytes.
 * @module utils/fileHelpers
 */

import { promises as fs } from 'fs';
import path from 'path';
import crypto from 'crypto';
import { logger } from './logger';

const log = logger.child('FileHelpers');

/**
 * Escribe data como JSON de forma atómica: archivo temporal en el mismo directorio,
 * fsync y rename. Un crash a mitad de escritura deja el archivo anterior intacto.
 */
export async function writeJSONFileAtomic(filePath: string, data: unknown): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.mkdir(dir, { recursive: true });
  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`
  );
  const handle = await fs.open(tmpPath, 'w');
  try {
    await handle.writeFile(JSON.stringify(data, null, 2), 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  try {
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    await removeFile(tmpPath);
    throw error;
  }
}

/** Lee y parsea un JSON; devuelve null si no existe o no es JSON válido. */
export async function readJSONFile(filePath: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw error;
  }
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    log.warn(`JSON ilegible en ${filePath}:`, (error as Error).message);
    return null;
  }
}

/** Tamaño del archivo en bytes, o null si no existe. */
export async function getFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw error;
  }
}

/** Borra el archivo si existe. Devuelve true si se borró. */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Crea (o trunca) el archivo de destino y lo reserva al tamaño total,
 * para que cada chunk escriba en su región con escrituras posicionadas.
 */
export async function preallocateFile(filePath: string, size: number): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const handle = await fs.open(filePath, 'w');
  try {
    await handle.truncate(size);
  } finally {
    await handle.close();
  }
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0 || !Number.isFinite(bytes)) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return `${(bytes / Math.pow(k, i)).toFixed(2)} ${sizes[i]}`;
}
