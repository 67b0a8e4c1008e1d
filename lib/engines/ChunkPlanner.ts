/**
 * Particiona un archivo de tamaño conocido en rangos de bytes contiguos.
 *
 * El plan es determinista: mismos (totalSize, chunkSize) producen siempre los mismos
 * rangos, por eso el registro de progreso guarda solo índices.
 *
 * @module engines/ChunkPlanner
 */

import { logger } from '../utils';
import { formatBytes } from '../utils/fileHelpers';
import { InvalidSizeError } from './errors';
import type { ChunkRange } from './types';

const log = logger.child('ChunkPlanner');

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidSizeError(`${name} debe ser un entero positivo (recibido: ${value})`);
  }
}

/**
 * Calcula los rangos [start, end] inclusivos que cubren exactamente [0, totalSize).
 * El último chunk puede ser más corto que chunkSize.
 *
 * @throws InvalidSizeError si totalSize o chunkSize no son enteros positivos.
 */
export function planChunks(totalSize: number, chunkSize: number): ChunkRange[] {
  assertPositiveInteger('totalSize', totalSize);
  assertPositiveInteger('chunkSize', chunkSize);

  const chunks: ChunkRange[] = [];
  for (let start = 0; start < totalSize; start += chunkSize) {
    chunks.push({ start, end: Math.min(start + chunkSize, totalSize) - 1 });
  }

  log.debug(
    `[planChunks] ${formatBytes(totalSize)} → ${chunks.length} chunks de ${formatBytes(chunkSize)}`
  );
  return chunks;
}

export function chunkLength(range: ChunkRange): number {
  return range.end - range.start + 1;
}
