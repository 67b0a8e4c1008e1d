/**
 * Tipos compartidos por el motor de descargas.
 *
 * Define los estados de chunk, la tarea de descarga inmutable, el registro de progreso
 * persistido y el resultado que devuelve el coordinador.
 *
 * @module engines/types
 */

import type { DownloadFailedError, IntegrityMismatchError } from './errors';

/** Estados posibles de un chunk (fragmento) de descarga. */
export const ChunkState = Object.freeze({
  PENDING: 'pending',
  IN_FLIGHT: 'inFlight',
  DONE: 'done',
  FAILED: 'failed',
} as const);

export type ChunkStateType = (typeof ChunkState)[keyof typeof ChunkState];

/** Rango de bytes inclusivo [start, end]. */
export interface ChunkRange {
  start: number;
  end: number;
}

export interface Chunk extends ChunkRange {
  readonly index: number;
  state: ChunkStateType;
  attempts: number;
}

export type ChunkSummary = Readonly<Chunk>;

export interface DownloadTask {
  readonly url: string;
  readonly destination: string;
  /** undefined: se toma del registro de progreso o de un HEAD. */
  readonly totalSize?: number;
  readonly chunkSize: number;
  /** Hex en minúsculas. */
  readonly expectedDigest?: string;
  readonly digestAlgorithm: string;
}

/** Identidad de una tarea a efectos de persistencia. */
export interface TaskKey {
  readonly id: string;
  readonly url: string;
  readonly destination: string;
}

export interface ProgressRecord {
  version: 1;
  taskId: string;
  url: string;
  destination: string;
  totalSize: number;
  chunkSize: number;
  /** Índices de chunks cuyos bytes ya están escritos y sincronizados en el destino. */
  done: number[];
  updatedAt: number;
}

export type VerificationStatus = 'verified' | 'unverified';

export type DownloadOutcome =
  | { readonly status: 'success'; readonly verification: VerificationStatus }
  | { readonly status: 'failed'; readonly error: DownloadFailedError | IntegrityMismatchError }
  | { readonly status: 'cancelled' };

export interface DownloadResult {
  readonly taskId: string;
  readonly finalPath: string;
  /** Tamaño del archivo final (0 si la descarga no terminó). */
  readonly totalBytes: number;
  /** Bytes recibidos por red en esta ejecución. */
  readonly bytesTransferred: number;
  readonly digest: string | null;
  readonly digestAlgorithm: string;
  readonly outcome: DownloadOutcome;
  readonly chunks: readonly ChunkSummary[];
  /** true si se reanudó a partir de un registro de progreso. */
  readonly resumed: boolean;
  /** true si se usó la descarga en un solo stream. */
  readonly usedFallback: boolean;
  readonly durationMs: number;
}
