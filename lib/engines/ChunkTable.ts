/**
 * Máquina de estados explícita para los chunks de una ejecución.
 *
 * Una sola estructura por tarea guarda el estado de todos los chunks; los workers solo
 * la modifican vía take/complete/fail/release. Todas las transiciones son síncronas, así que
 * en el event loop son atómicas: dos workers no pueden tomar el mismo índice.
 *
 *   pending → inFlight → done | failed
 *   inFlight → pending (cancelación o fallback: el chunk no quedó escrito)
 *
 * @module engines/ChunkTable
 */

import { ChunkState } from './types';
import type { Chunk, ChunkRange, ChunkStateType, ChunkSummary } from './types';

const TRANSITIONS: Record<ChunkStateType, readonly ChunkStateType[]> = {
  [ChunkState.PENDING]: [ChunkState.IN_FLIGHT],
  [ChunkState.IN_FLIGHT]: [ChunkState.DONE, ChunkState.FAILED, ChunkState.PENDING],
  [ChunkState.DONE]: [],
  [ChunkState.FAILED]: [],
};

export function canTransition(from: ChunkStateType, to: ChunkStateType): boolean {
  return TRANSITIONS[from].includes(to);
}

export class ChunkTable {
  private readonly chunks: Chunk[];

  constructor(ranges: readonly ChunkRange[], doneIndices: Iterable<number> = []) {
    this.chunks = ranges.map((range, index) => ({
      index,
      start: range.start,
      end: range.end,
      state: ChunkState.PENDING,
      attempts: 0,
    }));
    for (const index of doneIndices) {
      const chunk = this.chunks[index];
      if (chunk) chunk.state = ChunkState.DONE;
    }
  }

  get size(): number {
    return this.chunks.length;
  }

  /** Toma el pending de menor índice y lo pasa a inFlight; null si no quedan. */
  takeNextPending(): Chunk | null {
    const chunk = this.chunks.find(c => c.state === ChunkState.PENDING);
    if (!chunk) return null;
    this.transition(chunk, ChunkState.IN_FLIGHT);
    return chunk;
  }

  recordAttempt(index: number): number {
    const chunk = this.get(index);
    if (chunk.state !== ChunkState.IN_FLIGHT) {
      throw new Error(`Chunk ${index} no está en vuelo (estado: ${chunk.state})`);
    }
    chunk.attempts++;
    return chunk.attempts;
  }

  complete(index: number): void {
    this.transition(this.get(index), ChunkState.DONE);
  }

  fail(index: number): void {
    this.transition(this.get(index), ChunkState.FAILED);
  }

  /** Devuelve un chunk en vuelo a pending (su región no se considera escrita). */
  release(index: number): void {
    this.transition(this.get(index), ChunkState.PENDING);
  }

  get(index: number): Chunk {
    const chunk = this.chunks[index];
    if (!chunk) throw new RangeError(`Chunk ${index} fuera de rango (0..${this.chunks.length - 1})`);
    return chunk;
  }

  doneIndices(): number[] {
    return this.chunks.filter(c => c.state === ChunkState.DONE).map(c => c.index);
  }

  count(state: ChunkStateType): number {
    return this.chunks.filter(c => c.state === state).length;
  }

  allDone(): boolean {
    return this.chunks.every(c => c.state === ChunkState.DONE);
  }

  /** Bytes cubiertos por chunks done. */
  doneBytes(): number {
    return this.chunks
      .filter(c => c.state === ChunkState.DONE)
      .reduce((sum, c) => sum + (c.end - c.start + 1), 0);
  }

  snapshot(): ChunkSummary[] {
    return this.chunks.map(c => Object.freeze({ ...c }));
  }

  private transition(chunk: Chunk, to: ChunkStateType): void {
    if (!canTransition(chunk.state, to)) {
      throw new Error(`Transición inválida del chunk ${chunk.index}: ${chunk.state} → ${to}`);
    }
    chunk.state = to;
  }
}
