/**
 * Tests unitarios para lib/engines/ChunkPlanner.ts
 */
import { planChunks, chunkLength } from '../../lib/engines/ChunkPlanner';
import { InvalidSizeError } from '../../lib/engines/errors';

describe('ChunkPlanner', () => {
  it('parte 10 000 000 bytes en chunks de 6 MiB en dos rangos', () => {
    expect(planChunks(10_000_000, 6_291_456)).toEqual([
      { start: 0, end: 6_291_455 },
      { start: 6_291_456, end: 9_999_999 },
    ]);
  });

  it('un archivo menor que el chunk produce un solo rango', () => {
    expect(planChunks(100, 6_291_456)).toEqual([{ start: 0, end: 99 }]);
  });

  it('tamaño múltiplo exacto del chunk no deja rango vacío al final', () => {
    expect(planChunks(300, 100)).toEqual([
      { start: 0, end: 99 },
      { start: 100, end: 199 },
      { start: 200, end: 299 },
    ]);
  });

  it('los rangos son contiguos y cubren exactamente [0, totalSize)', () => {
    const pairs: Array<[number, number]> = [
      [1, 1],
      [1, 7],
      [7, 1],
      [1000, 3],
      [1024, 1024],
      [1025, 1024],
      [999_999, 65_536],
      [10_000_000, 6_291_456],
    ];
    for (const [total, chunk] of pairs) {
      const ranges = planChunks(total, chunk);
      expect(ranges[0].start).toBe(0);
      expect(ranges[ranges.length - 1].end).toBe(total - 1);
      expect(ranges.length).toBe(Math.ceil(total / chunk));
      let covered = 0;
      ranges.forEach((range, i) => {
        if (i > 0) expect(range.start).toBe(ranges[i - 1].end + 1);
        expect(chunkLength(range)).toBeGreaterThan(0);
        expect(chunkLength(range)).toBeLessThanOrEqual(chunk);
        covered += chunkLength(range);
      });
      expect(covered).toBe(total);
    }
  });

  it('es determinista', () => {
    expect(planChunks(12345, 1000)).toEqual(planChunks(12345, 1000));
  });

  it('rechaza tamaños no positivos o no enteros', () => {
    expect(() => planChunks(0, 100)).toThrow(InvalidSizeError);
    expect(() => planChunks(-5, 100)).toThrow(InvalidSizeError);
    expect(() => planChunks(100, 0)).toThrow(InvalidSizeError);
    expect(() => planChunks(100, 1.5)).toThrow(InvalidSizeError);
    expect(() => planChunks(Number.NaN, 100)).toThrow(InvalidSizeError);
  });

  it('el error lleva el código INVALID_SIZE', () => {
    try {
      planChunks(100, -1);
      expect.unreachable('debería haber lanzado');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSizeError);
      expect((error as InvalidSizeError).code).toBe('INVALID_SIZE');
    }
  });
});
