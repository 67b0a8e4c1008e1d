/**
 * Coordinador de una descarga fragmentada: planifica, reparte los chunks entre un pool
 * de workers, persiste el progreso, reanuda, finaliza y verifica.
 *
 * Flujo de run():
 *   1. Valida la tarea y carga el registro de progreso (clave = hash de url + destino).
 *   2. Tamaño: el de la tarea, el del registro o un HEAD. Sin tamaño → stream único.
 *   3. Registro reanudable solo si coincide la geometría y el destino mide totalSize;
 *      si no, se descarta y el destino se vuelve a reservar.
 *   4. Pool de `threads` workers: cada uno toma el pending de menor índice, lo descarga
 *      y guarda el registro (cadena de promesas serializada) antes de tomar otro.
 *   5. Primer ChunkFetchError → no se despachan más chunks; los que están en vuelo terminan.
 *      RangeUnsupportedError → se abortan los hermanos y se descarga en stream único.
 *      Abort del llamador → los chunks en vuelo vuelven a pending y el resultado es cancelled.
 *   6. Todos done → comprobación de tamaño → digest → resultado.
 *
 * Los errores de ejecución nunca se lanzan: se devuelven en DownloadResult.outcome.
 * Solo una tarea inválida rechaza la promesa.
 *
 * @module engines/DownloadCoordinator
 */

import crypto from 'crypto';
import path from 'path';
import config from '../config';
import { logger } from '../utils';
import { formatBytes, getFileSize, preallocateFile } from '../utils/fileHelpers';
import { taskInputSchema, validate } from '../utils/schemas';
import type { TaskInput } from '../utils/schemas';
import { DOWNLOAD_ERRORS } from '../constants/errors';
import { planChunks } from './ChunkPlanner';
import { ChunkFetcher } from './ChunkFetcher';
import { ChunkTable } from './ChunkTable';
import { EventBus } from './EventBus';
import { NodeHttpTransport } from './HttpTransport';
import { JsonProgressStore, createTaskKey } from './ProgressStore';
import { SimpleDownloader } from './SimpleDownloader';
import { Verifier } from './Verifier';
import {
  ChunkFetchError,
  ConfigError,
  DownloadCancelledError,
  DownloadFailedError,
  IntegrityMismatchError,
  InvalidSizeError,
  InvalidTaskError,
  RangeUnsupportedError,
  isAbortError,
} from './errors';
import { ChunkState } from './types';
import type { BackoffOptions } from './DownloadValidator';
import type { SleepFn } from './ChunkFetcher';
import type { HttpTransport } from './HttpTransport';
import type { ProgressStore } from './ProgressStore';
import type {
  ChunkSummary,
  DownloadOutcome,
  DownloadResult,
  DownloadTask,
  ProgressRecord,
  TaskKey,
} from './types';

const log = logger.child('Coordinator');

export interface DownloadCoordinatorOptions {
  /** Por defecto NodeHttpTransport (se cierra con close()). */
  transport?: HttpTransport;
  /** Por defecto JsonProgressStore (sidecar junto al destino). */
  store?: ProgressStore;
  threads?: number;
  maxRetries?: number;
  timeoutMs?: number;
  backoff?: BackoffOptions;
  sleep?: SleepFn;
  retainProgressRecord?: boolean;
  now?: () => number;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Bus al que se publican los eventos de esta ejecución (p. ej. con un ProgressReporter). */
  events?: EventBus;
}

interface RunContext {
  readonly task: DownloadTask;
  readonly key: TaskKey;
  readonly bus: EventBus;
  readonly signal?: AbortSignal;
  readonly startedAt: number;
  table: ChunkTable | null;
  bytesTransferred: number;
  resumed: boolean;
  usedFallback: boolean;
}

interface PoolState {
  stopDispatch: boolean;
  failure: ChunkFetchError | null;
  rangeError: RangeUnsupportedError | null;
  fatal: Error | null;
  persistChain: Promise<void>;
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new InvalidSizeError(`${name} debe ser un entero positivo (recibido: ${value})`);
  }
}

/**
 * Valida la entrada y devuelve una tarea congelada con los valores por defecto aplicados.
 *
 * @throws InvalidTaskError si la URL, el destino o el algoritmo no son válidos.
 * @throws InvalidSizeError si totalSize o chunkSize no son enteros positivos.
 */
export function createDownloadTask(input: TaskInput): DownloadTask {
  const result = validate(taskInputSchema, input);
  if (!result.success || !result.data) {
    throw new InvalidTaskError(result.error ?? DOWNLOAD_ERRORS.INVALID_TASK);
  }
  const data = result.data;
  const chunkSize = data.chunkSize ?? config.downloads.chunkSize;
  assertPositiveInteger('chunkSize', chunkSize);
  if (data.totalSize !== undefined) assertPositiveInteger('totalSize', data.totalSize);

  const digestAlgorithm = data.digestAlgorithm ?? config.downloads.digestAlgorithm;
  if (!crypto.getHashes().includes(digestAlgorithm)) {
    throw new InvalidTaskError(`algoritmo de digest no soportado: ${digestAlgorithm}`);
  }

  return Object.freeze({
    url: data.url,
    destination: path.resolve(data.destination),
    totalSize: data.totalSize,
    chunkSize,
    expectedDigest: data.expectedDigest,
    digestAlgorithm,
  });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class DownloadCoordinator {
  private readonly transport: HttpTransport;
  private readonly ownedTransport: NodeHttpTransport | null;
  private readonly store: ProgressStore;
  private readonly threads: number;
  private readonly timeoutMs: number;
  private readonly retainProgressRecord: boolean;
  private readonly now: () => number;
  private readonly fetcher: ChunkFetcher;
  private readonly simpleDownloader: SimpleDownloader;

  constructor(options: DownloadCoordinatorOptions = {}) {
    this.threads = options.threads ?? config.downloads.threads;
    if (!Number.isSafeInteger(this.threads) || this.threads < 1) {
      throw new ConfigError(`threads debe ser un entero >= 1 (recibido: ${this.threads})`);
    }
    const maxRetries = options.maxRetries ?? config.downloads.maxRetries;
    if (!Number.isSafeInteger(maxRetries) || maxRetries < 0) {
      throw new ConfigError(`maxRetries debe ser un entero >= 0 (recibido: ${maxRetries})`);
    }

    if (options.transport) {
      this.transport = options.transport;
      this.ownedTransport = null;
    } else {
      this.ownedTransport = new NodeHttpTransport({ timeoutMs: options.timeoutMs });
      this.transport = this.ownedTransport;
    }
    this.store = options.store ?? new JsonProgressStore();
    this.timeoutMs = options.timeoutMs ?? config.network.requestTimeoutMs;
    this.retainProgressRecord = options.retainProgressRecord ?? config.downloads.retainProgressRecord;
    this.now = options.now ?? Date.now;

    const retryOptions = {
      transport: this.transport,
      maxRetries,
      timeoutMs: this.timeoutMs,
      backoff: options.backoff,
      sleep: options.sleep,
    };
    this.fetcher = new ChunkFetcher(retryOptions);
    this.simpleDownloader = new SimpleDownloader(retryOptions);
  }

  /**
   * Ejecuta la tarea hasta success, failed o cancelled.
   *
   * @throws InvalidTaskError | InvalidSizeError solo si la entrada es inválida.
   */
  async run(input: TaskInput, options: RunOptions = {}): Promise<DownloadResult> {
    const task = createDownloadTask(input);
    const ctx: RunContext = {
      task,
      key: createTaskKey(task.url, task.destination),
      bus: options.events ?? new EventBus(),
      signal: options.signal,
      startedAt: this.now(),
      table: null,
      bytesTransferred: 0,
      resumed: false,
      usedFallback: false,
    };

    const endOperation = log.startOperation(`run ${ctx.key.id} → ${task.destination}`);
    const result = await this.execute(ctx);
    endOperation(result.outcome.status);
    ctx.bus.emit('finished', { result });
    return result;
  }

  /** Libera las conexiones keep-alive del transport propio. */
  close(): void {
    this.ownedTransport?.destroy();
  }

  private async execute(ctx: RunContext): Promise<DownloadResult> {
    try {
      return await this.executeTask(ctx);
    } catch (error) {
      if (isAbortError(error)) {
        log.info(`Descarga cancelada: ${ctx.task.destination}`);
        return this.buildResult(ctx, { status: 'cancelled' });
      }
      const failure =
        error instanceof DownloadFailedError
          ? error
          : new DownloadFailedError(toError(error).message, null, error);
      log.error(`[run] ${ctx.task.url}: ${failure.message}`);
      return this.buildResult(ctx, { status: 'failed', error: failure });
    }
  }

  private async executeTask(ctx: RunContext): Promise<DownloadResult> {
    const { task, key, bus } = ctx;
    let record = await this.store.load(key);

    const totalSize = task.totalSize ?? record?.totalSize ?? (await this.fetchRemoteSize(ctx));
    if (totalSize === null) {
      return this.runFallback(ctx, null, 'tamaño desconocido');
    }

    const ranges = planChunks(totalSize, task.chunkSize);
    if (record && !(await this.isResumable(record, task, totalSize, ranges.length))) {
      log.warn(`Registro de progreso descartado para ${task.destination}; se reinicia desde cero`);
      await this.store.remove(key);
      record = null;
    }
    if (!record) {
      await preallocateFile(task.destination, totalSize);
      record = this.buildRecord(ctx, totalSize, []);
      await this.store.save(record);
    }

    const table = new ChunkTable(ranges, record.done);
    ctx.table = table;
    ctx.resumed = record.done.length > 0;
    if (ctx.resumed) {
      log.info(
        `Reanudando ${task.destination}: ${record.done.length}/${ranges.length} chunks (${formatBytes(table.doneBytes())})`
      );
    }
    bus.emit('started', {
      taskId: key.id,
      totalSize,
      totalChunks: table.size,
      doneChunks: table.count(ChunkState.DONE),
      doneBytes: table.doneBytes(),
      resumed: ctx.resumed,
    });

    if (table.allDone()) {
      log.info(`Todos los chunks ya estaban completos; solo se verifica ${task.destination}`);
      return this.finalize(ctx, totalSize);
    }

    const pool = await this.runPool(ctx, table, totalSize);

    if (ctx.signal?.aborted) {
      throw new DownloadCancelledError(ctx.signal.reason);
    }
    if (pool.rangeError) {
      await this.store.remove(key);
      return this.runFallback(ctx, totalSize, pool.rangeError.message);
    }
    if (pool.failure) {
      return this.buildResult(ctx, { status: 'failed', error: DownloadFailedError.fromChunk(pool.failure) });
    }
    if (pool.fatal) {
      throw pool.fatal;
    }
    if (!table.allDone()) {
      throw new DownloadFailedError(
        `${table.count(ChunkState.DONE)}/${table.size} chunks completos al terminar el pool`,
        null
      );
    }
    return this.finalize(ctx, totalSize);
  }

  private async runPool(ctx: RunContext, table: ChunkTable, totalSize: number): Promise<PoolState> {
    const { task, key, bus, signal } = ctx;
    const state: PoolState = {
      stopDispatch: false,
      failure: null,
      rangeError: null,
      fatal: null,
      persistChain: Promise.resolve(),
    };

    // Señal interna: abortar hermanos sin tocar la del llamador
    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(signal?.reason);
    if (signal?.aborted) forwardAbort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const worker = async (): Promise<void> => {
      while (!state.stopDispatch && !controller.signal.aborted) {
        const chunk = table.takeNextPending();
        if (!chunk) return;
        const { index } = chunk;

        try {
          const bytes = await this.fetcher.fetch({
            url: task.url,
            index,
            range: chunk,
            destination: task.destination,
            signal: controller.signal,
            onAttempt: attempt => {
              table.recordAttempt(index);
              bus.emit('chunkStarted', { index, attempt });
            },
            onProgress: written => bus.emit('chunkProgress', { index, bytes: written }),
            onRetry: info => {
              bus.emit('chunkRetry', {
                index,
                attempt: info.attempt,
                delayMs: info.delayMs,
                error: info.error.message,
              });
              this.recordAttempt(key, index, info.attempt, info.error);
            },
          });
          table.complete(index);
          ctx.bytesTransferred += bytes;
          bus.emit('chunkCompleted', { index, bytes });
          await this.enqueueSave(state, () => this.buildRecord(ctx, totalSize, table.doneIndices()));
        } catch (error) {
          this.handleWorkerError(state, controller, table, ctx, index, error);
        }
      }
    };

    const workerCount = Math.min(this.threads, table.count(ChunkState.PENDING));
    log.debug(`[pool] ${workerCount} workers para ${table.count(ChunkState.PENDING)} chunks pendientes`);
    try {
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
      await state.persistChain;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
    return state;
  }

  private handleWorkerError(
    state: PoolState,
    controller: AbortController,
    table: ChunkTable,
    ctx: RunContext,
    index: number,
    error: unknown
  ): void {
    const inFlight = table.get(index).state === ChunkState.IN_FLIGHT;

    if (error instanceof RangeUnsupportedError) {
      if (inFlight) table.release(index);
      if (!state.rangeError) {
        log.warn(`[pool] ${error.message}; se abortan los chunks en vuelo`);
        state.rangeError = error;
        state.stopDispatch = true;
        controller.abort(error);
      }
      return;
    }
    if (isAbortError(error)) {
      if (inFlight) table.release(index);
      return;
    }
    if (error instanceof ChunkFetchError) {
      if (inFlight) table.fail(index);
      ctx.bus.emit('chunkFailed', { index, attempts: error.attempts, error: error.message });
      this.recordAttempt(ctx.key, index, error.attempts, toError(error.cause));
      if (!state.failure) {
        log.error(`[pool] chunk ${index} fallido; no se despachan más chunks`);
        state.failure = error;
      }
      state.stopDispatch = true;
      return;
    }

    // Errores de disco o de persistencia: no son del chunk en sí
    if (inFlight) table.fail(index);
    log.error(`[pool] error en chunk ${index}: ${toError(error).message}`);
    state.fatal ??= toError(error);
    state.stopDispatch = true;
  }

  /** Encadena un guardado del registro; el record se construye al ejecutarse, con el estado más reciente. */
  private enqueueSave(state: PoolState, buildRecord: () => ProgressRecord): Promise<void> {
    const next = state.persistChain.then(() => this.store.save(buildRecord()));
    state.persistChain = next.catch(error => {
      log.error(`${DOWNLOAD_ERRORS.PROGRESS_SAVE_FAILED}: ${toError(error).message}`);
    });
    return next;
  }

  private recordAttempt(key: TaskKey, chunkIndex: number, attempt: number, error: Error): void {
    if (!this.store.recordAttempt) return;
    // El diario puede lanzar de forma síncrona (better-sqlite3); se difiere a una promesa
    Promise.resolve()
      .then(() => this.store.recordAttempt?.(key, { chunkIndex, attempt, error: error.message }))
      .catch(storeError => {
        log.warn(`No se pudo registrar el intento del chunk ${chunkIndex}: ${toError(storeError).message}`);
      });
  }

  private async fetchRemoteSize(ctx: RunContext): Promise<number | null> {
    const { task, signal } = ctx;
    try {
      const head = await this.transport.head(task.url, { signal, timeoutMs: this.timeoutMs });
      if (head.statusCode >= 200 && head.statusCode < 300 && head.contentLength !== null && head.contentLength > 0) {
        log.debug(`[HEAD] ${task.url}: ${formatBytes(head.contentLength)}`);
        return head.contentLength;
      }
      log.warn(`[HEAD] ${task.url}: HTTP ${head.statusCode} sin Content-Length utilizable`);
      return null;
    } catch (error) {
      if (signal?.aborted || isAbortError(error)) {
        throw new DownloadCancelledError(error);
      }
      log.warn(`[HEAD] ${task.url} falló: ${toError(error).message}`);
      return null;
    }
  }

  private async isResumable(record: ProgressRecord, task: DownloadTask, totalSize: number, chunkCount: number): Promise<boolean> {
    if (record.totalSize !== totalSize || record.chunkSize !== task.chunkSize) return false;
    if (record.done.some(index => index >= chunkCount)) return false;
    return (await getFileSize(task.destination)) === totalSize;
  }

  private async runFallback(
    ctx: RunContext,
    totalSize: number | null,
    reason: string
  ): Promise<DownloadResult> {
    const { task, bus, signal } = ctx;
    ctx.usedFallback = true;
    log.warn(`Usando descarga en stream único para ${task.url}: ${reason}`);
    bus.emit('fallback', { reason });

    const written = await this.simpleDownloader.download({
      url: task.url,
      destination: task.destination,
      expectedSize: totalSize,
      signal,
      onProgress: bytes => bus.emit('fallbackProgress', { bytes }),
    });
    ctx.bytesTransferred += written;
    return this.verifyAndFinish(ctx, written);
  }

  private async finalize(ctx: RunContext, totalSize: number): Promise<DownloadResult> {
    const size = await getFileSize(ctx.task.destination);
    if (size !== totalSize) {
      await this.store.remove(ctx.key);
      throw new DownloadFailedError(`${DOWNLOAD_ERRORS.SIZE_MISMATCH}: ${size ?? 0}/${totalSize} bytes`, null);
    }
    return this.verifyAndFinish(ctx, totalSize);
  }

  private async verifyAndFinish(ctx: RunContext, totalBytes: number): Promise<DownloadResult> {
    const { task, key, bus } = ctx;
    bus.emit('verificationStarted', { path: task.destination });
    const verifier = new Verifier(task.digestAlgorithm);
    const verification = await verifier.verifyFile(task.destination, task.expectedDigest ?? null);

    if (verification.status === 'failed') {
      await this.store.remove(key);
      const error = new IntegrityMismatchError(
        task.destination,
        verification.expectedDigest ?? '',
        verification.digest
      );
      log.error(error.message);
      return this.buildResult(ctx, { status: 'failed', error }, { totalBytes, digest: verification.digest });
    }

    if (!this.retainProgressRecord || ctx.usedFallback) {
      await this.store.remove(key);
    }
    return this.buildResult(
      ctx,
      { status: 'success', verification: verification.status === 'passed' ? 'verified' : 'unverified' },
      { totalBytes, digest: verification.digest }
    );
  }

  private buildRecord(ctx: RunContext, totalSize: number, done: number[]): ProgressRecord {
    return {
      version: 1,
      taskId: ctx.key.id,
      url: ctx.task.url,
      destination: ctx.task.destination,
      totalSize,
      chunkSize: ctx.task.chunkSize,
      done,
      updatedAt: this.now(),
    };
  }

  private buildResult(
    ctx: RunContext,
    outcome: DownloadOutcome,
    file: { totalBytes: number; digest: string | null } = { totalBytes: 0, digest: null }
  ): DownloadResult {
    const chunks: readonly ChunkSummary[] = Object.freeze(ctx.table?.snapshot() ?? []);
    return Object.freeze({
      taskId: ctx.key.id,
      finalPath: ctx.task.destination,
      totalBytes: file.totalBytes,
      bytesTransferred: ctx.bytesTransferred,
      digest: file.digest,
      digestAlgorithm: ctx.task.digestAlgorithm,
      outcome,
      chunks,
      resumed: ctx.resumed,
      usedFallback: ctx.usedFallback,
      durationMs: this.now() - ctx.startedAt,
    });
  }
}

/** Atajo: crea un coordinador, ejecuta la tarea y cierra el transport propio. */
export async function downloadFile(
  input: TaskInput,
  options: DownloadCoordinatorOptions & RunOptions = {}
): Promise<DownloadResult> {
  const { signal, events, ...coordinatorOptions } = options;
  const coordinator = new DownloadCoordinator(coordinatorOptions);
  try {
    return await coordinator.run(input, { signal, events });
  } finally {
    coordinator.close();
  }
}
