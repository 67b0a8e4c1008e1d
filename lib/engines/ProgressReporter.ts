/**
 * Reporte de progreso en texto para terminal, alimentado por el EventBus de una ejecución.
 *
 * Lleva la cuenta de bytes de chunks terminados más los bytes en vuelo de cada chunk,
 * calcula velocidad y ETA con SpeedTracker y escribe una línea como máximo cada
 * config.ui.progressThrottle ms. En TTY la línea se reescribe con \r; fuera de TTY
 * se emite una línea por actualización.
 *
 * @module engines/ProgressReporter
 */

import config from '../config';
import { formatBytes } from '../utils/fileHelpers';
import { SpeedTracker } from './SpeedTracker';
import type { DownloadEventListener, DownloadEventName, EventBus } from './EventBus';

export interface ProgressOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

export interface ProgressLineState {
  label: string;
  downloaded: number;
  total: number | null;
  doneChunks: number;
  totalChunks: number;
  speedBytesPerSec: number;
  remainingTime: number | null;
}

const BAR_WIDTH = 20;

export function formatEta(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds)) return '--';
  const total = Math.round(seconds);
  if (total < 60) return `${total}s`;
  if (total < 3600) return `${Math.floor(total / 60)}m${total % 60}s`;
  return `${Math.floor(total / 3600)}h${Math.floor((total % 3600) / 60)}m`;
}

export function formatProgressLine(state: ProgressLineState): string {
  const speed = `${formatBytes(state.speedBytesPerSec)}/s`;
  if (state.total === null || state.total <= 0) {
    return `${state.label} ${formatBytes(state.downloaded)} ${speed}`;
  }
  const ratio = Math.min(1, state.downloaded / state.total);
  const filled = Math.round(ratio * BAR_WIDTH);
  const bar = '#'.repeat(filled) + '.'.repeat(BAR_WIDTH - filled);
  return (
    `${state.label} [${bar}] ${(ratio * 100).toFixed(1)}% ` +
    `${state.doneChunks}/${state.totalChunks} chunks ` +
    `${formatBytes(state.downloaded)}/${formatBytes(state.total)} ` +
    `${speed} ETA ${formatEta(state.remainingTime)}`
  );
}

export interface ProgressReporterOptions {
  label: string;
  output?: ProgressOutput;
  throttleMs?: number;
  now?: () => number;
}

export class ProgressReporter {
  private readonly label: string;
  private readonly output: ProgressOutput;
  private readonly throttleMs: number;
  private readonly now: () => number;
  private readonly speedTracker: SpeedTracker;

  private taskId = '';
  private total: number | null = null;
  private totalChunks = 0;
  private doneChunks = 0;
  private doneBytes = 0;
  private fallbackBytes: number | null = null;
  private readonly inFlight = new Map<number, number>();
  private lastRender = Number.NEGATIVE_INFINITY;
  private lastLine = '';
  private bus: EventBus | null = null;
  private readonly unsubscribers: Array<() => void> = [];

  constructor(options: ProgressReporterOptions) {
    this.label = options.label;
    this.output = options.output ?? process.stderr;
    this.throttleMs = options.throttleMs ?? config.ui.progressThrottle;
    this.now = options.now ?? Date.now;
    this.speedTracker = new SpeedTracker({ now: this.now });
  }

  attach(bus: EventBus): this {
    this.detach();
    this.bus = bus;
    this.listen('started', payload => {
      this.taskId = payload.taskId;
      this.total = payload.totalSize;
      this.totalChunks = payload.totalChunks;
      this.doneChunks = payload.doneChunks;
      this.doneBytes = payload.doneBytes;
      this.speedTracker.startTracking(payload.taskId, payload.doneBytes);
      this.render(true);
    });
    this.listen('chunkProgress', ({ index, bytes }) => {
      this.inFlight.set(index, bytes);
      this.render(false);
    });
    this.listen('chunkRetry', ({ index }) => {
      this.inFlight.set(index, 0);
    });
    this.listen('chunkCompleted', ({ index, bytes }) => {
      this.inFlight.delete(index);
      this.doneBytes += bytes;
      this.doneChunks++;
      this.render(false);
    });
    this.listen('chunkFailed', ({ index }) => {
      this.inFlight.delete(index);
    });
    this.listen('fallback', () => {
      this.inFlight.clear();
      this.fallbackBytes = 0;
    });
    this.listen('fallbackProgress', ({ bytes }) => {
      this.fallbackBytes = bytes;
      this.render(false);
    });
    this.listen('finished', ({ result }) => {
      if (result.outcome.status === 'success') {
        this.inFlight.clear();
        this.total = result.totalBytes;
        this.fallbackBytes = null;
        this.doneBytes = result.totalBytes;
        this.doneChunks = this.totalChunks;
      }
      this.render(true);
      if (this.output.isTTY) this.output.write('\n');
      this.speedTracker.stopTracking(this.taskId);
    });
    return this;
  }

  detach(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    this.bus = null;
  }

  /** Bytes presentes ahora mismo en el destino según los eventos recibidos. */
  downloadedBytes(): number {
    if (this.fallbackBytes !== null) return this.fallbackBytes;
    let sum = this.doneBytes;
    for (const bytes of this.inFlight.values()) sum += bytes;
    return sum;
  }

  get line(): string {
    return this.lastLine;
  }

  private listen<K extends DownloadEventName>(event: K, listener: DownloadEventListener<K>): void {
    const bus = this.bus;
    if (!bus) return;
    bus.on(event, listener);
    this.unsubscribers.push(() => {
      bus.off(event, listener);
    });
  }

  private render(force: boolean): void {
    const now = this.now();
    if (!force && now - this.lastRender < this.throttleMs) return;
    this.lastRender = now;

    const downloaded = this.downloadedBytes();
    const speed = this.speedTracker.update(this.taskId, downloaded, this.total);
    this.lastLine = formatProgressLine({
      label: this.label,
      downloaded,
      total: this.total,
      doneChunks: this.doneChunks,
      totalChunks: this.totalChunks,
      speedBytesPerSec: speed?.speedBytesPerSec ?? 0,
      remainingTime: speed?.remainingTime ?? null,
    });
    this.output.write(this.output.isTTY ? `\r${this.lastLine}` : `${this.lastLine}\n`);
  }
}
