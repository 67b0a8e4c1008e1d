/**
 * Bus de eventos de una ejecución del coordinador (un bus por run).
 *
 * Emite: started, chunkStarted, chunkProgress, chunkCompleted, chunkRetry, chunkFailed,
 * fallback, verificationStarted, finished. ProgressReporter y la CLI se suscriben aquí;
 * el coordinador nunca depende de quién escucha: un listener que lanza se registra en el
 * log y no llega al emisor.
 *
 * @module engines/EventBus
 */

import EventEmitter from 'events';
import { logger } from '../utils';
import type { DownloadResult } from './types';

const log = logger.child('EventBus');

type EmitterListener = Parameters<EventEmitter['on']>[1];

export interface DownloadEvents {
  started: {
    taskId: string;
    totalSize: number | null;
    totalChunks: number;
    doneChunks: number;
    doneBytes: number;
    resumed: boolean;
  };
  chunkStarted: { index: number; attempt: number };
  /** bytes: escritos del chunk en el intento actual. */
  chunkProgress: { index: number; bytes: number };
  chunkCompleted: { index: number; bytes: number };
  chunkRetry: { index: number; attempt: number; delayMs: number; error: string };
  chunkFailed: { index: number; attempts: number; error: string };
  fallback: { reason: string };
  /** bytes: escritos por el stream único hasta ahora. */
  fallbackProgress: { bytes: number };
  verificationStarted: { path: string };
  finished: { result: DownloadResult };
}

export type DownloadEventName = keyof DownloadEvents;
export type DownloadEventListener<K extends DownloadEventName> = (_payload: DownloadEvents[K]) => void;

export class EventBus {
  private readonly emitter = new EventEmitter();
  /** Listener original → wrapper registrado en el emitter, por evento. */
  private readonly wrappers = new Map<DownloadEventName, Map<object, EmitterListener>>();

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  on<K extends DownloadEventName>(event: K, listener: DownloadEventListener<K>): this {
    const wrapper = (payload: DownloadEvents[K]): void => {
      try {
        listener(payload);
      } catch (error) {
        log.warn(`Listener de '${event}' lanzó un error:`, error instanceof Error ? error.message : String(error));
      }
    };
    let byListener = this.wrappers.get(event);
    if (!byListener) {
      byListener = new Map<object, EmitterListener>();
      this.wrappers.set(event, byListener);
    }
    byListener.set(listener, wrapper);
    this.emitter.on(event, wrapper);
    return this;
  }

  off<K extends DownloadEventName>(event: K, listener: DownloadEventListener<K>): this {
    const byListener = this.wrappers.get(event);
    const wrapper = byListener?.get(listener);
    if (byListener && wrapper) {
      byListener.delete(listener);
      this.emitter.off(event, wrapper);
    }
    return this;
  }

  emit<K extends DownloadEventName>(event: K, payload: DownloadEvents[K]): void {
    this.emitter.emit(event, payload);
  }

  listenerCount(event: DownloadEventName): number {
    return this.emitter.listenerCount(event);
  }
}
