/**
 * Velocidad de descarga y ETA por taskId usando media móvil exponencial (EMA).
 *
 * startTracking inicia la sesión (con los bytes ya presentes si se reanuda, para que el
 * primer cálculo no cuente todo lo histórico como velocidad); update() recibe bytes totales
 * y tamaño y devuelve speedBytesPerSec y remainingTime en segundos.
 *
 * @module engines/SpeedTracker
 */

export interface SpeedTrackerEntry {
  lastUpdate: number;
  lastDownloaded: number;
  emaSpeed: number;
  emaRemainingTime: number | null;
}

export interface SpeedUpdateResult {
  speedBytesPerSec: number;
  remainingTime: number | null;
}

export interface SpeedTrackerOptions {
  alpha?: number;
  /** Segundos mínimos entre muestras para calcular velocidad instantánea. */
  minTimeDelta?: number;
  now?: () => number;
}

export class SpeedTracker {
  private trackers = new Map<string, SpeedTrackerEntry>();
  private readonly alpha: number;
  private readonly minTimeDelta: number;
  private readonly now: () => number;

  constructor(options: SpeedTrackerOptions = {}) {
    this.alpha = options.alpha ?? 0.3;
    this.minTimeDelta = options.minTimeDelta ?? 0.1;
    this.now = options.now ?? Date.now;
  }

  startTracking(taskId: string, initialDownloadedBytes = 0): void {
    const now = this.now();
    this.trackers.set(taskId, {
      lastUpdate: now,
      lastDownloaded: Math.max(0, initialDownloadedBytes),
      emaSpeed: 0,
      emaRemainingTime: null,
    });
  }

  update(taskId: string, downloadedBytes: number, totalBytes: number | null): SpeedUpdateResult | null {
    const tracker = this.trackers.get(taskId);
    if (!tracker) return null;

    const now = this.now();
    const timeDelta = (now - tracker.lastUpdate) / 1000;
    const bytesDelta = downloadedBytes - tracker.lastDownloaded;

    // Un chunk que se reintenta hace retroceder el total; no cuenta como velocidad
    if (bytesDelta < 0) {
      tracker.lastDownloaded = downloadedBytes;
      tracker.lastUpdate = now;
    } else if (timeDelta >= this.minTimeDelta) {
      const instantSpeed = bytesDelta / timeDelta;
      tracker.emaSpeed =
        tracker.emaSpeed === 0 ? instantSpeed : this.alpha * instantSpeed + (1 - this.alpha) * tracker.emaSpeed;
      tracker.lastDownloaded = downloadedBytes;
      tracker.lastUpdate = now;
    }

    const speedBytesPerSec = tracker.emaSpeed;
    let remainingTime: number | null = null;
    if (totalBytes !== null && speedBytesPerSec > 0) {
      const remainingBytes = Math.max(0, totalBytes - downloadedBytes);
      const instant = remainingBytes / speedBytesPerSec;
      tracker.emaRemainingTime =
        tracker.emaRemainingTime === null || remainingBytes === 0
          ? instant
          : this.alpha * instant + (1 - this.alpha) * tracker.emaRemainingTime;
      remainingTime = tracker.emaRemainingTime;
    }

    return { speedBytesPerSec, remainingTime };
  }

  stopTracking(taskId: string): void {
    this.trackers.delete(taskId);
  }
}
