/**
 * Punto de entrada del motor de descargas: reexporta DownloadCoordinator, ChunkPlanner,
 * ChunkTable, ChunkFetcher, SimpleDownloader, HttpTransport, ProgressStore (JSON y SQLite),
 * Verifier, EventBus, SpeedTracker, ProgressReporter, DownloadValidator, errores y tipos.
 *
 * @module engines
 */

export { DownloadCoordinator, createDownloadTask, downloadFile } from './DownloadCoordinator';
export type { DownloadCoordinatorOptions, RunOptions } from './DownloadCoordinator';
export { planChunks, chunkLength } from './ChunkPlanner';
export { ChunkTable, canTransition } from './ChunkTable';
export { ChunkFetcher, defaultSleep } from './ChunkFetcher';
export type { ChunkFetchRequest, ChunkFetcherOptions, RetryInfo, SleepFn } from './ChunkFetcher';
export { SimpleDownloader } from './SimpleDownloader';
export type { SimpleDownloadRequest, SimpleDownloaderOptions } from './SimpleDownloader';
export {
  NodeHttpTransport,
  headerValue,
  parseContentLength,
  parseContentRange,
} from './HttpTransport';
export type {
  HttpTransport,
  HttpResponse,
  HttpHeaders,
  HeadResult,
  GetOptions,
  RequestOptions,
  NodeHttpTransportOptions,
} from './HttpTransport';
export { JsonProgressStore, createTaskKey } from './ProgressStore';
export type { ProgressStore, AttemptEntry } from './ProgressStore';
export { SqliteProgressStore } from './SqliteProgressStore';
export type { StoredAttempt } from './SqliteProgressStore';
export { default as verifier, Verifier } from './Verifier';
export type { VerifyFileResult, VerifyStatus } from './Verifier';
export { EventBus } from './EventBus';
export type { DownloadEvents, DownloadEventName, DownloadEventListener } from './EventBus';
export { SpeedTracker } from './SpeedTracker';
export type { SpeedUpdateResult, SpeedTrackerOptions } from './SpeedTracker';
export { ProgressReporter, formatProgressLine, formatEta } from './ProgressReporter';
export type { ProgressOutput, ProgressLineState, ProgressReporterOptions } from './ProgressReporter';
export { isTransientNetworkError, calculateBackoffDelay, parseRetryAfter } from './DownloadValidator';
export type { BackoffOptions, ParseRetryAfterOptions } from './DownloadValidator';
export * from './errors';
export { ChunkState } from './types';
export type {
  ChunkStateType,
  ChunkRange,
  Chunk,
  ChunkSummary,
  DownloadTask,
  TaskKey,
  ProgressRecord,
  VerificationStatus,
  DownloadOutcome,
  DownloadResult,
} from './types';
