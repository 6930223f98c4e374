import type { ArchivePhase, ArchiveUnit, FailureKind, MediaItem, MediaPhase, RunMode, UnitKind } from './migration.js';

export interface ConcurrencyOptions {
  download: number;
  extract: number;
  metadata: number;
  upload: number;
}

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface DiskOptions {
  /** Ceiling for the working directory, `null` for unlimited. */
  budgetBytes: number | null;
  minFreeBytes: number;
  refreshIntervalMs: number;
  /** Usage ratio at which uploaded sources are reclaimed while work is deferred. */
  cleanupThreshold: number;
  pollIntervalMs: number;
}

export interface MetadataOptions {
  preserveDates: boolean;
  preserveGps: boolean;
  preserveDescriptions: boolean;
  preserveAlbums: boolean;
}

export interface PipelineOptions {
  concurrency: ConcurrencyOptions;
  retry: RetryOptions;
  disk: DiskOptions;
  metadata: MetadataOptions;
  cleanupAfterUpload: boolean;
  pauseFailureRatio: number;
  journalCompactEvery: number;
}

export interface FailureReport {
  unitKind: UnitKind;
  id: string;
  label: string;
  archiveId: string;
  failedFrom?: ArchivePhase | MediaPhase;
  kind: FailureKind;
  message: string;
  attempts: number;
}

export type StageName = 'download' | 'extract' | 'metadata' | 'upload' | 'cleanup';

export interface StageSummary {
  stage: StageName;
  attempts: number;
  succeeded: number;
  failed: number;
  bytes: number;
  durationMs: number;
  /** Succeeded attempts over all attempts, 0..1. */
  successRate: number;
  throughputPerSecond: number;
}

export interface RunSummary {
  runId: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  mode: RunMode;
  stopped: boolean;
  archives: Record<ArchivePhase, number>;
  media: Record<MediaPhase, number>;
  uploadedThisRun: number;
  reattempts: number;
  albumsCreated: number;
  failures: FailureReport[];
  deferred: string[];
  stages: StageSummary[];
  reportPath: string;
}

export type PipelineEvent =
  | { type: 'phase'; phase: string }
  | { type: 'archive'; archive: ArchiveUnit; message: string }
  | { type: 'media'; item: MediaItem; message: string }
  | { type: 'error'; unitKind: UnitKind; id: string; kind: FailureKind; error: Error }
  | { type: 'mode'; mode: RunMode };

export type ProgressCallback = (event: PipelineEvent) => void;
