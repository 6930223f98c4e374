export type ArchivePhase =
  | 'discovered'
  | 'downloading'
  | 'downloaded'
  | 'extracting'
  | 'extracted'
  | 'processed'
  | 'cleaned'
  | 'corrupted'
  | 'failed';

export type MediaPhase =
  | 'extracted'
  | 'metadata-merged'
  | 'album-resolved'
  | 'uploading'
  | 'uploaded'
  | 'failed';

export type FailureKind = 'transient' | 'permanent' | 'corrupt-input' | 'resource-exhausted';

export type UnitKind = 'archive' | 'media';

export interface RecordedError {
  kind: FailureKind;
  message: string;
  at: string;
}

export interface RetryRecord {
  kind: FailureKind;
  attempts: number;
  nextAttemptAt: string;
}

export interface ArchiveUnit {
  id: string;
  name: string;
  size: number;
  phase: ArchivePhase;
  attempts: number;
  lastError?: RecordedError;
  retry?: RetryRecord;
  failedFrom?: ArchivePhase;
  skipped?: boolean;
  localPath?: string;
  extractDir?: string;
  fingerprint?: string;
  itemCount?: number;
  discoveredAt: string;
  updatedAt: string;
}

export interface MediaMetadata {
  timestamp?: string;
  latitude?: number;
  longitude?: number;
  description?: string;
  title?: string;
  albumHints: string[];
}

export interface MediaItem {
  id: string;
  archiveId: string;
  relativePath: string;
  path: string;
  fingerprint: string;
  size: number;
  sidecarPath?: string;
  metadata?: MediaMetadata;
  albums: string[];
  phase: MediaPhase;
  attempts: number;
  lastError?: RecordedError;
  retry?: RetryRecord;
  failedFrom?: MediaPhase;
  remoteId?: string;
  fileReclaimed?: boolean;
  updatedAt: string;
}

export type AlbumOrigin = 'created' | 'pre-existing';

export interface Album {
  key: string;
  displayName: string;
  members: string[];
  origin: AlbumOrigin;
  /** Run that first created the album; compared against the current run id. */
  createdInRun?: string;
  updatedAt: string;
}

export type RunMode = 'running' | 'paused-for-retries';

export interface RunMeta {
  runId?: string;
  mode: RunMode;
  proceedGranted: boolean;
  /** Failed item count the operator accepted with `proceed`; more failures than this pause the run again. */
  acknowledgedFailures: number;
  lastRunStartedAt?: string;
  lastRunFinishedAt?: string;
}

export interface UnitRecordByKind {
  archive: ArchiveUnit;
  media: MediaItem;
}

export interface PhaseByKind {
  archive: ArchivePhase;
  media: MediaPhase;
}
