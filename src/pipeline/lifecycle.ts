import type { ArchivePhase, ArchiveUnit, MediaItem, MediaPhase, PhaseByKind, UnitKind } from '../types/migration.js';

export const ARCHIVE_PHASES: readonly ArchivePhase[] = [
  'discovered',
  'downloading',
  'downloaded',
  'extracting',
  'extracted',
  'processed',
  'cleaned',
  'corrupted',
  'failed'
];

export const MEDIA_PHASES: readonly MediaPhase[] = [
  'extracted',
  'metadata-merged',
  'album-resolved',
  'uploading',
  'uploaded',
  'failed'
];

const ARCHIVE_EDGES: Record<ArchivePhase, readonly ArchivePhase[]> = {
  discovered: ['downloading', 'failed'],
  // backward edges out of the in-flight phases are crash recovery and transient retry
  downloading: ['downloaded', 'discovered', 'corrupted', 'failed'],
  downloaded: ['extracting', 'corrupted', 'failed'],
  extracting: ['extracted', 'downloaded', 'corrupted', 'failed'],
  extracted: ['processed', 'failed'],
  // reopened when a failed item is retried
  processed: ['cleaned', 'extracted'],
  cleaned: [],
  corrupted: ['discovered', 'failed'],
  failed: []
};

const MEDIA_EDGES: Record<MediaPhase, readonly MediaPhase[]> = {
  extracted: ['metadata-merged', 'failed'],
  'metadata-merged': ['album-resolved', 'failed'],
  'album-resolved': ['uploading', 'failed'],
  uploading: ['uploaded', 'album-resolved', 'failed'],
  uploaded: [],
  failed: []
};

const EDGES: { [K in UnitKind]: Record<PhaseByKind[K], readonly PhaseByKind[K][]> } = {
  archive: ARCHIVE_EDGES,
  media: MEDIA_EDGES
};

export const canTransition = <K extends UnitKind>(kind: K, from: PhaseByKind[K], to: PhaseByKind[K]): boolean => {
  const edges: Record<PhaseByKind[K], readonly PhaseByKind[K][]> = EDGES[kind];
  return edges[from].includes(to);
};

/** Phases an interrupted process can leave a unit in, mapped to the last durable phase. */
export const ARCHIVE_RECOVERY: Partial<Record<ArchivePhase, ArchivePhase>> = {
  downloading: 'discovered',
  extracting: 'downloaded'
};

export const MEDIA_RECOVERY: Partial<Record<MediaPhase, MediaPhase>> = {
  uploading: 'album-resolved'
};

/**
 * Where an explicit retry resumes a unit that failed while in `failedFrom`.
 * In-flight phases resume from the phase that admitted them.
 */
export const archiveRetryPhase = (failedFrom: ArchivePhase | undefined): ArchivePhase => {
  if (!failedFrom) {
    return 'discovered';
  }
  return ARCHIVE_RECOVERY[failedFrom] ?? failedFrom;
};

export const mediaRetryPhase = (failedFrom: MediaPhase | undefined): MediaPhase => {
  if (!failedFrom) {
    return 'extracted';
  }
  return MEDIA_RECOVERY[failedFrom] ?? failedFrom;
};

export const isArchiveTerminal = (phase: ArchivePhase): boolean =>
  phase === 'cleaned' || phase === 'corrupted' || phase === 'failed';

export const isMediaTerminal = (phase: MediaPhase): boolean => phase === 'uploaded' || phase === 'failed';

export const tallyArchives = (records: Iterable<ArchiveUnit>): Record<ArchivePhase, number> => {
  const counts: Record<ArchivePhase, number> = {
    discovered: 0,
    downloading: 0,
    downloaded: 0,
    extracting: 0,
    extracted: 0,
    processed: 0,
    cleaned: 0,
    corrupted: 0,
    failed: 0
  };
  for (const record of records) {
    counts[record.phase] += 1;
  }
  return counts;
};

export const tallyMedia = (records: Iterable<MediaItem>): Record<MediaPhase, number> => {
  const counts: Record<MediaPhase, number> = {
    extracted: 0,
    'metadata-merged': 0,
    'album-resolved': 0,
    uploading: 0,
    uploaded: 0,
    failed: 0
  };
  for (const record of records) {
    counts[record.phase] += 1;
  }
  return counts;
};
