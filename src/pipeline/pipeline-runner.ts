import path from 'node:path';
import fs from 'fs-extra';
import PQueue from 'p-queue';
import { v4 as uuid } from 'uuid';
import { CorruptInputError, PermanentError, errorMessage, toError } from '../errors.js';
import { ensureAppDirectories } from '../config/app-paths.js';
import type { AppPaths } from '../config/app-paths.js';
import { AlbumResolver } from '../services/album-resolver.js';
import { DiagnosticsService } from '../services/diagnostics-service.js';
import type { DiskBudgetGovernor, Reservation } from '../services/disk-budget.js';
import { ReportService } from '../services/report-service.js';
import { RetryClassifier } from '../services/retry-classifier.js';
import { SidecarParser, isSidecarFile, locateSidecar } from '../services/sidecar-parser.js';
import { StageMetrics } from '../services/stage-metrics.js';
import type { StateStore } from '../services/state-store.js';
import { streamHash, removeTracked } from '../utils/files.js';
import { detectMagicType, isMediaSignature } from '../utils/magic-bytes.js';
import { isMediaFile } from '../utils/media.js';
import { mediaItemId } from '../utils/naming.js';
import { DownloadWorker } from '../workers/download-worker.js';
import type { DownloadOutput } from '../workers/download-worker.js';
import { ExtractWorker } from '../workers/extract-worker.js';
import type { ExtractOutput } from '../workers/extract-worker.js';
import { MetadataWorker } from '../workers/metadata-worker.js';
import { UploadWorker } from '../workers/upload-worker.js';
import { ARCHIVE_RECOVERY, MEDIA_RECOVERY, isArchiveTerminal, isMediaTerminal } from './lifecycle.js';
import { PipelineControl, sleep } from './pipeline-control.js';
import { WorkerPool } from './worker-pool.js';
import log from '../logger.js';
import type {
  ArchiveSource,
  ArchiveExtractor,
  ExtractedEntry,
  MediaUploader,
  MetadataTagger
} from '../types/collaborators.js';
import type {
  ArchivePhase,
  ArchiveUnit,
  MediaItem,
  MediaMetadata,
  MediaPhase,
  RecordedError,
  RetryRecord
} from '../types/migration.js';
import type {
  FailureReport,
  PipelineOptions,
  ProgressCallback,
  RunSummary,
  StageName
} from '../types/pipeline.js';

export interface PipelineDependencies {
  store: StateStore;
  governor: DiskBudgetGovernor;
  source: ArchiveSource;
  extractor: ArchiveExtractor;
  uploader: MediaUploader;
  tagger?: MetadataTagger;
  classifier?: RetryClassifier;
  paths: AppPaths;
  options: PipelineOptions;
}

/** What a unit of phase work produced; `skipped` means another writer or a stop got there first. */
type Outcome<T> = { status: 'done'; value: T } | { status: 'failed'; error: unknown } | { status: 'skipped' };

interface SpaceRequest {
  unitId: string;
  /** Archive whose drive is asking. */
  archiveId: string;
  bytes: number;
  /** Starting a new archive yields to archives already under way. */
  startsArchive?: boolean;
}

const totalSize = (entries: ExtractedEntry[]): number => entries.reduce((sum, entry) => sum + entry.size, 0);

const attempt = async <T>(work: () => Promise<T>): Promise<Outcome<T>> => {
  try {
    return { status: 'done', value: await work() };
  } catch (error) {
    return { status: 'failed', error };
  }
};

const noop: ProgressCallback = () => undefined;

/** A transient failure that used up its attempts is permanent from here on. */
const exhausted = (error: RecordedError): RecordedError =>
  error.kind === 'transient' ? { ...error, kind: 'permanent' } : error;

export class PipelineRunner {
  private readonly store: StateStore;
  private readonly governor: DiskBudgetGovernor;
  private readonly classifier: RetryClassifier;
  private readonly control = new PipelineControl();
  private readonly diagnosticsService = new DiagnosticsService();
  private readonly deletions = new PQueue({ concurrency: 1 });
  private readonly pools: { download: WorkerPool; extract: WorkerPool; metadata: WorkerPool; upload: WorkerPool };
  private readonly downloadWorker: DownloadWorker;
  private readonly extractWorker: ExtractWorker;
  private readonly metadataWorker: MetadataWorker;
  private readonly uploadWorker: UploadWorker;
  private resolver: AlbumResolver;
  private isRunning = false;
  private runId = '';
  private deferred = new Set<string>();
  private metrics = new StageMetrics();
  private readonly driving = new Set<string>();
  private readonly waitingForSpace = new Map<string, number>();
  private resumableWaiters = 0;
  private uploadedThisRun = 0;
  private reattempts = 0;
  private lastReportPath?: string;

  constructor(private readonly deps: PipelineDependencies) {
    const { options } = deps;
    this.store = deps.store;
    this.governor = deps.governor;
    this.classifier = deps.classifier ?? new RetryClassifier(options.retry);
    this.pools = {
      download: new WorkerPool('download', options.concurrency.download, this.control),
      extract: new WorkerPool('extract', options.concurrency.extract, this.control),
      metadata: new WorkerPool('metadata', options.concurrency.metadata, this.control),
      upload: new WorkerPool('upload', options.concurrency.upload, this.control)
    };
    this.downloadWorker = new DownloadWorker(deps.source, deps.extractor, deps.paths.zipsDir);
    this.extractWorker = new ExtractWorker(deps.extractor, deps.paths.extractedDir);
    this.metadataWorker = new MetadataWorker(new SidecarParser(), deps.tagger, options.metadata);
    this.uploadWorker = new UploadWorker(deps.uploader);
    this.resolver = new AlbumResolver(this.store);
  }

  async run(progress: ProgressCallback = noop): Promise<RunSummary> {
    if (this.isRunning) {
      throw new Error('Pipeline is already running.');
    }
    this.isRunning = true;
    this.control.reset();
    this.deferred = new Set();
    this.metrics = new StageMetrics();
    this.uploadedThisRun = 0;
    this.reattempts = 0;
    this.runId = uuid();
    this.resolver = new AlbumResolver(this.store, this.runId);
    const startedAt = new Date();

    try {
      await ensureAppDirectories(this.deps.paths);
      await this.store.setMeta({ runId: this.runId, lastRunStartedAt: startedAt.toISOString() });
      log.info('Starting migration run %s', this.runId);

      progress({ type: 'phase', phase: 'recover' });
      await this.recoverInFlight();
      await this.governor.refresh(true);

      progress({ type: 'phase', phase: 'discover' });
      await this.discover();
      await this.seedAlbums();

      progress({ type: 'phase', phase: 'migrate' });
      const pending = this.store
        .all('archive')
        .filter((archive) => !isArchiveTerminal(archive.phase))
        .map((archive) => archive.id);
      const drives = pending.map((id) => this.driveArchive(id, progress));
      try {
        await Promise.all(drives);
      } catch (error) {
        // a store or disk failure ends the run; let in-flight work reach a checkpoint first
        this.control.stop();
        await Promise.allSettled(drives);
        throw error;
      }

      if (!this.control.stopped) {
        progress({ type: 'phase', phase: 'cleanup' });
        await this.cleanupProcessed(progress);
      }

      const finishedAt = new Date();
      await this.store.setMeta({ lastRunFinishedAt: finishedAt.toISOString() });
      await this.store.compact();
      const summary = this.buildSummary(startedAt, finishedAt);
      const reportService = new ReportService(this.deps.paths.reportDir);
      summary.reportPath = await reportService.create(summary, this.store.all('media'));
      this.lastReportPath = summary.reportPath;
      this.metrics.logSummary();
      log.info(
        'Run %s finished: %d uploaded, %d failures, %d deferred',
        this.runId,
        summary.uploadedThisRun,
        summary.failures.length,
        summary.deferred.length
      );
      progress({ type: 'phase', phase: 'complete' });
      return summary;
    } finally {
      this.isRunning = false;
    }
  }

  getStatus(): { running: boolean; paused: boolean; stopped: boolean } {
    return { running: this.isRunning, paused: this.control.paused, stopped: this.control.stopped };
  }

  pause(): void {
    if (!this.isRunning) {
      return;
    }
    this.control.pause();
  }

  resume(): void {
    this.control.resume();
  }

  /** Stops admitting work; in-flight operations finish to their next recorded phase. */
  stop(): void {
    if (!this.isRunning) {
      return;
    }
    log.info('Stop requested; letting in-flight work reach a checkpoint');
    this.control.stop();
  }

  /**
   * Operator acknowledgement of the current failures: leaves
   * `paused-for-retries` and cleans every archive that was held back.
   */
  async proceed(progress: ProgressCallback = noop): Promise<number> {
    const failed = this.store.mediaCounts().failed;
    await this.store.setMeta({ mode: 'running', proceedGranted: true, acknowledgedFailures: failed });
    progress({ type: 'mode', mode: 'running' });
    log.info('Proceeding with %d acknowledged failures', failed);
    return this.cleanupProcessed(progress);
  }

  /**
   * Puts failed items (and failed archives that were not skipped) back to the
   * phase they failed from. Items of an archive that was already cleaned have
   * no local bytes left and are left alone. Returns the ids that were reset.
   */
  async retryFailed(ids?: string[]): Promise<string[]> {
    const wanted = ids ? new Set(ids) : undefined;
    const reset: string[] = [];
    for (const archive of this.store.all('archive')) {
      if (archive.phase !== 'failed' || archive.skipped || (wanted && !wanted.has(archive.id))) continue;
      if (await this.store.resetForRetry('archive', archive.id)) {
        reset.push(archive.id);
      }
    }
    for (const item of this.store.all('media')) {
      if (item.phase !== 'failed' || (wanted && !wanted.has(item.id))) continue;
      const archive = this.store.get('archive', item.archiveId);
      if (!archive || archive.phase === 'cleaned' || !(await fs.pathExists(item.path))) {
        log.warn('Cannot retry %s: its extracted file is gone', item.relativePath);
        continue;
      }
      if (archive.phase === 'processed') {
        await this.store.transition('archive', archive.id, 'processed', 'extracted');
      }
      if (await this.store.resetForRetry('media', item.id)) {
        reset.push(item.id);
      }
    }
    log.info('Reset %d failed units for retry', reset.length);
    return reset;
  }

  /** Deletes the local copy of a corrupted archive and queues it for a fresh download. */
  async reacquire(archiveId: string): Promise<boolean> {
    const archive = this.store.get('archive', archiveId);
    if (archive?.phase !== 'corrupted') {
      return false;
    }
    await this.deleteTracked([archive.localPath, archive.extractDir]);
    const result = await this.store.transition('archive', archiveId, 'corrupted', 'discovered', {
      localPath: undefined,
      extractDir: undefined,
      fingerprint: undefined,
      retry: undefined
    });
    if (result.ok) {
      log.info('Archive %s will be downloaded again', archive.name);
    }
    return result.ok;
  }

  /** Gives up on a corrupted archive. */
  async skip(archiveId: string): Promise<boolean> {
    const archive = this.store.get('archive', archiveId);
    if (archive?.phase !== 'corrupted') {
      return false;
    }
    const result = await this.store.transition('archive', archiveId, 'corrupted', 'failed', {
      skipped: true,
      failedFrom: 'corrupted'
    });
    return result.ok;
  }

  async createDiagnosticsBundle(configPath?: string): Promise<string> {
    const { reportDir, logDir, stateDir } = this.deps.paths;
    return this.diagnosticsService.createBundle({
      destinationDir: reportDir,
      logsDir: logDir,
      stateDir,
      reportPath: this.lastReportPath,
      configPath
    });
  }

  private async recoverInFlight(): Promise<void> {
    let recovered = 0;
    for (const archive of this.store.all('archive')) {
      const to = ARCHIVE_RECOVERY[archive.phase];
      if (to && (await this.store.recover('archive', archive.id, archive.phase, to))) {
        recovered += 1;
      }
    }
    for (const item of this.store.all('media')) {
      const to = MEDIA_RECOVERY[item.phase];
      if (to && (await this.store.recover('media', item.id, item.phase, to))) {
        recovered += 1;
      }
    }
    if (recovered > 0) {
      log.warn('Recovered %d units interrupted by an unclean shutdown', recovered);
    }
  }

  private async discover(): Promise<void> {
    for (let attemptNo = 1; ; attemptNo += 1) {
      try {
        const remote = await this.deps.source.listAvailable();
        let added = 0;
        for (const entry of remote) {
          const known = this.store.get('archive', entry.id);
          if (known) {
            // a replaced source file is picked up as long as the download has not started
            if (known.phase === 'discovered' && known.size !== entry.size) {
              await this.store.transition('archive', entry.id, 'discovered', 'discovered', { size: entry.size });
            }
            continue;
          }
          const now = new Date().toISOString();
          await this.store.upsert('archive', {
            id: entry.id,
            name: entry.name,
            size: entry.size,
            phase: 'discovered',
            attempts: 0,
            discoveredAt: now,
            updatedAt: now
          });
          added += 1;
        }
        log.info('Discovered %d new archives (%d listed)', added, remote.length);
        return;
      } catch (error) {
        const decision = this.classifier.decide(this.classifier.classify(error, { phase: 'discover' }), attemptNo);
        if (decision.action !== 'retry') {
          log.error('Listing archives failed, continuing with known archives: %s', errorMessage(error));
          return;
        }
        log.warn('Listing archives failed (attempt %d): %s', attemptNo, errorMessage(error));
        if (!(await sleep(decision.delayMs, this.control.signal))) {
          return;
        }
      }
    }
  }

  private async seedAlbums(): Promise<void> {
    if (!this.deps.options.metadata.preserveAlbums || !this.deps.uploader.listAlbums) {
      return;
    }
    try {
      await this.resolver.seedExisting(await this.deps.uploader.listAlbums());
    } catch (error) {
      log.warn('Unable to list existing albums: %s', errorMessage(error));
    }
  }

  private async driveArchive(id: string, progress: ProgressCallback): Promise<void> {
    this.driving.add(id);
    try {
      for (;;) {
        if (this.control.stopped) return;
        const archive = this.store.get('archive', id);
        if (!archive) return;
        let proceed: boolean;
        switch (archive.phase) {
          case 'discovered':
            proceed = await this.download(archive, progress);
            break;
          case 'downloaded':
            proceed = await this.extract(archive, progress);
            break;
          case 'extracted':
            proceed = await this.processItems(archive, progress);
            break;
          case 'processed':
            await this.cleanupArchive(archive, progress);
            return;
          default:
            return;
        }
        if (!proceed) return;
      }
    } finally {
      this.driving.delete(id);
    }
  }

  private async download(archive: ArchiveUnit, progress: ProgressCallback): Promise<boolean> {
    if (!(await this.waitForRetryWindow(archive.retry))) return false;
    if (this.governor.exceedsCeiling(archive.size)) {
      return this.failArchiveOversized(archive, 'discovered', archive.size);
    }
    const reservation = await this.acquire({
      unitId: archive.id,
      archiveId: archive.id,
      bytes: this.downloadReservation(archive.size),
      startsArchive: true
    });
    if (!reservation) return false;

    const outcome = await this.runInPool(this.pools.download, async (): Promise<Outcome<DownloadOutput>> => {
      const claimed = await this.store.transition('archive', archive.id, 'discovered', 'downloading', {
        attempts: archive.attempts + 1
      });
      if (!claimed.ok) return { status: 'skipped' };
      progress({ type: 'archive', archive: claimed.record, message: 'Downloading' });
      return this.measure('download', () => this.downloadWorker.process(claimed.record), (output) => output.size);
    });

    if (outcome.status !== 'done') {
      reservation.release();
      return outcome.status === 'failed' ? this.handleArchiveFailure(archive.id, 'downloading', outcome.error, progress) : false;
    }
    reservation.commit(outcome.value.size);
    const result = await this.store.transition('archive', archive.id, 'downloading', 'downloaded', {
      localPath: outcome.value.localPath,
      fingerprint: outcome.value.fingerprint,
      retry: undefined,
      lastError: undefined
    });
    if (result.ok) {
      progress({ type: 'archive', archive: result.record, message: 'Downloaded' });
    }
    return result.ok;
  }

  private async extract(archive: ArchiveUnit, progress: ProgressCallback): Promise<boolean> {
    if (!(await this.waitForRetryWindow(archive.retry))) return false;
    const inspection = await attempt(() => this.extractWorker.inspect(archive));
    if (inspection.status !== 'done') {
      return inspection.status === 'failed' ? this.handleArchiveFailure(archive.id, 'downloaded', inspection.error, progress) : false;
    }
    const estimate = inspection.value.uncompressedBytes;
    if (this.governor.exceedsCeiling(estimate)) {
      return this.failArchiveOversized(archive, 'downloaded', estimate);
    }
    const reservation = await this.acquire({ unitId: archive.id, archiveId: archive.id, bytes: estimate });
    if (!reservation) return false;

    const outcome = await this.runInPool(this.pools.extract, async (): Promise<Outcome<ExtractOutput>> => {
      const claimed = await this.store.transition('archive', archive.id, 'downloaded', 'extracting', {
        attempts: archive.attempts + 1
      });
      if (!claimed.ok) return { status: 'skipped' };
      progress({ type: 'archive', archive: claimed.record, message: 'Extracting' });
      return this.measure('extract', () => this.extractWorker.process(claimed.record), (output) => totalSize(output.entries));
    });

    if (outcome.status !== 'done') {
      reservation.release();
      return outcome.status === 'failed' ? this.handleArchiveFailure(archive.id, 'extracting', outcome.error, progress) : false;
    }
    const { extractDir, entries } = outcome.value;
    reservation.commit(totalSize(entries));
    const itemCount = await this.registerItems(archive.id, entries);
    const result = await this.store.transition('archive', archive.id, 'extracting', 'extracted', {
      extractDir,
      itemCount,
      retry: undefined,
      lastError: undefined
    });
    if (result.ok) {
      progress({ type: 'archive', archive: result.record, message: `Extracted ${itemCount} media items` });
    }
    return result.ok;
  }

  /**
   * Records the media items of a freshly extracted archive. An item seen
   * before keeps its state when its bytes are unchanged; a failed item whose
   * bytes changed starts over; an uploaded item is never touched.
   */
  private async registerItems(archiveId: string, entries: ExtractedEntry[]): Promise<number> {
    const siblings = new Map<string, Set<string>>();
    for (const entry of entries) {
      const dir = path.dirname(entry.absolutePath);
      const names = siblings.get(dir) ?? new Set<string>();
      names.add(path.basename(entry.absolutePath));
      siblings.set(dir, names);
    }

    let count = 0;
    for (const entry of entries) {
      if (isSidecarFile(entry.relativePath)) continue;
      // exports sometimes drop the extension; fall back to the file signature
      if (!isMediaFile(entry.relativePath) && !isMediaSignature(await detectMagicType(entry.absolutePath))) continue;
      count += 1;
      const id = mediaItemId(archiveId, entry.relativePath);
      const fingerprint = await streamHash(entry.absolutePath);
      const sidecarPath = locateSidecar(entry.absolutePath, siblings.get(path.dirname(entry.absolutePath)) ?? new Set());
      const existing = this.store.get('media', id);
      const now = new Date().toISOString();

      if (!existing) {
        await this.store.upsert('media', {
          id,
          archiveId,
          relativePath: entry.relativePath,
          path: entry.absolutePath,
          fingerprint,
          size: entry.size,
          sidecarPath,
          albums: [],
          phase: 'extracted',
          attempts: 0,
          updatedAt: now
        });
      } else if (existing.phase === 'uploaded' || existing.fingerprint === fingerprint) {
        continue;
      } else if (existing.phase === 'failed') {
        log.info('%s changed since it failed; starting it over', entry.relativePath);
        await this.store.upsert('media', {
          ...existing,
          path: entry.absolutePath,
          fingerprint,
          size: entry.size,
          sidecarPath,
          metadata: undefined,
          albums: [],
          phase: 'extracted',
          retry: undefined,
          failedFrom: undefined,
          lastError: undefined,
          updatedAt: now
        });
      } else {
        log.warn('%s changed while in %s; keeping its progress', entry.relativePath, existing.phase);
        await this.store.transition('media', id, existing.phase, existing.phase, { fingerprint, size: entry.size });
      }
    }
    return count;
  }

  private async processItems(archive: ArchiveUnit, progress: ProgressCallback): Promise<boolean> {
    const pending = this.store.mediaForArchive(archive.id).filter((item) => !isMediaTerminal(item.phase));
    await Promise.all(pending.map((item) => this.driveItem(item.id, progress)));
    if (this.control.stopped) return false;
    if (this.store.mediaForArchive(archive.id).some((item) => !isMediaTerminal(item.phase))) {
      return false;
    }
    const result = await this.store.transition('archive', archive.id, 'extracted', 'processed');
    if (result.ok) {
      progress({ type: 'archive', archive: result.record, message: 'Processed' });
    }
    return result.ok;
  }

  private async driveItem(id: string, progress: ProgressCallback): Promise<void> {
    for (;;) {
      if (this.control.stopped) return;
      const item = this.store.get('media', id);
      if (!item) return;
      let proceed: boolean;
      switch (item.phase) {
        case 'extracted':
          proceed = await this.mergeMetadata(item, progress);
          break;
        case 'metadata-merged':
          proceed = await this.resolveAlbums(item, progress);
          break;
        case 'album-resolved':
          proceed = await this.upload(item, progress);
          break;
        default:
          return;
      }
      if (!proceed) return;
    }
  }

  private async mergeMetadata(item: MediaItem, progress: ProgressCallback): Promise<boolean> {
    if (!(await this.waitForRetryWindow(item.retry))) return false;
    let reservation: Reservation | undefined;
    if (this.deps.tagger) {
      // exiftool rewrites the file beside itself before replacing it
      if (this.governor.exceedsCeiling(item.size)) {
        return this.failItem(item.id, 'extracted', new PermanentError(`${item.relativePath} is larger than the disk budget`));
      }
      reservation = await this.acquire({ unitId: item.id, archiveId: item.archiveId, bytes: item.size });
      if (!reservation) return false;
    }

    const outcome = await this.runInPool(this.pools.metadata, async (): Promise<Outcome<MediaMetadata>> => {
      const current = this.store.get('media', item.id);
      if (current?.phase !== 'extracted') return { status: 'skipped' };
      return this.measure('metadata', () => this.metadataWorker.process(current), () => current.size);
    });
    reservation?.release();

    if (outcome.status !== 'done') {
      return outcome.status === 'failed' ? this.handleItemFailure(item.id, 'extracted', outcome.error, progress) : false;
    }
    const result = await this.store.transition('media', item.id, 'extracted', 'metadata-merged', {
      metadata: outcome.value,
      attempts: item.attempts + 1,
      retry: undefined,
      lastError: undefined
    });
    if (result.ok) {
      progress({ type: 'media', item: result.record, message: 'Metadata merged' });
    }
    return result.ok;
  }

  private async resolveAlbums(item: MediaItem, progress: ProgressCallback): Promise<boolean> {
    const albums = this.deps.options.metadata.preserveAlbums ? (await this.resolver.resolve(item)).albums : [];
    const result = await this.store.transition('media', item.id, 'metadata-merged', 'album-resolved', { albums });
    if (result.ok) {
      progress({ type: 'media', item: result.record, message: albums.length ? `Albums: ${albums.join(', ')}` : 'No album' });
    }
    return result.ok;
  }

  private async upload(item: MediaItem, progress: ProgressCallback): Promise<boolean> {
    if (!(await this.waitForRetryWindow(item.retry))) return false;
    const outcome = await this.runInPool(this.pools.upload, async (): Promise<Outcome<string>> => {
      const claimed = await this.store.transition('media', item.id, 'album-resolved', 'uploading', {
        attempts: item.attempts + 1
      });
      if (!claimed.ok) return { status: 'skipped' };
      return this.measure('upload', () => this.uploadWorker.process(claimed.record), () => claimed.record.size);
    });

    if (outcome.status !== 'done') {
      return outcome.status === 'failed' ? this.handleItemFailure(item.id, 'uploading', outcome.error, progress) : false;
    }
    const result = await this.store.transition('media', item.id, 'uploading', 'uploaded', {
      remoteId: outcome.value,
      retry: undefined,
      lastError: undefined
    });
    if (result.ok) {
      this.uploadedThisRun += 1;
      progress({ type: 'media', item: result.record, message: 'Uploaded' });
    }
    return result.ok;
  }

  private async runInPool<T>(pool: WorkerPool, task: () => Promise<Outcome<T>>): Promise<Outcome<T>> {
    const result = await pool.submit(task);
    if (!result) {
      return { status: 'skipped' };
    }
    if (!result.ok) {
      // failures of the unit itself come back as outcomes; anything thrown here is infrastructure
      throw result.error;
    }
    return result.value;
  }

  private async measure<T>(stage: StageName, work: () => Promise<T>, bytesOf: (value: T) => number): Promise<Outcome<T>> {
    const startedAt = this.metrics.now();
    const outcome = await attempt(work);
    this.metrics.record(stage, {
      ok: outcome.status === 'done',
      startedAt,
      bytes: outcome.status === 'done' ? bytesOf(outcome.value) : 0
    });
    return outcome;
  }

  /** A download also needs room to extract what it fetches; the extra is handed back on commit. */
  private downloadReservation(size: number): number {
    const ceiling = this.governor.ceiling;
    return ceiling === null ? size * 2 : Math.min(size * 2, ceiling);
  }

  /**
   * Reserves disk for a unit, waiting while the budget is exhausted. New
   * downloads wait while units of archives under way are waiting, so zips
   * cannot fill the budget ahead of their own extraction. Returns undefined
   * when stopped, or when nothing else can free space and the unit is
   * deferred to a later run.
   */
  private async acquire(request: SpaceRequest): Promise<Reservation | undefined> {
    const { unitId, archiveId, bytes, startsArchive = false } = request;
    let forcedRefresh = false;
    this.trackWaiting(archiveId, startsArchive, 1);
    try {
      for (;;) {
        if (this.control.stopped) return undefined;
        if (!(startsArchive && this.resumableWaiters > 0)) {
          const admission = await this.governor.admit(bytes);
          if (admission.status === 'admitted') {
            this.deferred.delete(unitId);
            return admission.reservation;
          }
        }
        if (this.governor.usageRatio >= this.deps.options.disk.cleanupThreshold && (await this.reclaimSpace()) > 0) {
          continue;
        }
        if (await this.governor.waitForChange(this.deps.options.disk.pollIntervalMs, this.control.signal)) {
          continue;
        }
        if (this.control.stopped) return undefined;
        if (this.otherWorkUnderWay(archiveId)) continue;
        if (startsArchive && this.resumableWaiters > 0) continue;
        if ((await this.reclaimSpace()) > 0) continue;
        if (!forcedRefresh) {
          forcedRefresh = true;
          await this.governor.refresh(true);
          continue;
        }
        this.deferred.add(unitId);
        log.warn('Deferring %s: needs %d bytes, %d available', unitId, bytes, this.governor.availableBytes);
        return undefined;
      }
    } finally {
      this.trackWaiting(archiveId, startsArchive, -1);
    }
  }

  private trackWaiting(archiveId: string, startsArchive: boolean, delta: 1 | -1): void {
    const count = (this.waitingForSpace.get(archiveId) ?? 0) + delta;
    if (count > 0) {
      this.waitingForSpace.set(archiveId, count);
    } else {
      this.waitingForSpace.delete(archiveId);
    }
    if (!startsArchive) {
      this.resumableWaiters += delta;
    }
  }

  /** Pool work, or another archive's drive that is not itself waiting for space. */
  private otherWorkUnderWay(archiveId: string): boolean {
    if (this.inFlight() > 0) return true;
    return [...this.driving].some((id) => id !== archiveId && !this.waitingForSpace.has(id));
  }

  private inFlight(): number {
    return this.pools.download.load + this.pools.extract.load + this.pools.metadata.load + this.pools.upload.load;
  }

  /** Deletes the extracted files of uploaded items; returns the bytes freed. */
  private async reclaimSpace(): Promise<number> {
    return this.deletions.add(async () => {
      let freed = 0;
      for (const item of this.store.all('media')) {
        if (item.phase !== 'uploaded' || item.fileReclaimed) continue;
        freed += await removeTracked(item.path);
        await this.store.transition('media', item.id, 'uploaded', 'uploaded', { fileReclaimed: true });
      }
      if (freed > 0) {
        this.governor.freed(freed);
        log.info('Reclaimed %d bytes from uploaded media', freed);
      }
      return freed;
    }, { throwOnTimeout: true });
  }

  private async deleteTracked(targets: Array<string | undefined>): Promise<number> {
    return this.deletions.add(async () => {
      let freed = 0;
      for (const target of targets) {
        if (target) {
          freed += await removeTracked(target);
        }
      }
      this.governor.freed(freed);
      return freed;
    }, { throwOnTimeout: true });
  }

  /**
   * Pauses the run for the operator when the share of failed items crosses
   * `pauseFailureRatio`, and lifts the pause once it no longer does.
   * Returns whether cleanup may run.
   */
  private async evaluateFailureRatio(progress: ProgressCallback): Promise<boolean> {
    const { uploaded, failed } = this.store.mediaCounts();
    const meta = this.store.meta;
    const decided = uploaded + failed;
    const exceeded =
      failed > meta.acknowledgedFailures && decided > 0 && failed / decided > this.deps.options.pauseFailureRatio;
    if (exceeded) {
      if (meta.mode !== 'paused-for-retries') {
        await this.store.setMeta({ mode: 'paused-for-retries', proceedGranted: false });
        log.warn('%d of %d items failed; holding cleanup until the operator proceeds', failed, decided);
        progress({ type: 'mode', mode: 'paused-for-retries' });
      }
      return false;
    }
    if (meta.mode === 'paused-for-retries') {
      await this.store.setMeta({ mode: 'running' });
      progress({ type: 'mode', mode: 'running' });
    }
    return true;
  }

  private async cleanupArchive(archive: ArchiveUnit, progress: ProgressCallback): Promise<boolean> {
    if (!this.deps.options.cleanupAfterUpload) return false;
    if (!(await this.evaluateFailureRatio(progress))) return false;
    if (this.store.mediaForArchive(archive.id).some((item) => !isMediaTerminal(item.phase))) return false;
    const startedAt = this.metrics.now();
    const freed = await this.deleteTracked([archive.localPath, archive.extractDir]);
    const result = await this.store.transition('archive', archive.id, 'processed', 'cleaned');
    this.metrics.record('cleanup', { ok: result.ok, startedAt, bytes: freed });
    if (result.ok) {
      log.info('Cleaned %s (%d bytes freed)', archive.name, freed);
      progress({ type: 'archive', archive: result.record, message: 'Cleaned' });
    }
    return result.ok;
  }

  private async cleanupProcessed(progress: ProgressCallback): Promise<number> {
    let cleaned = 0;
    for await (const archive of this.store.listByPhase('archive', 'processed')) {
      if (await this.cleanupArchive(archive, progress)) {
        cleaned += 1;
      }
    }
    return cleaned;
  }

  private async handleArchiveFailure(
    id: string,
    from: 'downloading' | 'downloaded' | 'extracting',
    error: unknown,
    progress: ProgressCallback
  ): Promise<boolean> {
    const archive = this.store.get('archive', id);
    if (!archive) return false;
    const kind = this.classifier.classify(error, { phase: from, unitId: id });
    const attemptNo = (archive.retry?.attempts ?? 0) + 1;
    const decision = this.classifier.decide(kind, attemptNo);
    const lastError: RecordedError = { kind, message: errorMessage(error), at: new Date().toISOString() };
    const back: ArchivePhase = ARCHIVE_RECOVERY[from] ?? from;
    progress({ type: 'error', unitKind: 'archive', id, kind, error: toError(error) });

    switch (decision.action) {
      case 'retry': {
        const retry: RetryRecord = { kind, attempts: attemptNo, nextAttemptAt: decision.nextAttemptAt };
        const result = await this.store.transition('archive', id, from, back, { retry, lastError });
        if (!result.ok) return false;
        this.reattempts += 1;
        log.warn('%s failed while %s (attempt %d), retrying in %dms: %s', archive.name, from, attemptNo, decision.delayMs, lastError.message);
        return sleep(decision.delayMs, this.control.signal);
      }
      case 'defer':
        await this.store.transition('archive', id, from, back, { lastError });
        this.deferred.add(id);
        log.warn('Deferring %s: %s', archive.name, lastError.message);
        return false;
      case 'await-operator': {
        const localPath = error instanceof CorruptInputError && error.sourcePath ? error.sourcePath : archive.localPath;
        await this.store.transition('archive', id, from, 'corrupted', { lastError, localPath, retry: undefined });
        log.error('%s is corrupt and needs re-acquiring or skipping: %s', archive.name, lastError.message);
        return false;
      }
      case 'fail':
        await this.store.transition('archive', id, from, 'failed', {
          lastError: exhausted(lastError),
          failedFrom: from,
          retry: undefined
        });
        log.error('%s failed while %s: %s', archive.name, from, lastError.message);
        return false;
    }
  }

  private async failArchiveOversized(
    archive: ArchiveUnit,
    from: 'discovered' | 'downloaded',
    bytes: number
  ): Promise<boolean> {
    const message = `${archive.name} needs ${bytes} bytes, more than the whole disk budget`;
    await this.store.transition('archive', archive.id, from, 'failed', {
      lastError: { kind: 'permanent', message, at: new Date().toISOString() },
      failedFrom: from
    });
    log.error(message);
    return false;
  }

  private async handleItemFailure(
    id: string,
    from: 'extracted' | 'uploading',
    error: unknown,
    progress: ProgressCallback
  ): Promise<boolean> {
    const item = this.store.get('media', id);
    if (!item) return false;
    const kind = this.classifier.classify(error, { phase: from, unitId: id });
    const attemptNo = (item.retry?.attempts ?? 0) + 1;
    const decision = this.classifier.decide(kind, attemptNo);
    const lastError: RecordedError = { kind, message: errorMessage(error), at: new Date().toISOString() };
    const back: MediaPhase = MEDIA_RECOVERY[from] ?? from;
    progress({ type: 'error', unitKind: 'media', id, kind, error: toError(error) });

    switch (decision.action) {
      case 'retry': {
        const retry: RetryRecord = { kind, attempts: attemptNo, nextAttemptAt: decision.nextAttemptAt };
        const result = await this.store.transition('media', id, from, back, { retry, lastError });
        if (!result.ok) return false;
        this.reattempts += 1;
        log.warn('%s failed while %s (attempt %d), retrying in %dms: %s', item.relativePath, from, attemptNo, decision.delayMs, lastError.message);
        return sleep(decision.delayMs, this.control.signal);
      }
      case 'defer':
        await this.store.transition('media', id, from, back, { lastError });
        this.deferred.add(id);
        log.warn('Deferring %s: %s', item.relativePath, lastError.message);
        return false;
      case 'await-operator':
      case 'fail':
        return this.failItem(id, from, error, exhausted(lastError));
    }
  }

  private async failItem(
    id: string,
    from: 'extracted' | 'uploading',
    error: unknown,
    lastError: RecordedError = { kind: 'permanent', message: errorMessage(error), at: new Date().toISOString() }
  ): Promise<boolean> {
    const result = await this.store.transition('media', id, from, 'failed', { lastError, failedFrom: from, retry: undefined });
    if (result.ok) {
      log.error('%s failed while %s: %s', result.record.relativePath, from, lastError.message);
    }
    return false;
  }

  private async waitForRetryWindow(retry: RetryRecord | undefined): Promise<boolean> {
    if (this.control.stopped) return false;
    if (!retry) return true;
    const waitMs = Date.parse(retry.nextAttemptAt) - Date.now();
    return waitMs > 0 ? sleep(waitMs, this.control.signal) : true;
  }

  private buildSummary(startedAt: Date, finishedAt: Date): RunSummary {
    const failures: FailureReport[] = [];
    for (const archive of this.store.all('archive')) {
      if (archive.phase !== 'failed' && archive.phase !== 'corrupted') continue;
      failures.push({
        unitKind: 'archive',
        id: archive.id,
        label: archive.name,
        archiveId: archive.id,
        failedFrom: archive.failedFrom,
        kind: archive.lastError?.kind ?? (archive.phase === 'corrupted' ? 'corrupt-input' : 'permanent'),
        message: archive.lastError?.message ?? (archive.skipped ? 'Skipped by operator' : ''),
        attempts: archive.attempts
      });
    }
    for (const item of this.store.all('media')) {
      if (item.phase !== 'failed') continue;
      failures.push({
        unitKind: 'media',
        id: item.id,
        label: item.relativePath,
        archiveId: item.archiveId,
        failedFrom: item.failedFrom,
        kind: item.lastError?.kind ?? 'permanent',
        message: item.lastError?.message ?? '',
        attempts: item.attempts
      });
    }

    return {
      runId: this.runId,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      mode: this.store.meta.mode,
      stopped: this.control.stopped,
      archives: this.store.archiveCounts(),
      media: this.store.mediaCounts(),
      uploadedThisRun: this.uploadedThisRun,
      reattempts: this.reattempts,
      albumsCreated: this.resolver.createdIn(this.runId).length,
      failures,
      deferred: [...this.deferred],
      stages: this.metrics.summarize(),
      reportPath: ''
    };
  }
}
