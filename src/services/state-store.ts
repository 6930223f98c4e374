import fs from 'fs-extra';
import path from 'node:path';
import PQueue from 'p-queue';
import type { z } from 'zod';
import { InvalidTransitionError, StateCorruptionError } from '../errors.js';
import { archiveRetryPhase, canTransition, mediaRetryPhase, tallyArchives, tallyMedia } from '../pipeline/lifecycle.js';
import { appendDurable, writeFileAtomic } from '../utils/files.js';
import { canonicalAlbumKey, normalizeDisplayName } from '../utils/naming.js';
import log from '../logger.js';
import type {
  Album,
  ArchivePhase,
  ArchiveUnit,
  MediaItem,
  MediaPhase,
  PhaseByKind,
  RunMeta,
  UnitKind,
  UnitRecordByKind
} from '../types/migration.js';
import {
  albumSchema,
  archiveUnitSchema,
  journalEntrySchema,
  mediaItemSchema,
  runMetaSchema,
  snapshotSchema,
  STATE_VERSION
} from './state-schema.js';
import type { JournalEntry } from './state-schema.js';

export type UnitPatch<K extends UnitKind> = Partial<Omit<UnitRecordByKind[K], 'id' | 'phase'>>;

export type TransitionResult<T> =
  | { ok: true; record: T }
  | { ok: false; reason: 'conflict' | 'not-found'; current?: T };

export interface StateStoreOptions {
  /** Journal entries accumulated before they are folded into the snapshot. */
  compactEvery?: number;
}

const UNIT_SCHEMAS: { [K in UnitKind]: z.ZodType<UnitRecordByKind[K], z.ZodTypeDef, unknown> } = {
  archive: archiveUnitSchema,
  media: mediaItemSchema
};

interface JournalWrite {
  op: JournalEntry['op'];
  record: unknown;
}

const now = (): string => new Date().toISOString();

/**
 * Durable record of every archive, media item and album.
 *
 * Mutations run one at a time through a single-writer queue. Each one is
 * appended to the journal and synced before the in-memory copy changes, so a
 * reader never sees a state that a crash could take back. The journal is
 * periodically folded into `state.json`.
 */
export class StateStore {
  readonly snapshotPath: string;
  readonly journalPath: string;
  private readonly units: { [K in UnitKind]: Map<string, UnitRecordByKind[K]> } = {
    archive: new Map(),
    media: new Map()
  };
  private readonly albums = new Map<string, Album>();
  private runMeta: RunMeta = { mode: 'running', proceedGranted: false, acknowledgedFailures: 0 };
  private readonly writes = new PQueue({ concurrency: 1 });
  private readonly compactEvery: number;
  private journalEntries = 0;

  constructor(
    readonly stateDir: string,
    options: StateStoreOptions = {}
  ) {
    this.snapshotPath = path.join(stateDir, 'state.json');
    this.journalPath = path.join(stateDir, 'state.journal');
    this.compactEvery = options.compactEvery ?? 500;
  }

  static async open(stateDir: string, options?: StateStoreOptions): Promise<StateStore> {
    const store = new StateStore(stateDir, options);
    await store.load();
    return store;
  }

  async load(): Promise<void> {
    await fs.ensureDir(this.stateDir);
    await this.loadSnapshot();
    await this.replayJournal();
    log.info(
      'Loaded state: %d archives, %d media items, %d albums',
      this.units.archive.size,
      this.units.media.size,
      this.albums.size
    );
  }

  get<K extends UnitKind>(kind: K, id: string): UnitRecordByKind[K] | undefined {
    return this.units[kind].get(id);
  }

  all<K extends UnitKind>(kind: K): UnitRecordByKind[K][] {
    return [...this.units[kind].values()];
  }

  /**
   * Lazily yields the records currently in `phase`. Ids are captured when the
   * iteration starts; a record that moved on before it is reached is skipped.
   */
  async *listByPhase<K extends UnitKind>(kind: K, phase: PhaseByKind[K]): AsyncGenerator<UnitRecordByKind[K]> {
    const ids = [...this.units[kind].keys()];
    for (const id of ids) {
      const record = this.units[kind].get(id);
      if (record && record.phase === phase) {
        yield record;
      }
    }
  }

  archiveCounts(): Record<ArchivePhase, number> {
    return tallyArchives(this.units.archive.values());
  }

  mediaCounts(): Record<MediaPhase, number> {
    return tallyMedia(this.units.media.values());
  }

  mediaForArchive(archiveId: string): MediaItem[] {
    return this.all('media').filter((item) => item.archiveId === archiveId);
  }

  async upsert<K extends UnitKind>(kind: K, record: UnitRecordByKind[K]): Promise<UnitRecordByKind[K]> {
    const validated = this.validate(kind, record, this.journalPath);
    return this.serialize(async () => {
      await this.commit({ op: kind, record: validated }, () => this.units[kind].set(validated.id, validated));
      return validated;
    });
  }

  /**
   * Compare-and-swap on the phase. Fails with `conflict` when another writer
   * already moved the record, which is what keeps two workers from processing
   * the same unit. `from === to` applies `patch` under the same guard.
   */
  async transition<K extends UnitKind>(
    kind: K,
    id: string,
    from: PhaseByKind[K],
    to: PhaseByKind[K],
    patch: UnitPatch<K> = {}
  ): Promise<TransitionResult<UnitRecordByKind[K]>> {
    if (from !== to && !canTransition(kind, from, to)) {
      throw new InvalidTransitionError(id, from, to);
    }
    return this.serialize<TransitionResult<UnitRecordByKind[K]>>(async () => {
      const current = this.units[kind].get(id);
      if (!current) {
        return { ok: false, reason: 'not-found' };
      }
      if (current.phase !== from) {
        return { ok: false, reason: 'conflict', current };
      }
      const next: UnitRecordByKind[K] = { ...current, ...patch, phase: to, updatedAt: now() };
      await this.commit({ op: kind, record: next }, () => this.units[kind].set(id, next));
      return { ok: true, record: next };
    });
  }

  /**
   * Explicit retry: a failed unit resumes from the phase that preceded the
   * failure, a corrupted archive starts over from `discovered`. The retry
   * record is cleared so the attempt budget starts fresh.
   */
  async resetForRetry(kind: UnitKind, id: string): Promise<boolean> {
    if (kind === 'archive') {
      const next = await this.replace('archive', id, (current) => {
        if (current.phase !== 'failed' && current.phase !== 'corrupted') {
          return undefined;
        }
        const phase = current.phase === 'corrupted' ? 'discovered' : archiveRetryPhase(current.failedFrom);
        return { ...current, phase, retry: undefined, skipped: undefined, failedFrom: undefined, updatedAt: now() };
      });
      return next !== undefined;
    }
    const next = await this.replace('media', id, (current) => {
      if (current.phase !== 'failed') {
        return undefined;
      }
      return {
        ...current,
        phase: mediaRetryPhase(current.failedFrom),
        retry: undefined,
        failedFrom: undefined,
        updatedAt: now()
      };
    });
    return next !== undefined;
  }

  /** Applies `mutate` to the current record; returning undefined leaves it unchanged. */
  async update<K extends UnitKind>(
    kind: K,
    id: string,
    mutate: (current: UnitRecordByKind[K]) => UnitRecordByKind[K] | undefined
  ): Promise<UnitRecordByKind[K] | undefined> {
    return this.replace(kind, id, mutate);
  }

  /** Crash recovery: returns an in-flight record to its last durable phase. */
  async recover<K extends UnitKind>(kind: K, id: string, from: PhaseByKind[K], to: PhaseByKind[K]): Promise<boolean> {
    const result = await this.transition(kind, id, from, to);
    return result.ok;
  }

  getAlbum(key: string): Album | undefined {
    return this.albums.get(key);
  }

  allAlbums(): Album[] {
    return [...this.albums.values()];
  }

  /**
   * Atomic get-or-create of the album named `displayName` (matched by its
   * canonical key) plus an idempotent member add. The display name only
   * applies when the album is created.
   */
  async attachAlbumMember(
    displayName: string,
    mediaId: string,
    runId?: string
  ): Promise<{ album: Album; created: boolean }> {
    const key = canonicalAlbumKey(displayName);
    return this.serialize(async () => {
      const existing = this.albums.get(key);
      if (existing?.members.includes(mediaId)) {
        return { album: existing, created: false };
      }
      const album: Album = existing
        ? { ...existing, members: [...existing.members, mediaId], updatedAt: now() }
        : {
            key,
            displayName: normalizeDisplayName(displayName),
            members: [mediaId],
            origin: 'created',
            createdInRun: runId,
            updatedAt: now()
          };
      await this.commit({ op: 'album', record: album }, () => this.albums.set(key, album));
      return { album, created: !existing };
    });
  }

  async seedAlbum(displayName: string): Promise<boolean> {
    const key = canonicalAlbumKey(displayName);
    return this.serialize(async () => {
      if (this.albums.has(key)) {
        return false;
      }
      const album: Album = {
        key,
        displayName: normalizeDisplayName(displayName),
        members: [],
        origin: 'pre-existing',
        updatedAt: now()
      };
      await this.commit({ op: 'album', record: album }, () => this.albums.set(key, album));
      return true;
    });
  }

  get meta(): RunMeta {
    return this.runMeta;
  }

  async setMeta(patch: Partial<RunMeta>): Promise<RunMeta> {
    return this.serialize(async () => {
      const next: RunMeta = { ...this.runMeta, ...patch };
      await this.commit({ op: 'meta', record: next }, () => {
        this.runMeta = next;
      });
      return next;
    });
  }

  async compact(): Promise<void> {
    await this.serialize(() => this.writeSnapshot());
  }

  async close(): Promise<void> {
    await this.writes.onIdle();
    if (this.journalEntries > 0) {
      await this.compact();
    }
  }

  private async replace<K extends UnitKind>(
    kind: K,
    id: string,
    mutate: (current: UnitRecordByKind[K]) => UnitRecordByKind[K] | undefined
  ): Promise<UnitRecordByKind[K] | undefined> {
    return this.serialize(async () => {
      const current = this.units[kind].get(id);
      if (!current) {
        return undefined;
      }
      const next = mutate(current);
      if (!next) {
        return undefined;
      }
      await this.commit({ op: kind, record: next }, () => this.units[kind].set(id, next));
      return next;
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    return this.writes.add(task, { throwOnTimeout: true });
  }

  private async commit(entry: JournalWrite, apply: () => void): Promise<void> {
    await appendDurable(this.journalPath, `${JSON.stringify(entry)}\n`);
    apply();
    this.journalEntries += 1;
    if (this.journalEntries >= this.compactEvery) {
      await this.writeSnapshot();
    }
  }

  private async writeSnapshot(): Promise<void> {
    const snapshot = {
      version: STATE_VERSION,
      savedAt: now(),
      archives: Object.fromEntries(this.units.archive),
      media: Object.fromEntries(this.units.media),
      albums: Object.fromEntries(this.albums),
      meta: this.runMeta
    };
    await writeFileAtomic(this.snapshotPath, JSON.stringify(snapshot));
    // a crash before the truncate only replays full records onto the new snapshot
    await fs.writeFile(this.journalPath, '');
    this.journalEntries = 0;
    log.debug('Compacted state journal into %s', this.snapshotPath);
  }

  private async loadSnapshot(): Promise<void> {
    if (!(await fs.pathExists(this.snapshotPath))) {
      return;
    }
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(this.snapshotPath, 'utf8'));
    } catch (error) {
      throw new StateCorruptionError('State snapshot is not valid JSON', this.snapshotPath, { cause: error });
    }
    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateCorruptionError('State snapshot has an unexpected shape', this.snapshotPath, {
        cause: parsed.error
      });
    }
    const { archives, media, albums, meta } = parsed.data;
    for (const record of Object.values(archives)) {
      this.apply({ op: 'archive', record }, this.snapshotPath);
    }
    for (const record of Object.values(media)) {
      this.apply({ op: 'media', record }, this.snapshotPath);
    }
    for (const record of Object.values(albums)) {
      this.apply({ op: 'album', record }, this.snapshotPath);
    }
    if (meta !== undefined) {
      this.apply({ op: 'meta', record: meta }, this.snapshotPath);
    }
  }

  private async replayJournal(): Promise<void> {
    if (!(await fs.pathExists(this.journalPath))) {
      return;
    }
    const content = await fs.readFile(this.journalPath, 'utf8');
    const lines = content.split('\n');
    // the element after the final newline is empty unless the last append was torn
    const torn = lines.pop() ?? '';
    lines.forEach((line, index) => {
      if (!line.trim()) {
        return;
      }
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        throw new StateCorruptionError(`Journal line ${index + 1} is not valid JSON`, this.journalPath, {
          cause: error
        });
      }
      const entry = journalEntrySchema.safeParse(raw);
      if (!entry.success) {
        throw new StateCorruptionError(`Journal line ${index + 1} is not a state entry`, this.journalPath, {
          cause: entry.error
        });
      }
      this.apply(entry.data, this.journalPath);
      this.journalEntries += 1;
    });
    if (torn) {
      log.warn('Dropping uncommitted partial journal entry (%d bytes) from %s', torn.length, this.journalPath);
      await fs.writeFile(this.journalPath, content.slice(0, content.length - torn.length));
    }
  }

  private apply(entry: JournalEntry, source: string): void {
    switch (entry.op) {
      case 'archive': {
        const record = this.validate('archive', entry.record, source);
        this.units.archive.set(record.id, record);
        return;
      }
      case 'media': {
        const record = this.validate('media', entry.record, source);
        this.units.media.set(record.id, record);
        return;
      }
      case 'album': {
        const parsed = albumSchema.safeParse(entry.record);
        if (!parsed.success) {
          throw new StateCorruptionError('Invalid album record', source, { cause: parsed.error });
        }
        this.albums.set(parsed.data.key, parsed.data);
        return;
      }
      case 'meta': {
        const parsed = runMetaSchema.safeParse(entry.record);
        if (!parsed.success) {
          throw new StateCorruptionError('Invalid run metadata', source, { cause: parsed.error });
        }
        this.runMeta = parsed.data;
        return;
      }
    }
  }

  private validate<K extends UnitKind>(kind: K, record: unknown, source: string): UnitRecordByKind[K] {
    const schema: z.ZodType<UnitRecordByKind[K], z.ZodTypeDef, unknown> = UNIT_SCHEMAS[kind];
    const parsed = schema.safeParse(record);
    if (!parsed.success) {
      throw new StateCorruptionError(`Invalid ${kind} record`, source, { cause: parsed.error });
    }
    return parsed.data;
  }
}
