import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StateStore } from '../services/state-store.js';
import { InvalidTransitionError, StateCorruptionError } from '../errors.js';
import type { ArchiveUnit, MediaItem } from '../types/migration.js';
import { makeTempDir } from './helpers.js';

const archive = (id: string, overrides: Partial<ArchiveUnit> = {}): ArchiveUnit => ({
  id,
  name: id,
  size: 100,
  phase: 'discovered',
  attempts: 0,
  discoveredAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
  ...overrides
});

const media = (id: string, overrides: Partial<MediaItem> = {}): MediaItem => ({
  id,
  archiveId: 'a.zip',
  relativePath: `Trip/${id}.jpg`,
  path: `/tmp/${id}.jpg`,
  fingerprint: 'abc',
  size: 10,
  albums: [],
  phase: 'extracted',
  attempts: 0,
  updatedAt: '2024-01-01T00:00:00.000Z',
  ...overrides
});

describe('StateStore', () => {
  let dir: string;
  let store: StateStore;

  beforeEach(async () => {
    dir = await makeTempDir();
    store = await StateStore.open(dir, { compactEvery: 1000 });
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  describe('transition', () => {
    it('should move a record when the expected phase matches', async () => {
      await store.upsert('archive', archive('a.zip'));
      const result = await store.transition('archive', 'a.zip', 'discovered', 'downloading');

      expect(result.ok).toBe(true);
      expect(store.get('archive', 'a.zip')?.phase).toBe('downloading');
    });

    it('should report a conflict when another writer moved the record first', async () => {
      await store.upsert('archive', archive('a.zip'));
      const [first, second] = await Promise.all([
        store.transition('archive', 'a.zip', 'discovered', 'downloading'),
        store.transition('archive', 'a.zip', 'discovered', 'downloading')
      ]);

      expect(first.ok).toBe(true);
      expect(second).toMatchObject({ ok: false, reason: 'conflict' });
    });

    it('should report not-found for an unknown id', async () => {
      const result = await store.transition('media', 'missing', 'extracted', 'metadata-merged');
      expect(result).toEqual({ ok: false, reason: 'not-found' });
    });

    it('should reject an edge the lifecycle does not allow', async () => {
      await store.upsert('archive', archive('a.zip'));
      await expect(store.transition('archive', 'a.zip', 'discovered', 'cleaned')).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
      expect(store.get('archive', 'a.zip')?.phase).toBe('discovered');
    });

    it('should apply a patch without a phase change when from equals to', async () => {
      await store.upsert('media', media('m1'));
      const result = await store.transition('media', 'm1', 'extracted', 'extracted', { attempts: 2 });

      expect(result.ok).toBe(true);
      expect(store.get('media', 'm1')?.attempts).toBe(2);
    });
  });

  describe('persistence', () => {
    it('should replay journal entries on reopen', async () => {
      await store.upsert('archive', archive('a.zip'));
      await store.transition('archive', 'a.zip', 'discovered', 'downloading');
      await store.upsert('media', media('m1'));

      const reopened = await StateStore.open(dir);

      expect(reopened.get('archive', 'a.zip')?.phase).toBe('downloading');
      expect(reopened.get('media', 'm1')?.relativePath).toBe('Trip/m1.jpg');
    });

    it('should load a compacted snapshot and empty the journal', async () => {
      await store.upsert('archive', archive('a.zip'));
      await store.setMeta({ runId: 'run-1' });
      await store.close();

      expect(await fs.readFile(path.join(dir, 'state.journal'), 'utf8')).toBe('');
      const reopened = await StateStore.open(dir);
      expect(reopened.get('archive', 'a.zip')?.id).toBe('a.zip');
      expect(reopened.meta.runId).toBe('run-1');
    });

    it('should compact automatically once the journal reaches the threshold', async () => {
      const small = await StateStore.open(dir, { compactEvery: 2 });
      await small.upsert('archive', archive('a.zip'));
      await small.upsert('archive', archive('b.zip'));

      expect(await fs.pathExists(path.join(dir, 'state.json'))).toBe(true);
      expect(await fs.readFile(path.join(dir, 'state.journal'), 'utf8')).toBe('');
    });

    it('should drop a torn final journal line', async () => {
      await store.upsert('archive', archive('a.zip'));
      await fs.appendFile(path.join(dir, 'state.journal'), '{"op":"archive","record":{"id":"b.z');

      const reopened = await StateStore.open(dir);

      expect(reopened.all('archive').map((record) => record.id)).toEqual(['a.zip']);
      const journal = await fs.readFile(path.join(dir, 'state.journal'), 'utf8');
      expect(journal.endsWith('\n')).toBe(true);
    });

    it('should refuse to load a journal with a corrupt line before the end', async () => {
      await fs.writeFile(
        path.join(dir, 'state.journal'),
        'not json\n{"op":"meta","record":{"mode":"running"}}\n'
      );
      await expect(StateStore.open(dir)).rejects.toBeInstanceOf(StateCorruptionError);
    });

    it('should refuse to load a snapshot that is not JSON', async () => {
      await fs.writeFile(path.join(dir, 'state.json'), '{');
      await expect(StateStore.open(dir)).rejects.toBeInstanceOf(StateCorruptionError);
    });
  });

  describe('queries', () => {
    it('should list records by phase and count them', async () => {
      await store.upsert('media', media('m1'));
      await store.upsert('media', media('m2', { phase: 'uploaded' }));
      await store.upsert('media', media('m3'));

      const extracted: string[] = [];
      for await (const item of store.listByPhase('media', 'extracted')) {
        extracted.push(item.id);
      }

      expect(extracted).toEqual(['m1', 'm3']);
      expect(store.mediaCounts()).toMatchObject({ extracted: 2, uploaded: 1, failed: 0 });
      expect(store.mediaForArchive('a.zip')).toHaveLength(3);
    });
  });

  describe('resetForRetry', () => {
    it('should resume a failed archive from the phase before the failure', async () => {
      await store.upsert(
        'archive',
        archive('a.zip', {
          phase: 'failed',
          failedFrom: 'extracting',
          retry: { kind: 'transient', attempts: 5, nextAttemptAt: '2024-01-01T00:00:00.000Z' }
        })
      );

      expect(await store.resetForRetry('archive', 'a.zip')).toBe(true);
      const record = store.get('archive', 'a.zip');
      expect(record?.phase).toBe('downloaded');
      expect(record?.retry).toBeUndefined();
      expect(record?.failedFrom).toBeUndefined();
    });

    it('should restart a corrupted archive from discovered', async () => {
      await store.upsert('archive', archive('a.zip', { phase: 'corrupted', skipped: true }));

      expect(await store.resetForRetry('archive', 'a.zip')).toBe(true);
      expect(store.get('archive', 'a.zip')).toMatchObject({ phase: 'discovered' });
      expect(store.get('archive', 'a.zip')?.skipped).toBeUndefined();
    });

    it('should resume a failed upload from album-resolved', async () => {
      await store.upsert('media', media('m1', { phase: 'failed', failedFrom: 'uploading' }));

      expect(await store.resetForRetry('media', 'm1')).toBe(true);
      expect(store.get('media', 'm1')?.phase).toBe('album-resolved');
    });

    it('should leave a record that has not failed untouched', async () => {
      await store.upsert('media', media('m1', { phase: 'uploaded' }));
      expect(await store.resetForRetry('media', 'm1')).toBe(false);
      expect(store.get('media', 'm1')?.phase).toBe('uploaded');
    });
  });

  describe('albums', () => {
    it('should create an album once and keep the first casing', async () => {
      const first = await store.attachAlbumMember('Family', 'm1', 'run-1');
      const second = await store.attachAlbumMember('  family ', 'm2', 'run-1');

      expect(first.created).toBe(true);
      expect(second.created).toBe(false);
      expect(second.album.displayName).toBe('Family');
      expect(second.album.members).toEqual(['m1', 'm2']);
      expect(store.allAlbums()).toHaveLength(1);
    });

    it('should not add a member twice', async () => {
      await store.attachAlbumMember('Family', 'm1');
      const again = await store.attachAlbumMember('FAMILY', 'm1');

      expect(again).toMatchObject({ created: false });
      expect(store.getAlbum('family')?.members).toEqual(['m1']);
    });

    it('should attach to a seeded album instead of creating one', async () => {
      expect(await store.seedAlbum('Holidays')).toBe(true);
      expect(await store.seedAlbum('holidays')).toBe(false);

      const result = await store.attachAlbumMember('HOLIDAYS', 'm1');

      expect(result.created).toBe(false);
      expect(result.album).toMatchObject({ displayName: 'Holidays', origin: 'pre-existing', members: ['m1'] });
    });

    it('should keep albums across a reopen', async () => {
      await store.attachAlbumMember('Family', 'm1', 'run-1');
      const reopened = await StateStore.open(dir);

      expect(reopened.getAlbum('family')).toMatchObject({ displayName: 'Family', createdInRun: 'run-1' });
    });
  });
});
