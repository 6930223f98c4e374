import path from 'node:path';
import log from '../logger.js';
import { albumFromDirectory, canonicalAlbumKey, normalizeDisplayName } from '../utils/naming.js';
import type { Album, MediaItem, MediaMetadata } from '../types/migration.js';
import type { StateStore } from './state-store.js';

export interface AlbumResolution {
  /** Display names of every album the item belongs to, first observed casing. */
  albums: string[];
  created: Album[];
}

/**
 * Decides which albums a media item belongs to and records the membership.
 * Names that differ only by case or spacing land in one album, and the first
 * casing ever seen is the one that sticks, across runs.
 */
export class AlbumResolver {
  constructor(
    private readonly store: StateStore,
    private readonly runId?: string
  ) {}

  /** Album names a file implies, sidecar hints first, deduplicated by canonical key. */
  candidates(relativePath: string, metadata: MediaMetadata | undefined): string[] {
    const names = [...(metadata?.albumHints ?? [])];
    const fromDirectory = albumFromDirectory(path.dirname(relativePath));
    if (fromDirectory) {
      names.push(fromDirectory);
    }
    const seen = new Map<string, string>();
    for (const name of names) {
      const display = normalizeDisplayName(name);
      const key = canonicalAlbumKey(display);
      if (key && !seen.has(key)) {
        seen.set(key, display);
      }
    }
    return [...seen.values()];
  }

  async resolve(item: MediaItem, metadata: MediaMetadata | undefined = item.metadata): Promise<AlbumResolution> {
    const albums: string[] = [];
    const created: Album[] = [];
    for (const name of this.candidates(item.relativePath, metadata)) {
      const result = await this.store.attachAlbumMember(name, item.id, this.runId);
      if (result.created) {
        log.info('Created album "%s"', result.album.displayName);
        created.push(result.album);
      }
      albums.push(result.album.displayName);
    }
    return { albums, created };
  }

  /** Registers albums that already exist at the destination so they are matched, not recreated. */
  async seedExisting(names: string[]): Promise<number> {
    let added = 0;
    for (const name of names) {
      if (!canonicalAlbumKey(name)) {
        continue;
      }
      if (await this.store.seedAlbum(name)) {
        added += 1;
      }
    }
    if (added > 0) {
      log.info('Matched %d pre-existing albums', added);
    }
    return added;
  }

  membersOf(name: string): string[] {
    return this.store.getAlbum(canonicalAlbumKey(name))?.members ?? [];
  }

  /** Albums first created by the given run. */
  createdIn(runId: string): Album[] {
    return this.store.allAlbums().filter((album) => album.origin === 'created' && album.createdInRun === runId);
  }
}
