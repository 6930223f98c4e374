import path from 'node:path';
import fs from 'fs-extra';
import { streamHash, tempPath } from '../utils/files.js';
import { safeDirectoryName } from '../utils/naming.js';
import log from '../logger.js';
import type { MediaUploader } from '../types/collaborators.js';

export const UNSORTED_DIR = 'Unsorted';

/**
 * Upload target that files media into a local library directory, one
 * subdirectory per album. A file already present with identical content is
 * reused, so re-uploading after a crash does not duplicate it.
 */
export class LibraryUploader implements MediaUploader {
  constructor(private readonly libraryDir: string) {}

  async upload(mediaPath: string, albumNames: string[]): Promise<string> {
    const targets = albumNames.length > 0 ? albumNames.map(safeDirectoryName) : [UNSORTED_DIR];
    const hash = await streamHash(mediaPath);
    let primary: string | undefined;
    for (const albumDir of [...new Set(targets)]) {
      const stored = await this.place(mediaPath, path.join(this.libraryDir, albumDir), hash);
      primary ??= stored;
    }
    return path.relative(this.libraryDir, primary ?? mediaPath).split(path.sep).join('/');
  }

  async listAlbums(): Promise<string[]> {
    if (!(await fs.pathExists(this.libraryDir))) {
      return [];
    }
    const entries = await fs.readdir(this.libraryDir, { withFileTypes: true });
    return entries.filter((entry) => entry.isDirectory() && entry.name !== UNSORTED_DIR).map((entry) => entry.name);
  }

  private async place(mediaPath: string, dir: string, hash: string): Promise<string> {
    await fs.ensureDir(dir);
    const parsed = path.parse(mediaPath);
    for (let counter = 0; ; counter += 1) {
      const name = counter === 0 ? parsed.base : `${parsed.name} (${counter})${parsed.ext}`;
      const target = path.join(dir, name);
      if (!(await fs.pathExists(target))) {
        const staging = tempPath(dir, name);
        await fs.copy(mediaPath, staging, { overwrite: true, preserveTimestamps: true });
        await fs.move(staging, target);
        return target;
      }
      if ((await streamHash(target)) === hash) {
        log.debug('%s already in library as %s', parsed.base, target);
        return target;
      }
    }
  }
}
