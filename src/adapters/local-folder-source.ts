import path from 'node:path';
import fs from 'fs-extra';
import { PermanentError } from '../errors.js';
import { tempPath } from '../utils/files.js';
import log from '../logger.js';
import type { ArchiveSource, RemoteArchive } from '../types/collaborators.js';

/**
 * Archive source backed by a directory of Takeout zips, e.g. a synced Drive
 * folder. Archive ids are paths relative to that directory.
 */
export class LocalFolderSource implements ArchiveSource {
  constructor(private readonly sourceDir: string) {}

  async listAvailable(): Promise<RemoteArchive[]> {
    if (!(await fs.pathExists(this.sourceDir))) {
      throw new PermanentError(`Archive source directory ${this.sourceDir} does not exist`);
    }
    const archives: RemoteArchive[] = [];
    await this.collect(this.sourceDir, archives);
    archives.sort((a, b) => a.id.localeCompare(b.id));
    log.info('Found %d archives in %s', archives.length, this.sourceDir);
    return archives;
  }

  async fetch(id: string, destinationDir: string): Promise<string> {
    const sourcePath = this.resolve(id);
    if (!(await fs.pathExists(sourcePath))) {
      throw new PermanentError(`Archive ${id} is no longer available in ${this.sourceDir}`);
    }
    await fs.ensureDir(destinationDir);
    const fileName = id.split('/').join('__');
    const target = path.join(destinationDir, fileName);
    const staging = tempPath(destinationDir, fileName);
    await fs.copy(sourcePath, staging, { overwrite: true });
    await fs.move(staging, target, { overwrite: true });
    return target;
  }

  private resolve(id: string): string {
    const resolved = path.resolve(this.sourceDir, id);
    const relative = path.relative(this.sourceDir, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new PermanentError(`Archive id ${id} points outside ${this.sourceDir}`);
    }
    return resolved;
  }

  private async collect(dir: string, archives: RemoteArchive[]): Promise<void> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await this.collect(fullPath, archives);
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.zip')) {
        const stats = await fs.stat(fullPath);
        archives.push({
          id: path.relative(this.sourceDir, fullPath).split(path.sep).join('/'),
          name: entry.name,
          size: stats.size
        });
      }
    }
  }
}
