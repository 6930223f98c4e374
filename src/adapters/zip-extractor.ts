import path from 'node:path';
import { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import fs from 'fs-extra';
import StreamZip from 'node-stream-zip';
import { CorruptInputError, MigrationError, errorMessage } from '../errors.js';
import log from '../logger.js';
import type { ArchiveExtractor, ArchiveInspection, ExtractedEntry } from '../types/collaborators.js';

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

type ZipEntry = StreamZip.ZipEntry;

const isSymlink = (entry: ZipEntry): boolean => ((entry.attr >>> 16) & S_IFMT) === S_IFLNK;

const isJunk = (name: string): boolean => {
  const parts = name.split('/');
  return parts.includes('__MACOSX') || path.posix.basename(name).startsWith('._');
};

/** Resolves `name` under `root`, or undefined when it would land outside it. */
export const safeEntryPath = (root: string, name: string): string | undefined => {
  if (path.posix.isAbsolute(name) || /^[a-zA-Z]:/.test(name) || name.includes('\0')) {
    return undefined;
  }
  const target = path.resolve(root, ...name.split(/[\\/]+/));
  const relative = path.relative(root, target);
  if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
    return undefined;
  }
  return target;
};

const drain = (): Writable =>
  new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    }
  });

/**
 * Zip extraction through node-stream-zip. Any read failure of the archive
 * itself surfaces as a CorruptInputError, and extraction writes into a
 * staging directory that only replaces the destination once every entry is
 * out, so a bad archive never leaves partial output behind.
 */
export class ZipExtractor implements ArchiveExtractor {
  async inspect(archivePath: string): Promise<ArchiveInspection> {
    return this.withZip(archivePath, async (zip) => {
      const entries = Object.values(await zip.entries());
      const files = entries.filter((entry) => entry.isFile);
      return {
        entryCount: files.length,
        uncompressedBytes: files.reduce((sum, entry) => sum + entry.size, 0)
      };
    });
  }

  async verify(archivePath: string): Promise<void> {
    await this.withZip(archivePath, async (zip) => {
      for (const entry of Object.values(await zip.entries())) {
        if (!entry.isFile) continue;
        // streaming through node-stream-zip checks both size and CRC
        const stream = await zip.stream(entry);
        await pipeline(stream, drain());
      }
    });
  }

  async extract(archivePath: string, destinationDir: string): Promise<ExtractedEntry[]> {
    const staging = `${destinationDir}.partial`;
    await fs.remove(staging);
    await fs.ensureDir(staging);
    try {
      const relativePaths = await this.withZip(archivePath, async (zip) => {
        const written: string[] = [];
        for (const entry of Object.values(await zip.entries())) {
          if (!entry.isFile || isJunk(entry.name)) continue;
          if (isSymlink(entry)) {
            log.warn('Skipping symlink %s in %s', entry.name, archivePath);
            continue;
          }
          const target = safeEntryPath(staging, entry.name);
          if (!target) {
            log.warn('Rejecting entry %s escaping the extraction directory of %s', entry.name, archivePath);
            continue;
          }
          await fs.ensureDir(path.dirname(target));
          await zip.extract(entry, target);
          written.push(path.relative(staging, target));
        }
        return written;
      });
      await fs.remove(destinationDir);
      await fs.move(staging, destinationDir);
      const extracted: ExtractedEntry[] = [];
      for (const relativePath of relativePaths) {
        const absolutePath = path.join(destinationDir, relativePath);
        const stats = await fs.stat(absolutePath);
        extracted.push({ relativePath, absolutePath, size: stats.size });
      }
      log.info('Extracted %d files from %s', extracted.length, path.basename(archivePath));
      return extracted;
    } catch (error) {
      await fs.remove(staging);
      throw error;
    }
  }

  private async withZip<T>(archivePath: string, work: (zip: StreamZip.StreamZipAsync) => Promise<T>): Promise<T> {
    const zip = new StreamZip.async({ file: archivePath });
    try {
      return await work(zip);
    } catch (error) {
      if (error instanceof MigrationError || this.isLocalIoError(error)) {
        throw error;
      }
      throw new CorruptInputError(`Unreadable archive ${path.basename(archivePath)}: ${errorMessage(error)}`, archivePath, {
        cause: error
      });
    } finally {
      await zip.close().catch((error: unknown) => log.debug('Closing %s failed: %s', archivePath, errorMessage(error)));
    }
  }

  // disk and descriptor failures while writing are not the archive's fault
  private isLocalIoError(error: unknown): boolean {
    if (!(error instanceof Error) || !('code' in error)) {
      return false;
    }
    const { code } = error;
    return ['ENOSPC', 'EDQUOT', 'EMFILE', 'EACCES', 'EBUSY', 'ENOENT'].some((local) => local === code);
  }
}
