import fs from 'fs-extra';
import { CorruptInputError } from '../errors.js';
import { streamHash } from '../utils/files.js';
import { detectMagicType } from '../utils/magic-bytes.js';
import log from '../logger.js';
import type { ArchiveExtractor, ArchiveSource } from '../types/collaborators.js';
import type { ArchiveUnit } from '../types/migration.js';

export interface DownloadOutput {
  localPath: string;
  fingerprint: string;
  size: number;
}

/** Fetches an archive, proves it decompresses, and fingerprints the bytes. */
export class DownloadWorker {
  constructor(
    private readonly source: ArchiveSource,
    private readonly extractor: ArchiveExtractor,
    private readonly zipsDir: string
  ) {}

  async process(archive: ArchiveUnit): Promise<DownloadOutput> {
    const localPath = await this.source.fetch(archive.id, this.zipsDir);
    const stats = await fs.stat(localPath);
    if (archive.size > 0 && stats.size !== archive.size) {
      throw new CorruptInputError(
        `Archive ${archive.name} is ${stats.size} bytes, expected ${archive.size} (truncated transfer)`,
        localPath
      );
    }
    if ((await detectMagicType(localPath)) !== 'zip') {
      throw new CorruptInputError(`Archive ${archive.name} is not a zip file`, localPath);
    }
    await this.extractor.verify(localPath);
    const fingerprint = await streamHash(localPath);
    log.info('Downloaded %s (%d bytes)', archive.name, stats.size);
    return { localPath, fingerprint, size: stats.size };
  }
}
