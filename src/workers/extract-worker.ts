import path from 'node:path';
import { PermanentError } from '../errors.js';
import { safeDirectoryName } from '../utils/naming.js';
import type { ArchiveExtractor, ArchiveInspection, ExtractedEntry } from '../types/collaborators.js';
import type { ArchiveUnit } from '../types/migration.js';

export interface ExtractOutput {
  extractDir: string;
  entries: ExtractedEntry[];
}

export class ExtractWorker {
  constructor(
    private readonly extractor: ArchiveExtractor,
    private readonly extractedDir: string
  ) {}

  extractDirFor(archive: ArchiveUnit): string {
    return path.join(this.extractedDir, safeDirectoryName(archive.id.split('/').join('__').replace(/\.zip$/i, '')));
  }

  async inspect(archive: ArchiveUnit): Promise<ArchiveInspection> {
    return this.extractor.inspect(this.localPathOf(archive));
  }

  async process(archive: ArchiveUnit): Promise<ExtractOutput> {
    const extractDir = this.extractDirFor(archive);
    const entries = await this.extractor.extract(this.localPathOf(archive), extractDir);
    return { extractDir, entries };
  }

  private localPathOf(archive: ArchiveUnit): string {
    if (!archive.localPath) {
      throw new PermanentError(`Archive ${archive.name} has no local copy to extract`);
    }
    return archive.localPath;
  }
}
