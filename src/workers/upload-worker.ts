import fs from 'fs-extra';
import { PermanentError } from '../errors.js';
import type { MediaUploader } from '../types/collaborators.js';
import type { MediaItem } from '../types/migration.js';

export class UploadWorker {
  constructor(private readonly uploader: MediaUploader) {}

  async process(item: MediaItem): Promise<string> {
    if (!(await fs.pathExists(item.path))) {
      throw new PermanentError(`Media file ${item.relativePath} is missing from ${item.path}`);
    }
    return this.uploader.upload(item.path, item.albums);
  }
}
