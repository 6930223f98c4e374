import fs from 'fs-extra';
import { ExifTool } from 'exiftool-vendored';
import type { WriteTags } from 'exiftool-vendored';
import { PermanentError, errorMessage } from '../errors.js';
import { toExifTimestamp } from '../utils/date.js';
import { mediaKindOf } from '../utils/media.js';
import log from '../logger.js';
import type { MetadataPatch, MetadataTagger } from '../types/collaborators.js';

/** Tags exiftool should write for `patch`; video containers get their QuickTime dates too. */
export const buildWriteTags = (patch: MetadataPatch, mediaPath: string): WriteTags => {
  const tags: WriteTags = {};
  const stamp = patch.timestamp ? toExifTimestamp(patch.timestamp) : undefined;
  if (stamp) {
    tags.DateTimeOriginal = stamp;
    tags.CreateDate = stamp;
    tags.ModifyDate = stamp;
    if (mediaKindOf(mediaPath) === 'video') {
      tags.TrackCreateDate = stamp;
      tags.TrackModifyDate = stamp;
      tags.MediaCreateDate = stamp;
      tags.MediaModifyDate = stamp;
    }
  }
  if (patch.gps) {
    const { latitude, longitude } = patch.gps;
    tags.GPSLatitude = Math.abs(latitude);
    tags.GPSLongitude = Math.abs(longitude);
    tags.GPSLatitudeRef = latitude >= 0 ? 'N' : 'S';
    tags.GPSLongitudeRef = longitude >= 0 ? 'E' : 'W';
  }
  if (patch.description) {
    tags.ImageDescription = patch.description;
    tags.Description = patch.description;
    tags.UserComment = patch.description;
  }
  if (patch.title) {
    tags.Title = patch.title;
  }
  return tags;
};

export class ExifToolTagger implements MetadataTagger {
  private exif?: ExifTool;

  constructor(private readonly maxProcs = 4) {}

  async applyMetadata(mediaPath: string, patch: MetadataPatch): Promise<void> {
    const tags = buildWriteTags(patch, mediaPath);
    if (Object.keys(tags).length === 0) {
      return;
    }
    try {
      await this.client().write(mediaPath, tags, ['-overwrite_original']);
    } catch (error) {
      // exiftool reports unsupported or unwritable formats; retrying cannot help
      if (/not yet supported|unknown file type|can't currently write/i.test(errorMessage(error))) {
        throw new PermanentError(`exiftool cannot tag ${mediaPath}: ${errorMessage(error)}`, { cause: error });
      }
      throw error;
    }
    if (patch.timestamp) {
      await this.alignFileTimestamp(mediaPath, patch.timestamp);
    }
  }

  async version(): Promise<string> {
    return this.client().version();
  }

  async close(): Promise<void> {
    if (!this.exif) {
      return;
    }
    const exif = this.exif;
    this.exif = undefined;
    await exif.end();
    log.debug('exiftool process closed');
  }

  private client(): ExifTool {
    if (!this.exif) {
      this.exif = new ExifTool({ maxProcs: this.maxProcs });
    }
    return this.exif;
  }

  private async alignFileTimestamp(mediaPath: string, iso: string): Promise<void> {
    const mtime = new Date(iso);
    if (Number.isNaN(mtime.getTime())) {
      return;
    }
    await fs.utimes(mediaPath, mtime, mtime);
  }
}
