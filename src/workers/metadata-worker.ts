import type { SidecarParser } from '../services/sidecar-parser.js';
import type { MetadataPatch, MetadataTagger } from '../types/collaborators.js';
import type { MediaItem, MediaMetadata } from '../types/migration.js';
import type { MetadataOptions } from '../types/pipeline.js';

/** Which parts of the sidecar metadata get written into the file. */
export const buildPatch = (metadata: MediaMetadata, options: MetadataOptions): MetadataPatch => {
  const patch: MetadataPatch = {};
  if (options.preserveDates && metadata.timestamp) {
    patch.timestamp = metadata.timestamp;
  }
  if (options.preserveGps && metadata.latitude !== undefined && metadata.longitude !== undefined) {
    patch.gps = { latitude: metadata.latitude, longitude: metadata.longitude };
  }
  if (options.preserveDescriptions) {
    if (metadata.description) {
      patch.description = metadata.description;
    }
    if (metadata.title) {
      patch.title = metadata.title;
    }
  }
  return patch;
};

export const isEmptyPatch = (patch: MetadataPatch): boolean =>
  !patch.timestamp && !patch.gps && !patch.description && !patch.title;

/** Reads the item's sidecar and writes what it carries into the media file. */
export class MetadataWorker {
  constructor(
    private readonly parser: SidecarParser,
    private readonly tagger: MetadataTagger | undefined,
    private readonly options: MetadataOptions
  ) {}

  async process(item: MediaItem): Promise<MediaMetadata> {
    const metadata = await this.parser.parse(item.sidecarPath);
    const patch = buildPatch(metadata, this.options);
    if (this.tagger && !isEmptyPatch(patch)) {
      await this.tagger.applyMetadata(item.path, patch);
    }
    return metadata;
  }
}
