import path from 'node:path';
import mime from 'mime-types';

export type MediaKind = 'image' | 'video';

// extensions mime-types maps to something else or not at all
const EXTRA_MEDIA: Record<string, MediaKind> = {
  '.heic': 'image',
  '.heif': 'image',
  '.dng': 'image',
  '.cr2': 'image',
  '.nef': 'image',
  '.arw': 'image',
  '.mts': 'video',
  '.m2ts': 'video'
};

export const mediaKindOf = (filePath: string): MediaKind | undefined => {
  const ext = path.extname(filePath).toLowerCase();
  if (!ext) {
    return undefined;
  }
  const extra = EXTRA_MEDIA[ext];
  if (extra) {
    return extra;
  }
  const type = mime.lookup(ext);
  if (!type) {
    return undefined;
  }
  if (type.startsWith('image/')) {
    return 'image';
  }
  if (type.startsWith('video/')) {
    return 'video';
  }
  return undefined;
};

export const isMediaFile = (filePath: string): boolean => mediaKindOf(filePath) !== undefined;
