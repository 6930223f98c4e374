import path from 'node:path';

const DATE_BUCKET_RE = /^photos from \d{4}(-\d{2}(-\d{2})?)?$/i;
const DATED_ALBUM_RE = /^photos from \S+\s+(.+)$/i;
const CONTAINER_DIRS = new Set(['takeout', 'google photos', '__macosx']);

/** Trimmed, whitespace-collapsed, case-folded album name. */
export const canonicalAlbumKey = (name: string): string => name.trim().replace(/\s+/g, ' ').toLowerCase();

export const normalizeDisplayName = (name: string): string => name.trim().replace(/\s+/g, ' ');

/**
 * Album name implied by the directory a file was extracted into, or undefined
 * for Takeout container folders and year buckets.
 */
export const albumFromDirectory = (relativeDir: string): string | undefined => {
  if (!relativeDir || relativeDir === '.') {
    return undefined;
  }
  const leaf = normalizeDisplayName(path.basename(relativeDir)).replace(/^google photos\s*[-:]?\s*/i, '');
  if (!leaf || CONTAINER_DIRS.has(leaf.toLowerCase()) || DATE_BUCKET_RE.test(leaf)) {
    return undefined;
  }
  // "Photos from 2021-06-01 Beach Trip" names the album after the date
  return DATED_ALBUM_RE.exec(leaf)?.[1] ?? leaf;
};

/** Stable id for a media item inside an archive. */
export const mediaItemId = (archiveId: string, relativePath: string): string =>
  `${archiveId}::${relativePath.split(path.sep).join('/')}`;

export const safeDirectoryName = (name: string): string => {
  const cleaned = name.replace(/[<>:"/\\|?*\u0000-\u001f]/g, '_').replace(/\.+$/, '').trim();
  return cleaned || '_';
};
