import path from 'node:path';
import fs from 'fs-extra';
import { z } from 'zod';
import { fromEpochSeconds } from '../utils/date.js';
import { parseGeoData } from '../utils/gps.js';
import { normalizeDisplayName } from '../utils/naming.js';
import { errorMessage } from '../errors.js';
import log from '../logger.js';
import type { MediaMetadata } from '../types/migration.js';

// Takeout truncates sidecar names to this many characters before ".json"
const MAX_SIDECAR_STEM = 46;
const DUPLICATE_RE = /^(.*)\((\d+)\)(\.[^.]+)$/;
const EDITED_RE = /-(edited|bearbeitet|modifié)(\.[^.]+)$/i;

const timestampField = z.object({ timestamp: z.union([z.string(), z.number()]).optional() }).passthrough();
const geoField = z.object({ latitude: z.unknown(), longitude: z.unknown() }).passthrough();
const albumRef = z.object({ title: z.string().optional(), name: z.string().optional() }).passthrough();

const sidecarSchema = z
  .object({
    title: z.string().optional(),
    description: z.string().optional(),
    photoTakenTime: timestampField.optional(),
    creationTime: timestampField.optional(),
    geoData: geoField.optional(),
    geoDataExif: geoField.optional(),
    albumData: z.union([albumRef, z.string()]).optional(),
    googlePhotosOrigin: z.object({ albumTitle: z.string().optional() }).passthrough().optional(),
    albums: z.array(albumRef).optional()
  })
  .passthrough();

type SidecarJson = z.infer<typeof sidecarSchema>;

/**
 * Candidate sidecar names for a media file, most specific first:
 * `IMG.jpg.json`, `IMG.jpg.supplemental-metadata.json`, `IMG.json`, and the
 * `IMG.jpg(1).json` form Takeout uses for `IMG(1).jpg`.
 */
export const sidecarCandidates = (mediaName: string): string[] => {
  const names: string[] = [];
  const push = (stem: string, suffix = '.json'): void => {
    names.push(`${stem}${suffix}`);
    if (stem.length > MAX_SIDECAR_STEM) {
      names.push(`${stem.slice(0, MAX_SIDECAR_STEM)}${suffix}`);
    }
  };
  const add = (name: string): void => {
    const ext = path.extname(name);
    push(name);
    push(name, '.supplemental-metadata.json');
    if (ext) {
      push(name.slice(0, -ext.length));
    }
  };

  add(mediaName);
  const duplicate = DUPLICATE_RE.exec(mediaName);
  if (duplicate) {
    const [, stem, counter, ext] = duplicate;
    push(`${stem}${ext}`, `(${counter}).json`);
    push(`${stem}${ext}.supplemental-metadata`, `(${counter}).json`);
  }
  const edited = EDITED_RE.exec(mediaName);
  if (edited) {
    add(mediaName.slice(0, edited.index) + edited[2]);
  }
  return [...new Set(names)];
};

export const isSidecarFile = (fileName: string): boolean => fileName.toLowerCase().endsWith('.json');

/**
 * Finds the sidecar for `mediaPath` among `siblings` (file names in the same
 * directory). Falls back to a prefix match for supplemental names Takeout cut
 * short at an arbitrary point.
 */
export const locateSidecar = (mediaPath: string, siblings: ReadonlySet<string>): string | undefined => {
  const dir = path.dirname(mediaPath);
  const mediaName = path.basename(mediaPath);
  for (const candidate of sidecarCandidates(mediaName)) {
    if (siblings.has(candidate)) {
      return path.join(dir, candidate);
    }
  }
  const prefix = `${mediaName}.`;
  for (const sibling of siblings) {
    if (sibling.startsWith(prefix) && sibling.toLowerCase().endsWith('.json')) {
      return path.join(dir, sibling);
    }
  }
  return undefined;
};

const albumHints = (json: SidecarJson): string[] => {
  const hints: string[] = [];
  const { albumData } = json;
  if (typeof albumData === 'string') {
    hints.push(albumData);
  } else if (albumData) {
    hints.push(albumData.title ?? albumData.name ?? '');
  }
  if (json.googlePhotosOrigin?.albumTitle) {
    hints.push(json.googlePhotosOrigin.albumTitle);
  }
  for (const album of json.albums ?? []) {
    hints.push(album.title ?? album.name ?? '');
  }
  return hints.map(normalizeDisplayName).filter((hint) => hint.length > 0);
};

export const metadataFromSidecar = (json: SidecarJson): MediaMetadata => {
  const timestamp =
    fromEpochSeconds(json.photoTakenTime?.timestamp) ?? fromEpochSeconds(json.creationTime?.timestamp);
  const gps = parseGeoData(json.geoData) ?? parseGeoData(json.geoDataExif);
  const description = json.description?.replace(/[\r\n]+/g, ' ').trim();
  return {
    timestamp,
    latitude: gps?.latitude,
    longitude: gps?.longitude,
    description: description || undefined,
    title: json.title?.trim() || undefined,
    albumHints: albumHints(json)
  };
};

export class SidecarParser {
  /**
   * Reads the sidecar at `sidecarPath`. A missing, unreadable or malformed
   * sidecar yields empty metadata; the media item migrates without it.
   */
  async parse(sidecarPath: string | undefined): Promise<MediaMetadata> {
    if (!sidecarPath) {
      return { albumHints: [] };
    }
    let raw: unknown;
    try {
      raw = JSON.parse(await fs.readFile(sidecarPath, 'utf8'));
    } catch (error) {
      log.warn('Ignoring unreadable sidecar %s: %s', sidecarPath, errorMessage(error));
      return { albumHints: [] };
    }
    const parsed = sidecarSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('Ignoring sidecar with unexpected shape %s', sidecarPath);
      return { albumHints: [] };
    }
    return metadataFromSidecar(parsed.data);
  }
}
