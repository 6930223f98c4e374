export interface RemoteArchive {
  id: string;
  name: string;
  size: number;
}

export interface ArchiveSource {
  listAvailable(): Promise<RemoteArchive[]>;
  fetch(id: string, destinationDir: string): Promise<string>;
}

export interface ArchiveInspection {
  entryCount: number;
  uncompressedBytes: number;
}

export interface ExtractedEntry {
  relativePath: string;
  absolutePath: string;
  size: number;
}

export interface ArchiveExtractor {
  inspect(archivePath: string): Promise<ArchiveInspection>;
  verify(archivePath: string): Promise<void>;
  extract(archivePath: string, destinationDir: string): Promise<ExtractedEntry[]>;
}

export interface GpsCoordinates {
  latitude: number;
  longitude: number;
}

export interface MetadataPatch {
  timestamp?: string;
  gps?: GpsCoordinates;
  description?: string;
  title?: string;
}

export interface MetadataTagger {
  applyMetadata(mediaPath: string, patch: MetadataPatch): Promise<void>;
  /** Version of the underlying tool; rejects when it cannot be started. */
  version?(): Promise<string>;
  close?(): Promise<void>;
}

export interface MediaUploader {
  upload(mediaPath: string, albumNames: string[]): Promise<string>;
  listAlbums?(): Promise<string[]>;
}
