import os from 'node:os';
import path from 'node:path';
import fs from 'fs-extra';
import archiver from 'archiver';
import type { MediaUploader, MetadataPatch, MetadataTagger } from '../types/collaborators.js';
import type { PipelineOptions } from '../types/pipeline.js';

export const makeTempDir = async (prefix = 'migrator-test-'): Promise<string> =>
  fs.mkdtemp(path.join(os.tmpdir(), prefix));

/** Writes a zip at `zipPath` holding `entries` (name -> content). */
export const buildZip = async (zipPath: string, entries: Record<string, string | Buffer>): Promise<void> => {
  await fs.ensureDir(path.dirname(zipPath));
  const output = fs.createWriteStream(zipPath);
  const archive = archiver('zip', { zlib: { level: 1 } });
  const done = new Promise<void>((resolve, reject) => {
    output.on('close', () => resolve());
    archive.on('error', (error: Error) => reject(error));
  });
  archive.pipe(output);
  for (const [name, content] of Object.entries(entries)) {
    archive.append(content, { name });
  }
  await archive.finalize();
  await done;
};

/** A few bytes that sniff as JPEG. */
export const jpegBytes = (label: string): Buffer =>
  Buffer.concat([Buffer.from([0xff, 0xd8, 0xff, 0xe0]), Buffer.from(label, 'utf8')]);

export const sidecarJson = (fields: Record<string, unknown>): string => JSON.stringify(fields);

export const testOptions = (overrides: Partial<PipelineOptions> = {}): PipelineOptions => ({
  concurrency: { download: 2, extract: 1, metadata: 2, upload: 2 },
  retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
  disk: {
    budgetBytes: null,
    minFreeBytes: 0,
    refreshIntervalMs: 0,
    cleanupThreshold: 0.9,
    pollIntervalMs: 20
  },
  metadata: { preserveDates: true, preserveGps: true, preserveDescriptions: true, preserveAlbums: true },
  cleanupAfterUpload: true,
  pauseFailureRatio: 0,
  journalCompactEvery: 1000,
  ...overrides
});

export interface UploadCall {
  mediaPath: string;
  name: string;
  albums: string[];
}

/** In-memory uploader; `failWith` decides per call whether to throw. */
export class FakeUploader implements MediaUploader {
  readonly calls: UploadCall[] = [];
  existingAlbums: string[] = [];
  failWith?: (call: UploadCall, callNumber: number) => unknown;
  onUpload?: (call: UploadCall, callNumber: number) => void;

  async upload(mediaPath: string, albumNames: string[]): Promise<string> {
    const call: UploadCall = { mediaPath, name: path.basename(mediaPath), albums: [...albumNames] };
    this.calls.push(call);
    const callNumber = this.calls.length;
    const failure = this.failWith?.(call, callNumber);
    if (failure !== undefined) {
      throw failure;
    }
    this.onUpload?.(call, callNumber);
    return `remote-${callNumber}`;
  }

  async listAlbums(): Promise<string[]> {
    return this.existingAlbums;
  }

  uploadedNames(): string[] {
    return this.calls.map((call) => call.name);
  }
}

export class FakeTagger implements MetadataTagger {
  readonly applied: Array<{ mediaPath: string; patch: MetadataPatch }> = [];

  async applyMetadata(mediaPath: string, patch: MetadataPatch): Promise<void> {
    this.applied.push({ mediaPath, patch });
  }
}
