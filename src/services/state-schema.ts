import { z } from 'zod';
import type { Album, ArchiveUnit, MediaItem, RunMeta } from '../types/migration.js';

// Unknown keys are stripped and missing ones defaulted so state written by an
// older or newer build still loads.

const failureKind = z.enum(['transient', 'permanent', 'corrupt-input', 'resource-exhausted']);

const archivePhase = z.enum([
  'discovered',
  'downloading',
  'downloaded',
  'extracting',
  'extracted',
  'processed',
  'cleaned',
  'corrupted',
  'failed'
]);

const mediaPhase = z.enum(['extracted', 'metadata-merged', 'album-resolved', 'uploading', 'uploaded', 'failed']);

const recordedError = z.object({
  kind: failureKind.catch('permanent'),
  message: z.string().default(''),
  at: z.string().default(() => new Date(0).toISOString())
});

const retryRecord = z.object({
  kind: failureKind.catch('transient'),
  attempts: z.number().int().nonnegative().default(0),
  nextAttemptAt: z.string().default(() => new Date(0).toISOString())
});

export const archiveUnitSchema: z.ZodType<ArchiveUnit, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  name: z.string().default(''),
  size: z.number().nonnegative().default(0),
  phase: archivePhase,
  attempts: z.number().int().nonnegative().default(0),
  lastError: recordedError.optional(),
  retry: retryRecord.optional(),
  failedFrom: archivePhase.optional(),
  skipped: z.boolean().optional(),
  localPath: z.string().optional(),
  extractDir: z.string().optional(),
  fingerprint: z.string().optional(),
  itemCount: z.number().int().nonnegative().optional(),
  discoveredAt: z.string().default(() => new Date(0).toISOString()),
  updatedAt: z.string().default(() => new Date(0).toISOString())
});

const mediaMetadata = z.object({
  timestamp: z.string().optional(),
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  description: z.string().optional(),
  title: z.string().optional(),
  albumHints: z.array(z.string()).default([])
});

export const mediaItemSchema: z.ZodType<MediaItem, z.ZodTypeDef, unknown> = z.object({
  id: z.string().min(1),
  archiveId: z.string(),
  relativePath: z.string(),
  path: z.string(),
  fingerprint: z.string().default(''),
  size: z.number().nonnegative().default(0),
  sidecarPath: z.string().optional(),
  metadata: mediaMetadata.optional(),
  albums: z.array(z.string()).default([]),
  phase: mediaPhase,
  attempts: z.number().int().nonnegative().default(0),
  lastError: recordedError.optional(),
  retry: retryRecord.optional(),
  failedFrom: mediaPhase.optional(),
  remoteId: z.string().optional(),
  fileReclaimed: z.boolean().optional(),
  updatedAt: z.string().default(() => new Date(0).toISOString())
});

export const albumSchema: z.ZodType<Album, z.ZodTypeDef, unknown> = z.object({
  key: z.string().min(1),
  displayName: z.string(),
  members: z.array(z.string()).default([]),
  origin: z.enum(['created', 'pre-existing']).catch('pre-existing'),
  createdInRun: z.string().optional(),
  updatedAt: z.string().default(() => new Date(0).toISOString())
});

export const runMetaSchema: z.ZodType<RunMeta, z.ZodTypeDef, unknown> = z.object({
  runId: z.string().optional(),
  mode: z.enum(['running', 'paused-for-retries']).catch('running'),
  proceedGranted: z.boolean().default(false),
  acknowledgedFailures: z.number().int().nonnegative().default(0),
  lastRunStartedAt: z.string().optional(),
  lastRunFinishedAt: z.string().optional()
});

export const snapshotSchema = z.object({
  version: z.number().int().default(1),
  archives: z.record(z.unknown()).default({}),
  media: z.record(z.unknown()).default({}),
  albums: z.record(z.unknown()).default({}),
  meta: z.unknown().optional()
});

export const journalEntrySchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('archive'), record: z.unknown() }),
  z.object({ op: z.literal('media'), record: z.unknown() }),
  z.object({ op: z.literal('album'), record: z.unknown() }),
  z.object({ op: z.literal('meta'), record: z.unknown() })
]);

export type JournalEntry = z.infer<typeof journalEntrySchema>;

export const STATE_VERSION = 1;
