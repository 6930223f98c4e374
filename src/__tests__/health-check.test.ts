import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { LocalFolderSource } from '../adapters/local-folder-source.js';
import { getAppPaths } from '../config/app-paths.js';
import { HealthChecker } from '../services/health-check.js';
import type { HealthCheckDependencies } from '../services/health-check.js';
import type { DiskProbe } from '../services/disk-budget.js';
import type { MetadataTagger } from '../types/collaborators.js';
import { FakeTagger, makeTempDir } from './helpers.js';

class FixedProbe implements DiskProbe {
  constructor(private readonly free: number) {}

  async measureUsage(): Promise<number> {
    return 0;
  }

  async freeBytes(): Promise<number> {
    return this.free;
  }
}

const versionedTagger = (version: () => Promise<string>): MetadataTagger => {
  const tagger = new FakeTagger();
  return { applyMetadata: (mediaPath, patch) => tagger.applyMetadata(mediaPath, patch), version };
};

describe('HealthChecker', () => {
  let root: string;
  let sourceDir: string;

  const checker = (overrides: Partial<HealthCheckDependencies> = {}): HealthChecker =>
    new HealthChecker({
      paths: getAppPaths(path.join(root, 'work')),
      probe: new FixedProbe(10_000),
      disk: { budgetBytes: 1000, minFreeBytes: 100 },
      source: new LocalFolderSource(sourceDir),
      tagger: versionedTagger(async () => '12.70'),
      ...overrides
    });

  beforeEach(async () => {
    root = await makeTempDir();
    sourceDir = path.join(root, 'source');
    await fs.ensureDir(sourceDir);
    await fs.writeFile(path.join(sourceDir, 'takeout-001.zip'), 'zip bytes');
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it('should pass when the environment is ready', async () => {
    const report = await checker().checkAll();

    expect(report.passed).toBe(true);
    expect(report.results.map(({ name, passed, message }) => ({ name, passed, message }))).toEqual([
      { name: 'working directory', passed: true, message: `${path.join(root, 'work')} is writable` },
      { name: 'disk space', passed: true, message: '10000 bytes free' },
      { name: 'archive source', passed: true, message: '1 archives available' },
      { name: 'exiftool', passed: true, message: 'exiftool 12.70 available' }
    ]);
    expect(await fs.pathExists(path.join(root, 'work', '.health-check'))).toBe(false);
  });

  it('should fail when disk, source or exiftool are unusable', async () => {
    const missing = path.join(root, 'missing');
    const report = await checker({
      probe: new FixedProbe(50),
      source: new LocalFolderSource(missing),
      tagger: versionedTagger(async () => {
        throw new Error('spawn exiftool ENOENT');
      })
    }).checkAll();

    expect(report.passed).toBe(false);
    expect(report.results.filter((result) => !result.passed)).toEqual([
      { name: 'disk space', passed: false, message: '50 bytes free, at or below the 100 byte floor', severity: 'error' },
      {
        name: 'archive source',
        passed: false,
        message: `Archive source directory ${missing} does not exist`,
        severity: 'error'
      },
      { name: 'exiftool', passed: false, message: 'exiftool is not available: spawn exiftool ENOENT', severity: 'error' }
    ]);
  });

  it('should only warn when the budget is larger than the free space', async () => {
    const report = await checker({ probe: new FixedProbe(500) }).checkAll();

    expect(report.passed).toBe(true);
    expect(report.results[1]).toEqual({
      name: 'disk space',
      passed: false,
      message: '500 bytes free; the 1000 byte budget cannot be used in full',
      severity: 'warning'
    });
  });

  it('should skip the exiftool check when tagging is off', async () => {
    const result = await checker({ tagger: undefined }).checkExifTool();

    expect(result).toEqual({ name: 'exiftool', passed: true, message: 'metadata tagging is off', severity: 'error' });
  });
});
