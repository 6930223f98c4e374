import path from 'node:path';
import fs from 'fs-extra';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadConfig, parseByteSize, parseConfig } from '../config/config.js';
import { ConfigurationError } from '../errors.js';
import { makeTempDir } from './helpers.js';

describe('parseByteSize', () => {
  it('should accept plain numbers and unit suffixes', () => {
    expect(parseByteSize(2048)).toBe(2048);
    expect(parseByteSize('10KB')).toBe(10 * 1024);
    expect(parseByteSize('512 mb')).toBe(512 * 1024 ** 2);
    expect(parseByteSize('1.5GiB')).toBe(1.5 * 1024 ** 3);
  });

  it('should reject anything else', () => {
    expect(parseByteSize('lots')).toBeUndefined();
    expect(parseByteSize(-1)).toBeUndefined();
    expect(parseByteSize('10 PB')).toBeUndefined();
  });
});

describe('parseConfig', () => {
  it('should fill in defaults and resolve directories', () => {
    const config = parseConfig({ sourceDir: 'in', libraryDir: 'out' }, {}, '/work');

    expect(config.baseDir).toBe(path.resolve('/work', 'migration-work'));
    expect(config.sourceDir).toBe(path.resolve('/work', 'in'));
    expect(config.logging).toEqual({ level: 'info', file: true });
    expect(config.pipeline.concurrency).toEqual({ download: 2, extract: 1, metadata: 4, upload: 4 });
    expect(config.pipeline.retry.maxAttempts).toBe(5);
    expect(config.pipeline.disk.budgetBytes).toBeNull();
    expect(config.pipeline.disk.minFreeBytes).toBe(1024 ** 3);
    expect(config.pipeline.cleanupAfterUpload).toBe(true);
  });

  it('should parse human-readable disk sizes', () => {
    const config = parseConfig({
      sourceDir: 'in',
      libraryDir: 'out',
      pipeline: { disk: { budgetBytes: '50GB', minFreeBytes: '1 gb' } }
    });

    expect(config.pipeline.disk.budgetBytes).toBe(50 * 1024 ** 3);
    expect(config.pipeline.disk.minFreeBytes).toBe(1024 ** 3);
  });

  it('should let environment variables override the file', () => {
    const config = parseConfig(
      { sourceDir: 'in', libraryDir: 'out', logging: { level: 'warn', file: false } },
      { MIGRATION_LIBRARY_DIR: '/library', MIGRATION_LOG_LEVEL: 'debug', MIGRATION_DISK_BUDGET_BYTES: '2GB' },
      '/work'
    );

    expect(config.libraryDir).toBe(path.resolve('/library'));
    expect(config.logging).toEqual({ level: 'debug', file: false });
    expect(config.pipeline.disk.budgetBytes).toBe(2 * 1024 ** 3);
  });

  it('should report every invalid field', () => {
    let caught: unknown;
    try {
      parseConfig({ pipeline: { concurrency: { upload: 0 }, disk: { budgetBytes: 'huge' } } });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.issues).toContain('sourceDir: Required');
    expect(caught.issues).toContain('libraryDir: Required');
    expect(caught.issues).toContain('pipeline.disk.budgetBytes: "huge" is not a byte size');
    expect(caught.issues.some((issue) => issue.startsWith('pipeline.concurrency.upload:'))).toBe(true);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should read YAML and resolve paths next to the file', async () => {
    const file = path.join(dir, 'migration.yaml');
    await fs.writeFile(file, 'sourceDir: takeout\nlibraryDir: library\npipeline:\n  pauseFailureRatio: 0.25\n');

    const config = await loadConfig(file, {});

    expect(config.sourceDir).toBe(path.join(dir, 'takeout'));
    expect(config.libraryDir).toBe(path.join(dir, 'library'));
    expect(config.pipeline.pauseFailureRatio).toBe(0.25);
  });

  it('should raise a ConfigurationError for a missing file or invalid YAML', async () => {
    const broken = path.join(dir, 'broken.yaml');
    await fs.writeFile(broken, 'sourceDir: [unclosed\n');

    await expect(loadConfig(path.join(dir, 'missing.yaml'), {})).rejects.toBeInstanceOf(ConfigurationError);
    await expect(loadConfig(broken, {})).rejects.toBeInstanceOf(ConfigurationError);
  });
});
