import path from 'node:path';
import fs from 'fs-extra';
import { ensureAppDirectories } from '../config/app-paths.js';
import type { AppPaths } from '../config/app-paths.js';
import { errorMessage } from '../errors.js';
import log from '../logger.js';
import type { ArchiveSource, MetadataTagger } from '../types/collaborators.js';
import type { DiskOptions } from '../types/pipeline.js';
import type { DiskProbe } from './disk-budget.js';

export type HealthSeverity = 'error' | 'warning';

export interface HealthCheckResult {
  name: string;
  passed: boolean;
  message: string;
  /** How a failure of this check counts. */
  severity: HealthSeverity;
}

export interface HealthReport {
  /** False when any error-severity check failed; warnings do not block a run. */
  passed: boolean;
  results: HealthCheckResult[];
}

export interface HealthCheckDependencies {
  paths: AppPaths;
  probe: DiskProbe;
  disk: Pick<DiskOptions, 'budgetBytes' | 'minFreeBytes'>;
  source: ArchiveSource;
  tagger?: MetadataTagger;
}

const PROBE_FILE = '.health-check';

const pass = (name: string, message: string): HealthCheckResult => ({ name, passed: true, message, severity: 'error' });

const fail = (name: string, message: string, severity: HealthSeverity = 'error'): HealthCheckResult => ({
  name,
  passed: false,
  message,
  severity
});

/** Preflight checks run before a migration starts. */
export class HealthChecker {
  constructor(private readonly deps: HealthCheckDependencies) {}

  async checkAll(): Promise<HealthReport> {
    const results = [
      await this.checkWorkingDirectory(),
      await this.checkDiskSpace(),
      await this.checkSource(),
      await this.checkExifTool()
    ];
    for (const result of results) {
      if (result.passed) {
        log.info('Health check %s: %s', result.name, result.message);
      } else if (result.severity === 'warning') {
        log.warn('Health check %s: %s', result.name, result.message);
      } else {
        log.error('Health check %s failed: %s', result.name, result.message);
      }
    }
    return { passed: results.every((result) => result.passed || result.severity === 'warning'), results };
  }

  async checkWorkingDirectory(): Promise<HealthCheckResult> {
    const name = 'working directory';
    const { baseDir } = this.deps.paths;
    const probePath = path.join(baseDir, PROBE_FILE);
    try {
      await ensureAppDirectories(this.deps.paths);
      await fs.writeFile(probePath, 'ok');
      await fs.remove(probePath);
      return pass(name, `${baseDir} is writable`);
    } catch (error) {
      return fail(name, `Cannot write to ${baseDir}: ${errorMessage(error)}`);
    }
  }

  async checkDiskSpace(): Promise<HealthCheckResult> {
    const name = 'disk space';
    const { budgetBytes, minFreeBytes } = this.deps.disk;
    let free: number;
    try {
      free = await this.deps.probe.freeBytes();
    } catch (error) {
      return fail(name, `Could not check free space: ${errorMessage(error)}`);
    }
    if (free <= minFreeBytes) {
      return fail(name, `${free} bytes free, at or below the ${minFreeBytes} byte floor`);
    }
    if (budgetBytes !== null && free < budgetBytes + minFreeBytes) {
      return fail(name, `${free} bytes free; the ${budgetBytes} byte budget cannot be used in full`, 'warning');
    }
    return pass(name, `${free} bytes free`);
  }

  async checkSource(): Promise<HealthCheckResult> {
    const name = 'archive source';
    try {
      const archives = await this.deps.source.listAvailable();
      return pass(name, `${archives.length} archives available`);
    } catch (error) {
      return fail(name, errorMessage(error));
    }
  }

  async checkExifTool(): Promise<HealthCheckResult> {
    const name = 'exiftool';
    const { tagger } = this.deps;
    if (!tagger) {
      return pass(name, 'metadata tagging is off');
    }
    if (!tagger.version) {
      return pass(name, 'tagger does not report a version');
    }
    try {
      return pass(name, `exiftool ${await tagger.version()} available`);
    } catch (error) {
      return fail(name, `exiftool is not available: ${errorMessage(error)}`);
    }
  }
}
