import { statfs } from 'node:fs/promises';
import PQueue from 'p-queue';
import { DiskBudgetError, errorMessage } from '../errors.js';
import { directorySize } from '../utils/files.js';
import log from '../logger.js';
import type { DiskOptions } from '../types/pipeline.js';

export interface DiskProbe {
  /** Bytes currently used under the working directory. */
  measureUsage(): Promise<number>;
  /** Bytes free on the filesystem holding the working directory. */
  freeBytes(): Promise<number>;
}

export const createDiskProbe = (workDir: string): DiskProbe => ({
  measureUsage: () => directorySize(workDir),
  freeBytes: async () => {
    const stats = await statfs(workDir);
    return stats.bavail * stats.bsize;
  }
});

export interface Reservation {
  readonly bytes: number;
  /** Moves the reservation into measured usage, adjusted to what was actually written. */
  commit(actualBytes?: number): void;
  /** Returns the reservation unused. */
  release(): void;
}

export type AdmissionResult =
  | { status: 'admitted'; reservation: Reservation }
  | { status: 'deferred'; availableBytes: number };

export type DiskBudgetOptions = Pick<DiskOptions, 'budgetBytes' | 'minFreeBytes' | 'refreshIntervalMs'>;

/**
 * Process-wide accounting of local disk. Every stage that writes reserves its
 * estimate first; admissions run one at a time so two reservations never see
 * the same headroom.
 */
export class DiskBudgetGovernor {
  private usage = 0;
  private free = Number.POSITIVE_INFINITY;
  private reserved = 0;
  private measuredAt = 0;
  private readonly admissions = new PQueue({ concurrency: 1 });
  private waiters = new Set<() => void>();

  constructor(
    private readonly probe: DiskProbe,
    private readonly options: DiskBudgetOptions,
    private readonly clock: () => number = Date.now
  ) {}

  get usedBytes(): number {
    return this.usage;
  }

  get reservedBytes(): number {
    return this.reserved;
  }

  get ceiling(): number | null {
    return this.options.budgetBytes;
  }

  /** Fraction of the ceiling in use, reservations included; 0 when unlimited. */
  get usageRatio(): number {
    const ceiling = this.options.budgetBytes;
    if (ceiling === null || ceiling <= 0) {
      return 0;
    }
    return (this.usage + this.reserved) / ceiling;
  }

  get availableBytes(): number {
    const byFree = this.free - this.options.minFreeBytes - this.reserved;
    const ceiling = this.options.budgetBytes;
    if (ceiling === null) {
      return Math.max(0, byFree);
    }
    return Math.max(0, Math.min(ceiling - this.usage - this.reserved, byFree));
  }

  /** True when `bytes` could never fit, even with the working directory empty. */
  exceedsCeiling(bytes: number): boolean {
    const ceiling = this.options.budgetBytes;
    return ceiling !== null && bytes > ceiling;
  }

  async refresh(force = false): Promise<void> {
    if (!force && this.measuredAt > 0 && this.clock() - this.measuredAt < this.options.refreshIntervalMs) {
      return;
    }
    try {
      const [usage, free] = await Promise.all([this.probe.measureUsage(), this.probe.freeBytes()]);
      if (Math.abs(usage - this.usage) > 0 && this.measuredAt > 0) {
        log.debug('Disk usage corrected from %d to %d bytes', this.usage, usage);
      }
      this.usage = usage;
      this.free = free;
      this.measuredAt = this.clock();
    } catch (error) {
      throw new DiskBudgetError(`Unable to measure disk usage: ${errorMessage(error)}`, { cause: error });
    }
  }

  async admit(estimatedBytes: number): Promise<AdmissionResult> {
    const bytes = Math.max(0, Math.ceil(estimatedBytes));
    return this.admissions.add(async (): Promise<AdmissionResult> => {
      await this.refresh();
      const available = this.availableBytes;
      if (bytes > available) {
        return { status: 'deferred', availableBytes: available };
      }
      this.reserved += bytes;
      return { status: 'admitted', reservation: this.createReservation(bytes) };
    }, { throwOnTimeout: true });
  }

  /** Bookkeeping for files deleted by the pipeline. */
  freed(bytes: number): void {
    if (bytes <= 0) {
      return;
    }
    this.usage = Math.max(0, this.usage - bytes);
    if (Number.isFinite(this.free)) {
      this.free += bytes;
    }
    this.notify();
  }

  /**
   * Resolves true when a reservation settles or space is freed, false when
   * the timeout elapses or `signal` aborts first.
   */
  waitForChange(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) {
      return Promise.resolve(false);
    }
    return new Promise<boolean>((resolve) => {
      const finish = (changed: boolean): void => {
        clearTimeout(timer);
        this.waiters.delete(onChange);
        signal?.removeEventListener('abort', onAbort);
        resolve(changed);
      };
      const onChange = (): void => finish(true);
      const onAbort = (): void => finish(false);
      const timer = setTimeout(() => finish(false), timeoutMs);
      this.waiters.add(onChange);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  private createReservation(bytes: number): Reservation {
    let settled = false;
    return {
      bytes,
      commit: (actualBytes = bytes) => {
        if (settled) {
          return;
        }
        settled = true;
        this.reserved -= bytes;
        this.usage += Math.max(0, actualBytes);
        if (Number.isFinite(this.free)) {
          this.free -= Math.max(0, actualBytes);
        }
        this.notify();
      },
      release: () => {
        if (settled) {
          return;
        }
        settled = true;
        this.reserved -= bytes;
        this.notify();
      }
    };
  }

  private notify(): void {
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const resolve of waiters) {
      resolve();
    }
  }
}
