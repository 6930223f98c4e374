import PQueue from 'p-queue';
import log from '../logger.js';
import type { PauseSignal } from './pipeline-control.js';

export type WorkResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Bounded-concurrency executor for one pipeline phase. Tasks queued but not
 * yet started are dropped once the control is stopped; a paused control
 * pauses the queue.
 */
export class WorkerPool {
  private readonly queue: PQueue;
  private readonly unsubscribeControl?: () => void;

  constructor(
    readonly name: string,
    concurrency: number,
    private readonly control?: PauseSignal
  ) {
    this.queue = new PQueue({ concurrency: Math.max(1, concurrency) });
    if (this.control) {
      this.unsubscribeControl = this.control.onChange(({ paused }) => {
        if (paused) {
          this.queue.pause();
        } else {
          this.queue.start();
        }
      });
      if (this.control.paused) {
        this.queue.pause();
      }
    }
  }

  get pending(): number {
    return this.queue.pending;
  }

  get size(): number {
    return this.queue.size;
  }

  /** Number of tasks queued or running. */
  get load(): number {
    return this.queue.size + this.queue.pending;
  }

  /**
   * Runs `task` when a slot frees up. Resolves `undefined` when the pool was
   * stopped before the task started; failures are returned, never thrown.
   */
  submit<T>(task: () => Promise<T>): Promise<WorkResult<T> | undefined> {
    return this.queue.add(async (): Promise<WorkResult<T> | undefined> => {
      if (this.control?.stopped) {
        return undefined;
      }
      await this.control?.waitIfPaused();
      if (this.control?.stopped) {
        return undefined;
      }
      try {
        return { ok: true, value: await task() };
      } catch (error) {
        log.debug('%s task failed: %s', this.name, error instanceof Error ? error.message : String(error));
        return { ok: false, error };
      }
    }, { throwOnTimeout: true });
  }

  async onIdle(): Promise<void> {
    await this.queue.onIdle();
  }

  close(): void {
    this.unsubscribeControl?.();
    this.queue.clear();
  }
}
