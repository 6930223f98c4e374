type Listener = (state: { paused: boolean; stopped: boolean }) => void;

export interface PauseSignal {
  waitIfPaused(): Promise<void>;
  readonly paused: boolean;
  readonly stopped: boolean;
  readonly signal: AbortSignal;
  onChange(listener: Listener): () => void;
}

export class PipelineControl implements PauseSignal {
  private _paused = false;
  private waiters: Array<() => void> = [];
  private listeners = new Set<Listener>();
  private abort = new AbortController();

  get paused(): boolean {
    return this._paused;
  }

  get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  /** Aborts when `stop()` is called; backoff and admission waits listen to it. */
  get signal(): AbortSignal {
    return this.abort.signal;
  }

  pause(): void {
    if (this._paused || this.stopped) {
      return;
    }
    this._paused = true;
    this.emit();
  }

  resume(): void {
    if (!this._paused) {
      return;
    }
    this._paused = false;
    this.releaseWaiters();
    this.emit();
  }

  /** No new work is admitted after this; paused waiters are released so they can observe it. */
  stop(): void {
    if (this.stopped) {
      return;
    }
    this.abort.abort();
    this._paused = false;
    this.releaseWaiters();
    this.emit();
  }

  /** Clears pause and stop for a new run; pools paused by the last run start again. */
  reset(): void {
    const changed = this._paused || this.stopped;
    this._paused = false;
    this.releaseWaiters();
    if (this.stopped) {
      this.abort = new AbortController();
    }
    if (changed) {
      this.emit();
    }
  }

  async waitIfPaused(): Promise<void> {
    if (!this._paused) {
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  onChange(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  private releaseWaiters(): void {
    const waiters = [...this.waiters];
    this.waiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private emit(): void {
    for (const listener of this.listeners) {
      listener({ paused: this._paused, stopped: this.stopped });
    }
  }
}

/** Sleeps for `ms`, resolving false early if `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<boolean> => {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  if (ms <= 0) {
    return Promise.resolve(true);
  }
  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
