import { describe, expect, it } from 'vitest';
import { WorkerPool } from '../pipeline/worker-pool.js';
import { PipelineControl, sleep } from '../pipeline/pipeline-control.js';

const deferred = (): { promise: Promise<void>; resolve: () => void } => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

describe('WorkerPool', () => {
  it('should return task values and failures without throwing', async () => {
    const pool = new WorkerPool('test', 2);

    const ok = await pool.submit(async () => 42);
    const failed = await pool.submit(async () => {
      throw new Error('boom');
    });

    expect(ok).toEqual({ ok: true, value: 42 });
    expect(failed?.ok).toBe(false);
  });

  it('should never run more tasks than its concurrency', async () => {
    const pool = new WorkerPool('test', 2);
    let running = 0;
    let peak = 0;
    const task = async (): Promise<void> => {
      running += 1;
      peak = Math.max(peak, running);
      await sleep(5);
      running -= 1;
    };

    await Promise.all([1, 2, 3, 4, 5].map(() => pool.submit(task)));

    expect(peak).toBe(2);
  });

  it('should drop queued tasks once stopped', async () => {
    const control = new PipelineControl();
    const pool = new WorkerPool('test', 1, control);
    const gate = deferred();
    const started: string[] = [];

    const first = pool.submit(async () => {
      started.push('first');
      await gate.promise;
      return 'first';
    });
    const second = pool.submit(async () => {
      started.push('second');
      return 'second';
    });
    await sleep(5);
    control.stop();
    gate.resolve();

    expect(await first).toEqual({ ok: true, value: 'first' });
    expect(await second).toBeUndefined();
    expect(started).toEqual(['first']);
  });

  it('should hold tasks while paused', async () => {
    const control = new PipelineControl();
    const pool = new WorkerPool('test', 1, control);
    control.pause();
    let ran = false;

    const result = pool.submit(async () => {
      ran = true;
    });
    await sleep(10);
    expect(ran).toBe(false);

    control.resume();
    await result;
    expect(ran).toBe(true);
  });

  it('should run tasks again once a paused control is reset', async () => {
    const control = new PipelineControl();
    const pool = new WorkerPool('test', 1, control);
    control.pause();

    control.reset();

    expect(control.paused).toBe(false);
    expect(await pool.submit(async () => 'ran')).toEqual({ ok: true, value: 'ran' });
  });

  it('should accept work again after a stopped control is reset', async () => {
    const control = new PipelineControl();
    const pool = new WorkerPool('test', 1, control);
    control.stop();

    control.reset();

    expect(control.stopped).toBe(false);
    expect(await pool.submit(async () => 'ran')).toEqual({ ok: true, value: 'ran' });
  });
});

describe('sleep', () => {
  it('should resolve false when aborted', async () => {
    const controller = new AbortController();
    const pending = sleep(5000, controller.signal);
    controller.abort();

    await expect(pending).resolves.toBe(false);
  });
});
