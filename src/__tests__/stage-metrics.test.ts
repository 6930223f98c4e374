import { describe, expect, it } from 'vitest';
import { StageMetrics } from '../services/stage-metrics.js';

describe('StageMetrics', () => {
  it('should tally attempts, bytes and the span of each stage', () => {
    let now = 1000;
    const metrics = new StageMetrics(() => now);

    const startedAt = metrics.now();
    now = 1400;
    metrics.record('upload', { ok: true, startedAt, bytes: 300 });
    now = 2000;
    metrics.record('upload', { ok: false, startedAt: 1200, bytes: 99 });

    const upload = metrics.summarize().find((stage) => stage.stage === 'upload');
    expect(upload).toEqual({
      stage: 'upload',
      attempts: 2,
      succeeded: 1,
      failed: 1,
      bytes: 300,
      durationMs: 1000,
      successRate: 0.5,
      throughputPerSecond: 1
    });
  });

  it('should report every stage, with zeros for stages that did not run', () => {
    const metrics = new StageMetrics(() => 0);

    const stages = metrics.summarize();

    expect(stages.map((stage) => stage.stage)).toEqual(['download', 'extract', 'metadata', 'upload', 'cleanup']);
    expect(stages[0]).toEqual({
      stage: 'download',
      attempts: 0,
      succeeded: 0,
      failed: 0,
      bytes: 0,
      durationMs: 0,
      successRate: 0,
      throughputPerSecond: 0
    });
  });
});
