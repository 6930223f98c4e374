import log from '../logger.js';
import type { StageName, StageSummary } from '../types/pipeline.js';

export const STAGES: StageName[] = ['download', 'extract', 'metadata', 'upload', 'cleanup'];

interface StageTally {
  attempts: number;
  succeeded: number;
  failed: number;
  bytes: number;
  firstStartedAt?: number;
  lastFinishedAt?: number;
}

const emptyTally = (): StageTally => ({ attempts: 0, succeeded: 0, failed: 0, bytes: 0 });

/**
 * Per-stage counters for one run. Stages overlap, so a stage's duration is
 * the span from its first attempt starting to its last attempt finishing.
 */
export class StageMetrics {
  private readonly tallies = new Map<StageName, StageTally>(STAGES.map((stage) => [stage, emptyTally()]));

  constructor(private readonly clock: () => number = Date.now) {}

  now(): number {
    return this.clock();
  }

  record(stage: StageName, entry: { ok: boolean; startedAt: number; bytes?: number }): void {
    const tally = this.tallies.get(stage) ?? emptyTally();
    const finishedAt = this.clock();
    tally.attempts += 1;
    if (entry.ok) {
      tally.succeeded += 1;
      tally.bytes += Math.max(0, entry.bytes ?? 0);
    } else {
      tally.failed += 1;
    }
    tally.firstStartedAt = Math.min(tally.firstStartedAt ?? entry.startedAt, entry.startedAt);
    tally.lastFinishedAt = Math.max(tally.lastFinishedAt ?? finishedAt, finishedAt);
    this.tallies.set(stage, tally);
  }

  summarize(): StageSummary[] {
    return STAGES.map((stage) => {
      const tally = this.tallies.get(stage) ?? emptyTally();
      const durationMs =
        tally.firstStartedAt !== undefined && tally.lastFinishedAt !== undefined
          ? tally.lastFinishedAt - tally.firstStartedAt
          : 0;
      return {
        stage,
        attempts: tally.attempts,
        succeeded: tally.succeeded,
        failed: tally.failed,
        bytes: tally.bytes,
        durationMs,
        successRate: tally.attempts > 0 ? tally.succeeded / tally.attempts : 0,
        throughputPerSecond: durationMs > 0 ? (tally.succeeded * 1000) / durationMs : 0
      };
    });
  }

  logSummary(): void {
    for (const stage of this.summarize()) {
      if (stage.attempts === 0) continue;
      log.info(
        'Stage %s: %d/%d succeeded, %d bytes in %dms',
        stage.stage,
        stage.succeeded,
        stage.attempts,
        stage.bytes,
        stage.durationMs
      );
    }
  }
}
