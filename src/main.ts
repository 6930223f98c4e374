#!/usr/bin/env node
import { loadConfig } from './config/config.js';
import { createPipeline } from './pipeline/create-pipeline.js';
import { errorMessage } from './errors.js';
import log from './logger.js';
import type { PipelineEvent } from './types/pipeline.js';

const USAGE = `Usage: takeout-migrator <config.yaml> [command]

Commands:
  run                  check the environment, then migrate every pending archive (default)
  check                run the preflight health checks only
  proceed              accept current failures and clean held-back archives
  retry-failed [id..]  reset failed items and archives for another attempt
  reacquire <id>       delete a corrupted archive's local copy and download it again
  skip <id>            give up on a corrupted archive
  status               print counts by phase
  diagnostics          write a support bundle of state, reports and logs

While running, SIGINT/SIGTERM stop gracefully and SIGUSR2 pauses or resumes.`;

const printEvent = (event: PipelineEvent): void => {
  switch (event.type) {
    case 'phase':
      log.info('== %s', event.phase);
      break;
    case 'archive':
      log.verbose('[%s] %s', event.archive.name, event.message);
      break;
    case 'media':
      log.debug('[%s] %s', event.item.relativePath, event.message);
      break;
    case 'mode':
      log.warn('Run mode is now %s', event.mode);
      break;
    case 'error':
      log.verbose('%s %s: %s (%s)', event.unitKind, event.id, event.error.message, event.kind);
      break;
  }
};

const main = async (argv: string[]): Promise<number> => {
  const [configPath, command = 'run', ...args] = argv;
  if (!configPath || configPath === '--help' || configPath === '-h') {
    process.stdout.write(`${USAGE}\n`);
    return configPath ? 0 : 1;
  }

  const config = await loadConfig(configPath);
  const pipeline = await createPipeline(config);
  const { runner, store, health } = pipeline;
  const onSignal = (): void => runner.stop();
  const onTogglePause = (): void => {
    if (runner.getStatus().paused) {
      runner.resume();
      log.info('Resumed');
    } else {
      runner.pause();
      log.info('Paused; send SIGUSR2 again to resume');
    }
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  process.on('SIGUSR2', onTogglePause);

  try {
    switch (command) {
      case 'check':
        return (await health.checkAll()).passed ? 0 : 1;
      case 'run': {
        if (!(await health.checkAll()).passed) {
          log.error('Preflight checks failed; nothing was migrated');
          return 1;
        }
        const summary = await runner.run(printEvent);
        for (const failure of summary.failures) {
          log.warn('FAILED %s %s [%s]: %s', failure.unitKind, failure.label, failure.kind, failure.message);
        }
        log.info('Report written to %s', summary.reportPath);
        if (summary.mode === 'paused-for-retries') {
          log.warn('Cleanup is on hold. Run "retry-failed" or "proceed" once the failures are reviewed.');
        }
        return summary.failures.length > 0 ? 2 : 0;
      }
      case 'proceed':
        log.info('Cleaned %d archives', await runner.proceed(printEvent));
        return 0;
      case 'retry-failed':
        log.info('Reset %d units', (await runner.retryFailed(args.length ? args : undefined)).length);
        return 0;
      case 'reacquire':
      case 'skip': {
        const [archiveId] = args;
        if (!archiveId) {
          process.stderr.write(`${command} needs an archive id\n`);
          return 1;
        }
        const done = command === 'skip' ? await runner.skip(archiveId) : await runner.reacquire(archiveId);
        if (!done) {
          log.warn('Archive %s is not corrupted; nothing to do', archiveId);
        }
        return done ? 0 : 1;
      }
      case 'status':
        process.stdout.write(
          `${JSON.stringify({ meta: store.meta, archives: store.archiveCounts(), media: store.mediaCounts() }, null, 2)}\n`
        );
        return 0;
      case 'diagnostics':
        log.info('Diagnostics bundle written to %s', await runner.createDiagnosticsBundle(configPath));
        return 0;
      default:
        process.stderr.write(`Unknown command "${command}"\n${USAGE}\n`);
        return 1;
    }
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    process.off('SIGUSR2', onTogglePause);
    await pipeline.close();
  }
};

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.error('Migration aborted: %s', errorMessage(error));
    process.exitCode = 1;
  });
