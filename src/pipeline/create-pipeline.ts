import { LibraryUploader } from '../adapters/library-uploader.js';
import { LocalFolderSource } from '../adapters/local-folder-source.js';
import { ExifToolTagger } from '../adapters/exiftool-tagger.js';
import { ZipExtractor } from '../adapters/zip-extractor.js';
import { ensureAppDirectories, getAppPaths } from '../config/app-paths.js';
import type { MigrationConfig } from '../config/config.js';
import { DiskBudgetGovernor, createDiskProbe } from '../services/disk-budget.js';
import { HealthChecker } from '../services/health-check.js';
import { StateStore } from '../services/state-store.js';
import { configureLogging } from '../logger.js';
import { PipelineRunner } from './pipeline-runner.js';

export interface Pipeline {
  runner: PipelineRunner;
  store: StateStore;
  health: HealthChecker;
  /** Flushes state and ends the exiftool process. */
  close(): Promise<void>;
}

/** Wires the production collaborators for `config`. */
export const createPipeline = async (config: MigrationConfig): Promise<Pipeline> => {
  const paths = getAppPaths(config.baseDir);
  await ensureAppDirectories(paths);
  configureLogging({ level: config.logging.level, file: config.logging.file ? paths.logFile : undefined });

  const { pipeline: options } = config;
  const store = await StateStore.open(paths.stateDir, { compactEvery: options.journalCompactEvery });
  const probe = createDiskProbe(paths.baseDir);
  const governor = new DiskBudgetGovernor(probe, options.disk);
  const source = new LocalFolderSource(config.sourceDir);
  const tagger = new ExifToolTagger(options.concurrency.metadata);
  const runner = new PipelineRunner({
    store,
    governor,
    source,
    extractor: new ZipExtractor(),
    uploader: new LibraryUploader(config.libraryDir),
    tagger,
    paths,
    options
  });

  return {
    runner,
    store,
    health: new HealthChecker({ paths, probe, disk: options.disk, source, tagger }),
    close: async () => {
      await tagger.close();
      await store.close();
    }
  };
};
