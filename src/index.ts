export * from './errors.js';
export * from './types/migration.js';
export * from './types/pipeline.js';
export * from './types/collaborators.js';
export { loadConfig, parseConfig, parseByteSize } from './config/config.js';
export type { MigrationConfig } from './config/config.js';
export { getAppPaths } from './config/app-paths.js';
export type { AppPaths } from './config/app-paths.js';
export { StateStore } from './services/state-store.js';
export type { TransitionResult, UnitPatch } from './services/state-store.js';
export { DiskBudgetGovernor, createDiskProbe } from './services/disk-budget.js';
export type { AdmissionResult, DiskProbe, Reservation } from './services/disk-budget.js';
export { RetryClassifier } from './services/retry-classifier.js';
export type { RetryDecision } from './services/retry-classifier.js';
export { AlbumResolver } from './services/album-resolver.js';
export { HealthChecker } from './services/health-check.js';
export type { HealthCheckResult, HealthReport } from './services/health-check.js';
export { StageMetrics } from './services/stage-metrics.js';
export { SidecarParser, locateSidecar } from './services/sidecar-parser.js';
export { PipelineRunner } from './pipeline/pipeline-runner.js';
export type { PipelineDependencies } from './pipeline/pipeline-runner.js';
export { createPipeline } from './pipeline/create-pipeline.js';
export type { Pipeline } from './pipeline/create-pipeline.js';
export { LocalFolderSource } from './adapters/local-folder-source.js';
export { ZipExtractor } from './adapters/zip-extractor.js';
export { ExifToolTagger } from './adapters/exiftool-tagger.js';
export { LibraryUploader } from './adapters/library-uploader.js';
export { configureLogging } from './logger.js';
