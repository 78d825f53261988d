export { BackupEngine, summarizeSnapshot } from './services/backup-engine.js';
export type {
  BackupEngineOptions,
  CreateSnapshotOptions,
  ListSnapshotsOptions,
  PruneOptions,
  RestoreSnapshotOptions,
} from './services/backup-engine.js';
export { SnapshotStore, CATALOG_FILE_NAME } from './services/snapshot-store.js';
export { detectChanges, foldChainState, type DetectChangesOptions } from './services/change-detector.js';
export { buildArchive, type BuildArchiveOptions } from './services/archive-builder.js';
export { applyRetention, type ApplyRetentionOptions } from './services/retention-manager.js';
export { restoreChain, type RestoreChainOptions } from './services/restore-engine.js';
export { verifyArchive } from './services/verifier.js';
export { JobScheduler } from './services/job-scheduler.js';
export { ScheduledBackupService, type ScheduledBackupOptions } from './services/scheduled-backup.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
  readConfig,
  writeConfig,
  toRetentionPolicy,
  type BackupConfig,
} from './config/json-config.js';
export { BackupError, ExtractionFailureError, isBackupError, type BackupErrorKind } from './types/errors.js';
export { ExclusionMatcher } from './utils/exclusion.js';
export { parseDuration, formatBytes } from './utils/duration.js';
export { createLogger, logger, setLogLevel, type Logger, type LogLevel } from './utils/logger.js';
export { SNAPSHOT_ID_PATTERN } from './types/backup.js';
export type * from './types/backup.js';
export type * from './types/scheduler.js';
