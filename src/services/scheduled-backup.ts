import path from 'node:path';
import { toRetentionPolicy, type BackupConfig } from '../config/json-config.js';
import type { Snapshot } from '../types/backup.js';
import { errorMessage } from '../types/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { BackupEngine } from './backup-engine.js';
import type { JobScheduler } from './job-scheduler.js';

export interface ScheduledBackupOptions {
  engine: BackupEngine;
  scheduler: JobScheduler;
  config: BackupConfig;
  logger?: Logger;
}

export interface ScheduledRunRecord {
  startedAt: Date;
  snapshotId: string | null;
  error: string | null;
}

export function scheduledJobId(sourcePath: string): string {
  return `backup:${path.resolve(sourcePath)}`;
}

/**
 * Registers a cron job that snapshots the configured source and applies
 * the configured retention after each successful run.
 */
export class ScheduledBackupService {
  readonly #engine: BackupEngine;
  readonly #scheduler: JobScheduler;
  readonly #config: BackupConfig;
  readonly #logger: Logger;
  #lastRun: ScheduledRunRecord | null = null;

  constructor(options: ScheduledBackupOptions) {
    this.#engine = options.engine;
    this.#scheduler = options.scheduler;
    this.#config = options.config;
    this.#logger = options.logger ?? createLogger('scheduled-backup');
  }

  get jobId(): string {
    return scheduledJobId(this.#config.schedule.sourcePath);
  }

  get lastRun(): ScheduledRunRecord | null {
    return this.#lastRun;
  }

  /** Register the job. Returns false when scheduling is disabled or already registered. */
  start(): boolean {
    const { schedule } = this.#config;
    if (!schedule.enabled) {
      this.#logger.info('Scheduled backups are disabled');
      return false;
    }
    if (!schedule.sourcePath || !schedule.destinationPath) {
      throw new Error('[ScheduledBackup] schedule.sourcePath and schedule.destinationPath are required when scheduling is enabled.');
    }
    if (this.#scheduler.getJob(this.jobId)) {
      return false;
    }

    this.#scheduler.register({
      id: this.jobId,
      cronExpression: schedule.cronExpression,
      description: `${schedule.type} backup of ${schedule.sourcePath} into ${schedule.destinationPath}`,
      handler: async () => {
        await this.runOnce();
      },
      autoStart: true,
    });
    return true;
  }

  stop(): void {
    this.#scheduler.unregister(this.jobId);
  }

  /** One backup run with the configured defaults and retention. Errors propagate to the scheduler. */
  async runOnce(): Promise<Snapshot> {
    const { schedule, defaults, retention } = this.#config;
    const record: ScheduledRunRecord = { startedAt: new Date(), snapshotId: null, error: null };
    this.#lastRun = record;

    try {
      const snapshot = await this.#engine.create({
        sourcePath: schedule.sourcePath,
        destinationPath: schedule.destinationPath,
        type: schedule.type,
        exclusions: defaults.exclusions,
        compression: defaults.compression,
        verifyContent: defaults.verifyContent,
        retention: toRetentionPolicy(retention) ?? undefined,
      });
      record.snapshotId = snapshot.id;
      return snapshot;
    } catch (error) {
      record.error = errorMessage(error);
      this.#logger.error({ err: error, sourcePath: schedule.sourcePath }, 'Scheduled backup failed');
      throw error;
    }
  }
}
