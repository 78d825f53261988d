/** Status of a registered scheduled job. */
export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

/** Configuration required to register a new repeating job. */
export interface JobConfig {
    /** Unique identifier for this job (e.g. 'backup:/srv/data'). */
    id: string;
    /** A cron expression defining the schedule (node-cron format). */
    cronExpression: string;
    description: string;
    /** The async callback to execute on each tick. */
    handler: () => Promise<void> | void;
    /**
     * If true, the job will start immediately upon registration.
     * @default true
     */
    autoStart?: boolean;
}

/** Read-only view of a registered job's state. */
export interface JobState {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
    /** Ticks dropped because the previous run had not finished. */
    skippedRuns: number;
}

/**
 * Event types emitted by the job scheduler.
 * - 'job:start': fired just before a job handler executes.
 * - 'job:done': fired after a job handler completes successfully.
 * - 'job:error': fired when a job handler throws.
 * - 'job:skipped': fired when a tick arrives while the job is still running.
 */
export type SchedulerEventType = 'job:start' | 'job:done' | 'job:error' | 'job:skipped';

export interface SchedulerEvent {
    type: SchedulerEventType;
    jobId: string;
    timestamp: Date;
    error?: string;
}

export type SchedulerEventListener = (event: SchedulerEvent) => void;
