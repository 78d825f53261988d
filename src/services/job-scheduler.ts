import cron, { type ScheduledTask } from 'node-cron';
import { errorMessage } from '../types/errors.js';
import type {
    JobConfig,
    JobState,
    JobStatus,
    SchedulerEvent,
    SchedulerEventListener,
    SchedulerEventType,
} from '../types/scheduler.js';
import { createLogger, type Logger } from '../utils/logger.js';

/** Internal bookkeeping for a registered job. */
interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    running: boolean;
    /** Set once the job's schedule has been stopped. */
    stopped: boolean;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
    skippedRuns: number;
}

export interface JobSchedulerOptions {
    logger?: Logger;
    now?: () => Date;
}

/**
 * Named, repeating background jobs on top of `node-cron`, with event
 * emission, error isolation and runtime inspection. A job never overlaps
 * itself: a tick that arrives mid-run is dropped and reported.
 *
 * Usage:
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'nightly-backup',
 *   cronExpression: '0 2 * * *',
 *   description: 'Incremental backup of /srv/data',
 *   handler: async () => { … },
 * });
 * scheduler.startAll();
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();
    readonly #logger: Logger;
    readonly #now: () => Date;

    constructor(options: JobSchedulerOptions = {}) {
        this.#logger = options.logger ?? createLogger('job-scheduler');
        this.#now = options.now ?? (() => new Date());
    }

    /** Register a new repeating job. Throws if a job with the same ID already exists. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: null,
            status: 'idle',
            running: false,
            stopped: false,
            lastRunAt: null,
            lastError: null,
            runCount: 0,
            skippedRuns: 0,
        };

        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
    }

    /** Unregister and stop a job by ID. */
    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    start(jobId: string): void {
        this.#startJob(this.#require(jobId));
    }

    stop(jobId: string): void {
        this.#stopJob(this.#require(jobId));
    }

    startAll(): void {
        for (const entry of this.#jobs.values()) {
            this.#startJob(entry);
        }
    }

    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            this.#stopJob(entry);
        }
    }

    /**
     * Run a job's handler outside its schedule. Resolves once the run
     * finishes; handler errors are recorded on the job, not rethrown.
     */
    async runNow(jobId: string): Promise<JobState> {
        const entry = this.#require(jobId);
        await this.#executeJob(entry);
        return this.#toState(entry);
    }

    listJobs(): JobState[] {
        return [...this.#jobs.values()].map((entry) => this.#toState(entry));
    }

    /** Returns `undefined` if no job has this ID. */
    getJob(jobId: string): JobState | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#toState(entry) : undefined;
    }

    /** Subscribe to scheduler events. Returns an unsubscribe function. */
    on(eventType: SchedulerEventType, listener: SchedulerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #require(jobId: string): RegisteredJob {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        return entry;
    }

    #toState(entry: RegisteredJob): JobState {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
            runCount: entry.runCount,
            skippedRuns: entry.skippedRuns,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, () => this.#executeJob(entry));
        entry.stopped = false;
        if (!entry.running) {
            entry.status = 'idle';
        }
    }

    #stopJob(entry: RegisteredJob): void {
        if (!entry.task) return;
        entry.task.stop();
        entry.task = null;
        entry.stopped = true;
        if (!entry.running) {
            entry.status = 'stopped';
        }
    }

    async #executeJob(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        if (entry.running) {
            entry.skippedRuns += 1;
            this.#logger.warn({ jobId: config.id }, 'Previous run still in progress; skipping tick');
            this.#emit({ type: 'job:skipped', jobId: config.id, timestamp: this.#now() });
            return;
        }

        entry.running = true;
        entry.status = 'running';
        entry.lastRunAt = this.#now();
        entry.runCount += 1;
        this.#emit({ type: 'job:start', jobId: config.id, timestamp: this.#now() });

        try {
            this.#logger.debug({ jobId: config.id, cron: config.cronExpression }, 'Executing job');
            await config.handler();
            entry.status = entry.stopped ? 'stopped' : 'idle';
            entry.lastError = null;

            this.#emit({ type: 'job:done', jobId: config.id, timestamp: this.#now() });
        } catch (err: unknown) {
            const message = errorMessage(err);
            entry.status = 'error';
            entry.lastError = message;

            this.#logger.error({ jobId: config.id, err }, `Job '${config.id}' failed`);
            this.#emit({ type: 'job:error', jobId: config.id, timestamp: this.#now(), error: message });
        } finally {
            entry.running = false;
        }
    }

    #emit(event: SchedulerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                this.#logger.error({ err: listenerErr, event: event.type }, 'Scheduler event listener threw');
            }
        }
    }
}
