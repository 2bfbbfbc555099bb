import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { JobRepository } from '../types/collaborators.js';
import type { CreateJobInput, Job, JobStatus } from '../types/dispatch.js';
import type { DispatchEvent, DispatchEventListener } from '../types/dispatch-events.js';
import type { StartScheduler } from '../types/scheduler.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';
import type { DispatchEngine } from './dispatch-engine.js';
import {
    JobCapacityError,
    JobNotFoundError,
    JobStateError,
    JobValidationError,
} from './job-errors.js';

export interface JobManagerOptions {
    engine: DispatchEngine;
    repository: JobRepository;
    scheduler: StartScheduler;
    maxConcurrentJobs?: number;
    reportDir?: string;
    now?: () => Date;
}

export interface JobReport {
    path: string;
    content: string;
}

export interface RestoreSummary {
    paused: string[];
    started: string[];
    /** Overdue jobs waiting for a free execution slot. */
    deferred: string[];
    scheduled: string[];
}

const DEFAULT_MAX_CONCURRENT_JOBS = 3;
const DEFAULT_REPORT_DIR = 'reports';

function pad(value: number): string {
    return String(value).padStart(2, '0');
}

function reportStamp(date: Date): string {
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

/** Plain-text summary of a job: timestamps, counters and the error log. */
export function renderJobReport(job: Job): string {
    const lines = [
        `Task Report: ${job.name}`,
        `Task ID: ${job.id}`,
        `Status: ${job.status}`,
        `Created: ${job.createdAt}`,
        `Started: ${job.startedAt ?? 'N/A'}`,
        `Completed: ${job.completedAt ?? 'N/A'}`,
        '',
        '=== Statistics ===',
        `Total Targets: ${job.totalTargets}`,
        `Sent: ${job.sentCount}`,
        `Success: ${job.successCount}`,
        `Failed: ${job.failedCount}`,
        `Skipped: ${job.skippedCount}`,
        '',
    ];

    if (job.errorLog.length > 0) {
        lines.push('=== Errors ===');
        for (const entry of job.errorLog) {
            lines.push(`- ${entry.recipient ?? 'job'}: ${entry.reason}`);
        }
    }

    return lines.join('\n');
}

/**
 * Owns job records and the executions running them.
 *
 * Starting a job launches it on the dispatch engine in the background; the
 * manager keeps the live job object until the execution settles, so reads
 * always reflect current progress.
 */
export class JobManager {
    readonly #engine: DispatchEngine;
    readonly #repository: JobRepository;
    readonly #scheduler: StartScheduler;
    readonly #maxConcurrentJobs: number;
    readonly #reportDir: string;
    readonly #now: () => Date;

    readonly #live = new Map<string, Job>();
    readonly #runs = new Map<string, Promise<Job>>();
    readonly #listeners = new Set<DispatchEventListener>();
    /** Due jobs that hit the concurrency limit; started in order as executions settle. */
    readonly #deferred = new Set<string>();

    constructor(options: JobManagerOptions) {
        this.#engine = options.engine;
        this.#repository = options.repository;
        this.#scheduler = options.scheduler;
        this.#maxConcurrentJobs = options.maxConcurrentJobs ?? DEFAULT_MAX_CONCURRENT_JOBS;
        this.#reportDir = options.reportDir ?? DEFAULT_REPORT_DIR;
        this.#now = options.now ?? (() => new Date());

        this.#engine.on((event) => this.#emit(event));
    }

    /** Subscribe to engine progress plus `job:settled`. Returns an unsubscribe function. */
    subscribe(listener: DispatchEventListener): () => void {
        this.#listeners.add(listener);
        return () => {
            this.#listeners.delete(listener);
        };
    }

    create(input: CreateJobInput): Job {
        const name = input.name.trim();
        if (!name) throw new JobValidationError('Job name must not be empty.');
        if (!input.templateId) throw new JobValidationError('A template id is required.');
        if (!input.recipientSetId) throw new JobValidationError('A recipient set id is required.');
        if (input.identityHandles.length === 0) throw new JobValidationError('At least one identity handle is required.');
        if (input.scheduledAt && Number.isNaN(input.scheduledAt.getTime())) {
            throw new JobValidationError('scheduledAt is not a valid date.');
        }

        const job: Job = {
            id: randomUUID().slice(0, 8),
            name,
            status: 'pending',
            identityHandles: [...input.identityHandles],
            recipientSetId: input.recipientSetId,
            templateId: input.templateId,
            totalTargets: 0,
            sentCount: 0,
            successCount: 0,
            failedCount: 0,
            skippedCount: 0,
            recipientCursor: 0,
            identityCursor: 0,
            createdAt: this.#now().toISOString(),
            scheduledAt: input.scheduledAt?.toISOString(),
            errorLog: [],
        };

        this.#repository.save(job);
        if (input.scheduledAt && input.scheduledAt.getTime() > this.#now().getTime()) {
            this.#schedule(job);
        }

        void logThought(`[JobManager] Created job '${job.id}' (${job.name}).`);
        return job;
    }

    get(jobId: string): Job | undefined {
        return this.#live.get(jobId) ?? this.#repository.get(jobId);
    }

    list(status?: JobStatus): Job[] {
        const jobs = this.#repository.list().map((job) => this.#live.get(job.id) ?? job);
        return status ? jobs.filter((job) => job.status === status) : jobs;
    }

    /** Number of executions currently in flight. */
    get activeCount(): number {
        return this.#runs.size;
    }

    /**
     * Start a pending or paused job in the background and return at once.
     * A paused job whose execution is still live is resumed instead.
     */
    start(jobId: string): Job {
        const job = this.#require(jobId);
        if (job.status !== 'pending' && job.status !== 'paused') {
            throw new JobStateError(jobId, job.status, 'start');
        }

        if (this.#engine.isActive(jobId)) {
            this.#engine.resume(jobId);
            return job;
        }

        if (this.#runs.size >= this.#maxConcurrentJobs) {
            throw new JobCapacityError(this.#maxConcurrentJobs);
        }

        this.#scheduler.unregister(jobId);
        this.#deferred.delete(jobId);
        this.#launch(job);
        return job;
    }

    pause(jobId: string): Job {
        const job = this.#require(jobId);
        if (!this.#engine.pause(jobId)) {
            throw new JobStateError(jobId, job.status, 'pause');
        }
        void logThought(`[JobManager] Paused job '${jobId}'.`);
        return job;
    }

    /** Resume a paused job. A paused job with no live execution is relaunched from its cursor. */
    resume(jobId: string): Job {
        const job = this.#require(jobId);
        if (this.#engine.resume(jobId)) {
            void logThought(`[JobManager] Resumed job '${jobId}'.`);
            return job;
        }
        if (job.status === 'paused') {
            return this.start(jobId);
        }
        throw new JobStateError(jobId, job.status, 'resume');
    }

    cancel(jobId: string): Job {
        const job = this.#require(jobId);

        if (this.#engine.cancel(jobId)) {
            void logThought(`[JobManager] Cancelled job '${jobId}'.`);
            return job;
        }

        if (job.status === 'paused') {
            job.status = 'cancelled';
            job.completedAt = this.#now().toISOString();
            this.#repository.save(job);
            this.#emit({ type: 'job:status', jobId, status: 'cancelled', timestamp: job.completedAt });
            void logThought(`[JobManager] Cancelled job '${jobId}' (no live execution).`);
            return job;
        }

        throw new JobStateError(jobId, job.status, 'cancel');
    }

    /** Cancel the job when it is running or paused, drop its timer, and remove its record. */
    async delete(jobId: string): Promise<void> {
        const job = this.#require(jobId);
        this.#scheduler.unregister(jobId);
        this.#deferred.delete(jobId);

        if (job.status === 'running' || job.status === 'paused') {
            this.cancel(jobId);
        }
        await this.#runs.get(jobId);

        this.#repository.delete(jobId);
        void logThought(`[JobManager] Deleted job '${jobId}'.`);
    }

    /** Resolves with the job once its current execution (if any) has settled. */
    async whenSettled(jobId: string): Promise<Job | undefined> {
        const run = this.#runs.get(jobId);
        if (run) return run;
        return this.get(jobId);
    }

    /** Write a text report built from the persisted record. */
    async exportReport(jobId: string, outputPath?: string): Promise<JobReport> {
        const job = this.#repository.get(jobId);
        if (!job) throw new JobNotFoundError(jobId);

        const content = renderJobReport(job);
        const target = path.resolve(outputPath ?? path.join(this.#reportDir, `report_${job.id}_${reportStamp(this.#now())}.txt`));

        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, content, 'utf8');

        void logThought(`[JobManager] Exported report for job '${jobId}' to ${target}.`);
        return { path: target, content };
    }

    /**
     * Reconcile persisted jobs after a restart: jobs left `running` become
     * `paused`, scheduled `pending` jobs start when due or get their timer back.
     */
    restore(): RestoreSummary {
        const summary: RestoreSummary = { paused: [], started: [], deferred: [], scheduled: [] };
        const now = this.#now().getTime();

        for (const job of this.#repository.list()) {
            if (this.#live.has(job.id)) continue;

            if (job.status === 'running') {
                job.status = 'paused';
                this.#repository.save(job);
                summary.paused.push(job.id);
                continue;
            }

            if (job.status !== 'pending' || !job.scheduledAt) continue;

            if (new Date(job.scheduledAt).getTime() <= now) {
                try {
                    this.start(job.id);
                    summary.started.push(job.id);
                } catch (err) {
                    if (err instanceof JobCapacityError) {
                        this.#defer(job.id);
                        summary.deferred.push(job.id);
                        continue;
                    }
                    const reason = scrubSensitiveText(err instanceof Error ? err.message : String(err));
                    console.warn(`[JobManager] Could not start overdue job '${job.id}': ${reason}`);
                }
            } else {
                this.#schedule(job);
                summary.scheduled.push(job.id);
            }
        }

        void logThought(
            `[JobManager] Restored jobs: ${summary.paused.length} paused, ` +
            `${summary.started.length} started, ${summary.deferred.length} deferred, ${summary.scheduled.length} scheduled.`,
        );
        return summary;
    }

    /** Stop all timers and pause every running execution. */
    shutdown(): void {
        this.#scheduler.stopAll();
        this.#deferred.clear();
        for (const jobId of this.#live.keys()) {
            this.#engine.pause(jobId);
        }
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #require(jobId: string): Job {
        const job = this.get(jobId);
        if (!job) throw new JobNotFoundError(jobId);
        return job;
    }

    #launch(job: Job): void {
        this.#live.set(job.id, job);

        const run = this.#engine
            .execute(job)
            .catch(async (err: unknown) => {
                const reason = scrubSensitiveText(err instanceof Error ? err.message : String(err));
                console.error(`[JobManager] Execution of job '${job.id}' was rejected: ${reason}`);
                await logThought(`[JobManager] Execution of job '${job.id}' was rejected: ${reason}`);
                return job;
            })
            .then((finished) => {
                this.#live.delete(finished.id);
                this.#runs.delete(finished.id);
                this.#emit({ type: 'job:settled', jobId: finished.id, status: finished.status });
                this.#startDeferred();
                return finished;
            });

        this.#runs.set(job.id, run);
    }

    #schedule(job: Job): void {
        if (!job.scheduledAt) return;

        this.#scheduler.scheduleOnce({
            id: job.id,
            runAt: new Date(job.scheduledAt),
            description: `Start job '${job.name}'`,
            handler: () => {
                const current = this.get(job.id);
                if (current?.status !== 'pending') return;
                try {
                    this.start(job.id);
                } catch (err) {
                    if (!(err instanceof JobCapacityError)) throw err;
                    this.#defer(job.id);
                }
            },
        });
        void logThought(`[JobManager] Scheduled job '${job.id}' for ${job.scheduledAt}.`);
    }

    #defer(jobId: string): void {
        this.#deferred.add(jobId);
        void logThought(`[JobManager] Job '${jobId}' is due but the concurrency limit is reached; deferred.`);
    }

    #startDeferred(): void {
        for (const jobId of this.#deferred) {
            if (this.#runs.size >= this.#maxConcurrentJobs) return;
            this.#deferred.delete(jobId);

            if (this.get(jobId)?.status !== 'pending') continue;
            try {
                this.start(jobId);
            } catch (err) {
                const reason = scrubSensitiveText(err instanceof Error ? err.message : String(err));
                console.warn(`[JobManager] Could not start deferred job '${jobId}': ${reason}`);
            }
        }
    }

    #emit(event: DispatchEvent): void {
        for (const listener of this.#listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[JobManager] Event listener threw an error:', listenerErr);
            }
        }
    }
}
