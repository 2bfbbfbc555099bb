import type { SqliteDatabase } from './db.js';
import type { JobRepository } from '../types/collaborators.js';
import type { Job, JobErrorEntry, JobStatus } from '../types/dispatch.js';

interface JobRow {
    id: string;
    name: string;
    status: string;
    identity_handles: string;
    recipient_set_id: string;
    template_id: string;
    total_targets: number;
    sent_count: number;
    success_count: number;
    failed_count: number;
    skipped_count: number;
    recipient_cursor: number;
    identity_cursor: number;
    created_at: string;
    started_at: string | null;
    completed_at: string | null;
    scheduled_at: string | null;
    error_log: string;
}

const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'paused', 'completed', 'cancelled', 'failed'];

function isJobStatus(value: string): value is JobStatus {
    return JOB_STATUSES.some((status) => status === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(raw: string, column: string, jobId: string): unknown {
    try {
        return JSON.parse(raw);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`[JobStore] Column '${column}' of job '${jobId}' is not valid JSON: ${reason}`);
    }
}

function parseHandles(raw: string, jobId: string): string[] {
    const value = parseJson(raw, 'identity_handles', jobId);
    if (!Array.isArray(value)) return [];
    return value.filter((item): item is string => typeof item === 'string');
}

function parseErrorLog(raw: string, jobId: string): JobErrorEntry[] {
    const value = parseJson(raw, 'error_log', jobId);
    if (!Array.isArray(value)) return [];

    const entries: JobErrorEntry[] = [];
    for (const item of value) {
        if (!isRecord(item)) continue;
        entries.push({
            recipient: typeof item.recipient === 'string' ? item.recipient : null,
            reason: typeof item.reason === 'string' ? item.reason : 'Unknown error',
            timestamp: typeof item.timestamp === 'string' ? item.timestamp : '',
        });
    }
    return entries;
}

function rowToJob(row: JobRow): Job {
    if (!isJobStatus(row.status)) {
        throw new Error(`[JobStore] Job '${row.id}' has unknown status '${row.status}'.`);
    }

    return {
        id: row.id,
        name: row.name,
        status: row.status,
        identityHandles: parseHandles(row.identity_handles, row.id),
        recipientSetId: row.recipient_set_id,
        templateId: row.template_id,
        totalTargets: row.total_targets,
        sentCount: row.sent_count,
        successCount: row.success_count,
        failedCount: row.failed_count,
        skippedCount: row.skipped_count,
        recipientCursor: row.recipient_cursor,
        identityCursor: row.identity_cursor,
        createdAt: row.created_at,
        startedAt: row.started_at ?? undefined,
        completedAt: row.completed_at ?? undefined,
        scheduledAt: row.scheduled_at ?? undefined,
        errorLog: parseErrorLog(row.error_log, row.id),
    };
}

/** SQLite-backed job records. Every `save` is an upsert of the whole record. */
export class SqliteJobRepository implements JobRepository {
    readonly #db: SqliteDatabase;

    constructor(db: SqliteDatabase) {
        this.#db = db;
    }

    save(job: Job): void {
        this.#db
            .prepare(`
                INSERT INTO jobs (
                    id, name, status, identity_handles, recipient_set_id, template_id,
                    total_targets, sent_count, success_count, failed_count, skipped_count,
                    recipient_cursor, identity_cursor, created_at, started_at, completed_at,
                    scheduled_at, error_log, updated_at
                )
                VALUES (
                    @id, @name, @status, @identityHandles, @recipientSetId, @templateId,
                    @totalTargets, @sentCount, @successCount, @failedCount, @skippedCount,
                    @recipientCursor, @identityCursor, @createdAt, @startedAt, @completedAt,
                    @scheduledAt, @errorLog, CURRENT_TIMESTAMP
                )
                ON CONFLICT(id) DO UPDATE SET
                    name = excluded.name,
                    status = excluded.status,
                    identity_handles = excluded.identity_handles,
                    total_targets = excluded.total_targets,
                    sent_count = excluded.sent_count,
                    success_count = excluded.success_count,
                    failed_count = excluded.failed_count,
                    skipped_count = excluded.skipped_count,
                    recipient_cursor = excluded.recipient_cursor,
                    identity_cursor = excluded.identity_cursor,
                    started_at = excluded.started_at,
                    completed_at = excluded.completed_at,
                    scheduled_at = excluded.scheduled_at,
                    error_log = excluded.error_log,
                    updated_at = CURRENT_TIMESTAMP
            `)
            .run({
                id: job.id,
                name: job.name,
                status: job.status,
                identityHandles: JSON.stringify(job.identityHandles),
                recipientSetId: job.recipientSetId,
                templateId: job.templateId,
                totalTargets: job.totalTargets,
                sentCount: job.sentCount,
                successCount: job.successCount,
                failedCount: job.failedCount,
                skippedCount: job.skippedCount,
                recipientCursor: job.recipientCursor,
                identityCursor: job.identityCursor,
                createdAt: job.createdAt,
                startedAt: job.startedAt ?? null,
                completedAt: job.completedAt ?? null,
                scheduledAt: job.scheduledAt ?? null,
                errorLog: JSON.stringify(job.errorLog),
            });
    }

    get(jobId: string): Job | undefined {
        const row = this.#db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?').get(jobId);
        return row ? rowToJob(row) : undefined;
    }

    list(status?: JobStatus): Job[] {
        const rows = status
            ? this.#db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE status = ? ORDER BY created_at ASC, rowid ASC').all(status)
            : this.#db.prepare<[], JobRow>('SELECT * FROM jobs ORDER BY created_at ASC, rowid ASC').all();
        return rows.map(rowToJob);
    }

    delete(jobId: string): boolean {
        const result = this.#db.prepare('DELETE FROM jobs WHERE id = ?').run(jobId);
        return result.changes > 0;
    }
}
