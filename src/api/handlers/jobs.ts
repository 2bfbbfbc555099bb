import type { Request, Response } from 'express';
import type { JobManager } from '../../services/job-manager.js';
import type { CreateJobInput, JobStatus } from '../../types/dispatch.js';
import { mapError, sendError, sendOk } from '../shared.js';

export interface JobDeps {
    manager: JobManager;
}

type JobAction = 'start' | 'pause' | 'resume' | 'cancel';

const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'paused', 'completed', 'cancelled', 'failed'];

function isJobStatus(value: unknown): value is JobStatus {
    return JOB_STATUSES.some((status) => status === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCreateJob(body: unknown): CreateJobInput | string {
    if (!isRecord(body)) return 'Request body must be a JSON object.';

    const { name, templateId, recipientSetId, identityHandles, scheduledAt } = body;
    if (typeof name !== 'string' || !name.trim()) return "'name' must be a non-empty string.";
    if (typeof templateId !== 'string' || !templateId) return "'templateId' must be a string.";
    if (typeof recipientSetId !== 'string' || !recipientSetId) return "'recipientSetId' must be a string.";
    if (
        !Array.isArray(identityHandles) ||
        identityHandles.length === 0 ||
        !identityHandles.every((handle): handle is string => typeof handle === 'string' && handle.length > 0)
    ) {
        return "'identityHandles' must be a non-empty array of strings.";
    }

    let scheduled: Date | undefined;
    if (scheduledAt !== undefined && scheduledAt !== null) {
        if (typeof scheduledAt !== 'string' || Number.isNaN(Date.parse(scheduledAt))) {
            return "'scheduledAt' must be an ISO-8601 timestamp.";
        }
        scheduled = new Date(scheduledAt);
    }

    return { name, templateId, recipientSetId, identityHandles, scheduledAt: scheduled };
}

/** GET /jobs — List jobs, optionally filtered by `?status=`. */
export function handleListJobs(deps: JobDeps) {
    return (req: Request, res: Response): void => {
        const status: unknown = req.query.status;
        if (status !== undefined && !isJobStatus(status)) {
            sendError(res, `Unknown status filter. Expected one of: ${JOB_STATUSES.join(', ')}.`, 400);
            return;
        }
        sendOk(res, { jobs: deps.manager.list(status) });
    };
}

/** GET /jobs/:id — Read one job. */
export function handleGetJob(deps: JobDeps) {
    return (req: Request, res: Response): void => {
        const job = deps.manager.get(req.params.id ?? '');
        if (!job) {
            sendError(res, `Job '${req.params.id}' does not exist.`, 404);
            return;
        }
        sendOk(res, job);
    };
}

/** POST /jobs — Create a pending job. */
export function handleCreateJob(deps: JobDeps) {
    return (req: Request, res: Response): void => {
        const parsed = parseCreateJob(req.body);
        if (typeof parsed === 'string') {
            sendError(res, parsed, 400);
            return;
        }

        try {
            sendOk(res, deps.manager.create(parsed), 201);
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}

/** POST /jobs/:id/{start,pause,resume,cancel} */
export function handleJobAction(deps: JobDeps, action: JobAction) {
    return (req: Request, res: Response): void => {
        const jobId = req.params.id ?? '';
        try {
            const job = deps.manager[action](jobId);
            sendOk(res, job, action === 'start' ? 202 : 200);
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}

/** DELETE /jobs/:id — Cancel if needed, then remove the record. */
export function handleDeleteJob(deps: JobDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        const jobId = req.params.id ?? '';
        try {
            await deps.manager.delete(jobId);
            sendOk(res, { deleted: jobId });
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}

/** GET /jobs/:id/report — Write the text report and return it. */
export function handleJobReport(deps: JobDeps) {
    return async (req: Request, res: Response): Promise<void> => {
        try {
            sendOk(res, await deps.manager.exportReport(req.params.id ?? ''));
        } catch (err) {
            const { status, message } = mapError(err);
            sendError(res, message, status);
        }
    };
}
