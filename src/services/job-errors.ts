import type { JobStatus } from '../types/dispatch.js';

export class JobNotFoundError extends Error {
    readonly jobId: string;

    constructor(jobId: string) {
        super(`[JobManager] Job '${jobId}' does not exist.`);
        this.name = 'JobNotFoundError';
        this.jobId = jobId;
    }
}

/** An operation is not allowed from the job's current status. */
export class JobStateError extends Error {
    readonly jobId: string;
    readonly status: JobStatus;

    constructor(jobId: string, status: JobStatus, operation: string, component = 'JobManager') {
        super(`[${component}] Cannot ${operation} job '${jobId}' while it is ${status}.`);
        this.name = 'JobStateError';
        this.jobId = jobId;
        this.status = status;
    }
}

export class JobAlreadyRunningError extends Error {
    readonly jobId: string;

    constructor(jobId: string) {
        super(`[DispatchEngine] Job '${jobId}' already has a live execution.`);
        this.name = 'JobAlreadyRunningError';
        this.jobId = jobId;
    }
}

export class JobCapacityError extends Error {
    constructor(limit: number) {
        super(`[JobManager] Concurrent job limit reached (${limit}).`);
        this.name = 'JobCapacityError';
    }
}

/** Raised by the identity pool when no channel can be opened for an identity. */
export class IdentityUnavailableError extends Error {
    readonly handle: string;

    constructor(handle: string, reason: string) {
        super(`[IdentityPool] Identity '${handle}' is unavailable: ${reason}`);
        this.name = 'IdentityUnavailableError';
        this.handle = handle;
    }
}

/** Input to a job operation is malformed (missing name, no identities, bad schedule). */
export class JobValidationError extends Error {
    constructor(message: string) {
        super(`[JobManager] ${message}`);
        this.name = 'JobValidationError';
    }
}
