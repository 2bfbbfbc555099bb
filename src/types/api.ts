import type { JobStatus } from './dispatch.js';

export interface ApiEnvelope<T = unknown> {
    ok: boolean;
    data?: T;
    error?: string;
    correlationId?: string;
    timestamp: string;
}

// ── Health ──────────────────────────────────────────────────────────────────

export interface HealthData {
    status: 'ok' | 'degraded';
    uptimeSec: number;
    memoryUsageMb: number;
    jobs: {
        active: number;
        byStatus: Record<JobStatus, number>;
    };
}

// ── Requests ────────────────────────────────────────────────────────────────

export interface CreateJobRequest {
    name: string;
    templateId: string;
    recipientSetId: string;
    identityHandles: string[];
    /** ISO-8601 start time; omitted for manual start. */
    scheduledAt?: string;
}

export interface ImportRecipientsRequest {
    name: string;
    /** One identifier per line. */
    text: string;
}
