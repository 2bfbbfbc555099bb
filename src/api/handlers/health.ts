import type { Request, Response } from 'express';
import type { HealthData } from '../../types/api.js';
import type { JobStatus } from '../../types/dispatch.js';
import type { JobManager } from '../../services/job-manager.js';
import { sendOk } from '../shared.js';

const startTime = Date.now();

export interface HealthDeps {
    manager: JobManager;
}

/** GET /health — Process health and job counts by status. */
export function handleHealth(deps: HealthDeps) {
    return (_req: Request, res: Response): void => {
        const byStatus: Record<JobStatus, number> = {
            pending: 0,
            running: 0,
            paused: 0,
            completed: 0,
            cancelled: 0,
            failed: 0,
        };
        for (const job of deps.manager.list()) {
            byStatus[job.status]++;
        }

        const data: HealthData = {
            status: 'ok',
            uptimeSec: Math.floor((Date.now() - startTime) / 1000),
            memoryUsageMb: Math.round(process.memoryUsage().rss / 1024 / 1024),
            jobs: {
                active: deps.manager.activeCount,
                byStatus,
            },
        };

        sendOk(res, data);
    };
}
