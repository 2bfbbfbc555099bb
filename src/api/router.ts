import { createServer, type Server } from 'node:http';
import express, { type Express } from 'express';
import { handleHealth } from './handlers/health.js';
import {
    handleCreateJob,
    handleDeleteJob,
    handleGetJob,
    handleJobAction,
    handleJobReport,
    handleListJobs,
} from './handlers/jobs.js';
import {
    handleAddToBlacklist,
    handleImportRecipients,
    handleListBlacklist,
    handleListRecipientSets,
    handleRecipientStats,
} from './handlers/recipients.js';
import { requestLogger, requireSignature, setRawRequestBody } from './shared.js';
import type { JobManager } from '../services/job-manager.js';
import type { SqliteRecipientStore } from '../services/recipient-store.js';
import { getConfigValue } from '../config/json-config.js';
import { logThought } from '../utils/logger.js';

export interface ApiServerDeps {
    manager: JobManager;
    recipients: SqliteRecipientStore;
}

const DEFAULT_PORT = 3100;

/**
 * Build the control plane app.
 *
 * Endpoints:
 *   GET    /health                    — Process health and job counts
 *   GET    /jobs                      — List jobs (?status=)
 *   GET    /jobs/:id                  — Read one job
 *   POST   /jobs                      — Create a job (signed)
 *   POST   /jobs/:id/start            — Start or relaunch (signed)
 *   POST   /jobs/:id/pause            — Pause (signed)
 *   POST   /jobs/:id/resume           — Resume (signed)
 *   POST   /jobs/:id/cancel           — Cancel (signed)
 *   DELETE /jobs/:id                  — Cancel and remove (signed)
 *   GET    /jobs/:id/report           — Export the text report
 *   GET    /recipient-sets            — List recipient sets
 *   POST   /recipient-sets            — Import a recipient set (signed)
 *   GET    /recipient-sets/:id/stats  — Per-set statistics
 *   GET    /blacklist                 — Blacklisted identifiers
 *   POST   /blacklist                 — Blacklist an identifier (signed)
 */
export function createApiApp(deps: ApiServerDeps): Express {
    const app = express();

    // ── Global Middleware ───────────────────────────────────────────────────────
    app.use(express.json({ verify: setRawRequestBody }));
    app.use(requestLogger);

    const jobDeps = { manager: deps.manager };
    const recipientDeps = { recipients: deps.recipients };

    // ── Routes ──────────────────────────────────────────────────────────────────
    app.get('/health', handleHealth(jobDeps));

    app.get('/jobs', handleListJobs(jobDeps));
    app.get('/jobs/:id', handleGetJob(jobDeps));
    app.get('/jobs/:id/report', handleJobReport(jobDeps));
    app.post('/jobs', requireSignature, handleCreateJob(jobDeps));
    app.post('/jobs/:id/start', requireSignature, handleJobAction(jobDeps, 'start'));
    app.post('/jobs/:id/pause', requireSignature, handleJobAction(jobDeps, 'pause'));
    app.post('/jobs/:id/resume', requireSignature, handleJobAction(jobDeps, 'resume'));
    app.post('/jobs/:id/cancel', requireSignature, handleJobAction(jobDeps, 'cancel'));
    app.delete('/jobs/:id', requireSignature, handleDeleteJob(jobDeps));

    app.get('/recipient-sets', handleListRecipientSets(recipientDeps));
    app.get('/recipient-sets/:id/stats', handleRecipientStats(recipientDeps));
    app.post('/recipient-sets', requireSignature, handleImportRecipients(recipientDeps));
    app.get('/blacklist', handleListBlacklist(recipientDeps));
    app.post('/blacklist', requireSignature, handleAddToBlacklist(recipientDeps));

    return app;
}

/** Create the app and listen on `API_PORT`. */
export function startApiServer(deps: ApiServerDeps): Server {
    const port = Number(getConfigValue('API_PORT')) || DEFAULT_PORT;
    const server = createServer(createApiApp(deps));

    server.listen(port, () => {
        console.log(`[API] Control plane listening on http://localhost:${port}`);
        void logThought(`[API] Control plane started on port ${port}.`);
    });

    return server;
}
