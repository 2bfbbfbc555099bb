#!/usr/bin/env node
import 'dotenv/config';
import {
    handleBlacklistCli,
    handleHelpCli,
    handleImportCli,
    handleJobsCli,
    handleReportCli,
    handleUnknownCommand,
} from './core/cli.js';
import { handleLogsCli } from './core/logs-cli.js';
import { createRuntime } from './core/runtime.js';
import { startApiServer } from './api/router.js';
import { logThought } from './utils/logger.js';

const argv = process.argv.slice(2);

// ── One-shot CLI commands (no service startup) ───────────────────────────────

if (handleHelpCli(argv)) {
    process.exit(process.exitCode ?? 0);
}

if (handleUnknownCommand(argv)) {
    process.exit(process.exitCode ?? 1);
}

if (await handleLogsCli(argv)) {
    // `logs --follow` keeps its watcher alive; everything else ends here.
    if (!argv.includes('--follow') && !argv.includes('-f')) {
        process.exit(process.exitCode ?? 0);
    }
} else if (argv.length > 0 && !argv[0]?.startsWith('--')) {
    const runtime = createRuntime();
    try {
        const handled =
            handleJobsCli(argv, runtime) ||
            (await handleReportCli(argv, runtime)) ||
            (await handleImportCli(argv, runtime)) ||
            handleBlacklistCli(argv, runtime);
        if (!handled) process.exitCode = 1;
    } finally {
        await runtime.close();
    }
    process.exit(process.exitCode ?? 0);
} else {
    // ── Service ──────────────────────────────────────────────────────────────
    const runtime = createRuntime();
    const { workspace } = runtime;

    if (workspace.found) {
        console.log(
            `[Relaycast] Loaded workspace ${workspace.path}: ${workspace.identities} identities, ` +
            `${workspace.routes} routes, ${workspace.templates} templates.`,
        );
    } else {
        console.warn(`[Relaycast] No workspace file at ${workspace.path}; starting with empty registries.`);
    }

    const restored = runtime.manager.restore();
    if (restored.paused.length > 0) {
        console.log(`[Relaycast] Jobs interrupted by the last shutdown are paused: ${restored.paused.join(', ')}`);
    }
    if (restored.deferred.length > 0) {
        console.log(`[Relaycast] Overdue jobs waiting for a free slot: ${restored.deferred.join(', ')}`);
    }

    runtime.manager.subscribe((event) => {
        if (event.type === 'job:settled') {
            console.log(`[Relaycast] Job '${event.jobId}' settled as ${event.status}.`);
        }
    });

    const server = startApiServer({ manager: runtime.manager, recipients: runtime.recipients });
    void logThought('[Relaycast] Dispatch service started.');

    const shutdown = (signal: string): void => {
        console.log(`[Relaycast] ${signal} received, shutting down.`);
        server.close();
        runtime
            .close()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                console.error('[Relaycast] Shutdown failed:', error instanceof Error ? error.message : String(error));
                process.exit(1);
            });
    };

    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}
