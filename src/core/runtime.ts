import { openDatabase, type SqliteDatabase } from '../services/db.js';
import { DispatchEngine } from '../services/dispatch-engine.js';
import { IdentityRegistry } from '../services/identity-pool.js';
import { JobManager } from '../services/job-manager.js';
import { JobScheduler } from '../services/job-scheduler.js';
import { SqliteJobRepository } from '../services/job-store.js';
import { SqliteRecipientStore } from '../services/recipient-store.js';
import { RouteRegistry } from '../services/route-pool.js';
import { TemplateRegistry } from '../services/template-store.js';
import { getConfigValue, loadDispatchSettings, loadMaxConcurrentJobs } from '../config/json-config.js';
import { loadWorkspace, type WorkspaceLoadSummary } from '../config/workspace.js';
import { dryRunConnector } from '../interfaces/dry-run-channel.js';
import type { ChannelConnector } from '../types/collaborators.js';

export interface Runtime {
    db: SqliteDatabase;
    routes: RouteRegistry;
    identities: IdentityRegistry;
    templates: TemplateRegistry;
    recipients: SqliteRecipientStore;
    jobs: SqliteJobRepository;
    scheduler: JobScheduler;
    engine: DispatchEngine;
    manager: JobManager;
    workspace: WorkspaceLoadSummary;
    close(): Promise<void>;
}

export interface RuntimeOptions {
    dbPath?: string;
    workspaceFile?: string;
    connector?: ChannelConnector;
}

/** Wire stores, registries, the engine and the job manager from configuration. */
export function createRuntime(options: RuntimeOptions = {}): Runtime {
    const db = openDatabase(options.dbPath ?? getConfigValue('RELAYCAST_DB_PATH'));
    const routes = new RouteRegistry();
    const identities = new IdentityRegistry(routes, options.connector ?? dryRunConnector);
    const templates = new TemplateRegistry();
    const recipients = new SqliteRecipientStore(db);
    const jobs = new SqliteJobRepository(db);
    const scheduler = new JobScheduler();

    const workspace = loadWorkspace(
        options.workspaceFile ?? getConfigValue('RELAYCAST_WORKSPACE_FILE') ?? 'data/workspace.json',
        { routes, identities, templates },
    );

    const engine = new DispatchEngine({
        identities,
        recipients,
        templates,
        repository: jobs,
        settings: loadDispatchSettings(),
    });
    const manager = new JobManager({
        engine,
        repository: jobs,
        scheduler,
        maxConcurrentJobs: loadMaxConcurrentJobs(),
        reportDir: getConfigValue('RELAYCAST_REPORT_DIR'),
    });

    return {
        db,
        routes,
        identities,
        templates,
        recipients,
        jobs,
        scheduler,
        engine,
        manager,
        workspace,
        async close() {
            manager.shutdown();
            await identities.releaseAll();
            db.close();
        },
    };
}
