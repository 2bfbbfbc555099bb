import { readFile } from 'node:fs/promises';
import type { Job, JobStatus } from '../types/dispatch.js';
import type { Runtime } from './runtime.js';

// ── Help text ────────────────────────────────────────────────────────────────

const HELP_TEXT = `
Usage: relaycast [command] [options]

Commands:
  (none)                         Start the dispatch service and control plane API
  jobs [status]                  List jobs, optionally filtered by status
  report <jobId> [outputPath]    Export a job report
  import <name> <file>           Import a recipient set from a text file
  blacklist add <identifier>     Blacklist an identifier
  blacklist list                 Show the blacklist
  blacklist clear                Empty the blacklist
  logs [--follow|-f]             Print or follow today's log

Options:
  --help, -h                     Show this help message
  --json                         Machine-readable output (jobs only)

Examples:
  relaycast import spring-list data/recipients.txt
  relaycast jobs running
  relaycast report 1a2b3c4d
  relaycast blacklist add @someone
`.trim();

const KNOWN_COMMANDS = new Set(['jobs', 'report', 'import', 'blacklist', 'logs']);

const JOB_STATUSES: readonly JobStatus[] = ['pending', 'running', 'paused', 'completed', 'cancelled', 'failed'];

function isJobStatus(value: string): value is JobStatus {
    return JOB_STATUSES.some((status) => status === value);
}

/** One line per job: id, status, progress and name. */
export function formatJobLine(job: Job): string {
    const done = job.sentCount + job.skippedCount;
    return `${job.id}  ${job.status.padEnd(9)}  ${done}/${job.totalTargets}  ${job.name}`;
}

// ── Command handlers ─────────────────────────────────────────────────────────

/**
 * Handle `--help` or `-h` flags.
 * Returns `true` when the flag was found.
 */
export function handleHelpCli(argv: string[]): boolean {
    if (!argv.includes('--help') && !argv.includes('-h')) return false;

    console.log(HELP_TEXT);
    process.exitCode = 0;
    return true;
}

/**
 * Guard against unknown or mistyped top-level commands.
 * Returns `true` and sets a non-zero exit code when an unknown command is detected.
 */
export function handleUnknownCommand(argv: string[]): boolean {
    const command = argv[0];
    if (command === undefined || KNOWN_COMMANDS.has(command) || command.startsWith('--')) {
        return false;
    }

    console.error(`[Relaycast] Unknown command: '${command}'`);
    console.error(`Run 'relaycast --help' to see available commands.`);
    process.exitCode = 1;
    return true;
}

/**
 * Handle the `jobs` command.
 * Returns `true` when the command was recognized and handled.
 */
export function handleJobsCli(argv: string[], runtime: Pick<Runtime, 'manager'>): boolean {
    if (argv[0] !== 'jobs') return false;

    const filter = argv.slice(1).find((arg) => !arg.startsWith('--'));
    if (filter !== undefined && !isJobStatus(filter)) {
        console.error(`[Relaycast] Unknown status '${filter}'. Expected one of: ${JOB_STATUSES.join(', ')}.`);
        process.exitCode = 1;
        return true;
    }

    const jobs = runtime.manager.list(filter);
    if (argv.includes('--json')) {
        console.log(JSON.stringify(jobs, null, 2));
    } else if (jobs.length === 0) {
        console.log('No jobs.');
    } else {
        jobs.forEach((job) => console.log(formatJobLine(job)));
    }
    process.exitCode = 0;
    return true;
}

/** Handle `report <jobId> [outputPath]`. */
export async function handleReportCli(argv: string[], runtime: Pick<Runtime, 'manager'>): Promise<boolean> {
    if (argv[0] !== 'report') return false;

    const [, jobId, outputPath] = argv;
    if (!jobId) {
        console.error('[Relaycast] Usage: relaycast report <jobId> [outputPath]');
        process.exitCode = 1;
        return true;
    }

    try {
        const report = await runtime.manager.exportReport(jobId, outputPath);
        console.log(report.content);
        console.log(`\nReport written to ${report.path}`);
        process.exitCode = 0;
    } catch (error) {
        console.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
    return true;
}

/** Handle `import <name> <file>`. */
export async function handleImportCli(argv: string[], runtime: Pick<Runtime, 'recipients'>): Promise<boolean> {
    if (argv[0] !== 'import') return false;

    const [, name, file] = argv;
    if (!name || !file) {
        console.error('[Relaycast] Usage: relaycast import <name> <file>');
        process.exitCode = 1;
        return true;
    }

    try {
        const text = await readFile(file, 'utf8');
        const result = runtime.recipients.importFromText(name, text);
        console.log(
            `Imported set ${result.setId}: ${result.importedCount} recipients ` +
            `(${result.totalCount} read, ${result.duplicateCount} duplicate, ${result.blacklistedCount} blacklisted).`,
        );
        process.exitCode = 0;
    } catch (error) {
        console.error(`[Relaycast] Import failed: ${error instanceof Error ? error.message : String(error)}`);
        process.exitCode = 1;
    }
    return true;
}

/** Handle `blacklist add|list|clear`. */
export function handleBlacklistCli(argv: string[], runtime: Pick<Runtime, 'recipients'>): boolean {
    if (argv[0] !== 'blacklist') return false;

    const [, subcommand, identifier] = argv;
    switch (subcommand) {
        case 'add':
            if (!identifier) {
                console.error('[Relaycast] Usage: relaycast blacklist add <identifier>');
                process.exitCode = 1;
                return true;
            }
            console.log(runtime.recipients.addToBlacklist(identifier) ? `Blacklisted ${identifier}.` : `${identifier} is already blacklisted.`);
            break;
        case 'list':
            runtime.recipients.listBlacklist().forEach((entry) => console.log(entry));
            break;
        case 'clear':
            console.log(`Removed ${runtime.recipients.clearBlacklist()} entries.`);
            break;
        default:
            console.error('[Relaycast] Usage: relaycast blacklist <add|list|clear>');
            process.exitCode = 1;
            return true;
    }

    process.exitCode = 0;
    return true;
}
