import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
  formatJobLine,
  handleBlacklistCli,
  handleHelpCli,
  handleImportCli,
  handleJobsCli,
  handleReportCli,
  handleUnknownCommand,
} from '../../src/core/cli.js';
import { openDatabase, type SqliteDatabase } from '../../src/services/db.js';
import { DispatchEngine } from '../../src/services/dispatch-engine.js';
import { JobManager } from '../../src/services/job-manager.js';
import { SqliteRecipientStore } from '../../src/services/recipient-store.js';
import {
  FakeIdentityPool,
  FakeTemplates,
  InMemoryJobRepository,
  InMemoryRecipients,
  ScriptedNetwork,
  buildJob,
} from '../harness/dispatch-fakes.js';

vi.mock('../../src/utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/utils/logger.js')>()),
  logThought: vi.fn().mockResolvedValue(undefined),
}));

// Capture console output during tests
let consoleOutput: string[] = [];
let consoleErrors: string[] = [];

beforeEach(() => {
  consoleOutput = [];
  consoleErrors = [];
  vi.spyOn(console, 'log').mockImplementation((...args) => {
    consoleOutput.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args) => {
    consoleErrors.push(args.join(' '));
  });
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

function managerWith(repository: InMemoryJobRepository, reportDir = 'reports'): JobManager {
  const engine = new DispatchEngine({
    identities: new FakeIdentityPool([], new ScriptedNetwork()),
    recipients: new InMemoryRecipients([]),
    templates: new FakeTemplates(),
    repository,
    settings: { minDelayMs: 0, maxDelayMs: 0, identitySwitchDelayMs: 0, messagesPerIdentity: 1 },
  });
  return new JobManager({
    engine,
    repository,
    scheduler: { scheduleOnce: () => undefined, unregister: () => false, stopAll: () => undefined },
    reportDir,
  });
}

// ── handleHelpCli / handleUnknownCommand ─────────────────────────────────────

describe('handleHelpCli', () => {
  it('returns false when --help is not present', () => {
    expect(handleHelpCli([])).toBe(false);
    expect(handleHelpCli(['jobs'])).toBe(false);
  });

  it('returns true and prints help when --help or -h is present', () => {
    expect(handleHelpCli(['--help'])).toBe(true);
    expect(handleHelpCli(['jobs', '-h'])).toBe(true);
    expect(consoleOutput[0]?.split('\n')[0]).toBe('Usage: relaycast [command] [options]');
    expect(process.exitCode).toBe(0);
  });
});

describe('handleUnknownCommand', () => {
  it('lets known commands, flags and no command through', () => {
    expect(handleUnknownCommand([])).toBe(false);
    expect(handleUnknownCommand(['jobs'])).toBe(false);
    expect(handleUnknownCommand(['logs', '-f'])).toBe(false);
    expect(handleUnknownCommand(['--json'])).toBe(false);
  });

  it('rejects mistyped commands', () => {
    expect(handleUnknownCommand(['jbos'])).toBe(true);
    expect(consoleErrors).toEqual([
      "[Relaycast] Unknown command: 'jbos'",
      "Run 'relaycast --help' to see available commands.",
    ]);
    expect(process.exitCode).toBe(1);
  });
});

// ── jobs / report ────────────────────────────────────────────────────────────

describe('formatJobLine', () => {
  it('shows id, padded status, progress and name', () => {
    const line = formatJobLine(
      buildJob({ id: 'a1b2c3d4', status: 'running', totalTargets: 10, sentCount: 3, skippedCount: 1 }),
    );
    expect(line).toBe('a1b2c3d4  running    4/10  Spring launch');
  });
});

describe('handleJobsCli', () => {
  let repository: InMemoryJobRepository;

  beforeEach(() => {
    repository = new InMemoryJobRepository();
  });

  it('ignores other commands', () => {
    expect(handleJobsCli(['report'], { manager: managerWith(repository) })).toBe(false);
  });

  it('prints one line per job, filtered by status', () => {
    repository.save(buildJob({ id: 'a', status: 'completed', totalTargets: 2, sentCount: 2 }));
    repository.save(buildJob({ id: 'b', status: 'pending' }));

    expect(handleJobsCli(['jobs', 'completed'], { manager: managerWith(repository) })).toBe(true);
    expect(consoleOutput).toEqual(['a  completed  2/2  Spring launch']);
    expect(process.exitCode).toBe(0);
  });

  it('prints JSON with --json and a notice when empty', () => {
    repository.save(buildJob({ id: 'a' }));
    const manager = managerWith(repository);

    handleJobsCli(['jobs', '--json'], { manager });
    expect(JSON.parse(consoleOutput[0] ?? '[]')).toHaveLength(1);

    handleJobsCli(['jobs', 'failed'], { manager });
    expect(consoleOutput[1]).toBe('No jobs.');
  });

  it('rejects unknown statuses', () => {
    handleJobsCli(['jobs', 'stuck'], { manager: managerWith(repository) });

    expect(consoleErrors[0]).toBe(
      "[Relaycast] Unknown status 'stuck'. Expected one of: pending, running, paused, completed, cancelled, failed.",
    );
    expect(process.exitCode).toBe(1);
  });
});

describe('handleReportCli', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'relaycast-cli-report-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('prints the report and where it was written', async () => {
    const repository = new InMemoryJobRepository();
    repository.save(buildJob({ id: 'done', status: 'completed' }));
    const outputPath = path.join(tempDir, 'done.txt');

    expect(await handleReportCli(['report', 'done', outputPath], { manager: managerWith(repository) })).toBe(true);

    expect(consoleOutput[0]?.split('\n')[0]).toBe('Task Report: Spring launch');
    expect(consoleOutput[1]).toBe(`\nReport written to ${outputPath}`);
    expect(process.exitCode).toBe(0);
  });

  it('fails for a missing id or an unknown job', async () => {
    const manager = managerWith(new InMemoryJobRepository(), tempDir);

    await handleReportCli(['report'], { manager });
    expect(consoleErrors[0]).toBe('[Relaycast] Usage: relaycast report <jobId> [outputPath]');

    await handleReportCli(['report', 'ghost'], { manager });
    expect(consoleErrors[1]).toBe("[JobManager] Job 'ghost' does not exist.");
    expect(process.exitCode).toBe(1);
  });
});

// ── import / blacklist ───────────────────────────────────────────────────────

describe('recipient commands', () => {
  let db: SqliteDatabase;
  let recipients: SqliteRecipientStore;
  let tempDir: string;

  beforeEach(async () => {
    db = openDatabase(':memory:');
    recipients = new SqliteRecipientStore(db);
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'relaycast-cli-import-'));
  });

  afterEach(async () => {
    db.close();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('imports a recipient file', async () => {
    const file = path.join(tempDir, 'list.txt');
    await writeFile(file, 'amy\nben\nAMY\n', 'utf8');

    expect(await handleImportCli(['import', 'spring', file], { recipients })).toBe(true);

    expect(consoleOutput[0]).toMatch(/^Imported set [0-9a-f]{8}: 2 recipients \(3 read, 1 duplicate, 0 blacklisted\)\.$/);
    expect(recipients.listSets().map((set) => set.name)).toEqual(['spring']);
  });

  it('reports unreadable files', async () => {
    await handleImportCli(['import', 'spring', path.join(tempDir, 'missing.txt')], { recipients });

    expect(consoleErrors[0]).toMatch(/^\[Relaycast\] Import failed: ENOENT/);
    expect(process.exitCode).toBe(1);
  });

  it('adds, lists and clears blacklist entries', () => {
    handleBlacklistCli(['blacklist', 'add', '@Dave'], { recipients });
    handleBlacklistCli(['blacklist', 'add', 'dave'], { recipients });
    handleBlacklistCli(['blacklist', 'list'], { recipients });
    handleBlacklistCli(['blacklist', 'clear'], { recipients });

    expect(consoleOutput).toEqual(['Blacklisted @Dave.', 'dave is already blacklisted.', 'dave', 'Removed 1 entries.']);
    expect(process.exitCode).toBe(0);
  });

  it('prints usage for unknown blacklist subcommands', () => {
    handleBlacklistCli(['blacklist', 'purge'], { recipients });

    expect(consoleErrors).toEqual(['[Relaycast] Usage: relaycast blacklist <add|list|clear>']);
    expect(process.exitCode).toBe(1);
  });
});
