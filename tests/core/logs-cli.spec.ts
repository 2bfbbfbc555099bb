import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { handleLogsCli } from '../../src/core/logs-cli.js';
import { getDailyLogPath } from '../../src/utils/logger.js';

const watchMock = vi.hoisted(() => vi.fn(() => ({ close: () => undefined })));

vi.mock('node:fs', async (importOriginal) => ({
  ...(await importOriginal<typeof import('node:fs')>()),
  watch: watchMock,
}));

describe('handleLogsCli', () => {
  let tempDir = '';

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'relaycast-logs-cli-'));
    vi.stubEnv('RELAYCAST_LOG_DIR', tempDir);
    process.exitCode = undefined;
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
    watchMock.mockClear();
    process.exitCode = undefined;
  });

  it('ignores other commands', async () => {
    expect(await handleLogsCli(['jobs'])).toBe(false);
  });

  it('prints current daily logs when available', async () => {
    await mkdir(tempDir, { recursive: true });
    await writeFile(getDailyLogPath(), '- [09:00:00] [JobManager] Created job \'a1b2c3d4\' (Spring).\n', 'utf8');

    const writes: string[] = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk));
      return true;
    });

    const handled = await handleLogsCli(['logs']);
    expect(handled).toBe(true);
    expect(process.exitCode).toBe(0);
    expect(writes.join('')).toBe('- [09:00:00] [JobManager] Created job \'a1b2c3d4\' (Spring).\n');
  });

  it('returns failure when no log file exists for today', async () => {
    const errors: string[] = [];
    vi.spyOn(console, 'error').mockImplementation((...args) => errors.push(args.join(' ')));

    const handled = await handleLogsCli(['logs']);
    expect(handled).toBe(true);
    expect(process.exitCode).toBe(1);
    expect(errors).toEqual([`[Relaycast Logs] No logs found for today at ${getDailyLogPath()}.`]);
  });

  it('starts follow mode and watches the log file', async () => {
    await writeFile(getDailyLogPath(), '', 'utf8');

    const logs: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((...args) => logs.push(args.join(' ')));

    const handled = await handleLogsCli(['logs', '--follow']);
    expect(handled).toBe(true);
    expect(logs).toEqual([`[Relaycast Logs] Following ${getDailyLogPath()}...\n`]);
    expect(watchMock).toHaveBeenCalledTimes(1);
  });
});
