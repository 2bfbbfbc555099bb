import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { clearConfigCacheForTests } from '../../src/config/json-config.js';
import { createRuntime, type Runtime } from '../../src/core/runtime.js';

vi.mock('../../src/utils/logger.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../src/utils/logger.js')>()),
  logThought: vi.fn().mockResolvedValue(undefined),
}));

describe('createRuntime', () => {
  let tempDir: string;
  let runtime: Runtime | undefined;

  beforeEach(async () => {
    tempDir = await mkdtemp(path.join(os.tmpdir(), 'relaycast-runtime-'));
    vi.stubEnv('RELAYCAST_CONFIG_PATH', path.join(tempDir, 'relaycast.json'));
    vi.stubEnv('RELAYCAST_REPORT_DIR', path.join(tempDir, 'reports'));
    vi.stubEnv('MESSAGE_DELAY_MIN', '0');
    vi.stubEnv('MESSAGE_DELAY_MAX', '0');
    vi.stubEnv('ACCOUNT_SWITCH_DELAY', '0');
    vi.stubEnv('MESSAGES_PER_ACCOUNT', '2');
    clearConfigCacheForTests();
  });

  afterEach(async () => {
    await runtime?.close();
    runtime = undefined;
    vi.unstubAllEnvs();
    clearConfigCacheForTests();
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loads the workspace and runs a dry-run job to completion', async () => {
    runtime = createRuntime({ dbPath: ':memory:', workspaceFile: 'data/workspace.json' });
    expect(runtime.workspace).toMatchObject({ found: true, routes: 2, identities: 2, templates: 3 });

    const imported = runtime.recipients.importFromText('launch', '@amy\nben\ncat\n');
    const job = runtime.manager.create({
      name: 'Launch',
      templateId: 'welcome',
      recipientSetId: imported.setId,
      identityHandles: ['sender-alpha', 'sender-bravo'],
    });

    runtime.manager.start(job.id);
    const finished = await runtime.manager.whenSettled(job.id);

    // sender-bravo's route is inactive, so every rotation lands back on sender-alpha
    expect(finished).toMatchObject({ status: 'completed', totalTargets: 3, successCount: 3, failedCount: 0 });
    expect(runtime.identities.get('sender-alpha')?.sentCount).toBe(3);
    expect(runtime.identities.get('sender-bravo')?.sentCount).toBe(0);
    expect(runtime.recipients.getRecipients(imported.setId)[0]).toMatchObject({ resolvedId: 'handle:amy', resolvedHandle: 'amy' });
  });

  it('starts with empty registries when the workspace file is missing', () => {
    runtime = createRuntime({ dbPath: ':memory:', workspaceFile: path.join(tempDir, 'none.json') });

    expect(runtime.workspace.found).toBe(false);
    expect(runtime.identities.list()).toEqual([]);
  });
});
