import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../../src/services/db.js';
import { SqliteJobRepository } from '../../src/services/job-store.js';
import { buildJob } from '../harness/dispatch-fakes.js';

describe('SqliteJobRepository', () => {
  let db: SqliteDatabase;
  let repository: SqliteJobRepository;

  beforeEach(() => {
    db = openDatabase(':memory:');
    repository = new SqliteJobRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('round-trips every field of a job', () => {
    const job = buildJob({
      status: 'paused',
      totalTargets: 10,
      sentCount: 4,
      successCount: 3,
      failedCount: 1,
      skippedCount: 2,
      recipientCursor: 6,
      identityCursor: 1,
      startedAt: '2024-03-05T09:01:00.000Z',
      scheduledAt: '2024-03-05T09:00:30.000Z',
      errorLog: [{ recipient: 'carol', reason: 'Recipient privacy settings', timestamp: '2024-03-05T09:02:00.000Z' }],
    });

    repository.save(job);

    expect(repository.get('job-1')).toEqual(job);
  });

  it('overwrites progress on later saves', () => {
    const job = buildJob();
    repository.save(job);

    job.status = 'completed';
    job.recipientCursor = 10;
    job.completedAt = '2024-03-05T10:00:00.000Z';
    repository.save(job);

    const stored = repository.get('job-1');
    expect(stored?.status).toBe('completed');
    expect(stored?.recipientCursor).toBe(10);
    expect(stored?.completedAt).toBe('2024-03-05T10:00:00.000Z');
    expect(repository.list()).toHaveLength(1);
  });

  it('lists in creation order and filters by status', () => {
    repository.save(buildJob({ id: 'b', createdAt: '2024-03-05T09:00:02.000Z', status: 'running' }));
    repository.save(buildJob({ id: 'a', createdAt: '2024-03-05T09:00:01.000Z' }));
    repository.save(buildJob({ id: 'c', createdAt: '2024-03-05T09:00:03.000Z' }));

    expect(repository.list().map((job) => job.id)).toEqual(['a', 'b', 'c']);
    expect(repository.list('pending').map((job) => job.id)).toEqual(['a', 'c']);
    expect(repository.list('failed')).toEqual([]);
  });

  it('reports whether a delete removed anything', () => {
    repository.save(buildJob());

    expect(repository.delete('job-1')).toBe(true);
    expect(repository.delete('job-1')).toBe(false);
    expect(repository.get('job-1')).toBeUndefined();
  });

  it('refuses rows with an unknown status', () => {
    repository.save(buildJob());
    db.prepare("UPDATE jobs SET status = 'exploded' WHERE id = 'job-1'").run();

    expect(() => repository.get('job-1')).toThrow("[JobStore] Job 'job-1' has unknown status 'exploded'.");
  });

  it('drops malformed error log entries', () => {
    repository.save(buildJob());
    db.prepare(`UPDATE jobs SET error_log = '[{"reason":"boom"}, 7, null]' WHERE id = 'job-1'`).run();

    expect(repository.get('job-1')?.errorLog).toEqual([{ recipient: null, reason: 'boom', timestamp: '' }]);
  });
});
