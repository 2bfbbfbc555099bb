import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase, type SqliteDatabase } from '../../src/services/db.js';
import {
  parseRecipientIdentifier,
  SqliteRecipientStore,
  toBlacklistKey,
} from '../../src/services/recipient-store.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

describe('parseRecipientIdentifier', () => {
  it('classifies numeric ids, phones and handles', () => {
    expect(parseRecipientIdentifier('12345')).toEqual({ identifier: '12345', kind: 'numeric-id' });
    expect(parseRecipientIdentifier('+1 555-010-0199')).toEqual({ identifier: '+15550100199', kind: 'phone' });
    expect(parseRecipientIdentifier('  @Alice ')).toEqual({ identifier: 'Alice', kind: 'handle' });
    expect(parseRecipientIdentifier('+12')).toEqual({ identifier: '+12', kind: 'handle' });
  });

  it('normalizes blacklist keys', () => {
    expect(toBlacklistKey(' @Dave ')).toBe('dave');
  });
});

describe('SqliteRecipientStore', () => {
  let db: SqliteDatabase;
  let store: SqliteRecipientStore;

  beforeEach(() => {
    db = openDatabase(':memory:');
    store = new SqliteRecipientStore(db);
  });

  afterEach(() => {
    db.close();
  });

  it('imports text, dropping comments, duplicates and blacklisted entries', () => {
    store.addToBlacklist('carol');

    const result = store.importFromText(
      'spring',
      '# exported list\n@alice\nALICE\n\nbob\n12345\n+1 555 010 0199\ncarol\n',
      'set-a',
    );

    expect(result).toEqual({
      setId: 'set-a',
      name: 'spring',
      totalCount: 6,
      importedCount: 4,
      duplicateCount: 1,
      blacklistedCount: 1,
    });
    expect(store.getRecipients('set-a').map((r) => [r.position, r.identifier, r.kind])).toEqual([
      [0, 'alice', 'handle'],
      [1, 'bob', 'handle'],
      [2, '12345', 'numeric-id'],
      [3, '+15550100199', 'phone'],
    ]);
    expect(store.getStats('set-a')).toEqual({ total: 4, valid: 4, invalid: 0, handles: 2, numericIds: 1, phones: 1 });
  });

  it('yields valid recipients from a position and keeps positions after invalidation', () => {
    store.importFromText('spring', 'alice\nbob\ncarol\ndave', 'set-a');

    store.markInvalid('set-a', 'BOB', 'Could not resolve recipient');

    expect([...store.validTargetsInOrder('set-a', 1)].map((r) => `${r.position}:${r.identifier}`)).toEqual([
      '2:carol',
      '3:dave',
    ]);
    expect(store.countValid('set-a')).toBe(3);
    expect(store.countValid('set-a', 3)).toBe(1);
    expect(store.getRecipients('set-a')[1]).toMatchObject({ isValid: false, errorReason: 'Could not resolve recipient' });
    expect(store.getStats('set-a')).toMatchObject({ total: 4, valid: 3, invalid: 1 });
  });

  it('pages through large sets while the caller writes between yields', () => {
    const lines = Array.from({ length: 250 }, (_, i) => `user${i + 1}`).join('\n');
    store.importFromText('bulk', lines, 'set-bulk');

    const seen: string[] = [];
    for (const recipient of store.validTargetsInOrder('set-bulk')) {
      if (recipient.position === 0) store.markInvalid('set-bulk', 'user150', 'Blacklisted');
      seen.push(recipient.identifier);
    }

    expect(seen).toHaveLength(249);
    expect(seen[0]).toBe('user1');
    expect(seen[248]).toBe('user250');
    expect(seen).not.toContain('user150');
  });

  it('stores what a recipient resolved to', () => {
    store.importFromText('spring', 'alice', 'set-a');

    store.markResolved('set-a', 0, { id: '9001', handle: 'alice_real' });

    expect(store.getRecipients('set-a')[0]).toMatchObject({ resolvedId: '9001', resolvedHandle: 'alice_real' });
  });

  it('blacklists across every set', () => {
    store.importFromText('one', 'dave\nerin', 'set-1');
    store.importFromText('two', 'Dave', 'set-2');

    expect(store.addToBlacklist('@Dave')).toBe(true);
    expect(store.addToBlacklist('dave')).toBe(false);

    expect(store.isBlacklisted('DAVE')).toBe(true);
    expect(store.countValid('set-1')).toBe(1);
    expect(store.countValid('set-2')).toBe(0);
    expect(store.getRecipients('set-2')[0]?.errorReason).toBe('Blacklisted');
    expect(store.listBlacklist()).toEqual(['dave']);

    expect(store.clearBlacklist()).toBe(1);
    expect(store.isBlacklisted('dave')).toBe(false);
  });

  it('lists and removes sets', () => {
    store.importFromText('one', 'dave\nerin', 'set-1');
    store.importFromText('two', 'frank', 'set-2');

    expect(store.hasSet('set-1')).toBe(true);
    expect(store.listSets().map((set) => [set.id, set.name, set.sourceCount, set.recipientCount])).toEqual([
      ['set-1', 'one', 2, 2],
      ['set-2', 'two', 1, 1],
    ]);

    expect(store.removeSet('set-1')).toBe(true);
    expect(store.hasSet('set-1')).toBe(false);
    expect(store.getRecipients('set-1')).toEqual([]);
    expect(store.removeSet('set-1')).toBe(false);
  });

  it('rejects a duplicate set id without storing partial recipients', () => {
    store.importFromText('one', 'dave', 'set-1');

    expect(() => store.importFromText('again', 'erin', 'set-1')).toThrow();
    expect(store.getRecipients('set-1').map((r) => r.identifier)).toEqual(['dave']);
  });
});
