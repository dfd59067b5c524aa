import { beforeEach, describe, expect, it, vi } from 'vitest';
import { openDatabase, type DB } from '@/lib/db';
import { CredentialStore } from '@/lib/credential-store';
import { deactivateCredential, importCredentials, listCredentials } from '@/lib/credential-admin';
import type { CredentialImport } from '@/types';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const credential = (n: number, overrides: Partial<CredentialImport> = {}): CredentialImport => ({
  identity: `user-${n}@example.com`,
  secret: 'test-secret',
  externalUID: `uid-${n}`,
  externalKey: `key-${n}`,
  issuedAt: '2026-02-01T00:00:00.000Z',
  expiresAt: '2026-04-01T00:00:00.000Z',
  ...overrides,
});

const snapshot = (db: DB) => JSON.stringify(db.prepare('SELECT * FROM credentials ORDER BY id').all());

describe('CredentialStore', () => {
  let db: DB;
  let store: CredentialStore;

  beforeEach(() => {
    db = openDatabase();
    store = new CredentialStore(db, () => NOW);
  });

  it('returns null from an empty pool', () => {
    expect(store.checkoutNext()).toBeNull();
    expect(store.activeCount()).toBe(0);
  });

  it('visits every credential once before wrapping around', () => {
    importCredentials(db, [credential(1), credential(2), credential(3)], NOW);

    const uids = Array.from({ length: 7 }, () => store.checkoutNext()?.externalUID);

    expect(uids).toEqual(['uid-1', 'uid-2', 'uid-3', 'uid-1', 'uid-2', 'uid-3', 'uid-1']);
  });

  it('skips expired and deactivated credentials without touching them', () => {
    importCredentials(
      db,
      [
        credential(1),
        credential(2, { expiresAt: '2026-02-15T00:00:00.000Z' }),
        credential(3, { active: false }),
        credential(4, { expiresAt: null }),
      ],
      NOW
    );
    const before = snapshot(db);

    const uids = Array.from({ length: 4 }, () => store.checkoutNext()?.externalUID);

    expect(uids).toEqual(['uid-1', 'uid-4', 'uid-1', 'uid-4']);
    expect(store.activeCount()).toBe(2);
    expect(snapshot(db)).toBe(before);
  });

  it('writes a single cursor row per pool', () => {
    importCredentials(db, [credential(1), credential(2)], NOW);
    expect(store.cursor()).toBe(0);

    store.checkoutNext();
    store.checkoutNext();

    expect(store.cursor()).toBe(2);
    const rows = db.prepare('SELECT name, cursor FROM rotation_state').all();
    expect(rows).toEqual([{ name: 'credentials', cursor: 2 }]);
  });

  it('continues the rotation across store instances sharing the database', () => {
    importCredentials(db, [credential(1), credential(2), credential(3)], NOW);
    store.checkoutNext();

    const other = new CredentialStore(db, () => NOW);

    expect(other.checkoutNext()?.externalUID).toBe('uid-2');
    expect(store.checkoutNext()?.externalUID).toBe('uid-3');
  });

  it('picks up credentials added after rotation started', () => {
    importCredentials(db, [credential(1)], NOW);
    expect(store.checkoutNext()?.externalUID).toBe('uid-1');

    importCredentials(db, [credential(2)], NOW);

    expect(store.checkoutNext()?.externalUID).toBe('uid-2');
    expect(store.checkoutNext()?.externalUID).toBe('uid-1');
  });

  it('treats a credential that expires mid-rotation as gone', () => {
    importCredentials(db, [credential(1), credential(2, { expiresAt: '2026-03-01T13:00:00.000Z' })], NOW);
    let now = NOW;
    const clocked = new CredentialStore(db, () => now);

    expect(clocked.checkoutNext()?.externalUID).toBe('uid-1');
    now = new Date('2026-03-01T14:00:00.000Z');
    expect(clocked.checkoutNext()?.externalUID).toBe('uid-1');
  });
});

describe('credential admin', () => {
  it('upserts by identity and normalizes timestamps', () => {
    const db = openDatabase();
    importCredentials(db, [credential(1, { expiresAt: '2026-04-01' })], NOW);
    importCredentials(db, [credential(1, { externalKey: 'key-rotated', expiresAt: '2026-05-01' })], NOW);

    const all = listCredentials(db);

    expect(all).toHaveLength(1);
    expect(all[0]).toMatchObject({
      identity: 'user-1@example.com',
      externalKey: 'key-rotated',
      expiresAt: '2026-05-01T00:00:00.000Z',
      active: true,
    });
  });

  it('skips incomplete rows', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const db = openDatabase();

    const written = importCredentials(db, [credential(1), credential(2, { externalUID: '' })], NOW);

    expect(written).toBe(1);
    expect(listCredentials(db).map(row => row.identity)).toEqual(['user-1@example.com']);
  });

  it('deactivates once', () => {
    const db = openDatabase();
    importCredentials(db, [credential(1)], NOW);

    expect(deactivateCredential(db, 'user-1@example.com')).toBe(true);
    expect(deactivateCredential(db, 'user-1@example.com')).toBe(false);
    expect(new CredentialStore(db, () => NOW).checkoutNext()).toBeNull();
  });
});
