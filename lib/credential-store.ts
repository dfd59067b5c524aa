import type { Statement } from 'better-sqlite3';
import type { DB } from './db';
import type { Credential, CredentialRow } from '@/types';

const ROTATION_NAME = 'credentials';

export const toCredential = (row: CredentialRow): Credential => ({
  id: row.id,
  identity: row.identity,
  secret: row.secret,
  externalUID: row.external_uid,
  externalKey: row.external_key,
  issuedAt: row.issued_at,
  expiresAt: row.expires_at,
  active: row.active === 1,
});

/**
 * Round-robin view over the credential pool.
 *
 * The rotation cursor is the id of the credential handed out last. Each
 * checkout reads the next usable row after it (wrapping to the lowest id) and
 * rewrites that single cursor row inside one immediate transaction, so
 * concurrent processes sharing the database never hand out the same slot
 * twice in a row. Credentials themselves are never written here: expired or
 * deactivated rows are skipped by the query.
 */
export class CredentialStore {
  private db: DB;
  private now: () => Date;
  private nextAfter: Statement<[string, number], CredentialRow>;
  private first: Statement<[string], CredentialRow>;
  private countUsable: Statement<[string], { count: number }>;
  private readCursor: Statement<[string], { cursor: number }>;
  private writeCursor: Statement<[string, number, string], unknown>;
  private checkout: () => CredentialRow | undefined;

  constructor(db: DB, now: () => Date = () => new Date()) {
    this.db = db;
    this.now = now;

    const usable = 'active = 1 AND (expires_at IS NULL OR expires_at > ?)';
    this.nextAfter = db.prepare<[string, number], CredentialRow>(
      `SELECT * FROM credentials WHERE ${usable} AND id > ? ORDER BY id LIMIT 1`
    );
    this.first = db.prepare<[string], CredentialRow>(
      `SELECT * FROM credentials WHERE ${usable} ORDER BY id LIMIT 1`
    );
    this.countUsable = db.prepare<[string], { count: number }>(
      `SELECT count(*) as count FROM credentials WHERE ${usable}`
    );
    this.readCursor = db.prepare<[string], { cursor: number }>('SELECT cursor FROM rotation_state WHERE name = ?');
    this.writeCursor = db.prepare<[string, number, string], unknown>(`
      INSERT INTO rotation_state (name, cursor, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET cursor = excluded.cursor, updated_at = excluded.updated_at
    `);

    const checkoutTx = this.db.transaction((nowIso: string): CredentialRow | undefined => {
      const cursor = this.readCursor.get(ROTATION_NAME)?.cursor ?? 0;
      const row = this.nextAfter.get(nowIso, cursor) ?? this.first.get(nowIso);
      if (!row) return undefined;
      this.writeCursor.run(ROTATION_NAME, row.id, nowIso);
      return row;
    });
    this.checkout = () => checkoutTx.immediate(this.now().toISOString());
  }

  /** Next usable credential in rotation, or null when the pool is empty. */
  checkoutNext(): Credential | null {
    const row = this.checkout();
    return row ? toCredential(row) : null;
  }

  activeCount(): number {
    return this.countUsable.get(this.now().toISOString())?.count ?? 0;
  }

  /** Id of the credential handed out last (0 before the first checkout). */
  cursor(): number {
    return this.readCursor.get(ROTATION_NAME)?.cursor ?? 0;
  }
}
