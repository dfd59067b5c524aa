import type { DB } from './db';
import { toCredential } from './credential-store';
import type { Credential, CredentialImport, CredentialRow } from '@/types';

// Issuance side of the credential pool. The resolution path only reads.

const toIso = (value: string | null | undefined, fallback: string | null): string | null => {
  if (!value) return fallback;
  const time = new Date(value).getTime();
  return Number.isNaN(time) ? fallback : new Date(time).toISOString();
};

/** Inserts or refreshes credentials by identity. Returns how many rows were written. */
export function importCredentials(db: DB, credentials: CredentialImport[], now: Date = new Date()): number {
  const upsert = db.prepare<[string, string, string, string, string, string | null, number], unknown>(`
    INSERT INTO credentials (identity, secret, external_uid, external_key, issued_at, expires_at, active)
    VALUES (?, ?, ?, ?, ?, ?, ?)
    ON CONFLICT(identity) DO UPDATE SET
      secret = excluded.secret,
      external_uid = excluded.external_uid,
      external_key = excluded.external_key,
      issued_at = excluded.issued_at,
      expires_at = excluded.expires_at,
      active = excluded.active
  `);

  const run = db.transaction((rows: CredentialImport[]) => {
    let written = 0;
    for (const row of rows) {
      if (!row.identity || !row.externalUID || !row.externalKey) {
        console.warn(`[CredentialAdmin] Skipping incomplete credential "${row.identity ?? ''}"`);
        continue;
      }
      upsert.run(
        row.identity,
        row.secret ?? '',
        row.externalUID,
        row.externalKey,
        toIso(row.issuedAt, now.toISOString()) ?? now.toISOString(),
        toIso(row.expiresAt, null),
        row.active === false ? 0 : 1
      );
      written++;
    }
    return written;
  });

  return run(credentials);
}

export function deactivateCredential(db: DB, identity: string): boolean {
  const result = db.prepare('UPDATE credentials SET active = 0 WHERE identity = ? AND active = 1').run(identity);
  return result.changes > 0;
}

export function listCredentials(db: DB): Credential[] {
  return db.prepare<[], CredentialRow>('SELECT * FROM credentials ORDER BY id').all().map(toCredential);
}
