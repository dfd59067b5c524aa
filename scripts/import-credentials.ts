/**
 * Loads credentials minted by the registration job into the pool.
 *
 *   tsx scripts/import-credentials.ts credentials.json
 *   tsx scripts/import-credentials.ts --deactivate <identity>
 *
 * The JSON file holds an array of
 * `{identity, secret, externalUID, externalKey, issuedAt?, expiresAt?, active?}`.
 */
import fs from 'fs';
import { loadConfig } from '@/lib/config';
import { deactivateCredential, importCredentials, listCredentials } from '@/lib/credential-admin';
import { openDatabase } from '@/lib/db';
import type { CredentialImport } from '@/types';

const isCredentialImport = (value: unknown): value is CredentialImport => {
  if (typeof value !== 'object' || value === null) return false;
  const record: Record<string, unknown> = { ...value };
  return ['identity', 'externalUID', 'externalKey'].every(field => typeof record[field] === 'string');
};

const config = loadConfig();
const db = openDatabase(config.databasePath);
const [arg, value] = process.argv.slice(2);

if (arg === '--deactivate' && value) {
  const changed = deactivateCredential(db, value);
  console.log(changed ? `Deactivated ${value}` : `No active credential ${value}`);
} else if (arg) {
  const parsed: unknown = JSON.parse(fs.readFileSync(arg, 'utf-8'));
  const rows = Array.isArray(parsed) ? parsed.filter(isCredentialImport) : [];
  const written = importCredentials(db, rows);
  console.log(`Imported ${written} credentials from ${arg}`);
} else {
  const all = listCredentials(db);
  const active = all.filter(credential => credential.active).length;
  console.log(`${all.length} credentials, ${active} active`);
  console.log('Usage: import-credentials.ts <file.json> | --deactivate <identity>');
}

db.close();
