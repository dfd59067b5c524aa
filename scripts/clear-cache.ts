/**
 * Cache maintenance.
 *
 *   tsx scripts/clear-cache.ts <keyword>     remove one search entry
 *   tsx scripts/clear-cache.ts --expired     remove expired search entries
 *   tsx scripts/clear-cache.ts --all         remove every search entry and stored manifest
 *   tsx scripts/clear-cache.ts --artifacts   remove stored manifests only
 */
import { ArtifactStore } from '@/lib/artifact-store';
import { loadConfig } from '@/lib/config';
import { openDatabase } from '@/lib/db';
import { ResultCache } from '@/lib/result-cache';
import { EpisodeResolver } from '@/lib/episode-resolver';

const config = loadConfig();
const db = openDatabase(config.databasePath);
const artifacts = new ArtifactStore(config.artifactDir);
// Clearing never resolves anything, so the resolver is a no-op
const cache = new ResultCache(db, new EpisodeResolver({ resolve: async () => null }, 1), {
  ttlSeconds: config.cacheTTLSeconds,
});

const arg = process.argv[2];

if (!arg) {
  const stats = cache.stats();
  console.log(`Search cache: ${stats.total} entries (${stats.valid} valid, ${stats.expired} expired), ${stats.totalHits} hits`);
  console.log('Usage: clear-cache.ts <keyword> | --expired | --all | --artifacts');
} else if (arg === '--expired') {
  console.log(`Removed ${cache.clearExpired()} expired entries`);
} else if (arg === '--all') {
  console.log(`Removed ${cache.clearAll()} entries and ${artifacts.clear()} manifests`);
} else if (arg === '--artifacts') {
  console.log(`Removed ${artifacts.clear()} manifests from ${artifacts.dir}`);
} else {
  const removed = cache.clear(arg);
  console.log(removed ? `Removed cache entry "${arg}"` : `No cache entry for "${arg}"`);
}

db.close();
