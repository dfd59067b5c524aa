import type { Statement } from 'better-sqlite3';
import type { DB } from './db';
import type { EpisodeResolver } from './episode-resolver';
import { CachePersistFailureError, errorMessage } from './errors';
import { parsePlayManifest } from './play-url';
import type {
  CacheLookup,
  CacheStats,
  CachedResult,
  CatalogItem,
  PlayableStream,
  ResolvedEpisode,
  ResolvedItem,
  SearchCacheRow,
} from '@/types';

export interface ResultCacheOptions {
  ttlSeconds: number;
  now?: () => Date;
}

export const normalizeKey = (query: string): string => query.trim().toLowerCase();

// Items from the same source with the same title are the same show across refreshes
const itemIdentity = (item: { sourceKey: string; title: string }): string =>
  `${item.sourceKey}::${item.title.trim().toLowerCase()}`;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isResolvedItem = (value: unknown): value is ResolvedItem =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.title === 'string' &&
  typeof value.sourceKey === 'string' &&
  Array.isArray(value.episodes);

function parseItems(json: string): ResolvedItem[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    console.error(`[ResultCache] Unreadable cache row: ${errorMessage(error)}`);
    return [];
  }
  return Array.isArray(parsed) ? parsed.filter(isResolvedItem) : [];
}

function toResolvedItem(item: CatalogItem, episodes: ResolvedEpisode[]): ResolvedItem {
  const { rawPlayManifest: _manifest, ...metadata } = item;
  return { ...metadata, episodes };
}

/**
 * Search results keyed by normalized query, with TTL, hit counting and
 * incremental merge. Expired rows are left in place until `clearExpired`.
 */
export class ResultCache {
  private db: DB;
  private resolver: EpisodeResolver;
  private ttlSeconds: number;
  private now: () => Date;
  private selectRow: Statement<[string], SearchCacheRow>;
  private upsertRow: Statement<[string, string, string, string, string], unknown>;
  private bumpHits: Statement<[string], unknown>;

  constructor(db: DB, resolver: EpisodeResolver, options: ResultCacheOptions) {
    this.db = db;
    this.resolver = resolver;
    this.ttlSeconds = options.ttlSeconds;
    this.now = options.now ?? (() => new Date());

    this.selectRow = db.prepare<[string], SearchCacheRow>('SELECT * FROM search_cache WHERE keyword = ?');
    // created_at and hit_count survive every rewrite of an existing key
    this.upsertRow = db.prepare<[string, string, string, string, string], unknown>(`
      INSERT INTO search_cache (keyword, results, created_at, updated_at, expire_at, hit_count)
      VALUES (?, ?, ?, ?, ?, 0)
      ON CONFLICT(keyword) DO UPDATE SET
        results = excluded.results,
        updated_at = excluded.updated_at,
        expire_at = excluded.expire_at
    `);
    this.bumpHits = db.prepare<[string], unknown>('UPDATE search_cache SET hit_count = hit_count + 1 WHERE keyword = ?');
  }

  private toEntry(row: SearchCacheRow): CachedResult {
    return {
      normalizedKey: row.keyword,
      mergedCatalogItems: parseItems(row.results),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      expireAt: row.expire_at,
      hitCount: row.hit_count,
    };
  }

  private isLive(row: SearchCacheRow): boolean {
    return this.now().getTime() < new Date(row.expire_at).getTime();
  }

  /** Unexpired entry without counting a hit. */
  peek(query: string): CachedResult | null {
    const row = this.selectRow.get(normalizeKey(query));
    return row && this.isLive(row) ? this.toEntry(row) : null;
  }

  /** Counts one cache-served read of the entry. */
  recordHit(entry: CachedResult): void {
    try {
      this.bumpHits.run(entry.normalizedKey);
      entry.hitCount++;
    } catch (error) {
      console.error(`[ResultCache] Failed to record hit for "${entry.normalizedKey}": ${errorMessage(error)}`);
    }
  }

  get(query: string): CacheLookup {
    const entry = this.peek(query);
    if (!entry) return { entry: null, hit: false };

    this.recordHit(entry);
    return { entry, hit: true };
  }

  /** Stores items under the query. Empty results are never stored. */
  put(query: string, items: ResolvedItem[]): void {
    if (items.length === 0) return;

    const key = normalizeKey(query);
    const now = this.now();
    const nowIso = now.toISOString();
    const expireAt = new Date(now.getTime() + this.ttlSeconds * 1000).toISOString();
    try {
      this.upsertRow.run(key, JSON.stringify(items), nowIso, nowIso, expireAt);
    } catch (error) {
      throw new CachePersistFailureError(key, { cause: error });
    }
  }

  /**
   * Folds freshly aggregated items into the cached entry.
   *
   * Episodes are matched by raw URL, so only URLs the cache has not seen are
   * resolved. Merged items take the new episode order and labels; items left
   * with no playable episode are dropped; cached items missing from the new
   * results are kept. A failed write is logged and the merged result is still
   * returned.
   */
  async merge(query: string, newItems: CatalogItem[]): Promise<ResolvedItem[]> {
    const key = normalizeKey(query);
    const cachedItems = this.peek(key)?.mergedCatalogItems ?? [];

    const known = new Map<string, Map<string, PlayableStream>>();
    for (const item of cachedItems) {
      known.set(itemIdentity(item), new Map(item.episodes.map(episode => [episode.rawURL, episode.stream])));
    }

    const parsed = newItems.map(item => {
      const episodes = parsePlayManifest(item.rawPlayManifest);
      const streams = known.get(itemIdentity(item)) ?? new Map<string, PlayableStream>();
      return { item, episodes, streams };
    });

    const toResolve = parsed.flatMap(({ episodes, streams }) =>
      episodes.filter(episode => !streams.has(episode.rawURL)).map(episode => episode.rawURL)
    );
    const resolved = toResolve.length > 0 ? await this.resolver.resolveBatch(toResolve) : new Map<string, PlayableStream>();

    const merged: ResolvedItem[] = [];
    const seen = new Set<string>();
    let dropped = 0;

    for (const { item, episodes, streams } of parsed) {
      const resolvedEpisodes: ResolvedEpisode[] = [];
      for (const episode of episodes) {
        const stream = streams.get(episode.rawURL) ?? resolved.get(episode.rawURL);
        if (stream) resolvedEpisodes.push({ ...episode, stream });
      }

      seen.add(itemIdentity(item));
      if (resolvedEpisodes.length === 0) {
        dropped++;
        continue;
      }
      merged.push(toResolvedItem(item, resolvedEpisodes));
    }

    for (const cached of cachedItems) {
      if (!seen.has(itemIdentity(cached))) merged.push(cached);
    }

    console.log(
      `[ResultCache] Merge "${key}": ${merged.length} items, ${toResolve.length} new episodes, ` +
        `${resolved.size} resolved` +
        (dropped ? `, ${dropped} items without playable episodes` : '')
    );

    if (merged.length === 0) return merged;

    try {
      this.put(key, merged);
    } catch (error) {
      const cause = error instanceof CachePersistFailureError ? error.cause : error;
      console.error(`[ResultCache] ${errorMessage(error)}: ${errorMessage(cause)}`);
    }
    return merged;
  }

  /** Removes one entry. Returns false when there was nothing to remove. */
  clear(query: string): boolean {
    const result = this.db.prepare('DELETE FROM search_cache WHERE keyword = ?').run(normalizeKey(query));
    return result.changes > 0;
  }

  clearAll(): number {
    return this.db.prepare('DELETE FROM search_cache').run().changes;
  }

  clearExpired(): number {
    return this.db.prepare('DELETE FROM search_cache WHERE expire_at <= ?').run(this.now().toISOString()).changes;
  }

  stats(): CacheStats {
    const nowIso = this.now().toISOString();
    const row = this.db
      .prepare<[string], { total: number; expired: number | null; totalHits: number | null }>(`
        SELECT
          count(*) as total,
          sum(CASE WHEN expire_at <= ? THEN 1 ELSE 0 END) as expired,
          sum(hit_count) as totalHits
        FROM search_cache
      `)
      .get(nowIso);

    const total = row?.total ?? 0;
    const expired = row?.expired ?? 0;
    return {
      total,
      expired,
      valid: total - expired,
      totalHits: row?.totalHits ?? 0,
      ttlSeconds: this.ttlSeconds,
    };
  }
}
