import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { openDatabase, type DB } from '@/lib/db';
import { EpisodeResolver } from '@/lib/episode-resolver';
import { ResultCache, normalizeKey } from '@/lib/result-cache';
import type { PlayableStream, ResolvedItem } from '@/types';
import { catalogItem, labeledManifest, streamFor } from './helpers/fixtures';

const U1 = 'https://video.example.com/ep/1';
const U2 = 'https://video.example.com/ep/2';
const U3 = 'https://video.example.com/ep/3';

const resolvedItem = (urls: string[], overrides: Partial<ResolvedItem> = {}): ResolvedItem => {
  const { rawPlayManifest: _manifest, ...metadata } = catalogItem();
  return {
    ...metadata,
    episodes: urls.map((rawURL, index) => ({ label: `Ep0${index + 1}`, rawURL, stream: streamFor(rawURL) })),
    ...overrides,
  };
};

describe('ResultCache', () => {
  let db: DB;
  let now: Date;
  let resolve: Mock<(rawURL: string) => Promise<PlayableStream | null>>;
  let cache: ResultCache;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    db = openDatabase();
    now = new Date('2026-03-01T12:00:00.000Z');
    resolve = vi.fn<(rawURL: string) => Promise<PlayableStream | null>>(async rawURL => streamFor(rawURL));
    cache = new ResultCache(db, new EpisodeResolver({ resolve }, 4), { ttlSeconds: 7200, now: () => now });
  });

  describe('get / put', () => {
    it('round-trips non-empty results until the TTL elapses', () => {
      const items = [resolvedItem([U1, U2])];
      cache.put('Harbor', items);

      const first = cache.get('harbor');
      expect(first.hit).toBe(true);
      expect(first.entry?.mergedCatalogItems).toEqual(items);
      expect(first.entry?.hitCount).toBe(1);
      expect(cache.get('HARBOR ').entry?.hitCount).toBe(2);

      now = new Date('2026-03-01T13:59:59.000Z');
      expect(cache.get('harbor').hit).toBe(true);

      now = new Date('2026-03-01T14:00:00.000Z');
      expect(cache.get('harbor')).toEqual({ entry: null, hit: false });
      // expired rows stay until cleared
      expect(cache.stats()).toEqual({ total: 1, expired: 1, valid: 0, totalHits: 3, ttlSeconds: 7200 });
    });

    it('ignores an empty put', () => {
      const items = [resolvedItem([U1])];
      cache.put('harbor', items);
      cache.put('harbor', []);

      expect(cache.get('harbor').entry?.mergedCatalogItems).toEqual(items);
      cache.put('never-stored', []);
      expect(cache.get('never-stored').hit).toBe(false);
    });

    it('keeps createdAt and hitCount when rewritten', () => {
      cache.put('harbor', [resolvedItem([U1])]);
      cache.get('harbor');

      now = new Date('2026-03-01T12:30:00.000Z');
      cache.put('harbor', [resolvedItem([U1, U2])]);
      const { entry } = cache.get('harbor');

      expect(entry).toMatchObject({
        normalizedKey: 'harbor',
        createdAt: '2026-03-01T12:00:00.000Z',
        updatedAt: '2026-03-01T12:30:00.000Z',
        expireAt: '2026-03-01T14:30:00.000Z',
        hitCount: 2,
      });
    });
  });

  describe('merge', () => {
    it('resolves every episode of a new key and stores the result', async () => {
      const items = await cache.merge('Harbor', [catalogItem({ rawPlayManifest: labeledManifest([U1, U2]) })]);

      expect(resolve.mock.calls.map(([rawURL]) => rawURL).sort()).toEqual([U1, U2]);
      expect(items).toHaveLength(1);
      expect(items[0].episodes).toEqual([
        { label: 'Ep01', rawURL: U1, stream: streamFor(U1) },
        { label: 'Ep02', rawURL: U2, stream: streamFor(U2) },
      ]);
      expect(items[0]).not.toHaveProperty('rawPlayManifest');
      expect(cache.get('harbor').entry?.mergedCatalogItems).toEqual(items);
    });

    it('does not resolve anything when merging the same items twice', async () => {
      const fresh = [catalogItem({ rawPlayManifest: labeledManifest([U1, U2]) })];
      const first = await cache.merge('harbor', fresh);
      resolve.mockClear();

      const second = await cache.merge('harbor', fresh);

      expect(resolve).not.toHaveBeenCalled();
      expect(second).toEqual(first);
    });

    it('resolves only the new episode and keeps the original order', async () => {
      await cache.merge('harbor', [catalogItem({ rawPlayManifest: labeledManifest([U1, U2]) })]);
      resolve.mockClear();

      const items = await cache.merge('harbor', [catalogItem({ rawPlayManifest: labeledManifest([U1, U2, U3]) })]);

      expect(resolve).toHaveBeenCalledTimes(1);
      expect(resolve.mock.calls[0][0]).toBe(U3);
      expect(items[0].episodes.map(episode => [episode.label, episode.rawURL])).toEqual([
        ['Ep01', U1],
        ['Ep02', U2],
        ['Ep03', U3],
      ]);
    });

    it('takes order and labels from the new item while reusing cached streams', async () => {
      cache.put('harbor', [
        resolvedItem([U1, U2], {
          episodes: [
            { label: 'old-1', rawURL: U1, stream: { finalURL: 'https://cdn.example.com/1.m3u8', cachedArtifactRef: 'aaaaaaaaaaaaaaaa' } },
            { label: 'old-2', rawURL: U2, stream: { finalURL: 'https://cdn.example.com/2.m3u8', cachedArtifactRef: null } },
          ],
        }),
      ]);

      const items = await cache.merge('harbor', [catalogItem({ rawPlayManifest: `A$${U2}#B$${U1}` })]);

      expect(resolve).not.toHaveBeenCalled();
      expect(items[0].episodes).toEqual([
        { label: 'A', rawURL: U2, stream: { finalURL: 'https://cdn.example.com/2.m3u8', cachedArtifactRef: null } },
        { label: 'B', rawURL: U1, stream: { finalURL: 'https://cdn.example.com/1.m3u8', cachedArtifactRef: 'aaaaaaaaaaaaaaaa' } },
      ]);
    });

    it('drops unresolved episodes and items, and keeps cached items missing from the new results', async () => {
      cache.put('harbor', [resolvedItem([U1], { title: 'Old Show', sourceKey: 'beta' })]);
      resolve.mockImplementation(async (rawURL: string) => (rawURL === U3 ? null : streamFor(rawURL)));

      const items = await cache.merge('harbor', [
        catalogItem({ id: '1', rawPlayManifest: labeledManifest([U2, U3]) }),
        catalogItem({ id: '2', title: 'Only Failures', rawPlayManifest: labeledManifest([U3]) }),
      ]);

      expect(items.map(item => [item.sourceKey, item.title, item.episodes.map(episode => episode.rawURL)])).toEqual([
        ['alpha', 'Harbor Lights', [U2]],
        ['beta', 'Old Show', [U1]],
      ]);
      // U3 appears twice in the batch but is resolved once
      expect(resolve.mock.calls.filter(([rawURL]) => rawURL === U3)).toHaveLength(1);
    });

    it('treats an expired entry as nothing to merge against', async () => {
      await cache.merge('harbor', [catalogItem({ rawPlayManifest: labeledManifest([U1]) })]);
      resolve.mockClear();
      now = new Date('2026-03-02T12:00:00.000Z');

      await cache.merge('harbor', [catalogItem({ rawPlayManifest: labeledManifest([U1]) })]);

      expect(resolve).toHaveBeenCalledTimes(1);
      expect(cache.get('harbor').entry?.expireAt).toBe('2026-03-02T14:00:00.000Z');
    });

    it('does not store an empty merge result', async () => {
      resolve.mockResolvedValue(null);

      const items = await cache.merge('harbor', [catalogItem({ rawPlayManifest: labeledManifest([U1]) })]);

      expect(items).toEqual([]);
      expect(cache.stats().total).toBe(0);
    });

    it('still returns the merged result when the write fails', async () => {
      const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      db.exec(`
        CREATE TRIGGER reject_cache_writes BEFORE INSERT ON search_cache
        BEGIN SELECT RAISE(ABORT, 'disk full'); END;
      `);

      const items = await cache.merge('harbor', [catalogItem({ rawPlayManifest: labeledManifest([U1]) })]);

      expect(items.map(item => item.episodes.length)).toEqual([1]);
      expect(cache.get('harbor').hit).toBe(false);
      expect(errors).toHaveBeenCalledWith('[ResultCache] Failed to persist cache entry "harbor": disk full');
    });
  });

  describe('invalidation', () => {
    it('clears by key idempotently', () => {
      cache.put('harbor', [resolvedItem([U1])]);

      expect(cache.clear(' Harbor')).toBe(true);
      expect(cache.clear('harbor')).toBe(false);
      expect(cache.get('harbor').hit).toBe(false);
    });

    it('clears only expired entries', () => {
      cache.put('old', [resolvedItem([U1])]);
      now = new Date('2026-03-01T13:00:00.000Z');
      cache.put('new', [resolvedItem([U2])]);
      now = new Date('2026-03-01T14:30:00.000Z');

      expect(cache.clearExpired()).toBe(1);
      expect(cache.clearExpired()).toBe(0);
      expect(cache.get('new').hit).toBe(true);
      expect(cache.clearAll()).toBe(1);
    });
  });
});

describe('normalizeKey', () => {
  it('trims and case-folds', () => {
    expect(normalizeKey('  Harbor LIGHTS ')).toBe('harbor lights');
  });
});
