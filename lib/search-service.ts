import { CancellationToken } from './cancellation';
import { ResolverExhaustedError } from './errors';
import type { FallbackChain } from './fallback-chain';
import { normalizeKey, type ResultCache } from './result-cache';
import type { SourceAggregator } from './source-aggregator';
import type { SearchOutcome, StreamResolution } from '@/types';

export interface SearchOptions {
  /** Skip the cached answer and re-check every source. */
  refresh?: boolean;
}

export interface ParseOutcome extends StreamResolution {
  /** Milliseconds spent resolving. */
  took: number;
}

export interface SearchServiceDeps {
  aggregator: Pick<SourceAggregator, 'search'>;
  cache: ResultCache;
  chain: Pick<FallbackChain, 'resolveWithMethod'>;
  /** Age after which a cached answer is re-checked against the sources. */
  refreshAfterSeconds: number;
  now?: () => Date;
}

export class SearchService {
  private deps: SearchServiceDeps;
  private now: () => Date;
  // Identical concurrent searches share one run
  private pending = new Map<string, Promise<SearchOutcome>>();

  constructor(deps: SearchServiceDeps) {
    this.deps = deps;
    this.now = deps.now ?? (() => new Date());
  }

  search(query: string, options: SearchOptions = {}): Promise<SearchOutcome> {
    const key = normalizeKey(query);
    if (!key) return Promise.resolve({ items: [], fromCache: false });

    const pendingKey = `${key}|${options.refresh ? 'refresh' : ''}`;
    const inFlight = this.pending.get(pendingKey);
    if (inFlight) return inFlight;

    const run = this.run(key, options).finally(() => {
      this.pending.delete(pendingKey);
    });
    this.pending.set(pendingKey, run);
    return run;
  }

  private isStale(updatedAt: string): boolean {
    const age = this.now().getTime() - new Date(updatedAt).getTime();
    return age >= this.deps.refreshAfterSeconds * 1000;
  }

  private async run(key: string, options: SearchOptions): Promise<SearchOutcome> {
    const { aggregator, cache } = this.deps;
    const entry = cache.peek(key);

    if (entry && !options.refresh && !this.isStale(entry.updatedAt)) {
      cache.recordHit(entry);
      console.log(`[SearchService] Cache hit "${key}" (${entry.mergedCatalogItems.length} items, ${entry.hitCount} hits)`);
      return { items: entry.mergedCatalogItems, fromCache: true };
    }

    const catalog = await aggregator.search(key);
    if (catalog.length === 0) {
      if (entry) {
        cache.recordHit(entry);
        console.log(`[SearchService] No upstream results for "${key}", serving cached items`);
        return { items: entry.mergedCatalogItems, fromCache: true };
      }
      return { items: [], fromCache: false };
    }

    const items = await cache.merge(key, catalog);
    return { items, fromCache: false };
  }

  /** Resolves a single upstream URL, bypassing the search cache. */
  async resolveUrl(rawURL: string): Promise<ParseOutcome> {
    const started = Date.now();
    const resolution = await this.deps.chain.resolveWithMethod(rawURL, new CancellationToken());
    if (!resolution) throw new ResolverExhaustedError(rawURL);
    return { ...resolution, took: Date.now() - started };
  }
}
