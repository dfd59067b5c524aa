import type { AxiosInstance } from 'axios';
import { CatalogSourceClient } from './catalog-source';
import { createLimiter, type Limiter } from './concurrency';
import { errorMessage } from './errors';
import type { AppConfig } from './config';
import type { CatalogItem } from '@/types';

export type AggregatorConfig = Pick<AppConfig, 'sourceList' | 'searchTimeoutMs' | 'searchConcurrencyLimit' | 'denylistTerms'>;

const UNRANKED = Number.MAX_SAFE_INTEGER;

export class SourceAggregator {
  private clients: CatalogSourceClient[];
  private denylist: string[];
  private limit: Limiter;

  constructor(config: AggregatorConfig, session?: AxiosInstance) {
    this.clients = config.sourceList.map(source => new CatalogSourceClient(source, config.searchTimeoutMs, session));
    this.denylist = config.denylistTerms.map(term => term.toLowerCase());
    this.limit = createLimiter(config.searchConcurrencyLimit);
  }

  isDenied(item: CatalogItem): boolean {
    if (this.denylist.length === 0) return false;
    const fields = [item.typeName, item.class].map(field => field.toLowerCase());
    return this.denylist.some(term => fields.some(field => field.includes(term)));
  }

  /**
   * Queries every source concurrently. A failing source contributes nothing;
   * the rest still answer. Output is ordered by source priority, then by the
   * configured source order.
   */
  async search(query: string): Promise<CatalogItem[]> {
    const keyword = query.trim();
    if (!keyword || this.clients.length === 0) return [];

    const started = Date.now();
    const perSource = await Promise.all(
      this.clients.map(client =>
        this.limit(async () => {
          try {
            return await client.search(keyword);
          } catch (error) {
            console.warn(`[SourceAggregator] ${errorMessage(error)}`);
            return [];
          }
        })
      )
    );

    const ranked = perSource
      .map((items, order) => ({ items, order, rank: this.clients[order].source.priorityRank ?? UNRANKED }))
      .sort((a, b) => a.rank - b.rank || a.order - b.order);

    const seen = new Set<string>();
    const results: CatalogItem[] = [];
    let denied = 0;

    for (const { items } of ranked) {
      for (const item of items) {
        if (this.isDenied(item)) {
          denied++;
          continue;
        }
        const key = JSON.stringify([item.sourceKey, item.id]);
        if (seen.has(key)) continue;
        seen.add(key);
        results.push(item);
      }
    }

    console.log(
      `[SourceAggregator] "${keyword}": ${results.length} items from ${this.clients.length} sources` +
        (denied ? `, ${denied} filtered` : '') +
        ` in ${Date.now() - started}ms`
    );
    return results;
  }
}
