import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { DEFAULT_HEADERS } from './config';
import { SourceUnavailableError, errorMessage } from './errors';
import type { CatalogItem, CatalogSourceConfig } from '@/types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asText = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
};

const cleanHtml = (html: string): string => {
  if (!html) return '';
  return cheerio.load(html, null, false).text().replace(/\s+/g, ' ').trim();
};

/** Maps one upstream `vod_*` row. Rows without an id or a title are skipped. */
export function toCatalogItem(record: Record<string, unknown>, source: CatalogSourceConfig): CatalogItem | null {
  const id = asText(record.vod_id);
  const title = asText(record.vod_name).trim().replace(/\s+/g, ' ');
  if (!id || !title) return null;

  const doubanId = asText(record.vod_douban_id);

  return {
    id,
    title,
    class: asText(record.vod_class),
    year: asText(record.vod_year).match(/\d{4}/)?.[0] ?? '',
    description: cleanHtml(asText(record.vod_content)),
    sourceKey: source.key,
    sourceName: source.name,
    sourcePriority: source.priorityRank ?? null,
    rawPlayManifest: asText(record.vod_play_url),
    poster: asText(record.vod_pic),
    typeName: asText(record.type_name),
    doubanId: doubanId && doubanId !== '0' ? doubanId : null,
  };
}

/**
 * Client for one upstream catalog speaking the `ac=videolist` protocol.
 */
export class CatalogSourceClient {
  readonly source: CatalogSourceConfig;
  private session: AxiosInstance;
  private timeoutMs: number;

  constructor(source: CatalogSourceConfig, timeoutMs: number, session?: AxiosInstance) {
    this.source = source;
    this.timeoutMs = timeoutMs;
    this.session = session ?? axios.create({ headers: DEFAULT_HEADERS });
  }

  /** Throws SourceUnavailableError on network failure, timeout, non-2xx or malformed JSON. */
  async search(query: string): Promise<CatalogItem[]> {
    let data: unknown;
    try {
      const response = await this.session.get<unknown>(this.source.baseURL, {
        params: { ac: 'videolist', wd: query },
        timeout: this.timeoutMs,
        signal: AbortSignal.timeout(this.timeoutMs),
        validateStatus: () => true,
      });
      if (response.status < 200 || response.status >= 300) {
        throw new SourceUnavailableError(this.source.key, `HTTP ${response.status}`);
      }
      data = typeof response.data === 'string' ? JSON.parse(response.data) : response.data;
    } catch (error) {
      if (error instanceof SourceUnavailableError) throw error;
      throw new SourceUnavailableError(this.source.key, errorMessage(error), { cause: error });
    }

    const list = isRecord(data) ? data.list : undefined;
    if (!isRecord(data) || (list != null && !Array.isArray(list))) {
      throw new SourceUnavailableError(this.source.key, 'unexpected response shape');
    }

    const items: CatalogItem[] = [];
    for (const record of Array.isArray(list) ? list : []) {
      if (!isRecord(record)) continue;
      const item = toCatalogItem(record, this.source);
      if (item) items.push(item);
    }
    return items;
  }
}
