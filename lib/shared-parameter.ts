import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_HEADERS, type ParameterResolverConfig } from './config';
import type { DB } from './db';
import { errorMessage } from './errors';
import type { SharedParameter, SharedParameterRow } from '@/types';

const PARAMETER_NAME = 'z';
const HOUR_MS = 60 * 60 * 1000;

export interface SharedParameterStatus {
  present: boolean;
  expired: boolean;
  updatedAt: string | null;
}

/** Pulls `z`, `s1ig` and `g` out of a page that embeds a player URL. */
export function extractSharedParameter(html: string, defaults: Pick<ParameterResolverConfig, 'defaultSignature' | 'defaultGroup'>) {
  const value = html.match(/[?&]z=([a-f0-9]{32})/i)?.[1];
  if (!value) return null;
  return {
    value: value.toLowerCase(),
    signature: html.match(/[?&]s1ig=([^&"'\s<>]+)/)?.[1] ?? defaults.defaultSignature,
    group: html.match(/[?&]g=([^&"'\s<>]*)/)?.[1] ?? defaults.defaultGroup,
  };
}

/**
 * Durable, periodically refreshed parameter used by ParameterResolver.
 * Concurrent refreshes share one request; a failed refresh keeps the value
 * already on record.
 */
export class SharedParameterStore {
  private db: DB;
  private config: ParameterResolverConfig;
  private session: AxiosInstance;
  private now: () => Date;
  private pendingRefresh: Promise<SharedParameter | null> | null = null;

  constructor(db: DB, config: ParameterResolverConfig, session?: AxiosInstance, now: () => Date = () => new Date()) {
    this.db = db;
    this.config = config;
    this.session = session ?? axios.create({ headers: DEFAULT_HEADERS });
    this.now = now;
  }

  current(): SharedParameter | null {
    const row = this.db
      .prepare<[string], SharedParameterRow>('SELECT * FROM shared_parameters WHERE name = ?')
      .get(PARAMETER_NAME);
    if (!row) return null;
    return { value: row.value, signature: row.signature, group: row.group_id, updatedAt: row.updated_at };
  }

  isExpired(parameter: SharedParameter): boolean {
    const age = this.now().getTime() - new Date(parameter.updatedAt).getTime();
    return !(age < this.config.maxAgeHours * HOUR_MS);
  }

  save(parameter: Omit<SharedParameter, 'updatedAt'>): SharedParameter {
    const saved: SharedParameter = { ...parameter, updatedAt: this.now().toISOString() };
    this.db
      .prepare<[string, string, string, string, string], unknown>(`
        INSERT INTO shared_parameters (name, value, signature, group_id, updated_at) VALUES (?, ?, ?, ?, ?)
        ON CONFLICT(name) DO UPDATE SET
          value = excluded.value, signature = excluded.signature,
          group_id = excluded.group_id, updated_at = excluded.updated_at
      `)
      .run(PARAMETER_NAME, saved.value, saved.signature, saved.group, saved.updatedAt);
    return saved;
  }

  status(): SharedParameterStatus {
    const parameter = this.current();
    return {
      present: parameter !== null,
      expired: parameter ? this.isExpired(parameter) : true,
      updatedAt: parameter?.updatedAt ?? null,
    };
  }

  /** Current parameter, refreshed first when missing or older than `maxAgeHours`. */
  async get(): Promise<SharedParameter | null> {
    const parameter = this.current();
    if (parameter && !this.isExpired(parameter)) return parameter;

    const refreshed = await this.refresh();
    return refreshed ?? parameter;
  }

  refresh(): Promise<SharedParameter | null> {
    if (!this.pendingRefresh) {
      this.pendingRefresh = this.fetchParameter().finally(() => {
        this.pendingRefresh = null;
      });
    }
    return this.pendingRefresh;
  }

  private async fetchParameter(): Promise<SharedParameter | null> {
    if (!this.config.refreshPageUrl) return null;

    try {
      const response = await this.session.get<unknown>(this.config.refreshPageUrl, {
        timeout: this.config.timeoutMs,
        responseType: 'text',
        validateStatus: () => true,
      });
      if (response.status !== 200 || typeof response.data !== 'string') {
        console.warn(`[SharedParameter] Refresh page answered ${response.status}`);
        return null;
      }

      const extracted = extractSharedParameter(response.data, this.config);
      if (!extracted) {
        console.warn('[SharedParameter] No parameter found on refresh page');
        return null;
      }

      const saved = this.save(extracted);
      console.log(`[SharedParameter] Refreshed (${saved.value.substring(0, 8)}...)`);
      return saved;
    } catch (error) {
      console.error(`[SharedParameter] Refresh failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
