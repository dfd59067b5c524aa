// Catalog
export interface CatalogSourceConfig {
  key: string;
  name: string;
  baseURL: string;
  priorityRank?: number;
}

export interface CatalogItem {
  id: string;
  title: string;
  class: string;
  year: string;
  description: string;
  sourceKey: string;
  sourceName: string;
  sourcePriority: number | null;
  rawPlayManifest: string;
  poster: string;
  typeName: string;
  doubanId: string | null;
}

// Raw upstream row as returned by a catalog source (`ac=videolist`)
export type VodRecord = {
  vod_id?: string | number;
  vod_name?: string;
  vod_play_url?: string;
  vod_pic?: string;
  vod_year?: string | number;
  vod_class?: string;
  vod_content?: string;
  type_name?: string;
  vod_douban_id?: string | number;
};

// Resolution
export interface EpisodeURL {
  label: string | null;
  rawURL: string;
}

export interface PlayableStream {
  finalURL: string;
  cachedArtifactRef: string | null;
}

export interface ResolvedEpisode extends EpisodeURL {
  stream: PlayableStream;
}

/** A resolved stream and the strategy that produced it. */
export interface StreamResolution {
  stream: PlayableStream;
  method: ResolverKind;
}

export interface ResolvedItem extends Omit<CatalogItem, 'rawPlayManifest'> {
  episodes: ResolvedEpisode[];
}

export type ResolverKind = 'credential' | 'parameter' | 'decrypt';

export interface ResolverStrategy {
  readonly kind: ResolverKind;
  /** Returns the upstream stream URL, or null when this strategy cannot resolve it. */
  resolve(sourceURL: string): Promise<string | null>;
}

// Credentials
export interface Credential {
  id: number;
  identity: string;
  secret: string;
  externalUID: string;
  externalKey: string;
  issuedAt: string;
  expiresAt: string | null;
  active: boolean;
}

export interface CredentialRow {
  id: number;
  identity: string;
  secret: string;
  external_uid: string;
  external_key: string;
  issued_at: string;
  expires_at: string | null;
  active: number;
}

export interface CredentialImport {
  identity: string;
  secret?: string;
  externalUID: string;
  externalKey: string;
  issuedAt?: string;
  expiresAt?: string | null;
  active?: boolean;
}

// Shared parameter (ParameterResolver)
export interface SharedParameter {
  value: string;
  signature: string;
  group: string;
  updatedAt: string;
}

export interface SharedParameterRow {
  name: string;
  value: string;
  signature: string;
  group_id: string;
  updated_at: string;
}

// Result cache
export interface CachedResult {
  normalizedKey: string;
  mergedCatalogItems: ResolvedItem[];
  createdAt: string;
  updatedAt: string;
  expireAt: string;
  hitCount: number;
}

export interface SearchCacheRow {
  keyword: string;
  results: string;
  created_at: string;
  updated_at: string;
  expire_at: string;
  hit_count: number;
}

export interface CacheLookup {
  entry: CachedResult | null;
  hit: boolean;
}

export interface CacheStats {
  total: number;
  expired: number;
  valid: number;
  totalHits: number;
  ttlSeconds: number;
}

export interface SearchOutcome {
  items: ResolvedItem[];
  fromCache: boolean;
}
