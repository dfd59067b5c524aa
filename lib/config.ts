import fs from 'fs';
import path from 'path';
import type { CatalogSourceConfig } from '@/types';

export const DEFAULT_HEADERS = {
  'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Accept': 'application/json, text/plain, */*',
  'Accept-Language': 'en-US,en;q=0.9',
};

export interface CredentialResolverConfig {
  apiUrl: string;
  timeoutMs: number;
  rotationsPerCall: number;
}

export interface ParameterResolverConfig {
  apiUrl: string;
  refreshPageUrl: string;
  maxAgeHours: number;
  timeoutMs: number;
  defaultSignature: string;
  defaultGroup: string;
}

export interface DecryptResolverConfig {
  parserUrl: string;
  keyPrefix: string;
  keySuffix: string;
  iv: string;
  timeoutMs: number;
  maxRedirects: number;
}

export interface AppConfig {
  sourceList: CatalogSourceConfig[];
  searchTimeoutMs: number;
  searchConcurrencyLimit: number;
  resolverRetryCount: number;
  resolveConcurrencyLimit: number;
  cacheTTLSeconds: number;
  cacheRefreshSeconds: number;
  denylistTerms: string[];
  databasePath: string;
  artifactDir: string;
  publicBaseUrl: string;
  port: number;
  manifestTimeoutMs: number;
  resolvers: {
    credential: CredentialResolverConfig | null;
    parameter: ParameterResolverConfig | null;
    decrypt: DecryptResolverConfig | null;
  };
}

export const DEFAULT_CONFIG_PATH = 'data/config.json';
const EXAMPLE_CONFIG_PATH = 'config.example.json';

type Raw = Record<string, unknown>;

const isRecord = (value: unknown): value is Raw =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readString = (raw: Raw, key: string, fallback: string): string => {
  const value = raw[key];
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
};

const readNumber = (raw: Raw, key: string, fallback: number, min = 0): number => {
  const value = raw[key];
  const num = typeof value === 'string' ? Number(value) : value;
  if (typeof num !== 'number' || !Number.isFinite(num) || num < min) return fallback;
  return num;
};

const isHttpUrl = (value: string): boolean => /^https?:\/\//i.test(value);

function normalizeSources(value: unknown): CatalogSourceConfig[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    console.warn('[Config] sourceList must be an array, ignoring');
    return [];
  }

  const sources: CatalogSourceConfig[] = [];
  const seen = new Set<string>();
  for (const entry of value) {
    if (!isRecord(entry)) continue;
    const key = readString(entry, 'key', '');
    const baseURL = readString(entry, 'baseURL', readString(entry, 'api', ''));
    if (!key || !isHttpUrl(baseURL)) {
      console.warn(`[Config] Skipping source without key or http(s) baseURL: ${JSON.stringify(entry).substring(0, 100)}`);
      continue;
    }
    if (seen.has(key)) {
      console.warn(`[Config] Duplicate source key "${key}", keeping the first`);
      continue;
    }
    seen.add(key);

    const rank = entry.priorityRank;
    sources.push({
      key,
      baseURL,
      name: readString(entry, 'name', key),
      ...(typeof rank === 'number' && Number.isFinite(rank) ? { priorityRank: rank } : {}),
    });
  }
  return sources;
}

function normalizeCredentialResolver(value: unknown): CredentialResolverConfig | null {
  if (!isRecord(value)) return null;
  const apiUrl = readString(value, 'apiUrl', '');
  if (!isHttpUrl(apiUrl)) return null;
  return {
    apiUrl,
    timeoutMs: readNumber(value, 'timeoutMs', 10000, 1),
    rotationsPerCall: Math.floor(readNumber(value, 'rotationsPerCall', 2, 1)),
  };
}

function normalizeParameterResolver(value: unknown): ParameterResolverConfig | null {
  if (!isRecord(value)) return null;
  const apiUrl = readString(value, 'apiUrl', '');
  if (!isHttpUrl(apiUrl)) return null;
  return {
    apiUrl,
    refreshPageUrl: readString(value, 'refreshPageUrl', ''),
    maxAgeHours: readNumber(value, 'maxAgeHours', 24, 0),
    timeoutMs: readNumber(value, 'timeoutMs', 10000, 1),
    defaultSignature: readString(value, 'defaultSignature', '11397'),
    defaultGroup: readString(value, 'defaultGroup', ''),
  };
}

function normalizeDecryptResolver(value: unknown): DecryptResolverConfig | null {
  if (!isRecord(value)) return null;
  const parserUrl = readString(value, 'parserUrl', '');
  if (!isHttpUrl(parserUrl)) return null;
  return {
    parserUrl: parserUrl.replace(/\/+$/, ''),
    keyPrefix: readString(value, 'keyPrefix', ''),
    keySuffix: readString(value, 'keySuffix', ''),
    iv: readString(value, 'iv', ''),
    timeoutMs: readNumber(value, 'timeoutMs', 15000, 1),
    maxRedirects: Math.floor(readNumber(value, 'maxRedirects', 5, 0)),
  };
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/**
 * Builds an immutable config snapshot from a parsed JSON object.
 * Environment variables override the file for deployment-specific paths.
 */
export function normalizeConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const input: Raw = isRecord(raw) ? raw : {};
  const resolvers: Raw = isRecord(input.resolvers) ? input.resolvers : {};

  const denylist = Array.isArray(input.denylistTerms)
    ? input.denylistTerms.filter((term): term is string => typeof term === 'string' && term.trim() !== '').map(term => term.trim())
    : [];

  const config: AppConfig = {
    sourceList: normalizeSources(input.sourceList),
    searchTimeoutMs: readNumber(input, 'searchTimeoutMs', 5000, 1),
    searchConcurrencyLimit: Math.floor(readNumber(input, 'searchConcurrencyLimit', 10, 1)),
    resolverRetryCount: Math.floor(readNumber(input, 'resolverRetryCount', 2, 0)),
    resolveConcurrencyLimit: Math.floor(readNumber(input, 'resolveConcurrencyLimit', 10, 1)),
    cacheTTLSeconds: readNumber(input, 'cacheTTLSeconds', 7200, 1),
    cacheRefreshSeconds: readNumber(input, 'cacheRefreshSeconds', 600, 0),
    denylistTerms: denylist,
    databasePath: env.DATABASE_PATH || readString(input, 'databasePath', 'data/vod-aggregator.db'),
    artifactDir: env.ARTIFACT_DIR || readString(input, 'artifactDir', 'data/artifacts'),
    publicBaseUrl: (env.PUBLIC_BASE_URL || readString(input, 'publicBaseUrl', '')).replace(/\/+$/, ''),
    port: readNumber({ port: env.PORT ?? input.port }, 'port', 8000, 0),
    manifestTimeoutMs: readNumber(input, 'manifestTimeoutMs', 10000, 1),
    resolvers: {
      credential: normalizeCredentialResolver(resolvers.credential),
      parameter: normalizeParameterResolver(resolvers.parameter),
      decrypt: normalizeDecryptResolver(resolvers.decrypt),
    },
  };

  return deepFreeze(config);
}

/**
 * Loads the config file named by CONFIG_PATH (or data/config.json, then the
 * bundled example). A missing or unreadable file yields the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const candidates = env.CONFIG_PATH ? [env.CONFIG_PATH] : [DEFAULT_CONFIG_PATH, EXAMPLE_CONFIG_PATH];

  for (const candidate of candidates) {
    const filePath = path.resolve(process.cwd(), candidate);
    if (!fs.existsSync(filePath)) continue;
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      console.log(`[Config] Loaded ${filePath}`);
      return normalizeConfig(parsed, env);
    } catch (error) {
      console.error(`[Config] Failed to read ${filePath}:`, error);
    }
  }

  console.warn('[Config] No config file found, using defaults');
  return normalizeConfig({}, env);
}
