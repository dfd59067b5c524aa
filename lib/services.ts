import type { AxiosInstance } from 'axios';
import { ArtifactStore } from './artifact-store';
import type { AppConfig } from './config';
import { CredentialResolver } from './credential-resolver';
import { CredentialStore } from './credential-store';
import { openDatabase, type DB } from './db';
import { DecryptResolver } from './decrypt-resolver';
import { EpisodeResolver } from './episode-resolver';
import { FallbackChain } from './fallback-chain';
import { ParameterResolver } from './parameter-resolver';
import { ResultCache } from './result-cache';
import { SearchService } from './search-service';
import { SharedParameterStore } from './shared-parameter';
import { SourceAggregator } from './source-aggregator';
import type { ResolverStrategy } from '@/types';

export interface Services {
  config: Readonly<AppConfig>;
  db: DB;
  credentials: CredentialStore;
  parameters: SharedParameterStore | null;
  artifacts: ArtifactStore;
  aggregator: SourceAggregator;
  chain: FallbackChain;
  cache: ResultCache;
  search: SearchService;
}

export interface ServiceOverrides {
  db?: DB;
  /** One HTTP session for every outbound call (tests pass a stub). */
  session?: AxiosInstance;
  now?: () => Date;
}

export function createServices(config: Readonly<AppConfig>, overrides: ServiceOverrides = {}): Services {
  const { session, now } = overrides;
  const db = overrides.db ?? openDatabase(config.databasePath);

  const credentials = new CredentialStore(db, now);
  const parameters = config.resolvers.parameter
    ? new SharedParameterStore(db, config.resolvers.parameter, session, now)
    : null;

  const strategies: ResolverStrategy[] = [];
  if (config.resolvers.credential) {
    strategies.push(new CredentialResolver(credentials, config.resolvers.credential, session));
  }
  if (parameters && config.resolvers.parameter) {
    strategies.push(new ParameterResolver(parameters, config.resolvers.parameter, session));
  }
  if (config.resolvers.decrypt) {
    strategies.push(new DecryptResolver(config.resolvers.decrypt, session));
  }
  if (strategies.length === 0) {
    console.warn('[Services] No resolver configured; searches will return no playable items');
  }

  const artifacts = new ArtifactStore(config.artifactDir);
  const chain = new FallbackChain({
    strategies,
    artifacts,
    retryCount: config.resolverRetryCount,
    manifestTimeoutMs: config.manifestTimeoutMs,
    session,
  });
  const aggregator = new SourceAggregator(config, session);
  const cache = new ResultCache(db, new EpisodeResolver(chain, config.resolveConcurrencyLimit), {
    ttlSeconds: config.cacheTTLSeconds,
    now,
  });
  const search = new SearchService({
    aggregator,
    cache,
    chain,
    refreshAfterSeconds: config.cacheRefreshSeconds,
    now,
  });

  return { config, db, credentials, parameters, artifacts, aggregator, chain, cache, search };
}
