import axios, { type AxiosInstance } from 'axios';
import type { ArtifactStore } from './artifact-store';
import { CancellationToken } from './cancellation';
import { DEFAULT_HEADERS } from './config';
import { MasterPlaylistLoopError, errorMessage, isPipelineError } from './errors';
import { firstVariantUrl, isDirectMediaUrl, isManifest, isMasterManifest } from './manifest';
import { debugLog, shortUrl } from './debug';
import type { PlayableStream, ResolverKind, ResolverStrategy, StreamResolution } from '@/types';

const PRIORITY: Record<ResolverKind, number> = {
  credential: 0,
  parameter: 1,
  decrypt: 2,
};

// A failed first fetch may succeed with another credential; a failed variant fetch will not
type FinalizeOutcome = { stream: PlayableStream } | { stream: null; retryable: boolean };

export interface FallbackChainOptions {
  strategies: ResolverStrategy[];
  artifacts: ArtifactStore;
  /** Extra attempts granted to the credential strategy. */
  retryCount: number;
  manifestTimeoutMs?: number;
  session?: AxiosInstance;
}

export class FallbackChain {
  private strategies: ResolverStrategy[];
  private artifacts: ArtifactStore;
  private retryCount: number;
  private manifestTimeoutMs: number;
  private session: AxiosInstance;

  constructor(options: FallbackChainOptions) {
    this.strategies = [...options.strategies].sort((a, b) => PRIORITY[a.kind] - PRIORITY[b.kind]);
    this.artifacts = options.artifacts;
    this.retryCount = Math.max(0, options.retryCount);
    this.manifestTimeoutMs = options.manifestTimeoutMs ?? 10000;
    this.session = options.session ?? axios.create({ headers: DEFAULT_HEADERS });
  }

  get order(): ResolverKind[] {
    return this.strategies.map(strategy => strategy.kind);
  }

  private attemptsFor(strategy: ResolverStrategy): number {
    return strategy.kind === 'credential' ? 1 + this.retryCount : 1;
  }

  /**
   * Runs the strategies in priority order until one yields a usable stream.
   *
   * The token is checked before every attempt. The first chain to succeed
   * cancels it; a chain that finishes after that drops its own result and
   * returns null. Returns null when every strategy is exhausted.
   */
  async resolve(rawURL: string, token: CancellationToken = new CancellationToken()): Promise<PlayableStream | null> {
    const resolution = await this.resolveWithMethod(rawURL, token);
    return resolution?.stream ?? null;
  }

  /** Same as `resolve`, also naming the strategy that produced the stream. */
  async resolveWithMethod(
    rawURL: string,
    token: CancellationToken = new CancellationToken()
  ): Promise<StreamResolution | null> {
    for (const strategy of this.strategies) {
      const attempts = this.attemptsFor(strategy);

      for (let attempt = 1; attempt <= attempts; attempt++) {
        if (token.isCancelled) return null;

        let streamUrl: string | null;
        try {
          streamUrl = await strategy.resolve(rawURL);
        } catch (error) {
          if (isPipelineError(error, 'NO_ACTIVE_CREDENTIAL')) {
            console.warn(`[FallbackChain] ${error.message}, skipping ${strategy.kind}`);
            break;
          }
          debugLog('FallbackChain', `${strategy.kind} attempt ${attempt}/${attempts} threw: ${errorMessage(error)}`);
          continue;
        }

        if (!streamUrl) {
          debugLog('FallbackChain', `${strategy.kind} attempt ${attempt}/${attempts} found nothing for ${shortUrl(rawURL)}`);
          continue;
        }

        let outcome: FinalizeOutcome;
        try {
          outcome = await this.finalize(streamUrl);
        } catch (error) {
          if (error instanceof MasterPlaylistLoopError) {
            console.warn(`[FallbackChain] ${error.message}`);
            return null;
          }
          throw error;
        }
        if (outcome.stream === null) {
          if (outcome.retryable) continue;
          break;
        }
        const { stream } = outcome;

        if (!token.cancel(`resolved by ${strategy.kind}`)) {
          debugLog('FallbackChain', `${strategy.kind} finished after another chain won for ${shortUrl(rawURL)}`);
          return null;
        }
        console.log(`[FallbackChain] ${strategy.kind} resolved ${shortUrl(rawURL)}`);
        return { stream, method: strategy.kind };
      }
    }

    return null;
  }

  /**
   * Turns a stream URL into a PlayableStream. Direct media files pass
   * through; manifests are fetched, a master manifest is followed exactly one
   * hop, and the resulting media manifest is stored as an artifact.
   */
  private async finalize(streamUrl: string): Promise<FinalizeOutcome> {
    if (isDirectMediaUrl(streamUrl)) {
      return { stream: { finalURL: streamUrl, cachedArtifactRef: null } };
    }

    let finalURL = streamUrl;
    let body = await this.fetchManifest(streamUrl);
    if (body === null) return { stream: null, retryable: true };

    if (isMasterManifest(body)) {
      const variantUrl = firstVariantUrl(body, streamUrl);
      if (!variantUrl) return { stream: null, retryable: false };

      finalURL = variantUrl;
      body = await this.fetchManifest(variantUrl);
      if (body === null) return { stream: null, retryable: false };
      if (isMasterManifest(body)) throw new MasterPlaylistLoopError(variantUrl);
    }

    try {
      return { stream: { finalURL, cachedArtifactRef: this.artifacts.save(body, finalURL) } };
    } catch (error) {
      console.error(`[FallbackChain] Failed to store manifest for ${shortUrl(finalURL)}: ${errorMessage(error)}`);
      return { stream: { finalURL, cachedArtifactRef: null } };
    }
  }

  private async fetchManifest(url: string): Promise<string | null> {
    try {
      const response = await this.session.get<unknown>(url, {
        timeout: this.manifestTimeoutMs,
        responseType: 'text',
        validateStatus: () => true,
      });
      if (response.status !== 200 || typeof response.data !== 'string' || !isManifest(response.data)) {
        debugLog('FallbackChain', `Not a manifest (HTTP ${response.status}): ${shortUrl(url)}`);
        return null;
      }
      return response.data;
    } catch (error) {
      debugLog('FallbackChain', `Manifest fetch failed for ${shortUrl(url)}: ${errorMessage(error)}`);
      return null;
    }
  }
}
