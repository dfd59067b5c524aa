import { CancellationToken } from './cancellation';
import { createLimiter, type Limiter } from './concurrency';
import { errorMessage } from './errors';
import { shortUrl } from './debug';
import type { PlayableStream } from '@/types';

export interface StreamResolver {
  resolve(rawURL: string, token?: CancellationToken): Promise<PlayableStream | null>;
}

/**
 * Fans episode resolution out over the fallback chain with bounded
 * concurrency. Each distinct raw URL gets one token and one chain run, shared
 * by every episode in the batch that points at it.
 */
export class EpisodeResolver {
  private chain: StreamResolver;
  private limit: Limiter;

  constructor(chain: StreamResolver, concurrency: number) {
    this.chain = chain;
    this.limit = createLimiter(concurrency);
  }

  async resolveBatch(rawURLs: string[]): Promise<Map<string, PlayableStream>> {
    const pending = new Map<string, Promise<PlayableStream | null>>();

    for (const rawURL of rawURLs) {
      if (pending.has(rawURL)) continue;
      const token = new CancellationToken();
      pending.set(
        rawURL,
        this.limit(() => this.chain.resolve(rawURL, token)).catch((error: unknown) => {
          console.error(`[EpisodeResolver] ${shortUrl(rawURL)} failed: ${errorMessage(error)}`);
          return null;
        })
      );
    }

    const entries = await Promise.all(
      [...pending].map(async ([rawURL, promise]) => [rawURL, await promise] as const)
    );

    const resolved = new Map<string, PlayableStream>();
    for (const [rawURL, stream] of entries) {
      if (stream) resolved.set(rawURL, stream);
    }

    const failed = pending.size - resolved.size;
    if (failed > 0) {
      console.warn(`[EpisodeResolver] ${failed}/${pending.size} episodes exhausted every resolver`);
    }
    return resolved;
  }
}
