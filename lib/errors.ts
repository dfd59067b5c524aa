export type PipelineErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'RESOLVER_EXHAUSTED'
  | 'NO_ACTIVE_CREDENTIAL'
  | 'CACHE_PERSIST_FAILURE'
  | 'MASTER_PLAYLIST_LOOP';

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;

  constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A catalog source timed out, failed, or answered with something unparseable. */
export class SourceUnavailableError extends PipelineError {
  readonly sourceKey: string;

  constructor(sourceKey: string, reason: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `Source ${sourceKey} unavailable: ${reason}`, options);
    this.sourceKey = sourceKey;
  }
}

export class ResolverExhaustedError extends PipelineError {
  readonly rawURL: string;

  constructor(rawURL: string) {
    super('RESOLVER_EXHAUSTED', `All resolvers failed for ${rawURL.substring(0, 100)}`);
    this.rawURL = rawURL;
  }
}

export class NoActiveCredentialError extends PipelineError {
  constructor() {
    super('NO_ACTIVE_CREDENTIAL', 'No active credential available');
  }
}

export class CachePersistFailureError extends PipelineError {
  readonly key: string;

  constructor(key: string, options?: { cause?: unknown }) {
    super('CACHE_PERSIST_FAILURE', `Failed to persist cache entry "${key}"`, options);
    this.key = key;
  }
}

export class MasterPlaylistLoopError extends PipelineError {
  readonly url: string;

  constructor(url: string) {
    super('MASTER_PLAYLIST_LOOP', `Master playlist points at another master playlist: ${url.substring(0, 100)}`);
    this.url = url;
  }
}

export const isPipelineError = (error: unknown, code?: PipelineErrorCode): error is PipelineError =>
  error instanceof PipelineError && (code === undefined || error.code === code);

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
