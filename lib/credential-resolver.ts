import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_HEADERS, type CredentialResolverConfig } from './config';
import type { CredentialStore } from './credential-store';
import { NoActiveCredentialError, errorMessage } from './errors';
import { isManifest, resolveUri } from './manifest';
import { debugLog } from './debug';
import type { Credential, ResolverStrategy } from '@/types';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

/**
 * Resolves through the paid parsing API, one pooled credential per request.
 * A failed request is retried with the next credential in rotation, up to
 * `rotationsPerCall` credentials per call.
 */
export class CredentialResolver implements ResolverStrategy {
  readonly kind = 'credential' as const;
  private store: CredentialStore;
  private config: CredentialResolverConfig;
  private session: AxiosInstance;

  constructor(store: CredentialStore, config: CredentialResolverConfig, session?: AxiosInstance) {
    this.store = store;
    this.config = config;
    this.session = session ?? axios.create({ headers: DEFAULT_HEADERS });
  }

  async resolve(sourceURL: string): Promise<string | null> {
    for (let rotation = 0; rotation < this.config.rotationsPerCall; rotation++) {
      const credential = this.store.checkoutNext();
      if (!credential) {
        if (rotation === 0) throw new NoActiveCredentialError();
        return null;
      }

      const streamUrl = await this.request(sourceURL, credential);
      if (streamUrl) return streamUrl;
    }
    return null;
  }

  private buildUrl(sourceURL: string, credential: Credential): string {
    const url = new URL(this.config.apiUrl);
    url.searchParams.set('type', 'app');
    url.searchParams.set('uid', credential.externalUID);
    url.searchParams.set('key', credential.externalKey);
    url.searchParams.set('url', sourceURL);
    return url.toString();
  }

  private async request(sourceURL: string, credential: Credential): Promise<string | null> {
    const requestUrl = this.buildUrl(sourceURL, credential);
    try {
      const response = await this.session.get<unknown>(requestUrl, {
        timeout: this.config.timeoutMs,
        maxRedirects: 0,
        responseType: 'text',
        validateStatus: () => true,
      });

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers['location'];
        if (typeof location === 'string' && location) return resolveUri(location, requestUrl);
        debugLog('CredentialResolver', `Redirect without Location (uid=${credential.externalUID})`);
        return null;
      }

      if (response.status !== 200) {
        debugLog('CredentialResolver', `HTTP ${response.status} (uid=${credential.externalUID})`);
        return null;
      }

      const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
      // The API streams the manifest itself when the request URL is already playable
      if (isManifest(body)) return requestUrl;

      const match = body.match(/var url = "([^"]+)"/) ?? body.match(/(https?:\/\/[^\s"']+\.m3u8[^\s"']*)/);
      if (match) return match[1];

      debugLog('CredentialResolver', `No stream in response (uid=${credential.externalUID})`);
      return null;
    } catch (error) {
      debugLog('CredentialResolver', `Request failed (uid=${credential.externalUID}): ${errorMessage(error)}`);
      return null;
    }
  }
}
