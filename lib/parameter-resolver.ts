import axios, { type AxiosInstance } from 'axios';
import { DEFAULT_HEADERS, type ParameterResolverConfig } from './config';
import { errorMessage } from './errors';
import { debugLog } from './debug';
import type { SharedParameterStore } from './shared-parameter';
import type { ResolverStrategy } from '@/types';

const M3U8_IN_TEXT = /https?:\/\/[^\s"'<>]+\.m3u8[^\s"'<>]*/i;

/** Depth-first search for the first absolute .m3u8 URL anywhere in a JSON value. */
export function findStreamUrl(value: unknown): string | null {
  if (typeof value === 'string') {
    return value.startsWith('http') && value.includes('.m3u8') ? value : null;
  }
  if (Array.isArray(value)) {
    for (const entry of value) {
      const found = findStreamUrl(entry);
      if (found) return found;
    }
    return null;
  }
  if (typeof value === 'object' && value !== null) {
    for (const entry of Object.values(value)) {
      const found = findStreamUrl(entry);
      if (found) return found;
    }
  }
  return null;
}

export class ParameterResolver implements ResolverStrategy {
  readonly kind = 'parameter' as const;
  private parameters: SharedParameterStore;
  private config: ParameterResolverConfig;
  private session: AxiosInstance;

  constructor(parameters: SharedParameterStore, config: ParameterResolverConfig, session?: AxiosInstance) {
    this.parameters = parameters;
    this.config = config;
    this.session = session ?? axios.create({ headers: DEFAULT_HEADERS });
  }

  async resolve(sourceURL: string): Promise<string | null> {
    const parameter = await this.parameters.get();
    if (!parameter) {
      debugLog('ParameterResolver', 'No shared parameter available');
      return null;
    }

    try {
      const response = await this.session.get<unknown>(this.config.apiUrl, {
        params: { z: parameter.value, jx: sourceURL, s1ig: parameter.signature, g: parameter.group },
        timeout: this.config.timeoutMs,
        validateStatus: () => true,
      });
      if (response.status !== 200) {
        debugLog('ParameterResolver', `HTTP ${response.status}`);
        return null;
      }

      const { data } = response;
      if (typeof data === 'string') {
        const fromText = data.match(M3U8_IN_TEXT)?.[0] ?? null;
        let parsed: unknown;
        try {
          parsed = JSON.parse(data);
        } catch {
          return fromText;
        }
        return findStreamUrl(parsed) ?? fromText;
      }
      return findStreamUrl(data);
    } catch (error) {
      debugLog('ParameterResolver', `Request failed: ${errorMessage(error)}`);
      return null;
    }
  }
}
