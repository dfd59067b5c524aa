import axios, { type AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import crypto from 'crypto';
import { DEFAULT_HEADERS, type DecryptResolverConfig } from './config';
import { errorMessage } from './errors';
import { isDirectMediaUrl, resolveUri } from './manifest';
import { debugLog, shortUrl } from './debug';
import type { ResolverStrategy } from '@/types';

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const HEAD_UNSUPPORTED = new Set([405, 501]);
const AES_KEY_SIZES = [16, 24, 32];

const isHex = (value: string): boolean => value.length % 2 === 0 && /^[0-9a-f]+$/i.test(value);

// A wrong IV only garbles the first block, so the prefix alone proves nothing
const isCleanUrl = (plain: string): boolean => {
  if (!/^https?:\/\/[\x21-\x7e]+$/i.test(plain)) return false;
  try {
    new URL(plain);
    return true;
  } catch {
    return false;
  }
};

/** Key candidates in the order the player script has been seen to use them. */
export function deriveKeys(keyString: string): Buffer[] {
  const raw = Buffer.from(keyString, 'utf-8');
  const sha256 = crypto.createHash('sha256').update(raw).digest();
  const keys: Buffer[] = [];

  if (AES_KEY_SIZES.includes(raw.length)) keys.push(raw);
  keys.push(crypto.createHash('md5').update(raw).digest());
  for (const size of AES_KEY_SIZES) {
    if (size !== raw.length) keys.push(sha256.subarray(0, size));
  }
  return keys;
}

export function deriveIvs(iv: string): Buffer[] {
  const ivs: Buffer[] = [];
  const utf8 = Buffer.from(iv, 'utf-8');
  if (utf8.length === 16) ivs.push(utf8);

  if (isHex(iv)) {
    const bytes = Buffer.from(iv, 'hex');
    if (bytes.length < 16) {
      ivs.push(Buffer.concat([bytes, Buffer.alloc(16 - bytes.length)]));
      ivs.push(Buffer.concat([bytes, bytes, bytes]).subarray(0, 16));
    } else if (bytes.length === 16) {
      ivs.push(bytes);
    }
  }
  return ivs;
}

/**
 * Tries every key/IV derivation against an AES-CBC, base64-encoded URL.
 * Returns the first plaintext that is a well-formed, printable http(s) URL.
 */
export function decryptPlayerUrl(encrypted: string, keyString: string, iv: string): string | null {
  const data = Buffer.from(encrypted.replace(/\\\//g, '/'), 'base64');
  if (data.length === 0 || data.length % 16 !== 0) return null;

  for (const key of deriveKeys(keyString)) {
    for (const ivBytes of deriveIvs(iv)) {
      try {
        const decipher = crypto.createDecipheriv(`aes-${key.length * 8}-cbc`, key, ivBytes);
        const plain = Buffer.concat([decipher.update(data), decipher.final()]).toString('utf-8').trim();
        if (isCleanUrl(plain)) return plain;
      } catch {
        // bad padding: wrong key/IV pair
        continue;
      }
    }
  }
  return null;
}

/**
 * Scrapes a public parser page: finds its player iframe, decrypts the
 * embedded stream URL, then follows redirects to a manifest or media file.
 */
export class DecryptResolver implements ResolverStrategy {
  readonly kind = 'decrypt' as const;
  private config: DecryptResolverConfig;
  private session: AxiosInstance;

  constructor(config: DecryptResolverConfig, session?: AxiosInstance) {
    this.config = config;
    this.session = session ?? axios.create({ headers: DEFAULT_HEADERS });
  }

  async resolve(sourceURL: string): Promise<string | null> {
    try {
      const pageUrl = `${this.config.parserUrl}/?url=${encodeURIComponent(sourceURL)}`;
      const page = await this.fetchText(pageUrl);
      if (!page) return null;

      const iframeSrc = cheerio.load(page)('iframe[src]').first().attr('src');
      if (!iframeSrc) {
        debugLog('DecryptResolver', `No iframe on parser page for ${shortUrl(sourceURL)}`);
        return null;
      }

      const iframeUrl = resolveUri(iframeSrc, pageUrl);
      const player = await this.fetchText(iframeUrl, pageUrl);
      if (!player) return null;

      const encrypted = player.match(/"url"\s*:\s*"([^"]+)"/)?.[1];
      const uid = player.match(/"uid"\s*:\s*"([^"]+)"/)?.[1];
      if (!encrypted || !uid) {
        debugLog('DecryptResolver', 'Player config not found in iframe');
        return null;
      }

      const decrypted = decryptPlayerUrl(encrypted, `${this.config.keyPrefix}${uid}${this.config.keySuffix}`, this.config.iv);
      if (!decrypted) {
        debugLog('DecryptResolver', `Decryption failed (uid=${uid})`);
        return null;
      }

      return await this.followToStream(decrypted);
    } catch (error) {
      debugLog('DecryptResolver', `Failed for ${shortUrl(sourceURL)}: ${errorMessage(error)}`);
      return null;
    }
  }

  private async fetchText(url: string, referer?: string): Promise<string | null> {
    const response = await this.session.get<unknown>(url, {
      timeout: this.config.timeoutMs,
      responseType: 'text',
      headers: referer ? { Referer: referer } : undefined,
      validateStatus: () => true,
    });
    if (response.status !== 200 || typeof response.data !== 'string') {
      debugLog('DecryptResolver', `HTTP ${response.status} for ${shortUrl(url)}`);
      return null;
    }
    return response.data;
  }

  /**
   * Walks the redirect chain with HEAD requests. The manifest body itself is
   * fetched and validated once, by the fallback chain.
   */
  private async followToStream(startUrl: string): Promise<string | null> {
    let url = startUrl;
    for (let hop = 0; hop <= this.config.maxRedirects; hop++) {
      if (isDirectMediaUrl(url)) return url;

      const response = await this.session.head(url, {
        timeout: this.config.timeoutMs,
        maxRedirects: 0,
        validateStatus: () => true,
      });

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers['location'];
        if (typeof location !== 'string' || !location) return null;
        url = resolveUri(location, url);
        continue;
      }

      if ((response.status >= 200 && response.status < 300) || HEAD_UNSUPPORTED.has(response.status)) {
        return url;
      }
      debugLog('DecryptResolver', `HTTP ${response.status} for ${shortUrl(url)}`);
      return null;
    }

    debugLog('DecryptResolver', `Too many redirects from ${shortUrl(startUrl)}`);
    return null;
  }
}
