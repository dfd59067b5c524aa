// Per-attempt resolver chatter is off unless DEBUG_RESOLVER_LOGS=1
export const DEBUG_RESOLVER_LOGS = process.env.DEBUG_RESOLVER_LOGS === '1';

export function debugLog(scope: string, message: string) {
  if (DEBUG_RESOLVER_LOGS) {
    console.log(`[${scope}] ${message}`);
  }
}

export const shortUrl = (url: string): string => (url.length > 100 ? `${url.substring(0, 100)}...` : url);
