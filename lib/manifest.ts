export const MANIFEST_HEADER = '#EXTM3U';
const STREAM_INF = '#EXT-X-STREAM-INF';

export const isManifest = (body: string): boolean => body.includes(MANIFEST_HEADER);

/** A master manifest lists variant streams instead of media segments. */
export const isMasterManifest = (body: string): boolean => body.includes(STREAM_INF);

export const isDirectMediaUrl = (url: string): boolean => {
  try {
    return new URL(url).pathname.toLowerCase().endsWith('.mp4');
  } catch {
    return /\.mp4(\?|#|$)/i.test(url);
  }
};

export const resolveUri = (uri: string, baseUrl: string): string => new URL(uri, baseUrl).toString();

/** URI of the first variant listed after a stream-selection tag, resolved against the manifest URL. */
export function firstVariantUrl(body: string, manifestUrl: string): string | null {
  const lines = body.split(/\r?\n/).map(line => line.trim());
  for (let i = 0; i < lines.length; i++) {
    if (!lines[i].startsWith(STREAM_INF)) continue;
    for (let j = i + 1; j < lines.length; j++) {
      const line = lines[j];
      if (!line || line.startsWith('#')) continue;
      return resolveUri(line, manifestUrl);
    }
  }
  return null;
}

/** Rewrites relative segment and key URIs so the manifest can be served from elsewhere. */
export function absolutizeManifest(body: string, manifestUrl: string): string {
  return body
    .split(/\r?\n/)
    .map(line => {
      const trimmed = line.trim();
      if (!trimmed) return line;
      if (trimmed.startsWith('#')) {
        return line.replace(/URI="([^"]+)"/g, (_match, uri: string) => `URI="${resolveUri(uri, manifestUrl)}"`);
      }
      return resolveUri(trimmed, manifestUrl);
    })
    .join('\n');
}
