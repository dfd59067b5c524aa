import type { EpisodeURL } from '@/types';

const GROUP_SEPARATOR = '$$$';
const EPISODE_SEPARATOR = '#';
const TOKEN_SEPARATOR = '$';

const isPlayableUrl = (token: string): boolean => /^https?:\/\//i.test(token);

// Some sources append a quality hint like "(1080P)" to the URL
const stripSuffix = (url: string): string => url.replace(/\(\w+\)$/, '');

/**
 * Extracts the episodes of one play-source group.
 *
 * Standard groups (`name$url1$url2`) yield unlabeled episodes. Labeled groups
 * (`name$label1$url1#label2$url2`) take the token right before each URL as
 * its label; an empty token means the episode is positional.
 */
export function parsePlayGroup(group: string): EpisodeURL[] {
  const segments = group.split(EPISODE_SEPARATOR);
  const labeled = segments.length > 1;
  const episodes: EpisodeURL[] = [];
  const seen = new Set<string>();

  for (const segment of segments) {
    const tokens = segment.split(TOKEN_SEPARATOR).map(token => token.trim());

    tokens.forEach((token, index) => {
      if (!isPlayableUrl(token)) return;
      const rawURL = stripSuffix(token);
      if (seen.has(rawURL)) return;
      seen.add(rawURL);

      let label: string | null = null;
      if (labeled && index > 0) {
        const previous = tokens[index - 1];
        if (previous && !isPlayableUrl(previous)) label = previous;
      }
      episodes.push({ label, rawURL });
    });
  }

  return episodes;
}

/**
 * Picks the play-source group with the most extractable URLs. Ties keep the
 * earlier group.
 */
export function parsePlayManifest(manifest: string | null | undefined): EpisodeURL[] {
  if (!manifest) return [];

  let best: EpisodeURL[] = [];
  for (const group of manifest.split(GROUP_SEPARATOR)) {
    const episodes = parsePlayGroup(group);
    if (episodes.length > best.length) best = episodes;
  }
  return best;
}
