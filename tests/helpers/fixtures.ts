import fs from 'fs';
import os from 'os';
import path from 'path';
import { normalizeConfig, type AppConfig } from '@/lib/config';
import type { CatalogItem, PlayableStream, ResolverKind, ResolverStrategy, VodRecord } from '@/types';

export function testConfig(overrides: Record<string, unknown> = {}): Readonly<AppConfig> {
  return normalizeConfig(
    {
      databasePath: ':memory:',
      artifactDir: makeTempDir(),
      ...overrides,
    },
    {}
  );
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'vod-aggregator-'));
}

export function catalogItem(overrides: Partial<CatalogItem> = {}): CatalogItem {
  return {
    id: '1',
    title: 'Harbor Lights',
    class: 'Drama',
    year: '2021',
    description: '',
    sourceKey: 'alpha',
    sourceName: 'Alpha',
    sourcePriority: 1,
    rawPlayManifest: '',
    poster: '',
    typeName: 'Series',
    doubanId: null,
    ...overrides,
  };
}

export function vodRecord(overrides: VodRecord = {}): VodRecord {
  return {
    vod_id: 1,
    vod_name: 'Harbor Lights',
    vod_play_url: 'HD$https://media.example.com/a/1.m3u8',
    vod_pic: 'https://img.example.com/1.jpg',
    vod_year: '2021',
    vod_class: 'Drama',
    vod_content: '<p>A quiet town.</p>',
    type_name: 'Series',
    ...overrides,
  };
}

/** Labeled play manifest `Ep01$u1#Ep02$u2...`. */
export const labeledManifest = (urls: string[]): string =>
  urls.map((url, index) => `Ep${String(index + 1).padStart(2, '0')}$${url}`).join('#');

export const streamFor = (rawURL: string): PlayableStream => ({
  finalURL: `${rawURL}/final.m3u8`,
  cachedArtifactRef: null,
});

export function fakeStrategy(
  kind: ResolverKind,
  resolve: (sourceURL: string) => Promise<string | null>
): ResolverStrategy {
  return { kind, resolve };
}

export const MEDIA_MANIFEST = ['#EXTM3U', '#EXT-X-TARGETDURATION:10', '#EXTINF:10,', 'seg-0.ts', '#EXT-X-ENDLIST'].join('\n');

export const masterManifest = (variant: string): string =>
  ['#EXTM3U', '#EXT-X-STREAM-INF:BANDWIDTH=1280000,RESOLUTION=1280x720', variant].join('\n');
