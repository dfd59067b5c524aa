import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { errorMessage, isPipelineError } from '@/lib/errors';
import type { Services } from '@/lib/services';
import type { PlayableStream, ResolvedItem } from '@/types';

const MANIFEST_CONTENT_TYPE = 'application/vnd.apple.mpegurl';

const queryString = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

const isFlagSet = (value: unknown): boolean => {
  const flag = queryString(value).toLowerCase();
  return flag === '1' || flag === 'true';
};

export function createApp(services: Services, startedAt: number = Date.now()) {
  const { config, search, cache, artifacts, credentials, parameters } = services;
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Served manifests are addressed by artifact id, not by the upstream URL
  const withPlayUrl = (stream: PlayableStream) => ({
    ...stream,
    playUrl: stream.cachedArtifactRef
      ? `${config.publicBaseUrl}/api/v1/m3u8/${stream.cachedArtifactRef}`
      : stream.finalURL,
  });

  const present = (item: ResolvedItem) => ({
    ...item,
    episodes: item.episodes.map(episode => ({ ...episode, stream: withPlayUrl(episode.stream) })),
  });

  app.get('/health', (req: Request, res: Response) => {
    const parameter = parameters?.status() ?? null;
    res.json({
      status: parameter && parameter.expired ? 'degraded' : 'healthy',
      uptime: Math.floor((Date.now() - startedAt) / 1000),
      sources: config.sourceList.length,
      activeCredentials: credentials.activeCount(),
      sharedParameter: parameter,
      cache: cache.stats(),
    });
  });

  app.get('/api/v1/search', async (req: Request, res: Response): Promise<void> => {
    const ac = queryString(req.query.ac) || 'videolist';
    const keyword = queryString(req.query.wd);

    if (ac !== 'videolist') {
      res.status(400).json({ error: "Query parameter 'ac' must be 'videolist'" });
      return;
    }
    if (!keyword) {
      res.status(400).json({ error: "Query parameter 'wd' is required" });
      return;
    }

    const started = Date.now();
    try {
      const outcome = await search.search(keyword, { refresh: isFlagSet(req.query.refresh) });
      const body = {
        keyword,
        total: outcome.items.length,
        fromCache: outcome.fromCache,
        took: Date.now() - started,
        list: outcome.items.map(present),
      };
      res.status(outcome.items.length > 0 ? 200 : 404).json(body);
    } catch (error) {
      console.error('[Server] Search failed:', error);
      res.status(500).json({ error: errorMessage(error) });
    }
  });

  app.get('/api/v1/parse', async (req: Request, res: Response): Promise<void> => {
    const url = queryString(req.query.url);
    if (!/^https?:\/\//i.test(url)) {
      res.status(400).json({ error: "Query parameter 'url' must be an http(s) URL" });
      return;
    }

    try {
      const { stream, method, took } = await search.resolveUrl(url);
      res.json({ success: true, data: withPlayUrl(stream), method, took });
    } catch (error) {
      if (isPipelineError(error, 'RESOLVER_EXHAUSTED')) {
        res.status(502).json({ success: false, code: error.code, error: error.message });
        return;
      }
      console.error('[Server] Parse failed:', error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    }
  });

  app.get('/api/v1/m3u8/:fileId', (req: Request, res: Response) => {
    const manifest = artifacts.read(req.params.fileId);
    if (manifest === null) {
      res.status(404).json({ error: 'Manifest not found' });
      return;
    }
    res.type(MANIFEST_CONTENT_TYPE).send(manifest);
  });

  app.delete('/api/v1/cache/:keyword', (req: Request, res: Response) => {
    const removed = cache.clear(req.params.keyword);
    res.json({ keyword: req.params.keyword, removed });
  });

  app.delete('/api/v1/cache', (req: Request, res: Response) => {
    if (isFlagSet(req.query.expired)) {
      res.json({ removed: cache.clearExpired(), scope: 'expired' });
      return;
    }
    res.json({ removed: cache.clearAll(), scope: 'all' });
  });

  return app;
}
